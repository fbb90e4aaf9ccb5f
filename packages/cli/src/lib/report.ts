/**
 * Human and machine readable rendering of an evaluation result
 */

import {
  hasBlockingFindings,
  type EvaluationResult,
  type OverriddenFinding,
  type RatedFinding,
  type ResolutionError,
  type ScanMode,
  ResolutionWarning,
} from '@vulngate/core';

/** Unreachable findings listed before the "... and N more" line */
export const INFO_DISPLAY_LIMIT = 10;

export function infoHeading(scanMode: ScanMode): string {
  return scanMode === 'binary' ? 'Informational vulnerabilities' : 'Not reachable vulnerabilities';
}

function formatRated(entry: RatedFinding): string[] {
  const { finding, severity } = entry;
  const lines = [`  - ${finding.id} [${severity.level}] ${finding.summary}`.trimEnd()];

  if (severity.score > 0) lines.push(`    cvss score: ${severity.score.toFixed(1)}`);
  if (severity.source) lines.push(`    severity source: ${severity.source}`);
  lines.push(`    severity method: ${severity.method}`);
  if (severity.reason) lines.push(`    severity reason: ${severity.reason}`);
  if (finding.fixedVersions.length > 0) lines.push(`    fixed versions: ${finding.fixedVersions.join(', ')}`);
  if (finding.url) lines.push(`    more info: ${finding.url}`);
  if (entry.resolverError) {
    for (const message of entry.resolverError.message.split('\n')) {
      lines.push(`    resolver warning: ${message}`);
    }
  }

  return lines;
}

function formatOverride(entry: OverriddenFinding, verb: 'accepted by' | 'override'): string[] {
  const { finding, override, matchedBy } = entry;
  const head =
    verb === 'override'
      ? `  - ${finding.id} override ${matchedBy} expired on ${override.expiresOn}`
      : `  - ${finding.id} accepted by ${matchedBy} until ${override.expiresOn}`;
  return [head, `    reason: ${override.reason}`];
}

/**
 * Plain-text report, one entry per line.
 */
export function formatReport(scanMode: ScanMode, result: EvaluationResult): string[] {
  const lines = [
    `vulnerability policy results (${scanMode})`,
    `  fail: ${result.fail.length + result.expired.length}`,
    `  warn: ${result.warn.length}`,
    `  accepted: ${result.accepted.length}`,
    `  info: ${result.info.length}`,
  ];

  if (result.expired.length > 0) {
    lines.push('', 'Expired overrides');
    for (const entry of result.expired) lines.push(...formatOverride(entry, 'override'));
  }

  if (result.fail.length > 0) {
    lines.push('', 'Failing vulnerabilities');
    for (const entry of result.fail) lines.push(...formatRated(entry));
  }

  if (result.warn.length > 0) {
    lines.push('', 'Warning vulnerabilities');
    for (const entry of result.warn) lines.push(...formatRated(entry));
  }

  if (result.accepted.length > 0) {
    lines.push('', 'Accepted risk overrides');
    for (const entry of result.accepted) lines.push(...formatOverride(entry, 'accepted by'));
  }

  if (result.info.length > 0) {
    const heading = infoHeading(scanMode);
    lines.push('', heading);
    for (const { finding } of result.info.slice(0, INFO_DISPLAY_LIMIT)) {
      lines.push(`  - ${finding.id} ${finding.summary}`.trimEnd());
      if (finding.url) lines.push(`    more info: ${finding.url}`);
    }
    if (result.info.length > INFO_DISPLAY_LIMIT) {
      lines.push(`  ... and ${result.info.length - INFO_DISPLAY_LIMIT} more ${heading.toLowerCase()}`);
    }
  }

  return lines;
}

// ============================================================================
// JSON Report
// ============================================================================

export interface JsonResolverCause {
  source: string;
  identifier: string;
  kind: string;
  status?: number;
  message: string;
}

export interface JsonReport {
  scanMode: ScanMode;
  passed: boolean;
  summary: { fail: number; warn: number; accepted: number; info: number; expired: number };
  fail: JsonRatedEntry[];
  warn: JsonRatedEntry[];
  info: Array<{ id: string; summary: string; url: string }>;
  accepted: JsonOverrideEntry[];
  expired: JsonOverrideEntry[];
}

export interface JsonRatedEntry {
  id: string;
  aliases: string[];
  summary: string;
  url: string;
  fixedVersions: string[];
  severity: { level: string; score: number; source: string; method: string; reason?: string };
  resolverWarnings?: Array<JsonResolverCause | { message: string }>;
}

export interface JsonOverrideEntry {
  id: string;
  matchedBy: string;
  reason: string;
  expiresOn: string;
}

function causeToJson(cause: ResolutionError): JsonResolverCause {
  return {
    source: cause.source,
    identifier: cause.identifier,
    kind: cause.kind,
    ...(cause.status !== undefined && { status: cause.status }),
    message: cause.message,
  };
}

function ratedToJson(entry: RatedFinding): JsonRatedEntry {
  const { finding, severity, resolverError } = entry;
  const json: JsonRatedEntry = {
    id: finding.id,
    aliases: finding.aliases,
    summary: finding.summary,
    url: finding.url,
    fixedVersions: finding.fixedVersions,
    severity: { ...severity },
  };
  if (resolverError) {
    json.resolverWarnings =
      resolverError instanceof ResolutionWarning
        ? resolverError.causes.map(causeToJson)
        : [{ message: resolverError.message }];
  }
  return json;
}

function overrideToJson(entry: OverriddenFinding): JsonOverrideEntry {
  return {
    id: entry.finding.id,
    matchedBy: entry.matchedBy,
    reason: entry.override.reason,
    expiresOn: entry.override.expiresOn,
  };
}

export function buildJsonReport(scanMode: ScanMode, result: EvaluationResult): JsonReport {
  return {
    scanMode,
    passed: !hasBlockingFindings(result),
    summary: {
      fail: result.fail.length,
      warn: result.warn.length,
      accepted: result.accepted.length,
      info: result.info.length,
      expired: result.expired.length,
    },
    fail: result.fail.map(ratedToJson),
    warn: result.warn.map(ratedToJson),
    info: result.info.map(({ finding }) => ({ id: finding.id, summary: finding.summary, url: finding.url })),
    accepted: result.accepted.map(overrideToJson),
    expired: result.expired.map(overrideToJson),
  };
}
