/**
 * Finding Aggregator
 *
 * Folds the scanner's JSON event stream into one Finding per advisory id.
 * Advisory events describe the vulnerability, finding events carry fixed
 * versions and call traces. Decoding is strict: any malformed value aborts
 * the whole parse.
 */

import { readFile } from 'node:fs/promises';
import { ErrorCodes, GateError, wrapError } from './errors.js';
import { compareIds, normalizeId, uniqueStrings } from './ids.js';
import { isRecord, type JsonRecord } from './json.js';
import { betterSeverity, normalizeSeverity, parseScore, scoreFromCvssText } from './severity.js';
import type {
  Finding,
  ScanMode,
  ScannerAdvisory,
  ScannerEvent,
  ScannerFindingEvent,
  ScannerTraceFrame,
  SeverityAssessment,
} from './types.js';

// ============================================================================
// Stream Splitting
// ============================================================================

/**
 * Split a stream of concatenated JSON values into individual documents.
 * Handles one value per line as well as pretty-printed values spanning
 * several lines.
 */
export function splitJsonDocuments(input: string): string[] {
  const documents: string[] = [];
  let depth = 0;
  let inString = false;
  let escaped = false;
  let start = -1;

  for (let index = 0; index < input.length; index++) {
    const char = input[index];

    if (start === -1) {
      if (char === ' ' || char === '\t' || char === '\n' || char === '\r') continue;
      start = index;
    }

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === '\\') {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
    } else if (char === '{' || char === '[') {
      depth++;
    } else if (char === '}' || char === ']') {
      depth--;
    }

    if (depth === 0 && !inString && (char === '}' || char === ']')) {
      documents.push(input.slice(start, index + 1));
      start = -1;
    } else if (depth < 0) {
      throw new GateError(ErrorCodes.PARSE_SCANNER_OUTPUT, `unexpected '${char}' at offset ${index}`);
    }
  }

  if (start !== -1) {
    const rest = input.slice(start).trim();
    // A bare scalar is still a document; JSON.parse decides whether it is valid.
    if (depth === 0 && !inString && !rest.startsWith('{') && !rest.startsWith('[')) {
      documents.push(rest);
    } else {
      throw new GateError(ErrorCodes.PARSE_SCANNER_OUTPUT, 'unexpected end of JSON input');
    }
  }

  return documents;
}

// ============================================================================
// Event Decoding
// ============================================================================

function fail(message: string): never {
  throw new GateError(ErrorCodes.PARSE_SCANNER_OUTPUT, message);
}

function optionalString(record: JsonRecord, key: string, context: string): string | undefined {
  const value = record[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') fail(`${context}.${key} must be a string`);
  return value;
}

function optionalStringArray(record: JsonRecord, key: string, context: string): string[] | undefined {
  const value = record[key];
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value) || value.some((item) => typeof item !== 'string')) {
    fail(`${context}.${key} must be an array of strings`);
  }
  return value.filter((item): item is string => typeof item === 'string');
}

function decodeAdvisory(value: unknown): ScannerAdvisory {
  if (!isRecord(value)) fail('osv must be an object');
  const advisory: ScannerAdvisory = {
    id: optionalString(value, 'id', 'osv'),
    aliases: optionalStringArray(value, 'aliases', 'osv'),
    summary: optionalString(value, 'summary', 'osv'),
    severity: value['severity'],
  };

  const databaseSpecific = value['database_specific'];
  if (databaseSpecific !== undefined && databaseSpecific !== null) {
    if (!isRecord(databaseSpecific)) fail('osv.database_specific must be an object');
    const score = databaseSpecific['score'];
    if (score !== undefined && score !== null && typeof score !== 'number') {
      fail('osv.database_specific.score must be a number');
    }
    advisory.database_specific = {
      url: optionalString(databaseSpecific, 'url', 'osv.database_specific'),
      severity: optionalString(databaseSpecific, 'severity', 'osv.database_specific'),
      score: typeof score === 'number' ? score : undefined,
    };
  }

  return advisory;
}

function decodeFindingEvent(value: unknown): ScannerFindingEvent {
  if (!isRecord(value)) fail('finding must be an object');
  const traceValue = value['trace'];
  let trace: ScannerTraceFrame[] | undefined;
  if (traceValue !== undefined && traceValue !== null) {
    if (!Array.isArray(traceValue)) fail('finding.trace must be an array');
    trace = traceValue.map((frame): ScannerTraceFrame => {
      if (!isRecord(frame)) fail('finding.trace entries must be objects');
      return {
        package: optionalString(frame, 'package', 'finding.trace'),
        function: optionalString(frame, 'function', 'finding.trace'),
      };
    });
  }

  return {
    osv: optionalString(value, 'osv', 'finding'),
    fixed_version: optionalString(value, 'fixed_version', 'finding'),
    trace,
  };
}

/**
 * Decode one JSON document into a scanner event. Unknown top-level keys
 * (config, progress, SBOM records) are ignored.
 */
export function decodeScannerEvent(document: string): ScannerEvent {
  let parsed: unknown;
  try {
    parsed = JSON.parse(document);
  } catch (error) {
    throw new GateError(
      ErrorCodes.PARSE_SCANNER_OUTPUT,
      `invalid JSON in scanner output: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error instanceof Error ? error : undefined }
    );
  }

  if (!isRecord(parsed)) fail('scanner event must be a JSON object');

  const event: ScannerEvent = {};
  if (parsed['osv'] !== undefined && parsed['osv'] !== null) {
    event.osv = decodeAdvisory(parsed['osv']);
  }
  if (parsed['finding'] !== undefined && parsed['finding'] !== null) {
    event.finding = decodeFindingEvent(parsed['finding']);
  }
  return event;
}

// ============================================================================
// OSV Severity
// ============================================================================

interface SeverityCandidate {
  severity: string;
  score: number;
}

function candidateFromRecord(record: JsonRecord): SeverityCandidate {
  const rawSeverity = typeof record['severity'] === 'string' ? record['severity'] : '';
  const rawScore = record['score'];
  const score = parseScore(rawScore);
  if (score !== undefined) {
    return { severity: rawSeverity, score };
  }
  if (typeof rawScore === 'string') {
    return { severity: rawSeverity, score: scoreFromCvssText(rawScore) };
  }
  return { severity: rawSeverity, score: 0 };
}

/**
 * The OSV `severity` field comes as a string, an object or a list of either.
 */
export function extractOsvSeverityCandidates(value: unknown): SeverityCandidate[] {
  if (typeof value === 'string') {
    return [{ severity: value, score: 0 }];
  }
  if (isRecord(value)) {
    return [candidateFromRecord(value)];
  }
  if (Array.isArray(value)) {
    const candidates: SeverityCandidate[] = [];
    for (const item of value) {
      if (typeof item === 'string') {
        candidates.push({ severity: item, score: 0 });
      } else if (isRecord(item)) {
        candidates.push(candidateFromRecord(item));
      }
    }
    return candidates;
  }
  return [];
}

/**
 * Best severity embedded in an advisory, or undefined when it only yields UNKNOWN.
 */
export function resolveOsvSeverity(advisory: ScannerAdvisory): SeverityAssessment | undefined {
  const source = normalizeId(advisory.id ?? '');
  let best: SeverityAssessment = { level: 'UNKNOWN', score: 0, source, method: 'osv' };

  const candidates: SeverityCandidate[] = [
    {
      severity: advisory.database_specific?.severity ?? '',
      score: advisory.database_specific?.score ?? 0,
    },
    ...extractOsvSeverityCandidates(advisory.severity),
  ];

  for (const candidate of candidates) {
    const next: SeverityAssessment = {
      level: normalizeSeverity(candidate.severity, candidate.score),
      score: candidate.score,
      source,
      method: 'osv',
    };
    if (betterSeverity(next, best)) {
      best = next;
    }
  }

  return best.level === 'UNKNOWN' ? undefined : best;
}

// ============================================================================
// Aggregation
// ============================================================================

/**
 * Source mode only counts a finding as reachable when the trace names a
 * concrete call path. A single empty frame means none was found.
 */
export function isTraceReachable(trace: readonly ScannerTraceFrame[] | undefined): boolean {
  if (!trace || trace.length === 0) return false;
  if (trace.length > 1) return true;
  const [frame] = trace;
  return (frame?.package ?? '').trim() !== '' && (frame?.function ?? '').trim() !== '';
}

function ensureFinding(findings: Map<string, Finding>, id: string): Finding {
  const normalized = normalizeId(id);
  const existing = findings.get(normalized);
  if (existing) return existing;

  const entry: Finding = {
    id: normalized,
    aliases: [],
    summary: '',
    url: '',
    fixedVersions: [],
    reachable: false,
  };
  findings.set(normalized, entry);
  return entry;
}

function applyAdvisory(findings: Map<string, Finding>, advisory: ScannerAdvisory): void {
  const entry = ensureFinding(findings, advisory.id ?? '');
  entry.aliases = uniqueStrings([...entry.aliases, ...(advisory.aliases ?? [])]);

  const summary = (advisory.summary ?? '').trim();
  if (summary !== '') entry.summary = summary;

  const url = (advisory.database_specific?.url ?? '').trim();
  if (url !== '') entry.url = url;

  const severity = resolveOsvSeverity(advisory);
  if (severity && (!entry.osvSeverity || betterSeverity(severity, entry.osvSeverity))) {
    entry.osvSeverity = severity;
  }
}

function applyFindingEvent(findings: Map<string, Finding>, event: ScannerFindingEvent, scanMode: ScanMode): void {
  const entry = ensureFinding(findings, event.osv ?? '');
  const fixed = (event.fixed_version ?? '').trim();
  if (fixed !== '') {
    entry.fixedVersions = uniqueStrings([...entry.fixedVersions, fixed]);
  }
  if (scanMode === 'binary' || isTraceReachable(event.trace)) {
    entry.reachable = true;
  }
}

/**
 * Fold already-decoded events into findings sorted by canonical id.
 */
export function aggregateEvents(events: Iterable<ScannerEvent>, scanMode: ScanMode = 'source'): Finding[] {
  const findings = new Map<string, Finding>();

  for (const event of events) {
    if (event.osv) applyAdvisory(findings, event.osv);
    if (event.finding) applyFindingEvent(findings, event.finding, scanMode);
  }

  return [...findings.values()]
    .map((finding) => ({
      ...finding,
      aliases: [...finding.aliases].sort(compareIds),
      fixedVersions: [...finding.fixedVersions].sort(compareIds),
    }))
    .sort((left, right) => compareIds(left.id, right.id));
}

/**
 * Parse raw scanner output. Throws a GateError on the first malformed document.
 */
export function parseScannerOutput(input: string, scanMode: ScanMode = 'source'): Finding[] {
  return aggregateEvents(splitJsonDocuments(input).map(decodeScannerEvent), scanMode);
}

/**
 * Read and parse a scanner output file.
 */
export async function loadScannerOutput(path: string, scanMode: ScanMode = 'source'): Promise<Finding[]> {
  let content: string;
  try {
    content = await readFile(path.trim(), 'utf-8');
  } catch (error) {
    throw wrapError(error, ErrorCodes.IO_READ_ERROR, `Failed to read scanner output ${path}`);
  }
  return parseScannerOutput(content, scanMode);
}
