/**
 * Policy Evaluator
 *
 * Partitions findings into fail / warn / info / accepted / expired.
 * A matching override decides the outcome on its own; unreachable findings
 * are never rated; everything else is bucketed by its resolved severity,
 * with UNKNOWN failing the gate.
 */

import { compareIds } from './ids.js';
import { isOverrideExpired, matchOverride } from './overrides.js';
import { severityRank } from './severity.js';
import type {
  EvaluatedFinding,
  EvaluationResult,
  Finding,
  OverrideRegistry,
  RatedFinding,
  SeverityLevel,
  SeverityResolver,
} from './types.js';

/** Levels that land in the warn bucket; every other level fails */
const WARN_LEVELS: ReadonlySet<SeverityLevel> = new Set<SeverityLevel>(['LOW', 'MEDIUM']);

function sortRank(entry: EvaluatedFinding): number {
  return entry.kind === 'rated' ? severityRank(entry.severity.level) : -1;
}

/**
 * Severity descending, then canonical id ascending. Entries without a
 * rating all compare equal on the first key.
 */
export function compareEvaluated(left: EvaluatedFinding, right: EvaluatedFinding): number {
  const rankDelta = sortRank(right) - sortRank(left);
  if (rankDelta !== 0) return rankDelta;
  return compareIds(left.finding.id, right.finding.id);
}

export function isFailingLevel(level: SeverityLevel): boolean {
  return !WARN_LEVELS.has(level);
}

/**
 * Evaluate findings in input order. Resolution runs one finding at a time;
 * a cancelled `signal` rejects with the resolver's cancellation error.
 */
export async function evaluateFindings(
  findings: readonly Finding[],
  overrides: OverrideRegistry,
  resolver: SeverityResolver,
  now: Date,
  signal?: AbortSignal
): Promise<EvaluationResult> {
  const result: EvaluationResult = { fail: [], warn: [], info: [], accepted: [], expired: [] };

  for (const finding of findings) {
    const match = matchOverride(finding, overrides);
    if (match) {
      const entry = { kind: 'override' as const, finding, override: match.override, matchedBy: match.matchedBy };
      if (isOverrideExpired(match.override, now)) {
        result.expired.push(entry);
      } else {
        result.accepted.push(entry);
      }
      continue;
    }

    if (!finding.reachable) {
      result.info.push({ kind: 'unreachable', finding });
      continue;
    }

    const { assessment, warning } = await resolver.resolve(finding, signal);
    const rated: RatedFinding = warning
      ? { kind: 'rated', finding, severity: assessment, resolverError: warning }
      : { kind: 'rated', finding, severity: assessment };
    if (isFailingLevel(assessment.level)) {
      result.fail.push(rated);
    } else {
      result.warn.push(rated);
    }
  }

  result.fail.sort(compareEvaluated);
  result.warn.sort(compareEvaluated);
  result.info.sort(compareEvaluated);
  result.accepted.sort(compareEvaluated);
  result.expired.sort(compareEvaluated);

  return result;
}

/** True when the run must fail: something failed or a waiver lapsed */
export function hasBlockingFindings(result: EvaluationResult): boolean {
  return result.fail.length > 0 || result.expired.length > 0;
}
