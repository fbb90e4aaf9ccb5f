/**
 * Severity ordering and normalization
 */

import type { SeverityAssessment, SeverityLevel, SeverityMethod } from './types.js';

/** Ascending order: index is the rank */
export const SEVERITY_LEVELS: readonly SeverityLevel[] = ['UNKNOWN', 'LOW', 'MEDIUM', 'HIGH', 'CRITICAL'];

export function severityRank(level: SeverityLevel): number {
  return SEVERITY_LEVELS.indexOf(level);
}

export function isSeverityLevel(value: string): value is SeverityLevel {
  return (SEVERITY_LEVELS as readonly string[]).includes(value);
}

/**
 * Map a raw level string and score onto a SeverityLevel.
 * A recognized level string always wins over the score.
 */
export function normalizeSeverity(raw: string | undefined, score: number): SeverityLevel {
  const normalized = (raw ?? '').trim().toUpperCase();
  if (normalized !== 'UNKNOWN' && isSeverityLevel(normalized)) {
    return normalized;
  }

  if (score >= 9.0) return 'CRITICAL';
  if (score >= 7.0) return 'HIGH';
  if (score >= 4.0) return 'MEDIUM';
  if (score > 0) return 'LOW';
  return 'UNKNOWN';
}

/**
 * Strict ordering: true when `left` outranks `right`.
 * Higher level wins; at equal level the higher score wins.
 */
export function betterSeverity(
  left: Pick<SeverityAssessment, 'level' | 'score'>,
  right: Pick<SeverityAssessment, 'level' | 'score'>
): boolean {
  const leftRank = severityRank(left.level);
  const rightRank = severityRank(right.level);
  if (leftRank !== rightRank) {
    return leftRank > rightRank;
  }
  return left.score > right.score;
}

/**
 * Read a score that may arrive as a number or a numeric string.
 */
export function parseScore(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed === '') return undefined;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

/**
 * Pull the `SCORE:<n>` segment out of a slash-separated vector string.
 */
export function scoreFromCvssText(raw: string): number {
  for (const part of raw.split('/')) {
    const trimmed = part.trim();
    if (!trimmed.startsWith('SCORE:')) continue;
    const parsed = parseScore(trimmed.slice('SCORE:'.length));
    if (parsed !== undefined) return parsed;
  }
  return 0;
}

export function unknownAssessment(
  source: string,
  reason?: string,
  method: SeverityMethod = 'unknown'
): SeverityAssessment {
  return reason ? { level: 'UNKNOWN', score: 0, source, method, reason } : { level: 'UNKNOWN', score: 0, source, method };
}
