/**
 * Advisory identifier helpers
 */

import type { Finding } from './types.js';

export const GHSA_PREFIX = 'GHSA-';
export const CVE_PREFIX = 'CVE-';

/** Canonical form used for every map and set key */
export function normalizeId(value: string): string {
  return value.trim().toUpperCase();
}

/**
 * Trim, drop blanks and duplicates, keep first-seen order.
 */
export function uniqueStrings(values: Iterable<string>): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const value of values) {
    const trimmed = value.trim();
    if (trimmed === '' || seen.has(trimmed)) continue;
    seen.add(trimmed);
    result.push(trimmed);
  }
  return result;
}

/** The finding's own id followed by its aliases */
export function candidateIds(finding: Pick<Finding, 'id' | 'aliases'>): string[] {
  return [finding.id, ...finding.aliases];
}

/**
 * Canonical ids of the finding (own id included) that carry `prefix`,
 * deduplicated and sorted.
 */
export function collectIdsWithPrefix(finding: Pick<Finding, 'id' | 'aliases'>, prefix: string): string[] {
  const result = new Set<string>();
  for (const candidate of candidateIds(finding)) {
    const normalized = normalizeId(candidate);
    if (normalized.startsWith(prefix)) {
      result.add(normalized);
    }
  }
  return [...result].sort(compareIds);
}

/** Byte-wise ascending comparison */
export function compareIds(left: string, right: string): number {
  if (left === right) return 0;
  return left < right ? -1 : 1;
}
