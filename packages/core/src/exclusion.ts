/**
 * Exclusion Filter
 *
 * Suppresses findings already known from a baseline scan. A finding that
 * was unreachable in the baseline but is reachable now stays visible.
 */

import { loadScannerOutput } from './aggregator.js';
import { candidateIds, normalizeId } from './ids.js';
import type { ExclusionSet, Finding } from './types.js';

export const EMPTY_EXCLUSION_SET: ExclusionSet = {
  all: new Set<string>(),
  reachable: new Set<string>(),
};

/**
 * Collect every canonical id and alias of the baseline findings.
 */
export function buildExclusionSet(baseline: readonly Finding[]): ExclusionSet {
  const all = new Set<string>();
  const reachable = new Set<string>();

  for (const finding of baseline) {
    for (const candidate of candidateIds(finding)) {
      const normalized = normalizeId(candidate);
      if (normalized === '') continue;
      all.add(normalized);
      if (finding.reachable) {
        reachable.add(normalized);
      }
    }
  }

  return { all, reachable };
}

export function matchExclusion(
  finding: Finding,
  exclusions: ExclusionSet
): { matchedAll: boolean; matchedReachable: boolean } {
  let matchedAll = false;
  let matchedReachable = false;

  for (const candidate of candidateIds(finding)) {
    const normalized = normalizeId(candidate);
    if (normalized === '') continue;
    if (exclusions.all.has(normalized)) matchedAll = true;
    if (exclusions.reachable.has(normalized)) matchedReachable = true;
  }

  return { matchedAll, matchedReachable };
}

/**
 * Drop findings matching a reachable baseline id, or matching any baseline
 * id while themselves unreachable. Returns the input untouched when the
 * set is empty.
 */
export function filterExcludedFindings(findings: Finding[], exclusions: ExclusionSet): Finding[] {
  if (exclusions.all.size === 0) {
    return findings;
  }

  return findings.filter((finding) => {
    const { matchedAll, matchedReachable } = matchExclusion(finding, exclusions);
    return !(matchedReachable || (matchedAll && !finding.reachable));
  });
}

/**
 * Build the exclusion set from a baseline scan file. The baseline is always
 * read in source mode so its reachability reflects real call paths.
 */
export async function loadExclusionSet(path: string): Promise<ExclusionSet> {
  return buildExclusionSet(await loadScannerOutput(path, 'source'));
}
