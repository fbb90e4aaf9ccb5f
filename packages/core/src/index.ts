/**
 * @vulngate/core
 *
 * Scanner aggregation, exclusion, overrides, severity resolution and the
 * policy verdict.
 */

export * from './types.js';
export * from './errors.js';
export * from './severity.js';
export * from './ids.js';
export { isRecord, type JsonRecord } from './json.js';
export {
  aggregateEvents,
  decodeScannerEvent,
  extractOsvSeverityCandidates,
  isTraceReachable,
  loadScannerOutput,
  parseScannerOutput,
  resolveOsvSeverity,
  splitJsonDocuments,
} from './aggregator.js';
export {
  EMPTY_EXCLUSION_SET,
  buildExclusionSet,
  filterExcludedFindings,
  loadExclusionSet,
  matchExclusion,
} from './exclusion.js';
export {
  buildOverrideRegistry,
  isOverrideExpired,
  isValidExpiryDate,
  loadOverrides,
  matchOverride,
  parseOverrides,
  utcDateString,
  type OverrideInput,
} from './overrides.js';
export { loadSeveritySnapshot, parseSeveritySnapshot, type SeveritySnapshot } from './snapshot.js';
export { compareEvaluated, evaluateFindings, hasBlockingFindings, isFailingLevel } from './policy.js';
export * from './resolver/index.js';
