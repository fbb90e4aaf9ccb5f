export { SeverityCache, type CacheResult } from './cache.js';
export {
  DEFAULT_GHSA_BASE_URL,
  GHSA_API_VERSION,
  GHSA_FORBIDDEN_MESSAGE,
  GHSA_UNAUTHORIZED_MESSAGE,
  bestGhsaSeverity,
  buildAdvisoryUrl,
  createGhsaEndpoint,
  decodeGhsaAdvisory,
  type GhsaAdvisory,
  type GhsaCvssData,
  type GhsaEndpointOptions,
} from './ghsa.js';
export {
  DEFAULT_NVD_BASE_URL,
  NVD_FORBIDDEN_MESSAGE,
  NVD_UNAUTHORIZED_MESSAGE,
  bestNvdSeverity,
  buildNvdRequestUrl,
  createNvdEndpoint,
  extractNvdMetrics,
  type NvdEndpointOptions,
  type NvdMetric,
} from './nvd.js';
export {
  AdvisorySeverityResolver,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_USER_AGENT,
  buildUnknownReason,
  embeddedOsvSeverity,
  resolveBestFromCandidates,
  unknownSeveritySource,
  type AdvisoryResolverOptions,
  type ResolverLogger,
  type SourceResolution,
} from './resolver.js';
export {
  DEFAULT_RETRY_POLICY,
  computeBackoffDelay,
  fetchWithRetry,
  sleep,
  type AdvisoryEndpoint,
  type AdvisoryRequest,
  type FetchFn,
  type LookupOutcome,
  type RetryContext,
  type RetryPolicy,
} from './retry.js';
