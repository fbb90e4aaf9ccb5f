/**
 * Multi-source severity resolver
 *
 * Fallback chain per finding: embedded OSV severity, then the best GHSA
 * rating across the finding's GHSA ids, then the best NVD rating across its
 * CVE ids. When nothing rates the finding it is UNKNOWN with a reason.
 *
 * One resolver instance is meant to live for one evaluation run; its cache
 * is shared by every concurrent `resolve` call on it.
 */

import {
  ResolutionError,
  ResolutionWarning,
  type AdvisorySource,
} from '../errors.js';
import { CVE_PREFIX, GHSA_PREFIX, collectIdsWithPrefix, normalizeId } from '../ids.js';
import { betterSeverity, unknownAssessment } from '../severity.js';
import type { SeveritySnapshot } from '../snapshot.js';
import type { Finding, ResolvedSeverity, SeverityAssessment, SeverityResolver } from '../types.js';
import { SeverityCache } from './cache.js';
import { createGhsaEndpoint, DEFAULT_GHSA_BASE_URL } from './ghsa.js';
import { createNvdEndpoint, DEFAULT_NVD_BASE_URL } from './nvd.js';
import {
  DEFAULT_RETRY_POLICY,
  fetchWithRetry,
  type AdvisoryEndpoint,
  type FetchFn,
  type LookupOutcome,
  type RetryContext,
  type RetryPolicy,
} from './retry.js';

export const DEFAULT_TIMEOUT_MS = 15_000;
export const DEFAULT_USER_AGENT = 'vulngate/0.1.0';

/** Structured sink for resolver diagnostics */
export interface ResolverLogger {
  debug(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
}

export interface AdvisoryResolverOptions {
  nvdBaseUrl?: string;
  ghsaBaseUrl?: string;
  nvdApiKey?: string;
  ghsaToken?: string;
  /** Serve CVEs from the snapshot only and fail every GHSA lookup */
  offline?: boolean;
  snapshot?: SeveritySnapshot;
  /** Per HTTP attempt (default: 15000) */
  timeoutMs?: number;
  fetch?: FetchFn;
  retry?: Partial<RetryPolicy>;
  logger?: ResolverLogger;
  userAgent?: string;
}

/** What one source produced across all of a finding's candidate ids */
export interface SourceResolution {
  best: SeverityAssessment;
  errors: ResolutionError[];
  hasCandidates: boolean;
  resolved: boolean;
  /** Some candidate came back UNKNOWN without an error */
  returnedUnknown: boolean;
}

type Lookup = (identifier: string) => Promise<LookupOutcome>;

/**
 * Query every candidate in order and keep the best non-UNKNOWN rating.
 */
export async function resolveBestFromCandidates(
  candidates: readonly string[],
  lookup: Lookup
): Promise<SourceResolution> {
  const result: SourceResolution = {
    best: unknownAssessment(''),
    errors: [],
    hasCandidates: candidates.length > 0,
    resolved: false,
    returnedUnknown: false,
  };

  for (const candidate of candidates) {
    const outcome = await lookup(candidate);
    if (outcome.error) {
      result.errors.push(outcome.error);
      continue;
    }
    if (outcome.assessment.level === 'UNKNOWN') {
      result.returnedUnknown = true;
      continue;
    }
    if (!result.resolved || betterSeverity(outcome.assessment, result.best)) {
      result.best = outcome.assessment;
    }
    result.resolved = true;
  }

  return result;
}

function sourceUnknownReason(label: string, result: SourceResolution, noCandidatesMessage: string): string {
  if (!result.hasCandidates) return noCandidatesMessage;
  if (result.returnedUnknown) return `${label} lookup returned no severity data`;
  return `${label} lookup failed`;
}

export function buildUnknownReason(ghsa: SourceResolution, nvd: SourceResolution): string {
  const prefix = 'OSV severity unavailable in scanner input';
  if (!ghsa.hasCandidates && !nvd.hasCandidates) {
    return `${prefix}, no CVE/GHSA aliases found`;
  }
  return [
    prefix,
    sourceUnknownReason('GHSA', ghsa, 'no GHSA aliases found'),
    sourceUnknownReason('NVD', nvd, 'no CVE aliases found'),
  ].join(', ');
}

export function unknownSeveritySource(
  finding: Finding,
  ghsaCandidates: readonly string[],
  cveCandidates: readonly string[]
): string {
  return ghsaCandidates[0] ?? cveCandidates[0] ?? normalizeId(finding.id);
}

/** The scanner's own rating, when it has a usable one */
export function embeddedOsvSeverity(finding: Finding): SeverityAssessment | undefined {
  const embedded = finding.osvSeverity;
  if (!embedded || embedded.level === 'UNKNOWN') return undefined;
  return { ...embedded, source: embedded.source || normalizeId(finding.id), method: 'osv' };
}

export class AdvisorySeverityResolver implements SeverityResolver {
  readonly cache = new SeverityCache();

  private readonly nvd: AdvisoryEndpoint;
  private readonly ghsa: AdvisoryEndpoint;
  private readonly offline: boolean;
  private readonly snapshot: SeveritySnapshot;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;
  private readonly policy: RetryPolicy;
  private readonly logger?: ResolverLogger;

  constructor(options: AdvisoryResolverOptions = {}) {
    const userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.nvd = createNvdEndpoint({
      baseUrl: options.nvdBaseUrl ?? DEFAULT_NVD_BASE_URL,
      apiKey: options.nvdApiKey,
      userAgent,
    });
    this.ghsa = createGhsaEndpoint({
      baseUrl: options.ghsaBaseUrl ?? DEFAULT_GHSA_BASE_URL,
      token: options.ghsaToken,
      userAgent,
    });
    this.offline = options.offline ?? false;
    this.snapshot = options.snapshot ?? new Map<string, SeverityAssessment>();
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.policy = { ...DEFAULT_RETRY_POLICY, ...options.retry };
    this.logger = options.logger;
  }

  async resolve(finding: Finding, signal?: AbortSignal): Promise<ResolvedSeverity> {
    const embedded = embeddedOsvSeverity(finding);
    if (embedded) {
      return { assessment: embedded };
    }

    const ghsaCandidates = collectIdsWithPrefix(finding, GHSA_PREFIX);
    const ghsa = await resolveBestFromCandidates(ghsaCandidates, (id) => this.lookupGhsa(id, signal));
    if (ghsa.resolved) {
      return { assessment: ghsa.best, warning: ResolutionWarning.join(ghsa.errors) };
    }

    const cveCandidates = collectIdsWithPrefix(finding, CVE_PREFIX);
    const nvd = await resolveBestFromCandidates(cveCandidates, (id) => this.lookupCve(id, signal));
    const warning = ResolutionWarning.join(ghsa.errors, nvd.errors);
    if (nvd.resolved) {
      return { assessment: nvd.best, warning };
    }

    return {
      assessment: unknownAssessment(
        unknownSeveritySource(finding, ghsaCandidates, cveCandidates),
        buildUnknownReason(ghsa, nvd)
      ),
      warning,
    };
  }

  /**
   * Snapshot first, then the NVD API unless offline.
   */
  lookupCve(cveId: string, signal?: AbortSignal): Promise<LookupOutcome> {
    const identifier = normalizeId(cveId);
    return this.cachedLookup(identifier, signal, async () => {
      const fromSnapshot = this.snapshot.get(identifier);
      if (fromSnapshot) {
        return { assessment: fromSnapshot };
      }
      if (this.offline) {
        return this.offlineFailure(
          'nvd',
          identifier,
          `offline mode enabled and ${identifier} is missing from severity snapshot`
        );
      }
      return fetchWithRetry(this.nvd, identifier, this.retryContext(signal));
    });
  }

  /**
   * GHSA has no snapshot: offline mode fails every lookup.
   */
  lookupGhsa(ghsaId: string, signal?: AbortSignal): Promise<LookupOutcome> {
    const identifier = normalizeId(ghsaId);
    return this.cachedLookup(identifier, signal, async () => {
      if (this.offline) {
        return this.offlineFailure(
          'ghsa',
          identifier,
          `offline mode enabled and ${identifier} requires live GHSA lookup`
        );
      }
      return fetchWithRetry(this.ghsa, identifier, this.retryContext(signal));
    });
  }

  private async cachedLookup(
    identifier: string,
    signal: AbortSignal | undefined,
    load: () => Promise<LookupOutcome>
  ): Promise<LookupOutcome> {
    const { outcome, hit } = await this.cache.getOrLoad(identifier, load, signal);
    if (hit) {
      this.logger?.debug('Severity cache hit', { identifier });
    } else if (outcome.error) {
      const log = outcome.error.kind === 'auth' || outcome.error.kind === 'rate-limit' ? 'warn' : 'debug';
      this.logger?.[log]('Severity lookup failed', {
        identifier,
        source: outcome.error.source,
        kind: outcome.error.kind,
        status: outcome.error.status,
      });
    } else {
      this.logger?.debug('Severity resolved', {
        identifier,
        level: outcome.assessment.level,
        score: outcome.assessment.score,
      });
    }
    return outcome;
  }

  private offlineFailure(source: AdvisorySource, identifier: string, message: string): LookupOutcome {
    return {
      assessment: unknownAssessment(identifier),
      error: new ResolutionError(source, identifier, 'offline', message),
    };
  }

  private retryContext(signal?: AbortSignal): RetryContext {
    return {
      fetch: this.fetchFn,
      policy: this.policy,
      timeoutMs: this.timeoutMs,
      signal,
      onRetry: (identifier, attempt, delayMs, reason) => {
        this.logger?.debug('Retrying severity lookup', {
          identifier,
          attempt,
          delayMs,
          reason: reason.message,
        });
      },
    };
  }
}
