/**
 * Bounded retry loop for advisory lookups
 *
 * Each lookup is an explicit state machine:
 *
 *   attempting ──(transport error | 429 | 5xx, attempts left)──▶ backoff
 *   backoff ──(timer fires)──▶ attempting
 *   backoff | attempting ──(caller signal)──▶ cancelled
 *   attempting ──(anything else)──▶ done
 *
 * 401/403 are terminal and never retried.
 */

import { ResolutionCancelledError, ResolutionError, type AdvisorySource } from '../errors.js';
import type { SeverityAssessment } from '../types.js';

export interface RetryPolicy {
  /** Total attempts including the first (default: 3) */
  maxAttempts: number;
  /** Base delay when a key or token is configured (default: 300ms) */
  authenticatedBaseDelayMs: number;
  /** Base delay for anonymous access (default: 750ms) */
  anonymousBaseDelayMs: number;
  /** Returns a value in [0, 1); used for jitter */
  random: () => number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  authenticatedBaseDelayMs: 300,
  anonymousBaseDelayMs: 750,
  random: Math.random,
};

/**
 * Delay before the retry that follows `attempt` (1-based): the base delay
 * doubled per attempt plus up to half the base delay of jitter.
 */
export function computeBackoffDelay(attempt: number, credentialConfigured: boolean, policy: RetryPolicy): number {
  const baseDelay = credentialConfigured ? policy.authenticatedBaseDelayMs : policy.anonymousBaseDelayMs;
  const backoff = baseDelay * 2 ** (attempt - 1);
  const jitter = Math.floor(policy.random() * (baseDelay / 2));
  return backoff + jitter;
}

/**
 * Resolve after `ms`, or reject with ResolutionCancelledError as soon as
 * `signal` fires.
 */
export function sleep(ms: number, signal?: AbortSignal, identifier?: string): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new ResolutionCancelledError(identifier));
  }

  return new Promise<void>((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new ResolutionCancelledError(identifier));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

// ============================================================================
// Endpoint Description
// ============================================================================

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface AdvisoryRequest {
  url: string;
  headers: Record<string, string>;
}

/**
 * Everything that differs between advisory databases.
 */
export interface AdvisoryEndpoint {
  readonly source: AdvisorySource;
  /** Display name used in messages, e.g. "NVD" */
  readonly label: string;
  /** Selects the shorter backoff base delay */
  readonly credentialConfigured: boolean;
  buildRequest(identifier: string): AdvisoryRequest;
  unauthorizedMessage(): string;
  forbiddenMessage(): string;
  rateLimitedMessage(identifier: string): string;
  /** Throws on a payload that does not match the schema */
  extractSeverity(payload: unknown, identifier: string): SeverityAssessment;
}

/** The outcome of one identifier lookup, cached verbatim */
export interface LookupOutcome {
  assessment: SeverityAssessment;
  error?: ResolutionError;
}

export interface RetryContext {
  fetch: FetchFn;
  policy: RetryPolicy;
  timeoutMs: number;
  signal?: AbortSignal;
  onRetry?: (identifier: string, attempt: number, delayMs: number, reason: ResolutionError) => void;
}

type LookupState =
  | { phase: 'attempting'; attempt: number }
  | { phase: 'backoff'; attempt: number; reason: ResolutionError }
  | { phase: 'done'; outcome: LookupOutcome }
  | { phase: 'cancelled' };

type AttemptResult =
  | { kind: 'final'; outcome: LookupOutcome }
  | { kind: 'retryable'; error: ResolutionError }
  | { kind: 'cancelled' };

function unknownFor(identifier: string): SeverityAssessment {
  return { level: 'UNKNOWN', score: 0, source: identifier, method: 'unknown' };
}

function failed(identifier: string, error: ResolutionError): LookupOutcome {
  return { assessment: unknownFor(identifier), error };
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * One HTTP round trip bounded by the per-request timeout.
 */
async function attemptOnce(
  endpoint: AdvisoryEndpoint,
  identifier: string,
  request: AdvisoryRequest,
  context: RetryContext
): Promise<AttemptResult> {
  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, context.timeoutMs);
  const onCallerAbort = (): void => controller.abort();
  context.signal?.addEventListener('abort', onCallerAbort, { once: true });

  try {
    let response: Response;
    try {
      response = await context.fetch(request.url, {
        method: 'GET',
        headers: request.headers,
        signal: controller.signal,
      });
    } catch (error) {
      if (context.signal?.aborted) return { kind: 'cancelled' };
      const kind = timedOut ? 'timeout' : 'network';
      const message = timedOut
        ? `${endpoint.label} API request for ${identifier} timed out after ${context.timeoutMs}ms`
        : `${endpoint.label} API request for ${identifier} failed: ${describe(error)}`;
      return {
        kind: 'retryable',
        error: new ResolutionError(endpoint.source, identifier, kind, message, { cause: error }),
      };
    }

    const status = response.status;
    if (status !== 200) {
      // Release the connection; only a 200 body is read.
      await response.body?.cancel();
    }

    if (status === 401) {
      return {
        kind: 'final',
        outcome: failed(
          identifier,
          new ResolutionError(endpoint.source, identifier, 'auth', endpoint.unauthorizedMessage(), { status })
        ),
      };
    }

    if (status === 403) {
      return {
        kind: 'final',
        outcome: failed(
          identifier,
          new ResolutionError(endpoint.source, identifier, 'auth', endpoint.forbiddenMessage(), { status })
        ),
      };
    }

    if (status === 429 || status >= 500) {
      const message =
        status === 429
          ? endpoint.rateLimitedMessage(identifier)
          : `${endpoint.label} API returned HTTP ${status} for ${identifier}`;
      return {
        kind: 'retryable',
        error: new ResolutionError(endpoint.source, identifier, status === 429 ? 'rate-limit' : 'http-status', message, {
          status,
        }),
      };
    }

    if (status !== 200) {
      return {
        kind: 'final',
        outcome: failed(
          identifier,
          new ResolutionError(
            endpoint.source,
            identifier,
            'http-status',
            `${endpoint.label} API returned HTTP ${status} for ${identifier}`,
            { status }
          )
        ),
      };
    }

    let payload: unknown;
    try {
      payload = JSON.parse(await response.text());
    } catch (error) {
      if (context.signal?.aborted) return { kind: 'cancelled' };
      return {
        kind: 'final',
        outcome: failed(
          identifier,
          new ResolutionError(
            endpoint.source,
            identifier,
            'decode',
            `${endpoint.label} API response for ${identifier} could not be decoded: ${describe(error)}`,
            { cause: error }
          )
        ),
      };
    }

    let assessment: SeverityAssessment;
    try {
      assessment = endpoint.extractSeverity(payload, identifier);
    } catch (error) {
      return {
        kind: 'final',
        outcome: failed(
          identifier,
          new ResolutionError(
            endpoint.source,
            identifier,
            'decode',
            `${endpoint.label} API response for ${identifier} could not be decoded: ${describe(error)}`,
            { cause: error }
          )
        ),
      };
    }

    if (assessment.level === 'UNKNOWN') {
      return {
        kind: 'final',
        outcome: {
          assessment,
          error: new ResolutionError(
            endpoint.source,
            identifier,
            'no-data',
            `${endpoint.label} API returned no severity data for ${identifier}`
          ),
        },
      };
    }

    return { kind: 'final', outcome: { assessment } };
  } finally {
    clearTimeout(timer);
    context.signal?.removeEventListener('abort', onCallerAbort);
  }
}

/**
 * Run the lookup state machine for one identifier. Resolves with the
 * outcome to cache, or rejects with ResolutionCancelledError.
 */
export async function fetchWithRetry(
  endpoint: AdvisoryEndpoint,
  identifier: string,
  context: RetryContext
): Promise<LookupOutcome> {
  let request: AdvisoryRequest;
  try {
    request = endpoint.buildRequest(identifier);
  } catch (error) {
    return failed(
      identifier,
      new ResolutionError(endpoint.source, identifier, 'request', describe(error), { cause: error })
    );
  }

  let state: LookupState = { phase: 'attempting', attempt: 1 };

  while (state.phase === 'attempting' || state.phase === 'backoff') {
    if (state.phase === 'attempting') {
      if (context.signal?.aborted) {
        state = { phase: 'cancelled' };
        continue;
      }

      const result = await attemptOnce(endpoint, identifier, request, context);
      if (result.kind === 'cancelled') {
        state = { phase: 'cancelled' };
      } else if (result.kind === 'final') {
        state = { phase: 'done', outcome: result.outcome };
      } else if (state.attempt < context.policy.maxAttempts) {
        state = { phase: 'backoff', attempt: state.attempt, reason: result.error };
      } else {
        state = { phase: 'done', outcome: failed(identifier, result.error) };
      }
      continue;
    }

    const delay = computeBackoffDelay(state.attempt, endpoint.credentialConfigured, context.policy);
    context.onRetry?.(identifier, state.attempt, delay, state.reason);
    try {
      await sleep(delay, context.signal, identifier);
      state = { phase: 'attempting', attempt: state.attempt + 1 };
    } catch {
      state = { phase: 'cancelled' };
    }
  }

  if (state.phase === 'cancelled') {
    throw new ResolutionCancelledError(identifier);
  }
  return state.outcome;
}
