/**
 * Per-run cache of advisory lookups
 *
 * Keys are canonical identifiers. Failed lookups are stored alongside
 * successful ones so a broken identifier is only queried once per run.
 * Cancelled lookups are never stored.
 */

import { ResolutionCancelledError, isResolutionCancelled } from '../errors.js';
import type { LookupOutcome } from './retry.js';

export interface CacheResult {
  outcome: LookupOutcome;
  /** True when no new lookup was started for this call */
  hit: boolean;
}

/**
 * Wait for someone else's lookup, giving up as soon as our own signal fires.
 */
function joinInflight(
  inflight: Promise<LookupOutcome>,
  identifier: string,
  signal: AbortSignal | undefined
): Promise<LookupOutcome> {
  if (!signal) return inflight;
  if (signal.aborted) return Promise.reject(new ResolutionCancelledError(identifier));

  return new Promise<LookupOutcome>((resolve, reject) => {
    const onAbort = (): void => reject(new ResolutionCancelledError(identifier));
    signal.addEventListener('abort', onAbort, { once: true });
    void inflight.then(
      (outcome) => {
        signal.removeEventListener('abort', onAbort);
        resolve(outcome);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

export class SeverityCache {
  private readonly entries = new Map<string, LookupOutcome>();
  private readonly pending = new Map<string, Promise<LookupOutcome>>();

  get size(): number {
    return this.entries.size;
  }

  /**
   * Return the stored outcome, join a lookup already in flight, or start
   * `load`. When a shared lookup is cancelled by its owner, a caller whose
   * own signal is still live starts a fresh one.
   */
  async getOrLoad(
    identifier: string,
    load: () => Promise<LookupOutcome>,
    signal?: AbortSignal
  ): Promise<CacheResult> {
    for (;;) {
      const cached = this.entries.get(identifier);
      if (cached) {
        return { outcome: cached, hit: true };
      }

      const inflight = this.pending.get(identifier);
      if (inflight) {
        try {
          return { outcome: await joinInflight(inflight, identifier, signal), hit: true };
        } catch (error) {
          if (isResolutionCancelled(error) && !signal?.aborted) continue;
          throw error;
        }
      }

      const promise = load()
        .then((outcome) => {
          this.entries.set(identifier, outcome);
          return outcome;
        })
        .finally(() => {
          this.pending.delete(identifier);
        });
      this.pending.set(identifier, promise);
      return { outcome: await promise, hit: false };
    }
  }
}
