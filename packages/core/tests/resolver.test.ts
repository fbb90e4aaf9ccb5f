/**
 * Tests for the advisory severity resolver
 */

import { describe, it, expect, vi } from 'vitest';
import { ResolutionCancelledError, ResolutionWarning } from '../src/errors.js';
import {
  AdvisorySeverityResolver,
  GHSA_FORBIDDEN_MESSAGE,
  GHSA_UNAUTHORIZED_MESSAGE,
  NVD_FORBIDDEN_MESSAGE,
  NVD_UNAUTHORIZED_MESSAGE,
  bestGhsaSeverity,
  bestNvdSeverity,
  buildAdvisoryUrl,
  buildNvdRequestUrl,
  computeBackoffDelay,
  extractNvdMetrics,
  sleep,
  type AdvisoryResolverOptions,
  type RetryPolicy,
} from '../src/resolver/index.js';
import type { SeverityAssessment } from '../src/types.js';
import { makeFinding } from './helpers.js';

const NVD_BASE = 'https://nvd.test/rest/json/cves/2.0';
const GHSA_BASE = 'https://ghsa.test/advisories';

const FAST_RETRY: Partial<RetryPolicy> = {
  authenticatedBaseDelayMs: 1,
  anonymousBaseDelayMs: 1,
  random: () => 0,
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function nvdPayload(severity: string, score: number): unknown {
  return {
    vulnerabilities: [
      { cve: { metrics: { cvssMetricV31: [{ cvssData: { baseScore: score, baseSeverity: severity } }] } } },
    ],
  };
}

function mockFetch(handler: (url: string) => Response) {
  return vi.fn((input: string, _init?: RequestInit) => Promise.resolve(handler(input)));
}

function createResolver(
  fetchMock: (input: string, init?: RequestInit) => Promise<Response>,
  options: AdvisoryResolverOptions = {}
): AdvisorySeverityResolver {
  return new AdvisorySeverityResolver({
    nvdBaseUrl: NVD_BASE,
    ghsaBaseUrl: GHSA_BASE,
    fetch: fetchMock,
    retry: FAST_RETRY,
    ...options,
  });
}

describe('AdvisorySeverityResolver', () => {
  describe('fallback chain', () => {
    it('returns the embedded OSV severity without a network call', async () => {
      const fetchMock = mockFetch(() => jsonResponse({}));
      const resolver = createResolver(fetchMock);
      const embedded: SeverityAssessment = { level: 'HIGH', score: 7.5, source: 'GO-1', method: 'osv' };

      const result = await resolver.resolve(makeFinding('GO-1', { aliases: ['CVE-1'], osvSeverity: embedded }));

      expect(result).toEqual({ assessment: embedded });
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('prefers GHSA over NVD', async () => {
      const fetchMock = mockFetch(() =>
        jsonResponse({ ghsa_id: 'GHSA-aaaa-bbbb-cccc', severity: 'medium', cvss: { score: 5.3 } })
      );
      const resolver = createResolver(fetchMock, { ghsaToken: 'test-token' });

      const result = await resolver.resolve(
        makeFinding('GHSA-aaaa-bbbb-cccc', { aliases: ['CVE-2024-0002'] })
      );

      expect(result).toEqual({
        assessment: { level: 'MEDIUM', score: 5.3, source: 'GHSA-AAAA-BBBB-CCCC', method: 'ghsa' },
        warning: undefined,
      });
      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(fetchMock).toHaveBeenCalledWith(
        'https://ghsa.test/advisories/GHSA-AAAA-BBBB-CCCC',
        expect.objectContaining({
          method: 'GET',
          headers: {
            Accept: 'application/vnd.github+json',
            'X-GitHub-Api-Version': '2022-11-28',
            'User-Agent': 'vulngate/0.1.0',
            Authorization: 'Bearer test-token',
          },
          signal: expect.any(AbortSignal),
        })
      );
    });

    it('falls back to NVD and keeps the GHSA failure as a warning', async () => {
      const fetchMock = mockFetch((url) =>
        url.startsWith(GHSA_BASE) ? jsonResponse({ message: 'Not Found' }, 404) : jsonResponse(nvdPayload('HIGH', 8.1))
      );
      const resolver = createResolver(fetchMock);

      const result = await resolver.resolve(
        makeFinding('GO-1', { aliases: ['CVE-2024-0001', 'GHSA-aaaa-bbbb-cccc'] })
      );

      expect(result.assessment).toEqual({ level: 'HIGH', score: 8.1, source: 'CVE-2024-0001', method: 'nvd' });
      expect(result.warning).toBeInstanceOf(ResolutionWarning);
      expect(result.warning?.message).toBe('GHSA API returned HTTP 404 for GHSA-AAAA-BBBB-CCCC');
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it('keeps the best rating across candidates', async () => {
      const fetchMock = mockFetch((url) =>
        url.endsWith('CVE-2024-0001') ? jsonResponse(nvdPayload('MEDIUM', 5.0)) : jsonResponse(nvdPayload('HIGH', 7.2))
      );
      const resolver = createResolver(fetchMock);

      const result = await resolver.resolve(makeFinding('GO-1', { aliases: ['CVE-2024-0002', 'CVE-2024-0001'] }));

      expect(result.assessment).toEqual({ level: 'HIGH', score: 7.2, source: 'CVE-2024-0002', method: 'nvd' });
    });

    it('explains an UNKNOWN rating when there are no aliases', async () => {
      const fetchMock = mockFetch(() => jsonResponse({}));
      const resolver = createResolver(fetchMock);

      const result = await resolver.resolve(makeFinding('go-7'));

      expect(result).toEqual({
        assessment: {
          level: 'UNKNOWN',
          score: 0,
          source: 'GO-7',
          method: 'unknown',
          reason: 'OSV severity unavailable in scanner input, no CVE/GHSA aliases found',
        },
        warning: undefined,
      });
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });

  describe('retries', () => {
    it('gives up after three HTTP 500 responses', async () => {
      const fetchMock = mockFetch(() => jsonResponse({}, 500));
      const resolver = createResolver(fetchMock);

      const result = await resolver.resolve(makeFinding('GO-1', { aliases: ['CVE-2024-0001'] }));

      expect(fetchMock).toHaveBeenCalledTimes(3);
      expect(result.assessment).toEqual({
        level: 'UNKNOWN',
        score: 0,
        source: 'CVE-2024-0001',
        method: 'unknown',
        reason: 'OSV severity unavailable in scanner input, no GHSA aliases found, NVD lookup failed',
      });
      expect(result.warning?.message).toContain('HTTP 500');
    });

    it('recovers when a retry succeeds', async () => {
      let calls = 0;
      const fetchMock = mockFetch(() => {
        calls++;
        return calls === 1 ? jsonResponse({}, 503) : jsonResponse(nvdPayload('LOW', 3.1));
      });
      const resolver = createResolver(fetchMock);

      const outcome = await resolver.lookupCve('CVE-2024-0001');

      expect(outcome).toEqual({
        assessment: { level: 'LOW', score: 3.1, source: 'CVE-2024-0001', method: 'nvd' },
      });
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it('names the rate limit after repeated HTTP 429', async () => {
      const fetchMock = mockFetch(() => jsonResponse({}, 429));
      const resolver = createResolver(fetchMock);

      const outcome = await resolver.lookupCve('CVE-2024-0001');

      expect(fetchMock).toHaveBeenCalledTimes(3);
      expect(outcome.error?.kind).toBe('rate-limit');
      expect(outcome.error?.message).toBe(
        'NVD API returned HTTP 429 for CVE-2024-0001. This indicates rate limiting. ' +
          'Retry later, or configure --nvd-api-key-file or NVD_API_KEY for higher request limits'
      );
    });

    it('does not retry HTTP 401', async () => {
      const fetchMock = mockFetch(() => jsonResponse({}, 401));
      const resolver = createResolver(fetchMock, { nvdApiKey: 'test-secret' });

      const outcome = await resolver.lookupCve('CVE-2024-0001');

      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(outcome.error?.kind).toBe('auth');
      expect(outcome.error?.status).toBe(401);
      expect(outcome.error?.message).toBe(NVD_UNAUTHORIZED_MESSAGE);
    });

    it('does not retry HTTP 403', async () => {
      const fetchMock = mockFetch(() => jsonResponse({}, 403));
      const resolver = createResolver(fetchMock, { nvdApiKey: 'test-secret' });

      const outcome = await resolver.lookupCve('CVE-2024-0001');

      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(outcome.error).toMatchObject({ kind: 'auth', status: 403, message: NVD_FORBIDDEN_MESSAGE });
    });

    it('names the GHSA token remediation on HTTP 401 and 403', async () => {
      const unauthorized = createResolver(mockFetch(() => jsonResponse({}, 401)), { ghsaToken: 'test-token' });
      const forbidden = createResolver(mockFetch(() => jsonResponse({}, 403)), { ghsaToken: 'test-token' });

      const rejected = await unauthorized.lookupGhsa('GHSA-AAAA-BBBB-CCCC');
      const denied = await forbidden.lookupGhsa('GHSA-AAAA-BBBB-CCCC');

      expect(rejected.error).toMatchObject({ source: 'ghsa', kind: 'auth', status: 401 });
      expect(rejected.error?.message).toBe(
        'Missing or invalid GHSA token. Remove the configured token to use unauthenticated access, or configure a valid token.'
      );
      expect(rejected.error?.message).toBe(GHSA_UNAUTHORIZED_MESSAGE);
      expect(denied.error).toMatchObject({ source: 'ghsa', kind: 'auth', status: 403, message: GHSA_FORBIDDEN_MESSAGE });
    });

    it('does not retry other client errors', async () => {
      const fetchMock = mockFetch(() => jsonResponse({}, 404));
      const resolver = createResolver(fetchMock);

      const outcome = await resolver.lookupCve('CVE-2024-0001');

      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(outcome.error?.message).toBe('NVD API returned HTTP 404 for CVE-2024-0001');
    });

    it('retries transport errors', async () => {
      const fetchMock = vi.fn((_input: string, _init?: RequestInit) => Promise.reject(new Error('socket hang up')));
      const resolver = createResolver(fetchMock);

      const outcome = await resolver.lookupCve('CVE-2024-0001');

      expect(fetchMock).toHaveBeenCalledTimes(3);
      expect(outcome.error?.kind).toBe('network');
      expect(outcome.error?.message).toBe('NVD API request for CVE-2024-0001 failed: socket hang up');
    });

    it('reports a per-request timeout', async () => {
      const fetchMock = vi.fn(
        (_input: string, init?: RequestInit) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
          })
      );
      const resolver = createResolver(fetchMock, { timeoutMs: 5, retry: { ...FAST_RETRY, maxAttempts: 1 } });

      const outcome = await resolver.lookupCve('CVE-2024-0001');

      expect(outcome.error?.kind).toBe('timeout');
      expect(outcome.error?.message).toBe('NVD API request for CVE-2024-0001 timed out after 5ms');
    });
  });

  describe('responses', () => {
    it('sends the API key and cveId parameter', async () => {
      const fetchMock = mockFetch(() => jsonResponse(nvdPayload('HIGH', 7.5)));
      const resolver = createResolver(fetchMock, { nvdApiKey: 'test-secret' });

      await resolver.lookupCve('cve-2024-0001');

      expect(fetchMock).toHaveBeenCalledWith(
        'https://nvd.test/rest/json/cves/2.0?cveId=CVE-2024-0001',
        expect.objectContaining({
          headers: { Accept: 'application/json', 'User-Agent': 'vulngate/0.1.0', apiKey: 'test-secret' },
        })
      );
    });

    it('releases the body of every rejected response', async () => {
      const responses: Response[] = [];
      const fetchMock = mockFetch(() => {
        const response = jsonResponse({ message: 'unavailable' }, responses.length < 2 ? 503 : 404);
        responses.push(response);
        return response;
      });
      const resolver = createResolver(fetchMock);

      await resolver.lookupCve('CVE-2024-0001');

      expect(responses.map((response) => [response.status, response.bodyUsed])).toEqual([
        [503, true],
        [503, true],
        [404, true],
      ]);
    });

    it('treats an empty result as a failure', async () => {
      const fetchMock = mockFetch(() => jsonResponse({ vulnerabilities: [] }));
      const resolver = createResolver(fetchMock);

      const result = await resolver.resolve(makeFinding('GO-1', { aliases: ['CVE-2024-0001'] }));

      expect(result.warning?.message).toBe('NVD API returned no severity data for CVE-2024-0001');
      expect(result.assessment.reason).toBe(
        'OSV severity unavailable in scanner input, no GHSA aliases found, NVD lookup failed'
      );
    });

    it('does not retry an undecodable body', async () => {
      const fetchMock = mockFetch(() => new Response('not json', { status: 200 }));
      const resolver = createResolver(fetchMock);

      const outcome = await resolver.lookupCve('CVE-2024-0001');

      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(outcome.error?.kind).toBe('decode');
      expect(outcome.error?.message).toMatch(/^NVD API response for CVE-2024-0001 could not be decoded: /);
    });

    it('fails GHSA lookups without a base URL', async () => {
      const fetchMock = mockFetch(() => jsonResponse({}));
      const resolver = createResolver(fetchMock, { ghsaBaseUrl: '' });

      const outcome = await resolver.lookupGhsa('GHSA-aaaa-bbbb-cccc');

      expect(fetchMock).not.toHaveBeenCalled();
      expect(outcome.error?.kind).toBe('request');
      expect(outcome.error?.message).toBe('advisory base URL is required');
    });
  });

  describe('cache', () => {
    it('issues one request per identifier', async () => {
      const fetchMock = mockFetch(() => jsonResponse(nvdPayload('HIGH', 8.1)));
      const resolver = createResolver(fetchMock);
      const finding = makeFinding('GO-1', { aliases: ['CVE-2024-0001'] });

      const first = await resolver.resolve(finding);
      const second = await resolver.resolve(finding);

      expect(second).toEqual(first);
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('caches failures verbatim', async () => {
      const fetchMock = mockFetch(() => jsonResponse({}, 403));
      const resolver = createResolver(fetchMock);

      const first = await resolver.lookupCve('CVE-2024-0001');
      const second = await resolver.lookupCve('cve-2024-0001');

      expect(second).toBe(first);
      expect(second.error).toBe(first.error);
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('shares a lookup already in flight', async () => {
      const fetchMock = mockFetch(() => jsonResponse(nvdPayload('HIGH', 8.1)));
      const resolver = createResolver(fetchMock);

      const [first, second] = await Promise.all([
        resolver.lookupCve('CVE-2024-0001'),
        resolver.lookupCve('CVE-2024-0001'),
      ]);

      expect(second).toBe(first);
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });
  });

  describe('snapshot and offline mode', () => {
    const snapshot = new Map<string, SeverityAssessment>([
      ['CVE-2024-0001', { level: 'HIGH', score: 7.5, source: 'CVE-2024-0001', method: 'nvd' }],
    ]);

    it('serves snapshot hits before the network', async () => {
      const fetchMock = mockFetch(() => jsonResponse({}));
      const resolver = createResolver(fetchMock, { snapshot });

      const result = await resolver.resolve(makeFinding('GO-1', { aliases: ['CVE-2024-0001'] }));

      expect(result.assessment.level).toBe('HIGH');
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('fails GHSA lookups offline and rates from the snapshot', async () => {
      const fetchMock = mockFetch(() => jsonResponse({}));
      const resolver = createResolver(fetchMock, { snapshot, offline: true });

      const result = await resolver.resolve(
        makeFinding('GO-1', { aliases: ['CVE-2024-0001', 'GHSA-aaaa-bbbb-cccc'] })
      );

      expect(result.assessment).toEqual(snapshot.get('CVE-2024-0001'));
      expect(result.warning?.message).toBe('offline mode enabled and GHSA-AAAA-BBBB-CCCC requires live GHSA lookup');
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('fails a snapshot miss offline', async () => {
      const fetchMock = mockFetch(() => jsonResponse({}));
      const resolver = createResolver(fetchMock, { snapshot, offline: true });

      const result = await resolver.resolve(makeFinding('GO-2', { aliases: ['CVE-2024-0009'] }));

      expect(result.assessment.level).toBe('UNKNOWN');
      expect(result.warning?.message).toBe('offline mode enabled and CVE-2024-0009 is missing from severity snapshot');
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });

  describe('cancellation', () => {
    it('aborts during backoff and caches nothing', async () => {
      const controller = new AbortController();
      const fetchMock = mockFetch(() => {
        setTimeout(() => controller.abort(), 5);
        return jsonResponse({}, 503);
      });
      const resolver = createResolver(fetchMock, {
        retry: { ...FAST_RETRY, anonymousBaseDelayMs: 60_000 },
      });

      await expect(
        resolver.resolve(makeFinding('GO-1', { aliases: ['CVE-2024-0001'] }), controller.signal)
      ).rejects.toBeInstanceOf(ResolutionCancelledError);
      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(resolver.cache.size).toBe(0);
    });

    it('lets a caller waiting on a shared lookup give up on its own signal', async () => {
      const fetchMock = mockFetch(() => jsonResponse({}, 503));
      const resolver = createResolver(fetchMock, {
        retry: { ...FAST_RETRY, anonymousBaseDelayMs: 100 },
      });
      const controller = new AbortController();

      let ownerSettled = false;
      const owner = resolver.lookupCve('CVE-2024-0001').then((outcome) => {
        ownerSettled = true;
        return outcome;
      });
      const joiner = resolver.lookupCve('CVE-2024-0001', controller.signal);
      setTimeout(() => controller.abort(), 10);

      await expect(joiner).rejects.toThrow('Severity resolution for CVE-2024-0001 was cancelled');
      expect(ownerSettled).toBe(false);

      const outcome = await owner;
      expect(outcome.error).toMatchObject({ kind: 'http-status', status: 503 });
      expect(fetchMock).toHaveBeenCalledTimes(3);
      expect(resolver.cache.size).toBe(1);
    });

    it('makes no request when already cancelled', async () => {
      const fetchMock = mockFetch(() => jsonResponse({}));
      const resolver = createResolver(fetchMock);

      await expect(resolver.lookupCve('CVE-2024-0001', AbortSignal.abort())).rejects.toThrow(
        'Severity resolution for CVE-2024-0001 was cancelled'
      );
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });

  it('reports retries and failures to the logger', async () => {
    const logger = { debug: vi.fn(), warn: vi.fn() };
    const fetchMock = mockFetch(() => jsonResponse({}, 401));
    const resolver = createResolver(fetchMock, { logger });

    await resolver.lookupGhsa('GHSA-aaaa-bbbb-cccc');

    expect(logger.warn).toHaveBeenCalledWith('Severity lookup failed', {
      identifier: 'GHSA-AAAA-BBBB-CCCC',
      source: 'ghsa',
      kind: 'auth',
      status: 401,
    });
  });
});

describe('computeBackoffDelay', () => {
  const policy: RetryPolicy = { maxAttempts: 3, authenticatedBaseDelayMs: 300, anonymousBaseDelayMs: 750, random: () => 0.5 };

  it('doubles the base delay and adds jitter', () => {
    expect(computeBackoffDelay(1, true, policy)).toBe(375);
    expect(computeBackoffDelay(2, false, { ...policy, random: () => 0 })).toBe(1500);
    expect(computeBackoffDelay(3, false, { ...policy, random: () => 0.999 })).toBe(3374);
  });
});

describe('sleep', () => {
  it('rejects at once for an aborted signal', async () => {
    await expect(sleep(60_000, AbortSignal.abort())).rejects.toBeInstanceOf(ResolutionCancelledError);
  });

  it('resolves after the delay', async () => {
    await expect(sleep(1)).resolves.toBeUndefined();
  });
});

describe('NVD extraction', () => {
  it('orders metrics v3.1, v3.0, v2 within a record', () => {
    const metrics = extractNvdMetrics({
      vulnerabilities: [
        {
          cve: {
            metrics: {
              cvssMetricV2: [{ cvssData: { baseScore: 5 } }],
              cvssMetricV31: [{ cvssData: { baseScore: 9.8, baseSeverity: 'CRITICAL' } }],
            },
          },
        },
      ],
    });

    expect(metrics).toEqual([
      { baseScore: 9.8, baseSeverity: 'CRITICAL' },
      { baseScore: 5, baseSeverity: '' },
    ]);
  });

  it('rejects a wrongly typed score', () => {
    expect(() =>
      extractNvdMetrics({ vulnerabilities: [{ cve: { metrics: { cvssMetricV31: [{ cvssData: { baseScore: '9' } }] } } }] })
    ).toThrow('vulnerabilities[0].cve.metrics.cvssMetricV31[0].cvssData.baseScore must be a number');
  });

  it('keeps the highest level and the highest score at that level', () => {
    expect(
      bestNvdSeverity([
        { baseScore: 7.5, baseSeverity: 'HIGH' },
        { baseScore: 8.9, baseSeverity: '' },
        { baseScore: 6, baseSeverity: 'MEDIUM' },
      ])
    ).toEqual({ level: 'HIGH', score: 8.9 });
    expect(bestNvdSeverity([])).toEqual({ level: 'UNKNOWN', score: 0 });
  });

  it('keeps existing query parameters', () => {
    expect(buildNvdRequestUrl('https://nvd.test/cves?resultsPerPage=1', 'CVE-1')).toBe(
      'https://nvd.test/cves?resultsPerPage=1&cveId=CVE-1'
    );
  });
});

describe('GHSA extraction', () => {
  it('takes the best of the top-level, v4 and v3 ratings', () => {
    expect(
      bestGhsaSeverity(
        {
          ghsaId: '',
          severity: 'low',
          cvssScore: '3.1',
          cvssV4: { score: 9.3, severity: 'critical' },
          cvssV3: { severity: '' },
        },
        'ghsa-x'
      )
    ).toEqual({ level: 'CRITICAL', score: 9.3, source: 'GHSA-X', method: 'ghsa' });
  });

  it('trims trailing slashes from the base path', () => {
    expect(buildAdvisoryUrl('https://ghsa.test/advisories///', 'GHSA-1')).toBe('https://ghsa.test/advisories/GHSA-1');
  });
});
