/**
 * GitHub global security advisories endpoint
 */

import { normalizeId } from '../ids.js';
import { isRecord, type JsonRecord } from '../json.js';
import { betterSeverity, normalizeSeverity, parseScore } from '../severity.js';
import type { SeverityAssessment } from '../types.js';
import type { AdvisoryEndpoint, AdvisoryRequest } from './retry.js';

export const DEFAULT_GHSA_BASE_URL = 'https://api.github.com/advisories';
export const GHSA_API_VERSION = '2022-11-28';

export const GHSA_UNAUTHORIZED_MESSAGE =
  'Missing or invalid GHSA token. Remove the configured token to use unauthenticated access, or configure a valid token.';
export const GHSA_FORBIDDEN_MESSAGE =
  'GHSA token is valid but access is forbidden. Check token scope and account permissions.';

export interface GhsaCvssData {
  score?: unknown;
  severity: string;
}

/** The subset of an advisory document used for rating */
export interface GhsaAdvisory {
  ghsaId: string;
  severity: string;
  cvssScore?: unknown;
  cvssV3: GhsaCvssData;
  cvssV4: GhsaCvssData;
}

function stringField(record: JsonRecord, key: string, path: string): string {
  const value = record[key];
  if (value === undefined || value === null) return '';
  if (typeof value !== 'string') throw new Error(`${path}.${key} must be a string`);
  return value;
}

function objectField(record: JsonRecord, key: string, path: string): JsonRecord {
  const value = record[key];
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) throw new Error(`${path}.${key} must be an object`);
  return value;
}

function decodeCvssData(record: JsonRecord, key: string): GhsaCvssData {
  const data = objectField(record, key, 'cvss_severities');
  return { score: data['score'], severity: stringField(data, 'severity', `cvss_severities.${key}`) };
}

/**
 * Throws when the payload has the wrong shape. Scores stay untyped: the API
 * returns them as numbers, numeric strings or null.
 */
export function decodeGhsaAdvisory(payload: unknown): GhsaAdvisory {
  if (payload === null) {
    return { ghsaId: '', severity: '', cvssV3: { severity: '' }, cvssV4: { severity: '' } };
  }
  if (!isRecord(payload)) throw new Error('response must be a JSON object');

  const cvss = objectField(payload, 'cvss', 'response');
  const severities = objectField(payload, 'cvss_severities', 'response');

  return {
    ghsaId: stringField(payload, 'ghsa_id', 'response'),
    severity: stringField(payload, 'severity', 'response'),
    cvssScore: cvss['score'],
    cvssV3: decodeCvssData(severities, 'cvss_v3'),
    cvssV4: decodeCvssData(severities, 'cvss_v4'),
  };
}

/**
 * Best of the advisory's top-level rating, its CVSS v4 and its CVSS v3 block.
 */
export function bestGhsaSeverity(advisory: GhsaAdvisory, requestedId: string): SeverityAssessment {
  const source = normalizeId(advisory.ghsaId) || normalizeId(requestedId);
  let best: SeverityAssessment = { level: 'UNKNOWN', score: 0, source, method: 'ghsa' };

  const topLevelScore = parseScore(advisory.cvssScore) ?? 0;
  const candidates: Array<{ severity: string; score: number }> = [
    { severity: advisory.severity, score: topLevelScore },
    { severity: advisory.cvssV4.severity, score: parseScore(advisory.cvssV4.score) ?? 0 },
    { severity: advisory.cvssV3.severity, score: parseScore(advisory.cvssV3.score) ?? 0 },
  ];

  for (const candidate of candidates) {
    const next: SeverityAssessment = {
      level: normalizeSeverity(candidate.severity, candidate.score),
      score: candidate.score,
      source,
      method: 'ghsa',
    };
    if (betterSeverity(next, best)) {
      best = next;
    }
  }

  return best;
}

/**
 * `<base path without trailing slashes>/<encoded id>`
 */
export function buildAdvisoryUrl(baseUrl: string, advisoryId: string): string {
  const trimmed = baseUrl.trim();
  if (trimmed === '') {
    throw new Error('advisory base URL is required');
  }
  const url = new URL(trimmed);
  url.pathname = `${url.pathname.replace(/\/+$/, '')}/${encodeURIComponent(advisoryId)}`;
  return url.toString();
}

export interface GhsaEndpointOptions {
  baseUrl: string;
  token?: string;
  userAgent: string;
}

export function createGhsaEndpoint(options: GhsaEndpointOptions): AdvisoryEndpoint {
  const token = options.token?.trim() ?? '';

  return {
    source: 'ghsa',
    label: 'GHSA',
    credentialConfigured: token !== '',

    buildRequest(identifier: string): AdvisoryRequest {
      const headers: Record<string, string> = {
        Accept: 'application/vnd.github+json',
        'X-GitHub-Api-Version': GHSA_API_VERSION,
        'User-Agent': options.userAgent,
      };
      if (token !== '') {
        headers['Authorization'] = `Bearer ${token}`;
      }
      return { url: buildAdvisoryUrl(options.baseUrl, identifier), headers };
    },

    unauthorizedMessage: () => GHSA_UNAUTHORIZED_MESSAGE,
    forbiddenMessage: () => GHSA_FORBIDDEN_MESSAGE,
    rateLimitedMessage: (identifier: string) =>
      `GHSA API returned HTTP 429 for ${identifier}. This indicates rate limiting. ` +
      'Retry later, use unauthenticated fallback, or configure --ghsa-token-file for higher request limits',

    extractSeverity(payload: unknown, identifier: string): SeverityAssessment {
      const best = bestGhsaSeverity(decodeGhsaAdvisory(payload), identifier);
      return best.level === 'UNKNOWN' ? { ...best, method: 'unknown' } : best;
    },
  };
}
