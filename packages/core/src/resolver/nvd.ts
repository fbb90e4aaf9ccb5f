/**
 * NVD CVE API 2.0 endpoint
 */

import { isRecord, type JsonRecord } from '../json.js';
import { normalizeSeverity, severityRank } from '../severity.js';
import type { SeverityAssessment, SeverityLevel } from '../types.js';
import type { AdvisoryEndpoint, AdvisoryRequest } from './retry.js';

export const DEFAULT_NVD_BASE_URL = 'https://services.nvd.nist.gov/rest/json/cves/2.0';

export const NVD_UNAUTHORIZED_MESSAGE = 'Missing or invalid NVD API key. Please configure a valid API key.';
export const NVD_FORBIDDEN_MESSAGE =
  'NVD API key valid but lacks required permissions. Please check your API key configuration.';

/** One `cvssData` block of a CVSS metric */
export interface NvdMetric {
  baseScore: number;
  baseSeverity: string;
}

/** Preference order inside a single CVE record */
const METRIC_FAMILIES = ['cvssMetricV31', 'cvssMetricV30', 'cvssMetricV2'] as const;

function optionalArray(record: JsonRecord, key: string, path: string): unknown[] {
  const value = record[key];
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) throw new Error(`${path}.${key} must be an array`);
  return value;
}

function optionalObject(record: JsonRecord, key: string, path: string): JsonRecord {
  const value = record[key];
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) throw new Error(`${path}.${key} must be an object`);
  return value;
}

function decodeMetric(value: unknown, path: string): NvdMetric {
  if (!isRecord(value)) throw new Error(`${path} must be an object`);
  const data = optionalObject(value, 'cvssData', path);
  const score = data['baseScore'] ?? 0;
  const severity = data['baseSeverity'] ?? '';
  if (typeof score !== 'number') throw new Error(`${path}.cvssData.baseScore must be a number`);
  if (typeof severity !== 'string') throw new Error(`${path}.cvssData.baseSeverity must be a string`);
  return { baseScore: score, baseSeverity: severity };
}

/**
 * Flatten every CVSS metric of every returned CVE record, v3.1 before v3.0
 * before v2 within each record. Throws when the payload has the wrong shape.
 */
export function extractNvdMetrics(payload: unknown): NvdMetric[] {
  if (payload === null) return [];
  if (!isRecord(payload)) throw new Error('response must be a JSON object');

  const metrics: NvdMetric[] = [];
  optionalArray(payload, 'vulnerabilities', 'response').forEach((vulnerability, index) => {
    const path = `vulnerabilities[${index}]`;
    if (!isRecord(vulnerability)) throw new Error(`${path} must be an object`);
    const cve = optionalObject(vulnerability, 'cve', path);
    const metricGroups = optionalObject(cve, 'metrics', `${path}.cve`);
    for (const family of METRIC_FAMILIES) {
      optionalArray(metricGroups, family, `${path}.cve.metrics`).forEach((metric, metricIndex) => {
        metrics.push(decodeMetric(metric, `${path}.cve.metrics.${family}[${metricIndex}]`));
      });
    }
  });
  return metrics;
}

/**
 * Highest mapped level across all metrics; at equal level the higher base
 * score is kept.
 */
export function bestNvdSeverity(metrics: readonly NvdMetric[]): { level: SeverityLevel; score: number } {
  let level: SeverityLevel = 'UNKNOWN';
  let score = -1;

  for (const metric of metrics) {
    const next = normalizeSeverity(metric.baseSeverity, metric.baseScore);
    if (severityRank(next) > severityRank(level)) {
      level = next;
      score = metric.baseScore;
    } else if (next === level && metric.baseScore > score) {
      score = metric.baseScore;
    }
  }

  return { level, score: score < 0 ? 0 : score };
}

/**
 * The configured base URL with `cveId` set; other query parameters are kept.
 */
export function buildNvdRequestUrl(baseUrl: string, cveId: string): string {
  const url = new URL(baseUrl.trim());
  url.searchParams.set('cveId', cveId);
  return url.toString();
}

export interface NvdEndpointOptions {
  baseUrl: string;
  apiKey?: string;
  userAgent: string;
}

export function createNvdEndpoint(options: NvdEndpointOptions): AdvisoryEndpoint {
  const apiKey = options.apiKey?.trim() ?? '';

  return {
    source: 'nvd',
    label: 'NVD',
    credentialConfigured: apiKey !== '',

    buildRequest(identifier: string): AdvisoryRequest {
      const headers: Record<string, string> = {
        Accept: 'application/json',
        'User-Agent': options.userAgent,
      };
      if (apiKey !== '') {
        headers['apiKey'] = apiKey;
      }
      return { url: buildNvdRequestUrl(options.baseUrl, identifier), headers };
    },

    unauthorizedMessage: () => NVD_UNAUTHORIZED_MESSAGE,
    forbiddenMessage: () => NVD_FORBIDDEN_MESSAGE,
    rateLimitedMessage: (identifier: string) =>
      `NVD API returned HTTP 429 for ${identifier}. This indicates rate limiting. ` +
      'Retry later, or configure --nvd-api-key-file or NVD_API_KEY for higher request limits',

    extractSeverity(payload: unknown, identifier: string): SeverityAssessment {
      const { level, score } = bestNvdSeverity(extractNvdMetrics(payload));
      return { level, score, source: identifier, method: level === 'UNKNOWN' ? 'unknown' : 'nvd' };
    },
  };
}
