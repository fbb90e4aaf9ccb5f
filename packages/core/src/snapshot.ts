/**
 * Pinned NVD severity snapshot, used for offline runs and to skip live
 * lookups for CVEs whose rating is already known.
 */

import { readFile } from 'node:fs/promises';
import { ErrorCodes, GateError, wrapError } from './errors.js';
import { CVE_PREFIX, normalizeId } from './ids.js';
import { isRecord } from './json.js';
import { normalizeSeverity } from './severity.js';
import type { SeverityAssessment } from './types.js';

export type SeveritySnapshot = ReadonlyMap<string, SeverityAssessment>;

function invalid(message: string): GateError {
  return new GateError(ErrorCodes.PARSE_SNAPSHOT, message);
}

/**
 * Parse `{"cves": {"CVE-...": {"severity": "...", "score": n}}}`.
 * Every key must be a CVE id.
 */
export function parseSeveritySnapshot(content: string): Map<string, SeverityAssessment> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw wrapError(error, ErrorCodes.PARSE_SNAPSHOT);
  }
  if (!isRecord(parsed)) {
    throw invalid('severity snapshot must be a JSON object');
  }

  const cves = parsed['cves'];
  const snapshot = new Map<string, SeverityAssessment>();
  if (cves === undefined || cves === null) {
    return snapshot;
  }
  if (!isRecord(cves)) {
    throw invalid('"cves" must be an object keyed by CVE id');
  }

  for (const [rawId, entry] of Object.entries(cves)) {
    const id = normalizeId(rawId);
    if (!id.startsWith(CVE_PREFIX)) {
      throw invalid(`snapshot id must start with CVE-: ${rawId}`);
    }
    if (!isRecord(entry)) {
      throw invalid(`snapshot entry ${rawId} must be an object`);
    }
    const severity = entry['severity'] ?? '';
    const score = entry['score'] ?? 0;
    if (typeof severity !== 'string') {
      throw invalid(`snapshot entry ${rawId} severity must be a string`);
    }
    if (typeof score !== 'number') {
      throw invalid(`snapshot entry ${rawId} score must be a number`);
    }

    snapshot.set(id, {
      level: normalizeSeverity(severity, score),
      score,
      source: id,
      method: 'nvd',
    });
  }

  return snapshot;
}

/**
 * Load a snapshot file. A blank path means no snapshot.
 */
export async function loadSeveritySnapshot(path: string | undefined): Promise<Map<string, SeverityAssessment>> {
  const trimmed = (path ?? '').trim();
  if (trimmed === '') {
    return new Map();
  }

  let content: string;
  try {
    content = await readFile(trimmed, 'utf-8');
  } catch (error) {
    throw wrapError(error, ErrorCodes.IO_READ_ERROR, `Failed to read severity snapshot ${trimmed}`);
  }
  return parseSeveritySnapshot(content);
}
