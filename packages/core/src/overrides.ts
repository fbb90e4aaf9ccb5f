/**
 * Override Registry
 *
 * Risk-acceptance waivers keyed by canonical identifier. Unlike a baseline,
 * an override carries a justification and an expiry day; once the day has
 * passed the finding fails the gate again.
 */

import { readFile } from 'node:fs/promises';
import { ErrorCodes, GateError, wrapError } from './errors.js';
import { candidateIds, normalizeId } from './ids.js';
import { isRecord, type JsonRecord } from './json.js';
import type { Finding, OverrideMatch, OverrideRegistry, RiskOverride } from './types.js';

const EXPIRY_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Raw `{"overrides": [...]}` entry as written by users.
 */
export interface OverrideInput {
  id?: string;
  reason?: string;
  expires_on?: string;
}

function invalid(message: string, details?: unknown): GateError {
  return new GateError(ErrorCodes.PARSE_OVERRIDES, message, { details });
}

/**
 * True when `value` is a real calendar day written as YYYY-MM-DD.
 */
export function isValidExpiryDate(value: string): boolean {
  const match = EXPIRY_DATE_PATTERN.exec(value);
  if (!match) return false;
  const [, year, month, day] = match;
  const date = new Date(0);
  // setUTCFullYear keeps years below 100 as written
  date.setUTCFullYear(Number(year), Number(month) - 1, Number(day));
  return date.toISOString().slice(0, 10) === value;
}

/** The UTC calendar day of `now` as YYYY-MM-DD */
export function utcDateString(now: Date): string {
  return now.toISOString().slice(0, 10);
}

/**
 * An override is valid through its expiry day and expired from the next
 * UTC day on.
 */
export function isOverrideExpired(override: RiskOverride, now: Date): boolean {
  return utcDateString(now) > override.expiresOn;
}

function readField(entry: JsonRecord, key: keyof OverrideInput, index: number): string {
  const value = entry[key];
  if (value === undefined || value === null) return '';
  if (typeof value !== 'string') {
    throw invalid(`overrides[${index}].${key} must be a string`);
  }
  return value;
}

/**
 * Validate already-decoded override entries. The first invalid entry
 * rejects the whole registry.
 */
export function buildOverrideRegistry(entries: readonly unknown[]): Map<string, RiskOverride> {
  const registry = new Map<string, RiskOverride>();

  entries.forEach((entry, index) => {
    if (!isRecord(entry)) {
      throw invalid(`overrides[${index}] must be an object`);
    }

    const id = normalizeId(readField(entry, 'id', index));
    if (id === '') {
      throw invalid('override id is required', { index });
    }
    if (registry.has(id)) {
      throw invalid(`duplicate override id: ${id}`, { id });
    }
    const reason = readField(entry, 'reason', index).trim();
    if (reason === '') {
      throw invalid(`override ${id} must include a reason`, { id });
    }
    const expiresOn = readField(entry, 'expires_on', index).trim();
    if (expiresOn === '') {
      throw invalid(`override ${id} must include expires_on`, { id });
    }
    if (!isValidExpiryDate(expiresOn)) {
      throw invalid(`override ${id} has invalid expires_on "${expiresOn}" (expected YYYY-MM-DD)`, { id, expiresOn });
    }

    registry.set(id, { id, reason, expiresOn });
  });

  return registry;
}

/**
 * Parse the contents of an override registry file.
 */
export function parseOverrides(content: string): Map<string, RiskOverride> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw wrapError(error, ErrorCodes.PARSE_OVERRIDES);
  }

  if (!isRecord(parsed)) {
    throw invalid('override registry must be a JSON object');
  }
  const overrides = parsed['overrides'];
  if (overrides === undefined || overrides === null) {
    return new Map();
  }
  if (!Array.isArray(overrides)) {
    throw invalid('"overrides" must be an array');
  }
  return buildOverrideRegistry(overrides);
}

export async function loadOverrides(path: string): Promise<Map<string, RiskOverride>> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw wrapError(error, ErrorCodes.IO_READ_ERROR, `Failed to read override registry ${path}`);
  }
  return parseOverrides(content);
}

/**
 * Look the finding up by its own id first, then by each alias in order.
 */
export function matchOverride(finding: Finding, registry: OverrideRegistry): OverrideMatch | undefined {
  for (const candidate of candidateIds(finding)) {
    const normalized = normalizeId(candidate);
    const override = registry.get(normalized);
    if (override) {
      return { override, matchedBy: normalized };
    }
  }
  return undefined;
}
