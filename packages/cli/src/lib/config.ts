/**
 * Default configuration and config loading for vulngate
 */

import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { join } from 'path';
import { parse as parseYaml } from 'yaml';
import {
  DEFAULT_GHSA_BASE_URL,
  DEFAULT_NVD_BASE_URL,
  DEFAULT_TIMEOUT_MS,
  ErrorCodes,
  GateError,
  isRecord,
  wrapError,
  type JsonRecord,
  type ScanMode,
} from '@vulngate/core';

export interface GateConfig {
  scanMode: ScanMode;
  /** Override registry path */
  overrides?: string;
  /** Baseline scan whose findings are suppressed */
  excludeInput?: string;
  severitySnapshot?: string;
  offline: boolean;
  nvd: {
    baseUrl: string;
    apiKeyFile?: string;
    /** Per HTTP attempt, shared by both advisory APIs */
    timeoutMs: number;
  };
  ghsa: {
    baseUrl: string;
    tokenFile?: string;
  };
}

/** Config file contents after validation; every key is optional */
export interface PartialGateConfig {
  scanMode?: ScanMode;
  overrides?: string;
  excludeInput?: string;
  severitySnapshot?: string;
  offline?: boolean;
  nvd?: Partial<GateConfig['nvd']>;
  ghsa?: Partial<GateConfig['ghsa']>;
}

export const DEFAULT_CONFIG: GateConfig = {
  scanMode: 'source',
  offline: false,
  nvd: {
    baseUrl: DEFAULT_NVD_BASE_URL,
    timeoutMs: DEFAULT_TIMEOUT_MS,
  },
  ghsa: {
    baseUrl: DEFAULT_GHSA_BASE_URL,
  },
};

export const CONFIG_FILE_NAMES = [
  'vulngate.config.yaml',
  'vulngate.config.yml',
  'vulngate.config.json',
  '.vulngaterc',
  '.vulngaterc.yaml',
  '.vulngaterc.yml',
  '.vulngaterc.json',
];

const SCAN_MODES: readonly ScanMode[] = ['source', 'binary'];

function isScanMode(value: string): value is ScanMode {
  return (SCAN_MODES as readonly string[]).includes(value);
}

/**
 * Trimmed, case-insensitive scan mode.
 */
export function normalizeScanMode(value: string): ScanMode {
  const normalized = value.trim().toLowerCase();
  if (isScanMode(normalized)) {
    return normalized;
  }
  throw new GateError(
    ErrorCodes.CLI_INVALID_ARGUMENT,
    `unsupported scan mode "${value}" (valid values: ${SCAN_MODES.join(', ')})`
  );
}

function schemaError(message: string): GateError {
  return new GateError(ErrorCodes.CONFIG_SCHEMA_ERROR, message);
}

function readString(record: JsonRecord, key: string, path: string): string | undefined {
  const value = record[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') throw schemaError(`'${path}${key}' must be a string`);
  return value;
}

function readSection(record: JsonRecord, key: string): JsonRecord | undefined {
  const value = record[key];
  if (value === undefined || value === null) return undefined;
  if (!isRecord(value)) throw schemaError(`'${key}' must be an object`);
  return value;
}

/**
 * Check the shape of a parsed config file. Unknown keys are ignored.
 */
export function validateConfig(parsed: unknown): PartialGateConfig {
  if (parsed === undefined || parsed === null) return {};
  if (!isRecord(parsed)) throw schemaError('configuration must be a mapping');

  const config: PartialGateConfig = {
    overrides: readString(parsed, 'overrides', ''),
    excludeInput: readString(parsed, 'excludeInput', ''),
    severitySnapshot: readString(parsed, 'severitySnapshot', ''),
  };

  const scanMode = readString(parsed, 'scanMode', '');
  if (scanMode !== undefined) {
    const normalized = scanMode.trim().toLowerCase();
    if (!isScanMode(normalized)) throw schemaError(`'scanMode' must be "source" or "binary", got "${scanMode}"`);
    config.scanMode = normalized;
  }

  const offline = parsed['offline'];
  if (offline !== undefined && offline !== null) {
    if (typeof offline !== 'boolean') throw schemaError(`'offline' must be a boolean`);
    config.offline = offline;
  }

  const nvd = readSection(parsed, 'nvd');
  if (nvd) {
    const timeoutMs = nvd['timeoutMs'];
    if (timeoutMs !== undefined && (typeof timeoutMs !== 'number' || !(timeoutMs > 0))) {
      throw schemaError(`'nvd.timeoutMs' must be a positive number`);
    }
    config.nvd = {
      baseUrl: readString(nvd, 'baseUrl', 'nvd.'),
      apiKeyFile: readString(nvd, 'apiKeyFile', 'nvd.'),
      timeoutMs: typeof timeoutMs === 'number' ? timeoutMs : undefined,
    };
  }

  const ghsa = readSection(parsed, 'ghsa');
  if (ghsa) {
    config.ghsa = {
      baseUrl: readString(ghsa, 'baseUrl', 'ghsa.'),
      tokenFile: readString(ghsa, 'tokenFile', 'ghsa.'),
    };
  }

  return config;
}

/**
 * Later values win; undefined never overwrites.
 */
export function mergeConfig(base: GateConfig, override: PartialGateConfig): GateConfig {
  return {
    scanMode: override.scanMode ?? base.scanMode,
    overrides: override.overrides ?? base.overrides,
    excludeInput: override.excludeInput ?? base.excludeInput,
    severitySnapshot: override.severitySnapshot ?? base.severitySnapshot,
    offline: override.offline ?? base.offline,
    nvd: {
      baseUrl: override.nvd?.baseUrl ?? base.nvd.baseUrl,
      apiKeyFile: override.nvd?.apiKeyFile ?? base.nvd.apiKeyFile,
      timeoutMs: override.nvd?.timeoutMs ?? base.nvd.timeoutMs,
    },
    ghsa: {
      baseUrl: override.ghsa?.baseUrl ?? base.ghsa.baseUrl,
      tokenFile: override.ghsa?.tokenFile ?? base.ghsa.tokenFile,
    },
  };
}

/** First config file present in `directory`, if any */
export function findConfigFile(directory: string): string | undefined {
  for (const fileName of CONFIG_FILE_NAMES) {
    const configPath = join(directory, fileName);
    if (existsSync(configPath)) {
      return configPath;
    }
  }
  return undefined;
}

export async function loadConfig(directory: string): Promise<GateConfig> {
  const configPath = findConfigFile(directory);
  if (!configPath) {
    return DEFAULT_CONFIG;
  }

  let parsed: unknown;
  try {
    const content = await readFile(configPath, 'utf-8');
    parsed = configPath.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
  } catch (error) {
    throw wrapError(error, ErrorCodes.CONFIG_INVALID, `Failed to load ${configPath}`);
  }

  return mergeConfig(DEFAULT_CONFIG, validateConfig(parsed));
}
