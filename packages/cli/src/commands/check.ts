/**
 * Check command - gate a scan on the vulnerability policy
 */

import pc from 'picocolors';
import {
  AdvisorySeverityResolver,
  ErrorCodes,
  GateError,
  evaluateFindings,
  filterExcludedFindings,
  hasBlockingFindings,
  isGateError,
  loadExclusionSet,
  loadOverrides,
  loadScannerOutput,
  loadSeveritySnapshot,
  wrapError,
  type EvaluationResult,
  type FetchFn,
} from '@vulngate/core';
import { loadConfig, mergeConfig, normalizeScanMode, type GateConfig } from '../lib/config.js';
import { resolveGhsaToken, resolveNvdApiKey, type Environment } from '../lib/credentials.js';
import { logger } from '../lib/logger.js';
import { buildJsonReport, formatReport } from '../lib/report.js';

export interface CheckOptions {
  input?: string;
  overrides?: string;
  scanMode?: string;
  excludeInput?: string;
  severitySnapshot?: string;
  offline?: boolean;
  nvdApiBaseUrl?: string;
  nvdApiKeyFile?: string;
  ghsaApiBaseUrl?: string;
  ghsaTokenFile?: string;
  timeout?: string;
  json?: boolean;
  quiet?: boolean;
  verbose?: boolean;
}

/** Process-level collaborators, replaceable in tests */
export interface CheckContext {
  cwd: string;
  env: Environment;
  now: () => Date;
  fetch?: FetchFn;
  signal?: AbortSignal;
}

function defaultContext(): CheckContext {
  return { cwd: process.cwd(), env: process.env, now: () => new Date() };
}

function parseTimeout(value: string): number {
  const timeout = Number(value.trim());
  if (!Number.isInteger(timeout) || timeout <= 0) {
    throw new GateError(
      ErrorCodes.CLI_INVALID_ARGUMENT,
      `--timeout must be a positive number of milliseconds, got "${value}"`
    );
  }
  return timeout;
}

function required(value: string | undefined, flag: string): string {
  const trimmed = (value ?? '').trim();
  if (trimmed === '') {
    throw new GateError(ErrorCodes.CLI_MISSING_ARGUMENT, `${flag} is required`);
  }
  return trimmed;
}

/**
 * Config file values overlaid with command-line flags.
 */
export async function resolveCheckConfig(options: CheckOptions, cwd: string): Promise<GateConfig> {
  const fileConfig = await loadConfig(cwd);
  return mergeConfig(fileConfig, {
    scanMode: options.scanMode !== undefined ? normalizeScanMode(options.scanMode) : undefined,
    overrides: options.overrides,
    excludeInput: options.excludeInput,
    severitySnapshot: options.severitySnapshot,
    offline: options.offline ? true : undefined,
    nvd: {
      baseUrl: options.nvdApiBaseUrl,
      apiKeyFile: options.nvdApiKeyFile,
      timeoutMs: options.timeout !== undefined ? parseTimeout(options.timeout) : undefined,
    },
    ghsa: {
      baseUrl: options.ghsaApiBaseUrl,
      tokenFile: options.ghsaTokenFile,
    },
  });
}

/**
 * Run the whole pipeline and return the verdict. Fatal errors are thrown.
 */
export async function evaluateCheck(
  options: CheckOptions,
  context: CheckContext
): Promise<{ config: GateConfig; result: EvaluationResult }> {
  const config = await resolveCheckConfig(options, context.cwd);
  const inputPath = required(options.input, '--input');
  const overridesPath = required(config.overrides, '--overrides');

  let findings = await loadScannerOutput(inputPath, config.scanMode);
  logger.debug('Parsed scanner output', { path: inputPath, findings: findings.length, scanMode: config.scanMode });

  const excludePath = (config.excludeInput ?? '').trim();
  if (excludePath !== '') {
    const before = findings.length;
    findings = filterExcludedFindings(findings, await loadExclusionSet(excludePath));
    logger.debug('Applied baseline exclusions', { path: excludePath, excluded: before - findings.length });
  }

  const overrides = await loadOverrides(overridesPath);
  const nvdApiKey = await resolveNvdApiKey(config.nvd.apiKeyFile, context.env);
  const ghsaToken = await resolveGhsaToken(config.ghsa.tokenFile, context.env);
  const snapshot = await loadSeveritySnapshot(config.severitySnapshot);

  if (config.offline && snapshot.size === 0) {
    throw new GateError(ErrorCodes.CONFIG_OFFLINE_WITHOUT_SNAPSHOT, '--offline requires --severity-snapshot');
  }

  logger.debug('Resolver configured', {
    offline: config.offline,
    snapshotEntries: snapshot.size,
    anonymousNvd: nvdApiKey === '',
    anonymousGhsa: ghsaToken === '',
    timeoutMs: config.nvd.timeoutMs,
  });

  const resolver = new AdvisorySeverityResolver({
    nvdBaseUrl: config.nvd.baseUrl,
    ghsaBaseUrl: config.ghsa.baseUrl,
    nvdApiKey,
    ghsaToken,
    offline: config.offline,
    snapshot,
    timeoutMs: config.nvd.timeoutMs,
    fetch: context.fetch,
    logger,
  });

  const result = await evaluateFindings(findings, overrides, resolver, context.now(), context.signal);
  return { config, result };
}

function reportError(error: unknown, options: CheckOptions): void {
  const gateError = isGateError(error)
    ? error
    : wrapError(error, ErrorCodes.CHECK_EXECUTION_ERROR, 'Error running vulngate check');

  if (options.json) {
    console.error(JSON.stringify(gateError.toJSON(), null, 2));
    return;
  }

  console.error(pc.red(`\n${gateError.toUserString(options.verbose)}\n`));

  const remediation = gateError.getRemediation();
  if (remediation) {
    console.error(pc.yellow('How to fix:'));
    for (const line of remediation.split('\n')) {
      console.error(pc.dim(`  ${line}`));
    }
    console.error('');
  }

  if (gateError.cause && !options.verbose) {
    console.error(pc.dim(`Caused by: ${gateError.cause.message}`));
    console.error('');
  }
}

/**
 * Returns the process exit code: 1 when something failed, a waiver
 * expired or the run could not complete.
 */
export async function runCheck(options: CheckOptions, context: CheckContext = defaultContext()): Promise<number> {
  try {
    const { config, result } = await evaluateCheck(options, context);
    const blocking = hasBlockingFindings(result);

    if (options.json) {
      console.log(JSON.stringify(buildJsonReport(config.scanMode, result), null, 2));
      return blocking ? 1 : 0;
    }

    if (!options.quiet) {
      for (const line of formatReport(config.scanMode, result)) {
        console.log(line);
      }
      console.log('');
    }

    if (blocking) {
      logger.fail(
        `Policy check failed: ${result.fail.length} failing, ${result.expired.length} expired override(s)`
      );
      return 1;
    }
    logger.success('Policy check passed');
    return 0;
  } catch (error) {
    reportError(error, options);
    return 1;
  }
}

/**
 * Commander action: wires SIGINT to cancellation and sets the exit code.
 */
export async function checkCommand(options: CheckOptions): Promise<void> {
  logger.configure({
    verbose: options.verbose,
    silent: options.quiet,
    json: options.json,
  });

  const controller = new AbortController();
  const onInterrupt = (): void => {
    logger.warn('Interrupted, cancelling severity lookups');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  try {
    process.exitCode = await runCheck(options, { ...defaultContext(), signal: controller.signal });
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}
