/**
 * @vulngate/cli - Library exports
 *
 * The programmatic face of the vulngate CLI, for wrapping the policy
 * check in other tooling.
 */

// Check pipeline
export {
  runCheck,
  evaluateCheck,
  resolveCheckConfig,
  checkCommand,
  type CheckOptions,
  type CheckContext,
} from './commands/check.js';

// Configuration
export {
  DEFAULT_CONFIG,
  CONFIG_FILE_NAMES,
  findConfigFile,
  loadConfig,
  mergeConfig,
  normalizeScanMode,
  validateConfig,
  type GateConfig,
  type PartialGateConfig,
} from './lib/config.js';

// Credentials
export { resolveGhsaToken, resolveNvdApiKey, type Environment } from './lib/credentials.js';

// Reporting
export {
  INFO_DISPLAY_LIMIT,
  buildJsonReport,
  formatReport,
  infoHeading,
  type JsonOverrideEntry,
  type JsonRatedEntry,
  type JsonReport,
  type JsonResolverCause,
} from './lib/report.js';

export { Logger, logger, redactLogData, type LogData, type LoggerOptions, type LogLevel } from './lib/logger.js';
export { CLI_VERSION } from './version.js';
