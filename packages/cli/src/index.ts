#!/usr/bin/env node

/**
 * vulngate CLI
 *
 * Fail CI on unaccepted vulnerability risk.
 */

import { Command } from 'commander';
import { checkCommand } from './commands/check.js';
import { logger } from './lib/logger.js';
import { CLI_VERSION } from './version.js';

const program = new Command();

program
  .name('vulngate')
  .description('Gate scanner findings on severity and risk-acceptance overrides')
  .version(CLI_VERSION);

program
  .command('check')
  .description('Evaluate scanner output against the vulnerability policy')
  .option('-i, --input <path>', 'Scanner JSON stream to evaluate')
  .option('-o, --overrides <path>', 'Risk-acceptance override registry (JSON)')
  .option('--scan-mode <mode>', 'How the scan was produced: source or binary')
  .option('--exclude-input <path>', 'Baseline scan whose findings are ignored')
  .option('--severity-snapshot <path>', 'Pinned severities consulted before the advisory APIs')
  .option('--offline', 'Resolve severities from the snapshot only')
  .option('--nvd-api-base-url <url>', 'NVD CVE API endpoint')
  .option('--nvd-api-key-file <path>', 'File holding the NVD API key (else NVD_API_KEY)')
  .option('--ghsa-api-base-url <url>', 'GitHub advisory API endpoint')
  .option('--ghsa-token-file <path>', 'File holding a GitHub token (else GHSA_TOKEN or GITHUB_TOKEN)')
  .option('--timeout <ms>', 'Per-request timeout for advisory lookups')
  .option('--json', 'Output results as JSON')
  .option('--quiet', 'Only print the verdict')
  .option('-v, --verbose', 'Enable verbose output')
  .action(checkCommand);

program.parseAsync().catch((error: unknown) => {
  logger.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
