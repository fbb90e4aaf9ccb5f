/**
 * CLI logger
 *
 * Doubles as the resolver's ResolverLogger, so advisory lookups, retries
 * and cache hits show up under --verbose. Warnings and errors go to stderr.
 * In --json mode every line is a JSON object on stderr, leaving stdout to
 * the report.
 */

import pc from 'picocolors';
import { isRecord, type ResolverLogger } from '@vulngate/core';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerOptions {
  verbose?: boolean;
  silent?: boolean;
  json?: boolean;
}

export type LogData = Record<string, unknown>;

const LEVEL_LABELS: Record<LogLevel, string> = {
  debug: pc.dim('[DEBUG]'),
  info: pc.blue('[INFO]'),
  warn: pc.yellow('[WARN]'),
  error: pc.red('[ERROR]'),
};

/** Keys whose values never reach the output (API keys, tokens) */
const SENSITIVE_KEY = /api[_-]?key|secret|password|token|credential|auth/i;

/** Values that look like a bearer header or a GitHub token */
const SENSITIVE_PREFIXES = ['Bearer ', 'Basic ', 'ghp_', 'github_pat_'];

function maskValue(value: string): string {
  return value.length <= 8 ? '[REDACTED]' : `${value.slice(0, 4)}...${value.slice(-4)}`;
}

/**
 * Copy of `data` with credentials masked, recursing into nested objects.
 */
export function redactLogData(data: LogData): LogData {
  const redacted: LogData = {};
  for (const [key, value] of Object.entries(data)) {
    if (SENSITIVE_KEY.test(key)) {
      redacted[key] = '[REDACTED]';
    } else if (typeof value === 'string' && SENSITIVE_PREFIXES.some((prefix) => value.startsWith(prefix))) {
      redacted[key] = maskValue(value);
    } else if (isRecord(value)) {
      redacted[key] = redactLogData(value);
    } else {
      redacted[key] = value;
    }
  }
  return redacted;
}

export class Logger implements ResolverLogger {
  private options: Required<LoggerOptions> = { verbose: false, silent: false, json: false };

  configure(options: LoggerOptions): void {
    this.options = {
      verbose: options.verbose ?? false,
      silent: options.silent ?? false,
      json: options.json ?? false,
    };
  }

  debug(message: string, data?: LogData): void {
    if (this.options.verbose) this.write('debug', message, data);
  }

  info(message: string, data?: LogData): void {
    this.write('info', message, data);
  }

  warn(message: string, data?: LogData): void {
    this.write('warn', message, data);
  }

  /** Printed even in silent mode */
  error(message: string, data?: LogData): void {
    this.write('error', message, data);
  }

  /** Final verdict line for a passing check */
  success(message: string): void {
    if (!this.options.silent) console.log(pc.green('✓'), message);
  }

  /** Final verdict line for a failing check; printed even in silent mode */
  fail(message: string): void {
    console.log(pc.red('✗'), message);
  }

  private write(level: LogLevel, message: string, data?: LogData): void {
    if (this.options.silent && level !== 'error') return;
    const safe = data ? redactLogData(data) : undefined;

    if (this.options.json) {
      console.error(JSON.stringify({ timestamp: new Date().toISOString(), level, message, ...(safe && { data: safe }) }));
      return;
    }

    const print = level === 'warn' || level === 'error' ? console.error : console.log;
    print(`${LEVEL_LABELS[level]} ${message}`);
    if (this.options.verbose && safe) {
      print(pc.dim(JSON.stringify(safe, null, 2)));
    }
  }
}

export const logger = new Logger();
