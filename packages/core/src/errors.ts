/**
 * Deterministic Error Codes for vulngate
 *
 * Format: VG_<CATEGORY>_<NUMBER>
 *
 * Categories:
 * - CONFIG: Configuration errors
 * - PARSE: Scanner output, override and snapshot decoding errors
 * - IO: File system errors
 * - CLI: Command line argument errors
 * - CHECK: Unexpected failures while running a check
 * - RESOLVE: Severity resolution errors
 *
 * Fatal errors are GateErrors and abort the run. Per-identifier severity
 * lookup failures are ResolutionErrors; they are collected into a
 * ResolutionWarning and attached to the finding instead of being thrown.
 */

export const ErrorCodes = {
  // CONFIG errors (001-099)
  CONFIG_INVALID: 'VG_CONFIG_002',
  CONFIG_SCHEMA_ERROR: 'VG_CONFIG_003',
  CONFIG_OFFLINE_WITHOUT_SNAPSHOT: 'VG_CONFIG_004',
  CONFIG_EMPTY_CREDENTIAL: 'VG_CONFIG_005',

  // PARSE errors (100-199)
  PARSE_SCANNER_OUTPUT: 'VG_PARSE_101',
  PARSE_OVERRIDES: 'VG_PARSE_102',
  PARSE_SNAPSHOT: 'VG_PARSE_103',

  // IO errors (300-399)
  IO_READ_ERROR: 'VG_IO_301',

  // CLI errors (400-499)
  CLI_INVALID_ARGUMENT: 'VG_CLI_401',
  CLI_MISSING_ARGUMENT: 'VG_CLI_402',

  // CHECK errors (500-599)
  CHECK_EXECUTION_ERROR: 'VG_CHECK_501',

  // RESOLVE errors (600-699)
  RESOLVE_CANCELLED: 'VG_RESOLVE_601',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * User-friendly error messages for each error code
 */
export const ErrorMessages: Record<ErrorCode, string> = {
  [ErrorCodes.CONFIG_INVALID]: 'Configuration file is invalid',
  [ErrorCodes.CONFIG_SCHEMA_ERROR]: 'Configuration does not match expected schema',
  [ErrorCodes.CONFIG_OFFLINE_WITHOUT_SNAPSHOT]: 'Offline mode requires a severity snapshot',
  [ErrorCodes.CONFIG_EMPTY_CREDENTIAL]: 'Credential file is empty',

  [ErrorCodes.PARSE_SCANNER_OUTPUT]: 'Failed to parse scanner output',
  [ErrorCodes.PARSE_OVERRIDES]: 'Override registry is invalid',
  [ErrorCodes.PARSE_SNAPSHOT]: 'Severity snapshot is invalid',

  [ErrorCodes.IO_READ_ERROR]: 'Failed to read file',

  [ErrorCodes.CLI_INVALID_ARGUMENT]: 'Invalid argument provided',
  [ErrorCodes.CLI_MISSING_ARGUMENT]: 'Required argument missing',

  [ErrorCodes.CHECK_EXECUTION_ERROR]: 'Error running the policy check',

  [ErrorCodes.RESOLVE_CANCELLED]: 'Severity resolution was cancelled',
};

/**
 * Remediation guidance for each error code
 */
export const ErrorRemediation: Record<ErrorCode, string> = {
  [ErrorCodes.CONFIG_INVALID]: `
Check your vulngate.config.yaml for syntax errors.

Common issues:
- Invalid YAML indentation
- Invalid JSON in vulngate.config.json
- Typo in configuration keys

Run with --verbose for more details.
`.trim(),

  [ErrorCodes.CONFIG_SCHEMA_ERROR]: `
Your configuration has invalid options. Check these common issues:

- 'scanMode' must be "source" or "binary"
- 'offline' must be a boolean
- 'nvd.timeoutMs' must be a positive number
- paths and URLs must be strings
`.trim(),

  [ErrorCodes.CONFIG_OFFLINE_WITHOUT_SNAPSHOT]: `
Offline mode only rates CVEs from a pinned severity snapshot.

Provide one:
  vulngate check --offline --severity-snapshot severity-snapshot.json ...

Snapshot format:
  {"cves": {"CVE-2024-0001": {"severity": "HIGH", "score": 7.5}}}
`.trim(),

  [ErrorCodes.CONFIG_EMPTY_CREDENTIAL]: `
A credential file was given but contains no key or token.

Either write the key into the file, or drop the flag to fall back to the
environment (NVD_API_KEY, GHSA_TOKEN or GITHUB_TOKEN). Without any
credential the advisory APIs are queried anonymously at lower rate limits.
`.trim(),

  [ErrorCodes.PARSE_SCANNER_OUTPUT]: `
The scanner output is not valid JSON. This usually means:

1. The scan was interrupted and the file is truncated
2. Human-readable output was captured instead of JSON
3. Log lines were mixed into the JSON stream

Re-run the scanner with JSON output into a fresh file.
`.trim(),

  [ErrorCodes.PARSE_OVERRIDES]: `
Every override needs an id, a reason and an expiry date:

  {"overrides": [
    {"id": "GO-2024-0001", "reason": "Not exploitable here", "expires_on": "2026-12-31"}
  ]}

Ids must be unique (case-insensitive) and expires_on must be YYYY-MM-DD.
`.trim(),

  [ErrorCodes.PARSE_SNAPSHOT]: `
The severity snapshot must map CVE ids to ratings:

  {"cves": {"CVE-2024-0001": {"severity": "HIGH", "score": 7.5}}}

Every key must start with CVE-.
`.trim(),

  [ErrorCodes.IO_READ_ERROR]: `
Failed to read a file. Check:

1. The file exists and is readable
2. You have permission to read the file

Try: cat <file> to verify readability.
`.trim(),

  [ErrorCodes.CLI_INVALID_ARGUMENT]: `
Invalid command-line argument.

Run: vulngate check --help
`.trim(),

  [ErrorCodes.CLI_MISSING_ARGUMENT]: `
A required argument is missing.

Example:
  vulngate check --input scan.json --overrides overrides.json
`.trim(),

  [ErrorCodes.CHECK_EXECUTION_ERROR]: `
An unexpected error occurred while running the check.

Run with --verbose for the full cause and stack trace.
`.trim(),

  [ErrorCodes.RESOLVE_CANCELLED]: `
The run was interrupted while severities were being resolved.
Re-run the check to produce a verdict.
`.trim(),
};

/**
 * Structured error with deterministic error code
 */
export class GateError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: unknown;
  public override readonly cause?: Error;

  constructor(code: ErrorCode, message?: string, options?: { details?: unknown; cause?: Error }) {
    const baseMessage = message ?? ErrorMessages[code];
    super(baseMessage, { cause: options?.cause });

    this.name = 'GateError';
    this.code = code;
    this.details = options?.details;
    this.cause = options?.cause;

    Error.captureStackTrace?.(this, GateError);
  }

  getRemediation(): string {
    return ErrorRemediation[this.code];
  }

  /**
   * Format error for user display
   */
  toUserString(verbose = false): string {
    const parts: string[] = [`[${this.code}] ${this.message}`];

    if (verbose && this.details) {
      parts.push(`\nDetails: ${JSON.stringify(this.details, null, 2)}`);
    }

    if (verbose && this.cause) {
      parts.push(`\nCaused by: ${this.cause.message}`);
      if (this.cause.stack) {
        parts.push(`\n${this.cause.stack}`);
      }
    }

    return parts.join('');
  }

  toJSON(): Record<string, unknown> {
    return {
      code: this.code,
      message: this.message,
      remediation: this.getRemediation(),
      details: this.details,
      cause: this.cause
        ? {
            message: this.cause.message,
            stack: this.cause.stack,
          }
        : undefined,
    };
  }
}

export function isGateError(error: unknown): error is GateError {
  return error instanceof GateError;
}

/**
 * Wrap an unknown error in a GateError
 */
export function wrapError(error: unknown, code: ErrorCode, message?: string): GateError {
  if (error instanceof GateError) {
    return error;
  }

  const cause = error instanceof Error ? error : new Error(String(error));
  return new GateError(code, message ?? `${ErrorMessages[code]}: ${cause.message}`, { cause });
}

// ============================================================================
// Severity Resolution Errors
// ============================================================================

export type AdvisorySource = 'ghsa' | 'nvd';

export type ResolutionErrorKind =
  | 'network'
  | 'timeout'
  | 'auth'
  | 'rate-limit'
  | 'http-status'
  | 'decode'
  | 'no-data'
  | 'offline'
  | 'request';

/**
 * One failed advisory lookup. Never thrown out of the resolver: it degrades
 * the finding's rating and is cached with it.
 */
export class ResolutionError extends Error {
  public readonly source: AdvisorySource;
  public readonly identifier: string;
  public readonly kind: ResolutionErrorKind;
  public readonly status?: number;

  constructor(
    source: AdvisorySource,
    identifier: string,
    kind: ResolutionErrorKind,
    message: string,
    options?: { status?: number; cause?: unknown }
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ResolutionError';
    this.source = source;
    this.identifier = identifier;
    this.kind = kind;
    this.status = options?.status;
  }
}

/**
 * Ordered union of lookup failures across candidates and sources.
 */
export class ResolutionWarning extends Error {
  public readonly causes: readonly ResolutionError[];

  constructor(causes: readonly ResolutionError[]) {
    super(causes.map((cause) => cause.message).join('\n'));
    this.name = 'ResolutionWarning';
    this.causes = causes;
  }

  /** Returns undefined when there is nothing to report */
  static join(...groups: ReadonlyArray<readonly ResolutionError[]>): ResolutionWarning | undefined {
    const causes = groups.flat();
    return causes.length > 0 ? new ResolutionWarning(causes) : undefined;
  }
}

/**
 * The caller's signal fired while a lookup was in flight or backing off.
 */
export class ResolutionCancelledError extends GateError {
  constructor(identifier?: string, options?: { cause?: Error }) {
    super(
      ErrorCodes.RESOLVE_CANCELLED,
      identifier
        ? `Severity resolution for ${identifier} was cancelled`
        : ErrorMessages[ErrorCodes.RESOLVE_CANCELLED],
      options
    );
    this.name = 'ResolutionCancelledError';
  }
}

export function isResolutionCancelled(error: unknown): error is ResolutionCancelledError {
  return error instanceof ResolutionCancelledError;
}
