/**
 * Core types for the vulngate policy engine
 */

// ============================================================================
// Severity Types
// ============================================================================

export type SeverityLevel = 'UNKNOWN' | 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

/** How a severity rating was obtained */
export type SeverityMethod = 'osv' | 'ghsa' | 'nvd' | 'unknown';

/**
 * The rating of one finding. Compared with `betterSeverity`:
 * level first, score as the tie-break.
 */
export interface SeverityAssessment {
  readonly level: SeverityLevel;
  /** CVSS-like score in [0, 10]; 0 means no score was provided */
  readonly score: number;
  /** Advisory identifier that produced the rating */
  readonly source: string;
  readonly method: SeverityMethod;
  /** Only set when level is UNKNOWN */
  readonly reason?: string;
}

// ============================================================================
// Scanner Types
// ============================================================================

export type ScanMode = 'source' | 'binary';

/**
 * One vulnerability as reported by the scanner, keyed by canonical id.
 */
export interface Finding {
  /** Canonical identifier (uppercase, trimmed), e.g. GO-2024-0001 */
  id: string;
  /** CVE-/GHSA- aliases, deduplicated and sorted */
  aliases: string[];
  summary: string;
  url: string;
  /** Deduplicated, sorted */
  fixedVersions: string[];
  reachable: boolean;
  /** Severity carried by the scanner's own advisory payload */
  osvSeverity?: SeverityAssessment;
}

/** A single frame of a finding's call stack */
export interface ScannerTraceFrame {
  package?: string;
  function?: string;
}

/** `{"osv": {...}}` line of the scanner stream */
export interface ScannerAdvisory {
  id?: string;
  aliases?: string[];
  summary?: string;
  severity?: unknown;
  database_specific?: {
    url?: string;
    severity?: string;
    score?: number;
  };
}

/** `{"finding": {...}}` line of the scanner stream */
export interface ScannerFindingEvent {
  osv?: string;
  fixed_version?: string;
  trace?: ScannerTraceFrame[];
}

export interface ScannerEvent {
  osv?: ScannerAdvisory;
  finding?: ScannerFindingEvent;
}

/**
 * Identifiers seen in a baseline scan.
 * `reachable` is the subset belonging to findings reachable in that scan.
 */
export interface ExclusionSet {
  readonly all: ReadonlySet<string>;
  readonly reachable: ReadonlySet<string>;
}

// ============================================================================
// Override Types
// ============================================================================

/** A time-bounded risk acceptance for one identifier */
export interface RiskOverride {
  readonly id: string;
  readonly reason: string;
  /** Expiry day as YYYY-MM-DD (UTC); valid through that day */
  readonly expiresOn: string;
}

export type OverrideRegistry = ReadonlyMap<string, RiskOverride>;

export interface OverrideMatch {
  override: RiskOverride;
  /** The id or alias that matched, canonicalized */
  matchedBy: string;
}

// ============================================================================
// Evaluation Types
// ============================================================================

/** Outcome of resolving the severity of one finding */
export interface ResolvedSeverity {
  assessment: SeverityAssessment;
  /** Non-fatal: the rating is degraded but usable */
  warning?: Error;
}

export interface SeverityResolver {
  resolve(finding: Finding, signal?: AbortSignal): Promise<ResolvedSeverity>;
}

export interface OverriddenFinding {
  kind: 'override';
  finding: Finding;
  override: RiskOverride;
  matchedBy: string;
}

export interface RatedFinding {
  kind: 'rated';
  finding: Finding;
  severity: SeverityAssessment;
  resolverError?: Error;
}

/** Not reachable and not overridden: never rated */
export interface UnreachableFinding {
  kind: 'unreachable';
  finding: Finding;
}

export type EvaluatedFinding = OverriddenFinding | RatedFinding | UnreachableFinding;

/** Five disjoint buckets, each sorted by severity then id */
export interface EvaluationResult {
  fail: RatedFinding[];
  warn: RatedFinding[];
  info: UnreachableFinding[];
  accepted: OverriddenFinding[];
  expired: OverriddenFinding[];
}
