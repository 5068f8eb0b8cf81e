/**
 * Core data model for one analysis request.
 *
 * RawFinding and NormalizedFinding only live for the duration of a single
 * request. AnalysisResult is the one value that leaves the core.
 */

// ============================================================================
// Backends
// ============================================================================

export type BackendId = "static" | "ai";

/** Fixed order used whenever backends are listed or iterated. */
export const BACKEND_IDS: readonly BackendId[] = ["static", "ai"];

export function isBackendId(value: unknown): value is BackendId {
  return value === "static" || value === "ai";
}

/**
 * Outcome of one detector call as seen by the orchestrator.
 */
export type BackendStatus =
  | { kind: "success" }
  | { kind: "failure"; reason: string }
  | { kind: "timeout"; budgetMs: number }
  | { kind: "skipped" };

/** Wire form of a BackendStatus. */
export type BackendStatusLabel = "succeeded" | "failed" | "timed_out" | "skipped";

export function statusLabel(status: BackendStatus): BackendStatusLabel {
  switch (status.kind) {
    case "success":
      return "succeeded";
    case "failure":
      return "failed";
    case "timeout":
      return "timed_out";
    case "skipped":
      return "skipped";
  }
}

// ============================================================================
// Smell categories
// ============================================================================

export const SMELL_CATEGORIES = [
  "LongMethod",
  "LargeClass",
  "LongParameterList",
  "DuplicateCode",
  "DeadCode",
  "ComplexConditional",
  "DeepNesting",
  "MagicNumber",
  "FeatureEnvy",
  "DataClump",
  "GodObject",
  "PrimitiveObsession",
  "ShotgunSurgery",
  "InappropriateIntimacy",
  "MessageChain",
  "SpeculativeGenerality",
  "LazyClass",
  "Unknown",
] as const;

export type SmellCategory = (typeof SMELL_CATEGORIES)[number];

export function isSmellCategory(value: unknown): value is SmellCategory {
  return typeof value === "string" && (SMELL_CATEGORIES as readonly string[]).includes(value);
}

// ============================================================================
// Findings
// ============================================================================

/**
 * A span in the submitted source. Lines and columns are 1-based and inclusive.
 */
export interface SourceLocation {
  file: string;
  startLine: number;
  startColumn: number;
  endLine: number;
  endColumn: number;
}

/**
 * A finding as produced by one adapter, before category mapping.
 */
export interface RawFinding {
  backend: BackendId;
  location: SourceLocation;
  label: string;
  description?: string;
  /** Absent for the static backend; normalization treats absence as 1.0. */
  confidence?: number;
}

export interface NormalizedFinding {
  category: SmellCategory;
  location: SourceLocation;
  /** Always within [0, 1]. */
  confidence: number;
  /** Non-empty, in BACKEND_IDS order. */
  backends: BackendId[];
  /** Backend-specific labels that produced this finding, deduplicated and sorted. */
  labels: string[];
  description?: string;
}

// ============================================================================
// Requests and results
// ============================================================================

export interface AnalysisOptions {
  /** Which detectors to run. Defaults to all of them. */
  detectors?: readonly BackendId[];
  /** File name reported for findings whose backend omits one. */
  filename?: string;
}

export interface AnalysisRequest {
  readonly code: string;
  readonly language: string;
  readonly options: Readonly<AnalysisOptions>;
}

export type AnalysisOutcome = "complete" | "partial_failure" | "empty_result";

export interface AnalysisResult {
  requestId: string;
  findings: NormalizedFinding[];
  backendStatus: Record<BackendId, BackendStatus>;
  outcome: AnalysisOutcome;
  /** Findings removed because their location did not fit the source. */
  droppedFindings: number;
}
