/**
 * Configuration schema for the gateway YAML file.
 *
 * Every section is optional; missing values fall back to the defaults below
 * and environment variables take precedence over the file.
 */

/**
 * Connection settings for one detector backend.
 */
export interface BackendConfig {
  /**
   * Base URL of the backend, e.g. "http://static-analyzer:8080".
   * A backend without a URL reports a failure status on every request.
   */
  url?: string;

  /**
   * Per-call timeout budget in milliseconds.
   * Default: 10000 (static), 30000 (ai)
   */
  timeout_ms?: number;
}

export interface BackendsConfig {
  static?: BackendConfig;
  ai?: BackendConfig;
}

export interface AggregationConfig {
  /**
   * Fraction of the shorter span two findings must overlap by, exclusive.
   * Default: 0 (any overlap)
   */
  overlap_threshold?: number;

  /**
   * Path to the YAML label -> category lookup table.
   * Default: config/categories.yml next to the project root
   */
  category_table?: string;
}

export interface ReportConfig {
  /**
   * Base URL of the report generator. Reports are skipped when unset.
   */
  url?: string;

  /** Default: 10000 */
  timeout_ms?: number;

  /** Default: 2 */
  max_retries?: number;

  /** Default: 200 */
  retry_base_delay_ms?: number;
}

export interface RequestConfig {
  /**
   * Languages accepted by the gateway (case-insensitive).
   */
  languages?: string[];

  /** Default: 1048576 (1 MiB) */
  max_code_bytes?: number;
}

export interface GatewayFileConfig {
  version?: number;
  backends?: BackendsConfig;
  aggregation?: AggregationConfig;
  report?: ReportConfig;
  request?: RequestConfig;
}

// ============================================================================
// Resolved configuration
// ============================================================================

export interface ResolvedBackendConfig {
  url: string | null;
  timeoutMs: number;
}

export interface ResolvedReportConfig {
  url: string | null;
  timeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
}

/**
 * Fully resolved, read-only configuration handed to the orchestrator.
 */
export interface GatewayConfig {
  readonly backends: Readonly<Record<"static" | "ai", Readonly<ResolvedBackendConfig>>>;
  readonly aggregation: Readonly<{ overlapThreshold: number; categoryTablePath: string }>;
  readonly report: Readonly<ResolvedReportConfig>;
  readonly request: Readonly<{ languages: readonly string[]; maxCodeBytes: number }>;
}

export const DEFAULT_STATIC_TIMEOUT_MS = 10_000;
export const DEFAULT_AI_TIMEOUT_MS = 30_000;
export const DEFAULT_OVERLAP_THRESHOLD = 0;
export const DEFAULT_CATEGORY_TABLE = "config/categories.yml";
export const DEFAULT_MAX_CODE_BYTES = 1024 * 1024;

export const DEFAULT_REPORT_CONFIG: ResolvedReportConfig = {
  url: null,
  timeoutMs: 10_000,
  maxRetries: 2,
  retryBaseDelayMs: 200,
};

export const DEFAULT_LANGUAGES: readonly string[] = [
  "c",
  "cpp",
  "csharp",
  "go",
  "java",
  "javascript",
  "kotlin",
  "php",
  "python",
  "ruby",
  "rust",
  "scala",
  "swift",
  "typescript",
];
