/**
 * Configuration loader for the gateway.
 *
 * Merges defaults -> YAML config file -> environment variables, validates the
 * result, and freezes it. The frozen object is built once at startup and
 * passed explicitly to the orchestrator.
 */

import * as fs from "fs";
import * as path from "path";
import * as yaml from "js-yaml";
import { config as envConfig, EnvConfig } from "../env";
import { ConfigurationError } from "../errors";
import {
  GatewayConfig,
  GatewayFileConfig,
  DEFAULT_AI_TIMEOUT_MS,
  DEFAULT_CATEGORY_TABLE,
  DEFAULT_LANGUAGES,
  DEFAULT_MAX_CODE_BYTES,
  DEFAULT_OVERLAP_THRESHOLD,
  DEFAULT_REPORT_CONFIG,
  DEFAULT_STATIC_TIMEOUT_MS,
} from "./schema";

/**
 * Environment values the loader looks at. Tests pass their own.
 */
export type ConfigEnv = Partial<
  Pick<
    EnvConfig,
    | "STATIC_BACKEND_URL"
    | "AI_BACKEND_URL"
    | "REPORT_URL"
    | "STATIC_TIMEOUT_MS"
    | "AI_TIMEOUT_MS"
    | "OVERLAP_THRESHOLD"
    | "CATEGORY_TABLE_PATH"
    | "MAX_CODE_BYTES"
  >
>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse YAML text into the file schema. Structural problems throw.
 */
export function parseGatewayConfig(yamlContent: string, source = "<string>"): GatewayFileConfig {
  let parsed: unknown;
  try {
    parsed = yaml.load(yamlContent);
  } catch (err) {
    throw new ConfigurationError(
      `Failed to parse gateway config: ${err instanceof Error ? err.message : "unknown"}`,
      source
    );
  }

  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ConfigurationError("Gateway config must be a mapping", source);
  }

  for (const section of ["backends", "aggregation", "report", "request"] as const) {
    if (parsed[section] !== undefined && !isRecord(parsed[section])) {
      throw new ConfigurationError(`"${section}" must be a mapping`, source);
    }
  }

  const version = parsed.version ?? 1;
  if (version !== 1) {
    throw new ConfigurationError(`Unsupported config version: ${String(version)}`, source);
  }

  return parsed as GatewayFileConfig;
}

/**
 * Parse a numeric environment override. Unset stays undefined; anything that
 * is not a finite number is a configuration error naming the variable.
 */
function numberFromEnv(value: string | undefined, variable: string): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(`${variable} must be a number, got "${value}"`);
  }
  return parsed;
}

// Longest delay setTimeout honours; larger values fire after 1ms
const MAX_TIMER_MS = 2_147_483_647;

function timerBudget(value: unknown, name: string, fallback: number): number {
  const ms = positiveNumber(value, name, fallback);
  if (ms > MAX_TIMER_MS) {
    throw new ConfigurationError(`${name} must be at most ${MAX_TIMER_MS} ms, got ${ms}`);
  }
  return ms;
}

function positiveNumber(value: unknown, name: string, fallback: number): number {
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive number, got ${String(value)}`);
  }
  return value;
}

function nonNegativeInteger(value: unknown, name: string, fallback: number): number {
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(`${name} must be a non-negative integer, got ${String(value)}`);
  }
  return value;
}

function threshold(value: unknown): number {
  if (value === undefined || value === null) {
    return DEFAULT_OVERLAP_THRESHOLD;
  }
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0 || value >= 1) {
    throw new ConfigurationError(`overlap_threshold must be in [0, 1), got ${String(value)}`);
  }
  return value;
}

function optionalUrl(value: unknown, name: string): string | null {
  if (value === undefined || value === null || value === "") {
    return null;
  }
  if (typeof value !== "string") {
    throw new ConfigurationError(`${name} must be a string`);
  }
  try {
    const parsed = new URL(value);
    if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
      throw new ConfigurationError(`${name} must use http or https, got ${parsed.protocol}`);
    }
  } catch (err) {
    if (err instanceof ConfigurationError) {
      throw err;
    }
    throw new ConfigurationError(`${name} is not a valid URL: ${value}`);
  }
  // Strip trailing slashes so paths can be appended
  return value.replace(/\/+$/, "");
}

function languages(value: unknown): string[] {
  if (value === undefined || value === null) {
    return [...DEFAULT_LANGUAGES];
  }
  if (!Array.isArray(value) || value.length === 0 || !value.every((v) => typeof v === "string" && v.trim())) {
    throw new ConfigurationError("request.languages must be a non-empty list of strings");
  }
  return Array.from(new Set(value.map((v: string) => v.trim().toLowerCase()))).sort();
}

/**
 * Resolve a file config and environment into a frozen GatewayConfig.
 *
 * @param file - Parsed YAML config (may be empty)
 * @param env - Environment overrides
 * @param baseDir - Directory relative paths in the file are resolved against
 */
export function resolveGatewayConfig(
  file: GatewayFileConfig,
  env: ConfigEnv = {},
  baseDir: string = process.cwd()
): GatewayConfig {
  const tablePath = env.CATEGORY_TABLE_PATH
    ? path.resolve(env.CATEGORY_TABLE_PATH)
    : path.resolve(baseDir, file.aggregation?.category_table ?? DEFAULT_CATEGORY_TABLE);

  const resolved: GatewayConfig = {
    backends: {
      static: {
        url: optionalUrl(env.STATIC_BACKEND_URL ?? file.backends?.static?.url, "backends.static.url"),
        timeoutMs: timerBudget(
          numberFromEnv(env.STATIC_TIMEOUT_MS, "STATIC_TIMEOUT_MS") ?? file.backends?.static?.timeout_ms,
          "backends.static.timeout_ms",
          DEFAULT_STATIC_TIMEOUT_MS
        ),
      },
      ai: {
        url: optionalUrl(env.AI_BACKEND_URL ?? file.backends?.ai?.url, "backends.ai.url"),
        timeoutMs: timerBudget(
          numberFromEnv(env.AI_TIMEOUT_MS, "AI_TIMEOUT_MS") ?? file.backends?.ai?.timeout_ms,
          "backends.ai.timeout_ms",
          DEFAULT_AI_TIMEOUT_MS
        ),
      },
    },
    aggregation: {
      overlapThreshold: threshold(
        numberFromEnv(env.OVERLAP_THRESHOLD, "OVERLAP_THRESHOLD") ?? file.aggregation?.overlap_threshold
      ),
      categoryTablePath: tablePath,
    },
    report: {
      url: optionalUrl(env.REPORT_URL ?? file.report?.url, "report.url"),
      timeoutMs: timerBudget(file.report?.timeout_ms, "report.timeout_ms", DEFAULT_REPORT_CONFIG.timeoutMs),
      maxRetries: nonNegativeInteger(file.report?.max_retries, "report.max_retries", DEFAULT_REPORT_CONFIG.maxRetries),
      retryBaseDelayMs: nonNegativeInteger(
        file.report?.retry_base_delay_ms,
        "report.retry_base_delay_ms",
        DEFAULT_REPORT_CONFIG.retryBaseDelayMs
      ),
    },
    request: {
      languages: languages(file.request?.languages),
      maxCodeBytes: positiveNumber(
        numberFromEnv(env.MAX_CODE_BYTES, "MAX_CODE_BYTES") ?? file.request?.max_code_bytes,
        "request.max_code_bytes",
        DEFAULT_MAX_CODE_BYTES
      ),
    },
  };

  return deepFreeze(resolved);
}

/**
 * Load the gateway configuration for the running process.
 * Reads GATEWAY_CONFIG_PATH when set; otherwise uses defaults and environment only.
 */
export function loadGatewayConfig(env: EnvConfig = envConfig): GatewayConfig {
  const configPath = env.GATEWAY_CONFIG_PATH;
  if (!configPath) {
    return resolveGatewayConfig({}, env);
  }

  const absolute = path.resolve(configPath);
  if (!fs.existsSync(absolute)) {
    throw new ConfigurationError("Gateway config file not found", absolute);
  }

  const file = parseGatewayConfig(fs.readFileSync(absolute, "utf-8"), absolute);
  return resolveGatewayConfig(file, env, path.dirname(absolute));
}

/**
 * Load configuration from a YAML string without touching the environment.
 */
export function loadConfigFromString(yamlContent: string, baseDir?: string): GatewayConfig {
  return resolveGatewayConfig(parseGatewayConfig(yamlContent), {}, baseDir);
}

/**
 * Defaults only. Useful when no config file or environment is wanted.
 */
export function createDefaultConfig(): GatewayConfig {
  return resolveGatewayConfig({});
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
