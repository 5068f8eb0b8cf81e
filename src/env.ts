import dotenv from "dotenv";

dotenv.config();

/** Unset and blank variables both read as undefined. */
function stringFromEnv(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value.trim();
}

export const config = {
  PORT: process.env.PORT || "3000",
  NODE_ENV: process.env.NODE_ENV || "development",
  LOG_LEVEL: stringFromEnv(process.env.LOG_LEVEL),
  // Optional YAML file with backends/aggregation/report/request sections
  GATEWAY_CONFIG_PATH: stringFromEnv(process.env.GATEWAY_CONFIG_PATH),
  STATIC_BACKEND_URL: stringFromEnv(process.env.STATIC_BACKEND_URL),
  AI_BACKEND_URL: stringFromEnv(process.env.AI_BACKEND_URL),
  REPORT_URL: stringFromEnv(process.env.REPORT_URL),
  // Numeric overrides stay raw here; the config loader parses and validates them
  STATIC_TIMEOUT_MS: stringFromEnv(process.env.STATIC_TIMEOUT_MS),
  AI_TIMEOUT_MS: stringFromEnv(process.env.AI_TIMEOUT_MS),
  OVERLAP_THRESHOLD: stringFromEnv(process.env.OVERLAP_THRESHOLD),
  CATEGORY_TABLE_PATH: stringFromEnv(process.env.CATEGORY_TABLE_PATH),
  MAX_CODE_BYTES: stringFromEnv(process.env.MAX_CODE_BYTES),
};

export type EnvConfig = typeof config;
