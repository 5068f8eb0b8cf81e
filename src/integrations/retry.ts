/**
 * Retry logic with exponential backoff.
 */

import axios from "axios";
import { Logger, errorMessage, logger as defaultLogger } from "../logger";

const TRANSIENT_CODES = new Set(["ECONNRESET", "ECONNREFUSED", "ECONNABORTED", "ETIMEDOUT", "EPIPE", "EAI_AGAIN"]);

/**
 * Check if an error is likely transient and worth retrying.
 */
export function isTransientError(error: unknown): boolean {
  if (axios.isAxiosError(error)) {
    if (error.response) {
      const status = error.response.status;
      return status === 408 || status === 429 || status >= 500;
    }
    return error.code !== undefined && TRANSIENT_CODES.has(error.code);
  }
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes("network") ||
      message.includes("timeout") ||
      message.includes("econnreset") ||
      message.includes("econnrefused") ||
      message.includes("socket")
    );
  }
  return false;
}

/**
 * Sleep for a given number of milliseconds.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  /** Label used in log lines. */
  operation: string;
  logger?: Logger;
}

/**
 * Execute a function with retry logic and exponential backoff.
 * Only transient errors are retried; anything else is rethrown at once.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const log = options.logger ?? defaultLogger;
  let lastError: unknown;

  for (let attempt = 0; attempt <= options.maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (!isTransientError(error)) {
        throw error;
      }

      if (attempt === options.maxRetries) {
        log.error(`${options.operation}: all ${options.maxRetries + 1} attempts failed, giving up`, {
          error: errorMessage(error),
        });
        throw error;
      }

      // Exponential backoff with jitter
      const delay = options.baseDelayMs * Math.pow(2, attempt) + Math.random() * options.baseDelayMs * 0.1;
      log.warn(`${options.operation}: transient error, retrying`, {
        attempt: attempt + 1,
        of: options.maxRetries + 1,
        delayMs: Math.round(delay),
        error: errorMessage(error),
      });
      await sleep(delay);
    }
  }

  throw lastError;
}
