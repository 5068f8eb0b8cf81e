/**
 * Shared HTTP plumbing for detector adapters.
 *
 * Each adapter owns an axios instance bound to its backend's base URL. The
 * base class turns every way a call can go wrong into a BackendStatus so the
 * orchestrator never sees a rejection.
 */

import axios, { AxiosInstance } from "axios";
import { Logger, logger as defaultLogger } from "../logger";
import { MalformedResponseError } from "../errors";
import { BackendId, BackendStatus, RawFinding } from "../analysis/types";
import { DetectOptions, DetectionOutcome, DetectorClient } from "./types";

export const DETECT_PATH = "/detect";

export interface HttpDetectorOptions {
  /** Backend base URL; null means the backend is not configured. */
  baseUrl: string | null;
  /** Fixed per-call timeout enforced by the HTTP client. */
  timeoutMs: number;
  logger?: Logger;
}

/**
 * Classify a failed call. Exported for tests.
 */
export function statusFromError(error: unknown, timeoutMs: number): BackendStatus {
  if (error instanceof MalformedResponseError) {
    return { kind: "failure", reason: `malformed response: ${error.message}` };
  }

  if (axios.isCancel(error)) {
    return { kind: "failure", reason: "request cancelled" };
  }

  if (axios.isAxiosError(error)) {
    if (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT") {
      return { kind: "timeout", budgetMs: timeoutMs };
    }
    if (error.response) {
      return { kind: "failure", reason: `HTTP ${error.response.status}` };
    }
    return { kind: "failure", reason: error.code ? `${error.code}: ${error.message}` : error.message };
  }

  return { kind: "failure", reason: error instanceof Error ? error.message : "unknown error" };
}

export abstract class HttpDetector implements DetectorClient {
  abstract readonly id: BackendId;

  protected readonly client: AxiosInstance | null;
  protected readonly timeoutMs: number;
  protected readonly log: Logger;

  constructor(options: HttpDetectorOptions) {
    this.timeoutMs = options.timeoutMs;
    this.log = options.logger ?? defaultLogger;
    this.client = options.baseUrl
      ? axios.create({
          baseURL: options.baseUrl,
          timeout: options.timeoutMs,
          headers: { "Content-Type": "application/json", Accept: "application/json" },
        })
      : null;
  }

  /**
   * Convert the backend's response body into raw findings.
   * Throws MalformedResponseError when the body does not match the backend's shape.
   */
  protected abstract parseFindings(body: unknown, filename: string): RawFinding[];

  async detect(code: string, language: string, options: DetectOptions): Promise<DetectionOutcome> {
    if (!this.client) {
      return { findings: [], status: { kind: "failure", reason: "backend URL not configured" } };
    }

    const started = Date.now();
    try {
      const response = await this.client.post<unknown>(
        DETECT_PATH,
        { code, language },
        { signal: options.signal }
      );
      const findings = this.parseFindings(response.data, options.filename);

      this.log.debug("Detector call succeeded", {
        backend: this.id,
        findings: findings.length,
        durationMs: Date.now() - started,
      });
      return { findings, status: { kind: "success" } };
    } catch (error) {
      const status = statusFromError(error, this.timeoutMs);
      this.log.warn("Detector call failed", {
        backend: this.id,
        status: status.kind,
        reason: status.kind === "failure" ? status.reason : undefined,
        durationMs: Date.now() - started,
      });
      return { findings: [], status };
    }
  }
}
