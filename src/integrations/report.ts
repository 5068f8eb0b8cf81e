/**
 * Client for the report generator.
 *
 * The gateway hands each AnalysisResult over once and gets back an opaque
 * reference to the rendered report. Submissions carry the request id as an
 * idempotency key, so retrying a submission never creates a second report.
 * A report that cannot be created does not fail the analysis.
 */

import axios, { AxiosInstance } from "axios";
import { AnalysisResult } from "../analysis/types";
import { ResolvedReportConfig } from "../config/schema";
import { MalformedResponseError } from "../errors";
import { Logger, errorMessage, logger as defaultLogger } from "../logger";
import { serializeResult, SerializedResult } from "../serialize";
import { withRetry } from "./retry";

export const REPORTS_PATH = "/reports";

export interface ReportReference {
  ref: string;
}

/**
 * Anything that can turn a result into a report reference.
 */
export interface ReportPublisher {
  publish(result: AnalysisResult): Promise<ReportReference | null>;
}

export class ReportClient implements ReportPublisher {
  private readonly client: AxiosInstance | null;
  private readonly log: Logger;

  constructor(private readonly options: ResolvedReportConfig, logger?: Logger) {
    this.log = logger ?? defaultLogger;
    this.client = options.url
      ? axios.create({
          baseURL: options.url,
          timeout: options.timeoutMs,
          headers: { "Content-Type": "application/json", Accept: "application/json" },
        })
      : null;
  }

  get enabled(): boolean {
    return this.client !== null;
  }

  /**
   * Submit a result. Resolves to null when reports are disabled or every attempt failed.
   */
  async publish(result: AnalysisResult): Promise<ReportReference | null> {
    const client = this.client;
    if (!client) {
      return null;
    }

    const log = this.log.child({ requestId: result.requestId });
    const body: SerializedResult = serializeResult(result);

    try {
      const response = await withRetry(
        () =>
          client.post<unknown>(REPORTS_PATH, body, {
            headers: { "Idempotency-Key": result.requestId },
          }),
        {
          maxRetries: this.options.maxRetries,
          baseDelayMs: this.options.retryBaseDelayMs,
          operation: "Report submission",
          logger: log,
        }
      );

      const ref = readReportRef(response.data);
      log.info("Report created", { reportRef: ref });
      return { ref };
    } catch (error) {
      log.error("Report submission failed", { error: errorMessage(error) });
      return null;
    }
  }
}

function readReportRef(body: unknown): string {
  if (typeof body === "object" && body !== null && "report_ref" in body) {
    const ref = body.report_ref;
    if (typeof ref === "string" && ref !== "") {
      return ref;
    }
  }
  throw new MalformedResponseError('report response has no "report_ref"');
}
