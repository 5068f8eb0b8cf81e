/**
 * Request orchestration: validation, concurrent fan-out to the detector
 * backends under independent timeout budgets, and a single aggregation.
 *
 * A request only ever fails for malformed input. Any mix of backend
 * successes, failures and timeouts completes with a result.
 */

import { randomUUID } from "crypto";
import { CategoryTable } from "../config/categories";
import { GatewayConfig } from "../config/schema";
import { DetectionOutcome, DetectorClient } from "../detectors/types";
import { Logger, errorMessage, logger as defaultLogger } from "../logger";
import { aggregate } from "./aggregator";
import { countSourceLines } from "./location";
import { DEFAULT_FILENAME, selectedDetectors, validateRequest } from "./request";
import {
  AnalysisOutcome,
  AnalysisRequest,
  AnalysisResult,
  BackendId,
  BackendStatus,
  RawFinding,
} from "./types";

export type OrchestrationState = "pending" | "fanning_out" | "aggregating" | "completed";

export interface TransitionEvent {
  requestId: string;
  from: OrchestrationState;
  to: OrchestrationState;
  /** Set on the transition into "completed". */
  outcome?: AnalysisOutcome;
}

export interface OrchestratorDeps {
  config: GatewayConfig;
  categories: CategoryTable;
  detectors: Record<BackendId, DetectorClient>;
  logger?: Logger;
  onTransition?: (event: TransitionEvent) => void;
  generateRequestId?: () => string;
}

export interface AnalyzeOptions {
  /** Caller-supplied id, e.g. from an X-Request-Id header. */
  requestId?: string;
}

const SKIPPED: DetectionOutcome = { findings: [], status: { kind: "skipped" } };

/**
 * Decide the terminal outcome from the statuses of the detectors that ran.
 */
export function determineOutcome(statuses: BackendStatus[]): AnalysisOutcome {
  const succeeded = statuses.filter((s) => s.kind === "success").length;
  if (succeeded === statuses.length) {
    return "complete";
  }
  return succeeded === 0 ? "empty_result" : "partial_failure";
}

export class Orchestrator {
  private readonly config: GatewayConfig;
  private readonly categories: CategoryTable;
  private readonly detectors: Record<BackendId, DetectorClient>;
  private readonly log: Logger;
  private readonly onTransition?: (event: TransitionEvent) => void;
  private readonly generateRequestId: () => string;

  constructor(deps: OrchestratorDeps) {
    this.config = deps.config;
    this.categories = deps.categories;
    this.detectors = deps.detectors;
    this.log = deps.logger ?? defaultLogger;
    this.onTransition = deps.onTransition;
    this.generateRequestId = deps.generateRequestId ?? randomUUID;
  }

  /**
   * Analyze one request.
   *
   * @throws InvalidRequestError for malformed input, before any backend is called
   */
  async analyze(request: AnalysisRequest, options: AnalyzeOptions = {}): Promise<AnalysisResult> {
    validateRequest(request, this.config.request);

    const requestId = options.requestId ?? this.generateRequestId();
    const log = this.log.child({ requestId });
    let state: OrchestrationState = "pending";

    const transition = (to: OrchestrationState, outcome?: AnalysisOutcome): void => {
      const event: TransitionEvent = { requestId, from: state, to };
      if (outcome) {
        event.outcome = outcome;
      }
      state = to;
      log.debug("Orchestration state changed", { from: event.from, to, outcome });
      this.onTransition?.(event);
    };

    transition("fanning_out");

    const selected = selectedDetectors(request);
    const filename = request.options.filename ?? DEFAULT_FILENAME;
    const started = Date.now();

    const run = (id: BackendId): Promise<DetectionOutcome> =>
      selected.includes(id) ? this.runDetector(id, request, filename, log) : Promise.resolve(SKIPPED);

    const [staticOutcome, aiOutcome] = await Promise.all([run("static"), run("ai")]);

    const findings: Record<BackendId, RawFinding[]> = {
      static: staticOutcome.findings,
      ai: aiOutcome.findings,
    };
    const backendStatus: Record<BackendId, BackendStatus> = {
      static: staticOutcome.status,
      ai: aiOutcome.status,
    };

    log.info("Fan-out finished", {
      durationMs: Date.now() - started,
      static: backendStatus.static.kind,
      ai: backendStatus.ai.kind,
    });

    transition("aggregating");

    const aggregated = aggregate({
      findings,
      statuses: backendStatus,
      sourceLineCount: countSourceLines(request.code),
      overlapThreshold: this.config.aggregation.overlapThreshold,
      categories: this.categories,
      logger: log,
    });

    const outcome = determineOutcome(selected.map((id) => backendStatus[id]));
    transition("completed", outcome);

    if (outcome !== "complete") {
      log.warn("Analysis completed without all detectors", {
        outcome,
        static: backendStatus.static.kind,
        ai: backendStatus.ai.kind,
      });
    }

    return {
      requestId,
      findings: aggregated.findings,
      backendStatus,
      outcome,
      droppedFindings: aggregated.dropped,
    };
  }

  /**
   * Call one detector under its own timeout budget. On expiry the call is
   * aborted and the slot resolves to a timeout; the other detector is unaffected.
   */
  private async runDetector(
    id: BackendId,
    request: AnalysisRequest,
    filename: string,
    log: Logger
  ): Promise<DetectionOutcome> {
    const budgetMs = this.config.backends[id].timeoutMs;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<DetectionOutcome>((resolve) => {
      timer = setTimeout(() => {
        resolve({ findings: [], status: { kind: "timeout", budgetMs } });
        controller.abort();
        log.warn("Detector exceeded its timeout budget", { backend: id, budgetMs });
      }, budgetMs);
    });

    const call = this.detectors[id]
      .detect(request.code, request.language, { signal: controller.signal, filename })
      .catch((error: unknown): DetectionOutcome => {
        // Adapters are not supposed to reject; keep the request alive if one does
        log.error("Detector rejected instead of reporting a status", {
          backend: id,
          error: errorMessage(error),
        });
        return { findings: [], status: { kind: "failure", reason: errorMessage(error) } };
      });

    try {
      return await Promise.race([call, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
