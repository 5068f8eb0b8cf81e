import { BackendId } from "../analysis/types";
import { GatewayConfig } from "../config/schema";
import { Logger } from "../logger";
import { AiAnalysisAdapter } from "./ai";
import { StaticAnalysisAdapter } from "./static";
import { DetectorClient } from "./types";

export type { DetectorClient, DetectOptions, DetectionOutcome } from "./types";
export { StaticAnalysisAdapter } from "./static";
export { AiAnalysisAdapter } from "./ai";
export { HttpDetector, statusFromError } from "./http";

/**
 * Build one adapter per backend from the resolved configuration.
 */
export function createDetectors(config: GatewayConfig, logger?: Logger): Record<BackendId, DetectorClient> {
  return {
    static: new StaticAnalysisAdapter({
      baseUrl: config.backends.static.url,
      timeoutMs: config.backends.static.timeoutMs,
      logger,
    }),
    ai: new AiAnalysisAdapter({
      baseUrl: config.backends.ai.url,
      timeoutMs: config.backends.ai.timeoutMs,
      logger,
    }),
  };
}
