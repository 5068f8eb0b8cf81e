/**
 * Contract shared by every detector backend adapter.
 */

import { BackendId, BackendStatus, RawFinding } from "../analysis/types";

export interface DetectOptions {
  /** Aborted by the orchestrator when the call's timeout budget runs out. */
  signal?: AbortSignal;
  /** File name used for findings whose backend does not report one. */
  filename: string;
}

export interface DetectionOutcome {
  findings: RawFinding[];
  status: BackendStatus;
}

/**
 * A detection backend as seen by the orchestrator.
 *
 * `detect` never rejects: transport errors, non-2xx answers, malformed bodies
 * and aborts are all reported through `status`. Implementations keep no
 * per-call state, so concurrent calls are independent.
 */
export interface DetectorClient {
  readonly id: BackendId;
  detect(code: string, language: string, options: DetectOptions): Promise<DetectionOutcome>;
}
