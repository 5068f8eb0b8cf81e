/**
 * Tests for request orchestration: fan-out, timeout budgets, partial failure
 * and the per-request state machine.
 */

import { determineOutcome, Orchestrator, TransitionEvent } from "../src/analysis/orchestrator";
import { createAnalysisRequest } from "../src/analysis/request";
import { AnalysisOptions, BackendId, RawFinding } from "../src/analysis/types";
import { CategoryTable } from "../src/config/categories";
import { resolveGatewayConfig } from "../src/config/loader";
import { DetectionOutcome, DetectOptions, DetectorClient } from "../src/detectors/types";
import { InvalidRequestError } from "../src/errors";

const CODE = ["def load(path):", "    data = open(path).read()", "    return data * 3", ""].join("\n");

const categories = new CategoryTable({
  labels: { LongMethod: ["long-method"], MagicNumber: ["magic-number"] },
});

type Behavior = (options: DetectOptions) => Promise<DetectionOutcome>;

class FakeDetector implements DetectorClient {
  readonly calls: Array<{ code: string; language: string; options: DetectOptions }> = [];

  constructor(readonly id: BackendId, private readonly behavior: Behavior) {}

  detect(code: string, language: string, options: DetectOptions): Promise<DetectionOutcome> {
    this.calls.push({ code, language, options });
    return this.behavior(options);
  }
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function succeedWith(findings: RawFinding[], afterMs = 0): Behavior {
  return async () => {
    if (afterMs > 0) await delay(afterMs);
    return { findings, status: { kind: "success" } };
  };
}

function failWith(reason: string): Behavior {
  return async () => ({ findings: [], status: { kind: "failure", reason } });
}

/** Never answers on its own; resolves as cancelled once aborted. */
const hang: Behavior = (options) =>
  new Promise((resolve) => {
    options.signal?.addEventListener("abort", () =>
      resolve({ findings: [], status: { kind: "failure", reason: "request cancelled" } })
    );
  });

function finding(backend: BackendId, label: string, line: number, confidence?: number): RawFinding {
  const raw: RawFinding = {
    backend,
    label,
    location: { file: "loader.py", startLine: line, startColumn: 1, endLine: line, endColumn: 10 },
  };
  if (confidence !== undefined) raw.confidence = confidence;
  return raw;
}

function setup(staticBehavior: Behavior, aiBehavior: Behavior, budgets = { static: 1000, ai: 1000 }) {
  const config = resolveGatewayConfig({
    backends: {
      static: { url: "http://static.test", timeout_ms: budgets.static },
      ai: { url: "http://ai.test", timeout_ms: budgets.ai },
    },
  });
  const staticDetector = new FakeDetector("static", staticBehavior);
  const aiDetector = new FakeDetector("ai", aiBehavior);
  const transitions: TransitionEvent[] = [];
  let counter = 0;

  const orchestrator = new Orchestrator({
    config,
    categories,
    detectors: { static: staticDetector, ai: aiDetector },
    onTransition: (event) => transitions.push(event),
    generateRequestId: () => `req-${++counter}`,
  });

  return { orchestrator, staticDetector, aiDetector, transitions };
}

const request = (options: AnalysisOptions = {}) =>
  createAnalysisRequest(CODE, "python", { filename: "loader.py", ...options });

describe("Orchestrator", () => {
  describe("successful fan-out", () => {
    it("should call both detectors and aggregate their findings", async () => {
      const { orchestrator, staticDetector, aiDetector } = setup(
        succeedWith([finding("static", "magic-number", 3)]),
        succeedWith([finding("ai", "magic-number", 3, 0.9), finding("ai", "long-method", 1, 0.4)])
      );

      const result = await orchestrator.analyze(request());

      expect(result.requestId).toBe("req-1");
      expect(result.outcome).toBe("complete");
      expect(result.backendStatus).toEqual({ static: { kind: "success" }, ai: { kind: "success" } });
      expect(result.droppedFindings).toBe(0);
      expect(result.findings).toEqual([
        {
          category: "LongMethod",
          location: { file: "loader.py", startLine: 1, startColumn: 1, endLine: 1, endColumn: 10 },
          confidence: 0.4,
          backends: ["ai"],
          labels: ["long-method"],
        },
        {
          category: "MagicNumber",
          location: { file: "loader.py", startLine: 3, startColumn: 1, endLine: 3, endColumn: 10 },
          confidence: 0.9,
          backends: ["static", "ai"],
          labels: ["magic-number"],
        },
      ]);

      expect(staticDetector.calls).toHaveLength(1);
      expect(staticDetector.calls[0].code).toBe(CODE);
      expect(staticDetector.calls[0].language).toBe("python");
      expect(staticDetector.calls[0].options.filename).toBe("loader.py");
      expect(aiDetector.calls).toHaveLength(1);
    });

    it("should use a caller-supplied request id", async () => {
      const { orchestrator } = setup(succeedWith([]), succeedWith([]));

      const result = await orchestrator.analyze(request(), { requestId: "client-abc" });

      expect(result.requestId).toBe("client-abc");
    });

    it("should default the file name for findings that lack one", async () => {
      const { orchestrator, staticDetector } = setup(succeedWith([]), succeedWith([]));

      await orchestrator.analyze(createAnalysisRequest(CODE, "python"));

      expect(staticDetector.calls[0].options.filename).toBe("<input>");
    });

    it("should move through the states in order", async () => {
      const { orchestrator, transitions } = setup(succeedWith([]), failWith("HTTP 500"));

      await orchestrator.analyze(request());

      expect(transitions).toEqual([
        { requestId: "req-1", from: "pending", to: "fanning_out" },
        { requestId: "req-1", from: "fanning_out", to: "aggregating" },
        { requestId: "req-1", from: "aggregating", to: "completed", outcome: "partial_failure" },
      ]);
    });
  });

  describe("partial failure", () => {
    it("should return static findings when the AI backend times out", async () => {
      const { orchestrator, aiDetector } = setup(
        succeedWith([finding("static", "long-method", 1), finding("static", "magic-number", 3)]),
        hang,
        { static: 1000, ai: 50 }
      );

      const result = await orchestrator.analyze(request());

      expect(result.outcome).toBe("partial_failure");
      expect(result.backendStatus.static).toEqual({ kind: "success" });
      expect(result.backendStatus.ai).toEqual({ kind: "timeout", budgetMs: 50 });
      expect(result.findings.map((f) => [f.category, f.location.startLine, f.backends])).toEqual([
        ["LongMethod", 1, ["static"]],
        ["MagicNumber", 3, ["static"]],
      ]);
      expect(aiDetector.calls[0].options.signal?.aborted).toBe(true);
    });

    it("should not abort the backend that answered in time", async () => {
      const { orchestrator, staticDetector } = setup(succeedWith([], 10), hang, { static: 1000, ai: 50 });

      await orchestrator.analyze(request());

      expect(staticDetector.calls[0].options.signal?.aborted).toBe(false);
    });

    it("should keep AI findings when the static backend fails", async () => {
      const { orchestrator } = setup(failWith("HTTP 502"), succeedWith([finding("ai", "magic-number", 3, 0.7)]));

      const result = await orchestrator.analyze(request());

      expect(result.outcome).toBe("partial_failure");
      expect(result.backendStatus.static).toEqual({ kind: "failure", reason: "HTTP 502" });
      expect(result.findings).toHaveLength(1);
      expect(result.findings[0].backends).toEqual(["ai"]);
    });

    it("should turn a rejecting detector into a failure status", async () => {
      const { orchestrator } = setup(
        () => Promise.reject(new Error("socket hang up")),
        succeedWith([finding("ai", "magic-number", 3, 0.7)])
      );

      const result = await orchestrator.analyze(request());

      expect(result.backendStatus.static).toEqual({ kind: "failure", reason: "socket hang up" });
      expect(result.outcome).toBe("partial_failure");
    });
  });

  describe("total failure", () => {
    it("should complete with an empty result when both backends fail", async () => {
      const { orchestrator, transitions } = setup(failWith("HTTP 500"), failWith("ECONNREFUSED"));

      const result = await orchestrator.analyze(request());

      expect(result.findings).toEqual([]);
      expect(result.outcome).toBe("empty_result");
      expect(result.backendStatus).toEqual({
        static: { kind: "failure", reason: "HTTP 500" },
        ai: { kind: "failure", reason: "ECONNREFUSED" },
      });
      expect(transitions[transitions.length - 1]).toEqual({
        requestId: "req-1",
        from: "aggregating",
        to: "completed",
        outcome: "empty_result",
      });
    });

    it("should complete when both backends time out", async () => {
      const { orchestrator } = setup(hang, hang, { static: 30, ai: 60 });

      const result = await orchestrator.analyze(request());

      expect(result.outcome).toBe("empty_result");
      expect(result.backendStatus).toEqual({
        static: { kind: "timeout", budgetMs: 30 },
        ai: { kind: "timeout", budgetMs: 60 },
      });
    });
  });

  describe("detector selection", () => {
    it("should skip detectors the request did not select", async () => {
      const { orchestrator, aiDetector } = setup(succeedWith([finding("static", "long-method", 1)]), hang);

      const result = await orchestrator.analyze(request({ detectors: ["static"] }));

      expect(aiDetector.calls).toHaveLength(0);
      expect(result.backendStatus.ai).toEqual({ kind: "skipped" });
      expect(result.outcome).toBe("complete");
      expect(result.findings).toHaveLength(1);
    });

    it("should report an empty result when the only selected detector fails", async () => {
      const { orchestrator } = setup(succeedWith([]), failWith("HTTP 500"));

      const result = await orchestrator.analyze(request({ detectors: ["ai"] }));

      expect(result.outcome).toBe("empty_result");
      expect(result.backendStatus.static).toEqual({ kind: "skipped" });
    });
  });

  describe("aggregation inconsistencies", () => {
    it("should drop findings outside the submitted source", async () => {
      // CODE has three lines
      const { orchestrator } = setup(
        succeedWith([finding("static", "long-method", 3), finding("static", "long-method", 4)]),
        succeedWith([])
      );

      const result = await orchestrator.analyze(request());

      expect(result.droppedFindings).toBe(1);
      expect(result.findings.map((f) => f.location.startLine)).toEqual([3]);
      expect(result.outcome).toBe("complete");
    });
  });

  describe("invalid requests", () => {
    it.each([
      ["empty code", createAnalysisRequest("   \n", "python")],
      ["an unsupported language", createAnalysisRequest(CODE, "cobol")],
      ["an empty language", createAnalysisRequest(CODE, " ")],
    ])("should reject %s without calling any backend", async (_name, invalid) => {
      const { orchestrator, staticDetector, aiDetector, transitions } = setup(succeedWith([]), succeedWith([]));

      await expect(orchestrator.analyze(invalid)).rejects.toBeInstanceOf(InvalidRequestError);
      expect(staticDetector.calls).toHaveLength(0);
      expect(aiDetector.calls).toHaveLength(0);
      expect(transitions).toEqual([]);
    });

    it("should reject code over the size limit", async () => {
      const config = resolveGatewayConfig({ request: { max_code_bytes: 16 } });
      const orchestrator = new Orchestrator({
        config,
        categories,
        detectors: {
          static: new FakeDetector("static", succeedWith([])),
          ai: new FakeDetector("ai", succeedWith([])),
        },
      });

      await expect(orchestrator.analyze(request())).rejects.toThrow("code exceeds the 16 byte limit");
    });

    it("should accept language names in any case", async () => {
      const { orchestrator, staticDetector } = setup(succeedWith([]), succeedWith([]));

      await orchestrator.analyze(createAnalysisRequest(CODE, " Python "));

      expect(staticDetector.calls[0].language).toBe("python");
    });
  });

  describe("latency", () => {
    it("should run both detectors concurrently", async () => {
      const { orchestrator } = setup(succeedWith([], 150), succeedWith([], 100));

      const started = Date.now();
      const result = await orchestrator.analyze(request());
      const elapsed = Date.now() - started;

      expect(result.outcome).toBe("complete");
      expect(elapsed).toBeGreaterThanOrEqual(140);
      // Sequential calls would take at least 250ms
      expect(elapsed).toBeLessThan(240);
    });

    it("should return soon after the slow backend's budget expires", async () => {
      const { orchestrator } = setup(succeedWith([], 20), hang, { static: 1000, ai: 80 });

      const started = Date.now();
      await orchestrator.analyze(request());

      expect(Date.now() - started).toBeLessThan(500);
    });
  });
});

describe("determineOutcome", () => {
  it("should classify status combinations", () => {
    expect(determineOutcome([{ kind: "success" }, { kind: "success" }])).toBe("complete");
    expect(determineOutcome([{ kind: "success" }, { kind: "timeout", budgetMs: 1 }])).toBe("partial_failure");
    expect(determineOutcome([{ kind: "failure", reason: "x" }, { kind: "timeout", budgetMs: 1 }])).toBe(
      "empty_result"
    );
    expect(determineOutcome([{ kind: "success" }])).toBe("complete");
  });
});
