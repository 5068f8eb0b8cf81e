/**
 * End-to-end tests for the full analysis flow.
 *
 * These tests run the real adapters, orchestrator and report client behind the
 * HTTP app, with every backend replaced by an in-process stub:
 * 1. Fan-out of one submission to both detectors
 * 2. Normalization and merging of overlapping findings
 * 3. Degradation when one backend misses its budget
 * 4. Report submission with the request id as idempotency key
 */

import { Server } from "http";
import * as path from "path";
import { Orchestrator } from "../src/analysis/orchestrator";
import { loadCategoryTable } from "../src/config/categories";
import { resolveGatewayConfig } from "../src/config/loader";
import { createDetectors } from "../src/detectors";
import { ReportClient } from "../src/integrations/report";
import { createApp } from "../src/server";
import { startStubBackend, StubBackend, StubHandler } from "./helpers/stub-backend";

const CODE = [
  "def compute_invoice(order, customer, tax, discount, currency, region):",
  "    total = 0",
  "    for item in order.items:",
  "        total += item.price * 1.19",
  "    return total",
  "",
].join("\n");

function bodyOf(res: Response) {
  return res.text().then((text) => JSON.parse(text));
}

describe("End-to-end analysis flow", () => {
  const stubs: StubBackend[] = [];
  let server: Server | null = null;

  async function stub(handler: StubHandler): Promise<StubBackend> {
    const backend = await startStubBackend(handler);
    stubs.push(backend);
    return backend;
  }

  async function startGateway(urls: { static: string; ai: string; report: string }, aiTimeoutMs = 2000) {
    const config = resolveGatewayConfig({
      backends: { static: { url: urls.static, timeout_ms: 2000 }, ai: { url: urls.ai, timeout_ms: aiTimeoutMs } },
      report: { url: urls.report, retry_base_delay_ms: 1 },
    });
    const categories = loadCategoryTable(path.join(__dirname, "../config/categories.yml"));
    const orchestrator = new Orchestrator({ config, categories, detectors: createDetectors(config) });
    const app = createApp({ config, orchestrator, reports: new ReportClient(config.report), rateLimit: false });

    const listening = app.listen(0, "127.0.0.1");
    server = listening;
    await new Promise<void>((resolve) => listening.once("listening", () => resolve()));
    const address = listening.address();
    if (address === null || typeof address === "string") {
      throw new Error("gateway did not bind to a TCP port");
    }
    return `http://127.0.0.1:${address.port}`;
  }

  afterEach(async () => {
    const running = server;
    server = null;
    if (running) {
      running.closeAllConnections();
      await new Promise<void>((resolve, reject) => running.close((err) => (err ? reject(err) : resolve())));
    }
    await Promise.all(stubs.splice(0).map((s) => s.close()));
  });

  function analyze(gatewayUrl: string, requestId: string): Promise<Response> {
    return fetch(`${gatewayUrl}/analyze`, {
      method: "POST",
      headers: { "Content-Type": "application/json", "X-Request-Id": requestId },
      body: JSON.stringify({ code: CODE, language: "python", options: { filename: "billing.py" } }),
    });
  }

  it("should merge agreeing findings from both detectors and publish a report", async () => {
    const staticBackend = await stub(() => ({
      body: {
        findings: [
          { label: "too-many-arguments", location: { start_line: 1, end_line: 1 }, description: "6 parameters" },
          { label: "magic-number", location: { start_line: 4, start_column: 32, end_column: 36 } },
        ],
      },
    }));
    const aiBackend = await stub(() => ({
      body: {
        findings: [
          { label: "long parameter list", location: { line: 1 }, confidence: 0.9 },
          { label: "MagicNumber", location: { line: 3, end_line: 4 }, confidence: 0.6, description: "Tax rate" },
          { label: "hallucinated", location: { line: 40 }, confidence: 0.5 },
        ],
      },
    }));
    const reportBackend = await stub(() => ({ status: 201, body: { report_ref: "rep-e2e" } }));

    const gatewayUrl = await startGateway({
      static: staticBackend.url,
      ai: aiBackend.url,
      report: reportBackend.url,
    });
    const res = await analyze(gatewayUrl, "e2e-1");
    const body = await bodyOf(res);

    expect(res.status).toBe(200);
    expect(body).toEqual({
      request_id: "e2e-1",
      findings: [
        {
          category: "LongParameterList",
          location: { file: "billing.py", start_line: 1, start_column: 1, end_line: 1, end_column: 1 },
          confidence: 0.9,
          backends: ["static", "ai"],
          labels: ["long parameter list", "too-many-arguments"],
          description: "6 parameters",
        },
        {
          category: "MagicNumber",
          location: { file: "billing.py", start_line: 4, start_column: 32, end_line: 4, end_column: 36 },
          confidence: 0.6,
          backends: ["static", "ai"],
          labels: ["MagicNumber", "magic-number"],
          description: "Tax rate",
        },
      ],
      backend_status: { static: "succeeded", ai: "succeeded" },
      outcome: "complete",
      dropped_findings: 1,
      report: { ref: "rep-e2e" },
    });

    expect(staticBackend.requests[0].body).toEqual({ code: CODE, language: "python" });
    expect(aiBackend.requests[0].body).toEqual({ code: CODE, language: "python" });
    expect(reportBackend.requests).toHaveLength(1);
    expect(reportBackend.requests[0].headers["idempotency-key"]).toBe("e2e-1");
  });

  it("should return static findings when the AI backend is too slow", async () => {
    const staticBackend = await stub(() => ({
      body: { findings: [{ label: "R0913", location: { start_line: 1 } }] },
    }));
    const aiBackend = await stub(() => ({ body: { findings: [] }, delayMs: 1000 }));
    const reportBackend = await stub(() => ({ body: { report_ref: "rep-partial" } }));

    const gatewayUrl = await startGateway(
      { static: staticBackend.url, ai: aiBackend.url, report: reportBackend.url },
      100
    );
    const started = Date.now();
    const body = await bodyOf(await analyze(gatewayUrl, "e2e-2"));

    expect(Date.now() - started).toBeLessThan(900);
    expect(body.outcome).toBe("partial_failure");
    expect(body.backend_status).toEqual({ static: "succeeded", ai: "timed_out" });
    expect(body.findings).toHaveLength(1);
    expect(body.findings[0].category).toBe("LongParameterList");
    expect(body.report).toEqual({ ref: "rep-partial" });
  });

  it("should still answer when the report generator is down", async () => {
    const staticBackend = await stub(() => ({ body: { findings: [] } }));
    const aiBackend = await stub(() => ({ status: 500, body: {} }));
    const reportBackend = await stub(() => ({ status: 503, body: {} }));

    const gatewayUrl = await startGateway({
      static: staticBackend.url,
      ai: aiBackend.url,
      report: reportBackend.url,
    });
    const res = await analyze(gatewayUrl, "e2e-3");
    const body = await bodyOf(res);

    expect(res.status).toBe(200);
    expect(body.findings).toEqual([]);
    expect(body.backend_status).toEqual({ static: "succeeded", ai: "failed" });
    expect(body.outcome).toBe("partial_failure");
    expect(body.report).toBeNull();
    // One attempt plus the default two retries
    expect(reportBackend.requests).toHaveLength(3);
  });
});
