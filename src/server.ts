/**
 * HTTP surface of the gateway.
 *
 * `createApp` only wires routes and middleware around injected collaborators,
 * so tests can run it against in-process backends.
 */

import express, { Express, NextFunction, Request, Response } from "express";
import bodyParser from "body-parser";
import rateLimit from "express-rate-limit";
import { Orchestrator } from "./analysis/orchestrator";
import { parseAnalysisRequest } from "./analysis/request";
import { GatewayConfig } from "./config/schema";
import { isInvalidRequestError } from "./errors";
import { ReportPublisher } from "./integrations/report";
import { Logger, errorMessage, logger as defaultLogger } from "./logger";
import { serializeResult } from "./serialize";

export interface AppDeps {
  config: GatewayConfig;
  orchestrator: Orchestrator;
  reports?: ReportPublisher;
  logger?: Logger;
  /** Requests are refused with 503 while this returns true. */
  isShuttingDown?: () => boolean;
  rateLimit?: { windowMs: number; limit: number } | false;
  /** Response deadline for a whole request. */
  requestTimeoutMs?: number;
}

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._:-]{1,128}$/;

// Room for JSON escaping and the other request fields on top of the code itself
const BODY_OVERHEAD_BYTES = 64 * 1024;

/**
 * Accept a caller-supplied request id only when it is a plain token.
 */
export function readRequestId(header: string | string[] | undefined): string | undefined {
  const value = Array.isArray(header) ? header[0] : header;
  return value !== undefined && REQUEST_ID_PATTERN.test(value) ? value : undefined;
}

function httpStatusOf(err: unknown): number | undefined {
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return undefined;
}

export function createApp(deps: AppDeps): Express {
  const log = deps.logger ?? defaultLogger;
  const app = express();

  app.set("trust proxy", 1);
  app.disable("x-powered-by");

  if (deps.rateLimit !== false) {
    const settings = deps.rateLimit ?? { windowMs: 60 * 1000, limit: 120 };
    app.use(
      rateLimit({
        windowMs: settings.windowMs,
        limit: settings.limit,
        message: { error: "rate_limited", message: "Too many requests, please try again later" },
        standardHeaders: true,
        legacyHeaders: false,
        skip: (req) => req.path === "/health",
      })
    );
  }

  // Reject requests during shutdown
  app.use((_req: Request, res: Response, next: NextFunction) => {
    if (deps.isShuttingDown?.()) {
      res.status(503).json({ error: "shutting_down", message: "Server is shutting down" });
      return;
    }
    next();
  });

  if (deps.requestTimeoutMs) {
    const timeoutMs = deps.requestTimeoutMs;
    app.use((_req: Request, res: Response, next: NextFunction) => {
      res.setTimeout(timeoutMs, () => {
        if (!res.headersSent) {
          res.status(408).json({ error: "request_timeout", message: "Request timeout" });
        }
      });
      next();
    });
  }

  app.use(bodyParser.json({ limit: deps.config.request.maxCodeBytes * 2 + BODY_OVERHEAD_BYTES }));

  app.get("/", (_req: Request, res: Response) => {
    res.status(200).json({
      status: "ok",
      message: "Code smell analysis gateway is running",
      version: process.env.npm_package_version || "1.0.0",
    });
  });

  app.get("/health", (_req: Request, res: Response) => {
    const backend = (url: string | null, timeoutMs: number) => ({
      status: url ? "configured" : "not_configured",
      timeout_ms: timeoutMs,
    });
    const checks = {
      static: backend(deps.config.backends.static.url, deps.config.backends.static.timeoutMs),
      ai: backend(deps.config.backends.ai.url, deps.config.backends.ai.timeoutMs),
      report: { status: deps.config.report.url ? "configured" : "not_configured" },
    };

    const configuredBackends = [checks.static, checks.ai].filter((c) => c.status === "configured").length;
    const status = configuredBackends === 2 ? "healthy" : configuredBackends === 1 ? "degraded" : "unhealthy";

    res.status(status === "unhealthy" ? 503 : 200).json({
      status,
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      checks,
    });
  });

  app.post("/analyze", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const request = parseAnalysisRequest(req.body);
      const result = await deps.orchestrator.analyze(request, {
        requestId: readRequestId(req.headers["x-request-id"]),
      });

      const report = deps.reports ? await deps.reports.publish(result) : null;

      res.setHeader("X-Request-Id", result.requestId);
      res.status(200).json({ ...serializeResult(result), report });
    } catch (err) {
      next(err);
    }
  });

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: "not_found", message: "Route not found" });
  });

  // Error handler: invalid input -> 400, body-parser client errors keep their status, rest -> 500
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (isInvalidRequestError(err)) {
      log.info("Rejected invalid analysis request", { path: req.path, reason: err.message });
      res.status(400).json({ error: err.code, message: err.message });
      return;
    }

    const status = httpStatusOf(err);
    if (status !== undefined && status >= 400 && status < 500) {
      res.status(status).json({ error: "invalid_request", message: errorMessage(err) });
      return;
    }

    log.error("Unhandled error in request", { path: req.path, error: errorMessage(err) });
    res.status(500).json({ error: "internal_error", message: "Internal server error" });
  });

  return app;
}
