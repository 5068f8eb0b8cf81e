import { Orchestrator } from "./analysis/orchestrator";
import { loadCategoryTable } from "./config/categories";
import { loadGatewayConfig } from "./config/loader";
import { createDetectors } from "./detectors";
import { config as env } from "./env";
import { ReportClient } from "./integrations/report";
import { errorMessage, logger } from "./logger";
import { createApp } from "./server";

// Configuration and the category table are built once and shared read-only
function bootstrap() {
  try {
    const gatewayConfig = loadGatewayConfig(env);
    const categories = loadCategoryTable(gatewayConfig.aggregation.categoryTablePath);
    return { gatewayConfig, categories };
  } catch (err) {
    logger.error("FATAL: invalid configuration", { error: errorMessage(err) });
    process.exit(1);
  }
}

const { gatewayConfig, categories } = bootstrap();

for (const id of ["static", "ai"] as const) {
  if (!gatewayConfig.backends[id].url) {
    logger.warn("Detector backend not configured; every request will report it as failed", { backend: id });
  }
}

logger.info("Loaded category table", {
  path: gatewayConfig.aggregation.categoryTablePath,
  labels: categories.labelCount,
  patterns: categories.patternCount,
});

// Track server state for graceful shutdown
let isShuttingDown = false;

const orchestrator = new Orchestrator({
  config: gatewayConfig,
  categories,
  detectors: createDetectors(gatewayConfig, logger),
  logger,
});

const reports = new ReportClient(gatewayConfig.report, logger);

// Leave room for both detector budgets and report retries
const slowestBackendMs = Math.max(gatewayConfig.backends.static.timeoutMs, gatewayConfig.backends.ai.timeoutMs);

const app = createApp({
  config: gatewayConfig,
  orchestrator,
  reports,
  logger,
  isShuttingDown: () => isShuttingDown,
  // Capped at the longest delay a timer accepts
  requestTimeoutMs: Math.min(
    slowestBackendMs + gatewayConfig.report.timeoutMs * (gatewayConfig.report.maxRetries + 1) + 5_000,
    2_147_483_647
  ),
});

const port = Number(env.PORT) || 3000;

const server = app.listen(port, "0.0.0.0", () => {
  logger.info("Gateway listening", { port, reports: reports.enabled });
});

function shutdown(signal: string): void {
  logger.info("Graceful shutdown started", { signal });
  isShuttingDown = true;

  server.close(() => {
    logger.info("HTTP server closed");
    process.exit(0);
  });

  // Give in-flight requests time to complete (max 10 seconds)
  setTimeout(() => {
    logger.warn("Forcing shutdown with requests still in flight");
    process.exit(0);
  }, 10_000).unref();
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));

process.on("unhandledRejection", (reason) => {
  logger.error("Unhandled rejection", { error: errorMessage(reason) });
});
