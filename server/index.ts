import { createServer } from "http";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { logger } from "./logger";
import { createProductionDependencies } from "./services/extraction/dependencies";
import { APP_NAME, APP_VERSION } from "@shared/version";

const config = loadConfig();
const dependencies = createProductionDependencies(config);
const app = createApp({ config, dependencies });
const httpServer = createServer(app);

if (!config.documentIntelligence) {
  logger.warn("Document intelligence not configured - set DOCINTEL_ENDPOINT and DOCINTEL_KEY; /api/extract will return 503");
}

httpServer.listen({ port: config.port, host: "0.0.0.0" }, () => {
  logger.info({ port: config.port, version: APP_VERSION, env: config.env }, `${APP_NAME} listening`);
});

// Graceful shutdown handling
let isShuttingDown = false;
const SHUTDOWN_TIMEOUT_MS = 30000;

async function gracefulShutdown(signal: string): Promise<void> {
  if (isShuttingDown) {
    logger.info({ signal }, "Shutdown already in progress");
    return;
  }

  isShuttingDown = true;
  logger.info({ signal }, "Starting graceful shutdown");

  const forceExitTimeout = setTimeout(() => {
    logger.error({ timeoutMs: SHUTDOWN_TIMEOUT_MS }, "Graceful shutdown timed out, forcing exit");
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS);

  try {
    await new Promise<void>((resolve, reject) => {
      httpServer.close((err) => (err ? reject(err) : resolve()));
    });
    clearTimeout(forceExitTimeout);
    logger.info("HTTP server closed, all in-flight requests completed");
    process.exit(0);
  } catch (error) {
    clearTimeout(forceExitTimeout);
    logger.error({ err: error }, "Error during graceful shutdown");
    process.exit(1);
  }
}

process.on("SIGTERM", () => {
  void gracefulShutdown("SIGTERM");
});

process.on("SIGINT", () => {
  void gracefulShutdown("SIGINT");
});
