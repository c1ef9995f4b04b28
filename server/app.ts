import express, { type Express } from "express";
import helmet from "helmet";
import compression from "compression";
import type { AppConfig } from "./config";
import { errorHandler, notFoundHandler } from "./errors";
import { httpLogger } from "./logger";
import { correlationIdMiddleware } from "./middleware/correlation-id";
import { createGlobalRateLimiter } from "./middleware/rate-limit";
import { registerRoutes } from "./routes";
import type { ExtractionDependencies } from "./services/extraction/dependencies";

export interface AppOptions {
  config: AppConfig;
  dependencies: ExtractionDependencies;
}

export function createApp({ config, dependencies }: AppOptions): Express {
  const app = express();

  app.set("trust proxy", 1);
  app.disable("x-powered-by");

  app.use(helmet({
    contentSecurityPolicy: false,
    crossOriginEmbedderPolicy: false,
  }));
  app.use(compression({
    filter: (req, res) => {
      if (req.headers["x-no-compression"]) return false;
      return compression.filter(req, res);
    },
  }));

  app.use(correlationIdMiddleware);
  app.use(httpLogger);

  app.use(express.json({ limit: config.bodyLimit }));
  app.use("/api", createGlobalRateLimiter(config.rateLimitPerMinute));

  registerRoutes(app, dependencies);

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
