import type { Express } from "express";
import type { ExtractionDependencies } from "./services/extraction/dependencies";
import { createExtractionRouter } from "./routes/extraction.routes";
import { createPersonalDataRouter } from "./routes/personal-data.routes";
import { createSystemRouter } from "./routes/system.routes";

export function registerRoutes(app: Express, deps: ExtractionDependencies): void {
  app.use("/api", createSystemRouter(deps));
  app.use("/api", createExtractionRouter(deps));
  app.use("/api", createPersonalDataRouter(deps));
}
