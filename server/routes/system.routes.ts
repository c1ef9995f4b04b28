import { Router, type Request, type Response } from "express";
import type { HealthResponse } from "@shared/schema";
import { APP_VERSION } from "@shared/version";
import type { ExtractionDependencies } from "../services/extraction/dependencies";

export function createSystemRouter(deps: ExtractionDependencies): Router {
  const systemRouter = Router();

  // ===== HEALTH CHECK =====
  systemRouter.get("/health", (_req: Request, res: Response) => {
    const body: HealthResponse = {
      status: "healthy",
      timestamp: new Date().toISOString(),
      version: APP_VERSION,
      documentIntelligence: deps.isDocumentIntelligenceConfigured() ? "configured" : "not-configured",
    };
    res.json(body);
  });

  return systemRouter;
}
