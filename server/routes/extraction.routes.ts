import { Router, type Request, type Response } from "express";
import { extractRequestSchema } from "@shared/schema";
import { BadRequestError, ExternalServiceError, ServiceUnavailableError, ValidationError, asyncHandler } from "../errors";
import { extractionLogger } from "../logger";
import { extractLicenseMetadata } from "../services/license";
import type { ExtractionDependencies } from "../services/extraction/dependencies";
import { TextExtractionError } from "../services/extraction/types";
import { decodeBase64 } from "../utils/base64";
import { toLicenseMetadataResponse } from "./wire";

export function createExtractionRouter(deps: ExtractionDependencies): Router {
  const extractionRouter = Router();

  // ===== LICENCE METADATA =====
  extractionRouter.post("/extract", asyncHandler(async (req: Request, res: Response) => {
    const parsed = extractRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      throw ValidationError.fromZodError(parsed.error);
    }

    const { fileName, contentBase64, ayuntamientoHint, municipalityHint } = parsed.data;
    if (!contentBase64 || contentBase64.trim().length === 0) {
      throw new BadRequestError("Missing ContentBase64");
    }

    const bytes = decodeBase64(contentBase64);
    if (!bytes) {
      throw new BadRequestError("ContentBase64 no es válido.");
    }

    if (!deps.isDocumentIntelligenceConfigured()) {
      throw new ServiceUnavailableError("Document intelligence is not configured");
    }

    const log = extractionLogger.child({ traceId: req.correlationId, fileName: fileName ?? null });
    log.info({ bytes: bytes.length }, "Extracting licence metadata");

    let text: string;
    try {
      ({ text } = await deps.extractWithDocumentIntelligence(bytes));
    } catch (error) {
      if (error instanceof TextExtractionError) {
        throw new ExternalServiceError("document intelligence", error.message);
      }
      throw error;
    }

    const record = extractLicenseMetadata(text, ayuntamientoHint ?? null, municipalityHint ?? null);
    log.info(
      { confidence: record.confidence, needsReview: record.reviewReason !== null, textLength: text.length },
      "Licence metadata extracted"
    );

    res.json(toLicenseMetadataResponse(record));
  }));

  return extractionRouter;
}
