import { Router, type Request, type Response } from "express";
import { personalDataRequestSchema } from "@shared/schema";
import { BadRequestError, ValidationError, asyncHandler } from "../errors";
import { personalDataLogger } from "../logger";
import { classifyPersonalData } from "../services/personal-data";
import type { ExtractionDependencies } from "../services/extraction/dependencies";
import { fileExtension, isPlainText, isSupportedExtension } from "../services/extraction/text-source";
import type { SupportedExtension } from "../services/extraction/types";
import { decodeBase64 } from "../utils/base64";
import { toPersonalDataResponse } from "./wire";

export const PERSONAL_DATA_MESSAGES = Object.freeze({
  missingFields: "Se requiere FileName y ContentBase64.",
  unsupportedFormat: "Formato no soportado. Usa .docx, .pdf, .xlsx o .txt.",
  invalidContent: "ContentBase64 no es válido.",
});

export function createPersonalDataRouter(deps: ExtractionDependencies): Router {
  const personalDataRouter = Router();

  async function readText(bytes: Uint8Array, extension: SupportedExtension, traceId: string): Promise<string> {
    if (isPlainText(extension)) return deps.decodePlainText(bytes);

    try {
      const { text } = await deps.extractWithDocumentIntelligence(bytes);
      return text;
    } catch (error) {
      // Classified as unanalyzable rather than failing the request.
      personalDataLogger.warn(
        { traceId, extension, error: error instanceof Error ? error.message : String(error) },
        "Text extraction failed"
      );
      return "";
    }
  }

  personalDataRouter.post("/detect-personal-data", asyncHandler(async (req: Request, res: Response) => {
    const parsed = personalDataRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      throw ValidationError.fromZodError(parsed.error);
    }

    const { fileName, contentBase64 } = parsed.data;
    if (!fileName || fileName.trim().length === 0 || !contentBase64 || contentBase64.trim().length === 0) {
      throw new BadRequestError(PERSONAL_DATA_MESSAGES.missingFields);
    }

    const extension = fileExtension(fileName);
    if (!isSupportedExtension(extension)) {
      throw new BadRequestError(PERSONAL_DATA_MESSAGES.unsupportedFormat);
    }

    const bytes = decodeBase64(contentBase64);
    if (!bytes) {
      throw new BadRequestError(PERSONAL_DATA_MESSAGES.invalidContent);
    }

    const text = await readText(bytes, extension, req.correlationId);
    const record = classifyPersonalData(text, extension);

    personalDataLogger.info(
      {
        traceId: req.correlationId,
        fileType: extension,
        score: record.score,
        categories: record.categoriesDetected,
        special: record.containsSpecialCategoryData,
      },
      "Personal data classification complete"
    );

    res.json(toPersonalDataResponse(record));
  }));

  return personalDataRouter;
}
