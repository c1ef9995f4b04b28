import { z } from "zod";

/**
 * Request bodies are matched case-insensitively: `ContentBase64`, `contentbase64` and
 * `contentBase64` all land on the same property. The first spelling seen wins.
 */
function withCaseInsensitiveKeys(keys: readonly string[]) {
  const canonical = new Map(keys.map((key) => [key.toLowerCase(), key]));
  return (input: unknown): unknown => {
    if (input === undefined || input === null) return {};
    if (typeof input !== "object" || Array.isArray(input)) return input;
    const normalized: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(input)) {
      const target = canonical.get(key.toLowerCase());
      if (target && !(target in normalized)) normalized[target] = value;
    }
    return normalized;
  };
}

const optionalText = z.string().nullish();

const extractRequestShape = z.object({
  fileName: optionalText,
  contentBase64: optionalText,
  ayuntamientoHint: optionalText,
  municipalityHint: optionalText,
});

export const extractRequestSchema = z.preprocess(
  withCaseInsensitiveKeys(Object.keys(extractRequestShape.shape)),
  extractRequestShape
);

const personalDataRequestShape = z.object({
  fileName: optionalText,
  contentBase64: optionalText,
});

export const personalDataRequestSchema = z.preprocess(
  withCaseInsensitiveKeys(Object.keys(personalDataRequestShape.shape)),
  personalDataRequestShape
);

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);

export const licenseMetadataResponseSchema = z.object({
  expediente: z.string().nullable(),
  ayuntamiento: z.string().nullable(),
  municipio: z.string().nullable(),
  titular: z.string().nullable(),
  nifCif: z.string().nullable(),
  direccionLocal: z.string().nullable(),
  actividad: z.string().nullable(),
  fechaConcesion: isoDate.nullable(),
  fechaCaducidad: isoDate.nullable(),
  fechaRenovacion: isoDate.nullable(),
  confianzaExtraccion: z.number().min(0).max(1),
  motivoRevision: z.string().nullable(),
  palabrasClaveDetectadas: z.array(z.string()),
  resumen: z.string().nullable(),
});

export const personalDataResponseSchema = z.object({
  fileType: z.string(),
  containsPersonalData: z.boolean(),
  containsSpecialCategoryData: z.boolean(),
  score: z.number().min(0).max(1),
  textLength: z.number().int().nonnegative(),
  categoriesDetected: z.array(z.string()),
  indicators: z.array(z.string()),
  reviewReason: z.string().nullable(),
  summary: z.string(),
});

export type LicenseMetadataResponse = z.infer<typeof licenseMetadataResponseSchema>;
export type PersonalDataResponse = z.infer<typeof personalDataResponseSchema>;

export interface HealthResponse {
  status: "healthy";
  timestamp: string;
  version: string;
  documentIntelligence: "configured" | "not-configured";
}
