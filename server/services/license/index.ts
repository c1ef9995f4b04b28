import { extractFields } from './field-extractors';
import { buildSummary, calculateConfidence, composeReviewReason } from './scoring';
import type { LicenseMetadataRecord } from './types';

/**
 * Extracts licence metadata from OCR text. Pure and synchronous: identical
 * input always yields an identical record.
 *
 * The authority hint is only a default; an "Ayuntamiento de ..." match in the
 * document takes precedence. A municipality hint always wins.
 */
export function extractLicenseMetadata(
  text: string,
  authorityHint: string | null = null,
  municipalityHint: string | null = null
): LicenseMetadataRecord {
  const fields = extractFields(text, authorityHint, municipalityHint);

  return Object.freeze({
    caseReference: fields.caseReference,
    authority: fields.authority,
    municipality: fields.municipality,
    holder: fields.holder,
    taxId: fields.taxId,
    premisesAddress: fields.premisesAddress,
    activity: fields.activity,
    concessionDate: fields.concessionDate,
    expiryDate: fields.expiryDate,
    renewalDate: fields.renewalDate,
    confidence: calculateConfidence(fields),
    reviewReason: composeReviewReason(fields),
    keywordHints: Object.freeze([...fields.keywordHints]),
    summary: buildSummary(fields),
  });
}

export type { LicenseMetadataRecord } from './types';
export { normalizeText, splitLines, cleanValue } from './normalizer';
export { findDateNearAnchor, parseSpanishDate, formatIsoDate } from './dates';
