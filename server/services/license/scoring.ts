import { formatIsoDate } from './dates';
import type { ExtractedLicenseFields } from './types';

export const SCORE_WEIGHTS = Object.freeze({
  caseReference: 0.3,
  concessionDate: 0.25,
  expiryDate: 0.3,
  taxId: 0.1,
  authorityFromDocument: 0.05,
});

export const SCORE_PENALTIES = Object.freeze({
  expiryNotAfterConcession: 0.2,
  unreliableCaseReference: 0.1,
});

export const RELIABLE_CASE_REFERENCE_LENGTH = 7;

export const REVIEW_REASONS = Object.freeze({
  expiryNotAfterConcession: 'La caducidad es anterior o igual a la concesión',
  unreliableCaseReference: 'Expediente no detectado o poco fiable',
  missingTaxId: 'NIF/CIF no detectado',
});

type ScoredFields = Pick<
  ExtractedLicenseFields,
  'caseReference' | 'concessionDate' | 'expiryDate' | 'taxId' | 'authorityFromDocument' | 'holder'
>;

export function roundScore(score: number): number {
  const clamped = Math.min(1, Math.max(0, score));
  return Math.round(clamped * 100) / 100;
}

function hasReliableCaseReference(fields: ScoredFields): boolean {
  return fields.caseReference !== null && fields.caseReference.length >= RELIABLE_CASE_REFERENCE_LENGTH;
}

function expiryNotAfterConcession(fields: ScoredFields): boolean {
  return (
    fields.concessionDate !== null &&
    fields.expiryDate !== null &&
    fields.expiryDate.getTime() <= fields.concessionDate.getTime()
  );
}

export function calculateConfidence(fields: ScoredFields): number {
  let score = 0;

  if (hasReliableCaseReference(fields)) score += SCORE_WEIGHTS.caseReference;
  else score -= SCORE_PENALTIES.unreliableCaseReference;

  if (fields.concessionDate) score += SCORE_WEIGHTS.concessionDate;
  if (fields.expiryDate) score += SCORE_WEIGHTS.expiryDate;
  if (fields.taxId) score += SCORE_WEIGHTS.taxId;
  if (fields.authorityFromDocument) score += SCORE_WEIGHTS.authorityFromDocument;

  if (expiryNotAfterConcession(fields)) score -= SCORE_PENALTIES.expiryNotAfterConcession;

  return roundScore(score);
}

export function composeReviewReason(fields: ScoredFields): string | null {
  const reasons: string[] = [];

  if (expiryNotAfterConcession(fields)) reasons.push(REVIEW_REASONS.expiryNotAfterConcession);
  if (!hasReliableCaseReference(fields)) reasons.push(REVIEW_REASONS.unreliableCaseReference);
  if (!fields.taxId) reasons.push(REVIEW_REASONS.missingTaxId);

  return reasons.length > 0 ? reasons.join('; ') : null;
}

export function buildSummary(fields: ScoredFields): string | null {
  const parts: string[] = [];
  if (fields.caseReference) parts.push(`Expediente: ${fields.caseReference}`);
  if (fields.concessionDate) parts.push(`Concesión: ${formatIsoDate(fields.concessionDate)}`);
  if (fields.expiryDate) parts.push(`Caducidad: ${formatIsoDate(fields.expiryDate)}`);
  if (fields.holder) parts.push(`Titular: ${fields.holder}`);
  if (fields.taxId) parts.push(`NIF/CIF: ${fields.taxId}`);
  return parts.length > 0 ? parts.join(' | ') : null;
}
