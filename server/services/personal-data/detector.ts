import { passesLuhn } from './luhn';
import {
  CARD_CANDIDATE,
  CARD_WEIGHT,
  CROSS_CATEGORY_BONUS,
  DETECTION_RULES,
  MATCHES_PER_RULE,
  MAX_INDICATORS,
  MAX_INDICATOR_LENGTH,
} from './rules';
import type { DetectionRule, PersonalDataCategory, PersonalDataRecord } from './types';

export const MESSAGES = Object.freeze({
  noTextReview: 'No se pudo extraer texto para analizar.',
  noTextSummary: 'Sin texto analizable.',
  specialReview: 'Se detectaron posibles categorías especiales de datos personales (RGPD/LOPDGDD).',
  nothingDetected: 'No se detectaron patrones de datos personales.',
  legalReviewClause: 'Revisión legal recomendada por posibles datos especialmente protegidos.',
});

/** Keeps insertion order and drops values that differ only by case. */
class IndicatorSet {
  private readonly values = new Map<string, string>();

  add(raw: string): void {
    const indicator = cleanIndicator(raw);
    if (!indicator) return;
    const key = indicator.toLowerCase();
    if (!this.values.has(key)) this.values.set(key, indicator);
  }

  take(limit: number): string[] {
    return [...this.values.values()].slice(0, limit);
  }
}

function cleanIndicator(value: string): string {
  return value.replace(/\s+/g, ' ').trim().slice(0, MAX_INDICATOR_LENGTH);
}

function globalPattern(pattern: RegExp): RegExp {
  return pattern.global ? pattern : new RegExp(pattern.source, `${pattern.flags}g`);
}

function roundScore(score: number): number {
  return Math.round(Math.min(1, Math.max(0, score)) * 100) / 100;
}

function findValidCardNumber(text: string): string | null {
  for (const candidate of text.matchAll(CARD_CANDIDATE)) {
    const digits = candidate[0].replace(/\D/g, '');
    if (digits.length < 13 || digits.length > 19) continue;
    if (passesLuhn(digits)) return candidate[0];
  }
  return null;
}

function buildSummary(
  categories: readonly PersonalDataCategory[],
  score: number,
  special: boolean
): string {
  if (categories.length === 0) return MESSAGES.nothingDetected;

  const base = `Detectados datos personales. Categorías: ${categories.join(', ')}. Score: ${score.toFixed(2)}.`;
  return special ? `${base} ${MESSAGES.legalReviewClause}` : base;
}

/**
 * Classifies text for personal data. Every rule runs over the full text; a
 * matching rule contributes its category and weight once, however many times it
 * matches. Only the first Luhn-valid digit sequence counts towards `Financiero`.
 */
export function classifyPersonalData(
  text: string | null | undefined,
  fileType: string,
  rules: readonly DetectionRule[] = DETECTION_RULES
): PersonalDataRecord {
  if (!text || text.trim().length === 0) {
    return Object.freeze({
      fileType,
      containsPersonalData: false,
      containsSpecialCategoryData: false,
      score: 0,
      textLength: 0,
      categoriesDetected: Object.freeze([]),
      indicators: Object.freeze([]),
      reviewReason: MESSAGES.noTextReview,
      summary: MESSAGES.noTextSummary,
    });
  }

  const categories = new Set<PersonalDataCategory>();
  const indicators = new IndicatorSet();
  let score = 0;
  let special = false;

  for (const detectionRule of rules) {
    const matches = [...text.matchAll(globalPattern(detectionRule.pattern))];
    if (matches.length === 0) continue;

    categories.add(detectionRule.category);
    score += detectionRule.weight;
    if (detectionRule.isSpecialCategory) special = true;

    for (const match of matches.slice(0, MATCHES_PER_RULE)) {
      indicators.add(match[0]);
    }
  }

  const cardNumber = findValidCardNumber(text);
  if (cardNumber) {
    categories.add('Financiero');
    indicators.add(cardNumber);
    score += CARD_WEIGHT;
  }

  if (categories.size >= 2) score += CROSS_CATEGORY_BONUS;

  const categoriesDetected = [...categories].sort();
  const finalScore = roundScore(score);

  return Object.freeze({
    fileType,
    containsPersonalData: categoriesDetected.length > 0,
    containsSpecialCategoryData: special,
    score: finalScore,
    textLength: text.length,
    categoriesDetected: Object.freeze(categoriesDetected),
    indicators: Object.freeze(indicators.take(MAX_INDICATORS)),
    reviewReason: special ? MESSAGES.specialReview : null,
    summary: buildSummary(categoriesDetected, finalScore, special),
  });
}
