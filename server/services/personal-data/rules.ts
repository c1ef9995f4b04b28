import type { DetectionRule } from './types';

// Unicode-aware word edges: an accented letter is part of the word.
const WORD_CHAR = String.raw`[\p{L}\p{N}_]`;
const WORD_START = `(?<!${WORD_CHAR})`;
const WORD_END = `(?!${WORD_CHAR})`;

function words(body: string): string {
  return `${WORD_START}(?:${body})${WORD_END}`;
}

function rule(
  category: DetectionRule['category'],
  source: string,
  weight: number,
  isSpecialCategory = false
): DetectionRule {
  return Object.freeze({ category, pattern: new RegExp(source, 'giu'), weight, isSpecialCategory });
}

export const DETECTION_RULES: readonly DetectionRule[] = Object.freeze([
  // DNI, NIE and CIF
  rule('Identificativo', words(String.raw`\d{8}[A-HJ-NP-TV-Z]|[XYZ]\d{7}[A-Z]|[A-HJNP-SUVW]\d{7}[0-9A-J]`), 0.35),
  rule('Contacto', words(String.raw`[a-z0-9._%+\-]+@[a-z0-9.\-]+\.[a-z]{2,}`), 0.2),
  rule('Contacto', words(String.raw`(?:\+34[\s\-]?)?(?:6\d{2}|7[1-9]\d|8\d{2}|9\d{2})[\s\-]?\d{3}[\s\-]?\d{3}`), 0.2),
  rule(
    'Direcciones',
    String.raw`${words(String.raw`domicilio|direcci[oó]n|calle|avenida|avda|plaza`)}.{0,90}|${WORD_START}c\/.{0,90}`,
    0.15
  ),
  rule('Financiero', words(String.raw`ES\d{2}[A-Z0-9]{20}`), 0.3),
  rule(
    'Especial',
    words(String.raw`salud|historia cl[ií]nica|diagn[oó]stico|tratamiento m[eé]dico|baja m[eé]dica|discapacidad|minusval[ií]a`),
    0.4,
    true
  ),
  rule('Especial', words(String.raw`biom[eé]trico|huella dactilar|reconocimiento facial|adn`), 0.45, true),
  rule(
    'Especial',
    words(
      String.raw`ideolog[ií]a|opini[oó]n pol[ií]tica|afiliaci[oó]n sindical|religi[oó]n|creencias|orientaci[oó]n sexual|vida sexual|origen racial|etnia`
    ),
    0.45,
    true
  ),
  rule('Especial', words(String.raw`condena penal|antecedentes penales|infracci[oó]n penal`), 0.45, true),
]);

export const CARD_CANDIDATE = new RegExp(words(String.raw`(?:\d[ \-]?){13,19}`), 'gu');
export const CARD_WEIGHT = 0.3;
export const CROSS_CATEGORY_BONUS = 0.1;
export const MATCHES_PER_RULE = 3;
export const MAX_INDICATORS = 25;
export const MAX_INDICATOR_LENGTH = 90;
