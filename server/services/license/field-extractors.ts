import {
  ACTIVITY_STOP_TOKENS,
  AUTHORITY_KEYWORDS,
  BOUNDARY_LABELS,
  CASE_REFERENCE_ANCHORS,
  DATE_ANCHORS,
  DATE_ANCHOR_WINDOW,
  TAX_ID_LABEL,
} from './anchors';
import { collectDistinctDates, findDateNearAnchor } from './dates';
import { cleanValue, normalizeText, splitLines } from './normalizer';
import type { ExtractedLicenseFields } from './types';

interface LengthWindow {
  min: number;
  max: number;
}

const NAME_CHARS = "A-Za-zÁÉÍÓÚÜÑáéíóúüñ";
const NOT_LETTER = `(?![${NAME_CHARS}])`;

const AUTHORITY_PATTERN = new RegExp(
  String.raw`\b(?:${AUTHORITY_KEYWORDS.join('|')})\s+de\s+([${NAME_CHARS}][${NAME_CHARS}'\- ]*)`,
  'i'
);

const BOUNDARY_PATTERN = new RegExp(String.raw`\b(?:${BOUNDARY_LABELS.join('|')})${NOT_LETTER}`, 'i');

const MUNICIPALITY_PATTERN = new RegExp(
  String.raw`^(?:municipio|localidad|t[eé]rmino\s+municipal)${NOT_LETTER}\s*[:\-]?\s*(.+)$`,
  'i'
);

const CASE_REFERENCE_PRIMARY = /\b(?:expediente|expte\.?|exp\.?)\s*(?:(?:n[ºo°]\.?|n[uú]m(?:ero)?\.?)\s*)?[:\-]?\s*(?=[A-Za-z.\/-]*\d)([A-Za-z0-9][A-Za-z0-9.\/-]{3,80})/i;
const CASE_REFERENCE_ANCHOR_PREFIX = /^.*?(?:expediente|expte\.?|exp\.)/i;
const LEADING_NUMBERING = new RegExp(String.raw`^[\s:\-]*(?:(?:n[ºo°]\.?|n[uú]m(?:ero)?\.?)${NOT_LETTER})?[\s:\-]*`, 'i');

const TAX_ID_LABELLED = new RegExp(String.raw`\b${TAX_ID_LABEL}\s*[:\-]?\s*([A-Z0-9]\d{7}[A-Z0-9])\b`, 'i');
const TAX_ID_GENERIC = /\b(?=[A-Z0-9]*[A-Z])([A-Z0-9]\d{7}[A-Z0-9])\b/i;
const TAX_ID_LABEL_STOP = /\b(?:N\.?I\.?F|C\.?I\.?F|N\.?I\.?E|D\.?N\.?I)\b/i;

const HOLDER_PATTERNS = [
  new RegExp(
    String.raw`^(?:titular(?:\s+de\s+la\s+(?:licencia|actividad))?|nombre\s+o\s+raz[oó]n\s+social|raz[oó]n\s+social|solicitante|interesad[oa])${NOT_LETTER}\s*[:\-]?\s*(.+)$`,
    'i'
  ),
];

const ADDRESS_PATTERNS = [
  new RegExp(
    String.raw`^(?:direcci[oó]n|domicilio|emplazamiento|ubicaci[oó]n)(?:\s+(?:del\s+local|de\s+la\s+actividad|del\s+establecimiento|social))?${NOT_LETTER}\s*[:\-]?\s*(.+)$`,
    'i'
  ),
  new RegExp(String.raw`^((?:C\/|(?:calle|avda\.?|avenida|plaza|paseo)${NOT_LETTER})\s*.+)$`, 'i'),
];

const ACTIVITY_PATTERNS = [
  new RegExp(
    String.raw`^(?:actividad|ep[ií]grafe|uso)(?:\s+(?:principal|autorizada|a\s+desarrollar))?${NOT_LETTER}\s*[:\-]?\s*(.+)$`,
    'i'
  ),
];
const ACTIVITY_STOP = new RegExp(String.raw`\b(?:${ACTIVITY_STOP_TOKENS.join('|')})\b`, 'i');

const HOLDER_LENGTH: LengthWindow = { min: 3, max: 119 };
const ADDRESS_LENGTH: LengthWindow = { min: 7, max: 199 };
const ACTIVITY_LENGTH: LengthWindow = { min: 4, max: 199 };
const MUNICIPALITY_LENGTH: LengthWindow = { min: 2, max: 119 };

function cutAt(value: string, stop: RegExp): string {
  const match = stop.exec(value);
  return match ? value.slice(0, match.index) : value;
}

function withinWindow(value: string, window: LengthWindow): boolean {
  return value.length >= window.min && value.length <= window.max;
}

/** Scans lines in order and returns the first captured value `accept` keeps. */
function firstLineMatch(
  lines: readonly string[],
  patterns: readonly RegExp[],
  accept: (captured: string) => string | null
): string | null {
  for (const line of lines) {
    for (const pattern of patterns) {
      const match = pattern.exec(line);
      if (!match) continue;
      const value = accept(match[1]);
      if (value) return value;
    }
  }
  return null;
}

export function cleanHint(hint: string | null | undefined): string | null {
  if (typeof hint !== 'string') return null;
  const cleaned = cleanValue(hint);
  return cleaned.length > 0 ? cleaned : null;
}

export function extractAuthority(text: string): string | null {
  const match = AUTHORITY_PATTERN.exec(text);
  if (!match) return null;
  const name = cleanValue(cutAt(match[1], BOUNDARY_PATTERN));
  return name.length > 0 ? name : null;
}

export function extractMunicipality(lines: readonly string[]): string | null {
  return firstLineMatch(lines, [MUNICIPALITY_PATTERN], captured => {
    const value = cleanValue(cutAt(captured, BOUNDARY_PATTERN));
    return withinWindow(value, MUNICIPALITY_LENGTH) ? value : null;
  });
}

function isCaseReferenceCandidate(token: string): boolean {
  return token.length >= 5 && /\d/.test(token) && /[.\/-]/.test(token);
}

function tokensOf(fragment: string): string[] {
  return fragment
    .split(/\s+/)
    .map(cleanValue)
    .filter(token => token.length > 0);
}

export function extractCaseReference(normalized: string, lines: readonly string[]): string | null {
  const primary = CASE_REFERENCE_PRIMARY.exec(normalized);
  if (primary) {
    const value = cleanValue(primary[1]);
    if (value.length > 0) return value;
  }

  for (let i = 0; i < lines.length; i++) {
    const lowered = lines[i].toLowerCase();
    if (!CASE_REFERENCE_ANCHORS.some(anchor => lowered.includes(anchor))) continue;

    const remainder = lines[i].replace(CASE_REFERENCE_ANCHOR_PREFIX, '').replace(LEADING_NUMBERING, '');
    const candidates = [...tokensOf(remainder), ...tokensOf(lines[i + 1] ?? '')];
    const found = candidates.find(isCaseReferenceCandidate);
    if (found) return found;
  }

  return null;
}

export function extractTaxId(normalized: string): string | null {
  const labelled = TAX_ID_LABELLED.exec(normalized);
  if (labelled) return labelled[1].toUpperCase();

  const generic = TAX_ID_GENERIC.exec(normalized);
  return generic ? generic[1].toUpperCase() : null;
}

export function extractHolder(lines: readonly string[]): string | null {
  return firstLineMatch(lines, HOLDER_PATTERNS, captured => {
    const value = cleanValue(cutAt(captured, TAX_ID_LABEL_STOP));
    return withinWindow(value, HOLDER_LENGTH) ? value : null;
  });
}

export function extractPremisesAddress(lines: readonly string[]): string | null {
  return firstLineMatch(lines, ADDRESS_PATTERNS, captured => {
    const value = cleanValue(captured);
    return withinWindow(value, ADDRESS_LENGTH) ? value : null;
  });
}

export function extractActivity(lines: readonly string[]): string | null {
  return firstLineMatch(lines, ACTIVITY_PATTERNS, captured => {
    const value = cleanValue(cutAt(captured, ACTIVITY_STOP));
    return withinWindow(value, ACTIVITY_LENGTH) ? value : null;
  });
}

export function extractFields(
  text: string,
  authorityHint?: string | null,
  municipalityHint?: string | null
): ExtractedLicenseFields {
  const normalized = normalizeText(text);
  const lines = splitLines(text);

  const documentAuthority = extractAuthority(text);
  const authority = documentAuthority ?? cleanHint(authorityHint);
  const municipality = cleanHint(municipalityHint) ?? extractMunicipality(lines) ?? documentAuthority;

  const expiry = findDateNearAnchor(lines, DATE_ANCHORS.expiry, DATE_ANCHOR_WINDOW);
  const concession = findDateNearAnchor(lines, DATE_ANCHORS.concession, DATE_ANCHOR_WINDOW);
  const renewal = findDateNearAnchor(lines, DATE_ANCHORS.renewal, DATE_ANCHOR_WINDOW);

  let expiryDate = expiry.date;
  if (!expiryDate) {
    // Heuristic: a document carrying a single distinct date is assumed to state its expiry.
    const distinct = collectDistinctDates(lines);
    if (distinct.length === 1) expiryDate = distinct[0];
  }

  return {
    caseReference: extractCaseReference(normalized, lines),
    authority,
    authorityFromDocument: documentAuthority !== null,
    municipality,
    holder: extractHolder(lines),
    taxId: extractTaxId(normalized),
    premisesAddress: extractPremisesAddress(lines),
    activity: extractActivity(lines),
    concessionDate: concession.date,
    expiryDate,
    renewalDate: renewal.date,
    keywordHints: [...expiry.hints, ...concession.hints, ...renewal.hints],
  };
}
