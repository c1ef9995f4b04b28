const WHITESPACE_RUN = /\s+/g;
const TYPOGRAPHIC_DASHES = /[–—]/g;

const EDGE_PUNCTUATION = /^[\s.,;:\-–—"'«»“”‘’]+|[\s.,;:\-–—"'«»“”‘’]+$/g;

export function normalizeText(text: string): string {
  return text.replace(TYPOGRAPHIC_DASHES, '-').replace(WHITESPACE_RUN, ' ').trim();
}

/** Splits the raw text into trimmed, non-empty lines. */
export function splitLines(text: string): string[] {
  return text
    .replace(/\r/g, '')
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0);
}

export function cleanValue(value: string): string {
  return value.replace(WHITESPACE_RUN, ' ').trim().replace(EDGE_PUNCTUATION, '');
}
