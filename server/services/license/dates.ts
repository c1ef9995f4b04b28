import { format, isValid, parse } from 'date-fns';
import { es } from 'date-fns/locale';
import type { AnchoredDate } from './types';

const DATE_CANDIDATE = /(?<!\d)(?:0?[1-9]|[12]\d|3[01])[/\-.](?:0?[1-9]|1[0-2])[/\-.](?:(?:19|20)?\d{2})(?!\d)/g;

// Two-digit years resolve against 2000: 00-49 -> 20xx, 50-99 -> 19xx.
const REFERENCE_DATE = new Date(2000, 0, 1);

const DATE_FORMATS: Readonly<Record<'long' | 'short', string>> = Object.freeze({
  long: 'dd/MM/yyyy',
  short: 'dd/MM/yy',
});

export function parseSpanishDate(value: string): Date | null {
  const normalized = value.trim().replace(/[-.]/g, '/');
  const parts = normalized.split('/');
  if (parts.length !== 3) return null;

  const pattern = parts[2].length === 4 ? DATE_FORMATS.long : DATE_FORMATS.short;
  const parsed = parse(normalized, pattern, REFERENCE_DATE, { locale: es });
  return isValid(parsed) ? parsed : null;
}

export function findDatesInLine(line: string): Date[] {
  const dates: Date[] = [];
  for (const match of line.matchAll(DATE_CANDIDATE)) {
    const date = parseSpanishDate(match[0]);
    if (date) dates.push(date);
  }
  return dates;
}

export function findFirstDate(line: string): Date | null {
  for (const match of line.matchAll(DATE_CANDIDATE)) {
    const date = parseSpanishDate(match[0]);
    if (date) return date;
  }
  return null;
}

function containsAnchor(line: string, anchors: readonly string[]): boolean {
  const lowered = line.toLowerCase();
  return anchors.some(anchor => lowered.includes(anchor));
}

/**
 * Returns the date tied to the first anchor line that yields one, looking at the
 * anchor line itself and then at lines `index - window .. index + window` in
 * document order. The line the date was read from is returned as a hint.
 */
export function findDateNearAnchor(
  lines: readonly string[],
  anchors: readonly string[],
  window: number
): AnchoredDate {
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (!containsAnchor(line, anchors)) continue;

    const sameLine = findFirstDate(line);
    if (sameLine) return { date: sameLine, hints: [line] };

    const start = Math.max(0, i - window);
    const end = Math.min(lines.length - 1, i + window);
    for (let j = start; j <= end; j++) {
      if (j === i) continue;
      const nearby = findFirstDate(lines[j]);
      if (nearby) return { date: nearby, hints: [lines[j]] };
    }
  }

  return { date: null, hints: [] };
}

export function collectDistinctDates(lines: readonly string[]): Date[] {
  const seen = new Map<number, Date>();
  for (const line of lines) {
    for (const date of findDatesInLine(line)) {
      if (!seen.has(date.getTime())) seen.set(date.getTime(), date);
    }
  }
  return [...seen.values()];
}

export function formatIsoDate(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}
