// src/parsers/matchers.ts

export interface DateMatch {
  day: number;
  month: number;
  year: number; // Already normalized to four digits
  index: number;
  length: number;
}

export interface TimeMatch {
  hour: number;
  minute: number;
}

export type TimeMatcher = (text: string) => TimeMatch | null;

// dd/mm/yy, dd/mm/yyyy, dd.mm.yy, dd.mm.yyyy - both separators must agree
const DATE_PATTERN = /\b(\d{1,2})([/.])(\d{1,2})\2(\d{2}|\d{4})\b/;

const HOUR = '([01]?\\d|2[0-3])';
const OPTIONAL_MINUTE = '(?:[.:]([0-5]\\d))?';

const H_MARKER_PATTERN = new RegExp(`\\bh\\s*${HOUR}${OPTIONAL_MINUTE}\\b`, 'i');
const ORE_MARKER_PATTERN = new RegExp(`\\bore\\s*${HOUR}${OPTIONAL_MINUTE}\\b`, 'i');
const BARE_TIME_PATTERN = new RegExp(`\\b${HOUR}[.:]([0-5]\\d)\\b`);

/**
 * Find the leftmost date token. Two-digit years map to 20yy.
 */
export function matchDate(text: string): DateMatch | null {
  const match = DATE_PATTERN.exec(text);
  if (!match) return null;

  const yearText = match[4];
  const rawYear = Number.parseInt(yearText, 10);

  return {
    day: Number.parseInt(match[1], 10),
    month: Number.parseInt(match[3], 10),
    year: yearText.length === 2 ? rawYear + 2000 : rawYear,
    index: match.index,
    length: match[0].length,
  };
}

function toTimeMatch(match: RegExpExecArray | null): TimeMatch | null {
  if (!match) return null;
  return {
    hour: Number.parseInt(match[1], 10),
    minute: match[2] ? Number.parseInt(match[2], 10) : 0,
  };
}

/** "h 12", "h12", "H 9.30", "h 12:30" */
export const matchHourMarker: TimeMatcher = (text) => toTimeMatch(H_MARKER_PATTERN.exec(text));

/** "ore 14", "ore 14.30", "Ore 9:05" */
export const matchOreMarker: TimeMatcher = (text) => toTimeMatch(ORE_MARKER_PATTERN.exec(text));

/** Bare "12:00" or "12.00" anywhere */
export const matchBareTime: TimeMatcher = (text) => toTimeMatch(BARE_TIME_PATTERN.exec(text));

/**
 * Tried in order; the first hit wins
 */
export const TIME_MATCHERS: readonly TimeMatcher[] = [matchHourMarker, matchOreMarker, matchBareTime];

export function matchTime(
  text: string,
  matchers: readonly TimeMatcher[] = TIME_MATCHERS
): TimeMatch | null {
  for (const matcher of matchers) {
    const result = matcher(text);
    if (result) return result;
  }
  return null;
}

/**
 * Blank out the date token so "18.09.2026 12.00" is not read as 18:09
 */
export function maskDate(text: string, date: DateMatch): string {
  return text.slice(0, date.index) + ' '.repeat(date.length) + text.slice(date.index + date.length);
}
