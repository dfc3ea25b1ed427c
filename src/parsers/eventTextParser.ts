// src/parsers/eventTextParser.ts
import type { EventDraft, ParseOutcome } from '../types/event.js';
import { addMinutesToDateTime, createCalendarDateTime } from '../utils/calendarDateTime.js';
import { DEFAULT_DURATION_MINUTES, DEFAULT_TITLE, type IParser } from './IParser.js';
import { maskDate, matchDate, matchTime, TIME_MATCHERS, type TimeMatcher } from './matchers.js';

const WHITESPACE = /\s/;
const DIGIT = /\d/;

/**
 * Split text into trimmed, non-blank lines
 */
export function splitLines(text: string): string[] {
  return text
    .split(/\r\n|\r|\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * A second line is a location only when it is a single word without digits,
 * so note lines and the date/time line itself are never taken for one
 */
export function pickLocation(lines: string[]): string {
  const candidate = lines[1];
  if (candidate === undefined) return '';
  if (WHITESPACE.test(candidate) || DIGIT.test(candidate)) return '';
  return candidate;
}

/**
 * Multiline message grammar:
 *
 *   Nobili avv frattasi      <- title (first line)
 *   Carlomagno               <- location (optional, one word, no digits)
 *   13/2/26 h 12             <- date and time, anywhere in the text
 *
 * The whole trimmed text becomes the description. A message without a time is
 * rejected rather than defaulted, so no event lands at a wrong hour.
 */
export class EventTextParser implements IParser {
  constructor(private readonly timeMatchers: readonly TimeMatcher[] = TIME_MATCHERS) {}

  parse(text: string): ParseOutcome {
    const trimmed = text.trim();
    if (!trimmed) {
      return { kind: 'not_recognized', reason: 'empty' };
    }

    const date = matchDate(trimmed);
    if (!date) {
      return { kind: 'not_recognized', reason: 'missing_date' };
    }

    const time = matchTime(maskDate(trimmed, date), this.timeMatchers);
    if (!time) {
      return { kind: 'not_recognized', reason: 'missing_time' };
    }

    const start = createCalendarDateTime({
      year: date.year,
      month: date.month,
      day: date.day,
      hour: time.hour,
      minute: time.minute,
    });
    if (!start) {
      return { kind: 'malformed_timestamp', reason: 'invalid_calendar_date' };
    }

    const lines = splitLines(trimmed);

    const draft: EventDraft = Object.freeze({
      title: lines[0] ?? DEFAULT_TITLE,
      location: pickLocation(lines),
      description: trimmed,
      start,
      end: addMinutesToDateTime(start, DEFAULT_DURATION_MINUTES),
    });

    return { kind: 'recognized', draft };
  }
}
