// src/parsers/legacyEventParser.ts
import type { EventDraft, ParseOutcome } from '../types/event.js';
import { addMinutesToDateTime, createCalendarDateTime } from '../utils/calendarDateTime.js';
import { DEFAULT_DURATION_MINUTES, DEFAULT_TITLE, type IParser } from './IParser.js';

export const LEGACY_PREFIX = 'evento:';

const INTEGER = /^\d+$/;

function parseIntegers(value: string, separator: string, count: number): number[] | null {
  const parts = value.split(separator).map((part) => part.trim());
  if (parts.length !== count || !parts.every((part) => INTEGER.test(part))) {
    return null;
  }
  return parts.map((part) => Number.parseInt(part, 10));
}

/**
 * Duration in hours, "1,5" accepted. Anything unusable, or shorter than a
 * minute once rounded, means one hour.
 */
function parseDurationMinutes(value: string | undefined): number {
  if (value === undefined || !value.trim()) return DEFAULT_DURATION_MINUTES;
  const hours = Number(value.trim().replace(',', '.'));
  if (!Number.isFinite(hours)) {
    return DEFAULT_DURATION_MINUTES;
  }
  const minutes = Math.round(hours * 60);
  return minutes >= 1 ? minutes : DEFAULT_DURATION_MINUTES;
}

/**
 * Rigid single-line grammar kept for older senders:
 *
 *   evento: Titolo | dd/mm/yyyy | hh:mm | durata_ore
 *
 * The duration field is optional. Location and description stay empty.
 */
export class LegacyEventParser implements IParser {
  parse(text: string): ParseOutcome {
    const trimmed = text.trim();
    if (!trimmed) {
      return { kind: 'not_recognized', reason: 'empty' };
    }
    if (!trimmed.toLowerCase().startsWith(LEGACY_PREFIX)) {
      return { kind: 'not_recognized', reason: 'bad_format' };
    }

    const fields = trimmed
      .slice(LEGACY_PREFIX.length)
      .split('|')
      .map((field) => field.trim());
    if (fields.length < 3) {
      return { kind: 'not_recognized', reason: 'bad_format' };
    }

    const [title, dateField, timeField, durationField] = fields;
    const dateParts = parseIntegers(dateField, '/', 3);
    const timeParts = parseIntegers(timeField, ':', 2);
    if (!dateParts || !timeParts) {
      return { kind: 'not_recognized', reason: 'bad_format' };
    }

    const [day, month, rawYear] = dateParts;
    const [hour, minute] = timeParts;
    const start = createCalendarDateTime({
      year: rawYear < 100 ? rawYear + 2000 : rawYear,
      month,
      day,
      hour,
      minute,
    });
    if (!start) {
      return { kind: 'malformed_timestamp', reason: 'invalid_calendar_date' };
    }

    // A huge duration pushes the end past the range Date can represent
    const end = createCalendarDateTime(addMinutesToDateTime(start, parseDurationMinutes(durationField)));
    if (!end) {
      return { kind: 'not_recognized', reason: 'bad_format' };
    }

    const draft: EventDraft = Object.freeze({
      title: title || DEFAULT_TITLE,
      location: '',
      description: '',
      start,
      end,
    });

    return { kind: 'recognized', draft };
  }
}
