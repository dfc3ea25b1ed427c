// src/utils/calendarDateTime.ts
import { addMinutes, differenceInMinutes } from 'date-fns';
import { formatInTimeZone } from 'date-fns-tz';
import type { CalendarDateTime } from '../types/event.js';

// Wall-clock values are carried in UTC Date objects so that no host
// timezone or DST gap can shift them.
const CARRIER_ZONE = 'UTC';

function toCarrier(value: CalendarDateTime): Date {
  const date = new Date(0);
  // setUTCFullYear keeps years below 100 literal
  date.setUTCFullYear(value.year, value.month - 1, value.day);
  date.setUTCHours(value.hour, value.minute, 0, 0);
  return date;
}

function fromCarrier(date: Date): CalendarDateTime {
  return {
    year: date.getUTCFullYear(),
    month: date.getUTCMonth() + 1,
    day: date.getUTCDate(),
    hour: date.getUTCHours(),
    minute: date.getUTCMinutes(),
  };
}

/**
 * Build a calendar date-time, or null when the fields do not name a real
 * instant (day 31 in a 30-day month, 29/02 in a common year, hour 24, ...)
 */
export function createCalendarDateTime(fields: CalendarDateTime): CalendarDateTime | null {
  const values = [fields.year, fields.month, fields.day, fields.hour, fields.minute];
  if (!values.every(Number.isInteger)) {
    return null;
  }
  if (fields.month < 1 || fields.month > 12 || fields.day < 1 || fields.day > 31) {
    return null;
  }
  if (fields.hour < 0 || fields.hour > 23 || fields.minute < 0 || fields.minute > 59) {
    return null;
  }

  // Date rolls invalid days into the next month; a round trip catches it
  const roundTrip = fromCarrier(toCarrier(fields));
  if (roundTrip.month !== fields.month || roundTrip.day !== fields.day) {
    return null;
  }

  return Object.freeze(roundTrip);
}

export function addMinutesToDateTime(value: CalendarDateTime, minutes: number): CalendarDateTime {
  return Object.freeze(fromCarrier(addMinutes(toCarrier(value), minutes)));
}

export function minutesBetween(start: CalendarDateTime, end: CalendarDateTime): number {
  return differenceInMinutes(toCarrier(end), toCarrier(start));
}

/**
 * Format with a date-fns pattern, e.g. 'dd/MM/yyyy HH:mm'
 */
export function formatDateTime(value: CalendarDateTime, pattern: string): string {
  return formatInTimeZone(toCarrier(value), CARRIER_ZONE, pattern);
}

/**
 * ISO 8601 local date-time without offset, as the Calendar API expects
 * next to an explicit timeZone field
 */
export function toNaiveIso(value: CalendarDateTime): string {
  return formatDateTime(value, "yyyy-MM-dd'T'HH:mm:ss");
}
