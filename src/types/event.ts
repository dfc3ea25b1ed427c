// src/types/event.ts

/**
 * Wall-clock date and time with no offset attached.
 * Paired with a configured IANA zone name only when sent to the calendar API.
 */
export interface CalendarDateTime {
  year: number;
  month: number; // 1-12
  day: number; // 1-31
  hour: number; // 0-23
  minute: number; // 0-59
}

/**
 * Structured event produced from a chat message, not yet sent to a calendar
 */
export interface EventDraft {
  readonly title: string;
  readonly location: string; // Empty when the message carries no location line
  readonly description: string;
  readonly start: Readonly<CalendarDateTime>;
  readonly end: Readonly<CalendarDateTime>;
}

export type NotRecognizedReason = 'empty' | 'missing_date' | 'missing_time' | 'bad_format';

/**
 * Result of parsing one message.
 * `malformed_timestamp` means the tokens matched but name a date that does not exist (e.g. 31/02).
 */
export type ParseOutcome =
  | { kind: 'recognized'; draft: EventDraft }
  | { kind: 'not_recognized'; reason: NotRecognizedReason }
  | { kind: 'malformed_timestamp'; reason: 'invalid_calendar_date' };

export type ParseOutcomeKind = ParseOutcome['kind'];
