// src/parsers/IParser.ts
import type { ParseOutcome } from '../types/event.js';

/**
 * A grammar that turns message text into an event draft.
 * Implementations are pure: no I/O, no logging, no clock reads.
 */
export interface IParser {
  parse(text: string): ParseOutcome;
}

// Default title when a message has no usable first line
export const DEFAULT_TITLE = 'Evento';

// Every draft from the multiline grammar lasts exactly this long
export const DEFAULT_DURATION_MINUTES = 60;
