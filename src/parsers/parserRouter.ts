// src/parsers/parserRouter.ts
import type { ParseOutcome } from '../types/event.js';
import { EventTextParser } from './eventTextParser.js';
import { LEGACY_PREFIX, LegacyEventParser } from './legacyEventParser.js';

export interface RouteOptions {
  legacyFormat: boolean;
}

const multilineParser = new EventTextParser();
const legacyParser = new LegacyEventParser();

/**
 * Check if the message uses the pipe-delimited "evento:" grammar
 */
export function hasLegacyPrefix(text: string): boolean {
  return text.trim().toLowerCase().startsWith(LEGACY_PREFIX);
}

/**
 * Route message text to the matching grammar
 * - Legacy parser for "evento: ..." lines, when enabled
 * - Multiline parser for everything else
 *
 * @param text - Raw message text
 * @param options - Grammar selection
 * @returns Parse outcome
 */
export function routeParse(text: string, options: RouteOptions = { legacyFormat: true }): ParseOutcome {
  if (options.legacyFormat && hasLegacyPrefix(text)) {
    return legacyParser.parse(text);
  }
  return multilineParser.parse(text);
}
