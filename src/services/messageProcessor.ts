// src/services/messageProcessor.ts
import type { Counter } from 'prom-client';
import type { UnrecognizedPolicy } from '../config/env.js';
import { routeParse } from '../parsers/parserRouter.js';
import type { EventDraft, ParseOutcomeKind } from '../types/event.js';
import type { Logger } from '../types/logger.js';
import type { CalendarInserter } from '../utils/calendarIntegration.js';
import { formatDateTime, minutesBetween } from '../utils/calendarDateTime.js';

export const UNRECOGNIZED_REPLY = '❓ Evento non riconosciuto. Scrivi titolo, data e ora (es. "Riunione 13/2/26 h 12").';
export const FAILURE_REPLY = "⚠️ Errore nella creazione dell'evento.";

export interface ProcessorMetrics {
  messagesParsed: Counter<'outcome'>;
  calendarEvents: Counter<'status'>;
}

export interface MessageProcessorDeps {
  inserter: CalendarInserter;
  log: Logger;
  unrecognizedPolicy: UnrecognizedPolicy;
  legacyFormat: boolean;
  metrics?: ProcessorMetrics;
}

export type ProcessResult =
  | { status: 'ignored'; outcome: Exclude<ParseOutcomeKind, 'recognized'> }
  | { status: 'unrecognized'; outcome: Exclude<ParseOutcomeKind, 'recognized'>; reply: string }
  | { status: 'created'; draft: EventDraft; reply: string; link?: string }
  | { status: 'failed'; draft: EventDraft; reply: string };

/**
 * Confirmation text sent back to the chat, e.g.
 *
 *   📅 Evento creato!
 *   • Titolo: Riunione
 *   • Quando: 13/02/2026 12:00 → 13:00
 */
export function formatConfirmation(draft: EventDraft, link?: string): string {
  const lines = [
    '📅 Evento creato!',
    `• Titolo: ${draft.title}`,
    `• Quando: ${formatDateTime(draft.start, 'dd/MM/yyyy HH:mm')} → ${formatDateTime(draft.end, 'HH:mm')}`,
  ];
  if (draft.location) {
    lines.push(`• Luogo: ${draft.location}`);
  }
  if (link) {
    lines.push(`🔗 ${link}`);
  }
  return lines.join('\n');
}

/**
 * Turn one chat message into a calendar event
 * - Parses with the configured grammars
 * - Applies the unrecognized policy (silent or notify)
 * - Inserts the event and builds the confirmation
 * - Never throws: calendar failures become an apology reply
 *
 * @param text - Raw message text
 * @param deps - Calendar inserter, logger and policy
 * @returns What happened, plus the reply to send if any
 */
export async function processMessage(text: string, deps: MessageProcessorDeps): Promise<ProcessResult> {
  const outcome = routeParse(text, { legacyFormat: deps.legacyFormat });
  deps.metrics?.messagesParsed.inc({ outcome: outcome.kind });

  if (outcome.kind !== 'recognized') {
    if (outcome.kind === 'malformed_timestamp') {
      deps.log.warn({ reason: outcome.reason }, 'Message has a date that does not exist');
    } else {
      deps.log.debug({ reason: outcome.reason }, 'Message not recognized as an event');
    }

    if (deps.unrecognizedPolicy === 'notify') {
      return { status: 'unrecognized', outcome: outcome.kind, reply: UNRECOGNIZED_REPLY };
    }
    return { status: 'ignored', outcome: outcome.kind };
  }

  const { draft } = outcome;

  try {
    const created = await deps.inserter.insert(draft);
    const reply = formatConfirmation(draft, created.htmlLink);
    deps.metrics?.calendarEvents.inc({ status: 'created' });
    deps.log.info(
      {
        eventId: created.eventId,
        title: draft.title,
        durationMinutes: minutesBetween(draft.start, draft.end),
      },
      'Event added to calendar'
    );

    return {
      status: 'created',
      draft,
      reply,
      ...(created.htmlLink ? { link: created.htmlLink } : {}),
    };
  } catch (error) {
    deps.metrics?.calendarEvents.inc({ status: 'failed' });
    deps.log.error({ err: error, title: draft.title }, 'Error adding calendar event');
    return { status: 'failed', draft, reply: FAILURE_REPLY };
  }
}
