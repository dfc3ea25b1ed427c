// src/utils/whatsappExtractor.ts
import { z } from 'zod';

/**
 * Meta WhatsApp Cloud API webhook payload.
 * Only the fields we read are declared; everything else passes through so
 * media and unknown message types can be dumped as JSON.
 */
const ReplySchema = z.object({ title: z.string().nullish() }).passthrough();

const WhatsAppMessageSchema = z
  .object({
    type: z.string().nullish(),
    from: z.string().nullish(),
    text: z.object({ body: z.string().nullish() }).passthrough().nullish(),
    button: z.object({ text: z.string().nullish() }).passthrough().nullish(),
    interactive: z
      .object({
        type: z.string().nullish(),
        button_reply: ReplySchema.nullish(),
        list_reply: ReplySchema.nullish(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();

const WhatsAppContactSchema = z
  .object({
    wa_id: z.string().nullish(),
    profile: z.object({ name: z.string().nullish() }).passthrough().nullish(),
  })
  .passthrough();

export const WhatsAppWebhookSchema = z
  .object({
    entry: z
      .array(
        z
          .object({
            changes: z
              .array(
                z
                  .object({
                    value: z
                      .object({
                        messages: z.array(WhatsAppMessageSchema).nullish(),
                        contacts: z.array(WhatsAppContactSchema).nullish(),
                      })
                      .passthrough()
                      .nullish(),
                  })
                  .passthrough()
              )
              .nullish(),
          })
          .passthrough()
      )
      .nullish(),
  })
  .passthrough();

export type WhatsAppMessage = z.infer<typeof WhatsAppMessageSchema>;

export interface ExtractedMessage {
  sender: string;
  body: string;
}

export type ExtractionResult =
  | { kind: 'message'; message: ExtractedMessage; text: string }
  | { kind: 'unparsed'; text: string }
  | { kind: 'parse_error'; text: string };

function safeJson(value: unknown): string {
  try {
    return JSON.stringify(value, null, 2) ?? String(value);
  } catch {
    return String(value);
  }
}

/**
 * Human-readable body of one message, by message type
 */
export function messageBody(message: WhatsAppMessage): string {
  const type = message.type ?? '';

  switch (type) {
    case 'text':
      return message.text?.body ?? '';
    case 'button':
      return message.button?.text ?? '';
    case 'interactive': {
      const interactive = message.interactive;
      if (interactive?.type === 'button_reply') return interactive.button_reply?.title ?? '';
      if (interactive?.type === 'list_reply') return interactive.list_reply?.title ?? '';
      return safeJson(interactive ?? {});
    }
    default:
      // Media, location, contacts, ...
      return `[${type}] ${safeJson(message[type] ?? message)}`;
  }
}

/**
 * Pull the first message with a non-blank body out of a webhook payload
 *
 * @param payload - Parsed JSON body
 * @param prefix - Label prepended to the forwarded text
 * @returns The message and the text to forward, or a JSON dump when nothing was found
 */
export function extractWhatsAppText(payload: unknown, prefix: string): ExtractionResult {
  const parsed = WhatsAppWebhookSchema.safeParse(payload);
  if (!parsed.success) {
    return { kind: 'parse_error', text: `${prefix} (parse-error)\n\n${safeJson(payload)}` };
  }

  for (const entry of parsed.data.entry ?? []) {
    for (const change of entry.changes ?? []) {
      const value = change.value;
      const contact = value?.contacts?.[0];
      const waId = contact?.wa_id ?? '';
      const contactName = contact?.profile?.name ?? '';

      for (const message of value?.messages ?? []) {
        const from = message.from || waId;
        const body = messageBody(message).trim();
        if (!body) continue;

        const sender = contactName || from || 'unknown';
        return {
          kind: 'message',
          message: { sender, body },
          text: `${prefix} ${sender}\n\n${body}`,
        };
      }
    }
  }

  return { kind: 'unparsed', text: `${prefix} (unparsed)\n\n${safeJson(payload)}` };
}
