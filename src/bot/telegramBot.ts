// src/bot/telegramBot.ts
import { Telegraf } from 'telegraf';
import { message } from 'telegraf/filters';
import { processMessage, type MessageProcessorDeps } from '../services/messageProcessor.js';

export const USAGE_TEXT =
  'Inviami un evento su più righe:\n\n' +
  'Nobili avv frattasi\n' +
  'Carlomagno\n' +
  '13/2/26 h 12\n\n' +
  '• Riga 1: titolo\n' +
  '• Riga 2: luogo (una parola, facoltativo)\n' +
  '• Data e ora ovunque: 13/2/26, 18.09.2026, h 12, ore 14.30, 12:00';

/**
 * Handle one text message and send the reply, if the processor produced one
 *
 * @param text - Message text
 * @param reply - Sends a message back to the same chat
 * @param deps - Processor dependencies
 */
export async function replyToText(
  text: string,
  reply: (text: string) => Promise<unknown>,
  deps: MessageProcessorDeps
): Promise<void> {
  if (text.startsWith('/')) {
    return;
  }

  const result = await processMessage(text, deps);
  if (result.status !== 'ignored') {
    await reply(result.reply);
  }
}

/**
 * Create the polling bot. Call launch() on the result to start it.
 *
 * @param token - Bot token from BotFather
 * @param deps - Processor dependencies
 */
export function createTelegramBot(token: string, deps: MessageProcessorDeps): Telegraf {
  const bot = new Telegraf(token);

  bot.start((ctx) => ctx.reply(USAGE_TEXT));

  bot.on(message('text'), (ctx) =>
    replyToText(ctx.message.text, (text) => ctx.reply(text), deps)
  );

  bot.catch((err, ctx) => {
    deps.log.error({ err, updateId: ctx.update.update_id }, 'Telegram bot error');
  });

  return bot;
}
