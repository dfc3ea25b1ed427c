// src/utils/telegramNotifier.ts
import { Telegram } from 'telegraf';
import type { Logger } from '../types/logger.js';

export type TelegramSender = Pick<Telegram, 'sendMessage'>;

export interface ChatNotifier {
  send(text: string): Promise<boolean>;
}

export interface TelegramNotifierOptions {
  token?: string;
  chatId?: string;
}

/**
 * Best-effort forwarding to one Telegram chat.
 * No retries; a failed send is logged and reported as false, never thrown.
 */
export class TelegramNotifier implements ChatNotifier {
  private readonly sender: TelegramSender | null;
  private readonly chatId: string | null;

  constructor(
    options: TelegramNotifierOptions,
    private readonly log: Logger,
    sender?: TelegramSender
  ) {
    this.chatId = options.chatId || null;
    this.sender = sender ?? (options.token ? new Telegram(options.token) : null);
  }

  get configured(): boolean {
    return this.sender !== null && this.chatId !== null;
  }

  async send(text: string): Promise<boolean> {
    if (!this.sender || !this.chatId) {
      this.log.debug('Telegram forwarding not configured, skipping');
      return false;
    }

    try {
      await this.sender.sendMessage(this.chatId, text, {
        link_preview_options: { is_disabled: true },
      });
      return true;
    } catch (error) {
      this.log.error({ err: error, chatId: this.chatId }, 'Failed to forward message to Telegram');
      return false;
    }
  }
}
