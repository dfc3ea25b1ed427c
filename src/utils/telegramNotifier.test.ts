// src/utils/telegramNotifier.test.ts
import { describe, it, expect, beforeEach, vi } from 'vitest';
import { TelegramNotifier } from './telegramNotifier.js';

describe('TelegramNotifier', () => {
  const mockSendMessage = vi.fn();
  const log = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('sends to the configured chat without link previews', async () => {
    mockSendMessage.mockResolvedValue({ message_id: 1 });
    const notifier = new TelegramNotifier({ chatId: '@agenda' }, log, { sendMessage: mockSendMessage });

    await expect(notifier.send('ciao')).resolves.toBe(true);
    expect(mockSendMessage).toHaveBeenCalledWith('@agenda', 'ciao', {
      link_preview_options: { is_disabled: true },
    });
  });

  it('does nothing without a chat id', async () => {
    const notifier = new TelegramNotifier({ token: 'test-token' }, log, { sendMessage: mockSendMessage });

    expect(notifier.configured).toBe(false);
    await expect(notifier.send('ciao')).resolves.toBe(false);
    expect(mockSendMessage).not.toHaveBeenCalled();
  });

  it('does nothing without a token', async () => {
    const notifier = new TelegramNotifier({ chatId: '12345' }, log);

    expect(notifier.configured).toBe(false);
    await expect(notifier.send('ciao')).resolves.toBe(false);
  });

  it('logs and swallows send failures', async () => {
    const failure = new Error('429: Too Many Requests');
    mockSendMessage.mockRejectedValue(failure);
    const notifier = new TelegramNotifier({ chatId: '12345' }, log, { sendMessage: mockSendMessage });

    await expect(notifier.send('ciao')).resolves.toBe(false);
    expect(log.error).toHaveBeenCalledWith(
      { err: failure, chatId: '12345' },
      'Failed to forward message to Telegram'
    );
  });
});
