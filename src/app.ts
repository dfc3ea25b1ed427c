// src/app.ts
import Fastify, { type FastifyInstance } from 'fastify';
import { loadConfig, type EnvConfig } from './config/env.js';
import metricsPlugin from './plugins/metrics.js';
import { whatsappRoutes } from './routes/whatsappRoutes.js';
import { createTelegramBot } from './bot/telegramBot.js';
import {
  createServiceAccountAuth,
  GoogleCalendarInserter,
  type CalendarInserter,
} from './utils/calendarIntegration.js';
import { TelegramNotifier, type ChatNotifier } from './utils/telegramNotifier.js';
import type { Logger } from './types/logger.js';

export interface AppOptions {
  config: EnvConfig;
  inserter?: CalendarInserter;
  notifier?: ChatNotifier;
}

function loggerOptions(config: EnvConfig) {
  if (config.NODE_ENV === 'test') {
    return false;
  }
  if (config.NODE_ENV === 'development') {
    return {
      level: config.LOG_LEVEL,
      transport: {
        target: 'pino-pretty',
        options: {
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      },
    };
  }
  return { level: config.LOG_LEVEL };
}

/**
 * Calendar inserter for the configured calendar and service account
 */
export function createInserter(config: EnvConfig): CalendarInserter {
  return new GoogleCalendarInserter(
    {
      calendarId: config.GOOGLE_CALENDAR_ID,
      timeZone: config.TIMEZONE,
      titlePrefix: config.EVENT_TITLE_PREFIX,
    },
    createServiceAccountAuth(config.GOOGLE_SERVICE_ACCOUNT_FILE)
  );
}

/**
 * Telegram forwarding target for WhatsApp messages; warns when it is not set up
 */
export function createNotifier(config: EnvConfig, log: Logger): ChatNotifier {
  const notifier = new TelegramNotifier(
    { token: config.TELEGRAM_BOT_TOKEN, chatId: config.TELEGRAM_CHAT_ID },
    log
  );
  if (!notifier.configured) {
    log.warn('TELEGRAM_BOT_TOKEN or TELEGRAM_CHAT_ID not set, WhatsApp messages will not be forwarded');
  }
  return notifier;
}

/**
 * Build and configure Fastify application
 *
 * @returns Configured Fastify instance
 */
export async function buildApp(options: AppOptions): Promise<FastifyInstance> {
  const { config } = options;
  const fastify = Fastify({ logger: loggerOptions(config) });

  const inserter = options.inserter ?? createInserter(config);
  const notifier = options.notifier ?? createNotifier(config, fastify.log);

  fastify.get('/', async () => {
    return { ok: true };
  });

  fastify.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  await fastify.register(metricsPlugin);

  await fastify.register(whatsappRoutes, {
    verifyToken: config.WHATSAPP_VERIFY_TOKEN,
    appSecret: config.META_APP_SECRET,
    prefix: config.TG_PREFIX,
    notifier,
    processor: config.WHATSAPP_CREATE_EVENTS
      ? {
          inserter,
          unrecognizedPolicy: config.UNRECOGNIZED_POLICY,
          legacyFormat: config.LEGACY_FORMAT,
        }
      : undefined,
  });

  return fastify;
}

/**
 * Start the HTTP server and, when a token is configured, the Telegram bot
 */
async function start() {
  try {
    const config = loadConfig();
    const fastify = await buildApp({ config });

    await fastify.listen({ port: config.PORT, host: config.HOST });
    fastify.log.info(`Server listening on ${config.HOST}:${config.PORT}`);

    if (!config.TELEGRAM_BOT_TOKEN) {
      fastify.log.warn('TELEGRAM_BOT_TOKEN not set, Telegram bot disabled');
      return;
    }

    const bot = createTelegramBot(config.TELEGRAM_BOT_TOKEN, {
      inserter: createInserter(config),
      log: fastify.log,
      unrecognizedPolicy: config.UNRECOGNIZED_POLICY,
      legacyFormat: config.LEGACY_FORMAT,
      metrics: fastify.metrics,
    });

    // launch() settles only when polling stops
    bot
      .launch(() => fastify.log.info('Telegram bot polling for messages'))
      .catch((err: unknown) => {
        fastify.log.error({ err }, 'Telegram bot stopped');
      });

    const shutdown = (signal: string) => {
      bot.stop(signal);
      fastify.close().catch((err: unknown) => {
        fastify.log.error({ err }, 'Error closing server');
      });
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
  } catch (err) {
    console.error('Error starting server:', err);
    process.exit(1);
  }
}

// Start server if this is the main module
if (import.meta.url === `file://${process.argv[1]}`) {
  void start();
}
