import { z } from 'zod';
import { config } from 'dotenv';
import { existsSync } from 'fs';
import { join } from 'path';

/**
 * Load environment variables from the appropriate .env file based on NODE_ENV.
 * Priority: .env.{NODE_ENV}.local > .env.{NODE_ENV} > .env.local > .env
 *
 * Since dotenv doesn't override by default, we load highest priority first.
 * The first value set for each variable wins.
 */
function loadEnvFile(): void {
  const nodeEnv = process.env.NODE_ENV || 'development';
  const cwd = process.cwd();

  const envFiles = [
    `.env.${nodeEnv}.local`,
    `.env.${nodeEnv}`,
    '.env.local',
    '.env',
  ];

  for (const file of envFiles) {
    const filePath = join(cwd, file);
    if (existsSync(filePath)) {
      config({ path: filePath });
    }
  }
}

// Load env files before schema validation
loadEnvFile();

const booleanFlag = (fallback: 'true' | 'false') =>
  z
    .enum(['true', 'false', '1', '0'])
    .default(fallback)
    .transform((value) => value === 'true' || value === '1');

/**
 * Environment variable schema using Zod.
 * Validates all env vars at startup to fail fast.
 */
export const envSchema = z.object({
  // Server Configuration
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.string().default('3000').transform(Number),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // Telegram (bot polling and webhook forwarding)
  TELEGRAM_BOT_TOKEN: z.string().optional(),
  TELEGRAM_CHAT_ID: z.string().optional(), // Numeric id or @channelusername
  TG_PREFIX: z.string().default('📩 WA →'),

  // Google Calendar (service account)
  GOOGLE_CALENDAR_ID: z.string().optional(),
  GOOGLE_SERVICE_ACCOUNT_FILE: z.string().default('service-account.json'),
  TIMEZONE: z.string().min(1).default('Europe/Rome'),
  EVENT_TITLE_PREFIX: z.string().default('🤖 '),

  // Message handling
  UNRECOGNIZED_POLICY: z.enum(['silent', 'notify']).default('silent'),
  LEGACY_FORMAT: booleanFlag('true'),

  // WhatsApp Cloud API webhook
  WHATSAPP_VERIFY_TOKEN: z.string().default(''),
  META_APP_SECRET: z.string().default(''), // Empty disables signature checks
  WHATSAPP_CREATE_EVENTS: booleanFlag('false'),
});

export type EnvConfig = z.infer<typeof envSchema>;

export type UnrecognizedPolicy = EnvConfig['UNRECOGNIZED_POLICY'];

/**
 * Validate an environment source into typed configuration
 *
 * @param source - Variables to read (defaults to process.env)
 * @returns Parsed configuration
 * @throws ZodError listing every invalid variable
 */
export function loadConfig(source: Record<string, string | undefined> = process.env): EnvConfig {
  return envSchema.parse(source);
}
