// src/routes/whatsappRoutes.ts

import { createHmac, timingSafeEqual } from 'node:crypto';
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { processMessage, type MessageProcessorDeps } from '../services/messageProcessor.js';
import type { ChatNotifier } from '../utils/telegramNotifier.js';
import { extractWhatsAppText } from '../utils/whatsappExtractor.js';

export interface WhatsAppRoutesOptions {
  verifyToken: string;
  appSecret: string; // Empty disables signature checks
  prefix: string;
  notifier: ChatNotifier;
  // Set to run extracted messages through the event parser as well
  processor?: Omit<MessageProcessorDeps, 'log' | 'metrics'>;
}

/**
 * Query string of Meta's verification handshake
 */
const VerifyQuerySchema = z.object({
  'hub.mode': z.string().optional(),
  'hub.verify_token': z.string().optional(),
  'hub.challenge': z.string().optional(),
});

const SIGNATURE_PREFIX = 'sha256=';

/**
 * Check X-Hub-Signature-256 ("sha256=<hex>") against the raw body
 *
 * @param appSecret - Meta app secret; when empty every request passes
 * @param body - Raw request body
 * @param header - Signature header value
 */
export function verifySignature(appSecret: string, body: Buffer, header: string | undefined): boolean {
  if (!appSecret) {
    return true;
  }
  if (!header || !header.startsWith(SIGNATURE_PREFIX)) {
    return false;
  }

  const received = Buffer.from(header.slice(SIGNATURE_PREFIX.length).trim(), 'utf8');
  const expected = Buffer.from(createHmac('sha256', appSecret).update(body).digest('hex'), 'utf8');

  return received.length === expected.length && timingSafeEqual(received, expected);
}

/**
 * Register WhatsApp Cloud API webhook routes
 */
export async function whatsappRoutes(
  fastify: FastifyInstance,
  options: WhatsAppRoutesOptions
): Promise<void> {
  // The signature covers the exact bytes sent, so JSON is parsed by hand
  fastify.removeContentTypeParser('application/json');
  fastify.addContentTypeParser('application/json', { parseAs: 'buffer' }, (_request, body, done) => {
    done(null, body);
  });

  /**
   * GET /webhook
   * Meta verification handshake: echo hub.challenge when the token matches
   */
  fastify.get('/webhook', async (request, reply) => {
    const query = VerifyQuerySchema.safeParse(request.query);
    const params: z.infer<typeof VerifyQuerySchema> = query.success ? query.data : {};
    const challenge = params['hub.challenge'];

    if (
      params['hub.mode'] === 'subscribe' &&
      params['hub.verify_token'] === options.verifyToken &&
      challenge
    ) {
      return reply.code(200).type('text/plain').send(challenge);
    }

    fastify.log.warn({ mode: params['hub.mode'] }, 'Webhook verification rejected');
    return reply.code(403).type('text/plain').send('Forbidden');
  });

  /**
   * POST /webhook
   * Incoming WhatsApp messages, forwarded to Telegram
   */
  fastify.post('/webhook', async (request, reply) => {
    const rawBody = Buffer.isBuffer(request.body) ? request.body : Buffer.alloc(0);
    const signature = request.headers['x-hub-signature-256'];

    if (!verifySignature(options.appSecret, rawBody, typeof signature === 'string' ? signature : undefined)) {
      fastify.log.warn({ signature: signature ? '[redacted]' : 'none' }, 'Invalid webhook signature');
      return reply.code(403).type('text/plain').send('Invalid signature');
    }

    let payload: unknown;
    try {
      payload = JSON.parse(rawBody.toString('utf8'));
    } catch (error) {
      fastify.log.warn({ err: error }, 'Webhook body is not valid JSON');
      return reply.code(400).type('text/plain').send('Bad Request');
    }

    const extracted = extractWhatsAppText(payload, options.prefix);
    fastify.log.info({ kind: extracted.kind }, 'WhatsApp webhook received');

    await options.notifier.send(extracted.text);

    if (options.processor && extracted.kind === 'message') {
      const result = await processMessage(extracted.message.body, {
        ...options.processor,
        log: fastify.log,
        metrics: fastify.hasDecorator('metrics') ? fastify.metrics : undefined,
      });
      if (result.status !== 'ignored') {
        await options.notifier.send(result.reply);
      }
    }

    // Always acknowledge so Meta does not redeliver
    return reply.code(200).send({ status: 'ok' });
  });
}
