// src/plugins/metrics.ts
import type { FastifyInstance } from 'fastify';
import fp from 'fastify-plugin';
import { register, collectDefaultMetrics, Counter, Histogram } from 'prom-client';
import type { ProcessorMetrics } from '../services/messageProcessor.js';

declare module 'fastify' {
  interface FastifyInstance {
    metrics: ProcessorMetrics;
  }
}

const PREFIX = 'chat_calendar_';

/**
 * Metrics Plugin
 * Exposes Prometheus metrics at /metrics endpoint
 * Includes default Node.js metrics, HTTP timings and message outcomes
 */
async function metricsPlugin(fastify: FastifyInstance) {
  collectDefaultMetrics({
    register,
    prefix: PREFIX,
  });

  const httpRequestDuration = new Histogram({
    name: `${PREFIX}http_request_duration_seconds`,
    help: 'HTTP request duration in seconds',
    labelNames: ['method', 'route', 'status_code'],
    registers: [register],
  });

  const httpRequestsTotal = new Counter({
    name: `${PREFIX}http_requests_total`,
    help: 'Total number of HTTP requests',
    labelNames: ['method', 'route', 'status_code'],
    registers: [register],
  });

  const messagesParsed = new Counter({
    name: `${PREFIX}messages_parsed_total`,
    help: 'Chat messages run through the event parser, by outcome',
    labelNames: ['outcome'] as const,
    registers: [register],
  });

  const calendarEvents = new Counter({
    name: `${PREFIX}calendar_events_total`,
    help: 'Calendar insert attempts, by status',
    labelNames: ['status'] as const,
    registers: [register],
  });

  fastify.addHook('onResponse', async (request, reply) => {
    const labels = {
      method: request.method,
      route: request.routeOptions.url || request.url,
      status_code: reply.statusCode.toString(),
    };

    httpRequestDuration.observe(labels, reply.elapsedTime / 1000);
    httpRequestsTotal.inc(labels);
  });

  fastify.get('/metrics', async (_request, reply) => {
    reply.header('Content-Type', register.contentType);
    return register.metrics();
  });

  // Shared with the Telegram bot and the webhook routes
  fastify.decorate('metrics', {
    messagesParsed,
    calendarEvents,
  });

  fastify.log.info('Metrics plugin registered - /metrics endpoint available');
}

export default fp(metricsPlugin, {
  name: 'metrics-plugin',
});
