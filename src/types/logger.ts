// src/types/logger.ts
import type { FastifyBaseLogger } from 'fastify';

/**
 * Subset of the Fastify (pino) logger handed to collaborators outside a request
 */
export type Logger = Pick<FastifyBaseLogger, 'debug' | 'info' | 'warn' | 'error'>;
