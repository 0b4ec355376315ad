/**
 * Application factory.
 *
 * Builds a fully wired Fastify instance without listening, so tests can
 * drive it through inject().
 */

import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import type { AppConfig } from './config.js';
import { requestIdPlugin } from './plugins/request-id.js';
import { healthRoutes } from './routes/health.routes.js';
import { riskAssessmentRoutes } from './routes/risk-assessment.routes.js';
import { fail } from './utils/reply.js';

export interface BuildAppOptions {
  /** Override the pino logger settings (tests pass false). */
  logger?: FastifyServerOptions['logger'];
}

function loggerOptions(config: AppConfig): FastifyServerOptions['logger'] {
  return {
    level: config.logLevel,
    transport: config.nodeEnv === 'development'
      ? { target: 'pino-pretty', options: { colorize: true } }
      : undefined,
  };
}

export async function buildApp(config: AppConfig, options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: options.logger ?? loggerOptions(config),
  });

  await fastify.register(cors, {
    origin: config.corsOrigin,
    credentials: true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-Request-Id'],
    exposedHeaders: ['X-Request-Id'],
  });

  requestIdPlugin(fastify);

  // Consistent error envelope, no stack traces
  fastify.setErrorHandler((error, request, reply) => {
    if (error.validation) {
      return fail(reply, 'VALIDATION_ERROR', error.message, 400);
    }
    const statusCode = error.statusCode ?? 500;
    if (statusCode < 500) {
      // Malformed JSON, unsupported content type, oversized body
      request.log.warn({ code: error.code, statusCode }, 'Rejected request');
      return fail(reply, 'INVALID_REQUEST', error.message, statusCode);
    }
    request.log.error({ err: error }, 'Unhandled error');
    return fail(reply, 'INTERNAL_ERROR', 'Internal server error', statusCode);
  });

  fastify.setNotFoundHandler((request, reply) =>
    fail(reply, 'NOT_FOUND', `Route ${request.method} ${request.url} not found`, 404));

  await fastify.register(healthRoutes, { prefix: '/api' });
  await fastify.register(riskAssessmentRoutes, { prefix: '/api' });

  return fastify;
}
