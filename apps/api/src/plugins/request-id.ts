/**
 * Request ID Plugin
 *
 * Assigns a correlation ID to every request:
 * - Accepts inbound X-Request-Id header (up to 128 chars)
 * - Generates a UUID if none provided
 * - Binds requestId to the pino logger
 * - Returns X-Request-Id header on every response
 *
 * Hooks only reach routes in the same encapsulation context, so apply it
 * to the root instance directly rather than through register().
 */

import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { randomUUID } from 'node:crypto';

declare module 'fastify' {
  interface FastifyRequest {
    requestId: string;
  }
}

export const MAX_REQUEST_ID_LENGTH = 128;

export function resolveRequestId(inbound: string | string[] | undefined): string {
  if (typeof inbound === 'string' && inbound.length > 0 && inbound.length <= MAX_REQUEST_ID_LENGTH) {
    return inbound;
  }
  return randomUUID();
}

export function requestIdPlugin(fastify: FastifyInstance): void {
  fastify.decorateRequest('requestId', '');

  fastify.addHook('onRequest', (request: FastifyRequest, _reply: FastifyReply, done) => {
    request.requestId = resolveRequestId(request.headers['x-request-id']);
    request.log = request.log.child({ requestId: request.requestId });
    done();
  });

  fastify.addHook('onSend', (request: FastifyRequest, reply: FastifyReply, payload: unknown, done) => {
    reply.header('X-Request-Id', request.requestId);
    done(null, payload);
  });
}
