/**
 * Standardized API Reply Helpers
 *
 * All API responses use a consistent envelope:
 *   Success: { data: <payload> }
 *   Error:   { error: { code, message, details?, requestId? } }
 *
 * Usage:
 *   return ok(reply, { status: 'ok' });
 *   return fail(reply, 'VALIDATION_ERROR', 'Validation error', 400, zodErrors);
 */

import type { FastifyReply } from 'fastify';

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'INVALID_REQUEST'
  | 'INVALID_INPUT_ZERO_PRICE'
  | 'ASSESSMENT_FAILED'
  | 'NOT_FOUND'
  | 'SERVER_RESPONSE_INVALID'
  | 'INTERNAL_ERROR';

interface ErrorBody {
  error: { code: ErrorCode; message: string; details?: unknown; requestId?: string };
}

/**
 * Send a success response wrapped in { data }.
 */
export function ok<T>(reply: FastifyReply, data: T, statusCode = 200): FastifyReply {
  return reply.status(statusCode).send({ data });
}

/**
 * Send an error response wrapped in { error }. The correlation ID is
 * included whenever the request carries one.
 */
export function fail(
  reply: FastifyReply,
  code: ErrorCode,
  message: string,
  statusCode = 400,
  details?: unknown,
): FastifyReply {
  const body: ErrorBody = { error: { code, message } };
  if (details !== undefined) {
    body.error.details = details;
  }
  const requestId = reply.request.requestId;
  if (requestId) {
    body.error.requestId = requestId;
  }
  return reply.status(statusCode).send(body);
}
