/**
 * Contract Route Adapter
 *
 * Registers Fastify routes from contract definitions with automatic:
 * - params/query/body validation (Zod, before handler)
 * - response validation (Zod, after handler, before send)
 * - standardized error envelope for validation failures
 *
 * Handlers receive the parsed values typed from the route's own schemas.
 */

import type { FastifyInstance, FastifyRequest, FastifyReply, preHandlerHookHandler } from 'fastify';
import type { ContractRoute } from '@mortgage-risk/contract';
import type { z } from 'zod';
import { fail } from '../utils/reply.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

type Parsed<S> = S extends z.ZodTypeAny ? z.output<S> : undefined;

/** Parsed and validated contract data attached to the request. */
export interface ContractData<R extends ContractRoute> {
  params: Parsed<R['params']>;
  query: Parsed<R['query']>;
  body: Parsed<R['body']>;
}

export type ContractRequest<R extends ContractRoute> = FastifyRequest & { contractData: ContractData<R> };

export type ContractHandler<R extends ContractRoute> = (
  request: ContractRequest<R>,
  reply: FastifyReply,
) => Promise<FastifyReply | void>;

export interface ContractRouteOptions<R extends ContractRoute> {
  /** Fastify preHandler hooks */
  preHandler?: preHandlerHookHandler | preHandlerHookHandler[];
  handler: ContractHandler<R>;
  /** Status code for void responses (default 204). */
  successStatus?: number;
}

// ---------------------------------------------------------------------------
// Path conversion
// ---------------------------------------------------------------------------

/**
 * Contract paths are absolute (e.g. /assess-risk). Fastify routes are
 * relative to the prefix they are registered under.
 */
function contractPathToFastify(contractPath: string, prefix: string): string {
  if (prefix && contractPath.startsWith(prefix)) {
    const relative = contractPath.slice(prefix.length);
    return relative || '/';
  }
  return contractPath;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function parseSection(
  schema: z.ZodTypeAny | undefined,
  value: unknown,
): z.SafeParseReturnType<unknown, z.output<z.ZodTypeAny>> {
  if (!schema) {
    return { success: true, data: undefined };
  }
  return schema.safeParse(value);
}

/**
 * Validate the unwrapped payload (inside { data }) against the contract
 * response schema. Failures are logged with field paths only.
 */
function isValidResponse(
  responseSchema: z.ZodTypeAny | 'void',
  payload: unknown,
  request: FastifyRequest,
): boolean {
  if (responseSchema === 'void') {
    return true;
  }

  const result = responseSchema.safeParse(payload);
  if (result.success) {
    return true;
  }

  request.log.error({
    code: 'SERVER_RESPONSE_INVALID',
    method: request.method,
    url: request.url,
    issues: result.error.issues.map(i => ({
      path: i.path,
      code: i.code,
      message: i.message,
    })),
  }, 'Response failed contract validation');

  return false;
}

// ---------------------------------------------------------------------------
// Registration
// ---------------------------------------------------------------------------

/**
 * Register a single contract-authoritative route on a Fastify instance.
 *
 * @param prefix - Part of the contract path already supplied by the
 *                 register() prefix; '' when the contract path is used as-is.
 */
export function registerContractRoute<R extends ContractRoute>(
  fastify: FastifyInstance,
  route: R,
  prefix: string,
  options: ContractRouteOptions<R>,
): void {
  const { preHandler, handler, successStatus } = options;

  fastify.route({
    method: route.method,
    url: contractPathToFastify(route.path, prefix),
    preHandler: preHandler ?? [],
    handler: async (request: FastifyRequest, reply: FastifyReply) => {
      const params = parseSection(route.params, request.params);
      if (!params.success) {
        return fail(reply, 'INVALID_REQUEST', 'Invalid path parameters', 400, params.error.flatten());
      }

      const query = parseSection(route.query, request.query);
      if (!query.success) {
        return fail(reply, 'INVALID_REQUEST', 'Invalid query parameters', 400, query.error.flatten());
      }

      const body = parseSection(route.body, request.body);
      if (!body.success) {
        return fail(reply, 'VALIDATION_ERROR', 'Validation error', 400, body.error.flatten());
      }

      const contractData: ContractData<R> = {
        params: params.data,
        query: query.data,
        body: body.data,
      };
      const contractRequest = Object.assign(request, { contractData });

      // ── Intercept response for validation ──
      if (route.response !== 'void') {
        const originalSend = reply.send.bind(reply);
        reply.send = function interceptedSend(payload: unknown): FastifyReply {
          // Only success responses carrying { data } are checked
          const statusCode = reply.statusCode || 200;
          if (statusCode < 400 && payload && typeof payload === 'object' && 'data' in payload) {
            if (!isValidResponse(route.response, payload.data, request)) {
              reply.statusCode = 500;
              return originalSend({
                error: {
                  code: 'SERVER_RESPONSE_INVALID',
                  message: 'Response validation failed',
                  requestId: request.requestId,
                },
              });
            }
          }
          return originalSend(payload);
        } as typeof reply.send;
      }

      const result = await handler(contractRequest, reply);

      if (route.response === 'void' && !reply.sent) {
        return reply.status(successStatus ?? 204).send();
      }

      return result;
    },
  });
}
