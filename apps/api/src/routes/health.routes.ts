import type { FastifyInstance } from 'fastify';
import { healthRoutes as healthContract } from '@mortgage-risk/contract';
import { registerContractRoute } from '../lib/contract-route.js';
import { ok } from '../utils/reply.js';

export async function healthRoutes(fastify: FastifyInstance): Promise<void> {
  registerContractRoute(fastify, healthContract.check, '', {
    handler: async (_request, reply) => ok(reply, { status: 'ok' as const, timestamp: new Date().toISOString() }),
  });
}
