/**
 * Health check route contract.
 */

import { z } from 'zod';
import { defineRoute } from '../define-route.js';

export const HealthApiSchema = z.object({
  status: z.literal('ok'),
  timestamp: z.string(),
});
export type HealthApi = z.infer<typeof HealthApiSchema>;

export const healthRoutes = {
  check: defineRoute({
    method: 'GET' as const,
    path: '/health',
    summary: 'Liveness probe',
    response: HealthApiSchema,
  }),
};
