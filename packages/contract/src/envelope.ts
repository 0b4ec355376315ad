/**
 * Standard API envelopes.
 *
 *   Success: { data: <payload> }
 *   Error:   { error: { code, message, details?, requestId? } }
 */

import { z } from 'zod';

/** Wrap a payload schema in `{ data: T }`. */
export function DataEnvelope<T extends z.ZodTypeAny>(schema: T) {
  return z.object({ data: schema });
}

export const ErrorEnvelope = z.object({
  error: z.object({
    code: z.string(),
    message: z.string(),
    details: z.unknown().optional(),
    requestId: z.string().optional(),
  }),
});
export type ErrorEnvelope = z.infer<typeof ErrorEnvelope>;
