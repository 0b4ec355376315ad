/**
 * Contract route definition helper.
 *
 * A route is a plain object: HTTP method, path, zod schemas for
 * params/query/body/response, and the documented error statuses.
 */

import type { z } from 'zod';

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'PUT' | 'DELETE';

export interface ContractRoute {
  method: HttpMethod;
  path: string;
  summary?: string;
  params?: z.ZodTypeAny;
  query?: z.ZodTypeAny;
  body?: z.ZodTypeAny;
  /** Schema for the unwrapped payload (inside { data }), or 'void' for 204. */
  response: z.ZodTypeAny | 'void';
  /** Error statuses the route can answer with, keyed by status code. */
  errors?: Readonly<Record<number, string>>;
}

/**
 * Identity helper that type-checks a route definition and keeps its
 * literal types.
 */
export function defineRoute<T extends ContractRoute>(def: T): T {
  return def;
}
