/**
 * OpenAPI 3.1 document generator.
 *
 * Walks the contract registry and produces an OpenAPI document
 * using @asteasolutions/zod-to-openapi.
 */

import {
  OpenAPIRegistry,
  OpenApiGeneratorV31,
  extendZodWithOpenApi,
  type ResponseConfig,
} from '@asteasolutions/zod-to-openapi';
import { z } from 'zod';
import { contract } from '../routes/index.js';
import type { ContractRoute, HttpMethod } from '../define-route.js';
import { DataEnvelope, ErrorEnvelope } from '../envelope.js';

// Extend Zod with .openapi() method
extendZodWithOpenApi(z);

const API_PREFIX = '/api';

const OPENAPI_METHODS = {
  GET: 'get',
  POST: 'post',
  PATCH: 'patch',
  PUT: 'put',
  DELETE: 'delete',
} as const satisfies Record<HttpMethod, string>;

/**
 * Convert a contract route path like `/cases/:caseId` to OpenAPI `/cases/{caseId}`.
 */
function toOpenApiPath(path: string): string {
  return path.replace(/:([a-zA-Z0-9_]+)/g, '{$1}');
}

function buildResponses(route: ContractRoute): Record<string, ResponseConfig> {
  const responses: Record<string, ResponseConfig> = {};

  if (route.response === 'void') {
    responses['204'] = { description: 'No content' };
  } else {
    responses['200'] = {
      description: 'Successful response',
      content: { 'application/json': { schema: DataEnvelope(route.response) } },
    };
  }

  for (const [status, description] of Object.entries(route.errors ?? {})) {
    responses[status] = {
      description,
      content: { 'application/json': { schema: ErrorEnvelope } },
    };
  }

  return responses;
}

function asZodObject(schema: z.ZodTypeAny | undefined) {
  return schema instanceof z.ZodObject ? schema : undefined;
}

/**
 * Generate an OpenAPI 3.1 document from the contract registry.
 */
export function generateOpenApiDocument() {
  const registry = new OpenAPIRegistry();

  for (const [groupName, routes] of Object.entries(contract)) {
    for (const [routeName, route] of Object.entries<ContractRoute>(routes)) {
      registry.registerPath({
        method: OPENAPI_METHODS[route.method],
        path: toOpenApiPath(API_PREFIX + route.path),
        operationId: `${groupName}.${routeName}`,
        summary: route.summary,
        request: {
          params: asZodObject(route.params),
          query: asZodObject(route.query),
          body: route.body
            ? { content: { 'application/json': { schema: route.body } }, required: true }
            : undefined,
        },
        responses: buildResponses(route),
      });
    }
  }

  const generator = new OpenApiGeneratorV31(registry.definitions);
  return generator.generateDocument({
    openapi: '3.1.0',
    info: {
      title: 'Mortgage Buyer Risk API',
      version: '1.0.0',
      description: 'Auto-generated from @mortgage-risk/contract route definitions.',
    },
    servers: [
      { url: 'http://localhost:3001', description: 'Local development' },
    ],
  });
}
