/**
 * Risk Assessment API Tests
 *
 * Drives the full app through inject():
 * 1. Successful assessments and the response envelope
 * 2. Boundary validation (wrong types rejected before the engine runs)
 * 3. Engine failures surfaced as structured 422 errors
 * 4. CORS preflight, request IDs, health, not-found
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '../src/app.js';
import { loadConfig } from '../src/config.js';
import { cleanOwnerBody, sampleApplicationBody } from './fixtures/buyer-data.js';

let app: FastifyInstance;

beforeAll(async () => {
  app = await buildApp(loadConfig({ NODE_ENV: 'test' }), { logger: false });
  await app.ready();
});

afterAll(async () => {
  await app.close();
});

function assess(payload: unknown, headers: Record<string, string> = {}) {
  return app.inject({ method: 'POST', url: '/api/assess-risk', payload: JSON.stringify(payload), headers: { 'content-type': 'application/json', ...headers } });
}

// ---------------------------------------------------------------------------
// 1. Successful assessments
// ---------------------------------------------------------------------------

describe('POST /api/assess-risk: success', () => {
  it('assesses a clean owner as Low', async () => {
    const res = await assess(cleanOwnerBody());
    expect(res.statusCode).toBe(200);

    const body = res.json();
    expect(body.data.success).toBe(true);
    expect(body.data.risk_assessment).toEqual({
      risk_level: 'Low',
      suggested_actions: ['Verify property ownership and equity'],
      risk_factors: [
        'Existing property owner',
        'Home value to price ratio: 80.0%',
        'Deposit:20.0',
      ],
      reasons: [],
    });
    expect(body.data.debug.assessment_result).toEqual(body.data.risk_assessment);
  });

  it('echoes the validated input with defaults filled', async () => {
    const res = await assess(cleanOwnerBody());
    const input = res.json().data.debug.input_data;
    expect(input.PURCHASER_NAME_FROM_APS).toBe('John Smith');
    expect(input.PURCHASER_ID_ISSUE_DATE).toBe('');
    expect(input.CO_SIGNER_LIST_FROM_APS).toEqual([]);
  });

  it('assesses a complete application with third-party deposit as Very High', async () => {
    const res = await assess(sampleApplicationBody());
    expect(res.statusCode).toBe(200);
    expect(res.json().data.risk_assessment).toEqual({
      risk_level: 'Very High',
      suggested_actions: ['Verify property ownership and equity'],
      risk_factors: [
        'Existing property owner',
        'Home value to price ratio: 93.8%',
        'Deposit:25.0',
      ],
      reasons: [
        'Missing co-owner on APS',
        'Name mismatch between APS and HOUSESIGMA',
        'Name mismatch between ID and HOUSESIGMA',
        'Address mismatch APS and LAND REGISTRY',
        'Deposit paid by others',
        'Multiple mortgage parties',
      ],
    });
  });

  it('reports a first-time buyer', async () => {
    const res = await assess({
      PURCHASER_NAME_FROM_APS: 'Ann Lee',
      PURCHASER_NAME_FROM_ID: 'Ann Lee',
      PURCHASER_NAME_FROM_HOUSESIGMA: 'Ann Lee',
      PURCHASER_ADDRESS_FROM_APS: '5 Queen St',
      PURCHASER_ADDRESS_FROM_ID: '5 Queen St',
      PURCHASER_AGE_FROM_ID: 35,
      PURCHASER_DEPOSIT_PAID_FROM_APS: 200000,
      PROPERTY_PRICE: 700000,
      OTHER_DEPOSIT_PAID_NAME_LIST_FROM_APS: ['Ann Lee'],
      MORTGAGE_APPROVAL_NAMES: ['Ann Lee'],
    });
    expect(res.statusCode).toBe(200);
    const assessment = res.json().data.risk_assessment;
    expect(assessment.risk_level).toBe('Very High');
    expect(assessment.suggested_actions).toEqual(['Request 25% downpayment proof']);
    expect(assessment.reasons).toEqual(['Address in APS not found in LAND REGISTRY - empty']);
    expect(assessment.risk_factors).toEqual([
      'First-time homebuyer',
      'Home value to price ratio: 0.0%',
      'Deposit:28.57142857142857',
    ]);
  });

  it('keeps concurrent assessments independent', async () => {
    const [far, near] = await Promise.all([
      assess(cleanOwnerBody({ DISTANCE: 80 })),
      assess(cleanOwnerBody()),
    ]);
    expect(far.json().data.risk_assessment.reasons).toEqual(['Long distance (>75km)']);
    expect(far.json().data.risk_assessment.risk_level).toBe('Medium');
    expect(near.json().data.risk_assessment.reasons).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// 2. Boundary validation
// ---------------------------------------------------------------------------

describe('POST /api/assess-risk: validation', () => {
  it('rejects a wrongly typed field with 400', async () => {
    const res = await assess(cleanOwnerBody({ PROPERTY_PRICE: '800000' }));
    expect(res.statusCode).toBe(400);
    const body = res.json();
    expect(body.error.code).toBe('VALIDATION_ERROR');
    expect(body.error.details.fieldErrors.PROPERTY_PRICE).toHaveLength(1);
  });

  it('rejects a missing APS name with 400', async () => {
    const res = await assess(cleanOwnerBody({ PURCHASER_NAME_FROM_APS: undefined }));
    expect(res.statusCode).toBe(400);
    expect(res.json().error.code).toBe('VALIDATION_ERROR');
  });

  it('rejects malformed JSON with 400', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/assess-risk',
      payload: '{"PURCHASER_NAME_FROM_APS":',
      headers: { 'content-type': 'application/json' },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json().error.code).toBe('INVALID_REQUEST');
  });
});

// ---------------------------------------------------------------------------
// 3. Engine failures
// ---------------------------------------------------------------------------

describe('POST /api/assess-risk: engine failures', () => {
  it('returns a structured 422 for a zero price', async () => {
    const res = await assess(cleanOwnerBody({ PROPERTY_PRICE: 0 }), { 'x-request-id': 'zero-price-1' });
    expect(res.statusCode).toBe(422);
    expect(res.json()).toEqual({
      error: {
        code: 'INVALID_INPUT_ZERO_PRICE',
        message: 'Invalid input: property price is zero',
        details: { success: false },
        requestId: 'zero-price-1',
      },
    });
  });
});

// ---------------------------------------------------------------------------
// 4. Transport concerns
// ---------------------------------------------------------------------------

describe('transport', () => {
  it('answers CORS preflight for the assessment route', async () => {
    const res = await app.inject({
      method: 'OPTIONS',
      url: '/api/assess-risk',
      headers: {
        origin: 'http://localhost:10080',
        'access-control-request-method': 'POST',
      },
    });
    expect(res.statusCode).toBe(204);
    expect(res.headers['access-control-allow-origin']).toBe('http://localhost:10080');
    expect(res.headers['access-control-allow-credentials']).toBe('true');
  });

  it('reuses an inbound X-Request-Id', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/health', headers: { 'x-request-id': 'test-request-1' } });
    expect(res.headers['x-request-id']).toBe('test-request-1');
  });

  it('generates an X-Request-Id when none is sent', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/health' });
    expect(res.headers['x-request-id']).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('serves the health check', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/health' });
    expect(res.statusCode).toBe(200);
    expect(res.json().data.status).toBe('ok');
  });

  it('returns the error envelope for unknown routes', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/unknown' });
    expect(res.statusCode).toBe(404);
    expect(res.json().error.code).toBe('NOT_FOUND');
  });
});

describe('restricted CORS origins', () => {
  it('does not allow an origin outside the configured list', async () => {
    const restricted = await buildApp(
      loadConfig({ NODE_ENV: 'test', CORS_ORIGIN: 'https://app.example.com' }),
      { logger: false },
    );
    const res = await restricted.inject({
      method: 'OPTIONS',
      url: '/api/assess-risk',
      headers: {
        origin: 'https://other.example.com',
        'access-control-request-method': 'POST',
      },
    });
    expect(res.headers['access-control-allow-origin']).toBeUndefined();
    await restricted.close();
  });
});
