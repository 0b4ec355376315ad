/**
 * @mortgage-risk/contract - Canonical API contract definitions.
 *
 * Exports route contracts, envelope helpers, and the contract registry.
 */

// Core types
export type { ContractRoute, HttpMethod } from './define-route.js';
export { defineRoute } from './define-route.js';

// Envelope helpers
export { DataEnvelope, ErrorEnvelope } from './envelope.js';

// Route contracts & registry
export { contract, riskRoutes, healthRoutes } from './routes/index.js';

// Re-export schemas that consumers may need for type inference
export {
  BuyerDataWireSchema,
  type BuyerDataWire,
  CoSignerWireSchema,
  type CoSignerWire,
  RiskAssessmentApiSchema,
  type RiskAssessmentApi,
  AssessRiskResponseSchema,
  type AssessRiskResponse,
} from './routes/risk.js';
export { HealthApiSchema, type HealthApi } from './routes/health.js';
