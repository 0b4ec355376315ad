/**
 * Risk assessment route contracts.
 *
 * Wire-format schemas matching the JSON exchanged with intake clients.
 * Field names follow the source documents (APS, ID, HOUSESIGMA, LAND
 * REGISTRY, AVM, PURVIEW).
 */

import { z } from 'zod';
import { RiskTierLabel } from '@mortgage-risk/domain';
import { defineRoute } from '../define-route.js';

// ---------------------------------------------------------------------------
// Shared schemas
// ---------------------------------------------------------------------------

const names = z.array(z.string()).default([]);
const amounts = z.array(z.number()).default([]);

export const CoSignerWireSchema = z.object({
  CO_SIGNER_NAME_FROM_APS: z.string(),
  CO_SIGNER_NAME_FROM_ID: z.string().default(''),
  CO_SIGNER_ADDRESS_FROM_APS: z.string().default(''),
  CO_SIGNER_ADDRESS_LIST_FROM_LANDREGISTRY: names,
  CO_SIGNER_ALL_PROPERTIES_PURCHASE_PRICE_FROM_LANDREGISTRY: amounts,
  CO_SIGNER_ALL_PROPERTIES_VALUE_FROM_AVM: amounts,
  CO_SIGNER_ALL_PROPERTIES_TOTAL_DEBT_FROM_PURVIEW: amounts,
  CO_SIGNER_ALL_PROPERTIES_EQUITY: amounts,
});
export type CoSignerWire = z.infer<typeof CoSignerWireSchema>;

export const BuyerDataWireSchema = z.object({
  PURCHASER_NAME_FROM_APS: z.string(),
  PURCHASER_NAME_FROM_ID: z.string().default(''),
  PURCHASER_NAME_FROM_HOUSESIGMA: z.string().default(''),
  PURCHASER_ADDRESS_FROM_APS: z.string().default(''),
  PURCHASER_ADDRESS_FROM_ID: z.string().default(''),
  PURCHASER_ADDRESS_LIST_FROM_LANDREGISTRY: names,
  PURCHASER_AGE_FROM_ID: z.number().int().nonnegative().optional(),
  PURCHASER_ALL_PROPERTIES_PURCHASE_PRICE_FROM_LANDREGISTRY: amounts,
  PURCHASER_ALL_PROPERTIES_VALUE_FROM_AVM: amounts,
  PURCHASER_ALL_PROPERTIES_TOTAL_DEBT_FROM_PURVIEW: amounts,
  PURCHASER_ALL_PROPERTIES_EQUITY: amounts,
  PURCHASER_DEPOSIT_PAID_FROM_APS: z.number().default(0),
  PURCHASER_ID_ISSUE_DATE: z.string().default(''),
  PURCHASER_DRIVER_LICENSE_TYPE: z.string().default(''),
  CO_SIGNER_LIST_FROM_APS: z.array(CoSignerWireSchema).default([]),
  DISTANCE: z.number().default(0),
  PRIMARY_RESIDENCE_PURCHASE_PRICE_FROM_LANDREGISTRY: z.number().default(0),
  PRIMARY_RESIDENCE_VALUE_FROM_AVM: z.number().default(0),
  PRIMARY_RESIDENCE_TOTAL_DEBT_FROM_PURVIEW: z.number().default(0),
  PRIMARY_RESIDENCE_EQUITY: z.number().default(0),
  PRIMARY_RESIDENCE_TITLE_NAMES: names,
  PROPERTY_PRICE: z.number().optional(),
  OTHER_DEPOSIT_PAID_NAME_LIST_FROM_APS: names,
  MORTGAGE_APPROVAL: z.boolean().default(false),
  MORTGAGE_APPROVAL_NAMES: names,
});
export type BuyerDataWire = z.infer<typeof BuyerDataWireSchema>;

export const RiskAssessmentApiSchema = z.object({
  risk_level: RiskTierLabel,
  suggested_actions: z.array(z.string()),
  risk_factors: z.array(z.string()),
  reasons: z.array(z.string()),
});
export type RiskAssessmentApi = z.infer<typeof RiskAssessmentApiSchema>;

export const AssessRiskResponseSchema = z.object({
  success: z.literal(true),
  risk_assessment: RiskAssessmentApiSchema,
  debug: z.object({
    input_data: BuyerDataWireSchema,
    assessment_result: RiskAssessmentApiSchema,
  }),
});
export type AssessRiskResponse = z.infer<typeof AssessRiskResponseSchema>;

// ---------------------------------------------------------------------------
// Route definitions
// ---------------------------------------------------------------------------

export const riskRoutes = {
  assess: defineRoute({
    method: 'POST' as const,
    path: '/assess-risk',
    summary: 'Classify a buyer application into a risk tier',
    body: BuyerDataWireSchema,
    response: AssessRiskResponseSchema,
    errors: {
      400: 'Request body failed validation',
      422: 'The engine could not assess the profile',
    },
  }),
};
