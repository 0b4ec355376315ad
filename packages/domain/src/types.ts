import { z } from 'zod';

// ============================================================================
// ENUMS
// ============================================================================

export const RiskTier = z.enum([
  'NO_RISK',   // Below the escalation ladder
  'VERY_LOW',
  'LOW',
  'MEDIUM',
  'HIGH',
  'VERY_HIGH',
]);
export type RiskTier = z.infer<typeof RiskTier>;

export const RiskTierLabel = z.enum([
  'No Risk',
  'Very Low',
  'Low',
  'Medium',
  'High',
  'Very High',
]);
export type RiskTierLabel = z.infer<typeof RiskTierLabel>;

/** Display labels used on the wire. */
export const RISK_TIER_LABELS: Record<RiskTier, RiskTierLabel> = {
  NO_RISK: 'No Risk',
  VERY_LOW: 'Very Low',
  LOW: 'Low',
  MEDIUM: 'Medium',
  HIGH: 'High',
  VERY_HIGH: 'Very High',
};

// ============================================================================
// INPUT RECORDS
// Field sources: APS = agreement of purchase and sale, ID = government ID,
// HOUSESIGMA = listing service, LAND REGISTRY, AVM = automated valuation,
// PURVIEW = debt lookup.
// ============================================================================

export const CoSignerSchema = z.object({
  nameFromAps: z.string().default(''),
  nameFromId: z.string().default(''),
  addressFromAps: z.string().default(''),
  landRegistryAddresses: z.array(z.string()).default([]),
  propertyPurchasePrices: z.array(z.number()).default([]),
  propertyValues: z.array(z.number()).default([]),
  propertyDebts: z.array(z.number()).default([]),
  propertyEquities: z.array(z.number()).default([]),
});
export type CoSigner = z.infer<typeof CoSignerSchema>;

export const BuyerProfileSchema = z.object({
  // Identity
  nameFromAps: z.string().default(''),
  nameFromId: z.string().default(''),
  nameFromListing: z.string().default(''),
  addressFromAps: z.string().default(''),
  addressFromId: z.string().default(''),
  landRegistryAddresses: z.array(z.string()).default([]),
  /** Absent when the ID carried no readable birth date. */
  age: z.number().int().optional(),
  idIssueDate: z.string().default(''),
  driverLicenseType: z.string().default(''),

  // Other properties owned by the buyer
  propertyPurchasePrices: z.array(z.number()).default([]),
  propertyValues: z.array(z.number()).default([]),
  propertyDebts: z.array(z.number()).default([]),
  propertyEquities: z.array(z.number()).default([]),

  // Primary residence
  primaryResidencePurchasePrice: z.number().default(0),
  primaryResidenceValue: z.number().default(0),
  primaryResidenceDebt: z.number().default(0),
  primaryResidenceEquity: z.number().default(0),
  primaryResidenceTitleNames: z.array(z.string()).default([]),

  // Subject purchase
  /** Absent means "unknown"; see the per-rule defaults in the evaluators. */
  propertyPrice: z.number().optional(),
  deposit: z.number().default(0),
  otherDepositPayerNames: z.array(z.string()).default([]),
  mortgageApproved: z.boolean().default(false),
  mortgageApprovalNames: z.array(z.string()).default([]),
  /** Kilometres between the buyer and the subject property. */
  distanceKm: z.number().default(0),

  coSigners: z.array(CoSignerSchema).default([]),
});
export type BuyerProfile = z.infer<typeof BuyerProfileSchema>;
export type BuyerProfileInput = z.input<typeof BuyerProfileSchema>;

/** Build a profile from partial data, filling every absent field with its default. */
export function createBuyerProfile(input: BuyerProfileInput = {}): BuyerProfile {
  return BuyerProfileSchema.parse(input);
}

// ============================================================================
// OUTPUT
// ============================================================================

export interface Verdict {
  riskTier: RiskTier;
  suggestedActions: string[];
  reasons: string[];
  riskFactors: string[];
}
