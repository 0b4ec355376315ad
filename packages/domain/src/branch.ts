/**
 * Branch Evaluation
 *
 * PURE DOMAIN LOGIC - computes the initial tier and suggested actions from
 * one of two mutually exclusive rule sets, chosen by ownership.
 *
 * Reasons are returned with the result rather than collected on any
 * shared object, so concurrent evaluations never see each other's output.
 */

import { escalate } from './escalation.js';
import {
  hasHighRiskOverride,
  hasRelatedPartyNotOnAgreement,
  isBuyerOnPrimaryResidenceTitle,
  isMissingCoOwnerOnAgreement,
  MIN_LOW_RISK_AGE,
} from './predicates.js';
import type { BuyerProfile, RiskTier } from './types.js';

export interface BranchResult {
  riskTier: RiskTier;
  suggestedActions: string[];
  reasons: string[];
}

export const ACTIONS = {
  ADD_RELATED_PARTIES: 'Add related parties to APS',
  ADD_CO_SIGNERS: 'Request to add co-signers',
  DOWNPAYMENT_PROOF: 'Request 25% downpayment proof',
  VERIFY_OWNERSHIP: 'Verify property ownership and equity',
} as const;

/** Price band boundaries, CAD. */
const PRICE_BAND_LOW = 800_000;
const PRICE_BAND_MID = 1_000_000;
const PRICE_BAND_HIGH = 1_500_000;

/** Percentage of price, or 0 when price is not positive. */
export function percentOfPrice(amount: number, price: number): number {
  return price > 0 ? (amount / price) * 100 : 0;
}

// ============================================================================
// NON-OWNER
// ============================================================================

/**
 * Deposit-to-price tier. Returns undefined when no band rule applies.
 */
function depositTier(price: number, depositPct: number): RiskTier | undefined {
  if (price < PRICE_BAND_LOW) {
    if (depositPct > 25) return 'LOW';
    if (depositPct > 15) return 'MEDIUM';
    return undefined;
  }
  if (price <= PRICE_BAND_MID) {
    return depositPct > 20 ? 'MEDIUM' : undefined;
  }
  if (price <= PRICE_BAND_HIGH) {
    return depositPct > 25 ? 'MEDIUM' : undefined;
  }
  return depositPct > 25 ? 'MEDIUM' : undefined;
}

export function evaluateNonOwner(profile: BuyerProfile): BranchResult {
  const price = profile.propertyPrice ?? 0;
  const depositPct = percentOfPrice(profile.deposit, price);
  const suggestedActions: string[] = [];

  let riskTier: RiskTier = depositTier(price, depositPct) ?? 'NO_RISK';

  if (hasHighRiskOverride(profile)) {
    riskTier = 'HIGH';
  }

  if (hasRelatedPartyNotOnAgreement(profile)) {
    riskTier = escalate(riskTier, 1);
    if (price > PRICE_BAND_MID) {
      riskTier = escalate(riskTier, 2);
    }
    suggestedActions.push(ACTIONS.ADD_RELATED_PARTIES);
  }

  // Absent age never counts as young
  const age = profile.age ?? 100;
  if (age < MIN_LOW_RISK_AGE && !isBuyerOnPrimaryResidenceTitle(profile)) {
    suggestedActions.push(ACTIONS.ADD_CO_SIGNERS);
  }

  suggestedActions.push(ACTIONS.DOWNPAYMENT_PROOF);
  return { riskTier, suggestedActions, reasons: [] };
}

// ============================================================================
// OWNER
// ============================================================================

function homeValueTier(homeValue: number, price: number): RiskTier {
  if (homeValue >= 0.75 * price) return 'LOW';
  if (homeValue >= 0.6 * price) return 'MEDIUM';
  return 'HIGH';
}

export function evaluateOwner(profile: BuyerProfile): BranchResult {
  const price = profile.propertyPrice ?? 1;
  const equityPct = percentOfPrice(profile.primaryResidenceEquity, price);
  const suggestedActions: string[] = [];
  const reasons: string[] = [];

  let riskTier = homeValueTier(profile.primaryResidenceValue, price);

  if (equityPct < 5) {
    riskTier = 'VERY_HIGH';
    reasons.push('Very low equity (<5%)');
  } else if (equityPct < 15) {
    riskTier = escalate(riskTier, 2);
    reasons.push('Low equity (5-15%)');
  } else if (equityPct < 25) {
    riskTier = escalate(riskTier, 1);
    reasons.push('Moderate equity (15-25%)');
  }

  if (hasRelatedPartyNotOnAgreement(profile)) {
    // Owners take the full three steps regardless of price
    riskTier = escalate(escalate(riskTier, 1), 2);
    reasons.push('Same last name different addresses.');
    suggestedActions.push(ACTIONS.ADD_RELATED_PARTIES);
  }

  if (isMissingCoOwnerOnAgreement(profile)) {
    riskTier = escalate(riskTier, 2);
    reasons.push('Missing co-owner on APS');
  }

  suggestedActions.push(ACTIONS.VERIFY_OWNERSHIP);
  return { riskTier, suggestedActions, reasons };
}
