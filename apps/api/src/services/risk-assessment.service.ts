/**
 * Risk Assessment Service
 *
 * Bridges the wire format and the domain engine. The engine is pure and
 * may throw; this layer turns every failure into a structured result so
 * nothing escapes to the transport as an unhandled fault.
 */

import type { FastifyBaseLogger } from 'fastify';
import {
  assessBuyerRisk,
  DomainError,
  ZeroPriceError,
  type BuyerProfile,
  type CoSigner,
  type Verdict,
} from '@mortgage-risk/domain';
import type { BuyerDataWire, CoSignerWire } from '@mortgage-risk/contract';
import type { ErrorCode } from '../utils/reply.js';

// ============================================================================
// Types
// ============================================================================

export type AssessmentResult =
  | { success: true; verdict: Verdict }
  | { success: false; code: ErrorCode; message: string };

// ============================================================================
// Mapping (wire → domain)
// ============================================================================

function toCoSigner(wire: CoSignerWire): CoSigner {
  return {
    nameFromAps: wire.CO_SIGNER_NAME_FROM_APS,
    nameFromId: wire.CO_SIGNER_NAME_FROM_ID,
    addressFromAps: wire.CO_SIGNER_ADDRESS_FROM_APS,
    landRegistryAddresses: wire.CO_SIGNER_ADDRESS_LIST_FROM_LANDREGISTRY,
    propertyPurchasePrices: wire.CO_SIGNER_ALL_PROPERTIES_PURCHASE_PRICE_FROM_LANDREGISTRY,
    propertyValues: wire.CO_SIGNER_ALL_PROPERTIES_VALUE_FROM_AVM,
    propertyDebts: wire.CO_SIGNER_ALL_PROPERTIES_TOTAL_DEBT_FROM_PURVIEW,
    propertyEquities: wire.CO_SIGNER_ALL_PROPERTIES_EQUITY,
  };
}

export function toBuyerProfile(wire: BuyerDataWire): BuyerProfile {
  return {
    nameFromAps: wire.PURCHASER_NAME_FROM_APS,
    nameFromId: wire.PURCHASER_NAME_FROM_ID,
    nameFromListing: wire.PURCHASER_NAME_FROM_HOUSESIGMA,
    addressFromAps: wire.PURCHASER_ADDRESS_FROM_APS,
    addressFromId: wire.PURCHASER_ADDRESS_FROM_ID,
    landRegistryAddresses: wire.PURCHASER_ADDRESS_LIST_FROM_LANDREGISTRY,
    age: wire.PURCHASER_AGE_FROM_ID,
    idIssueDate: wire.PURCHASER_ID_ISSUE_DATE,
    driverLicenseType: wire.PURCHASER_DRIVER_LICENSE_TYPE,
    propertyPurchasePrices: wire.PURCHASER_ALL_PROPERTIES_PURCHASE_PRICE_FROM_LANDREGISTRY,
    propertyValues: wire.PURCHASER_ALL_PROPERTIES_VALUE_FROM_AVM,
    propertyDebts: wire.PURCHASER_ALL_PROPERTIES_TOTAL_DEBT_FROM_PURVIEW,
    propertyEquities: wire.PURCHASER_ALL_PROPERTIES_EQUITY,
    primaryResidencePurchasePrice: wire.PRIMARY_RESIDENCE_PURCHASE_PRICE_FROM_LANDREGISTRY,
    primaryResidenceValue: wire.PRIMARY_RESIDENCE_VALUE_FROM_AVM,
    primaryResidenceDebt: wire.PRIMARY_RESIDENCE_TOTAL_DEBT_FROM_PURVIEW,
    primaryResidenceEquity: wire.PRIMARY_RESIDENCE_EQUITY,
    primaryResidenceTitleNames: wire.PRIMARY_RESIDENCE_TITLE_NAMES,
    propertyPrice: wire.PROPERTY_PRICE,
    deposit: wire.PURCHASER_DEPOSIT_PAID_FROM_APS,
    otherDepositPayerNames: wire.OTHER_DEPOSIT_PAID_NAME_LIST_FROM_APS,
    mortgageApproved: wire.MORTGAGE_APPROVAL,
    mortgageApprovalNames: wire.MORTGAGE_APPROVAL_NAMES,
    distanceKm: wire.DISTANCE,
    coSigners: wire.CO_SIGNER_LIST_FROM_APS.map(toCoSigner),
  };
}

// ============================================================================
// Assessment
// ============================================================================

export function assessBuyer(profile: BuyerProfile, log: FastifyBaseLogger): AssessmentResult {
  log.debug({ coSigners: profile.coSigners.length, hasPrice: profile.propertyPrice !== undefined }, 'Assessing buyer profile');

  let verdict: Verdict;
  try {
    verdict = assessBuyerRisk(profile);
  } catch (err) {
    if (err instanceof ZeroPriceError) {
      log.warn({ code: err.code }, 'Assessment rejected: zero property price');
      return { success: false, code: 'INVALID_INPUT_ZERO_PRICE', message: err.message };
    }
    if (err instanceof DomainError) {
      log.warn({ code: err.code }, 'Assessment rejected by domain rule');
      return { success: false, code: 'ASSESSMENT_FAILED', message: err.message };
    }
    log.error({ err }, 'Assessment failed');
    return {
      success: false,
      code: 'ASSESSMENT_FAILED',
      message: err instanceof Error ? err.message : 'Assessment failed',
    };
  }

  log.info({
    riskTier: verdict.riskTier,
    reasons: verdict.reasons.length,
    actions: verdict.suggestedActions.length,
  }, 'Buyer risk assessed');

  return { success: true, verdict };
}
