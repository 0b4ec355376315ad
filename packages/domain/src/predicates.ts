/**
 * Buyer Profile Predicates
 *
 * PURE DOMAIN LOGIC - each check reads one BuyerProfile and answers one
 * question. The branch evaluators and the general rule pass compose them.
 */

import type { BuyerProfile } from './types.js';

export const LONG_DISTANCE_KM = 75;
export const MIN_LOW_RISK_AGE = 30;
export const MAX_LOW_RISK_AGE = 60;

// ============================================================================
// OWNERSHIP
// ============================================================================

/**
 * A buyer owns property when any source lists a holding: primary residence
 * title, the buyer's land registry addresses, or any co-signer's.
 */
export function ownsProperty(profile: BuyerProfile): boolean {
  if (profile.primaryResidenceTitleNames.length > 0) {
    return true;
  }
  if (profile.landRegistryAddresses.length > 0) {
    return true;
  }
  return profile.coSigners.some(c => c.landRegistryAddresses.length > 0);
}

export function isBuyerOnPrimaryResidenceTitle(profile: BuyerProfile): boolean {
  return profile.primaryResidenceTitleNames.includes(profile.nameFromAps);
}

// ============================================================================
// PARTIES ON THE AGREEMENT
// ============================================================================

/** Buyer plus every co-signer, as named on the APS. */
export function agreementParties(profile: BuyerProfile): Set<string> {
  return new Set([profile.nameFromAps, ...profile.coSigners.map(c => c.nameFromAps)]);
}

function lastName(fullName: string): string {
  const tokens = fullName.trim().split(/\s+/);
  return tokens[tokens.length - 1] ?? '';
}

/**
 * A primary-residence title holder shares the buyer's last name but is not
 * a party to the agreement.
 */
export function hasRelatedPartyNotOnAgreement(profile: BuyerProfile): boolean {
  const buyerLastName = lastName(profile.nameFromAps);
  const parties = agreementParties(profile);
  return profile.primaryResidenceTitleNames.some(
    name => lastName(name) === buyerLastName && !parties.has(name),
  );
}

/** Some primary-residence title holder is not a party to the agreement. */
export function isMissingCoOwnerOnAgreement(profile: BuyerProfile): boolean {
  const parties = agreementParties(profile);
  return profile.primaryResidenceTitleNames.some(name => !parties.has(name));
}

// ============================================================================
// CROSS-SOURCE CONSISTENCY
// ============================================================================

export function isLongDistance(profile: BuyerProfile): boolean {
  return profile.distanceKm > LONG_DISTANCE_KM;
}

/** Deposit was not paid by the buyer alone. */
export function isDepositPaidByOthers(profile: BuyerProfile): boolean {
  const payers = new Set(profile.otherDepositPayerNames);
  return payers.size !== 1 || !payers.has(profile.nameFromAps);
}

/** Mortgage approval names more than one party, or not the buyer. */
export function hasMultipleMortgageParties(profile: BuyerProfile): boolean {
  const names = profile.mortgageApprovalNames;
  return names.length > 1 || !names.includes(profile.nameFromAps);
}

/** An age of 0 is treated as not recorded. */
export function hasAgeRisk(profile: BuyerProfile): boolean {
  const { age } = profile;
  if (age === undefined || age === 0) {
    return false;
  }
  return age < MIN_LOW_RISK_AGE || age > MAX_LOW_RISK_AGE;
}

export function hasAddressMismatch(profile: BuyerProfile): boolean {
  return profile.addressFromId !== profile.addressFromAps;
}

/**
 * Conditions that force a non-owner straight to HIGH.
 */
export function hasHighRiskOverride(profile: BuyerProfile): boolean {
  return (
    isLongDistance(profile) ||
    isDepositPaidByOthers(profile) ||
    hasMultipleMortgageParties(profile) ||
    hasAgeRisk(profile) ||
    hasAddressMismatch(profile)
  );
}
