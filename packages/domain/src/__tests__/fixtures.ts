/**
 * Shared profile builders for domain tests.
 */

import { createBuyerProfile, type BuyerProfile, type BuyerProfileInput } from '../types.js';

/**
 * A first-time buyer with consistent identity and no override triggers.
 */
export function nonOwnerProfile(overrides: BuyerProfileInput = {}): BuyerProfile {
  return createBuyerProfile({
    nameFromAps: 'John Smith',
    nameFromId: 'John Smith',
    nameFromListing: 'John Smith',
    addressFromAps: '12 Oak Ave, Toronto, ON',
    addressFromId: '12 Oak Ave, Toronto, ON',
    age: 40,
    propertyPrice: 700_000,
    deposit: 200_000,
    otherDepositPayerNames: ['John Smith'],
    mortgageApproved: true,
    mortgageApprovalNames: ['John Smith'],
    distanceKm: 20,
    ...overrides,
  });
}

/**
 * An existing owner who passes every general rule.
 * Value 640k on an 800k price (80%), equity 300k (37.5%).
 */
export function ownerProfile(overrides: BuyerProfileInput = {}): BuyerProfile {
  return createBuyerProfile({
    nameFromAps: 'John Smith',
    nameFromId: 'John Smith',
    nameFromListing: 'John Smith',
    addressFromAps: '12 Oak Ave, Toronto, ON',
    addressFromId: '12 Oak Ave, Toronto, ON',
    landRegistryAddresses: ['12 Oak Ave, Toronto, ON'],
    age: 40,
    propertyValues: [700_000],
    primaryResidenceValue: 640_000,
    primaryResidenceEquity: 300_000,
    primaryResidenceTitleNames: ['John Smith'],
    propertyPrice: 800_000,
    deposit: 160_000,
    otherDepositPayerNames: ['John Smith'],
    mortgageApproved: true,
    mortgageApprovalNames: ['John Smith'],
    distanceKm: 20,
    ...overrides,
  });
}
