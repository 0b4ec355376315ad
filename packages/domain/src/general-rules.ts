/**
 * General Rule Pass
 *
 * PURE DOMAIN LOGIC - cross-source consistency checks applied to every
 * application after the branch result.
 *
 * Rules (evaluated in order, all of them; later rules see earlier effects):
 *   1. APS name ≠ ID name                      → VERY_HIGH
 *   2. APS name ≠ HOUSESIGMA name              → VERY_HIGH
 *   3. ID name ≠ HOUSESIGMA name               → VERY_HIGH
 *   4. ID address ≠ APS address                → VERY_HIGH
 *   5. APS address not in land registry list   → VERY_HIGH
 *   6. Distance > 75 km                        → +1
 *   7. Deposit paid by others                  → VERY_HIGH
 *   8. Multiple mortgage parties               → +1
 *   9. Age < 30 or > 60                        → +1
 *  10. More than one other property valued     → +1
 */

import { escalate } from './escalation.js';
import {
  hasAddressMismatch,
  hasAgeRisk,
  hasMultipleMortgageParties,
  isDepositPaidByOthers,
  isLongDistance,
} from './predicates.js';
import type { BuyerProfile, RiskTier } from './types.js';

/**
 * One rule's effect: force the tier to a value, or escalate by N steps.
 */
export type RuleEffect =
  | { kind: 'force'; tier: RiskTier }
  | { kind: 'escalate'; steps: number };

export interface GeneralRule {
  id: string;
  effect: RuleEffect;
  /** Returns the reason text when the rule fires, undefined otherwise. */
  check: (profile: BuyerProfile) => string | undefined;
}

export interface GeneralRuleOutcome {
  riskTier: RiskTier;
  reasons: string[];
}

const FORCE_VERY_HIGH: RuleEffect = { kind: 'force', tier: 'VERY_HIGH' };
const ESCALATE_ONE: RuleEffect = { kind: 'escalate', steps: 1 };

function when(condition: boolean, reason: string): string | undefined {
  return condition ? reason : undefined;
}

export const GENERAL_RULES: readonly GeneralRule[] = [
  {
    id: 'NAME_ID_VS_APS',
    effect: FORCE_VERY_HIGH,
    check: p => when(p.nameFromAps !== p.nameFromId, 'Name mismatch between ID and APS'),
  },
  {
    id: 'NAME_APS_VS_LISTING',
    effect: FORCE_VERY_HIGH,
    check: p => when(p.nameFromAps !== p.nameFromListing, 'Name mismatch between APS and HOUSESIGMA'),
  },
  {
    id: 'NAME_ID_VS_LISTING',
    effect: FORCE_VERY_HIGH,
    check: p => when(p.nameFromId !== p.nameFromListing, 'Name mismatch between ID and HOUSESIGMA'),
  },
  {
    id: 'ADDRESS_ID_VS_APS',
    effect: FORCE_VERY_HIGH,
    check: p => when(hasAddressMismatch(p), 'Address mismatch between ID and APS'),
  },
  {
    id: 'ADDRESS_APS_VS_LAND_REGISTRY',
    effect: FORCE_VERY_HIGH,
    check: p => {
      if (p.landRegistryAddresses.includes(p.addressFromAps)) return undefined;
      return p.landRegistryAddresses.length > 0
        ? 'Address mismatch APS and LAND REGISTRY'
        : 'Address in APS not found in LAND REGISTRY - empty';
    },
  },
  {
    id: 'LONG_DISTANCE',
    effect: ESCALATE_ONE,
    check: p => when(isLongDistance(p), 'Long distance (>75km)'),
  },
  {
    id: 'DEPOSIT_PAID_BY_OTHERS',
    effect: FORCE_VERY_HIGH,
    check: p => when(isDepositPaidByOthers(p), 'Deposit paid by others'),
  },
  {
    id: 'MULTIPLE_MORTGAGE_PARTIES',
    effect: ESCALATE_ONE,
    check: p => when(hasMultipleMortgageParties(p), 'Multiple mortgage parties'),
  },
  {
    id: 'AGE',
    effect: ESCALATE_ONE,
    check: p => when(hasAgeRisk(p), `Age risk (${p.age ?? 0} years)`),
  },
  {
    id: 'MULTIPLE_PROPERTIES',
    effect: ESCALATE_ONE,
    check: p => when(p.propertyValues.length > 1, 'Multiple property ownership'),
  },
];

export function applyRuleEffect(tier: RiskTier, effect: RuleEffect): RiskTier {
  switch (effect.kind) {
    case 'force':
      return effect.tier;
    case 'escalate':
      return escalate(tier, effect.steps);
  }
}

export function applyGeneralRules(
  profile: BuyerProfile,
  initialTier: RiskTier,
  rules: readonly GeneralRule[] = GENERAL_RULES,
): GeneralRuleOutcome {
  let riskTier = initialTier;
  const reasons: string[] = [];

  for (const rule of rules) {
    const reason = rule.check(profile);
    if (reason === undefined) continue;
    riskTier = applyRuleEffect(riskTier, rule.effect);
    reasons.push(reason);
  }

  return { riskTier, reasons };
}
