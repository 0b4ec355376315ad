/**
 * Buyer Risk Assessment
 *
 * PURE DOMAIN LOGIC - no database, no API dependencies.
 * Pipeline: ownership → branch evaluator → general rule pass, with risk
 * factors derived alongside. Every call builds its own verdict.
 */

import { evaluateNonOwner, evaluateOwner } from './branch.js';
import { applyGeneralRules } from './general-rules.js';
import { ownsProperty } from './predicates.js';
import { getRiskFactors } from './risk-factors.js';
import type { BuyerProfile, Verdict } from './types.js';

/**
 * Classify a buyer's application into a risk tier.
 *
 * @throws ZeroPriceError when the subject price is exactly 0.
 */
export function assessBuyerRisk(profile: BuyerProfile): Verdict {
  const branch = ownsProperty(profile) ? evaluateOwner(profile) : evaluateNonOwner(profile);
  const general = applyGeneralRules(profile, branch.riskTier);

  return {
    riskTier: general.riskTier,
    suggestedActions: branch.suggestedActions,
    reasons: [...branch.reasons, ...general.reasons],
    riskFactors: getRiskFactors(profile),
  };
}
