/**
 * Escalation Ladder
 *
 * Raises a tier by N steps along VERY_LOW → LOW → MEDIUM → HIGH → VERY_HIGH,
 * saturating at VERY_HIGH. NO_RISK is not on the ladder: escalating it
 * returns NO_RISK unchanged.
 */

import type { RiskTier } from './types.js';

export const ESCALATION_LADDER: readonly RiskTier[] = [
  'VERY_LOW',
  'LOW',
  'MEDIUM',
  'HIGH',
  'VERY_HIGH',
];

export function escalate(tier: RiskTier, steps = 1): RiskTier {
  const index = ESCALATION_LADDER.indexOf(tier);
  if (index === -1) {
    return tier;
  }
  const target = Math.min(index + steps, ESCALATION_LADDER.length - 1);
  return ESCALATION_LADDER[target] ?? tier;
}
