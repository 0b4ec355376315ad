/**
 * Risk Factor Reporter
 *
 * Descriptive factors derived straight from the profile. Independent of
 * the computed tier.
 */

import { ZeroPriceError } from './errors.js';
import { hasAgeRisk, isLongDistance, ownsProperty } from './predicates.js';
import type { BuyerProfile } from './types.js';

/**
 * Shortest round-trip decimal, always with a fractional part
 * (25 → "25.0", 28.571428571428573 unchanged). Magnitudes below 1e-4 or
 * from 1e16 up switch to exponent form with a signed two-digit exponent
 * (1e-5 → "1e-05", 1e16 → "1e+16").
 */
export function formatDecimal(value: number): string {
  if (Object.is(value, -0)) return '-0.0';
  if (value === 0) return '0.0';

  const exponential = value.toExponential();
  const split = exponential.indexOf('e');
  const exponent = Number(exponential.slice(split + 1));
  if (exponent < -4 || exponent >= 16) {
    const digits = String(Math.abs(exponent)).padStart(2, '0');
    return `${exponential.slice(0, split)}e${exponent < 0 ? '-' : '+'}${digits}`;
  }

  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

/**
 * One fractional digit. An exact tie rounds to the even digit
 * (81.25 → "81.2", 93.75 → "93.8"); toFixed would round it away from zero.
 */
export function formatOneDecimal(value: number): string {
  if (Object.is(value, -0)) return '-0.0';

  // x.x5 is exact in binary only as a multiple of 0.25
  const isTie = Number.isInteger(value * 4) && !Number.isInteger(value * 2);
  if (!isTie) {
    return value.toFixed(1);
  }

  const lower = Math.floor(value * 10);
  const tenths = lower % 2 === 0 ? lower : lower + 1;
  return (tenths / 10).toFixed(1);
}

export function getRiskFactors(profile: BuyerProfile): string[] {
  const factors: string[] = [];

  factors.push(ownsProperty(profile) ? 'Existing property owner' : 'First-time homebuyer');

  // Unlike the branch rules, a zero price is not guarded here
  const price = profile.propertyPrice ?? 1;
  if (price === 0) {
    throw new ZeroPriceError();
  }

  const valueRatio = (profile.primaryResidenceValue / price) * 100;
  factors.push(`Home value to price ratio: ${formatOneDecimal(valueRatio)}%`);

  const depositPct = (profile.deposit / price) * 100;
  factors.push(`Deposit:${formatDecimal(depositPct)}`);

  if (isLongDistance(profile)) {
    factors.push(`Long distance (${formatDecimal(profile.distanceKm)}km)`);
  }

  if (hasAgeRisk(profile)) {
    factors.push(`Age risk factor (${profile.age ?? 0} years)`);
  }

  return factors;
}
