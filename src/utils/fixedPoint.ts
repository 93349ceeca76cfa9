/**
 * Fixed-point math on bigint
 *
 * Precision conventions used across the engine:
 * - RAY (1e27): indices, rates (per second) and utilization
 * - WAD (1e18): prices (USD per whole token), USD values and health factors
 * - BPS (1e4): risk parameters (collateral factor, bonus, close factor, reserve factor)
 *
 * All divisions truncate toward zero. bigint has no upper bound, so products are
 * formed at full width before the division narrows them.
 */

export const WAD = 10n ** 18n;
export const RAY = 10n ** 27n;
export const BPS = 10_000n;

export const SECONDS_PER_YEAR = 31_536_000n;

export const MAX_UINT256 = 2n ** 256n - 1n;

/**
 * (a * b) / denominator, truncated
 * @throws RangeError when denominator is zero
 */
export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
  if (denominator === 0n) {
    throw new RangeError('mulDiv: division by zero');
  }
  return (a * b) / denominator;
}

export function rayMul(a: bigint, b: bigint): bigint {
  return (a * b) / RAY;
}

export function rayDiv(a: bigint, b: bigint): bigint {
  return mulDiv(a, RAY, b);
}

export function wadMul(a: bigint, b: bigint): bigint {
  return (a * b) / WAD;
}

export function wadDiv(a: bigint, b: bigint): bigint {
  return mulDiv(a, WAD, b);
}

export function bpsMul(value: bigint, bps: number | bigint): bigint {
  return (value * BigInt(bps)) / BPS;
}

export function minBigInt(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

/** Subtract, flooring at zero (aggregates absorb truncation dust) */
export function saturatingSub(a: bigint, b: bigint): bigint {
  return a > b ? a - b : 0n;
}

/**
 * USD value (WAD) of a raw token amount
 *
 * @example
 * // 10 ETH (18 decimals) at $2000
 * toValue(10n * 10n ** 18n, 18, 2000n * WAD) // => 20000n * WAD
 */
export function toValue(amount: bigint, decimals: number, priceWad: bigint): bigint {
  if (amount === 0n || priceWad === 0n) {
    return 0n;
  }
  return (amount * priceWad) / 10n ** BigInt(decimals);
}

/**
 * Raw token amount worth a USD value (WAD) at a given price
 */
export function fromValue(valueWad: bigint, decimals: number, priceWad: bigint): bigint {
  if (valueWad === 0n) {
    return 0n;
  }
  return mulDiv(valueWad, 10n ** BigInt(decimals), priceWad);
}

/** Convert a yearly RAY rate to a per-second RAY rate */
export function annualToPerSecond(annualRateRay: bigint): bigint {
  return annualRateRay / SECONDS_PER_YEAR;
}

export function perSecondToAnnual(rateRay: bigint): bigint {
  return rateRay * SECONDS_PER_YEAR;
}
