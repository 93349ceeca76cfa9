/**
 * RateModel: utilization -> (borrowRate, supplyRate)
 *
 * Pure functions over RAY values. The unit of the rate is whatever the reserve was
 * configured with (the pool converts yearly rates to per-second rates once, at
 * listing time).
 *
 * Kinked curve:
 *   U <= optimal: base + (U / optimal) * slope1
 *   U >  optimal: base + slope1 + ((U - optimal) / (1 - optimal)) * slope2
 */

import type { RateModelConfig } from '../types/index.js';
import { BPS, RAY, mulDiv, rayMul } from '../utils/fixedPoint.js';

export interface Rates {
  utilization: bigint;
  borrowRate: bigint;
  supplyRate: bigint;
}

/**
 * Fraction of liquidity currently lent out, clamped to [0, RAY].
 * An empty reserve has zero utilization.
 */
export function utilization(totalBorrows: bigint, availableLiquidity: bigint): bigint {
  const borrows = totalBorrows > 0n ? totalBorrows : 0n;
  const liquidity = availableLiquidity > 0n ? availableLiquidity : 0n;
  const denominator = borrows + liquidity;

  if (denominator === 0n) {
    return 0n;
  }

  const u = mulDiv(borrows, RAY, denominator);
  return u > RAY ? RAY : u;
}

export function borrowRate(model: RateModelConfig, u: bigint): bigint {
  switch (model.kind) {
    case 'fixed':
      return model.rate;

    case 'linear':
      return model.baseRate + rayMul(u, model.slope);

    case 'kinked': {
      const { baseRate, optimalUtilization, slope1, slope2 } = model;

      if (u <= optimalUtilization) {
        // optimal == 0 only reaches here at u == 0
        if (optimalUtilization === 0n) {
          return baseRate;
        }
        return baseRate + mulDiv(u, slope1, optimalUtilization);
      }

      // u > optimal implies optimal < RAY, so the denominator is positive
      const excess = u - optimalUtilization;
      return baseRate + slope1 + mulDiv(excess, slope2, RAY - optimalUtilization);
    }
  }
}

export function supplyRate(borrow: bigint, u: bigint, reserveFactorBps: number): bigint {
  const gross = rayMul(borrow, u);
  return mulDiv(gross, BPS - BigInt(reserveFactorBps), BPS);
}

export function computeRates(
  model: RateModelConfig,
  totalBorrows: bigint,
  availableLiquidity: bigint,
  reserveFactorBps: number
): Rates {
  const u = utilization(totalBorrows, availableLiquidity);
  const borrow = borrowRate(model, u);
  return {
    utilization: u,
    borrowRate: borrow,
    supplyRate: supplyRate(borrow, u, reserveFactorBps)
  };
}
