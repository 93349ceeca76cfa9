/**
 * AccrualEngine: advance a reserve's borrow/supply indices to `now`.
 *
 * Uses linear interest per step (factor = 1 + rate * elapsed) rather than
 * continuous compounding; compounding happens across successive accruals.
 *
 * The protocol's cut of borrow interest (reserve factor) is booked in
 * totalReserves and also counted in totalDeposits, as a treasury deposit, so
 * totalBorrows <= totalDeposits holds after every step.
 */

import type { Reserve } from '../types/index.js';
import { computeRates } from '../risk/RateModel.js';
import { RAY, rayMul, saturatingSub } from '../utils/fixedPoint.js';

export interface AccrualOutcome {
  elapsed: number;
  borrowInterest: bigint;
  supplyInterest: bigint;
  /** Part of borrowInterest kept by the protocol */
  reserveShare: bigint;
}

const NO_ACCRUAL: AccrualOutcome = { elapsed: 0, borrowInterest: 0n, supplyInterest: 0n, reserveShare: 0n };

/**
 * Mutates `reserve` in place. Calling twice with the same `now` (or an
 * earlier one) is a no-op.
 */
export function accrue(reserve: Reserve, now: number): AccrualOutcome {
  const elapsed = now - reserve.lastUpdateTimestamp;
  if (elapsed <= 0) {
    return NO_ACCRUAL;
  }

  const rates = computeRates(
    reserve.rateModel,
    reserve.totalBorrows,
    reserve.availableLiquidity,
    reserve.reserveFactorBps
  );

  const dt = BigInt(elapsed);
  const borrowFactor = RAY + rates.borrowRate * dt;
  const supplyFactor = RAY + rates.supplyRate * dt;

  const newTotalBorrows = rayMul(reserve.totalBorrows, borrowFactor);
  const newTotalDeposits = rayMul(reserve.totalDeposits, supplyFactor);
  const borrowInterest = newTotalBorrows - reserve.totalBorrows;
  const supplyInterest = newTotalDeposits - reserve.totalDeposits;
  const reserveShare = saturatingSub(borrowInterest, supplyInterest);

  reserve.borrowIndex = rayMul(reserve.borrowIndex, borrowFactor);
  reserve.supplyIndex = rayMul(reserve.supplyIndex, supplyFactor);
  reserve.totalBorrows = newTotalBorrows;
  reserve.totalDeposits = newTotalDeposits + reserveShare;
  reserve.totalReserves += reserveShare;
  reserve.lastUpdateTimestamp = now;

  return { elapsed, borrowInterest, supplyInterest, reserveShare };
}

export function cloneReserve(reserve: Reserve): Reserve {
  return {
    ...reserve,
    rateModel: { ...reserve.rateModel },
    liquidation: { ...reserve.liquidation }
  };
}

/**
 * Accrued copy of `reserve`; the input is left untouched.
 */
export function projectReserve(reserve: Reserve, now: number): Reserve {
  const copy = cloneReserve(reserve);
  accrue(copy, now);
  return copy;
}
