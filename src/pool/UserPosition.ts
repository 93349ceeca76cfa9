/**
 * UserPosition accounting: a principal paired with the reserve index at the
 * last touch. Every change re-bases the principal to the current index.
 */

import type { UserPosition } from '../types/index.js';
import { mulDiv } from '../utils/fixedPoint.js';
import { LendingError } from './errors.js';

/**
 * principal * reserveIndex / indexSnapshot, truncated
 */
export function currentBalance(position: UserPosition, reserveIndex: bigint): bigint {
  if (position.principal === 0n) {
    return 0n;
  }
  return mulDiv(position.principal, reserveIndex, position.indexSnapshot);
}

export function increasePosition<P extends UserPosition>(
  position: P,
  reserveIndex: bigint,
  delta: bigint
): P {
  return {
    ...position,
    principal: currentBalance(position, reserveIndex) + delta,
    indexSnapshot: reserveIndex
  };
}

/**
 * @throws LendingError InsufficientBalance when delta exceeds the current balance
 */
export function decreasePosition<P extends UserPosition>(
  position: P,
  reserveIndex: bigint,
  delta: bigint
): P {
  const balance = currentBalance(position, reserveIndex);
  if (delta > balance) {
    throw new LendingError(
      'InsufficientBalance',
      `Cannot remove ${delta} from a position holding ${balance}`
    );
  }

  return {
    ...position,
    principal: balance - delta,
    indexSnapshot: reserveIndex
  };
}

export function emptyPosition(reserveIndex: bigint): UserPosition {
  return { principal: 0n, indexSnapshot: reserveIndex };
}
