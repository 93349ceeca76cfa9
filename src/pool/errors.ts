/**
 * LendingError: every guard in the pool fails with one of these.
 *
 * Errors are raised before any mutation is committed, so a thrown LendingError
 * always means the operation had no effect.
 */

export type LendingErrorCategory = 'validation' | 'state' | 'safety' | 'authorization';

const ERROR_CATEGORIES = {
  ZeroAmount: 'validation',
  UnsupportedAsset: 'validation',
  InvalidConfig: 'validation',
  ReserveAlreadyListed: 'validation',
  ReserveInactive: 'validation',
  ReserveFrozen: 'validation',
  SelfLiquidation: 'validation',

  InsufficientBalance: 'state',
  InsufficientLiquidity: 'state',
  InsufficientCollateral: 'state',
  CollateralNotEnabled: 'state',
  SupplyCapExceeded: 'state',
  BorrowCapExceeded: 'state',
  NoDebt: 'state',

  HealthFactorTooLow: 'safety',
  NotLiquidatable: 'safety',
  ZeroLiquidation: 'safety',
  StalePrice: 'safety',
  PriceUnavailable: 'safety',
  PriceConfidenceTooLow: 'safety',
  PriceDeviationTooHigh: 'safety',

  Unauthorized: 'authorization'
} as const satisfies Record<string, LendingErrorCategory>;

export type LendingErrorCode = keyof typeof ERROR_CATEGORIES;

export class LendingError extends Error {
  public readonly category: LendingErrorCategory;

  constructor(
    public readonly code: LendingErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'LendingError';
    this.category = ERROR_CATEGORIES[code];
  }
}

export function isLendingError(error: unknown, code?: LendingErrorCode): error is LendingError {
  return error instanceof LendingError && (code === undefined || error.code === code);
}
