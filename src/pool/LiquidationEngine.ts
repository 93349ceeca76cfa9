/**
 * LiquidationEngine: bounded partial liquidation of an unhealthy account
 *
 * Healthy (HF >= 1.0) and Liquidatable (HF < 1.0) are recomputed on every call.
 * A liquidator repays at most closeFactor of one debt position and receives
 * the equivalent collateral plus the liquidation bonus as a deposit position.
 *
 * The engine only stages changes on the transaction; the pool moves tokens and
 * commits.
 */

import type { AccountId, AssetId, DepositPosition, LiquidationRecord } from '../types/index.js';
import type { HealthFactorCalculator } from '../risk/HealthFactorCalculator.js';
import { BPS, bpsMul, fromValue, minBigInt, saturatingSub, toValue } from '../utils/fixedPoint.js';
import { LendingError } from './errors.js';
import type { Transaction } from './Transaction.js';
import { currentBalance, decreasePosition, emptyPosition, increasePosition } from './UserPosition.js';

export interface LiquidationParams {
  liquidator: AccountId;
  borrower: AccountId;
  debtAsset: AssetId;
  collateralAsset: AssetId;
  repayAmount: bigint;
}

export class LiquidationEngine {
  constructor(private readonly healthCalculator: HealthFactorCalculator) {}

  /**
   * Stage a liquidation on `tx`. Every check runs before the first staged write.
   */
  execute(tx: Transaction, params: LiquidationParams): LiquidationRecord {
    const { liquidator, borrower, debtAsset, collateralAsset, repayAmount } = params;

    if (liquidator === borrower) {
      throw new LendingError('SelfLiquidation', `${liquidator} cannot liquidate its own position`);
    }

    // 1. accrue both reserves
    const debtReserve = tx.reserveForWrite(debtAsset);
    const collateralReserve = tx.reserveForWrite(collateralAsset);
    for (const reserve of [debtReserve, collateralReserve]) {
      if (!reserve.isActive) {
        throw new LendingError('ReserveInactive', `Reserve ${reserve.asset} is not active`);
      }
    }

    // 2. fresh health factor
    const before = this.healthCalculator.calculate(tx, borrower);
    if (!this.healthCalculator.isLiquidatable(before)) {
      throw new LendingError(
        'NotLiquidatable',
        `Health factor of ${borrower} is ${before.healthFactor}, position is healthy`
      );
    }

    // 3-4. close factor bound
    const debtPosition = tx.borrow(borrower, debtAsset);
    const debtBalance = debtPosition ? currentBalance(debtPosition, debtReserve.borrowIndex) : 0n;
    const maxRepay = bpsMul(debtBalance, debtReserve.liquidation.closeFactorBps);
    const actualRepaid = minBigInt(repayAmount, maxRepay);
    if (actualRepaid <= 0n || !debtPosition) {
      throw new LendingError(
        'ZeroLiquidation',
        `Nothing to repay for ${borrower} in ${debtAsset} (requested ${repayAmount}, max ${maxRepay})`
      );
    }

    // 5. collateral owed, bonus included
    const repayValue = toValue(actualRepaid, debtReserve.decimals, tx.price(debtAsset));
    const seizeValue = bpsMul(repayValue, BPS + BigInt(collateralReserve.liquidation.liquidationBonusBps));
    const collateralSeized = fromValue(seizeValue, collateralReserve.decimals, tx.price(collateralAsset));

    if (collateralSeized === 0n) {
      throw new LendingError(
        'ZeroLiquidation',
        `Repaying ${actualRepaid} ${debtAsset} seizes no ${collateralAsset} after rounding`
      );
    }

    // 6. borrower must hold enough of it, pledged as collateral
    const collateralPosition = tx.deposit(borrower, collateralAsset);
    if (collateralPosition && !collateralPosition.useAsCollateral) {
      throw new LendingError(
        'CollateralNotEnabled',
        `${borrower} has not enabled ${collateralAsset} as collateral`
      );
    }
    const collateralBalance = collateralPosition
      ? currentBalance(collateralPosition, collateralReserve.supplyIndex)
      : 0n;
    if (!collateralPosition || collateralSeized > collateralBalance) {
      throw new LendingError(
        'InsufficientCollateral',
        `Seizing ${collateralSeized} ${collateralAsset} exceeds ${borrower}'s balance ${collateralBalance}`
      );
    }

    // 7. stage all mutations
    tx.setBorrow(borrower, debtAsset, decreasePosition(debtPosition, debtReserve.borrowIndex, actualRepaid));
    tx.setDeposit(
      borrower,
      collateralAsset,
      decreasePosition(collateralPosition, collateralReserve.supplyIndex, collateralSeized)
    );

    const liquidatorPosition: DepositPosition = tx.deposit(liquidator, collateralAsset)
      ?? { ...emptyPosition(collateralReserve.supplyIndex), useAsCollateral: true };
    tx.setDeposit(
      liquidator,
      collateralAsset,
      increasePosition(liquidatorPosition, collateralReserve.supplyIndex, collateralSeized)
    );

    debtReserve.totalBorrows = saturatingSub(debtReserve.totalBorrows, actualRepaid);
    debtReserve.availableLiquidity += actualRepaid;

    // 8. outcome, HF after is reported but not required to improve
    const after = this.healthCalculator.calculate(tx, borrower);

    return {
      liquidator,
      borrower,
      debtAsset,
      collateralAsset,
      actualRepaid,
      collateralSeized,
      healthFactorBefore: before.healthFactor,
      healthFactorAfter: after.healthFactor,
      timestamp: tx.now
    };
  }
}
