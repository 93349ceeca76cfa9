/**
 * LendingPool: public operations over the lending engine
 *
 * Every state-changing call runs inside one Transaction:
 *   accrue touched reserves -> check -> stage positions -> check solvency
 *   -> move tokens through the ledger -> commit
 * A throw anywhere before commit leaves the pool untouched. The single token
 * transfer happens after every check, so a ledger failure also aborts cleanly.
 *
 * Events:
 * - 'liquidation' (LiquidationRecord) after a liquidation is committed
 */

import { EventEmitter } from 'events';
import { formatUnits } from 'ethers';

import type {
  AccountId,
  AssetId,
  Clock,
  DepositPosition,
  LiquidationConfig,
  LiquidationRecord,
  LiquidationResult,
  OperationResult,
  PriceOracle,
  RateModelConfig,
  ReserveData,
  TokenLedger,
  UserAccountData,
  UserReserveData
} from '../types/index.js';
import { config } from '../config/index.js';
import { getLogger } from '../utils/logger.js';
import { MAX_UINT256, RAY, perSecondToAnnual, saturatingSub } from '../utils/fixedPoint.js';
import { computeRates } from '../risk/RateModel.js';
import { PriceGuard, type PriceGuardOptions } from '../risk/PriceGuard.js';
import { HealthFactorCalculator } from '../risk/HealthFactorCalculator.js';
import {
  lendingLiquidationsTotal,
  lendingOperationErrorsTotal,
  lendingOperationsTotal,
  lendingReserveUtilization
} from '../metrics/index.js';
import { LendingError, isLendingError } from './errors.js';
import { ReserveStore, type StoreSnapshot } from './ReserveStore.js';
import { Transaction } from './Transaction.js';
import { LiquidationEngine } from './LiquidationEngine.js';
import { currentBalance, decreasePosition, emptyPosition, increasePosition } from './UserPosition.js';
import {
  createReserve,
  toPerSecondModel,
  validateLiquidationConfig,
  validateRateModel,
  validateReserveFactor,
  type ReserveListing
} from './reserveConfig.js';

export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000)
};

export interface LendingPoolOptions {
  oracle: PriceOracle;
  ledger: TokenLedger;
  clock?: Clock;
  /** Account allowed to list and configure reserves */
  admin?: AccountId;
  /** Account holding pooled liquidity on the ledger */
  poolAccount?: AccountId;
  priceGuard?: PriceGuardOptions;
}

export interface ReserveFlags {
  isActive?: boolean;
  isFrozen?: boolean;
}

export interface ReserveCaps {
  supplyCap?: bigint;
  borrowCap?: bigint;
}

export class LendingPool extends EventEmitter {
  private readonly log = getLogger('lending-pool');
  private readonly store: ReserveStore;
  private readonly priceGuard: PriceGuard;
  private readonly healthCalculator = new HealthFactorCalculator();
  private readonly liquidationEngine: LiquidationEngine;
  private readonly ledger: TokenLedger;
  private readonly clock: Clock;
  private readonly poolAccount: AccountId;

  constructor(options: LendingPoolOptions) {
    super();
    this.store = new ReserveStore(options.admin ?? config.adminAccount);
    this.priceGuard = new PriceGuard(options.oracle, options.priceGuard);
    this.liquidationEngine = new LiquidationEngine(this.healthCalculator);
    this.ledger = options.ledger;
    this.clock = options.clock ?? systemClock;
    this.poolAccount = options.poolAccount ?? config.poolAccount;
  }

  // ---------------------------------------------------------------------------
  // Admin
  // ---------------------------------------------------------------------------

  listReserve(caller: AccountId, listing: ReserveListing): void {
    this.requireAdmin(caller);
    if (this.store.hasReserve(listing.asset)) {
      throw new LendingError('ReserveAlreadyListed', `Reserve ${listing.asset} already exists`);
    }
    this.store.putReserve(createReserve(listing, this.clock.now()));
    this.log.info('Reserve listed', {
      asset: listing.asset,
      rateModel: listing.rateModel.kind,
      collateralFactorBps: listing.liquidation.collateralFactorBps
    });
  }

  /**
   * Swap the rate curve (yearly rates). Interest up to now accrues under the old curve.
   */
  updateRateModel(
    caller: AccountId,
    asset: AssetId,
    annualModel: RateModelConfig,
    reserveFactorBps?: number
  ): void {
    this.requireAdmin(caller);
    validateRateModel(annualModel);
    if (reserveFactorBps !== undefined) {
      validateReserveFactor(reserveFactorBps);
    }

    this.run('updateRateModel', (tx) => {
      const reserve = tx.reserveForWrite(asset);
      reserve.rateModel = toPerSecondModel(annualModel);
      if (reserveFactorBps !== undefined) {
        reserve.reserveFactorBps = reserveFactorBps;
      }
      tx.commit();
    });
  }

  updateLiquidationConfig(caller: AccountId, asset: AssetId, liquidation: LiquidationConfig): void {
    this.requireAdmin(caller);
    validateLiquidationConfig(liquidation);

    this.run('updateLiquidationConfig', (tx) => {
      const reserve = tx.reserveForWrite(asset);
      reserve.liquidation = { ...liquidation };
      tx.commit();
    });
  }

  setReserveFlags(caller: AccountId, asset: AssetId, flags: ReserveFlags): void {
    this.requireAdmin(caller);

    this.run('setReserveFlags', (tx) => {
      const reserve = tx.reserveForWrite(asset);
      reserve.isActive = flags.isActive ?? reserve.isActive;
      reserve.isFrozen = flags.isFrozen ?? reserve.isFrozen;
      tx.commit();
    });
  }

  setCaps(caller: AccountId, asset: AssetId, caps: ReserveCaps): void {
    this.requireAdmin(caller);
    if ((caps.supplyCap ?? 0n) < 0n || (caps.borrowCap ?? 0n) < 0n) {
      throw new LendingError('InvalidConfig', 'caps must be non-negative');
    }

    this.run('setCaps', (tx) => {
      const reserve = tx.reserveForWrite(asset);
      reserve.supplyCap = caps.supplyCap ?? reserve.supplyCap;
      reserve.borrowCap = caps.borrowCap ?? reserve.borrowCap;
      tx.commit();
    });
  }

  transferAdmin(caller: AccountId, newAdmin: AccountId): void {
    this.requireAdmin(caller);
    this.store.setAdmin(newAdmin);
    this.log.info('Admin transferred', { from: caller, to: newAdmin });
  }

  // ---------------------------------------------------------------------------
  // Positions
  // ---------------------------------------------------------------------------

  deposit(user: AccountId, asset: AssetId, amount: bigint): OperationResult {
    return this.run('deposit', (tx) => {
      requirePositive(amount);
      const reserve = tx.reserveForWrite(asset);
      requireOpen(reserve.asset, reserve.isActive, reserve.isFrozen);

      if (reserve.supplyCap > 0n && reserve.totalDeposits + amount > reserve.supplyCap) {
        throw new LendingError(
          'SupplyCapExceeded',
          `Deposit of ${amount} ${asset} exceeds supply cap ${reserve.supplyCap}`
        );
      }

      const position: DepositPosition = tx.deposit(user, asset)
        ?? { ...emptyPosition(reserve.supplyIndex), useAsCollateral: true };
      tx.setDeposit(user, asset, increasePosition(position, reserve.supplyIndex, amount));

      reserve.totalDeposits += amount;
      reserve.availableLiquidity += amount;

      this.transfer(asset, user, this.poolAccount, amount);
      tx.commit();

      this.log.info('Deposit', { user, asset, amount: formatUnits(amount, reserve.decimals) });
      return { amount, footprint: tx.footprint() };
    });
  }

  /**
   * Withdraw `amount`, or everything when amount is MAX_UINT256
   */
  withdraw(user: AccountId, asset: AssetId, amount: bigint): OperationResult {
    return this.run('withdraw', (tx) => {
      requirePositive(amount);
      const reserve = tx.reserveForWrite(asset);
      requireOpen(reserve.asset, reserve.isActive, false);

      const position = tx.deposit(user, asset);
      if (!position) {
        throw new LendingError('InsufficientBalance', `${user} has no ${asset} deposit`);
      }

      const balance = currentBalance(position, reserve.supplyIndex);
      const toWithdraw = amount === MAX_UINT256 ? balance : amount;
      const updated = decreasePosition(position, reserve.supplyIndex, toWithdraw);

      if (toWithdraw > reserve.availableLiquidity) {
        throw new LendingError(
          'InsufficientLiquidity',
          `Withdrawal of ${toWithdraw} ${asset} exceeds available liquidity ${reserve.availableLiquidity}`
        );
      }

      tx.setDeposit(user, asset, updated);
      reserve.totalDeposits = saturatingSub(reserve.totalDeposits, toWithdraw);
      reserve.availableLiquidity -= toWithdraw;

      if (position.useAsCollateral) {
        this.healthCalculator.requireHealthy(tx, user);
      }

      this.transfer(asset, this.poolAccount, user, toWithdraw);
      tx.commit();

      this.log.info('Withdraw', { user, asset, amount: formatUnits(toWithdraw, reserve.decimals) });
      return { amount: toWithdraw, footprint: tx.footprint() };
    });
  }

  borrow(user: AccountId, asset: AssetId, amount: bigint): OperationResult {
    return this.run('borrow', (tx) => {
      requirePositive(amount);
      const reserve = tx.reserveForWrite(asset);
      requireOpen(reserve.asset, reserve.isActive, reserve.isFrozen);

      if (amount > reserve.availableLiquidity) {
        throw new LendingError(
          'InsufficientLiquidity',
          `Borrow of ${amount} ${asset} exceeds available liquidity ${reserve.availableLiquidity}`
        );
      }
      if (reserve.borrowCap > 0n && reserve.totalBorrows + amount > reserve.borrowCap) {
        throw new LendingError(
          'BorrowCapExceeded',
          `Borrow of ${amount} ${asset} exceeds borrow cap ${reserve.borrowCap}`
        );
      }

      const position = tx.borrow(user, asset) ?? emptyPosition(reserve.borrowIndex);
      tx.setBorrow(user, asset, increasePosition(position, reserve.borrowIndex, amount));

      reserve.totalBorrows += amount;
      reserve.availableLiquidity -= amount;

      this.healthCalculator.requireHealthy(tx, user);

      this.transfer(asset, this.poolAccount, user, amount);
      tx.commit();

      this.log.info('Borrow', { user, asset, amount: formatUnits(amount, reserve.decimals) });
      return { amount, footprint: tx.footprint() };
    });
  }

  /**
   * Repay up to `amount`; anything above the outstanding debt is not taken.
   */
  repay(user: AccountId, asset: AssetId, amount: bigint): OperationResult {
    return this.run('repay', (tx) => {
      requirePositive(amount);
      const reserve = tx.reserveForWrite(asset);
      requireOpen(reserve.asset, reserve.isActive, false);

      const position = tx.borrow(user, asset);
      const debt = position ? currentBalance(position, reserve.borrowIndex) : 0n;
      if (!position || debt === 0n) {
        throw new LendingError('NoDebt', `${user} has no ${asset} debt to repay`);
      }

      const paid = amount > debt ? debt : amount;
      tx.setBorrow(user, asset, decreasePosition(position, reserve.borrowIndex, paid));

      reserve.totalBorrows = saturatingSub(reserve.totalBorrows, paid);
      reserve.availableLiquidity += paid;

      this.transfer(asset, user, this.poolAccount, paid);
      tx.commit();

      this.log.info('Repay', { user, asset, amount: formatUnits(paid, reserve.decimals) });
      return { amount: paid, footprint: tx.footprint() };
    });
  }

  setUseAsCollateral(user: AccountId, asset: AssetId, enabled: boolean): OperationResult {
    return this.run('setUseAsCollateral', (tx) => {
      const reserve = tx.reserve(asset);
      const position = tx.deposit(user, asset);
      if (!position || currentBalance(position, reserve.supplyIndex) === 0n) {
        throw new LendingError('InsufficientBalance', `${user} has no ${asset} deposit`);
      }

      if (position.useAsCollateral !== enabled) {
        tx.setDeposit(user, asset, { ...position, useAsCollateral: enabled });
        if (!enabled) {
          this.healthCalculator.requireHealthy(tx, user);
        }
        tx.commit();
      }

      return { amount: 0n, footprint: tx.footprint() };
    });
  }

  liquidate(
    liquidator: AccountId,
    borrower: AccountId,
    debtAsset: AssetId,
    collateralAsset: AssetId,
    repayAmount: bigint
  ): LiquidationResult {
    const result = this.run('liquidate', (tx): LiquidationResult => {
      const record = this.liquidationEngine.execute(tx, {
        liquidator,
        borrower,
        debtAsset,
        collateralAsset,
        repayAmount
      });

      this.transfer(debtAsset, liquidator, this.poolAccount, record.actualRepaid);
      tx.commit();

      return {
        actualRepaid: record.actualRepaid,
        collateralSeized: record.collateralSeized,
        record,
        footprint: tx.footprint()
      };
    });

    this.onLiquidation(result.record);
    return result;
  }

  // ---------------------------------------------------------------------------
  // Read-only views (projected to now, never committed)
  // ---------------------------------------------------------------------------

  getReserveData(asset: AssetId): ReserveData {
    const reserve = this.view().reserve(asset);
    const rates = computeRates(
      reserve.rateModel,
      reserve.totalBorrows,
      reserve.availableLiquidity,
      reserve.reserveFactorBps
    );

    return {
      asset,
      totalDeposits: reserve.totalDeposits,
      totalBorrows: reserve.totalBorrows,
      availableLiquidity: reserve.availableLiquidity,
      totalReserves: reserve.totalReserves,
      utilization: rates.utilization,
      borrowRate: rates.borrowRate,
      supplyRate: rates.supplyRate,
      borrowRateAnnual: perSecondToAnnual(rates.borrowRate),
      supplyRateAnnual: perSecondToAnnual(rates.supplyRate),
      borrowIndex: reserve.borrowIndex,
      supplyIndex: reserve.supplyIndex,
      lastUpdateTimestamp: reserve.lastUpdateTimestamp
    };
  }

  getUserHealthFactor(user: AccountId): bigint {
    return this.healthCalculator.calculate(this.view(), user).healthFactor;
  }

  getUserAccountData(user: AccountId): UserAccountData {
    const snapshot = this.healthCalculator.calculate(this.view(), user);
    return {
      ...snapshot,
      availableToBorrow: saturatingSub(snapshot.collateralValue, snapshot.debtValue)
    };
  }

  getUserReserveData(user: AccountId, asset: AssetId): UserReserveData {
    const view = this.view();
    const reserve = view.reserve(asset);
    const deposit = view.deposit(user, asset);
    const borrow = view.borrow(user, asset);

    return {
      asset,
      depositBalance: deposit ? currentBalance(deposit, reserve.supplyIndex) : 0n,
      borrowBalance: borrow ? currentBalance(borrow, reserve.borrowIndex) : 0n,
      useAsCollateral: deposit?.useAsCollateral ?? false
    };
  }

  listAssets(): AssetId[] {
    return this.store.listAssets();
  }

  getAdmin(): AccountId {
    return this.store.getAdmin();
  }

  snapshot(): StoreSnapshot {
    return this.store.snapshot();
  }

  // ---------------------------------------------------------------------------

  private view(): Transaction {
    return new Transaction(this.store, this.priceGuard, this.clock.now());
  }

  private run<T>(operation: string, body: (tx: Transaction) => T): T {
    const tx = this.view();
    try {
      const result = body(tx);
      lendingOperationsTotal.inc({ operation, status: 'ok' });
      this.recordUtilization(tx);
      return result;
    } catch (err) {
      lendingOperationsTotal.inc({ operation, status: 'error' });
      if (isLendingError(err)) {
        lendingOperationErrorsTotal.inc({ operation, category: err.category, code: err.code });
        this.log.warn(`${operation} aborted`, { code: err.code, reason: err.message });
      } else {
        this.log.error(`${operation} failed`, { error: err });
      }
      throw err;
    }
  }

  private transfer(asset: AssetId, from: AccountId, to: AccountId, amount: bigint): void {
    try {
      this.ledger.transfer(asset, from, to, amount);
    } catch (err) {
      if (isLendingError(err)) {
        throw err;
      }
      throw new LendingError(
        'InsufficientBalance',
        `Transfer of ${amount} ${asset} from ${from} to ${to} failed`,
        { cause: err }
      );
    }
  }

  private requireAdmin(caller: AccountId): void {
    if (caller !== this.store.getAdmin()) {
      throw new LendingError('Unauthorized', `${caller} is not the pool admin`);
    }
  }

  private recordUtilization(tx: Transaction): void {
    for (const reserve of tx.touchedReserves()) {
      const { utilization } = computeRates(
        reserve.rateModel,
        reserve.totalBorrows,
        reserve.availableLiquidity,
        reserve.reserveFactorBps
      );
      lendingReserveUtilization.set({ asset: reserve.asset }, Number((utilization * 10_000n) / RAY) / 10_000);
    }
  }

  private onLiquidation(record: LiquidationRecord): void {
    lendingLiquidationsTotal.inc({ debtAsset: record.debtAsset, collateralAsset: record.collateralAsset });
    this.log.info('Liquidation executed', {
      liquidator: record.liquidator,
      borrower: record.borrower,
      debtAsset: record.debtAsset,
      collateralAsset: record.collateralAsset,
      actualRepaid: record.actualRepaid,
      collateralSeized: record.collateralSeized,
      healthFactorBefore: formatUnits(record.healthFactorBefore, 18),
      healthFactorAfter: formatUnits(record.healthFactorAfter, 18)
    });
    this.emit('liquidation', record);
  }
}

function requirePositive(amount: bigint): void {
  if (amount <= 0n) {
    throw new LendingError('ZeroAmount', 'Amount must be greater than zero');
  }
}

function requireOpen(asset: AssetId, isActive: boolean, isFrozen: boolean): void {
  if (!isActive) {
    throw new LendingError('ReserveInactive', `Reserve ${asset} is not active`);
  }
  if (isFrozen) {
    throw new LendingError('ReserveFrozen', `Reserve ${asset} is frozen`);
  }
}
