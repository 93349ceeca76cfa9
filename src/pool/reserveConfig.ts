/**
 * Reserve listing and parameter validation
 *
 * Listings carry yearly rates; they are converted to per-second rates here,
 * once, so accrual never divides by the year length.
 */

import type { AssetId, LiquidationConfig, RateModelConfig, Reserve } from '../types/index.js';
import { RAY, annualToPerSecond } from '../utils/fixedPoint.js';
import { LendingError } from './errors.js';

const MAX_BPS = 10_000;

export interface ReserveListing {
  asset: AssetId;
  decimals: number;
  /** Yearly rates, RAY */
  rateModel: RateModelConfig;
  reserveFactorBps: number;
  liquidation: LiquidationConfig;
  supplyCap?: bigint;
  borrowCap?: bigint;
}

function invalid(message: string): LendingError {
  return new LendingError('InvalidConfig', message);
}

function requireBps(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > MAX_BPS) {
    throw invalid(`${name} must be an integer in [0, ${MAX_BPS}] bps, got ${value}`);
  }
}

export function validateRateModel(model: RateModelConfig): void {
  const rates: Array<[string, bigint]> =
    model.kind === 'kinked'
      ? [['baseRate', model.baseRate], ['slope1', model.slope1], ['slope2', model.slope2]]
      : model.kind === 'linear'
        ? [['baseRate', model.baseRate], ['slope', model.slope]]
        : [['rate', model.rate]];

  for (const [name, value] of rates) {
    if (value < 0n) {
      throw invalid(`${model.kind} ${name} must be non-negative`);
    }
  }

  if (model.kind === 'kinked' && (model.optimalUtilization < 0n || model.optimalUtilization > RAY)) {
    throw invalid('optimalUtilization must be within [0, 1] (RAY)');
  }
}

export function validateLiquidationConfig(liquidation: LiquidationConfig): void {
  requireBps('collateralFactor', liquidation.collateralFactorBps);
  requireBps('liquidationThreshold', liquidation.liquidationThresholdBps);
  requireBps('liquidationBonus', liquidation.liquidationBonusBps);
  requireBps('closeFactor', liquidation.closeFactorBps);

  if (liquidation.liquidationThresholdBps < liquidation.collateralFactorBps) {
    throw invalid(
      `liquidationThreshold (${liquidation.liquidationThresholdBps}) must be >= ` +
      `collateralFactor (${liquidation.collateralFactorBps})`
    );
  }
  if (liquidation.closeFactorBps === 0) {
    throw invalid('closeFactor must be positive');
  }
}

export function validateReserveFactor(reserveFactorBps: number): void {
  requireBps('reserveFactor', reserveFactorBps);
}

export function validateListing(listing: ReserveListing): void {
  if (listing.asset.trim() === '') {
    throw invalid('asset id must not be empty');
  }
  if (!Number.isInteger(listing.decimals) || listing.decimals < 0 || listing.decimals > 36) {
    throw invalid(`decimals must be an integer in [0, 36], got ${listing.decimals}`);
  }
  validateRateModel(listing.rateModel);
  validateReserveFactor(listing.reserveFactorBps);
  validateLiquidationConfig(listing.liquidation);
  if ((listing.supplyCap ?? 0n) < 0n || (listing.borrowCap ?? 0n) < 0n) {
    throw invalid('caps must be non-negative');
  }
}

/**
 * Same curve with every rate divided by the year length
 */
export function toPerSecondModel(model: RateModelConfig): RateModelConfig {
  switch (model.kind) {
    case 'fixed':
      return { kind: 'fixed', rate: annualToPerSecond(model.rate) };
    case 'linear':
      return {
        kind: 'linear',
        baseRate: annualToPerSecond(model.baseRate),
        slope: annualToPerSecond(model.slope)
      };
    case 'kinked':
      return {
        kind: 'kinked',
        baseRate: annualToPerSecond(model.baseRate),
        optimalUtilization: model.optimalUtilization,
        slope1: annualToPerSecond(model.slope1),
        slope2: annualToPerSecond(model.slope2)
      };
  }
}

export function createReserve(listing: ReserveListing, now: number): Reserve {
  validateListing(listing);

  return {
    asset: listing.asset,
    decimals: listing.decimals,
    totalDeposits: 0n,
    totalBorrows: 0n,
    availableLiquidity: 0n,
    totalReserves: 0n,
    borrowIndex: RAY,
    supplyIndex: RAY,
    lastUpdateTimestamp: now,
    rateModel: toPerSecondModel(listing.rateModel),
    reserveFactorBps: listing.reserveFactorBps,
    liquidation: { ...listing.liquidation },
    supplyCap: listing.supplyCap ?? 0n,
    borrowCap: listing.borrowCap ?? 0n,
    isActive: true,
    isFrozen: false
  };
}
