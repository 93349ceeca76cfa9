// Type definitions for the lending pool engine
//
// Units: amounts in asset base units, prices/values/health factors in WAD,
// indices/rates/utilization in RAY, risk parameters in basis points.

export type AssetId = string;
export type AccountId = string;

/**
 * Interest rate curve, selected once when the reserve is configured.
 * All rates are RAY per second.
 */
export type RateModelConfig =
  | {
      kind: 'kinked';
      baseRate: bigint;
      optimalUtilization: bigint;
      slope1: bigint;
      slope2: bigint;
    }
  | {
      kind: 'linear';
      baseRate: bigint;
      slope: bigint;
    }
  | {
      kind: 'fixed';
      rate: bigint;
    };

export type RateModelKind = RateModelConfig['kind'];

export interface LiquidationConfig {
  collateralFactorBps: number;
  liquidationThresholdBps: number;
  liquidationBonusBps: number;
  closeFactorBps: number;
}

export interface Reserve {
  asset: AssetId;
  decimals: number;

  totalDeposits: bigint;
  totalBorrows: bigint;
  availableLiquidity: bigint;
  totalReserves: bigint;

  borrowIndex: bigint;
  supplyIndex: bigint;
  lastUpdateTimestamp: number;

  rateModel: RateModelConfig;
  reserveFactorBps: number;
  liquidation: LiquidationConfig;

  supplyCap: bigint;
  borrowCap: bigint;
  isActive: boolean;
  isFrozen: boolean;
}

export type PositionSide = 'deposit' | 'borrow';

export interface UserPosition {
  principal: bigint;
  indexSnapshot: bigint;
}

export interface DepositPosition extends UserPosition {
  useAsCollateral: boolean;
}

export interface PriceQuote {
  /** USD per whole token, WAD */
  price: bigint;
  /** Unix seconds */
  timestamp: number;
  /** Absolute confidence interval, WAD */
  confidence?: bigint;
  /** Slow-moving reference (EMA/TWAP) used for the deviation check, WAD */
  referencePrice?: bigint;
}

/**
 * External price collaborator. Throwing means the price is unavailable.
 */
export interface PriceOracle {
  getPrice(asset: AssetId): PriceQuote;
}

/**
 * External token movement collaborator. Throwing means the sender cannot pay.
 */
export interface TokenLedger {
  transfer(asset: AssetId, from: AccountId, to: AccountId, amount: bigint): void;
}

export interface Clock {
  /** Unix seconds */
  now(): number;
}

export interface HealthSnapshot {
  collateralValue: bigint;
  debtValue: bigint;
  liquidationThresholdValue: bigint;
  healthFactor: bigint;
}

export interface ReserveData {
  asset: AssetId;
  totalDeposits: bigint;
  totalBorrows: bigint;
  availableLiquidity: bigint;
  totalReserves: bigint;
  utilization: bigint;
  borrowRate: bigint;
  supplyRate: bigint;
  borrowRateAnnual: bigint;
  supplyRateAnnual: bigint;
  borrowIndex: bigint;
  supplyIndex: bigint;
  lastUpdateTimestamp: number;
}

export interface UserAccountData extends HealthSnapshot {
  /** USD value (WAD) the user may still borrow while keeping health factor >= 1.0 */
  availableToBorrow: bigint;
}

export interface UserReserveData {
  asset: AssetId;
  depositBalance: bigint;
  borrowBalance: bigint;
  useAsCollateral: boolean;
}

/**
 * Resource keys an operation read or wrote. Two operations conflict only when
 * one's write set intersects the other's read or write set.
 */
export interface Footprint {
  reads: string[];
  writes: string[];
}

export interface OperationResult {
  /** Amount actually moved (repay/withdraw may be capped) */
  amount: bigint;
  footprint: Footprint;
}

export interface LiquidationRecord {
  liquidator: AccountId;
  borrower: AccountId;
  debtAsset: AssetId;
  collateralAsset: AssetId;
  actualRepaid: bigint;
  collateralSeized: bigint;
  healthFactorBefore: bigint;
  healthFactorAfter: bigint;
  timestamp: number;
}

export interface LiquidationResult {
  actualRepaid: bigint;
  collateralSeized: bigint;
  record: LiquidationRecord;
  footprint: Footprint;
}
