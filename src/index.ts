// Lending pool engine: public entry point
import { config } from './config/index.js';
import { loadMarketsFile } from './config/reserveSchema.js';
import { LendingPool, type LendingPoolOptions } from './pool/LendingPool.js';
import type { ReserveListing } from './pool/reserveConfig.js';
import { getLogger } from './utils/logger.js';

export * from './types/index.js';
export * from './utils/fixedPoint.js';
export { LendingError, isLendingError } from './pool/errors.js';
export type { LendingErrorCategory, LendingErrorCode } from './pool/errors.js';
export { LendingPool, systemClock } from './pool/LendingPool.js';
export type { LendingPoolOptions, ReserveCaps, ReserveFlags } from './pool/LendingPool.js';
export { ReserveStore } from './pool/ReserveStore.js';
export type { StoreSnapshot } from './pool/ReserveStore.js';
export { Transaction } from './pool/Transaction.js';
export type { AccountView } from './pool/Transaction.js';
export { accrue, projectReserve } from './pool/AccrualEngine.js';
export { currentBalance, increasePosition, decreasePosition } from './pool/UserPosition.js';
export { LiquidationEngine } from './pool/LiquidationEngine.js';
export type { ReserveListing } from './pool/reserveConfig.js';
export { computeRates, utilization, borrowRate, supplyRate } from './risk/RateModel.js';
export { PriceGuard } from './risk/PriceGuard.js';
export type { PriceGuardOptions } from './risk/PriceGuard.js';
export {
  HealthFactorCalculator,
  MAX_HEALTH_FACTOR,
  LIQUIDATION_HEALTH_FACTOR
} from './risk/HealthFactorCalculator.js';
export { parseReserveListing, loadMarketsFile } from './config/reserveSchema.js';
export { config } from './config/index.js';
export { registry } from './metrics/index.js';

const log = getLogger('bootstrap');

export interface BootstrapOptions extends LendingPoolOptions {
  /** Listings to register; defaults to the MARKETS_FILE contents when set */
  markets?: ReserveListing[];
}

/**
 * Create a pool and list its reserves as the admin account
 */
export async function bootstrapPool(options: BootstrapOptions): Promise<LendingPool> {
  const pool = new LendingPool(options);
  const marketsFile = config.marketsFile;
  const markets = options.markets
    ?? (marketsFile ? await loadMarketsFile(marketsFile) : []);

  for (const listing of markets) {
    pool.listReserve(pool.getAdmin(), listing);
  }

  log.info('Pool ready', { reserves: pool.listAssets() });
  return pool;
}
