// HealthFactorCalculator: risk-adjusted collateral vs debt for one account
import type { AccountId, HealthSnapshot } from '../types/index.js';
import type { AccountView } from '../pool/Transaction.js';
import { currentBalance } from '../pool/UserPosition.js';
import { LendingError } from '../pool/errors.js';
import { MAX_UINT256, WAD, bpsMul, toValue, wadDiv } from '../utils/fixedPoint.js';
import { lendingHealthChecksTotal } from '../metrics/index.js';

/** Health factor of an account without debt */
export const MAX_HEALTH_FACTOR = MAX_UINT256;

/** 1.0 in WAD; below this an account can be liquidated */
export const LIQUIDATION_HEALTH_FACTOR = WAD;

/**
 * Health Factor Formula:
 * HF = (Σ collateral_value × collateralFactor) / Σ debt_value
 *
 * Only deposits flagged useAsCollateral count. Values are WAD USD, HF is WAD.
 */
export class HealthFactorCalculator {
  calculate(view: AccountView, user: AccountId): HealthSnapshot {
    let collateralValue = 0n;
    let liquidationThresholdValue = 0n;
    let debtValue = 0n;

    for (const asset of view.userAssets(user, 'deposit')) {
      const position = view.deposit(user, asset);
      if (!position || !position.useAsCollateral) continue;

      const reserve = view.reserve(asset);
      const balance = currentBalance(position, reserve.supplyIndex);
      if (balance === 0n) continue;

      const value = toValue(balance, reserve.decimals, view.price(asset));
      collateralValue += bpsMul(value, reserve.liquidation.collateralFactorBps);
      liquidationThresholdValue += bpsMul(value, reserve.liquidation.liquidationThresholdBps);
    }

    for (const asset of view.userAssets(user, 'borrow')) {
      const position = view.borrow(user, asset);
      if (!position) continue;

      const reserve = view.reserve(asset);
      const balance = currentBalance(position, reserve.borrowIndex);
      if (balance === 0n) continue;

      debtValue += toValue(balance, reserve.decimals, view.price(asset));
    }

    return {
      collateralValue,
      debtValue,
      liquidationThresholdValue,
      healthFactor: healthFactorOf(collateralValue, debtValue)
    };
  }

  isLiquidatable(snapshot: HealthSnapshot): boolean {
    const liquidatable = snapshot.healthFactor < LIQUIDATION_HEALTH_FACTOR;
    lendingHealthChecksTotal.inc({
      result: snapshot.debtValue === 0n ? 'no_debt' : liquidatable ? 'liquidatable' : 'healthy'
    });
    return liquidatable;
  }

  /**
   * Abort unless the account stays at HF >= 1.0. Accounts without borrows pass
   * without pricing anything.
   * @throws LendingError HealthFactorTooLow
   */
  requireHealthy(view: AccountView, user: AccountId): void {
    if (view.userAssets(user, 'borrow').length === 0) {
      return;
    }

    const snapshot = this.calculate(view, user);
    if (this.isLiquidatable(snapshot)) {
      throw new LendingError(
        'HealthFactorTooLow',
        `Health factor of ${user} would drop to ${snapshot.healthFactor} (< ${LIQUIDATION_HEALTH_FACTOR})`
      );
    }
  }
}

export function healthFactorOf(collateralValue: bigint, debtValue: bigint): bigint {
  if (debtValue === 0n) {
    return MAX_HEALTH_FACTOR;
  }
  if (collateralValue === 0n) {
    return 0n;
  }
  return wadDiv(collateralValue, debtValue);
}
