// Unit tests for HealthFactorCalculator
import { describe, it, expect, beforeEach } from 'vitest';

import {
  HealthFactorCalculator,
  MAX_HEALTH_FACTOR,
  healthFactorOf
} from '../../../src/risk/HealthFactorCalculator.js';
import { PriceGuard } from '../../../src/risk/PriceGuard.js';
import { ReserveStore } from '../../../src/pool/ReserveStore.js';
import { Transaction } from '../../../src/pool/Transaction.js';
import { createReserve } from '../../../src/pool/reserveConfig.js';
import { isLendingError } from '../../../src/pool/errors.js';
import { RAY, WAD } from '../../../src/utils/fixedPoint.js';
import { ManualClock, ManualPriceOracle, T0 } from '../../helpers/fakes.js';
import { ADMIN, ETH_LISTING, USDC_LISTING, eth, usdc } from '../../helpers/pool.js';

describe('HealthFactorCalculator', () => {
  let store: ReserveStore;
  let oracle: ManualPriceOracle;
  let guard: PriceGuard;
  const calculator = new HealthFactorCalculator();

  const tx = (): Transaction => new Transaction(store, guard, T0);

  beforeEach(() => {
    store = new ReserveStore(ADMIN);
    store.putReserve(createReserve(USDC_LISTING, T0));
    store.putReserve(createReserve(ETH_LISTING, T0));

    oracle = new ManualPriceOracle(new ManualClock());
    oracle.setPrice('USDC', 1);
    oracle.setPrice('ETH', 2000);
    guard = new PriceGuard(oracle, { maxAgeSec: 3600, maxConfidenceBps: 0, maxDeviationBps: 0 });

    store.putDeposit('bob', 'ETH', { principal: eth('10'), indexSnapshot: RAY, useAsCollateral: true });
  });

  it('should compute HF 3.0 for 10 ETH @ $2000 against 5000 USDC at 75% CF', () => {
    store.putBorrow('bob', 'USDC', { principal: usdc('5000'), indexSnapshot: RAY });

    const snapshot = calculator.calculate(tx(), 'bob');

    expect(snapshot.collateralValue).toBe(15_000n * WAD);
    expect(snapshot.liquidationThresholdValue).toBe(16_000n * WAD);
    expect(snapshot.debtValue).toBe(5_000n * WAD);
    expect(snapshot.healthFactor).toBe(3n * WAD);
    expect(calculator.isLiquidatable(snapshot)).toBe(false);
  });

  it('should compute HF 0.9 once ETH falls to $600', () => {
    store.putBorrow('bob', 'USDC', { principal: usdc('5000'), indexSnapshot: RAY });
    oracle.setPrice('ETH', 600);

    const snapshot = calculator.calculate(tx(), 'bob');

    expect(snapshot.collateralValue).toBe(4_500n * WAD);
    expect(snapshot.healthFactor).toBe((9n * WAD) / 10n);
    expect(calculator.isLiquidatable(snapshot)).toBe(true);
  });

  it('should return the max sentinel for an account without debt and price nothing for it', () => {
    store.putDeposit('bob', 'ETH', { principal: eth('10'), indexSnapshot: RAY, useAsCollateral: false });

    const snapshot = calculator.calculate(tx(), 'bob');

    expect(snapshot.healthFactor).toBe(MAX_HEALTH_FACTOR);
    expect(oracle.calls).toBe(0);
  });

  it('should ignore deposits not enabled as collateral', () => {
    store.putDeposit('bob', 'ETH', { principal: eth('10'), indexSnapshot: RAY, useAsCollateral: false });
    store.putBorrow('bob', 'USDC', { principal: usdc('100'), indexSnapshot: RAY });

    const snapshot = calculator.calculate(tx(), 'bob');

    expect(snapshot.collateralValue).toBe(0n);
    expect(snapshot.healthFactor).toBe(0n);
  });

  it('should pass requireHealthy for an account with no borrows', () => {
    expect(() => calculator.requireHealthy(tx(), 'bob')).not.toThrow();
  });

  it('should fail requireHealthy with HealthFactorTooLow below 1.0', () => {
    store.putBorrow('bob', 'USDC', { principal: usdc('15001'), indexSnapshot: RAY });

    let caught: unknown;
    try {
      calculator.requireHealthy(tx(), 'bob');
    } catch (err) {
      caught = err;
    }
    expect(isLendingError(caught, 'HealthFactorTooLow')).toBe(true);
  });

  it('should treat HF exactly 1.0 as healthy', () => {
    store.putBorrow('bob', 'USDC', { principal: usdc('15000'), indexSnapshot: RAY });

    const snapshot = calculator.calculate(tx(), 'bob');
    expect(snapshot.healthFactor).toBe(WAD);
    expect(calculator.isLiquidatable(snapshot)).toBe(false);
  });

  describe('healthFactorOf', () => {
    it('should handle the zero edges', () => {
      expect(healthFactorOf(0n, 0n)).toBe(MAX_HEALTH_FACTOR);
      expect(healthFactorOf(0n, WAD)).toBe(0n);
      expect(healthFactorOf(3n * WAD, 2n * WAD)).toBe((3n * WAD) / 2n);
    });
  });
});
