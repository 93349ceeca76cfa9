// Unit tests for Transaction staging and footprints
import { describe, it, expect, beforeEach } from 'vitest';

import { Transaction } from '../../../src/pool/Transaction.js';
import { ReserveStore } from '../../../src/pool/ReserveStore.js';
import { createReserve } from '../../../src/pool/reserveConfig.js';
import { isLendingError } from '../../../src/pool/errors.js';
import { PriceGuard } from '../../../src/risk/PriceGuard.js';
import { RAY, WAD } from '../../../src/utils/fixedPoint.js';
import { DAY, ManualClock, ManualPriceOracle, T0 } from '../../helpers/fakes.js';
import { ADMIN, FIXED_10_PERCENT, USDC_LISTING, usdc } from '../../helpers/pool.js';

describe('Transaction', () => {
  let store: ReserveStore;
  let oracle: ManualPriceOracle;
  let guard: PriceGuard;

  beforeEach(() => {
    store = new ReserveStore(ADMIN);
    const reserve = createReserve({ ...USDC_LISTING, rateModel: FIXED_10_PERCENT }, T0);
    reserve.totalDeposits = usdc('1000');
    reserve.totalBorrows = usdc('500');
    reserve.availableLiquidity = usdc('500');
    store.putReserve(reserve);

    oracle = new ManualPriceOracle(new ManualClock(T0 + DAY));
    oracle.setPrice('USDC', 1);
    guard = new PriceGuard(oracle, { maxAgeSec: 3600 });
  });

  it('should leave the store untouched until commit', () => {
    const before = store.snapshot();
    const tx = new Transaction(store, guard, T0 + DAY);

    const draft = tx.reserveForWrite('USDC');
    draft.totalDeposits += 1n;
    tx.setDeposit('alice', 'USDC', { principal: 1n, indexSnapshot: RAY, useAsCollateral: true });

    expect(store.snapshot()).toEqual(before);

    tx.commit();
    expect(store.getReserve('USDC')?.lastUpdateTimestamp).toBe(T0 + DAY);
    expect(store.getDeposit('alice', 'USDC')?.principal).toBe(1n);
  });

  it('should refuse a second commit', () => {
    const tx = new Transaction(store, guard, T0);
    tx.commit();
    expect(() => tx.commit()).toThrow('Transaction already committed');
  });

  it('should return the same accrued draft for repeated writes', () => {
    const tx = new Transaction(store, guard, T0 + DAY);
    expect(tx.reserveForWrite('USDC')).toBe(tx.reserveForWrite('USDC'));
    expect(tx.reserve('USDC')).toBe(tx.reserveForWrite('USDC'));
  });

  it('should project reads to now without staging a write', () => {
    const tx = new Transaction(store, guard, T0 + DAY);
    const view = tx.reserve('USDC');

    expect(view.lastUpdateTimestamp).toBe(T0 + DAY);
    expect(view.totalBorrows).toBeGreaterThan(usdc('500'));
    expect(tx.footprint()).toEqual({ reads: ['reserve:USDC'], writes: [] });
  });

  it('should throw UnsupportedAsset for unknown reserves', () => {
    const tx = new Transaction(store, guard, T0);
    let caught: unknown;
    try {
      tx.reserveForWrite('DOGE');
    } catch (err) {
      caught = err;
    }
    expect(isLendingError(caught, 'UnsupportedAsset')).toBe(true);
  });

  it('should see its own staged positions and account asset lists', () => {
    store.putDeposit('alice', 'USDC', { principal: 5n, indexSnapshot: RAY, useAsCollateral: true });
    const tx = new Transaction(store, guard, T0);

    tx.setDeposit('alice', 'USDC', { principal: 0n, indexSnapshot: RAY, useAsCollateral: true });
    expect(tx.deposit('alice', 'USDC')).toBeUndefined();
    expect(tx.userAssets('alice', 'deposit')).toEqual([]);

    tx.setBorrow('alice', 'USDC', { principal: 7n, indexSnapshot: RAY });
    expect(tx.borrow('alice', 'USDC')).toEqual({ principal: 7n, indexSnapshot: RAY });
    expect(tx.userAssets('alice', 'borrow')).toEqual(['USDC']);
  });

  it('should record writes for position and account keys that change', () => {
    const tx = new Transaction(store, guard, T0);
    tx.reserveForWrite('USDC');
    tx.setDeposit('alice', 'USDC', { principal: 1n, indexSnapshot: RAY, useAsCollateral: true });

    expect(tx.footprint()).toEqual({
      reads: [],
      writes: ['account:deposit:alice', 'position:deposit:alice:USDC', 'reserve:USDC']
    });
  });

  it('should not mark the account key when an existing position only changes size', () => {
    store.putDeposit('alice', 'USDC', { principal: 5n, indexSnapshot: RAY, useAsCollateral: true });
    const tx = new Transaction(store, guard, T0);
    tx.setDeposit('alice', 'USDC', { principal: 6n, indexSnapshot: RAY, useAsCollateral: true });

    expect(tx.footprint().writes).toEqual(['position:deposit:alice:USDC']);
  });

  it('should fetch each price once per transaction', () => {
    const tx = new Transaction(store, guard, T0 + DAY);
    expect(tx.price('USDC')).toBe(WAD);
    expect(tx.price('USDC')).toBe(WAD);
    expect(oracle.calls).toBe(1);
  });
});
