// Unit tests for bounded partial liquidation
import { describe, it, expect, beforeEach } from 'vitest';

import { LendingError } from '../../../src/pool/errors.js';
import type { LiquidationRecord } from '../../../src/types/index.js';
import { WAD } from '../../../src/utils/fixedPoint.js';
import { T0 } from '../../helpers/fakes.js';
import { createTestPool, eth, openBorrowPosition, usdc, type TestPool } from '../../helpers/pool.js';

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return err instanceof LendingError ? err.code : 'not-a-lending-error';
  }
  return undefined;
}

describe('LiquidationEngine', () => {
  let ctx: TestPool;

  beforeEach(() => {
    ctx = createTestPool();
    openBorrowPosition(ctx, { liquidity: usdc('10000'), collateral: eth('10'), debt: usdc('5000') });
    ctx.ledger.mint('USDC', 'carol', usdc('10000'));
  });

  it('should reject liquidating a healthy position and change nothing', () => {
    const before = ctx.pool.snapshot();

    expect(codeOf(() => ctx.pool.liquidate('carol', 'borrower', 'USDC', 'ETH', usdc('1000'))))
      .toBe('NotLiquidatable');
    expect(ctx.pool.snapshot()).toEqual(before);
    expect(ctx.ledger.balanceOf('USDC', 'carol')).toBe(usdc('10000'));
  });

  it('should cap the repayment at the close factor and pay the bonus in collateral', () => {
    ctx.oracle.setPrice('ETH', 600);

    const result = ctx.pool.liquidate('carol', 'borrower', 'USDC', 'ETH', usdc('3000'));

    expect(result.actualRepaid).toBe(usdc('2500'));
    expect(result.collateralSeized).toBe(4_583_333_333_333_333_333n);
    expect(result.record.healthFactorBefore).toBe((9n * WAD) / 10n);
    expect(result.record.healthFactorAfter).toBe(975_000_000_000_000_000n);
    expect(result.record.timestamp).toBe(T0);
  });

  it('should move debt and collateral between borrower and liquidator', () => {
    ctx.oracle.setPrice('ETH', 600);
    ctx.pool.liquidate('carol', 'borrower', 'USDC', 'ETH', usdc('2500'));

    expect(ctx.pool.getUserReserveData('borrower', 'USDC').borrowBalance).toBe(usdc('2500'));
    expect(ctx.pool.getUserReserveData('borrower', 'ETH').depositBalance).toBe(5_416_666_666_666_666_667n);
    expect(ctx.pool.getUserReserveData('carol', 'ETH')).toEqual({
      asset: 'ETH',
      depositBalance: 4_583_333_333_333_333_333n,
      borrowBalance: 0n,
      useAsCollateral: true
    });
    expect(ctx.ledger.balanceOf('USDC', 'carol')).toBe(usdc('7500'));
    expect(ctx.pool.getReserveData('USDC').totalBorrows).toBe(usdc('2500'));
    expect(ctx.pool.getReserveData('USDC').availableLiquidity).toBe(usdc('7500'));
  });

  it('should honor a repay amount below the close factor', () => {
    ctx.oracle.setPrice('ETH', 600);
    const result = ctx.pool.liquidate('carol', 'borrower', 'USDC', 'ETH', usdc('1000'));

    expect(result.actualRepaid).toBe(usdc('1000'));
    expect(result.collateralSeized).toBe(1_833_333_333_333_333_333n);
  });

  it('should report a health factor that worsens after liquidation', () => {
    ctx.oracle.setPrice('ETH', 500);
    const result = ctx.pool.liquidate('carol', 'borrower', 'USDC', 'ETH', usdc('2500'));

    expect(result.collateralSeized).toBe(eth('5.5'));
    expect(result.record.healthFactorBefore).toBe(750_000_000_000_000_000n);
    expect(result.record.healthFactorAfter).toBe(675_000_000_000_000_000n);
  });

  it('should fail with InsufficientCollateral when the bonus exceeds the collateral held', () => {
    ctx.oracle.setPrice('ETH', 250);
    const before = ctx.pool.snapshot();

    expect(codeOf(() => ctx.pool.liquidate('carol', 'borrower', 'USDC', 'ETH', usdc('2500'))))
      .toBe('InsufficientCollateral');
    expect(ctx.pool.snapshot()).toEqual(before);
  });

  it('should fail with InsufficientCollateral when the borrower holds none of the collateral asset', () => {
    ctx.oracle.setPrice('ETH', 600);
    expect(codeOf(() => ctx.pool.liquidate('carol', 'borrower', 'USDC', 'USDC', usdc('100'))))
      .toBe('InsufficientCollateral');
  });

  it('should fail with CollateralNotEnabled for a deposit the borrower does not pledge', () => {
    ctx.pool.deposit('borrower', 'USDC', usdc('100'));
    ctx.pool.setUseAsCollateral('borrower', 'USDC', false);
    ctx.oracle.setPrice('ETH', 600);

    expect(codeOf(() => ctx.pool.liquidate('carol', 'borrower', 'USDC', 'USDC', usdc('10'))))
      .toBe('CollateralNotEnabled');
  });

  it('should fail with ZeroLiquidation when the seized collateral rounds down to nothing', () => {
    ctx.ledger.mint('ETH', 'eth-lender', eth('10'));
    ctx.pool.deposit('eth-lender', 'ETH', eth('10'));
    ctx.ledger.mint('USDC', 'dan', usdc('3000'));
    ctx.pool.deposit('dan', 'USDC', usdc('3000'));
    // $2400 of borrowing power against $2000 of ETH debt
    ctx.pool.borrow('dan', 'ETH', eth('1'));
    ctx.oracle.setPrice('ETH', 2500);
    ctx.ledger.mint('ETH', 'carol', 1n);
    const before = ctx.pool.snapshot();

    // 1 wei of ETH is worth 2625e-18 USD with the bonus, far below 1e-6 USDC
    expect(codeOf(() => ctx.pool.liquidate('carol', 'dan', 'ETH', 'USDC', 1n))).toBe('ZeroLiquidation');
    expect(ctx.pool.snapshot()).toEqual(before);
  });

  it('should reject self-liquidation', () => {
    ctx.oracle.setPrice('ETH', 600);
    expect(codeOf(() => ctx.pool.liquidate('borrower', 'borrower', 'USDC', 'ETH', usdc('100'))))
      .toBe('SelfLiquidation');
  });

  it('should fail with ZeroLiquidation when there is nothing to repay', () => {
    ctx.oracle.setPrice('ETH', 600);
    expect(codeOf(() => ctx.pool.liquidate('carol', 'borrower', 'USDC', 'ETH', 0n))).toBe('ZeroLiquidation');
    expect(codeOf(() => ctx.pool.liquidate('carol', 'borrower', 'ETH', 'ETH', eth('1')))).toBe('ZeroLiquidation');
  });

  it('should abort cleanly when the liquidator cannot pay', () => {
    ctx.oracle.setPrice('ETH', 600);
    const before = ctx.pool.snapshot();

    expect(codeOf(() => ctx.pool.liquidate('dave', 'borrower', 'USDC', 'ETH', usdc('2500'))))
      .toBe('InsufficientBalance');
    expect(ctx.pool.snapshot()).toEqual(before);
  });

  it('should emit a liquidation event after commit', () => {
    ctx.oracle.setPrice('ETH', 600);
    const events: LiquidationRecord[] = [];
    ctx.pool.on('liquidation', (record: LiquidationRecord) => events.push(record));

    ctx.pool.liquidate('carol', 'borrower', 'USDC', 'ETH', usdc('2500'));

    expect(events).toHaveLength(1);
    expect(events[0]?.liquidator).toBe('carol');
    expect(events[0]?.actualRepaid).toBe(usdc('2500'));
  });

  it('should report a footprint covering both reserves and both accounts', () => {
    ctx.oracle.setPrice('ETH', 600);
    const { footprint } = ctx.pool.liquidate('carol', 'borrower', 'USDC', 'ETH', usdc('2500'));

    expect(footprint.writes).toEqual([
      'account:deposit:carol',
      'position:borrow:borrower:USDC',
      'position:deposit:borrower:ETH',
      'position:deposit:carol:ETH',
      'reserve:ETH',
      'reserve:USDC'
    ]);
    expect(footprint.reads).toEqual(['account:borrow:borrower', 'account:deposit:borrower']);
  });
});
