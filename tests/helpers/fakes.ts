// In-process stand-ins for the pool's external collaborators
import type { AccountId, AssetId, Clock, PriceOracle, PriceQuote, TokenLedger } from '../../src/types/index.js';
import { WAD } from '../../src/utils/fixedPoint.js';

export const T0 = 1_700_000_000;
export const DAY = 86_400;
export const YEAR = 365 * DAY;

export class ManualClock implements Clock {
  constructor(private current: number = T0) {}

  now(): number {
    return this.current;
  }

  set(timestamp: number): void {
    this.current = timestamp;
  }

  advance(seconds: number): void {
    this.current += seconds;
  }
}

/**
 * Oracle whose quotes are always as fresh as the clock unless pinned
 */
export class ManualPriceOracle implements PriceOracle {
  private readonly quotes = new Map<AssetId, Partial<PriceQuote> & { price: bigint }>();
  public calls = 0;

  constructor(private readonly clock: Clock) {}

  /** price in whole USD per token, e.g. setPrice('ETH', 2000) */
  setPrice(asset: AssetId, usd: number | bigint, extra: Partial<PriceQuote> = {}): void {
    this.quotes.set(asset, { ...extra, price: BigInt(usd) * WAD });
  }

  setQuote(asset: AssetId, quote: PriceQuote): void {
    this.quotes.set(asset, quote);
  }

  remove(asset: AssetId): void {
    this.quotes.delete(asset);
  }

  getPrice(asset: AssetId): PriceQuote {
    this.calls += 1;
    const quote = this.quotes.get(asset);
    if (!quote) {
      throw new Error(`no feed for ${asset}`);
    }
    return {
      ...quote,
      price: quote.price,
      timestamp: quote.timestamp ?? this.clock.now()
    };
  }
}

export class InMemoryLedger implements TokenLedger {
  private readonly balances = new Map<string, bigint>();
  public readonly transfers: Array<{ asset: AssetId; from: AccountId; to: AccountId; amount: bigint }> = [];

  mint(asset: AssetId, account: AccountId, amount: bigint): void {
    this.balances.set(key(asset, account), this.balanceOf(asset, account) + amount);
  }

  balanceOf(asset: AssetId, account: AccountId): bigint {
    return this.balances.get(key(asset, account)) ?? 0n;
  }

  transfer(asset: AssetId, from: AccountId, to: AccountId, amount: bigint): void {
    const available = this.balanceOf(asset, from);
    if (available < amount) {
      throw new Error(`${from} holds ${available} ${asset}, needs ${amount}`);
    }
    this.balances.set(key(asset, from), available - amount);
    this.balances.set(key(asset, to), this.balanceOf(asset, to) + amount);
    this.transfers.push({ asset, from, to, amount });
  }
}

function key(asset: AssetId, account: AccountId): string {
  return `${asset}:${account}`;
}
