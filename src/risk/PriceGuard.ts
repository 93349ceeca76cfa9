/**
 * PriceGuard: validate oracle quotes before the engine uses them
 *
 * A quote is rejected (and the calling operation aborted) when it is:
 * - missing, or the oracle throws (PriceUnavailable)
 * - older than maxAgeSec (StalePrice)
 * - wider than maxConfidenceBps relative to price (PriceConfidenceTooLow)
 * - further than maxDeviationBps from its reference price (PriceDeviationTooHigh)
 *
 * There is no fallback price; the caller decides whether to retry.
 */

import type { AssetId, PriceOracle, PriceQuote } from '../types/index.js';
import { LendingError, type LendingErrorCode } from '../pool/errors.js';
import { BPS } from '../utils/fixedPoint.js';
import { config } from '../config/index.js';
import { lendingPriceRejectionsTotal } from '../metrics/index.js';

export interface PriceGuardOptions {
  maxAgeSec?: number;
  /** 0 disables the confidence check */
  maxConfidenceBps?: number;
  /** 0 disables the deviation check */
  maxDeviationBps?: number;
}

export class PriceGuard {
  private readonly maxAgeSec: number;
  private readonly maxConfidenceBps: number;
  private readonly maxDeviationBps: number;

  constructor(
    private readonly oracle: PriceOracle,
    options: PriceGuardOptions = {}
  ) {
    this.maxAgeSec = options.maxAgeSec ?? config.priceMaxAgeSec;
    this.maxConfidenceBps = options.maxConfidenceBps ?? config.priceMaxConfidenceBps;
    this.maxDeviationBps = options.maxDeviationBps ?? config.priceMaxDeviationBps;
  }

  /**
   * Validated price (WAD) for `asset` as of `now` (unix seconds)
   */
  getPrice(asset: AssetId, now: number): bigint {
    let quote: PriceQuote;
    try {
      quote = this.oracle.getPrice(asset);
    } catch (err) {
      throw this.reject(asset, 'PriceUnavailable', `Price unavailable for ${asset}`, err);
    }

    if (quote.price <= 0n) {
      throw this.reject(asset, 'PriceUnavailable', `Oracle returned non-positive price for ${asset}`);
    }

    const age = now - quote.timestamp;
    if (age > this.maxAgeSec) {
      throw this.reject(
        asset,
        'StalePrice',
        `Price for ${asset} is ${age}s old (max ${this.maxAgeSec}s)`
      );
    }

    if (this.maxConfidenceBps > 0 && quote.confidence !== undefined) {
      // confidence / price > maxBps / BPS, cross-multiplied to stay in integers
      if (quote.confidence * BPS > quote.price * BigInt(this.maxConfidenceBps)) {
        throw this.reject(
          asset,
          'PriceConfidenceTooLow',
          `Confidence interval ${quote.confidence} too wide for price ${quote.price} of ${asset}`
        );
      }
    }

    if (this.maxDeviationBps > 0 && quote.referencePrice !== undefined && quote.referencePrice > 0n) {
      const diff = quote.price > quote.referencePrice
        ? quote.price - quote.referencePrice
        : quote.referencePrice - quote.price;
      if (diff * BPS > quote.referencePrice * BigInt(this.maxDeviationBps)) {
        throw this.reject(
          asset,
          'PriceDeviationTooHigh',
          `Price ${quote.price} of ${asset} deviates from reference ${quote.referencePrice} ` +
          `by more than ${this.maxDeviationBps}bps`
        );
      }
    }

    return quote.price;
  }

  private reject(asset: AssetId, code: LendingErrorCode, message: string, cause?: unknown): LendingError {
    lendingPriceRejectionsTotal.inc({ asset, reason: code });
    return new LendingError(code, message, cause === undefined ? undefined : { cause });
  }
}
