/**
 * Market listing schema
 *
 * Human-readable reserve parameters (JSON) -> ReserveListing. Rates are yearly
 * decimal strings ("0.04" = 4% APR) parsed to RAY; caps are token amounts parsed
 * with the reserve's decimals; risk parameters are basis points.
 */

import { readFile } from 'fs/promises';
import { parseUnits } from 'ethers';
import { z } from 'zod';

import type { RateModelConfig } from '../types/index.js';
import type { ReserveListing } from '../pool/reserveConfig.js';

const RAY_DECIMALS = 27;

const decimalString = z
  .string()
  .regex(/^\d+(\.\d+)?$/, 'expected a non-negative decimal string');

const rate = decimalString.transform((value) => parseUnits(value, RAY_DECIMALS));

const bps = z.number().int().min(0).max(10_000);

const rateModelSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('kinked'),
    baseRate: rate,
    optimalUtilization: rate,
    slope1: rate,
    slope2: rate
  }),
  z.object({
    kind: z.literal('linear'),
    baseRate: rate,
    slope: rate
  }),
  z.object({
    kind: z.literal('fixed'),
    rate
  })
]);

export const reserveListingSchema = z
  .object({
    asset: z.string().min(1),
    decimals: z.number().int().min(0).max(36),
    rateModel: rateModelSchema,
    reserveFactorBps: bps,
    liquidation: z.object({
      collateralFactorBps: bps,
      liquidationThresholdBps: bps,
      liquidationBonusBps: bps,
      closeFactorBps: bps.min(1)
    }),
    supplyCap: decimalString.optional(),
    borrowCap: decimalString.optional()
  })
  .refine(
    (listing) => listing.liquidation.liquidationThresholdBps >= listing.liquidation.collateralFactorBps,
    { message: 'liquidationThresholdBps must be >= collateralFactorBps', path: ['liquidation'] }
  )
  .refine(
    (listing) => listing.rateModel.kind !== 'kinked' || listing.rateModel.optimalUtilization <= parseUnits('1', RAY_DECIMALS),
    { message: 'optimalUtilization must be <= 1', path: ['rateModel'] }
  );

export type ReserveListingInput = z.input<typeof reserveListingSchema>;

/**
 * Validate one human-readable listing
 */
export function parseReserveListing(input: unknown): ReserveListing {
  const parsed = reserveListingSchema.parse(input);
  const rateModel: RateModelConfig = parsed.rateModel;

  return {
    asset: parsed.asset,
    decimals: parsed.decimals,
    rateModel,
    reserveFactorBps: parsed.reserveFactorBps,
    liquidation: parsed.liquidation,
    supplyCap: parsed.supplyCap === undefined ? undefined : parseUnits(parsed.supplyCap, parsed.decimals),
    borrowCap: parsed.borrowCap === undefined ? undefined : parseUnits(parsed.borrowCap, parsed.decimals)
  };
}

/**
 * Read and validate a JSON markets file: { "reserves": [ ...listings ] }
 */
export async function loadMarketsFile(path: string): Promise<ReserveListing[]> {
  const raw: unknown = JSON.parse(await readFile(path, 'utf8'));
  const { reserves } = z.object({ reserves: z.array(z.unknown()).min(1) }).parse(raw);
  return reserves.map((entry) => parseReserveListing(entry));
}
