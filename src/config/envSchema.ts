import { z } from 'zod';

export const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const booleanString = z.enum(['true', 'false']).transform(v => v === 'true');

// Blank variables count as unset
function blankToUndefined(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
}

function lowercase(value: unknown): unknown {
  const normalized = blankToUndefined(value);
  return typeof normalized === 'string' ? normalized.toLowerCase() : normalized;
}

const text = (fallback: string) => z.preprocess(blankToUndefined, z.string().default(fallback));

const integer = (name: string, fallback: number, min: number, max: number) =>
  z.preprocess(
    blankToUndefined,
    z.coerce
      .number({ invalid_type_error: `${name} must be an integer` })
      .int(`${name} must be an integer`)
      .min(min, `${name} must be >= ${min}`)
      .max(max, `${name} must be <= ${max}`)
      .default(fallback)
  );

export const rawEnvSchema = z.object({
  NODE_ENV: text('development'),

  // Logging
  LOG_LEVEL: z.preprocess(lowercase, z.enum(LOG_LEVELS).optional()),
  LOG_JSON: z.preprocess(lowercase, booleanString.default('false')),

  // Price guard
  PRICE_MAX_AGE_SEC: integer('PRICE_MAX_AGE_SEC', 3600, 1, 31_536_000),
  PRICE_MAX_CONFIDENCE_BPS: integer('PRICE_MAX_CONFIDENCE_BPS', 200, 0, 10_000),
  PRICE_MAX_DEVIATION_BPS: integer('PRICE_MAX_DEVIATION_BPS', 1000, 0, 10_000),

  // Accounts
  POOL_ACCOUNT: text('pool'),
  ADMIN_ACCOUNT: text('admin'),

  // Market listing file (JSON)
  MARKETS_FILE: z.preprocess(blankToUndefined, z.string().optional())
});

export type RawEnv = z.infer<typeof rawEnvSchema>;

export interface Env {
  nodeEnv: string;
  logLevel: LogLevel;
  logJson: boolean;
  priceMaxAgeSec: number;
  priceMaxConfidenceBps: number;
  priceMaxDeviationBps: number;
  poolAccount: string;
  adminAccount: string;
  marketsFile: string | undefined;
}

export function parseEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = rawEnvSchema.parse(source);

  return {
    nodeEnv: parsed.NODE_ENV,
    // quieter by default under test
    logLevel: parsed.LOG_LEVEL ?? (parsed.NODE_ENV === 'test' ? 'warn' : 'info'),
    logJson: parsed.LOG_JSON,

    priceMaxAgeSec: parsed.PRICE_MAX_AGE_SEC,
    priceMaxConfidenceBps: parsed.PRICE_MAX_CONFIDENCE_BPS,
    priceMaxDeviationBps: parsed.PRICE_MAX_DEVIATION_BPS,

    poolAccount: parsed.POOL_ACCOUNT,
    adminAccount: parsed.ADMIN_ACCOUNT,

    marketsFile: parsed.MARKETS_FILE
  };
}
