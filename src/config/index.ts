import dotenv from 'dotenv';

import { parseEnv } from './envSchema.js';

dotenv.config();

const env = parseEnv();

export const config = {
  get nodeEnv() { return env.nodeEnv; },

  get logLevel() { return env.logLevel; },
  get logJson() { return env.logJson; },

  // Price guard defaults (overridable per pool)
  get priceMaxAgeSec() { return env.priceMaxAgeSec; },
  get priceMaxConfidenceBps() { return env.priceMaxConfidenceBps; },
  get priceMaxDeviationBps() { return env.priceMaxDeviationBps; },

  get poolAccount() { return env.poolAccount; },
  get adminAccount() { return env.adminAccount; },

  get marketsFile() { return env.marketsFile; }
};

export type AppConfig = typeof config;
