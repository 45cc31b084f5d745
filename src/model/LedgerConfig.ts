import { z } from 'zod';
import { amountSchema, booleanSchema, countSchema, objectParams } from '../utils/Validation';

const ONE_DAY_SEC = 24 * 3600;

export const DEFAULT_LEDGER_CONFIG = {
  cycleLength: 7 * ONE_DAY_SEC,
  freezeWindow: 3600,
  maxGauges: 10,
  maxLiveGauges: 1000,
  maxDelegates: 10,
  transferable: false,
  minter: {
    maxRateLimitPerSecond: 10n ** 18n * 1000n,
    rateLimitPerSecond: 0n,
    bufferCap: 0n
  }
};

export const minterConfigSchema = z
  .object(
    {
      maxRateLimitPerSecond: amountSchema.default(DEFAULT_LEDGER_CONFIG.minter.maxRateLimitPerSecond),
      rateLimitPerSecond: amountSchema.default(DEFAULT_LEDGER_CONFIG.minter.rateLimitPerSecond),
      bufferCap: amountSchema.default(DEFAULT_LEDGER_CONFIG.minter.bufferCap)
    },
    objectParams
  )
  .refine((_) => _.rateLimitPerSecond <= _.maxRateLimitPerSecond, {
    message: 'must not exceed maxRateLimitPerSecond',
    path: ['rateLimitPerSecond']
  });

export const ledgerConfigSchema = z
  .object(
    {
      cycleLength: countSchema.positive('must be positive').default(DEFAULT_LEDGER_CONFIG.cycleLength), // in seconds
      freezeWindow: countSchema.default(DEFAULT_LEDGER_CONFIG.freezeWindow), // in seconds
      maxGauges: countSchema.default(DEFAULT_LEDGER_CONFIG.maxGauges),
      maxLiveGauges: countSchema.default(DEFAULT_LEDGER_CONFIG.maxLiveGauges),
      maxDelegates: countSchema.default(DEFAULT_LEDGER_CONFIG.maxDelegates),
      transferable: booleanSchema.default(DEFAULT_LEDGER_CONFIG.transferable),
      minter: minterConfigSchema.default({})
    },
    objectParams
  )
  .refine((_) => _.freezeWindow < _.cycleLength, {
    message: 'must be shorter than the cycle length',
    path: ['freezeWindow']
  });

export type MinterConfig = z.output<typeof minterConfigSchema>;
export type LedgerConfig = z.output<typeof ledgerConfigSchema>;
