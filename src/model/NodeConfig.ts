import { ethers } from 'ethers';
import { z } from 'zod';
import { CoreRoles } from '../ledger/Authorization';
import { addressSchema, amountSchema, booleanSchema, countSchema, objectParams } from '../utils/Validation';
import { ledgerConfigSchema } from './LedgerConfig';

// { "GAUGE_ADD": ["0x..."], ... }, listed in role order
export const rolesSchema = z
  .record(
    z.nativeEnum(CoreRoles, { errorMap: () => ({ message: 'is not a known role' }) }),
    z.array(addressSchema, { invalid_type_error: 'must be an array of addresses' }),
    objectParams
  )
  .transform((roles) =>
    Object.values(CoreRoles).flatMap((role) => {
      const accounts = roles[role];
      return accounts ? [{ role, accounts }] : [];
    })
  );

export const gaugeIndexerConfigSchema = z.object(
  {
    enabled: booleanSchema.default(true),
    saveEverySec: countSchema.default(60)
  },
  objectParams
);

export const lossApplierConfigSchema = z.object(
  {
    enabled: booleanSchema.default(false),
    runEverySec: countSchema.default(600),
    retryDelaySec: countSchema.default(12 * 3600), // do not retry a failed gauge/user pair before this delay
    minSizeToApply: amountSchema.default(0n)
  },
  objectParams
);

export const apiConfigSchema = z.object(
  {
    enabled: booleanSchema.default(true)
  },
  objectParams
);

export const nodeConfigSchema = z.object(
  {
    ledger: ledgerConfigSchema.default({}),
    minterAddress: addressSchema.default(ethers.ZeroAddress),
    roles: rolesSchema.default({}),
    processors: z
      .object(
        {
          GAUGE_INDEXER: gaugeIndexerConfigSchema.default({}),
          LOSS_APPLIER: lossApplierConfigSchema.default({})
        },
        objectParams
      )
      .default({}),
    api: apiConfigSchema.default({})
  },
  objectParams
);

export type NodeConfig = z.output<typeof nodeConfigSchema>;
export type RoleAssignment = z.output<typeof rolesSchema>[number];
export type Processors = NodeConfig['processors'];
export type GaugeIndexerConfig = z.output<typeof gaugeIndexerConfigSchema>;
export type LossApplierConfig = z.output<typeof lossApplierConfigSchema>;
export type ApiConfig = z.output<typeof apiConfigSchema>;
