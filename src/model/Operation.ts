import { z } from 'zod';
import { amountSchema, booleanSchema, countSchema, stringSchema } from '../utils/Validation';

// One line of the operation journal. `timestamp` is in unix seconds.

const timestamp = countSchema;
const gaugeList = z.array(stringSchema, { invalid_type_error: 'must be an array of strings' });
const amountList = z.array(amountSchema, { invalid_type_error: 'must be an array of amounts' });

export const operationSchema = z.discriminatedUnion(
  'op',
  [
    z.object({ op: z.literal('addGauge'), timestamp, caller: stringSchema, gaugeType: countSchema, gauge: stringSchema }),
    z.object({ op: z.literal('removeGauge'), timestamp, caller: stringSchema, gauge: stringSchema }),
    z.object({ op: z.literal('setMaxGauges'), timestamp, caller: stringSchema, maxGauges: countSchema }),
    z.object({
      op: z.literal('setExempt'),
      timestamp,
      caller: stringSchema,
      account: stringSchema,
      exempt: booleanSchema
    }),
    z.object({ op: z.literal('mint'), timestamp, caller: stringSchema, to: stringSchema, amount: amountSchema }),
    z.object({ op: z.literal('minterMint'), timestamp, caller: stringSchema, to: stringSchema, amount: amountSchema }),
    z.object({ op: z.literal('burn'), timestamp, user: stringSchema, amount: amountSchema }),
    z.object({ op: z.literal('transfer'), timestamp, from: stringSchema, to: stringSchema, amount: amountSchema }),
    z.object({
      op: z.literal('transferFrom'),
      timestamp,
      spender: stringSchema,
      from: stringSchema,
      to: stringSchema,
      amount: amountSchema
    }),
    z.object({ op: z.literal('approve'), timestamp, owner: stringSchema, spender: stringSchema, amount: amountSchema }),
    z.object({ op: z.literal('enableTransfer'), timestamp, caller: stringSchema }),
    z.object({ op: z.literal('incrementWeight'), timestamp, user: stringSchema, gauge: stringSchema, amount: amountSchema }),
    z.object({ op: z.literal('incrementWeights'), timestamp, user: stringSchema, gauges: gaugeList, amounts: amountList }),
    z.object({ op: z.literal('decrementWeight'), timestamp, user: stringSchema, gauge: stringSchema, amount: amountSchema }),
    z.object({ op: z.literal('decrementWeights'), timestamp, user: stringSchema, gauges: gaugeList, amounts: amountList }),
    z.object({ op: z.literal('reportLoss'), timestamp, caller: stringSchema, gauge: stringSchema }),
    z.object({ op: z.literal('applyLoss'), timestamp, gauge: stringSchema, user: stringSchema }),
    z.object({ op: z.literal('delegate'), timestamp, delegator: stringSchema, delegatee: stringSchema }),
    z.object({
      op: z.literal('incrementDelegation'),
      timestamp,
      delegator: stringSchema,
      delegatee: stringSchema,
      amount: amountSchema
    }),
    z.object({
      op: z.literal('undelegate'),
      timestamp,
      delegator: stringSchema,
      delegatee: stringSchema,
      amount: amountSchema
    })
  ],
  {
    errorMap: (issue, ctx) => {
      if (issue.code == z.ZodIssueCode.invalid_union_discriminator) {
        return { message: 'is not a known operation' };
      }
      if (issue.code == z.ZodIssueCode.invalid_type) {
        return { message: 'must be an object' };
      }
      return { message: ctx.defaultError };
    }
  }
);

export type Operation = z.output<typeof operationSchema>;

export type OperationName = Operation['op'];

export interface ReplayResult {
  line: number;
  op: OperationName;
  ok: boolean;
  error?: string;
}
