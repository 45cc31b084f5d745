import { ethers } from 'ethers';
import { z } from 'zod';

const NON_NEGATIVE_INTEGER = 'must be a non negative integer';
const AMOUNT = 'must be a non negative integer amount';

export const countSchema = z
  .number({ invalid_type_error: NON_NEGATIVE_INTEGER, required_error: NON_NEGATIVE_INTEGER })
  .int(NON_NEGATIVE_INTEGER)
  .nonnegative(NON_NEGATIVE_INTEGER);

export const booleanSchema = z.boolean({ invalid_type_error: 'must be a boolean', required_error: 'must be a boolean' });

export const stringSchema = z.string({ invalid_type_error: 'must be a string', required_error: 'must be a string' });

export const addressSchema = z
  .string({ invalid_type_error: 'must be an address', required_error: 'must be an address' })
  .refine((_) => ethers.isAddress(_), 'must be an address')
  .transform((_) => ethers.getAddress(_));

// 123n (already revived), "123", "123n" and safe integers
function toBigInt(value: unknown): unknown {
  if (typeof value === 'string' && /^\d+n?$/.test(value)) {
    return BigInt(value.endsWith('n') ? value.slice(0, -1) : value);
  }
  if (typeof value === 'number' && Number.isSafeInteger(value)) {
    return BigInt(value);
  }
  return value;
}

export const amountSchema = z.preprocess(
  toBigInt,
  z.bigint({ invalid_type_error: AMOUNT, required_error: AMOUNT }).nonnegative(AMOUNT)
);

export const objectParams = { invalid_type_error: 'must be an object', required_error: 'must be an object' };

/**
 * Parse `raw` with `schema`, throw on the first issue with its dotted path:
 * `'ledger.maxGauges' must be a non negative integer`. `name` labels the root value.
 */
export function ParseWithSchema<T extends z.ZodTypeAny>(
  schema: T,
  raw: unknown,
  name: string,
  prefix: readonly string[] = []
): z.output<T> {
  const result = schema.safeParse(raw);
  if (result.success) {
    return result.data;
  }
  const issue = result.error.issues[0];
  const path = [...prefix, ...issue.path.map((_) => String(_))];
  throw new Error(`'${path.length > 0 ? path.join('.') : name}' ${issue.message}`);
}
