import {z, type ZodError} from 'zod';
import {InvalidInput} from './error/invalid-input.js';

function nonNegativeInteger() {
  return z
    .number({invalid_type_error: 'must be a number'})
    .int({message: 'must be an integer'})
    .nonnegative({message: 'must be non-negative'});
}

export const valueSchema = nonNegativeInteger().max(Number.MAX_SAFE_INTEGER, {
  message: 'must be a safe integer',
});

export const valuesSchema = z.array(valueSchema);

/** `null` means no cap. */
export const capSchema = nonNegativeInteger().nullable();

export type Cap = z.infer<typeof capSchema>;

/**
 * Copies `values` and checks that each one is a non-negative safe integer and
 * that their total is a safe integer too, so that every capped sum is exact.
 */
export function parseValues(values: Iterable<number>): number[] {
  const result = valuesSchema.safeParse([...values]);
  if (!result.success) {
    throw invalidInput('values', result.error);
  }
  let total = 0;
  for (const v of result.data) {
    total += v;
  }
  if (total > Number.MAX_SAFE_INTEGER) {
    throw new InvalidInput(
      `values total ${total} exceeds ${Number.MAX_SAFE_INTEGER}`,
    );
  }
  return result.data;
}

export function parseCap(cap: number | null): Cap {
  const result = capSchema.safeParse(cap);
  if (!result.success) {
    throw invalidInput('cap', result.error);
  }
  return result.data;
}

// Reports the first issue only. Checks run in declaration order, so `-0.5`
// reports the integer check rather than the sign.
function invalidInput(label: string, error: ZodError): InvalidInput {
  const [issue] = error.issues;
  const path = issue.path.map(p => `[${p}]`).join('');
  return new InvalidInput(`${label}${path} ${issue.message}`, {cause: error});
}
