import type { z } from 'zod';
import { BillingValidationError } from './billing-errors.js';

/**
 * Validate service input using a Zod schema
 *
 * @throws {BillingValidationError} Listing every failed path
 */
export function parseInput<TSchema extends z.ZodTypeAny>(
  schema: TSchema,
  input: unknown
): z.output<TSchema> {
  const result = schema.safeParse(input);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `${e.path.length > 0 ? e.path.join('.') : 'input'}: ${e.message}`)
      .join(', ');
    throw new BillingValidationError(`Validation failed: ${errors}`);
  }

  return result.data;
}
