import { z } from 'zod';

// Unset and empty variables both fall back to the default
const durationMs = (fallback: number) =>
  z.preprocess(
    (value) => (value === '' ? undefined : value),
    z.coerce.number().int().positive().default(fallback)
  );

const BillingEnvSchema = z.object({
  LEDGER_LOCK_TIMEOUT_MS: durationMs(2_000),
  LEDGER_TRANSACTION_TIMEOUT_MS: durationMs(10_000),
  LEDGER_SCHEDULER_BATCH_SIZE: z.preprocess(
    (value) => (value === '' ? undefined : value),
    z.coerce.number().int().positive().max(1000).default(100)
  ),
});

export interface BillingConfig {
  /** Longest a unit of work waits on any single row lock */
  lockTimeoutMs: number;
  /** Bound on each statement and on a unit of work sitting idle */
  transactionTimeoutMs: number;
  /** Templates the scheduler picks up per pass */
  schedulerBatchSize: number;
}

/**
 * Read ledger settings from the environment
 *
 * @throws {Error} If a variable is set to something other than a positive integer
 */
export function loadBillingConfig(env: NodeJS.ProcessEnv = process.env): BillingConfig {
  const result = BillingEnvSchema.safeParse(env);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new Error(`Invalid ledger configuration: ${errors}`);
  }

  return {
    lockTimeoutMs: result.data.LEDGER_LOCK_TIMEOUT_MS,
    transactionTimeoutMs: result.data.LEDGER_TRANSACTION_TIMEOUT_MS,
    schedulerBatchSize: result.data.LEDGER_SCHEDULER_BATCH_SIZE,
  };
}
