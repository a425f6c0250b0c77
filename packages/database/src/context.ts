import { sql } from 'drizzle-orm';
import type { DatabaseOrTransaction } from './client.js';

export type TransactionLimits = {
  /** How long any single lock wait may take inside the transaction. */
  lockTimeoutMs: number;
  /** Bound on each statement and on idling between statements. */
  transactionTimeoutMs: number;
};

function toMilliseconds(setting: string, value: number): string {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new Error(`Invalid ${setting} value: ${value}`);
  }

  return `${value}ms`;
}

/**
 * Apply per-transaction timeouts. `set_config(..., true)` scopes each setting to the
 * current transaction, so pooled connections return to their defaults on commit or rollback.
 */
export async function setTransactionLimits(
  client: DatabaseOrTransaction,
  limits: TransactionLimits
): Promise<void> {
  const lockTimeout = toMilliseconds('lock_timeout', limits.lockTimeoutMs);
  const statementTimeout = toMilliseconds('statement_timeout', limits.transactionTimeoutMs);

  await client.execute(sql`
    SELECT
      set_config('lock_timeout', ${lockTimeout}, true),
      set_config('statement_timeout', ${statementTimeout}, true),
      set_config('idle_in_transaction_session_timeout', ${statementTimeout}, true)
  `);
}
