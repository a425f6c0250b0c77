#!/usr/bin/env tsx
/**
 * Materialize due recurring charges
 *
 * Usage:
 *   npm run billing:materialize -- [YYYY-MM-DD]
 *
 * Charges every template due on or before the given date (default: today),
 * one period per pass, until nothing is due. Conflicts with concurrent runs
 * are skipped and retried on the next invocation. Exits 1 if any template
 * failed for another reason.
 */

import { config } from "dotenv";
import { resolve } from "node:path";
import { getDatabase } from "@repo/database";
import { createLogger } from "@repo/observability";
import {
  PostgresBillingStore,
  RecurringChargeService,
  formatCalendarDate,
  loadBillingConfig,
} from "@repo/core";

config({ path: resolve(process.cwd(), ".env.local") });

const logger = createLogger().child({ module: "billing.scheduler" });
const asOf = process.argv[2] ?? formatCalendarDate(new Date());
const billingConfig = loadBillingConfig();
const { db, close } = getDatabase();

const store = new PostgresBillingStore(db, {
  lockTimeoutMs: billingConfig.lockTimeoutMs,
  transactionTimeoutMs: billingConfig.transactionTimeoutMs,
  logger,
});
const recurringCharges = new RecurringChargeService(store, { logger });

let failed = false;

try {
  const summary = await recurringCharges.materializeAllDue(asOf, {
    batchSize: billingConfig.schedulerBatchSize,
  });
  failed = summary.failures > 0;
} catch (error) {
  logger.error({ err: error, asOf }, "Recurring charge run aborted");
  failed = true;
} finally {
  await close();
}

if (failed) {
  process.exitCode = 1;
}
