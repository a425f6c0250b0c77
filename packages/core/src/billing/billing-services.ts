import type { Database } from '@repo/database';
import type { Logger } from '@repo/observability';
import { AllocationService } from './allocation-service.js';
import type { BillingConfig } from './billing-config.js';
import type { BillingRegistry } from './billing-registry.js';
import { PostgresBillingStore } from './billing-repository.js';
import { BillingService } from './billing-service.js';
import type { BillingStore } from './billing-store.js';
import type { Clock } from './billing-types.js';
import { RecurringChargeService } from './recurring-charge-service.js';

export interface BillingServices {
  store: BillingStore;
  billing: BillingService;
  allocations: AllocationService;
  recurringCharges: RecurringChargeService;
}

export interface BillingServicesOptions {
  logger?: Logger;
  clock?: Clock;
}

/**
 * Wire the ledger services around one store
 */
export function createBillingServices(
  store: BillingStore,
  registry: BillingRegistry,
  options: BillingServicesOptions = {}
): BillingServices {
  return {
    store,
    billing: new BillingService(store, registry, options),
    allocations: new AllocationService(store, { logger: options.logger }),
    recurringCharges: new RecurringChargeService(store, options),
  };
}

/**
 * Ledger services backed by Postgres
 */
export function createPostgresBillingServices(
  db: Database,
  registry: BillingRegistry,
  config: BillingConfig,
  options: BillingServicesOptions = {}
): BillingServices {
  const store = new PostgresBillingStore(db, {
    lockTimeoutMs: config.lockTimeoutMs,
    transactionTimeoutMs: config.transactionTimeoutMs,
    logger: options.logger,
  });
  return createBillingServices(store, registry, options);
}
