/**
 * Billing ledger
 *
 * Charges, payments, the transactions that allocate payments to charges, and
 * recurring charge templates, scoped by community.
 */

export * from './billing-types.js';
export * from './billing-errors.js';
export * from './billing-store.js';
export * from './billing-registry.js';
export * from './billing-config.js';
export * from './balance-calculator.js';
export * from './recurrence.js';
export { parseInput } from './billing-validation.js';
export { AllocationService, type AllocationServiceOptions } from './allocation-service.js';
export { BillingService, type BillingServiceOptions } from './billing-service.js';
export {
  MAX_DUE_LIST_LIMIT,
  RecurringChargeService,
  type MaterializationRunSummary,
  type RecurringChargeServiceOptions,
} from './recurring-charge-service.js';
export {
  PostgresBillingStore,
  translatePostgresError,
  type PostgresBillingStoreOptions,
} from './billing-repository.js';
export { InMemoryBillingStore, type InMemoryBillingStoreOptions } from './in-memory-billing-store.js';
export { KeyedLock } from './keyed-lock.js';
export * from './billing-services.js';
