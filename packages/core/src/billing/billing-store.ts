/**
 * Billing Store
 *
 * The ledger's persistence contract. Every read and write happens through a
 * `BillingUnitOfWork` handed out by `runInTransaction`: its effects commit
 * together when the callback resolves and are discarded when it throws.
 */

import type {
  BillingTransaction,
  CalendarDate,
  Charge,
  ChargeFilter,
  NewBillingTransaction,
  NewCharge,
  NewPayment,
  NewRecurringCharge,
  Payment,
  PaymentFilter,
  RecurringCharge,
  TransactionFilter,
} from './billing-types.js';

export interface UnitOfWorkOptions {
  /** Aborting before commit rolls the unit of work back */
  signal?: AbortSignal;
}

export interface BillingUnitOfWork {
  /**
   * Lock rows for the rest of the unit of work and return their current state.
   * A row already locked elsewhere fails immediately with `ConcurrencyConflictError`.
   */
  lockCharge(communityId: string, chargeId: string): Promise<Charge | null>;
  lockPayment(communityId: string, paymentId: string): Promise<Payment | null>;
  lockRecurringCharge(communityId: string, recurringChargeId: string): Promise<RecurringCharge | null>;

  findCharge(communityId: string, chargeId: string): Promise<Charge | null>;
  findPayment(communityId: string, paymentId: string): Promise<Payment | null>;
  findRecurringCharge(communityId: string, recurringChargeId: string): Promise<RecurringCharge | null>;
  findTransaction(paymentId: string, chargeId: string): Promise<BillingTransaction | null>;

  /** Newest charge first */
  listCharges(filter: ChargeFilter): Promise<Charge[]>;
  /** Newest payment first */
  listPayments(filter: PaymentFilter): Promise<Payment[]>;
  /** In the order they were written */
  listTransactions(filter: TransactionFilter): Promise<BillingTransaction[]>;
  /** Templates across all communities whose next charge date is on or before `asOf`, oldest first */
  listDueRecurringCharges(asOf: CalendarDate, limit: number): Promise<RecurringCharge[]>;

  insertCharge(data: NewCharge): Promise<Charge>;
  insertPayment(data: NewPayment): Promise<Payment>;
  insertRecurringCharge(data: NewRecurringCharge): Promise<RecurringCharge>;
  insertTransaction(data: NewBillingTransaction): Promise<BillingTransaction>;

  /**
   * Move a template's next charge date from `from` to `to`.
   * Returns null when the stored date is no longer `from`.
   */
  advanceRecurringCharge(
    communityId: string,
    recurringChargeId: string,
    from: CalendarDate,
    to: CalendarDate
  ): Promise<RecurringCharge | null>;

  /** Delete a charge and, by cascade, its transactions */
  deleteCharge(communityId: string, chargeId: string): Promise<boolean>;
  /** Delete a payment and, by cascade, its transactions */
  deletePayment(communityId: string, paymentId: string): Promise<boolean>;
}

export interface BillingStore {
  runInTransaction<T>(
    work: (uow: BillingUnitOfWork) => Promise<T>,
    options?: UnitOfWorkOptions
  ): Promise<T>;
}
