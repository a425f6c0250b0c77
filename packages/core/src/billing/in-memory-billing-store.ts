/**
 * In-memory billing store for tests and local development
 *
 * Mirrors the Postgres store's guarantees: writes are staged per unit of work
 * and applied in one synchronous step on commit, row locks fail fast, and the
 * table constraints (unique allocation pair, non-negative closing balances,
 * same-community references, cascading deletes) are checked on write.
 */

import crypto from 'node:crypto';
import { logger as defaultLogger, type Logger } from '@repo/observability';
import {
  BalanceViolationError,
  ConcurrencyConflictError,
  DuplicateAllocationError,
  PersistenceError,
} from './billing-errors.js';
import type { BillingStore, BillingUnitOfWork, UnitOfWorkOptions } from './billing-store.js';
import {
  isSameTarget,
  systemClock,
  type BillingTransaction,
  type CalendarDate,
  type Charge,
  type ChargeFilter,
  type Clock,
  type NewBillingTransaction,
  type NewCharge,
  type NewPayment,
  type NewRecurringCharge,
  type Payment,
  type PaymentFilter,
  type RecurringCharge,
  type TransactionFilter,
} from './billing-types.js';
import { KeyedLock } from './keyed-lock.js';

const DEFAULT_TRANSACTION_TIMEOUT_MS = 10_000;

type Row<T> = { value: T; seq: number };

interface LedgerTables {
  charges: Map<string, Row<Charge>>;
  payments: Map<string, Row<Payment>>;
  recurringCharges: Map<string, Row<RecurringCharge>>;
  transactions: Map<string, Row<BillingTransaction>>;
}

function createTables(): LedgerTables {
  return {
    charges: new Map(),
    payments: new Map(),
    recurringCharges: new Map(),
    transactions: new Map(),
  };
}

function transactionKey(paymentId: string, chargeId: string): string {
  return `${paymentId}:${chargeId}`;
}

/**
 * Copy-on-read view of one table: committed rows overlaid with this unit of
 * work's pending upserts and deletes.
 */
class StagedTable<T> {
  private readonly upserts = new Map<string, Row<T>>();
  private readonly deletes = new Set<string>();

  constructor(
    private readonly committed: Map<string, Row<T>>,
    private readonly nextSeq: () => number
  ) {}

  get(key: string): T | null {
    const row = this.getRow(key);
    return row ? structuredClone(row.value) : null;
  }

  values(): Array<Row<T>> {
    const merged = new Map<string, Row<T>>();
    for (const [key, row] of this.committed) {
      if (!this.deletes.has(key)) {
        merged.set(key, row);
      }
    }
    for (const [key, row] of this.upserts) {
      merged.set(key, row);
    }
    return [...merged.values()].map((row) => ({ value: structuredClone(row.value), seq: row.seq }));
  }

  put(key: string, value: T): void {
    const seq = this.getRow(key)?.seq ?? this.nextSeq();
    this.deletes.delete(key);
    this.upserts.set(key, { value: structuredClone(value), seq });
  }

  remove(key: string): boolean {
    const existed = this.getRow(key) !== null;
    this.upserts.delete(key);
    if (this.committed.has(key)) {
      this.deletes.add(key);
    }
    return existed;
  }

  commit(): void {
    for (const key of this.deletes) {
      this.committed.delete(key);
    }
    for (const [key, row] of this.upserts) {
      this.committed.set(key, row);
    }
  }

  private getRow(key: string): Row<T> | null {
    if (this.deletes.has(key)) {
      return null;
    }
    return this.upserts.get(key) ?? this.committed.get(key) ?? null;
  }
}

class InMemoryUnitOfWork implements BillingUnitOfWork {
  private readonly owner = Symbol('unit-of-work');
  private readonly charges: StagedTable<Charge>;
  private readonly payments: StagedTable<Payment>;
  private readonly recurringCharges: StagedTable<RecurringCharge>;
  private readonly transactions: StagedTable<BillingTransaction>;
  private closed = false;

  constructor(
    tables: LedgerTables,
    private readonly locks: KeyedLock,
    nextSeq: () => number,
    private readonly clock: Clock
  ) {
    this.charges = new StagedTable(tables.charges, nextSeq);
    this.payments = new StagedTable(tables.payments, nextSeq);
    this.recurringCharges = new StagedTable(tables.recurringCharges, nextSeq);
    this.transactions = new StagedTable(tables.transactions, nextSeq);
  }

  async lockCharge(communityId: string, chargeId: string): Promise<Charge | null> {
    this.lock(`charge:${chargeId}`);
    return this.findCharge(communityId, chargeId);
  }

  async lockPayment(communityId: string, paymentId: string): Promise<Payment | null> {
    this.lock(`payment:${paymentId}`);
    return this.findPayment(communityId, paymentId);
  }

  async lockRecurringCharge(
    communityId: string,
    recurringChargeId: string
  ): Promise<RecurringCharge | null> {
    this.lock(`recurring-charge:${recurringChargeId}`);
    return this.findRecurringCharge(communityId, recurringChargeId);
  }

  async findCharge(communityId: string, chargeId: string): Promise<Charge | null> {
    this.ensureOpen();
    return inCommunity(this.charges.get(chargeId), communityId);
  }

  async findPayment(communityId: string, paymentId: string): Promise<Payment | null> {
    this.ensureOpen();
    return inCommunity(this.payments.get(paymentId), communityId);
  }

  async findRecurringCharge(
    communityId: string,
    recurringChargeId: string
  ): Promise<RecurringCharge | null> {
    this.ensureOpen();
    return inCommunity(this.recurringCharges.get(recurringChargeId), communityId);
  }

  async findTransaction(paymentId: string, chargeId: string): Promise<BillingTransaction | null> {
    this.ensureOpen();
    return this.transactions.get(transactionKey(paymentId, chargeId));
  }

  async listCharges(filter: ChargeFilter): Promise<Charge[]> {
    this.ensureOpen();
    const { target } = filter;
    return this.charges
      .values()
      .filter(({ value }) => value.communityId === filter.communityId)
      .filter(({ value }) => !target || isSameTarget(value.target, target))
      .sort(
        (a, b) => b.value.chargeDate.getTime() - a.value.chargeDate.getTime() || b.seq - a.seq
      )
      .map(({ value }) => value);
  }

  async listPayments(filter: PaymentFilter): Promise<Payment[]> {
    this.ensureOpen();
    return this.payments
      .values()
      .filter(({ value }) => value.communityId === filter.communityId)
      .filter(({ value }) => filter.payerId === undefined || value.payerId === filter.payerId)
      .sort(
        (a, b) => b.value.paymentDate.getTime() - a.value.paymentDate.getTime() || b.seq - a.seq
      )
      .map(({ value }) => value);
  }

  async listTransactions(filter: TransactionFilter): Promise<BillingTransaction[]> {
    this.ensureOpen();
    const { chargeIds, paymentIds } = filter;
    return this.transactions
      .values()
      .filter(({ value }) => value.communityId === filter.communityId)
      .filter(({ value }) => !chargeIds || chargeIds.includes(value.chargeId))
      .filter(({ value }) => !paymentIds || paymentIds.includes(value.paymentId))
      .sort((a, b) => a.seq - b.seq)
      .map(({ value }) => value);
  }

  async listDueRecurringCharges(asOf: CalendarDate, limit: number): Promise<RecurringCharge[]> {
    this.ensureOpen();
    return this.recurringCharges
      .values()
      .filter(({ value }) => value.nextChargeDate <= asOf)
      .sort(
        (a, b) => a.value.nextChargeDate.localeCompare(b.value.nextChargeDate) || a.seq - b.seq
      )
      .slice(0, limit)
      .map(({ value }) => value);
  }

  async insertCharge(data: NewCharge): Promise<Charge> {
    this.ensureOpen();
    const charge: Charge = { ...data, id: data.id ?? crypto.randomUUID() };
    if (this.charges.get(charge.id)) {
      throw new PersistenceError(`Charge ${charge.id} already exists`);
    }
    this.charges.put(charge.id, charge);
    return structuredClone(charge);
  }

  async insertPayment(data: NewPayment): Promise<Payment> {
    this.ensureOpen();
    const payment: Payment = { ...data, id: data.id ?? crypto.randomUUID() };
    if (this.payments.get(payment.id)) {
      throw new PersistenceError(`Payment ${payment.id} already exists`);
    }
    this.payments.put(payment.id, payment);
    return structuredClone(payment);
  }

  async insertRecurringCharge(data: NewRecurringCharge): Promise<RecurringCharge> {
    this.ensureOpen();
    const template: RecurringCharge = { ...data, id: data.id ?? crypto.randomUUID() };
    if (this.recurringCharges.get(template.id)) {
      throw new PersistenceError(`Recurring charge ${template.id} already exists`);
    }
    this.recurringCharges.put(template.id, template);
    return structuredClone(template);
  }

  async insertTransaction(data: NewBillingTransaction): Promise<BillingTransaction> {
    this.ensureOpen();
    const key = transactionKey(data.paymentId, data.chargeId);

    if (this.transactions.get(key)) {
      throw new DuplicateAllocationError(data.paymentId, data.chargeId);
    }
    if (!inCommunity(this.charges.get(data.chargeId), data.communityId)) {
      throw new PersistenceError(`Transaction references missing charge ${data.chargeId}`);
    }
    if (!inCommunity(this.payments.get(data.paymentId), data.communityId)) {
      throw new PersistenceError(`Transaction references missing payment ${data.paymentId}`);
    }
    if (data.chargeClosingBalance < 0) {
      throw new BalanceViolationError(
        'charge',
        data.chargeId,
        data.chargeOpeningBalance,
        data.transactionAmount
      );
    }
    if (data.paymentClosingBalance < 0) {
      throw new BalanceViolationError(
        'payment',
        data.paymentId,
        data.paymentOpeningBalance,
        data.transactionAmount
      );
    }
    if (
      data.transactionAmount <= 0 ||
      data.chargeClosingBalance !== data.chargeOpeningBalance - data.transactionAmount ||
      data.paymentClosingBalance !== data.paymentOpeningBalance - data.transactionAmount
    ) {
      throw new PersistenceError('Transaction balances are inconsistent with its amount');
    }

    const transaction: BillingTransaction = { ...data, createdAt: this.clock() };
    this.transactions.put(key, transaction);
    return structuredClone(transaction);
  }

  async advanceRecurringCharge(
    communityId: string,
    recurringChargeId: string,
    from: CalendarDate,
    to: CalendarDate
  ): Promise<RecurringCharge | null> {
    this.ensureOpen();
    const template = inCommunity(this.recurringCharges.get(recurringChargeId), communityId);
    if (!template || template.nextChargeDate !== from) {
      return null;
    }

    const advanced: RecurringCharge = { ...template, nextChargeDate: to };
    this.recurringCharges.put(recurringChargeId, advanced);
    return structuredClone(advanced);
  }

  async deleteCharge(communityId: string, chargeId: string): Promise<boolean> {
    this.ensureOpen();
    if (!inCommunity(this.charges.get(chargeId), communityId)) {
      return false;
    }
    for (const { value } of this.transactions.values()) {
      if (value.chargeId === chargeId) {
        this.transactions.remove(transactionKey(value.paymentId, value.chargeId));
      }
    }
    return this.charges.remove(chargeId);
  }

  async deletePayment(communityId: string, paymentId: string): Promise<boolean> {
    this.ensureOpen();
    if (!inCommunity(this.payments.get(paymentId), communityId)) {
      return false;
    }
    for (const { value } of this.transactions.values()) {
      if (value.paymentId === paymentId) {
        this.transactions.remove(transactionKey(value.paymentId, value.chargeId));
      }
    }
    return this.payments.remove(paymentId);
  }

  commit(): void {
    this.ensureOpen();
    this.charges.commit();
    this.payments.commit();
    this.recurringCharges.commit();
    this.transactions.commit();
  }

  close(): void {
    this.closed = true;
    this.locks.releaseAll(this.owner);
  }

  private lock(key: string): void {
    this.ensureOpen();
    if (!this.locks.tryAcquire(key, this.owner)) {
      throw new ConcurrencyConflictError(`${key} is locked by another unit of work`);
    }
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new ConcurrencyConflictError('Unit of work is no longer active');
    }
  }
}

function inCommunity<T extends { communityId: string }>(
  value: T | null,
  communityId: string
): T | null {
  return value && value.communityId === communityId ? value : null;
}

function cancelledError(signal: AbortSignal): ConcurrencyConflictError {
  return new ConcurrencyConflictError('Unit of work was cancelled before commit', {
    cause: signal.reason,
  });
}

export interface InMemoryBillingStoreOptions {
  transactionTimeoutMs?: number;
  clock?: Clock;
  logger?: Logger;
}

export class InMemoryBillingStore implements BillingStore {
  private tables = createTables();
  private readonly locks = new KeyedLock();
  private sequence = 0;
  private readonly transactionTimeoutMs: number;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: InMemoryBillingStoreOptions = {}) {
    this.transactionTimeoutMs = options.transactionTimeoutMs ?? DEFAULT_TRANSACTION_TIMEOUT_MS;
    this.clock = options.clock ?? systemClock;
    this.logger = (options.logger ?? defaultLogger).child({ module: 'billing.in-memory-store' });
  }

  async runInTransaction<T>(
    work: (uow: BillingUnitOfWork) => Promise<T>,
    options: UnitOfWorkOptions = {}
  ): Promise<T> {
    const { signal } = options;
    if (signal?.aborted) {
      throw cancelledError(signal);
    }

    const uow = new InMemoryUnitOfWork(this.tables, this.locks, () => ++this.sequence, this.clock);
    let timer: ReturnType<typeof setTimeout> | undefined;
    let onAbort: (() => void) | undefined;

    const interrupted = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        reject(
          new ConcurrencyConflictError(
            `Unit of work did not finish within ${this.transactionTimeoutMs}ms`
          )
        );
      }, this.transactionTimeoutMs);

      if (signal) {
        onAbort = () => reject(cancelledError(signal));
        signal.addEventListener('abort', onAbort, { once: true });
      }
    });

    try {
      const result = await Promise.race([work(uow), interrupted]);
      if (signal?.aborted) {
        throw cancelledError(signal);
      }
      uow.commit();
      return result;
    } catch (error) {
      this.logger.debug({ err: error }, 'Unit of work rolled back');
      throw error;
    } finally {
      clearTimeout(timer);
      if (signal && onAbort) {
        signal.removeEventListener('abort', onAbort);
      }
      uow.close();
    }
  }

  /** Committed row counts */
  counts(): { charges: number; payments: number; recurringCharges: number; transactions: number } {
    return {
      charges: this.tables.charges.size,
      payments: this.tables.payments.size,
      recurringCharges: this.tables.recurringCharges.size,
      transactions: this.tables.transactions.size,
    };
  }

  /** Whether any unit of work currently holds a lock on `key` (e.g. `charge:<id>`) */
  isLocked(key: string): boolean {
    return this.locks.isHeld(key);
  }

  // Helper to clear data between tests
  reset(): void {
    this.tables = createTables();
    this.sequence = 0;
  }
}
