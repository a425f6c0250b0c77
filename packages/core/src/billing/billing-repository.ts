/**
 * Billing Repository
 *
 * Postgres implementation of the billing store on drizzle-orm. Each unit of
 * work is one READ COMMITTED transaction with per-transaction timeouts; rows
 * are locked with `FOR UPDATE NOWAIT` from the balance read through the write,
 * so a contended row fails immediately instead of queueing.
 */

import crypto from 'node:crypto';
import { and, asc, desc, eq, inArray, lte, type SQL } from 'drizzle-orm';
import {
  PostgresErrorCode,
  billingCharges,
  billingPayments,
  billingRecurringCharges,
  billingTransactions,
  getPostgresErrorDetails,
  isConnectionTimeoutError,
  setTransactionLimits,
  type BillingChargeRow,
  type BillingPaymentRow,
  type BillingRecurringChargeRow,
  type BillingTransactionRow,
  type Database,
  type DatabaseTransaction,
} from '@repo/database';
import { logger as defaultLogger, type Logger } from '@repo/observability';
import {
  BalanceViolationError,
  BillingValidationError,
  ConcurrencyConflictError,
  DuplicateAllocationError,
  PersistenceError,
  isBillingError,
  type BillingError,
} from './billing-errors.js';
import type { BillingStore, BillingUnitOfWork, UnitOfWorkOptions } from './billing-store.js';
import type {
  BillingTarget,
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

export interface PostgresBillingStoreOptions {
  lockTimeoutMs: number;
  transactionTimeoutMs: number;
  logger?: Logger;
}

type TargetColumns = { residenceId: string | null; occupantId: string | null };

function targetToColumns(target: BillingTarget): TargetColumns {
  switch (target.kind) {
    case 'residence':
      return { residenceId: target.residenceId, occupantId: null };
    case 'occupant':
      return { residenceId: null, occupantId: target.occupantId };
  }
}

function targetFromColumns(row: TargetColumns): BillingTarget {
  if (row.residenceId !== null && row.occupantId === null) {
    return { kind: 'residence', residenceId: row.residenceId };
  }
  if (row.occupantId !== null && row.residenceId === null) {
    return { kind: 'occupant', occupantId: row.occupantId };
  }
  throw new PersistenceError('Stored row must reference exactly one of residence or occupant');
}

function mapCharge(row: BillingChargeRow): Charge {
  return {
    id: row.id,
    communityId: row.communityId,
    target: targetFromColumns(row),
    name: row.name,
    amount: row.amount,
    chargeDate: row.chargeDate,
    dueDate: row.dueDate,
    recurringChargeId: row.recurringChargeId ?? null,
  };
}

function mapPayment(row: BillingPaymentRow): Payment {
  return {
    id: row.id,
    communityId: row.communityId,
    payerId: row.payerId,
    amount: row.amount,
    paymentDate: row.paymentDate,
  };
}

function mapRecurringCharge(row: BillingRecurringChargeRow): RecurringCharge {
  return {
    id: row.id,
    communityId: row.communityId,
    target: targetFromColumns(row),
    name: row.name,
    amount: row.amount,
    frequency: row.frequency,
    frequencySkip: row.frequencySkip,
    timeToPayDays: row.timeToPayDays,
    nextChargeDate: row.nextChargeDate,
    anchorDay: row.anchorDay,
  };
}

function mapTransaction(row: BillingTransactionRow): BillingTransaction {
  return {
    communityId: row.communityId,
    paymentId: row.paymentId,
    chargeId: row.chargeId,
    transactionAmount: row.transactionAmount,
    chargeOpeningBalance: row.chargeOpeningBalance,
    chargeClosingBalance: row.chargeClosingBalance,
    paymentOpeningBalance: row.paymentOpeningBalance,
    paymentClosingBalance: row.paymentClosingBalance,
    createdAt: row.createdAt,
  };
}

function firstOrNull<T>(rows: T[]): T | null {
  return rows[0] ?? null;
}

function requireRow<T>(rows: T[], description: string): T {
  const row = rows[0];
  if (row === undefined) {
    throw new PersistenceError(`Insert into ${description} returned no row`);
  }
  return row;
}

/**
 * Typed error for a transaction row rejected by the allocation constraints,
 * carrying the ids and balances of the rejected write.
 */
function allocationConstraintError(
  error: unknown,
  data: NewBillingTransaction
): BillingError | null {
  const details = getPostgresErrorDetails(error);

  switch (details?.constraint) {
    case 'billing_transaction_pkey':
      return new DuplicateAllocationError(data.paymentId, data.chargeId, { cause: error });
    case 'billing_transaction_charge_closing_check':
      return new BalanceViolationError(
        'charge',
        data.chargeId,
        data.chargeOpeningBalance,
        data.transactionAmount,
        { cause: error }
      );
    case 'billing_transaction_payment_closing_check':
      return new BalanceViolationError(
        'payment',
        data.paymentId,
        data.paymentOpeningBalance,
        data.transactionAmount,
        { cause: error }
      );
    default:
      return null;
  }
}

class PostgresBillingUnitOfWork implements BillingUnitOfWork {
  constructor(private readonly tx: DatabaseTransaction) {}

  async lockCharge(communityId: string, chargeId: string): Promise<Charge | null> {
    const rows = await this.tx
      .select()
      .from(billingCharges)
      .where(and(eq(billingCharges.id, chargeId), eq(billingCharges.communityId, communityId)))
      .for('update', { noWait: true });
    const row = firstOrNull(rows);
    return row ? mapCharge(row) : null;
  }

  async lockPayment(communityId: string, paymentId: string): Promise<Payment | null> {
    const rows = await this.tx
      .select()
      .from(billingPayments)
      .where(and(eq(billingPayments.id, paymentId), eq(billingPayments.communityId, communityId)))
      .for('update', { noWait: true });
    const row = firstOrNull(rows);
    return row ? mapPayment(row) : null;
  }

  async lockRecurringCharge(
    communityId: string,
    recurringChargeId: string
  ): Promise<RecurringCharge | null> {
    const rows = await this.tx
      .select()
      .from(billingRecurringCharges)
      .where(
        and(
          eq(billingRecurringCharges.id, recurringChargeId),
          eq(billingRecurringCharges.communityId, communityId)
        )
      )
      .for('update', { noWait: true });
    const row = firstOrNull(rows);
    return row ? mapRecurringCharge(row) : null;
  }

  async findCharge(communityId: string, chargeId: string): Promise<Charge | null> {
    const rows = await this.tx
      .select()
      .from(billingCharges)
      .where(and(eq(billingCharges.id, chargeId), eq(billingCharges.communityId, communityId)));
    const row = firstOrNull(rows);
    return row ? mapCharge(row) : null;
  }

  async findPayment(communityId: string, paymentId: string): Promise<Payment | null> {
    const rows = await this.tx
      .select()
      .from(billingPayments)
      .where(and(eq(billingPayments.id, paymentId), eq(billingPayments.communityId, communityId)));
    const row = firstOrNull(rows);
    return row ? mapPayment(row) : null;
  }

  async findRecurringCharge(
    communityId: string,
    recurringChargeId: string
  ): Promise<RecurringCharge | null> {
    const rows = await this.tx
      .select()
      .from(billingRecurringCharges)
      .where(
        and(
          eq(billingRecurringCharges.id, recurringChargeId),
          eq(billingRecurringCharges.communityId, communityId)
        )
      );
    const row = firstOrNull(rows);
    return row ? mapRecurringCharge(row) : null;
  }

  async findTransaction(paymentId: string, chargeId: string): Promise<BillingTransaction | null> {
    const rows = await this.tx
      .select()
      .from(billingTransactions)
      .where(
        and(eq(billingTransactions.paymentId, paymentId), eq(billingTransactions.chargeId, chargeId))
      );
    const row = firstOrNull(rows);
    return row ? mapTransaction(row) : null;
  }

  async listCharges(filter: ChargeFilter): Promise<Charge[]> {
    const conditions: SQL[] = [eq(billingCharges.communityId, filter.communityId)];
    if (filter.target?.kind === 'residence') {
      conditions.push(eq(billingCharges.residenceId, filter.target.residenceId));
    } else if (filter.target?.kind === 'occupant') {
      conditions.push(eq(billingCharges.occupantId, filter.target.occupantId));
    }

    const rows = await this.tx
      .select()
      .from(billingCharges)
      .where(and(...conditions))
      .orderBy(desc(billingCharges.chargeDate), desc(billingCharges.id));
    return rows.map(mapCharge);
  }

  async listPayments(filter: PaymentFilter): Promise<Payment[]> {
    const conditions: SQL[] = [eq(billingPayments.communityId, filter.communityId)];
    if (filter.payerId !== undefined) {
      conditions.push(eq(billingPayments.payerId, filter.payerId));
    }

    const rows = await this.tx
      .select()
      .from(billingPayments)
      .where(and(...conditions))
      .orderBy(desc(billingPayments.paymentDate), desc(billingPayments.id));
    return rows.map(mapPayment);
  }

  async listTransactions(filter: TransactionFilter): Promise<BillingTransaction[]> {
    if (filter.chargeIds?.length === 0 || filter.paymentIds?.length === 0) {
      return [];
    }

    const conditions: SQL[] = [eq(billingTransactions.communityId, filter.communityId)];
    if (filter.chargeIds) {
      conditions.push(inArray(billingTransactions.chargeId, [...filter.chargeIds]));
    }
    if (filter.paymentIds) {
      conditions.push(inArray(billingTransactions.paymentId, [...filter.paymentIds]));
    }

    const rows = await this.tx
      .select()
      .from(billingTransactions)
      .where(and(...conditions))
      .orderBy(asc(billingTransactions.sequence));
    return rows.map(mapTransaction);
  }

  async listDueRecurringCharges(asOf: CalendarDate, limit: number): Promise<RecurringCharge[]> {
    const rows = await this.tx
      .select()
      .from(billingRecurringCharges)
      .where(lte(billingRecurringCharges.nextChargeDate, asOf))
      .orderBy(asc(billingRecurringCharges.nextChargeDate), asc(billingRecurringCharges.createdAt))
      .limit(limit);
    return rows.map(mapRecurringCharge);
  }

  async insertCharge(data: NewCharge): Promise<Charge> {
    const rows = await this.tx
      .insert(billingCharges)
      .values({
        id: data.id ?? crypto.randomUUID(),
        communityId: data.communityId,
        ...targetToColumns(data.target),
        recurringChargeId: data.recurringChargeId,
        name: data.name,
        amount: data.amount,
        chargeDate: data.chargeDate,
        dueDate: data.dueDate,
      })
      .returning();
    return mapCharge(requireRow(rows, 'billing_charge'));
  }

  async insertPayment(data: NewPayment): Promise<Payment> {
    const rows = await this.tx
      .insert(billingPayments)
      .values({
        id: data.id ?? crypto.randomUUID(),
        communityId: data.communityId,
        payerId: data.payerId,
        amount: data.amount,
        paymentDate: data.paymentDate,
      })
      .returning();
    return mapPayment(requireRow(rows, 'billing_payment'));
  }

  async insertRecurringCharge(data: NewRecurringCharge): Promise<RecurringCharge> {
    const rows = await this.tx
      .insert(billingRecurringCharges)
      .values({
        id: data.id ?? crypto.randomUUID(),
        communityId: data.communityId,
        ...targetToColumns(data.target),
        name: data.name,
        amount: data.amount,
        frequency: data.frequency,
        frequencySkip: data.frequencySkip,
        timeToPayDays: data.timeToPayDays,
        nextChargeDate: data.nextChargeDate,
        anchorDay: data.anchorDay,
      })
      .returning();
    return mapRecurringCharge(requireRow(rows, 'billing_recurring_charge'));
  }

  async insertTransaction(data: NewBillingTransaction): Promise<BillingTransaction> {
    try {
      const rows = await this.tx.insert(billingTransactions).values(data).returning();
      return mapTransaction(requireRow(rows, 'billing_transaction'));
    } catch (error) {
      throw allocationConstraintError(error, data) ?? error;
    }
  }

  async advanceRecurringCharge(
    communityId: string,
    recurringChargeId: string,
    from: CalendarDate,
    to: CalendarDate
  ): Promise<RecurringCharge | null> {
    const rows = await this.tx
      .update(billingRecurringCharges)
      .set({ nextChargeDate: to })
      .where(
        and(
          eq(billingRecurringCharges.id, recurringChargeId),
          eq(billingRecurringCharges.communityId, communityId),
          eq(billingRecurringCharges.nextChargeDate, from)
        )
      )
      .returning();
    const row = firstOrNull(rows);
    return row ? mapRecurringCharge(row) : null;
  }

  async deleteCharge(communityId: string, chargeId: string): Promise<boolean> {
    const rows = await this.tx
      .delete(billingCharges)
      .where(and(eq(billingCharges.id, chargeId), eq(billingCharges.communityId, communityId)))
      .returning({ id: billingCharges.id });
    return rows.length > 0;
  }

  async deletePayment(communityId: string, paymentId: string): Promise<boolean> {
    const rows = await this.tx
      .delete(billingPayments)
      .where(and(eq(billingPayments.id, paymentId), eq(billingPayments.communityId, communityId)))
      .returning({ id: billingPayments.id });
    return rows.length > 0;
  }
}

const KEY_DETAIL_REGEX = /^Key \([^)]*\)=\(([^)]*)\)/;

/** Values from a unique violation detail such as `Key (a, b)=(1, 2) already exists.` */
function parseKeyDetail(detail: string | null): string[] {
  const values = detail ? KEY_DETAIL_REGEX.exec(detail)?.[1] : undefined;
  return values ? values.split(',').map((value) => value.trim()) : [];
}

/**
 * Translate driver and database failures into ledger error kinds.
 */
export function translatePostgresError(error: unknown, signal?: AbortSignal): BillingError {
  if (isBillingError(error)) {
    return error;
  }

  if (signal?.aborted) {
    return new ConcurrencyConflictError('Unit of work was cancelled before commit', {
      cause: error,
    });
  }

  if (isConnectionTimeoutError(error)) {
    return new ConcurrencyConflictError('Timed out waiting for a database connection', {
      cause: error,
    });
  }

  const details = getPostgresErrorDetails(error);
  if (!details) {
    const message = error instanceof Error ? error.message : String(error);
    return new PersistenceError(`Billing store failure: ${message}`, { cause: error });
  }

  switch (details.code) {
    case PostgresErrorCode.LockNotAvailable:
    case PostgresErrorCode.SerializationFailure:
    case PostgresErrorCode.DeadlockDetected:
    case PostgresErrorCode.QueryCanceled:
    case PostgresErrorCode.IdleInTransactionTimeout:
      return new ConcurrencyConflictError(`Ledger row is busy: ${details.message}`, {
        cause: error,
      });
    case PostgresErrorCode.UniqueViolation:
      if (details.constraint === 'billing_transaction_pkey') {
        const [paymentId = 'unknown', chargeId = 'unknown'] = parseKeyDetail(details.detail);
        return new DuplicateAllocationError(paymentId, chargeId, { cause: error });
      }
      break;
    case PostgresErrorCode.CheckViolation:
      if (details.table === 'billing_transaction') {
        return new PersistenceError(`Allocation rejected by ${details.constraint ?? 'a check'}`, {
          cause: error,
        });
      }
      return new BillingValidationError(`Rejected by ${details.constraint ?? 'a check'}`, {
        cause: error,
      });
    case PostgresErrorCode.InvalidTextRepresentation:
      return new BillingValidationError(details.message, { cause: error });
  }

  return new PersistenceError(`Billing store failure: ${details.message}`, { cause: error });
}

export class PostgresBillingStore implements BillingStore {
  private readonly logger: Logger;

  constructor(
    private readonly db: Database,
    private readonly options: PostgresBillingStoreOptions
  ) {
    this.logger = (options.logger ?? defaultLogger).child({ module: 'billing.postgres-store' });
  }

  async runInTransaction<T>(
    work: (uow: BillingUnitOfWork) => Promise<T>,
    options: UnitOfWorkOptions = {}
  ): Promise<T> {
    const { signal } = options;

    try {
      signal?.throwIfAborted();
      return await this.db.transaction(
        async (tx) => {
          await setTransactionLimits(tx, {
            lockTimeoutMs: this.options.lockTimeoutMs,
            transactionTimeoutMs: this.options.transactionTimeoutMs,
          });
          const result = await work(new PostgresBillingUnitOfWork(tx));
          // Throwing here rolls the transaction back instead of committing
          signal?.throwIfAborted();
          return result;
        },
        { isolationLevel: 'read committed' }
      );
    } catch (error) {
      const translated = translatePostgresError(error, signal);
      this.logger.debug({ err: error, kind: translated.kind }, 'Unit of work rolled back');
      throw translated;
    }
  }
}
