/**
 * Billing Service
 *
 * Charges, payments and recurring charge templates for a community, with
 * remaining balances derived from the transaction log. References to
 * communities, residences and occupants are checked against the registry
 * before anything is written.
 */

import { logger as defaultLogger, type Logger } from '@repo/observability';
import { chargeRemainingBalance, paymentRemainingBalance } from './balance-calculator.js';
import {
  BillingNotFoundError,
  BillingValidationError,
  ConcurrencyConflictError,
  reportBillingFailure,
} from './billing-errors.js';
import { assertTargetExists, type BillingRegistry } from './billing-registry.js';
import type { BillingStore, BillingUnitOfWork } from './billing-store.js';
import {
  CreateChargeSchema,
  CreateRecurringChargeSchema,
  EntityRefSchema,
  ListChargesSchema,
  ListPaymentsSchema,
  ListTransactionsSchema,
  RecordPaymentSchema,
  TargetStatementSchema,
  systemClock,
  type BillingTransaction,
  type Charge,
  type ChargeFilter,
  type ChargeWithBalance,
  type Clock,
  type CreateChargeParams,
  type CreateRecurringChargeParams,
  type EntityRefParams,
  type ListChargesParams,
  type ListPaymentsParams,
  type ListTransactionsParams,
  type Payment,
  type PaymentWithBalance,
  type RecordPaymentParams,
  type RecurringCharge,
  type TargetStatement,
  type TargetStatementParams,
} from './billing-types.js';
import { parseInput } from './billing-validation.js';
import { anchorDayOf } from './recurrence.js';

function uniqueSorted(ids: string[]): string[] {
  return [...new Set(ids)].sort();
}

/**
 * The first of `cascaded` that is no longer the latest transaction on its
 * counterpart in `counterpartLog`, which is in write order
 */
function findBuriedTransaction(
  cascaded: BillingTransaction[],
  counterpartLog: BillingTransaction[],
  counterpartOf: (transaction: BillingTransaction) => string
): BillingTransaction | undefined {
  const latest = new Map<string, BillingTransaction>();
  for (const transaction of counterpartLog) {
    latest.set(counterpartOf(transaction), transaction);
  }

  return cascaded.find((transaction) => {
    const last = latest.get(counterpartOf(transaction));
    return (
      last !== undefined &&
      (last.paymentId !== transaction.paymentId || last.chargeId !== transaction.chargeId)
    );
  });
}

export interface BillingServiceOptions {
  logger?: Logger;
  clock?: Clock;
}

export class BillingService {
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(
    private readonly store: BillingStore,
    private readonly registry: BillingRegistry,
    options: BillingServiceOptions = {}
  ) {
    this.logger = (options.logger ?? defaultLogger).child({ module: 'billing.service' });
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Create a one-off charge against a residence or an occupant
   *
   * @throws {BillingValidationError} If the input is malformed
   * @throws {BillingNotFoundError} If the community or target is unknown
   */
  async createCharge(params: CreateChargeParams): Promise<Charge> {
    return this.run('createCharge', { communityId: params.communityId }, async () => {
      const input = parseInput(CreateChargeSchema, params);
      await assertTargetExists(this.registry, input.communityId, input.target);

      const charge = await this.store.runInTransaction((uow) =>
        uow.insertCharge({
          communityId: input.communityId,
          target: input.target,
          name: input.name,
          amount: input.amount,
          chargeDate: this.clock(),
          dueDate: input.dueDate,
          recurringChargeId: null,
        })
      );

      this.logger.info(
        { communityId: charge.communityId, chargeId: charge.id, amount: charge.amount },
        'Charge created'
      );
      return charge;
    });
  }

  /**
   * Record a payment made by an occupant
   *
   * @throws {BillingNotFoundError} If the community or payer is unknown
   */
  async recordPayment(params: RecordPaymentParams): Promise<Payment> {
    return this.run('recordPayment', { communityId: params.communityId }, async () => {
      const input = parseInput(RecordPaymentSchema, params);
      await assertTargetExists(this.registry, input.communityId, {
        kind: 'occupant',
        occupantId: input.payerId,
      });

      const payment = await this.store.runInTransaction((uow) =>
        uow.insertPayment({
          communityId: input.communityId,
          payerId: input.payerId,
          amount: input.amount,
          paymentDate: input.paymentDate ?? this.clock(),
        })
      );

      this.logger.info(
        { communityId: payment.communityId, paymentId: payment.id, amount: payment.amount },
        'Payment recorded'
      );
      return payment;
    });
  }

  /**
   * Create a recurring charge template whose first charge falls on `firstChargeDate`.
   * The day of month of that date becomes the schedule's anchor day.
   */
  async createRecurringCharge(params: CreateRecurringChargeParams): Promise<RecurringCharge> {
    return this.run('createRecurringCharge', { communityId: params.communityId }, async () => {
      const input = parseInput(CreateRecurringChargeSchema, params);
      await assertTargetExists(this.registry, input.communityId, input.target);

      const template = await this.store.runInTransaction((uow) =>
        uow.insertRecurringCharge({
          communityId: input.communityId,
          target: input.target,
          name: input.name,
          amount: input.amount,
          frequency: input.frequency,
          frequencySkip: input.frequencySkip,
          timeToPayDays: input.timeToPayDays,
          nextChargeDate: input.firstChargeDate,
          anchorDay: anchorDayOf(input.firstChargeDate),
        })
      );

      this.logger.info(
        {
          communityId: template.communityId,
          templateId: template.id,
          frequency: template.frequency,
          nextChargeDate: template.nextChargeDate,
        },
        'Recurring charge created'
      );
      return template;
    });
  }

  async getCharge(params: EntityRefParams): Promise<ChargeWithBalance> {
    return this.run('getCharge', { ...params }, async () => {
      const { communityId, id } = parseInput(EntityRefSchema, params);

      return this.store.runInTransaction(async (uow) => {
        const charge = await uow.findCharge(communityId, id);
        if (!charge) {
          throw new BillingNotFoundError('charge', id);
        }

        const transactions = await uow.listTransactions({ communityId, chargeIds: [id] });
        return { ...charge, remainingBalance: chargeRemainingBalance(charge, transactions) };
      });
    });
  }

  async getPayment(params: EntityRefParams): Promise<PaymentWithBalance> {
    return this.run('getPayment', { ...params }, async () => {
      const { communityId, id } = parseInput(EntityRefSchema, params);

      return this.store.runInTransaction(async (uow) => {
        const payment = await uow.findPayment(communityId, id);
        if (!payment) {
          throw new BillingNotFoundError('payment', id);
        }

        const transactions = await uow.listTransactions({ communityId, paymentIds: [id] });
        return { ...payment, remainingBalance: paymentRemainingBalance(payment, transactions) };
      });
    });
  }

  async getRecurringCharge(params: EntityRefParams): Promise<RecurringCharge> {
    return this.run('getRecurringCharge', { ...params }, async () => {
      const { communityId, id } = parseInput(EntityRefSchema, params);

      const template = await this.store.runInTransaction((uow) =>
        uow.findRecurringCharge(communityId, id)
      );
      if (!template) {
        throw new BillingNotFoundError('recurring charge', id);
      }
      return template;
    });
  }

  /**
   * Charges in a community, newest first, optionally for one target
   */
  async listCharges(params: ListChargesParams): Promise<ChargeWithBalance[]> {
    return this.run('listCharges', { communityId: params.communityId }, async () => {
      const filter = parseInput(ListChargesSchema, params);
      return this.store.runInTransaction((uow) => this.chargesWithBalances(uow, filter));
    });
  }

  /**
   * Payments in a community, newest first, optionally for one payer
   */
  async listPayments(params: ListPaymentsParams): Promise<PaymentWithBalance[]> {
    return this.run('listPayments', { communityId: params.communityId }, async () => {
      const filter = parseInput(ListPaymentsSchema, params);

      return this.store.runInTransaction(async (uow) => {
        const payments = await uow.listPayments(filter);
        const transactions = await uow.listTransactions({
          communityId: filter.communityId,
          paymentIds: payments.map((payment) => payment.id),
        });

        return payments.map((payment) => ({
          ...payment,
          remainingBalance: paymentRemainingBalance(payment, transactions),
        }));
      });
    });
  }

  /**
   * Transactions in the order they were written, optionally for one charge and/or payment
   */
  async listTransactions(params: ListTransactionsParams): Promise<BillingTransaction[]> {
    return this.run('listTransactions', { ...params }, async () => {
      const { communityId, chargeId, paymentId } = parseInput(ListTransactionsSchema, params);

      return this.store.runInTransaction((uow) =>
        uow.listTransactions({
          communityId,
          ...(chargeId !== undefined ? { chargeIds: [chargeId] } : {}),
          ...(paymentId !== undefined ? { paymentIds: [paymentId] } : {}),
        })
      );
    });
  }

  /**
   * Every charge billed to a residence or occupant with its outstanding balance
   *
   * @throws {BillingNotFoundError} If the community or target is unknown
   */
  async getTargetStatement(params: TargetStatementParams): Promise<TargetStatement> {
    return this.run('getTargetStatement', { communityId: params.communityId }, async () => {
      const { communityId, target } = parseInput(TargetStatementSchema, params);
      await assertTargetExists(this.registry, communityId, target);

      const charges = await this.store.runInTransaction((uow) =>
        this.chargesWithBalances(uow, { communityId, target })
      );

      return {
        communityId,
        target,
        charges,
        totalCharged: charges.reduce((sum, charge) => sum + charge.amount, 0),
        totalOutstanding: charges.reduce((sum, charge) => sum + charge.remainingBalance, 0),
      };
    });
  }

  /**
   * Delete a charge and its transactions, freeing the amounts they allocated
   * from their payments
   *
   * Balances are read from the closing balances of the latest transaction, so
   * a transaction can only be removed while it is still the latest one on its
   * payment.
   *
   * @throws {BillingValidationError} If a payment of the charge was allocated again afterwards
   * @throws {ConcurrencyConflictError} If the charge or one of its payments is locked
   */
  async deleteCharge(params: EntityRefParams): Promise<void> {
    return this.run('deleteCharge', { ...params }, async () => {
      const { communityId, id } = parseInput(EntityRefSchema, params);

      await this.store.runInTransaction(async (uow) => {
        const charge = await uow.lockCharge(communityId, id);
        if (!charge) {
          throw new BillingNotFoundError('charge', id);
        }

        const cascaded = await uow.listTransactions({ communityId, chargeIds: [id] });
        const paymentIds = uniqueSorted(cascaded.map((transaction) => transaction.paymentId));
        for (const paymentId of paymentIds) {
          await uow.lockPayment(communityId, paymentId);
        }

        const paymentLog = await uow.listTransactions({ communityId, paymentIds });
        const buried = findBuriedTransaction(cascaded, paymentLog, (t) => t.paymentId);
        if (buried) {
          throw new BillingValidationError(
            `Charge ${id} cannot be deleted: payment ${buried.paymentId} was allocated again after it`
          );
        }

        if (!(await uow.deleteCharge(communityId, id))) {
          throw new BillingNotFoundError('charge', id);
        }
      });

      this.logger.info({ communityId, chargeId: id }, 'Charge deleted');
    });
  }

  /**
   * Delete a payment and its transactions, restoring the balances of the
   * charges it was allocated to
   *
   * Charges are locked before the payment, as in an allocation. A charge
   * allocated to after this payment keeps the payment.
   *
   * @throws {BillingValidationError} If a charge of the payment was allocated to again afterwards
   * @throws {ConcurrencyConflictError} If the payment or one of its charges is locked
   */
  async deletePayment(params: EntityRefParams): Promise<void> {
    return this.run('deletePayment', { ...params }, async () => {
      const { communityId, id } = parseInput(EntityRefSchema, params);

      await this.store.runInTransaction(async (uow) => {
        const found = await uow.findPayment(communityId, id);
        if (!found) {
          throw new BillingNotFoundError('payment', id);
        }

        const allocated = await uow.listTransactions({ communityId, paymentIds: [id] });
        const chargeIds = uniqueSorted(allocated.map((transaction) => transaction.chargeId));
        for (const chargeId of chargeIds) {
          await uow.lockCharge(communityId, chargeId);
        }

        const payment = await uow.lockPayment(communityId, id);
        if (!payment) {
          throw new BillingNotFoundError('payment', id);
        }

        const cascaded = await uow.listTransactions({ communityId, paymentIds: [id] });
        const unlocked = cascaded.find((transaction) => !chargeIds.includes(transaction.chargeId));
        if (unlocked) {
          throw new ConcurrencyConflictError(
            `Payment ${id} was allocated to charge ${unlocked.chargeId} while being deleted`
          );
        }

        const chargeLog = await uow.listTransactions({ communityId, chargeIds });
        const buried = findBuriedTransaction(cascaded, chargeLog, (t) => t.chargeId);
        if (buried) {
          throw new BillingValidationError(
            `Payment ${id} cannot be deleted: charge ${buried.chargeId} was allocated to again after it`
          );
        }

        if (!(await uow.deletePayment(communityId, id))) {
          throw new BillingNotFoundError('payment', id);
        }
      });

      this.logger.info({ communityId, paymentId: id }, 'Payment deleted');
    });
  }

  private async chargesWithBalances(
    uow: BillingUnitOfWork,
    filter: ChargeFilter
  ): Promise<ChargeWithBalance[]> {
    const charges = await uow.listCharges(filter);
    const transactions = await uow.listTransactions({
      communityId: filter.communityId,
      chargeIds: charges.map((charge) => charge.id),
    });

    return charges.map((charge) => ({
      ...charge,
      remainingBalance: chargeRemainingBalance(charge, transactions),
    }));
  }

  private async run<T>(
    operation: string,
    bindings: Record<string, unknown>,
    work: () => Promise<T>
  ): Promise<T> {
    try {
      return await work();
    } catch (error) {
      throw reportBillingFailure(
        this.logger,
        error,
        { ...bindings, operation },
        `${operation} failed`
      );
    }
  }
}
