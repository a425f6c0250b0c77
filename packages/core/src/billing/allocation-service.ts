/**
 * Allocation Service
 *
 * Applies payments to charges. Each allocation runs in one unit of work that
 * locks the charge, then the payment, reads both remaining balances, and writes
 * a transaction row with the opening and closing balances frozen. A row locked
 * by a concurrent allocation fails the call with `ConcurrencyConflictError`
 * rather than waiting, so two allocations can never read the same opening
 * balance.
 */

import { logger as defaultLogger, type Logger } from '@repo/observability';
import {
  chargeRemainingBalance,
  computeAllocationBalances,
  paymentRemainingBalance,
} from './balance-calculator.js';
import {
  BillingNotFoundError,
  DuplicateAllocationError,
  reportBillingFailure,
} from './billing-errors.js';
import type { BillingStore, BillingUnitOfWork, UnitOfWorkOptions } from './billing-store.js';
import {
  AllocateAcrossSchema,
  AllocateSchema,
  type AllocateAcrossParams,
  type AllocateParams,
  type BillingTransaction,
  type Charge,
  type Payment,
} from './billing-types.js';
import { parseInput } from './billing-validation.js';

export interface AllocationServiceOptions {
  logger?: Logger;
}

export class AllocationService {
  private readonly logger: Logger;

  constructor(
    private readonly store: BillingStore,
    options: AllocationServiceOptions = {}
  ) {
    this.logger = (options.logger ?? defaultLogger).child({ module: 'billing.allocation' });
  }

  /**
   * Allocate part of a payment to a charge
   *
   * @returns The transaction with its frozen balances
   * @throws {BillingValidationError} If the input is malformed
   * @throws {BillingNotFoundError} If the charge or payment is not in the community
   * @throws {DuplicateAllocationError} If the payment is already allocated to the charge
   * @throws {BalanceViolationError} If either remaining balance would go negative
   * @throws {ConcurrencyConflictError} If either row is locked by another unit of work
   */
  async allocate(
    params: AllocateParams,
    options: UnitOfWorkOptions = {}
  ): Promise<BillingTransaction> {
    try {
      const { communityId, paymentId, chargeId, amount } = parseInput(AllocateSchema, params);

      const transaction = await this.store.runInTransaction(async (uow) => {
        const charge = await uow.lockCharge(communityId, chargeId);
        if (!charge) {
          throw new BillingNotFoundError('charge', chargeId);
        }

        const payment = await uow.lockPayment(communityId, paymentId);
        if (!payment) {
          throw new BillingNotFoundError('payment', paymentId);
        }

        return this.writeAllocation(uow, charge, payment, amount);
      }, options);

      this.logAllocation(transaction);
      return transaction;
    } catch (error) {
      throw reportBillingFailure(this.logger, error, { ...params }, 'Allocation failed');
    }
  }

  /**
   * Allocate one payment across several charges in a single unit of work.
   * Either every allocation is written or none is.
   *
   * Charges are locked in id order before the payment, the same order
   * `allocate` uses, so overlapping requests conflict instead of deadlocking.
   */
  async allocateAcross(
    params: AllocateAcrossParams,
    options: UnitOfWorkOptions = {}
  ): Promise<BillingTransaction[]> {
    try {
      const { communityId, paymentId, allocations } = parseInput(AllocateAcrossSchema, params);

      const transactions = await this.store.runInTransaction(async (uow) => {
        const charges = new Map<string, Charge>();
        const lockOrder = allocations.map((item) => item.chargeId).sort();
        for (const chargeId of lockOrder) {
          const charge = await uow.lockCharge(communityId, chargeId);
          if (!charge) {
            throw new BillingNotFoundError('charge', chargeId);
          }
          charges.set(chargeId, charge);
        }

        const payment = await uow.lockPayment(communityId, paymentId);
        if (!payment) {
          throw new BillingNotFoundError('payment', paymentId);
        }

        const written: BillingTransaction[] = [];
        for (const { chargeId, amount } of allocations) {
          const charge = charges.get(chargeId);
          if (!charge) {
            throw new BillingNotFoundError('charge', chargeId);
          }
          written.push(await this.writeAllocation(uow, charge, payment, amount));
        }
        return written;
      }, options);

      transactions.forEach((transaction) => this.logAllocation(transaction));
      return transactions;
    } catch (error) {
      throw reportBillingFailure(
        this.logger,
        error,
        { communityId: params.communityId, paymentId: params.paymentId },
        'Allocation across charges failed'
      );
    }
  }

  /**
   * Write one allocation against rows already locked by `uow`. Balances are
   * read inside the unit of work, so earlier writes in the same unit count.
   */
  private async writeAllocation(
    uow: BillingUnitOfWork,
    charge: Charge,
    payment: Payment,
    amount: number
  ): Promise<BillingTransaction> {
    const existing = await uow.findTransaction(payment.id, charge.id);
    if (existing) {
      throw new DuplicateAllocationError(payment.id, charge.id);
    }

    const [chargeTransactions, paymentTransactions] = await Promise.all([
      uow.listTransactions({ communityId: charge.communityId, chargeIds: [charge.id] }),
      uow.listTransactions({ communityId: payment.communityId, paymentIds: [payment.id] }),
    ]);

    const balances = computeAllocationBalances({
      chargeId: charge.id,
      paymentId: payment.id,
      chargeOpeningBalance: chargeRemainingBalance(charge, chargeTransactions),
      paymentOpeningBalance: paymentRemainingBalance(payment, paymentTransactions),
      transactionAmount: amount,
    });

    return uow.insertTransaction({
      communityId: charge.communityId,
      paymentId: payment.id,
      chargeId: charge.id,
      ...balances,
    });
  }

  private logAllocation(transaction: BillingTransaction): void {
    this.logger.info(
      {
        communityId: transaction.communityId,
        paymentId: transaction.paymentId,
        chargeId: transaction.chargeId,
        amount: transaction.transactionAmount,
        chargeClosingBalance: transaction.chargeClosingBalance,
        paymentClosingBalance: transaction.paymentClosingBalance,
      },
      'Payment allocated to charge'
    );
  }
}
