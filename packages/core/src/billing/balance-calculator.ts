/**
 * Balance Calculator
 *
 * Pure derivation of remaining balances from the transaction log. A charge or
 * payment with no transactions still has its full amount outstanding; otherwise
 * its balance is the smallest closing balance ever recorded against it, since
 * every allocation lowers it.
 */

import { BalanceViolationError } from './billing-errors.js';
import type { BillingTransaction, Charge, Payment } from './billing-types.js';

type BalanceEntity = { id: string; amount: number };

export function remainingBalance(amount: number, closingBalances: readonly number[]): number {
  return closingBalances.reduce((lowest, balance) => Math.min(lowest, balance), amount);
}

export function chargeRemainingBalance(
  charge: Pick<Charge, 'id' | 'amount'>,
  transactions: readonly BillingTransaction[]
): number {
  return remainingBalance(
    charge.amount,
    transactions
      .filter((transaction) => transaction.chargeId === charge.id)
      .map((transaction) => transaction.chargeClosingBalance)
  );
}

export function paymentRemainingBalance(
  payment: Pick<Payment, 'id' | 'amount'>,
  transactions: readonly BillingTransaction[]
): number {
  return remainingBalance(
    payment.amount,
    transactions
      .filter((transaction) => transaction.paymentId === payment.id)
      .map((transaction) => transaction.paymentClosingBalance)
  );
}

export interface BalanceSummary {
  amount: number;
  allocated: number;
  remaining: number;
}

export function summarizeChargeBalance(
  charge: Pick<Charge, 'id' | 'amount'>,
  transactions: readonly BillingTransaction[]
): BalanceSummary {
  return summarize(charge, chargeRemainingBalance(charge, transactions));
}

export function summarizePaymentBalance(
  payment: Pick<Payment, 'id' | 'amount'>,
  transactions: readonly BillingTransaction[]
): BalanceSummary {
  return summarize(payment, paymentRemainingBalance(payment, transactions));
}

function summarize(entity: BalanceEntity, remaining: number): BalanceSummary {
  return { amount: entity.amount, allocated: entity.amount - remaining, remaining };
}

export interface AllocationBalances {
  transactionAmount: number;
  chargeOpeningBalance: number;
  chargeClosingBalance: number;
  paymentOpeningBalance: number;
  paymentClosingBalance: number;
}

/**
 * Compute the four frozen balances for a new allocation.
 *
 * @throws {BalanceViolationError} If either side would go negative
 */
export function computeAllocationBalances(params: {
  chargeId: string;
  paymentId: string;
  chargeOpeningBalance: number;
  paymentOpeningBalance: number;
  transactionAmount: number;
}): AllocationBalances {
  const { chargeOpeningBalance, paymentOpeningBalance, transactionAmount } = params;
  const chargeClosingBalance = chargeOpeningBalance - transactionAmount;
  const paymentClosingBalance = paymentOpeningBalance - transactionAmount;

  if (chargeClosingBalance < 0) {
    throw new BalanceViolationError(
      'charge',
      params.chargeId,
      chargeOpeningBalance,
      transactionAmount
    );
  }

  if (paymentClosingBalance < 0) {
    throw new BalanceViolationError(
      'payment',
      params.paymentId,
      paymentOpeningBalance,
      transactionAmount
    );
  }

  return {
    transactionAmount,
    chargeOpeningBalance,
    chargeClosingBalance,
    paymentOpeningBalance,
    paymentClosingBalance,
  };
}
