/**
 * Billing Domain Errors
 *
 * Every ledger operation fails with exactly one of these kinds. Callers map
 * them to responses and decide whether to retry `concurrency_conflict`; every
 * other kind is terminal for that call.
 */

import type { Logger } from '@repo/observability';

export type BillingErrorKind =
  | 'validation'
  | 'not_found'
  | 'duplicate_allocation'
  | 'balance_violation'
  | 'concurrency_conflict'
  | 'persistence';

export abstract class BillingError extends Error {
  abstract readonly kind: BillingErrorKind;
  readonly retryable: boolean = false;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class BillingValidationError extends BillingError {
  override readonly kind = 'validation';
}

export type BillingEntityType =
  | 'charge'
  | 'payment'
  | 'recurring charge'
  | 'community'
  | 'residence'
  | 'occupant';

export class BillingNotFoundError extends BillingError {
  override readonly kind = 'not_found';

  constructor(
    readonly entity: BillingEntityType,
    readonly id: string
  ) {
    super(`${entity.charAt(0).toUpperCase()}${entity.slice(1)} not found: ${id}`);
  }
}

export class DuplicateAllocationError extends BillingError {
  override readonly kind = 'duplicate_allocation';

  constructor(
    readonly paymentId: string,
    readonly chargeId: string,
    options?: ErrorOptions
  ) {
    super(`Payment ${paymentId} is already allocated to charge ${chargeId}`, options);
  }
}

export type BalanceSide = 'charge' | 'payment';

export class BalanceViolationError extends BillingError {
  override readonly kind = 'balance_violation';

  constructor(
    readonly side: BalanceSide,
    readonly entityId: string,
    readonly openingBalance: number,
    readonly transactionAmount: number,
    options?: ErrorOptions
  ) {
    super(
      `Allocating ${transactionAmount} would leave ${side} ${entityId} with a balance of ${
        openingBalance - transactionAmount
      }`,
      options
    );
  }
}

export class ConcurrencyConflictError extends BillingError {
  override readonly kind = 'concurrency_conflict';
  override readonly retryable = true;
}

export class PersistenceError extends BillingError {
  override readonly kind = 'persistence';
}

export function isBillingError(error: unknown): error is BillingError {
  return error instanceof BillingError;
}

export function isRetryableBillingError(error: unknown): boolean {
  return isBillingError(error) && error.retryable;
}

/**
 * Normalize anything thrown below the service layer into a single error kind.
 * Unknown failures become `PersistenceError` with the original as `cause`.
 */
export function toBillingError(error: unknown): BillingError {
  if (isBillingError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  return new PersistenceError(`Billing store failure: ${message}`, { cause: error });
}

/**
 * Log a failed ledger operation at a level matching its kind and return the
 * normalized error for rethrowing.
 */
export function reportBillingFailure(
  logger: Logger,
  error: unknown,
  bindings: Record<string, unknown>,
  message: string
): BillingError {
  const billingError = toBillingError(error);
  const fields = { ...bindings, kind: billingError.kind, err: billingError };

  switch (billingError.kind) {
    case 'persistence':
      logger.error(fields, message);
      break;
    case 'concurrency_conflict':
    case 'balance_violation':
    case 'duplicate_allocation':
      logger.warn(fields, message);
      break;
    case 'validation':
    case 'not_found':
      logger.debug(fields, message);
      break;
  }

  return billingError;
}
