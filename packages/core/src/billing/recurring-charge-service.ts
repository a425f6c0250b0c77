/**
 * Recurring Charge Service
 *
 * Turns due recurring charge templates into charges. A scheduler supplies the
 * `asOf` date and calls `materializeDue` once per due template; a template
 * several periods behind produces one charge per call until it catches up.
 */

import { z } from 'zod';
import { logger as defaultLogger, type Logger } from '@repo/observability';
import {
  BillingNotFoundError,
  ConcurrencyConflictError,
  isRetryableBillingError,
  reportBillingFailure,
} from './billing-errors.js';
import type { BillingStore, UnitOfWorkOptions } from './billing-store.js';
import {
  MaterializeDueSchema,
  calendarDateSchema,
  systemClock,
  type CalendarDate,
  type Clock,
  type MaterializationResult,
  type MaterializeDueParams,
  type RecurringCharge,
} from './billing-types.js';
import { parseInput } from './billing-validation.js';
import { addDaysToCalendarDate, advanceChargeDate } from './recurrence.js';

/** Largest page of due templates read at once */
export const MAX_DUE_LIST_LIMIT = 1000;

const dueListSchema = z.object({
  asOf: calendarDateSchema,
  limit: z.number().int().positive().max(MAX_DUE_LIST_LIMIT),
});

const dueRunSchema = z.object({
  asOf: calendarDateSchema,
  batchSize: z.number().int().positive().max(MAX_DUE_LIST_LIMIT),
});

export interface MaterializationRunSummary {
  materialized: number;
  /** Templates skipped because another unit of work held or advanced them */
  conflicts: number;
  failures: number;
}

export interface RecurringChargeServiceOptions {
  logger?: Logger;
  clock?: Clock;
}

export class RecurringChargeService {
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(
    private readonly store: BillingStore,
    options: RecurringChargeServiceOptions = {}
  ) {
    this.logger = (options.logger ?? defaultLogger).child({ module: 'billing.recurring' });
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Materialize the template's current period if it is due on `asOf`
   *
   * The template row stays locked from the due check through the advance of
   * its next charge date, so a period is charged at most once.
   *
   * @throws {BillingNotFoundError} If the template is not in the community
   * @throws {ConcurrencyConflictError} If the template is locked or was advanced concurrently
   */
  async materializeDue(
    params: MaterializeDueParams,
    asOf: CalendarDate,
    options: UnitOfWorkOptions = {}
  ): Promise<MaterializationResult> {
    try {
      const { communityId, templateId } = parseInput(MaterializeDueSchema, params);
      const dueOn = parseInput(calendarDateSchema, asOf);

      const result = await this.store.runInTransaction<MaterializationResult>(async (uow) => {
        const template = await uow.lockRecurringCharge(communityId, templateId);
        if (!template) {
          throw new BillingNotFoundError('recurring charge', templateId);
        }

        // YYYY-MM-DD strings order the same way as the dates they name
        if (template.nextChargeDate > dueOn) {
          return { status: 'not_due', template };
        }

        const charge = await uow.insertCharge({
          communityId,
          target: template.target,
          name: template.name,
          amount: template.amount,
          chargeDate: this.clock(),
          dueDate: addDaysToCalendarDate(template.nextChargeDate, template.timeToPayDays),
          recurringChargeId: template.id,
        });

        const nextChargeDate = advanceChargeDate(
          template.nextChargeDate,
          template.frequency,
          template.frequencySkip,
          template.anchorDay
        );
        const advanced = await uow.advanceRecurringCharge(
          communityId,
          template.id,
          template.nextChargeDate,
          nextChargeDate
        );
        if (!advanced) {
          throw new ConcurrencyConflictError(
            `Recurring charge ${template.id} was advanced by another unit of work`
          );
        }

        return { status: 'materialized', charge, template: advanced };
      }, options);

      if (result.status === 'materialized') {
        this.logger.info(
          {
            communityId,
            templateId,
            chargeId: result.charge.id,
            dueDate: result.charge.dueDate,
            nextChargeDate: result.template.nextChargeDate,
          },
          'Recurring charge materialized'
        );
      } else {
        this.logger.debug(
          { communityId, templateId, nextChargeDate: result.template.nextChargeDate, asOf },
          'Recurring charge not due'
        );
      }

      return result;
    } catch (error) {
      throw reportBillingFailure(
        this.logger,
        error,
        { ...params, asOf },
        'Recurring charge materialization failed'
      );
    }
  }

  /**
   * Materialize every template due on or before `asOf`, one period per pass,
   * until nothing due is left. A template that fails once is skipped for the
   * rest of the run and picked up again by the next one.
   *
   * @throws {BillingValidationError} If `asOf` or `batchSize` is invalid
   */
  async materializeAllDue(
    asOf: CalendarDate,
    options: { batchSize: number }
  ): Promise<MaterializationRunSummary> {
    const { batchSize } = parseInput(dueRunSchema, { asOf, batchSize: options.batchSize });
    const summary: MaterializationRunSummary = { materialized: 0, conflicts: 0, failures: 0 };
    const skipped = new Set<string>();

    for (;;) {
      // Skipped templates are still due and come back first
      const limit = Math.min(batchSize + skipped.size, MAX_DUE_LIST_LIMIT);
      const due = (await this.listDueRecurringCharges(asOf, limit)).filter(
        (template) => !skipped.has(template.id)
      );
      if (due.length === 0) {
        break;
      }

      for (const template of due) {
        try {
          const result = await this.materializeDue(
            { communityId: template.communityId, templateId: template.id },
            asOf
          );
          if (result.status === 'materialized') {
            summary.materialized += 1;
          }
        } catch (error) {
          // materializeDue has already reported it
          skipped.add(template.id);
          if (isRetryableBillingError(error)) {
            summary.conflicts += 1;
          } else {
            summary.failures += 1;
          }
        }
      }
    }

    this.logger.info({ asOf, ...summary }, 'Recurring charge run finished');
    return summary;
  }

  /**
   * Templates across every community due on or before `asOf`, oldest first
   */
  async listDueRecurringCharges(asOf: CalendarDate, limit: number): Promise<RecurringCharge[]> {
    try {
      const input = parseInput(dueListSchema, { asOf, limit });
      return await this.store.runInTransaction((uow) =>
        uow.listDueRecurringCharges(input.asOf, input.limit)
      );
    } catch (error) {
      throw reportBillingFailure(
        this.logger,
        error,
        { asOf, limit },
        'Listing due recurring charges failed'
      );
    }
  }
}
