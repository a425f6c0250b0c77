/**
 * Recurring Charge Service Unit Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { BillingNotFoundError, BillingValidationError } from '../billing-errors.js';
import type { RecurringCharge } from '../billing-types.js';
import {
  COMMUNITY_ID,
  MISSING_ID,
  OCCUPANT_ID,
  OTHER_COMMUNITY_ID,
  RESIDENCE_ID,
  createTestLedger,
  type TestLedger,
} from './ledger-fixtures.js';

describe('RecurringChargeService', () => {
  let ledger: TestLedger;

  beforeEach(() => {
    ledger = createTestLedger();
  });

  function createMonthlyDues(firstChargeDate = '2024-01-31'): Promise<RecurringCharge> {
    return ledger.billing.createRecurringCharge({
      communityId: COMMUNITY_ID,
      target: { kind: 'residence', residenceId: RESIDENCE_ID },
      name: 'Monthly dues',
      amount: 25000,
      frequency: 'MONTHLY',
      timeToPayDays: 10,
      firstChargeDate,
    });
  }

  describe('materializeDue', () => {
    it('should create a charge from the template and advance its next date', async () => {
      // Arrange
      const template = await createMonthlyDues();

      // Act
      const result = await ledger.recurringCharges.materializeDue(
        { communityId: COMMUNITY_ID, templateId: template.id },
        '2024-01-31'
      );

      // Assert
      expect(result.status).toBe('materialized');
      if (result.status === 'materialized') {
        expect(result.charge).toMatchObject({
          communityId: COMMUNITY_ID,
          target: { kind: 'residence', residenceId: RESIDENCE_ID },
          name: 'Monthly dues',
          amount: 25000,
          dueDate: '2024-02-10',
          recurringChargeId: template.id,
        });
        expect(result.template.nextChargeDate).toBe('2024-02-29');
      }
    });

    it('should produce exactly one charge when called twice for the same date', async () => {
      const template = await createMonthlyDues();
      const ref = { communityId: COMMUNITY_ID, templateId: template.id };

      const first = await ledger.recurringCharges.materializeDue(ref, '2024-02-15');
      const second = await ledger.recurringCharges.materializeDue(ref, '2024-02-15');

      expect(first.status).toBe('materialized');
      expect(second).toEqual({
        status: 'not_due',
        template: { ...template, nextChargeDate: '2024-02-29' },
      });
      expect(ledger.store.counts().charges).toBe(1);
    });

    it('should report templates whose next date is after asOf as not due', async () => {
      const template = await createMonthlyDues('2024-03-01');

      const result = await ledger.recurringCharges.materializeDue(
        { communityId: COMMUNITY_ID, templateId: template.id },
        '2024-02-29'
      );

      expect(result).toEqual({ status: 'not_due', template });
      expect(ledger.store.counts().charges).toBe(0);
    });

    it('should catch up one period per call and return to the anchor day', async () => {
      // Arrange
      const template = await createMonthlyDues();
      const ref = { communityId: COMMUNITY_ID, templateId: template.id };

      // Act
      const dueDates: string[] = [];
      let result = await ledger.recurringCharges.materializeDue(ref, '2024-04-30');
      while (result.status === 'materialized') {
        dueDates.push(result.charge.dueDate);
        result = await ledger.recurringCharges.materializeDue(ref, '2024-04-30');
      }

      // Assert
      expect(dueDates).toEqual(['2024-02-10', '2024-03-10', '2024-04-10', '2024-05-10']);
      expect(result.template.nextChargeDate).toBe('2024-05-31');
    });

    it('should throw BillingNotFoundError for a template in another community', async () => {
      const template = await createMonthlyDues();

      await expect(
        ledger.recurringCharges.materializeDue(
          { communityId: OTHER_COMMUNITY_ID, templateId: template.id },
          '2024-02-01'
        )
      ).rejects.toBeInstanceOf(BillingNotFoundError);
    });

    it('should reject an invalid asOf date', async () => {
      await expect(
        ledger.recurringCharges.materializeDue(
          { communityId: COMMUNITY_ID, templateId: MISSING_ID },
          '2024-02-30'
        )
      ).rejects.toBeInstanceOf(BillingValidationError);
    });

    it('should fail fast while another unit of work holds the template', async () => {
      const template = await createMonthlyDues();
      const ref = { communityId: COMMUNITY_ID, templateId: template.id };

      const results = await Promise.allSettled([
        ledger.recurringCharges.materializeDue(ref, '2024-01-31'),
        ledger.recurringCharges.materializeDue(ref, '2024-01-31'),
      ]);

      expect(results.map((r) => r.status)).toEqual(['fulfilled', 'rejected']);
      expect(results[1]).toMatchObject({ reason: { kind: 'concurrency_conflict' } });
      expect(ledger.store.counts().charges).toBe(1);
    });
  });

  describe('materializeAllDue', () => {
    it('should charge every due template and skip one held elsewhere', async () => {
      // Arrange
      const held = await createMonthlyDues('2024-01-01');
      await createMonthlyDues('2024-01-05');
      let markLocked = () => {};
      let release = () => {};
      const locked = new Promise<void>((resolve) => {
        markLocked = resolve;
      });
      const holding = ledger.store.runInTransaction(async (uow) => {
        await uow.lockRecurringCharge(COMMUNITY_ID, held.id);
        markLocked();
        await new Promise<void>((resolve) => {
          release = resolve;
        });
      });
      await locked;
      const listSpy = vi.spyOn(ledger.recurringCharges, 'listDueRecurringCharges');

      // Act
      const summary = await ledger.recurringCharges.materializeAllDue('2024-01-15', {
        batchSize: 1000,
      });
      release();
      await holding;

      // Assert
      expect(summary).toEqual({ materialized: 1, conflicts: 1, failures: 0 });
      expect(listSpy.mock.calls.map(([, limit]) => limit)).toEqual([1000, 1000]);
      expect(ledger.store.counts().charges).toBe(1);
    });

    it('should catch a template up one period per pass', async () => {
      await createMonthlyDues('2024-01-31');

      const summary = await ledger.recurringCharges.materializeAllDue('2024-04-30', {
        batchSize: 10,
      });

      // Jan 31, Feb 29, Mar 31 and Apr 30
      expect(summary).toEqual({ materialized: 4, conflicts: 0, failures: 0 });
      expect(ledger.store.counts().charges).toBe(4);
    });

    it('should reject a batch size above the list limit', async () => {
      await expect(
        ledger.recurringCharges.materializeAllDue('2024-01-15', { batchSize: 1001 })
      ).rejects.toBeInstanceOf(BillingValidationError);
    });
  });

  describe('listDueRecurringCharges', () => {
    it('should list due templates oldest first up to the limit', async () => {
      const march = await createMonthlyDues('2024-03-05');
      const january = await createMonthlyDues('2024-01-20');
      await createMonthlyDues('2024-06-01');
      const weekly = await ledger.billing.createRecurringCharge({
        communityId: COMMUNITY_ID,
        target: { kind: 'occupant', occupantId: OCCUPANT_ID },
        name: 'Parking',
        amount: 1500,
        frequency: 'WEEKLY',
        frequencySkip: 2,
        timeToPayDays: 0,
        firstChargeDate: '2024-02-14',
      });

      const due = await ledger.recurringCharges.listDueRecurringCharges('2024-03-31', 10);
      const limited = await ledger.recurringCharges.listDueRecurringCharges('2024-03-31', 1);

      expect(due.map((t) => t.id)).toEqual([january.id, weekly.id, march.id]);
      expect(limited.map((t) => t.id)).toEqual([january.id]);
    });

    it('should reject a non-positive limit', async () => {
      await expect(
        ledger.recurringCharges.listDueRecurringCharges('2024-03-31', 0)
      ).rejects.toBeInstanceOf(BillingValidationError);
    });
  });
});
