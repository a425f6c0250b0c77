/**
 * Billing Service Unit Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { BillingNotFoundError, BillingValidationError } from '../billing-errors.js';
import {
  COMMUNITY_ID,
  FOREIGN_OCCUPANT_ID,
  MISSING_ID,
  OCCUPANT_ID,
  OTHER_COMMUNITY_ID,
  OTHER_OCCUPANT_ID,
  OTHER_RESIDENCE_ID,
  RESIDENCE_ID,
  createTestLedger,
  type TestLedger,
} from './ledger-fixtures.js';

const residence = { kind: 'residence', residenceId: RESIDENCE_ID } as const;

describe('BillingService', () => {
  let ledger: TestLedger;

  beforeEach(() => {
    ledger = createTestLedger();
  });

  describe('createCharge', () => {
    it('should create a charge stamped with the current time', async () => {
      const charge = await ledger.billing.createCharge({
        communityId: COMMUNITY_ID,
        target: residence,
        name: '  Pool key  ',
        amount: 2500,
        dueDate: '2024-02-01',
      });

      expect(charge).toMatchObject({
        communityId: COMMUNITY_ID,
        target: residence,
        name: 'Pool key',
        amount: 2500,
        dueDate: '2024-02-01',
        recurringChargeId: null,
        chargeDate: new Date('2024-01-15T12:00:00.000Z'),
      });
    });

    it('should reject a target that names both a residence and an occupant', async () => {
      const target = { kind: 'residence', residenceId: RESIDENCE_ID, occupantId: OCCUPANT_ID } as const;

      await expect(
        ledger.billing.createCharge({
          communityId: COMMUNITY_ID,
          target,
          name: 'Pool key',
          amount: 2500,
          dueDate: '2024-02-01',
        })
      ).rejects.toThrow("Validation failed: target: Unrecognized key(s) in object: 'occupantId'");
    });

    it('should reject a fractional amount', async () => {
      await expect(
        ledger.billing.createCharge({
          communityId: COMMUNITY_ID,
          target: residence,
          name: 'Pool key',
          amount: 25.5,
          dueDate: '2024-02-01',
        })
      ).rejects.toBeInstanceOf(BillingValidationError);
    });

    it('should reject a residence that belongs to no community it is billed in', async () => {
      await expect(
        ledger.billing.createCharge({
          communityId: COMMUNITY_ID,
          target: { kind: 'residence', residenceId: MISSING_ID },
          name: 'Pool key',
          amount: 2500,
          dueDate: '2024-02-01',
        })
      ).rejects.toThrow(`Residence not found: ${MISSING_ID}`);
      expect(ledger.store.counts().charges).toBe(0);
    });

    it('should reject an unknown community', async () => {
      await expect(
        ledger.billing.createCharge({
          communityId: MISSING_ID,
          target: residence,
          name: 'Pool key',
          amount: 2500,
          dueDate: '2024-02-01',
        })
      ).rejects.toThrow(`Community not found: ${MISSING_ID}`);
    });
  });

  describe('recordPayment', () => {
    it('should default the payment date to now', async () => {
      const payment = await ledger.billing.recordPayment({
        communityId: COMMUNITY_ID,
        payerId: OCCUPANT_ID,
        amount: 6000,
      });

      expect(payment.paymentDate).toEqual(new Date('2024-01-15T12:00:00.000Z'));
    });

    it('should reject a payer from another community', async () => {
      await expect(
        ledger.billing.recordPayment({
          communityId: COMMUNITY_ID,
          payerId: FOREIGN_OCCUPANT_ID,
          amount: 6000,
        })
      ).rejects.toBeInstanceOf(BillingNotFoundError);
    });
  });

  describe('createRecurringCharge', () => {
    it('should anchor the schedule on the first charge day', async () => {
      const template = await ledger.billing.createRecurringCharge({
        communityId: COMMUNITY_ID,
        target: residence,
        name: 'Monthly dues',
        amount: 25000,
        frequency: 'MONTHLY',
        timeToPayDays: 10,
        firstChargeDate: '2024-01-31',
      });

      expect(template).toMatchObject({
        frequencySkip: 1,
        nextChargeDate: '2024-01-31',
        anchorDay: 31,
      });
      await expect(
        ledger.billing.getRecurringCharge({ communityId: COMMUNITY_ID, id: template.id })
      ).resolves.toEqual(template);
    });

    it('should reject a first charge date that does not exist', async () => {
      await expect(
        ledger.billing.createRecurringCharge({
          communityId: COMMUNITY_ID,
          target: residence,
          name: 'Monthly dues',
          amount: 25000,
          frequency: 'MONTHLY',
          timeToPayDays: 10,
          firstChargeDate: '2023-02-29',
        })
      ).rejects.toThrow('Validation failed: firstChargeDate: Invalid calendar date');
    });
  });

  describe('queries', () => {
    it('should list charges newest first with remaining balances', async () => {
      // Arrange
      const older = await ledger.billing.createCharge({
        communityId: COMMUNITY_ID,
        target: residence,
        name: 'January dues',
        amount: 10000,
        dueDate: '2024-02-01',
      });
      const newer = await ledger.billing.createCharge({
        communityId: COMMUNITY_ID,
        target: { kind: 'occupant', occupantId: OCCUPANT_ID },
        name: 'Guest parking',
        amount: 500,
        dueDate: '2024-02-01',
      });
      const payment = await ledger.billing.recordPayment({
        communityId: COMMUNITY_ID,
        payerId: OCCUPANT_ID,
        amount: 3000,
      });
      await ledger.allocations.allocate({
        communityId: COMMUNITY_ID,
        paymentId: payment.id,
        chargeId: older.id,
        amount: 3000,
      });

      // Act
      const all = await ledger.billing.listCharges({ communityId: COMMUNITY_ID });
      const forResidence = await ledger.billing.listCharges({
        communityId: COMMUNITY_ID,
        target: residence,
      });
      const elsewhere = await ledger.billing.listCharges({ communityId: OTHER_COMMUNITY_ID });

      // Assert
      expect(all.map((c) => [c.id, c.remainingBalance])).toEqual([
        [newer.id, 500],
        [older.id, 7000],
      ]);
      expect(forResidence.map((c) => c.id)).toEqual([older.id]);
      expect(elsewhere).toEqual([]);
    });

    it('should list payments newest first, filtered by payer', async () => {
      const first = await ledger.billing.recordPayment({
        communityId: COMMUNITY_ID,
        payerId: OCCUPANT_ID,
        amount: 100,
        paymentDate: new Date('2024-01-01T00:00:00.000Z'),
      });
      const second = await ledger.billing.recordPayment({
        communityId: COMMUNITY_ID,
        payerId: OTHER_OCCUPANT_ID,
        amount: 200,
        paymentDate: new Date('2024-01-02T00:00:00.000Z'),
      });

      const all = await ledger.billing.listPayments({ communityId: COMMUNITY_ID });
      const byPayer = await ledger.billing.listPayments({
        communityId: COMMUNITY_ID,
        payerId: OCCUPANT_ID,
      });

      expect(all.map((p) => p.id)).toEqual([second.id, first.id]);
      expect(byPayer).toEqual([{ ...first, remainingBalance: 100 }]);
    });

    it('should list transactions in the order they were written', async () => {
      const charge = await ledger.billing.createCharge({
        communityId: COMMUNITY_ID,
        target: residence,
        name: 'Assessment',
        amount: 9000,
        dueDate: '2024-03-01',
      });
      const first = await ledger.billing.recordPayment({
        communityId: COMMUNITY_ID,
        payerId: OCCUPANT_ID,
        amount: 4000,
      });
      const second = await ledger.billing.recordPayment({
        communityId: COMMUNITY_ID,
        payerId: OTHER_OCCUPANT_ID,
        amount: 5000,
      });
      for (const payment of [first, second]) {
        await ledger.allocations.allocate({
          communityId: COMMUNITY_ID,
          paymentId: payment.id,
          chargeId: charge.id,
          amount: payment.amount,
        });
      }

      const forCharge = await ledger.billing.listTransactions({
        communityId: COMMUNITY_ID,
        chargeId: charge.id,
      });
      const forSecond = await ledger.billing.listTransactions({
        communityId: COMMUNITY_ID,
        paymentId: second.id,
      });

      expect(forCharge.map((t) => [t.chargeOpeningBalance, t.chargeClosingBalance])).toEqual([
        [9000, 5000],
        [5000, 0],
      ]);
      expect(forSecond).toHaveLength(1);
      expect(forSecond[0]?.paymentId).toBe(second.id);
    });

    it('should throw BillingNotFoundError for an unknown charge', async () => {
      await expect(
        ledger.billing.getCharge({ communityId: COMMUNITY_ID, id: MISSING_ID })
      ).rejects.toThrow(`Charge not found: ${MISSING_ID}`);
    });
  });

  describe('getTargetStatement', () => {
    it('should total charged and outstanding amounts for a residence', async () => {
      const dues = await ledger.billing.createCharge({
        communityId: COMMUNITY_ID,
        target: residence,
        name: 'Dues',
        amount: 10000,
        dueDate: '2024-02-01',
      });
      await ledger.billing.createCharge({
        communityId: COMMUNITY_ID,
        target: residence,
        name: 'Fine',
        amount: 1500,
        dueDate: '2024-02-01',
      });
      await ledger.billing.createCharge({
        communityId: COMMUNITY_ID,
        target: { kind: 'residence', residenceId: OTHER_RESIDENCE_ID },
        name: 'Dues',
        amount: 10000,
        dueDate: '2024-02-01',
      });
      const payment = await ledger.billing.recordPayment({
        communityId: COMMUNITY_ID,
        payerId: OCCUPANT_ID,
        amount: 6000,
      });
      await ledger.allocations.allocate({
        communityId: COMMUNITY_ID,
        paymentId: payment.id,
        chargeId: dues.id,
        amount: 6000,
      });

      const statement = await ledger.billing.getTargetStatement({
        communityId: COMMUNITY_ID,
        target: residence,
      });

      expect(statement.charges).toHaveLength(2);
      expect(statement.totalCharged).toBe(11500);
      expect(statement.totalOutstanding).toBe(5500);
    });
  });

  describe('deletes', () => {
    async function allocatedPair() {
      const charge = await ledger.billing.createCharge({
        communityId: COMMUNITY_ID,
        target: residence,
        name: 'Dues',
        amount: 10000,
        dueDate: '2024-02-01',
      });
      const payment = await ledger.billing.recordPayment({
        communityId: COMMUNITY_ID,
        payerId: OCCUPANT_ID,
        amount: 6000,
      });
      await ledger.allocations.allocate({
        communityId: COMMUNITY_ID,
        paymentId: payment.id,
        chargeId: charge.id,
        amount: 6000,
      });
      return { charge, payment };
    }

    it('should restore charge balances when a payment is deleted', async () => {
      const { charge, payment } = await allocatedPair();

      await ledger.billing.deletePayment({ communityId: COMMUNITY_ID, id: payment.id });

      const reloaded = await ledger.billing.getCharge({ communityId: COMMUNITY_ID, id: charge.id });
      expect(reloaded.remainingBalance).toBe(10000);
      expect(ledger.store.counts()).toMatchObject({ payments: 0, transactions: 0 });
    });

    it('should free the payment when a charge is deleted', async () => {
      const { charge, payment } = await allocatedPair();

      await ledger.billing.deleteCharge({ communityId: COMMUNITY_ID, id: charge.id });

      const reloaded = await ledger.billing.getPayment({
        communityId: COMMUNITY_ID,
        id: payment.id,
      });
      expect(reloaded.remainingBalance).toBe(6000);
    });

    it('should refuse to delete a payment whose charge was allocated to again afterwards', async () => {
      // Arrange
      const charge = await ledger.billing.createCharge({
        communityId: COMMUNITY_ID,
        target: residence,
        name: 'Dues',
        amount: 10000,
        dueDate: '2024-02-01',
      });
      const [first, second] = await Promise.all(
        [3000, 2000].map((amount) =>
          ledger.billing.recordPayment({ communityId: COMMUNITY_ID, payerId: OCCUPANT_ID, amount })
        )
      );
      if (!first || !second) {
        throw new Error('payments were not recorded');
      }
      for (const payment of [first, second]) {
        await ledger.allocations.allocate({
          communityId: COMMUNITY_ID,
          paymentId: payment.id,
          chargeId: charge.id,
          amount: payment.amount,
        });
      }
      const balanceOf = async () =>
        (await ledger.billing.getCharge({ communityId: COMMUNITY_ID, id: charge.id }))
          .remainingBalance;

      // Act & Assert
      await expect(
        ledger.billing.deletePayment({ communityId: COMMUNITY_ID, id: first.id })
      ).rejects.toThrow(
        `Payment ${first.id} cannot be deleted: charge ${charge.id} was allocated to again after it`
      );
      expect(await balanceOf()).toBe(5000);
      expect(ledger.store.counts()).toMatchObject({ payments: 2, transactions: 2 });

      await ledger.billing.deletePayment({ communityId: COMMUNITY_ID, id: second.id });
      expect(await balanceOf()).toBe(7000);

      await ledger.billing.deletePayment({ communityId: COMMUNITY_ID, id: first.id });
      expect(await balanceOf()).toBe(10000);
    });

    it('should refuse to delete a charge whose payment was allocated again afterwards', async () => {
      // Arrange
      const payment = await ledger.billing.recordPayment({
        communityId: COMMUNITY_ID,
        payerId: OCCUPANT_ID,
        amount: 5000,
      });
      const charges = [];
      for (const amount of [3000, 2000]) {
        const charge = await ledger.billing.createCharge({
          communityId: COMMUNITY_ID,
          target: residence,
          name: 'Dues',
          amount: 10000,
          dueDate: '2024-02-01',
        });
        await ledger.allocations.allocate({
          communityId: COMMUNITY_ID,
          paymentId: payment.id,
          chargeId: charge.id,
          amount,
        });
        charges.push(charge);
      }
      const [earlier, later] = charges;
      if (!earlier || !later) {
        throw new Error('charges were not created');
      }

      // Act & Assert
      await expect(
        ledger.billing.deleteCharge({ communityId: COMMUNITY_ID, id: earlier.id })
      ).rejects.toBeInstanceOf(BillingValidationError);
      expect(ledger.store.counts()).toMatchObject({ charges: 2, transactions: 2 });

      await ledger.billing.deleteCharge({ communityId: COMMUNITY_ID, id: later.id });
      const reloaded = await ledger.billing.getPayment({
        communityId: COMMUNITY_ID,
        id: payment.id,
      });
      expect(reloaded.remainingBalance).toBe(2000);
    });

    it('should not delete a charge through another community', async () => {
      const { charge } = await allocatedPair();

      await expect(
        ledger.billing.deleteCharge({ communityId: OTHER_COMMUNITY_ID, id: charge.id })
      ).rejects.toBeInstanceOf(BillingNotFoundError);
      expect(ledger.store.counts().charges).toBe(1);
    });
  });
});
