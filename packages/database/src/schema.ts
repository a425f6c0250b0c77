import { sql } from 'drizzle-orm';
import {
  bigint,
  bigserial,
  check,
  date,
  foreignKey,
  index,
  integer,
  pgEnum,
  pgTable,
  primaryKey,
  smallint,
  text,
  timestamp,
  unique,
  uuid,
} from 'drizzle-orm/pg-core';

/**
 * Billing ledger tables.
 *
 * Every row is scoped by community. Residences, occupants and communities live in
 * the registry, which owns those tables; only their identifiers are stored here.
 * Money columns hold integer minor currency units.
 */

export const billingFrequency = pgEnum('billing_frequency', ['YEARLY', 'MONTHLY', 'WEEKLY', 'DAILY']);

export const billingRecurringCharges = pgTable(
  'billing_recurring_charge',
  {
    id: uuid('id').primaryKey(),
    communityId: uuid('community_id').notNull(),
    residenceId: uuid('residence_id'),
    occupantId: uuid('occupant_id'),
    name: text('name').notNull(),
    amount: bigint('amount', { mode: 'number' }).notNull(),
    frequency: billingFrequency('frequency').notNull(),
    frequencySkip: integer('frequency_skip').notNull().default(1),
    timeToPayDays: integer('time_to_pay_days').notNull(),
    nextChargeDate: date('next_charge_date', { mode: 'string' }).notNull(),
    /** Day-of-month the schedule was first anchored on; end-of-month clamping re-attempts it. */
    anchorDay: smallint('anchor_day').notNull(),
    createdAt: timestamp('created_at', { withTimezone: true, mode: 'date' }).notNull().defaultNow(),
  },
  (table) => [
    check(
      'billing_recurring_charge_target_check',
      sql`(${table.residenceId} IS NULL) <> (${table.occupantId} IS NULL)`
    ),
    check('billing_recurring_charge_amount_check', sql`${table.amount} > 0`),
    check('billing_recurring_charge_skip_check', sql`${table.frequencySkip} > 0`),
    check('billing_recurring_charge_time_to_pay_check', sql`${table.timeToPayDays} >= 0`),
    check('billing_recurring_charge_anchor_day_check', sql`${table.anchorDay} BETWEEN 1 AND 31`),
    index('billing_recurring_charge_next_date_idx').on(table.nextChargeDate),
  ]
);

export const billingCharges = pgTable(
  'billing_charge',
  {
    id: uuid('id').primaryKey(),
    communityId: uuid('community_id').notNull(),
    residenceId: uuid('residence_id'),
    occupantId: uuid('occupant_id'),
    recurringChargeId: uuid('recurring_charge_id').references(() => billingRecurringCharges.id, {
      onDelete: 'set null',
    }),
    name: text('name').notNull(),
    amount: bigint('amount', { mode: 'number' }).notNull(),
    chargeDate: timestamp('charge_date', { withTimezone: true, mode: 'date' }).notNull().defaultNow(),
    dueDate: date('due_date', { mode: 'string' }).notNull(),
  },
  (table) => [
    unique('billing_charge_id_community_key').on(table.id, table.communityId),
    check(
      'billing_charge_target_check',
      sql`(${table.residenceId} IS NULL) <> (${table.occupantId} IS NULL)`
    ),
    check('billing_charge_amount_check', sql`${table.amount} > 0`),
    index('billing_charge_community_date_idx').on(table.communityId, table.chargeDate),
    index('billing_charge_residence_idx').on(table.residenceId),
    index('billing_charge_occupant_idx').on(table.occupantId),
  ]
);

export const billingPayments = pgTable(
  'billing_payment',
  {
    id: uuid('id').primaryKey(),
    communityId: uuid('community_id').notNull(),
    payerId: uuid('payer_id').notNull(),
    amount: bigint('amount', { mode: 'number' }).notNull(),
    paymentDate: timestamp('payment_date', { withTimezone: true, mode: 'date' }).notNull(),
  },
  (table) => [
    unique('billing_payment_id_community_key').on(table.id, table.communityId),
    check('billing_payment_amount_check', sql`${table.amount} > 0`),
    index('billing_payment_community_date_idx').on(table.communityId, table.paymentDate),
    index('billing_payment_payer_idx').on(table.payerId),
  ]
);

export const billingTransactions = pgTable(
  'billing_transaction',
  {
    // Write order; created_at is the same for every row of one unit of work
    sequence: bigserial('sequence', { mode: 'number' }).notNull(),
    communityId: uuid('community_id').notNull(),
    paymentId: uuid('payment_id').notNull(),
    chargeId: uuid('charge_id').notNull(),
    transactionAmount: bigint('transaction_amount', { mode: 'number' }).notNull(),
    chargeOpeningBalance: bigint('charge_opening_balance', { mode: 'number' }).notNull(),
    chargeClosingBalance: bigint('charge_closing_balance', { mode: 'number' }).notNull(),
    paymentOpeningBalance: bigint('payment_opening_balance', { mode: 'number' }).notNull(),
    paymentClosingBalance: bigint('payment_closing_balance', { mode: 'number' }).notNull(),
    createdAt: timestamp('created_at', { withTimezone: true, mode: 'date' }).notNull().defaultNow(),
  },
  (table) => [
    primaryKey({ name: 'billing_transaction_pkey', columns: [table.paymentId, table.chargeId] }),
    foreignKey({
      name: 'billing_transaction_payment_fkey',
      columns: [table.paymentId, table.communityId],
      foreignColumns: [billingPayments.id, billingPayments.communityId],
    }).onDelete('cascade'),
    foreignKey({
      name: 'billing_transaction_charge_fkey',
      columns: [table.chargeId, table.communityId],
      foreignColumns: [billingCharges.id, billingCharges.communityId],
    }).onDelete('cascade'),
    check('billing_transaction_amount_check', sql`${table.transactionAmount} > 0`),
    check('billing_transaction_charge_closing_check', sql`${table.chargeClosingBalance} >= 0`),
    check('billing_transaction_payment_closing_check', sql`${table.paymentClosingBalance} >= 0`),
    check(
      'billing_transaction_charge_balance_check',
      sql`${table.chargeClosingBalance} = ${table.chargeOpeningBalance} - ${table.transactionAmount}`
    ),
    check(
      'billing_transaction_payment_balance_check',
      sql`${table.paymentClosingBalance} = ${table.paymentOpeningBalance} - ${table.transactionAmount}`
    ),
    index('billing_transaction_charge_idx').on(table.chargeId),
    index('billing_transaction_sequence_idx').on(table.sequence),
  ]
);

export type BillingChargeRow = typeof billingCharges.$inferSelect;
export type BillingPaymentRow = typeof billingPayments.$inferSelect;
export type BillingTransactionRow = typeof billingTransactions.$inferSelect;
export type BillingRecurringChargeRow = typeof billingRecurringCharges.$inferSelect;
