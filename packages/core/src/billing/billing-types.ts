/**
 * Billing Domain Types
 *
 * Ledger entities, the zod schemas that guard service inputs, and the
 * parameter/result types passed between service and store layers.
 */

import { z } from 'zod';
import { isValidCalendarDate } from './recurrence.js';

export const BILLING_FREQUENCIES = ['YEARLY', 'MONTHLY', 'WEEKLY', 'DAILY'] as const;
export type BillingFrequency = (typeof BILLING_FREQUENCIES)[number];

/** ISO calendar date, `YYYY-MM-DD` */
export type CalendarDate = string;

export type ResidenceTarget = { kind: 'residence'; residenceId: string };
export type OccupantTarget = { kind: 'occupant'; occupantId: string };

/** Who a charge is billed to: a residence or a single occupant, never both */
export type BillingTarget = ResidenceTarget | OccupantTarget;

export interface Charge {
  id: string;
  communityId: string;
  target: BillingTarget;
  name: string;
  amount: number;
  chargeDate: Date;
  dueDate: CalendarDate;
  recurringChargeId: string | null;
}

export interface Payment {
  id: string;
  communityId: string;
  payerId: string;
  amount: number;
  paymentDate: Date;
}

/**
 * Allocation of one payment against one charge. Balances are frozen when the
 * row is written and never change afterwards.
 */
export interface BillingTransaction {
  communityId: string;
  paymentId: string;
  chargeId: string;
  transactionAmount: number;
  chargeOpeningBalance: number;
  chargeClosingBalance: number;
  paymentOpeningBalance: number;
  paymentClosingBalance: number;
  createdAt: Date;
}

export interface RecurringCharge {
  id: string;
  communityId: string;
  target: BillingTarget;
  name: string;
  amount: number;
  frequency: BillingFrequency;
  frequencySkip: number;
  timeToPayDays: number;
  nextChargeDate: CalendarDate;
  anchorDay: number;
}

export type ChargeWithBalance = Charge & { remainingBalance: number };
export type PaymentWithBalance = Payment & { remainingBalance: number };

// Store write shapes

export type NewCharge = Omit<Charge, 'id'> & { id?: string };
export type NewPayment = Omit<Payment, 'id'> & { id?: string };
export type NewRecurringCharge = Omit<RecurringCharge, 'id'> & { id?: string };
export type NewBillingTransaction = Omit<BillingTransaction, 'createdAt'>;

export interface ChargeFilter {
  communityId: string;
  target?: BillingTarget;
}

export interface PaymentFilter {
  communityId: string;
  payerId?: string;
}

export interface TransactionFilter {
  communityId: string;
  chargeIds?: readonly string[];
  paymentIds?: readonly string[];
}

// Input schemas

const idSchema = z.string().uuid();

export const amountSchema = z.number().int().positive().safe();

export const calendarDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a YYYY-MM-DD date')
  .refine(isValidCalendarDate, 'Invalid calendar date');

export const BillingTargetSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('residence'), residenceId: idSchema }).strict(),
  z.object({ kind: z.literal('occupant'), occupantId: idSchema }).strict(),
]);

const nameSchema = z.string().trim().min(1).max(200);

export const CreateChargeSchema = z
  .object({
    communityId: idSchema,
    target: BillingTargetSchema,
    name: nameSchema,
    amount: amountSchema,
    dueDate: calendarDateSchema,
  })
  .strict();

export const RecordPaymentSchema = z
  .object({
    communityId: idSchema,
    payerId: idSchema,
    amount: amountSchema,
    paymentDate: z.date().optional(),
  })
  .strict();

export const CreateRecurringChargeSchema = z
  .object({
    communityId: idSchema,
    target: BillingTargetSchema,
    name: nameSchema,
    amount: amountSchema,
    frequency: z.enum(BILLING_FREQUENCIES),
    frequencySkip: z.number().int().positive().max(1000).default(1),
    timeToPayDays: z.number().int().min(0).max(3660),
    firstChargeDate: calendarDateSchema,
  })
  .strict();

export const AllocateSchema = z
  .object({
    communityId: idSchema,
    paymentId: idSchema,
    chargeId: idSchema,
    amount: amountSchema,
  })
  .strict();

export const AllocateAcrossSchema = z
  .object({
    communityId: idSchema,
    paymentId: idSchema,
    allocations: z
      .array(z.object({ chargeId: idSchema, amount: amountSchema }).strict())
      .min(1)
      .max(100)
      .refine(
        (allocations) => new Set(allocations.map((item) => item.chargeId)).size === allocations.length,
        'Each charge may appear only once per allocation request'
      ),
  })
  .strict();

export const EntityRefSchema = z
  .object({
    communityId: idSchema,
    id: idSchema,
  })
  .strict();

export const MaterializeDueSchema = z
  .object({
    communityId: idSchema,
    templateId: idSchema,
  })
  .strict();

export const ListChargesSchema = z
  .object({
    communityId: idSchema,
    target: BillingTargetSchema.optional(),
  })
  .strict();

export const ListPaymentsSchema = z
  .object({
    communityId: idSchema,
    payerId: idSchema.optional(),
  })
  .strict();

export const ListTransactionsSchema = z
  .object({
    communityId: idSchema,
    chargeId: idSchema.optional(),
    paymentId: idSchema.optional(),
  })
  .strict();

export const TargetStatementSchema = z
  .object({
    communityId: idSchema,
    target: BillingTargetSchema,
  })
  .strict();

export type CreateChargeParams = z.input<typeof CreateChargeSchema>;
export type RecordPaymentParams = z.input<typeof RecordPaymentSchema>;
export type CreateRecurringChargeParams = z.input<typeof CreateRecurringChargeSchema>;
export type AllocateParams = z.input<typeof AllocateSchema>;
export type AllocateAcrossParams = z.input<typeof AllocateAcrossSchema>;
export type EntityRefParams = z.input<typeof EntityRefSchema>;
export type MaterializeDueParams = z.input<typeof MaterializeDueSchema>;
export type ListChargesParams = z.input<typeof ListChargesSchema>;
export type ListPaymentsParams = z.input<typeof ListPaymentsSchema>;
export type ListTransactionsParams = z.input<typeof ListTransactionsSchema>;
export type TargetStatementParams = z.input<typeof TargetStatementSchema>;

// Results

export type MaterializationResult =
  | { status: 'materialized'; charge: Charge; template: RecurringCharge }
  | { status: 'not_due'; template: RecurringCharge };

export interface TargetStatement {
  communityId: string;
  target: BillingTarget;
  charges: ChargeWithBalance[];
  totalCharged: number;
  totalOutstanding: number;
}

/** Current time source; injected so tests can pin charge and payment dates */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export function describeTarget(target: BillingTarget): string {
  switch (target.kind) {
    case 'residence':
      return `residence ${target.residenceId}`;
    case 'occupant':
      return `occupant ${target.occupantId}`;
  }
}

export function isSameTarget(left: BillingTarget, right: BillingTarget): boolean {
  if (left.kind === 'residence' && right.kind === 'residence') {
    return left.residenceId === right.residenceId;
  }
  if (left.kind === 'occupant' && right.kind === 'occupant') {
    return left.occupantId === right.occupantId;
  }
  return false;
}
