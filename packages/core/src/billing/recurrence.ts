import {
  addDays,
  addMonths,
  addWeeks,
  addYears,
  format,
  getDate,
  getDaysInMonth,
  isValid,
  parse,
  setDate,
  startOfMonth,
} from 'date-fns';
import type { BillingFrequency, CalendarDate } from './billing-types.js';

const CALENDAR_DATE_FORMAT = 'yyyy-MM-dd';

// Fixed reference so parsing never depends on the current date
const REFERENCE_DATE = new Date(2000, 0, 1);

export function isValidCalendarDate(value: string): boolean {
  const parsed = parse(value, CALENDAR_DATE_FORMAT, REFERENCE_DATE);
  return isValid(parsed) && format(parsed, CALENDAR_DATE_FORMAT) === value;
}

/**
 * Parse a `YYYY-MM-DD` date to local midnight. Calendar arithmetic runs on
 * local dates so DST shifts never move a date across a day boundary.
 */
export function parseCalendarDate(value: CalendarDate): Date {
  const parsed = parse(value, CALENDAR_DATE_FORMAT, REFERENCE_DATE);
  if (!isValid(parsed)) {
    throw new RangeError(`Invalid calendar date: ${value}`);
  }
  return parsed;
}

export function formatCalendarDate(date: Date): CalendarDate {
  return format(date, CALENDAR_DATE_FORMAT);
}

export function addDaysToCalendarDate(value: CalendarDate, days: number): CalendarDate {
  return formatCalendarDate(addDays(parseCalendarDate(value), days));
}

export function anchorDayOf(value: CalendarDate): number {
  return getDate(parseCalendarDate(value));
}

/** Day `anchorDay` of the month, or the month's last day when it is shorter */
function clampToAnchorDay(monthStart: Date, anchorDay: number): Date {
  return setDate(monthStart, Math.min(anchorDay, getDaysInMonth(monthStart)));
}

/**
 * Advance a charge date by one period of `frequency × skip`.
 *
 * Monthly and yearly schedules land on `anchorDay`, clamped to the end of
 * shorter months. The anchor is re-attempted every period, so a schedule
 * anchored on the 31st runs Jan 31 → Feb 28 → Mar 31 rather than staying on
 * the 28th after the first short month.
 */
export function advanceChargeDate(
  current: CalendarDate,
  frequency: BillingFrequency,
  skip: number,
  anchorDay: number
): CalendarDate {
  if (!Number.isInteger(skip) || skip < 1) {
    throw new RangeError(`Frequency skip must be a positive integer, got ${skip}`);
  }
  if (!Number.isInteger(anchorDay) || anchorDay < 1 || anchorDay > 31) {
    throw new RangeError(`Anchor day must be between 1 and 31, got ${anchorDay}`);
  }

  const date = parseCalendarDate(current);

  switch (frequency) {
    case 'DAILY':
      return formatCalendarDate(addDays(date, skip));
    case 'WEEKLY':
      return formatCalendarDate(addWeeks(date, skip));
    case 'MONTHLY':
      return formatCalendarDate(clampToAnchorDay(addMonths(startOfMonth(date), skip), anchorDay));
    case 'YEARLY':
      return formatCalendarDate(clampToAnchorDay(addYears(startOfMonth(date), skip), anchorDay));
    default: {
      const unreachable: never = frequency;
      throw new RangeError(`Unsupported billing frequency: ${String(unreachable)}`);
    }
  }
}
