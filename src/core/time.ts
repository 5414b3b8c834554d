/**
 * Time utilities for consistent date handling
 */

import {
  endOfDay,
  endOfQuarter,
  format,
  isValid,
  parseISO,
  startOfDay,
  startOfQuarter,
  subQuarters,
} from 'date-fns';

export interface DateRange {
  from: Date;
  to: Date;
}

/** Parses an ISO-8601 date or timestamp; throws on anything else. */
export function parseDate(dateStr: string): Date {
  const parsed = parseISO(dateStr);
  if (!isValid(parsed)) {
    throw new Error(`Invalid date: ${dateStr}`);
  }
  return parsed;
}

/**
 * Canonical UTC form used for stored timestamps. Every stored value shares
 * this shape, so string order matches time order.
 */
export function toIsoTimestamp(value: Date | string): string {
  const date = typeof value === 'string' ? parseDate(value) : value;
  return date.toISOString();
}

/** Whole days from the start of `from` to the end of `to`. */
export function dayRange(from: string, to: string): DateRange {
  return { from: startOfDay(parseDate(from)), to: endOfDay(parseDate(to)) };
}

/** The calendar quarter `quartersBack` quarters before the one containing `date`. */
export function quarterRange(date: Date = new Date(), quartersBack: number = 0): DateRange {
  const anchor = subQuarters(date, quartersBack);
  return { from: startOfQuarter(anchor), to: endOfQuarter(anchor) };
}

export function quarterLabel(date: Date): string {
  return format(date, "yyyy-'Q'Q");
}
