/**
 * Date helpers for the range checks done before calling the NBP service
 */

import { differenceInCalendarDays, format, isValid, parse, subYears } from 'date-fns';
import type { Instrument, RangeValidation } from '../types/index.js';
import { MAX_DATE_RANGE_DAYS, getInstrumentInfo } from '../config/constants.js';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export function formatDate(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

// Strict YYYY-MM-DD; rejects impossible dates such as 2025-02-30
export function parseIsoDate(value: string): Date | null {
  if (!ISO_DATE.test(value)) return null;
  const date = parse(value, 'yyyy-MM-dd', new Date(0));
  return isValid(date) ? date : null;
}

export function rangeLengthDays(start: Date, end: Date): number {
  return differenceInCalendarDays(end, start);
}

export function minDateFor(instrument: Instrument): string {
  return getInstrumentInfo(instrument).minDate;
}

export function defaultRange(today: Date = new Date()): { start: string; end: string } {
  return { start: formatDate(subYears(today, 1)), end: formatDate(today) };
}

export function validateRange(
  instrument: Instrument,
  start: string,
  end: string,
  today: Date = new Date()
): RangeValidation {
  const startDate = parseIsoDate(start);
  const endDate = parseIsoDate(end);
  if (!startDate || !endDate) return { ok: false, reason: 'invalid_date' };

  const days = rangeLengthDays(startDate, endDate);
  if (days < 0) return { ok: false, reason: 'start_after_end', days };
  // ISO strings compare chronologically
  if (start < minDateFor(instrument)) return { ok: false, reason: 'before_min_date', days };
  if (end > formatDate(today)) return { ok: false, reason: 'after_today', days };
  if (days > MAX_DATE_RANGE_DAYS) return { ok: false, reason: 'range_too_long', days };

  return { ok: true, days };
}
