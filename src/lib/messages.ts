// User-facing text for the dashboard and the JSON API
import type { Instrument, RangeValidation } from '../types/index.js';
import { MAX_DATE_RANGE_DAYS, getInstrumentInfo, isGold } from '../config/constants.js';

export function rangeMessage(instrument: Instrument, validation: RangeValidation): string {
  if (validation.ok) return `Date range: ${validation.days} days`;

  switch (validation.reason) {
    case 'invalid_date':
      return 'Dates must use the YYYY-MM-DD format';
    case 'start_after_end':
      return 'Start date must not be after end date';
    case 'before_min_date': {
      const info = getInstrumentInfo(instrument);
      return `${info.label} are available from ${info.minDate}`;
    }
    case 'after_today':
      return 'End date cannot be in the future';
    case 'range_too_long':
      return `Date range too large! Maximum ${MAX_DATE_RANGE_DAYS} days allowed. Current range: ${validation.days ?? '?'} days`;
  }
}

export function fetchingMessage(instrument: Instrument): string {
  return `Fetching ${isGold(instrument) ? 'gold prices' : `${instrument} exchange rates`}`;
}

export function failureMessage(instrument: Instrument): string {
  const what = isGold(instrument) ? 'gold prices' : `${instrument} exchange rates`;
  return `Failed to fetch ${what}. Please check your date range and try again.`;
}

export function successMessage(instrument: Instrument, count: number): string {
  return `Successfully fetched ${count} ${getInstrumentInfo(instrument).label.toLowerCase()} records!`;
}
