// Type definitions
import type { CURRENCIES, GOLD } from '../config/constants.js';

export type Currency = (typeof CURRENCIES)[number];
export type Instrument = Currency | typeof GOLD;

export type SeriesKind = 'exchange_rate' | 'gold_price';

export interface RatePoint {
  date: string;
  value: number;
}

// Ascending by date, one point per date
export type RateSeries = RatePoint[];

export type FetchFailureKind = 'network_error' | 'parse_error' | 'missing_field' | 'empty_result';

export interface FetchSuccess {
  ok: true;
  series: RateSeries;
  url: string;
}

export interface FetchFailure {
  ok: false;
  kind: FetchFailureKind;
  detail: string;
  url: string;
}

export type FetchResult = FetchSuccess | FetchFailure;

export interface Statistics {
  count: number;
  min: number;
  max: number;
  mean: number;
}

export type RangeRejection =
  | 'invalid_date'
  | 'start_after_end'
  | 'before_min_date'
  | 'after_today'
  | 'range_too_long';

export type RangeValidation =
  | { ok: true; days: number }
  | { ok: false; reason: RangeRejection; days?: number };

export interface InstrumentInfo {
  code: Instrument;
  kind: SeriesKind;
  label: string;
  valueLabel: string;
  minDate: string;
}

export interface RatesQuerystring {
  instrument: Instrument;
  start: string;
  end: string;
}

export interface DashboardQuerystring {
  instrument?: string;
  start?: string;
  end?: string;
  fetch?: string;
  // Dates of the last fetch; auto-refetch only applies while they are unchanged
  auto?: string;
  fetchedStart?: string;
  fetchedEnd?: string;
}
