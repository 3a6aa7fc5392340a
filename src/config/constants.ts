// Configuration constants
import type { Instrument, InstrumentInfo } from '../types/index.js';

export const NBP_API_BASE = (process.env.NBP_API_BASE || 'https://api.nbp.pl').replace(/\/+$/, '');

export const REQUEST_TIMEOUT_MS = parseInt(process.env.NBP_REQUEST_TIMEOUT_MS || '10000', 10);

export const PORT = parseInt(process.env.PORT || '8000', 10);
export const HOST = process.env.HOST || '0.0.0.0';
export const LOG_LEVEL = process.env.LOG_LEVEL || 'info';

// Range limits are enforced by callers of the fetch service, never by the service itself
export const MAX_DATE_RANGE_DAYS = 367;
export const MIN_DATE_CURRENCIES = '2002-01-02';
export const MIN_DATE_GOLD = '2013-01-02';

export const CURRENCIES = ['USD', 'EUR', 'CHF', 'GBP'] as const;
export const GOLD = 'GOLD';

export const INSTRUMENTS = [...CURRENCIES, GOLD] as const;

export function isInstrument(value: string): value is Instrument {
  return INSTRUMENTS.some((code) => code === value);
}

export function isGold(instrument: Instrument): instrument is typeof GOLD {
  return instrument === GOLD;
}

export function getInstrumentInfo(instrument: Instrument): InstrumentInfo {
  if (isGold(instrument)) {
    return {
      code: instrument,
      kind: 'gold_price',
      label: 'Gold Prices',
      valueLabel: 'Price (PLN)',
      minDate: MIN_DATE_GOLD
    };
  }
  return {
    code: instrument,
    kind: 'exchange_rate',
    label: `${instrument} Exchange Rates`,
    valueLabel: 'Rate (PLN)',
    minDate: MIN_DATE_CURRENCIES
  };
}
