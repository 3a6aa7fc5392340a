/**
 * Zod schemas for NBP Web API responses
 *
 * API Documentation: https://api.nbp.pl/
 */

import { z } from 'zod';

/**
 * Table A mid rate for one business day.
 * https://api.nbp.pl/api/exchangerates/rates/A/USD/2025-01-02/2025-01-10/
 */
export const NbpRateRecordSchema = z.object({
  effectiveDate: z.string().min(1),
  mid: z.number(),
});

export const NbpRatesResponseSchema = z.object({
  rates: z.array(z.unknown()),
});

/**
 * Gold price (PLN per gram) for one business day.
 * https://api.nbp.pl/api/cenyzlota/2025-01-02/2025-01-10/
 */
export const NbpGoldRecordSchema = z.object({
  data: z.string().min(1),
  cena: z.number(),
});

export const NbpGoldResponseSchema = z.array(z.unknown());
