import type { FastifyBaseLogger } from 'fastify';
import type { FetchFailureKind, FetchResult, Instrument, RatePoint, RateSeries } from '../types/index.js';
import { NBP_API_BASE, REQUEST_TIMEOUT_MS, isGold } from '../config/constants.js';
import {
  NbpGoldRecordSchema,
  NbpGoldResponseSchema,
  NbpRateRecordSchema,
  NbpRatesResponseSchema
} from './nbp.schemas.js';

export interface NBPServiceOptions {
  baseUrl?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

type Extraction =
  | { ok: true; records: RatePoint[] }
  | { ok: false; kind: FetchFailureKind; detail: string };

function describeError(err: unknown): string {
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return String(err);
}

export function extractExchangeRates(payload: unknown): Extraction {
  const envelope = NbpRatesResponseSchema.safeParse(payload);
  if (!envelope.success || envelope.data.rates.length === 0) {
    return { ok: false, kind: 'empty_result', detail: 'No rates in NBP response' };
  }

  const records: RatePoint[] = [];
  for (const [index, raw] of envelope.data.rates.entries()) {
    const rate = NbpRateRecordSchema.safeParse(raw);
    if (!rate.success) {
      return { ok: false, kind: 'missing_field', detail: `Rate #${index} lacks effectiveDate/mid` };
    }
    records.push({ date: rate.data.effectiveDate, value: rate.data.mid });
  }
  return { ok: true, records };
}

export function extractGoldPrices(payload: unknown): Extraction {
  const list = NbpGoldResponseSchema.safeParse(payload);
  if (!list.success || list.data.length === 0) {
    return { ok: false, kind: 'empty_result', detail: 'No gold prices in NBP response' };
  }

  const records: RatePoint[] = [];
  for (const [index, raw] of list.data.entries()) {
    const price = NbpGoldRecordSchema.safeParse(raw);
    if (!price.success) {
      return { ok: false, kind: 'missing_field', detail: `Gold price #${index} lacks data/cena` };
    }
    records.push({ date: price.data.data, value: price.data.cena });
  }
  return { ok: true, records };
}

// Later records overwrite earlier ones on the same date
export function toSortedSeries(records: RatePoint[]): RateSeries {
  const byDate = new Map<string, number>();
  for (const { date, value } of records) {
    byDate.set(date, value);
  }
  return [...byDate.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([date, value]) => ({ date, value }));
}

class NBPService {
  private logger: FastifyBaseLogger;
  private baseUrl: string;
  private timeoutMs: number;
  private fetchImpl: typeof fetch;

  constructor(logger: FastifyBaseLogger, options: NBPServiceOptions = {}) {
    this.logger = logger;
    this.baseUrl = (options.baseUrl ?? NBP_API_BASE).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  buildRequestUrl(instrument: Instrument, start: string, end: string): string {
    if (isGold(instrument)) {
      return `${this.baseUrl}/api/cenyzlota/${start}/${end}/`;
    }
    return `${this.baseUrl}/api/exchangerates/rates/A/${instrument}/${start}/${end}/`;
  }

  /**
   * Fetches one instrument over [start, end] with a single GET.
   * Never throws: every failure comes back as a `FetchFailure`.
   * Dates are forwarded as given; range checks belong to the caller.
   */
  async fetchSeries(instrument: Instrument, start: string, end: string): Promise<FetchResult> {
    const url = this.buildRequestUrl(instrument, start, end);
    this.logger.info(`Fetching from NBP: ${url}`);

    let rawText: string;
    try {
      const response = await this.fetchImpl(url, {
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(this.timeoutMs)
      });

      if (!response.ok) {
        const errorText = await response.text();
        this.logger.error(`NBP API error ${response.status}: ${errorText}`);
        return this.fail(url, 'network_error', `NBP API error: ${response.status}`);
      }

      rawText = await response.text();
    } catch (err) {
      return this.fail(url, 'network_error', describeError(err));
    }

    let payload: unknown;
    try {
      payload = JSON.parse(rawText);
    } catch (err) {
      return this.fail(url, 'parse_error', describeError(err));
    }

    const extracted = isGold(instrument) ? extractGoldPrices(payload) : extractExchangeRates(payload);
    if (!extracted.ok) {
      return this.fail(url, extracted.kind, extracted.detail);
    }

    const series = toSortedSeries(extracted.records);
    this.logger.info(`Received ${series.length} records from NBP`);
    return { ok: true, series, url };
  }

  private fail(url: string, kind: FetchFailureKind, detail: string): FetchResult {
    this.logger.warn({ url, kind }, `NBP fetch failed: ${detail}`);
    return { ok: false, kind, detail, url };
  }
}

export default NBPService;
