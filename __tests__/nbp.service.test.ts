import { describe, it, expect, vi } from 'vitest';
import pino from 'pino';
import NBPService from '../src/services/nbp.service.js';

const logger = pino({ level: 'silent' });
const BASE = 'https://api.nbp.pl';

function respondWith(body: unknown, status = 200) {
    const text = typeof body === 'string' ? body : JSON.stringify(body);
    return vi.fn<typeof fetch>(async () => new Response(text, { status }));
}

function serviceWith(fetchImpl: typeof fetch, timeoutMs = 10_000) {
    return new NBPService(logger, { baseUrl: BASE, timeoutMs, fetchImpl });
}

describe('NBPService.buildRequestUrl', () => {
    const service = serviceWith(respondWith([]));

    it('uses the table A rates endpoint for currencies', () => {
        expect(service.buildRequestUrl('EUR', '2025-01-01', '2025-01-31'))
            .toBe('https://api.nbp.pl/api/exchangerates/rates/A/EUR/2025-01-01/2025-01-31/');
    });

    it('uses the gold prices endpoint for gold', () => {
        expect(service.buildRequestUrl('GOLD', '2025-01-01', '2025-01-31'))
            .toBe('https://api.nbp.pl/api/cenyzlota/2025-01-01/2025-01-31/');
    });

    it('drops a trailing slash from the configured base', () => {
        const s = new NBPService(logger, { baseUrl: 'https://nbp.test/', fetchImpl: respondWith([]) });
        expect(s.buildRequestUrl('GBP', '2025-02-03', '2025-02-04'))
            .toBe('https://nbp.test/api/exchangerates/rates/A/GBP/2025-02-03/2025-02-04/');
    });
});

describe('NBPService.fetchSeries', () => {
    it('orders currency rates by date regardless of response order', async () => {
        const fetchImpl = respondWith({
            rates: [
                { effectiveDate: '2025-01-02', mid: 4.05 },
                { effectiveDate: '2025-01-01', mid: 4.0 },
            ],
        });
        const result = await serviceWith(fetchImpl).fetchSeries('USD', '2025-01-01', '2025-01-02');

        expect(result).toEqual({
            ok: true,
            series: [
                { date: '2025-01-01', value: 4.0 },
                { date: '2025-01-02', value: 4.05 },
            ],
            url: 'https://api.nbp.pl/api/exchangerates/rates/A/USD/2025-01-01/2025-01-02/',
        });
        expect(fetchImpl).toHaveBeenCalledTimes(1);
    });

    it('sends one GET with a JSON accept header and an abort signal', async () => {
        const fetchImpl = respondWith({ rates: [{ effectiveDate: '2025-01-02', mid: 4.1 }] });
        await serviceWith(fetchImpl).fetchSeries('CHF', '2025-01-02', '2025-01-02');

        const [input, init] = fetchImpl.mock.calls[0];
        expect(input).toBe('https://api.nbp.pl/api/exchangerates/rates/A/CHF/2025-01-02/2025-01-02/');
        expect(init?.headers).toEqual({ Accept: 'application/json' });
        expect(init?.signal).toBeInstanceOf(AbortSignal);
    });

    it('reads gold prices from a top-level array', async () => {
        const fetchImpl = respondWith([
            { data: '2025-01-03', cena: 352.1 },
            { data: '2025-01-02', cena: 350.5 },
        ]);
        const result = await serviceWith(fetchImpl).fetchSeries('GOLD', '2025-01-02', '2025-01-03');

        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(result.series).toEqual([
            { date: '2025-01-02', value: 350.5 },
            { date: '2025-01-03', value: 352.1 },
        ]);
        expect(result.url).toBe('https://api.nbp.pl/api/cenyzlota/2025-01-02/2025-01-03/');
    });

    it('keeps the later record when a date repeats', async () => {
        const fetchImpl = respondWith({
            rates: [
                { effectiveDate: '2025-01-02', mid: 4.05 },
                { effectiveDate: '2025-01-03', mid: 4.07 },
                { effectiveDate: '2025-01-02', mid: 4.06 },
            ],
        });
        const result = await serviceWith(fetchImpl).fetchSeries('USD', '2025-01-02', '2025-01-03');

        expect(result.ok && result.series).toEqual([
            { date: '2025-01-02', value: 4.06 },
            { date: '2025-01-03', value: 4.07 },
        ]);
    });

    it('returns strictly ascending dates for a shuffled payload', async () => {
        const dates = ['2025-03-05', '2025-01-10', '2025-02-28', '2025-01-09', '2025-03-04'];
        const fetchImpl = respondWith({ rates: dates.map((d, i) => ({ effectiveDate: d, mid: 4 + i / 100 })) });
        const result = await serviceWith(fetchImpl).fetchSeries('EUR', '2025-01-01', '2025-03-31');

        expect(result.ok).toBe(true);
        if (!result.ok) return;
        const got = result.series.map(p => p.date);
        expect(got).toEqual(['2025-01-09', '2025-01-10', '2025-02-28', '2025-03-04', '2025-03-05']);
    });

    it('reports empty_result when the rates key is absent', async () => {
        const result = await serviceWith(respondWith({ table: 'A', code: 'USD' })).fetchSeries('USD', '2025-01-01', '2025-01-02');
        expect(result).toMatchObject({ ok: false, kind: 'empty_result' });
    });

    it('reports empty_result for an empty rates array', async () => {
        const result = await serviceWith(respondWith({ rates: [] })).fetchSeries('USD', '2025-01-01', '2025-01-02');
        expect(result).toMatchObject({ ok: false, kind: 'empty_result' });
    });

    it('reports empty_result for an empty gold array', async () => {
        const result = await serviceWith(respondWith([])).fetchSeries('GOLD', '2025-01-01', '2025-01-02');
        expect(result).toMatchObject({ ok: false, kind: 'empty_result' });
    });

    it('reports missing_field when a rate lacks mid', async () => {
        const fetchImpl = respondWith({
            rates: [
                { effectiveDate: '2025-01-02', mid: 4.05 },
                { effectiveDate: '2025-01-03' },
            ],
        });
        const result = await serviceWith(fetchImpl).fetchSeries('USD', '2025-01-02', '2025-01-03');
        expect(result).toEqual({
            ok: false,
            kind: 'missing_field',
            detail: 'Rate #1 lacks effectiveDate/mid',
            url: 'https://api.nbp.pl/api/exchangerates/rates/A/USD/2025-01-02/2025-01-03/',
        });
    });

    it('reports missing_field when a gold price lacks data', async () => {
        const result = await serviceWith(respondWith([{ cena: 350.5 }])).fetchSeries('GOLD', '2025-01-02', '2025-01-02');
        expect(result).toMatchObject({ ok: false, kind: 'missing_field', detail: 'Gold price #0 lacks data/cena' });
    });

    it('reports missing_field when a rate lacks effectiveDate', async () => {
        const result = await serviceWith(respondWith({ rates: [{ mid: 4.05 }] })).fetchSeries('USD', '2025-01-02', '2025-01-02');
        expect(result).toMatchObject({ ok: false, kind: 'missing_field', detail: 'Rate #0 lacks effectiveDate/mid' });
    });

    it('reports missing_field when a gold price lacks cena', async () => {
        const fetchImpl = respondWith([
            { data: '2025-01-02', cena: 350.5 },
            { data: '2025-01-03' },
        ]);
        const result = await serviceWith(fetchImpl).fetchSeries('GOLD', '2025-01-02', '2025-01-03');
        expect(result).toMatchObject({ ok: false, kind: 'missing_field', detail: 'Gold price #1 lacks data/cena' });
    });

    it('reports missing_field when mid is not a number', async () => {
        const result = await serviceWith(respondWith({ rates: [{ effectiveDate: '2025-01-02', mid: '4.05' }] }))
            .fetchSeries('USD', '2025-01-02', '2025-01-02');
        expect(result).toMatchObject({ ok: false, kind: 'missing_field', detail: 'Rate #0 lacks effectiveDate/mid' });
    });

    it('reports parse_error for a body that is not JSON', async () => {
        const result = await serviceWith(respondWith('<html>maintenance</html>')).fetchSeries('USD', '2025-01-01', '2025-01-02');
        expect(result).toMatchObject({ ok: false, kind: 'parse_error' });
    });

    it('reports network_error for a non-2xx status', async () => {
        const result = await serviceWith(respondWith('404 NotFound - Not Found - Brak danych', 404))
            .fetchSeries('USD', '2025-01-04', '2025-01-05');
        expect(result).toMatchObject({ ok: false, kind: 'network_error', detail: 'NBP API error: 404' });
    });

    it('reports network_error when the connection fails', async () => {
        const fetchImpl = vi.fn<typeof fetch>(async () => {
            throw new TypeError('fetch failed');
        });
        const result = await serviceWith(fetchImpl).fetchSeries('USD', '2025-01-01', '2025-01-02');
        expect(result).toMatchObject({ ok: false, kind: 'network_error', detail: 'TypeError: fetch failed' });
    });

    it('reports network_error once the timeout fires, without data', async () => {
        const hanging = vi.fn<typeof fetch>((_input, init) => new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => reject(init?.signal?.reason));
        }));
        const result = await serviceWith(hanging, 20).fetchSeries('USD', '2025-01-01', '2025-01-02');

        expect(result.ok).toBe(false);
        expect(result).toMatchObject({ kind: 'network_error' });
        expect('series' in result).toBe(false);
    });

    it('forwards reversed dates untouched', async () => {
        const fetchImpl = respondWith('400 BadRequest - Błędny zakres dat', 400);
        const result = await serviceWith(fetchImpl).fetchSeries('USD', '2025-02-01', '2025-01-01');

        expect(fetchImpl.mock.calls[0][0]).toBe('https://api.nbp.pl/api/exchangerates/rates/A/USD/2025-02-01/2025-01-01/');
        expect(result).toMatchObject({ ok: false, kind: 'network_error' });
    });

    it('returns identical series for identical requests', async () => {
        const fetchImpl = respondWith({
            rates: [
                { effectiveDate: '2025-01-03', mid: 4.1 },
                { effectiveDate: '2025-01-02', mid: 4.0 },
            ],
        });
        const service = serviceWith(fetchImpl);
        const first = await service.fetchSeries('GBP', '2025-01-02', '2025-01-03');
        const second = await service.fetchSeries('GBP', '2025-01-02', '2025-01-03');

        expect(second).toEqual(first);
        expect(fetchImpl).toHaveBeenCalledTimes(2);
    });
});
