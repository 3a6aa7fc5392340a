import { FastifyInstance } from 'fastify';
import type { DashboardQuerystring, FetchResult, RatesQuerystring } from '../types/index.js';
import { openApiSpec } from '../config/openapi.js';
import {
  CURRENCIES,
  INSTRUMENTS,
  MAX_DATE_RANGE_DAYS,
  getInstrumentInfo,
  isInstrument
} from '../config/constants.js';
import { defaultRange, formatDate, validateRange } from '../lib/dates.js';
import { computeStatistics } from '../lib/statistics.js';
import { failureMessage, fetchingMessage, rangeMessage } from '../lib/messages.js';
import { renderDashboardPage } from '../views/dashboard.js';
import NBPService from '../services/nbp.service.js';

const ISO_DATE_PATTERN = '^\\d{4}-\\d{2}-\\d{2}$';

const ratesQuerySchema = {
  type: 'object',
  required: ['instrument', 'start', 'end'],
  properties: {
    instrument: { type: 'string', enum: [...INSTRUMENTS] },
    start: { type: 'string', pattern: ISO_DATE_PATTERN },
    end: { type: 'string', pattern: ISO_DATE_PATTERN }
  }
};

const dashboardQuerySchema = {
  type: 'object',
  properties: {
    instrument: { type: 'string' },
    start: { type: 'string' },
    end: { type: 'string' },
    fetch: { type: 'string' },
    auto: { type: 'string' },
    fetchedStart: { type: 'string' },
    fetchedEnd: { type: 'string' }
  }
};

export function setupRoutes(
  fastify: FastifyInstance,
  nbpService: NBPService,
  now: () => Date = () => new Date()
) {
  // Schema failures answer in the same envelope as the other errors
  fastify.setErrorHandler((error, request, reply) => {
    if (error.validation) {
      return reply.code(400).send({ status: 'error', reason: 'invalid_request', message: error.message });
    }
    request.log.error({ err: error }, 'Unhandled error');
    return reply.code(error.statusCode ?? 500).send({ status: 'error', message: 'Internal server error' });
  });

  // API info endpoint
  fastify.get('/api', async () => ({
    service: 'NBP Rates API',
    version: '1.0.0',
    endpoints: {
      health: 'GET /api/health',
      instruments: 'GET /api/instruments',
      rates: 'GET /api/rates?instrument=USD&start=2025-01-01&end=2025-03-31',
      dashboard: 'GET /',
      docs: 'GET /api/docs'
    }
  }));

  // Scalar API Documentation - Accessible at /api/docs
  fastify.get('/api/docs', async (request, reply) => {
    reply.type('text/html');
    return `
<!DOCTYPE html>
<html>
<head>
  <title>NBP Rates API Documentation</title>
  <meta charset="utf-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1" />
</head>
<body>
  <script
    id="api-reference"
    type="application/json"
    data-configuration='${JSON.stringify({
      spec: {
        url: '/api/openapi.json'
      },
      defaultHttpClient: {
        targetKey: 'shell',
        clientKey: 'curl'
      }
    })}'></script>
  <script src="https://cdn.jsdelivr.net/npm/@scalar/api-reference"></script>
</body>
</html>
    `;
  });

  // OpenAPI JSON endpoint
  fastify.get('/api/openapi.json', async () => openApiSpec);

  fastify.get('/api/health', async () => ({
    status: 'ok',
    timestamp: now().toISOString()
  }));

  fastify.get('/api/instruments', async () => ({
    status: 'success',
    maxRangeDays: MAX_DATE_RANGE_DAYS,
    instruments: INSTRUMENTS.map(getInstrumentInfo),
    source: 'Narodowy Bank Polski (NBP)'
  }));

  // Rate series endpoint
  fastify.get<{ Querystring: RatesQuerystring }>(
    '/api/rates',
    { schema: { querystring: ratesQuerySchema } },
    async (request, reply) => {
      const { instrument, start, end } = request.query;

      // The fetch service forwards any dates, so the range is checked here
      const validation = validateRange(instrument, start, end, now());
      if (!validation.ok) {
        return reply.code(400).send({
          status: 'error',
          reason: validation.reason,
          message: rangeMessage(instrument, validation)
        });
      }

      fastify.log.info(`${fetchingMessage(instrument)} from ${start} to ${end}`);
      const result = await nbpService.fetchSeries(instrument, start, end);

      if (!result.ok) {
        fastify.log.error({ kind: result.kind, detail: result.detail }, 'Error in /api/rates');
        return reply.code(502).send({
          status: 'error',
          kind: result.kind,
          message: failureMessage(instrument),
          nbpRequestUrl: result.url
        });
      }

      return {
        status: 'success',
        instrument,
        start,
        end,
        count: result.series.length,
        statistics: computeStatistics(result.series),
        data: result.series,
        source: 'Narodowy Bank Polski (NBP)',
        nbpRequestUrl: result.url,
        queriedAt: now().toISOString()
      };
    }
  );

  // Dashboard page; the querystring carries all of its state
  fastify.get<{ Querystring: DashboardQuerystring }>(
    '/',
    { schema: { querystring: dashboardQuerySchema } },
    async (request, reply) => {
      const today = now();
      const defaults = defaultRange(today);
      const query = request.query;

      const instrument = query.instrument && isInstrument(query.instrument) ? query.instrument : CURRENCIES[0];
      const start = query.start || defaults.start;
      const end = query.end || defaults.end;
      const validation = validateRange(instrument, start, end, today);

      const autoFetch = query.auto === '1' && query.fetchedStart === start && query.fetchedEnd === end;

      let result: FetchResult | undefined;
      if ((query.fetch === '1' || autoFetch) && validation.ok) {
        fastify.log.info(`${fetchingMessage(instrument)} from ${start} to ${end}`);
        result = await nbpService.fetchSeries(instrument, start, end);
        if (!result.ok) {
          fastify.log.error({ kind: result.kind, detail: result.detail }, 'Error in dashboard fetch');
        }
      }

      reply.type('text/html');
      return renderDashboardPage(
        { instrument, start, end, today: formatDate(today), validation, result },
        fastify.log
      );
    }
  );

  // 404 handler
  fastify.setNotFoundHandler((request, reply) => {
    return reply.code(404).send({ status: 'error', message: 'Not found' });
  });
}
