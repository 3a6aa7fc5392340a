import { CURRENCIES, INSTRUMENTS, MAX_DATE_RANGE_DAYS, MIN_DATE_CURRENCIES, MIN_DATE_GOLD } from './constants.js';

const errorSchema = {
  type: 'object',
  properties: {
    status: { type: 'string', example: 'error' },
    message: { type: 'string', example: 'Failed to fetch USD exchange rates. Please check your date range and try again.' }
  }
};

export const openApiSpec = {
  openapi: '3.1.0',
  info: {
    title: 'NBP Rates API',
    version: '1.0.0',
    description: `Exchange rates (table A mid rates, in PLN) and gold prices from the Polish National Bank (NBP).

**NBP documentation:**
- [NBP Web API](https://api.nbp.pl/en.html)

**Limits:**
- Maximum date range: ${MAX_DATE_RANGE_DAYS} days
- Currency data from ${MIN_DATE_CURRENCIES}, gold data from ${MIN_DATE_GOLD}
- No caching: every call reaches NBP once
- Format: JSON`,
    contact: {
      name: 'API Support'
    }
  },
  servers: [
    {
      url: 'http://localhost:8000',
      description: 'Development server'
    }
  ],
  paths: {
    '/api/health': {
      get: {
        summary: 'Health check',
        tags: ['System'],
        responses: {
          '200': {
            description: 'API is healthy',
            content: {
              'application/json': {
                schema: {
                  type: 'object',
                  properties: {
                    status: { type: 'string', example: 'ok' },
                    timestamp: { type: 'string', format: 'date-time' }
                  }
                }
              }
            }
          }
        }
      }
    },
    '/api/instruments': {
      get: {
        summary: 'List supported instruments',
        description: `Currencies (${CURRENCIES.join(', ')}) and gold, with the earliest date NBP publishes for each.`,
        tags: ['Rates'],
        responses: {
          '200': {
            description: 'Supported instruments',
            content: {
              'application/json': {
                schema: {
                  type: 'object',
                  properties: {
                    status: { type: 'string', example: 'success' },
                    maxRangeDays: { type: 'number', example: MAX_DATE_RANGE_DAYS },
                    instruments: {
                      type: 'array',
                      items: {
                        type: 'object',
                        properties: {
                          code: { type: 'string', example: 'USD' },
                          kind: { type: 'string', enum: ['exchange_rate', 'gold_price'] },
                          label: { type: 'string', example: 'USD Exchange Rates' },
                          valueLabel: { type: 'string', example: 'Rate (PLN)' },
                          minDate: { type: 'string', format: 'date', example: MIN_DATE_CURRENCIES }
                        }
                      }
                    }
                  }
                }
              }
            }
          }
        }
      }
    },
    '/api/rates': {
      get: {
        summary: 'Get a rate series',
        description: `Fetches one instrument over a date range, ordered by date.

**URL to copy/paste:**
\`\`\`
http://localhost:8000/api/rates?instrument=USD&start=2025-01-01&end=2025-03-31
\`\`\``,
        tags: ['Rates'],
        'x-codeSamples': [
          {
            lang: 'Shell',
            source: "curl 'http://localhost:8000/api/rates?instrument=USD&start=2025-01-01&end=2025-03-31'"
          },
          {
            lang: 'Shell',
            label: 'Gold',
            source: "curl 'http://localhost:8000/api/rates?instrument=GOLD&start=2025-01-01&end=2025-03-31'"
          }
        ],
        parameters: [
          {
            name: 'instrument',
            in: 'query',
            required: true,
            schema: { type: 'string', enum: [...INSTRUMENTS] },
            example: 'USD'
          },
          {
            name: 'start',
            in: 'query',
            required: true,
            schema: { type: 'string', format: 'date' },
            example: '2025-01-01'
          },
          {
            name: 'end',
            in: 'query',
            required: true,
            schema: { type: 'string', format: 'date' },
            example: '2025-03-31'
          }
        ],
        responses: {
          '200': {
            description: 'Series fetched',
            content: {
              'application/json': {
                schema: {
                  type: 'object',
                  properties: {
                    status: { type: 'string', example: 'success' },
                    instrument: { type: 'string', example: 'USD' },
                    start: { type: 'string', format: 'date' },
                    end: { type: 'string', format: 'date' },
                    count: { type: 'number', example: 2 },
                    statistics: {
                      type: 'object',
                      properties: {
                        count: { type: 'number' },
                        min: { type: 'number' },
                        max: { type: 'number' },
                        mean: { type: 'number' }
                      }
                    },
                    data: {
                      type: 'array',
                      items: {
                        type: 'object',
                        properties: {
                          date: { type: 'string', format: 'date', example: '2025-01-02' },
                          value: { type: 'number', example: 4.1219 }
                        }
                      }
                    },
                    nbpRequestUrl: { type: 'string' },
                    queriedAt: { type: 'string', format: 'date-time' }
                  }
                }
              }
            }
          },
          '400': {
            description: 'Invalid parameters or date range',
            content: {
              'application/json': {
                schema: {
                  ...errorSchema,
                  properties: {
                    ...errorSchema.properties,
                    reason: {
                      type: 'string',
                      enum: ['invalid_request', 'invalid_date', 'start_after_end', 'before_min_date', 'after_today', 'range_too_long']
                    }
                  }
                }
              }
            }
          },
          '502': {
            description: 'NBP call failed or returned no usable data',
            content: {
              'application/json': {
                schema: {
                  ...errorSchema,
                  properties: {
                    ...errorSchema.properties,
                    kind: { type: 'string', enum: ['network_error', 'parse_error', 'missing_field', 'empty_result'] },
                    nbpRequestUrl: { type: 'string' }
                  }
                }
              }
            }
          }
        }
      }
    }
  },
  tags: [
    { name: 'System', description: 'Service status' },
    { name: 'Rates', description: 'NBP exchange rates and gold prices' }
  ]
};
