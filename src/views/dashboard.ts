import type { FastifyBaseLogger } from 'fastify';
import type { FetchResult, Instrument, RangeValidation, RateSeries } from '../types/index.js';
import {
  INSTRUMENTS,
  MAX_DATE_RANGE_DAYS,
  MIN_DATE_CURRENCIES,
  MIN_DATE_GOLD,
  NBP_API_BASE,
  getInstrumentInfo,
  isGold
} from '../config/constants.js';
import { buildChartConfig } from '../lib/chart.js';
import { computeStatistics } from '../lib/statistics.js';
import { failureMessage, rangeMessage, successMessage } from '../lib/messages.js';

export interface DashboardState {
  instrument: Instrument;
  start: string;
  end: string;
  today: string;
  validation: RangeValidation;
  // Absent when no fetch was requested or the range was rejected
  result?: FetchResult;
}

export type DashboardLogger = Pick<FastifyBaseLogger, 'warn'>;

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;'
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

// JSON placed inside a <script> element must not be able to close it
function scriptJson(value: unknown): string {
  return JSON.stringify(value).replace(/</g, '\\u003c');
}

function pln(value: number): string {
  return `${Number(value.toFixed(4))} PLN`;
}

function renderInstrumentOptions(selected: Instrument): string {
  return INSTRUMENTS.map((code) => {
    const text = isGold(code) ? 'Gold' : code;
    return `<option value="${code}"${code === selected ? ' selected' : ''}>${text}</option>`;
  }).join('');
}

function renderTable(series: RateSeries, instrument: Instrument): string {
  const info = getInstrumentInfo(instrument);
  const rows = series
    .map((p) => `<tr><td>${escapeHtml(p.date)}</td><td>${p.value.toFixed(4)}</td></tr>`)
    .join('');
  return `
    <h2>📋 ${escapeHtml(info.label)}</h2>
    <table class="rates">
      <thead><tr><th>Date</th><th>${escapeHtml(info.valueLabel)}</th></tr></thead>
      <tbody>${rows}</tbody>
    </table>`;
}

function renderStatistics(series: RateSeries): string {
  const stats = computeStatistics(series);
  return `
    <div class="metrics">
      <div class="metric"><span>Records</span><strong>${stats.count}</strong></div>
      <div class="metric"><span>Min Value</span><strong>${pln(stats.min)}</strong></div>
      <div class="metric"><span>Max Value</span><strong>${pln(stats.max)}</strong></div>
      <div class="metric"><span>Avg Value</span><strong>${stats.mean.toFixed(4)} PLN</strong></div>
    </div>`;
}

function renderChart(series: RateSeries, instrument: Instrument, logger?: DashboardLogger): string {
  const config = buildChartConfig(series, getInstrumentInfo(instrument).kind, instrument);
  if (!config) {
    logger?.warn(`No data to plot for ${instrument}`);
    return '<p class="warning">No data to plot</p>';
  }
  return `
    <h2>📊 Chart</h2>
    <div class="chart"><canvas id="rates-chart"></canvas></div>
    <script id="chart-config" type="application/json">${scriptJson(config)}</script>
    <script src="https://cdn.jsdelivr.net/npm/chart.js@4"></script>
    <script>
      new Chart(document.getElementById('rates-chart'),
        JSON.parse(document.getElementById('chart-config').textContent));
    </script>`;
}

function renderResult(state: DashboardState, logger?: DashboardLogger): string {
  const { result, instrument } = state;
  if (!result) return '';
  if (!result.ok) {
    return `<p class="error">${escapeHtml(failureMessage(instrument))}</p>`;
  }
  return [
    renderTable(result.series, instrument),
    renderStatistics(result.series),
    renderChart(result.series, instrument, logger),
    `<p class="success">${escapeHtml(successMessage(instrument, result.series.length))}</p>`
  ].join('\n');
}

export function renderDashboardPage(state: DashboardState, logger?: DashboardLogger): string {
  const gold = isGold(state.instrument);
  const minDate = getInstrumentInfo(state.instrument).minDate;
  const rangeClass = state.validation.ok ? 'success' : 'error';
  const rangeIcon = state.validation.ok ? '✅' : '❌';
  // Instrument changes refetch only while the dates still match the last fetch
  const autoFetch = state.result
    ? `<input type="hidden" name="auto" value="1" />
      <input type="hidden" name="fetchedStart" value="${escapeHtml(state.start)}" />
      <input type="hidden" name="fetchedEnd" value="${escapeHtml(state.end)}" />`
    : '';

  return `<!DOCTYPE html>
<html>
<head>
  <title>NBP Exchange Rates</title>
  <meta charset="utf-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1" />
  <style>
    body { font-family: system-ui, sans-serif; margin: 0; display: flex; min-height: 100vh; }
    aside { width: 300px; padding: 1.5rem; background: #f3f5f8; }
    main { flex: 1; padding: 1.5rem 2rem; }
    .metrics { display: flex; gap: 1rem; margin: 1rem 0; }
    .metric { flex: 1; padding: 0.75rem; border: 1px solid #dde3ea; border-radius: 6px; }
    .metric span { display: block; color: #5a6472; font-size: 0.85rem; }
    .chart { position: relative; height: 420px; }
    table.rates { border-collapse: collapse; min-width: 320px; }
    table.rates td, table.rates th { padding: 0.25rem 0.75rem; border-bottom: 1px solid #e4e8ee; text-align: left; }
    .success { color: #1e7b34; }
    .error { color: #b3261e; }
    .warning { color: #8a6d00; }
  </style>
</head>
<body>
  <aside>
    <h2>Settings</h2>
    <form method="get" action="/">
      <label>Select Currency/Asset
        <select name="instrument" onchange="this.form.submit()">${renderInstrumentOptions(state.instrument)}</select>
      </label>
      <h3>Date Range</h3>
      <label>Start Date <input type="date" name="start" value="${escapeHtml(state.start)}" min="${minDate}" max="${state.today}" /></label>
      <label>End Date <input type="date" name="end" value="${escapeHtml(state.end)}" min="${minDate}" max="${state.today}" /></label>
      <p class="${rangeClass}">${rangeIcon} ${escapeHtml(rangeMessage(state.instrument, state.validation))}</p>
      ${autoFetch}
      <button type="submit" name="fetch" value="1">📊 Fetch Data</button>
    </form>
    <hr />
    <h3>Instructions</h3>
    <ol>
      <li>Select a currency (USD, EUR, CHF, GBP) or Gold</li>
      <li>Choose your date range (max ${MAX_DATE_RANGE_DAYS} days)</li>
      <li>Click "Fetch Data"</li>
      <li>View the data table and chart</li>
    </ol>
    <h3>API Limits</h3>
    <ul>
      <li>Maximum date range: <strong>${MAX_DATE_RANGE_DAYS} days</strong></li>
      <li>Currency data from <strong>${MIN_DATE_CURRENCIES}</strong></li>
      <li>Gold data from <strong>${MIN_DATE_GOLD}</strong></li>
      <li>Weekends and holidays excluded</li>
    </ul>
  </aside>
  <main>
    <h1>💰 NBP ${gold ? 'Gold Prices' : 'Exchange Rates'} Dashboard</h1>
    <p>Fetch and visualize ${gold ? 'gold prices' : 'exchange rates'} from the Polish National Bank (NBP) API</p>
    ${renderResult(state, logger)}
    <hr />
    <footer>Data source: <a href="${NBP_API_BASE}">NBP API</a></footer>
  </main>
</body>
</html>`;
}
