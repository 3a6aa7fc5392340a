import { format } from 'date-fns';
import type { RateSeries, SeriesKind } from '../types/index.js';
import { computeStatistics } from './statistics.js';
import { parseIsoDate } from './dates.js';

// Subset of Chart.js' ChartConfiguration<'line'> that the dashboard page feeds to `new Chart()`
export interface LineChartConfig {
  type: 'line';
  data: {
    labels: string[];
    datasets: Array<{
      label: string;
      data: number[];
      borderColor: string;
      backgroundColor: string;
      borderWidth: number;
      pointRadius: number;
      pointHoverRadius: number;
      tension: number;
      fill: boolean;
    }>;
  };
  options: {
    responsive: boolean;
    maintainAspectRatio: boolean;
    interaction: { intersect: boolean; mode: 'index' };
    plugins: {
      legend: { display: boolean };
      title: { display: boolean; text: string; font: { size: number; weight: 'bold' } };
    };
    scales: {
      x: {
        title: { display: boolean; text: string };
        grid: { color: string };
        ticks: { autoSkip: boolean; maxTicksLimit: number; maxRotation: number; minRotation: number };
      };
      y: {
        title: { display: boolean; text: string };
        grid: { color: string };
        min: number;
        max: number;
      };
    };
  };
}

const LINE_COLOR = { bg: 'rgba(31, 119, 180, 0.16)', border: 'rgba(31, 119, 180, 1)' };
const GRID_COLOR = 'rgba(0, 0, 0, 0.1)';
const MAX_X_TICKS = 10;

function monthYear(date: string): string {
  const parsed = parseIsoDate(date);
  return parsed ? format(parsed, 'MMM yyyy') : date;
}

export function chartTitle(series: RateSeries, kind: SeriesKind, label: string): string {
  const first = series[0]?.date ?? '';
  const last = series[series.length - 1]?.date ?? '';
  const period = `(${monthYear(first)} - ${monthYear(last)})`;
  return kind === 'gold_price'
    ? `Gold Price, PLN ${period}`
    : `${label} Exchange Rate, PLN ${period}`;
}

/**
 * Line chart of a rate series. `label` is the currency code for exchange rates.
 * Returns null for an empty series; callers warn and render nothing.
 */
export function buildChartConfig(series: RateSeries, kind: SeriesKind, label: string): LineChartConfig | null {
  if (series.length === 0) return null;

  const { min, max } = computeStatistics(series);
  const padding = (max - min) * 0.05 || 0.01;

  return {
    type: 'line',
    data: {
      labels: series.map(p => p.date),
      datasets: [
        {
          label: kind === 'gold_price' ? 'Gold' : label,
          data: series.map(p => p.value),
          borderColor: LINE_COLOR.border,
          backgroundColor: LINE_COLOR.bg,
          borderWidth: 2,
          pointRadius: 4,
          pointHoverRadius: 6,
          tension: 0,
          fill: false
        }
      ]
    },
    options: {
      responsive: true,
      maintainAspectRatio: false,
      interaction: { intersect: false, mode: 'index' },
      plugins: {
        legend: { display: false },
        title: { display: true, text: chartTitle(series, kind, label), font: { size: 14, weight: 'bold' } }
      },
      scales: {
        x: {
          title: { display: true, text: 'Date' },
          grid: { color: GRID_COLOR },
          ticks: { autoSkip: true, maxTicksLimit: MAX_X_TICKS, maxRotation: 45, minRotation: 45 }
        },
        y: {
          title: { display: true, text: kind === 'gold_price' ? 'Price (PLN)' : 'Exchange Rate (PLN)' },
          grid: { color: GRID_COLOR },
          min: min - padding,
          max: max + padding
        }
      }
    }
  };
}
