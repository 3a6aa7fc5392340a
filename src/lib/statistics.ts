import type { RateSeries, Statistics } from '../types/index.js';

// Callers must not pass an empty series
export function computeStatistics(series: RateSeries): Statistics {
  let min = Infinity;
  let max = -Infinity;
  let sum = 0;
  for (const { value } of series) {
    if (value < min) min = value;
    if (value > max) max = value;
    sum += value;
  }
  return { count: series.length, min, max, mean: sum / series.length };
}
