import type { DiagnosticCollector } from '../core/diagnostics.js';

/**
 * Clamp a raw series into non-negative magnitudes usable as angular shares.
 * Negative and non-finite entries contribute nothing; order and length are kept.
 */
export function normalizeSeries(series: readonly number[], diagnostics?: DiagnosticCollector): number[] {
  return series.map((value, i) => {
    if (!Number.isFinite(value)) {
      diagnostics?.warn('PIE-NON-FINITE-VALUE', `Series entry ${i} is not a finite number (${value}); treated as 0.`);
      return 0;
    }
    if (value < 0) {
      diagnostics?.warn(
        'PIE-NEGATIVE-VALUE',
        `Series entry ${i} is negative (${value}); negative values are drawn as empty slices.`,
        'Pie charts show shares of a whole; pass magnitudes instead.'
      );
      return 0;
    }
    return value;
  });
}

export function sumSeries(series: readonly number[]): number {
  return series.reduce((acc, v) => acc + v, 0);
}
