import type { DiagnosticCollector } from '../core/diagnostics.js';
import { sumSeries } from './normalize.js';

export const MIN_SHOW_RATIO = 0.0001;
export const MAX_SHOW_RATIO = 1;

export interface TotalOverrides {
  total?: number;
  showRatio?: number;
}

export function clampShowRatio(ratio: number): number {
  return Math.min(MAX_SHOW_RATIO, Math.max(MIN_SHOW_RATIO, ratio));
}

/**
 * Value that corresponds to the full 360 degrees.
 *
 * showRatio wins over total: the data then occupies `showRatio` of the circle.
 * An explicit total is scaled from raw to normalized units and never allowed
 * to fall below the normalized sum.
 */
export function resolveTotal(
  normalized: readonly number[],
  raw: readonly number[],
  overrides: TotalOverrides = {},
  diagnostics?: DiagnosticCollector
): number {
  const normalizedSum = sumSeries(normalized);
  let valuesTotal = normalizedSum;

  if (overrides.showRatio !== undefined) {
    const ratio = clampShowRatio(overrides.showRatio);
    if (ratio !== overrides.showRatio) {
      diagnostics?.warn(
        'PIE-RATIO-CLAMPED',
        `showRatio ${overrides.showRatio} is outside [${MIN_SHOW_RATIO}, ${MAX_SHOW_RATIO}]; using ${ratio}.`
      );
    }
    valuesTotal = normalizedSum / ratio;
  } else if (overrides.total !== undefined) {
    const rawSum = sumSeries(raw.map(v => (Number.isFinite(v) ? v : 0)));
    const scaled = (normalizedSum / rawSum) * overrides.total;
    if (rawSum > 0 && Number.isFinite(scaled)) {
      valuesTotal = Math.max(scaled, normalizedSum);
    } else {
      diagnostics?.warn(
        'PIE-TOTAL-IGNORED',
        `Explicit total ${overrides.total} cannot be applied because the raw series sums to ${rawSum}.`
      );
    }
  }

  if (valuesTotal === Infinity) {
    diagnostics?.warn(
      'PIE-TOTAL-NON-FINITE',
      'Series total overflows to Infinity; no slices are drawn.',
      'Scale the values down before laying out the chart.'
    );
    return 0;
  }
  if (!(valuesTotal > 0)) {
    diagnostics?.warn('PIE-TOTAL-ZERO', 'Series has no positive values; no slices are drawn.');
    return 0;
  }
  return valuesTotal;
}
