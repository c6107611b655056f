import type { DiagnosticCollector } from '../core/diagnostics.js';
import type { LabelAnchor, LabelEntry, LabelFormatter, LabelPosition, Point } from '../core/types.js';
import type { AngleSpan } from './angles.js';
import { polarToCartesian } from './polar.js';

export function labelRadiusFor(position: LabelPosition, radius: number, offset: number): number {
  switch (position) {
    case 'inside':
      return radius / 2 + offset;
    case 'outside':
      return radius + offset;
    case 'center':
      return offset;
  }
}

/**
 * One anchor per series entry, at the bookkeeping midpoint of its slice.
 * Zero entries get a suppressed anchor instead of a point.
 */
export function placeLabels(spans: readonly AngleSpan[], center: Point, labelRadius: number): LabelAnchor[] {
  return spans.map((span): LabelAnchor => {
    if (span.empty) return { seriesIndex: span.seriesIndex, suppressed: true };
    const angle = span.start + (span.end - span.start) / 2;
    return {
      seriesIndex: span.seriesIndex,
      suppressed: false,
      point: polarToCartesian(center, labelRadius, angle),
      angle,
    };
  });
}

export const defaultLabelFormatter: LabelFormatter = (value) => String(value);

export interface LabelTextOptions {
  labels?: readonly string[];
  showLabels: boolean;
  labelInterpolation?: LabelFormatter;
}

/**
 * Pair anchors with text. Explicit labels always win and are paired by index;
 * otherwise values are formatted, unless labels are switched off entirely.
 */
export function resolveLabels(
  anchors: readonly LabelAnchor[],
  series: readonly number[],
  options: LabelTextOptions,
  diagnostics?: DiagnosticCollector
): LabelEntry[] {
  const { labels } = options;
  if (!labels && !options.showLabels) return [];

  if (labels && labels.length !== series.length) {
    diagnostics?.warn(
      'PIE-LABEL-COUNT-MISMATCH',
      `Got ${labels.length} labels for ${series.length} series entries.`,
      'Entries without a label are drawn without text.'
    );
  }

  const format = options.labelInterpolation ?? defaultLabelFormatter;
  return anchors.map((anchor) => {
    if (anchor.suppressed) return { anchor, text: null };
    if (labels) return { anchor, text: labels[anchor.seriesIndex] ?? null };
    return { anchor, text: format(series[anchor.seriesIndex]) };
  });
}
