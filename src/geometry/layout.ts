import { type ChartConfig, type ChartOptions, resolveChartConfig } from '../core/config.js';
import { DiagnosticCollector } from '../core/diagnostics.js';
import { ConfigurationError } from '../core/errors.js';
import type { DiagnosticSink, PieLayout, Point } from '../core/types.js';
import { walkAngles } from './angles.js';
import { labelRadiusFor, placeLabels, resolveLabels } from './labels.js';
import { normalizeSeries } from './normalize.js';
import { buildSlices } from './slices.js';
import { resolveTotal } from './total.js';

// Room kept between the pie and the viewbox edge for outside labels
export const FRAME_MARGIN = 30;

export interface LayoutHooks {
  /** Receives each geometry warning as it is raised */
  onDiagnostic?: DiagnosticSink;
}

export interface ChartFrame {
  center: Point;
  radius: number;
  innerRadius: number;
}

export function resolveFrame(config: ChartConfig, diagnostics?: DiagnosticCollector): ChartFrame {
  const center = config.center ?? { x: config.viewboxWidth / 2, y: config.viewboxHeight / 2 };
  let radius = config.radius ?? Math.min(config.viewboxWidth / 2, config.viewboxHeight / 2) - FRAME_MARGIN - config.padding;
  if (!(radius > 0)) {
    diagnostics?.warn(
      'PIE-RADIUS-NONPOSITIVE',
      `Radius resolves to ${radius}; slices collapse to the centre.`,
      'Enlarge the viewbox or reduce padding.'
    );
    radius = 0;
  }

  let innerRadius = 0;
  if (config.donut) {
    innerRadius = radius - config.donutWidth;
    if (innerRadius <= 0) {
      diagnostics?.warn(
        'PIE-DONUT-CLAMPED',
        `donutWidth ${config.donutWidth} is not smaller than radius ${radius}; the ring is drawn as a full wedge.`
      );
      innerRadius = 0;
    }
  }

  return { center, radius, innerRadius };
}

/**
 * Lay out a pie or donut chart: slice paths, label anchors and label text.
 * Throws ConfigurationError for an empty series or an invalid config; every
 * other problem is clamped and reported in `diagnostics`.
 */
export function computePieLayout(series: readonly number[], options: ChartOptions = {}, hooks: LayoutHooks = {}): PieLayout {
  if (series.length === 0) {
    throw new ConfigurationError('Pie chart error: empty series', 'PIE-EMPTY-SERIES', 'Provide at least one value.');
  }
  const config = resolveChartConfig(options);
  const diagnostics = new DiagnosticCollector(hooks.onDiagnostic);

  const frame = resolveFrame(config, diagnostics);
  const normalized = normalizeSeries(series, diagnostics);
  const valuesTotal = resolveTotal(normalized, series, config, diagnostics);
  const spans = walkAngles(normalized, valuesTotal, config.startAngle);

  const slices = buildSlices(spans, { ...frame, donut: config.donut });
  const labelRadius = labelRadiusFor(config.labelPosition, frame.radius, config.labelOffset);
  const anchors = placeLabels(spans, frame.center, labelRadius);
  const labels = resolveLabels(anchors, series, config, diagnostics);

  return {
    center: frame.center,
    radius: frame.radius,
    innerRadius: frame.innerRadius,
    labelRadius,
    valuesTotal,
    normalized,
    slices,
    anchors,
    labels,
    diagnostics: diagnostics.diagnostics,
  };
}
