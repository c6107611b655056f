// Public SDK surface for programmatic use
export type {
  Point,
  LabelPosition,
  LabelFormatter,
  PathCommand,
  SliceDescriptor,
  LabelAnchor,
  LabelEntry,
  PieLayout,
  Diagnostic,
  DiagnosticCode,
  DiagnosticSink,
  ValidationError,
} from './core/types.js';

// Configuration and errors
export type { ChartConfig, ChartConfigData, ChartOptions } from './core/config.js';
export { ChartConfigSchema, parseChartConfig, parseChartOverrides, resolveChartConfig, mergeChartConfig } from './core/config.js';
export { LayoutError, ConfigurationError, isLayoutError } from './core/errors.js';

// Geometry
export type { LayoutHooks, ChartFrame } from './geometry/layout.js';
export { computePieLayout, resolveFrame } from './geometry/layout.js';
export { normalizeSeries, sumSeries } from './geometry/normalize.js';
export { resolveTotal, clampShowRatio } from './geometry/total.js';
export { polarToCartesian } from './geometry/polar.js';
export type { AngleSpan } from './geometry/angles.js';
export { walkAngles, SEAM_OVERLAP, MAX_SWEEP } from './geometry/angles.js';
export { buildSlices } from './geometry/slices.js';
export { placeLabels, resolveLabels, labelRadiusFor, defaultLabelFormatter } from './geometry/labels.js';
export { colorForIndex, sliceFill } from './geometry/color.js';
export { serializePath } from './geometry/path.js';

// Pie source text
export type { PieSource } from './diagrams/pie/builder.js';
export { buildPieSource } from './diagrams/pie/builder.js';
export type { SourceLayoutResult } from './core/pipeline.js';
export { layoutPieSource } from './core/pipeline.js';

// Reporting
export { textReport, diagnosticsReport, layoutSummary, toJsonResult, formatNumber } from './core/format.js';
