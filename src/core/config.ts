import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import type { LabelFormatter } from './types.js';

const finite = () => z.number().finite();

const PointSchema = z.object({ x: finite(), y: finite() }).strict();

// Serializable part of a chart configuration (CLI JSON, frontmatter, callers)
export const ChartConfigSchema = z.object({
  viewboxWidth: finite().positive().default(600).describe('Width of the drawing area'),
  viewboxHeight: finite().positive().default(400).describe('Height of the drawing area'),
  padding: finite().default(0).describe('Padding on every side; shrinks the derived radius'),
  startAngle: finite().default(0).describe('Angle of the first slice boundary, degrees clockwise from 12 o\'clock'),
  donut: z.boolean().default(false),
  donutWidth: finite().default(40).describe('Ring thickness when donut is set'),
  labelPosition: z.enum(['inside', 'outside', 'center']).default('inside'),
  labelOffset: finite().default(0).describe('Extra distance added to the label radius'),
  showLabels: z.boolean().default(true),
  labels: z.array(z.string()).optional().describe('Explicit label per series entry'),
  total: finite().optional().describe('Explicit value of the whole circle (gauge charts)'),
  showRatio: finite().optional().describe('Share of the circle the data occupies, 0.0001 to 1'),
  center: PointSchema.optional().describe('Overrides the viewbox centre'),
  radius: finite().optional().describe('Overrides the radius derived from the viewbox'),
}).strict();

export type ChartConfigData = z.input<typeof ChartConfigSchema>;

export interface ChartOptions extends ChartConfigData {
  labelInterpolation?: LabelFormatter;
}

export type ChartConfig = Readonly<z.output<typeof ChartConfigSchema>> & {
  readonly labelInterpolation?: LabelFormatter;
};

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    })
    .join('; ');
}

/**
 * Validate serializable config data and fill in defaults.
 * Throws ConfigurationError when the data does not match the schema.
 */
export function parseChartConfig(data: unknown): z.output<typeof ChartConfigSchema> {
  const parsed = ChartConfigSchema.safeParse(data ?? {});
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid chart configuration: ${describeIssues(parsed.error)}`,
      'PIE-CONFIG-INVALID',
      'Check option names and types, e.g. { "donut": true, "startAngle": -60 }'
    );
  }
  return parsed.data;
}

const ChartOverridesSchema = ChartConfigSchema.partial();

/**
 * Validate a partial config (a file or frontmatter section) without filling
 * defaults, so it can be layered under other sources.
 */
export function parseChartOverrides(data: unknown): z.output<typeof ChartOverridesSchema> {
  const parsed = ChartOverridesSchema.safeParse(data ?? {});
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid chart configuration: ${describeIssues(parsed.error)}`,
      'PIE-CONFIG-INVALID',
      'Check option names and types, e.g. { "donut": true, "startAngle": -60 }'
    );
  }
  return parsed.data;
}

/**
 * Build the immutable snapshot used for one layout computation.
 */
export function resolveChartConfig(options: ChartOptions = {}): ChartConfig {
  const { labelInterpolation, ...data } = options;
  const config: ChartConfig = { ...parseChartConfig(data), labelInterpolation };
  return Object.freeze(config);
}

/**
 * Shallow merge where later sources win; undefined values never override.
 */
export function mergeChartConfig(...sources: Array<ChartOptions | undefined>): ChartOptions {
  const out: ChartOptions = {};
  for (const src of sources) {
    if (!src) continue;
    Object.assign(out, Object.fromEntries(Object.entries(src).filter(([, value]) => value !== undefined)));
  }
  return out;
}
