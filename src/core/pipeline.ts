import { buildPieSource } from '../diagrams/pie/builder.js';
import { computePieLayout, type LayoutHooks } from '../geometry/layout.js';
import { ChartConfigSchema, type ChartOptions, mergeChartConfig, parseChartOverrides } from './config.js';
import { isLayoutError } from './errors.js';
import { formatNumber } from './format.js';
import { type FrontmatterValue, parseFrontmatter } from './frontmatter.js';
import type { PieLayout, ValidationError } from './types.js';

export interface SourceLayoutResult {
  title?: string;
  layout: PieLayout | null;
  errors: ValidationError[];
}

const CONFIG_KEYS = new Set(Object.keys(ChartConfigSchema.shape));

function offsetErrors(errors: ValidationError[], lineOffset: number): ValidationError[] {
  if (!lineOffset) return errors;
  return errors.map(e => ({ ...e, line: e.line + lineOffset }));
}

function layoutErrorToValidation(error: unknown, line = 1): ValidationError {
  if (!isLayoutError(error)) throw error;
  const out: ValidationError = { line, column: 1, severity: 'error', code: error.code, message: error.message };
  if (error.hint) out.hint = error.hint;
  return out;
}

/**
 * Source text in, layout out: frontmatter config, pie statements, geometry.
 * Input problems come back as errors; `layout` is null when any error occurred.
 * Config precedence: defaults < frontmatter < `overrides`.
 */
export function layoutPieSource(text: string, overrides: ChartOptions = {}, hooks: LayoutHooks = {}): SourceLayoutResult {
  const errors: ValidationError[] = [];
  let body = text;
  let lineOffset = 0;
  let fromFrontmatter: ChartOptions = {};

  const fm = parseFrontmatter(text);
  if (fm) {
    body = fm.body;
    lineOffset = fm.bodyLineOffset;
    const data: Record<string, FrontmatterValue> = {};
    for (const entry of fm.pie) {
      if (CONFIG_KEYS.has(entry.key)) {
        data[entry.key] = entry.value;
      } else {
        errors.push({
          line: entry.line,
          column: 1,
          severity: 'warning',
          code: 'PIE-CONFIG-UNKNOWN-KEY',
          message: `Unknown pie option '${entry.key}' is ignored.`,
          hint: `Known options: ${[...CONFIG_KEYS].join(', ')}`,
        });
      }
    }
    try {
      fromFrontmatter = parseChartOverrides(data);
    } catch (e) {
      errors.push(layoutErrorToValidation(e, fm.pie[0]?.line ?? 1));
    }
  }

  const { source, errors: sourceErrors } = buildPieSource(body);
  errors.push(...offsetErrors(sourceErrors, lineOffset));
  if (errors.some(e => e.severity === 'error')) {
    return { title: source.title, layout: null, errors };
  }

  const labels = source.showData
    ? source.labels.map((label, i) => `${label} ${formatNumber(source.series[i])}`)
    : source.labels;

  // Source labels are plain explicit labels, so `showLabels: false` has to drop them here
  const labelsOff = mergeChartConfig(fromFrontmatter, overrides).showLabels === false;
  const fromSource: ChartOptions = labelsOff ? {} : { labels };

  try {
    const layout = computePieLayout(source.series, mergeChartConfig(fromFrontmatter, fromSource, overrides), hooks);
    return { title: source.title, layout, errors };
  } catch (e) {
    errors.push(layoutErrorToValidation(e, lineOffset + 1));
    return { title: source.title, layout: null, errors };
  }
}
