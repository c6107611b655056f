import { computePieLayout } from '../geometry/layout.js';
import { formatNumber, groupErrors, layoutSummary, textReport, toJsonResult } from './format.js';
import type { ValidationError } from './types.js';

const labelError: ValidationError = {
  line: 2,
  column: 7,
  severity: 'error',
  code: 'PIE-LABEL-REQUIRES-QUOTES',
  message: 'Slice labels must be quoted (single or double quotes).',
  hint: 'Example: "Dogs" : 10',
};

describe('formatNumber', () => {
  it('should print integers as is and round fractions to two places', () => {
    expect(formatNumber(3)).toBe('3');
    expect(formatNumber(59.54)).toBe('59.54');
    expect(formatNumber(0.125)).toBe('0.13');
  });
});

describe('textReport', () => {
  it('should say Valid when nothing was reported', () => {
    expect(textReport('chart.pie', 'pie\n"A": 1', [])).toBe('Valid');
  });

  it('should show the offending line with a caret', () => {
    const report = textReport('chart.pie', 'pie\n  Dogs : 3', [labelError]);

    expect(report.split('\n')).toEqual([
      '\x1b[31merror\x1b[0m[PIE-LABEL-REQUIRES-QUOTES]: Slice labels must be quoted (single or double quotes).',
      'at chart.pie:2:7',
      '  1 | pie',
      '  2 |   Dogs : 3',
      '    |       \x1b[31m^\x1b[0m',
      'hint: Example: "Dogs" : 10',
      '',
    ]);
  });
});

describe('layoutSummary', () => {
  it('should list slices and drawable labels', () => {
    const summary = layoutSummary(computePieLayout([1, 1]), 'Halves');

    expect(summary.split('\n')).toEqual([
      'Halves',
      'center 300,200 radius 170 total 2',
      'slice 0 [0] 0..180 rgb(255, 40, 40) M300,370A170,170,0,0,0,300,30L300,200Z',
      'slice 1 [1] 180..360 rgb(180, 40, 40) M300,30A170,170,0,0,0,301.19,370L300,200Z',
      'label [0] 385,200 1',
      'label [1] 215,200 1',
    ]);
  });

  it('should mention the inner radius of a donut and skip suppressed labels', () => {
    const summary = layoutSummary(computePieLayout([1, 0], { donut: true }));
    const lines = summary.split('\n');

    expect(lines[0]).toBe('center 300,200 radius 170 inner 130 total 1');
    expect(lines.filter(l => l.startsWith('label'))).toHaveLength(1);
  });
});

describe('toJsonResult', () => {
  it('should count errors and warnings separately', () => {
    const warning: ValidationError = { line: 1, column: 1, severity: 'warning', message: 'w' };

    const result = toJsonResult('chart.pie', [labelError, warning], null);

    expect(result).toMatchObject({ file: 'chart.pie', valid: false, errorCount: 1, warningCount: 1, layout: null });
    expect(groupErrors([labelError, warning]).errs).toEqual([labelError]);
  });
});
