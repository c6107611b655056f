import type { Diagnostic, PieLayout, ValidationError } from './types.js';

export type OutputFormat = 'text' | 'json';

export function formatNumber(n: number): string {
  // Keep simple, avoid locales for stable output
  if (Number.isInteger(n)) return String(n);
  return (Math.round(n * 100) / 100).toString();
}

export function groupErrors(errors: ValidationError[]) {
  const errs = errors.filter(e => e.severity === 'error');
  const warns = errors.filter(e => e.severity === 'warning');
  return { errs, warns };
}

export function textReport(filename: string, content: string, errors: ValidationError[]): string {
  const { errs, warns } = groupErrors(errors);
  const lines: string[] = [];
  const allLines = content.split(/\r?\n/);
  const numWidth = String(allLines.length).length;
  const fmtNum = (n: number) => String(n).padStart(numWidth, ' ');

  const printBlock = (kind: 'error' | 'warning', e: ValidationError) => {
    const kindColor = kind === 'error' ? '\x1b[31merror\x1b[0m' : '\x1b[33mwarning\x1b[0m';
    lines.push(`${kindColor}${e.code ? `[${e.code}]` : ''}: ${e.message}`);
    lines.push(`at ${filename}:${e.line}:${e.column}`);
    const idx = Math.max(0, Math.min(allLines.length - 1, e.line - 1));
    if (idx > 0) lines.push(`  ${fmtNum(idx)} | ${allLines[idx - 1]}`);
    lines.push(`  ${fmtNum(idx + 1)} | ${allLines[idx] ?? ''}`);
    const caretPad = ' '.repeat(Math.max(0, e.column - 1));
    const caretLen = Math.max(1, e.length ?? 1);
    lines.push(`  ${' '.repeat(numWidth)} | ${caretPad}\x1b[31m${'^'.repeat(caretLen)}\x1b[0m`);
    if (idx + 1 < allLines.length) lines.push(`  ${fmtNum(idx + 2)} | ${allLines[idx + 1]}`);
    if (e.hint) lines.push(`hint: ${e.hint}`);
    lines.push('');
  };

  for (const e of errs) printBlock('error', e);
  for (const w of warns) printBlock('warning', w);
  if (errs.length === 0 && warns.length === 0) return 'Valid';
  return lines.join('\n');
}

export function diagnosticsReport(diagnostics: Diagnostic[]): string {
  return diagnostics
    .map(d => `\x1b[33mwarning\x1b[0m[${d.code}]: ${d.message}${d.hint ? `\nhint: ${d.hint}` : ''}`)
    .join('\n');
}

// One line per slice, then one per drawable label
export function layoutSummary(layout: PieLayout, title?: string): string {
  const lines: string[] = [];
  if (title) lines.push(title);
  lines.push(
    `center ${formatNumber(layout.center.x)},${formatNumber(layout.center.y)} radius ${formatNumber(layout.radius)}` +
      (layout.innerRadius > 0 ? ` inner ${formatNumber(layout.innerRadius)}` : '') +
      ` total ${formatNumber(layout.valuesTotal)}`
  );
  for (const s of layout.slices) {
    lines.push(`slice ${s.index} [${s.seriesIndex}] ${formatNumber(s.startAngle)}..${formatNumber(s.endAngle)} ${s.fill} ${s.path}`);
  }
  for (const { anchor, text } of layout.labels) {
    if (anchor.suppressed || text === null) continue;
    lines.push(`label [${anchor.seriesIndex}] ${formatNumber(anchor.point.x)},${formatNumber(anchor.point.y)} ${text}`);
  }
  return lines.join('\n');
}

export function toJsonResult(filename: string, errors: ValidationError[], layout: PieLayout | null, title?: string) {
  const { errs, warns } = groupErrors(errors);
  return {
    file: filename,
    valid: errs.length === 0,
    errorCount: errs.length,
    warningCount: warns.length + (layout?.diagnostics.length ?? 0),
    errors: errs,
    warnings: warns,
    title,
    layout,
  };
}
