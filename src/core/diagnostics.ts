import type { ILexingError, IRecognitionException, IToken } from 'chevrotain';
import type { Diagnostic, DiagnosticCode, DiagnosticSink, ValidationError } from './types.js';

export function coercePos(line?: number | null, column?: number | null, fallbackLine = 1, fallbackColumn = 1) {
  const ln = typeof line === 'number' && Number.isFinite(line) && line > 0 ? line : fallbackLine;
  const col = typeof column === 'number' && Number.isFinite(column) && column > 0 ? column : fallbackColumn;
  return { line: ln, column: col };
}

export function endOfTextPos(text: string) {
  const lines = text.split(/\r?\n/);
  const line = lines.length;
  const last = lines[lines.length - 1] ?? '';
  const column = Math.max(1, last.length + 1);
  return { line, column };
}

export function fromLexerError(e: ILexingError): ValidationError {
  const { line, column } = coercePos(e.line, e.column);
  return {
    line,
    column,
    severity: 'error',
    code: 'PIE-LEX',
    message: e.message,
    length: Math.max(1, e.length),
  };
}

function expecting(err: IRecognitionException, tokenName: string) {
  // Chevrotain does not expose expected tokens structurally; fall back to message text.
  return (err.message || '').includes(`--> ${tokenName} <--`);
}

export function mapPieParserError(err: IRecognitionException, text: string): ValidationError {
  const tok: IToken | undefined = err.token;
  const posFallback = endOfTextPos(text);
  const { line, column } = coercePos(tok?.startLine ?? null, tok?.startColumn ?? null, posFallback.line, posFallback.column);
  const len = tok && tok.image.length > 0 ? tok.image.length : 1;
  const ltxt = text.split(/\r?\n/)[Math.max(0, line - 1)] ?? '';

  // Unquoted label before a colon (token may point anywhere on the line)
  if (err.name === 'NotAllInputParsedException') {
    if (tok?.tokenType?.name === 'Colon') {
      return {
        line, column, severity: 'error', code: 'PIE-LABEL-REQUIRES-QUOTES',
        message: 'Slice labels must be quoted (single or double quotes).',
        hint: 'Example: "Dogs" : 10',
        length: len
      };
    }
    const colonIdx = ltxt.indexOf(':');
    const left = ltxt.slice(0, Math.max(0, colonIdx)).trimStart();
    if (colonIdx > 0 && !left.startsWith('"') && !left.startsWith("'")) {
      return {
        line, column: Math.max(1, colonIdx), severity: 'error', code: 'PIE-LABEL-REQUIRES-QUOTES',
        message: 'Slice labels must be quoted (single or double quotes).',
        hint: 'Example: "Dogs" : 10',
        length: 1
      };
    }
  }

  if (expecting(err, 'Colon')) {
    return {
      line, column, severity: 'error', code: 'PIE-MISSING-COLON',
      message: 'Missing colon between slice label and value.',
      hint: 'Use: "Label" : 10',
      length: len
    };
  }

  if (expecting(err, 'NumberLiteral')) {
    return {
      line, column, severity: 'error', code: 'PIE-MISSING-NUMBER',
      message: 'Missing numeric value after colon.',
      hint: 'Use a number like 10, -3 or 42.5',
      length: len
    };
  }

  if (expecting(err, 'PieKeyword')) {
    return {
      line, column, severity: 'error', code: 'PIE-HEADER-MISSING',
      message: 'Chart source must start with "pie".',
      hint: 'Start with: pie',
      length: len
    };
  }

  return { line, column, severity: 'error', code: 'PIE-PARSE', message: err.message || 'Parser error', length: len };
}

/**
 * Collects geometry warnings for one layout run and forwards each to an optional sink.
 * A code is recorded once per run.
 */
export class DiagnosticCollector {
  private readonly items: Diagnostic[] = [];

  constructor(private readonly sink?: DiagnosticSink) {}

  warn(code: DiagnosticCode, message: string, hint?: string): void {
    if (this.items.some(d => d.code === code)) return;
    const diagnostic: Diagnostic = hint ? { severity: 'warning', code, message, hint } : { severity: 'warning', code, message };
    this.items.push(diagnostic);
    this.sink?.(diagnostic);
  }

  get diagnostics(): Diagnostic[] {
    return [...this.items];
  }
}
