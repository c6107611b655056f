import type { CstElement, CstNode, IToken } from 'chevrotain';
import { fromLexerError, mapPieParserError } from '../../core/diagnostics.js';
import type { ValidationError } from '../../core/types.js';
import { tokenize } from './lexer.js';
import { parse } from './parser.js';

export interface PieSource {
  title?: string;
  showData: boolean;
  series: number[];
  labels: string[];
}

export interface PieSourceResult {
  source: PieSource;
  errors: ValidationError[];
}

function isNode(el: CstElement): el is CstNode {
  return 'children' in el;
}

function isToken(el: CstElement): el is IToken {
  return 'image' in el;
}

function childNodes(node: CstNode, key: string): CstNode[] {
  return (node.children[key] ?? []).filter(isNode);
}

function childTokens(node: CstNode, key: string): IToken[] {
  return (node.children[key] ?? []).filter(isToken);
}

export function unquote(s: string): string {
  if (!s) return s;
  const first = s.charAt(0);
  const last = s.charAt(s.length - 1);
  if (s.length >= 2 && (first === '"' || first === "'") && first === last) {
    // escaped quotes become plain characters
    return s.slice(1, -1).replace(/\\(["'\\])/g, '$1');
  }
  return s;
}

function titleFrom(text: string, node: CstNode): string | undefined {
  // Leading `title` keyword is the earliest token; words come back grouped by kind
  const body = Object.values(node.children)
    .flatMap(els => els.filter(isToken))
    .filter(tok => tok.tokenType.name !== 'Newline')
    .sort((a, b) => a.startOffset - b.startOffset)
    .slice(1);
  if (body.length === 0) return undefined;
  if (body.length === 1 && body[0].tokenType.name === 'QuotedString') {
    return unquote(body[0].image).trim() || undefined;
  }
  const first = body[0];
  const last = body[body.length - 1];
  const end = (last.endOffset ?? last.startOffset + last.image.length - 1) + 1;
  return text.slice(first.startOffset, end).trim() || undefined;
}

/**
 * Parse pie source text into a series with labels. Slices from statements
 * that failed to parse are skipped; the errors say why.
 */
export function buildPieSource(text: string): PieSourceResult {
  const errors: ValidationError[] = [];
  const source: PieSource = { showData: false, series: [], labels: [] };

  const lex = tokenize(text);
  errors.push(...lex.errors.map(fromLexerError));

  const { cst, errors: parseErrors } = parse(lex.tokens);
  errors.push(...parseErrors.map(e => mapPieParserError(e, text)));
  if (!cst || !cst.children) return { source, errors };

  if (childTokens(cst, 'ShowDataKeyword').length > 0) source.showData = true;

  for (const st of childNodes(cst, 'statement')) {
    const titleNode = childNodes(st, 'titleStmt')[0];
    if (titleNode) {
      const title = titleFrom(text, titleNode);
      if (title) source.title = title;
      continue;
    }

    const sliceNode = childNodes(st, 'sliceStmt')[0];
    if (!sliceNode) continue;
    const labelTok = childTokens(sliceNode, 'QuotedString')[0];
    const numTok = childTokens(sliceNode, 'NumberLiteral')[0];
    if (!labelTok || !numTok) continue;
    const value = Number(numTok.image);
    if (Number.isNaN(value)) continue;
    source.labels.push(unquote(labelTok.image).trim());
    source.series.push(value);
  }

  return { source, errors };
}
