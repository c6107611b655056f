import { createToken, Lexer } from 'chevrotain';

export const PieKeyword = createToken({ name: 'PieKeyword', pattern: /pie/ });
export const TitleKeyword = createToken({ name: 'TitleKeyword', pattern: /title/ });
export const ShowDataKeyword = createToken({ name: 'ShowDataKeyword', pattern: /showData/ });

export const Colon = createToken({ name: 'Colon', pattern: /:/ });
// Signed decimals; negative values are legal here and clamped later by the layout
export const NumberLiteral = createToken({ name: 'NumberLiteral', pattern: /-?(?:[0-9]+(?:\.[0-9]+)?|\.[0-9]+)/ });
// Allow escaped characters within quotes (e.g., \" inside "...")
export const QuotedString = createToken({ name: 'QuotedString', pattern: /"(?:\\[^\n\r]|[^"\\\n\r])*"|'(?:\\[^\n\r]|[^'\\\n\r])*'/ });
// Fallback for titles; placed after whitespace and keywords so it does not swallow them
export const Text = createToken({ name: 'Text', pattern: /[^:\n\r]+/ });

export const Comment = createToken({ name: 'Comment', pattern: /%%[^\n\r]*/, group: Lexer.SKIPPED });
export const WhiteSpace = createToken({ name: 'WhiteSpace', pattern: /[ \t]+/, group: Lexer.SKIPPED });
export const Newline = createToken({ name: 'Newline', pattern: /[\n\r]+/, line_breaks: true });

export const allTokens = [
  Comment,
  QuotedString,
  // keywords before text
  PieKeyword,
  TitleKeyword,
  ShowDataKeyword,
  WhiteSpace,
  Colon,
  NumberLiteral,
  Text,
  Newline,
];

export const PieLexer = new Lexer(allTokens);

export function tokenize(text: string) {
  return PieLexer.tokenize(text);
}
