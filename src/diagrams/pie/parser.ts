import { CstParser, type IToken } from 'chevrotain';
import * as t from './lexer.js';

export class PieParser extends CstParser {
  constructor() {
    super(t.allTokens);
    this.performSelfAnalysis();
  }

  public diagram = this.RULE('diagram', () => {
    this.MANY(() => this.CONSUME(t.Newline));
    this.CONSUME(t.PieKeyword);
    // Optional inline flag: `pie showData`
    this.OPTION(() => this.CONSUME(t.ShowDataKeyword));
    this.OPTION2(() => this.CONSUME2(t.Newline));
    this.MANY2(() => this.SUBRULE(this.statement));
  });

  private statement = this.RULE('statement', () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.titleStmt) },
      { ALT: () => this.SUBRULE(this.sliceStmt) },
      { ALT: () => this.CONSUME(t.Newline) },
    ]);
  });

  private titleStmt = this.RULE('titleStmt', () => {
    this.CONSUME(t.TitleKeyword);
    // Keywords are plain words inside a title ("title pie facts")
    this.AT_LEAST_ONE(() => this.OR([
      { ALT: () => this.CONSUME(t.QuotedString) },
      { ALT: () => this.CONSUME(t.Text) },
      { ALT: () => this.CONSUME(t.NumberLiteral) },
      { ALT: () => this.CONSUME(t.PieKeyword) },
      { ALT: () => this.CONSUME2(t.TitleKeyword) },
      { ALT: () => this.CONSUME(t.ShowDataKeyword) },
    ]));
    this.OPTION(() => this.CONSUME(t.Newline));
  });

  private sliceStmt = this.RULE('sliceStmt', () => {
    // Labels must be quoted (single or double quotes)
    this.CONSUME(t.QuotedString);
    this.CONSUME(t.Colon);
    this.CONSUME(t.NumberLiteral);
    this.OPTION(() => this.CONSUME(t.Newline));
  });
}

export const parserInstance = new PieParser();

export function parse(tokens: IToken[]) {
  parserInstance.input = tokens;
  const cst = parserInstance.diagram();
  return { cst, errors: parserInstance.errors };
}
