import { SprigLiteral } from '../runtime/values';

export enum TokenType {
  START_STATEMENT = 'START_STATEMENT', // ( or $
  END_STATEMENT = 'END_STATEMENT',     // ) or the close of a $ wrap
  KEYWORD = 'KEYWORD',
  LITERAL = 'LITERAL',
  IDENTIFIER = 'IDENTIFIER',
}

export enum Keyword {
  LET = 'let',
  LAMBDA = 'lambda',
}

export const KEYWORDS: ReadonlyMap<string, Keyword> = new Map([
  ['let', Keyword.LET],
  ['lambda', Keyword.LAMBDA],
]);

/**
 * A position in a named source. Lines and columns are 1-based and count
 * characters of the untrimmed line.
 */
export interface Location {
  readonly filename: string;
  readonly line: number;
  readonly column: number;
}

export function location(filename: string, line: number, column: number): Location {
  return { filename, line, column };
}

export function formatLocation(loc: Location): string {
  return `${loc.filename}:${loc.line}:${loc.column}`;
}

export interface StartStatementToken {
  type: TokenType.START_STATEMENT;
  location: Location;
}

export interface EndStatementToken {
  type: TokenType.END_STATEMENT;
  location: Location;
}

export interface KeywordToken {
  type: TokenType.KEYWORD;
  keyword: Keyword;
  location: Location;
}

export interface LiteralToken {
  type: TokenType.LITERAL;
  value: SprigLiteral;
  location: Location;
}

export interface IdentifierToken {
  type: TokenType.IDENTIFIER;
  name: string;
  location: Location;
}

export type Token =
  | StartStatementToken
  | EndStatementToken
  | KeywordToken
  | LiteralToken
  | IdentifierToken;

/**
 * Short human-readable form of a token, used by `--lex` and in tests.
 */
export function describeToken(token: Token): string {
  switch (token.type) {
    case TokenType.START_STATEMENT: return '(';
    case TokenType.END_STATEMENT: return ')';
    case TokenType.KEYWORD: return token.keyword;
    case TokenType.IDENTIFIER: return token.name;
    case TokenType.LITERAL:
      return token.value.kind === 'string' ? JSON.stringify(token.value.value) : literalText(token.value);
  }
}

function literalText(value: SprigLiteral): string {
  switch (value.kind) {
    case 'integer':
    case 'float':
      return String(value.value);
    case 'string':
      return value.value;
    case 'nil':
      return 'nil';
  }
}
