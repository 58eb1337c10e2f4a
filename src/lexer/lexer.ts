import { Diagnostics } from '../runtime/diagnostics';
import { SprigError } from '../runtime/errors';
import { INTEGER_MAX, INTEGER_MIN, sprigFloat, sprigInteger, sprigNil, sprigString } from '../runtime/values';
import { KEYWORDS, Location, Token, TokenType, location } from './tokens';

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const SPECIAL_FLOAT_PATTERN = /^([+-]?)(inf|infinity|nan)$/i;

enum LexerMode {
  NORMAL,
  IN_STRING,
  IN_COMMENT,
}

export class Lexer {
  private tokens: Token[] = [];
  private mode = LexerMode.NORMAL;
  private buffer = '';
  private bufferStart: Location | null = null;
  private previous = '';
  private commentStart: Location | null = null;
  // `$` wraps not yet closed; the next `)` or end of input closes them all
  private wraps = 0;
  private diagnostics = new Diagnostics();

  constructor(
    private readonly source: string,
    private readonly filename = '<provided>',
  ) {}

  tokenize(): Token[] {
    this.reset();

    const lines = this.source.split(/\r?\n/);
    lines.forEach((text, index) => this.scanLine(text, index + 1));

    if (this.mode === LexerMode.IN_COMMENT && this.commentStart) {
      this.diagnostics
        .error(this.commentStart, 'Unterminated block comment!')
        .note(null, 'Close it with `*}`.');
    }

    // Close every wrap still open at end of input
    const end = location(this.filename, lines.length, lines[lines.length - 1].length + 1);
    this.closeWraps(end);

    if (!this.diagnostics.isEmpty()) {
      throw new SprigError(this.diagnostics);
    }
    return this.tokens;
  }

  private reset(): void {
    this.tokens = [];
    this.mode = LexerMode.NORMAL;
    this.buffer = '';
    this.bufferStart = null;
    this.commentStart = null;
    this.wraps = 0;
    this.diagnostics = new Diagnostics();
  }

  private scanLine(text: string, line: number): void {
    this.previous = '';

    for (let i = 0; i < text.length; i++) {
      const ch = text[i];
      const here = location(this.filename, line, i + 1);

      if (this.mode === LexerMode.IN_STRING) {
        if (ch === '"') {
          this.pushString();
        } else {
          this.buffer += ch;
        }
      } else if (this.mode === LexerMode.IN_COMMENT) {
        if (ch === '}' && this.previous === '*') {
          this.mode = LexerMode.NORMAL;
          this.previous = '';
          continue;
        }
      } else if (ch === '/' && this.previous === '/') {
        // Line comment: the first `/` is already buffered
        this.dropLast();
        break;
      } else if (ch === '*' && this.previous === '{') {
        this.dropLast();
        this.flush();
        this.mode = LexerMode.IN_COMMENT;
        this.commentStart = location(this.filename, line, i);
        this.previous = '';
        continue;
      } else {
        this.scanNormal(ch, here);
      }

      this.previous = ch;
    }

    if (this.mode === LexerMode.IN_STRING) {
      this.diagnostics
        .error(this.bufferStart ?? location(this.filename, line, 1), 'Unterminated string literal!')
        .note(null, 'Add a closing `"`.');
      this.mode = LexerMode.NORMAL;
      this.buffer = '';
      this.bufferStart = null;
    } else if (this.mode === LexerMode.NORMAL) {
      this.flush();
    }
  }

  private scanNormal(ch: string, here: Location): void {
    switch (ch) {
      case '(':
        this.flush();
        this.tokens.push({ type: TokenType.START_STATEMENT, location: here });
        break;
      case ')':
        this.flush();
        this.closeWraps(here);
        this.tokens.push({ type: TokenType.END_STATEMENT, location: here });
        break;
      case '$':
        this.flush();
        this.tokens.push({ type: TokenType.START_STATEMENT, location: here });
        this.wraps++;
        break;
      case '"':
        this.flush();
        this.mode = LexerMode.IN_STRING;
        this.bufferStart = here;
        break;
      case ' ':
      case '\t':
        this.flush();
        break;
      default:
        if (!this.buffer) this.bufferStart = here;
        this.buffer += ch;
    }
  }

  private closeWraps(at: Location): void {
    for (; this.wraps > 0; this.wraps--) {
      this.tokens.push({ type: TokenType.END_STATEMENT, location: at });
    }
  }

  private pushString(): void {
    if (this.bufferStart) {
      this.tokens.push({ type: TokenType.LITERAL, value: sprigString(this.buffer), location: this.bufferStart });
    }
    this.mode = LexerMode.NORMAL;
    this.buffer = '';
    this.bufferStart = null;
  }

  private flush(): void {
    if (this.buffer && this.bufferStart) {
      this.tokens.push(this.classify(this.buffer, this.bufferStart));
    }
    this.buffer = '';
    this.bufferStart = null;
  }

  private dropLast(): void {
    this.buffer = this.buffer.slice(0, -1);
    if (!this.buffer) this.bufferStart = null;
  }

  /**
   * Keyword, then integer, then float, then `nil`, else identifier.
   * Integers are signed 64-bit; a longer digit string reads as a float.
   */
  private classify(text: string, at: Location): Token {
    const keyword = KEYWORDS.get(text);
    if (keyword) {
      return { type: TokenType.KEYWORD, keyword, location: at };
    }
    if (INTEGER_PATTERN.test(text)) {
      const value = BigInt(text);
      if (value >= INTEGER_MIN && value <= INTEGER_MAX) {
        return { type: TokenType.LITERAL, value: sprigInteger(value), location: at };
      }
    }
    if (FLOAT_PATTERN.test(text)) {
      return { type: TokenType.LITERAL, value: sprigFloat(Number(text)), location: at };
    }
    const special = SPECIAL_FLOAT_PATTERN.exec(text);
    if (special) {
      const magnitude = special[2].toLowerCase() === 'nan' ? NaN : Infinity;
      return { type: TokenType.LITERAL, value: sprigFloat(special[1] === '-' ? -magnitude : magnitude), location: at };
    }
    if (text === 'nil') {
      return { type: TokenType.LITERAL, value: sprigNil(), location: at };
    }
    return { type: TokenType.IDENTIFIER, name: text, location: at };
  }
}
