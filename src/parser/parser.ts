import { Keyword, Location, Token, TokenType } from '../lexer/tokens';
import { Diagnostics } from '../runtime/diagnostics';
import { InternalError, SprigError, sprigError } from '../runtime/errors';
import { Scope } from '../runtime/scope';
import { sprigStatement } from '../runtime/values';
import { Var } from '../runtime/var';
import { Statement } from './ast';
import { processBindings } from './bindings';

enum ParserStatus {
  ARGUMENTS,
  BINDINGS,
}

interface Collected {
  value: Var;
  location: Location;
}

/**
 * Builds an executable Statement tree from tokens, resolving identifiers
 * against a Scope as it goes. `let` lists extend that scope in place.
 */
export class Parser {
  private tokens: Token[] = [];
  // For each start/end marker, the index of its partner
  private partners: number[] = [];

  constructor(private readonly scope: Scope) {}

  /**
   * Parse a whole token stream. The outermost call may omit its
   * parentheses: `+ 1 2` and `(+ 1 2)` are the same program.
   */
  parse(tokens: Token[], origin: Location): Statement {
    this.tokens = tokens;
    this.partners = this.matchMarkers(tokens);

    if (tokens.length === 0) {
      throw this.emptyStatement(origin);
    }

    let from = 0;
    let to = tokens.length - 1;
    if (tokens[0].type === TokenType.START_STATEMENT && this.partners[0] === to) {
      from = 1;
      to -= 1;
    }
    return this.parseSpan(from, to, from <= to ? tokens[from].location : tokens[0].location);
  }

  private matchMarkers(tokens: Token[]): number[] {
    const partners = new Array<number>(tokens.length).fill(-1);
    const open: number[] = [];

    tokens.forEach((token, i) => {
      if (token.type === TokenType.START_STATEMENT) {
        open.push(i);
      } else if (token.type === TokenType.END_STATEMENT) {
        const start = open.pop();
        if (start === undefined) {
          throw sprigError(token.location, 'Unmatched closing parentheses!', 'Delete it.');
        }
        partners[start] = i;
        partners[i] = start;
      }
    });

    const unclosed = open.pop();
    if (unclosed !== undefined) {
      throw sprigError(tokens[unclosed].location, 'Unmatched opening parentheses!', 'Delete it, or add a matching `)`.');
    }
    return partners;
  }

  /** Parse tokens[from..to] (inclusive) as one statement. */
  private parseSpan(from: number, to: number, start: Location): Statement {
    if (from > to) {
      throw this.emptyStatement(start);
    }

    const collected: Collected[] = [];
    let status = ParserStatus.ARGUMENTS;
    let letLocation = start;

    for (let i = from; i <= to; i++) {
      const token = this.tokens[i];

      if (status === ParserStatus.BINDINGS) {
        if (token.type !== TokenType.START_STATEMENT) {
          throw this.missingBindings(letLocation);
        }
        const close = this.partners[i];
        processBindings(this.tokens.slice(i + 1, close), this.scope);
        status = ParserStatus.ARGUMENTS;
        i = close;
        continue;
      }

      switch (token.type) {
        case TokenType.START_STATEMENT: {
          const close = this.partners[i];
          const inner = this.parseSpan(i + 1, close - 1, i + 1 < close ? this.tokens[i + 1].location : token.location);
          collected.push({ value: Var.of(sprigStatement(inner)), location: token.location });
          i = close;
          break;
        }
        case TokenType.END_STATEMENT:
          throw new InternalError('Reached an end marker that has no partner in this statement.');
        case TokenType.KEYWORD:
          if (token.keyword === Keyword.LAMBDA) {
            throw sprigError(token.location, '`lambda` is not implemented yet!', 'Functions can only be defined by the host program for now.');
          }
          status = ParserStatus.BINDINGS;
          letLocation = token.location;
          break;
        case TokenType.LITERAL:
          collected.push({ value: Var.of({ ...token.value }), location: token.location });
          break;
        case TokenType.IDENTIFIER: {
          const bound = this.scope.get(token.name);
          if (!bound) {
            throw sprigError(token.location, `Unknown identifier \`${token.name}\`!`);
          }
          collected.push({ value: bound.newRef(), location: token.location });
          break;
        }
      }
    }

    if (status === ParserStatus.BINDINGS) {
      throw this.missingBindings(letLocation);
    }
    return this.finish(collected, start);
  }

  /**
   * A callable first value makes a call; a lone nested statement stands
   * for itself; anything else would be a list literal, which the language
   * does not have.
   */
  private finish(collected: Collected[], start: Location): Statement {
    const [first, ...rest] = collected;
    if (first && first.value.isCallable()) {
      return new Statement(first.value, rest.map(c => c.value), first.location);
    }
    if (first && rest.length === 0) {
      const value = first.value.get();
      if (value.kind === 'statement') {
        return value.statement;
      }
    }
    throw new SprigError(
      new Diagnostics()
        .error(start, 'Raw lists are not available (Yet...)!')
        .note(null, first ? 'This is not a function.' : 'There is nothing to call here.'),
    );
  }

  private emptyStatement(at: Location): SprigError {
    return sprigError(at, 'Empty statements are not allowed!', 'Write something to call, such as `(+ 1 2)`.');
  }

  private missingBindings(at: Location): SprigError {
    return sprigError(at, '`let` must be followed by a list of bindings!', 'Write the bindings as `((name value) ...)`.');
  }
}
