import { Lexer } from '../lexer/lexer';
import { Location, Token, formatLocation, location } from '../lexer/tokens';
import { Statement } from '../parser/ast';
import { Parser } from '../parser/parser';
import { OutputSink, consoleOutput } from './builtins';
import { UserFunction } from './callable';
import { Diagnostics } from './diagnostics';
import { SprigError, sprigError } from './errors';
import { Scope, createDefaultScope } from './scope';
import { SprigValue, sprigFunc, valueToString } from './values';
import { Var } from './var';

export interface InterpreterOptions {
  /** Where `print` writes. Defaults to console.log. */
  output?: OutputSink;
  trace?: boolean;
}

export type InterpretResult =
  | { ok: true; value: SprigValue; text: string }
  | { ok: false; diagnostics: Diagnostics; text: string };

/**
 * Runs sprig source through lexer, parser and evaluator against one
 * persistent scope.
 */
export class Interpreter {
  private scope: Scope;
  private readonly output: OutputSink;
  private traceEnabled: boolean;
  private traceLog: string[] = [];
  private startTime = Date.now();

  constructor(options: InterpreterOptions = {}) {
    this.output = options.output ?? consoleOutput;
    this.traceEnabled = options.trace ?? false;
    this.scope = createDefaultScope(this.output);
  }

  getScope(): Scope {
    return this.scope;
  }

  /** Replace the scope with a fresh default one. */
  reset(): void {
    this.scope = createDefaultScope(this.output);
    this.trace('Scope reset.');
  }

  setTrace(enabled: boolean): void {
    this.traceEnabled = enabled;
  }

  isTracing(): boolean {
    return this.traceEnabled;
  }

  getTraceLog(): readonly string[] {
    return this.traceLog;
  }

  tokenize(source: string, sourceName: string): Token[] {
    const tokens = new Lexer(source, sourceName).tokenize();
    this.trace(`Tokenized ${sourceName}: ${tokens.length} token(s).`);
    return tokens;
  }

  parse(source: string, sourceName: string): Statement {
    const tokens = this.tokenize(source, sourceName);
    const statement = this.guardDepth(sourceName, () => new Parser(this.scope).parse(tokens, origin(sourceName)));
    this.trace(`Parsed statement at ${formatLocation(statement.location)}.`);
    return statement;
  }

  /** Resolve a parsed statement to a concrete value handle. */
  evaluate(statement: Statement): Var {
    const name = statement.location.filename;
    const result = this.guardDepth(name, () => statement.resolve());
    this.trace(`Resolved ${formatLocation(statement.location)} to ${valueToString(result.get())}.`);
    return result;
  }

  /**
   * Lex, parse and evaluate. Throws SprigError on any user-facing failure.
   */
  run(source: string, sourceName = '<provided>'): Var {
    this.startTime = Date.now();
    return this.evaluate(this.parse(source, sourceName));
  }

  /**
   * Like run(), but reports failures as a value: `text` is either the
   * display form of the result or the rendered diagnostics.
   */
  interpret(source: string, sourceName = '<provided>'): InterpretResult {
    try {
      const value = this.run(source, sourceName).get();
      return { ok: true, value, text: valueToString(value) };
    } catch (e) {
      if (e instanceof SprigError) {
        this.trace(`Failed with ${e.diagnostics.size} diagnostic(s).`);
        return { ok: false, diagnostics: e.diagnostics, text: e.diagnostics.render() };
      }
      throw e;
    }
  }

  /** Bind a host value under `name`. */
  define(name: string, value: SprigValue): Var {
    const handle = Var.of(value);
    this.scope.insert(name, handle, origin('<host>'));
    return handle;
  }

  /**
   * Define a user function. The parameters are bound only while `body` is
   * parsed, in a private copy of the current scope, so they do not leak
   * into the shared namespace.
   */
  defineFunction(name: string, params: string[], body: string): UserFunction {
    const sourceName = `<function ${name}>`;
    const privateScope = this.scope.fork();
    const handles = params.map(param => {
      const handle = Var.nil();
      privateScope.insert(param, handle, origin(sourceName));
      return handle;
    });
    const tokens = this.tokenize(body, sourceName);
    const statement = new Parser(privateScope).parse(tokens, origin(sourceName));
    const fn = new UserFunction(name, handles, statement);
    this.define(name, sprigFunc(fn));
    this.trace(`Defined function ${name}/${params.length}.`);
    return fn;
  }

  private guardDepth<T>(sourceName: string, work: () => T): T {
    try {
      return work();
    } catch (e) {
      if (e instanceof RangeError) {
        throw sprigError(origin(sourceName), 'Expression is nested too deeply!', 'Reduce how deeply this expression is nested.');
      }
      throw e;
    }
  }

  private trace(message: string): void {
    this.traceLog.push(`[${Date.now() - this.startTime}ms] ${message}`);
    if (this.traceEnabled) {
      console.log(`  [trace] ${message}`);
    }
  }
}

function origin(sourceName: string): Location {
  return location(sourceName, 1, 1);
}
