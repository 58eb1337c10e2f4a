export { Lexer } from './lexer/lexer';
export {
  Token,
  TokenType,
  Keyword,
  KEYWORDS,
  Location,
  location,
  formatLocation,
  describeToken,
} from './lexer/tokens';
export { Parser } from './parser/parser';
export { Statement, describeStatement } from './parser/ast';
export { processBindings } from './parser/bindings';
export { Interpreter, InterpreterOptions, InterpretResult } from './runtime/interpreter';
export { Scope, createDefaultScope, shadowingError } from './runtime/scope';
export { Var } from './runtime/var';
export {
  SprigValue,
  SprigLiteral,
  SprigInteger,
  SprigFloat,
  SprigString,
  SprigNil,
  SprigList,
  SprigFunc,
  SprigStatement,
  SprigAlias,
  FLOAT_EPSILON,
  sprigInteger,
  sprigFloat,
  sprigString,
  sprigNil,
  sprigList,
  sprigFunc,
  sprigStatement,
  sprigAlias,
  typeName,
  valueToString,
  valuesEqual,
} from './runtime/values';
export { Callable, UserFunction } from './runtime/callable';
export { Intrinsic, IntrinsicOp, OutputSink, consoleOutput } from './runtime/builtins';
export { Diagnostics, DiagnosticEntry } from './runtime/diagnostics';
export { SprigError, InternalError, sprigError } from './runtime/errors';
export { SprigConfig, loadConfig, loadConfigForScript, traceEnabled } from './runtime/config';
export { ReplSession, ReplResponse, ReplOptions, startRepl, hasOpenStatements } from './repl';

import { Interpreter, InterpreterOptions, InterpretResult } from './runtime/interpreter';
import { SprigValue } from './runtime/values';

/**
 * Run a sprig source string in a fresh interpreter, reporting failures
 * as a value.
 */
export function interpret(
  source: string,
  sourceName = '<provided>',
  options?: InterpreterOptions,
): InterpretResult {
  return new Interpreter(options).interpret(source, sourceName);
}

/**
 * Run a sprig source string in a fresh interpreter. Throws SprigError on
 * failure.
 */
export function execute(
  source: string,
  sourceName = '<provided>',
  options?: InterpreterOptions,
): SprigValue {
  return new Interpreter(options).run(source, sourceName).get();
}
