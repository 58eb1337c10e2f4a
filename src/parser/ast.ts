import { Location, formatLocation } from '../lexer/tokens';
import { valueToString } from '../runtime/values';
import { Var } from '../runtime/var';

/**
 * A parsed call: an operator handle (always holding a function, which the
 * parser checks), its argument handles, and a result slot.
 *
 * The result slot is written once, on the first successful `resolve()`.
 * Every later `resolve()` of the same object returns that same handle
 * without calling anything, so side effects run at most once. A user
 * function calls `forget()` on its body to evaluate it afresh.
 */
export class Statement {
  private cached: Var | null = null;

  constructor(
    public readonly operator: Var,
    public readonly args: readonly Var[],
    public readonly location: Location,
  ) {}

  get result(): Var | null {
    return this.cached;
  }

  resolve(): Var {
    if (this.cached) return this.cached;
    const result = this.operator.callable().call(this.args, this.location);
    this.cached = result;
    return result;
  }

  /** Clear the memoized results of this statement and the statements nested in it. */
  forget(): void {
    this.cached = null;
    for (const arg of this.args) {
      const value = arg.get();
      if (value.kind === 'statement') value.statement.forget();
    }
  }
}

/**
 * Indented dump of a statement tree, one node per line.
 */
export function describeStatement(statement: Statement, depth = 0): string {
  const pad = '  '.repeat(depth);
  const lines = [`${pad}(${statement.operator.callable().name}) @ ${formatLocation(statement.location)}`];
  for (const arg of statement.args) {
    lines.push(describeArgument(arg, depth + 1));
  }
  return lines.join('\n');
}

function describeArgument(arg: Var, depth: number): string {
  const value = arg.target().get();
  switch (value.kind) {
    case 'statement':
      return describeStatement(value.statement, depth);
    case 'string':
      return '  '.repeat(depth) + JSON.stringify(value.value);
    case 'func':
      return '  '.repeat(depth) + `<Function ${value.callable.name}>`;
    default:
      return '  '.repeat(depth) + valueToString(value);
  }
}
