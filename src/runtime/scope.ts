import { Location } from '../lexer/tokens';
import { IntrinsicOp, Intrinsic, OutputSink, consoleOutput } from './builtins';
import { Diagnostics } from './diagnostics';
import { SprigError } from './errors';
import { sprigFunc } from './values';
import { Var } from './var';

/**
 * The namespace identifiers resolve against while parsing.
 *
 * One scope serves a whole parse: `let` forms add to it in place and
 * nothing is ever removed. A name can be bound once; rebinding it is a
 * shadowing error.
 */
export class Scope {
  private bindings: Map<string, Var> = new Map();

  /** The bound handle itself (not an alias of it). */
  get(name: string): Var | undefined {
    return this.bindings.get(name);
  }

  has(name: string): boolean {
    return this.bindings.has(name);
  }

  insert(name: string, value: Var, location: Location): void {
    if (this.bindings.has(name)) {
      throw new SprigError(shadowingError(name, location));
    }
    this.bindings.set(name, value);
  }

  /** Bound names in sorted order. */
  names(): string[] {
    return Array.from(this.bindings.keys()).sort();
  }

  /**
   * A new scope holding aliases of every handle bound here. Bindings added
   * to the fork are not seen by this scope.
   */
  fork(): Scope {
    const fork = new Scope();
    for (const [name, value] of this.bindings) {
      fork.bindings.set(name, value.newRef());
    }
    return fork;
  }
}

export function shadowingError(name: string, location: Location): Diagnostics {
  return new Diagnostics()
    .error(location, 'Shadowing is not currently allowed!')
    .note(null, `\`${name}\` is already defined.`)
    .note(null, 'Change its name.');
}

/**
 * A fresh scope seeded with the intrinsics `print`, `+`, `-` and `*`.
 * `print` writes to `output`.
 */
export function createDefaultScope(output: OutputSink = consoleOutput): Scope {
  const scope = new Scope();
  const origin: Location = { filename: '<intrinsic>', line: 0, column: 0 };
  for (const op of [IntrinsicOp.PRINT, IntrinsicOp.ADD, IntrinsicOp.SUBTRACT, IntrinsicOp.MULTIPLY]) {
    scope.insert(op, Var.of(sprigFunc(new Intrinsic(op, output))), origin);
  }
  return scope;
}
