import { Location } from '../lexer/tokens';
import { Statement } from '../parser/ast';
import { Diagnostics } from './diagnostics';
import { SprigError, sprigError } from './errors';
import { sprigAlias } from './values';
import { Var } from './var';

/**
 * Anything that can be invoked with an ordered argument list and the
 * location of the call. Arguments arrive unresolved; a callable resolves
 * the ones it needs.
 */
export interface Callable {
  readonly name: string;
  call(args: readonly Var[], location: Location): Var;
  /** An independent copy, or null if this callable cannot be copied. */
  tryClone(): Callable | null;
}

/**
 * A function defined by the host program: fixed parameter handles and a
 * body statement that reads them.
 *
 * A call writes an alias of each argument into its parameter handle and
 * resolves the body afresh. The same handles serve every call, so a call
 * that re-enters the function while it runs is refused.
 */
export class UserFunction implements Callable {
  private running = false;

  constructor(
    public readonly name: string,
    private readonly params: readonly Var[],
    private readonly body: Statement,
  ) {}

  get arity(): number {
    return this.params.length;
  }

  call(args: readonly Var[], location: Location): Var {
    if (args.length < this.params.length) {
      throw sprigError(
        location,
        'Insufficient arguments provided!',
        `\`${this.name}\` takes ${this.params.length} argument(s) but was given ${args.length}.`,
      );
    }
    if (args.length > this.params.length) {
      throw new SprigError(
        new Diagnostics()
          .error(location, 'Too many arguments provided!')
          .note(null, `\`${this.name}\` takes ${this.params.length} argument(s) but was given ${args.length}.`)
          .note(location, 'Delete them.'),
      );
    }
    if (this.running) {
      throw sprigError(location, 'Re-entrant calls to user functions are not supported!');
    }

    args.forEach((arg, i) => this.params[i].set(sprigAlias(arg.newRef())));
    this.body.forget();
    this.running = true;
    try {
      return this.body.resolve();
    } finally {
      this.running = false;
    }
  }

  tryClone(): Callable | null {
    return null;
  }
}
