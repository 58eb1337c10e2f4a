import { Callable } from './callable';
import { InternalError } from './errors';
import { SprigValue, sprigList, sprigNil, valueToString } from './values';

interface Cell {
  value: SprigValue;
}

/**
 * A shared, mutable handle onto one runtime value.
 *
 * Handles made with `newRef()` alias the same cell: a `set()` through any
 * of them is seen by all of them. `maybeClone()` is the only way to get an
 * independent copy.
 */
export class Var {
  private constructor(private readonly cell: Cell) {}

  static of(value: SprigValue): Var {
    return new Var({ value });
  }

  static nil(): Var {
    return Var.of(sprigNil());
  }

  /** A second handle onto this cell. Aliases; copies nothing. */
  newRef(): Var {
    return new Var(this.cell);
  }

  /**
   * A handle onto a fresh cell holding a copy of this value. Plain data is
   * copied, lists element by element, aliases copy their target. Callables
   * are copied only if they support it.
   */
  maybeClone(): Var {
    const value = this.cell.value;
    switch (value.kind) {
      case 'integer':
      case 'float':
      case 'string':
      case 'nil':
        return Var.of({ ...value });
      case 'list':
        return Var.of(sprigList(value.elements.map(e => e.maybeClone())));
      case 'alias':
        return value.target.maybeClone();
      case 'func': {
        const copy = value.callable.tryClone();
        if (!copy) {
          throw new InternalError(`Tried to clone the function \`${value.callable.name}\`, which cannot be copied!`);
        }
        return Var.of({ kind: 'func', callable: copy });
      }
      case 'statement':
        throw new InternalError('Tried to clone an unresolved statement!');
    }
  }

  get(): SprigValue {
    return this.cell.value;
  }

  set(value: SprigValue): void {
    this.cell.value = value;
  }

  /** Whether both handles point at the same cell. */
  aliases(other: Var): boolean {
    return this.cell === other.cell;
  }

  /** The handle this one ultimately stands for, following aliases. */
  target(): Var {
    const value = this.cell.value;
    return value.kind === 'alias' ? value.target.target() : this;
  }

  /**
   * Force this handle to a concrete value. Statements are evaluated (and
   * memoized by the statement); anything else resolves to itself.
   */
  resolve(): Var {
    const value = this.cell.value;
    switch (value.kind) {
      case 'alias': return value.target.resolve();
      case 'statement': return value.statement.resolve();
      default: return this;
    }
  }

  isCallable(): boolean {
    return this.target().get().kind === 'func';
  }

  /** The callable held here. Only valid where the parser guaranteed one. */
  callable(): Callable {
    const value = this.target().get();
    if (value.kind !== 'func') {
      throw new InternalError(`Expected a function but found \`${valueToString(value)}\`!`);
    }
    return value.callable;
  }

  toString(): string {
    return valueToString(this.cell.value);
  }
}
