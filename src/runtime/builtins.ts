/**
 * Intrinsic callables bound in every default scope.
 */

import { Location } from '../lexer/tokens';
import { Callable } from './callable';
import { Diagnostics } from './diagnostics';
import { SprigError, sprigError } from './errors';
import { INTEGER_MAX, INTEGER_MIN, sprigInteger, typeName, valueToString } from './values';
import { Var } from './var';

export enum IntrinsicOp {
  PRINT = 'print',
  ADD = '+',
  SUBTRACT = '-',
  MULTIPLY = '*',
}

/** Where `print` writes. */
export type OutputSink = (text: string) => void;

export const consoleOutput: OutputSink = (text) => console.log(text);

type ArithmeticOp = Exclude<IntrinsicOp, IntrinsicOp.PRINT>;

const ARITHMETIC: Record<ArithmeticOp, { noun: string; apply: (lhs: bigint, rhs: bigint) => bigint }> = {
  [IntrinsicOp.ADD]: { noun: 'Addition', apply: (lhs, rhs) => lhs + rhs },
  [IntrinsicOp.SUBTRACT]: { noun: 'Subtraction', apply: (lhs, rhs) => lhs - rhs },
  [IntrinsicOp.MULTIPLY]: { noun: 'Multiplication', apply: (lhs, rhs) => lhs * rhs },
};

export class Intrinsic implements Callable {
  constructor(
    public readonly op: IntrinsicOp,
    private readonly output: OutputSink = consoleOutput,
  ) {}

  get name(): string {
    return this.op;
  }

  call(args: readonly Var[], location: Location): Var {
    if (this.op === IntrinsicOp.PRINT) {
      return this.print(args, location);
    }
    return this.arithmetic(this.op, args, location);
  }

  tryClone(): Callable | null {
    return new Intrinsic(this.op, this.output);
  }

  private print(args: readonly Var[], location: Location): Var {
    if (args.length !== 1) {
      throw sprigError(location, 'Print intrinsic requires only one argument!', 'Try wrapping this in a statement with `$`.');
    }
    this.output(valueToString(args[0].resolve().get()));
    return Var.of(sprigInteger(0n));
  }

  private arithmetic(op: ArithmeticOp, args: readonly Var[], location: Location): Var {
    const { noun, apply } = ARITHMETIC[op];
    if (args.length < 2) {
      throw sprigError(location, `${noun} requires at least two arguments!`, `\`${op}\` was given ${args.length}.`);
    }

    let total = 0n;
    args.forEach((arg, i) => {
      const operand = this.integerOperand(op, arg, location);
      total = i === 0 ? operand : apply(total, operand);
      if (total < INTEGER_MIN || total > INTEGER_MAX) {
        throw sprigError(location, `Integer overflow in ${noun.toLowerCase()}!`);
      }
    });
    return Var.of(sprigInteger(total));
  }

  private integerOperand(op: ArithmeticOp, arg: Var, location: Location): bigint {
    const value = arg.resolve().target().get();
    if (value.kind !== 'integer') {
      throw new SprigError(
        new Diagnostics()
          .error(location, `Incompatible types for \`${op}\`: expected Integer, found ${typeName(value)} \`${valueToString(value)}\`!`)
          .note(null, `\`${op}\` only works on integers.`),
      );
    }
    return value.value;
  }
}
