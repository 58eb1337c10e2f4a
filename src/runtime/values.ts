/**
 * Runtime value types for the sprig language.
 * Every handle (see `Var`) holds exactly one SprigValue.
 */

import { Statement } from '../parser/ast';
import { Callable } from './callable';
import { Var } from './var';

export type SprigValue =
  | SprigInteger
  | SprigFloat
  | SprigString
  | SprigNil
  | SprigList
  | SprigFunc
  | SprigStatement
  | SprigAlias;

/** Values a token can spell directly. */
export type SprigLiteral = SprigInteger | SprigFloat | SprigString | SprigNil;

/** A signed 64-bit integer. */
export interface SprigInteger {
  kind: 'integer';
  value: bigint;
}

export interface SprigFloat {
  kind: 'float';
  value: number;
}

export interface SprigString {
  kind: 'string';
  value: string;
}

export interface SprigNil {
  kind: 'nil';
}

export interface SprigList {
  kind: 'list';
  elements: Var[];
}

export interface SprigFunc {
  kind: 'func';
  callable: Callable;
}

/** An unevaluated nested expression. */
export interface SprigStatement {
  kind: 'statement';
  statement: Statement;
}

/**
 * A slot that stands in for another handle. Parameter slots of user
 * functions hold one of these while a call is running.
 */
export interface SprigAlias {
  kind: 'alias';
  target: Var;
}

export const INTEGER_MIN = -(2n ** 63n);
export const INTEGER_MAX = 2n ** 63n - 1n;

/** Two floats closer than this compare equal. */
export const FLOAT_EPSILON = 0.001;

// ─── Constructors ────────────────────────────────────

export function sprigInteger(value: bigint): SprigInteger {
  return { kind: 'integer', value };
}

export function sprigFloat(value: number): SprigFloat {
  return { kind: 'float', value };
}

export function sprigString(value: string): SprigString {
  return { kind: 'string', value };
}

export function sprigNil(): SprigNil {
  return { kind: 'nil' };
}

export function sprigList(elements: Var[]): SprigList {
  return { kind: 'list', elements };
}

export function sprigFunc(callable: Callable): SprigFunc {
  return { kind: 'func', callable };
}

export function sprigStatement(statement: Statement): SprigStatement {
  return { kind: 'statement', statement };
}

export function sprigAlias(target: Var): SprigAlias {
  return { kind: 'alias', target };
}

// ─── Utilities ───────────────────────────────────────

export function typeName(value: SprigValue): string {
  switch (value.kind) {
    case 'integer': return 'Integer';
    case 'float': return 'Float';
    case 'string': return 'String';
    case 'nil': return 'Nil';
    case 'list': return 'List';
    case 'func': return 'Function';
    case 'statement': return 'Statement';
    case 'alias': return typeName(value.target.get());
  }
}

/**
 * Display form of a value. A statement shows its cached result once it
 * has been resolved; this never evaluates anything.
 */
export function valueToString(value: SprigValue): string {
  switch (value.kind) {
    case 'integer': return String(value.value);
    case 'float': return String(value.value);
    case 'string': return value.value;
    case 'nil': return 'nil';
    case 'list': return '(' + value.elements.map(e => valueToString(e.get())).join(' ') + ')';
    case 'func': return '<Function>';
    case 'statement': {
      const result = value.statement.result;
      return result ? valueToString(result.get()) : '<Statement>';
    }
    case 'alias': return valueToString(value.target.get());
  }
}

export function valuesEqual(a: SprigValue, b: SprigValue): boolean {
  if (a.kind === 'alias') return valuesEqual(a.target.get(), b);
  if (b.kind === 'alias') return valuesEqual(a, b.target.get());

  switch (a.kind) {
    case 'integer': return b.kind === 'integer' && a.value === b.value;
    case 'float': return b.kind === 'float' && Math.abs(a.value - b.value) < FLOAT_EPSILON;
    case 'string': return b.kind === 'string' && a.value === b.value;
    case 'nil': return b.kind === 'nil';
    case 'list':
      return b.kind === 'list' &&
        a.elements.length === b.elements.length &&
        a.elements.every((element, i) => valuesEqual(element.get(), b.elements[i].get()));
    case 'func': return false;
    case 'statement': return b.kind === 'statement' && a.statement === b.statement;
  }
}
