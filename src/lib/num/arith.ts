/**
 * Operator dispatch over mixed native/decimal operands
 *
 * Every binary operator resolves its operands the same way:
 * - both native: the host operator runs, result stays native
 * - both decimal: the engine primitive runs
 * - mixed: the native side is promoted, then the engine primitive runs
 *
 * Derived operators (notEqual, greaterOrEqual, lessOrEqual) are composed from
 * equal/greaterThan/lessThan and never evaluated on their own.
 */

import { InvalidOperandError, NotComparableError } from '../../utils/errors.js';
import { createDecimalEngine, type DecimalEngine } from './engine.js';
import {
  describeOperand,
  isDecimal,
  isNativeNumber,
  type DecimalValue,
  type NativeNumber,
  type Operand,
  type Ordering,
} from './operand.js';

/** Result type follows the operands: native stays native, any decimal makes it decimal */
export interface ArithmeticOperator {
  (a: number, b: number): number;
  (a: bigint, b: bigint): bigint;
  (a: DecimalValue, b: Operand): DecimalValue;
  (a: Operand, b: DecimalValue): DecimalValue;
  (a: Operand, b: Operand): Operand;
}

export type ComparisonOperator = (a: Operand, b: Operand) => boolean;

export interface Arithmetic {
  readonly engine: DecimalEngine;
  add: ArithmeticOperator;
  subtract: ArithmeticOperator;
  multiply: ArithmeticOperator;
  divide: ArithmeticOperator;
  equal: ComparisonOperator;
  notEqual: ComparisonOperator;
  greaterThan: ComparisonOperator;
  greaterOrEqual: ComparisonOperator;
  lessThan: ComparisonOperator;
  lessOrEqual: ComparisonOperator;
  compare(a: Operand, b: Operand): Ordering;
  /** Decimals pass through unchanged; native numbers convert exactly via their text form */
  promote(value: Operand): DecimalValue;
  round(value: Operand, places?: number): DecimalValue;
  decimalFrom(text: string): DecimalValue;
}

type NativeArithmetic = {
  number: (a: number, b: number) => number;
  bigint: (a: bigint, b: bigint) => bigint;
};

const NATIVE_ADD: NativeArithmetic = { number: (a, b) => a + b, bigint: (a, b) => a + b };
const NATIVE_SUB: NativeArithmetic = { number: (a, b) => a - b, bigint: (a, b) => a - b };
const NATIVE_MUL: NativeArithmetic = { number: (a, b) => a * b, bigint: (a, b) => a * b };
// bigint division truncates and throws RangeError on 0n, as the host does
const NATIVE_DIV: NativeArithmetic = { number: (a, b) => a / b, bigint: (a, b) => a / b };

function nativeArithmetic(ops: NativeArithmetic, a: NativeNumber, b: NativeNumber): NativeNumber {
  if (typeof a === 'number' && typeof b === 'number') return ops.number(a, b);
  if (typeof a === 'bigint' && typeof b === 'bigint') return ops.bigint(a, b);
  throw new TypeError('Cannot mix BigInt and other types, use explicit conversions');
}

export function createArithmetic(engine: DecimalEngine = createDecimalEngine()): Arithmetic {
  function promote(value: Operand): DecimalValue {
    if (isDecimal(value)) return value;
    if (isNativeNumber(value)) return engine.construct(value);
    throw new InvalidOperandError(value);
  }

  function operator(
    native: NativeArithmetic,
    decimal: (a: DecimalValue, b: DecimalValue) => DecimalValue,
  ): ArithmeticOperator {
    function operate(a: number, b: number): number;
    function operate(a: bigint, b: bigint): bigint;
    function operate(a: DecimalValue, b: Operand): DecimalValue;
    function operate(a: Operand, b: DecimalValue): DecimalValue;
    function operate(a: Operand, b: Operand): Operand;
    function operate(a: Operand, b: Operand): Operand {
      if (isNativeNumber(a) && isNativeNumber(b)) return nativeArithmetic(native, a, b);
      return decimal(promote(a), promote(b));
    }
    return operate;
  }

  function equal(a: Operand, b: Operand): boolean {
    // number and bigint compare by value: 1 == 1n
    if (isNativeNumber(a) && isNativeNumber(b)) return a == b;
    return engine.valueEqual(promote(a), promote(b));
  }

  function notEqual(a: Operand, b: Operand): boolean {
    return !equal(a, b);
  }

  function greaterThan(a: Operand, b: Operand): boolean {
    if (isNativeNumber(a) && isNativeNumber(b)) return a > b;
    return engine.compare(promote(a), promote(b)) === 'greater';
  }

  function lessThan(a: Operand, b: Operand): boolean {
    if (isNativeNumber(a) && isNativeNumber(b)) return a < b;
    return engine.compare(promote(a), promote(b)) === 'less';
  }

  function greaterOrEqual(a: Operand, b: Operand): boolean {
    return equal(a, b) || greaterThan(a, b);
  }

  function lessOrEqual(a: Operand, b: Operand): boolean {
    return equal(a, b) || lessThan(a, b);
  }

  function compare(a: Operand, b: Operand): Ordering {
    if (isNativeNumber(a) && isNativeNumber(b)) {
      if (a < b) return 'less';
      if (a > b) return 'greater';
      if (a == b) return 'equal';
      throw new NotComparableError(describeOperand(a), describeOperand(b));
    }
    return engine.compare(promote(a), promote(b));
  }

  return {
    engine,
    add: operator(NATIVE_ADD, engine.add),
    subtract: operator(NATIVE_SUB, engine.sub),
    multiply: operator(NATIVE_MUL, engine.mul),
    divide: operator(NATIVE_DIV, engine.div),
    equal,
    notEqual,
    greaterThan,
    greaterOrEqual,
    lessThan,
    lessOrEqual,
    compare,
    promote,
    round: (value, places = 0) => engine.round(promote(value), places),
    decimalFrom: (text) => engine.construct(text),
  };
}
