/**
 * Mixed native/decimal arithmetic
 *
 * Operators accept any pair of number, bigint or decimal.js Decimal values and
 * pick native or exact decimal arithmetic per call
 */

export {
  add,
  subtract,
  multiply,
  divide,
  equal,
  notEqual,
  greaterThan,
  greaterOrEqual,
  lessThan,
  lessOrEqual,
  compare,
  promote,
  round,
  decimalFrom,
  arithmetic
} from './defaults.js';

export { createArithmetic } from './arith.js';

export type { Arithmetic, ArithmeticOperator, ComparisonOperator } from './arith.js';

export { createDecimalEngine } from './engine.js';

export type { DecimalEngine, EngineOptions } from './engine.js';

export { isDecimal, isNativeNumber, isOperand } from './operand.js';

export type { NativeNumber, DecimalValue, Operand, Ordering } from './operand.js';

export { m } from './literal.js';
