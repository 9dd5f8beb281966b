// Process-wide arithmetic scope, configured from the environment (see config/index.ts)

import { createArithmetic } from './arith.js';

export const arithmetic = createArithmetic();

export const {
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
} = arithmetic;
