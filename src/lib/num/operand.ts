/**
 * Operand kinds accepted by the arithmetic dispatcher
 *
 * - NativeNumber: host numbers. `number` is the floating kind, `bigint` the integer kind
 * - DecimalValue: an immutable decimal.js `Decimal`, from any constructor clone
 */

import { Decimal } from 'decimal.js';

export type NativeNumber = number | bigint;

export type DecimalValue = Decimal;

export type Operand = NativeNumber | DecimalValue;

/** Three-way comparison result */
export type Ordering = 'greater' | 'equal' | 'less';

export function isNativeNumber(value: unknown): value is NativeNumber {
  return typeof value === 'number' || typeof value === 'bigint';
}

// Decimal.isDecimal checks the shared tag, so instances of clones pass too
export function isDecimal(value: unknown): value is DecimalValue {
  return Decimal.isDecimal(value);
}

export function isOperand(value: unknown): value is Operand {
  return isNativeNumber(value) || isDecimal(value);
}

export function describeOperand(value: Operand): string {
  return typeof value === 'bigint' ? `${value.toString()}n` : value.toString();
}
