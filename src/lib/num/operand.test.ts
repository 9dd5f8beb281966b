import { describe, test, expect } from '@jest/globals';
import { Decimal } from 'decimal.js';
import { describeOperand, isDecimal, isNativeNumber, isOperand } from './operand.js';

describe('operand guards', () => {
  const Clone = Decimal.clone({ precision: 5 });

  test('isOperand accepts every operand kind', () => {
    expect(isOperand(1.5)).toBe(true);
    expect(isOperand(-3n)).toBe(true);
    expect(isOperand(new Decimal('2.33'))).toBe(true);
    expect(isOperand(new Clone('2.33'))).toBe(true);
  });

  test('isOperand rejects everything else', () => {
    expect(isOperand('1.5')).toBe(false);
    expect(isOperand(null)).toBe(false);
    expect(isOperand(undefined)).toBe(false);
    expect(isOperand({ d: [1], e: 0, s: 1 })).toBe(false);
  });

  test('isNativeNumber and isDecimal split the kinds', () => {
    expect(isNativeNumber(NaN)).toBe(true);
    expect(isNativeNumber(new Decimal(1))).toBe(false);
    expect(isDecimal(new Clone(1))).toBe(true);
    expect(isDecimal(1)).toBe(false);
  });

  test('describeOperand marks bigints', () => {
    expect(describeOperand(5n)).toBe('5n');
    expect(describeOperand(0.5)).toBe('0.5');
    expect(describeOperand(new Decimal('1.50'))).toBe('1.5');
  });
});
