// src/utils/errors.ts

export type ArithmeticErrorCode =
  | 'MALFORMED_LITERAL'
  | 'DIVISION_BY_ZERO'
  | 'NON_FINITE_NUMBER'
  | 'NOT_COMPARABLE'
  | 'INVALID_OPERAND'
  | 'INVALID_PLACES';

export class ArithmeticError extends Error {
  readonly code: ArithmeticErrorCode;
  constructor(code: ArithmeticErrorCode, message: string) {
    super(message);
    this.name = 'ArithmeticError';
    this.code = code;
  }
}

/** Text that is not a plain decimal literal (`[+-]digits[.digits][e[+-]digits]`). */
export class MalformedLiteralError extends ArithmeticError {
  readonly literal: string;
  constructor(literal: string) {
    super('MALFORMED_LITERAL', `Malformed decimal literal: ${JSON.stringify(literal)}`);
    this.name = 'MalformedLiteralError';
    this.literal = literal;
  }
}

export class DivisionByZeroError extends ArithmeticError {
  readonly dividend: string;
  constructor(dividend: string) {
    super('DIVISION_BY_ZERO', `Division by zero: ${dividend} / 0`);
    this.name = 'DivisionByZeroError';
    this.dividend = dividend;
  }
}

export class NonFiniteNumberError extends ArithmeticError {
  readonly value: number;
  constructor(value: number) {
    super('NON_FINITE_NUMBER', `Cannot promote non-finite number ${String(value)} to decimal`);
    this.name = 'NonFiniteNumberError';
    this.value = value;
  }
}

export class NotComparableError extends ArithmeticError {
  constructor(left: string, right: string) {
    super('NOT_COMPARABLE', `Cannot order ${left} and ${right}`);
    this.name = 'NotComparableError';
  }
}

// Only reachable from untyped callers
export class InvalidOperandError extends ArithmeticError {
  constructor(value: unknown) {
    super('INVALID_OPERAND', `Expected number, bigint or Decimal, got ${typeof value}`);
    this.name = 'InvalidOperandError';
  }
}

export class InvalidPlacesError extends ArithmeticError {
  readonly places: number;
  constructor(places: number) {
    super('INVALID_PLACES', `Decimal places must be an integer in 0..1e9, got ${String(places)}`);
    this.name = 'InvalidPlacesError';
    this.places = places;
  }
}

export class ConfigError extends Error {
  readonly issues: string[];
  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function normalizeError(err: unknown) {
  if (err instanceof Error) {
    return {
      name: err.name || 'Error',
      message: err.message || 'unknown',
    };
  }
  return {
    name: typeof err,
    message: String(err),
  };
}
