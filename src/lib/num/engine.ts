/**
 * Decimal engine: the adapter over decimal.js that every decimal-side
 * operation goes through
 *
 * Each engine owns an isolated `Decimal.clone(...)`, so its precision and
 * rounding never leak into (or pick up changes from) the global decimal.js
 * constructor. The adapter turns decimal.js's silent special values into
 * errors: a zero divisor raises DivisionByZeroError instead of yielding
 * Infinity/NaN, and literals are restricted to plain decimal notation.
 */

import { Decimal } from 'decimal.js';
import { loadConfig, parseDecimalSettings, type DecimalSettings, type RoundingName } from '../../config/index.js';
import { log } from '../../log.js';
import {
  DivisionByZeroError,
  InvalidPlacesError,
  MalformedLiteralError,
  NonFiniteNumberError,
  NotComparableError,
  normalizeError,
} from '../../utils/errors.js';
import type { DecimalValue, Ordering } from './operand.js';

const ROUNDING_MODES: Record<RoundingName, Decimal.Rounding> = {
  up: Decimal.ROUND_UP,
  down: Decimal.ROUND_DOWN,
  ceil: Decimal.ROUND_CEIL,
  floor: Decimal.ROUND_FLOOR,
  half_up: Decimal.ROUND_HALF_UP,
  half_down: Decimal.ROUND_HALF_DOWN,
  half_even: Decimal.ROUND_HALF_EVEN,
  half_ceil: Decimal.ROUND_HALF_CEIL,
  half_floor: Decimal.ROUND_HALF_FLOOR,
};

// decimal.js caps decimal places at 1e9
const MAX_PLACES = 1e9;

// [sign] digits [.digits] [e/E [sign] digits]
const LITERAL = /^[+-]?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?$/;

export interface DecimalEngine {
  readonly precision: number;
  readonly rounding: RoundingName;
  /** Parse a literal, or promote a native number through its textual form */
  construct(input: string | number | bigint): DecimalValue;
  add(a: DecimalValue, b: DecimalValue): DecimalValue;
  sub(a: DecimalValue, b: DecimalValue): DecimalValue;
  mul(a: DecimalValue, b: DecimalValue): DecimalValue;
  div(a: DecimalValue, b: DecimalValue): DecimalValue;
  compare(a: DecimalValue, b: DecimalValue): Ordering;
  /** Numeric equality; scale is ignored ("1.50" equals "1.5") */
  valueEqual(a: DecimalValue, b: DecimalValue): boolean;
  /** Round to `places` fractional digits with the engine's rounding mode */
  round(value: DecimalValue, places: number): DecimalValue;
}

export type EngineOptions = Partial<DecimalSettings>;

export function createDecimalEngine(options: EngineOptions = {}): DecimalEngine {
  // Environment is only consulted for settings the caller left out
  const defaults = options.precision === undefined || options.rounding === undefined ? loadConfig() : undefined;
  const settings = parseDecimalSettings({
    precision: options.precision ?? defaults?.precision,
    rounding: options.rounding ?? defaults?.rounding,
  });
  const rounding = ROUNDING_MODES[settings.rounding];
  const D = Decimal.clone({ precision: settings.precision, rounding });
  const logger = log.child({ scope: 'decimal-engine' });

  logger.debug({ precision: settings.precision, rounding: settings.rounding }, 'decimal engine ready');

  function fail(err: Error): never {
    logger.debug({ error: normalizeError(err) }, 'decimal operation failed');
    throw err;
  }

  function construct(input: string | number | bigint): DecimalValue {
    if (typeof input === 'bigint') return new D(input.toString());
    if (typeof input === 'number') {
      if (!Number.isFinite(input)) return fail(new NonFiniteNumberError(input));
      // Whole numbers past 2^53 print rounded (2**60 -> "1152921504606847000"); take the exact binary value
      if (Number.isInteger(input) && !Number.isSafeInteger(input)) return new D(BigInt(input).toString());
      // String(x) is the shortest round-tripping rendering, so 0.1 stays 0.1
      return new D(String(input));
    }
    const text = input.trim();
    if (!LITERAL.test(text)) return fail(new MalformedLiteralError(input));
    return new D(text);
  }

  return {
    precision: settings.precision,
    rounding: settings.rounding,
    construct,
    add: (a, b) => D.add(a, b),
    sub: (a, b) => D.sub(a, b),
    mul: (a, b) => D.mul(a, b),
    div(a, b) {
      if (b.isZero()) return fail(new DivisionByZeroError(a.toString()));
      return D.div(a, b);
    },
    compare(a, b) {
      const c = a.comparedTo(b);
      if (c > 0) return 'greater';
      if (c < 0) return 'less';
      if (c === 0) return 'equal';
      // NaN on either side
      return fail(new NotComparableError(a.toString(), b.toString()));
    },
    valueEqual: (a, b) => a.equals(b),
    round(value, places) {
      if (!Number.isInteger(places) || places < 0 || places > MAX_PLACES) return fail(new InvalidPlacesError(places));
      return new D(value).toDecimalPlaces(places, rounding);
    },
  };
}
