/**
 * Decimal literal shorthand
 *
 *   m`98.01`          -> decimalFrom('98.01')
 *   m`${units}.${cents}` -> interpolations are spliced in as text, then parsed
 */

import type { DecimalValue, NativeNumber } from './operand.js';
import { decimalFrom } from './defaults.js';

export function m(strings: TemplateStringsArray, ...values: Array<string | NativeNumber>): DecimalValue {
  let text = strings[0] ?? '';
  values.forEach((value, i) => {
    text += String(value) + (strings[i + 1] ?? '');
  });
  return decimalFrom(text);
}
