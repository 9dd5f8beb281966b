import { describe, test, expect } from '@jest/globals';
import { m } from './literal.js';
import { add, equal, multiply, round } from './defaults.js';
import { MalformedLiteralError } from '../../utils/errors.js';

describe('m literal', () => {
  test('parses the template text', () => {
    expect(m`89.01`.toString()).toBe('89.01');
  });

  test('splices interpolations before parsing', () => {
    const units = 12;
    const cents = '05';
    expect(m`${units}.${cents}`.toString()).toBe('12.05');
    expect(m`${7n}`.toString()).toBe('7');
  });

  test('malformed template text fails', () => {
    expect(() => m`12x.3`).toThrow(MalformedLiteralError);
  });

  test('works with the default operators', () => {
    expect(equal(add(3, m`2.33`), m`5.33`)).toBe(true);
    const gross = round(multiply(m`34.78`, 1 + 23 / 100), 2);
    expect(gross.toString()).toBe('42.78');
  });
});
