import { describe, test, expect, afterEach } from '@jest/globals';
import { loadConfig, parseDecimalSettings, resetConfigCache } from '../index.js';
import { ConfigError } from '../../utils/errors.js';

describe('loadConfig', () => {
  afterEach(() => {
    resetConfigCache();
  });

  test('defaults', () => {
    expect(loadConfig({})).toEqual({
      precision: 28,
      rounding: 'half_up',
      logLevel: 'info',
      logPretty: false,
    });
  });

  test('reads decimal settings', () => {
    const cfg = loadConfig({ DECIMAL_PRECISION: '40', DECIMAL_ROUNDING: ' HALF_EVEN ' });
    expect(cfg.precision).toBe(40);
    expect(cfg.rounding).toBe('half_even');
  });

  test('logging is silent under test unless asked', () => {
    expect(loadConfig({ NODE_ENV: 'test' }).logLevel).toBe('silent');
    expect(loadConfig({ NODE_ENV: 'test', LOG_LEVEL: 'Debug' }).logLevel).toBe('debug');
  });

  test('LOG_PRETTY flag', () => {
    expect(loadConfig({ LOG_PRETTY: '1' }).logPretty).toBe(true);
    expect(loadConfig({ LOG_PRETTY: 'false' }).logPretty).toBe(false);
  });

  test('blank variables fall back to defaults', () => {
    expect(loadConfig({ DECIMAL_PRECISION: '  ' }).precision).toBe(28);
  });

  test('invalid values raise ConfigError naming the variable', () => {
    expect(() => loadConfig({ DECIMAL_PRECISION: 'abc' })).toThrow(ConfigError);
    try {
      loadConfig({ DECIMAL_PRECISION: '0', DECIMAL_ROUNDING: 'nearest' });
      throw new Error('expected failure');
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.issues).toHaveLength(2);
        expect(err.issues[0]).toMatch(/^DECIMAL_PRECISION: /);
        expect(err.issues[1]).toMatch(/^DECIMAL_ROUNDING: /);
      }
    }
  });

  test('process environment is cached until reset', () => {
    const first = loadConfig();
    expect(loadConfig()).toBe(first);
    resetConfigCache();
    expect(loadConfig()).not.toBe(first);
  });
});

describe('parseDecimalSettings', () => {
  test('accepts valid settings', () => {
    expect(parseDecimalSettings({ precision: 10, rounding: 'floor' })).toEqual({ precision: 10, rounding: 'floor' });
  });

  test('rejects unknown keys', () => {
    expect(() => parseDecimalSettings({ precision: 10, rounding: 'floor', scale: 2 })).toThrow(ConfigError);
  });
});
