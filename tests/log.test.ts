import { describe, it, expect } from '@jest/globals';
import { createLogger, log } from '../src/log.js';
import { loadConfig } from '../src/config/index.js';

describe('createLogger', () => {
  it('uses the configured level', () => {
    const logger = createLogger({ logLevel: 'debug', logPretty: false });
    expect(logger.level).toBe('debug');
    expect(logger.isLevelEnabled('debug')).toBe(true);
    expect(logger.isLevelEnabled('trace')).toBe(false);
  });

  it('shared logger follows the loaded config', () => {
    expect(log.level).toBe(loadConfig().logLevel);
  });
});
