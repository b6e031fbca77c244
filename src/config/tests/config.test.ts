import { afterEach, describe, expect, test } from '@jest/globals';
import path from 'node:path';
import { ConfigError } from '../../util/errors.js';
import { getConfig, loadConfig, resetConfigCache } from '../index.js';

describe('config', () => {
  test('defaults', () => {
    expect(loadConfig({})).toEqual({
      limits: { min_bet: 5, max_bet: 500 },
      cardStyle: 'text',
      logLevel: 'info',
      logFile: path.resolve('logs', 'blackjack.ndjson'),
    });
  });

  test('reads overrides from the environment', () => {
    const cfg = loadConfig({ BLACKJACK_MIN_BET: '10', BLACKJACK_MAX_BET: '100', CARD_STYLE: 'unicode', LOG_LEVEL: 'debug' });
    expect(cfg.limits).toEqual({ min_bet: 10, max_bet: 100 });
    expect(cfg.cardStyle).toBe('unicode');
    expect(cfg.logLevel).toBe('debug');
  });

  test('blank values fall back to defaults', () => {
    expect(loadConfig({ BLACKJACK_MIN_BET: ' ' }).limits.min_bet).toBe(5);
  });

  test('minimum above maximum is rejected', () => {
    expect(() => loadConfig({ BLACKJACK_MIN_BET: '600' })).toThrow(ConfigError);
    try {
      loadConfig({ BLACKJACK_MIN_BET: '600' });
    } catch (e) {
      expect(e instanceof ConfigError && e.issues).toEqual([
        'BLACKJACK_MIN_BET: BLACKJACK_MIN_BET must not exceed BLACKJACK_MAX_BET',
      ]);
    }
  });

  test('non-numeric and unknown values are rejected', () => {
    expect(() => loadConfig({ BLACKJACK_MAX_BET: 'lots' })).toThrow(ConfigError);
    expect(() => loadConfig({ BLACKJACK_MIN_BET: '2.5' })).toThrow(ConfigError);
    expect(() => loadConfig({ CARD_STYLE: 'ascii' })).toThrow(ConfigError);
  });

  describe('getConfig', () => {
    afterEach(() => {
      delete process.env.BLACKJACK_MIN_BET;
      resetConfigCache();
    });

    test('reads the environment once until the cache is reset', () => {
      process.env.BLACKJACK_MIN_BET = '10';
      resetConfigCache();
      const first = getConfig();
      expect(first.limits.min_bet).toBe(10);

      process.env.BLACKJACK_MIN_BET = '25';
      expect(getConfig()).toBe(first);

      resetConfigCache();
      expect(getConfig().limits.min_bet).toBe(25);
    });
  });
});
