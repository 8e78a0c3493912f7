/**
 * Unit Tests for Logger Level Resolution
 */

import { describe, test, expect, jest, afterEach } from '@jest/globals';
import { resolveLogLevel } from '../../../server/config/logger';
import { Environment } from '../../../server/types/environment';

describe('resolveLogLevel', () => {
  test('should keep a valid LOG_LEVEL', () => {
    expect(resolveLogLevel('warn', Environment.Production)).toBe('warn');
    expect(resolveLogLevel('silent', Environment.Development)).toBe('silent');
  });

  test('should fall back to the environment default for an unknown level', () => {
    expect(resolveLogLevel('verbose', Environment.Test)).toBe('error');
    expect(resolveLogLevel('verbose', Environment.Production)).toBe('info');
    expect(resolveLogLevel('verbose', Environment.Development)).toBe('debug');
  });

  test('should fall back when LOG_LEVEL is unset or blank', () => {
    expect(resolveLogLevel(undefined, Environment.Production)).toBe('info');
    expect(resolveLogLevel('', Environment.Test)).toBe('error');
  });
});

describe('logger', () => {
  const originalLevel = process.env.LOG_LEVEL;

  afterEach(() => {
    process.env.LOG_LEVEL = originalLevel;
  });

  test('should load with an unknown LOG_LEVEL and use the test default', async () => {
    process.env.LOG_LEVEL = 'verbose';

    await jest.isolateModulesAsync(async () => {
      const { logger } = await import('../../../server/config/logger');
      expect(logger.level).toBe('error');
    });
  });
});
