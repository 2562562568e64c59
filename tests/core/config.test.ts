import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import {
  Table,
  configure,
  getConfig,
  getDefaultConfig,
  resetConfig,
} from '../../src';

describe('Table Configuration', () => {
  beforeEach(() => {
    resetConfig();
  });

  afterEach(() => {
    resetConfig();
    vi.restoreAllMocks();
  });

  describe('configure()', () => {
    test('updates the default policy', () => {
      configure({ defaultPolicy: 'strict' });
      expect(getConfig().defaultPolicy).toBe('strict');
    });

    test('partial updates preserve other settings', () => {
      configure({ echoWarnings: true });
      configure({ defaultPolicy: 'strict' });
      expect(getConfig()).toEqual({ defaultPolicy: 'strict', echoWarnings: true });
    });
  });

  describe('resetConfig()', () => {
    test('restores defaults', () => {
      configure({ defaultPolicy: 'strict', echoWarnings: true });
      resetConfig();
      expect(getConfig()).toEqual(getDefaultConfig());
    });
  });

  describe('getDefaultConfig()', () => {
    test('is legacy and quiet', () => {
      expect(getDefaultConfig()).toEqual({ defaultPolicy: 'legacy', echoWarnings: false });
    });
  });

  describe('echoWarnings', () => {
    test('warnings stay silent by default', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      Table.make({ a: [1] }, 'strict').col('b');
      expect(warn).not.toHaveBeenCalled();
    });

    test('mirrors a missing column warning to the console', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      configure({ echoWarnings: true });

      const result = Table.make({ a: [1] }, 'strict').col('b');

      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn).toHaveBeenCalledWith(result.warning?.format());
    });

    test('mirrors a recycle warning to the console', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      configure({ echoWarnings: true });

      const result = Table.make({ a: [1, 2, 3] }, 'legacy').assign('b', [1, 2]);

      expect(result.applied).toBe(false);
      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn).toHaveBeenCalledWith(result.warning?.format());
    });

    test('legacy misses never warn', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      configure({ echoWarnings: true });

      Table.make({ a: [1] }, 'legacy').col('b');

      expect(warn).not.toHaveBeenCalled();
    });
  });
});
