import { describe, expect, it } from 'vitest';
import { DEFAULT_TIMEOUT_MS, MAX_TIMEOUT_MS, resolveHarnessConfig } from '../../../src/harness/config.js';

describe('resolveHarnessConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(resolveHarnessConfig({})).toEqual({ timeoutMs: DEFAULT_TIMEOUT_MS, useDist: false });
  });

  it('treats an empty timeout as unset', () => {
    expect(resolveHarnessConfig({ IMPROVER_TEST_TIMEOUT_MS: '' }).timeoutMs).toBe(DEFAULT_TIMEOUT_MS);
  });

  it('reads the timeout and dist switch', () => {
    expect(resolveHarnessConfig({ IMPROVER_TEST_TIMEOUT_MS: '2500', IMPROVER_TEST_DIST: '1' })).toEqual({
      timeoutMs: 2500,
      useDist: true,
    });
  });

  it('only enables dist mode for "1"', () => {
    expect(resolveHarnessConfig({ IMPROVER_TEST_DIST: 'yes' }).useDist).toBe(false);
  });

  it('rejects a non-positive timeout', () => {
    expect(() => resolveHarnessConfig({ IMPROVER_TEST_TIMEOUT_MS: '0' })).toThrow(
      'Invalid harness configuration: IMPROVER_TEST_TIMEOUT_MS must be positive'
    );
  });

  it('rejects a fractional timeout', () => {
    expect(() => resolveHarnessConfig({ IMPROVER_TEST_TIMEOUT_MS: '1.5' })).toThrow(
      'IMPROVER_TEST_TIMEOUT_MS must be a whole number of milliseconds'
    );
  });

  it('rejects a timeout beyond what setTimeout can wait', () => {
    expect(() => resolveHarnessConfig({ IMPROVER_TEST_TIMEOUT_MS: '3000000000' })).toThrow(
      'Invalid harness configuration: IMPROVER_TEST_TIMEOUT_MS must be at most 2147483647'
    );
  });

  it('accepts the largest timer delay', () => {
    expect(resolveHarnessConfig({ IMPROVER_TEST_TIMEOUT_MS: String(MAX_TIMEOUT_MS) }).timeoutMs).toBe(MAX_TIMEOUT_MS);
  });
});
