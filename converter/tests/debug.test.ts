/**
 * Tests for level-gated debug logging
 */
import { afterEach, describe, it, expect, vi } from 'vitest';
import { debug, debugWarn, isDebugEnabled, resetDebugLevel } from '../src/utils/debug';

describe('debug', () => {
  const originalLevel = process.env.DEBUG_STATE;

  afterEach(() => {
    if (originalLevel === undefined) {
      delete process.env.DEBUG_STATE;
    } else {
      process.env.DEBUG_STATE = originalLevel;
    }
    resetDebugLevel();
    vi.restoreAllMocks();
  });

  it('should log messages at or below the configured level', () => {
    process.env.DEBUG_STATE = '1';
    resetDebugLevel();
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    debug(1, '[test] essential');
    debug(2, '[test] verbose');

    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith('[test] essential');
  });

  it('should be silent when DEBUG_STATE is unset or invalid', () => {
    delete process.env.DEBUG_STATE;
    resetDebugLevel();
    expect(isDebugEnabled(1)).toBe(false);

    process.env.DEBUG_STATE = 'verbose';
    resetDebugLevel();
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    debugWarn(1, '[test] warning');
    expect(warn).not.toHaveBeenCalled();
  });

  it('should cap the level at 2', () => {
    process.env.DEBUG_STATE = '9';
    resetDebugLevel();
    expect(isDebugEnabled(2)).toBe(true);
    expect(isDebugEnabled(3)).toBe(false);
  });
});
