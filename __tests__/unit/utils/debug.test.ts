/**
 * @fileoverview Debug utility tests
 */

import { createAtom } from '@/core/atom';
import { debug, DEBUG_ID, DEBUG_NAME, DEBUG_TYPE, logError } from '@/utils/debug';
import { afterEach, beforeEach, describe, expect, it, type MockInstance, vi } from 'vitest';

describe('debug configuration', () => {
  it('development mode detection works', () => {
    expect(typeof debug.enabled).toBe('boolean');
  });

  it('maxListeners default value is set', () => {
    expect(debug.maxListeners).toBe(100);
  });

  it('warnCascadingWrites default value is true', () => {
    expect(debug.warnCascadingWrites).toBe(true);
  });
});

describe('debug.warn', () => {
  it('outputs warning when condition is true', () => {
    const originalEnabled = debug.enabled;
    debug.enabled = true;
    const consoleWarn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    debug.warn(true, 'Test warning');

    expect(consoleWarn).toHaveBeenCalledWith('[guarded-atom] Test warning');

    consoleWarn.mockRestore();
    debug.enabled = originalEnabled;
  });

  it('does not output warning when condition is false', () => {
    const originalEnabled = debug.enabled;
    debug.enabled = true;
    const consoleWarn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    debug.warn(false, 'Should not warn');

    expect(consoleWarn).not.toHaveBeenCalled();

    consoleWarn.mockRestore();
    debug.enabled = originalEnabled;
  });

  it('does not output warning when not in development mode', () => {
    const originalEnabled = debug.enabled;
    debug.enabled = false;
    const consoleWarn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    debug.warn(true, 'Should not warn in production');

    expect(consoleWarn).not.toHaveBeenCalled();

    consoleWarn.mockRestore();
    debug.enabled = originalEnabled;
  });
});

describe('debug.attachDebugInfo', () => {
  it('attaches metadata in development mode', () => {
    const originalEnabled = debug.enabled;
    debug.enabled = true;
    const target = {};

    debug.attachDebugInfo(target, 'atom', 7);

    expect(debug.getDebugName(target)).toBe('atom_7');
    expect(debug.getDebugType(target)).toBe('atom');
    expect((target as Record<symbol, unknown>)[DEBUG_ID]).toBe(7);

    debug.enabled = originalEnabled;
  });

  it('attaches nothing outside development mode', () => {
    const originalEnabled = debug.enabled;
    debug.enabled = false;
    const target = {};

    debug.attachDebugInfo(target, 'atom', 7);

    expect(DEBUG_NAME in target).toBe(false);
    expect(DEBUG_TYPE in target).toBe(false);

    debug.enabled = originalEnabled;
  });

  it('returns undefined for values without metadata', () => {
    expect(debug.getDebugName(null)).toBeUndefined();
    expect(debug.getDebugType(42)).toBeUndefined();
    expect(debug.getDebugType({})).toBeUndefined();
  });
});

describe('logError', () => {
  it('prefixes the message', () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
    const error = new Error('x');

    logError('Something failed', error);

    expect(consoleError).toHaveBeenCalledWith('[guarded-atom] Something failed:', error);
    consoleError.mockRestore();
  });
});

describe('development warnings from atoms', () => {
  let originalEnabled: boolean;
  let consoleWarn: MockInstance<typeof console.warn>;

  beforeEach(() => {
    originalEnabled = debug.enabled;
    debug.enabled = true;
    consoleWarn = vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleWarn.mockRestore();
    debug.enabled = originalEnabled;
  });

  it('warns when listeners exceed the configured maximum', () => {
    const originalMax = debug.maxListeners;
    debug.maxListeners = 2;
    const count = createAtom(0, { name: 'busy' });

    count.subscribe(() => {});
    count.subscribe(() => {});
    expect(consoleWarn).not.toHaveBeenCalled();

    count.subscribe(() => {});
    expect(consoleWarn).toHaveBeenCalledWith(
      '[guarded-atom] Atom "busy" has 3 listeners; subscriptions may be leaking'
    );

    debug.maxListeners = originalMax;
  });

  it('warns when a listener writes back into its own atom', () => {
    const count = createAtom(0, { name: 'echo' });
    count.subscribe((v) => {
      if (v === 1) count.set(2);
    });

    count.set(1);

    expect(count.get()).toBe(2);
    expect(consoleWarn).toHaveBeenCalledTimes(1);
    expect(consoleWarn).toHaveBeenCalledWith(
      '[guarded-atom] Atom "echo" was written from inside one of its own listeners'
    );
  });

  it('tags atoms for type detection', () => {
    const count = createAtom(0);
    expect(debug.getDebugType(count)).toBe('atom');
  });
});
