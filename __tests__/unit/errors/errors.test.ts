/**
 * @fileoverview Error class tests
 */

import {
  AtomError,
  isPromise,
  ListenerError,
  ReentrancyError,
  toError,
  wrapError,
} from '@/errors/errors';
import { describe, expect, it } from 'vitest';

describe('Error Classes', () => {
  it('AtomError has correct properties', () => {
    const error = new AtomError('Test message');

    expect(error.name).toBe('AtomError');
    expect(error.message).toBe('Test message');
    expect(error.cause).toBe(null);
    expect(error.recoverable).toBe(true);
    expect(error.timestamp).toBeInstanceOf(Date);
  });

  it('AtomError can receive cause', () => {
    const cause = new Error('Original error');
    const error = new AtomError('Wrapped error', cause);

    expect(error.cause).toBe(cause);
  });

  it('AtomError recoverable can be set', () => {
    const error = new AtomError('Test', null, false);

    expect(error.recoverable).toBe(false);
  });

  it('ListenerError extends AtomError and carries the registration', () => {
    const cause = new Error('listener threw');
    const error = new ListenerError('Listener 4 failed', cause, 4, 'counter');

    expect(error).toBeInstanceOf(AtomError);
    expect(error.name).toBe('ListenerError');
    expect(error.cause).toBe(cause);
    expect(error.thrown).toBe(cause);
    expect(error.listenerId).toBe(4);
    expect(error.atomName).toBe('counter');
    expect(error.recoverable).toBe(true);
  });

  it('ReentrancyError extends AtomError and is not recoverable', () => {
    const error = new ReentrancyError('re-entered');

    expect(error).toBeInstanceOf(AtomError);
    expect(error.name).toBe('ReentrancyError');
    expect(error.recoverable).toBe(false);
  });
});

describe('wrapError', () => {
  it('returns AtomErrors unchanged', () => {
    const original = new ReentrancyError('already wrapped');
    expect(wrapError(original, AtomError, 'test')).toBe(original);
  });

  it('wraps TypeError with context', () => {
    const cause = new TypeError('x is not a function');
    const wrapped = wrapError(cause, AtomError, 'onError');

    expect(wrapped.message).toBe('Type error (onError): x is not a function');
    expect(wrapped.cause).toBe(cause);
  });

  it('wraps ReferenceError with context', () => {
    const cause = new ReferenceError('y is not defined');
    const wrapped = wrapError(cause, AtomError, 'onError');

    expect(wrapped.message).toBe('Reference error (onError): y is not defined');
  });

  it('wraps other errors with the chosen class', () => {
    const wrapped = wrapError(new Error('generic'), ReentrancyError, 'update');

    expect(wrapped).toBeInstanceOf(ReentrancyError);
    expect(wrapped.message).toBe('Unexpected error (update): generic');
  });

  it('wraps non-Error values without a cause', () => {
    const wrapped = wrapError('string failure', AtomError, 'listener');

    expect(wrapped.message).toBe('Unexpected error (listener): string failure');
    expect(wrapped.cause).toBe(null);
  });
});

describe('toError', () => {
  it('keeps Error instances', () => {
    const error = new Error('kept');
    expect(toError(error)).toBe(error);
  });

  it('converts other thrown values', () => {
    const converted = toError(42);
    expect(converted).toBeInstanceOf(Error);
    expect(converted.message).toBe('42');
  });

  it('describes values without a string conversion', () => {
    const converted = toError(Object.create(null));
    expect(converted).toBeInstanceOf(Error);
    expect(converted.message).toBe('Non-error value of type object');
  });
});

describe('isPromise', () => {
  it('detects thenables', () => {
    expect(isPromise(Promise.resolve(1))).toBe(true);
    expect(isPromise({ then: () => {} })).toBe(true);
  });

  it('rejects other values', () => {
    expect(isPromise(null)).toBe(false);
    expect(isPromise(undefined)).toBe(false);
    expect(isPromise({})).toBe(false);
    expect(isPromise(1)).toBe(false);
  });
});
