/**
 * @fileoverview Utility helpers for scoped listener registration
 */

import { isPromise } from '../errors/errors';
import type { Listener, ReadonlyAtom } from '../types';

/**
 * Keeps `listener` subscribed for the duration of `body`.
 *
 * The registration is removed when `body` returns or throws. If `body`
 * returns a promise or any other thenable, removal waits until it settles;
 * the returned native promise settles with the same outcome.
 *
 * @template T - Atom value type
 * @template R - Return type of `body`
 *
 * @example
 * ```ts
 * const seen: number[] = [];
 * subscribeScoped(count, (v) => seen.push(v), () => {
 *   count.set(1);
 *   count.set(2);
 * });
 * count.set(3); // not recorded
 * ```
 */
export function subscribeScoped<T, R>(
  atom: ReadonlyAtom<T>,
  listener: Listener<T>,
  body: () => PromiseLike<R>
): Promise<R>;
export function subscribeScoped<T, R>(atom: ReadonlyAtom<T>, listener: Listener<T>, body: () => R): R;
export function subscribeScoped<T, R>(
  atom: ReadonlyAtom<T>,
  listener: Listener<T>,
  body: () => R | PromiseLike<R>
): R | PromiseLike<R> {
  const subscription = atom.subscribe(listener);
  let result: R | PromiseLike<R>;

  try {
    result = body();
  } catch (error) {
    subscription.unsubscribe();
    throw error;
  }

  if (isPromise<R>(result)) {
    const pending = result;
    // Adopt through a native promise: thenables need not implement finally
    const settled = new Promise<R>((resolve, reject) => {
      pending.then(resolve, reject);
    });
    return settled.finally(() => subscription.unsubscribe());
  }

  subscription.unsubscribe();
  return result;
}
