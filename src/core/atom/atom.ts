/**
 * @fileoverview atom: guarded observable value container
 *
 * An atom holds one value behind a reader/writer lock and notifies its
 * listeners after every accepted change. Listeners run after the lock is
 * released, against a snapshot of the registry taken under the lock.
 *
 * @example
 * ```ts
 * const count = createAtom(0, (error) => console.error(error.cause));
 * const sub = count.subscribe((value) => console.log('count', value));
 *
 * count.set(5);
 * count.update((prev) => prev + 10);
 * console.log(count.get()); // 15
 *
 * sub.unsubscribe();
 * ```
 */

import { ERROR_CONFIG, UnhandledErrorPolicy } from '../../constants';
import { AtomError, ListenerError, wrapError } from '../../errors/errors';
import { ERROR_MESSAGES } from '../../errors/messages';
import type {
  AtomOptions,
  EqualityFn,
  Listener,
  ListenerErrorHandler,
  UnhandledErrorPolicyType,
  Updater,
  WritableAtom,
} from '../../types';
import type { ListenerEntry } from '../../types/internal';
import { debug, generateId, logError } from '../../utils/debug';
import { dispatch } from '../notification/dispatch';
import { Subscription } from '../subscription/subscription';
import { StateCell } from './state-cell';

/** Listeners and value captured under the lock for one notification pass */
interface NotificationPass<T> {
  snapshot: ReadonlyArray<ListenerEntry<T>>;
  value: T;
}

/**
 * Internal implementation of the WritableAtom interface.
 *
 * @template T - The type of value stored in the atom
 *
 * @remarks
 * Not exported: atoms are only created through {@link createAtom}, so every
 * instance owns the state cell its subscriptions weakly reference.
 */
class AtomImpl<T> implements WritableAtom<T> {
  readonly name: string;

  /** Value, registry and lock; subscriptions hold a WeakRef to it */
  private readonly _cell: StateCell<T>;

  private readonly _equal: EqualityFn<T> | false;
  private readonly _clone: ((value: T) => T) | undefined;
  private readonly _onError: ListenerErrorHandler | undefined;
  private readonly _unhandled: UnhandledErrorPolicyType;

  constructor(initialValue: T, options: AtomOptions<T>) {
    const id = generateId();
    this.name = options.name ?? `atom_${id}`;
    this._cell = new StateCell(initialValue, this.name);
    this._equal = options.equal ?? Object.is;
    this._clone = options.clone;
    this._onError = options.onError;
    this._unhandled = options.unhandledErrors ?? ERROR_CONFIG.DEFAULT_UNHANDLED_POLICY;

    debug.attachDebugInfo(this, 'atom', id);
  }

  get isDisposed(): boolean {
    return this._cell.disposed;
  }

  /**
   * Returns a copy of the current value.
   *
   * @throws {AtomError} If the atom has been disposed
   * @throws {ReentrancyError} If called from this atom's own updater
   */
  get(): T {
    const cell = this._live();
    return cell.lock.withShared(() => this._copy(cell.value));
  }

  /**
   * Stores `value` and notifies listeners, unless it equals the current value.
   *
   * @throws {AtomError} If the atom has been disposed
   */
  set(value: T): void {
    this._write(() => value);
  }

  /**
   * Replaces the value with `updater(current)` and notifies listeners,
   * unless the result equals the current value.
   *
   * The updater runs under the exclusive lock. It must not touch this atom;
   * doing so throws a ReentrancyError. Anything the updater throws reaches
   * the caller and leaves the value unchanged.
   */
  update(updater: Updater<T>): void {
    if (typeof updater !== 'function') {
      throw new AtomError(ERROR_MESSAGES.ATOM_UPDATER_MUST_BE_FUNCTION);
    }
    this._write(updater);
  }

  /**
   * Registers a listener for every accepted change after this call.
   *
   * @returns The handle that owns the registration
   * @throws {AtomError} If listener is not a function or the atom is disposed
   *
   * @example
   * ```ts
   * const sub = count.subscribe((value) => render(value));
   * // Later:
   * sub.unsubscribe();
   * ```
   */
  subscribe(listener: Listener<T>): Subscription<T> {
    if (typeof listener !== 'function') {
      throw new AtomError(ERROR_MESSAGES.ATOM_SUBSCRIBER_MUST_BE_FUNCTION);
    }

    const cell = this._live();
    const [id, count] = cell.lock.withExclusive(() => {
      const issued = cell.issueId();
      cell.listeners.add(issued, listener);
      return [issued, cell.listeners.size] as const;
    });

    debug.warn(count > debug.maxListeners, ERROR_MESSAGES.LARGE_LISTENER_SET(this.name, count));

    return Subscription.issue(cell, id);
  }

  /**
   * Number of live registrations; 0 once disposed.
   */
  listenerCount(): number {
    const cell = this._cell;
    if (cell.disposed) return 0;
    return cell.lock.withShared(() => cell.listeners.size);
  }

  /**
   * Drains listener failures retained under the `'collect'` policy.
   */
  takeErrors(): ListenerError[] {
    return this._cell.collected.splice(0);
  }

  /**
   * Ends the atom's lifetime.
   *
   * Every registration is dropped and outstanding subscriptions turn into
   * no-ops. Reads and writes afterwards throw. Calling it again does nothing.
   */
  dispose(): void {
    const cell = this._cell;
    if (cell.disposed) return;

    cell.lock.withExclusive(() => {
      cell.listeners.clear();
      cell.disposed = true;
    });
  }

  private _write(next: Updater<T>): void {
    const cell = this._live();

    debug.warn(
      debug.warnCascadingWrites && cell.dispatchDepth > 0,
      ERROR_MESSAGES.CASCADING_WRITE(this.name)
    );

    const pass = cell.lock.withExclusive((): NotificationPass<T> | null => {
      const value = next(cell.value);
      if (this._equal !== false && this._equal(value, cell.value)) return null;

      if (!cell.listeners.hasListeners) {
        cell.value = value;
        return null;
      }

      // Copy before storing so a failing clone leaves the value untouched
      const delivered = this._copy(value);
      cell.value = value;
      return { snapshot: cell.listeners.snapshot(), value: delivered };
    });

    if (pass !== null) {
      this._notify(cell, pass);
    }
  }

  private _notify(cell: StateCell<T>, pass: NotificationPass<T>): void {
    cell.dispatchDepth++;
    try {
      dispatch(pass.snapshot, pass.value, (error, listenerId) => this._report(error, listenerId));
    } finally {
      cell.dispatchDepth--;
    }
  }

  /**
   * Routes one listener failure to `onError` or the unhandled error policy.
   * Never throws: dispatch must continue with the remaining listeners.
   */
  private _report(error: unknown, listenerId: number): void {
    const failure = new ListenerError(
      ERROR_MESSAGES.ATOM_INDIVIDUAL_SUBSCRIBER_FAILED(this.name, listenerId),
      error,
      listenerId,
      this.name
    );

    if (this._onError !== undefined) {
      try {
        this._onError(failure);
      } catch (handlerError) {
        logError(
          ERROR_MESSAGES.CALLBACK_ERROR_IN_ERROR_HANDLER,
          wrapError(handlerError, AtomError, `onError of "${this.name}"`)
        );
      }
      return;
    }

    switch (this._unhandled) {
      case UnhandledErrorPolicy.LOG:
        logError(ERROR_MESSAGES.UNHANDLED_LISTENER_ERROR, failure);
        break;
      case UnhandledErrorPolicy.COLLECT: {
        const collected = this._cell.collected;
        collected.push(failure);
        if (collected.length > ERROR_CONFIG.MAX_COLLECTED_ERRORS) {
          collected.splice(0, collected.length - ERROR_CONFIG.MAX_COLLECTED_ERRORS);
        }
        break;
      }
      case UnhandledErrorPolicy.DISCARD:
        break;
    }
  }

  private _live(): StateCell<T> {
    const cell = this._cell;
    if (cell.disposed) {
      throw new AtomError(ERROR_MESSAGES.ATOM_DISPOSED(this.name), null, false);
    }
    return cell;
  }

  private _copy(value: T): T {
    return this._clone !== undefined ? this._clone(value) : value;
  }
}

/**
 * Creates an atom holding `initialValue`.
 *
 * The second argument is either an error handler for listener failures or
 * a full options object.
 *
 * @example
 * ```ts
 * const count = createAtom(0);
 * const config = createAtom(
 *   { retries: 3 },
 *   { equal: (a, b) => a.retries === b.retries, clone: (c) => ({ ...c }) }
 * );
 * const logged = createAtom('idle', (error) => console.error(error));
 * ```
 */
export function createAtom<T>(
  initialValue: T,
  options: AtomOptions<T> | ListenerErrorHandler = {}
): WritableAtom<T> {
  const resolved = typeof options === 'function' ? { onError: options } : options;
  return new AtomImpl(initialValue, resolved);
}
