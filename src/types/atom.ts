import type { ListenerError } from '../errors/errors';
import type { Subscription } from '../core/subscription/subscription';

/** Callback invoked with the new value after every accepted change */
export type Listener<T> = (value: T) => void;

/** Pure function producing the next value from the current one */
export type Updater<T> = (current: T) => T;

/** Equality used for change suppression */
export type EqualityFn<T> = (a: T, b: T) => boolean;

/** Receives every listener failure of an atom */
export type ListenerErrorHandler = (error: ListenerError) => void;

export type UnhandledErrorPolicyType = 'discard' | 'log' | 'collect';

export interface AtomOptions<T = unknown> {
  /** Called with each listener failure. Takes precedence over `unhandledErrors`. */
  onError?: ListenerErrorHandler;
  /** What to do with listener failures when `onError` is absent (default: 'discard') */
  unhandledErrors?: UnhandledErrorPolicyType;
  /** Change suppression equality (default: Object.is); `false` notifies on every write */
  equal?: EqualityFn<T> | false;
  /** Copy applied to values handed to readers and listeners (default: identity) */
  clone?: (value: T) => T;
  /** Label used in log messages and errors */
  name?: string;
}

export interface ReadonlyAtom<T = unknown> {
  readonly name: string;
  get(): T;
  subscribe(listener: Listener<T>): Subscription<T>;
  listenerCount(): number;
}

export interface WritableAtom<T = unknown> extends ReadonlyAtom<T> {
  readonly isDisposed: boolean;
  set(value: T): void;
  update(updater: Updater<T>): void;
  takeErrors(): ListenerError[];
  dispose(): void;
}
