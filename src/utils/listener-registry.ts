/**
 * @fileoverview Listener registry utility
 * @description Id-keyed listener storage with point-in-time snapshots
 */

import { AtomError } from '../errors/errors';
import { ERROR_MESSAGES } from '../errors/messages';
import type { Listener } from '../types';
import type { ListenerEntry } from '../types/internal';

/**
 * Stores listeners by registration id
 *
 * Ids are issued by the owning atom and are never reused, so removal by id
 * cannot hit a later registration. Dispatch never iterates the live map:
 * it works on a `snapshot()`, which stays fixed while listeners add or
 * remove registrations.
 *
 * Storage is lazily initialized; atoms without listeners allocate no map.
 *
 * @template T - Value type passed to listeners
 *
 * @example
 * ```ts
 * const registry = new ListenerRegistry<number>();
 * registry.add(1, (value) => console.log(value));
 *
 * for (const [, listener] of registry.snapshot()) listener(42);
 *
 * registry.remove(1);
 * ```
 */
export class ListenerRegistry<T> {
  private listeners: Map<number, Listener<T>> | null = null;

  /**
   * Registers a listener under an id
   *
   * @throws {AtomError} If the id is already registered
   */
  add(id: number, listener: Listener<T>): void {
    if (!this.listeners) {
      this.listeners = new Map();
    }
    if (this.listeners.has(id)) {
      throw new AtomError(ERROR_MESSAGES.DUPLICATE_LISTENER_ID(id));
    }
    this.listeners.set(id, listener);
  }

  /**
   * Removes the listener registered under an id
   *
   * @returns True if removed, false if not found
   */
  remove(id: number): boolean {
    return this.listeners?.delete(id) ?? false;
  }

  has(id: number): boolean {
    return this.listeners?.has(id) ?? false;
  }

  /**
   * Copies the current registrations
   *
   * The returned array is detached from the registry; later `add` and
   * `remove` calls do not affect it.
   */
  snapshot(): ReadonlyArray<ListenerEntry<T>> {
    return this.listeners ? Array.from(this.listeners) : [];
  }

  get size(): number {
    return this.listeners?.size ?? 0;
  }

  get hasListeners(): boolean {
    return this.size > 0;
  }

  /**
   * Removes all listeners and releases the map
   */
  clear(): void {
    this.listeners?.clear();
    this.listeners = null;
  }
}
