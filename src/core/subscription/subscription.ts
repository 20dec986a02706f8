/**
 * @fileoverview Subscription: move-only handle for one listener registration
 *
 * A subscription is the single authority for removing its listener. It holds
 * only a weak reference to the atom's state, so it never keeps a dropped
 * atom alive, and every operation on it becomes a no-op once the atom is
 * disposed or collected.
 *
 * @example
 * ```ts
 * const count = createAtom(0);
 * const sub = count.subscribe((value) => console.log(value));
 *
 * const moved = sub.transfer(); // `sub` is now inert
 * moved.unsubscribe();
 * moved.unsubscribe(); // no-op
 * ```
 */

import { SUBSCRIPTION_CONFIG } from '../../constants';
import type { StateCell } from '../atom/state-cell';

export class Subscription<T> {
  private owner: WeakRef<StateCell<T>> | null = null;
  private id: number = SUBSCRIPTION_CONFIG.INERT_ID;

  private constructor() {}

  /**
   * Binds a new handle to a registration that was just inserted.
   *
   * @internal Called by the atom while issuing a registration.
   */
  static issue<T>(cell: StateCell<T>, id: number): Subscription<T> {
    const subscription = new Subscription<T>();
    subscription.owner = new WeakRef(cell);
    subscription.id = id;
    return subscription;
  }

  /** Id of the registration this handle owns, or 0 once inert. */
  get listenerId(): number {
    return this.id;
  }

  /**
   * Whether this handle still owns a registration on a live atom.
   */
  get active(): boolean {
    const cell = this.liveOwner();
    if (cell === undefined) return false;
    const id = this.id;
    return cell.lock.withShared(() => cell.listeners.has(id));
  }

  /**
   * Removes the listener and makes this handle inert.
   *
   * Safe to call any number of times, and a no-op once the atom is gone.
   * Calling it from inside a listener is allowed: dispatch runs after the
   * atom's lock is released.
   *
   * @throws {ReentrancyError} If called from the atom's own updater,
   * equality or clone function
   */
  unsubscribe(): void {
    const cell = this.liveOwner();
    if (cell !== undefined) {
      const id = this.id;
      cell.lock.withExclusive(() => cell.listeners.remove(id));
    }
    this.release();
  }

  /**
   * Moves responsibility for the registration into a new handle.
   *
   * This handle becomes inert; unsubscribing it afterwards does not touch the
   * listener now owned by the returned handle.
   */
  transfer(): Subscription<T> {
    const target = new Subscription<T>();
    target.owner = this.owner;
    target.id = this.id;
    this.release();
    return target;
  }

  /**
   * Takes over `source`'s registration.
   *
   * Whatever this handle owned before is unsubscribed first, then `source`
   * becomes inert. Assigning a handle to itself does nothing.
   */
  assign(source: Subscription<T>): this {
    if (source === this) return this;

    this.unsubscribe();
    this.owner = source.owner;
    this.id = source.id;
    source.release();
    return this;
  }

  private liveOwner(): StateCell<T> | undefined {
    const cell = this.owner?.deref();
    return cell !== undefined && !cell.disposed ? cell : undefined;
  }

  private release(): void {
    this.owner = null;
    this.id = SUBSCRIPTION_CONFIG.INERT_ID;
  }
}
