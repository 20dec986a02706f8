import { SUBSCRIPTION_CONFIG } from '../../constants';
import type { ListenerError } from '../../errors/errors';
import { ListenerRegistry } from '../../utils/listener-registry';
import { ReadWriteLock } from './rw-lock';

/**
 * State shared between an atom and the subscriptions it hands out.
 *
 * The atom owns the cell; subscriptions only hold a `WeakRef` to it.
 * `value` and `listeners` must only be touched under `lock`.
 */
export class StateCell<T> {
  value: T;
  readonly listeners = new ListenerRegistry<T>();
  readonly lock: ReadWriteLock;
  disposed = false;
  /** Depth of dispatch passes currently running for this cell */
  dispatchDepth = 0;
  /** Failures retained under the collect policy */
  readonly collected: ListenerError[] = [];

  private nextId: number = SUBSCRIPTION_CONFIG.FIRST_ID;

  constructor(
    initialValue: T,
    readonly name: string
  ) {
    this.value = initialValue;
    this.lock = new ReadWriteLock(name);
  }

  /** Issues the next listener id. Ids are never reused. */
  issueId(): number {
    return this.nextId++;
  }
}
