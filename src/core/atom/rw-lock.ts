/**
 * @fileoverview Synchronous reader/writer guard for atom state
 */

import { ReentrancyError } from '../../errors/errors';
import { ERROR_MESSAGES } from '../../errors/messages';
import type { LockMode } from '../../types';

/**
 * Reader/writer lock guarding an atom's value and listener registry as one unit.
 *
 * Critical sections are synchronous and run to completion, so no other task
 * can observe the lock held. A conflicting acquisition can only come from
 * the holder's own call stack re-entering the atom; waiting for release
 * would never end, so the conflict is raised as a {@link ReentrancyError}.
 *
 * - Shared mode admits nested readers.
 * - Exclusive mode admits nothing else, including another exclusive section.
 */
export class ReadWriteLock {
  private readers = 0;
  private writing = false;

  constructor(private readonly owner: string) {}

  get mode(): LockMode {
    if (this.writing) return 'exclusive';
    return this.readers > 0 ? 'shared' : 'idle';
  }

  /**
   * Runs `fn` holding the lock in shared mode.
   *
   * @throws {ReentrancyError} If the lock is held exclusively
   */
  withShared<R>(fn: () => R): R {
    if (this.writing) {
      throw new ReentrancyError(ERROR_MESSAGES.REENTRANT_READ(this.owner));
    }
    this.readers++;
    try {
      return fn();
    } finally {
      this.readers--;
    }
  }

  /**
   * Runs `fn` holding the lock in exclusive mode.
   *
   * @throws {ReentrancyError} If the lock is held in any mode
   */
  withExclusive<R>(fn: () => R): R {
    if (this.writing || this.readers > 0) {
      throw new ReentrancyError(ERROR_MESSAGES.REENTRANT_WRITE(this.owner));
    }
    this.writing = true;
    try {
      return fn();
    } finally {
      this.writing = false;
    }
  }
}
