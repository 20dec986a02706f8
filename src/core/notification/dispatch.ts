/**
 * @fileoverview Snapshot notification dispatcher
 */

import { ERROR_MESSAGES } from '../../errors/messages';
import type { FailureReporter, ListenerEntry } from '../../types/internal';
import { logError } from '../../utils/debug';

/**
 * Delivers `value` to every listener of a snapshot.
 *
 * Each call is isolated: a throwing listener is reported through `report`
 * and the pass continues with the remaining entries. A reporter that throws
 * is logged and does not end the pass either. The snapshot is not the
 * live registry, so listeners may subscribe, unsubscribe or write to the
 * same atom; those calls only affect later passes.
 *
 * @returns Number of listeners that failed
 */
export function dispatch<T>(
  snapshot: ReadonlyArray<ListenerEntry<T>>,
  value: T,
  report: FailureReporter
): number {
  let failures = 0;

  for (const [id, listener] of snapshot) {
    try {
      listener(value);
    } catch (error) {
      failures++;
      try {
        report(error, id);
      } catch (reportError) {
        logError(ERROR_MESSAGES.FAILURE_REPORT_FAILED, reportError);
      }
    }
  }

  return failures;
}
