/**
 * @fileoverview Error class hierarchy for guarded-atom
 * @description Structured error classes with cause tracking and recoverability flags
 */

/**
 * Base error class for all guarded-atom errors
 *
 * Provides enhanced error information including:
 * - Original cause tracking for error chains
 * - Recoverability flag for error handling strategies
 * - Timestamp for debugging and logging
 *
 * @example
 * ```ts
 * throw new AtomError('Atom has been disposed', null, false);
 * ```
 */
export class AtomError extends Error {
  /** Original error that caused this error, if any */
  override cause: Error | null;
  /** Whether this error can be recovered from */
  recoverable: boolean;
  /** When this error occurred */
  timestamp: Date;

  /**
   * @param message - Error message describing what went wrong
   * @param cause - Original error that caused this error
   * @param recoverable - Whether the operation can be retried
   */
  constructor(message: string, cause: Error | null = null, recoverable: boolean = true) {
    super(message);
    this.name = 'AtomError';
    this.cause = cause;
    this.recoverable = recoverable;
    this.timestamp = new Date();
  }
}

/**
 * Error reported when a subscribed listener throws during notification
 *
 * Listener errors never reach the writer. They are handed to the atom's
 * `onError` handler, or to its unhandled error policy.
 */
export class ListenerError extends AtomError {
  /** Id of the registration whose listener failed */
  readonly listenerId: number;
  /** Name of the atom that was notifying */
  readonly atomName: string;
  /** The value the listener threw, exactly as thrown */
  readonly thrown: unknown;

  /**
   * @param message - Error message
   * @param thrown - Value thrown by the listener; `cause` holds it as an Error
   * @param listenerId - Id of the failing registration
   * @param atomName - Name of the notifying atom
   */
  constructor(message: string, thrown: unknown, listenerId: number, atomName: string) {
    super(message, toError(thrown), true);
    this.name = 'ListenerError';
    this.thrown = thrown;
    this.listenerId = listenerId;
    this.atomName = atomName;
  }
}

/**
 * Error thrown when an atom is re-entered from inside its own critical section
 *
 * This happens when an updater, an equality function or a clone function
 * calls back into the atom it is running for. It is a usage error and is
 * never recoverable.
 */
export class ReentrancyError extends AtomError {
  /**
   * @param message - Error message
   * @param cause - Original error
   */
  constructor(message: string, cause: Error | null = null) {
    super(message, cause, false);
    this.name = 'ReentrancyError';
  }
}

/**
 * Wraps an unknown error in the appropriate AtomError subclass
 *
 * Existing AtomErrors are returned unchanged. Anything else keeps its
 * original error in `cause`, and the message names where it occurred.
 *
 * @param error - Unknown error to wrap
 * @param ErrorClass - AtomError subclass to use for wrapping
 * @param context - Context string describing where the error occurred
 *
 * @example
 * ```ts
 * try {
 *   clone(value);
 * } catch (err) {
 *   throw wrapError(err, AtomError, 'clone');
 * }
 * ```
 */
export function wrapError(
  error: unknown,
  ErrorClass: new (message: string, cause: Error | null) => AtomError,
  context: string
): AtomError {
  if (error instanceof AtomError) {
    return error;
  }
  if (error instanceof TypeError) {
    return new ErrorClass(`Type error (${context}): ${error.message}`, error);
  }
  if (error instanceof ReferenceError) {
    return new ErrorClass(`Reference error (${context}): ${error.message}`, error);
  }

  const errorMessage = error instanceof Error ? error.message : describeThrown(error);
  const cause = error instanceof Error ? error : null;
  return new ErrorClass(`Unexpected error (${context}): ${errorMessage}`, cause);
}

/**
 * Normalizes a thrown value into an Error instance
 *
 * Non-Error throws (strings, plain objects) are converted so that the value
 * can travel as the `cause` of an AtomError. Never throws, even for values
 * without a string conversion such as `Object.create(null)`.
 */
export function toError(thrown: unknown): Error {
  return thrown instanceof Error ? thrown : new Error(describeThrown(thrown));
}

function describeThrown(thrown: unknown): string {
  try {
    return String(thrown);
  } catch {
    return `Non-error value of type ${typeof thrown}`;
  }
}

/**
 * Type guard to check if a value is a Promise
 *
 * Uses duck-typing to detect Promise-like objects by checking for
 * the presence of a `then` method.
 */
export function isPromise<T>(value: unknown): value is Promise<T> {
  return (
    value !== null &&
    value !== undefined &&
    typeof (value as { then?: unknown }).then === 'function'
  );
}
