/**
 * @fileoverview Constants and configuration for guarded-atom
 * @description Centralized defaults for debugging, error reporting and subscription handles
 */

/**
 * Debug configuration defaults
 */
export const DEBUG_CONFIG = {
  /** Listener count above which a possible subscription leak is reported */
  MAX_LISTENERS: 100,
  /** Warn when a listener writes back into the atom that is notifying it */
  WARN_CASCADING_WRITES: true,
} as const;

/**
 * Policies for listener failures on atoms created without an `onError` handler
 */
export const UnhandledErrorPolicy = {
  /** Drop the failure silently */
  DISCARD: 'discard' as const,
  /** Report the failure through console.error */
  LOG: 'log' as const,
  /** Keep the failure until `takeErrors()` drains it */
  COLLECT: 'collect' as const,
};

/**
 * Listener error reporting configuration
 */
export const ERROR_CONFIG = {
  /** Policy used when neither `onError` nor `unhandledErrors` is given */
  DEFAULT_UNHANDLED_POLICY: UnhandledErrorPolicy.DISCARD,
  /** Maximum failures retained per atom under the collect policy; oldest are dropped first */
  MAX_COLLECTED_ERRORS: 100,
} as const;

/**
 * Subscription handle configuration
 */
export const SUBSCRIPTION_CONFIG = {
  /** Id held by a consumed handle. Listener ids start at 1, so it is never issued. */
  INERT_ID: 0,
  /** First id issued by a fresh atom */
  FIRST_ID: 1,
} as const;
