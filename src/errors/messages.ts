/**
 * @fileoverview Centralized error messages for better maintainability
 */

export const ERROR_MESSAGES = {
  // Atom errors
  ATOM_SUBSCRIBER_MUST_BE_FUNCTION: 'Subscription listener must be a function',
  ATOM_UPDATER_MUST_BE_FUNCTION: 'Update function must be a function',
  ATOM_DISPOSED: (name: string) => `Atom "${name}" has been disposed`,
  ATOM_INDIVIDUAL_SUBSCRIBER_FAILED: (name: string, id: number) =>
    `Listener ${id} of atom "${name}" failed`,

  // Lock errors
  REENTRANT_READ: (name: string) =>
    `Atom "${name}" was read from inside its own update, equality or clone function`,
  REENTRANT_WRITE: (name: string) =>
    `Atom "${name}" was modified from inside its own update, equality or clone function`,

  // Registry errors
  DUPLICATE_LISTENER_ID: (id: number) => `Listener id ${id} is already registered`,

  // Debug warnings
  LARGE_LISTENER_SET: (name: string, count: number) =>
    `Atom "${name}" has ${count} listeners; subscriptions may be leaking`,
  CASCADING_WRITE: (name: string) =>
    `Atom "${name}" was written from inside one of its own listeners`,
  CALLBACK_ERROR_IN_ERROR_HANDLER: 'Error occurred during onError callback execution',
  UNHANDLED_LISTENER_ERROR: 'Unhandled listener error',
  FAILURE_REPORT_FAILED: 'Error occurred while reporting a listener failure',
} as const;
