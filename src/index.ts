/**
 * @fileoverview guarded-atom - Main entry point
 */

export { DEBUG_CONFIG, ERROR_CONFIG, SUBSCRIPTION_CONFIG, UnhandledErrorPolicy } from './constants';

export { createAtom, ReadWriteLock, Subscription } from './core';

export { AtomError, ListenerError, ReentrancyError } from './errors/errors';

export { subscribeScoped } from './helpers/helpers';
export { isAtom, isSubscription, isWritableAtom } from './utils/type-guards';

export { debug as DEBUG_RUNTIME } from './utils/debug';

export * from './types';
