export { createAtom, ReadWriteLock } from './atom';
export { dispatch } from './notification/dispatch';
export { Subscription } from './subscription/subscription';
