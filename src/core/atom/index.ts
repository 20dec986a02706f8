export { createAtom } from './atom';
export { ReadWriteLock } from './rw-lock';
