export type {
  AtomOptions,
  EqualityFn,
  Listener,
  ListenerErrorHandler,
  ReadonlyAtom,
  UnhandledErrorPolicyType,
  Updater,
  WritableAtom,
} from './atom';
export type { DebugConfig, LockMode } from './common';
