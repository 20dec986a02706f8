import type { Listener } from './atom';

/** One entry of a listener snapshot */
export type ListenerEntry<T> = readonly [id: number, listener: Listener<T>];

/** Receives each failure caught while dispatching a snapshot */
export type FailureReporter = (error: unknown, listenerId: number) => void;
