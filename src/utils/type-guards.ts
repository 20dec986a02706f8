import { Subscription } from '../core/subscription/subscription';
import type { ReadonlyAtom, WritableAtom } from '../types';
import { debug } from './debug';

export function isAtom(obj: unknown): obj is ReadonlyAtom {
  if (debug.enabled) {
    const debugType = debug.getDebugType(obj);
    if (debugType) {
      return debugType === 'atom';
    }
  }
  return (
    obj !== null &&
    typeof obj === 'object' &&
    'get' in obj &&
    'subscribe' in obj &&
    typeof obj.get === 'function' &&
    typeof obj.subscribe === 'function'
  );
}

export function isWritableAtom(obj: unknown): obj is WritableAtom {
  return (
    isAtom(obj) &&
    'set' in obj &&
    'update' in obj &&
    typeof obj.set === 'function' &&
    typeof obj.update === 'function'
  );
}

export function isSubscription(obj: unknown): obj is Subscription<unknown> {
  return obj instanceof Subscription;
}
