/**
 * @fileoverview Debug configuration and utilities
 * @description Development-time warnings and debug metadata for atoms
 */

import { DEBUG_CONFIG } from '../constants';
import type { DebugConfig } from '../types';

/**
 * Symbols for debug metadata to avoid property name collisions
 */
export const DEBUG_NAME = Symbol('debugName');
export const DEBUG_ID = Symbol('id');
export const DEBUG_TYPE = Symbol('type');

export const LOG_PREFIX = '[guarded-atom]';

export const debug: DebugConfig = {
  enabled: typeof process !== 'undefined' && process.env?.NODE_ENV === 'development',
  maxListeners: DEBUG_CONFIG.MAX_LISTENERS,
  warnCascadingWrites: DEBUG_CONFIG.WARN_CASCADING_WRITES,

  warn(condition: boolean, message: string): void {
    if (this.enabled && condition) {
      console.warn(`${LOG_PREFIX} ${message}`);
    }
  },

  attachDebugInfo(obj: object, type: string, id: number): void {
    if (!this.enabled) return;
    const target = obj as Record<symbol, unknown>;
    target[DEBUG_NAME] = `${type}_${id}`;
    target[DEBUG_ID] = id;
    target[DEBUG_TYPE] = type;
  },

  getDebugName(obj: unknown): string | undefined {
    if (obj && typeof obj === 'object' && DEBUG_NAME in obj) {
      const tag = obj[DEBUG_NAME];
      return typeof tag === 'string' ? tag : undefined;
    }
    return undefined;
  },

  getDebugType(obj: unknown): string | undefined {
    if (obj && typeof obj === 'object' && DEBUG_TYPE in obj) {
      const tag = obj[DEBUG_TYPE];
      return typeof tag === 'string' ? tag : undefined;
    }
    return undefined;
  },
};

/**
 * Logs an error with the library prefix
 */
export function logError(message: string, error: unknown): void {
  console.error(`${LOG_PREFIX} ${message}:`, error);
}

let nextId = 1;
export const generateId = (): number => nextId++;
