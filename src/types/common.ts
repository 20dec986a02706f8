/**
 * Debug configuration interface
 */
export interface DebugConfig {
  enabled: boolean;
  maxListeners: number;
  warnCascadingWrites: boolean;
  warn(condition: boolean, message: string): void;
  attachDebugInfo(obj: object, type: string, id: number): void;
  getDebugName(obj: unknown): string | undefined;
  getDebugType(obj: unknown): string | undefined;
}

export type LockMode = 'idle' | 'shared' | 'exclusive';
