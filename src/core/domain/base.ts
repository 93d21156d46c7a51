import type { Logger } from 'pino';

/**
 * Base interface for domain services.
 * All services log through a child logger tagged with their component name.
 */
export interface BaseService {
  readonly log: Logger;
}

/**
 * Utility: Get current timestamp in milliseconds
 */
export function now(): number {
  return Date.now();
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Maximum characters of an attachment inlined into a prompt
 */
export const MAX_INLINE_CHARS = 20000;

/**
 * Utility: Clip text to MAX_INLINE_CHARS
 */
export function clipText(s: string, max: number = MAX_INLINE_CHARS): string {
  if (s.length <= max) return s;
  return s.slice(0, max) + `\n[clipped to ${max} chars]`;
}
