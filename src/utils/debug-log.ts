/**
 * @fileoverview Debug logging gated by SERVECTL_DEBUG.
 *
 * @module utils/debug-log
 */

export const DEBUG_ENV = 'SERVECTL_DEBUG';

export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env[DEBUG_ENV];
  return value !== undefined && value !== '' && value !== '0';
}

/** Logs `[tag] message` to stderr when debugging is enabled. */
export function debugLog(tag: string, message: string, ...details: unknown[]): void {
  if (!isDebugEnabled()) return;
  console.error(`[${tag}] ${message}`, ...details);
}
