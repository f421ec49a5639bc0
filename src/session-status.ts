/**
 * @fileoverview Status classification for supervised sessions.
 *
 * @module session-status
 */

import type { ActivitySignal } from './activity-reporter.js';
import type { SessionStatus } from './types.js';

export interface StatusInputs {
  alive: boolean;
  /** Signal from the running service; ignored when not alive */
  signal: ActivitySignal;
  lastActivity: number;
  now: number;
  idleThresholdMs: number;
}

/**
 * Classifies a session. A missing process always wins and yields `dead`;
 * then blocked beats failed beats the inactivity check.
 */
export function classifyStatus(inputs: StatusInputs): SessionStatus {
  if (!inputs.alive) return 'dead';
  switch (inputs.signal.kind) {
    case 'blocked':
      return 'waitingPermission';
    case 'failed':
      return 'error';
    case 'ok':
      return inputs.now - inputs.lastActivity > inputs.idleThresholdMs ? 'idle' : 'running';
  }
}

/** Milliseconds since the session was last touched (never negative). */
export function inactivityMs(lastActivity: number, now: number): number {
  return Math.max(0, now - lastActivity);
}
