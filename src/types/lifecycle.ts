/**
 * @fileoverview Session lifecycle audit types
 */

/** Types of session lifecycle events recorded to the audit log */
export type LifecycleEventType =
  | 'started' // Service spawned and its record added to the store
  | 'spawn_failed' // Start failed after a port was allocated, or its record could not be saved
  | 'stopped' // Record removed by stop()
  | 'reaped' // Record removed because its process was gone
  | 'idle_cleaned' // Record removed by cleanup()
  | 'touched'; // Activity timestamp moved forward

/** A single entry in the session lifecycle audit log */
export interface LifecycleEntry {
  ts: number;
  event: LifecycleEventType;
  sessionId: string;
  port?: number;
  pid?: number;
  reason?: string;
  extra?: Record<string, unknown>;
}
