/**
 * @fileoverview Session port: capabilities for session lifecycle management.
 * Route modules that manage sessions depend on this port.
 * SessionCoordinator satisfies it structurally.
 */

import type { ListOptions, StartedSession, StopResult } from '../../session-coordinator.js';
import type { ExternalState, LaunchConfig, SessionRecord, SessionView } from '../../types.js';

export interface SessionPort {
  list(options?: ListOptions): Promise<SessionView[]>;
  get(id: string): Promise<SessionView>;
  start(workdir?: string | null, config?: LaunchConfig): Promise<StartedSession>;
  stop(id: string, force?: boolean): Promise<StopResult>;
  touch(id: string): Promise<SessionRecord>;
  cleanup(maxIdleMs?: number): Promise<string[]>;
  hasPendingChanges(id: string): Promise<ExternalState>;
}
