/**
 * @fileoverview Core types for servectl session supervision.
 *
 * @module types
 */

/**
 * Status of a supervised session.
 *
 * - `running`: process alive and recently active
 * - `idle`: process alive, inactive past the idle threshold
 * - `waitingPermission`: process alive, blocked on an approval
 * - `error`: process alive but reporting a failure
 * - `dead`: process gone (terminal)
 */
export type SessionStatus = 'running' | 'idle' | 'waitingPermission' | 'error' | 'dead';

export const SESSION_STATUSES: readonly SessionStatus[] = ['running', 'idle', 'waitingPermission', 'error', 'dead'];

/** A session record exactly as it is written to store.json. */
export interface SessionRecord {
  id: string;
  port: number;
  pid: number;
  createdAt: number;
  lastActivity: number;
  workdir: string | null;
  agent: string | null;
  status: SessionStatus;
}

/** Live state of a session's working directory. Never persisted. */
export interface ExternalState {
  hasPendingChange: boolean;
  changedItems: string[];
}

/** A session record enriched with read-time data. */
export interface SessionView extends SessionRecord {
  hasPendingChanges: boolean;
  changedItems: string[];
  /** When status (and probe, if any) were observed (epoch ms) */
  observedAt: number;
}

/**
 * How a batch listing is observed.
 *
 * - `snapshot`: statuses for all records are computed at one instant, then probes run
 * - `per-item`: each record's status and probe are computed back to back
 */
export type ListingMode = 'snapshot' | 'per-item';

/** Configuration for launching a managed service. */
export interface LaunchConfig {
  /** Service binary (default: opencode) */
  command?: string;
  /** Arguments placed before `--port <port>` (default: ['serve']) */
  args?: string[];
  /** Pattern on the service's output that signals it is ready */
  readyPattern?: RegExp;
  startupTimeoutMs?: number;
  /** Extra environment for the service */
  env?: Record<string, string>;
  /** Default agent passed to the service */
  agent?: string;
  /** Let the service run servectl itself (default: blocked via its command blocklist) */
  allowServectlCommands?: boolean;
}

/** Result of a successful spawn. */
export interface LaunchedService {
  pid: number;
  /** URL announced by the service, if the ready pattern captured one */
  url: string | null;
}

/** Probe command used by the live status enricher. */
export interface ExternalProbeConfig {
  command: string;
  args: string[];
  /** Entry that must exist inside the workdir for the probe to run (e.g. `.git`) */
  marker: string | null;
  timeoutMs: number;
}

// ========== API Responses ==========

export enum ApiErrorCode {
  NOT_FOUND = 'NOT_FOUND',
  INVALID_INPUT = 'INVALID_INPUT',
  LOCK_TIMEOUT = 'LOCK_TIMEOUT',
  SPAWN_FAILED = 'SPAWN_FAILED',
  CORRUPT_STORE = 'CORRUPT_STORE',
  OPERATION_FAILED = 'OPERATION_FAILED',
}

export interface ApiErrorResponse {
  success: false;
  error: string;
  errorCode: ApiErrorCode;
}

export interface ApiSuccessResponse<T> {
  success: true;
  data: T;
}

export type ApiResponse<T> = ApiSuccessResponse<T> | ApiErrorResponse;

export function createErrorResponse(code: ApiErrorCode, error: string): ApiErrorResponse {
  return { success: false, error, errorCode: code };
}

export function createSuccessResponse<T>(data: T): ApiSuccessResponse<T> {
  return { success: true, data };
}

/** Extracts a message from an unknown thrown value. */
export function getErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  return String(err);
}
