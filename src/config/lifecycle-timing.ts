/**
 * @fileoverview Timing and allocation defaults for session supervision.
 *
 * Every external wait is bounded by one of these values so that a hung
 * child process cannot hold the store lock indefinitely.
 *
 * @module config/lifecycle-timing
 */

// ============================================================================
// Store Access
// ============================================================================

/** Maximum wait for the store lock before LockTimeoutError (ms) */
export const LOCK_TIMEOUT_MS = 10 * 1000;

/** Interval between lock acquisition attempts (ms) */
export const LOCK_POLL_INTERVAL_MS = 50;

/** How often a holder refreshes the lock owner file's mtime (ms) */
export const LOCK_HEARTBEAT_INTERVAL_MS = 2 * 1000;

/** Heartbeat age after which a lock is stale even if its pid is alive (ms) */
export const LOCK_STALE_AFTER_MS = 30 * 1000;

/** Age after which an abandoned break marker is removed (ms) */
export const LOCK_BREAK_STALE_MS = 5 * 1000;

// ============================================================================
// Port Allocation
// ============================================================================

/** First port handed out to a session */
export const DEFAULT_PORT_BASE = 9100;

// ============================================================================
// Process Lifecycle
// ============================================================================

/** Time allowed for a service to print its ready line (ms) */
export const STARTUP_TIMEOUT_MS = 30 * 1000;

/** Grace period after SIGTERM before escalating to SIGKILL (ms) */
export const STOP_GRACE_MS = 5 * 1000;

/** Liveness poll interval while waiting for a stopped process to exit (ms) */
export const STOP_POLL_INTERVAL_MS = 100;

/** Inactivity after which a live session is reported idle (ms) */
export const IDLE_THRESHOLD_MS = 60 * 1000;

/** Default inactivity bound used by `cleanup` (ms) */
export const CLEANUP_MAX_IDLE_MS = 60 * 1000;

// ============================================================================
// External Probes
// ============================================================================

/** Working-directory status probe timeout (ms) */
export const PROBE_TIMEOUT_MS = 5 * 1000;

/** Activity query against the service's local API (ms) */
export const ACTIVITY_TIMEOUT_MS = 2 * 1000;
