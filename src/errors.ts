/**
 * @fileoverview Error taxonomy for the session coordinator.
 *
 * NotFound, LockTimeout and Spawn errors are results surfaced to callers.
 * Probe failures never reach this module; the live status enricher turns
 * them into a "no pending changes" result.
 *
 * @module errors
 */

export type ServectlErrorCode =
  | 'NOT_FOUND'
  | 'LOCK_TIMEOUT'
  | 'SPAWN_FAILED'
  | 'CORRUPT_STORE'
  | 'NESTED_SCOPE';

export abstract class ServectlError extends Error {
  abstract readonly code: ServectlErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** No session with the given id exists in the store. */
export class NotFoundError extends ServectlError {
  readonly code = 'NOT_FOUND' as const;

  constructor(readonly sessionId: string) {
    super(`Session ${sessionId} not found`);
  }
}

/** The store lock could not be obtained within the timeout. */
export class LockTimeoutError extends ServectlError {
  readonly code = 'LOCK_TIMEOUT' as const;

  constructor(
    readonly lockPath: string,
    readonly timeoutMs: number,
  ) {
    super(`Timed out after ${timeoutMs}ms waiting for lock ${lockPath}`);
  }
}

/** The managed service failed to start. */
export class SpawnError extends ServectlError {
  readonly code = 'SPAWN_FAILED' as const;

  constructor(
    message: string,
    readonly port: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** The store document exists but its top level cannot be read. */
export class CorruptStoreError extends ServectlError {
  readonly code = 'CORRUPT_STORE' as const;

  constructor(
    readonly storePath: string,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super(`Corrupt session store ${storePath}: ${reason}`, options);
  }
}

/** A transactional scope was opened while another was already open for the same store. */
export class NestedScopeError extends ServectlError {
  readonly code = 'NESTED_SCOPE' as const;

  constructor(readonly storePath: string) {
    super(`A transactional scope is already open for ${storePath}; thread the open store instead`);
  }
}

export function isServectlError(err: unknown): err is ServectlError {
  return err instanceof ServectlError;
}
