/**
 * @fileoverview Cross-process exclusive lock on the session store.
 *
 * Uses mkdir atomic locking: creating `<store>.lock/` either succeeds for
 * exactly one process or fails with EEXIST. The holder records its pid and
 * a token in `owner.json` inside the directory and keeps touching that file
 * while it holds the lock, so that a lock left behind by a crashed process
 * (or one whose pid has since been reused) can be recognised and broken.
 *
 * Breaking is serialised through a sibling `<store>.lock.break/` marker.
 * The breaker re-inspects the lock under the marker, renames the directory
 * to a unique tombstone and checks the owner inside the tombstone before
 * deleting it; a directory that turns out to belong to a new holder is
 * moved back.
 *
 * @module file-lock
 */

import { mkdir, readFile, rename, rm, stat, utimes, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import {
  LOCK_BREAK_STALE_MS,
  LOCK_HEARTBEAT_INTERVAL_MS,
  LOCK_POLL_INTERVAL_MS,
  LOCK_STALE_AFTER_MS,
  LOCK_TIMEOUT_MS,
} from './config/lifecycle-timing.js';
import { LockTimeoutError } from './errors.js';
import { isProcessAlive } from './process-control.js';
import { debugLog } from './utils/debug-log.js';

const OWNER_FILE = 'owner.json';

export interface LockOwner {
  pid: number;
  acquiredAt: number;
  /** Distinguishes acquisitions by the same pid within one millisecond */
  token?: string;
}

export interface FileLockOptions {
  pollIntervalMs?: number;
  /** Age after which a lock without an owner file is considered abandoned (ms) */
  orphanAfterMs?: number;
  heartbeatIntervalMs?: number;
  /** Heartbeat age after which a lock with a live pid is still broken (ms) */
  staleAfterMs?: number;
  isProcessAlive?: (pid: number) => boolean;
}

type LockState =
  | { kind: 'free' }
  | { kind: 'held' }
  | { kind: 'stale'; owner: LockOwner | null; message: string };

type RemoveResult = 'removed' | 'gone' | 'restored';

let tombstoneSeq = 0;

function isLockOwner(value: unknown): value is LockOwner {
  if (typeof value !== 'object' || value === null) return false;
  if (!('pid' in value && typeof value.pid === 'number')) return false;
  if (!('acquiredAt' in value && typeof value.acquiredAt === 'number')) return false;
  return !('token' in value) || typeof value.token === 'string';
}

function sameOwner(a: LockOwner | null, b: LockOwner | null): boolean {
  if (a === null || b === null) return a === b;
  return a.pid === b.pid && a.acquiredAt === b.acquiredAt && a.token === b.token;
}

function errnoCode(err: unknown): string | undefined {
  return (err as NodeJS.ErrnoException).code;
}

/** Owner recorded in `dir`, with the owner file's mtime as its last heartbeat. */
async function readOwnerRecord(dir: string): Promise<{ owner: LockOwner; heartbeatMs: number } | null> {
  const file = join(dir, OWNER_FILE);
  try {
    const parsed: unknown = JSON.parse(await readFile(file, 'utf-8'));
    if (!isLockOwner(parsed)) return null;
    return { owner: parsed, heartbeatMs: (await stat(file)).mtimeMs };
  } catch {
    return null;
  }
}

export class FileLock {
  private held = false;
  private owner: LockOwner | null = null;
  private heartbeat: NodeJS.Timeout | null = null;
  private readonly pollIntervalMs: number;
  private readonly orphanAfterMs: number;
  private readonly heartbeatIntervalMs: number;
  private readonly staleAfterMs: number;
  private readonly isAlive: (pid: number) => boolean;

  constructor(
    readonly lockPath: string,
    options: FileLockOptions = {},
  ) {
    this.pollIntervalMs = options.pollIntervalMs ?? LOCK_POLL_INTERVAL_MS;
    this.orphanAfterMs = options.orphanAfterMs ?? LOCK_TIMEOUT_MS;
    this.heartbeatIntervalMs = options.heartbeatIntervalMs ?? LOCK_HEARTBEAT_INTERVAL_MS;
    this.staleAfterMs = options.staleAfterMs ?? LOCK_STALE_AFTER_MS;
    this.isAlive = options.isProcessAlive ?? isProcessAlive;
  }

  get isHeld(): boolean {
    return this.held;
  }

  /**
   * Blocks until the lock is obtained.
   * @throws LockTimeoutError after `timeoutMs`
   */
  async acquire(timeoutMs: number = LOCK_TIMEOUT_MS): Promise<void> {
    if (this.held) {
      throw new Error(`Lock ${this.lockPath} is already held by this instance`);
    }
    await mkdir(dirname(this.lockPath), { recursive: true });

    const deadline = Date.now() + timeoutMs;
    for (;;) {
      if (await this.tryAcquire()) return;
      if (await this.breakIfStale()) continue;
      if (Date.now() >= deadline) {
        throw new LockTimeoutError(this.lockPath, timeoutMs);
      }
      await new Promise((resolve) => setTimeout(resolve, this.pollIntervalMs));
    }
  }

  /**
   * Releases the lock. No-op if not held.
   *
   * Leaves the directory alone if it no longer carries this instance's
   * owner record (the lock was broken and taken by another process).
   */
  async release(): Promise<void> {
    if (!this.held) return;
    const owner = this.owner;
    this.held = false;
    this.owner = null;
    this.stopHeartbeat();

    if ((await this.removeIfOwnedBy(owner)) === 'restored') {
      console.warn(`[FileLock] Lock ${this.lockPath} was taken over before release`);
    }
  }

  /** Reads the current owner, or null if there is none or it is unreadable. */
  async readOwner(): Promise<LockOwner | null> {
    return (await readOwnerRecord(this.lockPath))?.owner ?? null;
  }

  private async tryAcquire(): Promise<boolean> {
    try {
      await mkdir(this.lockPath);
    } catch (err) {
      if (errnoCode(err) === 'EEXIST') return false;
      throw err;
    }
    const owner: LockOwner = { pid: process.pid, acquiredAt: Date.now(), token: uuidv4() };
    try {
      await writeFile(join(this.lockPath, OWNER_FILE), JSON.stringify(owner), { encoding: 'utf-8', flag: 'wx' });
    } catch (err) {
      // Directory moved away by a breaker, or replaced by another holder's
      const code = errnoCode(err);
      if (code === 'ENOENT' || code === 'EEXIST') return false;
      await rm(this.lockPath, { recursive: true, force: true });
      throw err;
    }
    this.held = true;
    this.owner = owner;
    this.startHeartbeat();
    return true;
  }

  private async inspect(): Promise<LockState> {
    const record = await readOwnerRecord(this.lockPath);
    const now = Date.now();
    if (record) {
      const { owner, heartbeatMs } = record;
      if (!this.isAlive(owner.pid)) {
        return { kind: 'stale', owner, message: `Breaking lock ${this.lockPath} left by dead process ${owner.pid}` };
      }
      const silentMs = Math.round(now - heartbeatMs);
      if (silentMs > this.staleAfterMs) {
        return {
          kind: 'stale',
          owner,
          message: `Breaking lock ${this.lockPath} held by process ${owner.pid} with no heartbeat for ${silentMs}ms`,
        };
      }
      return { kind: 'held' };
    }

    let mtimeMs: number;
    try {
      mtimeMs = (await stat(this.lockPath)).mtimeMs;
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') return { kind: 'free' };
      throw err;
    }
    // Holder died between mkdir and writing owner.json, or is about to write it
    if (now - mtimeMs < this.orphanAfterMs) return { kind: 'held' };
    return { kind: 'stale', owner: null, message: `Breaking ownerless lock ${this.lockPath}` };
  }

  /**
   * Removes a lock whose owner process is gone, whose heartbeat stopped, or
   * an ownerless lock older than orphanAfterMs.
   * @returns true if the caller should retry acquisition immediately
   */
  private async breakIfStale(): Promise<boolean> {
    const first = await this.inspect();
    if (first.kind === 'free') return true;
    if (first.kind === 'held') return false;

    return this.withBreakMarker(async () => {
      // Another breaker may have finished while we waited
      const state = await this.inspect();
      if (state.kind !== 'stale') return state.kind === 'free';

      const result = await this.removeIfOwnedBy(state.owner);
      if (result === 'removed') {
        console.warn(`[FileLock] ${state.message}`);
      }
      return result !== 'restored';
    });
  }

  /**
   * Moves the lock directory to a tombstone and deletes it only if the
   * tombstone still carries `expected` as its owner.
   */
  private async removeIfOwnedBy(expected: LockOwner | null): Promise<RemoveResult> {
    const tombstone = `${this.lockPath}.stale.${process.pid}.${++tombstoneSeq}`;
    try {
      await rename(this.lockPath, tombstone);
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') return 'gone';
      throw err;
    }

    const moved = await readOwnerRecord(tombstone);
    if (sameOwner(moved?.owner ?? null, expected)) {
      await rm(tombstone, { recursive: true, force: true });
      return 'removed';
    }

    try {
      await rename(tombstone, this.lockPath);
    } catch (err) {
      console.warn(`[FileLock] Could not restore lock ${this.lockPath} to its holder: ${errnoCode(err) ?? String(err)}`);
      await rm(tombstone, { recursive: true, force: true });
    }
    return 'restored';
  }

  /**
   * Runs `fn` while holding the break marker. Returns false without running
   * it when another process is breaking the lock.
   */
  private async withBreakMarker(fn: () => Promise<boolean>): Promise<boolean> {
    const markerPath = `${this.lockPath}.break`;
    try {
      await mkdir(markerPath);
    } catch (err) {
      if (errnoCode(err) !== 'EEXIST') throw err;
      await this.clearAbandonedMarker(markerPath);
      return false;
    }
    try {
      return await fn();
    } finally {
      await rm(markerPath, { recursive: true, force: true });
    }
  }

  private async clearAbandonedMarker(markerPath: string): Promise<void> {
    try {
      const { mtimeMs } = await stat(markerPath);
      if (Date.now() - mtimeMs < LOCK_BREAK_STALE_MS) return;
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') return;
      throw err;
    }
    console.warn(`[FileLock] Removing abandoned break marker ${markerPath}`);
    await rm(markerPath, { recursive: true, force: true });
  }

  private startHeartbeat(): void {
    const ownerFile = join(this.lockPath, OWNER_FILE);
    this.heartbeat = setInterval(() => {
      const now = new Date();
      utimes(ownerFile, now, now).catch((err: unknown) => {
        debugLog('FileLock', `Heartbeat failed for ${this.lockPath}`, err);
      });
    }, this.heartbeatIntervalMs);
    this.heartbeat.unref();
  }

  private stopHeartbeat(): void {
    if (this.heartbeat) {
      clearInterval(this.heartbeat);
      this.heartbeat = null;
    }
  }
}
