/**
 * @fileoverview Transactional access to the session store.
 *
 * A scope acquires the store lock, loads the store, hands it to the caller
 * and, if the caller returns normally, saves it before releasing the lock.
 * If the caller throws, the save is skipped and the lock is still released.
 * This is the only code path that writes store.json.
 *
 * One logical operation opens exactly one scope. Opening a second scope on
 * the same store from inside the first would wait on our own lock, so it
 * fails immediately with NestedScopeError instead. Independent operations
 * running concurrently in one process are not nested: they queue on the
 * lock like separate processes do.
 *
 * @module session-transaction
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { LOCK_TIMEOUT_MS } from './config/lifecycle-timing.js';
import type { DataPaths } from './config/paths.js';
import { NestedScopeError } from './errors.js';
import { FileLock, type FileLockOptions } from './file-lock.js';
import { SessionStore } from './session-store.js';

export interface ScopeOptions {
  lockTimeoutMs?: number;
  lock?: FileLockOptions;
}

/** Store paths with a scope open in the current async call chain */
const scopeContext = new AsyncLocalStorage<ReadonlySet<string>>();

/** True if the calling code runs inside a scope on this store. */
export function isScopeOpen(storePath: string): boolean {
  return scopeContext.getStore()?.has(storePath) ?? false;
}

export async function withSessionStore<T>(
  paths: Pick<DataPaths, 'storePath' | 'lockPath'>,
  fn: (store: SessionStore) => Promise<T> | T,
  options: ScopeOptions = {},
): Promise<T> {
  const open = scopeContext.getStore() ?? new Set<string>();
  if (open.has(paths.storePath)) {
    throw new NestedScopeError(paths.storePath);
  }

  const lock = new FileLock(paths.lockPath, options.lock);
  await lock.acquire(options.lockTimeoutMs ?? LOCK_TIMEOUT_MS);
  try {
    return await scopeContext.run(new Set([...open, paths.storePath]), async () => {
      const store = await SessionStore.load(paths.storePath);
      const result = await fn(store);
      await store.save();
      return result;
    });
  } finally {
    await lock.release();
  }
}
