/**
 * @fileoverview Tests for the mkdir-based store lock.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { mkdir, readdir, readFile, stat, utimes, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { FileLock } from '../src/file-lock.js';
import { LockTimeoutError } from '../src/errors.js';
import { createTestDir } from './setup.js';

const DEAD_PID = 999999;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('FileLock', () => {
  let dir: string;
  let lockPath: string;

  beforeEach(async () => {
    dir = await createTestDir();
    lockPath = join(dir, 'store.lock');
  });

  it('creates the lock directory with an owner file', async () => {
    const lock = new FileLock(lockPath);
    await lock.acquire(1000);

    expect(lock.isHeld).toBe(true);
    const owner = JSON.parse(await readFile(join(lockPath, 'owner.json'), 'utf-8'));
    expect(owner.pid).toBe(process.pid);
    expect(typeof owner.acquiredAt).toBe('number');

    await lock.release();
    expect(lock.isHeld).toBe(false);
    expect(existsSync(lockPath)).toBe(false);
  });

  it('release is a no-op when not held', async () => {
    const lock = new FileLock(lockPath);
    await lock.release();
    expect(existsSync(lockPath)).toBe(false);
  });

  it('refuses to acquire twice on the same instance', async () => {
    const lock = new FileLock(lockPath);
    await lock.acquire(1000);
    await expect(lock.acquire(1000)).rejects.toThrow('already held');
    await lock.release();
  });

  it('times out while a live holder keeps the lock', async () => {
    const holder = new FileLock(lockPath);
    await holder.acquire(1000);

    const waiter = new FileLock(lockPath, { pollIntervalMs: 10 });
    const err = await waiter.acquire(100).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(LockTimeoutError);
    expect(err).toMatchObject({ code: 'LOCK_TIMEOUT', lockPath, timeoutMs: 100 });
    await holder.release();
  });

  it('is obtained once the holder releases it', async () => {
    const holder = new FileLock(lockPath);
    await holder.acquire(1000);

    const waiter = new FileLock(lockPath, { pollIntervalMs: 10 });
    const acquired = waiter.acquire(2000);
    setTimeout(() => {
      void holder.release();
    }, 50);
    await acquired;

    expect(waiter.isHeld).toBe(true);
    await waiter.release();
  });

  it('breaks a lock left by a dead process', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    await mkdir(lockPath);
    await writeFile(join(lockPath, 'owner.json'), JSON.stringify({ pid: 999999, acquiredAt: 1 }));

    const lock = new FileLock(lockPath, { isProcessAlive: (pid) => pid !== 999999 });
    await lock.acquire(500);

    expect(warn).toHaveBeenCalledWith(`[FileLock] Breaking lock ${lockPath} left by dead process 999999`);
    const owner = JSON.parse(await readFile(join(lockPath, 'owner.json'), 'utf-8'));
    expect(owner.pid).toBe(process.pid);
    await lock.release();
    warn.mockRestore();
  });

  it('breaks an ownerless lock older than orphanAfterMs', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    await mkdir(lockPath);

    const lock = new FileLock(lockPath, { orphanAfterMs: 0 });
    await lock.acquire(500);

    expect(lock.isHeld).toBe(true);
    expect(warn).toHaveBeenCalledWith(`[FileLock] Breaking ownerless lock ${lockPath}`);
    await lock.release();
    warn.mockRestore();
  });

  it('waits on a fresh ownerless lock', async () => {
    await mkdir(lockPath);
    const lock = new FileLock(lockPath, { pollIntervalMs: 10, orphanAfterMs: 60_000 });
    await expect(lock.acquire(80)).rejects.toBeInstanceOf(LockTimeoutError);
    expect((await stat(lockPath)).isDirectory()).toBe(true);
  });

  it('hands a dead-owner lock to one contender at a time', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    await mkdir(lockPath);
    await writeFile(join(lockPath, 'owner.json'), JSON.stringify({ pid: DEAD_PID, acquiredAt: 1 }));

    let holders = 0;
    let maxHolders = 0;
    const contenders = Array.from(
      { length: 8 },
      () => new FileLock(lockPath, { pollIntervalMs: 1, isProcessAlive: (pid) => pid !== DEAD_PID }),
    );
    const results = await Promise.allSettled(
      contenders.map(async (lock) => {
        for (let round = 0; round < 5; round++) {
          await lock.acquire(10_000);
          holders++;
          maxHolders = Math.max(maxHolders, holders);
          await sleep(1);
          holders--;
          await lock.release();
        }
      }),
    );

    expect(results.filter((r) => r.status === 'rejected')).toEqual([]);
    expect(maxHolders).toBe(1);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(`[FileLock] Breaking lock ${lockPath} left by dead process ${DEAD_PID}`);
    expect(await readdir(dir)).toEqual([]);
    warn.mockRestore();
  });

  it('refreshes the owner file while held', async () => {
    const lock = new FileLock(lockPath, { heartbeatIntervalMs: 20 });
    await lock.acquire(1000);
    const ownerFile = join(lockPath, 'owner.json');
    const old = new Date(Date.now() - 60_000);
    await utimes(ownerFile, old, old);

    await sleep(100);

    expect((await stat(ownerFile)).mtimeMs).toBeGreaterThan(Date.now() - 5_000);
    await lock.release();
  });

  it('breaks a lock whose heartbeat stopped even though its pid is alive', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    await mkdir(lockPath);
    const ownerFile = join(lockPath, 'owner.json');
    await writeFile(ownerFile, JSON.stringify({ pid: process.pid, acquiredAt: 1, token: 'reused-pid' }));
    const old = new Date(Date.now() - 120_000);
    await utimes(ownerFile, old, old);

    const lock = new FileLock(lockPath, { staleAfterMs: 30_000 });
    await lock.acquire(500);

    expect(warn).toHaveBeenCalledWith(
      expect.stringMatching(
        new RegExp(`^\\[FileLock\\] Breaking lock .+ held by process ${process.pid} with no heartbeat for \\d+ms$`),
      ),
    );
    const owner = JSON.parse(await readFile(ownerFile, 'utf-8'));
    expect(owner.acquiredAt).not.toBe(1);
    expect(owner.token).not.toBe('reused-pid');
    await lock.release();
    warn.mockRestore();
  });

  it('does not delete a lock that another holder took over', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const lock = new FileLock(lockPath);
    await lock.acquire(1000);
    const takeover = { pid: process.pid, acquiredAt: 42, token: 'other-holder' };
    await writeFile(join(lockPath, 'owner.json'), JSON.stringify(takeover));

    await lock.release();

    expect(lock.isHeld).toBe(false);
    expect(warn).toHaveBeenCalledWith(`[FileLock] Lock ${lockPath} was taken over before release`);
    expect(JSON.parse(await readFile(join(lockPath, 'owner.json'), 'utf-8'))).toEqual(takeover);
    expect(await readdir(dir)).toEqual(['store.lock']);
    warn.mockRestore();
  });
});
