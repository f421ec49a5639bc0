/**
 * @fileoverview Append-only JSONL audit log for session lifecycle events.
 *
 * Records every start, failed start, stop, reap, idle cleanup and touch to
 * `<dataDir>/lifecycle.jsonl`. The store only holds live sessions; this log
 * is where removed ones can still be traced.
 *
 * @module session-lifecycle-log
 */

import { appendFile, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { LifecycleEventType, LifecycleEntry } from './types/lifecycle.js';

const MAX_LINES = 10_000;
const TRIM_TO = 8_000;

function isLifecycleEntry(value: unknown): value is LifecycleEntry {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'ts' in value && typeof value.ts === 'number' &&
    'event' in value && typeof value.event === 'string' &&
    'sessionId' in value && typeof value.sessionId === 'string'
  );
}

export interface LifecycleQuery {
  sessionId?: string;
  event?: LifecycleEventType;
  since?: number;
  limit?: number;
}

export class SessionLifecycleLog {
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(readonly filePath: string) {
    const dir = dirname(this.filePath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true, mode: 0o700 });
    }
  }

  /**
   * Append a lifecycle event. Fire-and-forget; errors are logged but never thrown.
   */
  log(entry: Omit<LifecycleEntry, 'ts'> & { ts?: number }): void {
    const line = JSON.stringify({ ts: Date.now(), ...entry }) + '\n';
    // Chain writes to prevent interleaving
    this.writeQueue = this.writeQueue
      .then(() => appendFile(this.filePath, line, 'utf-8'))
      .catch((err) => {
        console.error('[LifecycleLog] Failed to write:', err);
      });
  }

  /** Resolves once every queued write has settled. */
  flush(): Promise<void> {
    return this.writeQueue;
  }

  /**
   * Query the log, newest first.
   */
  async query(opts?: LifecycleQuery): Promise<LifecycleEntry[]> {
    const limit = opts?.limit ?? 200;

    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') return [];
      throw err;
    }

    const lines = raw.trim().split('\n').filter(Boolean);
    const entries: LifecycleEntry[] = [];

    for (let i = lines.length - 1; i >= 0 && entries.length < limit; i--) {
      let entry: unknown;
      try {
        entry = JSON.parse(lines[i]);
      } catch {
        continue; // torn or hand-edited line
      }
      if (!isLifecycleEntry(entry)) continue;
      if (opts?.sessionId && entry.sessionId !== opts.sessionId) continue;
      if (opts?.event && entry.event !== opts.event) continue;
      if (opts?.since && entry.ts < opts.since) continue;
      entries.push(entry);
    }

    return entries;
  }

  /**
   * Trim the log file once it exceeds MAX_LINES, keeping the newest TRIM_TO.
   *
   * The trimmed copy replaces the file by rename, so readers never see a
   * partial file. Appends from other processes are not serialised here;
   * callers hold the store lock (see SessionCoordinator.trimAuditLog).
   * @returns true if the file was trimmed
   */
  async trimIfNeeded(): Promise<boolean> {
    await this.flush();
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') return false;
      throw err;
    }

    const lines = raw.trim().split('\n').filter(Boolean);
    if (lines.length <= MAX_LINES) return false;

    const trimmed = lines.slice(-TRIM_TO);
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await writeFile(tmpPath, trimmed.join('\n') + '\n', 'utf-8');
      await rename(tmpPath, this.filePath);
    } catch (err) {
      await rm(tmpPath, { force: true });
      throw err;
    }
    console.log(`[LifecycleLog] Trimmed from ${lines.length} to ${trimmed.length} entries`);
    return true;
  }
}
