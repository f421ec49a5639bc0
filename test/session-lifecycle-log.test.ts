/**
 * @fileoverview Tests for the JSONL lifecycle audit log.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { appendFile, readdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { SessionLifecycleLog } from '../src/session-lifecycle-log.js';
import { createTestDir } from './setup.js';

describe('SessionLifecycleLog', () => {
  let filePath: string;
  let log: SessionLifecycleLog;

  beforeEach(async () => {
    filePath = join(await createTestDir(), 'nested', 'lifecycle.jsonl');
    log = new SessionLifecycleLog(filePath);
  });

  it('appends one JSON line per event in order', async () => {
    log.log({ event: 'started', sessionId: 'sv-1', port: 9100, pid: 10, ts: 1 });
    log.log({ event: 'stopped', sessionId: 'sv-1', reason: 'terminated', ts: 2 });
    await log.flush();

    const lines = (await readFile(filePath, 'utf-8')).trim().split('\n');
    expect(lines.map((l) => JSON.parse(l))).toEqual([
      { ts: 1, event: 'started', sessionId: 'sv-1', port: 9100, pid: 10 },
      { ts: 2, event: 'stopped', sessionId: 'sv-1', reason: 'terminated' },
    ]);
  });

  it('stamps entries with the current time by default', async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2024-05-01T00:00:00.000Z'));
    log.log({ event: 'touched', sessionId: 'sv-1' });
    vi.useRealTimers();
    await log.flush();

    const [entry] = await log.query();
    expect(entry.ts).toBe(Date.parse('2024-05-01T00:00:00.000Z'));
  });

  it('queries newest first with filters and a limit', async () => {
    log.log({ event: 'started', sessionId: 'sv-1', ts: 100 });
    log.log({ event: 'started', sessionId: 'sv-2', ts: 200 });
    log.log({ event: 'reaped', sessionId: 'sv-1', ts: 300 });
    log.log({ event: 'touched', sessionId: 'sv-2', ts: 400 });
    await log.flush();

    expect((await log.query()).map((e) => e.ts)).toEqual([400, 300, 200, 100]);
    expect((await log.query({ sessionId: 'sv-1' })).map((e) => e.event)).toEqual(['reaped', 'started']);
    expect((await log.query({ event: 'started' })).map((e) => e.sessionId)).toEqual(['sv-2', 'sv-1']);
    expect((await log.query({ since: 250 })).map((e) => e.ts)).toEqual([400, 300]);
    expect((await log.query({ limit: 1 })).map((e) => e.ts)).toEqual([400]);
  });

  it('skips torn and foreign lines', async () => {
    log.log({ event: 'started', sessionId: 'sv-1', ts: 1 });
    await log.flush();
    await appendFile(filePath, '{"ts": 2, "event": "sta\n{"hello":"world"}\n');

    expect((await log.query()).map((e) => e.sessionId)).toEqual(['sv-1']);
  });

  it('returns nothing before the first write', async () => {
    expect(await log.query()).toEqual([]);
  });

  it('reports a failed write without throwing', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    // The target is a directory, so every append fails
    const broken = new SessionLifecycleLog(dirname(filePath));

    broken.log({ event: 'started', sessionId: 'sv-1' });
    await broken.flush();

    expect(error).toHaveBeenCalledWith('[LifecycleLog] Failed to write:', expect.any(Error));
    error.mockRestore();
  });

  describe('trimIfNeeded', () => {
    it('leaves a small log alone', async () => {
      log.log({ event: 'started', sessionId: 'sv-1', ts: 1 });
      expect(await log.trimIfNeeded()).toBe(false);
    });

    it('keeps the newest 8000 lines once past 10000', async () => {
      const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
      const lines = Array.from({ length: 10_001 }, (_, i) =>
        JSON.stringify({ ts: i, event: 'touched', sessionId: 'sv-1' }),
      );
      await writeFile(filePath, lines.join('\n') + '\n');

      expect(await log.trimIfNeeded()).toBe(true);

      const kept = (await readFile(filePath, 'utf-8')).trim().split('\n');
      expect(kept).toHaveLength(8000);
      expect(JSON.parse(kept[0]).ts).toBe(2001);
      expect(spy).toHaveBeenCalledWith('[LifecycleLog] Trimmed from 10001 to 8000 entries');
      spy.mockRestore();
    });

    it('replaces the file without leaving a temporary copy', async () => {
      const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
      const lines = Array.from({ length: 10_500 }, (_, i) =>
        JSON.stringify({ ts: i, event: 'touched', sessionId: 'sv-1' }),
      );
      await writeFile(filePath, lines.join('\n') + '\n');

      expect(await log.trimIfNeeded()).toBe(true);

      expect(await readdir(dirname(filePath))).toEqual(['lifecycle.jsonl']);
      const [newest] = await log.query({ limit: 1 });
      expect(newest.ts).toBe(10_499);
      spy.mockRestore();
    });
  });
});
