/**
 * @fileoverview Tests for the persisted session store.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { readFile, readdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { SessionStore, normalizeStoredSession, toStoredSession } from '../src/session-store.js';
import { CorruptStoreError } from '../src/errors.js';
import type { SessionRecord, SessionView } from '../src/types.js';
import { createTestDir } from './setup.js';

function record(overrides: Partial<SessionRecord> = {}): SessionRecord {
  return {
    id: 'sv-00000001',
    port: 9100,
    pid: 4242,
    createdAt: 1_000,
    lastActivity: 2_000,
    workdir: '/tmp/project',
    agent: null,
    status: 'running',
    ...overrides,
  };
}

describe('SessionStore', () => {
  let dir: string;
  let storePath: string;

  beforeEach(async () => {
    dir = await createTestDir();
    storePath = join(dir, 'store.json');
  });

  // ========== Loading ==========

  describe('load', () => {
    it('returns an empty store when the file does not exist', async () => {
      const store = await SessionStore.load(storePath);
      expect(store.size).toBe(0);
    });

    it('treats an empty file as an empty store', async () => {
      await writeFile(storePath, '  \n');
      const store = await SessionStore.load(storePath);
      expect(store.size).toBe(0);
    });

    it('throws CorruptStoreError for invalid JSON', async () => {
      await writeFile(storePath, '{"sessions": ');
      await expect(SessionStore.load(storePath)).rejects.toBeInstanceOf(CorruptStoreError);
    });

    it('throws CorruptStoreError when sessions is not an object', async () => {
      await writeFile(storePath, JSON.stringify({ sessions: [1, 2] }));
      await expect(SessionStore.load(storePath)).rejects.toBeInstanceOf(CorruptStoreError);
    });

    it('accepts a document without a sessions key', async () => {
      await writeFile(storePath, JSON.stringify({ version: 1 }));
      const store = await SessionStore.load(storePath);
      expect(store.size).toBe(0);
    });

    it('drops records without a usable port or pid and warns', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      await writeFile(
        storePath,
        JSON.stringify({
          sessions: {
            good: { port: 9100, pid: 10 },
            noPort: { pid: 11 },
            badPid: { port: 9101, pid: 'x' },
          },
        }),
      );

      const store = await SessionStore.load(storePath);

      expect(store.all().map((s) => s.id)).toEqual(['good']);
      expect(warn).toHaveBeenCalledWith('[SessionStore] Dropping unreadable session entry noPort');
      expect(warn).toHaveBeenCalledWith('[SessionStore] Dropping unreadable session entry badPid');
      warn.mockRestore();
    });
  });

  // ========== Normalization ==========

  describe('normalizeStoredSession', () => {
    it('fills optional fields with defaults', () => {
      expect(normalizeStoredSession('sv-aaaa0000', { port: 9105, pid: 77 })).toEqual({
        id: 'sv-aaaa0000',
        port: 9105,
        pid: 77,
        createdAt: 0,
        lastActivity: 0,
        workdir: null,
        agent: null,
        status: 'running',
      });
    });

    it('parses ISO timestamps to epoch milliseconds', () => {
      const session = normalizeStoredSession('a', {
        port: 9100,
        pid: 1,
        createdAt: '2024-01-01T00:00:00.000Z',
        lastActivity: '2024-01-01T00:01:00.000Z',
      });
      expect(session?.createdAt).toBe(1704067200000);
      expect(session?.lastActivity).toBe(1704067260000);
    });

    it('uses one timestamp for the other when only one is present', () => {
      const session = normalizeStoredSession('a', { port: 9100, pid: 1, createdAt: 5000 });
      expect(session?.lastActivity).toBe(5000);
    });

    it('maps an unknown status to running', () => {
      const session = normalizeStoredSession('a', { port: 9100, pid: 1, status: 'busy' });
      expect(session?.status).toBe('running');
    });

    it('keeps a known status', () => {
      const session = normalizeStoredSession('a', { port: 9100, pid: 1, status: 'idle' });
      expect(session?.status).toBe('idle');
    });

    it('returns null for an out-of-range port', () => {
      expect(normalizeStoredSession('a', { port: 70000, pid: 1 })).toBeNull();
    });
  });

  // ========== Saving ==========

  describe('save', () => {
    it('writes a versioned document that loads back to the same records', async () => {
      const store = new SessionStore(storePath, [record(), record({ id: 'sv-00000002', port: 9101, agent: 'build' })]);
      await store.save();

      const reloaded = await SessionStore.load(storePath);
      expect(reloaded.all()).toEqual(store.all());

      const doc = JSON.parse(await readFile(storePath, 'utf-8'));
      expect(doc.version).toBe(1);
      expect(Object.keys(doc.sessions)).toEqual(['sv-00000001', 'sv-00000002']);
    });

    it('leaves no temp file behind', async () => {
      await new SessionStore(storePath, [record()]).save();
      expect(await readdir(dir)).toEqual(['store.json']);
    });

    it('creates the parent directory', async () => {
      const nested = join(dir, 'a', 'b', 'store.json');
      await new SessionStore(nested).save();
      expect(JSON.parse(await readFile(nested, 'utf-8'))).toEqual({ version: 1, sessions: {} });
    });

    it('never persists view fields', async () => {
      const view: SessionView = {
        ...record(),
        hasPendingChanges: true,
        changedItems: ['a.ts'],
        observedAt: 3_000,
      };
      await new SessionStore(storePath, [view]).save();

      const doc = JSON.parse(await readFile(storePath, 'utf-8'));
      expect(doc.sessions['sv-00000001']).toEqual(record());
    });
  });

  // ========== Mutation ==========

  describe('touch', () => {
    it('moves lastActivity forward', () => {
      const store = new SessionStore(storePath, [record({ lastActivity: 2_000 })]);
      expect(store.touch('sv-00000001', 5_000)?.lastActivity).toBe(5_000);
    });

    it('never moves lastActivity backwards', () => {
      const store = new SessionStore(storePath, [record({ lastActivity: 9_000 })]);
      expect(store.touch('sv-00000001', 5_000)?.lastActivity).toBe(9_000);
    });

    it('returns null for an unknown id', () => {
      const store = new SessionStore(storePath);
      expect(store.touch('missing', 5_000)).toBeNull();
    });
  });

  describe('allocatePort', () => {
    it('does not hand out the same port twice within a scope', () => {
      const store = new SessionStore(storePath, [record({ port: 9100 })]);
      expect(store.allocatePort(9100)).toBe(9101);
      expect(store.allocatePort(9100)).toBe(9102);
    });

    it('reuses a released reservation', () => {
      const store = new SessionStore(storePath);
      const port = store.allocatePort(9100);
      store.releasePort(port);
      expect(store.allocatePort(9100)).toBe(9100);
    });

    it('frees a port once its record is removed', () => {
      const store = new SessionStore(storePath, [record({ port: 9100 })]);
      expect(store.remove('sv-00000001')).toBe(true);
      expect(store.allocatePort(9100)).toBe(9100);
    });
  });

  it('toStoredSession strips extra fields', () => {
    const view: SessionView = { ...record(), hasPendingChanges: false, changedItems: [], observedAt: 1 };
    expect(Object.keys(toStoredSession(view))).toEqual([
      'id', 'port', 'pid', 'createdAt', 'lastActivity', 'workdir', 'agent', 'status',
    ]);
  });
});
