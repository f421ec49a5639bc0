/**
 * @fileoverview Persistent JSON store of supervised sessions.
 *
 * The store lives at `<dataDir>/store.json` and is only ever read and written
 * inside a transactional scope (see session-transaction.ts), which holds the
 * cross-process lock for the whole load → mutate → save cycle.
 *
 * Writes are atomic: the document goes to a temp file that is then renamed
 * over the real one, so a crash mid-write leaves the previous document.
 *
 * @module session-store
 */

import { mkdir, readFile, rename, unlink, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { DEFAULT_PORT_BASE } from './config/lifecycle-timing.js';
import { CorruptStoreError } from './errors.js';
import { allocatePort } from './port-allocator.js';
import { SESSION_STATUSES, getErrorMessage, type SessionRecord, type SessionStatus } from './types.js';

/** Current document version */
export const STORE_VERSION = 1;

const TimestampSchema = z.union([z.number(), z.string()]);

/** Shape of one stored record. Only port and pid are required. */
const StoredSessionSchema = z.object({
  id: z.string().min(1).optional(),
  port: z.number().int().min(1).max(65535),
  pid: z.number().int().positive(),
  createdAt: TimestampSchema.optional(),
  lastActivity: TimestampSchema.optional(),
  workdir: z.string().nullable().optional(),
  agent: z.string().nullable().optional(),
  status: z.string().optional(),
});

/** Top-level document. Records are validated one by one. */
const StoreDocumentSchema = z.object({
  version: z.number().optional(),
  sessions: z.record(z.string(), z.unknown()).default({}),
});

export interface StoreDocument {
  version: number;
  sessions: Record<string, SessionRecord>;
}

function toEpochMs(value: number | string | undefined): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? undefined : parsed;
}

function toStatus(value: string | undefined): SessionStatus {
  const match = SESSION_STATUSES.find((s) => s === value);
  return match ?? 'running';
}

/**
 * Builds a record from stored data, filling missing optional fields.
 * Returns null when the entry lacks a usable port or pid.
 */
export function normalizeStoredSession(key: string, raw: unknown): SessionRecord | null {
  const parsed = StoredSessionSchema.safeParse(raw);
  if (!parsed.success) return null;
  const data = parsed.data;
  const createdAt = toEpochMs(data.createdAt);
  const lastActivity = toEpochMs(data.lastActivity);
  return {
    id: data.id ?? key,
    port: data.port,
    pid: data.pid,
    createdAt: createdAt ?? lastActivity ?? 0,
    lastActivity: lastActivity ?? createdAt ?? 0,
    workdir: data.workdir ?? null,
    agent: data.agent ?? null,
    status: toStatus(data.status),
  };
}

/** Picks exactly the persisted fields, whatever else the object carries. */
export function toStoredSession(record: SessionRecord): SessionRecord {
  return {
    id: record.id,
    port: record.port,
    pid: record.pid,
    createdAt: record.createdAt,
    lastActivity: record.lastActivity,
    workdir: record.workdir,
    agent: record.agent,
    status: record.status,
  };
}

/**
 * In-memory view of store.json for the duration of one scope.
 *
 * @example
 * ```typescript
 * await withSessionStore(paths, async (store) => {
 *   const port = store.allocatePort();
 *   store.add({ id, port, pid, ... });
 * });
 * ```
 */
export class SessionStore {
  private readonly sessions: Map<string, SessionRecord>;
  /** Ports handed out during this scope but not yet backed by a record */
  private readonly reservedPorts = new Set<number>();

  constructor(
    readonly filePath: string,
    sessions: Iterable<SessionRecord> = [],
  ) {
    this.sessions = new Map();
    for (const session of sessions) {
      this.sessions.set(session.id, session);
    }
  }

  /**
   * Reads the store from disk. A missing file yields an empty store.
   * @throws CorruptStoreError when the top-level document is unreadable
   */
  static async load(filePath: string): Promise<SessionStore> {
    let raw: string;
    try {
      raw = await readFile(filePath, 'utf-8');
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') return new SessionStore(filePath);
      throw err;
    }
    return SessionStore.parse(filePath, raw);
  }

  static parse(filePath: string, raw: string): SessionStore {
    if (raw.trim() === '') return new SessionStore(filePath);

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new CorruptStoreError(filePath, `invalid JSON (${getErrorMessage(err)})`, { cause: err });
    }

    const doc = StoreDocumentSchema.safeParse(json);
    if (!doc.success) {
      throw new CorruptStoreError(filePath, doc.error.issues[0]?.message ?? 'unexpected document shape');
    }

    const records: SessionRecord[] = [];
    for (const [key, value] of Object.entries(doc.data.sessions)) {
      const record = normalizeStoredSession(key, value);
      if (record) {
        records.push(record);
      } else {
        console.warn(`[SessionStore] Dropping unreadable session entry ${key}`);
      }
    }
    return new SessionStore(filePath, records);
  }

  /** Serializable document. Ephemeral view fields are never included. */
  toDocument(): StoreDocument {
    const sessions: Record<string, SessionRecord> = {};
    for (const [id, record] of this.sessions) {
      sessions[id] = toStoredSession(record);
    }
    return { version: STORE_VERSION, sessions };
  }

  /** Writes the store atomically (temp file + rename). */
  async save(): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    const json = JSON.stringify(this.toDocument(), null, 2);
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await writeFile(tempPath, json, 'utf-8');
      await rename(tempPath, this.filePath);
    } catch (err) {
      await unlink(tempPath).catch(() => undefined);
      throw err;
    }
  }

  get size(): number {
    return this.sessions.size;
  }

  /** Returns a session by ID, or null if not found. */
  get(id: string): SessionRecord | null {
    return this.sessions.get(id) ?? null;
  }

  has(id: string): boolean {
    return this.sessions.has(id);
  }

  /** All sessions in insertion order. */
  all(): SessionRecord[] {
    return Array.from(this.sessions.values());
  }

  add(session: SessionRecord): void {
    this.sessions.set(session.id, session);
    this.reservedPorts.delete(session.port);
  }

  remove(id: string): boolean {
    return this.sessions.delete(id);
  }

  /**
   * Moves lastActivity forward to `now`. Never moves it backwards.
   * @returns The updated record, or null if not found.
   */
  touch(id: string, now: number = Date.now()): SessionRecord | null {
    const session = this.sessions.get(id);
    if (!session) return null;
    session.lastActivity = Math.max(session.lastActivity, now);
    return session;
  }

  /** Reserves the lowest free port at or above `base` for this scope. */
  allocatePort(base: number = DEFAULT_PORT_BASE): number {
    const port = allocatePort(this.sessions.values(), base, this.reservedPorts);
    this.reservedPorts.add(port);
    return port;
  }

  /** Drops a reservation made by allocatePort(). */
  releasePort(port: number): void {
    this.reservedPorts.delete(port);
  }
}
