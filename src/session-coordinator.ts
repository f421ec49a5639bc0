/**
 * @fileoverview Lifecycle coordinator for supervised services.
 *
 * A SessionCoordinator is an explicit value built from a data directory and
 * its collaborators; nothing here is process-global. Every public operation
 * opens exactly one transactional scope (see session-transaction.ts) and
 * batch operations thread that one scope through all per-session work.
 *
 * Status is recomputed from OS liveness on read. A session whose process is
 * gone is reported `dead` and reaped before the scope that observed it ends.
 *
 * @module session-coordinator
 */

import { resolve } from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import {
  CLEANUP_MAX_IDLE_MS,
  DEFAULT_PORT_BASE,
  IDLE_THRESHOLD_MS,
  LOCK_TIMEOUT_MS,
  STOP_GRACE_MS,
  STOP_POLL_INTERVAL_MS,
} from './config/lifecycle-timing.js';
import { getDataPaths, getSessionLogPath, resolveDataDir, type DataPaths } from './config/paths.js';
import { HttpActivityReporter, type ActivitySignal, type SessionActivityReporter } from './activity-reporter.js';
import { NotFoundError, SpawnError } from './errors.js';
import { computeExternalState, DEFAULT_EXTERNAL_PROBE, execProbe, type ProbeRunner } from './external-state.js';
import { NodeProcessControl, type ProcessControl } from './process-control.js';
import { NodeServiceLauncher, type ServiceLauncher } from './session-launcher.js';
import { SessionLifecycleLog, type LifecycleQuery } from './session-lifecycle-log.js';
import { classifyStatus, inactivityMs } from './session-status.js';
import { toStoredSession, type SessionStore } from './session-store.js';
import { withSessionStore } from './session-transaction.js';
import {
  getErrorMessage,
  type ExternalProbeConfig,
  type ExternalState,
  type LaunchConfig,
  type LaunchedService,
  type ListingMode,
  type SessionRecord,
  type SessionStatus,
  type SessionView,
} from './types.js';
import type { LifecycleEntry } from './types/lifecycle.js';
import { debugLog } from './utils/debug-log.js';

export interface SessionCoordinatorOptions {
  /** Root holding store.json and its lock (default: $SERVECTL_DATA_DIR or ~/.local/share/servectl) */
  dataDir?: string;
  portBase?: number;
  idleThresholdMs?: number;
  lockTimeoutMs?: number;
  stopGraceMs?: number;
  stopPollIntervalMs?: number;
  listingMode?: ListingMode;
  probe?: ExternalProbeConfig;
  probeRunner?: ProbeRunner;
  processControl?: ProcessControl;
  launcher?: ServiceLauncher;
  activityReporter?: SessionActivityReporter;
  /** Audit log; pass null to disable */
  lifecycleLog?: SessionLifecycleLog | null;
  now?: () => number;
  idFactory?: () => string;
}

export interface ListOptions {
  /** Run the live external-state probe for each session (default true) */
  probe?: boolean;
}

/** How a stopped session's process went away */
export type StopOutcome = 'absent' | 'terminated' | 'killed';

export interface StopResult {
  session: SessionRecord;
  outcome: StopOutcome;
}

export interface StartedSession extends SessionRecord {
  url: string | null;
}

/** A launched service whose record has not reached store.json yet */
interface UnsavedService {
  id: string;
  port: number;
  pid: number;
}

/** Session ids look like `sv-1a2b3c4d` */
export function createSessionId(): string {
  return `sv-${uuidv4().slice(0, 8)}`;
}

export class SessionCoordinator {
  readonly paths: DataPaths;
  readonly listingMode: ListingMode;
  private readonly portBase: number;
  private readonly idleThresholdMs: number;
  private readonly lockTimeoutMs: number;
  private readonly stopGraceMs: number;
  private readonly stopPollIntervalMs: number;
  private readonly probe: ExternalProbeConfig;
  private readonly probeRunner: ProbeRunner;
  private readonly processControl: ProcessControl;
  private readonly launcher: ServiceLauncher;
  private readonly activityReporter: SessionActivityReporter;
  private readonly lifecycleLog: SessionLifecycleLog | null;
  private readonly now: () => number;
  private readonly idFactory: () => string;

  constructor(options: SessionCoordinatorOptions = {}) {
    this.paths = getDataPaths(resolveDataDir(options.dataDir));
    this.listingMode = options.listingMode ?? 'snapshot';
    this.portBase = options.portBase ?? DEFAULT_PORT_BASE;
    this.idleThresholdMs = options.idleThresholdMs ?? IDLE_THRESHOLD_MS;
    this.lockTimeoutMs = options.lockTimeoutMs ?? LOCK_TIMEOUT_MS;
    this.stopGraceMs = options.stopGraceMs ?? STOP_GRACE_MS;
    this.stopPollIntervalMs = options.stopPollIntervalMs ?? STOP_POLL_INTERVAL_MS;
    this.probe = options.probe ?? DEFAULT_EXTERNAL_PROBE;
    this.probeRunner = options.probeRunner ?? execProbe;
    this.processControl = options.processControl ?? new NodeProcessControl();
    this.launcher =
      options.launcher ??
      new NodeServiceLauncher({ processControl: this.processControl, stopGraceMs: this.stopGraceMs });
    this.activityReporter = options.activityReporter ?? new HttpActivityReporter();
    this.lifecycleLog =
      options.lifecycleLog === undefined ? new SessionLifecycleLog(this.paths.lifecycleLogPath) : options.lifecycleLog;
    this.now = options.now ?? Date.now;
    this.idFactory = options.idFactory ?? createSessionId;
  }

  // ========== Operations ==========

  /**
   * Lists live sessions. Dead sessions are removed from the store before
   * the scope ends and are not returned.
   *
   * Probes run one after another, so views in one listing may reflect the
   * working directories at slightly different instants.
   */
  async list(options: ListOptions = {}): Promise<SessionView[]> {
    const probe = options.probe ?? true;
    return this.transaction(async (store) => {
      const views: SessionView[] = [];
      const dead: SessionRecord[] = [];

      if (this.listingMode === 'snapshot') {
        const takenAt = this.now();
        const live: SessionRecord[] = [];
        for (const session of store.all()) {
          session.status = await this.determineStatus(session, takenAt);
          (session.status === 'dead' ? dead : live).push(session);
        }
        for (const session of live) {
          views.push(await this.toView(session, takenAt, probe));
        }
      } else {
        for (const session of store.all()) {
          const observedAt = this.now();
          session.status = await this.determineStatus(session, observedAt);
          if (session.status === 'dead') {
            dead.push(session);
            continue;
          }
          views.push(await this.toView(session, observedAt, probe));
        }
      }

      this.reap(store, dead);
      return views;
    });
  }

  /**
   * Returns one session with a fresh status. A dead session is reaped and
   * returned with status `dead`.
   * @throws NotFoundError
   */
  async get(id: string): Promise<SessionView> {
    return this.transaction(async (store) => {
      const session = this.require(store, id);
      const observedAt = this.now();
      session.status = await this.determineStatus(session, observedAt);
      if (session.status === 'dead') {
        this.reap(store, [session]);
        return this.toView(session, observedAt, false);
      }
      return this.toView(session, observedAt, true);
    });
  }

  /**
   * Allocates a port, spawns the service bound to it and persists a
   * `running` record, all in one scope. On failure the port is released and
   * nothing is persisted. A service whose record cannot be saved is killed.
   * @throws SpawnError
   */
  async start(workdir: string | null = null, config: LaunchConfig = {}): Promise<StartedSession> {
    const resolvedWorkdir = resolve(workdir ?? process.cwd());
    const attempt: { unsaved: UnsavedService | null } = { unsaved: null };
    try {
      return await this.transaction(async (store) => {
        const port = store.allocatePort(this.portBase);
        let id = this.idFactory();
        while (store.has(id)) id = this.idFactory();

        let launched: LaunchedService;
        try {
          launched = await this.launcher.launch({
            sessionId: id,
            port,
            workdir: resolvedWorkdir,
            config,
            logPath: getSessionLogPath(this.paths, id),
          });
        } catch (err) {
          store.releasePort(port);
          this.lifecycleLog?.log({ event: 'spawn_failed', sessionId: id, port, reason: getErrorMessage(err) });
          if (err instanceof SpawnError) throw err;
          throw new SpawnError(`Failed to start service on port ${port}: ${getErrorMessage(err)}`, port, { cause: err });
        }
        attempt.unsaved = { id, port, pid: launched.pid };

        const now = this.now();
        const session: SessionRecord = {
          id,
          port,
          pid: launched.pid,
          createdAt: now,
          lastActivity: now,
          workdir: resolvedWorkdir,
          agent: config.agent ?? null,
          status: 'running',
        };
        store.add(session);
        this.lifecycleLog?.log({ event: 'started', sessionId: id, port, pid: launched.pid });
        return { ...session, url: launched.url };
      });
    } catch (err) {
      if (!attempt.unsaved) throw err;
      throw await this.discardUnsaved(attempt.unsaved, err);
    }
  }

  /**
   * Stops a session and removes its record. A process that is already gone
   * counts as stopped.
   * @throws NotFoundError
   */
  async stop(id: string, force: boolean = false): Promise<StopResult> {
    return this.transaction(async (store) => {
      const session = this.require(store, id);
      const outcome = await this.stopProcess(session, force);
      store.remove(id);
      this.lifecycleLog?.log({
        event: 'stopped',
        sessionId: id,
        port: session.port,
        pid: session.pid,
        reason: force ? 'force' : outcome,
      });
      return { session: toStoredSession(session), outcome };
    });
  }

  /**
   * Stops and removes every `idle` session inactive for longer than
   * `maxIdleMs`. Sessions in any other status are left as they are.
   * @returns Ids of the removed sessions
   */
  async cleanup(maxIdleMs: number = CLEANUP_MAX_IDLE_MS): Promise<string[]> {
    return this.transaction(async (store) => {
      const now = this.now();
      const removed: string[] = [];
      for (const session of store.all()) {
        const status = await this.determineStatus(session, now);
        const idleFor = inactivityMs(session.lastActivity, now);
        if (status !== 'idle' || idleFor <= maxIdleMs) continue;

        await this.stopProcess(session, false);
        store.remove(session.id);
        removed.push(session.id);
        this.lifecycleLog?.log({
          event: 'idle_cleaned',
          sessionId: session.id,
          port: session.port,
          pid: session.pid,
          extra: { idleMs: idleFor },
        });
      }
      return removed;
    });
  }

  /**
   * Moves the session's last-activity timestamp to now (never backwards).
   * @throws NotFoundError, leaving the store unchanged
   */
  async touch(id: string): Promise<SessionRecord> {
    return this.transaction((store) => {
      const session = store.touch(id, this.now());
      if (!session) throw new NotFoundError(id);
      this.lifecycleLog?.log({ event: 'touched', sessionId: id });
      return toStoredSession(session);
    });
  }

  /**
   * Probes the session's working directory right now. Never cached.
   * @throws NotFoundError
   */
  async hasPendingChanges(id: string): Promise<ExternalState> {
    const workdir = await this.transaction((store) => this.require(store, id).workdir);
    return this.computeExternalState(workdir);
  }

  // ========== Status & Enrichment ==========

  /** Classifies a session from OS liveness, the service's activity signal and its last activity. */
  async determineStatus(session: SessionRecord, now: number = this.now()): Promise<SessionStatus> {
    const alive = this.processControl.isAlive(session.pid);
    // A dead service has no API to ask
    const signal: ActivitySignal = alive ? await this.activityReporter.report(session) : { kind: 'ok' };
    return classifyStatus({ alive, signal, lastActivity: session.lastActivity, now, idleThresholdMs: this.idleThresholdMs });
  }

  computeExternalState(workdir: string | null): Promise<ExternalState> {
    return computeExternalState(workdir, { probe: this.probe, run: this.probeRunner });
  }

  // ========== Audit Log ==========

  /** Lifecycle events, newest first. Empty when the audit log is disabled. */
  async history(query: LifecycleQuery = {}): Promise<LifecycleEntry[]> {
    if (!this.lifecycleLog) return [];
    await this.lifecycleLog.flush();
    return this.lifecycleLog.query(query);
  }

  /** Trims the audit log under the store lock, which every coordinator holds while appending. */
  async trimAuditLog(): Promise<boolean> {
    const log = this.lifecycleLog;
    if (!log) return false;
    return this.transaction(() => log.trimIfNeeded());
  }

  /** Resolves once pending audit log writes have settled. */
  async flush(): Promise<void> {
    await this.lifecycleLog?.flush();
  }

  // ========== Internals ==========

  private transaction<T>(fn: (store: SessionStore) => Promise<T> | T): Promise<T> {
    return withSessionStore(
      this.paths,
      async (store) => {
        try {
          return await fn(store);
        } finally {
          // Audit appends complete before the lock is released
          await this.lifecycleLog?.flush();
        }
      },
      { lockTimeoutMs: this.lockTimeoutMs },
    );
  }

  /**
   * Kills a service whose record was not saved, so that no process keeps a
   * port that the store considers free.
   */
  private async discardUnsaved(unsaved: UnsavedService, err: unknown): Promise<SpawnError> {
    const { id, port, pid } = unsaved;
    const reason = `Session record could not be saved: ${getErrorMessage(err)}`;
    console.error(`[SessionCoordinator] ${reason}; killing ${id} (pid ${pid})`);
    if (this.processControl.signal(pid, 'SIGKILL')) {
      await this.processControl.waitForExit(pid, this.stopGraceMs, this.stopPollIntervalMs);
    }
    this.lifecycleLog?.log({ event: 'spawn_failed', sessionId: id, port, pid, reason });
    return new SpawnError(`Failed to start service on port ${port}: ${reason}`, port, { cause: err });
  }

  private require(store: SessionStore, id: string): SessionRecord {
    const session = store.get(id);
    if (!session) throw new NotFoundError(id);
    return session;
  }

  private async toView(session: SessionRecord, observedAt: number, probe: boolean): Promise<SessionView> {
    const external = probe
      ? await this.computeExternalState(session.workdir)
      : { hasPendingChange: false, changedItems: [] };
    return {
      ...toStoredSession(session),
      hasPendingChanges: external.hasPendingChange,
      changedItems: external.changedItems,
      observedAt,
    };
  }

  private reap(store: SessionStore, dead: SessionRecord[]): void {
    for (const session of dead) {
      store.remove(session.id);
      debugLog('SessionCoordinator', `Reaped ${session.id} (pid ${session.pid} gone)`);
      this.lifecycleLog?.log({ event: 'reaped', sessionId: session.id, port: session.port, pid: session.pid });
    }
  }

  /**
   * SIGTERM then wait up to the grace period, escalating to SIGKILL;
   * or SIGKILL straight away when forced.
   */
  private async stopProcess(session: SessionRecord, force: boolean): Promise<StopOutcome> {
    const { pid } = session;
    const pc = this.processControl;
    if (!pc.isAlive(pid)) return 'absent';

    if (force) {
      if (!pc.signal(pid, 'SIGKILL')) return 'absent';
      await pc.waitForExit(pid, this.stopGraceMs, this.stopPollIntervalMs);
      return 'killed';
    }

    if (!pc.signal(pid, 'SIGTERM')) return 'absent';
    if (await pc.waitForExit(pid, this.stopGraceMs, this.stopPollIntervalMs)) return 'terminated';

    console.warn(`[SessionCoordinator] ${session.id} (pid ${pid}) still alive ${this.stopGraceMs}ms after SIGTERM, sending SIGKILL`);
    pc.signal(pid, 'SIGKILL');
    return 'killed';
  }
}
