/**
 * @fileoverview Spawns managed services and waits for them to become ready.
 *
 * The service runs detached in its own process group so it outlives the
 * invoking command. Its stdout and stderr go to a per-session log file,
 * which is polled for the ready line.
 *
 * @module session-launcher
 */

import { spawn, type ChildProcess } from 'node:child_process';
import { mkdir, open, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { STARTUP_TIMEOUT_MS, STOP_GRACE_MS } from './config/lifecycle-timing.js';
import { SpawnError } from './errors.js';
import { NodeProcessControl, type ProcessControl } from './process-control.js';
import { buildServeArgs, buildServeEnv, DEFAULT_SERVICE_COMMAND } from './session-cli-builder.js';
import { getErrorMessage, type LaunchConfig, type LaunchedService } from './types.js';

/** Matches the line a service prints once it accepts connections */
export const DEFAULT_READY_PATTERN = /server listening on (https?:\/\/\S+)/;

/** Interval between reads of the service log while waiting for ready (ms) */
const READY_POLL_INTERVAL_MS = 100;

export interface LaunchRequest {
  sessionId: string;
  port: number;
  workdir: string;
  config: LaunchConfig;
  /** File receiving the service's stdout and stderr */
  logPath: string;
}

export interface ServiceLauncher {
  /**
   * Starts the service and resolves once it reports ready.
   * @throws SpawnError if it fails to start, exits early, or misses the startup timeout
   */
  launch(request: LaunchRequest): Promise<LaunchedService>;
}

export interface NodeServiceLauncherOptions {
  pollIntervalMs?: number;
  /** Used to tear down a service that failed to become ready */
  processControl?: ProcessControl;
  /** Wait after SIGTERM before a failed service gets SIGKILL (ms) */
  stopGraceMs?: number;
}

interface ReadyMatch {
  url: string | null;
}

export class NodeServiceLauncher implements ServiceLauncher {
  private readonly pollIntervalMs: number;
  private readonly processControl: ProcessControl;
  private readonly stopGraceMs: number;

  constructor(options: NodeServiceLauncherOptions = {}) {
    this.pollIntervalMs = options.pollIntervalMs ?? READY_POLL_INTERVAL_MS;
    this.processControl = options.processControl ?? new NodeProcessControl();
    this.stopGraceMs = options.stopGraceMs ?? STOP_GRACE_MS;
  }

  async launch(request: LaunchRequest): Promise<LaunchedService> {
    const { sessionId, port, workdir, config, logPath } = request;
    const command = config.command ?? DEFAULT_SERVICE_COMMAND;
    const timeoutMs = config.startupTimeoutMs ?? STARTUP_TIMEOUT_MS;
    const pattern = config.readyPattern ?? DEFAULT_READY_PATTERN;
    // Without g/y so lastIndex never carries over between polls
    const readyPattern = new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));

    try {
      await mkdir(workdir, { recursive: true });
      await mkdir(dirname(logPath), { recursive: true });
    } catch (err) {
      throw new SpawnError(`Cannot prepare ${workdir}: ${getErrorMessage(err)}`, port, { cause: err });
    }

    const log = await open(logPath, 'w');
    const state: { failure: SpawnError | null } = { failure: null };
    let child: ChildProcess;
    try {
      child = spawn(command, buildServeArgs(port, config), {
        cwd: workdir,
        env: buildServeEnv(sessionId, port, config),
        detached: true,
        stdio: ['ignore', log.fd, log.fd],
      });
    } catch (err) {
      throw new SpawnError(`Failed to spawn ${command}: ${getErrorMessage(err)}`, port, { cause: err });
    } finally {
      await log.close();
    }

    child.once('error', (err) => {
      state.failure ??= new SpawnError(`Failed to spawn ${command}: ${err.message}`, port, { cause: err });
    });
    child.once('exit', (code, signal) => {
      state.failure ??= new SpawnError(
        `${command} exited before becoming ready (${signal ?? `code ${code}`}); see ${logPath}`,
        port,
      );
    });

    const deadline = Date.now() + timeoutMs;
    while (Date.now() < deadline) {
      const ready = await this.matchReady(logPath, readyPattern);
      if (ready && child.pid !== undefined) {
        child.unref();
        return { pid: child.pid, url: ready.url };
      }
      if (state.failure) {
        // The leader is gone but anything it forked may still hold the group
        if (child.pid !== undefined) await this.terminate(child.pid);
        child.unref();
        throw state.failure;
      }
      await new Promise((resolve) => setTimeout(resolve, this.pollIntervalMs));
    }

    if (child.pid !== undefined) await this.terminate(child.pid);
    child.unref();
    throw state.failure ?? new SpawnError(`${command} did not report ready on port ${port} within ${timeoutMs}ms`, port);
  }

  /**
   * SIGTERM to the service's process group, then SIGKILL to whatever is
   * left of the group once the leader has exited or the grace period ends.
   */
  private async terminate(pid: number): Promise<void> {
    const pc = this.processControl;
    if (!pc.signal(pid, 'SIGTERM')) return;
    const exited = await pc.waitForExit(pid, this.stopGraceMs, this.pollIntervalMs);
    if (!exited) {
      console.warn(`[ServiceLauncher] pid ${pid} ignored SIGTERM, sending SIGKILL`);
    }
    if (pc.signal(pid, 'SIGKILL') && !exited) {
      await pc.waitForExit(pid, this.stopGraceMs, this.pollIntervalMs);
    }
  }

  private async matchReady(logPath: string, pattern: RegExp): Promise<ReadyMatch | null> {
    let output: string;
    try {
      output = await readFile(logPath, 'utf-8');
    } catch {
      return null;
    }
    const match = pattern.exec(output);
    return match ? { url: match[1] ?? null } : null;
  }
}
