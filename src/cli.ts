/**
 * @fileoverview servectl command-line interface.
 *
 * Every command builds a SessionCoordinator over the selected data directory,
 * runs one coordinator operation and prints the result. Failures print
 * `Error: <message>` (or `Not found: <id>`) and set exit code 1.
 *
 * @module cli
 */

import { Command, InvalidArgumentError } from 'commander';
import { NotFoundError } from './errors.js';
import { SessionCoordinator, type StartedSession, type StopResult } from './session-coordinator.js';
import type { LifecycleEntry, LifecycleEventType } from './types/lifecycle.js';
import { getErrorMessage, type LaunchConfig, type SessionView } from './types.js';
import { DEFAULT_WEB_PORT, WebServer } from './web/server.js';
import type { SessionPort } from './web/ports/index.js';

/** What the CLI needs from a coordinator */
export interface CliCoordinator extends SessionPort {
  history(query?: { sessionId?: string; event?: LifecycleEventType; limit?: number }): Promise<LifecycleEntry[]>;
  trimAuditLog(): Promise<boolean>;
  flush(): Promise<void>;
}

export interface CliDeps {
  createCoordinator: (dataDir: string | undefined) => CliCoordinator;
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

interface StartCommandOptions {
  workdir?: string;
  timeout?: number;
  agent?: string;
  command?: string;
  allowServectlCommands?: boolean;
  json?: boolean;
}

const defaultDeps: CliDeps = {
  createCoordinator: (dataDir) => new SessionCoordinator({ dataDir }),
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
};

// ========== Formatting ==========

/**
 * Formats a duration in milliseconds as e.g. "1d 2h 30m 15s".
 */
export function formatDuration(ms: number): string {
  const seconds = Math.max(0, Math.floor(ms / 1000));
  const days = Math.floor(seconds / 86400);
  const hours = Math.floor((seconds % 86400) / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = seconds % 60;

  const parts: string[] = [];
  if (days > 0) parts.push(`${days}d`);
  if (hours > 0) parts.push(`${hours}h`);
  if (minutes > 0) parts.push(`${minutes}m`);
  if (secs > 0 || parts.length === 0) parts.push(`${secs}s`);

  return parts.join(' ');
}

/** One line per session: id, status, port, pid, idle time, pending changes, workdir. */
export function formatSessionLine(view: SessionView): string {
  const changes = view.hasPendingChanges ? `${view.changedItems.length} changed` : 'clean';
  const idle = formatDuration(view.observedAt - view.lastActivity);
  return [
    view.id,
    view.status.padEnd(17),
    `port ${view.port}`,
    `pid ${view.pid}`,
    `idle ${idle}`,
    changes,
    view.workdir ?? '-',
  ].join('  ');
}

function formatSessionDetail(view: SessionView): string[] {
  const lines = [
    `Session:      ${view.id}`,
    `Status:       ${view.status}`,
    `Port:         ${view.port}`,
    `PID:          ${view.pid}`,
    `Workdir:      ${view.workdir ?? '-'}`,
    `Agent:        ${view.agent ?? '-'}`,
    `Created:      ${new Date(view.createdAt).toISOString()}`,
    `Last active:  ${new Date(view.lastActivity).toISOString()} (${formatDuration(view.observedAt - view.lastActivity)} ago)`,
  ];
  if (view.hasPendingChanges) {
    lines.push(`Changes:      ${view.changedItems.length}`);
    for (const item of view.changedItems) lines.push(`  ${item}`);
  }
  return lines;
}

function formatStarted(session: StartedSession): string {
  const url = session.url ? ` at ${session.url}` : '';
  return `Started ${session.id} on port ${session.port} (pid ${session.pid})${url}`;
}

function formatStopped(result: StopResult): string {
  return `Stopped ${result.session.id} (${result.outcome})`;
}

function formatHistoryLine(entry: LifecycleEntry): string {
  const details = [
    entry.port !== undefined ? `port ${entry.port}` : null,
    entry.pid !== undefined ? `pid ${entry.pid}` : null,
    entry.reason ?? null,
  ].filter((d): d is string => d !== null);
  const suffix = details.length > 0 ? `  ${details.join('  ')}` : '';
  return `${new Date(entry.ts).toISOString()}  ${entry.event.padEnd(12)}  ${entry.sessionId}${suffix}`;
}

// ========== Option Parsers ==========

function parseSeconds(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n < 0) {
    throw new InvalidArgumentError('Expected a non-negative number of seconds.');
  }
  return n;
}

function parsePort(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1 || n > 65535) {
    throw new InvalidArgumentError('Expected a port between 1 and 65535.');
  }
  return n;
}

function parseLimit(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return n;
}

// ========== Program ==========

export function createProgram(deps: CliDeps = defaultDeps): Command {
  const program = new Command();

  program
    .name('servectl')
    .description('Supervise local service processes, one port each')
    .version('0.1.0')
    .option('--data-dir <dir>', 'Directory holding the session store (default: $SERVECTL_DATA_DIR or ~/.local/share/servectl)');

  const coordinator = (): CliCoordinator => deps.createCoordinator(program.opts<{ dataDir?: string }>().dataDir);

  /** Runs one command against a fresh coordinator and reports failures. */
  async function run(action: (c: CliCoordinator) => Promise<void>): Promise<void> {
    let c: CliCoordinator | null = null;
    try {
      c = coordinator();
      await action(c);
    } catch (err) {
      if (err instanceof NotFoundError) {
        deps.stderr(`Not found: ${err.sessionId}`);
      } else {
        deps.stderr(`Error: ${getErrorMessage(err)}`);
      }
      process.exitCode = 1;
    } finally {
      await c?.flush();
    }
  }

  program
    .command('list')
    .description('List live sessions (dead ones are removed)')
    .option('--no-probe', 'Skip the pending-changes probe')
    .option('--json', 'Print JSON')
    .action((opts: { probe: boolean; json?: boolean }) =>
      run(async (c) => {
        const sessions = await c.list({ probe: opts.probe });
        if (opts.json) {
          deps.stdout(JSON.stringify(sessions, null, 2));
        } else if (sessions.length === 0) {
          deps.stdout('No sessions');
        } else {
          for (const view of sessions) deps.stdout(formatSessionLine(view));
        }
      }),
    );

  program
    .command('status <id>')
    .description('Show one session')
    .option('--json', 'Print JSON')
    .action((id: string, opts: { json?: boolean }) =>
      run(async (c) => {
        const view = await c.get(id);
        if (opts.json) {
          deps.stdout(JSON.stringify(view, null, 2));
        } else {
          for (const line of formatSessionDetail(view)) deps.stdout(line);
        }
      }),
    );

  program
    .command('start')
    .description('Start a service on the lowest free port')
    .option('-w, --workdir <dir>', 'Working directory (default: current directory)')
    .option('-t, --timeout <seconds>', 'Startup timeout', parseSeconds)
    .option('-a, --agent <name>', 'Default agent for the service')
    .option('--command <bin>', 'Service binary (default: opencode)')
    .option('--allow-servectl-commands', 'Let the service run servectl itself')
    .option('--json', 'Print JSON')
    .action((opts: StartCommandOptions) =>
      run(async (c) => {
        const config: LaunchConfig = {};
        if (opts.timeout !== undefined) config.startupTimeoutMs = opts.timeout * 1000;
        if (opts.agent !== undefined) config.agent = opts.agent;
        if (opts.command !== undefined) config.command = opts.command;
        if (opts.allowServectlCommands) config.allowServectlCommands = true;
        const session = await c.start(opts.workdir ?? null, config);
        deps.stdout(opts.json ? JSON.stringify(session, null, 2) : formatStarted(session));
      }),
    );

  program
    .command('stop <id>')
    .description('Stop a session and remove it')
    .option('-f, --force', 'Send SIGKILL immediately')
    .action((id: string, opts: { force?: boolean }) =>
      run(async (c) => {
        deps.stdout(formatStopped(await c.stop(id, opts.force ?? false)));
      }),
    );

  program
    .command('touch <id>')
    .description('Record activity for a session')
    .action((id: string) =>
      run(async (c) => {
        const session = await c.touch(id);
        deps.stdout(`Touched ${session.id}`);
      }),
    );

  program
    .command('cleanup')
    .description('Stop and remove idle sessions')
    .option('--max-idle <seconds>', 'Idle time after which a session is removed', parseSeconds)
    .action((opts: { maxIdle?: number }) =>
      run(async (c) => {
        const removed = await c.cleanup(opts.maxIdle === undefined ? undefined : opts.maxIdle * 1000);
        deps.stdout(`Removed ${removed.length} idle session(s)`);
        for (const id of removed) deps.stdout(`  ${id}`);
      }),
    );

  program
    .command('changes <id>')
    .description("List pending changes in a session's working directory")
    .action((id: string) =>
      run(async (c) => {
        const state = await c.hasPendingChanges(id);
        if (!state.hasPendingChange) {
          deps.stdout('No pending changes');
          return;
        }
        for (const item of state.changedItems) deps.stdout(item);
      }),
    );

  program
    .command('history [id]')
    .description('Show lifecycle events, newest first')
    .option('-n, --limit <count>', 'Maximum number of events', parseLimit, 50)
    .action((id: string | undefined, opts: { limit: number }) =>
      run(async (c) => {
        const entries = await c.history({ sessionId: id, limit: opts.limit });
        if (entries.length === 0) {
          deps.stdout('No events');
          return;
        }
        for (const entry of entries) deps.stdout(formatHistoryLine(entry));
      }),
    );

  program
    .command('web')
    .description('Serve the REST API')
    .option('-p, --port <port>', 'Port to listen on', parsePort, DEFAULT_WEB_PORT)
    .action((opts: { port: number }) =>
      run(async (c) => {
        await c.trimAuditLog();
        const server = new WebServer(c, { port: opts.port });
        await server.start();
        await new Promise<void>((resolve, reject) => {
          const shutdown = (): void => {
            server.stop().then(resolve, reject);
          };
          process.once('SIGINT', shutdown);
          process.once('SIGTERM', shutdown);
        });
      }),
    );

  return program;
}

export const program = createProgram();
