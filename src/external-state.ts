/**
 * @fileoverview Live probe of a session's working directory.
 *
 * Runs `git status --porcelain` (or a configured equivalent) every time it
 * is asked. Results are never cached and never written to the store; two
 * calls only agree if the directory did not change in between.
 *
 * Failures are not raised. A missing directory, a directory without the
 * probe marker, a timeout or a failing command all report "no pending
 * changes", so callers cannot tell a clean tree from one that could not be
 * inspected.
 *
 * @module external-state
 */

import { execFile } from 'node:child_process';
import { stat } from 'node:fs/promises';
import { join } from 'node:path';
import { promisify } from 'node:util';
import { PROBE_TIMEOUT_MS } from './config/lifecycle-timing.js';
import type { ExternalProbeConfig, ExternalState } from './types.js';
import { debugLog } from './utils/debug-log.js';

const execFileAsync = promisify(execFile);

/** Length of the status code prefix on each porcelain line ("XY ") */
const STATUS_PREFIX_LENGTH = 3;

const PROBE_MAX_BUFFER = 4 * 1024 * 1024;

export const DEFAULT_EXTERNAL_PROBE: ExternalProbeConfig = {
  command: 'git',
  args: ['status', '--porcelain'],
  marker: '.git',
  timeoutMs: PROBE_TIMEOUT_MS,
};

/** Runs the probe command and resolves with its stdout; rejects on non-zero exit or timeout. */
export type ProbeRunner = (
  command: string,
  args: string[],
  options: { cwd: string; timeoutMs: number },
) => Promise<string>;

export const execProbe: ProbeRunner = async (command, args, { cwd, timeoutMs }) => {
  const { stdout } = await execFileAsync(command, args, {
    cwd,
    timeout: timeoutMs,
    encoding: 'utf-8',
    maxBuffer: PROBE_MAX_BUFFER,
  });
  return stdout;
};

function noPendingChanges(): ExternalState {
  return { hasPendingChange: false, changedItems: [] };
}

/** Strips the status code from each non-empty line. Lines of 3 chars or fewer are kept whole. */
export function parseProbeOutput(stdout: string): string[] {
  const items: string[] = [];
  for (const rawLine of stdout.split('\n')) {
    const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
    if (!line) continue;
    items.push(line.length > STATUS_PREFIX_LENGTH ? line.slice(STATUS_PREFIX_LENGTH) : line);
  }
  return items;
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

export interface ExternalStateOptions {
  probe?: ExternalProbeConfig;
  run?: ProbeRunner;
}

export async function computeExternalState(
  workdir: string | null,
  options: ExternalStateOptions = {},
): Promise<ExternalState> {
  const probe = options.probe ?? DEFAULT_EXTERNAL_PROBE;
  const run = options.run ?? execProbe;

  if (!workdir || !(await isDirectory(workdir))) return noPendingChanges();
  if (probe.marker && !(await pathExists(join(workdir, probe.marker)))) return noPendingChanges();

  let stdout: string;
  try {
    stdout = await run(probe.command, probe.args, { cwd: workdir, timeoutMs: probe.timeoutMs });
  } catch (err) {
    debugLog('ExternalState', `Probe failed in ${workdir}`, err);
    return noPendingChanges();
  }

  const changedItems = parseProbeOutput(stdout);
  return { hasPendingChange: changedItems.length > 0, changedItems };
}
