/**
 * @fileoverview Tests for the live working-directory probe.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  DEFAULT_EXTERNAL_PROBE,
  computeExternalState,
  parseProbeOutput,
  type ProbeRunner,
} from '../src/external-state.js';
import { DEBUG_ENV, debugLog, isDebugEnabled } from '../src/utils/debug-log.js';
import { createTestDir } from './setup.js';

describe('parseProbeOutput', () => {
  it('strips the two-letter status and the separating space', () => {
    expect(parseProbeOutput(' M src/a.ts\n?? notes.md\n')).toEqual(['src/a.ts', 'notes.md']);
  });

  it('keeps a leading-space status intact before slicing', () => {
    expect(parseProbeOutput(' D removed.txt')).toEqual(['removed.txt']);
  });

  it('skips empty lines and handles CRLF', () => {
    expect(parseProbeOutput('A  x.ts\r\n\r\n\nM  y.ts')).toEqual(['x.ts', 'y.ts']);
  });

  it('keeps lines of three characters or fewer whole', () => {
    expect(parseProbeOutput('?? \nab\n')).toEqual(['?? ', 'ab']);
  });

  it('returns nothing for empty output', () => {
    expect(parseProbeOutput('')).toEqual([]);
  });
});

describe('computeExternalState', () => {
  let workdir: string;

  beforeEach(async () => {
    workdir = await createTestDir();
    await mkdir(join(workdir, '.git'));
  });

  it('reports changed items from the probe', async () => {
    const run = vi.fn<ProbeRunner>(async () => ' M a.ts\n?? b.ts\n');
    const state = await computeExternalState(workdir, { run });

    expect(state).toEqual({ hasPendingChange: true, changedItems: ['a.ts', 'b.ts'] });
    expect(run).toHaveBeenCalledWith('git', ['status', '--porcelain'], { cwd: workdir, timeoutMs: 5000 });
  });

  it('reports a clean tree', async () => {
    const state = await computeExternalState(workdir, { run: async () => '' });
    expect(state).toEqual({ hasPendingChange: false, changedItems: [] });
  });

  it('runs the probe on every call', async () => {
    const outputs = ['', ' M a.ts\n'];
    const run = vi.fn<ProbeRunner>(async () => outputs.shift() ?? '');

    const first = await computeExternalState(workdir, { run });
    const second = await computeExternalState(workdir, { run });

    expect(first.hasPendingChange).toBe(false);
    expect(second).toEqual({ hasPendingChange: true, changedItems: ['a.ts'] });
    expect(run).toHaveBeenCalledTimes(2);
  });

  it('reports no changes for a null workdir without probing', async () => {
    const run = vi.fn<ProbeRunner>(async () => ' M a.ts');
    expect(await computeExternalState(null, { run })).toEqual({ hasPendingChange: false, changedItems: [] });
    expect(run).not.toHaveBeenCalled();
  });

  it('reports no changes for a missing workdir', async () => {
    const run = vi.fn<ProbeRunner>(async () => ' M a.ts');
    const state = await computeExternalState(join(workdir, 'missing'), { run });
    expect(state).toEqual({ hasPendingChange: false, changedItems: [] });
    expect(run).not.toHaveBeenCalled();
  });

  it('reports no changes when the workdir is a file', async () => {
    const file = join(workdir, 'file.txt');
    await writeFile(file, 'x');
    const run = vi.fn<ProbeRunner>(async () => ' M a.ts');
    expect((await computeExternalState(file, { run })).hasPendingChange).toBe(false);
    expect(run).not.toHaveBeenCalled();
  });

  it('reports no changes when the marker is missing', async () => {
    const plain = await createTestDir();
    const run = vi.fn<ProbeRunner>(async () => ' M a.ts');
    expect(await computeExternalState(plain, { run })).toEqual({ hasPendingChange: false, changedItems: [] });
    expect(run).not.toHaveBeenCalled();
  });

  it('probes without a marker check when the marker is null', async () => {
    const plain = await createTestDir();
    const run = vi.fn<ProbeRunner>(async () => 'xx changed.txt');
    const state = await computeExternalState(plain, { probe: { ...DEFAULT_EXTERNAL_PROBE, marker: null }, run });
    expect(state.changedItems).toEqual(['changed.txt']);
  });

  it('reports no changes when the probe fails', async () => {
    const run = vi.fn<ProbeRunner>(async () => {
      throw new Error('Command failed: git status --porcelain');
    });
    expect(await computeExternalState(workdir, { run })).toEqual({ hasPendingChange: false, changedItems: [] });
  });
});

describe('debugLog', () => {
  it('is silent unless debugging is enabled', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.stubEnv(DEBUG_ENV, '');
    debugLog('Test', 'hidden');
    expect(error).not.toHaveBeenCalled();

    vi.stubEnv(DEBUG_ENV, '1');
    debugLog('Test', 'shown', 42);
    expect(error).toHaveBeenCalledWith('[Test] shown', 42);

    vi.unstubAllEnvs();
    error.mockRestore();
  });

  it('treats "0" as disabled', () => {
    expect(isDebugEnabled({ [DEBUG_ENV]: '0' })).toBe(false);
    expect(isDebugEnabled({ [DEBUG_ENV]: 'yes' })).toBe(true);
    expect(isDebugEnabled({})).toBe(false);
  });
});
