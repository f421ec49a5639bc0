/**
 * @fileoverview Resolve a service binary across common install paths.
 *
 * Finds the directory holding the binary and provides an augmented PATH
 * string for spawned services, which may run from shells whose PATH lacks
 * user-local install directories.
 *
 * @module utils/service-bin-resolver
 */

import { execFileSync } from 'node:child_process';
import { existsSync } from 'node:fs';
import { delimiter, dirname, isAbsolute, join } from 'node:path';
import { homedir } from 'node:os';

/** Timeout for exec commands (5 seconds) */
const EXEC_TIMEOUT_MS = 5000;

/** Common directories where service binaries may be installed */
const SEARCH_DIRS = [
  join(homedir(), '.opencode', 'bin'),
  join(homedir(), '.local', 'bin'),
  '/usr/local/bin',
  join(homedir(), 'go', 'bin'),
  join(homedir(), '.bun', 'bin'),
  join(homedir(), '.npm-global', 'bin'),
  join(homedir(), 'bin'),
];

/** Binary names may not carry path separators or shell metacharacters */
const SAFE_BIN_NAME = /^[a-zA-Z0-9._-]+$/;

/** Cached directory per command (empty string = searched but not found) */
const resolved = new Map<string, string>();

/**
 * Finds the directory containing `command`.
 * Checks `which` first, then falls back to common install locations.
 * Result is cached per command.
 *
 * @returns Directory path, or null if not found
 */
export function resolveServiceDir(command: string): string | null {
  if (isAbsolute(command)) return existsSync(command) ? dirname(command) : null;
  if (!SAFE_BIN_NAME.test(command)) return null;

  const cached = resolved.get(command);
  if (cached !== undefined) return cached || null;

  try {
    const result = execFileSync('which', [command], {
      encoding: 'utf-8',
      timeout: EXEC_TIMEOUT_MS,
      stdio: ['ignore', 'pipe', 'ignore'],
    }).trim();
    if (result && existsSync(result)) {
      resolved.set(command, dirname(result));
      return dirname(result);
    }
  } catch {
    // Not in PATH, check common locations
  }

  for (const dir of SEARCH_DIRS) {
    if (existsSync(join(dir, command))) {
      resolved.set(command, dir);
      return dir;
    }
  }

  resolved.set(command, '');
  return null;
}

/** Returns `currentPath` with the directory holding `command` prepended, if not already present. */
export function getServiceAugmentedPath(command: string, currentPath: string = process.env.PATH ?? ''): string {
  const dir = resolveServiceDir(command);
  if (dir && !currentPath.split(delimiter).includes(dir)) {
    return currentPath ? `${dir}${delimiter}${currentPath}` : dir;
  }
  return currentPath;
}

/** Reset cached resolution (for testing). */
export function resetServiceBinCache(): void {
  resolved.clear();
}
