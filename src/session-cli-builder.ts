/**
 * @fileoverview Pure functions for building the arguments and environment of
 * a managed service process.
 *
 * Kept apart from the launcher so argument construction stays testable
 * without spawning anything.
 *
 * @module session-cli-builder
 */

import type { LaunchConfig } from './types.js';
import { getServiceAugmentedPath } from './utils/service-bin-resolver.js';

export const DEFAULT_SERVICE_COMMAND = 'opencode';
export const DEFAULT_SERVICE_ARGS: readonly string[] = ['serve'];

/** Environment variable naming the session a process runs under */
export const SESSION_ID_ENV = 'SERVECTL_SESSION_ID';
export const PARENT_SESSION_ID_ENV = 'SERVECTL_PARENT_SESSION_ID';
export const PORT_ENV = 'SERVECTL_PORT';
export const AGENT_ENV = 'SERVECTL_AGENT';

/** Comma-separated `tool:command` entries the service refuses to run */
export const COMMAND_BLOCKLIST_ENV = 'OPENCODE_BLACKLIST';
export const SERVECTL_COMMAND_BLOCK = 'bash:servectl';

/** Adds the servectl entry to a blocklist value unless it is already listed. */
export function withServectlBlocked(blocklist: string | undefined): string {
  if (!blocklist) return SERVECTL_COMMAND_BLOCK;
  const entries = blocklist.split(',').map((entry) => entry.trim());
  return entries.includes(SERVECTL_COMMAND_BLOCK) ? blocklist : `${blocklist},${SERVECTL_COMMAND_BLOCK}`;
}

/**
 * Build args for a service bound to `port`.
 *
 * @returns Configured args (default `serve`) followed by `--port <port>`
 */
export function buildServeArgs(port: number, config: LaunchConfig = {}): string[] {
  return [...(config.args ?? DEFAULT_SERVICE_ARGS), '--port', String(port)];
}

/**
 * Build environment variables for a service process.
 *
 * Augments the parent environment with:
 * - PATH including the directory of the service binary
 * - session identification vars
 * - the parent session id, when the caller itself runs inside a session
 * - overrides from `config.env`
 * - `bash:servectl` on the command blocklist, unless `allowServectlCommands`
 */
export function buildServeEnv(
  sessionId: string,
  port: number,
  config: LaunchConfig = {},
  parentEnv: NodeJS.ProcessEnv = process.env,
): Record<string, string | undefined> {
  const command = config.command ?? DEFAULT_SERVICE_COMMAND;
  const env: Record<string, string | undefined> = {
    ...parentEnv,
    PATH: getServiceAugmentedPath(command, parentEnv.PATH ?? ''),
    [SESSION_ID_ENV]: sessionId,
    [PORT_ENV]: String(port),
  };

  const parentSessionId = parentEnv[SESSION_ID_ENV];
  if (parentSessionId && parentSessionId !== sessionId) {
    env[PARENT_SESSION_ID_ENV] = parentSessionId;
  }
  if (config.agent) {
    env[AGENT_ENV] = config.agent;
  }

  const merged: Record<string, string | undefined> = { ...env, ...config.env };
  if (!config.allowServectlCommands) {
    merged[COMMAND_BLOCKLIST_ENV] = withServectlBlocked(merged[COMMAND_BLOCKLIST_ENV]);
  }
  return merged;
}
