/**
 * @fileoverview Data directory layout.
 *
 * @module config/paths
 */

import { homedir } from 'node:os';
import { join, resolve } from 'node:path';

/** Environment variable overriding the data directory */
export const DATA_DIR_ENV = 'SERVECTL_DATA_DIR';

export interface DataPaths {
  dataDir: string;
  storePath: string;
  lockPath: string;
  lifecycleLogPath: string;
  /** Output of each spawned service, one file per session */
  logsDir: string;
}

/** Resolves the data directory: explicit value, then $SERVECTL_DATA_DIR, then ~/.local/share/servectl. */
export function resolveDataDir(explicit?: string, env: NodeJS.ProcessEnv = process.env): string {
  if (explicit) return resolve(explicit);
  const fromEnv = env[DATA_DIR_ENV];
  if (fromEnv) return resolve(fromEnv);
  return join(homedir(), '.local', 'share', 'servectl');
}

export function getDataPaths(dataDir: string): DataPaths {
  return {
    dataDir,
    storePath: join(dataDir, 'store.json'),
    lockPath: join(dataDir, 'store.lock'),
    lifecycleLogPath: join(dataDir, 'lifecycle.jsonl'),
    logsDir: join(dataDir, 'logs'),
  };
}

export function getSessionLogPath(paths: Pick<DataPaths, 'logsDir'>, sessionId: string): string {
  return join(paths.logsDir, `${sessionId}.log`);
}
