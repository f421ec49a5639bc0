/**
 * @fileoverview Zod validation schemas for API routes
 *
 * Request bodies and query strings are parsed here before they reach the
 * coordinator.
 *
 * @module web/schemas
 */

import { z } from 'zod';

// ========== Path Validation ==========

const SAFE_PATH_PATTERN = /^\/[\w\-./ @+~]*$/;

/** Validate a path string: no shell metacharacters, no traversal, must be absolute */
export function isValidWorkingDir(p: string): boolean {
  if (!p || !p.startsWith('/')) return false;
  if (p.split('/').includes('..')) return false;
  return SAFE_PATH_PATTERN.test(p);
}

const safePathSchema = z.string().max(1000).refine(isValidWorkingDir, {
  message: 'Invalid path: must be absolute, no shell metacharacters or traversal',
});

// ========== Env Var Allowlist ==========

/** Keys the launcher sets itself; callers may not override them */
const BLOCKED_ENV_KEYS = new Set([
  'PATH', 'LD_PRELOAD', 'LD_LIBRARY_PATH', 'NODE_OPTIONS',
  'SERVECTL_SESSION_ID', 'SERVECTL_PARENT_SESSION_ID', 'SERVECTL_PORT',
]);

const ENV_KEY_PATTERN = /^[A-Z_][A-Z0-9_]*$/;

function isAllowedEnvKey(key: string): boolean {
  return ENV_KEY_PATTERN.test(key) && !BLOCKED_ENV_KEYS.has(key);
}

const safeEnvSchema = z.record(z.string(), z.string()).optional().refine(
  (val) => !val || Object.keys(val).every(isAllowedEnvKey),
  { message: 'env contains blocked or malformed variable names' },
);

// ========== Sessions ==========

/**
 * Schema for POST /api/sessions
 */
export const CreateSessionSchema = z.object({
  workingDir: safePathSchema.optional(),
  agent: z.string().min(1).max(100).optional(),
  command: z.string().min(1).max(500).optional(),
  args: z.array(z.string().max(1000)).max(50).optional(),
  startupTimeoutSeconds: z.number().positive().max(600).optional(),
  env: safeEnvSchema,
  allowServectlCommands: z.boolean().optional(),
});

export type CreateSessionInput = z.infer<typeof CreateSessionSchema>;

/** Query flags arrive as strings; accept the usual spellings. */
const queryFlag = z
  .enum(['1', '0', 'true', 'false'])
  .optional()
  .transform((v) => (v === undefined ? undefined : v === '1' || v === 'true'));

/**
 * Schema for GET /api/sessions query
 */
export const ListSessionsQuerySchema = z.object({
  probe: queryFlag,
});

/**
 * Schema for DELETE /api/sessions/:id query
 */
export const StopSessionQuerySchema = z.object({
  force: queryFlag,
});

/**
 * Schema for POST /api/cleanup
 */
export const CleanupSchema = z
  .object({
    maxIdleSeconds: z.number().nonnegative().max(30 * 24 * 3600).optional(),
  })
  .optional();

export const SessionIdParamsSchema = z.object({
  id: z.string().min(1).max(64),
});
