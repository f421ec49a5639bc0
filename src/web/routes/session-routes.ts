/**
 * @fileoverview Session management routes.
 * Covers listing, lookup, start, stop, touch, pending-change probes and idle cleanup.
 */

import type { FastifyInstance } from 'fastify';
import { createSuccessResponse, type LaunchConfig } from '../../types.js';
import {
  CleanupSchema,
  CreateSessionSchema,
  ListSessionsQuerySchema,
  SessionIdParamsSchema,
  StopSessionQuerySchema,
  type CreateSessionInput,
} from '../schemas.js';
import { parseInput } from '../route-helpers.js';
import type { SessionPort } from '../ports/index.js';

function toLaunchConfig(body: CreateSessionInput): LaunchConfig {
  const config: LaunchConfig = {};
  if (body.command !== undefined) config.command = body.command;
  if (body.args !== undefined) config.args = body.args;
  if (body.agent !== undefined) config.agent = body.agent;
  if (body.env !== undefined) config.env = body.env;
  if (body.startupTimeoutSeconds !== undefined) config.startupTimeoutMs = body.startupTimeoutSeconds * 1000;
  if (body.allowServectlCommands !== undefined) config.allowServectlCommands = body.allowServectlCommands;
  return config;
}

export function registerSessionRoutes(app: FastifyInstance, ctx: SessionPort): void {
  // ========== Session Listing ==========

  app.get('/api/sessions', async (req) => {
    const query = parseInput(ListSessionsQuerySchema, req.query);
    const sessions = await ctx.list({ probe: query.probe ?? true });
    return createSuccessResponse(sessions);
  });

  app.get('/api/sessions/:id', async (req) => {
    const { id } = parseInput(SessionIdParamsSchema, req.params);
    return createSuccessResponse(await ctx.get(id));
  });

  // ========== Session Creation ==========

  app.post('/api/sessions', async (req) => {
    const body = parseInput(CreateSessionSchema, req.body ?? {});
    const session = await ctx.start(body.workingDir ?? null, toLaunchConfig(body));
    return createSuccessResponse(session);
  });

  // ========== Stop ==========

  app.delete('/api/sessions/:id', async (req) => {
    const { id } = parseInput(SessionIdParamsSchema, req.params);
    const { force } = parseInput(StopSessionQuerySchema, req.query);
    const result = await ctx.stop(id, force ?? false);
    return createSuccessResponse(result);
  });

  // ========== Activity ==========

  app.post('/api/sessions/:id/touch', async (req) => {
    const { id } = parseInput(SessionIdParamsSchema, req.params);
    return createSuccessResponse(await ctx.touch(id));
  });

  app.get('/api/sessions/:id/changes', async (req) => {
    const { id } = parseInput(SessionIdParamsSchema, req.params);
    return createSuccessResponse(await ctx.hasPendingChanges(id));
  });

  // ========== Cleanup ==========

  app.post('/api/cleanup', async (req) => {
    const body = parseInput(CleanupSchema, req.body);
    const maxIdleMs = body?.maxIdleSeconds === undefined ? undefined : body.maxIdleSeconds * 1000;
    const removed = await ctx.cleanup(maxIdleMs);
    return createSuccessResponse({ removed });
  });
}
