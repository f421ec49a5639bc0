/**
 * @fileoverview Fastify server exposing the session coordinator over REST.
 *
 * Holds no session state of its own: every request goes through the
 * coordinator, which reads and writes the shared store under its lock. CLI
 * invocations and the server can therefore run side by side.
 *
 * @module web/server
 */

import Fastify, { type FastifyInstance } from 'fastify';
import { registerSecurityHeaders } from './middleware/security-headers.js';
import { registerErrorHandler } from './route-helpers.js';
import { registerSessionRoutes } from './routes/index.js';
import type { SessionPort } from './ports/index.js';

export const DEFAULT_WEB_PORT = 3100;
export const DEFAULT_WEB_HOST = '127.0.0.1';

export interface WebServerOptions {
  port?: number;
  host?: string;
}

/**
 * Builds a ready-to-listen Fastify instance with every route module registered.
 */
export function buildApp(ctx: SessionPort): FastifyInstance {
  const app = Fastify({ logger: false });
  registerSecurityHeaders(app);
  registerErrorHandler(app);
  registerSessionRoutes(app, ctx);
  return app;
}

export class WebServer {
  readonly app: FastifyInstance;
  private readonly port: number;
  private readonly host: string;

  constructor(ctx: SessionPort, options: WebServerOptions = {}) {
    this.app = buildApp(ctx);
    this.port = options.port ?? DEFAULT_WEB_PORT;
    this.host = options.host ?? DEFAULT_WEB_HOST;
  }

  /** @returns The address the server listens on */
  async start(): Promise<string> {
    const address = await this.app.listen({ port: this.port, host: this.host });
    console.log(`servectl API listening at ${address}`);
    return address;
  }

  async stop(): Promise<void> {
    await this.app.close();
  }
}
