/**
 * @fileoverview Shared helpers for route modules.
 *
 * Route handlers let coordinator errors propagate; the error handler
 * registered here turns them into the `{ success: false, error, errorCode }`
 * envelope with a matching HTTP status.
 */

import type { FastifyError, FastifyInstance } from 'fastify';
import type { ZodType, ZodTypeDef } from 'zod';
import {
  CorruptStoreError,
  LockTimeoutError,
  NotFoundError,
  SpawnError,
  isServectlError,
  type ServectlError,
} from '../errors.js';
import { ApiErrorCode, createErrorResponse, getErrorMessage, type ApiErrorResponse } from '../types.js';

/** Request input that failed schema validation. */
export class RequestValidationError extends Error {
  readonly statusCode = 400;
}

/**
 * Parse request input or throw a RequestValidationError carrying the first issue.
 */
export function parseInput<Output, Input>(schema: ZodType<Output, ZodTypeDef, Input>, value: unknown): Output {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new RequestValidationError(result.error.issues[0]?.message ?? 'Validation failed');
  }
  return result.data;
}

function describeServectlError(err: ServectlError): { statusCode: number; errorCode: ApiErrorCode } {
  if (err instanceof NotFoundError) return { statusCode: 404, errorCode: ApiErrorCode.NOT_FOUND };
  if (err instanceof LockTimeoutError) return { statusCode: 503, errorCode: ApiErrorCode.LOCK_TIMEOUT };
  if (err instanceof SpawnError) return { statusCode: 502, errorCode: ApiErrorCode.SPAWN_FAILED };
  if (err instanceof CorruptStoreError) return { statusCode: 500, errorCode: ApiErrorCode.CORRUPT_STORE };
  return { statusCode: 500, errorCode: ApiErrorCode.OPERATION_FAILED };
}

/**
 * Maps any thrown value to an HTTP status and error envelope.
 */
export function toErrorReply(err: unknown): { statusCode: number; body: ApiErrorResponse } {
  if (isServectlError(err)) {
    const { statusCode, errorCode } = describeServectlError(err);
    return { statusCode, body: createErrorResponse(errorCode, err.message) };
  }
  if (err instanceof RequestValidationError) {
    return { statusCode: 400, body: createErrorResponse(ApiErrorCode.INVALID_INPUT, err.message) };
  }
  return { statusCode: 500, body: createErrorResponse(ApiErrorCode.OPERATION_FAILED, getErrorMessage(err)) };
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((error: FastifyError, _req, reply) => {
    // Fastify's own 4xx errors (malformed JSON, oversized body) keep their status
    if (!isServectlError(error) && error.statusCode !== undefined && error.statusCode < 500) {
      reply.code(error.statusCode).send(createErrorResponse(ApiErrorCode.INVALID_INPUT, error.message));
      return;
    }
    const { statusCode, body } = toErrorReply(error);
    if (statusCode >= 500) {
      console.error(`[WebServer] ${body.errorCode}: ${body.error}`);
    }
    reply.code(statusCode).send(body);
  });
}
