/**
 * Error → HTTP response mapping shared by the handlers.
 *
 * Both helpers set the reply status and return the body for the handler
 * to return.
 */

import type { FastifyReply } from 'fastify';
import { ZodError } from 'zod';
import { IngestError } from '../types/errors.js';
import type { ApiError } from './types.js';

export function errorResponse(reply: FastifyReply, err: unknown): ApiError {
  if (err instanceof ZodError) {
    reply.status(400);
    return {
      error: 'INVALID_REQUEST',
      message: err.issues.map((issue) => `${issue.path.join('.') || 'query'}: ${issue.message}`).join('; '),
    };
  }
  if (err instanceof IngestError) {
    reply.status(err.statusCode);
    return { error: err.code, message: err.message };
  }
  reply.log.error({ err }, 'Request failed');
  reply.status(500);
  return {
    error: 'INTERNAL_ERROR',
    message: err instanceof Error ? err.message : String(err),
  };
}

export function notFound(reply: FastifyReply, message: string): ApiError {
  reply.status(404);
  return { error: 'NOT_FOUND', message };
}
