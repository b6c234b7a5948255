/**
 * LibraryHandlers — HTTP handlers for configured libraries.
 *
 * - GET /libs: libraries, their graphs and refresh status
 * - POST /refresh: refresh one library, or all of them
 * - POST /parse_notes: refresh with the note parser enabled
 *
 * A refresh request waits for the run to finish. Asking for a library
 * whose refresh is already in flight answers 409.
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import { z } from 'zod';
import type { Library } from '../../library/LibraryResolver.js';
import type { RefreshScheduler, TriggerOptions } from '../../scheduler/RefreshScheduler.js';
import { errorResponse, notFound } from '../errors.js';
import type { ApiError, LibraryListResponse, LibrarySummary, RefreshResponse } from '../types.js';

export const refreshQuerySchema = z.object({
  library: z.string().min(1).optional(),
});

export type RefreshQuery = z.input<typeof refreshQuerySchema>;

export interface LibraryHandlerContext {
  libraries: readonly Library[];
  failed: ReadonlyArray<{ name: string; message: string }>;
  scheduler: RefreshScheduler;
}

/**
 * Create library handlers.
 */
export function createLibraryHandlers(ctx: LibraryHandlerContext) {
  const { scheduler } = ctx;

  function summarize(library: Library): LibrarySummary {
    const refresh = scheduler.statusOf(library.name);
    return {
      name: library.name,
      libraryType: library.libraryType,
      ...(library.libraryId ? { libraryId: library.libraryId } : {}),
      ...(library.description ? { description: library.description } : {}),
      loadMode: library.loadMode,
      graph: library.graphIri,
      ...(library.knowledgeBaseGraph ? { knowledgeBaseGraph: library.knowledgeBaseGraph } : {}),
      ...(refresh ? { refresh } : {}),
    };
  }

  async function runRefresh(
    request: FastifyRequest<{ Querystring: RefreshQuery }>,
    reply: FastifyReply,
    options: TriggerOptions,
  ): Promise<RefreshResponse | ApiError> {
    try {
      const { library } = refreshQuerySchema.parse(request.query);
      if (!library) {
        return { results: await scheduler.triggerAll(options) };
      }
      if (!scheduler.has(library)) {
        return notFound(reply, `Library not found: ${library}`);
      }

      const result = await scheduler.trigger(library, options);
      if (result.status === 'skipped') {
        reply.status(409);
        return {
          error: 'REFRESH_IN_PROGRESS',
          message: `A refresh of '${library}' is already running`,
        };
      }
      if (result.status === 'failed') {
        reply.status(500);
        return {
          error: result.code ?? 'REFRESH_FAILED',
          message: result.error,
          details: { library, durationMs: result.durationMs },
        };
      }
      return { results: [result] };
    } catch (err) {
      return errorResponse(reply, err);
    }
  }

  /**
   * GET /libs
   */
  async function listLibraries(): Promise<LibraryListResponse> {
    const libraries = ctx.libraries.map(summarize);
    return { libraries, failed: [...ctx.failed], total: libraries.length };
  }

  /**
   * POST /refresh
   */
  async function refresh(
    request: FastifyRequest<{ Querystring: RefreshQuery }>,
    reply: FastifyReply,
  ): Promise<RefreshResponse | ApiError> {
    return runRefresh(request, reply, {});
  }

  /**
   * POST /parse_notes
   */
  async function parseNotes(
    request: FastifyRequest<{ Querystring: RefreshQuery }>,
    reply: FastifyReply,
  ): Promise<RefreshResponse | ApiError> {
    return runRefresh(request, reply, { parseNotes: true });
  }

  return {
    listLibraries,
    refresh,
    parseNotes,
  };
}

export type LibraryHandlers = ReturnType<typeof createLibraryHandlers>;
