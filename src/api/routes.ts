/**
 * Route configuration for the API.
 *
 * This module registers all API routes on a Fastify instance.
 * Route handlers are thin wrappers around the store and the scheduler.
 */

import type { FastifyInstance } from 'fastify';
import type { DatasetHandlers } from './handlers/DatasetHandlers.js';
import type { LibraryHandlers } from './handlers/LibraryHandlers.js';
import type { LogHandlers } from './handlers/LogHandlers.js';
import type { HealthResponse } from './types.js';

/**
 * Options for registering routes.
 */
export interface RouteOptions {
  datasetHandlers: DatasetHandlers;
  libraryHandlers: LibraryHandlers;
  logHandlers: LogHandlers;
  health: () => HealthResponse['components'];
}

/**
 * Register all API routes on a Fastify instance.
 */
export function registerRoutes(
  fastify: FastifyInstance,
  options: RouteOptions
): void {
  const { datasetHandlers, libraryHandlers, logHandlers, health } = options;

  // ============================================================================
  // Health Check
  // ============================================================================

  fastify.get('/health', async (): Promise<HealthResponse> => {
    const components = health();
    const degraded = components.libraries.failed > 0 || components.libraries.erroring > 0;
    return {
      status: degraded ? 'degraded' : 'ok',
      timestamp: new Date().toISOString(),
      components,
    };
  });

  // ============================================================================
  // Library Routes
  // ============================================================================

  fastify.get('/libs', libraryHandlers.listLibraries);
  fastify.post('/refresh', libraryHandlers.refresh);
  fastify.post('/parse_notes', libraryHandlers.parseNotes);

  // ============================================================================
  // Dataset Routes
  // ============================================================================

  fastify.get('/graphs', datasetHandlers.listGraphs);
  fastify.get('/export', datasetHandlers.exportDataset);
  fastify.get('/schema', datasetHandlers.getSchema);
  fastify.get('/csv', datasetHandlers.exportCsv);
  fastify.post('/csv', datasetHandlers.loadCsv);
  fastify.post('/backup', datasetHandlers.backup);
  fastify.post('/optimize', datasetHandlers.optimize);

  // ============================================================================
  // Log Viewer
  // ============================================================================

  fastify.get('/logs', logHandlers.viewLogs);
  fastify.post('/logs/clear', logHandlers.clearLogs);
}
