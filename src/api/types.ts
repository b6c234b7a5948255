/**
 * Types for the HTTP API layer.
 *
 * These types define request/response structures for the REST API.
 * They carry no mapping or store logic.
 */

import type { LibraryType, LoadMode } from '../config/types.js';
import type { RefreshResult, RefreshTaskStatus } from '../scheduler/RefreshScheduler.js';

// ============================================================================
// Error Response
// ============================================================================

/**
 * Standard error response.
 */
export interface ApiError {
  /** Error type/code */
  error: string;
  /** Human-readable message */
  message: string;
  /** Additional details (optional) */
  details?: unknown;
}

// ============================================================================
// Dataset Endpoints
// ============================================================================

export interface GraphSummary {
  iri: string;
  size: number;
}

export interface GraphListResponse {
  graphs: GraphSummary[];
  total: number;
}

export interface BackupResponse {
  success: boolean;
  path: string;
  quads: number;
  timestamp: string;
}

export interface OptimizeResponse {
  success: boolean;
  quads: number;
}

export interface CsvLoadResponse {
  success: boolean;
  graph: string;
  /** Statements read from the file */
  loaded: number;
  /** Statements dropped first because the file lists their subject */
  removed: number;
  /** Rows and values naming blank nodes */
  skipped: number;
  /** Statements in the graph afterwards */
  size: number;
}

// ============================================================================
// Library Endpoints
// ============================================================================

/**
 * A configured library as reported by the API. Secrets are never included.
 */
export interface LibrarySummary {
  name: string;
  libraryType: LibraryType;
  libraryId?: string;
  description?: string;
  loadMode: LoadMode;
  graph: string;
  knowledgeBaseGraph?: string;
  refresh?: RefreshTaskStatus;
}

export interface LibraryListResponse {
  libraries: LibrarySummary[];
  failed: Array<{ name: string; message: string }>;
  total: number;
}

export interface RefreshResponse {
  results: RefreshResult[];
}

// ============================================================================
// Health Check
// ============================================================================

/**
 * Health check response.
 */
export interface HealthResponse {
  /** Status */
  status: 'ok' | 'degraded';
  /** Timestamp */
  timestamp: string;
  /** Component statuses */
  components: {
    store: { quads: number; graphs: number };
    libraries: { configured: number; failed: number; erroring: number };
  };
}
