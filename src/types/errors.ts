/**
 * Error taxonomy for the ingestion pipeline.
 *
 * Each class carries a stable `code` and the HTTP status the API layer maps
 * it to. Scope differs per class:
 * - MalformedRecordError: one record is skipped, the batch continues
 * - FetchFailureError: the library's refresh is aborted, its graph is kept
 * - MappingRuleError: the library's rules are invalid, it fails at startup
 * - StoreLoadFailureError: the load is aborted, the previous generation stays
 */

export type IngestErrorCode =
  | 'MALFORMED_RECORD'
  | 'FETCH_FAILURE'
  | 'MAPPING_RULE'
  | 'STORE_LOAD_FAILURE'
  | 'REFRESH_TIMEOUT'
  | 'REFRESH_ABORTED'
  | 'INVALID_REQUEST';

export class IngestError extends Error {
  readonly code: IngestErrorCode;
  readonly statusCode: number;

  constructor(code: IngestErrorCode, message: string, statusCode = 500, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.statusCode = statusCode;
    this.name = 'IngestError';
  }
}

export class MalformedRecordError extends IngestError {
  constructor(
    message: string,
    public readonly record: unknown
  ) {
    super('MALFORMED_RECORD', message, 400);
    this.name = 'MalformedRecordError';
  }
}

export class FetchFailureError extends IngestError {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super('FETCH_FAILURE', message, 502, options);
    this.name = 'FetchFailureError';
  }
}

export class MappingRuleError extends IngestError {
  constructor(
    message: string,
    public readonly rule: string,
    public readonly value: unknown
  ) {
    super('MAPPING_RULE', `Invalid mapping rule '${rule}': ${message}`, 400);
    this.name = 'MappingRuleError';
  }
}

export class StoreLoadFailureError extends IngestError {
  constructor(
    message: string,
    public readonly graph: string | undefined,
    options?: { cause?: unknown }
  ) {
    super('STORE_LOAD_FAILURE', message, 500, options);
    this.name = 'StoreLoadFailureError';
  }
}

/**
 * A refresh ran past its deadline or was cancelled on shutdown.
 */
export class RefreshAbortedError extends IngestError {
  constructor(
    message: string,
    public readonly library: string,
    public readonly timedOut: boolean
  ) {
    super(timedOut ? 'REFRESH_TIMEOUT' : 'REFRESH_ABORTED', message, 503);
    this.name = 'RefreshAbortedError';
  }
}

/**
 * A request the store or the pipeline cannot serve as asked, such as a
 * single-graph export format without a graph.
 */
export class InvalidRequestError extends IngestError {
  constructor(message: string) {
    super('INVALID_REQUEST', message, 400);
    this.name = 'InvalidRequestError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
