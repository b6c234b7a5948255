/**
 * Types for library sources.
 *
 * A source fetches the raw material of one library refresh. It has no
 * mapping semantics: JSON records and parsed quads come back as they were
 * found, normalisation happens downstream.
 */

import type * as RDF from '@rdfjs/types';

/**
 * What one fetch produced.
 */
export interface SourcePayload {
  /** Raw JSON item records */
  items: unknown[];
  /** Raw JSON collection records */
  collections: unknown[];
  /** Quads from RDF exports or RDF files */
  quads: RDF.Quad[];
}

export interface SourceFetcher {
  /** Source kind, for logs */
  readonly kind: string;

  /**
   * Fetch the library's current content.
   *
   * @throws FetchFailureError
   */
  fetch(signal: AbortSignal): Promise<SourcePayload>;
}

export function emptyPayload(): SourcePayload {
  return { items: [], collections: [], quads: [] };
}
