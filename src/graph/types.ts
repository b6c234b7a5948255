import type * as RDF from '@rdfjs/types';

/**
 * How a batch is applied to its graph.
 * - replace: the batch is the graph's complete new content
 * - contribute: the batch replaces only this source's share of a shared graph
 */
export type BatchMode = 'replace' | 'contribute';

export interface GraphBatch {
  graph: string;
  mode: BatchMode;
  quads: RDF.Quad[];
}

/**
 * Where one library's triples go.
 */
export interface LibraryTarget {
  /** Internal library name, also the contribution source id */
  name: string;
  graphIri: string;
  /** Shared entity graph, when knowledge-base mapping is enabled */
  knowledgeBaseGraph?: string | undefined;
  vocab: string;
  description?: string | undefined;
}
