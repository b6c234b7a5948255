/**
 * Types for the Store Gateway.
 *
 * The gateway is the only boundary between the pipeline and the RDF
 * engine. It has no mapping knowledge: it loads, replaces, exports and
 * backs up named graphs.
 */

import type { Readable } from 'node:stream';
import type * as RDF from '@rdfjs/types';
import type { ExportFormat } from '../rdf/serialize.js';

export type { ExportFormat };

/**
 * Result of a load.
 */
export interface LoadGraphResult {
  graph: string;
  /** Quads in the graph after the load */
  size: number;
  /** Quads the load replaced */
  removed: number;
}

export interface BackupResult {
  /** File the dataset was written to */
  path: string;
  quads: number;
  timestamp: string;
}

/**
 * Quad pattern; absent terms match anything.
 */
export interface QuadPattern {
  subject?: RDF.Term | null;
  predicate?: RDF.Term | null;
  object?: RDF.Term | null;
  graph?: RDF.Term | null;
}

export interface StoreGateway {
  /**
   * Load quads into a named graph. The quads' own graph terms are ignored.
   * A failed load leaves the previous graph content intact.
   *
   * @throws StoreLoadFailureError
   */
  loadGraph(graph: string, quads: readonly RDF.Quad[]): Promise<LoadGraphResult>;

  /** Remove every quad of a named graph. */
  clearGraph(graph: string): Promise<number>;

  /**
   * Serialise the dataset, or one graph of it.
   * Formats without named graphs (ttl, nt, n3, xml) need a graph.
   */
  export(format: ExportFormat, graph?: string): Promise<Readable>;

  /** Replace the backup at `destination` with the current dataset. */
  backup(destination: string): Promise<BackupResult>;

  /** Compact the store and rewrite its snapshot. */
  optimize(): Promise<void>;

  namedGraphs(): string[];

  match(pattern: QuadPattern): RDF.Quad[];

  size(graph?: string): number;

  close(): Promise<void>;
}
