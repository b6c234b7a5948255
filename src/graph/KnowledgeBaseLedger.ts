/**
 * KnowledgeBaseLedger — tracks each library's share of a shared graph.
 *
 * A shared graph's content is the union of its current contributions.
 * Replacing one library's contribution therefore drops exactly the triples
 * only that library produced, and leaves the others untouched.
 *
 * Content found in the store at startup is held as the `persisted`
 * contribution until every expected source has contributed once.
 */

import type * as RDF from '@rdfjs/types';
import { dedupeQuads } from '../rdf/terms.js';

export const PERSISTED_SOURCE = '@persisted';

interface LedgerEntry {
  contributions: Map<string, RDF.Quad[]>;
  expected: Set<string>;
}

export class KnowledgeBaseLedger {
  private readonly graphs = new Map<string, LedgerEntry>();

  private entry(graph: string): LedgerEntry {
    let entry = this.graphs.get(graph);
    if (!entry) {
      entry = { contributions: new Map(), expected: new Set() };
      this.graphs.set(graph, entry);
    }
    return entry;
  }

  /**
   * Declare the sources that will contribute to a graph.
   */
  expect(graph: string, sources: Iterable<string>): void {
    const entry = this.entry(graph);
    for (const source of sources) entry.expected.add(source);
  }

  /**
   * Hold content that was in the store before any source contributed.
   */
  seed(graph: string, quads: readonly RDF.Quad[]): void {
    if (quads.length === 0) return;
    this.entry(graph).contributions.set(PERSISTED_SOURCE, [...quads]);
  }

  /**
   * The graph content if `source` contributed `quads`, without recording it.
   */
  preview(graph: string, source: string, quads: readonly RDF.Quad[]): RDF.Quad[] {
    const entry = this.graphs.get(graph);
    const next = new Map(entry?.contributions ?? []);
    next.set(source, [...quads]);
    if (entry && this.completes(entry, next)) next.delete(PERSISTED_SOURCE);
    return dedupeQuads([...next.values()].flat());
  }

  /**
   * Record a contribution once the store accepted the resulting graph.
   */
  commit(graph: string, source: string, quads: readonly RDF.Quad[]): void {
    const entry = this.entry(graph);
    entry.contributions.set(source, [...quads]);
    if (this.completes(entry, entry.contributions)) {
      entry.contributions.delete(PERSISTED_SOURCE);
    }
  }

  union(graph: string): RDF.Quad[] {
    const entry = this.graphs.get(graph);
    return entry ? dedupeQuads([...entry.contributions.values()].flat()) : [];
  }

  sources(graph: string): string[] {
    return [...(this.graphs.get(graph)?.contributions.keys() ?? [])];
  }

  graphIris(): string[] {
    return [...this.graphs.keys()];
  }

  private completes(entry: LedgerEntry, contributions: ReadonlyMap<string, unknown>): boolean {
    if (!contributions.has(PERSISTED_SOURCE)) return false;
    for (const source of entry.expected) {
      if (!contributions.has(source)) return false;
    }
    return true;
  }
}
