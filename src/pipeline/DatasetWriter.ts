/**
 * DatasetWriter — applies graph batches to the store.
 *
 * Writes to one graph are serialised. A replace batch becomes the graph's
 * content; a contribute batch replaces only its source's share of a shared
 * graph, the ledger recording the share once the store accepted it.
 *
 * Refreshes that canonicalise labels against a shared graph hold that
 * graph's section from the label read until their batches are written.
 */

import type { Logger } from '../logging/logger.js';
import type { KnowledgeBaseLedger } from '../graph/KnowledgeBaseLedger.js';
import type { GraphBatch } from '../graph/types.js';
import { namedNode } from '../rdf/terms.js';
import { KeyedMutex } from '../store/KeyedMutex.js';
import type { LoadGraphResult, StoreGateway } from '../store/types.js';

export interface DatasetWriterOptions {
  store: StoreGateway;
  ledger: KnowledgeBaseLedger;
  logger: Logger;
}

export class DatasetWriter {
  private readonly locks = new KeyedMutex();
  private readonly sections = new KeyedMutex();

  constructor(private readonly options: DatasetWriterOptions) {}

  get store(): StoreGateway {
    return this.options.store;
  }

  get ledger(): KnowledgeBaseLedger {
    return this.options.ledger;
  }

  /**
   * Run `work` exclusively against other sections on the same shared graph.
   * Without a graph the work runs directly. Graph writes inside a section
   * take the per-graph lock as usual.
   */
  sharedSection<T>(graph: string | undefined, work: () => Promise<T>): Promise<T> {
    return graph ? this.sections.runExclusive(graph, work) : work();
  }

  /**
   * Apply the batches of one library refresh, in order.
   *
   * @throws StoreLoadFailureError; batches already applied stay applied
   */
  async write(source: string, batches: readonly GraphBatch[], signal?: AbortSignal): Promise<LoadGraphResult[]> {
    const results: LoadGraphResult[] = [];
    for (const batch of batches) {
      results.push(await this.locks.runExclusive(batch.graph, async () => {
        signal?.throwIfAborted();
        if (batch.mode === 'replace') {
          return this.options.store.loadGraph(batch.graph, batch.quads);
        }
        const union = this.options.ledger.preview(batch.graph, source, batch.quads);
        const result = await this.options.store.loadGraph(batch.graph, union);
        this.options.ledger.commit(batch.graph, source, batch.quads);
        return result;
      }));
    }
    this.options.logger.debug({ source, graphs: results.map((r) => r.graph) }, 'Batches written');
    return results;
  }

  /**
   * Drop a graph, serialised with writes to it.
   */
  async clear(graph: string): Promise<number> {
    return this.locks.runExclusive(graph, () => this.options.store.clearGraph(graph));
  }

  /**
   * Replace a graph that has no per-source ledger, such as the vocabulary
   * ontology.
   */
  async replace(graph: string, batch: GraphBatch['quads']): Promise<LoadGraphResult> {
    return this.locks.runExclusive(graph, () => this.options.store.loadGraph(graph, batch));
  }

  /**
   * Replace a graph with a function of its current content, serialised
   * with writes to it.
   */
  async update(graph: string, change: (current: GraphBatch['quads']) => GraphBatch['quads']): Promise<LoadGraphResult> {
    return this.locks.runExclusive(graph, () => {
      const current = this.options.store.match({ graph: namedNode(graph) });
      return this.options.store.loadGraph(graph, change(current));
    });
  }
}
