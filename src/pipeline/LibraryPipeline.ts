/**
 * LibraryPipeline — one refresh of one library.
 *
 * fetch → normalise → canonicalise entity labels → map → (notes) →
 * assemble → write. Malformed records are skipped and counted; any other
 * failure aborts the refresh before the store is touched, so the previous
 * generation of the library's graphs stays in place.
 */

import type { Logger } from '../logging/logger.js';
import type { Library } from '../library/LibraryResolver.js';
import type { GraphAssembler } from '../graph/GraphAssembler.js';
import { IdentityResolver } from '../identity/IdentityResolver.js';
import { collectEntityLabels, mapRecord, passThroughTriples } from '../mapping/TripleMapper.js';
import type { ScopedTriple } from '../mapping/types.js';
import type { NoteParser } from '../notes/types.js';
import { normalizeJsonRecords, normalizeRdfRecords } from '../records/RecordNormalizer.js';
import type { CanonicalRecord } from '../records/types.js';
import { scalarText, toList } from '../records/types.js';
import { RDF_TYPE, RDFS_LABEL, namedNode } from '../rdf/terms.js';
import type { MalformedRecordError } from '../types/errors.js';
import type { SourceFetcher } from '../source/types.js';
import type { LoadGraphResult } from '../store/types.js';
import type { DatasetWriter } from './DatasetWriter.js';

export type PipelineStage = 'fetching' | 'mapping' | 'loading';

export interface PipelineRunOptions {
  signal: AbortSignal;
  /** Run the note parser even when the library does not do so automatically */
  parseNotes?: boolean;
  onStage?: (stage: PipelineStage) => void;
}

export interface RefreshOutcome {
  library: string;
  records: number;
  skipped: number;
  /** Source statements carried over outside any record */
  unmapped: number;
  notes: number;
  triples: number;
  graphs: Array<{ graph: string; size: number }>;
}

export interface LibraryPipelineDeps {
  writer: DatasetWriter;
  assembler: GraphAssembler;
  noteParser?: NoteParser | undefined;
  logger: Logger;
}

export class LibraryPipeline {
  private readonly logger: Logger;

  constructor(
    readonly library: Library,
    private readonly fetcher: SourceFetcher,
    private readonly deps: LibraryPipelineDeps,
  ) {
    this.logger = deps.logger.child({ library: library.name });
  }

  async run(options: PipelineRunOptions): Promise<RefreshOutcome> {
    const { signal, onStage } = options;
    const { library } = this;
    const { ruleSet } = library;

    onStage?.('fetching');
    const payload = await this.fetcher.fetch(signal);
    signal.throwIfAborted();

    onStage?.('mapping');
    const items = normalizeJsonRecords(payload.items, 'item');
    const collections = normalizeJsonRecords(payload.collections, 'collection');
    const rdf = normalizeRdfRecords(payload.quads, { vocab: ruleSet.vocab });
    const records = [...collections.records, ...items.records, ...rdf.records];
    const errors: MalformedRecordError[] = [...collections.errors, ...items.errors, ...rdf.errors];
    for (const error of errors) {
      this.logger.warn({ err: error.message }, 'Skipping malformed record');
    }
    if (rdf.sourceGraphs.length > 0) {
      this.logger.info({ sourceGraphs: rdf.sourceGraphs }, 'Folding source graphs into the library graph');
    }
    const unmapped = passThroughTriples(rdf.unmapped);

    const written = await this.deps.writer.sharedSection(this.sharedGraph(), () =>
      this.mapAndWrite(records, unmapped, options),
    );

    const outcome: RefreshOutcome = {
      library: library.name,
      records: records.length,
      skipped: errors.length,
      unmapped: unmapped.length,
      notes: written.notes,
      triples: written.triples,
      graphs: written.results.map((result) => ({ graph: result.graph, size: result.size })),
    };
    this.logger.info(outcome, 'Library refreshed');
    return outcome;
  }

  /**
   * Canonicalise, map and write. Runs inside the shared graph's section so
   * the labels read from the store are still current when the batches land.
   */
  private async mapAndWrite(
    records: CanonicalRecord[],
    unmapped: ScopedTriple[],
    options: PipelineRunOptions,
  ): Promise<{ notes: number; triples: number; results: LoadGraphResult[] }> {
    const { signal, onStage } = options;
    const { library } = this;
    const { ruleSet } = library;
    signal.throwIfAborted();

    const labels = collectEntityLabels(records, ruleSet);
    const identity = new IdentityResolver({
      baseIri: library.baseIri,
      knowledgeBase: ruleSet.knowledgeBase,
      knownLabels: this.knownLabels(labels.keys()),
    });
    identity.prepare(labels);

    const triples: ScopedTriple[] = [...unmapped];
    for (const record of records) {
      triples.push(...mapRecord(record, ruleSet, { identity, libraryGraph: library.graphIri }));
    }

    let notes = 0;
    const noteParser = this.deps.noteParser;
    if (noteParser && (options.parseNotes ?? library.parseNotes)) {
      for (const record of records) {
        const html = noteHtml(record);
        if (html === undefined) continue;
        const iri = record.iri ?? identity.recordIri(record.kind, record.key);
        triples.push(...noteParser.parse(html, iri));
        notes++;
      }
      this.logger.info({ notes }, 'Parsed notes');
    }

    const batches = this.deps.assembler.assemble(
      {
        name: library.name,
        graphIri: library.graphIri,
        knowledgeBaseGraph: library.knowledgeBaseGraph,
        vocab: ruleSet.vocab,
        description: library.description,
      },
      triples,
    );

    signal.throwIfAborted();
    onStage?.('loading');
    const results = await this.deps.writer.write(library.name, batches, signal);
    return { notes, triples: triples.length, results };
  }

  private sharedGraph(): string | undefined {
    return this.library.ruleSet.knowledgeBase.enabled ? this.library.knowledgeBaseGraph : undefined;
  }

  /**
   * Labels of the entities already in the shared graph, per role.
   */
  private knownLabels(roles: Iterable<string>): Map<string, string[]> | undefined {
    const kbGraph = this.sharedGraph();
    if (!kbGraph) return undefined;

    const store = this.deps.writer.store;
    const graph = namedNode(kbGraph);
    const known = new Map<string, string[]>();
    for (const role of roles) {
      const labels: string[] = [];
      const typed = store.match({
        predicate: namedNode(RDF_TYPE),
        object: namedNode(`${this.library.ruleSet.vocab}${role}`),
        graph,
      });
      for (const typing of typed) {
        for (const label of store.match({ subject: typing.subject, predicate: namedNode(RDFS_LABEL), graph })) {
          labels.push(label.object.value);
        }
      }
      known.set(role, labels);
    }
    return known;
  }
}

/**
 * HTML of a note record, if the record is one.
 */
function noteHtml(record: CanonicalRecord): string | undefined {
  for (const value of toList(record.fields['note'])) {
    const text = scalarText(value);
    if (text !== undefined && text.trim() !== '') return text;
  }
  return undefined;
}
