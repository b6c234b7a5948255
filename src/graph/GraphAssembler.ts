/**
 * GraphAssembler — partitions one library's mapped triples into
 * per-graph batches.
 *
 * Content triples always land in the library graph. Entity triples land
 * in the knowledge-base graph when one is configured, otherwise in the
 * library graph. A library whose graph is the knowledge-base graph itself
 * contributes everything to it.
 *
 * Each pass stamps the library graph with `prov:generatedAtTime`. That
 * triple aside, the same triples always assemble into the same batches.
 */

import type * as RDF from '@rdfjs/types';
import {
  PROV_GENERATED_AT,
  RDF_TYPE,
  RDFS_LABEL,
  XSD_NS,
  dedupeQuads,
  literal,
  namedNode,
  quad,
} from '../rdf/terms.js';
import type { ScopedTriple } from '../mapping/types.js';
import type { GraphBatch, LibraryTarget } from './types.js';

export interface GraphAssemblerOptions {
  /** Clock for the generation timestamp */
  now?: () => Date;
}

export class GraphAssembler {
  private readonly now: () => Date;

  constructor(options: GraphAssemblerOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Build the batches for one ingestion pass of a library.
   */
  assemble(target: LibraryTarget, triples: Iterable<ScopedTriple>): GraphBatch[] {
    const libraryGraph = namedNode(target.graphIri);
    const kbIri = target.knowledgeBaseGraph;
    const kbGraph = kbIri ? namedNode(kbIri) : undefined;

    const libraryQuads: RDF.Quad[] = [];
    const entityQuads: RDF.Quad[] = [];

    for (const triple of triples) {
      if (triple.scope === 'entity' && kbGraph) {
        entityQuads.push(quad(triple.subject, triple.predicate, triple.object, kbGraph));
      } else {
        libraryQuads.push(quad(triple.subject, triple.predicate, triple.object, libraryGraph));
      }
    }

    libraryQuads.push(...this.metadata(target, libraryGraph));

    if (kbIri && kbIri === target.graphIri) {
      return [{
        graph: kbIri,
        mode: 'contribute',
        quads: dedupeQuads([...libraryQuads, ...entityQuads]),
      }];
    }

    const batches: GraphBatch[] = [{
      graph: target.graphIri,
      mode: 'replace',
      quads: dedupeQuads(libraryQuads),
    }];
    if (kbIri) {
      batches.push({ graph: kbIri, mode: 'contribute', quads: dedupeQuads(entityQuads) });
    }
    return batches;
  }

  private metadata(target: LibraryTarget, graph: RDF.NamedNode): RDF.Quad[] {
    const quads: RDF.Quad[] = [
      quad(graph, namedNode(RDF_TYPE), namedNode(`${target.vocab}library`), graph),
      quad(graph, namedNode(RDFS_LABEL), literal(target.name), graph),
      quad(
        graph,
        namedNode(PROV_GENERATED_AT),
        literal(this.now().toISOString(), namedNode(`${XSD_NS}dateTime`)),
        graph,
      ),
    ];
    if (target.description) {
      quads.push(quad(graph, namedNode('http://purl.org/dc/terms/description'), literal(target.description.trim()), graph));
    }
    return quads;
  }
}
