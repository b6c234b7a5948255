/**
 * RDF serialisation for exports and snapshots.
 */

import { Writer } from 'n3';
import type * as RDF from '@rdfjs/types';
import { defaultGraph, quad } from './terms.js';
import { writeRdfXml } from './RdfXmlWriter.js';

export type ExportFormat = 'trig' | 'nquads' | 'ttl' | 'nt' | 'n3' | 'xml';

export interface ExportFormatInfo {
  mediaType: string;
  extension: string;
  /** Whether the syntax can carry named graphs */
  multiGraph: boolean;
}

export const EXPORT_FORMATS: Record<ExportFormat, ExportFormatInfo> = {
  trig: { mediaType: 'application/trig', extension: 'trig', multiGraph: true },
  nquads: { mediaType: 'application/n-quads', extension: 'nq', multiGraph: true },
  ttl: { mediaType: 'text/turtle', extension: 'ttl', multiGraph: false },
  nt: { mediaType: 'application/n-triples', extension: 'nt', multiGraph: false },
  n3: { mediaType: 'text/n3', extension: 'n3', multiGraph: false },
  xml: { mediaType: 'application/rdf+xml', extension: 'rdf', multiGraph: false },
};

export function isExportFormat(value: string): value is ExportFormat {
  return Object.prototype.hasOwnProperty.call(EXPORT_FORMATS, value);
}

const N3_FORMATS: Record<Exclude<ExportFormat, 'xml'>, string> = {
  trig: 'application/trig',
  nquads: 'N-Quads',
  ttl: 'Turtle',
  nt: 'N-Triples',
  n3: 'text/n3',
};

function toDefaultGraph(quads: readonly RDF.Quad[]): RDF.Quad[] {
  return quads.map((q) => quad(q.subject, q.predicate, q.object, defaultGraph()));
}

/**
 * Serialise quads. Single-graph formats drop the graph term.
 */
export function serializeQuads(
  quads: readonly RDF.Quad[],
  format: ExportFormat,
  prefixes: Record<string, string> = {},
): Promise<string> {
  const input = EXPORT_FORMATS[format].multiGraph ? [...quads] : toDefaultGraph(quads);

  if (format === 'xml') {
    return Promise.resolve(writeRdfXml(input, prefixes));
  }

  const lineBased = format === 'nquads' || format === 'nt';
  return new Promise((resolve, reject) => {
    const writer = new Writer(lineBased ? { format: N3_FORMATS[format] } : { format: N3_FORMATS[format], prefixes });
    writer.addQuads(input);
    writer.end((error: Error | null, result: string) => {
      if (error) reject(error);
      else resolve(result);
    });
  });
}
