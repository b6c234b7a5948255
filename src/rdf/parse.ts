/**
 * RDF parsing: N3-family syntaxes through n3, RDF/XML through rdf-parse.
 */

import { Readable } from 'node:stream';
import { extname } from 'node:path';
import { Parser } from 'n3';
import { rdfParser } from 'rdf-parse';
import type * as RDF from '@rdfjs/types';

const EXTENSION_MEDIA_TYPES: Record<string, string> = {
  '.rdf': 'application/rdf+xml',
  '.xml': 'application/rdf+xml',
  '.owl': 'application/rdf+xml',
  '.ttl': 'text/turtle',
  '.trig': 'application/trig',
  '.nt': 'application/n-triples',
  '.nq': 'application/n-quads',
  '.n3': 'text/n3',
};

/**
 * Media type for an RDF file, by extension.
 */
export function mediaTypeForFile(path: string): string | undefined {
  return EXTENSION_MEDIA_TYPES[extname(path).toLowerCase()];
}

const N3_MEDIA_TYPES = new Set([
  'text/turtle',
  'application/trig',
  'application/n-triples',
  'application/n-quads',
  'text/n3',
]);

/**
 * Parse an RDF document.
 *
 * @param text - Document content
 * @param mediaType - Syntax of the document
 * @param baseIRI - Base for relative IRIs
 */
export async function parseRdf(text: string, mediaType: string, baseIRI?: string): Promise<RDF.Quad[]> {
  if (N3_MEDIA_TYPES.has(mediaType)) {
    const parser = new Parser({ format: mediaType, ...(baseIRI ? { baseIRI } : {}) });
    return parser.parse(text);
  }

  return new Promise<RDF.Quad[]>((resolve, reject) => {
    const quads: RDF.Quad[] = [];
    rdfParser
      .parse(Readable.from([text]), { contentType: mediaType, ...(baseIRI ? { baseIRI } : {}) })
      .on('data', (q: RDF.Quad) => quads.push(q))
      .on('error', (error: Error) => reject(error))
      .on('end', () => resolve(quads));
  });
}
