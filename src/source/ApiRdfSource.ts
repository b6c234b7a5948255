/**
 * ApiRdfSource — items as an RDF export from the web API.
 *
 * Each page is a complete RDF/XML document. Collections have no RDF
 * export and are read as JSON.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type * as RDF from '@rdfjs/types';
import type { Logger } from '../logging/logger.js';
import { parseRdf } from '../rdf/parse.js';
import { serializeQuads } from '../rdf/serialize.js';
import { RDF_TYPE } from '../rdf/terms.js';
import { FetchFailureError, errorMessage } from '../types/errors.js';
import type { LibraryLocator, ZoteroApiClient } from './ZoteroApiClient.js';
import type { SourceFetcher, SourcePayload } from './types.js';

export interface ApiRdfSourceOptions {
  client: ZoteroApiClient;
  library: LibraryLocator;
  /** API export format, e.g. rdf_zotero */
  format: string;
  /** Base for relative IRIs in the exports */
  baseIri: string;
  params?: Record<string, string>;
  /** Directory for an N-Quads dump of every fetch */
  saveTo?: string | undefined;
  logger: Logger;
}

/**
 * Records on a page: distinct typed subjects.
 */
function countTypedSubjects(quads: readonly RDF.Quad[]): number {
  const subjects = new Set<string>();
  for (const q of quads) {
    if (q.predicate.value === RDF_TYPE) subjects.add(q.subject.value);
  }
  return subjects.size;
}

export class ApiRdfSource implements SourceFetcher {
  readonly kind = 'api-rdf';

  constructor(private readonly options: ApiRdfSourceOptions) {}

  async fetch(signal: AbortSignal): Promise<SourcePayload> {
    const { client, library, format, baseIri, params = {}, saveTo, logger } = this.options;
    const quads: RDF.Quad[] = [];

    const pages = await client.fetchTextPages(
      library,
      'items',
      format,
      async (text) => {
        let parsed: RDF.Quad[];
        try {
          parsed = await parseRdf(text, 'application/rdf+xml', `${baseIri}/`);
        } catch (err) {
          throw new FetchFailureError(`Unparseable ${format} page: ${errorMessage(err)}`, baseIri, undefined, { cause: err });
        }
        quads.push(...parsed);
        return countTypedSubjects(parsed);
      },
      params,
      signal,
    );
    const collections = await client.fetchJsonPages(library, 'collections', {}, signal);
    logger.debug({ pages, quads: quads.length, collections: collections.length }, 'Fetched RDF export');

    if (saveTo) {
      await mkdir(saveTo, { recursive: true });
      const path = join(saveTo, `${library.libraryId}_items.nq`);
      await writeFile(path, await serializeQuads(quads, 'nquads'), 'utf-8');
      logger.info({ path }, 'Saved RDF dump');
    }
    return { items: [], collections, quads };
  }
}
