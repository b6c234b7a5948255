/**
 * ApiJsonSource — items and collections as JSON from the web API.
 */

import type { Logger } from '../logging/logger.js';
import { writeJsonDump } from './JsonDump.js';
import type { LibraryLocator, ZoteroApiClient } from './ZoteroApiClient.js';
import type { SourceFetcher, SourcePayload } from './types.js';

export interface ApiJsonSourceOptions {
  client: ZoteroApiClient;
  library: LibraryLocator;
  params?: Record<string, string>;
  /** Directory for JSON dumps of every fetch */
  saveTo?: string | undefined;
  logger: Logger;
}

export class ApiJsonSource implements SourceFetcher {
  readonly kind = 'api-json';

  constructor(private readonly options: ApiJsonSourceOptions) {}

  async fetch(signal: AbortSignal): Promise<SourcePayload> {
    const { client, library, params = {}, saveTo, logger } = this.options;
    const items = await client.fetchJsonPages(library, 'items', params, signal);
    const collections = await client.fetchJsonPages(library, 'collections', {}, signal);

    if (saveTo) {
      const paths = await writeJsonDump(saveTo, library.libraryId, items, collections);
      logger.info({ paths }, 'Saved JSON dump');
    }
    return { items, collections, quads: [] };
  }
}
