/**
 * Factory for the SourceFetcher matching a library's load mode.
 *
 * - api-json → ApiJsonSource
 * - api-rdf → ApiRdfSource
 * - manual-import → ManualImportSource
 */

import type { Library } from '../library/LibraryResolver.js';
import type { Logger } from '../logging/logger.js';
import { ConfigValidationError } from '../config/loader.js';
import { ApiJsonSource } from './ApiJsonSource.js';
import { ApiRdfSource } from './ApiRdfSource.js';
import { ManualImportSource } from './ManualImportSource.js';
import type { LibraryLocator, ZoteroApiClient } from './ZoteroApiClient.js';
import type { SourceFetcher } from './types.js';

export interface CreateSourceFetcherOptions {
  library: Library;
  client: ZoteroApiClient;
  logger: Logger;
}

function locatorFor(library: Library): LibraryLocator {
  if (library.libraryType === 'knowledge base' || !library.libraryId) {
    throw new ConfigValidationError(
      `load mode '${library.loadMode}' needs a groups or user library with a library_id`,
      `libraries.${library.name}.load_mode`,
      library.loadMode,
    );
  }
  return { libraryType: library.libraryType, libraryId: library.libraryId, apiKey: library.apiKey };
}

export function createSourceFetcher(options: CreateSourceFetcherOptions): SourceFetcher {
  const { library, client } = options;
  const logger = options.logger.child({ source: library.loadMode });

  switch (library.loadMode) {
    case 'api-json':
      return new ApiJsonSource({
        client,
        library: locatorFor(library),
        params: library.apiQueryParams,
        saveTo: library.saveTo,
        logger,
      });
    case 'api-rdf':
      return new ApiRdfSource({
        client,
        library: locatorFor(library),
        format: library.rdfExportFormat,
        baseIri: library.baseIri,
        params: library.apiQueryParams,
        saveTo: library.saveTo,
        logger,
      });
    case 'manual-import':
      return new ManualImportSource({ path: library.loadFrom, baseIri: library.baseIri, logger });
  }
}
