/**
 * ManualImportSource — a library read from files on disk.
 *
 * Every file of the directory is read in name order: RDF files by their
 * extension, JSON files as record dumps. A dump named `*_collections.json`
 * holds collections, any other dump holds items unless a record says
 * otherwise. Files of other types are ignored.
 */

import { readFile, readdir, stat } from 'node:fs/promises';
import { extname, join } from 'node:path';
import type { Logger } from '../logging/logger.js';
import { isRecord } from '../config/loader.js';
import { mediaTypeForFile, parseRdf } from '../rdf/parse.js';
import { FetchFailureError, errorMessage } from '../types/errors.js';
import { emptyPayload, type SourceFetcher, type SourcePayload } from './types.js';

export interface ManualImportSourceOptions {
  /** A directory, or a single file */
  path: string;
  /** Base for relative IRIs in RDF files */
  baseIri: string;
  logger: Logger;
}

function isCollectionRecord(record: unknown): boolean {
  if (!isRecord(record)) return false;
  const data = isRecord(record['data']) ? record['data'] : record;
  return typeof data['name'] === 'string' && data['itemType'] === undefined;
}

/**
 * Sort the records of one JSON dump into items and collections.
 */
export function splitJsonDump(fileName: string, document: unknown, payload: SourcePayload): void {
  if (isRecord(document) && (Array.isArray(document['items']) || Array.isArray(document['collections']))) {
    if (Array.isArray(document['items'])) payload.items.push(...document['items']);
    if (Array.isArray(document['collections'])) payload.collections.push(...document['collections']);
    return;
  }

  const records: unknown[] = Array.isArray(document) ? document : [document];
  if (/_collections\.json$/i.test(fileName)) {
    payload.collections.push(...records);
    return;
  }
  for (const record of records) {
    if (isCollectionRecord(record)) payload.collections.push(record);
    else payload.items.push(record);
  }
}

export class ManualImportSource implements SourceFetcher {
  readonly kind = 'manual-import';

  constructor(private readonly options: ManualImportSourceOptions) {}

  private async listFiles(): Promise<string[]> {
    const { path } = this.options;
    try {
      const info = await stat(path);
      if (info.isFile()) return [path];
      const entries = await readdir(path, { withFileTypes: true });
      return entries
        .filter((entry) => entry.isFile())
        .map((entry) => entry.name)
        .sort()
        .map((name) => join(path, name));
    } catch (err) {
      throw new FetchFailureError(`Cannot read import path ${path}: ${errorMessage(err)}`, path, undefined, { cause: err });
    }
  }

  async fetch(signal: AbortSignal): Promise<SourcePayload> {
    const { baseIri, logger } = this.options;
    const payload = emptyPayload();

    for (const file of await this.listFiles()) {
      signal.throwIfAborted();
      const mediaType = mediaTypeForFile(file);
      const isJson = extname(file).toLowerCase() === '.json';
      if (!mediaType && !isJson) {
        logger.debug({ file }, 'Skipping file of unknown type');
        continue;
      }

      try {
        const text = await readFile(file, 'utf-8');
        if (mediaType) {
          const quads = await parseRdf(text, mediaType, `${baseIri}/`);
          payload.quads.push(...quads);
          logger.debug({ file, quads: quads.length }, 'Read RDF file');
        } else {
          const document: unknown = JSON.parse(text);
          splitJsonDump(file, document, payload);
          logger.debug({ file }, 'Read JSON dump');
        }
      } catch (err) {
        throw new FetchFailureError(`Cannot import ${file}: ${errorMessage(err)}`, file, undefined, { cause: err });
      }
    }
    return payload;
  }
}
