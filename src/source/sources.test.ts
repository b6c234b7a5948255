/**
 * Tests for the library sources: manual import, API JSON and API RDF.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { createLogger } from '../logging/logger.js';
import { FetchFailureError } from '../types/errors.js';
import { ApiJsonSource } from './ApiJsonSource.js';
import { ApiRdfSource } from './ApiRdfSource.js';
import { ManualImportSource, splitJsonDump } from './ManualImportSource.js';
import { ZoteroApiClient, type FetchLike, type LibraryLocator } from './ZoteroApiClient.js';
import { emptyPayload } from './types.js';

const logger = createLogger('silent');
const library: LibraryLocator = { libraryType: 'groups', libraryId: '42' };

function json(body: unknown, total?: number): Response {
  return new Response(JSON.stringify(body), {
    headers: total === undefined ? {} : { 'Total-Results': String(total) },
  });
}

describe('splitJsonDump', () => {
  it('reads an items/collections document as is', () => {
    const payload = emptyPayload();
    splitJsonDump('dump.json', { items: [{ key: 'I' }], collections: [{ key: 'C' }] }, payload);
    expect(payload.items).toEqual([{ key: 'I' }]);
    expect(payload.collections).toEqual([{ key: 'C' }]);
  });

  it('sorts records of a plain dump by shape', () => {
    const payload = emptyPayload();
    splitJsonDump('42_items.json', [
      { key: 'I1', data: { key: 'I1', itemType: 'book', title: 'T' } },
      { key: 'C1', data: { key: 'C1', name: 'Coll' } },
    ], payload);
    expect(payload.items).toEqual([{ key: 'I1', data: { key: 'I1', itemType: 'book', title: 'T' } }]);
    expect(payload.collections).toEqual([{ key: 'C1', data: { key: 'C1', name: 'Coll' } }]);
  });

  it('trusts the collections file name', () => {
    const payload = emptyPayload();
    splitJsonDump('/tmp/42_collections.json', { key: 'C2', data: { key: 'C2' } }, payload);
    expect(payload.collections).toEqual([{ key: 'C2', data: { key: 'C2' } }]);
    expect(payload.items).toEqual([]);
  });
});

describe('ManualImportSource', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'bibgraph-import-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads RDF files and JSON dumps in name order', async () => {
    await writeFile(join(dir, 'a.ttl'), '<rel> a <http://ex/T> .\n');
    await writeFile(join(dir, 'b_items.json'), JSON.stringify([{ key: 'I1', itemType: 'book' }, { key: 'C1', name: 'Coll' }]));
    await writeFile(join(dir, 'c_collections.json'), JSON.stringify([{ key: 'C2', name: 'Other' }]));
    await writeFile(join(dir, 'notes.txt'), 'ignored');
    await mkdir(join(dir, 'nested'));

    const source = new ManualImportSource({ path: dir, baseIri: 'http://ex/lib', logger });
    const payload = await source.fetch(new AbortController().signal);

    expect(payload.quads.map((q) => q.subject.value)).toEqual(['http://ex/lib/rel']);
    expect(payload.items).toEqual([{ key: 'I1', itemType: 'book' }]);
    expect(payload.collections).toEqual([{ key: 'C1', name: 'Coll' }, { key: 'C2', name: 'Other' }]);
  });

  it('reads a single file', async () => {
    const file = join(dir, 'data.nt');
    await writeFile(file, '<http://ex/a> <http://ex/p> "v" .\n');
    const payload = await new ManualImportSource({ path: file, baseIri: 'http://ex/lib', logger })
      .fetch(new AbortController().signal);
    expect(payload.quads).toHaveLength(1);
  });

  it('fails on a missing path or a broken file', async () => {
    const missing = new ManualImportSource({ path: join(dir, 'missing'), baseIri: 'http://ex/lib', logger });
    await expect(missing.fetch(new AbortController().signal)).rejects.toThrow(FetchFailureError);

    await writeFile(join(dir, 'bad.json'), '{ not json');
    const broken = new ManualImportSource({ path: dir, baseIri: 'http://ex/lib', logger });
    await expect(broken.fetch(new AbortController().signal)).rejects.toThrow(/^Cannot import .*bad\.json: /);
  });

  it('stops when aborted', async () => {
    await writeFile(join(dir, 'a.nt'), '<http://ex/a> <http://ex/p> "v" .\n');
    const controller = new AbortController();
    controller.abort(new Error('stop'));
    const source = new ManualImportSource({ path: dir, baseIri: 'http://ex/lib', logger });
    await expect(source.fetch(controller.signal)).rejects.toThrow('stop');
  });
});

describe('ApiJsonSource', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'bibgraph-dump-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('fetches items and collections and saves a dump', async () => {
    const fetch = vi.fn<FetchLike>(async (url) => (url.includes('/items')
      ? json([{ key: 'I1', data: { key: 'I1', itemType: 'book' } }], 1)
      : json([{ key: 'C1', data: { key: 'C1', name: 'Coll' } }], 1)));
    const client = new ZoteroApiClient({ apiUrl: 'https://api.example.org/', fetch, logger });
    const source = new ApiJsonSource({ client, library, params: { itemType: '-attachment' }, saveTo: dir, logger });

    const payload = await source.fetch(new AbortController().signal);
    expect(payload.items).toHaveLength(1);
    expect(payload.collections).toHaveLength(1);
    expect(fetch.mock.calls[0]?.[0]).toBe(
      'https://api.example.org/groups/42/items?itemType=-attachment&format=json&limit=100&start=0',
    );

    const saved: unknown = JSON.parse(await readFile(join(dir, '42_collections.json'), 'utf-8'));
    expect(saved).toEqual([{ key: 'C1', data: { key: 'C1', name: 'Coll' } }]);
  });
});

describe('ApiRdfSource', () => {
  it('parses RDF/XML pages and reads collections as JSON', async () => {
    const page = [
      '<?xml version="1.0"?>',
      '<rdf:RDF xmlns:rdf="http://www.w3.org/1999/02/22-rdf-syntax-ns#" xmlns:dc="http://purl.org/dc/elements/1.1/">',
      '  <rdf:Description rdf:about="#item_1">',
      '    <rdf:type rdf:resource="http://purl.org/ontology/bibo/Book"/>',
      '    <dc:title>Graphs</dc:title>',
      '  </rdf:Description>',
      '</rdf:RDF>',
    ].join('\n');
    const fetch = vi.fn<FetchLike>(async (url) => (url.includes('/items')
      ? new Response(page, { headers: { 'Total-Results': '1' } })
      : json([], 0)));
    const client = new ZoteroApiClient({ apiUrl: 'https://api.example.org/', fetch, logger });
    const source = new ApiRdfSource({
      client,
      library,
      format: 'rdf_zotero',
      baseIri: 'https://example.org/groups/42',
      logger,
    });

    const payload = await source.fetch(new AbortController().signal);
    expect(payload.items).toEqual([]);
    expect(payload.collections).toEqual([]);
    expect(payload.quads.map((q) => `${q.subject.value} ${q.object.value}`)).toEqual([
      'https://example.org/groups/42/#item_1 http://purl.org/ontology/bibo/Book',
      'https://example.org/groups/42/#item_1 Graphs',
    ]);
    expect(fetch).toHaveBeenCalledTimes(2);
  });

  it('reports unparseable pages as fetch failures', async () => {
    const fetch = vi.fn<FetchLike>(async () => new Response(
      '<rdf:RDF xmlns:rdf="http://www.w3.org/1999/02/22-rdf-syntax-ns#"></rdf:Description>',
    ));
    const client = new ZoteroApiClient({ apiUrl: 'https://api.example.org/', fetch, logger });
    const source = new ApiRdfSource({ client, library, format: 'rdf_zotero', baseIri: 'https://example.org/g', logger });
    await expect(source.fetch(new AbortController().signal)).rejects.toThrow(/^Unparseable rdf_zotero page: /);
  });
});
