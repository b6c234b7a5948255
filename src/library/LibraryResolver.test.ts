import { describe, it, expect } from 'vitest';
import { join } from 'node:path';
import { parseConfig } from '../config/loader.js';
import { createLogger } from '../logging/logger.js';
import { createSourceFetcher } from '../source/createSourceFetcher.js';
import { ZoteroApiClient } from '../source/ZoteroApiClient.js';
import { defaultBaseIri, normalizeBaseIri, resolveLibraries, resolveLibrary } from './LibraryResolver.js';

const logger = createLogger('silent');

function config(libraries: unknown[], defaults: Record<string, unknown> = {}) {
  return parseConfig({
    server: { import_directory: '/data/import', refresh_interval: 60 },
    context: { vocab: 'http://ex/#', base: 'https://lib.example.org' },
    defaults,
    libraries,
  });
}

describe('normalizeBaseIri', () => {
  it('strips trailing separators', () => {
    expect(normalizeBaseIri(' https://example.org/kb/# ')).toBe('https://example.org/kb');
  });
});

describe('resolveLibrary', () => {
  it('derives IRIs and paths from the defaults', () => {
    const cfg = config([{ name: 'shelf', library_type: 'groups', library_id: '123', save_to: '/dumps/$' }]);
    const [entry] = cfg.libraries;
    if (!entry) throw new Error('library missing');

    expect(defaultBaseIri(cfg.context.base, entry)).toBe('https://lib.example.org/groups/123');
    const library = resolveLibrary(cfg, entry);
    expect(library).toMatchObject({
      name: 'shelf',
      loadMode: 'api-json',
      baseIri: 'https://lib.example.org/groups/123',
      graphIri: 'https://lib.example.org/groups/123',
      loadFrom: join('/data/import', 'shelf'),
      saveTo: '/dumps/123',
      refreshInterval: 60,
      parseNotes: false,
    });
    expect(library.knowledgeBaseGraph).toBeUndefined();
  });

  it('targets the knowledge-base graph when mapping is enabled', () => {
    const cfg = config(
      [
        { name: 'shelf', library_type: 'user', library_id: '7', knowledge_base_mapping: true, refresh_interval: -1 },
        { name: 'plain', library_type: 'user', library_id: '8' },
      ],
      { knowledge_base_graph: 'https://example.org/kb/' },
    );
    const { libraries, failed } = resolveLibraries(cfg);
    expect(failed).toEqual([]);
    expect(libraries.map((library) => library.knowledgeBaseGraph)).toEqual(['https://example.org/kb', undefined]);
    expect(libraries[0]?.ruleSet.knowledgeBase).toEqual({
      enabled: true,
      namespace: 'https://example.org/kb',
      fuzzyThreshold: 90,
    });
    expect(libraries[0]?.refreshInterval).toBe(-1);
  });

  it('imports knowledge-base libraries manually into their own graph', () => {
    const cfg = config(
      [{ name: 'kb', library_type: 'knowledge base', load_from: '/kb-files' }],
      { knowledge_base_graph: 'https://example.org/kb' },
    );
    const [library] = resolveLibraries(cfg).libraries;
    expect(library).toMatchObject({
      loadMode: 'manual-import',
      baseIri: 'https://example.org/kb',
      graphIri: 'https://example.org/kb',
      knowledgeBaseGraph: 'https://example.org/kb',
      loadFrom: '/kb-files',
    });
  });

  it('reports libraries that cannot be resolved', () => {
    const cfg = config([
      { name: 'kb', library_type: 'knowledge base' },
      { name: 'a', library_type: 'groups', library_id: '1', graph_uri: 'https://example.org/g' },
      { name: 'b', library_type: 'groups', library_id: '2', graph_uri: 'https://example.org/g' },
      { name: 'c', library_type: 'groups', library_id: '3', map: { named_library: 'bad term' } },
      { name: 'd', library_type: 'groups', library_id: 'x' },
    ]);
    const { libraries, failed } = resolveLibraries(cfg);
    expect(libraries.map((library) => library.name)).toEqual(['a']);
    expect(failed).toEqual([
      { name: 'd', message: "Config validation error at 'libraries[4].library_id': library_id must be numeric" },
      {
        name: 'kb',
        message: "Config validation error at 'libraries.kb.base_uri': base_uri is required for a knowledge base library",
      },
      {
        name: 'b',
        message: "Config validation error at 'libraries.b': graph <https://example.org/g> is already used by 'a'",
      },
      {
        name: 'c',
        message: "Invalid mapping rule 'named_library': 'http://ex/#bad term' is not a valid IRI",
      },
    ]);
  });
});

describe('createSourceFetcher', () => {
  const client = new ZoteroApiClient({ apiUrl: 'https://api.example.org/', logger });

  it('picks the source for the load mode', () => {
    const cfg = config([
      { name: 'json', library_type: 'groups', library_id: '1' },
      { name: 'rdf', library_type: 'groups', library_id: '2', load_mode: 'rdf' },
      { name: 'files', library_type: 'groups', library_id: '3', load_mode: 'manual-import' },
    ]);
    const kinds = resolveLibraries(cfg).libraries.map((library) => createSourceFetcher({ library, client, logger }).kind);
    expect(kinds).toEqual(['api-json', 'api-rdf', 'manual-import']);
  });

  it('refuses API modes for knowledge-base libraries', () => {
    const cfg = config([{ name: 'kb', library_type: 'knowledge base', base_uri: 'https://example.org/kb', load_mode: 'api-json' }]);
    const [library] = resolveLibraries(cfg).libraries;
    if (!library) throw new Error('library missing');
    expect(() => createSourceFetcher({ library, client, logger })).toThrow(
      "Config validation error at 'libraries.kb.load_mode': load mode 'api-json' needs a groups or user library with a library_id",
    );
  });
});
