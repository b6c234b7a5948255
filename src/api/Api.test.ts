/**
 * E2E tests for the HTTP API.
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { join, resolve } from 'node:path';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import type { FastifyInstance } from 'fastify';
import { parseConfig } from '../config/loader.js';
import { createLogger } from '../logging/logger.js';
import { RDFS_LABEL, namedNode } from '../rdf/terms.js';
import type { FetchLike } from '../source/ZoteroApiClient.js';
import { initializeApp, createServer, loadVocabularyOntology } from '../server.js';
import type { AppContext } from '../server.js';
import type {
  ApiError,
  BackupResponse,
  GraphListResponse,
  HealthResponse,
  LibraryListResponse,
  CsvLoadResponse,
  OptimizeResponse,
  RefreshResponse,
} from './types.js';

const VOCAB = 'http://ex/#';
const GRAPH = 'https://lib.example.org/groups/5';
const FIXED = new Date('2024-05-01T12:00:00.000Z');

const schemaDocument = {
  itemTypes: [{ itemType: 'book', fields: [{ field: 'title' }], creatorTypes: [{ creatorType: 'author' }] }],
  locales: { en: { itemTypes: { book: 'Book' } } },
};

describe('API E2E Tests', () => {
  let app: FastifyInstance;
  let ctx: AppContext;
  let testDir: string;

  beforeAll(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'bibgraph-api-'));
    await mkdir(join(testDir, 'import'), { recursive: true });
    await writeFile(
      join(testDir, 'import', '5_items.json'),
      JSON.stringify([{ key: 'A1', itemType: 'book', title: 'Graphs' }]),
    );

    const config = parseConfig({
      server: {
        backup_directory: join(testDir, 'backup'),
        export_directory: join(testDir, 'export'),
        log_file: join(testDir, 'app.log'),
        refresh_interval: -1,
      },
      context: { vocab: VOCAB, base: 'https://lib.example.org', schema: 'https://api.example.org/schema' },
      libraries: [
        { name: 'shelf', library_type: 'groups', library_id: '5', load_mode: 'manual-import', load_from: join(testDir, 'import') },
        { name: 'broken', library_type: 'groups', library_id: 'x' },
      ],
    });
    const fetch: FetchLike = async () => new Response(JSON.stringify(schemaDocument));

    ctx = await initializeApp({ config, logger: createLogger('silent'), fetch, now: () => FIXED });
    app = await createServer(ctx);
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
    await rm(testDir, { recursive: true, force: true });
  });

  describe('Health Check', () => {
    it('reports a degraded service while a library is disabled', async () => {
      const response = await app.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
      const body = response.json<HealthResponse>();
      expect(body.status).toBe('degraded');
      expect(body.components).toEqual({
        store: { quads: 0, graphs: 0 },
        libraries: { configured: 1, failed: 1, erroring: 0 },
      });
    });
  });

  describe('Library Routes', () => {
    it('lists configured and failed libraries', async () => {
      const response = await app.inject({ method: 'GET', url: '/libs' });

      expect(response.statusCode).toBe(200);
      const body = response.json<LibraryListResponse>();
      expect(body.total).toBe(1);
      expect(body.libraries[0]).toMatchObject({
        name: 'shelf',
        libraryType: 'groups',
        libraryId: '5',
        loadMode: 'manual-import',
        graph: GRAPH,
        refresh: { state: 'idle', runs: 0, policy: { mode: 'disabled' } },
      });
      expect(body.failed).toEqual([
        { name: 'broken', message: "Config validation error at 'libraries[1].library_id': library_id must be numeric" },
      ]);
    });

    it('returns 404 for an unknown library', async () => {
      const response = await app.inject({ method: 'POST', url: '/refresh?library=missing' });

      expect(response.statusCode).toBe(404);
      expect(response.json<ApiError>()).toEqual({ error: 'NOT_FOUND', message: 'Library not found: missing' });
    });

    it('refreshes a library and waits for the result', async () => {
      const response = await app.inject({ method: 'POST', url: '/refresh?library=shelf' });

      expect(response.statusCode).toBe(200);
      const [result] = response.json<RefreshResponse>().results;
      expect(result).toMatchObject({
        library: 'shelf',
        status: 'completed',
        outcome: { library: 'shelf', records: 1, skipped: 0, notes: 0 },
      });
      expect(ctx.store.size(GRAPH)).toBeGreaterThan(0);
    });

    it('parses notes on request', async () => {
      const response = await app.inject({ method: 'POST', url: '/parse_notes?library=shelf' });

      expect(response.statusCode).toBe(200);
      expect(response.json<RefreshResponse>().results.map((result) => result.status)).toEqual(['completed']);
    });
  });

  describe('Log Viewer', () => {
    it('shows the log file escaped as HTML', async () => {
      await writeFile(join(testDir, 'app.log'), '{"msg":"<b>hi</b> & bye"}\n');

      const response = await app.inject({ method: 'GET', url: '/logs' });
      expect(response.statusCode).toBe(200);
      expect(response.headers['content-type']).toBe('text/html; charset=utf-8');
      expect(response.body).toContain('<div id="log">{"msg":"&lt;b&gt;hi&lt;/b&gt; &amp; bye"}\n</div>');
    });

    it('clears the log file and returns to the viewer', async () => {
      const response = await app.inject({ method: 'POST', url: '/logs/clear' });

      expect(response.statusCode).toBe(303);
      expect(response.headers['location']).toBe('/logs');
      expect(await readFile(join(testDir, 'app.log'), 'utf-8')).toBe('');
    });
  });

  describe('Dataset Routes', () => {
    it('lists named graphs with their sizes', async () => {
      const response = await app.inject({ method: 'GET', url: '/graphs' });

      expect(response.statusCode).toBe(200);
      expect(response.json<GraphListResponse>()).toEqual({
        graphs: [{ iri: GRAPH, size: ctx.store.size(GRAPH) }],
        total: 1,
      });
    });

    it('exports the dataset as N-Quads', async () => {
      const response = await app.inject({ method: 'GET', url: '/export?format=nquads&download=true' });

      expect(response.statusCode).toBe(200);
      expect(response.headers['content-type']).toBe('application/n-quads; charset=utf-8');
      expect(response.headers['content-disposition']).toBe('attachment; filename="dataset.nq"');
      expect(response.body.split('\n')).toContain(`<${GRAPH}> <${RDFS_LABEL}> "shelf" <${GRAPH}> .`);
    });

    it('rejects unknown graphs, formats and single-graph formats without a graph', async () => {
      const missing = await app.inject({ method: 'GET', url: '/export?graph=http://ex/none' });
      expect(missing.statusCode).toBe(404);
      expect(missing.json<ApiError>().message).toBe('Graph not found: http://ex/none');

      const badFormat = await app.inject({ method: 'GET', url: '/export?format=csv' });
      expect(badFormat.statusCode).toBe(400);
      expect(badFormat.json<ApiError>().error).toBe('INVALID_REQUEST');

      const noGraph = await app.inject({ method: 'GET', url: '/export?format=ttl' });
      expect(noGraph.statusCode).toBe(400);
      expect(noGraph.json<ApiError>()).toEqual({
        error: 'INVALID_REQUEST',
        message: "Format 'ttl' holds a single graph; pass a graph IRI",
      });
    });

    it('writes a graph as a CSV table', async () => {
      const response = await app.inject({ method: 'GET', url: `/csv?graph=${encodeURIComponent(GRAPH)}&download=true` });

      expect(response.statusCode).toBe(200);
      expect(response.headers['content-type']).toBe('text/csv; charset=utf-8');
      expect(response.headers['content-disposition']).toBe('attachment; filename="export.csv"');
      expect(response.body.split('\n')[0]?.startsWith('IRI,')).toBe(true);
      expect(await readFile(join(testDir, 'export', 'export.csv'), 'utf-8')).toBe(response.body);
    });

    it('loads a CSV table into a graph, replacing the listed subjects', async () => {
      const item = 'https://lib.example.org/groups/5/item/A1';
      await writeFile(
        join(testDir, 'export', 'edits.csv'),
        `IRI,${RDFS_LABEL}\n${item},Edited | <http://ex/other>\n`,
      );
      const before = ctx.store.size(GRAPH);
      const about = ctx.store.match({ subject: namedNode(item), graph: namedNode(GRAPH) }).length;

      const response = await app.inject({
        method: 'POST',
        url: `/csv?graph=${encodeURIComponent(GRAPH)}&load_csv=edits.csv&delete=true`,
      });

      expect(response.statusCode).toBe(200);
      expect(response.json<CsvLoadResponse>()).toEqual({
        success: true,
        graph: GRAPH,
        loaded: 2,
        removed: about,
        skipped: 0,
        size: before - about + 2,
      });
      expect(ctx.store.match({ subject: namedNode(item), graph: namedNode(GRAPH) })
        .map((q) => q.object.value)
        .sort()).toEqual(['Edited', 'http://ex/other']);
    });

    it('rejects CSV files outside the export directory or missing', async () => {
      const graph = encodeURIComponent(GRAPH);
      const outside = await app.inject({ method: 'POST', url: `/csv?graph=${graph}&load_csv=../outside.csv` });
      expect(outside.statusCode).toBe(400);
      expect(outside.json<ApiError>()).toEqual({
        error: 'INVALID_REQUEST',
        message: 'CSV file must be inside the export directory: ../outside.csv',
      });

      const missing = await app.inject({ method: 'POST', url: `/csv?graph=${graph}&load_csv=missing.csv` });
      expect(missing.statusCode).toBe(404);
      expect(missing.json<ApiError>().message).toBe('CSV file not found: missing.csv');
    });

    it('serves the vocabulary ontology once it is loaded', async () => {
      const before = await app.inject({ method: 'GET', url: '/schema' });
      expect(before.statusCode).toBe(404);
      expect(before.json<ApiError>().message).toBe('Vocabulary ontology is not loaded');

      expect(await loadVocabularyOntology(ctx)).toBeGreaterThan(0);
      const after = await app.inject({ method: 'GET', url: '/schema' });
      expect(after.statusCode).toBe(200);
      expect(after.headers['content-type']).toBe('text/turtle; charset=utf-8');
      expect(after.body).toContain('Book');
    });

    it('writes a backup', async () => {
      const response = await app.inject({ method: 'POST', url: '/backup' });

      expect(response.statusCode).toBe(200);
      const body = response.json<BackupResponse>();
      const path = join(resolve(testDir, 'backup'), 'Store', 'store.nq');
      expect(body).toEqual({ success: true, path, quads: ctx.store.size(), timestamp: FIXED.toISOString() });
      expect(await readFile(join(testDir, 'backup', 'backup.log'), 'utf-8')).toBe(
        `${FIXED.toISOString()} backup of ${ctx.store.size()} quads written to ${path}\n`,
      );
    });

    it('optimizes the store', async () => {
      const response = await app.inject({ method: 'POST', url: '/optimize' });

      expect(response.statusCode).toBe(200);
      expect(response.json<OptimizeResponse>()).toEqual({ success: true, quads: ctx.store.size() });
    });
  });
});
