/**
 * DatasetHandlers — HTTP handlers for the dataset as a whole.
 *
 * - GET /graphs: named graphs and their sizes
 * - GET /export: serialise the dataset or one graph
 * - GET /schema: the vocabulary ontology
 * - GET /csv: tabulate the dataset or one graph into the export directory
 * - POST /csv: load a table from the export directory into a graph
 * - POST /backup, POST /optimize: store maintenance
 */

import { existsSync } from 'node:fs';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { isAbsolute, join, relative, resolve } from 'node:path';
import type { FastifyRequest, FastifyReply } from 'fastify';
import { z } from 'zod';
import type { DatasetWriter } from '../../pipeline/DatasetWriter.js';
import { csvToQuads, quadsToCsv } from '../../rdf/csv.js';
import { EXPORT_FORMATS, type ExportFormat } from '../../rdf/serialize.js';
import { localName, namedNode } from '../../rdf/terms.js';
import type { StoreGateway } from '../../store/types.js';
import { InvalidRequestError } from '../../types/errors.js';
import { errorResponse, notFound } from '../errors.js';
import type { ApiError, BackupResponse, CsvLoadResponse, GraphListResponse, OptimizeResponse } from '../types.js';

export const CSV_EXPORT_FILE = 'export.csv';

const exportFormatSchema = z.enum(['trig', 'nquads', 'ttl', 'nt', 'n3', 'xml']);

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

export const exportQuerySchema = z.object({
  format: exportFormatSchema.default('trig'),
  graph: z.string().min(1).optional(),
  download: booleanFlag.optional(),
});

export const schemaQuerySchema = z.object({
  format: exportFormatSchema.default('ttl'),
});

export const csvExportQuerySchema = z.object({
  graph: z.string().min(1).optional(),
  download: booleanFlag.optional(),
});

export const csvLoadQuerySchema = z.object({
  graph: z.string().min(1),
  load_csv: z.string().min(1),
  delete: booleanFlag.optional(),
});

export type ExportQuery = z.input<typeof exportQuerySchema>;
export type SchemaQuery = z.input<typeof schemaQuerySchema>;
export type CsvExportQuery = z.input<typeof csvExportQuerySchema>;
export type CsvLoadQuery = z.input<typeof csvLoadQuerySchema>;

export interface DatasetHandlerContext {
  store: StoreGateway;
  writer: DatasetWriter;
  backupDirectory: string;
  /** Where CSV tables are written and read */
  exportDirectory: string;
  /** Graph holding the vocabulary ontology */
  ontologyGraph: string;
}

function attachmentName(graph: string | undefined, format: ExportFormat): string {
  const base = graph ? localName(graph.replace(/[/#]+$/, '')) || 'graph' : 'dataset';
  return `${base.replace(/[^A-Za-z0-9._-]/g, '_')}.${EXPORT_FORMATS[format].extension}`;
}

/**
 * A file name inside the export directory.
 *
 * @throws InvalidRequestError for paths leaving the directory
 */
function exportFile(directory: string, name: string): string {
  const root = resolve(directory);
  const path = resolve(root, name);
  const inside = relative(root, path);
  if (inside === '' || inside.startsWith('..') || isAbsolute(inside)) {
    throw new InvalidRequestError(`CSV file must be inside the export directory: ${name}`);
  }
  return path;
}

/**
 * Create dataset handlers.
 */
export function createDatasetHandlers(ctx: DatasetHandlerContext) {
  const { store } = ctx;

  async function sendGraph(
    reply: FastifyReply,
    format: ExportFormat,
    graph: string | undefined,
    download: boolean,
  ): Promise<FastifyReply> {
    const body = await store.export(format, graph);
    reply.header('content-type', `${EXPORT_FORMATS[format].mediaType}; charset=utf-8`);
    if (download) {
      reply.header('content-disposition', `attachment; filename="${attachmentName(graph, format)}"`);
    }
    return reply.send(body);
  }

  /**
   * GET /graphs
   */
  async function listGraphs(): Promise<GraphListResponse> {
    const graphs = store.namedGraphs().map((iri) => ({ iri, size: store.size(iri) }));
    return { graphs, total: graphs.length };
  }

  /**
   * GET /export
   */
  async function exportDataset(
    request: FastifyRequest<{ Querystring: ExportQuery }>,
    reply: FastifyReply,
  ): Promise<FastifyReply | ApiError> {
    try {
      const query = exportQuerySchema.parse(request.query);
      if (query.graph && !store.namedGraphs().includes(query.graph)) {
        return notFound(reply, `Graph not found: ${query.graph}`);
      }
      return await sendGraph(reply, query.format, query.graph, query.download ?? false);
    } catch (err) {
      return errorResponse(reply, err);
    }
  }

  /**
   * GET /schema
   */
  async function getSchema(
    request: FastifyRequest<{ Querystring: SchemaQuery }>,
    reply: FastifyReply,
  ): Promise<FastifyReply | ApiError> {
    try {
      const query = schemaQuerySchema.parse(request.query);
      if (store.size(ctx.ontologyGraph) === 0) {
        return notFound(reply, 'Vocabulary ontology is not loaded');
      }
      return await sendGraph(reply, query.format, ctx.ontologyGraph, false);
    } catch (err) {
      return errorResponse(reply, err);
    }
  }

  /**
   * GET /csv
   */
  async function exportCsv(
    request: FastifyRequest<{ Querystring: CsvExportQuery }>,
    reply: FastifyReply,
  ): Promise<string | ApiError> {
    try {
      const query = csvExportQuerySchema.parse(request.query);
      if (query.graph && !store.namedGraphs().includes(query.graph)) {
        return notFound(reply, `Graph not found: ${query.graph}`);
      }
      const table = quadsToCsv(store.match({ graph: query.graph ? namedNode(query.graph) : null }));
      await mkdir(ctx.exportDirectory, { recursive: true });
      const path = join(ctx.exportDirectory, CSV_EXPORT_FILE);
      await writeFile(path, table.text, 'utf-8');
      request.log.info({ path, rows: table.rows, graph: query.graph }, 'CSV table written');

      reply.type('text/csv; charset=utf-8');
      if (query.download) {
        reply.header('content-disposition', `attachment; filename="${CSV_EXPORT_FILE}"`);
      }
      return table.text;
    } catch (err) {
      return errorResponse(reply, err);
    }
  }

  /**
   * POST /csv
   *
   * With `delete`, statements about the listed subjects are dropped before
   * the table's statements are added. The graph keeps the result until its
   * owner next refreshes it.
   */
  async function loadCsv(
    request: FastifyRequest<{ Querystring: CsvLoadQuery }>,
    reply: FastifyReply,
  ): Promise<CsvLoadResponse | ApiError> {
    try {
      const query = csvLoadQuerySchema.parse(request.query);
      if (!store.namedGraphs().includes(query.graph)) {
        return notFound(reply, `Graph not found: ${query.graph}`);
      }
      const path = exportFile(ctx.exportDirectory, query.load_csv);
      if (!existsSync(path)) {
        return notFound(reply, `CSV file not found: ${query.load_csv}`);
      }
      const table = csvToQuads(await readFile(path, 'utf-8'));
      const listed = new Set(table.subjects.map((subject) => subject.value));

      let removed = 0;
      const result = await ctx.writer.update(query.graph, (current) => {
        const kept = query.delete
          ? current.filter((q) => !(q.subject.termType === 'NamedNode' && listed.has(q.subject.value)))
          : current;
        removed = current.length - kept.length;
        return [...kept, ...table.quads];
      });
      request.log.info({ path, graph: query.graph, loaded: table.quads.length, removed }, 'CSV table loaded');
      return {
        success: true,
        graph: query.graph,
        loaded: table.quads.length,
        removed,
        skipped: table.skipped,
        size: result.size,
      };
    } catch (err) {
      return errorResponse(reply, err);
    }
  }

  /**
   * POST /backup
   */
  async function backup(
    _request: FastifyRequest,
    reply: FastifyReply,
  ): Promise<BackupResponse | ApiError> {
    try {
      const result = await store.backup(ctx.backupDirectory);
      return { success: true, ...result };
    } catch (err) {
      return errorResponse(reply, err);
    }
  }

  /**
   * POST /optimize
   */
  async function optimize(
    _request: FastifyRequest,
    reply: FastifyReply,
  ): Promise<OptimizeResponse | ApiError> {
    try {
      await store.optimize();
      return { success: true, quads: store.size() };
    } catch (err) {
      return errorResponse(reply, err);
    }
  }

  return {
    listGraphs,
    exportDataset,
    getSchema,
    exportCsv,
    loadCsv,
    backup,
    optimize,
  };
}

export type DatasetHandlers = ReturnType<typeof createDatasetHandlers>;
