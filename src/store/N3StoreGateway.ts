/**
 * N3StoreGateway — StoreGateway over an in-memory n3 Store.
 *
 * Graph replacement is staged: the new content is validated off to the
 * side and swapped in synchronously, so a failed load never leaves a half
 * replaced graph and readers never see one. With a store directory the
 * dataset is snapshotted as N-Quads after every change (write to a temp
 * file, then rename) and reloaded on open.
 */

import { Readable } from 'node:stream';
import { appendFile, mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { Parser, Store } from 'n3';
import type * as RDF from '@rdfjs/types';
import { logger as rootLogger, type Logger } from '../logging/logger.js';
import { InvalidRequestError, StoreLoadFailureError, errorMessage } from '../types/errors.js';
import { dedupeQuads, isAbsoluteIri, namedNode, quad } from '../rdf/terms.js';
import { EXPORT_FORMATS, serializeQuads, type ExportFormat } from '../rdf/serialize.js';
import { KeyedMutex } from './KeyedMutex.js';
import type {
  BackupResult,
  LoadGraphResult,
  QuadPattern,
  StoreGateway,
} from './types.js';

export const SNAPSHOT_FILE = 'dataset.nq';
export const BACKUP_FILE = 'store.nq';
export const BACKUP_LOG = 'backup.log';

export interface N3StoreGatewayOptions {
  /** Snapshot directory; empty or absent keeps the dataset in memory only */
  storeDirectory?: string | undefined;
  /** Prefixes used for Turtle, TriG, N3 and RDF/XML exports */
  prefixes?: Record<string, string>;
  logger?: Logger;
  now?: () => Date;
}

function checkIri(value: string, position: string): void {
  if (!isAbsoluteIri(value)) {
    throw new Error(`${position} <${value}> is not an absolute IRI`);
  }
}

/**
 * Re-home a quad into the target graph, rejecting terms the store could
 * not serialise.
 */
function stageQuad(q: RDF.Quad, graph: RDF.NamedNode): RDF.Quad {
  const { subject, predicate, object } = q;
  if (subject.termType === 'NamedNode') checkIri(subject.value, 'subject');
  else if (subject.termType !== 'BlankNode') throw new Error(`unsupported subject ${subject.termType}`);

  if (predicate.termType !== 'NamedNode') throw new Error(`unsupported predicate ${predicate.termType}`);
  checkIri(predicate.value, 'predicate');

  if (object.termType === 'NamedNode') checkIri(object.value, 'object');
  else if (object.termType === 'Literal') checkIri(object.datatype.value, 'datatype');
  else if (object.termType !== 'BlankNode') throw new Error(`unsupported object ${object.termType}`);

  return quad(subject, predicate, object, graph);
}

export class N3StoreGateway implements StoreGateway {
  private store = new Store();
  private readonly persistLock = new KeyedMutex();
  private readonly storeDirectory: string | undefined;
  private readonly prefixes: Record<string, string>;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: N3StoreGatewayOptions = {}) {
    this.storeDirectory = options.storeDirectory ? resolve(options.storeDirectory) : undefined;
    this.prefixes = options.prefixes ?? {};
    this.logger = (options.logger ?? rootLogger).child({ component: 'store' });
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Create a gateway and load the snapshot from the store directory, if any.
   */
  static async open(options: N3StoreGatewayOptions = {}): Promise<N3StoreGateway> {
    const gateway = new N3StoreGateway(options);
    await gateway.loadSnapshot();
    return gateway;
  }

  get snapshotPath(): string | undefined {
    return this.storeDirectory ? join(this.storeDirectory, SNAPSHOT_FILE) : undefined;
  }

  private async loadSnapshot(): Promise<void> {
    const path = this.snapshotPath;
    if (!path || !existsSync(path)) return;
    const content = await readFile(path, 'utf-8');
    try {
      const quads = new Parser({ format: 'N-Quads' }).parse(content);
      this.store.addQuads(quads);
      this.logger.info({ path, quads: quads.length }, 'Loaded dataset snapshot');
    } catch (err) {
      throw new StoreLoadFailureError(`Cannot read snapshot ${path}: ${errorMessage(err)}`, undefined, { cause: err });
    }
  }

  private async persist(): Promise<void> {
    const path = this.snapshotPath;
    const directory = this.storeDirectory;
    if (!path || !directory) return;
    await this.persistLock.runExclusive(path, async () => {
      const text = await serializeQuads(this.store.getQuads(null, null, null, null), 'nquads');
      await mkdir(directory, { recursive: true });
      const temp = `${path}.tmp`;
      await writeFile(temp, text, 'utf-8');
      await rename(temp, path);
    });
  }

  async loadGraph(graph: string, quads: readonly RDF.Quad[]): Promise<LoadGraphResult> {
    if (!isAbsoluteIri(graph)) {
      throw new StoreLoadFailureError(`Graph name <${graph}> is not an absolute IRI`, graph);
    }
    const graphNode = namedNode(graph);

    let staged: RDF.Quad[];
    try {
      staged = dedupeQuads(quads.map((q) => stageQuad(q, graphNode)));
    } catch (err) {
      throw new StoreLoadFailureError(`Load into <${graph}> rejected: ${errorMessage(err)}`, graph, { cause: err });
    }

    // swap without yielding to the event loop
    const previous = this.store.getQuads(null, null, null, graphNode);
    this.store.removeQuads(previous);
    this.store.addQuads(staged);

    try {
      await this.persist();
    } catch (err) {
      this.store.removeQuads(staged);
      this.store.addQuads(previous);
      throw new StoreLoadFailureError(`Snapshot after loading <${graph}> failed: ${errorMessage(err)}`, graph, { cause: err });
    }

    const size = this.size(graph);
    this.logger.debug({ graph, size, removed: previous.length }, 'Graph loaded');
    return { graph, size, removed: previous.length };
  }

  async clearGraph(graph: string): Promise<number> {
    const graphNode = namedNode(graph);
    const previous = this.store.getQuads(null, null, null, graphNode);
    this.store.removeQuads(previous);
    try {
      await this.persist();
    } catch (err) {
      this.store.addQuads(previous);
      throw new StoreLoadFailureError(`Snapshot after clearing <${graph}> failed: ${errorMessage(err)}`, graph, { cause: err });
    }
    return previous.length;
  }

  async export(format: ExportFormat, graph?: string): Promise<Readable> {
    if (!EXPORT_FORMATS[format].multiGraph && !graph) {
      throw new InvalidRequestError(`Format '${format}' holds a single graph; pass a graph IRI`);
    }
    const quads = this.store.getQuads(null, null, null, graph ? namedNode(graph) : null);
    const text = await serializeQuads(quads, format, this.prefixes);
    return Readable.from([text]);
  }

  async backup(destination: string): Promise<BackupResult> {
    const root = resolve(destination);
    const directory = join(root, 'Store');
    const path = join(directory, BACKUP_FILE);
    const quads = this.store.getQuads(null, null, null, null);
    const timestamp = this.now().toISOString();

    await rm(directory, { recursive: true, force: true });
    await mkdir(directory, { recursive: true });
    await writeFile(path, await serializeQuads(quads, 'nquads'), 'utf-8');
    await appendFile(join(root, BACKUP_LOG), `${timestamp} backup of ${quads.length} quads written to ${path}\n`, 'utf-8');

    this.logger.info({ path, quads: quads.length }, 'Backup written');
    return { path, quads: quads.length, timestamp };
  }

  async optimize(): Promise<void> {
    const quads = this.store.getQuads(null, null, null, null);
    this.store = new Store(quads);
    await this.persist();
    this.logger.info({ quads: quads.length }, 'Store optimized');
  }

  namedGraphs(): string[] {
    return this.store
      .getGraphs(null, null, null)
      .filter((graph) => graph.termType === 'NamedNode')
      .map((graph) => graph.value)
      .sort();
  }

  match(pattern: QuadPattern): RDF.Quad[] {
    return this.store.getQuads(
      pattern.subject ?? null,
      pattern.predicate ?? null,
      pattern.object ?? null,
      pattern.graph ?? null,
    );
  }

  size(graph?: string): number {
    return this.store.countQuads(null, null, null, graph ? namedNode(graph) : null);
  }

  async close(): Promise<void> {
    await this.persist();
  }
}
