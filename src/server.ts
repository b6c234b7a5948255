/**
 * Server entry point for the bibliographic graph service.
 *
 * This module:
 * - Initializes all components (config, store, libraries, scheduler)
 * - Creates Fastify server with routes
 * - Provides both programmatic API and CLI usage
 */

import Fastify, { type FastifyBaseLogger } from 'fastify';
import cors from '@fastify/cors';

import { loadConfig } from './config/loader.js';
import type { AppConfig } from './config/types.js';
import { createLogger, type Logger } from './logging/logger.js';
import { resolveLibraries, type Library } from './library/LibraryResolver.js';
import { GraphAssembler } from './graph/GraphAssembler.js';
import { KnowledgeBaseLedger } from './graph/KnowledgeBaseLedger.js';
import { HtmlNoteParser } from './notes/HtmlNoteParser.js';
import { DatasetWriter } from './pipeline/DatasetWriter.js';
import { LibraryPipeline } from './pipeline/LibraryPipeline.js';
import { namedNode, standardPrefixes } from './rdf/terms.js';
import {
  RefreshScheduler,
  resolveRefreshPolicy,
  type SchedulerClock,
} from './scheduler/RefreshScheduler.js';
import { buildSchemaOntology, ontologyGraphIri } from './schema/SchemaOntology.js';
import { createSourceFetcher } from './source/createSourceFetcher.js';
import { ZoteroApiClient, type FetchLike } from './source/ZoteroApiClient.js';
import { N3StoreGateway } from './store/N3StoreGateway.js';
import { createDatasetHandlers } from './api/handlers/DatasetHandlers.js';
import { createLibraryHandlers } from './api/handlers/LibraryHandlers.js';
import { createLogHandlers } from './api/handlers/LogHandlers.js';
import { registerRoutes } from './api/routes.js';
import type { HealthResponse } from './api/types.js';
import { errorMessage } from './types/errors.js';

/**
 * Application context holding all initialized components.
 */
export interface AppContext {
  config: AppConfig;
  logger: Logger;
  store: N3StoreGateway;
  ledger: KnowledgeBaseLedger;
  writer: DatasetWriter;
  client: ZoteroApiClient;
  scheduler: RefreshScheduler;
  libraries: Library[];
  failedLibraries: Array<{ name: string; message: string }>;
}

export interface InitializeOptions {
  /** Use this configuration instead of reading the config file */
  config?: AppConfig;
  configPath?: string;
  logger?: Logger;
  fetch?: FetchLike;
  clock?: SchedulerClock;
  /** Clock for generation timestamps and backups */
  now?: () => Date;
}

/**
 * Declare the contributors of every shared graph and hold its persisted
 * content until each of them has contributed.
 */
function prepareLedger(ledger: KnowledgeBaseLedger, store: N3StoreGateway, libraries: readonly Library[]): void {
  const contributors = new Map<string, string[]>();
  for (const library of libraries) {
    if (!library.knowledgeBaseGraph) continue;
    const names = contributors.get(library.knowledgeBaseGraph) ?? [];
    names.push(library.name);
    contributors.set(library.knowledgeBaseGraph, names);
  }
  for (const [graph, names] of contributors) {
    ledger.expect(graph, names);
    ledger.seed(graph, store.match({ graph: namedNode(graph) }));
  }
}

/**
 * Drop graphs no configured library (or the ontology) owns any more.
 */
async function removeStaleGraphs(ctx: Pick<AppContext, 'config' | 'store' | 'writer' | 'libraries' | 'logger'>): Promise<void> {
  const owned = new Set<string>([ontologyGraphIri(ctx.config.context.vocab)]);
  for (const library of ctx.libraries) {
    owned.add(library.graphIri);
    if (library.knowledgeBaseGraph) owned.add(library.knowledgeBaseGraph);
  }
  for (const graph of ctx.store.namedGraphs()) {
    if (owned.has(graph)) continue;
    const removed = await ctx.writer.clear(graph);
    ctx.logger.info({ graph, removed }, 'Removed graph of unconfigured library');
  }
}

/**
 * Initialize all application components.
 */
export async function initializeApp(options: InitializeOptions = {}): Promise<AppContext> {
  const config = options.config ?? await loadConfig(options.configPath ? { configPath: options.configPath } : {});
  const logger = options.logger ?? createLogger(config.server.logLevel, { file: config.server.logFile });
  const { server, context } = config;

  logger.info({ libraries: config.libraries.length, vocab: context.vocab }, 'Initializing app');

  const store = await N3StoreGateway.open({
    storeDirectory: server.storeDirectory,
    prefixes: standardPrefixes(context.vocab),
    logger,
    ...(options.now ? { now: options.now } : {}),
  });
  const ledger = new KnowledgeBaseLedger();
  const writer = new DatasetWriter({ store, ledger, logger });
  const client = new ZoteroApiClient({
    apiUrl: context.apiUrl,
    logger,
    ...(options.fetch ? { fetch: options.fetch } : {}),
  });

  const resolution = resolveLibraries(config);
  const failedLibraries = [...resolution.failed];
  const assembler = new GraphAssembler(options.now ? { now: options.now } : {});
  const noteParser = new HtmlNoteParser(context.vocab);
  const scheduler = new RefreshScheduler({
    logger,
    timeoutMs: server.refreshTimeout * 1000,
    startupDelayMs: server.delay * 1000,
    ...(options.clock ? { clock: options.clock } : {}),
  });

  const libraries: Library[] = [];
  for (const library of resolution.libraries) {
    try {
      const fetcher = createSourceFetcher({ library, client, logger });
      const pipeline = new LibraryPipeline(library, fetcher, { writer, assembler, noteParser, logger });
      const { policy, warning } = resolveRefreshPolicy(library.refreshInterval);
      if (warning) logger.warn({ library: library.name }, warning);
      scheduler.register(library.name, (run) => pipeline.run(run), policy);
      libraries.push(library);
    } catch (err) {
      failedLibraries.push({ name: library.name, message: errorMessage(err) });
    }
  }
  for (const failed of failedLibraries) {
    logger.error({ library: failed.name }, `Library disabled: ${failed.message}`);
  }

  prepareLedger(ledger, store, libraries);
  await removeStaleGraphs({ config, store, writer, libraries, logger });

  logger.info({ libraries: libraries.length, failed: failedLibraries.length, quads: store.size() }, 'App initialized');
  return { config, logger, store, ledger, writer, client, scheduler, libraries, failedLibraries };
}

/**
 * Fetch the API schema and load the vocabulary ontology built from it.
 *
 * @returns Number of ontology quads, 0 when no schema URL is configured
 */
export async function loadVocabularyOntology(ctx: AppContext): Promise<number> {
  const { schema, vocab } = ctx.config.context;
  if (!schema) return 0;
  const document = await ctx.client.getJson(schema);
  const quads = buildSchemaOntology(document, vocab);
  await ctx.writer.replace(ontologyGraphIri(vocab), quads);
  ctx.logger.info({ quads: quads.length, graph: ontologyGraphIri(vocab) }, 'Vocabulary ontology loaded');
  return quads.length;
}

function healthComponents(ctx: AppContext): HealthResponse['components'] {
  return {
    store: { quads: ctx.store.size(), graphs: ctx.store.namedGraphs().length },
    libraries: {
      configured: ctx.libraries.length,
      failed: ctx.failedLibraries.length,
      erroring: ctx.scheduler.status().filter((status) => status.errorStreak > 0).length,
    },
  };
}

/**
 * Create and configure a Fastify server.
 */
export async function createServer(ctx: AppContext) {
  const loggerInstance: FastifyBaseLogger = ctx.logger;
  const fastify = Fastify({ loggerInstance });

  // Register CORS if enabled
  if (ctx.config.server.cors) {
    await fastify.register(cors, {
      origin: true,
      methods: ['GET', 'HEAD', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type'],
    });
  }

  // Create handlers
  const datasetHandlers = createDatasetHandlers({
    store: ctx.store,
    writer: ctx.writer,
    backupDirectory: ctx.config.server.backupDirectory,
    exportDirectory: ctx.config.server.exportDirectory,
    ontologyGraph: ontologyGraphIri(ctx.config.context.vocab),
  });
  const libraryHandlers = createLibraryHandlers({
    libraries: ctx.libraries,
    failed: ctx.failedLibraries,
    scheduler: ctx.scheduler,
  });

  const logHandlers = createLogHandlers({ logFile: ctx.config.server.logFile });

  registerRoutes(fastify, {
    datasetHandlers,
    libraryHandlers,
    logHandlers,
    health: () => healthComponents(ctx),
  });

  fastify.addHook('onClose', async () => {
    await ctx.scheduler.stop();
    await ctx.store.close();
  });

  return fastify;
}

/**
 * Start the server.
 */
export async function startServer(options: InitializeOptions = {}): Promise<void> {
  try {
    // Initialize app
    const ctx = await initializeApp(options);

    // Create server
    const fastify = await createServer(ctx);

    // Start listening
    const { port, host } = ctx.config.server;
    await fastify.listen({ port, host });

    ctx.scheduler.start();
    loadVocabularyOntology(ctx).catch((err: unknown) => {
      ctx.logger.error({ err: errorMessage(err) }, 'Vocabulary ontology not loaded');
    });

    // Handle shutdown
    const shutdown = async (): Promise<void> => {
      ctx.logger.info('Shutting down...');
      await fastify.close();
      process.exit(0);
    };

    const onSignal = (): void => {
      shutdown().catch((err: unknown) => {
        ctx.logger.error({ err: errorMessage(err) }, 'Shutdown failed');
        process.exit(1);
      });
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  } catch (err) {
    createLogger().fatal({ err: errorMessage(err) }, 'Failed to start server');
    process.exit(1);
  }
}

/**
 * CLI entry point.
 */
async function main(): Promise<void> {
  const configPath = process.env['CONFIG_PATH'];
  await startServer(configPath ? { configPath } : {});
}

// Run if executed directly
// Note: ESM doesn't have require.main, use import.meta instead
const isMain = process.argv[1]?.endsWith('server.js') ||
               process.argv[1]?.endsWith('server.ts');

if (isMain) {
  main().catch((err: unknown) => {
    createLogger().fatal({ err: errorMessage(err) }, 'Server crashed');
    process.exit(1);
  });
}
