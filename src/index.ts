/**
 * bibgraph — maps bibliographic libraries into named RDF graphs.
 *
 * This is the main entry point for the library.
 */

// Configuration
export { loadConfig, parseConfig, ConfigValidationError } from './config/loader.js';
export type * from './config/types.js';

// Errors
export * from './types/errors.js';

// Records and mapping
export * from './records/types.js';
export { normalizeJsonRecord, normalizeJsonRecords, normalizeRdfRecords } from './records/RecordNormalizer.js';
export { resolveRuleSet, isFieldAllowed, expandTerm } from './mapping/RuleResolver.js';
export { mapRecord, collectEntityLabels, passThroughTriples } from './mapping/TripleMapper.js';
export type * from './mapping/types.js';

// Identity
export { IdentityResolver, graphLocalIri, knowledgeBaseIri } from './identity/IdentityResolver.js';
export { LabelCanonicalizer, normalizeLabel, similarity } from './identity/LabelMatcher.js';

// Graphs and store
export { GraphAssembler } from './graph/GraphAssembler.js';
export { KnowledgeBaseLedger } from './graph/KnowledgeBaseLedger.js';
export type * from './graph/types.js';
export { N3StoreGateway } from './store/N3StoreGateway.js';
export type * from './store/types.js';
export { quadsToCsv, csvToQuads } from './rdf/csv.js';

// Sources, pipeline and scheduling
export { ZoteroApiClient } from './source/ZoteroApiClient.js';
export { createSourceFetcher } from './source/createSourceFetcher.js';
export { resolveLibraries, resolveLibrary } from './library/LibraryResolver.js';
export type { Library } from './library/LibraryResolver.js';
export { LibraryPipeline } from './pipeline/LibraryPipeline.js';
export type { RefreshOutcome } from './pipeline/LibraryPipeline.js';
export { RefreshScheduler, resolveRefreshPolicy } from './scheduler/RefreshScheduler.js';

// Vocabulary ontology
export { buildSchemaOntology } from './schema/SchemaOntology.js';

// Server
export { initializeApp, createServer, startServer } from './server.js';
export type { AppContext } from './server.js';
