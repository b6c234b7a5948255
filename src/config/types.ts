/**
 * Configuration types for the bibgraph server.
 *
 * These types describe config.yaml after normalisation: the YAML file
 * uses snake_case keys (`load_mode`, `api_query_params`, ...), the loader
 * turns them into the camelCase shapes below.
 */

/**
 * Top-level configuration.
 */
export interface AppConfig {
  server: ServerConfig;
  context: ContextConfig;
  defaults: LibraryDefaults;
  libraries: LibraryConfig[];
  /** Libraries that failed validation; the rest of the config still loads. */
  rejectedLibraries: RejectedLibrary[];
}

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * How a library's records are obtained.
 */
export type LoadMode = 'api-json' | 'api-rdf' | 'manual-import';

export type LibraryType = 'groups' | 'user' | 'knowledge base';

/**
 * Per-field policy for combining a library's mapping lists with the defaults.
 */
export type MergeMode = 'override' | 'merge';

/**
 * Mapping list fields a merge policy can be set for.
 */
export type MergeableField =
  | 'white'
  | 'black'
  | 'rdfMapping'
  | 'itemType'
  | 'collectionType'
  | 'additional';

export const MERGEABLE_FIELDS: readonly MergeableField[] = [
  'white',
  'black',
  'rdfMapping',
  'itemType',
  'collectionType',
  'additional',
];

/**
 * Server settings.
 */
export interface ServerConfig {
  /** Port to listen on (default: 3001) */
  port: number;
  /** Host to bind to (default: '0.0.0.0') */
  host: string;
  /** Log level (default: 'info') */
  logLevel: LogLevel;
  /** Enable CORS for all origins (default: true) */
  cors: boolean;
  /**
   * Refresh interval in seconds.
   * -1 disables refreshing, 0 loads once at startup, 30 and above refreshes
   * periodically. Anything else is rejected and treated as 0.
   */
  refreshInterval: number;
  /** Seconds a single library refresh may take before it is aborted */
  refreshTimeout: number;
  /** Seconds to wait before the initial load */
  delay: number;
  /** Directory holding the dataset snapshot; empty keeps the store in memory only */
  storeDirectory: string;
  exportDirectory: string;
  importDirectory: string;
  backupDirectory: string;
  /** File the log is also written to, shown by the log viewer; empty disables it */
  logFile: string;
}

/**
 * Vocabulary and endpoints shared by every library.
 */
export interface ContextConfig {
  /** Vocabulary namespace unprefixed mapping terms expand against */
  vocab: string;
  /** Base URL of the library-hosting web API */
  apiUrl: string;
  /** Base for default library IRIs */
  base: string;
  /** URL of the API schema document; when set an OWL ontology is built from it */
  schema?: string;
}

/**
 * An extra triple emitted for records carrying a given field.
 */
export interface AdditionalTripleConfig {
  /** Predicate IRI, or a term expanded against the vocabulary */
  property: string;
  /** Field name, or a constant when prefixed with `_` */
  value: string;
  /** Emit the value as an IRI instead of a literal */
  namedNode: boolean;
  /** Prepended to the value before the triple is built */
  prefix?: string;
}

/**
 * Mapping rules as written in config.
 *
 * Empty lists count as "not specified".
 */
export interface MapConfig {
  white?: string[];
  black?: string[];
  /** Fields treated as structured references (creators, tags, ...) */
  rdfMapping?: string[];
  itemType?: string[];
  collectionType?: string[];
  /** Back-link predicate from every record to its library graph */
  namedLibrary?: string;
  additional?: AdditionalTripleConfig[];
  /** Emit a human readable rdfs:label for items */
  itemLabel?: boolean;
}

export interface NotesParserConfig {
  /** Run the note parser during every refresh */
  auto: boolean;
}

/**
 * Settings every library inherits unless it overrides them.
 */
export interface LibraryDefaults {
  /** Merge policy applied to every mapping list */
  mode: MergeMode;
  /** Per-field merge policy, wins over `mode` */
  merge: Partial<Record<MergeableField, MergeMode>>;
  loadMode: LoadMode;
  /** API export format used by the `api-rdf` load mode */
  rdfExportFormat: string;
  /** Shared graph for entities; absent means entities stay in each library graph */
  knowledgeBaseGraph?: string;
  knowledgeBaseMapping: boolean;
  /** Fuzzy matching threshold (0-100) for knowledge-base labels */
  fuzzy: number;
  notesParser: NotesParserConfig;
  map: MapConfig;
  apiQueryParams: Record<string, string>;
}

/**
 * One configured library.
 */
export interface LibraryConfig {
  /** Unique internal name */
  name: string;
  libraryType: LibraryType;
  /** Numeric id; not required for knowledge-base libraries */
  libraryId?: string;
  apiKey?: string;
  baseUri?: string;
  /** Named graph IRI; defaults to the base IRI */
  graphUri?: string;
  description?: string;
  loadMode?: LoadMode;
  /** Import path for manual imports; `$` is replaced by the library id */
  loadFrom?: string;
  /** Directory for JSON dumps of fetched records; `$` is replaced by the library id */
  saveTo?: string;
  rdfExportFormat?: string;
  knowledgeBaseGraph?: string;
  knowledgeBaseMapping?: boolean;
  fuzzy?: number;
  notesParser?: Partial<NotesParserConfig>;
  map?: MapConfig;
  apiQueryParams?: Record<string, string>;
  /** Per-library refresh interval in seconds, same semantics as the server setting */
  refreshInterval?: number;
}

export interface RejectedLibrary {
  index: number;
  name?: string;
  message: string;
}

/**
 * Default configuration values.
 */
export const DEFAULT_SERVER_CONFIG: ServerConfig = {
  port: 3001,
  host: '0.0.0.0',
  logLevel: 'info',
  cors: true,
  refreshInterval: 0,
  refreshTimeout: 600,
  delay: 0,
  storeDirectory: '',
  exportDirectory: './data/export',
  importDirectory: './data/import',
  backupDirectory: './data/backup',
  logFile: './data/app.log',
};

export const DEFAULT_CONTEXT_CONFIG: ContextConfig = {
  vocab: 'http://www.zotero.org/namespaces/export#',
  apiUrl: 'https://api.zotero.org/',
  base: 'https://www.zotero.org/',
};

export const DEFAULT_LIBRARY_DEFAULTS: LibraryDefaults = {
  mode: 'override',
  merge: {},
  loadMode: 'api-json',
  rdfExportFormat: 'rdf_zotero',
  knowledgeBaseMapping: false,
  fuzzy: 90,
  notesParser: { auto: false },
  map: {},
  apiQueryParams: {},
};

export const DEFAULT_CONFIG: AppConfig = {
  server: DEFAULT_SERVER_CONFIG,
  context: DEFAULT_CONTEXT_CONFIG,
  defaults: DEFAULT_LIBRARY_DEFAULTS,
  libraries: [],
  rejectedLibraries: [],
};
