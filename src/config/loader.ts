/**
 * Configuration loader for the bibgraph server.
 *
 * Loads config from YAML file with support for:
 * - Environment variable substitution (${VAR_NAME})
 * - Default values
 * - snake_case keys normalised to the camelCase config types
 * - Per-library validation (a broken library is rejected, the rest load)
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { logger } from '../logging/logger.js';
import type {
  AdditionalTripleConfig,
  AppConfig,
  ContextConfig,
  LibraryConfig,
  LibraryDefaults,
  LibraryType,
  LoadMode,
  LogLevel,
  MapConfig,
  MergeableField,
  MergeMode,
  RejectedLibrary,
  ServerConfig,
} from './types.js';
import {
  DEFAULT_CONFIG,
  DEFAULT_CONTEXT_CONFIG,
  DEFAULT_LIBRARY_DEFAULTS,
  DEFAULT_SERVER_CONFIG,
} from './types.js';

/**
 * Config loading options.
 */
export interface LoadConfigOptions {
  /** Path to config file (default: process.env.CONFIG_PATH or './config.yaml') */
  configPath?: string;
}

/**
 * Config validation error.
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly value: unknown
  ) {
    super(`Config validation error at '${path}': ${message}`);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Environment variable substitution pattern.
 * Matches ${VAR_NAME} and ${VAR_NAME:-default}
 */
const ENV_VAR_PATTERN = /\$\{([A-Z_][A-Z0-9_]*)(?::-([^}]*))?\}/gi;

/**
 * Substitute environment variables in a string.
 *
 * Supports:
 * - ${VAR_NAME} - Replace with env var value
 * - ${VAR_NAME:-default} - Replace with env var or default
 */
function substituteEnvVars(value: string): string {
  return value.replace(ENV_VAR_PATTERN, (_match, varName: string, defaultValue: string | undefined) => {
    const envValue = process.env[varName];
    if (envValue !== undefined) {
      return envValue;
    }
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    logger.warn({ variable: varName }, 'Environment variable is not set and has no default');
    return '';
  });
}

/**
 * Recursively substitute environment variables in an object.
 */
function substituteEnvVarsRecursive(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return substituteEnvVars(obj);
  }
  if (Array.isArray(obj)) {
    return obj.map(substituteEnvVarsRecursive);
  }
  if (isRecord(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVarsRecursive(value);
    }
    return result;
  }
  return obj;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

// ============================================================================
// Field readers
// ============================================================================

function readString(obj: Record<string, unknown>, key: string, path: string): string | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'number') return String(value);
  if (typeof value !== 'string') {
    throw new ConfigValidationError('must be a string', `${path}.${key}`, value);
  }
  return value;
}

function readNumber(obj: Record<string, unknown>, key: string, path: string): number | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  const parsed = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof parsed !== 'number' || !Number.isFinite(parsed)) {
    throw new ConfigValidationError('must be a number', `${path}.${key}`, value);
  }
  return parsed;
}

function readBoolean(obj: Record<string, unknown>, key: string, path: string): boolean | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (value === 'true') return true;
  if (value === 'false') return false;
  if (typeof value !== 'boolean') {
    throw new ConfigValidationError('must be a boolean', `${path}.${key}`, value);
  }
  return value;
}

/**
 * A list of strings; a single string is accepted as a one-element list.
 */
function readStringList(obj: Record<string, unknown>, key: string, path: string): string[] | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'string') return [value];
  if (!Array.isArray(value)) {
    throw new ConfigValidationError('must be a list of strings', `${path}.${key}`, value);
  }
  return value.map((entry, index) => {
    if (typeof entry !== 'string') {
      throw new ConfigValidationError('must be a string', `${path}.${key}[${index}]`, entry);
    }
    return entry;
  });
}

function readObject(obj: Record<string, unknown>, key: string, path: string): Record<string, unknown> | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (!isRecord(value)) {
    throw new ConfigValidationError('must be an object', `${path}.${key}`, value);
  }
  return value;
}

// ============================================================================
// Section normalisers
// ============================================================================

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'silent'];

function normalizeServerConfig(raw: unknown, path = 'server'): ServerConfig {
  if (raw === undefined || raw === null) return { ...DEFAULT_SERVER_CONFIG };
  if (!isRecord(raw)) {
    throw new ConfigValidationError('must be an object', path, raw);
  }

  const port = readNumber(raw, 'port', path);
  if (port !== undefined && (!Number.isInteger(port) || port < 1 || port > 65535)) {
    throw new ConfigValidationError('port must be a number between 1 and 65535', `${path}.port`, port);
  }

  const logLevel = readString(raw, 'log_level', path)?.toLowerCase();
  const level = LOG_LEVELS.find((candidate) => candidate === logLevel);
  if (logLevel !== undefined && level === undefined) {
    throw new ConfigValidationError(`log_level must be one of: ${LOG_LEVELS.join(', ')}`, `${path}.log_level`, logLevel);
  }

  const refreshInterval = readNumber(raw, 'refresh_interval', path);
  if (refreshInterval !== undefined && !Number.isInteger(refreshInterval)) {
    throw new ConfigValidationError('refresh_interval must be an integer', `${path}.refresh_interval`, refreshInterval);
  }

  const refreshTimeout = readNumber(raw, 'refresh_timeout', path);
  if (refreshTimeout !== undefined && refreshTimeout <= 0) {
    throw new ConfigValidationError('refresh_timeout must be positive', `${path}.refresh_timeout`, refreshTimeout);
  }

  const delay = readNumber(raw, 'delay', path);
  if (delay !== undefined && delay < 0) {
    throw new ConfigValidationError('delay must not be negative', `${path}.delay`, delay);
  }

  const d = DEFAULT_SERVER_CONFIG;
  return {
    port: port ?? d.port,
    host: readString(raw, 'host', path) ?? d.host,
    logLevel: level ?? d.logLevel,
    cors: readBoolean(raw, 'cors', path) ?? d.cors,
    refreshInterval: refreshInterval ?? d.refreshInterval,
    refreshTimeout: refreshTimeout ?? d.refreshTimeout,
    delay: delay ?? d.delay,
    storeDirectory: readString(raw, 'store_directory', path) ?? d.storeDirectory,
    exportDirectory: readString(raw, 'export_directory', path) ?? d.exportDirectory,
    importDirectory: readString(raw, 'import_directory', path) ?? d.importDirectory,
    backupDirectory: readString(raw, 'backup_directory', path) ?? d.backupDirectory,
    logFile: readString(raw, 'log_file', path) ?? d.logFile,
  };
}

function normalizeContextConfig(raw: unknown, path = 'context'): ContextConfig {
  if (raw === undefined || raw === null) return { ...DEFAULT_CONTEXT_CONFIG };
  if (!isRecord(raw)) {
    throw new ConfigValidationError('must be an object', path, raw);
  }
  const schema = readString(raw, 'schema', path);
  return {
    vocab: readString(raw, 'vocab', path) ?? DEFAULT_CONTEXT_CONFIG.vocab,
    apiUrl: readString(raw, 'api_url', path) ?? DEFAULT_CONTEXT_CONFIG.apiUrl,
    base: readString(raw, 'base', path) ?? readString(raw, 'base_url', path) ?? DEFAULT_CONTEXT_CONFIG.base,
    ...(schema ? { schema } : {}),
  };
}

const LOAD_MODE_ALIASES: Record<string, LoadMode> = {
  'api-json': 'api-json',
  json: 'api-json',
  'api-rdf': 'api-rdf',
  rdf: 'api-rdf',
  'manual-import': 'manual-import',
  manual_import: 'manual-import',
};

function normalizeLoadMode(value: string | undefined, path: string): LoadMode | undefined {
  if (value === undefined) return undefined;
  const mode = LOAD_MODE_ALIASES[value];
  if (!mode) {
    throw new ConfigValidationError('load_mode must be one of: api-json, api-rdf, manual-import', path, value);
  }
  return mode;
}

function normalizeMergeMode(value: string | undefined, path: string): MergeMode | undefined {
  if (value === undefined) return undefined;
  // "default" is the historical spelling of override
  if (value === 'override' || value === 'default') return 'override';
  if (value === 'merge') return 'merge';
  throw new ConfigValidationError('mode must be one of: override, merge', path, value);
}

const MERGEABLE_KEYS: Record<string, MergeableField> = {
  white: 'white',
  black: 'black',
  rdf_mapping: 'rdfMapping',
  item_type: 'itemType',
  collection_type: 'collectionType',
  additional: 'additional',
};

function normalizeAdditional(raw: unknown, path: string): AdditionalTripleConfig[] | undefined {
  if (raw === undefined || raw === null) return undefined;
  if (!Array.isArray(raw)) {
    throw new ConfigValidationError('must be a list', path, raw);
  }
  return raw.map((entry, index) => {
    const entryPath = `${path}[${index}]`;
    if (!isRecord(entry)) {
      throw new ConfigValidationError('must be an object', entryPath, entry);
    }
    const property = readString(entry, 'property', entryPath);
    const value = readString(entry, 'value', entryPath);
    if (!property) {
      throw new ConfigValidationError('property is required', `${entryPath}.property`, property);
    }
    if (!value) {
      throw new ConfigValidationError('value is required', `${entryPath}.value`, value);
    }
    const prefix = readString(entry, 'prefix', entryPath);
    return {
      property,
      value,
      namedNode: readBoolean(entry, 'named_node', entryPath) ?? false,
      ...(prefix ? { prefix } : {}),
    };
  });
}

function normalizeMapConfig(raw: unknown, path: string): MapConfig {
  if (raw === undefined || raw === null) return {};
  if (!isRecord(raw)) {
    throw new ConfigValidationError('must be an object', path, raw);
  }
  const map: MapConfig = {};
  const white = readStringList(raw, 'white', path);
  const black = readStringList(raw, 'black', path);
  const rdfMapping = readStringList(raw, 'rdf_mapping', path);
  const itemType = readStringList(raw, 'item_type', path);
  const collectionType = readStringList(raw, 'collection_type', path);
  const namedLibrary = readString(raw, 'named_library', path);
  const additional = normalizeAdditional(raw['additional'], `${path}.additional`);
  const itemLabel = readBoolean(raw, 'item_label', path);
  if (white) map.white = white;
  if (black) map.black = black;
  if (rdfMapping) map.rdfMapping = rdfMapping;
  if (itemType) map.itemType = itemType;
  if (collectionType) map.collectionType = collectionType;
  if (namedLibrary) map.namedLibrary = namedLibrary;
  if (additional) map.additional = additional;
  if (itemLabel !== undefined) map.itemLabel = itemLabel;
  return map;
}

function normalizeQueryParams(raw: Record<string, unknown> | undefined, path: string): Record<string, string> | undefined {
  if (!raw) return undefined;
  const params: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (value === undefined || value === null) continue;
    if (typeof value !== 'string' && typeof value !== 'number' && typeof value !== 'boolean') {
      throw new ConfigValidationError('query parameter values must be scalars', `${path}.${key}`, value);
    }
    params[key] = String(value);
  }
  return params;
}

/**
 * Knowledge-base settings may sit at the library level or, historically,
 * inside `notes_parser`; the library level wins.
 */
function readKnowledgeBaseSettings(raw: Record<string, unknown>, path: string): {
  knowledgeBaseMapping?: boolean;
  fuzzy?: number;
} {
  const notes = readObject(raw, 'notes_parser', path);
  const mapping = readBoolean(raw, 'knowledge_base_mapping', path)
    ?? (notes ? readBoolean(notes, 'knowledge_base_mapping', `${path}.notes_parser`) : undefined);
  const fuzzy = readNumber(raw, 'fuzzy', path)
    ?? (notes ? readNumber(notes, 'fuzzy', `${path}.notes_parser`) : undefined);
  return {
    ...(mapping !== undefined ? { knowledgeBaseMapping: mapping } : {}),
    ...(fuzzy !== undefined ? { fuzzy } : {}),
  };
}

function normalizeDefaults(raw: unknown, path = 'defaults'): LibraryDefaults {
  if (raw === undefined || raw === null) return { ...DEFAULT_LIBRARY_DEFAULTS };
  if (!isRecord(raw)) {
    throw new ConfigValidationError('must be an object', path, raw);
  }
  const d = DEFAULT_LIBRARY_DEFAULTS;

  const merge: Partial<Record<MergeableField, MergeMode>> = {};
  const rawMerge = readObject(raw, 'merge', path);
  if (rawMerge) {
    for (const [key, value] of Object.entries(rawMerge)) {
      const field = MERGEABLE_KEYS[key];
      if (!field) {
        throw new ConfigValidationError(`unknown mapping field '${key}'`, `${path}.merge`, key);
      }
      const mode = normalizeMergeMode(typeof value === 'string' ? value : String(value), `${path}.merge.${key}`);
      if (mode) merge[field] = mode;
    }
  }

  const notes = readObject(raw, 'notes_parser', path);
  const knowledgeBaseGraph = readString(raw, 'knowledge_base_graph', path);
  const kb = readKnowledgeBaseSettings(raw, path);

  return {
    mode: normalizeMergeMode(readString(raw, 'mode', path), `${path}.mode`) ?? d.mode,
    merge,
    loadMode: normalizeLoadMode(readString(raw, 'load_mode', path), `${path}.load_mode`) ?? d.loadMode,
    rdfExportFormat: readString(raw, 'rdf_export_format', path) ?? d.rdfExportFormat,
    ...(knowledgeBaseGraph ? { knowledgeBaseGraph } : {}),
    knowledgeBaseMapping: kb.knowledgeBaseMapping ?? d.knowledgeBaseMapping,
    fuzzy: kb.fuzzy ?? d.fuzzy,
    notesParser: {
      auto: (notes ? readBoolean(notes, 'auto', `${path}.notes_parser`) : undefined) ?? d.notesParser.auto,
    },
    map: normalizeMapConfig(raw['map'], `${path}.map`),
    apiQueryParams: normalizeQueryParams(readObject(raw, 'api_query_params', path), `${path}.api_query_params`) ?? {},
  };
}

const LIBRARY_TYPES: readonly LibraryType[] = ['groups', 'user', 'knowledge base'];

/**
 * Validate and normalise one library entry.
 */
export function normalizeLibraryConfig(raw: unknown, path: string): LibraryConfig {
  if (!isRecord(raw)) {
    throw new ConfigValidationError('must be an object', path, raw);
  }

  const name = readString(raw, 'name', path);
  if (!name || name.trim() === '') {
    throw new ConfigValidationError('name is required', `${path}.name`, name);
  }

  const rawType = readString(raw, 'library_type', path);
  const libraryType = LIBRARY_TYPES.find((candidate) => candidate === rawType);
  if (!libraryType) {
    throw new ConfigValidationError(
      `library_type must be one of: ${LIBRARY_TYPES.join(', ')}`,
      `${path}.library_type`,
      rawType,
    );
  }

  const libraryId = readString(raw, 'library_id', path);
  if (libraryType !== 'knowledge base' && (!libraryId || !/^\d+$/.test(libraryId))) {
    throw new ConfigValidationError('library_id must be numeric', `${path}.library_id`, libraryId);
  }

  const library: LibraryConfig = { name, libraryType };
  if (libraryId) library.libraryId = libraryId;

  const stringFields = [
    ['api_key', 'apiKey'],
    ['base_uri', 'baseUri'],
    ['graph_uri', 'graphUri'],
    ['description', 'description'],
    ['load_from', 'loadFrom'],
    ['save_to', 'saveTo'],
    ['rdf_export_format', 'rdfExportFormat'],
    ['knowledge_base_graph', 'knowledgeBaseGraph'],
  ] as const;
  for (const [key, target] of stringFields) {
    const value = readString(raw, key, path);
    if (value !== undefined && value !== '') library[target] = value;
  }

  const loadMode = normalizeLoadMode(readString(raw, 'load_mode', path), `${path}.load_mode`);
  if (loadMode) library.loadMode = loadMode;

  const kb = readKnowledgeBaseSettings(raw, path);
  if (kb.knowledgeBaseMapping !== undefined) library.knowledgeBaseMapping = kb.knowledgeBaseMapping;
  if (kb.fuzzy !== undefined) library.fuzzy = kb.fuzzy;

  const notes = readObject(raw, 'notes_parser', path);
  const auto = notes ? readBoolean(notes, 'auto', `${path}.notes_parser`) : undefined;
  if (auto !== undefined) library.notesParser = { auto };

  if (raw['map'] !== undefined && raw['map'] !== null) {
    library.map = normalizeMapConfig(raw['map'], `${path}.map`);
  }

  const params = normalizeQueryParams(readObject(raw, 'api_query_params', path), `${path}.api_query_params`);
  if (params) library.apiQueryParams = params;

  const refreshInterval = readNumber(raw, 'refresh_interval', path);
  if (refreshInterval !== undefined) {
    if (!Number.isInteger(refreshInterval)) {
      throw new ConfigValidationError('refresh_interval must be an integer', `${path}.refresh_interval`, refreshInterval);
    }
    library.refreshInterval = refreshInterval;
  }

  return library;
}

/**
 * Normalise a parsed config document.
 *
 * Server, context and defaults errors throw; library errors are collected
 * in `rejectedLibraries` so the remaining libraries still load.
 */
export function parseConfig(document: unknown): AppConfig {
  if (document === undefined || document === null) {
    return { ...DEFAULT_CONFIG, libraries: [], rejectedLibraries: [] };
  }
  if (!isRecord(document)) {
    throw new ConfigValidationError('must be an object', '', document);
  }

  const substituted = substituteEnvVarsRecursive(document);
  if (!isRecord(substituted)) {
    throw new ConfigValidationError('must be an object', '', substituted);
  }

  const rawLibraries = substituted['libraries'] ?? [];
  if (!Array.isArray(rawLibraries)) {
    throw new ConfigValidationError('must be a list', 'libraries', rawLibraries);
  }

  const libraries: LibraryConfig[] = [];
  const rejectedLibraries: RejectedLibrary[] = [];
  const seen = new Set<string>();

  rawLibraries.forEach((entry: unknown, index) => {
    const path = `libraries[${index}]`;
    const rawName = isRecord(entry) && typeof entry['name'] === 'string' ? entry['name'] : undefined;
    try {
      const library = normalizeLibraryConfig(entry, path);
      if (seen.has(library.name)) {
        throw new ConfigValidationError(`duplicate library name: ${library.name}`, `${path}.name`, library.name);
      }
      seen.add(library.name);
      libraries.push(library);
    } catch (err) {
      if (!(err instanceof ConfigValidationError)) throw err;
      logger.warn({ library: rawName, path }, err.message);
      rejectedLibraries.push({
        index,
        ...(rawName ? { name: rawName } : {}),
        message: err.message,
      });
    }
  });

  return {
    server: normalizeServerConfig(substituted['server']),
    context: normalizeContextConfig(substituted['context']),
    defaults: normalizeDefaults(substituted['defaults']),
    libraries,
    rejectedLibraries,
  };
}

/**
 * Load configuration from a YAML file.
 *
 * @param options - Loading options
 * @returns Loaded and validated configuration
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const configPath = options.configPath
    ?? process.env['CONFIG_PATH']
    ?? './config.yaml';

  const absolutePath = resolve(configPath);

  // If config file doesn't exist, return defaults
  if (!existsSync(absolutePath)) {
    logger.warn({ path: absolutePath }, 'Config file not found, using defaults');
    return parseConfig(undefined);
  }

  const content = await readFile(absolutePath, 'utf-8');
  let parsed: unknown;

  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new Error(`Failed to parse config file: ${err instanceof Error ? err.message : String(err)}`);
  }

  return parseConfig(parsed);
}
