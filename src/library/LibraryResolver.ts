/**
 * LibraryResolver — effective settings of each configured library.
 *
 * Combines the library entry with the context, the defaults and the server
 * settings: graph and base IRIs, knowledge-base target, load paths and the
 * resolved mapping rule set. A library whose rules do not resolve is
 * reported and left out; the others still load.
 */

import { join } from 'node:path';
import type {
  AppConfig,
  LibraryConfig,
  LibraryType,
  LoadMode,
} from '../config/types.js';
import { ConfigValidationError } from '../config/loader.js';
import { resolveRuleSet } from '../mapping/RuleResolver.js';
import type { MappingRuleSet } from '../mapping/types.js';
import { isAbsoluteIri } from '../rdf/terms.js';
import { MappingRuleError, errorMessage } from '../types/errors.js';

export interface Library {
  name: string;
  libraryType: LibraryType;
  libraryId?: string | undefined;
  apiKey?: string | undefined;
  description?: string | undefined;
  loadMode: LoadMode;
  /** Base for graph-local IRIs */
  baseIri: string;
  /** The library's named graph */
  graphIri: string;
  /** Shared graph receiving entity triples, when there is one */
  knowledgeBaseGraph?: string | undefined;
  rdfExportFormat: string;
  apiQueryParams: Record<string, string>;
  /** Directory read by manual imports */
  loadFrom: string;
  /** Directory receiving JSON dumps */
  saveTo?: string | undefined;
  /** Run the note parser on every refresh */
  parseNotes: boolean;
  /** Seconds; see resolveRefreshPolicy */
  refreshInterval: number;
  ruleSet: MappingRuleSet;
}

export interface LibraryResolution {
  libraries: Library[];
  failed: Array<{ name: string; message: string }>;
}

/**
 * Strip trailing `/` and `#` from a base IRI.
 */
export function normalizeBaseIri(iri: string): string {
  return iri.trim().replace(/[/#]+$/, '');
}

function withLibraryId(pattern: string, libraryId: string | undefined): string {
  return libraryId ? pattern.split('$').join(libraryId) : pattern;
}

/**
 * Default base IRI: `{context.base}{library_type}/{library_id}`.
 */
export function defaultBaseIri(base: string, library: LibraryConfig): string | undefined {
  if (!library.libraryId) return undefined;
  const prefix = base.endsWith('/') ? base : `${base}/`;
  return normalizeBaseIri(`${prefix}${library.libraryType}/${library.libraryId}`);
}

/**
 * Resolve one library.
 *
 * @throws ConfigValidationError for unusable IRIs
 * @throws MappingRuleError for invalid mapping rules
 */
export function resolveLibrary(config: AppConfig, library: LibraryConfig): Library {
  const { context, defaults, server } = config;
  const path = `libraries.${library.name}`;

  const configuredBase = library.baseUri ?? (library.libraryType === 'knowledge base' ? defaults.knowledgeBaseGraph : undefined);
  const rawBase = configuredBase ?? defaultBaseIri(context.base, library);
  if (!rawBase) {
    throw new ConfigValidationError('base_uri is required for a knowledge base library', `${path}.base_uri`, library.baseUri);
  }
  const baseIri = normalizeBaseIri(rawBase);
  if (!isAbsoluteIri(baseIri)) {
    throw new ConfigValidationError('base_uri must be an absolute IRI', `${path}.base_uri`, rawBase);
  }

  const graphIri = library.graphUri ? library.graphUri.trim() : baseIri;
  if (!isAbsoluteIri(graphIri)) {
    throw new ConfigValidationError('graph_uri must be an absolute IRI', `${path}.graph_uri`, library.graphUri);
  }

  const explicitKb = library.knowledgeBaseGraph ?? defaults.knowledgeBaseGraph;
  const kbGraph = explicitKb ? normalizeBaseIri(explicitKb) : undefined;
  const kbEnabled = library.knowledgeBaseMapping ?? defaults.knowledgeBaseMapping;
  const namespace = kbGraph ?? baseIri;

  const ruleSet = resolveRuleSet({
    vocab: context.vocab,
    defaults: defaults.map,
    overrides: library.map,
    mode: defaults.mode,
    merge: defaults.merge,
    knowledgeBase: {
      enabled: kbEnabled,
      namespace,
      fuzzy: library.fuzzy ?? defaults.fuzzy,
    },
  });

  // entities of the knowledge-base library itself always go to the shared graph
  const knowledgeBaseGraph = kbGraph && (kbEnabled || graphIri === kbGraph) ? kbGraph : undefined;

  const loadFrom = withLibraryId(library.loadFrom ?? join(server.importDirectory, library.name), library.libraryId);
  const saveTo = library.saveTo ? withLibraryId(library.saveTo, library.libraryId) : undefined;

  return {
    name: library.name,
    libraryType: library.libraryType,
    libraryId: library.libraryId,
    apiKey: library.apiKey,
    description: library.description,
    loadMode: library.libraryType === 'knowledge base' && !library.loadMode ? 'manual-import' : library.loadMode ?? defaults.loadMode,
    baseIri,
    graphIri,
    knowledgeBaseGraph,
    rdfExportFormat: library.rdfExportFormat ?? defaults.rdfExportFormat,
    apiQueryParams: { ...defaults.apiQueryParams, ...library.apiQueryParams },
    loadFrom,
    saveTo,
    parseNotes: library.notesParser?.auto ?? defaults.notesParser.auto,
    refreshInterval: library.refreshInterval ?? server.refreshInterval,
    ruleSet,
  };
}

/**
 * Resolve every library, collecting the ones that fail.
 */
export function resolveLibraries(config: AppConfig): LibraryResolution {
  const libraries: Library[] = [];
  const failed: LibraryResolution['failed'] = config.rejectedLibraries.map((rejected) => ({
    name: rejected.name ?? `libraries[${rejected.index}]`,
    message: rejected.message,
  }));

  const graphs = new Map<string, string>();
  for (const entry of config.libraries) {
    try {
      const library = resolveLibrary(config, entry);
      const owner = graphs.get(library.graphIri);
      if (owner && library.graphIri !== library.knowledgeBaseGraph) {
        throw new ConfigValidationError(`graph <${library.graphIri}> is already used by '${owner}'`, `libraries.${entry.name}`, library.graphIri);
      }
      graphs.set(library.graphIri, library.name);
      libraries.push(library);
    } catch (err) {
      if (!(err instanceof ConfigValidationError) && !(err instanceof MappingRuleError)) throw err;
      failed.push({ name: entry.name, message: errorMessage(err) });
    }
  }
  return { libraries, failed };
}
