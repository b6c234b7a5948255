/**
 * Types for resolved mapping rules and mapper output.
 */

import type * as RDF from '@rdfjs/types';

/**
 * One entry of a type rule: a constant class IRI, or a field whose values
 * name the classes.
 */
export type TypeRule =
  | { kind: 'constant'; iri: string }
  | { kind: 'field'; field: string };

export type AdditionalSource =
  | { kind: 'constant'; value: string }
  | { kind: 'field'; field: string };

export interface AdditionalRule {
  predicate: string;
  source: AdditionalSource;
  namedNode: boolean;
  prefix?: string;
}

export interface KnowledgeBaseSettings {
  /** Entities get shared, label-derived IRIs when enabled */
  enabled: boolean;
  /** Namespace the shared IRIs are minted in */
  namespace: string;
  /** Fuzzy threshold, 0-100; 100 means exact normalised match only */
  fuzzyThreshold: number;
}

/**
 * Language code lookup: lower-cased alias (`english`, `eng`, ...) to a
 * BCP 47 tag, plus the tag used when nothing matches.
 */
export interface LanguageMap {
  aliases: ReadonlyMap<string, string>;
  fallback: string;
}

/**
 * The validated, fully expanded rules for one library.
 */
export interface MappingRuleSet {
  vocab: string;
  /** Fields to emit; when present the deny-list is ignored */
  allow?: ReadonlySet<string>;
  deny: ReadonlySet<string>;
  /** Fields whose values are references to other resources */
  structured: ReadonlySet<string>;
  itemType: readonly TypeRule[];
  collectionType: readonly TypeRule[];
  /** Predicate linking each record to its library graph */
  namedLibrary?: string;
  additional: readonly AdditionalRule[];
  knowledgeBase: KnowledgeBaseSettings;
  languageMap: LanguageMap;
  itemLabel: boolean;
}

/**
 * Where a mapped triple belongs: the library's own content, or the
 * description of a shared entity.
 */
export type TripleScope = 'content' | 'entity';

export interface ScopedTriple {
  subject: RDF.NamedNode | RDF.BlankNode;
  predicate: RDF.NamedNode;
  object: RDF.NamedNode | RDF.BlankNode | RDF.Literal;
  scope: TripleScope;
}
