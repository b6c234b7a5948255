/**
 * RuleResolver — merges global mapping defaults with a library's overrides
 * into one validated MappingRuleSet.
 *
 * Resolution happens once per library at startup. Every term is expanded
 * and checked here, so a bad rule fails the library before any record is
 * mapped instead of half-way through a refresh.
 */

import type {
  AdditionalTripleConfig,
  MapConfig,
  MergeableField,
  MergeMode,
} from '../config/types.js';
import { MappingRuleError } from '../types/errors.js';
import { hasScheme, isAbsoluteIri } from '../rdf/terms.js';
import { defaultLanguageMap } from './languages.js';
import type {
  AdditionalRule,
  LanguageMap,
  MappingRuleSet,
  TypeRule,
} from './types.js';

/**
 * Fields treated as references when no `rdf_mapping` is configured.
 */
export const DEFAULT_STRUCTURED_FIELDS: readonly string[] = [
  'creators',
  'tags',
  'collections',
  'parentItem',
  'parentCollection',
  'place',
  'publisher',
  'series',
];

export interface RuleResolutionInput {
  vocab: string;
  defaults: MapConfig;
  overrides?: MapConfig | undefined;
  /** Policy for every list field */
  mode: MergeMode;
  /** Per-field policy, wins over `mode` */
  merge?: Partial<Record<MergeableField, MergeMode>> | undefined;
  knowledgeBase: {
    enabled: boolean;
    namespace: string;
    fuzzy: number;
  };
  languageMap?: LanguageMap | undefined;
}

/**
 * Expand a mapping token against the vocabulary.
 * Tokens that start with a URI scheme are taken as IRIs.
 */
export function expandTerm(token: string, vocab: string, rule: string): string {
  const trimmed = token.trim();
  if (trimmed === '') {
    throw new MappingRuleError('empty term', rule, token);
  }
  const iri = hasScheme(trimmed) ? trimmed : `${vocab}${trimmed}`;
  if (!isAbsoluteIri(iri)) {
    throw new MappingRuleError(`'${iri}' is not a valid IRI`, rule, token);
  }
  return iri;
}

/**
 * Combine a default list with a library list.
 * An absent or empty library list never suppresses the defaults.
 */
function combine<T>(
  base: readonly T[] | undefined,
  override: readonly T[] | undefined,
  mode: MergeMode,
  identity: (value: T) => string,
): T[] | undefined {
  if (!override || override.length === 0) {
    return base ? [...base] : undefined;
  }
  if (mode === 'override' || !base) {
    return [...override];
  }
  const seen = new Set<string>();
  const result: T[] = [];
  for (const value of [...base, ...override]) {
    const key = identity(value);
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(value);
  }
  return result;
}

function stringIdentity(value: string): string {
  return value;
}

function additionalIdentity(value: AdditionalTripleConfig): string {
  return JSON.stringify([value.property, value.value, value.namedNode, value.prefix ?? '']);
}

/**
 * Field names in allow/deny lists: vocabulary IRIs fold back to their
 * local name so they match normalised record fields.
 */
function toFieldName(token: string, vocab: string, rule: string): string {
  const trimmed = token.trim();
  if (trimmed === '') {
    throw new MappingRuleError('empty field name', rule, token);
  }
  if (trimmed.startsWith(vocab) && trimmed.length > vocab.length) {
    return trimmed.slice(vocab.length);
  }
  return trimmed;
}

function resolveTypeRules(tokens: readonly string[], vocab: string, rule: string): TypeRule[] {
  return tokens.map((token): TypeRule => {
    if (token.startsWith('_')) {
      return { kind: 'constant', iri: expandTerm(token.slice(1), vocab, rule) };
    }
    const field = token.trim();
    if (field === '') {
      throw new MappingRuleError('empty field name', rule, token);
    }
    return { kind: 'field', field };
  });
}

function resolveAdditional(entries: readonly AdditionalTripleConfig[], vocab: string): AdditionalRule[] {
  return entries.map((entry, index): AdditionalRule => {
    const rule = `additional[${index}]`;
    const predicate = expandTerm(entry.property, vocab, `${rule}.property`);
    const source = entry.value.startsWith('_')
      ? { kind: 'constant' as const, value: entry.value.slice(1) }
      : { kind: 'field' as const, field: entry.value.trim() };
    if (source.kind === 'field' && source.field === '') {
      throw new MappingRuleError('value must name a field or a _constant', `${rule}.value`, entry.value);
    }
    if (entry.prefix !== undefined && entry.namedNode && !hasScheme(entry.prefix)) {
      throw new MappingRuleError('prefix of a named node must be an absolute IRI', `${rule}.prefix`, entry.prefix);
    }
    return {
      predicate,
      source,
      namedNode: entry.namedNode,
      ...(entry.prefix !== undefined ? { prefix: entry.prefix } : {}),
    };
  });
}

/**
 * Resolve the effective rule set for one library.
 *
 * @throws MappingRuleError when the vocabulary, an expanded term or the
 * fuzzy threshold is invalid
 */
export function resolveRuleSet(input: RuleResolutionInput): MappingRuleSet {
  const { vocab, defaults } = input;
  const overrides = input.overrides ?? {};

  if (!isAbsoluteIri(vocab)) {
    throw new MappingRuleError('vocabulary must be an absolute IRI', 'vocab', vocab);
  }

  const { fuzzy, namespace, enabled } = input.knowledgeBase;
  if (!Number.isFinite(fuzzy) || fuzzy < 0 || fuzzy > 100) {
    throw new MappingRuleError('fuzzy threshold must be between 0 and 100', 'fuzzy', fuzzy);
  }
  if (enabled && !isAbsoluteIri(namespace)) {
    throw new MappingRuleError('knowledge base namespace must be an absolute IRI', 'knowledge_base_graph', namespace);
  }

  const modeFor = (field: MergeableField): MergeMode => input.merge?.[field] ?? input.mode;

  const white = combine(defaults.white, overrides.white, modeFor('white'), stringIdentity);
  const black = combine(defaults.black, overrides.black, modeFor('black'), stringIdentity);
  const structured = combine(defaults.rdfMapping, overrides.rdfMapping, modeFor('rdfMapping'), stringIdentity);
  const itemType = combine(defaults.itemType, overrides.itemType, modeFor('itemType'), stringIdentity);
  const collectionType = combine(defaults.collectionType, overrides.collectionType, modeFor('collectionType'), stringIdentity);
  const additional = combine(defaults.additional, overrides.additional, modeFor('additional'), additionalIdentity);

  const namedLibrary = overrides.namedLibrary ?? defaults.namedLibrary;

  const ruleSet: MappingRuleSet = {
    vocab,
    deny: new Set((black ?? []).map((token) => toFieldName(token, vocab, 'black'))),
    structured: new Set((structured && structured.length > 0 ? structured : DEFAULT_STRUCTURED_FIELDS)
      .map((token) => toFieldName(token, vocab, 'rdf_mapping'))),
    itemType: resolveTypeRules(itemType ?? [], vocab, 'item_type'),
    collectionType: resolveTypeRules(collectionType ?? [], vocab, 'collection_type'),
    additional: resolveAdditional(additional ?? [], vocab),
    knowledgeBase: { enabled, namespace, fuzzyThreshold: fuzzy },
    languageMap: input.languageMap ?? defaultLanguageMap(),
    itemLabel: overrides.itemLabel ?? defaults.itemLabel ?? false,
  };

  if (white && white.length > 0) {
    ruleSet.allow = new Set(white.map((token) => toFieldName(token, vocab, 'white')));
  }
  if (namedLibrary) {
    ruleSet.namedLibrary = expandTerm(namedLibrary, vocab, 'named_library');
  }

  return ruleSet;
}

/**
 * Whether a field survives the allow/deny lists.
 *
 * With an allow-list only listed fields and structured fields pass and the
 * deny-list is not consulted.
 */
export function isFieldAllowed(ruleSet: MappingRuleSet, field: string): boolean {
  if (ruleSet.allow) {
    return ruleSet.allow.has(field) || ruleSet.structured.has(field);
  }
  return !ruleSet.deny.has(field);
}
