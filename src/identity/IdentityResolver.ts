/**
 * IdentityResolver — deterministic IRIs for records and shared entities.
 *
 * Two patterns:
 * - graph-local: {base}/{role}/{encoded key}, unique inside one library graph
 * - knowledge-base: {namespace}/{role}/{uuid}, unique across the dataset;
 *   the uuid is UUIDv5 of `{role}/{normalised label}` in a namespace uuid
 *   derived from the knowledge-base namespace IRI, so every library that
 *   sees the same entity mints the same IRI.
 */

import { v5 as uuidv5 } from 'uuid';
import type { KnowledgeBaseSettings } from '../mapping/types.js';
import type { RecordKind } from '../records/types.js';
import { LabelCanonicalizer, normalizeLabel, type CanonicalLabel } from './LabelMatcher.js';

/**
 * Field names mapped to the role their values play.
 */
const ROLE_ALIASES: Record<string, string> = {
  tags: 'tag',
  creators: 'creator',
  collections: 'collection',
  parentCollection: 'collection',
  parentItem: 'item',
};

const RECORD_ROLES: ReadonlySet<string> = new Set(['item', 'collection']);

export function roleForField(field: string): string {
  return ROLE_ALIASES[field] ?? field;
}

export function isRecordRole(role: string): boolean {
  return RECORD_ROLES.has(role);
}

function joinIri(base: string, ...segments: string[]): string {
  const trimmed = base.replace(/\/+$/, '');
  return [trimmed, ...segments].join('/');
}

/**
 * IRI unique within one library graph.
 */
export function graphLocalIri(base: string, role: string, key: string): string {
  return joinIri(base, role, encodeURIComponent(key));
}

const namespaceIds = new Map<string, string>();

function namespaceUuid(namespace: string): string {
  let id = namespaceIds.get(namespace);
  if (id === undefined) {
    id = uuidv5(namespace, uuidv5.URL);
    namespaceIds.set(namespace, id);
  }
  return id;
}

/**
 * IRI shared across libraries, derived from the normalised label.
 */
export function knowledgeBaseIri(namespace: string, role: string, label: string): string {
  const name = `${role}/${normalizeLabel(label)}`;
  return joinIri(namespace, role, uuidv5(name, namespaceUuid(namespace)));
}

export interface IdentityScope {
  /** Base IRI of the library */
  baseIri: string;
  knowledgeBase: KnowledgeBaseSettings;
  /**
   * Canonical labels already present in the knowledge base, per role.
   * Only consulted when knowledge-base mapping is enabled.
   */
  knownLabels?: ReadonlyMap<string, Iterable<string>>;
}

export interface ResolvedEntity {
  iri: string;
  /** Display label of the canonical entity */
  label: string;
}

/**
 * Resolves identities for one library during one ingestion pass.
 *
 * Record roles are always graph-local and key-based. Entity roles are
 * label-based: knowledge-base IRIs when knowledge-base mapping is enabled,
 * graph-local IRIs on the normalised label otherwise.
 */
export class IdentityResolver {
  private readonly canonicalizers = new Map<string, LabelCanonicalizer>();

  constructor(private readonly scope: IdentityScope) {}

  get sharedEntities(): boolean {
    return this.scope.knowledgeBase.enabled;
  }

  /**
   * IRI for a record or a key reference.
   */
  resolve(role: string, sourceKey: string): string {
    if (!isRecordRole(role) && this.scope.knowledgeBase.enabled) {
      return this.resolveEntity(role, sourceKey).iri;
    }
    return graphLocalIri(this.scope.baseIri, role, sourceKey);
  }

  recordIri(kind: RecordKind, key: string): string {
    return graphLocalIri(this.scope.baseIri, kind, key);
  }

  /**
   * Canonicalise every label of a pass up front, in alphabetical order,
   * so later lookups do not depend on record order.
   */
  prepare(labelsByRole: ReadonlyMap<string, Iterable<string>>): void {
    if (!this.scope.knowledgeBase.enabled) return;
    for (const [role, labels] of labelsByRole) {
      this.canonicalizer(role).canonicalizeAll(labels);
    }
  }

  resolveEntity(role: string, label: string): ResolvedEntity {
    if (!this.scope.knowledgeBase.enabled) {
      const normalized = normalizeLabel(label);
      return {
        iri: graphLocalIri(this.scope.baseIri, role, normalized),
        label: label.trim(),
      };
    }
    const canonical: CanonicalLabel = this.canonicalizer(role).canonicalize(label);
    return {
      iri: knowledgeBaseIri(this.scope.knowledgeBase.namespace, role, canonical.normalized),
      label: canonical.display,
    };
  }

  private canonicalizer(role: string): LabelCanonicalizer {
    let canonicalizer = this.canonicalizers.get(role);
    if (!canonicalizer) {
      canonicalizer = new LabelCanonicalizer(
        this.scope.knowledgeBase.fuzzyThreshold,
        this.scope.knownLabels?.get(role) ?? [],
      );
      this.canonicalizers.set(role, canonicalizer);
    }
    return canonicalizer;
  }
}
