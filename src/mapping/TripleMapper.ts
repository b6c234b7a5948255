/**
 * TripleMapper — CanonicalRecord + MappingRuleSet → scoped triples.
 *
 * Deterministic: blank nodes for nested values are labelled by a hash of
 * their subject and field path, fields are visited in sorted order, so the
 * same record and rules always give the same triples.
 */

import { createHash } from 'node:crypto';
import type * as RDF from '@rdfjs/types';
import {
  RDF_TYPE,
  RDFS_LABEL,
  SKOS_ALT_LABEL,
  blankNode,
  hasScheme,
  literal,
  namedNode,
  safeNamedNode,
  termKey,
} from '../rdf/terms.js';
import {
  isRecordRole,
  roleForField,
  type IdentityResolver,
} from '../identity/IdentityResolver.js';
import type {
  CanonicalRecord,
  EntityReference,
  FieldValue,
  NestedRecord,
  SingleFieldValue,
} from '../records/types.js';
import { isScalar, scalarText, toList } from '../records/types.js';
import { isFieldAllowed } from './RuleResolver.js';
import { itemLabel, typeValue, type LiteralContext } from './LiteralTyper.js';
import type { MappingRuleSet, ScopedTriple, TripleScope, TypeRule } from './types.js';

export interface MappingContext {
  identity: IdentityResolver;
  /** Named graph IRI of the library, target of the back-link predicate */
  libraryGraph: string;
}

type Subject = RDF.NamedNode | RDF.BlankNode;
type ObjectTerm = RDF.NamedNode | RDF.BlankNode | RDF.Literal;

/**
 * Scalar values of structured entity fields may hold several labels.
 */
function splitEntityLabels(text: string): string[] {
  return text.split(';').map((part) => part.trim()).filter((part) => part !== '');
}

function firstText(value: FieldValue | undefined): string | undefined {
  for (const entry of toList(value)) {
    const text = scalarText(entry);
    if (text !== undefined && text.trim() !== '') return text.trim();
  }
  return undefined;
}

class RecordMapper {
  private readonly triples: ScopedTriple[] = [];
  private readonly seen = new Set<string>();
  private readonly literalContext: LiteralContext;

  constructor(
    private readonly record: CanonicalRecord,
    private readonly ruleSet: MappingRuleSet,
    private readonly context: MappingContext
  ) {
    this.literalContext = {
      language: firstText(record.fields['language']),
      languageMap: ruleSet.languageMap,
    };
  }

  map(): ScopedTriple[] {
    const { record, ruleSet } = this;
    const subject = namedNode(record.iri ?? this.context.identity.recordIri(record.kind, record.key));

    this.mapTypes(subject);

    for (const field of Object.keys(record.fields).sort()) {
      if (!isFieldAllowed(ruleSet, field)) continue;
      const values = toList(record.fields[field]);
      if (ruleSet.structured.has(field)) {
        this.mapStructured(subject, field, values);
      } else {
        this.mapPlain(subject, field, values, field);
      }
    }

    this.mapAdditional(subject);

    if (ruleSet.namedLibrary) {
      this.add(subject, namedNode(ruleSet.namedLibrary), namedNode(this.context.libraryGraph), 'content');
    }

    if (ruleSet.itemLabel && record.kind === 'item') {
      this.add(subject, namedNode(RDFS_LABEL), literal(this.label()), 'content');
    }

    return this.triples;
  }

  private vocabTerm(name: string): RDF.NamedNode {
    return hasScheme(name) ? safeNamedNode(name) : safeNamedNode(`${this.ruleSet.vocab}${name}`);
  }

  private add(subject: Subject, predicate: RDF.NamedNode, object: ObjectTerm, scope: TripleScope): void {
    const key = `${termKey(subject)} ${termKey(predicate)} ${termKey(object)} ${scope}`;
    if (this.seen.has(key)) return;
    this.seen.add(key);
    this.triples.push({ subject, predicate, object, scope });
  }

  private mapTypes(subject: RDF.NamedNode): void {
    const rdfType = namedNode(RDF_TYPE);
    const rules: readonly TypeRule[] = this.record.kind === 'item' ? this.ruleSet.itemType : this.ruleSet.collectionType;

    if (rules.length === 0) {
      this.add(subject, rdfType, this.vocabTerm(this.record.kind), 'content');
    }
    for (const rule of rules) {
      if (rule.kind === 'constant') {
        this.add(subject, rdfType, namedNode(rule.iri), 'content');
        continue;
      }
      for (const entry of toList(this.record.fields[rule.field])) {
        const text = entry !== undefined && typeof entry === 'object' && entry.type === 'iri' ? entry.value : scalarText(entry);
        if (text === undefined) continue;
        const parts = hasScheme(text.trim()) ? [text.trim()] : text.split(',');
        for (const part of parts) {
          const name = part.trim();
          if (name !== '') this.add(subject, rdfType, this.vocabTerm(name), 'content');
        }
      }
    }
    for (const type of this.record.types) {
      this.add(subject, rdfType, safeNamedNode(type), 'content');
    }
  }

  private blankNodeFor(subject: Subject, path: string, index: number): RDF.BlankNode {
    const digest = createHash('sha1').update(`${termKey(subject)}|${path}|${index}`).digest('hex');
    return blankNode(`n${digest.slice(0, 24)}`);
  }

  private mapPlain(subject: Subject, field: string, values: readonly SingleFieldValue[], path: string): void {
    const predicate = this.vocabTerm(field);
    values.forEach((value, index) => {
      if (isScalar(value)) {
        const object = typeValue(field, value, this.literalContext);
        if (object) this.add(subject, predicate, object, 'content');
        return;
      }
      switch (value.type) {
        case 'literal': {
          const object = typeValue(field, value, this.literalContext);
          if (object) this.add(subject, predicate, object, 'content');
          return;
        }
        case 'iri':
          this.add(subject, predicate, safeNamedNode(value.value), 'content');
          return;
        case 'entity':
          this.add(subject, predicate, literal(value.label), 'content');
          return;
        case 'nested': {
          const node = this.blankNodeFor(subject, path, index);
          this.add(subject, predicate, node, 'content');
          this.mapNested(node, value, `${path}/${index}`);
          return;
        }
      }
    });
  }

  private mapNested(node: RDF.BlankNode, nested: NestedRecord, path: string): void {
    for (const type of nested.types ?? []) {
      this.add(node, namedNode(RDF_TYPE), safeNamedNode(type), 'content');
    }
    for (const field of Object.keys(nested.fields).sort()) {
      this.mapPlain(node, field, toList(nested.fields[field]), `${path}/${field}`);
    }
  }

  private mapStructured(subject: RDF.NamedNode, field: string, values: readonly SingleFieldValue[]): void {
    const role = roleForField(field);
    const predicate = this.vocabTerm(field);
    values.forEach((value, index) => {
      if (!isScalar(value)) {
        if (value.type === 'entity') {
          this.addEntity(subject, predicate, role, value.label, value);
          return;
        }
        if (value.type === 'iri') {
          this.add(subject, predicate, safeNamedNode(value.value), 'content');
          return;
        }
        if (value.type === 'nested') {
          const node = this.blankNodeFor(subject, field, index);
          this.add(subject, predicate, node, 'content');
          this.mapNested(node, value, `${field}/${index}`);
          return;
        }
      }
      const text = scalarText(value)?.trim();
      if (!text) return;
      if (isRecordRole(role)) {
        this.add(subject, predicate, namedNode(this.context.identity.resolve(role, text)), 'content');
        return;
      }
      for (const label of splitEntityLabels(text)) {
        this.addEntity(subject, predicate, role, label);
      }
    });
  }

  private addEntity(
    subject: RDF.NamedNode,
    predicate: RDF.NamedNode,
    role: string,
    label: string,
    reference?: EntityReference,
  ): void {
    const resolved = this.context.identity.resolveEntity(role, label);
    const entity = namedNode(resolved.iri);

    this.add(subject, predicate, entity, 'content');
    if (reference?.qualifier) {
      this.add(subject, this.vocabTerm(reference.qualifier), entity, 'content');
    }

    this.add(entity, namedNode(RDF_TYPE), this.vocabTerm(role), 'entity');
    this.add(entity, namedNode(RDFS_LABEL), literal(resolved.label), 'entity');
    this.add(entity, namedNode(SKOS_ALT_LABEL), literal(label.trim()), 'entity');
    for (const name of Object.keys(reference?.attributes ?? {}).sort()) {
      const value = reference?.attributes[name];
      if (value === undefined || String(value).trim() === '') continue;
      this.add(entity, this.vocabTerm(name), literal(String(value)), 'entity');
    }
  }

  private mapAdditional(subject: RDF.NamedNode): void {
    for (const rule of this.ruleSet.additional) {
      const texts: string[] = [];
      if (rule.source.kind === 'constant') {
        texts.push(rule.source.value);
      } else {
        for (const entry of toList(this.record.fields[rule.source.field])) {
          const text = scalarText(entry);
          if (text !== undefined && text.trim() !== '') texts.push(text.trim());
        }
      }
      const predicate = namedNode(rule.predicate);
      for (const text of texts) {
        const value = `${rule.prefix ?? ''}${text}`;
        this.add(subject, predicate, rule.namedNode ? safeNamedNode(value) : literal(value), 'content');
      }
    }
  }

  private label(): string {
    const { fields } = this.record;
    let creator: string | undefined;
    for (const entry of toList(fields['creators'])) {
      if (isScalar(entry)) {
        creator = String(entry);
      } else if (entry.type === 'entity') {
        const lastName = entry.attributes['lastName'];
        creator = lastName !== undefined ? String(lastName) : entry.label;
      }
      if (creator) break;
    }
    return itemLabel(creator, firstText(fields['title']), firstText(fields['date']));
  }
}

/**
 * Map one record to triples.
 */
export function mapRecord(record: CanonicalRecord, ruleSet: MappingRuleSet, context: MappingContext): ScopedTriple[] {
  return new RecordMapper(record, ruleSet, context).map();
}

/**
 * Entity labels the records will reference, per role, for up-front
 * canonicalisation by the identity resolver.
 */
export function collectEntityLabels(
  records: readonly CanonicalRecord[],
  ruleSet: MappingRuleSet,
): Map<string, string[]> {
  const labels = new Map<string, string[]>();
  const push = (role: string, label: string): void => {
    const list = labels.get(role);
    if (list) list.push(label);
    else labels.set(role, [label]);
  };

  for (const record of records) {
    for (const [field, value] of Object.entries(record.fields)) {
      if (!ruleSet.structured.has(field) || !isFieldAllowed(ruleSet, field)) continue;
      const role = roleForField(field);
      if (isRecordRole(role)) continue;
      for (const entry of toList(value)) {
        if (!isScalar(entry) && entry.type === 'entity') {
          push(role, entry.label);
          continue;
        }
        const text = scalarText(entry);
        if (text === undefined || (!isScalar(entry) && entry.type === 'iri')) continue;
        for (const label of splitEntityLabels(text)) push(role, label);
      }
    }
  }
  return labels;
}

function sourceTerm<T extends ObjectTerm>(term: T): T | RDF.BlankNode {
  // keep source blank nodes apart from the ones minted for nested values
  return term.termType === 'BlankNode' ? blankNode(`src_${term.value}`) : term;
}

/**
 * Carry statements no record takes up into the library graph unchanged,
 * except for blank-node labels. Statements about quoted triples or with
 * variables are dropped.
 */
export function passThroughTriples(quads: readonly RDF.Quad[]): ScopedTriple[] {
  const triples: ScopedTriple[] = [];
  for (const q of quads) {
    const { subject, predicate, object } = q;
    if (subject.termType !== 'NamedNode' && subject.termType !== 'BlankNode') continue;
    if (predicate.termType !== 'NamedNode') continue;
    if (object.termType !== 'NamedNode' && object.termType !== 'BlankNode' && object.termType !== 'Literal') continue;
    triples.push({
      subject: sourceTerm(subject),
      predicate,
      object: sourceTerm(object),
      scope: 'content',
    });
  }
  return triples;
}
