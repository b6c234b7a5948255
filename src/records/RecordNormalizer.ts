/**
 * RecordNormalizer — turns source records into CanonicalRecords.
 *
 * Handles the three shapes the sources produce:
 * - API envelopes: `{ key, version, library, data: { ... } }`
 * - bare `data` objects and flat records: `{ id, itemType, ... }`
 * - RDF statements from an API RDF export or a manual import file
 *
 * Pure functions: nothing here touches the network, the store or the clock.
 */

import type * as RDF from '@rdfjs/types';
import { MalformedRecordError } from '../types/errors.js';
import { RDF_TYPE, XSD_NS, localName } from '../rdf/terms.js';
import type {
  CanonicalRecord,
  EntityReference,
  FieldValue,
  NestedRecord,
  RecordHint,
  RecordKind,
  SingleFieldValue,
} from './types.js';

// ============================================================================
// JSON records
// ============================================================================

/**
 * Identity and transport keys that are never mapped as fields.
 */
const RESERVED_JSON_KEYS = new Set(['key', 'id', 'version', 'links', 'meta', 'library']);

function isObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function keyOf(value: unknown): string | undefined {
  if (typeof value === 'string' && value.trim() !== '') return value.trim();
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return undefined;
}

function isEmpty(value: unknown): boolean {
  if (value === undefined || value === null || value === '') return true;
  if (Array.isArray(value)) return value.length === 0;
  if (isObject(value)) return Object.keys(value).length === 0;
  return false;
}

function toTag(entry: unknown): EntityReference | undefined {
  if (typeof entry === 'string') {
    return entry.trim() === '' ? undefined : { type: 'entity', label: entry.trim(), attributes: {} };
  }
  if (!isObject(entry)) return undefined;
  const label = keyOf(entry['tag']);
  if (!label) return undefined;
  const attributes: Record<string, string | number> = {};
  const tagType = entry['type'];
  if (typeof tagType === 'number' || typeof tagType === 'string') attributes['type'] = tagType;
  return { type: 'entity', label, attributes };
}

function toCreator(entry: unknown): EntityReference | undefined {
  if (typeof entry === 'string') {
    return entry.trim() === '' ? undefined : { type: 'entity', label: entry.trim(), attributes: {} };
  }
  if (!isObject(entry)) return undefined;

  const attributes: Record<string, string | number> = {};
  for (const field of ['firstName', 'lastName', 'name']) {
    const value = keyOf(entry[field]);
    if (value) attributes[field] = value;
  }

  const first = attributes['firstName'];
  const last = attributes['lastName'];
  let label: string | undefined;
  if (attributes['name'] !== undefined) {
    label = String(attributes['name']);
  } else if (last !== undefined && first !== undefined) {
    label = `${last}, ${first}`;
  } else if (last !== undefined || first !== undefined) {
    label = String(last ?? first);
  }
  if (!label) return undefined;

  const qualifier = keyOf(entry['creatorType']);
  return {
    type: 'entity',
    label,
    ...(qualifier ? { qualifier } : {}),
    attributes,
  };
}

function convertJsonValue(value: unknown): SingleFieldValue | SingleFieldValue[] | undefined {
  if (isEmpty(value)) return undefined;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (Array.isArray(value)) {
    const items: SingleFieldValue[] = [];
    for (const entry of value) {
      const converted = convertJsonValue(entry);
      if (converted === undefined) continue;
      if (Array.isArray(converted)) items.push(...converted);
      else items.push(converted);
    }
    return items.length > 0 ? items : undefined;
  }
  if (isObject(value)) {
    const nested: NestedRecord = { type: 'nested', fields: {} };
    for (const [field, entry] of Object.entries(value)) {
      const converted = convertJsonValue(entry);
      if (converted !== undefined) nested.fields[field] = converted;
    }
    return Object.keys(nested.fields).length > 0 ? nested : undefined;
  }
  return undefined;
}

function convertEntities(value: unknown, convert: (entry: unknown) => EntityReference | undefined): EntityReference[] {
  const entries = Array.isArray(value) ? value : [value];
  const result: EntityReference[] = [];
  for (const entry of entries) {
    const entity = convert(entry);
    if (entity) result.push(entity);
  }
  return result;
}

function detectKind(data: Record<string, unknown>, hint: RecordHint | undefined): RecordKind | undefined {
  if (hint) return hint;
  if (keyOf(data['itemType'])) return 'item';
  if (keyOf(data['name']) !== undefined) return 'collection';
  return undefined;
}

/**
 * Normalise one JSON record.
 *
 * @param raw - API envelope, bare data object or flat record
 * @param hint - The endpoint the record came from, when known
 * @throws MalformedRecordError when the key or kind cannot be determined
 */
export function normalizeJsonRecord(raw: unknown, hint?: RecordHint): CanonicalRecord {
  if (!isObject(raw)) {
    throw new MalformedRecordError('record must be an object', raw);
  }

  const data = isObject(raw['data']) ? raw['data'] : raw;
  const key = keyOf(data['key']) ?? keyOf(raw['key']) ?? keyOf(data['id']) ?? keyOf(raw['id']);
  if (!key) {
    throw new MalformedRecordError('record has no key', raw);
  }

  const kind = detectKind(data, hint);
  if (!kind) {
    throw new MalformedRecordError(`cannot determine kind of record ${key}`, raw);
  }

  const fields: Record<string, FieldValue> = {};
  for (const [field, value] of Object.entries(data)) {
    if (RESERVED_JSON_KEYS.has(field)) continue;
    if (field === 'parentCollection' && value === false) continue;

    let converted: FieldValue | undefined;
    if (field === 'tags') {
      const tags = convertEntities(value, toTag);
      converted = tags.length > 0 ? tags : undefined;
    } else if (field === 'creators') {
      const creators = convertEntities(value, toCreator);
      converted = creators.length > 0 ? creators : undefined;
    } else {
      converted = convertJsonValue(value);
    }

    if (converted !== undefined) {
      fields[field] = converted;
    }
  }

  const rawType = keyOf(data['itemType']);
  return {
    kind,
    key,
    ...(rawType ? { rawType } : {}),
    types: [],
    fields,
  };
}

/**
 * Result of normalising a batch: the records that made it and the
 * per-record failures that were skipped.
 */
export interface NormalizedBatch {
  records: CanonicalRecord[];
  errors: MalformedRecordError[];
}

/**
 * Normalise a list of JSON records, skipping malformed ones.
 */
export function normalizeJsonRecords(raw: readonly unknown[], hint?: RecordHint): NormalizedBatch {
  const records: CanonicalRecord[] = [];
  const errors: MalformedRecordError[] = [];
  for (const entry of raw) {
    try {
      records.push(normalizeJsonRecord(entry, hint));
    } catch (err) {
      if (!(err instanceof MalformedRecordError)) throw err;
      errors.push(err);
    }
  }
  return { records, errors };
}

// ============================================================================
// RDF records
// ============================================================================

export interface RdfNormalizeOptions {
  /** Vocabulary namespace; predicates inside it become local field names */
  vocab: string;
}

const XSD_STRING = `${XSD_NS}string`;
const RDF_LANG_STRING = 'http://www.w3.org/1999/02/22-rdf-syntax-ns#langString';

interface SubjectGroup {
  subject: RDF.Quad['subject'];
  quads: RDF.Quad[];
}

function subjectId(term: RDF.Term): string {
  return term.termType === 'BlankNode' ? `_:${term.value}` : term.value;
}

function fieldName(predicate: string, vocab: string): string {
  if (predicate.startsWith(vocab) && predicate.length > vocab.length) {
    return predicate.slice(vocab.length);
  }
  return predicate;
}

function isCollectionType(iri: string): boolean {
  return localName(iri).toLowerCase() === 'collection';
}

function addField(fields: Record<string, FieldValue>, name: string, value: SingleFieldValue): void {
  const existing = fields[name];
  if (existing === undefined) {
    fields[name] = value;
  } else if (Array.isArray(existing)) {
    existing.push(value);
  } else {
    fields[name] = [existing, value];
  }
}

class RdfRecordBuilder {
  private readonly groups = new Map<string, SubjectGroup>();

  constructor(
    quads: Iterable<RDF.Quad>,
    private readonly vocab: string
  ) {
    for (const q of quads) {
      const id = subjectId(q.subject);
      let group = this.groups.get(id);
      if (!group) {
        group = { subject: q.subject, quads: [] };
        this.groups.set(id, group);
      }
      group.quads.push(q);
    }
  }

  /**
   * Statements of subjects that no record takes up: untyped named subjects
   * and blank nodes no record subject reaches.
   */
  unmapped(): RDF.Quad[] {
    const taken = new Set<string>();
    const pending = this.recordSubjects();
    for (let group = pending.pop(); group; group = pending.pop()) {
      const id = subjectId(group.subject);
      if (taken.has(id)) continue;
      taken.add(id);
      for (const q of group.quads) {
        if (q.object.termType !== 'BlankNode') continue;
        const nested = this.groups.get(subjectId(q.object));
        if (nested) pending.push(nested);
      }
    }
    return [...this.groups.entries()]
      .filter(([id]) => !taken.has(id))
      .flatMap(([, group]) => group.quads);
  }

  /**
   * Named subjects with at least one rdf:type, in first-seen order.
   */
  recordSubjects(): SubjectGroup[] {
    return [...this.groups.values()].filter(
      (group) => group.subject.termType === 'NamedNode'
        && group.quads.some((q) => q.predicate.value === RDF_TYPE),
    );
  }

  build(group: SubjectGroup): CanonicalRecord {
    const iri = group.subject.value;
    const key = localName(iri);
    if (!key) {
      throw new MalformedRecordError(`cannot derive a key from ${iri}`, iri);
    }
    const { fields, types } = this.collect(group, new Set([subjectId(group.subject)]));
    const kind: RecordKind = types.some(isCollectionType) ? 'collection' : 'item';

    const typeField = fields['itemType'];
    const firstType = types[0];
    const rawType = typeof typeField === 'string'
      ? typeField
      : firstType !== undefined ? localName(firstType) : undefined;

    return {
      kind,
      key,
      iri,
      ...(rawType ? { rawType } : {}),
      types,
      fields,
    };
  }

  private collect(group: SubjectGroup, visiting: Set<string>): { fields: Record<string, FieldValue>; types: string[] } {
    const fields: Record<string, FieldValue> = {};
    const types: string[] = [];
    for (const q of group.quads) {
      if (q.predicate.value === RDF_TYPE && q.object.termType === 'NamedNode') {
        if (!types.includes(q.object.value)) types.push(q.object.value);
        continue;
      }
      const value = this.convertObject(q.object, visiting);
      if (value !== undefined) {
        addField(fields, fieldName(q.predicate.value, this.vocab), value);
      }
    }
    return { fields, types };
  }

  private convertObject(object: RDF.Quad['object'], visiting: Set<string>): SingleFieldValue | undefined {
    switch (object.termType) {
      case 'Literal': {
        if (object.language) {
          return { type: 'literal', value: object.value, language: object.language };
        }
        const datatype = object.datatype.value;
        if (datatype === XSD_STRING || datatype === RDF_LANG_STRING) {
          return object.value;
        }
        return { type: 'literal', value: object.value, datatype };
      }
      case 'NamedNode':
        return { type: 'iri', value: object.value };
      case 'BlankNode': {
        const id = subjectId(object);
        const group = this.groups.get(id);
        if (!group || visiting.has(id)) return undefined;
        visiting.add(id);
        const { fields, types } = this.collect(group, visiting);
        visiting.delete(id);
        return {
          type: 'nested',
          fields,
          ...(types.length > 0 ? { types } : {}),
        };
      }
      default:
        return undefined;
    }
  }
}

export interface RdfNormalizedBatch extends NormalizedBatch {
  /** Statements outside every record, in source order */
  unmapped: RDF.Quad[];
  /** Named graphs the statements came from, sorted */
  sourceGraphs: string[];
}

/**
 * Normalise RDF statements into records, one per typed named subject.
 *
 * Blank-node objects are folded into nested records; a blank node that
 * refers back to an ancestor is dropped rather than followed. Statements
 * about other subjects are returned as `unmapped`.
 */
export function normalizeRdfRecords(quads: Iterable<RDF.Quad>, options: RdfNormalizeOptions): RdfNormalizedBatch {
  const all = [...quads];
  const builder = new RdfRecordBuilder(all, options.vocab);
  const sourceGraphs = new Set<string>();
  for (const q of all) {
    if (q.graph.termType === 'NamedNode') sourceGraphs.add(q.graph.value);
  }
  const records: CanonicalRecord[] = [];
  const errors: MalformedRecordError[] = [];
  for (const group of builder.recordSubjects()) {
    try {
      records.push(builder.build(group));
    } catch (err) {
      if (!(err instanceof MalformedRecordError)) throw err;
      errors.push(err);
    }
  }
  return { records, errors, unmapped: builder.unmapped(), sourceGraphs: [...sourceGraphs].sort() };
}
