/**
 * Canonical record model.
 *
 * Every source shape (API JSON, API RDF export, manual RDF files) is
 * normalised into CanonicalRecord before mapping, so the mapper only knows
 * one shape.
 */

export type RecordKind = 'item' | 'collection';

export interface TypedLiteral {
  type: 'literal';
  value: string;
  datatype?: string;
  language?: string;
}

export interface IriReference {
  type: 'iri';
  value: string;
}

export interface NestedRecord {
  type: 'nested';
  fields: Record<string, FieldValue>;
  /** Source types of the nested node, if it had any */
  types?: string[];
}

/**
 * A reference to a shared entity (creator, tag) identified by its label.
 */
export interface EntityReference {
  type: 'entity';
  label: string;
  /** Role qualifier, e.g. the creatorType of a creator */
  qualifier?: string;
  /** Extra descriptive fields (firstName, lastName, tag type, ...) */
  attributes: Record<string, string | number>;
}

export type ScalarValue = string | number | boolean;

export type SingleFieldValue = ScalarValue | TypedLiteral | IriReference | NestedRecord | EntityReference;

export type FieldValue = SingleFieldValue | SingleFieldValue[];

export interface CanonicalRecord {
  kind: RecordKind;
  /** Library-scoped source key */
  key: string;
  /** Source IRI, set for records that came from RDF */
  iri?: string;
  /** Raw type discriminator, e.g. the itemType field */
  rawType?: string;
  /** Source rdf:type IRIs (RDF sources only) */
  types: string[];
  fields: Record<string, FieldValue>;
}

/**
 * Which endpoint a JSON record came from, when known.
 */
export type RecordHint = RecordKind;

export function isScalar(value: SingleFieldValue): value is ScalarValue {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

export function toList(value: FieldValue | undefined): SingleFieldValue[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

/**
 * Plain string form of a field value, for type discriminators and labels.
 */
export function scalarText(value: SingleFieldValue): string | undefined {
  if (isScalar(value)) return String(value);
  switch (value.type) {
    case 'literal':
    case 'iri':
      return value.value;
    case 'entity':
      return value.label;
    default:
      return undefined;
  }
}
