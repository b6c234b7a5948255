/**
 * SchemaOntology — OWL ontology of the vocabulary, built from the web API's
 * schema document.
 *
 * - item, library, collection, tag and creatorRole as base classes
 * - every item type as a subclass of item, every creator type as a
 *   subclass of creatorRole, labelled in each locale
 * - every field as a datatype property whose domain is the (union of the)
 *   item types using it, equivalent to its base field when it has one
 * - `creators` as an object property ranging over the creator types
 *
 * Blank nodes of union classes and lists are labelled from their content,
 * so rebuilding from the same schema yields the same quads.
 */

import { createHash } from 'node:crypto';
import { z } from 'zod';
import type * as RDF from '@rdfjs/types';
import {
  OWL_NS,
  RDF_NS,
  RDF_TYPE,
  RDFS_LABEL,
  RDFS_NS,
  blankNode,
  literal,
  namedNode,
  quad,
  safeNamedNode,
  trimIri,
} from '../rdf/terms.js';

const labelMapSchema = z.record(z.string()).default({});

export const schemaDocumentSchema = z.object({
  itemTypes: z.array(z.object({
    itemType: z.string(),
    fields: z.array(z.object({
      field: z.string(),
      baseField: z.string().optional(),
    })).default([]),
    creatorTypes: z.array(z.object({ creatorType: z.string() })).default([]),
  })).default([]),
  locales: z.record(z.object({
    itemTypes: labelMapSchema,
    creatorTypes: labelMapSchema,
    fields: labelMapSchema,
  })).default({}),
});

export type SchemaDocument = z.infer<typeof schemaDocumentSchema>;

const BASE_CLASSES = ['item', 'library', 'collection', 'tag', 'creatorRole'];

/**
 * Graph holding the ontology: the vocabulary IRI without trailing `#`/`/`.
 */
export function ontologyGraphIri(vocab: string): string {
  return trimIri(vocab);
}

class OntologyBuilder {
  readonly quads: RDF.Quad[] = [];
  private readonly graph: RDF.NamedNode;

  constructor(private readonly vocab: string) {
    this.graph = namedNode(ontologyGraphIri(vocab));
  }

  term(name: string): RDF.NamedNode {
    return safeNamedNode(`${this.vocab}${name}`);
  }

  add(subject: RDF.Quad_Subject, predicate: string, object: RDF.Quad_Object): void {
    this.quads.push(quad(subject, namedNode(predicate), object, this.graph));
  }

  /**
   * `subject predicate T` for one member, an owl:unionOf class otherwise.
   */
  addUnion(subject: RDF.NamedNode, predicate: string, members: readonly string[]): void {
    const sorted = [...new Set(members)].sort();
    const [only] = sorted;
    if (only !== undefined && sorted.length === 1) {
      this.add(subject, predicate, this.term(only));
      return;
    }
    const seed = createHash('sha1').update(`${subject.value}|${predicate}|${sorted.join('|')}`).digest('hex').slice(0, 16);
    const union = blankNode(`u${seed}`);
    this.add(subject, predicate, union);
    this.add(union, RDF_TYPE, namedNode(`${OWL_NS}Class`));
    this.add(union, `${OWL_NS}unionOf`, this.list(seed, sorted));
  }

  private list(seed: string, members: readonly string[]): RDF.Quad_Object {
    const nil = namedNode(`${RDF_NS}nil`);
    if (members.length === 0) return nil;
    const nodes = members.map((_, index) => blankNode(`l${seed}_${index}`));
    members.forEach((member, index) => {
      const node = nodes[index];
      if (!node) return;
      this.add(node, `${RDF_NS}first`, this.term(member));
      this.add(node, `${RDF_NS}rest`, nodes[index + 1] ?? nil);
    });
    return nodes[0] ?? nil;
  }
}

function collectLabels(
  locales: SchemaDocument['locales'],
  pick: (locale: SchemaDocument['locales'][string]) => Record<string, string>,
): Map<string, RDF.Literal[]> {
  const labels = new Map<string, RDF.Literal[]>();
  for (const lang of Object.keys(locales).sort()) {
    const locale = locales[lang];
    if (!locale) continue;
    for (const [name, label] of Object.entries(pick(locale))) {
      const list = labels.get(name) ?? [];
      list.push(literal(label, lang));
      labels.set(name, list);
    }
  }
  return labels;
}

/**
 * Build the ontology quads for a schema document.
 *
 * @throws ZodError when the document is not a schema
 */
export function buildSchemaOntology(document: unknown, vocab: string): RDF.Quad[] {
  const schema = schemaDocumentSchema.parse(document);
  const builder = new OntologyBuilder(vocab);
  const owlClass = namedNode(`${OWL_NS}Class`);
  const subClassOf = `${RDFS_NS}subClassOf`;

  const classLabels = collectLabels(schema.locales, (locale) => ({ ...locale.itemTypes, ...locale.creatorTypes }));
  const fieldLabels = collectLabels(schema.locales, (locale) => locale.fields);

  for (const name of BASE_CLASSES) {
    builder.add(builder.term(name), RDF_TYPE, owlClass);
    builder.add(builder.term(name), RDFS_LABEL, literal(name));
  }

  const fieldDomains = new Map<string, string[]>();
  const baseFields = new Map<string, string>();
  const creatorTypes = new Set<string>();
  const creatorDomains: string[] = [];

  for (const itemType of schema.itemTypes) {
    const node = builder.term(itemType.itemType);
    builder.add(node, RDF_TYPE, owlClass);
    builder.add(node, subClassOf, builder.term('item'));
    for (const label of classLabels.get(itemType.itemType) ?? []) {
      builder.add(node, RDFS_LABEL, label);
    }

    for (const field of itemType.fields) {
      const domains = fieldDomains.get(field.field) ?? [];
      domains.push(itemType.itemType);
      fieldDomains.set(field.field, domains);
      if (field.baseField) baseFields.set(field.field, field.baseField);
    }

    if (itemType.creatorTypes.length > 0) {
      creatorDomains.push(itemType.itemType);
      for (const creator of itemType.creatorTypes) creatorTypes.add(creator.creatorType);
    }
  }

  for (const [field, domains] of [...fieldDomains].sort(([a], [b]) => a.localeCompare(b))) {
    const node = builder.term(field);
    builder.add(node, RDF_TYPE, namedNode(`${OWL_NS}DatatypeProperty`));
    builder.addUnion(node, `${RDFS_NS}domain`, domains);
    builder.add(node, `${RDFS_NS}range`, namedNode(`${RDFS_NS}Literal`));
    for (const label of fieldLabels.get(field) ?? []) {
      builder.add(node, RDFS_LABEL, label);
    }
    const base = baseFields.get(field);
    if (base) builder.add(node, `${OWL_NS}equivalentProperty`, builder.term(base));
  }

  for (const creatorType of [...creatorTypes].sort()) {
    const node = builder.term(creatorType);
    builder.add(node, RDF_TYPE, owlClass);
    builder.add(node, subClassOf, builder.term('creatorRole'));
    for (const label of classLabels.get(creatorType) ?? []) {
      builder.add(node, RDFS_LABEL, label);
    }
  }

  if (creatorTypes.size > 0) {
    const creators = builder.term('creators');
    builder.add(creators, RDF_TYPE, namedNode(`${OWL_NS}ObjectProperty`));
    builder.add(creators, RDFS_LABEL, literal('Creators'));
    builder.addUnion(creators, `${RDFS_NS}range`, [...creatorTypes]);
    builder.addUnion(creators, `${RDFS_NS}domain`, creatorDomains);
  }

  return builder.quads;
}
