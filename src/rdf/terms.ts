/**
 * Shared RDF vocabulary and term helpers.
 */

import { DataFactory } from 'n3';
import type * as RDF from '@rdfjs/types';

export const { namedNode, literal, blankNode, quad, defaultGraph } = DataFactory;

export const RDF_NS = 'http://www.w3.org/1999/02/22-rdf-syntax-ns#';
export const RDFS_NS = 'http://www.w3.org/2000/01/rdf-schema#';
export const OWL_NS = 'http://www.w3.org/2002/07/owl#';
export const XSD_NS = 'http://www.w3.org/2001/XMLSchema#';
export const SKOS_NS = 'http://www.w3.org/2004/02/skos/core#';
export const PROV_NS = 'http://www.w3.org/ns/prov#';

export const RDF_TYPE = `${RDF_NS}type`;
export const RDFS_LABEL = `${RDFS_NS}label`;
export const SKOS_ALT_LABEL = `${SKOS_NS}altLabel`;
export const PROV_GENERATED_AT = `${PROV_NS}generatedAtTime`;

/**
 * Prefixes used when serialising.
 */
export function standardPrefixes(vocab: string): Record<string, string> {
  return {
    zot: vocab,
    rdf: RDF_NS,
    rdfs: RDFS_NS,
    owl: OWL_NS,
    xsd: XSD_NS,
    skos: SKOS_NS,
    prov: PROV_NS,
  };
}

const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:/i;

/**
 * Whether a token starts with a URI scheme (`http:`, `urn:`, ...).
 */
export function hasScheme(value: string): boolean {
  return SCHEME_PATTERN.test(value);
}

/**
 * Absolute IRI check: a scheme, no whitespace, none of the characters
 * N-Triples forbids inside `<...>`.
 */
export function isAbsoluteIri(value: string): boolean {
  return hasScheme(value) && !/[\s<>"{}|\\^`]/.test(value);
}

/**
 * Named node that never fails: a value that is not a valid IRI is moved
 * under an internal namespace, percent-encoded.
 */
export function safeNamedNode(value: string): RDF.NamedNode {
  const trimmed = value.trim();
  if (isAbsoluteIri(trimmed)) {
    return namedNode(trimmed);
  }
  return namedNode(`http://internal.invalid/${encodeURIComponent(trimmed)}`);
}

/**
 * Local name of an IRI: the part after the last `#` or `/`.
 */
export function localName(iri: string): string {
  const index = Math.max(iri.lastIndexOf('#'), iri.lastIndexOf('/'));
  return index >= 0 ? iri.slice(index + 1) : iri;
}

export function termKey(term: RDF.Term): string {
  switch (term.termType) {
    case 'NamedNode':
      return `<${term.value}>`;
    case 'BlankNode':
      return `_:${term.value}`;
    case 'Literal':
      return `"${term.value}"@${term.language}^^${term.datatype.value}`;
    case 'DefaultGraph':
      return '';
    default:
      return `?${term.value}`;
  }
}

/**
 * Identity key of a quad, for de-duplication.
 */
export function quadKey(q: RDF.Quad): string {
  return `${termKey(q.subject)} ${termKey(q.predicate)} ${termKey(q.object)} ${termKey(q.graph)}`;
}

/**
 * Remove duplicate quads, keeping first-seen order.
 */
export function dedupeQuads(quads: Iterable<RDF.Quad>): RDF.Quad[] {
  const seen = new Set<string>();
  const result: RDF.Quad[] = [];
  for (const q of quads) {
    const key = quadKey(q);
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(q);
  }
  return result;
}

/**
 * Strip trailing `#` and `/` characters from an IRI.
 */
export function trimIri(iri: string): string {
  return iri.replace(/[#/]+$/, '');
}
