/**
 * Minimal RDF/XML serialiser for one graph: one rdf:Description per
 * subject, predicates as namespaced elements.
 */

import type * as RDF from '@rdfjs/types';
import { RDF_NS, XSD_NS } from './terms.js';

const NCNAME = /^[A-Za-z_][A-Za-z0-9_.-]*$/;
const XSD_STRING = `${XSD_NS}string`;
const RDF_LANG_STRING = `${RDF_NS}langString`;

// XML 1.0 has no form for these, not even a character reference
const XML_UNREPRESENTABLE = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]|[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;

/**
 * Escape text for element content. Unrepresentable characters become
 * U+FFFD; CR is referenced so parsers do not fold it into LF.
 */
function escapeXmlText(value: string): string {
  return value
    .replace(XML_UNREPRESENTABLE, '\uFFFD')
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/\r/g, '&#13;');
}

/**
 * Escape text for a double-quoted attribute; whitespace other than the
 * space is referenced so attribute normalisation keeps it.
 */
function escapeXml(value: string): string {
  return escapeXmlText(value)
    .replace(/"/g, '&quot;')
    .replace(/\t/g, '&#9;')
    .replace(/\n/g, '&#10;');
}

/**
 * Split a predicate IRI into namespace and an NCName local part.
 */
export function splitPredicate(iri: string): [string, string] {
  for (let index = iri.length - 1; index > 0; index--) {
    const local = iri.slice(index);
    if (NCNAME.test(local) && !NCNAME.test(iri.slice(index - 1))) {
      return [iri.slice(0, index), local];
    }
  }
  throw new Error(`Predicate <${iri}> cannot be written as an RDF/XML element`);
}

function subjectAttribute(term: RDF.Quad['subject']): string {
  return term.termType === 'BlankNode'
    ? `rdf:nodeID="${escapeXml(term.value)}"`
    : `rdf:about="${escapeXml(term.value)}"`;
}

export function writeRdfXml(quads: readonly RDF.Quad[], prefixes: Record<string, string> = {}): string {
  const namespaces = new Map<string, string>([[RDF_NS, 'rdf']]);
  for (const [prefix, namespace] of Object.entries(prefixes)) {
    if (!namespaces.has(namespace) && NCNAME.test(prefix) && prefix !== 'rdf') {
      namespaces.set(namespace, prefix);
    }
  }

  const bySubject = new Map<string, RDF.Quad[]>();
  for (const q of quads) {
    const key = `${q.subject.termType}:${q.subject.value}`;
    const list = bySubject.get(key);
    if (list) list.push(q);
    else bySubject.set(key, [q]);
  }

  const prefixFor = (namespace: string): string => {
    let prefix = namespaces.get(namespace);
    if (!prefix) {
      prefix = `ns${namespaces.size}`;
      namespaces.set(namespace, prefix);
    }
    return prefix;
  };

  const body: string[] = [];
  for (const group of bySubject.values()) {
    const first = group[0];
    if (!first) continue;
    body.push(`  <rdf:Description ${subjectAttribute(first.subject)}>`);
    for (const q of group) {
      const [namespace, local] = splitPredicate(q.predicate.value);
      const element = `${prefixFor(namespace)}:${local}`;
      const object = q.object;
      if (object.termType === 'NamedNode') {
        body.push(`    <${element} rdf:resource="${escapeXml(object.value)}"/>`);
      } else if (object.termType === 'BlankNode') {
        body.push(`    <${element} rdf:nodeID="${escapeXml(object.value)}"/>`);
      } else if (object.termType === 'Literal') {
        let attributes = '';
        if (object.language) {
          attributes = ` xml:lang="${escapeXml(object.language)}"`;
        } else if (object.datatype.value !== XSD_STRING && object.datatype.value !== RDF_LANG_STRING) {
          attributes = ` rdf:datatype="${escapeXml(object.datatype.value)}"`;
        }
        body.push(`    <${element}${attributes}>${escapeXmlText(object.value)}</${element}>`);
      }
    }
    body.push('  </rdf:Description>');
  }

  const declarations = [...namespaces.entries()]
    .map(([namespace, prefix]) => `xmlns:${prefix}="${escapeXml(namespace)}"`)
    .join('\n         ');

  return [
    '<?xml version="1.0" encoding="utf-8"?>',
    `<rdf:RDF ${declarations}>`,
    ...body,
    '</rdf:RDF>',
    '',
  ].join('\n');
}
