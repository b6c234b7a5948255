/**
 * Typing rules for literal field values.
 */

import type * as RDF from '@rdfjs/types';
import { XSD_NS, hasScheme, literal, namedNode, safeNamedNode } from '../rdf/terms.js';
import type { ScalarValue, TypedLiteral } from '../records/types.js';
import { resolveLanguage } from './languages.js';
import type { LanguageMap } from './types.js';

const XSD_INT = namedNode(`${XSD_NS}int`);
const XSD_INTEGER = namedNode(`${XSD_NS}integer`);
const XSD_DECIMAL = namedNode(`${XSD_NS}decimal`);
const XSD_BOOLEAN = namedNode(`${XSD_NS}boolean`);
const XSD_GYEAR = namedNode(`${XSD_NS}gYear`);
const XSD_DATETIME = namedNode(`${XSD_NS}dateTime`);

const INTEGER_FIELDS = new Set(['numPages', 'numberOfVolumes', 'volume', 'seriesNumber', 'series number']);
const DATETIME_FIELDS = new Set(['dateAdded', 'dateModified', 'accessDate']);
const LINK_FIELDS = new Set(['url', 'doi']);
const TITLE_FIELDS = new Set(['title', 'bookTitle']);

const YEAR_PATTERN = /\b(1[5-9]\d{2}|20\d{2}|2100)\b/;

export interface LiteralContext {
  /** Raw language field of the record, if any */
  language?: string | undefined;
  languageMap: LanguageMap;
}

/**
 * Object term for one literal-valued field.
 * Returns undefined for values that produce no triple (empty strings).
 */
export function typeValue(
  field: string,
  value: ScalarValue | TypedLiteral,
  context: LiteralContext,
): RDF.Literal | RDF.NamedNode | undefined {
  if (typeof value === 'object') {
    if (value.language) return literal(value.value, value.language);
    if (value.datatype) return literal(value.value, namedNode(value.datatype));
    return typeString(field, value.value, context);
  }
  if (typeof value === 'boolean') {
    return literal(String(value), XSD_BOOLEAN);
  }
  if (typeof value === 'number') {
    if (INTEGER_FIELDS.has(field) && Number.isInteger(value)) {
      return literal(String(value), XSD_INT);
    }
    return literal(String(value), Number.isInteger(value) ? XSD_INTEGER : XSD_DECIMAL);
  }
  return typeString(field, value, context);
}

function typeString(field: string, value: string, context: LiteralContext): RDF.Literal | RDF.NamedNode | undefined {
  const text = value.trim();
  if (text === '') return undefined;

  if (INTEGER_FIELDS.has(field) && /^\d+$/.test(text)) {
    return literal(text, XSD_INT);
  }

  if (field === 'date') {
    if (/^\d{4}$/.test(text)) return literal(text, XSD_GYEAR);
    const year = YEAR_PATTERN.exec(text)?.[1];
    return year ? literal(year, XSD_GYEAR) : literal(value);
  }

  if (DATETIME_FIELDS.has(field)) {
    return literal(text, XSD_DATETIME);
  }

  if (LINK_FIELDS.has(field)) {
    if (/^https?:/i.test(text)) return safeNamedNode(text);
    if (field === 'doi' && text.length > 5 && !hasScheme(text)) {
      return safeNamedNode(`https://doi.org/${text}`);
    }
  }

  if (TITLE_FIELDS.has(field) && context.language) {
    return literal(value, resolveLanguage(context.language, context.languageMap));
  }

  return literal(value);
}

/**
 * First-creator / title / year label for an item.
 */
export function itemLabel(creator: string | undefined, title: string | undefined, date: string | undefined): string {
  const year = date ? (YEAR_PATTERN.exec(date)?.[1] ?? date) : undefined;
  return `${creator ?? 'NO CREATOR'}: ${title ?? 'NO TITLE'} (${year ?? 'NO DATE'})`;
}
