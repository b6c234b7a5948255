/**
 * Tabular view of a graph: one row per subject, one column per predicate.
 *
 * The first column, `IRI`, holds the subject; the other headers are the
 * predicate IRIs in ascending order. A cell joins a subject's objects for
 * its predicate with ` | `: literals by lexical value, IRIs as `<iri>`,
 * blank nodes as `_:label`. Datatypes and language tags are not kept.
 */

import type * as RDF from '@rdfjs/types';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import { InvalidRequestError } from '../types/errors.js';
import { isAbsoluteIri, literal, namedNode, quad, safeNamedNode } from './terms.js';

export const CSV_SUBJECT_COLUMN = 'IRI';
export const CSV_VALUE_SEPARATOR = ' | ';

const rowsSchema = z.array(z.array(z.string()));

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function cellValue(term: RDF.Quad['object']): string {
  switch (term.termType) {
    case 'NamedNode':
      return `<${term.value}>`;
    case 'BlankNode':
      return `_:${term.value}`;
    default:
      return term.value;
  }
}

function subjectCell(term: RDF.Quad['subject']): string {
  return term.termType === 'BlankNode' ? `_:${term.value}` : term.value;
}

export interface CsvTable {
  text: string;
  /** Data rows, one per subject */
  rows: number;
}

/**
 * Tabulate quads regardless of their graph.
 */
export function quadsToCsv(quads: Iterable<RDF.Quad>): CsvTable {
  const bySubject = new Map<string, Map<string, string[]>>();
  const predicates = new Set<string>();
  for (const q of quads) {
    const subject = subjectCell(q.subject);
    let cells = bySubject.get(subject);
    if (!cells) {
      cells = new Map();
      bySubject.set(subject, cells);
    }
    const values = cells.get(q.predicate.value) ?? [];
    values.push(cellValue(q.object));
    cells.set(q.predicate.value, values);
    predicates.add(q.predicate.value);
  }

  const columns = [...predicates].sort(compareText);
  const rows = [...bySubject.keys()].sort(compareText).map((subject) => {
    const cells = bySubject.get(subject);
    return [subject, ...columns.map((predicate) => (cells?.get(predicate) ?? []).join(CSV_VALUE_SEPARATOR))];
  });
  return {
    text: stringify([[CSV_SUBJECT_COLUMN, ...columns], ...rows]),
    rows: rows.length,
  };
}

export interface CsvStatements {
  /** Statements in the default graph; the caller picks the target graph */
  quads: RDF.Quad[];
  /** Subjects of the rows read, in row order, without duplicates */
  subjects: RDF.NamedNode[];
  /** Rows and values naming blank nodes, which cannot be matched to the store */
  skipped: number;
}

function unwrap(value: string): string {
  return value.trim().replace(/^<(.*)>$/, '$1').trim();
}

function objectTerm(value: string): RDF.NamedNode | RDF.Literal {
  const match = /^<(.*)>$/.exec(value);
  const iri = match?.[1]?.trim();
  return iri !== undefined && isAbsoluteIri(iri) ? namedNode(iri) : literal(value);
}

/**
 * Read statements back from a table in the layout `quadsToCsv` writes.
 * Subjects and predicates that are not absolute IRIs are kept under an
 * internal namespace.
 *
 * @throws InvalidRequestError when the text is not CSV or lacks the IRI column
 */
export function csvToQuads(text: string): CsvStatements {
  let parsed: unknown;
  try {
    parsed = parse(text, { skip_empty_lines: true, relax_column_count: true, bom: true });
  } catch (err) {
    throw new InvalidRequestError(`Invalid CSV: ${err instanceof Error ? err.message : String(err)}`);
  }
  const [header, ...rows] = rowsSchema.parse(parsed);
  if (!header || header[0]?.trim() !== CSV_SUBJECT_COLUMN) {
    throw new InvalidRequestError(`CSV must start with an '${CSV_SUBJECT_COLUMN}' column`);
  }
  const predicates = header.slice(1).map((column) => {
    const iri = unwrap(column);
    return iri === '' ? undefined : safeNamedNode(iri);
  });

  const quads: RDF.Quad[] = [];
  const subjects = new Map<string, RDF.NamedNode>();
  let skipped = 0;
  for (const row of rows) {
    const raw = unwrap(row[0] ?? '');
    if (raw === '') continue;
    if (raw.startsWith('_:')) {
      skipped++;
      continue;
    }
    const subject = safeNamedNode(raw);
    subjects.set(subject.value, subject);

    predicates.forEach((predicate, index) => {
      const cell = row[index + 1];
      if (!predicate || cell === undefined) return;
      for (const part of cell.split(CSV_VALUE_SEPARATOR)) {
        const value = part.trim();
        if (value === '') continue;
        if (value.startsWith('_:')) {
          skipped++;
          continue;
        }
        quads.push(quad(subject, predicate, objectTerm(value)));
      }
    });
  }
  return { quads, subjects: [...subjects.values()], skipped };
}
