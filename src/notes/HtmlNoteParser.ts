/**
 * HtmlNoteParser - Extract text, title and links from note HTML
 *
 * Emits, for a note IRI:
 * - `vocab:noteText`: the note as plain text
 * - `vocab:noteTitle`: the first heading, when there is one
 * - `rdfs:seeAlso`: every absolute hyperlink, in document order
 */

import * as cheerio from 'cheerio';
import { RDFS_NS, isAbsoluteIri, literal, namedNode } from '../rdf/terms.js';
import type { ScopedTriple } from '../mapping/types.js';
import type { NoteParser } from './types.js';

const BLOCK_SELECTOR = 'p, div, li, h1, h2, h3, h4, h5, h6, blockquote, pre, tr';

export class HtmlNoteParser implements NoteParser {
  constructor(private readonly vocab: string) {}

  parse(html: string, noteIri: string): ScopedTriple[] {
    const $ = cheerio.load(html);
    const subject = namedNode(noteIri);
    const triples: ScopedTriple[] = [];

    const title = $('h1, h2, h3, h4, h5, h6').first().text().replace(/\s+/g, ' ').trim();

    const links: string[] = [];
    $('a[href]').each((_, el) => {
      const href = $(el).attr('href')?.trim();
      if (href && isAbsoluteIri(href) && !links.includes(href)) links.push(href);
    });

    // keep block boundaries as whitespace
    $('br').replaceWith('\n');
    $(BLOCK_SELECTOR).append('\n');
    $('script, style').remove();
    const text = $.root()
      .text()
      .replace(/[ \t]+/g, ' ')
      .replace(/\s*\n\s*/g, '\n')
      .trim();

    if (text !== '') {
      triples.push({ subject, predicate: namedNode(`${this.vocab}noteText`), object: literal(text), scope: 'content' });
    }
    if (title !== '') {
      triples.push({ subject, predicate: namedNode(`${this.vocab}noteTitle`), object: literal(title), scope: 'content' });
    }
    for (const link of links) {
      triples.push({ subject, predicate: namedNode(`${RDFS_NS}seeAlso`), object: namedNode(link), scope: 'content' });
    }
    return triples;
  }
}
