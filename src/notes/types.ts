import type { ScopedTriple } from '../mapping/types.js';

/**
 * Turns the HTML of a note into triples about the note.
 */
export interface NoteParser {
  parse(html: string, noteIri: string): ScopedTriple[];
}
