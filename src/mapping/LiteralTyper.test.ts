import { describe, it, expect } from 'vitest';
import { XSD_NS } from '../rdf/terms.js';
import { parseLanguageMap } from './languages.js';
import { itemLabel, typeValue, type LiteralContext } from './LiteralTyper.js';

const context: LiteralContext = {
  languageMap: parseLanguageMap({ aliases: { en: ['english', 'en'], de: ['german', 'deu'] }, fallback: 'und' }),
};

function describeTerm(term: ReturnType<typeof typeValue>): string | undefined {
  if (!term) return undefined;
  if (term.termType === 'NamedNode') return `<${term.value}>`;
  if (term.language) return `"${term.value}"@${term.language}`;
  return `"${term.value}"^^${term.datatype.value.replace(XSD_NS, 'xsd:')}`;
}

describe('typeValue', () => {
  it('types numbers and booleans', () => {
    expect(describeTerm(typeValue('numPages', 312, context))).toBe('"312"^^xsd:int');
    expect(describeTerm(typeValue('numPages', '312', context))).toBe('"312"^^xsd:int');
    expect(describeTerm(typeValue('citations', 4, context))).toBe('"4"^^xsd:integer');
    expect(describeTerm(typeValue('rating', 4.5, context))).toBe('"4.5"^^xsd:decimal');
    expect(describeTerm(typeValue('archived', true, context))).toBe('"true"^^xsd:boolean');
  });

  it('extracts years from dates', () => {
    expect(describeTerm(typeValue('date', '1999', context))).toBe('"1999"^^xsd:gYear');
    expect(describeTerm(typeValue('date', 'March 3, 2004', context))).toBe('"2004"^^xsd:gYear');
    expect(describeTerm(typeValue('date', 'undated', context))).toBe('"undated"^^xsd:string');
    expect(describeTerm(typeValue('dateAdded', '2024-01-02T03:04:05Z', context))).toBe('"2024-01-02T03:04:05Z"^^xsd:dateTime');
  });

  it('turns links and DOIs into IRIs', () => {
    expect(describeTerm(typeValue('url', 'https://example.org/paper', context))).toBe('<https://example.org/paper>');
    expect(describeTerm(typeValue('doi', '10.1000/xyz', context))).toBe('<https://doi.org/10.1000/xyz>');
    expect(describeTerm(typeValue('url', 'not a link', context))).toBe('"not a link"^^xsd:string');
  });

  it('tags titles with the record language', () => {
    const english = { ...context, language: 'English' };
    expect(describeTerm(typeValue('title', 'Graphs', english))).toBe('"Graphs"@en');
    expect(describeTerm(typeValue('title', 'Graphen', { ...context, language: 'Elvish' }))).toBe('"Graphen"@und');
    expect(describeTerm(typeValue('publisher', 'Press', english))).toBe('"Press"^^xsd:string');
  });

  it('keeps explicit datatypes and languages', () => {
    expect(describeTerm(typeValue('x', { type: 'literal', value: 'v', language: 'de' }, context))).toBe('"v"@de');
    expect(describeTerm(typeValue('x', { type: 'literal', value: '2', datatype: `${XSD_NS}short` }, context))).toBe('"2"^^xsd:short');
  });

  it('produces nothing for blank strings', () => {
    expect(typeValue('title', '   ', context)).toBeUndefined();
  });
});

describe('itemLabel', () => {
  it('combines creator, title and year', () => {
    expect(itemLabel('Lovelace, Ada', 'Notes', '1843-09-01')).toBe('Lovelace, Ada: Notes (1843)');
    expect(itemLabel(undefined, undefined, undefined)).toBe('NO CREATOR: NO TITLE (NO DATE)');
  });
});
