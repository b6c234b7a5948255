import { describe, it, expect } from 'vitest';
import { MappingRuleError } from '../types/errors.js';
import { expandTerm, isFieldAllowed, resolveRuleSet, type RuleResolutionInput } from './RuleResolver.js';
import { resolveLanguage } from './languages.js';

const VOCAB = 'http://ex/#';

function input(partial: Partial<RuleResolutionInput> = {}): RuleResolutionInput {
  return {
    vocab: VOCAB,
    defaults: {},
    mode: 'override',
    knowledgeBase: { enabled: false, namespace: 'https://example.org/kb', fuzzy: 90 },
    ...partial,
  };
}

describe('expandTerm', () => {
  it('expands bare tokens against the vocabulary', () => {
    expect(expandTerm('Item', VOCAB, 'item_type')).toBe('http://ex/#Item');
  });

  it('keeps tokens that already carry a scheme', () => {
    expect(expandTerm(' http://purl.org/dc/terms/title ', VOCAB, 'x')).toBe('http://purl.org/dc/terms/title');
  });

  it('rejects empty and invalid terms', () => {
    expect(() => expandTerm('  ', VOCAB, 'x')).toThrow(MappingRuleError);
    expect(() => expandTerm('has space', VOCAB, 'named_library')).toThrow(
      "Invalid mapping rule 'named_library': 'http://ex/#has space' is not a valid IRI",
    );
  });
});

describe('resolveRuleSet', () => {
  it('overrides default lists unless the library list is empty', () => {
    const rules = resolveRuleSet(input({
      defaults: { black: ['version', 'relations'], itemType: ['_Item'] },
      overrides: { black: ['dateAdded'], itemType: [] },
    }));
    expect([...rules.deny]).toEqual(['dateAdded']);
    expect(rules.itemType).toEqual([{ kind: 'constant', iri: 'http://ex/#Item' }]);
  });

  it('merges per field and removes duplicates', () => {
    const rules = resolveRuleSet(input({
      defaults: { black: ['version', 'relations'], white: ['title'] },
      overrides: { black: ['relations', 'dateAdded'], white: ['date'] },
      merge: { black: 'merge' },
    }));
    expect([...rules.deny]).toEqual(['version', 'relations', 'dateAdded']);
    expect(rules.allow && [...rules.allow]).toEqual(['date']);
  });

  it('splits type rules into constants and fields', () => {
    const rules = resolveRuleSet(input({ defaults: { itemType: ['_Item', 'itemType', '_http://schema.org/Book'] } }));
    expect(rules.itemType).toEqual([
      { kind: 'constant', iri: 'http://ex/#Item' },
      { kind: 'field', field: 'itemType' },
      { kind: 'constant', iri: 'http://schema.org/Book' },
    ]);
  });

  it('folds vocabulary IRIs in field lists back to local names', () => {
    const rules = resolveRuleSet(input({ defaults: { black: ['http://ex/#abstractNote'], rdfMapping: ['creators'] } }));
    expect(rules.deny.has('abstractNote')).toBe(true);
    expect([...rules.structured]).toEqual(['creators']);
  });

  it('uses the default structured fields when none are configured', () => {
    const rules = resolveRuleSet(input());
    expect([...rules.structured]).toEqual([
      'creators',
      'tags',
      'collections',
      'parentItem',
      'parentCollection',
      'place',
      'publisher',
      'series',
    ]);
    expect(rules.allow).toBeUndefined();
    expect(rules.itemLabel).toBe(false);
  });

  it('resolves additional triples and the library back-link', () => {
    const rules = resolveRuleSet(input({
      defaults: {
        namedLibrary: 'inLibrary',
        additional: [{ property: 'seeAlso', value: 'url', namedNode: true }],
      },
      overrides: {
        additional: [{ property: 'http://purl.org/dc/terms/source', value: '_catalogue', namedNode: false }],
      },
      merge: { additional: 'merge' },
    }));
    expect(rules.namedLibrary).toBe('http://ex/#inLibrary');
    expect(rules.additional).toEqual([
      { predicate: 'http://ex/#seeAlso', source: { kind: 'field', field: 'url' }, namedNode: true },
      { predicate: 'http://purl.org/dc/terms/source', source: { kind: 'constant', value: 'catalogue' }, namedNode: false },
    ]);
  });

  it('rejects an invalid vocabulary, threshold or named-node prefix', () => {
    expect(() => resolveRuleSet(input({ vocab: 'not an iri' }))).toThrow(MappingRuleError);
    expect(() => resolveRuleSet(input({
      knowledgeBase: { enabled: true, namespace: 'https://example.org/kb', fuzzy: 101 },
    }))).toThrow("Invalid mapping rule 'fuzzy': fuzzy threshold must be between 0 and 100");
    expect(() => resolveRuleSet(input({
      defaults: { additional: [{ property: 'seeAlso', value: 'doi', namedNode: true, prefix: 'doi.org/' }] },
    }))).toThrow("Invalid mapping rule 'additional[0].prefix'");
  });
});

describe('isFieldAllowed', () => {
  it('consults only the allow-list when one is present', () => {
    const rules = resolveRuleSet(input({ defaults: { white: ['title'], black: ['title', 'date'] } }));
    expect(isFieldAllowed(rules, 'title')).toBe(true);
    expect(isFieldAllowed(rules, 'creators')).toBe(true);
    expect(isFieldAllowed(rules, 'date')).toBe(false);
    expect(isFieldAllowed(rules, 'url')).toBe(false);
  });

  it('falls back to the deny-list', () => {
    const rules = resolveRuleSet(input({ defaults: { black: ['version'] } }));
    expect(isFieldAllowed(rules, 'version')).toBe(false);
    expect(isFieldAllowed(rules, 'title')).toBe(true);
  });
});

describe('resolveLanguage', () => {
  const rules = resolveRuleSet(input());

  it('maps names, codes and regional tags', () => {
    expect(resolveLanguage('English', rules.languageMap)).toBe('en');
    expect(resolveLanguage('deu', rules.languageMap)).toBe('de');
    expect(resolveLanguage('en-GB', rules.languageMap)).toBe('en');
  });

  it('falls back for unknown languages', () => {
    expect(resolveLanguage('Klingon', rules.languageMap)).toBe(rules.languageMap.fallback);
  });
});
