import { describe, it, expect } from 'vitest';
import { IdentityResolver, graphLocalIri, knowledgeBaseIri, roleForField } from './IdentityResolver.js';

const UUID_V5 = /^[0-9a-f]{8}-[0-9a-f]{4}-5[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;
const KB = 'https://example.org/kb';

describe('graphLocalIri', () => {
  it('joins base, role and the encoded key', () => {
    expect(graphLocalIri('http://ex/base/', 'item', 'a b')).toBe('http://ex/base/item/a%20b');
  });
});

describe('knowledgeBaseIri', () => {
  it('mints a UUIDv5 under the role', () => {
    const iri = knowledgeBaseIri(KB, 'tag', 'Important');
    const [prefix, id] = [iri.slice(0, iri.lastIndexOf('/')), iri.slice(iri.lastIndexOf('/') + 1)];
    expect(prefix).toBe('https://example.org/kb/tag');
    expect(id).toMatch(UUID_V5);
  });

  it('depends on the normalised label, the role and the namespace', () => {
    const iri = knowledgeBaseIri(KB, 'tag', 'Important');
    expect(knowledgeBaseIri(KB, 'tag', '  important ')).toBe(iri);
    expect(knowledgeBaseIri(KB, 'creator', 'Important').split('/').pop()).not.toBe(iri.split('/').pop());
    expect(knowledgeBaseIri('https://example.org/other', 'tag', 'Important')).not.toBe(iri);
  });
});

describe('roleForField', () => {
  it('maps structured fields to roles', () => {
    expect(roleForField('tags')).toBe('tag');
    expect(roleForField('parentItem')).toBe('item');
    expect(roleForField('publisher')).toBe('publisher');
  });
});

describe('IdentityResolver', () => {
  const settings = { enabled: true, namespace: KB, fuzzyThreshold: 90 };

  it('keeps records graph-local', () => {
    const resolver = new IdentityResolver({ baseIri: 'http://ex/lib', knowledgeBase: settings });
    expect(resolver.recordIri('item', 'A1')).toBe('http://ex/lib/item/A1');
    expect(resolver.resolve('collection', 'C1')).toBe('http://ex/lib/collection/C1');
  });

  it('gives the same entity the same IRI in every library', () => {
    const first = new IdentityResolver({ baseIri: 'http://ex/one', knowledgeBase: settings });
    const second = new IdentityResolver({ baseIri: 'http://ex/two', knowledgeBase: settings });
    expect(first.resolve('tag', 'Important')).toBe(second.resolve('tag', 'important'));
    expect(first.resolve('tag', 'Important')).toBe(knowledgeBaseIri(KB, 'tag', 'important'));
  });

  it('converges fuzzy matches onto the canonical entity', () => {
    const resolver = new IdentityResolver({ baseIri: 'http://ex/lib', knowledgeBase: settings });
    resolver.prepare(new Map([['tag', ['important.', 'important']]]));
    expect(resolver.resolveEntity('tag', 'important.')).toEqual({
      iri: knowledgeBaseIri(KB, 'tag', 'important'),
      label: 'important',
    });
  });

  it('reuses labels already in the knowledge base', () => {
    const resolver = new IdentityResolver({
      baseIri: 'http://ex/lib',
      knowledgeBase: settings,
      knownLabels: new Map([['creator', ['Lovelace, Ada']]]),
    });
    expect(resolver.resolveEntity('creator', 'Lovelace, Ada.')).toEqual({
      iri: knowledgeBaseIri(KB, 'creator', 'lovelace, ada'),
      label: 'Lovelace, Ada',
    });
  });

  it('mints graph-local entity IRIs when shared entities are off', () => {
    const resolver = new IdentityResolver({
      baseIri: 'http://ex/lib',
      knowledgeBase: { ...settings, enabled: false },
    });
    expect(resolver.sharedEntities).toBe(false);
    expect(resolver.resolveEntity('tag', ' Machine  Learning ')).toEqual({
      iri: 'http://ex/lib/tag/machine%20learning',
      label: 'Machine  Learning',
    });
  });
});
