import { describe, it, expect, vi } from 'vitest';
import { FetchFailureError } from '../types/errors.js';
import { ZoteroApiClient, type FetchLike, type LibraryLocator } from './ZoteroApiClient.js';

const library: LibraryLocator = { libraryType: 'groups', libraryId: '123', apiKey: 'test-secret' };

function json(body: unknown, headers: Record<string, string> = {}, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json', ...headers } });
}

function client(fetch: FetchLike, sleeps: number[] = []): ZoteroApiClient {
  return new ZoteroApiClient({
    apiUrl: 'https://api.example.org',
    fetch,
    pageSize: 2,
    maxRetries: 2,
    backoffMs: 10,
    sleep: async (ms) => {
      sleeps.push(ms);
    },
  });
}

describe('ZoteroApiClient', () => {
  it('builds page URLs with query parameters', () => {
    const api = client(vi.fn<FetchLike>());
    expect(api.pageUrl(library, 'items', 'json', 4, { since: '5' })).toBe(
      'https://api.example.org/groups/123/items?since=5&format=json&limit=2&start=4',
    );
  });

  it('pages until Total-Results is reached', async () => {
    const fetch = vi.fn<FetchLike>()
      .mockResolvedValueOnce(json([{ key: 'A' }, { key: 'B' }], { 'Total-Results': '3' }))
      .mockResolvedValueOnce(json([{ key: 'C' }], { 'Total-Results': '3' }));

    const records = await client(fetch).fetchJsonPages(library, 'items');
    expect(records).toEqual([{ key: 'A' }, { key: 'B' }, { key: 'C' }]);
    expect(fetch).toHaveBeenCalledTimes(2);
    expect(fetch.mock.calls[1]?.[0]).toBe('https://api.example.org/groups/123/items?format=json&limit=2&start=2');
    expect(fetch.mock.calls[0]?.[1]?.headers).toEqual({ 'Zotero-API-Version': '3', 'Zotero-API-Key': 'test-secret' });
  });

  it('stops at an empty page without Total-Results', async () => {
    const fetch = vi.fn<FetchLike>()
      .mockResolvedValueOnce(json([{ key: 'A' }, { key: 'B' }]))
      .mockResolvedValueOnce(json([]));
    const records = await client(fetch).fetchJsonPages(library, 'collections');
    expect(records).toHaveLength(2);
    expect(fetch).toHaveBeenCalledTimes(2);
  });

  it('retries rate limiting with the server hint', async () => {
    const sleeps: number[] = [];
    const fetch = vi.fn<FetchLike>()
      .mockResolvedValueOnce(json({}, { 'Retry-After': '2' }, 429))
      .mockResolvedValueOnce(json([], { 'Total-Results': '0' }));
    await client(fetch, sleeps).fetchJsonPages(library, 'items');
    expect(sleeps).toEqual([2000]);
  });

  it('gives up after the retry budget', async () => {
    const sleeps: number[] = [];
    const fetch = vi.fn<FetchLike>().mockImplementation(async () => json({}, {}, 500));
    await expect(client(fetch, sleeps).getJson('https://api.example.org/schema')).rejects.toThrow(
      'GET https://api.example.org/schema failed (UPSTREAM_ERROR): HTTP 500',
    );
    expect(fetch).toHaveBeenCalledTimes(3);
    expect(sleeps).toEqual([10, 20]);
  });

  it('does not retry terminal failures', async () => {
    const fetch = vi.fn<FetchLike>().mockResolvedValue(json({}, {}, 403));
    const error = await client(fetch).getJson('https://api.example.org/schema').catch((err: unknown) => err);
    expect(error).toBeInstanceOf(FetchFailureError);
    expect(error).toMatchObject({ status: 403, code: 'FETCH_FAILURE' });
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it('retries network errors', async () => {
    const fetch = vi.fn<FetchLike>()
      .mockRejectedValueOnce(new Error('socket hang up'))
      .mockResolvedValueOnce(json({ ok: true }));
    expect(await client(fetch).getJson('https://api.example.org/schema')).toEqual({ ok: true });
  });

  it('reads text pages until a page is short', async () => {
    const fetch = vi.fn<FetchLike>()
      .mockResolvedValueOnce(new Response('page one'))
      .mockResolvedValueOnce(new Response('page two'));
    const seen: string[] = [];
    const pages = await client(fetch).fetchTextPages(library, 'items', 'rdf_zotero', async (text) => {
      seen.push(text);
      return seen.length === 1 ? 2 : 0;
    });
    expect(pages).toBe(2);
    expect(seen).toEqual(['page one', 'page two']);
  });
});
