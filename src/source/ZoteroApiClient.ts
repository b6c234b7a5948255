/**
 * ZoteroApiClient — paginated access to the library-hosting web API.
 *
 * Pages are requested with `limit` and `start`; paging stops once
 * `Total-Results` is reached or, without that header, at the first empty
 * page. Rate limiting (429) and server errors (5xx) are retried with
 * backoff, honouring `Retry-After`/`Backoff`.
 */

import { setTimeout as delay } from 'node:timers/promises';
import { logger as rootLogger, type Logger } from '../logging/logger.js';
import { FetchFailureError, errorMessage } from '../types/errors.js';
import { classifyFetchFailure, retryDelayMs } from './RetryPolicy.js';

export const PAGE_SIZE = 100;
export const MAX_RETRIES = 5;

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface ZoteroApiClientOptions {
  /** API base URL, e.g. https://api.zotero.org/ */
  apiUrl: string;
  fetch?: FetchLike;
  pageSize?: number;
  maxRetries?: number;
  /** Base for exponential backoff */
  backoffMs?: number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  logger?: Logger;
}

/**
 * Which remote library to read.
 */
export interface LibraryLocator {
  libraryType: 'groups' | 'user';
  libraryId: string;
  apiKey?: string | undefined;
}

export type LibraryResource = 'items' | 'collections';

function defaultSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return delay(ms, undefined, signal ? { signal } : {});
}

export class ZoteroApiClient {
  private readonly apiUrl: string;
  private readonly fetchImpl: FetchLike;
  private readonly pageSize: number;
  private readonly maxRetries: number;
  private readonly backoffMs: number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly logger: Logger;

  constructor(options: ZoteroApiClientOptions) {
    this.apiUrl = options.apiUrl.endsWith('/') ? options.apiUrl : `${options.apiUrl}/`;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.pageSize = options.pageSize ?? PAGE_SIZE;
    this.maxRetries = options.maxRetries ?? MAX_RETRIES;
    this.backoffMs = options.backoffMs ?? 1000;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = (options.logger ?? rootLogger).child({ component: 'api-client' });
  }

  /**
   * URL of one page of a library resource.
   */
  pageUrl(
    library: LibraryLocator,
    resource: LibraryResource,
    format: string,
    start: number,
    params: Record<string, string> = {},
  ): string {
    const url = new URL(`${library.libraryType}/${encodeURIComponent(library.libraryId)}/${resource}`, this.apiUrl);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    url.searchParams.set('format', format);
    url.searchParams.set('limit', String(this.pageSize));
    url.searchParams.set('start', String(start));
    return url.toString();
  }

  /**
   * GET with retries for transient failures.
   *
   * @throws FetchFailureError once retries are exhausted or on a terminal status
   */
  async request(url: string, signal?: AbortSignal, apiKey?: string): Promise<Response> {
    const headers: Record<string, string> = { 'Zotero-API-Version': '3' };
    if (apiKey) headers['Zotero-API-Key'] = apiKey;

    for (let attempt = 0; ; attempt++) {
      let response: Response | undefined;
      let networkError: unknown;
      try {
        response = await this.fetchImpl(url, { headers, ...(signal ? { signal } : {}) });
      } catch (err) {
        if (signal?.aborted) throw err;
        networkError = err;
      }

      if (response?.ok) return response;

      const policy = classifyFetchFailure({
        ...(response ? { status: response.status } : {}),
        ...(networkError !== undefined ? { networkError } : {}),
      });
      const detail = response ? `HTTP ${response.status}` : errorMessage(networkError);

      if (!policy.retryRecommended || attempt >= this.maxRetries) {
        throw new FetchFailureError(
          `GET ${url} failed (${policy.failureCode}): ${detail}`,
          url,
          response?.status,
          networkError !== undefined ? { cause: networkError } : undefined,
        );
      }

      const wait = retryDelayMs(attempt, this.backoffMs, response?.headers);
      this.logger.warn({ url, attempt: attempt + 1, wait, reason: policy.reason }, 'Retrying request');
      await this.sleep(wait, signal);
    }
  }

  /**
   * All JSON records of a library resource.
   */
  async fetchJsonPages(
    library: LibraryLocator,
    resource: LibraryResource,
    params: Record<string, string> = {},
    signal?: AbortSignal,
  ): Promise<unknown[]> {
    const records: unknown[] = [];
    let start = 0;
    for (;;) {
      const url = this.pageUrl(library, resource, 'json', start, params);
      const response = await this.request(url, signal, library.apiKey);
      const body: unknown = await response.json();
      if (!Array.isArray(body)) {
        throw new FetchFailureError('Expected a JSON array page', url, response.status);
      }
      records.push(...body);
      start += body.length;

      const total = Number.parseInt(response.headers.get('total-results') ?? '', 10);
      if (body.length === 0 || (Number.isFinite(total) && start >= total)) break;
    }
    this.logger.debug({ resource, library: library.libraryId, count: records.length }, 'Fetched JSON pages');
    return records;
  }

  /**
   * Walk text pages (e.g. RDF exports). `onPage` returns how many records
   * the page held; an empty page ends the walk.
   *
   * @returns Number of pages read
   */
  async fetchTextPages(
    library: LibraryLocator,
    resource: LibraryResource,
    format: string,
    onPage: (text: string) => Promise<number>,
    params: Record<string, string> = {},
    signal?: AbortSignal,
  ): Promise<number> {
    let start = 0;
    let pages = 0;
    for (;;) {
      const url = this.pageUrl(library, resource, format, start, params);
      const response = await this.request(url, signal, library.apiKey);
      const text = await response.text();
      const count = text.trim() === '' ? 0 : await onPage(text);
      pages++;
      start += this.pageSize;

      const total = Number.parseInt(response.headers.get('total-results') ?? '', 10);
      if (count === 0 || (Number.isFinite(total) && start >= total)) break;
    }
    return pages;
  }

  /**
   * A single JSON document, e.g. the API schema.
   */
  async getJson(url: string, signal?: AbortSignal): Promise<unknown> {
    const response = await this.request(url, signal);
    return response.json();
  }
}
