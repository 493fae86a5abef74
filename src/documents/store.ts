/**
 * Document store client
 *
 * Records are durable once the store accepts them; the cache is only an
 * accelerator in front of it.
 */

import * as core from '@actions/core';
import {EventRecord, isPlainObject} from '../records';

export const DEFAULT_DOCUMENT_STORE_TIMEOUT_MS = 30000;

export interface SearchResult {
  /** `_source` of each hit */
  hits: Array<Record<string, unknown>>;
  total: number;
  maxScore: number | null;
}

export interface DocumentStore {
  indexRecord(record: EventRecord): Promise<void>;
  search(query: string, size?: number): Promise<SearchResult>;
  /** True when the cluster health endpoint answers 200 */
  health(): Promise<boolean>;
}

export interface HttpResponse {
  status: number;
  text(): Promise<string>;
}

export interface HttpRequest {
  method: 'GET' | 'POST';
  headers: Record<string, string>;
  body?: string;
  signal: AbortSignal;
}

export type HttpTransport = (
  url: string,
  request: HttpRequest
) => Promise<HttpResponse>;

export interface HttpDocumentStoreOptions {
  endpoint: string;
  index: string;
  token?: string;
  timeoutMs?: number;
  transport?: HttpTransport;
}

const fetchTransport: HttpTransport = (url, request) => fetch(url, request);

function readTotal(total: unknown): number {
  if (typeof total === 'number') {
    return total;
  }
  if (typeof total === 'object' && total !== null && 'value' in total) {
    return typeof total.value === 'number' ? total.value : 0;
  }
  return 0;
}

function readSources(hits: unknown): Array<Record<string, unknown>> {
  if (!Array.isArray(hits)) {
    return [];
  }

  const items: unknown[] = hits;
  const sources: Array<Record<string, unknown>> = [];
  for (const hit of items) {
    if (isPlainObject(hit) && isPlainObject(hit._source)) {
      sources.push(hit._source);
    }
  }
  return sources;
}

/**
 * Search-engine style document store: `POST /<index>/_doc`,
 * `POST /<index>/_search` with a `query_string` query, and
 * `GET /_cluster/health`. Every request is aborted after `timeoutMs`.
 */
export class HttpDocumentStore implements DocumentStore {
  private readonly rootUrl: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly transport: HttpTransport;

  constructor(private readonly options: HttpDocumentStoreOptions) {
    this.rootUrl = options.endpoint.replace(/\/+$/, '');
    this.baseUrl = `${this.rootUrl}/${options.index}`;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_DOCUMENT_STORE_TIMEOUT_MS;
    this.transport = options.transport ?? fetchTransport;
  }

  async indexRecord(record: EventRecord): Promise<void> {
    const response = await this.send(
      'POST',
      `${this.baseUrl}/_doc`,
      JSON.stringify(record)
    );

    if (response.status !== 200 && response.status !== 201) {
      const body = await response.text();
      throw new Error(`Failed to index record: ${response.status} - ${body}`);
    }
    core.debug(`[documents] Indexed record ${record.id}`);
  }

  async search(query: string, size = 10): Promise<SearchResult> {
    const body = JSON.stringify({
      query: {query_string: {query: query || '*'}},
      size,
    });
    const response = await this.send('POST', `${this.baseUrl}/_search`, body);
    const text = await response.text();

    if (response.status !== 200) {
      throw new Error(`Search failed: ${response.status} - ${text}`);
    }

    const result: unknown = JSON.parse(text);
    const hits = isPlainObject(result) ? result.hits : undefined;

    if (!isPlainObject(hits)) {
      return {hits: [], total: 0, maxScore: null};
    }

    return {
      hits: readSources(hits.hits),
      total: readTotal(hits.total),
      maxScore: typeof hits.max_score === 'number' ? hits.max_score : null,
    };
  }

  async health(): Promise<boolean> {
    const response = await this.send('GET', `${this.rootUrl}/_cluster/health`);
    if (response.status !== 200) {
      core.debug(`[documents] Cluster health answered ${response.status}`);
      return false;
    }
    return true;
  }

  private async send(
    method: HttpRequest['method'],
    url: string,
    body?: string
  ): Promise<HttpResponse> {
    const headers: Record<string, string> = {};
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }
    if (this.options.token) {
      headers.Authorization = `Bearer ${this.options.token}`;
    }

    core.debug(`[documents] ${method} ${url}`);
    const signal = AbortSignal.timeout(this.timeoutMs);
    try {
      return await this.transport(url, {method, headers, body, signal});
    } catch (error) {
      if (signal.aborted) {
        throw new Error(
          `Document store ${method} ${url} timed out after ${this.timeoutMs}ms`
        );
      }
      throw error;
    }
  }
}
