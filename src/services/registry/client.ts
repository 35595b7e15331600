/**
 * Registry Pagination Client
 *
 * Drives paged retrieval against the trial registry's studies endpoint,
 * following continuation tokens until they run out or the page cap is hit.
 * One instance owns its request context (base URL, headers, timeout) for its
 * whole lifetime.
 *
 * @module registry/client
 */

import { z } from 'zod';
import { type RawStudyDocument, isJsonObject } from '../../models/study.js';
import { sleep as defaultSleep } from '../../utils/time.js';
import { RegistryAPIError, bodySnippet } from '../api-errors.js';

export const DEFAULT_REGISTRY_BASE_URL = 'https://clinicaltrials.gov/api/v2';
export const DEFAULT_PAGE_SIZE = 200;

/** Header some deployments use instead of the body token */
export const NEXT_PAGE_TOKEN_HEADER = 'x-next-page-token';

export type QueryParams = Record<string, string | number | boolean>;

export interface RegistryClientConfig {
  baseUrl?: string;
  /** Delay between consecutive page requests */
  sleepSeconds?: number;
  timeoutSeconds?: number;
  userAgent?: string;
  fetch?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
}

export interface IterStudiesOptions {
  pageSize?: number;
  /** Hard cap on page requests; undefined means no cap */
  maxPages?: number;
}

const StudiesPageSchema = z
  .object({
    studies: z.array(z.unknown()).nullish(),
    nextPageToken: z.string().nullish(),
  })
  .passthrough();

const JsonObjectSchema = z.custom<RawStudyDocument>(isJsonObject, 'Expected a JSON object');

export class RegistryClient {
  private readonly baseUrl: string;
  private readonly sleepMs: number;
  private readonly timeoutMs: number;
  private readonly headers: Record<string, string>;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(config: RegistryClientConfig = {}) {
    this.baseUrl = (config.baseUrl ?? DEFAULT_REGISTRY_BASE_URL).replace(/\/+$/, '');
    this.sleepMs = Math.max(0, (config.sleepSeconds ?? 0.25) * 1000);
    this.timeoutMs = (config.timeoutSeconds ?? 30) * 1000;
    this.headers = {
      Accept: 'application/json',
      'User-Agent': config.userAgent ?? 'trial-watch/0.1',
    };
    this.fetchImpl = config.fetch ?? fetch;
    this.sleep = config.sleep ?? defaultSleep;
  }

  private buildUrl(path: string, params?: QueryParams): string {
    const url = `${this.baseUrl}/${path.replace(/^\/+/, '')}`;
    if (!params || Object.keys(params).length === 0) return url;
    const search = new URLSearchParams();
    for (const [key, value] of Object.entries(params)) {
      search.set(key, String(value));
    }
    return `${url}?${search.toString()}`;
  }

  private get(path: string, params?: QueryParams): Promise<Response> {
    return this.fetchImpl(this.buildUrl(path, params), {
      method: 'GET',
      headers: this.headers,
      signal: AbortSignal.timeout(this.timeoutMs),
    });
  }

  private async readJson(response: Response, what: string): Promise<unknown> {
    if (response.status !== 200) {
      throw new RegistryAPIError(
        `Registry API error ${response.status} (${what}): ${await bodySnippet(response)}`,
        response.status
      );
    }
    try {
      return await response.json();
    } catch (error) {
      throw new RegistryAPIError(
        `Registry returned invalid JSON (${what}): ${error instanceof Error ? error.message : String(error)}`,
        response.status,
        true
      );
    }
  }

  /**
   * Registry API version metadata
   */
  async version(): Promise<RawStudyDocument> {
    const body = await this.readJson(await this.get('version'), 'version');
    const parsed = JsonObjectSchema.safeParse(body);
    if (!parsed.success) {
      throw new RegistryAPIError('Registry version response is not an object', 200, true);
    }
    return parsed.data;
  }

  /**
   * Fetch a single study by identifier
   *
   * @throws RegistryAPIError on a non-success status
   */
  async getStudy(nctId: string): Promise<RawStudyDocument> {
    const body = await this.readJson(
      await this.get(`studies/${encodeURIComponent(nctId)}`),
      `study ${nctId}`
    );
    const parsed = JsonObjectSchema.safeParse(body);
    if (!parsed.success) {
      throw new RegistryAPIError(`Study ${nctId} response is not an object`, 200, true);
    }
    return parsed.data;
  }

  /**
   * Lazily yield study documents page by page.
   *
   * The next-page token is read from the body first, then from the
   * x-next-page-token header. A missing token ends the sequence normally.
   * Any non-200 page aborts the sequence with RegistryAPIError.
   */
  async *iterStudies(
    params: QueryParams,
    options: IterStudiesOptions = {}
  ): AsyncGenerator<RawStudyDocument, void, undefined> {
    const base: QueryParams = { ...params };
    if (!('format' in base)) base.format = 'json';
    if (!('pageSize' in base)) base.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    delete base.pageToken;

    const maxPages = options.maxPages;
    let pageToken: string | null = null;
    let page = 0;

    while (maxPages === undefined || page < maxPages) {
      page++;
      const query: QueryParams = pageToken === null ? base : { ...base, pageToken };
      const response = await this.get('studies', query);
      const body = await this.readJson(response, `studies page ${page}`);

      const parsed = StudiesPageSchema.safeParse(body);
      if (!parsed.success) {
        throw new RegistryAPIError(
          `Registry studies page ${page} has an unexpected shape: ${parsed.error.message}`,
          response.status,
          true
        );
      }

      const studies = (parsed.data.studies ?? []).filter(isJsonObject);
      console.error(`[Registry] page ${page}: ${studies.length} studies`);
      for (const study of studies) {
        yield study;
      }

      pageToken = parsed.data.nextPageToken || response.headers.get(NEXT_PAGE_TOKEN_HEADER) || null;
      if (pageToken === null) return;
      if (maxPages !== undefined && page >= maxPages) return;

      if (this.sleepMs > 0) {
        await this.sleep(this.sleepMs);
      }
    }
  }
}
