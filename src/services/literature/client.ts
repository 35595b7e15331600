/**
 * Literature Linking Client
 *
 * Resolves a registry trial identifier to PubMed citations through the
 * E-utilities search/summary pair. Matching is best-effort: PubMed records
 * registry identifiers in the secondary source ID field, sometimes prefixed
 * with the registry name.
 *
 * @module literature/client
 */

import { z } from 'zod';
import type { Citation } from '../../models/citation.js';
import { sleep as defaultSleep } from '../../utils/time.js';
import { LiteratureAPIError, bodySnippet } from '../api-errors.js';

export const DEFAULT_LITERATURE_BASE_URL = 'https://eutils.ncbi.nlm.nih.gov/entrez/eutils';
export const DEFAULT_RETMAX = 200;

export interface LiteratureClientConfig {
  /** Tool name reported to E-utilities */
  tool: string;
  email?: string;
  apiKey?: string;
  baseUrl?: string;
  /** Delay between consecutive requests from this client */
  sleepSeconds?: number;
  timeoutSeconds?: number;
  fetch?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
}

const SearchResponseSchema = z.object({
  esearchresult: z
    .object({
      idlist: z.array(z.union([z.string(), z.number()])).nullish(),
    })
    .passthrough()
    .nullish(),
});

const ArticleIdSchema = z
  .object({
    idtype: z.string().nullish(),
    value: z.string().nullish(),
  })
  .passthrough();

/** Numbers become strings; any other unexpected type reads as null */
const SummaryField = z
  .union([z.string(), z.number().transform(String)])
  .nullish()
  .catch(null);

const SummaryItemSchema = z
  .object({
    title: SummaryField,
    fulljournalname: SummaryField,
    source: SummaryField,
    pubdate: SummaryField,
    elocationid: SummaryField,
    articleids: z.array(z.unknown()).nullish().catch(null),
  })
  .passthrough();

export type SummaryItem = z.infer<typeof SummaryItemSchema>;

const SummaryResponseSchema = z.object({
  result: z.record(z.unknown()).nullish(),
});

/**
 * Search term matching either the bare identifier or the registry-qualified
 * form in the secondary source ID field
 */
export function buildSearchTerm(nctId: string): string {
  return `("ClinicalTrials.gov/${nctId}"[SI] OR "${nctId}"[SI])`;
}

/**
 * DOI from a summary item. A structured `doi` article id wins over the
 * free-text electronic location.
 */
export function extractDoi(item: SummaryItem): string | null {
  for (const entry of item.articleids ?? []) {
    const parsed = ArticleIdSchema.safeParse(entry);
    if (parsed.success && parsed.data.idtype === 'doi') {
      return parsed.data.value ?? null;
    }
  }
  const eloc = item.elocationid;
  if (eloc && eloc.toLowerCase().includes('doi')) {
    return eloc.replaceAll('doi:', '').trim();
  }
  return null;
}

export class LiteratureClient {
  private readonly baseUrl: string;
  private readonly tool: string;
  private readonly email: string;
  private readonly apiKey: string | undefined;
  private readonly sleepMs: number;
  private readonly timeoutMs: number;
  private readonly headers: Record<string, string>;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;
  private requestCount = 0;

  constructor(config: LiteratureClientConfig) {
    this.baseUrl = (config.baseUrl ?? DEFAULT_LITERATURE_BASE_URL).replace(/\/+$/, '');
    this.tool = config.tool;
    this.email = config.email ?? '';
    this.apiKey = config.apiKey;
    this.sleepMs = Math.max(0, (config.sleepSeconds ?? 0.4) * 1000);
    this.timeoutMs = (config.timeoutSeconds ?? 30) * 1000;
    this.headers = {
      Accept: 'application/json',
      'User-Agent': this.email ? `${this.tool} (mailto:${this.email})` : this.tool,
    };
    this.fetchImpl = config.fetch ?? fetch;
    this.sleep = config.sleep ?? defaultSleep;
  }

  private async get(endpoint: string, params: Record<string, string>): Promise<unknown> {
    if (this.requestCount > 0 && this.sleepMs > 0) {
      await this.sleep(this.sleepMs);
    }
    this.requestCount++;

    const search = new URLSearchParams({ ...params, retmode: 'json', tool: this.tool });
    if (this.email) search.set('email', this.email);
    if (this.apiKey) search.set('api_key', this.apiKey);

    const response = await this.fetchImpl(`${this.baseUrl}/${endpoint}?${search.toString()}`, {
      method: 'GET',
      headers: this.headers,
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (response.status !== 200) {
      throw new LiteratureAPIError(
        `PubMed ${endpoint} error ${response.status}: ${await bodySnippet(response)}`,
        response.status
      );
    }
    try {
      return await response.json();
    } catch (error) {
      throw new LiteratureAPIError(
        `PubMed ${endpoint} returned invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
        response.status,
        true
      );
    }
  }

  /**
   * PMIDs whose secondary source ID names the trial
   */
  async searchPmids(nctId: string, retmax: number = DEFAULT_RETMAX): Promise<string[]> {
    const body = await this.get('esearch.fcgi', {
      db: 'pubmed',
      term: buildSearchTerm(nctId),
      retmax: String(retmax),
    });
    const parsed = SearchResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new LiteratureAPIError(
        `PubMed esearch response has an unexpected shape: ${parsed.error.message}`,
        200,
        true
      );
    }
    return (parsed.data.esearchresult?.idlist ?? []).map((id) => String(id));
  }

  /**
   * Summary records keyed by PMID. An empty id list makes no request.
   */
  async summary(pmids: readonly string[]): Promise<Record<string, unknown>> {
    if (pmids.length === 0) return {};
    const body = await this.get('esummary.fcgi', { db: 'pubmed', id: pmids.join(',') });
    const parsed = SummaryResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new LiteratureAPIError(
        `PubMed esummary response has an unexpected shape: ${parsed.error.message}`,
        200,
        true
      );
    }
    return parsed.data.result ?? {};
  }

  /**
   * Citations for a trial, in search order. PMIDs without a usable summary
   * record are dropped.
   */
  async citationsForTrial(nctId: string, retmax: number = DEFAULT_RETMAX): Promise<Citation[]> {
    const pmids = await this.searchPmids(nctId, retmax);
    if (pmids.length === 0) return [];

    const result = await this.summary(pmids);
    const citations: Citation[] = [];
    for (const pmid of pmids) {
      const parsed = SummaryItemSchema.safeParse(result[pmid]);
      if (!parsed.success) continue;
      const item = parsed.data;
      citations.push({
        pmid,
        title: item.title ?? null,
        source: item.fulljournalname || item.source || null,
        pub_date: item.pubdate ?? null,
        doi: extractDoi(item),
      });
    }
    return citations;
  }
}
