import { z } from 'zod/v4';
import { requestChecksum } from '../utils/hash.js';
import { sleep } from '../utils/sleep.js';
import { errorMessage } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import type { ResponseCache } from '../cache/cache.js';
import type { ArticleLookup, ArticleLookupResult } from '../types/index.js';

const apiErrorSchema = z.object({
  error: z.object({
    code: z.string(),
    info: z.string(),
  }),
});

// [query, titles, descriptions, urls]
const openSearchSchema = z.tuple([z.string(), z.array(z.string()), z.array(z.string()), z.array(z.string())]);

const extractsSchema = z.object({
  query: z
    .object({
      pages: z.record(
        z.string(),
        z.object({
          title: z.string().optional(),
          extract: z.string().optional(),
          missing: z.unknown().optional(),
        }),
      ),
    })
    .optional(),
});

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface WikipediaClientOptions {
  apiUrl?: string;
  articleBaseUrl?: string;
  userAgent?: string;
  cache?: ResponseCache | undefined;
  namespace?: string;
  searchLimit?: number;
  maxRetries?: number;
  retryBackoffMs?: number;
  requestSpacingMs?: number;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
  logger?: Logger | undefined;
}

export const DEFAULT_API_URL = 'https://en.wikipedia.org/w/api.php';
export const DEFAULT_USER_AGENT = 'airline-status-check/0.1.0';
const DEFAULT_ARTICLE_BASE_URL = 'https://en.wikipedia.org/wiki/';

/**
 * Looks airlines up on Wikipedia: an opensearch for the name, then the plain-text
 * introduction of the best hit. Raw responses are cached so a rerun does not refetch.
 */
export class WikipediaClient implements ArticleLookup {
  private readonly apiUrl: string;
  private readonly articleBaseUrl: string;
  private readonly userAgent: string;
  private readonly cache: ResponseCache | undefined;
  private readonly namespace: string;
  private readonly searchLimit: number;
  private readonly maxRetries: number;
  private readonly retryBackoffMs: number;
  private readonly requestSpacingMs: number;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger | undefined;
  private nextRequestAt = 0;

  constructor(options: WikipediaClientOptions = {}) {
    this.apiUrl = options.apiUrl ?? DEFAULT_API_URL;
    this.articleBaseUrl = options.articleBaseUrl ?? DEFAULT_ARTICLE_BASE_URL;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.cache = options.cache;
    this.namespace = options.namespace ?? 'wikipedia';
    this.searchLimit = options.searchLimit ?? 5;
    this.maxRetries = options.maxRetries ?? 3;
    this.retryBackoffMs = options.retryBackoffMs ?? 2000;
    this.requestSpacingMs = options.requestSpacingMs ?? 100;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init));
    this.logger = options.logger;
  }

  async lookup(name: string): Promise<ArticleLookupResult> {
    const search = await this.getJson(
      {
        action: 'opensearch',
        search: name,
        limit: String(this.searchLimit),
        format: 'json',
      },
      openSearchSchema,
      'opensearch',
    );
    const [, titles, , urls] = search;
    const title = titles[0];
    if (!title) {
      this.logger?.(`No article found for "${name}".`);
      return { found: false };
    }

    const extracts = await this.getJson(
      {
        action: 'query',
        titles: title,
        prop: 'extracts',
        exintro: '1',
        explaintext: '1',
        redirects: '1',
        format: 'json',
      },
      extractsSchema,
      'extracts',
    );
    const page = Object.values(extracts.query?.pages ?? {})[0];
    if (!page || page.missing !== undefined) {
      this.logger?.(`Article "${title}" for "${name}" has no page.`);
      return { found: false };
    }

    return {
      found: true,
      title: page.title ?? title,
      url: urls[0] ?? this.articleUrl(title),
      extract: page.extract ?? '',
    };
  }

  articleUrl(title: string): string {
    return `${this.articleBaseUrl}${encodeURIComponent(title.replace(/ /g, '_'))}`;
  }

  // Only bodies that parse and validate are cached; anything else is refetched next time.
  private async getJson<T>(params: Record<string, string>, schema: z.ZodType<T>, label: string): Promise<T> {
    const url = `${this.apiUrl}?${new URLSearchParams(params).toString()}`;
    const key = requestChecksum('GET', url);

    const cached = await this.cache?.read(this.namespace, key);
    if (cached) {
      try {
        return parsePayload(schema, cached.body, label);
      } catch (error) {
        this.logger?.(`Ignoring cached ${label} response: ${errorMessage(error)}`);
      }
    }

    await this.waitForTurn();
    const body = await this.fetchLive(url);
    const payload = parsePayload(schema, body, label);
    await this.cache?.write(this.namespace, {
      key,
      body,
      metadata: { url },
    });
    return payload;
  }

  // Reserves the next request slot up front so concurrent lookups stay spaced.
  private async waitForTurn(): Promise<void> {
    if (this.requestSpacingMs <= 0) {
      return;
    }
    const now = Date.now();
    const waitMs = this.nextRequestAt - now;
    this.nextRequestAt = Math.max(now, this.nextRequestAt) + this.requestSpacingMs;
    if (waitMs > 0) {
      await sleep(waitMs);
    }
  }

  private async fetchLive(url: string): Promise<string> {
    for (let attempt = 0; attempt < this.maxRetries; attempt += 1) {
      const response = await this.fetchImpl(url, {
        headers: {
          'User-Agent': this.userAgent,
          Accept: 'application/json',
        },
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (response.status === 429) {
        const waitMs = retryAfterMs(response.headers.get('retry-after')) ?? this.retryBackoffMs * (attempt + 1);
        this.logger?.(`Hit Wikipedia rate limit (429). Waiting ${Math.round(waitMs / 1000)}s before retry #${attempt + 1}.`);
        await sleep(waitMs);
        continue;
      }

      if (!response.ok) {
        if (attempt < this.maxRetries - 1) {
          const waitMs = this.retryBackoffMs * (attempt + 1);
          this.logger?.(`Request failed with status ${response.status}. Retrying in ${waitMs}ms.`);
          await sleep(waitMs);
          continue;
        }

        throw new Error(`Wikipedia API request failed with status ${response.status}`);
      }

      return response.text();
    }

    throw new Error('Exceeded retry budget for Wikipedia API request.');
  }
}

function parsePayload<T>(schema: z.ZodType<T>, body: string, label: string): T {
  let payload: unknown;
  try {
    payload = JSON.parse(body);
  } catch (error) {
    throw new Error(`Unreadable Wikipedia ${label} response: ${errorMessage(error)}`);
  }

  const apiError = apiErrorSchema.safeParse(payload);
  if (apiError.success) {
    throw new Error(`Wikipedia API returned error ${apiError.data.error.code}: ${apiError.data.error.info}`);
  }

  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    throw new Error(`Unexpected Wikipedia ${label} payload: ${parsed.error.message}`);
  }
  return parsed.data;
}

function retryAfterMs(header: string | null): number | undefined {
  if (header === null || header.trim() === '') {
    return undefined;
  }
  const seconds = Number(header);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
}
