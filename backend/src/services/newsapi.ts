import { z } from 'zod';
import { httpRequest, type HttpClient } from '../lib/fetcher.js';
import { MalformedResponseError, ProviderError, errorMessage } from '../lib/errors.js';
import { collapseWhitespace, stripHtml, yyyyMmDd } from '../lib/text.js';
import type { Article, NewsCategory } from '../types/news.js';

const NEWSAPI_BASE = 'https://newsapi.org/v2';
const PAGE_SIZE = 100; // NewsAPI maximum

const articleSchema = z.object({
  source: z.object({ name: z.string().nullish() }).nullish(),
  title: z.string().nullish(),
  description: z.string().nullish(),
  content: z.string().nullish(),
  url: z.string().nullish(),
  publishedAt: z.string().nullish(),
});

const responseSchema = z.discriminatedUnion('status', [
  z.object({ status: z.literal('ok'), totalResults: z.number().optional(), articles: z.array(articleSchema) }),
  z.object({ status: z.literal('error'), code: z.string().optional(), message: z.string().optional() }),
]);

type NewsApiArticle = z.infer<typeof articleSchema>;

export interface NewsApiOptions {
  apiKey: string;
  http?: HttpClient;
  baseUrl?: string;
  timeoutMs?: number;
  now?: () => Date;
}

export function mapNewsApiArticle(a: NewsApiArticle): Article | null {
  const title = collapseWhitespace(a.title ?? '');
  const url = (a.url ?? '').trim();
  if (!title || !url || title === '[Removed]') return null;
  const content = (a.content ?? '').replace(/\s*…?\s*\[\+\d+ chars\]\s*$/, '');
  return {
    title,
    url,
    source: a.source?.name?.trim() || 'NewsAPI',
    publishedAt: a.publishedAt ?? '',
    body: stripHtml(content || a.description || ''),
  };
}

export class NewsApiClient {
  private readonly http: HttpClient;
  private readonly baseUrl: string;
  private readonly now: () => Date;

  constructor(private readonly opts: NewsApiOptions) {
    this.http = opts.http ?? httpRequest;
    this.baseUrl = (opts.baseUrl ?? NEWSAPI_BASE).replace(/\/+$/, '');
    this.now = opts.now ?? (() => new Date());
  }

  get configured(): boolean {
    return this.opts.apiKey.length > 0;
  }

  everything(topic: string, daysBack: number, language: string): Promise<Article[]> {
    const from = new Date(this.now().getTime() - daysBack * 86_400_000);
    return this.request('/everything', {
      q: topic,
      from: yyyyMmDd(from),
      language,
      sortBy: 'publishedAt',
      pageSize: String(PAGE_SIZE),
    });
  }

  topHeadlines(country: string, category?: NewsCategory): Promise<Article[]> {
    return this.request('/top-headlines', {
      country: country.toLowerCase(),
      ...(category ? { category } : {}),
      pageSize: String(PAGE_SIZE),
    });
  }

  private async request(path: string, params: Record<string, string>): Promise<Article[]> {
    if (!this.configured) throw new ProviderError('newsapi', 'API key not configured');
    const url = new URL(this.baseUrl + path);
    for (const [k, v] of Object.entries(params)) url.searchParams.set(k, v);

    let json: unknown;
    try {
      const res = await this.http(url.toString(), {
        headers: { 'x-api-key': this.opts.apiKey, 'user-agent': 'news-agent/1.0' },
      }, { timeoutMs: this.opts.timeoutMs });
      json = await res.json();
    } catch (e) {
      throw new ProviderError('newsapi', errorMessage(e), { cause: e });
    }

    const parsed = responseSchema.safeParse(json);
    if (!parsed.success) throw new MalformedResponseError('newsapi', parsed.error.issues[0]?.message ?? 'unexpected shape');
    if (parsed.data.status === 'error') {
      throw new ProviderError('newsapi', `${parsed.data.code ?? 'error'}: ${parsed.data.message ?? 'unknown error'}`);
    }
    return parsed.data.articles
      .map(mapNewsApiArticle)
      .filter((a): a is Article => a !== null);
  }
}
