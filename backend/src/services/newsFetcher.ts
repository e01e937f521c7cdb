import * as cheerio from 'cheerio';
import { httpRequest, type HttpClient } from '../lib/fetcher.js';
import { ProviderError, errorMessage } from '../lib/errors.js';
import { silentLogger, type Logger } from '../lib/logger.js';
import { collapseWhitespace } from '../lib/text.js';
import type { Article, FetchResult, NewsCategory, SourceFailure } from '../types/news.js';
import { RSS_FEEDS, feedCategoryForNews, feedCategoryForTopic } from './feeds.js';
import type { NewsApiClient } from './newsapi.js';
import type { RssClient } from './rss.js';

export interface ArticleSource {
  fetchByTopic(topic: string, daysBack: number, language?: string): Promise<FetchResult>;
  fetchTrending(country: string, category?: NewsCategory): Promise<FetchResult>;
  fetchFromUrl(url: string): Promise<Article>;
}

export interface NewsFetcherDeps {
  newsapi: NewsApiClient;
  rss: RssClient;
  http?: HttpClient;
  logger?: Logger;
  defaultLanguage?: string;
  maxArticlesPerTopic?: number;
  timeoutMs?: number;
}

/** `source: message`, without repeating a prefix the message already carries. */
export function failureText(f: SourceFailure): string {
  return f.message.startsWith(`${f.source}: `) ? f.message : `${f.source}: ${f.message}`;
}

export function isRelevant(article: Article, topic: string): boolean {
  const t = topic.toLowerCase();
  return article.title.toLowerCase().includes(t) || article.body.toLowerCase().includes(t);
}

export function extractArticle(html: string, url: string): Article {
  const $ = cheerio.load(html);
  $('script, style, noscript, nav, footer, header, aside, form').remove();

  const title = collapseWhitespace(
    $('meta[property="og:title"]').attr('content') || $('title').first().text() || $('h1').first().text()
  );
  const main = $('article').first().text() || $('main').first().text() || $('body').text();
  const publishedAt = $('meta[property="article:published_time"]').attr('content') ?? '';
  const host = new URL(url).hostname.replace(/^www\./, '');

  return {
    title: title || url,
    url,
    source: host,
    publishedAt: Number.isNaN(Date.parse(publishedAt)) ? '' : new Date(publishedAt).toISOString(),
    body: collapseWhitespace(main),
  };
}

/** NewsAPI first; RSS when the key is missing, the call fails or it finds nothing. */
export class NewsFetcher implements ArticleSource {
  private readonly http: HttpClient;
  private readonly logger: Logger;

  constructor(private readonly deps: NewsFetcherDeps) {
    this.http = deps.http ?? httpRequest;
    this.logger = deps.logger ?? silentLogger;
  }

  async fetchByTopic(topic: string, daysBack: number, language = this.deps.defaultLanguage ?? 'en'): Promise<FetchResult> {
    const failures: SourceFailure[] = [];

    if (this.deps.newsapi.configured) {
      try {
        const articles = await this.deps.newsapi.everything(topic, daysBack, language);
        this.logger.info(`Fetched ${articles.length} articles from NewsAPI for "${topic}"`);
        if (articles.length) return { articles: this.cap(articles), failures };
      } catch (e) {
        this.logger.error(`Error fetching from NewsAPI: ${errorMessage(e)}`);
        failures.push({ source: 'newsapi', message: errorMessage(e) });
      }
    } else {
      this.logger.debug('NewsAPI key not configured; using RSS feeds');
    }

    const category = feedCategoryForTopic(topic);
    const rss = await this.deps.rss.fetchFeeds(RSS_FEEDS[category], a => isRelevant(a, topic));
    this.logger.info(`Fetched ${rss.articles.length} articles from ${category} RSS feeds for "${topic}"`);
    return { articles: this.cap(rss.articles), failures: [...failures, ...rss.failures] };
  }

  async fetchTrending(country: string, category?: NewsCategory): Promise<FetchResult> {
    const failures: SourceFailure[] = [];

    if (this.deps.newsapi.configured) {
      try {
        const articles = await this.deps.newsapi.topHeadlines(country, category);
        this.logger.info(`Fetched ${articles.length} trending articles from NewsAPI (${country})`);
        if (articles.length) return { articles: this.cap(articles), failures };
      } catch (e) {
        this.logger.error(`Error fetching trending from NewsAPI: ${errorMessage(e)}`);
        failures.push({ source: 'newsapi', message: errorMessage(e) });
      }
    } else {
      this.logger.warn('NewsAPI key not configured; trending falls back to RSS headlines');
    }

    const rss = await this.deps.rss.fetchFeeds(RSS_FEEDS[feedCategoryForNews(category)]);
    return { articles: this.cap(rss.articles), failures: [...failures, ...rss.failures] };
  }

  async fetchFromUrl(url: string): Promise<Article> {
    let target: URL;
    try {
      target = new URL(url);
    } catch {
      throw new ProviderError('url', `not a valid URL: ${url}`);
    }
    try {
      const res = await this.http(target.toString(), {
        headers: { 'user-agent': 'news-agent/1.0', accept: 'text/html,application/xhtml+xml' },
      }, { timeoutMs: this.deps.timeoutMs });
      return extractArticle(await res.text(), target.toString());
    } catch (e) {
      throw new ProviderError('url', errorMessage(e), { cause: e });
    }
  }

  private cap(articles: Article[]): Article[] {
    const max = this.deps.maxArticlesPerTopic;
    return max && articles.length > max ? articles.slice(0, max) : articles;
  }
}
