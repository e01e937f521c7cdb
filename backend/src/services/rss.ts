import Parser from 'rss-parser';
import { httpRequest, type HttpClient } from '../lib/fetcher.js';
import { ProviderError, errorMessage } from '../lib/errors.js';
import { silentLogger, type Logger } from '../lib/logger.js';
import { collapseWhitespace, stripHtml } from '../lib/text.js';
import type { Article, FetchResult } from '../types/news.js';
import type { FeedSource } from './feeds.js';

type FeedItem = { contentEncoded?: string };

const parser = new Parser<Record<string, unknown>, FeedItem>({
  customFields: {
    item: [['content:encoded', 'contentEncoded']],
  },
});

export interface RssOptions {
  http?: HttpClient;
  timeoutMs?: number;
  perFeedLimit?: number;
  logger?: Logger;
}

export type ArticlePredicate = (a: Article) => boolean;

export function parseFeedXml(xml: string): ReturnType<typeof parser.parseString> {
  return parser.parseString(xml);
}

export class RssClient {
  private readonly http: HttpClient;
  private readonly perFeedLimit: number;
  private readonly logger: Logger;

  constructor(private readonly opts: RssOptions = {}) {
    this.http = opts.http ?? httpRequest;
    this.perFeedLimit = opts.perFeedLimit ?? 20;
    this.logger = opts.logger ?? silentLogger;
  }

  async fetchFeed(feed: FeedSource): Promise<Article[]> {
    let xml: string;
    try {
      const res = await this.http(feed.url, {
        headers: {
          'user-agent': 'news-agent/1.0',
          accept: 'application/rss+xml, application/atom+xml, application/xml, text/xml, */*',
        },
      }, { timeoutMs: this.opts.timeoutMs });
      xml = await res.text();
    } catch (e) {
      throw new ProviderError('rss', `${feed.name}: ${errorMessage(e)}`, { cause: e });
    }

    let output: Awaited<ReturnType<typeof parseFeedXml>>;
    try {
      output = await parseFeedXml(xml);
    } catch (e) {
      throw new ProviderError('rss', `${feed.name}: unparseable feed (${errorMessage(e)})`, { cause: e });
    }

    const source = collapseWhitespace(output.title ?? '') || feed.name;
    return output.items.slice(0, this.perFeedLimit).flatMap((item): Article[] => {
      const title = collapseWhitespace(item.title ?? '');
      const url = (item.link ?? '').trim();
      if (!title || !url) return [];
      return [{
        title,
        url,
        source,
        publishedAt: item.isoDate ?? '',
        body: stripHtml(item.contentEncoded || item.content || item.summary || ''),
      }];
    });
  }

  /** Sequential; a failing feed is recorded and skipped. */
  async fetchFeeds(feeds: FeedSource[], keep: ArticlePredicate = () => true): Promise<FetchResult> {
    const result: FetchResult = { articles: [], failures: [] };
    for (const feed of feeds) {
      try {
        const items = await this.fetchFeed(feed);
        const kept = items.filter(keep);
        this.logger.debug(`${feed.name}: ${kept.length}/${items.length} entries kept`);
        result.articles.push(...kept);
      } catch (e) {
        this.logger.warn(`Error parsing feed ${feed.url}: ${errorMessage(e)}`);
        result.failures.push({ source: 'rss', message: errorMessage(e) });
      }
    }
    return result;
  }
}
