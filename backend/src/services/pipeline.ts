import { errorMessage } from '../lib/errors.js';
import { silentLogger, type Logger } from '../lib/logger.js';
import type {
  AnalyzedArticle, Article, FetchResult, Insights, Report, ReportFilters, ReportQuery,
} from '../types/news.js';
import { applyFilters, listSources, sentimentBreakdown } from './filters.js';
import { failureText, type ArticleSource } from './newsFetcher.js';
import type { ArticleAnalyzer } from './summarizer.js';

export interface PipelineRequest {
  query: ReportQuery;
  language?: string;
  /** Caps how many fetched articles are sent to the summarizer. */
  limit?: number;
  filters?: ReportFilters;
  insights?: boolean;
}

export interface RunOptions {
  signal?: AbortSignal;
  onProgress?: (done: number, total: number, article: Article) => void;
}

export interface FetchOutcome {
  articles: Article[];
  warnings: string[];
}

export interface AnalysisBatch {
  analyzed: AnalyzedArticle[];
  skipped: number;
  interrupted: boolean;
}

export interface PipelineDeps {
  fetcher: ArticleSource;
  summarizer: ArticleAnalyzer;
  logger?: Logger;
  now?: () => Date;
}

/** First occurrence of each URL wins; articles without a URL are dropped. */
export function dedupeByUrl(articles: Article[]): Article[] {
  const seen = new Set<string>();
  return articles.filter(a => {
    if (!a.url || seen.has(a.url)) return false;
    seen.add(a.url);
    return true;
  });
}

function warningsOf(result: FetchResult): string[] {
  return result.failures.map(failureText);
}

export class NewsPipeline {
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(private readonly deps: PipelineDeps) {
    this.logger = deps.logger ?? silentLogger;
    this.now = deps.now ?? (() => new Date());
  }

  async fetchNews(topics: string[], daysBack: number, language?: string): Promise<FetchOutcome> {
    this.logger.info(`Fetching news for topics: ${topics.join(', ')}`);
    const all: Article[] = [];
    const warnings: string[] = [];
    for (const topic of topics) {
      const result = await this.deps.fetcher.fetchByTopic(topic, daysBack, language);
      this.logger.info(`Found ${result.articles.length} articles for topic: ${topic}`);
      all.push(...result.articles);
      warnings.push(...warningsOf(result));
    }
    const articles = dedupeByUrl(all);
    this.logger.info(`Total unique articles: ${articles.length}`);
    return { articles, warnings };
  }

  async fetchForQuery(query: ReportQuery, language?: string): Promise<FetchOutcome> {
    switch (query.mode) {
      case 'topics':
        return this.fetchNews(query.topics, query.daysBack, language);
      case 'trending': {
        this.logger.info(`Fetching trending news for ${query.country}${query.category ? ` (${query.category})` : ''}`);
        const result = await this.deps.fetcher.fetchTrending(query.country, query.category);
        return { articles: dedupeByUrl(result.articles), warnings: warningsOf(result) };
      }
      case 'url':
        try {
          return { articles: [await this.deps.fetcher.fetchFromUrl(query.url)], warnings: [] };
        } catch (e) {
          this.logger.error(`Error fetching from URL: ${errorMessage(e)}`);
          return { articles: [], warnings: [errorMessage(e)] };
        }
    }
  }

  /** One article at a time; a failed analysis skips that article only. */
  async analyzeArticles(articles: Article[], opts: RunOptions = {}): Promise<AnalysisBatch> {
    this.logger.info(`Processing ${articles.length} articles...`);
    const analyzed: AnalyzedArticle[] = [];
    let skipped = 0;
    for (const [i, article] of articles.entries()) {
      if (opts.signal?.aborted) {
        this.logger.warn(`Interrupted after ${i} of ${articles.length} articles`);
        return { analyzed, skipped, interrupted: true };
      }
      this.logger.info(`Processing article ${i + 1}/${articles.length}: ${article.title || 'Untitled'}`);
      try {
        const analysis = await this.deps.summarizer.analyze(article);
        analyzed.push({ ...article, analysis, processedAt: this.now().toISOString() });
      } catch (e) {
        skipped += 1;
        this.logger.error(`Error processing article: ${errorMessage(e)}`);
      }
      opts.onProgress?.(i + 1, articles.length, article);
    }
    this.logger.info(`Successfully processed ${analyzed.length} articles`);
    return { analyzed, skipped, interrupted: false };
  }

  async buildInsights(articles: AnalyzedArticle[]): Promise<Insights> {
    const overview = await this.deps.summarizer.overview(articles.map(a => a.title));
    return { overview, sentimentBreakdown: sentimentBreakdown(articles), sources: listSources(articles) };
  }

  async run(request: PipelineRequest, opts: RunOptions = {}): Promise<Report> {
    const fetched = await this.fetchForQuery(request.query, request.language);
    const warnings = [...fetched.warnings];
    if (!fetched.articles.length && warnings.length) {
      this.logger.warn(`No articles fetched; ${warnings.length} source(s) failed`);
    }

    const toAnalyze = request.limit !== undefined ? fetched.articles.slice(0, request.limit) : fetched.articles;
    const batch = await this.analyzeArticles(toAnalyze, opts);
    if (batch.interrupted) warnings.push('Run interrupted before all articles were processed');

    const articles = applyFilters(batch.analyzed, request.filters);
    if (request.filters?.sentiment || request.filters?.source) {
      this.logger.info(`Filtered to ${articles.length} articles`);
    }

    let insights: Insights | undefined;
    if (request.insights && articles.length) {
      try {
        insights = await this.buildInsights(articles);
      } catch (e) {
        this.logger.error(`Error generating insights: ${errorMessage(e)}`);
        warnings.push(`Insights unavailable: ${errorMessage(e)}`);
      }
    }

    return buildReport({
      query: request.query,
      articles,
      fetched: fetched.articles.length,
      skipped: batch.skipped,
      warnings,
      insights,
      generatedAt: this.now(),
    });
  }
}

export function buildReport(input: {
  query: ReportQuery;
  articles: AnalyzedArticle[];
  fetched: number;
  skipped: number;
  warnings: string[];
  insights?: Insights;
  generatedAt: Date;
}): Report {
  return {
    generatedAt: input.generatedAt.toISOString(),
    query: input.query,
    articles: input.articles,
    count: input.articles.length,
    fetched: input.fetched,
    skipped: input.skipped,
    warnings: input.warnings,
    ...(input.insights ? { insights: input.insights } : {}),
  };
}
