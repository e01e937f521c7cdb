export type Sentiment = 'positive' | 'negative' | 'neutral';
export const SENTIMENTS: readonly Sentiment[] = ['positive', 'negative', 'neutral'];

export type ReportFormat = 'text' | 'markdown' | 'html';
export const REPORT_FORMATS: readonly ReportFormat[] = ['text', 'markdown', 'html'];

export type NewsCategory =
  | 'business' | 'entertainment' | 'general' | 'health' | 'science' | 'sports' | 'technology';
export const NEWS_CATEGORIES: readonly NewsCategory[] = [
  'business', 'entertainment', 'general', 'health', 'science', 'sports', 'technology',
];

export interface Article {
  readonly title: string;
  readonly source: string;
  readonly publishedAt: string; // ISO, '' when the provider gave none
  readonly body: string;
  readonly url: string;
}

export interface Analysis {
  summary: string;
  keyPoints: string[];
  sentiment: Sentiment;
}

export interface AnalyzedArticle extends Article {
  analysis: Analysis;
  processedAt: string;
}

export type SourceKind = 'newsapi' | 'rss' | 'url';

export interface SourceFailure {
  source: SourceKind;
  message: string;
}

export interface FetchResult {
  articles: Article[];
  failures: SourceFailure[];
}

export type ReportQuery =
  | { mode: 'topics'; topics: string[]; daysBack: number }
  | { mode: 'trending'; country: string; category?: NewsCategory }
  | { mode: 'url'; url: string };

export interface ReportFilters {
  sentiment?: Sentiment;
  source?: string;
  maxCount?: number;
}

export interface Insights {
  overview: string;
  sentimentBreakdown: Record<Sentiment, number>;
  sources: string[];
}

export interface Report {
  generatedAt: string;
  query: ReportQuery;
  articles: AnalyzedArticle[];
  count: number;
  fetched: number;
  skipped: number;
  warnings: string[];
  insights?: Insights;
}

export interface NewsResponse {
  articles: Article[];
  warnings: string[];
}
