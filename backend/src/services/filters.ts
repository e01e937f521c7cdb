import type { AnalyzedArticle, ReportFilters, Sentiment } from '../types/news.js';

export function filterBySentiment(articles: AnalyzedArticle[], sentiment: Sentiment): AnalyzedArticle[] {
  return articles.filter(a => a.analysis.sentiment === sentiment);
}

export function filterBySource(articles: AnalyzedArticle[], source: string): AnalyzedArticle[] {
  const needle = source.trim().toLowerCase();
  return articles.filter(a => a.source.toLowerCase().includes(needle));
}

export function topArticles(articles: AnalyzedArticle[], n: number): AnalyzedArticle[] {
  return articles.slice(0, Math.max(0, n));
}

/** Order is preserved: sentiment, then source, then the count cap. */
export function applyFilters(articles: AnalyzedArticle[], filters: ReportFilters = {}): AnalyzedArticle[] {
  let out = articles;
  if (filters.sentiment) out = filterBySentiment(out, filters.sentiment);
  if (filters.source?.trim()) out = filterBySource(out, filters.source);
  if (filters.maxCount !== undefined) out = topArticles(out, filters.maxCount);
  return out;
}

export function sentimentBreakdown(articles: AnalyzedArticle[]): Record<Sentiment, number> {
  const counts: Record<Sentiment, number> = { positive: 0, negative: 0, neutral: 0 };
  for (const a of articles) counts[a.analysis.sentiment] += 1;
  return counts;
}

/** Distinct sources in first-seen order. */
export function listSources(articles: AnalyzedArticle[]): string[] {
  return [...new Set(articles.map(a => a.source))];
}
