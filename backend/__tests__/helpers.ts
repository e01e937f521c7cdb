import { readFile } from 'node:fs/promises';
import { Response } from 'node-fetch';
import type { AppConfig } from '../src/config.js';
import type { Analysis, AnalyzedArticle, Article, Report } from '../src/types/news.js';

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

export function textResponse(body: string, status = 200): Response {
  return new Response(body, { status });
}

export function readFixture(name: string): Promise<string> {
  return readFile(new URL(`./fixtures/${name}`, import.meta.url), 'utf8');
}

export function article(overrides: Partial<Article> = {}): Article {
  return {
    title: 'Chip shortage eases',
    source: 'Wire',
    publishedAt: '2026-10-17T08:00:00.000Z',
    body: 'Supply improves across fabs.',
    url: 'https://example.com/chips',
    ...overrides,
  };
}

export function analyzed(overrides: Partial<Article> = {}, analysis: Partial<Analysis> = {}): AnalyzedArticle {
  return {
    ...article(overrides),
    analysis: { summary: 'A summary.', keyPoints: ['First point'], sentiment: 'neutral', ...analysis },
    processedAt: '2026-10-18T12:00:00.000Z',
  };
}

export function report(overrides: Partial<Report> = {}): Report {
  const articles = overrides.articles ?? [];
  return {
    generatedAt: '2026-10-18T12:00:00.000Z',
    query: { mode: 'topics', topics: ['chips'], daysBack: 1 },
    articles,
    count: articles.length,
    fetched: articles.length,
    skipped: 0,
    warnings: [],
    ...overrides,
  };
}

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    nodeEnv: 'test',
    port: 0,
    openaiApiKey: 'test-secret',
    openaiModel: 'gpt-4o-mini',
    openaiBaseUrl: 'https://llm.test/v1',
    openaiTemperature: 0.7,
    newsapiKey: '',
    defaultLanguage: 'en',
    defaultCountry: 'us',
    maxArticlesPerTopic: 50,
    defaultTopics: ['technology'],
    reportFormat: 'markdown',
    outputDirectory: 'reports',
    autonomousIntervalHours: 24,
    autonomousIterations: 1,
    logLevel: 'silent',
    httpTimeoutMs: 1000,
    ...overrides,
  };
}

/** An LLM completion whose content is the given analysis as JSON. */
export function completion(content: string): Response {
  return jsonResponse({ choices: [{ message: { role: 'assistant', content } }] });
}
