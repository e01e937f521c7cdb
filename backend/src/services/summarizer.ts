import { z } from 'zod';
import { httpPostJson, httpRequest, type HttpClient } from '../lib/fetcher.js';
import { MalformedResponseError, ProviderError, errorMessage } from '../lib/errors.js';
import { silentLogger, type Logger } from '../lib/logger.js';
import { truncate } from '../lib/text.js';
import type { Analysis, Article, Sentiment } from '../types/news.js';
import { buildAnalysisMessages, buildOverviewMessages, type ChatMessage } from './prompts.js';

const MAX_CONTENT_CHARS = 6000;
const MAX_KEY_POINTS = 5;
const MAX_OVERVIEW_TITLES = 10;

export interface ArticleAnalyzer {
  analyze(article: Article): Promise<Analysis>;
  overview(titles: string[]): Promise<string>;
}

export interface SummarizerOptions {
  apiKey: string;
  model: string;
  temperature: number;
  baseUrl?: string;
  http?: HttpClient;
  timeoutMs?: number;
  logger?: Logger;
}

const completionSchema = z.object({
  choices: z.array(z.object({
    message: z.object({ content: z.string().nullable() }),
  })).min(1),
});

const analysisSchema = z.object({
  summary: z.string().trim().min(1),
  keyPoints: z.array(z.string()).optional(),
  key_points: z.array(z.string()).optional(),
  sentiment: z.string(),
});

export function prepareContent(article: Article): string {
  const text = article.body.trim();
  return text ? truncate(text, MAX_CONTENT_CHARS) : '(no article text available; judge from the title)';
}

export function normalizeSentiment(raw: string): Sentiment | null {
  const s = raw.trim().toLowerCase();
  if (s.includes('positive')) return 'positive';
  if (s.includes('negative')) return 'negative';
  if (s.includes('neutral')) return 'neutral';
  return null;
}

/** Strips list markers such as `1.`, `2)`, `-`, `•`. */
export function cleanKeyPoint(point: string): string {
  return point.replace(/^\s*(?:\d+[.)]|[-•–*])\s*/, '').trim();
}

/** A fenced ```json block, else the outermost `{...}` span. */
export function extractJson(text: string): string | null {
  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (fenced && fenced[1].trim().startsWith('{')) return fenced[1].trim();
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  return start >= 0 && end > start ? text.slice(start, end + 1) : null;
}

export function parseAnalysis(text: string): Analysis {
  const json = extractJson(text);
  if (!json) throw new MalformedResponseError('openai', 'no JSON object in completion');

  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (e) {
    throw new MalformedResponseError('openai', `invalid JSON (${errorMessage(e)})`, { cause: e });
  }

  const parsed = analysisSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new MalformedResponseError('openai', issue ? `${issue.path.join('.') || 'body'}: ${issue.message}` : 'unexpected shape');
  }

  const sentiment = normalizeSentiment(parsed.data.sentiment);
  if (!sentiment) throw new MalformedResponseError('openai', `unknown sentiment "${parsed.data.sentiment}"`);

  const keyPoints = (parsed.data.keyPoints ?? parsed.data.key_points ?? [])
    .map(cleanKeyPoint)
    .filter(Boolean)
    .slice(0, MAX_KEY_POINTS);

  return { summary: parsed.data.summary, keyPoints, sentiment };
}

/** Any OpenAI-compatible `/chat/completions` endpoint. */
export class OpenAISummarizer implements ArticleAnalyzer {
  private readonly http: HttpClient;
  private readonly logger: Logger;
  private readonly endpoint: string;

  constructor(private readonly opts: SummarizerOptions) {
    this.http = opts.http ?? httpRequest;
    this.logger = opts.logger ?? silentLogger;
    this.endpoint = `${(opts.baseUrl ?? 'https://api.openai.com/v1').replace(/\/+$/, '')}/chat/completions`;
  }

  async analyze(article: Article): Promise<Analysis> {
    const text = await this.complete(buildAnalysisMessages(article.title || 'Untitled', prepareContent(article)));
    return parseAnalysis(text);
  }

  async overview(titles: string[]): Promise<string> {
    const text = await this.complete(buildOverviewMessages(titles.slice(0, MAX_OVERVIEW_TITLES)));
    return text.trim();
  }

  private async complete(messages: ChatMessage[]): Promise<string> {
    if (!this.opts.apiKey) throw new ProviderError('openai', 'API key not configured');

    let json: unknown;
    try {
      const res = await httpPostJson(this.http, this.endpoint, {
        model: this.opts.model,
        temperature: this.opts.temperature,
        messages,
      }, { authorization: `Bearer ${this.opts.apiKey}` }, { timeoutMs: this.opts.timeoutMs });
      json = await res.json();
    } catch (e) {
      throw new ProviderError('openai', errorMessage(e), { cause: e });
    }

    const parsed = completionSchema.safeParse(json);
    if (!parsed.success) throw new MalformedResponseError('openai', 'completion without choices');
    const content = parsed.data.choices[0].message.content?.trim() ?? '';
    if (!content) throw new MalformedResponseError('openai', 'empty completion');
    this.logger.debug(`completion: ${content.length} chars`);
    return content;
  }
}
