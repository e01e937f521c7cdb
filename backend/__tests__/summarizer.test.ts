import type { RequestInit } from 'node-fetch';
import { describe, expect, it, vi } from 'vitest';
import { MalformedResponseError } from '../src/lib/errors.js';
import {
  OpenAISummarizer, cleanKeyPoint, extractJson, normalizeSentiment, parseAnalysis, prepareContent,
} from '../src/services/summarizer.js';
import { article, completion, jsonResponse } from './helpers.js';

describe('normalizeSentiment', () => {
  it('finds the label inside free text', () => {
    expect(normalizeSentiment('Positive')).toBe('positive');
    expect(normalizeSentiment('Mostly NEGATIVE overall')).toBe('negative');
    expect(normalizeSentiment(' neutral. ')).toBe('neutral');
    expect(normalizeSentiment('mixed')).toBeNull();
  });
});

describe('cleanKeyPoint', () => {
  it('strips list markers', () => {
    expect(['1. One', '2) Two', '- Three', '• Four', 'Five'].map(cleanKeyPoint))
      .toEqual(['One', 'Two', 'Three', 'Four', 'Five']);
  });
});

describe('extractJson', () => {
  it('prefers a fenced block', () => {
    expect(extractJson('Sure!\n```json\n{"a": 1}\n```\nDone')).toBe('{"a": 1}');
  });

  it('takes the outermost braces otherwise', () => {
    expect(extractJson('Result: {"a": {"b": 2}} ok')).toBe('{"a": {"b": 2}}');
    expect(extractJson('nothing here')).toBeNull();
  });
});

describe('parseAnalysis', () => {
  it('reads summary, key points and sentiment', () => {
    const text = '{"summary": "Prices fell.", "keyPoints": ["1. Prices fell", "- Demand held"], "sentiment": "Negative"}';

    expect(parseAnalysis(text)).toEqual({
      summary: 'Prices fell.',
      keyPoints: ['Prices fell', 'Demand held'],
      sentiment: 'negative',
    });
  });

  it('accepts snake_case key points and keeps at most five', () => {
    const points = ['a', 'b', 'c', 'd', 'e', 'f'].map(p => `"${p}"`).join(', ');
    const result = parseAnalysis(`{"summary": "S", "key_points": [${points}], "sentiment": "neutral"}`);

    expect(result.keyPoints).toEqual(['a', 'b', 'c', 'd', 'e']);
  });

  it('rejects text without JSON', () => {
    expect(() => parseAnalysis('I cannot help with that.')).toThrow(
      new MalformedResponseError('openai', 'no JSON object in completion'),
    );
  });

  it('rejects an unknown sentiment', () => {
    expect(() => parseAnalysis('{"summary": "S", "sentiment": "mixed"}')).toThrow(
      new MalformedResponseError('openai', 'unknown sentiment "mixed"'),
    );
  });

  it('rejects a missing summary', () => {
    expect(() => parseAnalysis('{"sentiment": "neutral"}')).toThrow(MalformedResponseError);
  });
});

describe('prepareContent', () => {
  it('truncates long bodies', () => {
    expect(prepareContent(article({ body: 'x'.repeat(7000) }))).toHaveLength(6003);
  });

  it('says so when there is no text', () => {
    expect(prepareContent(article({ body: '  ' }))).toBe('(no article text available; judge from the title)');
  });
});

describe('OpenAISummarizer', () => {
  const analysisJson = '{"summary": "Chips are easier to buy.", "keyPoints": ["Supply up"], "sentiment": "positive"}';

  it('posts a chat completion and parses the answer', async () => {
    const http = vi.fn(async (_url: string, _init?: RequestInit) => completion(analysisJson));
    const summarizer = new OpenAISummarizer({
      apiKey: 'test-secret', model: 'test-model', temperature: 0.2, baseUrl: 'https://llm.test/v1/', http,
    });

    const result = await summarizer.analyze(article());

    expect(result).toEqual({ summary: 'Chips are easier to buy.', keyPoints: ['Supply up'], sentiment: 'positive' });
    const [url, init] = http.mock.calls[0];
    expect(url).toBe('https://llm.test/v1/chat/completions');
    expect(init).toMatchObject({ method: 'POST', headers: { authorization: 'Bearer test-secret' } });
    const body = JSON.parse(String(init?.body));
    expect(body.model).toBe('test-model');
    expect(body.temperature).toBe(0.2);
    expect(body.messages).toHaveLength(2);
    expect(body.messages[1].content).toContain('Title: Chip shortage eases');
    expect(body.messages[1].content).toContain('Content: Supply improves across fabs.');
  });

  it('treats an empty completion as malformed', async () => {
    const http = vi.fn(async () => completion('   '));
    const summarizer = new OpenAISummarizer({ apiKey: 'test-secret', model: 'm', temperature: 0, http });

    await expect(summarizer.analyze(article())).rejects.toThrow(new MalformedResponseError('openai', 'empty completion'));
  });

  it('treats a response without choices as malformed', async () => {
    const http = vi.fn(async () => jsonResponse({ error: { message: 'overloaded' } }));
    const summarizer = new OpenAISummarizer({ apiKey: 'test-secret', model: 'm', temperature: 0, http });

    await expect(summarizer.analyze(article())).rejects.toThrow(
      new MalformedResponseError('openai', 'completion without choices'),
    );
  });

  it('needs an API key', async () => {
    const http = vi.fn(async () => completion(analysisJson));
    const summarizer = new OpenAISummarizer({ apiKey: '', model: 'm', temperature: 0, http });

    await expect(summarizer.analyze(article())).rejects.toThrow('openai: API key not configured');
    expect(http).not.toHaveBeenCalled();
  });

  it('builds an overview from at most ten titles', async () => {
    const http = vi.fn(async (_url: string, _init?: RequestInit) => completion('  Chips dominate the news.  '));
    const summarizer = new OpenAISummarizer({ apiKey: 'test-secret', model: 'm', temperature: 0, http });
    const titles = Array.from({ length: 12 }, (_, i) => `Title ${i + 1}`);

    const overview = await summarizer.overview(titles);

    expect(overview).toBe('Chips dominate the news.');
    const body = JSON.parse(String(http.mock.calls[0][1]?.body));
    const listed = String(body.messages[1].content).split('\n').filter((l: string) => l.startsWith('- '));
    expect(listed).toHaveLength(10);
    expect(listed[9]).toBe('- Title 10');
  });
});
