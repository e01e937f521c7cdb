import { mkdtemp, readFile, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { USAGE, type CliOptions } from '../src/cli/args.js';
import { main, type MainDeps } from '../src/cli/main.js';
import { buildRequest, filePrefix, summaryLines } from '../src/cli/run.js';
import type { PipelineRequest } from '../src/services/pipeline.js';
import type { Report } from '../src/types/news.js';
import { analyzed, report, testConfig } from './helpers.js';

let dir: string;
let out: string[];
let err: string[];

beforeEach(async () => {
  dir = await mkdtemp(path.join(tmpdir(), 'news-agent-cli-'));
  out = [];
  err = [];
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

const now = () => new Date('2026-10-18T12:00:00Z');

function deps(result: Report | Error, env: NodeJS.ProcessEnv = {}) {
  const run = vi.fn(async (_req: PipelineRequest) => {
    if (result instanceof Error) throw result;
    return result;
  });
  const d: MainDeps = {
    io: { out: line => out.push(line), err: line => err.push(line) },
    env: { OPENAI_API_KEY: 'test-secret', OUTPUT_DIRECTORY: dir, LOG_LEVEL: 'silent', ...env },
    now,
    sleep: async () => {},
    pipeline: () => ({ run }),
  };
  return { d, run };
}

const positive = report({
  articles: [analyzed({ title: 'Good news' }, { sentiment: 'positive' })],
});

describe('main', () => {
  it('prints usage for --help', async () => {
    const { d } = deps(positive);
    expect(await main(['--help'], d)).toBe(0);
    expect(out).toEqual([USAGE]);
  });

  it('exits 2 on a usage error', async () => {
    const { d, run } = deps(positive);
    expect(await main(['--days', '0'], d)).toBe(2);
    expect(err).toEqual(['Error: --days must be an integer >= 1', 'Run with --help for usage.']);
    expect(run).not.toHaveBeenCalled();
  });

  it('exits 1 when the environment is invalid', async () => {
    const { d } = deps(positive, { REPORT_FORMAT: 'pdf' });
    expect(await main([], d)).toBe(1);
    expect(err[0]).toBe('Configuration validation failed:');
    expect(err[1]).toMatch(/^ {2}- REPORT_FORMAT: /);
  });

  it('validates the configuration', async () => {
    const bad = deps(positive, { OPENAI_API_KEY: '' });
    expect(await main(['--validate'], bad.d)).toBe(1);
    expect(err).toEqual(['✗ Configuration validation failed:', '  - OPENAI_API_KEY is not set']);

    const good = deps(positive);
    expect(await main(['--validate'], good.d)).toBe(0);
    expect(out).toEqual(['✓ Configuration is valid', '  note: NEWSAPI_KEY is not set; only RSS feeds will be used']);
  });

  it('prints the configuration', async () => {
    const { d } = deps(positive);
    expect(await main(['--config'], d)).toBe(0);
    expect(out).toHaveLength(1);
    expect(out[0]).toMatch(/^News Agent Configuration:\n/);
  });

  it('refuses to run without an LLM key', async () => {
    const { d, run } = deps(positive, { OPENAI_API_KEY: '' });
    expect(await main(['AI'], d)).toBe(1);
    expect(run).not.toHaveBeenCalled();
  });

  it('writes the report and prints a summary', async () => {
    const { d, run } = deps(positive);

    expect(await main(['AI', '--days', '3', '--sentiment', 'positive'], d)).toBe(0);

    expect(run.mock.calls[0][0]).toEqual({
      query: { mode: 'topics', topics: ['AI'], daysBack: 3 },
      language: 'en',
      limit: undefined,
      filters: { sentiment: 'positive', source: undefined },
      insights: false,
    });
    const file = path.join(dir, 'news_report_20261018_120000.md');
    expect(out).toEqual([
      `✓ Report generated: ${file}`,
      '  Total articles processed: 1',
      '  Sentiment: Positive: 1',
    ]);
    expect(await readFile(file, 'utf8')).toContain('## 1. Good news');
  });

  it('names trending reports after the country', async () => {
    const trending = report({ ...positive, query: { mode: 'trending', country: 'gb' } });
    const { d } = deps(trending);

    expect(await main(['--trending', '--country', 'gb', '--format', 'text'], d)).toBe(0);

    expect(await readdir(dir)).toEqual(['trending_report_gb_20261018_120000.txt']);
  });

  it('writes to --output when given', async () => {
    const { d } = deps(positive);
    const target = path.join(dir, 'custom', 'today.html');

    expect(await main(['-f', 'html', '-o', target], d)).toBe(0);

    expect(await readFile(target, 'utf8')).toMatch(/^<!DOCTYPE html>/);
  });

  it('hints at wider searches when nothing was found', async () => {
    const { d } = deps(report());

    expect(await main(['obscure'], d)).toBe(0);

    expect(out.slice(-2)).toEqual([
      '⚠ No articles found for the specified topics and timeframe.',
      '  Try adjusting your topics or increasing the --days parameter.',
    ]);
  });

  it('prints source warnings', async () => {
    const { d } = deps(report({ warnings: ['rss: BBC News: timeout'] }));

    await main([], d);

    expect(err).toEqual(['warning: rss: BBC News: timeout']);
  });

  it('exits 1 when the run fails', async () => {
    const { d } = deps(new Error('disk full'));
    expect(await main([], d)).toBe(1);
    expect(err).toEqual(['Error: disk full']);
  });

  it('runs the autonomous loop', async () => {
    const { d, run } = deps(positive);

    expect(await main(['--autonomous', '--iterations', '2', '--interval', '1'], d)).toBe(0);

    expect(run).toHaveBeenCalledTimes(2);
    expect(out).toEqual(['Autonomous runs: 2 completed, 0 failed, 2 saved']);
  });
});

describe('run helpers', () => {
  it('falls back to configured topics and country', () => {
    const config = testConfig({ defaultTopics: ['space'], defaultCountry: 'de' });
    const base: Omit<CliOptions, 'command'> = { topics: [], days: 2, insights: true };

    expect(buildRequest({ ...base, command: 'topics' }, config).query)
      .toEqual({ mode: 'topics', topics: ['space'], daysBack: 2 });
    expect(buildRequest({ ...base, command: 'trending', category: 'sports' }, config).query)
      .toEqual({ mode: 'trending', country: 'de', category: 'sports' });
    expect(buildRequest({ ...base, command: 'url', url: 'https://e.com/a' }, config).query)
      .toEqual({ mode: 'url', url: 'https://e.com/a' });
  });

  it('prefixes file names by query mode', () => {
    expect(filePrefix({ mode: 'topics', topics: ['a'], daysBack: 1 })).toBe('news_report');
    expect(filePrefix({ mode: 'trending', country: 'us' })).toBe('trending_report_us');
    expect(filePrefix({ mode: 'url', url: 'https://e.com' })).toBe('article_report');
  });

  it('summarizes skipped articles and only non-zero sentiments', () => {
    const r = report({
      articles: [
        analyzed({ url: 'https://e.com/1' }, { sentiment: 'negative' }),
        analyzed({ url: 'https://e.com/2' }, { sentiment: 'negative' }),
        analyzed({ url: 'https://e.com/3' }, { sentiment: 'neutral' }),
      ],
      skipped: 1,
    });

    expect(summaryLines(r, '/tmp/r.md')).toEqual([
      '✓ Report generated: /tmp/r.md',
      '  Total articles processed: 3',
      '  Skipped (analysis failed): 1',
      '  Sentiment: Negative: 2, Neutral: 1',
    ]);
  });
});
