import { describe, expect, it, vi } from 'vitest';
import { RssClient } from '../src/services/rss.js';
import { readFixture, textResponse } from './helpers.js';

const feed = { url: 'https://news.example.com/feed', name: 'Fixture' };

describe('RssClient', () => {
  it('maps feed items to articles and skips untitled entries', async () => {
    const xml = await readFixture('feed.xml');
    const client = new RssClient({ http: vi.fn(async () => textResponse(xml)) });

    const articles = await client.fetchFeed(feed);

    expect(articles).toEqual([
      {
        title: 'Open source AI model released',
        url: 'https://news.example.com/ai-model',
        source: 'Example Tech Wire',
        publishedAt: '2026-10-17T09:30:00.000Z',
        body: 'The AI model ships with weights.',
      },
      {
        title: 'Battery plant opens',
        url: 'https://news.example.com/battery',
        source: 'Example Tech Wire',
        publishedAt: '2026-10-16T14:00:00.000Z',
        body: 'A new factory for cells.',
      },
    ]);
  });

  it('takes at most perFeedLimit entries per feed', async () => {
    const xml = await readFixture('feed.xml');
    const client = new RssClient({ http: vi.fn(async () => textResponse(xml)), perFeedLimit: 1 });

    const articles = await client.fetchFeed(feed);

    expect(articles.map(a => a.title)).toEqual(['Open source AI model released']);
  });

  it('records failing feeds and keeps going', async () => {
    const xml = await readFixture('feed.xml');
    const http = vi.fn(async (url: string) => {
      if (url.includes('broken')) throw new Error('connect ECONNREFUSED');
      return textResponse(xml);
    });
    const client = new RssClient({ http });

    const result = await client.fetchFeeds(
      [{ url: 'https://broken.example.com/rss', name: 'Broken' }, feed],
      a => a.title.toLowerCase().includes('battery'),
    );

    expect(result.articles.map(a => a.url)).toEqual(['https://news.example.com/battery']);
    expect(result.failures).toEqual([{ source: 'rss', message: 'rss: Broken: connect ECONNREFUSED' }]);
  });

  it('reports unparseable XML as a failure', async () => {
    const client = new RssClient({ http: vi.fn(async () => textResponse('not xml at all')) });

    const result = await client.fetchFeeds([feed]);

    expect(result.articles).toEqual([]);
    expect(result.failures).toHaveLength(1);
    expect(result.failures[0].message).toMatch(/^rss: Fixture: unparseable feed/);
  });
});
