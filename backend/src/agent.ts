import type { AppConfig } from './config.js';
import type { Logger } from './lib/logger.js';
import { NewsApiClient } from './services/newsapi.js';
import { NewsFetcher } from './services/newsFetcher.js';
import { NewsPipeline } from './services/pipeline.js';
import { RssClient } from './services/rss.js';
import { OpenAISummarizer } from './services/summarizer.js';

export interface Agent {
  fetcher: NewsFetcher;
  summarizer: OpenAISummarizer;
  pipeline: NewsPipeline;
}

export function createAgent(config: AppConfig, logger: Logger): Agent {
  const timeoutMs = config.httpTimeoutMs;
  const fetcher = new NewsFetcher({
    newsapi: new NewsApiClient({ apiKey: config.newsapiKey, timeoutMs }),
    rss: new RssClient({ timeoutMs, logger: logger.child('rss') }),
    logger: logger.child('fetcher'),
    defaultLanguage: config.defaultLanguage,
    maxArticlesPerTopic: config.maxArticlesPerTopic,
    timeoutMs,
  });
  const summarizer = new OpenAISummarizer({
    apiKey: config.openaiApiKey,
    model: config.openaiModel,
    temperature: config.openaiTemperature,
    baseUrl: config.openaiBaseUrl,
    timeoutMs,
    logger: logger.child('summarizer'),
  });
  const pipeline = new NewsPipeline({ fetcher, summarizer, logger: logger.child('pipeline') });
  return { fetcher, summarizer, pipeline };
}
