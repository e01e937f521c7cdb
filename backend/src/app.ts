import express from 'express';
import cors from 'cors';
import morgan from 'morgan';
import helmet from 'helmet';
import type { AppConfig } from './config.js';
import { silentLogger, type Logger } from './lib/logger.js';
import { errorHandler, notFound } from './middlewares/error.js';
import { createNewsRouter } from './routes/news.js';
import { createReportsRouter } from './routes/reports.js';
import type { ArticleSource } from './services/newsFetcher.js';
import type { NewsPipeline } from './services/pipeline.js';

export interface AppDeps {
  agent: { fetcher: ArticleSource; pipeline: Pick<NewsPipeline, 'run'> };
  config: AppConfig;
  logger?: Logger;
  /** Seconds GET /api/news responses stay cached. */
  newsCacheSeconds?: number;
}

const INDEX_HTML = `<!DOCTYPE html>
<html>
<head>
  <title>News Agent</title>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
</head>
<body>
  <h1>News Agent API Server</h1>
  <p>Backend is running.</p>
  <ul>
    <li><a href="/health">Health Check</a></li>
    <li><a href="/api/news?q=technology">Topic search</a></li>
    <li><a href="/api/news/trending?country=us">Trending headlines</a></li>
    <li><code>POST /api/reports</code> fetches, analyzes and renders a report</li>
  </ul>
</body>
</html>`;

export function createApp({ agent, config, logger = silentLogger, newsCacheSeconds = 60 }: AppDeps) {
  const app = express();

  app.use(helmet());
  app.use(cors());
  app.use(express.json({ limit: '100kb' }));
  if (config.nodeEnv !== 'test') app.use(morgan(config.nodeEnv === 'production' ? 'tiny' : 'dev'));

  app.get('/health', (_req, res) => {
    res.json({
      ok: true,
      service: 'backend',
      time: new Date().toISOString(),
      providers: { newsapi: Boolean(config.newsapiKey), llm: Boolean(config.openaiApiKey) },
    });
  });

  app.use('/api/news', createNewsRouter(agent.fetcher, {
    topic: config.defaultTopics[0] ?? 'technology',
    language: config.defaultLanguage,
    country: config.defaultCountry,
  }, newsCacheSeconds));
  app.use('/api/reports', createReportsRouter(agent.pipeline, {
    topics: config.defaultTopics,
    country: config.defaultCountry,
    language: config.defaultLanguage,
    limit: Math.min(10, config.maxArticlesPerTopic),
  }));

  app.get('/', (_req, res) => { res.type('html').send(INDEX_HTML); });

  app.use('/api', notFound);
  app.use(errorHandler(logger));
  return app;
}
