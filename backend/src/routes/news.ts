import { Router } from 'express';
import { z } from 'zod';
import { cache } from '../middlewares/cache.js';
import { BadRequestError } from '../lib/errors.js';
import { failureText, type ArticleSource } from '../services/newsFetcher.js';
import { NEWS_CATEGORIES, type FetchResult, type NewsCategory, type NewsResponse } from '../types/news.js';

export interface NewsRouteDefaults {
  topic: string;
  language: string;
  country: string;
}

const categorySchema = z.string().refine((c): c is NewsCategory => (NEWS_CATEGORIES as readonly string[]).includes(c), {
  message: `category must be one of ${NEWS_CATEGORIES.join(', ')}`,
});

function toResponse(result: FetchResult): NewsResponse {
  return { articles: result.articles, warnings: result.failures.map(failureText) };
}

function issueText(error: z.ZodError): string {
  return error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
}

export function createNewsRouter(fetcher: ArticleSource, defaults: NewsRouteDefaults, ttlSeconds = 60): Router {
  const searchSchema = z.object({
    q: z.string().trim().min(1).default(defaults.topic),
    days: z.coerce.number().int().min(1).max(30).default(1),
    lang: z.string().trim().min(2).max(5).default(defaults.language),
  });
  const trendingSchema = z.object({
    country: z.string().trim().length(2).default(defaults.country),
    category: categorySchema.optional(),
  });

  const r = Router();

  r.get('/', cache(ttlSeconds), async (req, res, next) => {
    try {
      const q = searchSchema.safeParse(req.query);
      if (!q.success) throw new BadRequestError(issueText(q.error));
      const result = await fetcher.fetchByTopic(q.data.q, q.data.days, q.data.lang);
      res.json({ ok: true, ...toResponse(result) });
    } catch (e) { next(e); }
  });

  r.get('/trending', cache(ttlSeconds), async (req, res, next) => {
    try {
      const q = trendingSchema.safeParse(req.query);
      if (!q.success) throw new BadRequestError(issueText(q.error));
      const result = await fetcher.fetchTrending(q.data.country, q.data.category);
      res.json({ ok: true, ...toResponse(result) });
    } catch (e) { next(e); }
  });

  return r;
}
