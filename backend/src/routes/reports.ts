import { Router } from 'express';
import { z } from 'zod';
import { BadRequestError } from '../lib/errors.js';
import type { NewsPipeline, PipelineRequest } from '../services/pipeline.js';
import { renderAll } from '../services/reporter.js';
import type { ReportQuery } from '../types/news.js';

export interface ReportRouteDefaults {
  topics: string[];
  country: string;
  language: string;
  limit: number;
}

const bodySchema = z.object({
  mode: z.enum(['topics', 'trending', 'url']).default('topics'),
  topics: z.array(z.string().trim().min(1)).max(10).optional(),
  days: z.number().int().min(1).max(30).default(1),
  language: z.string().trim().min(2).max(5).optional(),
  country: z.string().trim().length(2).optional(),
  category: z.enum(['business', 'entertainment', 'general', 'health', 'science', 'sports', 'technology']).optional(),
  url: z.string().url().optional(),
  limit: z.number().int().min(1).max(100).optional(),
  sentiment: z.enum(['positive', 'negative', 'neutral']).optional(),
  source: z.string().trim().min(1).optional(),
  maxCount: z.number().int().min(1).optional(),
  insights: z.boolean().default(false),
});

export type ReportRequestBody = z.infer<typeof bodySchema>;

export function toPipelineRequest(body: ReportRequestBody, defaults: ReportRouteDefaults): PipelineRequest {
  let query: ReportQuery;
  if (body.mode === 'url') {
    if (!body.url) throw new BadRequestError('url is required when mode is "url"');
    query = { mode: 'url', url: body.url };
  } else if (body.mode === 'trending') {
    query = { mode: 'trending', country: body.country ?? defaults.country, ...(body.category ? { category: body.category } : {}) };
  } else {
    const topics = body.topics?.length ? body.topics : defaults.topics;
    query = { mode: 'topics', topics, daysBack: body.days };
  }
  return {
    query,
    language: body.language ?? defaults.language,
    limit: body.limit ?? defaults.limit,
    filters: { sentiment: body.sentiment, source: body.source, maxCount: body.maxCount },
    insights: body.insights,
  };
}

export function createReportsRouter(pipeline: Pick<NewsPipeline, 'run'>, defaults: ReportRouteDefaults): Router {
  const r = Router();

  r.post('/', async (req, res, next) => {
    try {
      const parsed = bodySchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        res.status(400).json({ ok: false, error: 'Invalid request', issues: parsed.error.flatten() });
        return;
      }
      const report = await pipeline.run(toPipelineRequest(parsed.data, defaults));
      res.json({ ok: true, report, rendered: renderAll(report) });
    } catch (e) { next(e); }
  });

  return r;
}
