import type { AnalyzedArticle, ReportResponse, Sentiment } from '../src/types/news';

export function item(title:string, sentiment:Sentiment, source='Wire'):AnalyzedArticle {
  return {
    title, source,
    publishedAt:'2026-10-17T08:00:00.000Z',
    body:'Body text.',
    url:`https://example.com/${encodeURIComponent(title)}`,
    analysis:{ summary:`Summary of ${title}.`, keyPoints:[`${title} point`], sentiment },
    processedAt:'2026-10-18T12:00:00.000Z',
  };
}

export function reportResponse(articles:AnalyzedArticle[], warnings:string[] = []):ReportResponse {
  return {
    ok:true,
    report:{
      generatedAt:'2026-10-18T12:00:00.000Z',
      query:{ mode:'topics', topics:['chips'], daysBack:1 },
      articles, count:articles.length, fetched:articles.length, skipped:0, warnings,
    },
    rendered:{ text:'TEXT REPORT', markdown:'# News Report', html:'<html></html>' },
  };
}

export function json(body:unknown, status=200):Response {
  return new Response(JSON.stringify(body), { status, headers:{ 'content-type':'application/json' } });
}
