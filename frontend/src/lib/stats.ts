import type { AnalyzedArticle, ReportFormat, Sentiment } from '../types/news';

export type SentimentFilter = Sentiment | 'all';
export const SENTIMENTS:Sentiment[] = ['positive','negative','neutral'];

export function sentimentCounts(items:AnalyzedArticle[]):Record<Sentiment,number>{
  const c:Record<Sentiment,number> = { positive:0, negative:0, neutral:0 };
  for(const a of items) c[a.analysis.sentiment] += 1;
  return c;
}

/** Most frequent first; ties keep first-seen order. */
export function sourceCounts(items:AnalyzedArticle[]):{source:string; count:number}[]{
  const m = new Map<string,number>();
  for(const a of items) m.set(a.source, (m.get(a.source) ?? 0) + 1);
  return [...m].map(([source,count])=>({source,count})).sort((x,y)=>y.count-x.count);
}

export function bySentiment(items:AnalyzedArticle[], f:SentimentFilter):AnalyzedArticle[]{
  return f === 'all' ? items : items.filter(a=>a.analysis.sentiment === f);
}

const MIME:Record<ReportFormat,string> = { text:'text/plain', markdown:'text/markdown', html:'text/html' };
const EXT:Record<ReportFormat,string> = { text:'txt', markdown:'md', html:'html' };

export function downloadHref(content:string, format:ReportFormat):string{
  return `data:${MIME[format]};charset=utf-8,${encodeURIComponent(content)}`;
}

export function downloadName(generatedAt:string, format:ReportFormat):string{
  const stamp = generatedAt.slice(0,19).replace(/-|:/g,'').replace('T','_');
  return `news_report_${stamp}.${EXT[format]}`;
}

export function splitTopics(s:string):string[]{
  return s.split(',').map(t=>t.trim()).filter(Boolean);
}
