export type Sentiment = 'positive' | 'negative' | 'neutral';
export type ReportFormat = 'text' | 'markdown' | 'html';
export type NewsCategory = 'business' | 'entertainment' | 'general' | 'health' | 'science' | 'sports' | 'technology';

export interface Analysis { summary:string; keyPoints:string[]; sentiment:Sentiment; }

export interface AnalyzedArticle {
  title:string; source:string; publishedAt:string; body:string; url:string;
  analysis:Analysis; processedAt:string;
}

export type ReportQuery =
  | { mode:'topics'; topics:string[]; daysBack:number }
  | { mode:'trending'; country:string; category?:NewsCategory }
  | { mode:'url'; url:string };

export interface Insights { overview:string; sentimentBreakdown:Record<Sentiment,number>; sources:string[]; }

export interface Report {
  generatedAt:string; query:ReportQuery; articles:AnalyzedArticle[];
  count:number; fetched:number; skipped:number; warnings:string[]; insights?:Insights;
}

export interface ReportRequest {
  mode:'topics'|'trending'|'url';
  topics?:string[]; days?:number; country?:string; category?:NewsCategory; url?:string;
  limit?:number; sentiment?:Sentiment; source?:string; maxCount?:number; insights?:boolean;
}

export interface ReportResponse { ok:true; report:Report; rendered:Record<ReportFormat,string>; }

export interface Health { ok:boolean; service?:string; time?:string; providers?:{ newsapi:boolean; llm:boolean }; }
