'use client';
import { useEffect, useState } from 'react';
import Toolbar from '../components/Toolbar';
import NewsList from '../components/NewsList';
import StatsPanel from '../components/StatsPanel';
import SentimentFilter from '../components/SentimentFilter';
import ReportDownloads from '../components/ReportDownloads';
import type { Health, ReportRequest, ReportResponse } from '../types/news';
import { API_BASE, fetchHealth, runReport } from '../lib/api';
import { bySentiment, type SentimentFilter as Filter } from '../lib/stats';

export default function Page(){
  const [result,setResult] = useState<ReportResponse|null>(null);
  const [loading,setLoading] = useState(false);
  const [error,setError] = useState<string|undefined>();
  const [health,setHealth] = useState<Health|null>(null);
  const [filter,setFilter] = useState<Filter>('all');

  async function run(req:ReportRequest){
    setLoading(true); setError(undefined);
    try { setResult(await runReport(req)); setFilter('all'); }
    catch(e){ setError(e instanceof Error ? e.message : 'Request failed'); }
    finally{ setLoading(false); }
  }

  useEffect(() => {
    fetchHealth().then(setHealth).catch(()=>setHealth({ok:false}));
  }, []);

  const report = result?.report;
  return (
    <main style={{padding:24, maxWidth: '960px', margin: '0 auto'}}>
      <h1 style={{fontWeight:'bold', fontSize: 24, marginBottom: 12}}>News Agent</h1>
      <div style={{marginBottom: 12, fontSize:14}}>
        Backend: <code>{API_BASE}</code>{' '}
        {health && (health.ok
          ? <span>· NewsAPI {health.providers?.newsapi ? 'on' : 'off (RSS only)'} · LLM {health.providers?.llm ? 'on' : 'off'}</span>
          : <span style={{color:'red'}}>· unreachable</span>)}
      </div>

      <Toolbar onRun={run} busy={loading} />

      {loading && <div>Fetching and analyzing articles…</div>}
      {error && <div role="alert" style={{color: 'red'}}>Error: {error}</div>}
      {!loading && !error && !report && <div style={{opacity:.7}}>Pick topics or trending news and run a report.</div>}
      {!loading && !error && report && (
        <>
          {report.warnings.length > 0 && (
            <ul style={{fontSize:13, color:'#92400e'}}>{report.warnings.map((w,i)=><li key={i}>{w}</li>)}</ul>
          )}
          {report.insights && <p style={{fontStyle:'italic'}}>{report.insights.overview}</p>}
          <StatsPanel items={report.articles} />
          {result && <ReportDownloads rendered={result.rendered} generatedAt={report.generatedAt} />}
          <SentimentFilter value={filter} onChange={setFilter} />
          <NewsList items={bySentiment(report.articles, filter)} />
        </>
      )}
    </main>
  );
}
