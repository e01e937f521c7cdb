import type { AnalyzedArticle, Sentiment } from '../types/news';

export const BADGE:Record<Sentiment,{bg:string; fg:string}> = {
  positive:{bg:'#d4edda', fg:'#155724'},
  negative:{bg:'#f8d7da', fg:'#721c24'},
  neutral:{bg:'#d1ecf1', fg:'#0c5460'},
};

export default function NewsCard({a}:{a:AnalyzedArticle}) {
  const s = a.analysis.sentiment;
  const published = a.publishedAt ? new Date(a.publishedAt).toLocaleString() : 'unknown date';
  return (
    <article style={{padding:16, border:'1px solid #e5e7eb', borderRadius:12}}>
      <h3 style={{fontWeight:600}}>{a.title}</h3>
      <span data-testid="sentiment" style={{fontSize:12, padding:'2px 8px', borderRadius:4, background:BADGE[s].bg, color:BADGE[s].fg}}>{s}</span>
      <p style={{fontSize:14, opacity:.8}}>{a.analysis.summary}</p>
      {a.analysis.keyPoints.length > 0 && (
        <ul style={{fontSize:14, paddingLeft:18}}>
          {a.analysis.keyPoints.map((p,i)=><li key={i}>{p}</li>)}
        </ul>
      )}
      <div style={{fontSize:12, marginTop:8, opacity:.8}}>
        {a.source} · {published}
      </div>
      <a href={a.url} target="_blank" rel="noreferrer" style={{color:'#2563eb', textDecoration:'underline', fontSize:14, display:'inline-block', marginTop:8}}>Read full article</a>
    </article>
  );
}
