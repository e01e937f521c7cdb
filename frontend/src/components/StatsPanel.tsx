import type { AnalyzedArticle } from '../types/news';
import { SENTIMENTS, sentimentCounts, sourceCounts } from '../lib/stats';
import { BADGE } from './NewsCard';

const box = {padding:12, border:'1px solid #e5e7eb', borderRadius:8, minWidth:110, textAlign:'center' as const};

export default function StatsPanel({items}:{items:AnalyzedArticle[]}) {
  const counts = sentimentCounts(items);
  const sources = sourceCounts(items);
  return (
    <section style={{marginBottom:16}}>
      <div style={{display:'flex', gap:8, flexWrap:'wrap'}}>
        <div style={box} data-testid="stat-total"><div style={{fontSize:22, fontWeight:700}}>{items.length}</div>Total</div>
        {SENTIMENTS.map(s=>(
          <div key={s} style={{...box, background:BADGE[s].bg, color:BADGE[s].fg}} data-testid={`stat-${s}`}>
            <div style={{fontSize:22, fontWeight:700}}>{counts[s]}</div>{s}
          </div>
        ))}
      </div>
      {sources.length > 0 && (
        <table style={{marginTop:12, fontSize:14, borderCollapse:'collapse'}}>
          <thead><tr><th style={{textAlign:'left', paddingRight:24}}>Source</th><th>Articles</th></tr></thead>
          <tbody>
            {sources.map(r=><tr key={r.source}><td style={{paddingRight:24}}>{r.source}</td><td style={{textAlign:'right'}}>{r.count}</td></tr>)}
          </tbody>
        </table>
      )}
    </section>
  );
}
