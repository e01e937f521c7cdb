'use client';
import { SENTIMENTS, type SentimentFilter as Filter } from '../lib/stats';

export default function SentimentFilter({value, onChange}:{value:Filter; onChange:(f:Filter)=>void}){
  return (
    <label style={{fontSize:14, display:'block', marginBottom:12}}>
      Show{' '}
      <select aria-label="Sentiment filter" value={value} onChange={e=>onChange(SENTIMENTS.find(s=>s === e.target.value) ?? 'all')}
        style={{border:'1px solid #e5e7eb', padding:'4px 8px', borderRadius:8}}>
        <option value="all">all sentiments</option>
        {SENTIMENTS.map(s=><option key={s} value={s}>{s}</option>)}
      </select>
    </label>
  );
}
