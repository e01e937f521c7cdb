'use client';
import { useState, type FormEvent } from 'react';
import type { NewsCategory, ReportRequest } from '../types/news';
import { splitTopics } from '../lib/stats';

const CATEGORIES:NewsCategory[] = ['business','entertainment','general','health','science','sports','technology'];
const field = {border:'1px solid #e5e7eb', padding:'8px 12px', borderRadius:8};

export default function Toolbar({onRun, busy=false}:{onRun:(req:ReportRequest)=>void; busy?:boolean}){
  const [mode,setMode] = useState<'topics'|'trending'>('topics');
  const [topics,setTopics] = useState('technology, AI');
  const [days,setDays] = useState(1);
  const [country,setCountry] = useState('us');
  const [category,setCategory] = useState<NewsCategory|''>('');
  const [limit,setLimit] = useState(10);
  const [insights,setInsights] = useState(false);

  function submit(e:FormEvent){
    e.preventDefault();
    if(mode === 'trending'){
      onRun({ mode, country, ...(category ? {category} : {}), limit, insights });
      return;
    }
    onRun({ mode, topics: splitTopics(topics), days, limit, insights });
  }

  return (
    <form onSubmit={submit} style={{display:'flex', flexWrap:'wrap', gap:8, marginBottom:16, alignItems:'center'}}>
      <select aria-label="Mode" style={field} value={mode} onChange={e=>setMode(e.target.value === 'trending' ? 'trending' : 'topics')}>
        <option value="topics">Topics</option><option value="trending">Trending</option>
      </select>
      {mode === 'topics' ? (
        <>
          <input aria-label="Topics" style={{...field, minWidth:220}} value={topics} onChange={e=>setTopics(e.target.value)} placeholder="AI, climate" />
          <input aria-label="Days" type="number" min={1} max={30} style={{...field, width:72}} value={days} onChange={e=>setDays(Number(e.target.value) || 1)} />
        </>
      ) : (
        <>
          <input aria-label="Country" maxLength={2} style={{...field, width:64}} value={country} onChange={e=>setCountry(e.target.value.toLowerCase())} />
          <select aria-label="Category" style={field} value={category} onChange={e=>setCategory(CATEGORIES.find(c=>c === e.target.value) ?? '')}>
            <option value="">Any category</option>
            {CATEGORIES.map(c=><option key={c} value={c}>{c}</option>)}
          </select>
        </>
      )}
      <input aria-label="Max articles" type="number" min={1} max={100} style={{...field, width:72}} value={limit} onChange={e=>setLimit(Number(e.target.value) || 1)} />
      <label style={{fontSize:14}}><input type="checkbox" checked={insights} onChange={e=>setInsights(e.target.checked)} /> Insights</label>
      <button type="submit" disabled={busy} style={{padding:'8px 14px', borderRadius:8, background:'#111', color:'#fff', opacity: busy ? .6 : 1}}>
        {busy ? 'Running…' : 'Run report'}
      </button>
    </form>
  );
}
