import NewsCard from './NewsCard';
import type { AnalyzedArticle } from '../types/news';
export default function NewsList({items}:{items:AnalyzedArticle[]}) {
  if(!items.length) return <div style={{opacity:.7}}>No articles to show.</div>;
  return (
    <div
      style={{display:'grid', gap:16, gridTemplateColumns:'repeat(auto-fill,minmax(320px,1fr))'}}
    >
      {items.map(a => <NewsCard key={a.url} a={a} />)}
    </div>
  );
}
