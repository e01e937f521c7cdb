import type { NewsCategory } from '../types/news.js';

export interface FeedSource {
  url: string;
  name: string;
}

export type FeedCategory = 'technology' | 'business' | 'science' | 'general';

export const RSS_FEEDS: Record<FeedCategory, FeedSource[]> = {
  technology: [
    { url: 'https://techcrunch.com/feed/', name: 'TechCrunch' },
    { url: 'https://www.theverge.com/rss/index.xml', name: 'The Verge' },
    { url: 'https://www.wired.com/feed/rss', name: 'Wired' },
  ],
  business: [
    { url: 'https://feeds.bbci.co.uk/news/business/rss.xml', name: 'BBC Business' },
    { url: 'https://www.cnbc.com/id/100003114/device/rss/rss.html', name: 'CNBC' },
  ],
  science: [
    { url: 'https://www.sciencedaily.com/rss/all.xml', name: 'ScienceDaily' },
    { url: 'https://www.nature.com/nature.rss', name: 'Nature' },
  ],
  general: [
    { url: 'https://rss.nytimes.com/services/xml/rss/nyt/HomePage.xml', name: 'The New York Times' },
    { url: 'https://feeds.bbci.co.uk/news/rss.xml', name: 'BBC News' },
    { url: 'https://www.theguardian.com/world/rss', name: 'The Guardian' },
  ],
};

const TOPICAL: FeedCategory[] = ['technology', 'business', 'science'];

/** First category whose name appears in the topic, else general. */
export function feedCategoryForTopic(topic: string): FeedCategory {
  const t = topic.toLowerCase();
  return TOPICAL.find(c => t.includes(c)) ?? 'general';
}

export function feedCategoryForNews(category?: NewsCategory): FeedCategory {
  return category === 'technology' || category === 'business' || category === 'science' ? category : 'general';
}
