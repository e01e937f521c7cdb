import type { Request, Response, NextFunction } from 'express';

export interface CacheEntry {
  at: number;
  body: unknown;
}

export interface CacheOptions {
  clock?: () => number;
  maxEntries?: number;
  store?: Map<string, CacheEntry>;
}

export function cache(seconds = 120, { clock = Date.now, maxEntries = 500, store = new Map() }: CacheOptions = {}) {
  const ttl = seconds * 1000;
  const mem: Map<string, CacheEntry> = store;

  // insertion order is age order
  const prune = (now: number) => {
    for (const [k, v] of mem) {
      if (now - v.at < ttl) break;
      mem.delete(k);
    }
    while (mem.size >= maxEntries) {
      const oldest = mem.keys().next();
      if (oldest.done) break;
      mem.delete(oldest.value);
    }
  };

  return (req: Request, res: Response, next: NextFunction) => {
    const key = req.originalUrl;
    const hit = mem.get(key);
    if (hit && clock() - hit.at < ttl) {
      res.setHeader('X-Cache', 'HIT');
      res.json(hit.body);
      return;
    }
    mem.delete(key);
    res.setHeader('X-Cache', 'MISS');
    const json = res.json.bind(res);
    res.json = (body: unknown) => {
      if (res.statusCode < 400) {
        const now = clock();
        prune(now);
        mem.set(key, { at: now, body });
      }
      return json(body);
    };
    next();
  };
}
