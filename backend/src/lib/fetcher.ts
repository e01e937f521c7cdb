import fetch, { Response, type RequestInit } from 'node-fetch';
import { HttpStatusError } from './errors.js';

export interface RetryOptions {
  timeoutMs?: number;
  retries?: number;
  backoffBaseMs?: number;
  maxRetryAfterMs?: number;
}

export type HttpClient = (url: string, init?: RequestInit, opts?: RetryOptions) => Promise<Response>;

const RETRYABLE = [429, 500, 502, 503, 504];

const wait = (ms: number) => new Promise<void>(r => setTimeout(r, ms));

// reads the body while the caller's timeout still applies
async function buffered(res: Response): Promise<Response> {
  const body = Buffer.from(await res.arrayBuffer());
  return new Response(body, { status: res.status, statusText: res.statusText, headers: res.headers });
}

/** Seconds or an HTTP date; null when absent or unparseable. */
export function parseRetryAfter(header: string | null, now = Date.now()): number | null {
  if (!header) return null;
  const secs = Number(header);
  if (Number.isFinite(secs)) return Math.max(0, secs * 1000);
  const at = Date.parse(header);
  return Number.isNaN(at) ? null : Math.max(0, at - now);
}

export async function httpRequest(
  url: string,
  init: RequestInit = {},
  { timeoutMs = 5000, retries = 2, backoffBaseMs = 500, maxRetryAfterMs = 60_000 }: RetryOptions = {}
): Promise<Response> {
  let lastErr: unknown;
  for (let i = 0; i <= retries; i++) {
    const backoff = backoffBaseMs * Math.pow(2, i);
    const ctrl = new AbortController();
    const t = setTimeout(() => ctrl.abort(), timeoutMs);
    let res: Response;
    try {
      res = await buffered(await fetch(url, { ...init, signal: ctrl.signal }));
    } catch (e) {
      // network failure or timeout
      lastErr = e;
      if (i < retries) await wait(backoff);
      continue;
    } finally {
      clearTimeout(t);
    }
    if (res.ok) return res;

    const detail = (await res.text().catch(() => '')).slice(0, 200);
    lastErr = new HttpStatusError(res.status, res.statusText, url, detail);
    if (!RETRYABLE.includes(res.status)) throw lastErr;
    if (i < retries) {
      const retryAfter = parseRetryAfter(res.headers.get('retry-after'));
      await wait(retryAfter === null ? backoff : Math.min(retryAfter, maxRetryAfterMs));
    }
  }
  throw lastErr instanceof Error ? lastErr : new Error(String(lastErr));
}

export async function httpPostJson(
  http: HttpClient,
  url: string,
  body: unknown,
  headers: Record<string, string> = {},
  opts?: RetryOptions
): Promise<Response> {
  return http(url, {
    method: 'POST',
    headers: { 'content-type': 'application/json', ...headers },
    body: JSON.stringify(body),
  }, opts);
}
