import type { Health, ReportRequest, ReportResponse } from '../types/news';
export const API_BASE = process.env.NEXT_PUBLIC_API_BASE || 'http://localhost:4000';

async function failure(res:Response):Promise<Error>{
  const body:unknown = await res.json().catch(()=>null);
  const msg = typeof body === 'object' && body !== null && 'error' in body && typeof body.error === 'string'
    ? body.error : `API Error ${res.status}`;
  return new Error(msg);
}

export async function runReport(req:ReportRequest, base=API_BASE):Promise<ReportResponse>{
  const res = await fetch(new URL('/api/reports', base).toString(), {
    method:'POST', cache:'no-store',
    headers:{ 'content-type':'application/json' },
    body: JSON.stringify(req),
  });
  if(!res.ok) throw await failure(res);
  return res.json();
}

export async function fetchHealth(base=API_BASE):Promise<Health>{
  try {
    const res = await fetch(new URL('/health', base).toString(), { cache:'no-store' });
    return res.ok ? await res.json() : { ok:false };
  } catch { return { ok:false }; }
}
