import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { ReportFormat } from '../types/news.js';

export const REPORT_EXTENSIONS: Record<ReportFormat, string> = { text: 'txt', markdown: 'md', html: 'html' };

/** `{prefix}_YYYYMMDD_HHMMSS.{ext}`, UTC */
export function reportFileName(format: ReportFormat, now: Date, prefix = 'news_report'): string {
  const stamp = now.toISOString().slice(0, 19).replace(/-|:/g, '').replace('T', '_');
  return `${prefix}_${stamp}.${REPORT_EXTENSIONS[format]}`;
}

/** Writes to a sibling temp file and renames it over the target. */
export async function saveReport(content: string, filePath: string): Promise<string> {
  const target = path.resolve(filePath);
  await mkdir(path.dirname(target), { recursive: true });
  const tmp = `${target}.${process.pid}.${Date.now()}.tmp`;
  try {
    await writeFile(tmp, content, 'utf8');
    await rename(tmp, target);
  } catch (e) {
    await rm(tmp, { force: true });
    throw e;
  }
  return target;
}
