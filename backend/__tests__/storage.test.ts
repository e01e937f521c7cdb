import { mkdtemp, readFile, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { reportFileName, saveReport } from '../src/services/storage.js';

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(path.join(tmpdir(), 'news-agent-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('reportFileName', () => {
  it('stamps the UTC time and picks the extension', () => {
    const at = new Date('2026-10-18T07:05:09.123Z');
    expect(reportFileName('markdown', at)).toBe('news_report_20261018_070509.md');
    expect(reportFileName('text', at, 'trending_report_us')).toBe('trending_report_us_20261018_070509.txt');
    expect(reportFileName('html', at, 'article_report')).toBe('article_report_20261018_070509.html');
  });
});

describe('saveReport', () => {
  it('creates missing directories and leaves no temp file behind', async () => {
    const target = path.join(dir, 'nested', 'deeper', 'report.md');

    const written = await saveReport('# Report\n', target);

    expect(written).toBe(target);
    expect(await readFile(target, 'utf8')).toBe('# Report\n');
    expect(await readdir(path.dirname(target))).toEqual(['report.md']);
  });

  it('replaces an existing report whole', async () => {
    const target = path.join(dir, 'report.txt');
    await saveReport('old contents that are longer', target);

    await saveReport('new', target);

    expect(await readFile(target, 'utf8')).toBe('new');
    expect(await readdir(dir)).toEqual(['report.txt']);
  });

  it('cleans up when the target cannot be written', async () => {
    // the target is an existing directory, so the rename fails
    const target = path.join(dir, 'taken');
    await saveReport('x', path.join(target, 'inner.txt'));

    await expect(saveReport('y', target)).rejects.toThrow();
    expect(await readdir(dir)).toEqual(['taken']);
  });
});
