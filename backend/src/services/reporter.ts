import { ReportFormatError } from '../lib/errors.js';
import { collapseWhitespace, escapeHtml } from '../lib/text.js';
import { REPORT_FORMATS, type AnalyzedArticle, type Report, type ReportFormat, type ReportQuery, type Sentiment } from '../types/news.js';
import { sentimentBreakdown } from './filters.js';

const RULE = '='.repeat(80);
const THIN_RULE = '-'.repeat(80);
export const EMPTY_REPORT_MESSAGE = 'No articles to report.';

export function isReportFormat(s: string): s is ReportFormat {
  return (REPORT_FORMATS as readonly string[]).includes(s);
}

/** `YYYY-MM-DD HH:mm:ss` in UTC */
export function formatTimestamp(iso: string): string {
  const t = Date.parse(iso);
  return Number.isNaN(t) ? iso : new Date(t).toISOString().replace('T', ' ').slice(0, 19);
}

function formatPublished(iso: string): string {
  return iso ? formatTimestamp(iso) : 'unknown';
}

export function sentimentLabel(s: Sentiment): string {
  return s.charAt(0).toUpperCase() + s.slice(1);
}

export function describeQuery(q: ReportQuery): string {
  switch (q.mode) {
    case 'topics':
      return `Topics: ${q.topics.join(', ')} (last ${q.daysBack} day${q.daysBack === 1 ? '' : 's'})`;
    case 'trending':
      return `Trending: ${q.country.toUpperCase()}${q.category ? ` / ${q.category}` : ''}`;
    case 'url':
      return `URL: ${q.url}`;
  }
}

function breakdownLine(articles: AnalyzedArticle[]): string {
  const b = sentimentBreakdown(articles);
  return `Positive: ${b.positive} | Negative: ${b.negative} | Neutral: ${b.neutral}`;
}

function textReport(r: Report): string {
  const out: string[] = [
    RULE,
    `NEWS REPORT - ${formatTimestamp(r.generatedAt)}`,
    describeQuery(r.query),
    `Total Articles: ${r.count}`,
    `Sentiment: ${breakdownLine(r.articles)}`,
  ];
  if (r.skipped) out.push(`Skipped (analysis failed): ${r.skipped}`);
  out.push(RULE, '');
  if (r.insights?.overview) out.push(`Overview: ${collapseWhitespace(r.insights.overview)}`, '');
  if (!r.articles.length) {
    out.push(EMPTY_REPORT_MESSAGE);
    return out.join('\n');
  }

  r.articles.forEach((a, i) => {
    out.push(
      `[${i + 1}] ${collapseWhitespace(a.title)}`,
      `Source: ${a.source} | Published: ${formatPublished(a.publishedAt)}`,
      `Sentiment: ${sentimentLabel(a.analysis.sentiment)}`,
      '',
      `Summary: ${collapseWhitespace(a.analysis.summary)}`,
      '',
      'Key Points:',
      ...a.analysis.keyPoints.map(p => `  • ${collapseWhitespace(p)}`),
      '',
      `Read more: ${a.url}`,
      THIN_RULE,
    );
  });
  return out.join('\n');
}

function mdUrl(url: string): string {
  return url.replace(/ /g, '%20').replace(/\(/g, '%28').replace(/\)/g, '%29');
}

function markdownReport(r: Report): string {
  const out: string[] = [
    `# News Report - ${formatTimestamp(r.generatedAt)}`,
    '',
    `**Query:** ${describeQuery(r.query)}  `,
    `**Total Articles:** ${r.count}  `,
    `**Sentiment:** ${breakdownLine(r.articles)}`,
  ];
  if (r.skipped) out.push('', `_Skipped (analysis failed): ${r.skipped}_`);
  out.push('', '---', '');
  if (r.insights?.overview) out.push('### Overview', '', collapseWhitespace(r.insights.overview), '', '---', '');
  if (!r.articles.length) {
    out.push(EMPTY_REPORT_MESSAGE);
    return out.join('\n');
  }

  r.articles.forEach((a, i) => {
    out.push(
      `## ${i + 1}. ${collapseWhitespace(a.title)}`,
      '',
      `**Source:** ${a.source} | **Published:** ${formatPublished(a.publishedAt)}  `,
      `**Sentiment:** ${sentimentLabel(a.analysis.sentiment)}`,
      '',
      '### Summary',
      '',
      collapseWhitespace(a.analysis.summary),
      '',
      '### Key Points',
      '',
      ...a.analysis.keyPoints.map(p => `- ${collapseWhitespace(p)}`),
      '',
      `[Read full article](${mdUrl(a.url)})`,
      '',
      '---',
      '',
    );
  });
  return out.join('\n');
}

const HTML_STYLE = [
  'body { font-family: Arial, sans-serif; max-width: 800px; margin: 0 auto; padding: 20px; }',
  'h1 { color: #333; }',
  '.article { border: 1px solid #ddd; padding: 15px; margin: 20px 0; border-radius: 5px; }',
  '.meta { color: #666; font-size: 0.9em; }',
  '.sentiment { display: inline-block; padding: 3px 8px; border-radius: 3px; }',
  '.positive { background-color: #d4edda; color: #155724; }',
  '.negative { background-color: #f8d7da; color: #721c24; }',
  '.neutral { background-color: #d1ecf1; color: #0c5460; }',
].join('\n');

function htmlReport(r: Report): string {
  const ts = formatTimestamp(r.generatedAt);
  const out: string[] = [
    '<!DOCTYPE html>',
    '<html><head><meta charset="utf-8"><title>News Report</title>',
    `<style>\n${HTML_STYLE}\n</style></head><body>`,
    `<h1>News Report - ${escapeHtml(ts)}</h1>`,
    `<p class="meta">${escapeHtml(describeQuery(r.query))}</p>`,
    `<p><strong>Total Articles:</strong> ${r.count}</p>`,
    `<p><strong>Sentiment:</strong> ${escapeHtml(breakdownLine(r.articles))}</p>`,
  ];
  if (r.skipped) out.push(`<p class="meta">Skipped (analysis failed): ${r.skipped}</p>`);
  if (r.insights?.overview) out.push(`<h2>Overview</h2><p>${escapeHtml(r.insights.overview)}</p>`);
  if (!r.articles.length) out.push(`<p class="empty">${EMPTY_REPORT_MESSAGE}</p>`);

  r.articles.forEach((a, i) => {
    const s = a.analysis.sentiment;
    out.push(
      '<div class="article">',
      `<h2>${i + 1}. ${escapeHtml(collapseWhitespace(a.title))}</h2>`,
      `<p class="meta">Source: ${escapeHtml(a.source)} | Published: ${escapeHtml(formatPublished(a.publishedAt))}</p>`,
      `<p>Sentiment: <span class="sentiment ${s}">${sentimentLabel(s)}</span></p>`,
      `<h3>Summary</h3><p>${escapeHtml(a.analysis.summary)}</p>`,
      '<h3>Key Points</h3><ul>',
      ...a.analysis.keyPoints.map(p => `<li>${escapeHtml(p)}</li>`),
      '</ul>',
      `<p><a href="${escapeHtml(a.url)}" target="_blank" rel="noreferrer">Read full article</a></p>`,
      '</div>',
    );
  });
  out.push('</body></html>');
  return out.join('\n');
}

export function renderReport(report: Report, format: string): string {
  if (!isReportFormat(format)) throw new ReportFormatError(format);
  switch (format) {
    case 'text': return textReport(report);
    case 'markdown': return markdownReport(report);
    case 'html': return htmlReport(report);
  }
}

export function renderAll(report: Report): Record<ReportFormat, string> {
  return { text: textReport(report), markdown: markdownReport(report), html: htmlReport(report) };
}
