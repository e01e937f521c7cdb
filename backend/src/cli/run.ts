import path from 'node:path';
import type { AppConfig } from '../config.js';
import { silentLogger, type Logger } from '../lib/logger.js';
import { runAutonomous, type AutonomousSummary, type Sleeper } from '../services/autonomous.js';
import type { NewsPipeline, PipelineRequest } from '../services/pipeline.js';
import { renderReport, sentimentLabel } from '../services/reporter.js';
import { reportFileName, saveReport } from '../services/storage.js';
import { SENTIMENTS, type Report, type ReportFormat, type ReportQuery } from '../types/news.js';
import type { CliOptions } from './args.js';

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

export interface RunContext {
  pipeline: Pick<NewsPipeline, 'run'>;
  config: AppConfig;
  io: CliIO;
  logger?: Logger;
  now?: () => Date;
  signal?: AbortSignal;
  sleep?: Sleeper;
}

export function buildQuery(options: CliOptions, config: AppConfig): ReportQuery {
  if (options.command === 'url' && options.url !== undefined) return { mode: 'url', url: options.url };
  if (options.command === 'trending') {
    return {
      mode: 'trending',
      country: options.country ?? config.defaultCountry,
      ...(options.category ? { category: options.category } : {}),
    };
  }
  const topics = options.topics.length ? options.topics : config.defaultTopics;
  return { mode: 'topics', topics, daysBack: options.days };
}

export function buildRequest(options: CliOptions, config: AppConfig): PipelineRequest {
  return {
    query: buildQuery(options, config),
    language: config.defaultLanguage,
    limit: options.limit,
    filters: { sentiment: options.sentiment, source: options.source },
    insights: options.insights,
  };
}

export function filePrefix(query: ReportQuery): string {
  switch (query.mode) {
    case 'trending': return `trending_report_${query.country}`;
    case 'url': return 'article_report';
    default: return 'news_report';
  }
}

function outputPath(report: Report, format: ReportFormat, config: AppConfig, now: Date, explicit?: string): string {
  if (explicit) return explicit;
  return path.join(config.outputDirectory, reportFileName(format, now, filePrefix(report.query)));
}

export function summaryLines(report: Report, where: string): string[] {
  const lines = [`✓ Report generated: ${where}`, `  Total articles processed: ${report.count}`];
  if (report.skipped) lines.push(`  Skipped (analysis failed): ${report.skipped}`);
  const counts = report.articles.reduce<Record<string, number>>((acc, a) => {
    acc[a.analysis.sentiment] = (acc[a.analysis.sentiment] ?? 0) + 1;
    return acc;
  }, {});
  const breakdown = SENTIMENTS.filter(s => counts[s]).map(s => `${sentimentLabel(s)}: ${counts[s]}`);
  if (breakdown.length) lines.push(`  Sentiment: ${breakdown.join(', ')}`);
  return lines;
}

/** One report, written to disk. Returns the absolute path. */
export async function runOnce(options: CliOptions, ctx: RunContext): Promise<string> {
  const now = ctx.now ?? (() => new Date());
  const format = options.format ?? ctx.config.reportFormat;
  const report = await ctx.pipeline.run(buildRequest(options, ctx.config), { signal: ctx.signal });

  for (const w of report.warnings) ctx.io.err(`warning: ${w}`);

  const where = await saveReport(
    renderReport(report, format),
    outputPath(report, format, ctx.config, now(), options.output),
  );
  for (const line of summaryLines(report, where)) ctx.io.out(line);
  if (report.fetched === 0) {
    ctx.io.out('⚠ No articles found for the specified topics and timeframe.');
    ctx.io.out('  Try adjusting your topics or increasing the --days parameter.');
  }
  return where;
}

export async function runAutonomousCommand(options: CliOptions, ctx: RunContext): Promise<AutonomousSummary> {
  const now = ctx.now ?? (() => new Date());
  const format = options.format ?? ctx.config.reportFormat;
  const request = buildRequest(options, ctx.config);

  const summary = await runAutonomous({
    iterations: options.iterations ?? ctx.config.autonomousIterations,
    intervalHours: options.interval ?? ctx.config.autonomousIntervalHours,
    runOnce: () => ctx.pipeline.run(request, { signal: ctx.signal }),
    persist: report => saveReport(renderReport(report, format), outputPath(report, format, ctx.config, now())),
    sleep: ctx.sleep,
    signal: ctx.signal,
    logger: ctx.logger ?? silentLogger,
  });

  ctx.io.out(`Autonomous runs: ${summary.completed} completed, ${summary.failed} failed, ${summary.saved.length} saved`);
  return summary;
}
