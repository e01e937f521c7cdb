import { setTimeout as sleepFor } from 'node:timers/promises';
import { errorMessage } from '../lib/errors.js';
import { silentLogger, type Logger } from '../lib/logger.js';
import type { Report } from '../types/news.js';

const HOUR_MS = 3_600_000;

// setTimeout cannot sleep longer than 2^31-1 ms
export const MAX_INTERVAL_HOURS = 596;

export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

export const defaultSleep: Sleeper = async (ms, signal) => {
  await sleepFor(ms, undefined, { signal });
};

export interface AutonomousOptions {
  iterations: number;
  intervalHours: number;
  runOnce: (iteration: number) => Promise<Report>;
  /** Called only for reports with articles; resolves to where it was written. */
  persist: (report: Report, iteration: number) => Promise<string>;
  sleep?: Sleeper;
  signal?: AbortSignal;
  logger?: Logger;
}

export interface AutonomousSummary {
  completed: number;
  failed: number;
  saved: string[];
  aborted: boolean;
}

function isAbort(e: unknown): boolean {
  return e instanceof Error && e.name === 'AbortError';
}

export async function runAutonomous(opts: AutonomousOptions): Promise<AutonomousSummary> {
  const logger = opts.logger ?? silentLogger;
  const sleep = opts.sleep ?? defaultSleep;
  const summary: AutonomousSummary = { completed: 0, failed: 0, saved: [], aborted: false };

  logger.info(`Will run every ${opts.intervalHours} hours for ${opts.iterations} iteration(s)`);

  for (let i = 1; i <= opts.iterations; i++) {
    if (opts.signal?.aborted) {
      summary.aborted = true;
      break;
    }
    logger.info(`Iteration ${i}/${opts.iterations}`);
    try {
      const report = await opts.runOnce(i);
      if (report.count > 0) {
        const where = await opts.persist(report, i);
        summary.saved.push(where);
        logger.info(`Report saved to: ${where}`);
      } else {
        logger.warn('No articles found in this iteration');
      }
      summary.completed += 1;
    } catch (e) {
      summary.failed += 1;
      logger.error(`Error in autonomous mode: ${errorMessage(e)}`);
      if (i < opts.iterations) logger.info('Continuing to next iteration...');
    }

    if (i < opts.iterations) {
      logger.info(`Sleeping for ${opts.intervalHours} hours until next run...`);
      try {
        await sleep(opts.intervalHours * HOUR_MS, opts.signal);
      } catch (e) {
        if (!isAbort(e)) throw e;
        summary.aborted = true;
        break;
      }
    }
  }

  logger.info(summary.aborted ? 'Autonomous mode interrupted' : 'Autonomous mode completed');
  return summary;
}
