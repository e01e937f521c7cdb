import { parseArgs } from 'node:util';
import { AppError, errorMessage } from '../lib/errors.js';
import { MAX_INTERVAL_HOURS } from '../services/autonomous.js';
import {
  NEWS_CATEGORIES, REPORT_FORMATS, SENTIMENTS,
  type NewsCategory, type ReportFormat, type Sentiment,
} from '../types/news.js';

export class UsageError extends AppError {
  constructor(message: string) {
    super(message, 400, 'usage');
  }
}

export type CliCommand = 'help' | 'config' | 'validate' | 'autonomous' | 'url' | 'trending' | 'topics';

export interface CliOptions {
  command: CliCommand;
  topics: string[];
  days: number;
  country?: string;
  category?: NewsCategory;
  url?: string;
  format?: ReportFormat;
  output?: string;
  sentiment?: Sentiment;
  source?: string;
  limit?: number;
  interval?: number;
  iterations?: number;
  insights: boolean;
}

export const USAGE = `Usage: news-agent [options] [topic...]

Fetch news, summarize each article with an LLM and write a report.

Modes (first match wins):
  --help, -h              Show this help
  --config                Display the current configuration and exit
  --validate              Validate the configuration and exit
  --autonomous            Run repeatedly (see --interval, --iterations)
  --url <url>             Analyze a single article
  --trending              Fetch top headlines instead of a topic search
  (default)               Search the given topics, or DEFAULT_TOPICS

Options:
  -t, --topic <topic>     Topic to search for; repeatable, commas allowed
  --days <n>              Days to look back (default: 1)
  --country <cc>          Country code for trending news (default: DEFAULT_COUNTRY)
  --category <name>       Trending category: ${NEWS_CATEGORIES.join(', ')}
  -f, --format <fmt>      Report format: ${REPORT_FORMATS.join(', ')} (default: REPORT_FORMAT)
  -o, --output <path>     Output file (default: timestamped file in OUTPUT_DIRECTORY)
  --sentiment <label>     Keep only ${SENTIMENTS.join(', ')} articles
  --source <name>         Keep only articles whose source contains <name>
  --limit <n>             Analyze at most <n> articles
  --insights              Add an overview of themes across the articles
  --interval <hours>      Hours between autonomous runs (default: AUTONOMOUS_INTERVAL_HOURS)
  --iterations <n>        Autonomous runs (default: AUTONOMOUS_ITERATIONS)

Examples:
  news-agent --topic AI --topic "climate change"
  news-agent --trending --country us --category technology --format html
  news-agent --autonomous --interval 12 --iterations 5
  news-agent --sentiment positive technology`;

function choice<T extends string>(name: string, value: string | undefined, choices: readonly T[]): T | undefined {
  if (value === undefined) return undefined;
  const hit = choices.find(c => c === value.trim().toLowerCase());
  if (!hit) throw new UsageError(`--${name} must be one of: ${choices.join(', ')}`);
  return hit;
}

function int(name: string, value: string | undefined, min: number): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isInteger(n) || n < min) throw new UsageError(`--${name} must be an integer >= ${min}`);
  return n;
}

function hours(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0 || n > MAX_INTERVAL_HOURS) {
    throw new UsageError(`--interval must be a number of hours between 0 and ${MAX_INTERVAL_HOURS}`);
  }
  return n;
}

export function splitTopics(values: string[]): string[] {
  return values.flatMap(v => v.split(',')).map(t => t.trim()).filter(Boolean);
}

function readArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      help: { type: 'boolean', short: 'h' },
      config: { type: 'boolean' },
      validate: { type: 'boolean' },
      autonomous: { type: 'boolean' },
      trending: { type: 'boolean' },
      insights: { type: 'boolean' },
      topic: { type: 'string', short: 't', multiple: true },
      topics: { type: 'string', multiple: true },
      url: { type: 'string' },
      days: { type: 'string' },
      country: { type: 'string' },
      category: { type: 'string' },
      format: { type: 'string', short: 'f' },
      output: { type: 'string', short: 'o' },
      sentiment: { type: 'string' },
      source: { type: 'string' },
      limit: { type: 'string' },
      interval: { type: 'string' },
      iterations: { type: 'string' },
    },
  });
}

export function parseCliArgs(argv: string[]): CliOptions {
  let parsed: ReturnType<typeof readArgs>;
  try {
    parsed = readArgs(argv);
  } catch (e) {
    throw new UsageError(errorMessage(e));
  }
  const { values: v, positionals } = parsed;

  const command: CliCommand =
    v.help ? 'help'
      : v.config ? 'config'
        : v.validate ? 'validate'
          : v.autonomous ? 'autonomous'
            : v.url !== undefined ? 'url'
              : v.trending ? 'trending'
                : 'topics';

  const country = v.country?.trim().toLowerCase();
  if (country !== undefined && !/^[a-z]{2}$/.test(country)) throw new UsageError('--country must be a two-letter code');

  return {
    command,
    topics: splitTopics([...(v.topic ?? []), ...(v.topics ?? []), ...positionals]),
    days: int('days', v.days, 1) ?? 1,
    country,
    category: choice('category', v.category, NEWS_CATEGORIES),
    url: v.url,
    format: choice('format', v.format, REPORT_FORMATS),
    output: v.output,
    sentiment: choice('sentiment', v.sentiment, SENTIMENTS),
    source: v.source,
    limit: int('limit', v.limit, 1),
    interval: hours(v.interval),
    iterations: int('iterations', v.iterations, 1),
    insights: v.insights ?? false,
  };
}
