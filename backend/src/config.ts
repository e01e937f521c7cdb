import { cleanEnv, str, num, makeValidator, EnvError } from 'envalid';
import { ConfigError } from './lib/errors.js';
import { LOG_LEVELS, type LogLevel } from './lib/logger.js';
import { MAX_INTERVAL_HOURS } from './services/autonomous.js';
import { REPORT_FORMATS, type ReportFormat } from './types/news.js';

const PLACEHOLDER_KEYS = ['your-newsapi-key-here', 'your-openai-api-key-here'];

const oneOf = <T extends string>(choices: readonly T[]) =>
  makeValidator<T>((input: string) => {
    const hit = choices.find(c => c === input.trim().toLowerCase());
    if (!hit) throw new EnvError(`expected one of ${choices.join(', ')}`);
    return hit;
  });

const csv = makeValidator<string[]>((input: string) =>
  input.split(',').map(s => s.trim()).filter(Boolean));

const apiKey = makeValidator<string>((input: string) => {
  const v = input.trim();
  return PLACEHOLDER_KEYS.includes(v) ? '' : v;
});

export interface AppConfig {
  nodeEnv: 'development' | 'production' | 'test';
  port: number;
  openaiApiKey: string;
  openaiModel: string;
  openaiBaseUrl: string;
  openaiTemperature: number;
  newsapiKey: string;
  defaultLanguage: string;
  defaultCountry: string;
  maxArticlesPerTopic: number;
  defaultTopics: string[];
  reportFormat: ReportFormat;
  outputDirectory: string;
  autonomousIntervalHours: number;
  autonomousIterations: number;
  logLevel: LogLevel;
  httpTimeoutMs: number;
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const env = cleanEnv(source, {
    NODE_ENV: oneOf(['development', 'production', 'test'] as const)({ default: 'development' }),
    PORT: num({ default: 4000 }),
    OPENAI_API_KEY: apiKey({ default: '' }),
    OPENAI_MODEL: str({ default: 'gpt-4o-mini' }),
    OPENAI_BASE_URL: str({ default: 'https://api.openai.com/v1' }),
    OPENAI_TEMPERATURE: num({ default: 0.7 }),
    NEWSAPI_KEY: apiKey({ default: '' }),
    DEFAULT_LANGUAGE: str({ default: 'en' }),
    DEFAULT_COUNTRY: str({ default: 'us' }),
    MAX_ARTICLES_PER_TOPIC: num({ default: 50 }),
    DEFAULT_TOPICS: csv({ default: ['technology', 'AI', 'machine learning'] }),
    REPORT_FORMAT: oneOf(REPORT_FORMATS)({ default: 'markdown' }),
    OUTPUT_DIRECTORY: str({ default: 'reports' }),
    AUTONOMOUS_INTERVAL_HOURS: num({ default: 24 }),
    AUTONOMOUS_ITERATIONS: num({ default: 1 }),
    LOG_LEVEL: oneOf(LOG_LEVELS)({ default: 'info' }),
    HTTP_TIMEOUT_MS: num({ default: 30_000 }),
  }, {
    reporter: ({ errors }) => {
      const problems = Object.entries(errors).map(([k, e]) =>
        `${k}: ${e instanceof Error ? e.message : String(e)}`);
      if (problems.length) throw new ConfigError(problems);
    },
  });

  return {
    nodeEnv: env.NODE_ENV,
    port: env.PORT,
    openaiApiKey: env.OPENAI_API_KEY,
    openaiModel: env.OPENAI_MODEL,
    openaiBaseUrl: env.OPENAI_BASE_URL.replace(/\/+$/, ''),
    openaiTemperature: env.OPENAI_TEMPERATURE,
    newsapiKey: env.NEWSAPI_KEY,
    defaultLanguage: env.DEFAULT_LANGUAGE,
    defaultCountry: env.DEFAULT_COUNTRY,
    maxArticlesPerTopic: env.MAX_ARTICLES_PER_TOPIC,
    defaultTopics: env.DEFAULT_TOPICS,
    reportFormat: env.REPORT_FORMAT,
    outputDirectory: env.OUTPUT_DIRECTORY,
    autonomousIntervalHours: env.AUTONOMOUS_INTERVAL_HOURS,
    autonomousIterations: env.AUTONOMOUS_ITERATIONS,
    logLevel: env.LOG_LEVEL,
    httpTimeoutMs: env.HTTP_TIMEOUT_MS,
  };
}

/** Problems that make the agent unusable. A missing NewsAPI key is not one: RSS still works. */
export function validateConfig(config: AppConfig): string[] {
  const errors: string[] = [];
  if (!config.openaiApiKey) errors.push('OPENAI_API_KEY is not set');
  if (config.openaiTemperature < 0 || config.openaiTemperature > 1) {
    errors.push('OPENAI_TEMPERATURE must be between 0 and 1');
  }
  if (config.maxArticlesPerTopic < 1) errors.push('MAX_ARTICLES_PER_TOPIC must be at least 1');
  if (config.autonomousIntervalHours <= 0 || config.autonomousIntervalHours > MAX_INTERVAL_HOURS) {
    errors.push(`AUTONOMOUS_INTERVAL_HOURS must be between 0 and ${MAX_INTERVAL_HOURS}`);
  }
  if (config.autonomousIterations < 1) errors.push('AUTONOMOUS_ITERATIONS must be at least 1');
  if (!config.defaultTopics.length) errors.push('DEFAULT_TOPICS must name at least one topic');
  return errors;
}

export function configWarnings(config: AppConfig): string[] {
  return config.newsapiKey ? [] : ['NEWSAPI_KEY is not set; only RSS feeds will be used'];
}

export function assertConfig(config: AppConfig): AppConfig {
  const errors = validateConfig(config);
  if (errors.length) throw new ConfigError(errors);
  return config;
}

export function describeConfig(config: AppConfig): string {
  const set = (v: string) => (v ? '[SET]' : '[NOT SET]');
  return [
    'News Agent Configuration:',
    '========================',
    `OpenAI Model: ${config.openaiModel}`,
    `OpenAI Base URL: ${config.openaiBaseUrl}`,
    `OpenAI Temperature: ${config.openaiTemperature}`,
    `OpenAI API Key: ${set(config.openaiApiKey)}`,
    `NewsAPI Key: ${set(config.newsapiKey)}`,
    `Default Language: ${config.defaultLanguage}`,
    `Default Country: ${config.defaultCountry}`,
    `Max Articles Per Topic: ${config.maxArticlesPerTopic}`,
    `Default Topics: ${config.defaultTopics.join(', ')}`,
    `Report Format: ${config.reportFormat}`,
    `Output Directory: ${config.outputDirectory}`,
    `Autonomous Interval: ${config.autonomousIntervalHours} hours`,
    `Autonomous Iterations: ${config.autonomousIterations}`,
    `Log Level: ${config.logLevel}`,
  ].join('\n');
}
