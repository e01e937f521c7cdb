import { createAgent } from '../agent.js';
import { assertConfig, configWarnings, describeConfig, loadConfig, validateConfig, type AppConfig } from '../config.js';
import { ConfigError, errorMessage } from '../lib/errors.js';
import { createLogger } from '../lib/logger.js';
import type { Sleeper } from '../services/autonomous.js';
import type { NewsPipeline } from '../services/pipeline.js';
import { parseCliArgs, UsageError, USAGE, type CliOptions } from './args.js';
import { runAutonomousCommand, runOnce, type CliIO } from './run.js';

export interface MainDeps {
  io: CliIO;
  env?: NodeJS.ProcessEnv;
  signal?: AbortSignal;
  sleep?: Sleeper;
  now?: () => Date;
  /** Replaces the real agent; tests pass a stub pipeline. */
  pipeline?: (config: AppConfig) => Pick<NewsPipeline, 'run'>;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

function printProblems(io: CliIO, heading: string, problems: string[]) {
  io.err(heading);
  for (const p of problems) io.err(`  - ${p}`);
}

async function execute(options: CliOptions, config: AppConfig, deps: MainDeps): Promise<number> {
  const logger = createLogger('news-agent', config.logLevel);
  for (const w of configWarnings(config)) logger.warn(w);

  const pipeline = deps.pipeline ? deps.pipeline(config) : createAgent(config, logger).pipeline;
  const ctx = { pipeline, config, io: deps.io, logger, now: deps.now, signal: deps.signal, sleep: deps.sleep };

  if (options.command === 'autonomous') {
    const summary = await runAutonomousCommand(options, ctx);
    return summary.completed > 0 || summary.aborted ? EXIT_OK : EXIT_FAILURE;
  }
  await runOnce(options, ctx);
  return EXIT_OK;
}

/** Runs the command line and resolves to the process exit code. */
export async function main(argv: string[], deps: MainDeps): Promise<number> {
  const { io } = deps;

  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (e) {
    if (!(e instanceof UsageError)) throw e;
    io.err(`Error: ${e.message}`);
    io.err('Run with --help for usage.');
    return EXIT_USAGE;
  }

  if (options.command === 'help') {
    io.out(USAGE);
    return EXIT_OK;
  }

  let config: AppConfig;
  try {
    config = loadConfig(deps.env ?? process.env);
  } catch (e) {
    if (!(e instanceof ConfigError)) throw e;
    printProblems(io, 'Configuration validation failed:', e.problems);
    return EXIT_FAILURE;
  }

  if (options.command === 'config') {
    io.out(describeConfig(config));
    return EXIT_OK;
  }

  if (options.command === 'validate') {
    const problems = validateConfig(config);
    if (problems.length) {
      printProblems(io, '✗ Configuration validation failed:', problems);
      return EXIT_FAILURE;
    }
    io.out('✓ Configuration is valid');
    for (const w of configWarnings(config)) io.out(`  note: ${w}`);
    return EXIT_OK;
  }

  try {
    assertConfig(config);
  } catch (e) {
    if (!(e instanceof ConfigError)) throw e;
    printProblems(io, 'Configuration validation failed:', e.problems);
    return EXIT_FAILURE;
  }

  try {
    return await execute(options, config, deps);
  } catch (e) {
    io.err(`Error: ${errorMessage(e)}`);
    return EXIT_FAILURE;
  }
}
