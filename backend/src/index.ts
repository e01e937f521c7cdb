import dotenv from 'dotenv';
import { createAgent } from './agent.js';
import { createApp } from './app.js';
import { assertConfig, configWarnings, loadConfig, type AppConfig } from './config.js';
import { ConfigError } from './lib/errors.js';
import { createLogger } from './lib/logger.js';

dotenv.config();

function start() {
  let config: AppConfig;
  try {
    config = assertConfig(loadConfig());
  } catch (e) {
    if (!(e instanceof ConfigError)) throw e;
    console.error('Configuration validation failed:');
    for (const p of e.problems) console.error(`  - ${p}`);
    process.exitCode = 1;
    return;
  }

  const logger = createLogger('server', config.logLevel);
  for (const w of configWarnings(config)) logger.warn(w);

  const app = createApp({ agent: createAgent(config, logger), config, logger });
  const port = config.port;
  app.listen(port, () => {
    logger.info(`Backend running on http://localhost:${port}`);
  });
}

start();
