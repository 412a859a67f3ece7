import dotenv from 'dotenv';
import chalk from 'chalk';
import { createDb, loadConfig } from '@duetrack/core';
import { createApp } from './app.js';
import { createLogger } from './lib/logger.js';

dotenv.config();

function main(): void {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  const db = createDb(config.databasePath);
  const app = createApp({ config, db, logger });

  app.listen(config.port, () => {
    logger.info(`duetrack listening on ${config.port} (db: ${config.databasePath}, ownership: ${config.ownership})`);
  });
}

try {
  main();
} catch (err: unknown) {
  console.error(chalk.red(err instanceof Error ? err.message : String(err)));
  process.exit(1);
}
