#!/usr/bin/env node
/**
 * SAT Bulletin Monitor
 *
 * Watches the SAT technical bulletin page and, for every new PDF:
 * 1. Downloads it and extracts its text
 * 2. Searches the text for the configured keywords
 * 3. Archives the PDF and records it as processed
 * Then emails a summary of the matches.
 *
 * Usage:
 *   node dist/index.js --service  - Run on the cron schedule (default)
 *   node dist/index.js --run      - Run once, print the result and exit
 */

import { loadConfig } from './config/index.js';
import { handler } from './handler.js';
import { MonitorScheduler } from './scheduler.js';
import { applyTimezone } from './utils/dates.js';
import { errorMessage } from './utils/errors.js';
import { logger } from './utils/logger.js';

const args = process.argv.slice(2);
const isRunOnce = args.includes('--run');

async function runOnce(): Promise<number> {
  const response = await handler();
  process.stdout.write(`${JSON.stringify(response, null, 2)}\n`);
  return response.statusCode === 200 ? 0 : 1;
}

async function runService(): Promise<void> {
  const config = loadConfig();
  applyTimezone(config.scheduler.timezone);

  const scheduler = new MonitorScheduler({
    cronExpression: config.scheduler.cronExpression,
    timezone: config.scheduler.timezone,
    run: handler,
  });

  const shutdown = (signal: string): void => {
    logger.info({ signal }, 'Shutting down...');
    scheduler.stop();
    process.exit(0);
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  logger.info({ env: config.app.env, mode: 'service' }, 'Starting application');

  logger.info('Running initial check...');
  await scheduler.execute();

  scheduler.start();
  logger.info('Scheduler running. Press Ctrl+C to stop.');
}

async function main(): Promise<void> {
  if (isRunOnce) {
    process.exitCode = await runOnce();
    return;
  }
  await runService();
}

main().catch((error: unknown) => {
  logger.fatal({ error: errorMessage(error) }, 'Application failed');
  process.exit(1);
});
