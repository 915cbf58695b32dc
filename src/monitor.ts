/**
 * Monitor run
 *
 * Wraps one ingestion pass with configuration, notification and the run log,
 * and turns the result into the trigger response.
 */

import type { MonitorConfig } from './config/index.js';
import { closeDatabase, getSqlClient, initDatabase } from './db/index.js';
import { createEmailNotifier, type Notifier } from './notifier/index.js';
import { runIngestion } from './pipeline.js';
import { HttpFetcher, createTextExtractor, type DocumentFetcher } from './scraper/index.js';
import {
  DedupStore,
  PostgresObjectStore,
  S3ObjectStore,
  writeRunLog,
  type ObjectStore,
} from './storage/index.js';
import { MonitorError, StoreError, errorMessage } from './utils/errors.js';
import { logger as defaultLogger, type Logger } from './utils/logger.js';
import type { Advisory, MatchResult, RunOutcome, RunStatus, TriggerResponse } from './types/index.js';

export const INTERNAL_ERROR_MESSAGE = 'Internal server error';

export interface MonitorDependencies {
  config: MonitorConfig;
  fetcher: DocumentFetcher;
  store: ObjectStore;
  notifier: Notifier;
  extractText: (bytes: Uint8Array) => Promise<string>;
  /** Releases connections held by the store */
  dispose?: () => Promise<void>;
}

export interface MonitorOptions {
  logger?: Logger;
  clock?: () => Date;
  tempRoot?: string;
}

/**
 * Build the production dependencies for a validated configuration
 */
export async function createDependencies(
  config: MonitorConfig,
  logger: Logger = defaultLogger
): Promise<MonitorDependencies> {
  const fetcher = new HttpFetcher(config.http, { logger });
  const notifier = createEmailNotifier(config.email, logger);
  const extractText = createTextExtractor({ logger });

  if (config.storage.backend === 'postgres') {
    try {
      await initDatabase(config.storage.databaseUrl);
    } catch (error) {
      throw new StoreError(`Could not open database: ${errorMessage(error)}`, 'stored_objects', error);
    }
    return {
      config,
      fetcher,
      notifier,
      extractText,
      store: new PostgresObjectStore(getSqlClient()),
      dispose: closeDatabase,
    };
  }

  const s3 = new S3ObjectStore({ bucket: config.storage.bucket, region: config.storage.region });
  return {
    config,
    fetcher,
    notifier,
    extractText,
    store: s3,
    dispose: async () => s3.destroy(),
  };
}

function elapsedSeconds(start: Date, end: Date): number {
  return (end.getTime() - start.getTime()) / 1000;
}

function successLog(now: Date, executionTime: number, discovered: number, matches: MatchResult[]): string {
  return [
    `Monitoring run completed: ${now.toISOString()}`,
    `Execution time: ${executionTime.toFixed(2)} seconds`,
    `PDFs found: ${discovered}`,
    `Updates detected: ${matches.length}`,
    `Updates: ${JSON.stringify(matches.map((match) => match.document))}`,
  ].join('\n');
}

function errorLog(now: Date, error: unknown): string {
  const heading =
    error instanceof MonitorError
      ? `SAT monitor error: ${error.message}`
      : `Unexpected error: ${errorMessage(error)}`;
  return `${heading}\nTimestamp: ${now.toISOString()}`;
}

/**
 * Execute one monitoring run. Never rejects.
 *
 * resolveDependencies is where configuration is validated; a
 * ConfigurationError thrown there ends the run before any network call.
 */
export async function runMonitor(
  resolveDependencies: () => MonitorDependencies | Promise<MonitorDependencies>,
  options: MonitorOptions = {}
): Promise<RunOutcome> {
  const logger = options.logger ?? defaultLogger;
  const clock = options.clock ?? (() => new Date());
  const start = clock();

  const advisories: Advisory[] = [];
  let deps: MonitorDependencies | undefined;
  let linksDiscovered = 0;
  let matches: MatchResult[] = [];

  const recordRun = async (status: RunStatus, message: string): Promise<void> => {
    if (!deps) {
      logger.warn({ status }, 'Run log not saved: storage is not available');
      return;
    }
    const result = await writeRunLog(deps.store, status, message, clock(), logger);
    if (!result.ok) {
      advisories.push({ operation: 'write-run-log', key: result.error.key, message: result.error.message });
    }
  };

  try {
    deps = await resolveDependencies();
    const { config } = deps;

    logger.info({ sourceUrl: config.sourceUrl }, 'Starting SAT bulletin monitoring');

    const report = await runIngestion({
      settings: config,
      fetcher: deps.fetcher,
      dedup: new DedupStore(deps.store, { clock, logger }),
      archive: deps.store,
      extractText: deps.extractText,
      logger,
      clock,
      tempRoot: options.tempRoot,
    });
    linksDiscovered = report.discovered;
    matches = report.matches;
    advisories.push(...report.advisories);

    await deps.notifier.notify(matches);

    const end = clock();
    const executionTime = elapsedSeconds(start, end);
    const message = successLog(end, executionTime, linksDiscovered, matches);
    await recordRun('success', message);
    logger.info({ executionTime, linksDiscovered, updates: matches.length }, 'Monitoring run completed');

    return { status: 'success', linksDiscovered, matches, executionTime, advisories };
  } catch (error) {
    const end = clock();
    const known = error instanceof MonitorError;
    logger.error({ error: errorMessage(error) }, known ? 'SAT monitor error' : 'Unexpected error');

    await recordRun('error', errorLog(end, error));

    return {
      status: 'error',
      linksDiscovered,
      matches,
      executionTime: elapsedSeconds(start, end),
      errorMessage: error instanceof MonitorError ? error.message : INTERNAL_ERROR_MESSAGE,
      advisories,
    };
  } finally {
    if (deps?.dispose) {
      await deps.dispose().catch((error: unknown) => {
        logger.warn({ error: errorMessage(error) }, 'Failed to release resources');
      });
    }
  }
}

export function toTriggerResponse(outcome: RunOutcome): TriggerResponse {
  if (outcome.status === 'success') {
    return {
      statusCode: 200,
      body: {
        status: 'success',
        updates_found: outcome.matches.length,
        pdfs_analyzed: outcome.linksDiscovered,
        execution_time: outcome.executionTime,
      },
    };
  }

  return {
    statusCode: 500,
    body: {
      status: 'error',
      message: outcome.errorMessage ?? INTERNAL_ERROR_MESSAGE,
    },
  };
}
