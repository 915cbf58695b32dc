/**
 * Scheduler
 *
 * Runs the monitor on a cron schedule
 */

import cron, { type ScheduledTask } from 'node-cron';
import { errorMessage } from './utils/errors.js';
import { logger as defaultLogger, type Logger } from './utils/logger.js';
import type { TriggerResponse } from './types/index.js';

export interface SchedulerOptions {
  cronExpression: string;
  timezone: string;
  run: () => Promise<TriggerResponse>;
  logger?: Logger;
}

export class MonitorScheduler {
  private task: ScheduledTask | null = null;
  private running = false;
  private readonly logger: Logger;

  constructor(private readonly options: SchedulerOptions) {
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Execute a run unless one is already in progress.
   * Resolves null when the tick was skipped.
   */
  async execute(): Promise<TriggerResponse | null> {
    if (this.running) {
      this.logger.warn('Monitor already running, skipping this execution');
      return null;
    }

    this.running = true;
    const startTime = new Date();
    this.logger.info({ startTime: startTime.toISOString() }, 'Scheduled run starting');

    try {
      const response = await this.options.run();
      this.logger.info(
        { startTime: startTime.toISOString(), endTime: new Date().toISOString(), response },
        'Scheduled run completed'
      );
      return response;
    } finally {
      this.running = false;
    }
  }

  start(): void {
    const { cronExpression, timezone } = this.options;

    if (!cron.validate(cronExpression)) {
      throw new Error(`Invalid cron expression: ${cronExpression}`);
    }

    this.logger.info({ cronExpression, timezone }, 'Starting scheduler');

    this.task = cron.schedule(
      cronExpression,
      () => {
        this.execute().catch((error: unknown) => {
          this.logger.error({ error: errorMessage(error) }, 'Scheduled run failed');
        });
      },
      { timezone }
    );

    this.logger.info('Scheduler started');
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      this.logger.info('Scheduler stopped');
    }
  }

  isScheduled(): boolean {
    return this.task !== null;
  }

  isRunning(): boolean {
    return this.running;
  }
}
