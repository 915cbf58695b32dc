/**
 * Trigger entry point for schedulers and serverless runtimes
 */

import { loadConfig } from './config/index.js';
import { createDependencies, runMonitor, toTriggerResponse } from './monitor.js';
import type { TriggerResponse } from './types/index.js';
import { applyTimezone } from './utils/dates.js';

/**
 * Run the monitor once with configuration from the environment.
 * Storage key stamps follow the configured TZ. The event payload is ignored.
 */
export async function handler(_event?: unknown): Promise<TriggerResponse> {
  const outcome = await runMonitor(() => {
    const config = loadConfig();
    applyTimezone(config.scheduler.timezone);
    return createDependencies(config);
  });
  return toTriggerResponse(outcome);
}
