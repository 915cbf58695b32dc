import { describe, expect, it } from 'vitest';
import { MonitorScheduler } from './scheduler.js';
import type { TriggerResponse } from './types/index.js';

const SUCCESS: TriggerResponse = {
  statusCode: 200,
  body: { status: 'success', updates_found: 0, pdfs_analyzed: 0, execution_time: 0.5 },
};

describe('MonitorScheduler', () => {
  it('skips a tick while a run is in progress', async () => {
    let finish: (response: TriggerResponse) => void = () => undefined;
    let runs = 0;
    const scheduler = new MonitorScheduler({
      cronExpression: '0 9 * * 1-5',
      timezone: 'America/Mexico_City',
      run: () => {
        runs++;
        return new Promise<TriggerResponse>((resolve) => {
          finish = resolve;
        });
      },
    });

    const first = scheduler.execute();
    expect(scheduler.isRunning()).toBe(true);
    await expect(scheduler.execute()).resolves.toBeNull();

    finish(SUCCESS);
    await expect(first).resolves.toEqual(SUCCESS);
    expect(runs).toBe(1);
    expect(scheduler.isRunning()).toBe(false);
  });

  it('allows a new run after a failed one', async () => {
    let calls = 0;
    const scheduler = new MonitorScheduler({
      cronExpression: '0 9 * * 1-5',
      timezone: 'America/Mexico_City',
      run: async () => {
        calls++;
        if (calls === 1) {
          throw new Error('boom');
        }
        return SUCCESS;
      },
    });

    await expect(scheduler.execute()).rejects.toThrow('boom');
    await expect(scheduler.execute()).resolves.toEqual(SUCCESS);
  });

  it('rejects an invalid cron expression', () => {
    const scheduler = new MonitorScheduler({
      cronExpression: 'every morning',
      timezone: 'America/Mexico_City',
      run: async () => SUCCESS,
    });

    expect(() => scheduler.start()).toThrow('Invalid cron expression: every morning');
    expect(scheduler.isScheduled()).toBe(false);
  });

  it('schedules and stops a valid expression', () => {
    const scheduler = new MonitorScheduler({
      cronExpression: '0 9 * * 1-5',
      timezone: 'America/Mexico_City',
      run: async () => SUCCESS,
    });

    scheduler.start();
    expect(scheduler.isScheduled()).toBe(true);
    scheduler.stop();
    expect(scheduler.isScheduled()).toBe(false);
  });
});
