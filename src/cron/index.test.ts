import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { calculateNextRun, CronScheduler } from './index';

const T0 = new Date('2024-06-01T00:00:00Z');

describe('calculateNextRun', () => {
  it('schedules interval jobs one period after the last run', () => {
    const last = new Date(T0.getTime() - 1000);
    expect(calculateNextRun({ type: 'interval', intervalMs: 5000 }, last, T0)).toEqual(new Date(T0.getTime() + 4000));
  });

  it('reschedules from now after an overrun', () => {
    const last = new Date(T0.getTime() - 10_000);
    expect(calculateNextRun({ type: 'interval', intervalMs: 5000 }, last, T0)).toEqual(T0);
  });

  it('finds the next local daily hour in a half-hour offset zone', () => {
    // 05:30 in Kolkata; 09:00 local is 03:30 UTC
    expect(calculateNextRun({ type: 'daily', hour: 9, timeZone: 'Asia/Kolkata' }, null, T0)).toEqual(
      new Date('2024-06-01T03:30:00Z'),
    );
  });

  it('rolls a daily job over to tomorrow once the hour has passed', () => {
    const afterNine = new Date('2024-06-01T04:00:00Z');
    expect(calculateNextRun({ type: 'daily', hour: 9, timeZone: 'Asia/Kolkata' }, null, afterNine)).toEqual(
      new Date('2024-06-02T03:30:00Z'),
    );
  });

  it('runs hourly jobs at the top of the local hour', () => {
    const now = new Date('2024-06-01T03:10:00Z');
    expect(calculateNextRun({ type: 'hourly', timeZone: 'Asia/Kolkata' }, null, now)).toEqual(
      new Date('2024-06-01T03:30:00Z'),
    );
    expect(calculateNextRun({ type: 'hourly', timeZone: 'UTC' }, null, now)).toEqual(
      new Date('2024-06-01T04:00:00Z'),
    );
  });
});

describe('CronScheduler', () => {
  let scheduler: CronScheduler;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(T0);
    scheduler = new CronScheduler({ tickIntervalMs: 1000 });
  });

  afterEach(async () => {
    await scheduler.stop();
    vi.useRealTimers();
  });

  it('runs a runOnStart job immediately and then every interval', async () => {
    const handler = vi.fn();
    scheduler.addJob({ id: 'scrape', name: 'Scrape', schedule: { type: 'interval', intervalMs: 5000 }, handler, runOnStart: true });

    scheduler.start();
    await vi.advanceTimersByTimeAsync(0);
    expect(handler).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(4000);
    expect(handler).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(1000);
    expect(handler).toHaveBeenCalledTimes(2);
  });

  it('waits one period for jobs without runOnStart', async () => {
    const handler = vi.fn();
    scheduler.addJob({ id: 'sweep', name: 'Sweep', schedule: { type: 'interval', intervalMs: 3000 }, handler });

    scheduler.start();
    await vi.advanceTimersByTimeAsync(2000);
    expect(handler).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(1000);
    expect(handler).toHaveBeenCalledTimes(1);
  });

  it('never overlaps two runs of the same job', async () => {
    let finish: () => void = () => {};
    const handler = vi.fn(
      () =>
        new Promise<void>((resolve) => {
          finish = resolve;
        }),
    );
    scheduler.addJob({ id: 'slow', name: 'Slow', schedule: { type: 'interval', intervalMs: 1000 }, handler, runOnStart: true });

    scheduler.start();
    await vi.advanceTimersByTimeAsync(3000);
    expect(handler).toHaveBeenCalledTimes(1);
    expect(scheduler.getJob('slow')?.running).toBe(true);

    finish();
    await vi.advanceTimersByTimeAsync(1000);
    expect(handler).toHaveBeenCalledTimes(2);
  });

  it('records failures and keeps the job scheduled', async () => {
    const handler = vi.fn().mockRejectedValueOnce(new Error('oracle down')).mockResolvedValue(undefined);
    scheduler.addJob({ id: 'scrape', name: 'Scrape', schedule: { type: 'interval', intervalMs: 2000 }, handler, runOnStart: true });

    scheduler.start();
    await vi.advanceTimersByTimeAsync(0);
    expect(scheduler.getJob('scrape')).toMatchObject({ lastStatus: 'error', lastError: 'oracle down' });

    await vi.advanceTimersByTimeAsync(2000);
    expect(handler).toHaveBeenCalledTimes(2);
    expect(scheduler.getJob('scrape')?.lastStatus).toBe('ok');
  });

  it('refuses runNow while the job is running', async () => {
    let finish: () => void = () => {};
    scheduler.addJob({
      id: 'slow',
      name: 'Slow',
      schedule: { type: 'interval', intervalMs: 60_000 },
      handler: () =>
        new Promise<void>((resolve) => {
          finish = resolve;
        }),
    });

    const first = scheduler.runNow('slow');
    await expect(scheduler.runNow('slow')).resolves.toBe(false);
    finish();
    await expect(first).resolves.toBe(true);
    await expect(scheduler.runNow('missing')).resolves.toBe(false);
  });

  it('waits for in-flight runs on stop', async () => {
    let finished = false;
    scheduler.addJob({
      id: 'digest',
      name: 'Digest',
      schedule: { type: 'interval', intervalMs: 60_000 },
      runOnStart: true,
      handler: async () => {
        await new Promise((resolve) => setTimeout(resolve, 500));
        finished = true;
      },
    });

    scheduler.start();
    await vi.advanceTimersByTimeAsync(0);
    const stopping = scheduler.stop();
    await vi.advanceTimersByTimeAsync(500);
    await stopping;
    expect(finished).toBe(true);
  });
});
