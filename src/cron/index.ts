/**
 * Cron Scheduler - Scheduled job execution
 *
 * Features:
 * - Interval jobs (run every N milliseconds)
 * - Hourly jobs (top of every local hour)
 * - Daily jobs (fixed local hour in an IANA time zone)
 * - A job never starts while its previous run is still in flight
 * - 30-second scheduler loop
 */

import { createLogger } from '../utils/logger';
import { nextDailyRun, nextHourlyRun } from '../utils/time';

const logger = createLogger('cron');

// =============================================================================
// TYPES
// =============================================================================

export type CronJobSchedule =
  | { type: 'interval'; intervalMs: number }
  | { type: 'hourly'; timeZone: string }
  | { type: 'daily'; hour: number; timeZone: string };

export type CronJobStatus = 'ok' | 'error' | 'pending';

export type CronJobHandler = () => Promise<void> | void;

export interface CronJob {
  id: string;
  name: string;
  schedule: CronJobSchedule;
  handler: CronJobHandler;
  running: boolean;
  lastRunAt: Date | null;
  nextRunAt: Date | null;
  lastStatus: CronJobStatus;
  lastError?: string;
  lastDurationMs?: number;
}

export interface CronJobInput {
  id: string;
  name: string;
  schedule: CronJobSchedule;
  handler: CronJobHandler;
  /** Due as soon as the scheduler starts instead of after the first period */
  runOnStart?: boolean;
}

export interface CronSchedulerOptions {
  tickIntervalMs?: number;
  now?: () => Date;
}

// =============================================================================
// CALCULATE NEXT RUN
// =============================================================================

export function calculateNextRun(schedule: CronJobSchedule, lastRunAt: Date | null, now: Date): Date | null {
  switch (schedule.type) {
    case 'interval': {
      if (schedule.intervalMs <= 0) return null;
      const base = lastRunAt ? lastRunAt.getTime() : now.getTime();
      // A run that overran its period is rescheduled from now
      return new Date(Math.max(base + schedule.intervalMs, now.getTime()));
    }

    case 'hourly':
      return nextHourlyRun(now, schedule.timeZone);

    case 'daily':
      return nextDailyRun(now, schedule.hour, schedule.timeZone);
  }
}

// =============================================================================
// CRON SCHEDULER
// =============================================================================

export class CronScheduler {
  private jobs = new Map<string, CronJob>();
  private inFlight = new Set<Promise<void>>();
  private tickTimer: NodeJS.Timeout | null = null;
  private running = false;
  private readonly tickIntervalMs: number;
  private readonly now: () => Date;

  constructor(options: CronSchedulerOptions = {}) {
    this.tickIntervalMs = options.tickIntervalMs ?? 30_000;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Add a job to the scheduler
   */
  addJob(input: CronJobInput): CronJob {
    if (this.jobs.has(input.id)) {
      logger.warn({ jobId: input.id }, 'Job already exists, replacing');
    }

    const now = this.now();
    const job: CronJob = {
      id: input.id,
      name: input.name,
      schedule: input.schedule,
      handler: input.handler,
      running: false,
      lastRunAt: null,
      nextRunAt: input.runOnStart ? now : calculateNextRun(input.schedule, null, now),
      lastStatus: 'pending',
    };

    this.jobs.set(job.id, job);
    logger.info({ jobId: job.id, name: job.name, type: job.schedule.type, nextRunAt: job.nextRunAt }, 'Cron job added');
    return job;
  }

  /**
   * Start the scheduler loop (checks every tickIntervalMs)
   */
  start(): void {
    if (this.running) {
      logger.warn('Cron scheduler already running');
      return;
    }

    this.running = true;
    logger.info({ tickIntervalMs: this.tickIntervalMs, jobCount: this.jobs.size }, 'Cron scheduler started');

    this.tick();
    this.tickTimer = setInterval(() => {
      this.tick();
    }, this.tickIntervalMs);
  }

  /**
   * Stop the loop and wait for runs already in flight
   */
  async stop(): Promise<void> {
    if (this.tickTimer) {
      clearInterval(this.tickTimer);
      this.tickTimer = null;
    }
    if (!this.running) return;
    this.running = false;

    if (this.inFlight.size > 0) {
      logger.info({ inFlight: this.inFlight.size }, 'Waiting for running jobs');
      await Promise.allSettled([...this.inFlight]);
    }
    logger.info('Cron scheduler stopped');
  }

  getJobs(): CronJob[] {
    return Array.from(this.jobs.values());
  }

  getJob(id: string): CronJob | undefined {
    return this.jobs.get(id);
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Run a job immediately, ignoring its schedule. Returns false for unknown
   * jobs and for jobs that are already running.
   */
  async runNow(id: string): Promise<boolean> {
    const job = this.jobs.get(id);
    if (!job || job.running) return false;
    await this.track(job);
    return true;
  }

  // ===========================================================================
  // PRIVATE
  // ===========================================================================

  private tick(): void {
    const now = this.now().getTime();

    for (const job of this.jobs.values()) {
      if (!job.nextRunAt || job.nextRunAt.getTime() > now) continue;
      if (job.running) {
        logger.debug({ jobId: job.id }, 'Previous run still in flight, skipping');
        continue;
      }

      this.track(job).catch((error: unknown) => {
        logger.error({ jobId: job.id, name: job.name, error }, 'Unexpected error in job execution wrapper');
      });
    }
  }

  private track(job: CronJob): Promise<void> {
    const run = this.executeJob(job);
    this.inFlight.add(run);
    return run.finally(() => {
      this.inFlight.delete(run);
    });
  }

  private async executeJob(job: CronJob): Promise<void> {
    job.running = true;
    const startedAt = this.now();
    logger.debug({ jobId: job.id, name: job.name }, 'Running cron job');

    try {
      await job.handler();
      job.lastStatus = 'ok';
      job.lastError = undefined;
    } catch (error) {
      job.lastStatus = 'error';
      job.lastError = error instanceof Error ? error.message : String(error);
      logger.error({ jobId: job.id, name: job.name, err: error }, 'Cron job failed');
    } finally {
      const finishedAt = this.now();
      job.running = false;
      job.lastRunAt = startedAt;
      job.lastDurationMs = finishedAt.getTime() - startedAt.getTime();
      job.nextRunAt = calculateNextRun(job.schedule, startedAt, finishedAt);
      logger.debug(
        { jobId: job.id, status: job.lastStatus, durationMs: job.lastDurationMs, nextRunAt: job.nextRunAt },
        'Cron job finished',
      );
    }
  }
}
