import { Store } from '../db/store';
import { IsoDate } from '../types/opportunity';
import { Clock, TimeOfDay, formatTimeOfDay, isAtOrAfter, systemClock, toIsoDate } from '../utils/dates';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

/**
 * One step of the daily sequence
 */
export interface ScheduledJob {
  readonly name: string;
  run(date: IsoDate): Promise<unknown>;
}

export type JobResult =
  | { job: string; status: 'succeeded'; durationMs: number; output: unknown }
  | { job: string; status: 'failed'; durationMs: number; error: string };

export type TickOutcome =
  | { ran: true; date: IsoDate; results: JobResult[] }
  | { ran: false; reason: 'running' | 'before-run-time' | 'already-ran' | 'state-unavailable' };

export type SchedulerStatus = 'idle' | 'running';

export interface SchedulerOptions {
  runTime: TimeOfDay;
  tickIntervalMs: number;
}

const log = logger.child('scheduler');

/**
 * Runs the daily job sequence at most once per calendar day.
 * The last-run date lives in the store so restarts on the same day do not run it again.
 */
export class Scheduler {
  private status: SchedulerStatus = 'idle';
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<TickOutcome> | null = null;
  private runTime: TimeOfDay;

  constructor(
    private store: Store,
    private jobs: readonly ScheduledJob[],
    private options: SchedulerOptions,
    private clock: Clock = systemClock
  ) {
    this.runTime = options.runTime;
  }

  get state(): SchedulerStatus {
    return this.status;
  }

  /**
   * Evaluates the run-now condition once and, when met, runs every job in order.
   * Never throws.
   */
  async tick(): Promise<TickOutcome> {
    if (this.status === 'running') {
      return { ran: false, reason: 'running' };
    }

    const now = this.clock.now();
    if (!isAtOrAfter(now, this.runTime)) {
      return { ran: false, reason: 'before-run-time' };
    }

    const today = toIsoDate(now);
    this.status = 'running';
    try {
      let claimed: boolean;
      try {
        claimed = await this.claim(today);
      } catch (error) {
        log.error('Could not read or write scheduler state', error);
        return { ran: false, reason: 'state-unavailable' };
      }
      if (!claimed) {
        return { ran: false, reason: 'already-ran' };
      }

      log.info('Daily run started', { date: today, jobs: this.jobs.map(job => job.name) });
      const results = await this.runJobs(today);
      log.info('Daily run finished', {
        date: today,
        failed: results.filter(result => result.status === 'failed').map(result => result.job),
      });
      return { ran: true, date: today, results };
    } finally {
      this.status = 'idle';
    }
  }

  /**
   * Ticks now and then on every interval until stopped
   */
  start(): void {
    if (this.timer) return;
    log.info(`Scheduler started, daily run at ${formatTimeOfDay(this.runTime)}`, {
      tickIntervalMs: this.options.tickIntervalMs,
    });
    this.scheduleTick();
    this.timer = setInterval(() => this.scheduleTick(), this.options.tickIntervalMs);
  }

  /**
   * Stops ticking and waits for a tick already under way to finish
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
    log.info('Scheduler stopped');
  }

  reschedule(runTime: TimeOfDay): void {
    this.runTime = runTime;
    log.info(`Rescheduled daily run to ${formatTimeOfDay(runTime)}`);
  }

  /**
   * Moves the watermark to today before any job runs; false when today already ran
   */
  private async claim(today: IsoDate): Promise<boolean> {
    return this.store.withTransaction(async (repos) => {
      const lastRunDate = await repos.schedulerState.getLastRunDate();
      if (lastRunDate !== null && today <= lastRunDate) {
        return false;
      }
      await repos.schedulerState.setLastRunDate(today);
      return true;
    });
  }

  private async runJobs(today: IsoDate): Promise<JobResult[]> {
    const results: JobResult[] = [];

    for (const job of this.jobs) {
      const startedAt = Date.now();
      try {
        const output = await job.run(today);
        results.push({ job: job.name, status: 'succeeded', durationMs: Date.now() - startedAt, output });
        log.info(`Job ${job.name} succeeded`, { durationMs: Date.now() - startedAt });
      } catch (error) {
        results.push({
          job: job.name,
          status: 'failed',
          durationMs: Date.now() - startedAt,
          error: errorMessage(error),
        });
        log.error(`Job ${job.name} failed`, error);
      }
    }

    return results;
  }

  private scheduleTick(): void {
    if (this.inFlight) return;
    this.inFlight = this.tick().finally(() => {
      this.inFlight = null;
    });
  }
}
