/**
 * Monitoring Scheduler
 *
 * Runs the batch job on the configured cadence inside a long-lived process.
 * A PID file marks the active scheduler so that other invocations of the CLI
 * can report on it and stop it.
 */

import { readFile, rm, writeFile } from 'node:fs/promises';
import { Cron } from 'croner';

import { ScheduleError, errorMessage } from '../core/errors.js';
import type { Logger } from '../lib/logger.js';
import { describeSchedule } from './describe.js';
import type { ScheduleStore } from './store.js';
import type { IntervalUnit, ScheduleConfig } from './types.js';

const UNIT_MS: Record<IntervalUnit, number> = {
  minutes: 60_000,
  hours: 3_600_000,
  days: 86_400_000,
};

/** Longest delay setInterval accepts */
const MAX_TIMER_MS = 2_147_483_647;

/**
 * The work done on every tick
 */
export type ScheduledJob = (config: ScheduleConfig) => Promise<void>;

export interface MonitoringSchedulerOptions {
  store: ScheduleStore;
  pidFile: string;
  job: ScheduledJob;
  logger: Logger;
  now?: () => Date;
}

export interface SchedulerStatus {
  running: boolean;
  config: ScheduleConfig;
  description: string;
  nextRun: string | null;
}

type Trigger =
  | { kind: 'interval'; ms: number; timer: NodeJS.Timeout }
  | { kind: 'cron'; job: Cron };

/**
 * Compute the interval length, falling back to one day for unknown units.
 */
export function intervalMs(config: ScheduleConfig, logger: Logger): number {
  const unitMs: number | undefined = UNIT_MS[config.interval_unit];
  if (unitMs === undefined) {
    logger.warning(`Unknown interval unit ${String(config.interval_unit)}, defaulting to daily`);
    return UNIT_MS.days;
  }
  return unitMs * config.interval_value;
}

/**
 * Next run of a cron expression after `from`, or null if it never fires again.
 */
export function nextCronRun(expression: string, from: Date): Date | null {
  const job = new Cron(expression, { paused: true });
  const next = job.nextRun(from);
  job.stop();
  return next;
}

export class MonitoringScheduler {
  private readonly store: ScheduleStore;
  private readonly pidFile: string;
  private readonly job: ScheduledJob;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private config: ScheduleConfig | undefined;
  private trigger: Trigger | undefined;
  private inFlight = false;
  private shutdownSignal: (() => void) | undefined;

  constructor(options: MonitoringSchedulerOptions) {
    this.store = options.store;
    this.pidFile = options.pidFile;
    this.job = options.job;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Start scheduling in this process and write the PID file.
   *
   * @throws ScheduleError if another scheduler process is alive
   */
  async start(): Promise<SchedulerStatus> {
    if (this.trigger !== undefined || (await this.isRunning())) {
      throw new ScheduleError(
        'The scheduler is already running',
        'SCHEDULER_RUNNING',
        'Run `vm-ping schedule stop` first.'
      );
    }

    const config = await this.store.load();
    await writeFile(this.pidFile, String(process.pid), 'utf-8');
    try {
      this.trigger = this.createTrigger(config);
    } catch (error) {
      await this.removePidFile();
      throw error;
    }
    config.enabled = true;
    config.next_run = this.nextRun(config);
    this.config = config;
    await this.store.save(config);

    this.logger.success('Scheduler started successfully');
    return this.statusOf(config, true);
  }

  /**
   * Resolve once SIGINT or SIGTERM arrives (or `shutdown()` is called),
   * after shutting the scheduler down.
   */
  async waitForShutdown(): Promise<void> {
    await new Promise<void>((resolveWait) => {
      const onSignal = (): void => {
        process.off('SIGINT', onSignal);
        process.off('SIGTERM', onSignal);
        this.shutdownSignal = undefined;
        resolveWait();
      };
      this.shutdownSignal = onSignal;
      process.on('SIGINT', onSignal);
      process.on('SIGTERM', onSignal);
    });
    await this.shutdown();
  }

  /**
   * Stop scheduling in this process, clear `enabled` and remove the PID file.
   */
  async shutdown(): Promise<void> {
    this.shutdownSignal?.();
    if (this.trigger === undefined) {
      return;
    }
    this.clearTrigger();

    const config = this.config ?? (await this.store.load());
    config.enabled = false;
    config.next_run = null;
    await this.store.save(config);
    await this.removePidFile();
    this.logger.info('Scheduler stopped');
  }

  /**
   * Stop the scheduler process named in the PID file.
   *
   * @returns Whether a scheduler was running
   */
  async stop(): Promise<boolean> {
    if (this.trigger !== undefined) {
      await this.shutdown();
      return true;
    }

    const pid = await this.readPid();
    const wasRunning = pid !== undefined && isAlive(pid);
    if (pid !== undefined && wasRunning) {
      process.kill(pid, 'SIGTERM');
    }

    const config = await this.store.load();
    config.enabled = false;
    config.next_run = null;
    await this.store.save(config);
    await this.removePidFile();
    return wasRunning;
  }

  /**
   * Whether a scheduler process is alive. A stale PID file is removed.
   */
  async isRunning(): Promise<boolean> {
    const pid = await this.readPid();
    if (pid === undefined) {
      return false;
    }
    if (isAlive(pid)) {
      return true;
    }
    await this.removePidFile();
    return false;
  }

  async status(): Promise<SchedulerStatus> {
    const running = await this.isRunning();
    const config = this.config ?? (await this.store.load());
    return this.statusOf(config, running);
  }

  /**
   * Run the job once, now, and record the run.
   */
  async runNow(): Promise<void> {
    this.logger.info('Running VM ping monitoring job now');
    const config = this.config ?? (await this.store.load());
    await this.job(config);
    await this.recordRun(config);
  }

  private statusOf(config: ScheduleConfig, running: boolean): SchedulerStatus {
    return {
      running,
      config,
      description: describeSchedule(config),
      nextRun: running ? config.next_run : null,
    };
  }

  private createTrigger(config: ScheduleConfig): Trigger {
    if (config.schedule_type === 'cron') {
      try {
        const job = new Cron(config.cron_expression, { protect: true }, () => this.tick());
        return { kind: 'cron', job };
      } catch (error) {
        this.logger.warning(
          `Invalid cron expression ${config.cron_expression}: ${errorMessage(error)}, defaulting to daily`
        );
        return this.intervalTrigger(UNIT_MS.days);
      }
    }
    return this.intervalTrigger(intervalMs(config, this.logger));
  }

  private intervalTrigger(ms: number): Trigger {
    if (ms > MAX_TIMER_MS) {
      throw new ScheduleError(
        `Interval of ${ms}ms is longer than the supported maximum of ${MAX_TIMER_MS}ms`,
        'SCHEDULE_INVALID',
        'Use a cron schedule such as --monthly for long cadences.'
      );
    }
    const timer = setInterval(() => {
      this.tick().catch((error: unknown) => {
        this.logger.error(`Error in scheduled job: ${errorMessage(error)}`);
      });
    }, ms);
    return { kind: 'interval', ms, timer };
  }

  private clearTrigger(): void {
    if (this.trigger?.kind === 'interval') {
      clearInterval(this.trigger.timer);
    } else if (this.trigger?.kind === 'cron') {
      this.trigger.job.stop();
    }
    this.trigger = undefined;
  }

  private nextRun(config: ScheduleConfig): string | null {
    if (this.trigger?.kind === 'cron') {
      return nextCronRun(config.cron_expression, this.now())?.toISOString() ?? null;
    }
    if (this.trigger?.kind === 'interval') {
      return new Date(this.now().getTime() + this.trigger.ms).toISOString();
    }
    return config.next_run;
  }

  /**
   * One scheduled run. Skipped while the previous run is still in flight.
   */
  private async tick(): Promise<void> {
    const config = this.config;
    if (config === undefined) {
      return;
    }
    if (this.inFlight) {
      this.logger.warning('Previous scheduled run still in progress, skipping this one');
      return;
    }

    this.inFlight = true;
    try {
      this.logger.info('Starting scheduled VM ping monitoring');
      await this.job(config);
      this.logger.info('Completed scheduled VM ping monitoring');
      await this.recordRun(config);
    } catch (error) {
      this.logger.error(`Error in scheduled job: ${errorMessage(error)}`);
    } finally {
      this.inFlight = false;
    }
  }

  private async recordRun(config: ScheduleConfig): Promise<void> {
    config.last_run = this.now().toISOString();
    config.next_run = this.nextRun(config);
    await this.store.save(config);
  }

  private async readPid(): Promise<number | undefined> {
    try {
      const pid = Number.parseInt((await readFile(this.pidFile, 'utf-8')).trim(), 10);
      return Number.isInteger(pid) && pid > 0 ? pid : undefined;
    } catch {
      return undefined;
    }
  }

  private async removePidFile(): Promise<void> {
    await rm(this.pidFile, { force: true });
  }
}

/**
 * Signal 0 probes a process without affecting it.
 */
function isAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return (error as NodeJS.ErrnoException).code === 'EPERM';
  }
}
