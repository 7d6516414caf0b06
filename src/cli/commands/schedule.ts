/**
 * Schedule Command Handlers
 *
 * `schedule start` runs the scheduler in the foreground until SIGINT or
 * SIGTERM. The other subcommands inspect or change the persisted
 * configuration and the PID file.
 */

import { loadResolvedConfig } from '../../config/resolver.js';
import { ScheduleError } from '../../core/errors.js';
import type { Logger } from '../../lib/logger.js';
import { createBatchJob } from '../../schedule/job.js';
import { scheduleUpdatesFromOptions } from '../../schedule/options.js';
import { MonitoringScheduler } from '../../schedule/scheduler.js';
import { ScheduleStore } from '../../schedule/store.js';
import type { FriendlyScheduleOptions, ScheduleConfig } from '../../schedule/types.js';
import {
  createOutput,
  handleError,
  renderBatchSummary,
  renderScheduleStatus,
} from '../output.js';

export interface ScheduleCommandOptions {
  json?: boolean;
  debug?: boolean;
}

export interface ScheduleConfigureOptions extends ScheduleCommandOptions, FriendlyScheduleOptions {
  vmNames?: string[];
  allVms?: boolean;
  force?: boolean;
}

interface SchedulerHandle {
  scheduler: MonitoringScheduler;
  store: ScheduleStore;
}

async function openScheduler(configPath: string, output: Logger): Promise<SchedulerHandle> {
  const config = await loadResolvedConfig(configPath);
  const store = new ScheduleStore(config.paths.schedule, output);
  const scheduler = new MonitoringScheduler({
    store,
    pidFile: config.paths.pidFile,
    job: createBatchJob({
      configPath,
      logger: output,
      onSummary: (summary) => renderBatchSummary(output, summary),
    }),
    logger: output,
  });
  return { scheduler, store };
}

export async function scheduleStartCommand(
  configPath: string,
  options: ScheduleCommandOptions
): Promise<void> {
  const output = createOutput('schedule start', options);

  try {
    const { scheduler } = await openScheduler(configPath, output);
    const status = await scheduler.start();
    renderScheduleStatus(output, status);
    output.info('Press Ctrl+C to stop');

    await scheduler.waitForShutdown();
    output.flush();
    process.exit(0);
  } catch (error) {
    handleError(output, error);
  }
}

export async function scheduleStopCommand(
  configPath: string,
  options: ScheduleCommandOptions
): Promise<void> {
  const output = createOutput('schedule stop', options);

  try {
    const { scheduler } = await openScheduler(configPath, output);
    const wasRunning = await scheduler.stop();
    if (wasRunning) {
      output.success('Scheduler stopped');
    } else {
      output.info('Scheduler is not running');
    }
    output.addData('wasRunning', wasRunning);
    output.flush();
    process.exit(0);
  } catch (error) {
    handleError(output, error);
  }
}

export async function scheduleStatusCommand(
  configPath: string,
  options: ScheduleCommandOptions
): Promise<void> {
  const output = createOutput('schedule status', options);

  try {
    const { scheduler } = await openScheduler(configPath, output);
    renderScheduleStatus(output, await scheduler.status());
    output.flush();
    process.exit(0);
  } catch (error) {
    handleError(output, error);
  }
}

export async function scheduleRunNowCommand(
  configPath: string,
  options: ScheduleCommandOptions
): Promise<void> {
  const output = createOutput('schedule run-now', options);

  try {
    const { scheduler } = await openScheduler(configPath, output);
    await scheduler.runNow();
    output.flush();
    process.exit(0);
  } catch (error) {
    handleError(output, error);
  }
}

/**
 * Build the configuration updates for `schedule configure`.
 *
 * @throws ScheduleError for malformed or conflicting options
 */
export function configureUpdates(options: ScheduleConfigureOptions): Partial<ScheduleConfig> {
  if (options.vmNames !== undefined && options.allVms) {
    throw new ScheduleError('--vm-names and --all-vms cannot be combined');
  }

  const updates = scheduleUpdatesFromOptions(options);
  if (options.vmNames !== undefined) {
    updates.vm_names = options.vmNames;
  } else if (options.allVms) {
    updates.vm_names = null;
  }
  if (options.force !== undefined) {
    updates.force_update = options.force;
  }
  return updates;
}

export async function scheduleConfigureCommand(
  configPath: string,
  options: ScheduleConfigureOptions
): Promise<void> {
  const output = createOutput('schedule configure', options);

  try {
    const updates = configureUpdates(options);
    const { scheduler, store } = await openScheduler(configPath, output);

    if (Object.keys(updates).length === 0) {
      output.info('No changes given; current configuration:');
    } else {
      await store.update(updates);
      output.success('Schedule configuration updated');
    }

    const status = await scheduler.status();
    renderScheduleStatus(output, status);
    if (status.running && Object.keys(updates).length > 0) {
      output.warning('Restart the scheduler for the new configuration to take effect');
    }
    output.flush();
    process.exit(0);
  } catch (error) {
    handleError(output, error);
  }
}
