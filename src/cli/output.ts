/**
 * CLI Output Layer
 *
 * Renders command results through a Logger so that every command behaves
 * the same in human-readable and JSON modes.
 */

import { ConfigError, getExitCode, isPingEnablerError } from '../core/errors.js';
import type { BatchSummary, ReconcileOutcome } from '../core/types.js';
import { Logger } from '../lib/logger.js';
import type { SchedulerStatus } from '../schedule/scheduler.js';
import type { ProcessingRecord } from '../state/types.js';

/**
 * Options every command accepts
 */
export interface OutputOptions {
  json?: boolean;
  debug?: boolean;
}

/**
 * Create the logger a command writes through.
 */
export function createOutput(command: string, options: OutputOptions): Logger {
  const output = Logger.fromOptions(options);
  output.setCommand(command);
  return output;
}

const STATUS_SYMBOLS: Record<ReconcileOutcome['status'], string> = {
  updated: '+',
  skipped_already_enabled: '=',
  skipped_cached: '·',
  update_failed: '✗',
};

/**
 * One line per reconciled VM, for --debug runs.
 */
export function renderOutcome(output: Logger, outcome: ReconcileOutcome): void {
  output.debug(`${STATUS_SYMBOLS[outcome.status]} ${outcome.name} (${outcome.status})`);
}

/**
 * Print the end-of-batch counters.
 */
export function renderBatchSummary(output: Logger, summary: BatchSummary): void {
  output.newline();
  const parts = [
    `${summary.updatesApplied} enabled`,
    `${summary.alreadyEnabled} already enabled`,
    `${summary.skippedCached} cached`,
  ];
  if (summary.failed > 0) {
    parts.push(`${summary.failed} failed`);
  }

  if (summary.failed > 0) {
    output.warning(`Done. ${summary.totalFound} VMs: ${parts.join(', ')}.`);
  } else {
    output.success(`Done. ${summary.totalFound} VMs: ${parts.join(', ')}.`);
  }

  output.addData('summary', summary);
  output.setSuccess(summary.failed === 0);
}

/**
 * Print the processed-VM records.
 */
export function renderStateTable(
  output: Logger,
  statePath: string,
  entries: Array<[string, ProcessingRecord]>
): void {
  output.info(`State file: ${statePath}`);
  output.newline();

  if (entries.length === 0) {
    output.info('No VMs processed yet.');
  } else {
    output.indent();
    output.table(
      ['NAME', 'ID', 'ACTION', 'LAST PROCESSED'],
      entries.map(([vmId, record]) => [record.name, vmId, record.action, record.last_processed])
    );
    output.dedent();
    output.newline();
    output.info(`${entries.length} VM${entries.length === 1 ? '' : 's'} recorded.`);
  }

  output.addData(
    'vms',
    entries.map(([vmId, record]) => ({ id: vmId, ...record }))
  );
}

/**
 * Print scheduler state and configuration.
 */
export function renderScheduleStatus(output: Logger, status: SchedulerStatus): void {
  const { config } = status;
  output.info(`Status: ${status.running ? 'RUNNING' : 'STOPPED'}`);
  output.info(`Schedule: ${status.description}`);
  output.info(
    `Target VMs: ${config.vm_names ? config.vm_names.join(', ') : 'ALL VMs in environment'}`
  );
  output.info(
    `Cache behavior: ${
      config.force_update
        ? 'Ignore cache (process all VMs)'
        : 'Use cache (only process new/changed VMs)'
    }`
  );
  output.info(`Last run: ${config.last_run ?? 'Never'}`);
  if (status.running) {
    output.info(`Next run: ${status.nextRun ?? 'Not scheduled'}`);
  } else {
    output.info('Next run: N/A (scheduler stopped)');
  }

  output.addData('schedule', {
    running: status.running,
    description: status.description,
    nextRun: status.nextRun,
    config,
  });
}

/**
 * Report an error and exit with its exit code.
 */
export function handleError(output: Logger, error: unknown): never {
  if (error instanceof ConfigError && error.validationErrors) {
    output.error(error.message, error);
    for (const detail of error.validationErrors) {
      output.info(`  - ${detail.path}: ${detail.message}`);
    }
  } else if (isPingEnablerError(error)) {
    output.error(error.message, error);
  } else if (error instanceof Error) {
    output.error(error.message);
  } else {
    output.error(String(error));
  }

  output.flush();
  process.exit(getExitCode(error));
}
