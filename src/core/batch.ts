/**
 * Batch Driver
 *
 * Runs the reconciler over every targeted VM, checkpointing the state store
 * as updates accumulate and once more, unconditionally, at the end.
 */

import type { Logger } from '../lib/logger.js';
import type { ResourceGateway } from '../ops/gateway.js';
import type { VMResource } from '../ops/types.js';
import type { StateManager } from '../state/manager.js';
import { errorMessage } from './errors.js';
import type { Reconciler } from './reconciler.js';
import type { BatchOptions, BatchSummary, ReconcileOutcome } from './types.js';

/**
 * Applied updates between two checkpoints
 */
export const CHECKPOINT_EVERY = 10;

/**
 * Callback for reporting per-VM progress
 */
export type BatchProgressCallback = (outcome: ReconcileOutcome) => void;

export interface BatchRunnerOptions {
  gateway: ResourceGateway;
  reconciler: Reconciler;
  state: StateManager;
  logger: Logger;
  onProgress?: BatchProgressCallback;
  /** Monotonic clock in ms (default: performance.now) */
  clock?: () => number;
}

function displayName(resource: VMResource): string {
  return resource.resourceKey.name || 'Unknown';
}

export class BatchRunner {
  private readonly gateway: ResourceGateway;
  private readonly reconciler: Reconciler;
  private readonly state: StateManager;
  private readonly logger: Logger;
  private readonly onProgress?: BatchProgressCallback;
  private readonly clock: () => number;

  constructor(options: BatchRunnerOptions) {
    this.gateway = options.gateway;
    this.reconciler = options.reconciler;
    this.state = options.state;
    this.logger = options.logger;
    this.onProgress = options.onProgress;
    this.clock = options.clock ?? (() => performance.now());
  }

  /**
   * Process the targeted VMs.
   *
   * An error thrown while handling one VM is logged and counted; the batch
   * moves on. A failure to fetch the targets propagates after the final
   * checkpoint and summary.
   */
  async run(options: BatchOptions): Promise<BatchSummary> {
    const { vmNames, forceUpdate } = options;
    this.logger.info(`Starting VM processing (force update: ${forceUpdate})`);

    const start = this.clock();
    const summary: BatchSummary = {
      totalFound: 0,
      updatesApplied: 0,
      alreadyEnabled: 0,
      skippedCached: 0,
      failed: 0,
      elapsedMs: 0,
    };

    try {
      let vms: VMResource[];
      if (vmNames === undefined) {
        this.logger.info('Fetching all VMs...');
        vms = await this.gateway.fetchAll();
      } else {
        this.logger.info(`Fetching specified VMs: ${vmNames.join(', ')}`);
        vms = await this.gateway.fetchNamed(vmNames);
      }

      summary.totalFound = vms.length;
      this.logger.info(`Found ${vms.length} VMs`);
      if (vms.length === 0) {
        this.logger.warning('No VMs to process');
        return summary;
      }

      for (const vm of vms) {
        let outcome: ReconcileOutcome;
        try {
          outcome = await this.reconciler.reconcile(vm, forceUpdate);
        } catch (error) {
          summary.failed++;
          this.logger.error(`Error processing VM ${displayName(vm)}: ${errorMessage(error)}`);
          continue;
        }

        this.count(summary, outcome);
        if (outcome.updated && summary.updatesApplied % CHECKPOINT_EVERY === 0) {
          await this.state.save();
        }
        this.reportProgress(outcome);
      }

      return summary;
    } catch (error) {
      this.logger.error(`Error during VM processing: ${errorMessage(error)}`);
      throw error;
    } finally {
      await this.state.save();
      summary.elapsedMs = this.clock() - start;
      this.logSummary(summary);
    }
  }

  /**
   * A throwing progress callback is logged; it does not change the counts.
   */
  private reportProgress(outcome: ReconcileOutcome): void {
    try {
      this.onProgress?.(outcome);
    } catch (error) {
      this.logger.warning(`Progress report for ${outcome.name} failed: ${errorMessage(error)}`);
    }
  }

  private count(summary: BatchSummary, outcome: ReconcileOutcome): void {
    switch (outcome.status) {
      case 'updated':
        summary.updatesApplied++;
        break;
      case 'skipped_already_enabled':
        summary.alreadyEnabled++;
        break;
      case 'skipped_cached':
        summary.skippedCached++;
        break;
      case 'update_failed':
        summary.failed++;
        break;
    }
  }

  private logSummary(summary: BatchSummary): void {
    this.logger.info('Processing complete:');
    this.logger.info(`Total VMs processed: ${summary.totalFound}`);
    this.logger.info(`Updates made: ${summary.updatesApplied}`);
    this.logger.info(`Time taken: ${(summary.elapsedMs / 1000).toFixed(2)} seconds`);
  }
}
