/**
 * Core Types for vm-ping-enabler
 *
 * Outcomes of reconciling a VM and of running a batch.
 */

/**
 * How a single VM was handled
 *
 * - skipped_cached: a valid record exists and the run is not forced
 * - skipped_already_enabled: ping monitoring is already on
 * - updated: the update was applied
 * - update_failed: the update was attempted and rejected
 */
export type ReconcileStatus =
  | 'skipped_cached'
  | 'skipped_already_enabled'
  | 'updated'
  | 'update_failed';

/**
 * Result of reconciling one VM
 */
export interface ReconcileOutcome {
  vmId: string;
  name: string;
  status: ReconcileStatus;
  /** True only for `updated` */
  updated: boolean;
  /** Error message for `update_failed` */
  error?: string;
}

/**
 * Which VMs a batch targets and whether the cache is bypassed
 */
export interface BatchOptions {
  /** Names to process; all VMs when undefined */
  vmNames?: string[];
  forceUpdate: boolean;
}

/**
 * Aggregate counters of one batch
 */
export interface BatchSummary {
  totalFound: number;
  updatesApplied: number;
  alreadyEnabled: number;
  skippedCached: number;
  failed: number;
  elapsedMs: number;
}
