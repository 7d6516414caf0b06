/**
 * State Types for vm-ping-enabler
 *
 * These types represent the persisted state file: a JSON object mapping a VM
 * resource id to the record of its last examination.
 */

/**
 * What the last successful pass did to the VM
 */
export type ProcessingAction = 'ping_enabled' | 'already_enabled' | 'unknown';

export const PROCESSING_ACTIONS: readonly ProcessingAction[] = [
  'ping_enabled',
  'already_enabled',
  'unknown',
];

/**
 * Record of having examined one VM
 */
export interface ProcessingRecord {
  /** VM display name at the time of processing */
  name: string;
  /** ISO timestamp of the first successful pass; never overwritten */
  first_processed: string;
  /** ISO timestamp of the latest successful pass */
  last_processed: string;
  /** Operations host the VM was processed against */
  ops_source: string;
  action: ProcessingAction;
}

/**
 * Whole state file, keyed by Operations resource id
 */
export type StateSnapshot = Record<string, ProcessingRecord>;

/**
 * An empty snapshot without a prototype, so that every resource id,
 * `__proto__` included, is stored as a plain key.
 */
export function emptySnapshot(): StateSnapshot {
  return Object.create(null);
}
