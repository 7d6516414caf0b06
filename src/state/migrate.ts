/**
 * State Migration
 *
 * Upgrades every entry of a freshly parsed state file to the current
 * ProcessingRecord shape. Runs once, at load time.
 *
 * Known encodings:
 * - v0: a bare ISO timestamp string
 * - v1: an object with an optional boolean `ping_enabled` flag and no `action`
 * - v2: the current ProcessingRecord
 */

import {
  PROCESSING_ACTIONS,
  emptySnapshot,
  type ProcessingAction,
  type ProcessingRecord,
  type StateSnapshot,
} from './types.js';

export interface MigrationContext {
  /** Operations host recorded when an entry has none */
  source: string;
  /** Timestamp used for missing first/last processed values */
  now: string;
}

export interface MigrationResult {
  snapshot: StateSnapshot;
  /** Ids whose entries were upgraded from an older encoding */
  migrated: string[];
  /** Ids whose entries could not be interpreted and were dropped */
  dropped: string[];
}

function isRecordLike(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isProcessingAction(value: unknown): value is ProcessingAction {
  return typeof value === 'string' && PROCESSING_ACTIONS.some((action) => action === value);
}

function stringOr(value: unknown, fallback: string): string {
  return typeof value === 'string' ? value : fallback;
}

/**
 * Check that a value already has the current record shape.
 */
export function isProcessingRecord(value: unknown): value is ProcessingRecord {
  return (
    isRecordLike(value) &&
    typeof value['name'] === 'string' &&
    typeof value['first_processed'] === 'string' &&
    typeof value['last_processed'] === 'string' &&
    typeof value['ops_source'] === 'string' &&
    isProcessingAction(value['action'])
  );
}

/**
 * Upgrade one entry. Returns undefined for values no encoding produces.
 */
export function migrateEntry(value: unknown, context: MigrationContext): ProcessingRecord | undefined {
  if (typeof value === 'string') {
    return {
      name: 'Unknown',
      first_processed: value,
      last_processed: value,
      ops_source: context.source,
      action: 'unknown',
    };
  }

  if (!isRecordLike(value)) {
    return undefined;
  }

  const storedAction = value['action'];
  const legacyFlag = value['ping_enabled'];
  let action: ProcessingAction = 'unknown';
  if (isProcessingAction(storedAction)) {
    action = storedAction;
  } else if (typeof legacyFlag === 'boolean') {
    action = legacyFlag ? 'ping_enabled' : 'unknown';
  }

  return {
    name: stringOr(value['name'], 'Unknown'),
    first_processed: stringOr(value['first_processed'], context.now),
    last_processed: stringOr(value['last_processed'], context.now),
    ops_source: stringOr(value['ops_source'], context.source),
    action,
  };
}

/**
 * Upgrade a parsed state file.
 */
export function migrateSnapshot(
  data: Record<string, unknown>,
  context: MigrationContext
): MigrationResult {
  const snapshot = emptySnapshot();
  const migrated: string[] = [];
  const dropped: string[] = [];

  for (const [vmId, value] of Object.entries(data)) {
    const record = migrateEntry(value, context);
    if (record === undefined) {
      dropped.push(vmId);
      continue;
    }
    if (!isProcessingRecord(value)) {
      migrated.push(vmId);
    }
    snapshot[vmId] = record;
  }

  return { snapshot, migrated, dropped };
}
