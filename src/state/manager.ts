/**
 * State Manager
 *
 * Manages the persisted record of processed VMs. Loading and saving never
 * throw: a missing or corrupt file yields an empty state, and a failed save
 * is logged so that it cannot abort a batch.
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';

import { errorMessage } from '../core/errors.js';
import type { Logger } from '../lib/logger.js';
import { isProcessingRecord, migrateSnapshot } from './migrate.js';
import { emptySnapshot, type ProcessingAction, type ProcessingRecord, type StateSnapshot } from './types.js';

/**
 * Options for constructing a StateManager
 */
export interface StateManagerOptions {
  /** Operations host recorded in new and migrated records */
  source: string;
  logger: Logger;
  /** Clock used for record timestamps (default: system time) */
  now?: () => Date;
}

/**
 * Manages state persistence for processed VMs.
 *
 * The whole snapshot is rewritten on every save, via a temp file and rename.
 */
export class StateManager {
  private readonly statePath: string;
  private readonly source: string;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private state: StateSnapshot = emptySnapshot();

  constructor(statePath: string, options: StateManagerOptions) {
    this.statePath = resolve(statePath);
    this.source = options.source;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Load state from disk, upgrading legacy entries.
   *
   * Missing or malformed files yield an empty state.
   */
  async load(): Promise<StateSnapshot> {
    this.state = await this.readSnapshot();
    return this.state;
  }

  private async readSnapshot(): Promise<StateSnapshot> {
    let content: string;
    try {
      content = await readFile(this.statePath, 'utf-8');
    } catch (error) {
      const err = error as NodeJS.ErrnoException;
      if (err.code === 'ENOENT') {
        this.logger.debug('No existing state file found, starting fresh');
      } else {
        this.logger.warning(`Cannot read state file ${this.statePath}: ${err.message}, starting fresh`);
      }
      return emptySnapshot();
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch {
      this.logger.warning(`Corrupted state file ${this.statePath}, starting fresh`);
      return emptySnapshot();
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      this.logger.warning(`State file ${this.statePath} is not a JSON object, starting fresh`);
      return emptySnapshot();
    }

    const { snapshot, migrated, dropped } = migrateSnapshot(
      Object.fromEntries(Object.entries(parsed)),
      { source: this.source, now: this.timestamp() }
    );

    if (migrated.length > 0) {
      this.logger.debug(`Upgraded ${migrated.length} legacy state entries`);
    }
    if (dropped.length > 0) {
      this.logger.warning(`Dropped ${dropped.length} unreadable state entries: ${dropped.join(', ')}`);
    }
    this.logger.debug(`Loaded state file with ${Object.keys(snapshot).length} entries`);
    return snapshot;
  }

  /**
   * Save the current state to disk using an atomic write.
   *
   * Failures are logged and swallowed.
   */
  async save(): Promise<boolean> {
    const tempPath = `${this.statePath}.tmp`;
    try {
      await mkdir(dirname(this.statePath), { recursive: true });
      await writeFile(tempPath, JSON.stringify(this.state, null, 2), 'utf-8');
      await rename(tempPath, this.statePath);
      this.logger.debug(`Saved state with ${this.size} entries`);
      return true;
    } catch (error) {
      this.logger.error(`Error saving state file: ${errorMessage(error)}`);
      return false;
    }
  }

  /**
   * Whether the id maps to a structurally valid record.
   */
  containsValid(vmId: string): boolean {
    return Object.hasOwn(this.state, vmId) && isProcessingRecord(this.state[vmId]);
  }

  /**
   * Get the record for a VM, if any.
   */
  get(vmId: string): ProcessingRecord | undefined {
    return Object.hasOwn(this.state, vmId) ? this.state[vmId] : undefined;
  }

  /**
   * Write or refresh the record for a VM.
   *
   * `first_processed` is kept from an existing valid record.
   */
  record(vmId: string, name: string, action: ProcessingAction): ProcessingRecord {
    const now = this.timestamp();
    const existing = this.containsValid(vmId) ? this.state[vmId] : undefined;
    const record: ProcessingRecord = {
      name,
      first_processed: existing?.first_processed ?? now,
      last_processed: now,
      ops_source: this.source,
      action,
    };
    this.state[vmId] = record;
    return record;
  }

  /**
   * All records, in insertion order.
   */
  entries(): Array<[string, ProcessingRecord]> {
    return Object.entries(this.state);
  }

  get size(): number {
    return Object.keys(this.state).length;
  }

  /**
   * Get the state file path.
   */
  getStatePath(): string {
    return this.statePath;
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}
