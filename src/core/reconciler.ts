/**
 * VM Reconciler
 *
 * Decides, for one VM resource, whether ping monitoring needs enabling,
 * applies the minimal update, and records the outcome. Each call is
 * independent: nothing is remembered between calls except the state store.
 */

import type { Logger } from '../lib/logger.js';
import type { ResourceGateway } from '../ops/gateway.js';
import { findIdentifier, needsPingUpdate, selectRequiredIdentifiers } from '../ops/resources.js';
import { PING_IDENTIFIER, type VMResource } from '../ops/types.js';
import type { StateManager } from '../state/manager.js';
import { RemoteRejectedError, errorMessage } from './errors.js';
import type { ReconcileOutcome } from './types.js';

/**
 * Collaborators of the reconciler
 */
export interface ReconcilerOptions {
  gateway: ResourceGateway;
  state: StateManager;
  logger: Logger;
}

export class Reconciler {
  private readonly gateway: ResourceGateway;
  private readonly state: StateManager;
  private readonly logger: Logger;

  constructor(options: ReconcilerOptions) {
    this.gateway = options.gateway;
    this.state = options.state;
    this.logger = options.logger;
  }

  /**
   * Reconcile one VM.
   *
   * A failed update is logged and reported as `update_failed`; it is never
   * thrown, and it leaves the VM's record untouched.
   *
   * @param resource - VM resource as fetched
   * @param forceUpdate - Re-evaluate even if a valid record exists
   */
  async reconcile(resource: VMResource, forceUpdate: boolean): Promise<ReconcileOutcome> {
    const vmId = resource.identifier;
    const name = resource.resourceKey.name;

    if (!forceUpdate && this.state.containsValid(vmId)) {
      this.logger.info(`Skipping ${name} - already processed (cached)`);
      return { vmId, name, status: 'skipped_cached', updated: false };
    }

    if (!needsPingUpdate(resource)) {
      if (findIdentifier(resource, PING_IDENTIFIER) === undefined) {
        this.logger.debug(`${name} has no ${PING_IDENTIFIER} identifier; treating as enabled`);
      } else {
        this.logger.debug(`No update needed for ${name} - ${PING_IDENTIFIER} already true`);
      }
      this.state.record(vmId, name, 'already_enabled');
      return { vmId, name, status: 'skipped_already_enabled', updated: false };
    }

    this.logger.info(`Updating ping monitoring for ${name}`);
    try {
      await this.gateway.applyUpdate(vmId, name, selectRequiredIdentifiers(resource));
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error(`Error updating ${name}: ${message}`);
      if (error instanceof RemoteRejectedError && error.body !== '') {
        this.logger.error(`Response: ${error.body}`);
      }
      return { vmId, name, status: 'update_failed', updated: false, error: message };
    }

    this.logger.success(`Successfully updated ${name}`);
    this.state.record(vmId, name, 'ping_enabled');
    return { vmId, name, status: 'updated', updated: true };
  }
}
