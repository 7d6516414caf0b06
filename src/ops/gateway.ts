/**
 * Resource Gateway
 *
 * The two reads (all VMs, VMs by name) and the one write (apply update) the
 * tool performs against the Operations API, with one credential refresh
 * and retry on an expired token.
 */

import { AuthExpiredError, errorMessage } from '../core/errors.js';
import type { TokenStore } from '../auth/token-store.js';
import type { Logger } from '../lib/logger.js';
import type { OpsClient } from './client.js';
import { buildUpdatePayload, parseResourceList } from './resources.js';
import { ADAPTER_KIND, RESOURCE_KIND, type ResourceIdentifier, type VMResource } from './types.js';

const RESOURCES_PATH = '/resources';

/**
 * Read and write access to VM resources. The reconciler and batch driver
 * depend on this interface, not on the HTTP implementation.
 */
export interface ResourceGateway {
  fetchAll(): Promise<VMResource[]>;
  fetchNamed(names: string[]): Promise<VMResource[]>;
  applyUpdate(vmId: string, name: string, identifiers: ResourceIdentifier[]): Promise<void>;
}

export interface OpsGatewayOptions {
  client: OpsClient;
  tokens: TokenStore;
  logger: Logger;
}

export class OpsGateway implements ResourceGateway {
  private readonly client: OpsClient;
  private readonly tokens: TokenStore;
  private readonly logger: Logger;

  constructor(options: OpsGatewayOptions) {
    this.client = options.client;
    this.tokens = options.tokens;
    this.logger = options.logger;
  }

  /**
   * Fetch every VirtualMachine resource.
   *
   * A 401 refreshes the token and re-issues the request once; a second 401
   * and every other error propagate.
   */
  async fetchAll(): Promise<VMResource[]> {
    this.logger.debug('Fetching all VMs');
    const query = { resourceKind: RESOURCE_KIND, adapterKind: ADAPTER_KIND };

    let body: unknown;
    try {
      body = await this.client.request('GET', RESOURCES_PATH, { query });
    } catch (error) {
      if (!(error instanceof AuthExpiredError)) {
        throw error;
      }
      this.logger.warning('Token expired, refreshing...');
      await this.refreshToken();
      body = await this.client.request('GET', RESOURCES_PATH, { query });
    }

    const vms = parseResourceList(body, this.logger);
    this.logger.info(`Successfully fetched ${vms.length} VMs`);
    return vms;
  }

  /**
   * Fetch VMs by name, one request per name, in input order.
   *
   * Only the first 401 of the whole call refreshes the token and retries
   * that name; later 401s, failed retries and other errors skip the name.
   * A failure to obtain a new token propagates.
   */
  async fetchNamed(names: string[]): Promise<VMResource[]> {
    const found: VMResource[] = [];
    let retried = false;

    for (const name of names) {
      const query = { resourceKind: RESOURCE_KIND, adapterKind: ADAPTER_KIND, name };
      this.logger.debug(`Fetching VM: ${name}`);

      let body: unknown;
      try {
        body = await this.client.request('GET', RESOURCES_PATH, { query });
      } catch (error) {
        if (!(error instanceof AuthExpiredError) || retried) {
          this.logger.error(`Error fetching VM ${name}: ${errorMessage(error)}`);
          continue;
        }

        this.logger.warning('Token expired, refreshing...');
        await this.refreshToken();
        retried = true;
        try {
          body = await this.client.request('GET', RESOURCES_PATH, { query });
        } catch (retryError) {
          this.logger.error(
            `Error fetching VM ${name} after token refresh: ${errorMessage(retryError)}`
          );
          continue;
        }
      }

      const vms = parseResourceList(body, this.logger);
      if (vms.length > 0) {
        this.logger.info(`Found VM: ${name}`);
        found.push(...vms);
      } else {
        this.logger.warning(`VM not found: ${name}`);
      }
    }

    return found;
  }

  /**
   * Send the minimal update for one VM. Errors propagate; there is no retry.
   */
  async applyUpdate(vmId: string, name: string, identifiers: ResourceIdentifier[]): Promise<void> {
    this.logger.debug(`Sending update request for ${name}`);
    await this.client.request('PUT', RESOURCES_PATH, {
      query: { _no_links: 'true' },
      body: buildUpdatePayload(vmId, name, identifiers),
    });
  }

  private async refreshToken(): Promise<void> {
    const token = await this.tokens.refresh();
    this.client.setToken(token);
  }
}
