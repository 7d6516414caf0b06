/**
 * Token Store
 *
 * Reads the bearer token from its plain-text slot, acquiring a new one when
 * the slot is empty. The token carries no expiry; callers learn it is stale
 * from an HTTP 401 and call `refresh()`.
 */

import { readFile } from 'node:fs/promises';

import { CredentialUnavailableError } from '../core/errors.js';
import type { Logger } from '../lib/logger.js';

/**
 * Populates the token slot. Throws CredentialUnavailableError on failure.
 */
export type TokenAcquirer = () => Promise<void>;

export class TokenStore {
  constructor(
    private readonly tokenPath: string,
    private readonly acquire: TokenAcquirer,
    private readonly logger: Logger
  ) {}

  /**
   * Return the stored token, acquiring one first if the slot is empty.
   *
   * @throws CredentialUnavailableError if the slot is still empty after acquisition
   */
  async getToken(): Promise<string> {
    const stored = await this.read();
    if (stored !== undefined) {
      this.logger.debug('Bearer token loaded from file');
      return stored;
    }

    this.logger.info('Bearer token not found. Fetching new token...');
    await this.acquire();
    const token = await this.readRequired();
    this.logger.info('New bearer token generated and loaded');
    return token;
  }

  /**
   * Acquire a new token unconditionally and return it.
   */
  async refresh(): Promise<string> {
    await this.acquire();
    return this.readRequired();
  }

  private async read(): Promise<string | undefined> {
    try {
      const token = (await readFile(this.tokenPath, 'utf-8')).trim();
      return token === '' ? undefined : token;
    } catch (error) {
      const err = error as NodeJS.ErrnoException;
      if (err.code !== 'ENOENT') {
        this.logger.warning(`Cannot read token file ${this.tokenPath}: ${err.message}`);
      }
      return undefined;
    }
  }

  private async readRequired(): Promise<string> {
    const token = await this.read();
    if (token === undefined) {
      throw new CredentialUnavailableError(
        `Token file ${this.tokenPath} is still empty after token acquisition`,
        this.tokenPath
      );
    }
    return token;
  }
}
