/**
 * Token Acquisition
 *
 * Exchanges the configured login data for a bearer token via
 * POST /auth/token/acquire and writes it to the token slot.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import type { ResolvedConfig } from '../config/types.js';
import { CredentialUnavailableError, errorMessage } from '../core/errors.js';
import type { Logger } from '../lib/logger.js';
import type { FetchLike } from '../ops/client.js';
import type { TokenAcquirer } from './token-store.js';

export const TOKEN_ACQUIRE_PATH = '/auth/token/acquire';

/**
 * Options for acquiring a token
 */
export interface AcquireTokenOptions {
  config: ResolvedConfig;
  logger: Logger;
  fetch?: FetchLike;
}

/**
 * Acquire a new token and write it to `config.paths.token`.
 *
 * @returns The new token
 * @throws CredentialUnavailableError on any failure
 */
export async function acquireToken(options: AcquireTokenOptions): Promise<string> {
  const { config, logger } = options;
  const fetchImpl = options.fetch ?? fetch;
  const url = `${config.apiBaseUrl}${TOKEN_ACQUIRE_PATH}`;

  if (!config.loginData) {
    throw new CredentialUnavailableError(
      `No loginData in ${config.paths.loginConfig}; cannot acquire a token`
    );
  }

  logger.debug(`POST ${url}`);
  let response: Response;
  try {
    response = await fetchImpl(url, {
      method: 'POST',
      headers: { Accept: 'application/json', 'Content-Type': 'application/json' },
      body: JSON.stringify(config.loginData),
      signal:
        config.requestTimeoutMs === undefined
          ? undefined
          : AbortSignal.timeout(config.requestTimeoutMs),
    });
  } catch (error) {
    throw new CredentialUnavailableError(`Token request to ${url} failed: ${errorMessage(error)}`);
  }

  if (response.status !== 200) {
    throw new CredentialUnavailableError(
      `Token request to ${url} returned HTTP ${response.status}`
    );
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    throw new CredentialUnavailableError(`Token response is not JSON: ${errorMessage(error)}`);
  }

  const token =
    typeof body === 'object' && body !== null && 'token' in body ? body.token : undefined;
  if (typeof token !== 'string' || token === '') {
    throw new CredentialUnavailableError('Token response does not contain a token');
  }

  const tokenPath = config.paths.token;
  try {
    await mkdir(dirname(tokenPath), { recursive: true });
    await writeFile(tokenPath, token, { encoding: 'utf-8', mode: 0o600 });
  } catch (error) {
    throw new CredentialUnavailableError(
      `Cannot write token file ${tokenPath}: ${errorMessage(error)}`,
      tokenPath
    );
  }

  logger.debug(`Wrote new token to ${tokenPath}`);
  return token;
}

/**
 * Bind `acquireToken` to a configuration for use by a TokenStore.
 */
export function createTokenAcquirer(options: AcquireTokenOptions): TokenAcquirer {
  return async () => {
    await acquireToken(options);
  };
}
