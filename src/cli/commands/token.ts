/**
 * Token Command Handler
 *
 * Acquires a new bearer token and writes it to the token file.
 */

import { acquireToken } from '../../auth/acquire.js';
import { loadResolvedConfig } from '../../config/resolver.js';
import { createOutput, handleError } from '../output.js';

export interface TokenCommandOptions {
  json?: boolean;
  debug?: boolean;
}

export async function tokenCommand(configPath: string, options: TokenCommandOptions): Promise<void> {
  const output = createOutput('token', options);

  try {
    const config = await loadResolvedConfig(configPath);
    output.info(`Requesting token from ${config.operationsHost}`);

    await acquireToken({ config, logger: output });

    output.success(`New bearer token written to ${config.paths.token}`);
    output.addData('tokenFile', config.paths.token);
    output.flush();
    process.exit(0);
  } catch (error) {
    handleError(output, error);
  }
}
