/**
 * Validate Command Handler
 *
 * Validates the login configuration without contacting the Operations API.
 */

import { loadResolvedConfig } from '../../config/resolver.js';
import { createOutput, handleError } from '../output.js';

export interface ValidateCommandOptions {
  json?: boolean;
}

/**
 * Execute the validate command.
 *
 * Warns, without failing, when loginData is missing: the tool can still
 * run on an existing token but cannot refresh it.
 */
export async function validateCommand(
  configPath: string,
  options: ValidateCommandOptions
): Promise<void> {
  const output = createOutput('validate', options);

  try {
    output.info(`Validating configuration: ${configPath}`);
    const config = await loadResolvedConfig(configPath);

    output.success('Configuration valid');
    output.indent();
    output.info(`Operations host: ${config.operationsHost}`);
    output.info(`API: ${config.apiBaseUrl}`);
    output.info(`State file: ${config.paths.state}`);
    output.info(`Token file: ${config.paths.token}`);
    output.dedent();

    if (!config.loginData) {
      output.newline();
      output.warning('No loginData: expired tokens cannot be refreshed');
    }

    output.addData('operationsHost', config.operationsHost);
    output.addData('paths', config.paths);
    output.flush();
    process.exit(0);
  } catch (error) {
    handleError(output, error);
  }
}
