/**
 * Run Command Handler
 *
 * Enables ping monitoring on the named VMs, or on every VM.
 */

import { loadResolvedConfig } from '../../config/resolver.js';
import { ConfigError } from '../../core/errors.js';
import { createSession } from '../../core/session.js';
import { createOutput, handleError, renderBatchSummary, renderOutcome } from '../output.js';

/**
 * Options for the run command
 */
export interface RunCommandOptions {
  vmName?: string[];
  allVms?: boolean;
  force?: boolean;
  json?: boolean;
  debug?: boolean;
}

/**
 * Execute the run command.
 *
 * This command:
 * 1. Loads and validates the login configuration
 * 2. Opens a session (state file, bearer token)
 * 3. Runs one batch over the targeted VMs
 * 4. Reports the counters
 *
 * Ctrl+C saves the state file before exiting.
 *
 * @param configPath - Path to the login configuration
 * @param options - Command options
 */
export async function runCommand(configPath: string, options: RunCommandOptions): Promise<void> {
  const output = createOutput('run', options);

  try {
    if (options.vmName !== undefined && options.allVms) {
      throw new ConfigError('--vm-name and --all-vms cannot be combined', 'CONFIG_VALIDATION_FAILED');
    }
    if (options.vmName === undefined && !options.allVms) {
      throw new ConfigError(
        'No VMs selected',
        'CONFIG_VALIDATION_FAILED',
        'Pass --vm-name <names...> or --all-vms.'
      );
    }

    const config = await loadResolvedConfig(configPath);
    output.debug(`Loaded configuration for ${config.operationsHost}`);

    const session = await createSession({
      config,
      logger: output,
      onProgress: (outcome) => renderOutcome(output, outcome),
    });

    const onInterrupt = (): void => {
      output.warning('Operation cancelled by user');
      session.state
        .save()
        .then(() => process.exit(130))
        .catch(() => process.exit(130));
    };
    process.once('SIGINT', onInterrupt);

    const summary = await session.run({
      vmNames: options.allVms ? undefined : options.vmName,
      forceUpdate: options.force ?? false,
    });
    process.off('SIGINT', onInterrupt);

    renderBatchSummary(output, summary);
    output.flush();
    process.exit(summary.failed === 0 ? 0 : 1);
  } catch (error) {
    handleError(output, error);
  }
}
