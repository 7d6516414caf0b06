/**
 * Status Command Handler
 *
 * Lists the VMs recorded in the state file.
 */

import { loadResolvedConfig } from '../../config/resolver.js';
import { StateManager } from '../../state/manager.js';
import { createOutput, handleError, renderStateTable } from '../output.js';

export interface StatusCommandOptions {
  json?: boolean;
  debug?: boolean;
}

export async function statusCommand(configPath: string, options: StatusCommandOptions): Promise<void> {
  const output = createOutput('status', options);

  try {
    const config = await loadResolvedConfig(configPath);
    const state = new StateManager(config.paths.state, {
      source: config.operationsHost,
      logger: output,
    });
    await state.load();

    renderStateTable(output, state.getStatePath(), state.entries());
    output.flush();
    process.exit(0);
  } catch (error) {
    handleError(output, error);
  }
}
