/**
 * The scheduled batch job: reload the login configuration, open a fresh
 * session and run one batch with the schedule's targets.
 */

import { loadResolvedConfig } from '../config/resolver.js';
import { createSession, type SessionContext } from '../core/session.js';
import type { BatchSummary } from '../core/types.js';
import type { Logger } from '../lib/logger.js';
import type { ScheduledJob } from './scheduler.js';
import type { ScheduleConfig } from './types.js';

export interface BatchJobOptions {
  configPath: string;
  logger: Logger;
  /** Extra session wiring, e.g. a fetch implementation */
  session?: Omit<SessionContext, 'config' | 'logger'>;
  onSummary?: (summary: BatchSummary) => void;
}

export function createBatchJob(options: BatchJobOptions): ScheduledJob {
  return async (schedule: ScheduleConfig) => {
    const config = await loadResolvedConfig(options.configPath);
    const session = await createSession({ ...options.session, config, logger: options.logger });
    const summary = await session.run({
      vmNames: schedule.vm_names ?? undefined,
      forceUpdate: schedule.force_update,
    });
    options.onSummary?.(summary);
  };
}
