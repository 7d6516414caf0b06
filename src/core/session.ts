/**
 * Session
 *
 * Wires the token store, state manager, gateway, reconciler and batch
 * runner from one explicit context. The token is read once here and only
 * replaced when the gateway sees a 401.
 */

import { createTokenAcquirer } from '../auth/acquire.js';
import { TokenStore, type TokenAcquirer } from '../auth/token-store.js';
import type { ResolvedConfig } from '../config/types.js';
import type { Logger } from '../lib/logger.js';
import { OpsClient, type FetchLike } from '../ops/client.js';
import { OpsGateway } from '../ops/gateway.js';
import { StateManager } from '../state/manager.js';
import { BatchRunner, type BatchProgressCallback } from './batch.js';
import { Reconciler } from './reconciler.js';
import type { BatchOptions, BatchSummary } from './types.js';

/**
 * Everything a session is built from
 */
export interface SessionContext {
  config: ResolvedConfig;
  logger: Logger;
  /** HTTP implementation (default: global fetch) */
  fetch?: FetchLike;
  /** Clock for record timestamps (default: system time) */
  now?: () => Date;
  /** Token acquisition (default: POST /auth/token/acquire with loginData) */
  acquire?: TokenAcquirer;
  onProgress?: BatchProgressCallback;
}

export interface Session {
  readonly config: ResolvedConfig;
  readonly tokens: TokenStore;
  readonly state: StateManager;
  readonly gateway: OpsGateway;
  readonly reconciler: Reconciler;
  readonly batch: BatchRunner;
  run(options: BatchOptions): Promise<BatchSummary>;
}

/**
 * Build a session: load state, capture the token, wire the components.
 *
 * @throws CredentialUnavailableError if no token can be obtained
 */
export async function createSession(context: SessionContext): Promise<Session> {
  const { config, logger } = context;

  const acquire =
    context.acquire ?? createTokenAcquirer({ config, logger, fetch: context.fetch });
  const tokens = new TokenStore(config.paths.token, acquire, logger);

  const state = new StateManager(config.paths.state, {
    source: config.operationsHost,
    logger,
    now: context.now,
  });
  await state.load();

  const token = await tokens.getToken();
  const client = new OpsClient({
    baseUrl: config.apiBaseUrl,
    token,
    logger,
    fetch: context.fetch,
    timeoutMs: config.requestTimeoutMs,
  });

  const gateway = new OpsGateway({ client, tokens, logger });
  const reconciler = new Reconciler({ gateway, state, logger });
  const batch = new BatchRunner({
    gateway,
    reconciler,
    state,
    logger,
    onProgress: context.onProgress,
  });

  logger.debug(`Initialized session for ${config.operationsHost}`);

  return {
    config,
    tokens,
    state,
    gateway,
    reconciler,
    batch,
    run: (options) => batch.run(options),
  };
}
