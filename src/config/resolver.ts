/**
 * Configuration Resolver
 *
 * Loads, validates and resolves the login configuration into the values a
 * session needs: API base URL, credentials and absolute file locations.
 */

import { dirname, resolve } from 'node:path';

import { ConfigError } from '../core/errors.js';
import { expandPath, getDefaultPaths } from '../lib/paths.js';
import { loadConfigFile, ConfigLoadError } from './loader.js';
import { validateLoginConfig } from './validator.js';
import type { LoginConfig, ResolvedConfig } from './types.js';

/**
 * Build the REST base URL for an Operations host.
 */
export function apiBaseUrl(operationsHost: string): string {
  return `https://${operationsHost}/suite-api/api`;
}

/**
 * Resolve a validated login configuration.
 *
 * Files named under `settings` are resolved relative to the directory that
 * holds the configuration file; the rest default to that directory.
 *
 * @param config - Validated login configuration
 * @param configPath - Path to the configuration file
 */
export function resolveConfig(config: LoginConfig, configPath: string): ResolvedConfig {
  const absoluteConfigPath = resolve(configPath);
  const basePath = dirname(absoluteConfigPath);
  const defaults = getDefaultPaths(basePath);
  const settings = config.settings;

  const pick = (value: string | undefined, fallback: string): string =>
    value === undefined ? fallback : expandPath(value, basePath);

  return {
    operationsHost: config.operationsHost,
    apiBaseUrl: settings?.api_base_url?.replace(/\/+$/, '') ?? apiBaseUrl(config.operationsHost),
    loginData: config.loginData,
    paths: {
      loginConfig: absoluteConfigPath,
      token: pick(settings?.token_file, defaults.token),
      state: pick(settings?.state_file, defaults.state),
      schedule: pick(settings?.schedule_file, defaults.schedule),
      pidFile: pick(settings?.pid_file, defaults.pidFile),
    },
    requestTimeoutMs: settings?.request_timeout_ms,
  };
}

/**
 * Load, validate and resolve the login configuration at `configPath`.
 *
 * @throws ConfigError when the file is missing, unparsable or invalid
 */
export async function loadResolvedConfig(configPath: string): Promise<ResolvedConfig> {
  let raw: unknown;
  try {
    raw = await loadConfigFile(configPath);
  } catch (error) {
    if (error instanceof ConfigLoadError) {
      throw new ConfigError(
        error.message,
        error.reason === 'syntax' ? 'CONFIG_INVALID_SYNTAX' : 'CONFIG_NOT_FOUND',
        'Create vcf-monitoring-loginData.json with at least {"operationsHost": "<fqdn>"}.',
        configPath
      );
    }
    throw error;
  }

  const result = validateLoginConfig(raw);
  if (!result.valid) {
    throw new ConfigError(
      `Invalid login configuration: ${configPath}`,
      'CONFIG_VALIDATION_FAILED',
      undefined,
      configPath,
      result.errors.map(({ path, message }) => ({ path, message }))
    );
  }

  return resolveConfig(result.value, configPath);
}
