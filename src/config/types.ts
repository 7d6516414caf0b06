/**
 * Configuration Types for vm-ping-enabler
 *
 * These types represent the login configuration file and the resolved
 * configuration with defaults applied.
 */

import type { LocalPaths } from '../lib/paths.js';

// =============================================================================
// File Input Types
// =============================================================================

/**
 * Root of vcf-monitoring-loginData.json
 */
export interface LoginConfig {
  /** FQDN (optionally with port) of the VCF Operations instance */
  operationsHost: string;
  /** Body sent to /auth/token/acquire */
  loginData?: LoginData;
  settings?: SettingsConfig;
}

/**
 * Credentials posted to acquire a bearer token
 */
export interface LoginData {
  username: string;
  password: string;
  /** Authentication source, e.g. "local" or an LDAP source name */
  authSource?: string;
}

/**
 * Optional overrides for local file locations and request behavior
 */
export interface SettingsConfig {
  state_file?: string;
  token_file?: string;
  schedule_file?: string;
  pid_file?: string;
  /** Override of https://{operationsHost}/suite-api/api, e.g. for a proxy */
  api_base_url?: string;
  /** Abort each API request after this many milliseconds. Default: no timeout */
  request_timeout_ms?: number;
}

// =============================================================================
// Resolved Types
// =============================================================================

/**
 * Fully resolved configuration ready for a session
 */
export interface ResolvedConfig {
  operationsHost: string;
  /** https://{operationsHost}/suite-api/api */
  apiBaseUrl: string;
  loginData?: LoginData;
  /** Absolute locations of local files */
  paths: LocalPaths;
  requestTimeoutMs?: number;
}
