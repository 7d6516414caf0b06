/**
 * Path Utilities
 *
 * Provides path expansion and the default locations of the local files the
 * tool reads and writes.
 */

import { homedir } from 'node:os';
import { isAbsolute, join, resolve } from 'node:path';

/**
 * Default file names, relative to the working directory.
 */
export const DEFAULT_FILE_NAMES = {
  loginConfig: 'vcf-monitoring-loginData.json',
  token: 'vcf-monitoring-accessToken.txt',
  state: 'ping_enabled_vms.json',
  schedule: 'vcf-monitoring-schedule.json',
  pidFile: 'vm_ping_scheduler.pid',
} as const;

/**
 * Absolute locations of every local file.
 */
export interface LocalPaths {
  loginConfig: string;
  token: string;
  state: string;
  schedule: string;
  pidFile: string;
}

/**
 * Expand a path, resolving ~ to home directory and making relative paths absolute.
 *
 * @param inputPath - Path that may contain ~ or be relative
 * @param basePath - Base directory for resolving relative paths
 * @returns Absolute path with ~ expanded
 */
export function expandPath(inputPath: string, basePath: string): string {
  let expanded = inputPath;

  if (expanded.startsWith('~')) {
    expanded = join(homedir(), expanded.slice(1));
  }

  // Expand environment variables (Windows-style %VAR% and Unix-style $VAR)
  expanded = expanded.replace(/%([^%]+)%/g, (_, varName: string) => {
    return process.env[varName] ?? '';
  });
  expanded = expanded.replace(
    /\$([A-Za-z_][A-Za-z0-9_]*)/g,
    (_, varName: string) => {
      return process.env[varName] ?? '';
    }
  );

  if (!isAbsolute(expanded)) {
    expanded = resolve(basePath, expanded);
  }

  return expanded;
}

/**
 * Get the default locations of all local files under a working directory.
 *
 * @param workDir - Directory holding the files (usually the cwd)
 */
export function getDefaultPaths(workDir: string): LocalPaths {
  const base = resolve(workDir);
  return {
    loginConfig: join(base, DEFAULT_FILE_NAMES.loginConfig),
    token: join(base, DEFAULT_FILE_NAMES.token),
    state: join(base, DEFAULT_FILE_NAMES.state),
    schedule: join(base, DEFAULT_FILE_NAMES.schedule),
    pidFile: join(base, DEFAULT_FILE_NAMES.pidFile),
  };
}
