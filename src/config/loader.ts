/**
 * Configuration Loader
 *
 * Reads the login configuration. The Operations tooling ships it as JSON;
 * hand-written YAML copies are accepted too, since js-yaml reads both.
 */

import { readFile } from 'node:fs/promises';
import yaml from 'js-yaml';

export type ConfigLoadFailure = 'not-found' | 'unreadable' | 'syntax';

/**
 * Error thrown when a configuration file cannot be read or parsed
 */
export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly reason: ConfigLoadFailure,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'ConfigLoadError';
  }
}

function readFailure(filePath: string, err: NodeJS.ErrnoException): ConfigLoadError {
  switch (err.code) {
    case 'ENOENT':
      return new ConfigLoadError(`Configuration file not found: ${filePath}`, filePath, 'not-found', err);
    case 'EACCES':
    case 'EPERM':
      return new ConfigLoadError(
        `Permission denied reading configuration file: ${filePath}`,
        filePath,
        'unreadable',
        err
      );
    case 'EISDIR':
      return new ConfigLoadError(`Configuration path is a directory: ${filePath}`, filePath, 'unreadable', err);
    default:
      return new ConfigLoadError(`Failed to read configuration file: ${filePath}`, filePath, 'unreadable', err);
  }
}

/**
 * Read and parse a configuration file. A UTF-8 byte order mark is ignored.
 *
 * @returns Parsed content as unknown (requires validation)
 * @throws ConfigLoadError if the file cannot be read or parsed
 */
export async function loadConfigFile(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw readFailure(filePath, error as NodeJS.ErrnoException);
  }

  try {
    return yaml.load(content.replace(/^\uFEFF/, ''), { filename: filePath });
  } catch (error) {
    if (error instanceof yaml.YAMLException) {
      throw new ConfigLoadError(`Invalid syntax in ${filePath}: ${error.reason}`, filePath, 'syntax', error);
    }
    throw error;
  }
}
