/**
 * Schedule Store
 *
 * Loads and saves the scheduler configuration. Like the state file, a
 * missing or invalid file falls back to defaults and a failed save is logged.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { JSONSchemaType } from 'ajv';

import { ajv, formatValidationErrors, runValidator } from '../config/validator.js';
import { errorMessage } from '../core/errors.js';
import type { Logger } from '../lib/logger.js';
import { DEFAULT_SCHEDULE_CONFIG, type ScheduleConfig } from './types.js';

const scheduleConfigSchema: JSONSchemaType<ScheduleConfig> = {
  type: 'object',
  required: [
    'schedule_type',
    'interval_unit',
    'interval_value',
    'cron_expression',
    'vm_names',
    'force_update',
    'enabled',
    'last_run',
    'next_run',
  ],
  properties: {
    schedule_type: { type: 'string', enum: ['interval', 'cron'] },
    interval_unit: { type: 'string', enum: ['minutes', 'hours', 'days'] },
    interval_value: { type: 'integer', minimum: 1 },
    cron_expression: { type: 'string' },
    vm_names: {
      anyOf: [{ type: 'array', items: { type: 'string', minLength: 1 } }, { type: 'null', nullable: true }],
    },
    force_update: { type: 'boolean' },
    enabled: { type: 'boolean' },
    last_run: { anyOf: [{ type: 'string' }, { type: 'null', nullable: true }] },
    next_run: { anyOf: [{ type: 'string' }, { type: 'null', nullable: true }] },
  },
  additionalProperties: false,
};

const validateScheduleConfig = ajv.compile<ScheduleConfig>(scheduleConfigSchema);

export function defaultScheduleConfig(): ScheduleConfig {
  return { ...DEFAULT_SCHEDULE_CONFIG };
}

export class ScheduleStore {
  constructor(
    private readonly configPath: string,
    private readonly logger: Logger
  ) {}

  /**
   * Load the configuration. Keys missing from the file take their defaults.
   */
  async load(): Promise<ScheduleConfig> {
    let content: string;
    try {
      content = await readFile(this.configPath, 'utf-8');
    } catch (error) {
      const err = error as NodeJS.ErrnoException;
      if (err.code === 'ENOENT') {
        this.logger.debug(`Configuration file ${this.configPath} not found, using defaults`);
      } else {
        this.logger.warning(`Error loading schedule configuration: ${err.message}`);
      }
      return defaultScheduleConfig();
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      this.logger.warning(`Error loading schedule configuration: ${errorMessage(error)}`);
      return defaultScheduleConfig();
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      this.logger.warning('Schedule configuration is not a JSON object, using defaults');
      return defaultScheduleConfig();
    }

    const result = runValidator(validateScheduleConfig, { ...DEFAULT_SCHEDULE_CONFIG, ...parsed });
    if (!result.valid) {
      this.logger.warning(
        `Invalid schedule configuration, using defaults:\n${formatValidationErrors(result.errors)}`
      );
      return defaultScheduleConfig();
    }

    this.logger.debug(`Loaded configuration from ${this.configPath}`);
    return result.value;
  }

  /**
   * Write the configuration. Failures are logged, not thrown.
   */
  async save(config: ScheduleConfig): Promise<boolean> {
    try {
      await mkdir(dirname(this.configPath), { recursive: true });
      await writeFile(this.configPath, JSON.stringify(config, null, 2), 'utf-8');
      this.logger.debug(`Saved configuration to ${this.configPath}`);
      return true;
    } catch (error) {
      this.logger.error(`Error saving schedule configuration: ${errorMessage(error)}`);
      return false;
    }
  }

  /**
   * Merge updates into the stored configuration and save it.
   */
  async update(updates: Partial<ScheduleConfig>): Promise<ScheduleConfig> {
    const config = { ...(await this.load()), ...updates };
    await this.save(config);
    return config;
  }
}
