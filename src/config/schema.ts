/**
 * JSON Schema for vcf-monitoring-loginData.json
 */

import type { JSONSchemaType } from 'ajv';
import type { LoginConfig } from './types.js';

export const loginConfigSchema: JSONSchemaType<LoginConfig> = {
  type: 'object',
  required: ['operationsHost'],
  properties: {
    operationsHost: {
      type: 'string',
      minLength: 1,
      pattern: '^[A-Za-z0-9.-]+(:[0-9]{1,5})?$',
    },
    loginData: {
      type: 'object',
      nullable: true,
      required: ['username', 'password'],
      properties: {
        username: { type: 'string', minLength: 1 },
        password: { type: 'string' },
        authSource: { type: 'string', nullable: true },
      },
      additionalProperties: true,
    },
    settings: {
      type: 'object',
      nullable: true,
      required: [],
      properties: {
        state_file: { type: 'string', nullable: true, minLength: 1 },
        token_file: { type: 'string', nullable: true, minLength: 1 },
        schedule_file: { type: 'string', nullable: true, minLength: 1 },
        pid_file: { type: 'string', nullable: true, minLength: 1 },
        api_base_url: { type: 'string', nullable: true, format: 'uri' },
        request_timeout_ms: { type: 'integer', nullable: true, minimum: 1 },
      },
      additionalProperties: false,
    },
  },
  additionalProperties: true,
};
