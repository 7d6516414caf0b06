/**
 * VM Resource helpers
 *
 * Boundary validation of GET /resources responses and the pure functions the
 * reconciler uses to inspect a resource and build its update payload.
 */

import type { JSONSchemaType } from 'ajv';

import { ajv, formatValidationErrors, runValidator } from '../config/validator.js';
import type { Logger } from '../lib/logger.js';
import {
  ADAPTER_KIND,
  PING_IDENTIFIER,
  REQUIRED_IDENTIFIER_TYPES,
  RESOURCE_KIND,
  type ResourceIdentifier,
  type ResourceUpdatePayload,
  type VMResource,
} from './types.js';

const vmResourceSchema: JSONSchemaType<VMResource> = {
  type: 'object',
  required: ['identifier', 'resourceKey'],
  properties: {
    identifier: { type: 'string', minLength: 1 },
    resourceKey: {
      type: 'object',
      required: ['name', 'resourceIdentifiers'],
      properties: {
        name: { type: 'string' },
        adapterKindKey: { type: 'string', nullable: true },
        resourceKindKey: { type: 'string', nullable: true },
        resourceIdentifiers: {
          type: 'array',
          items: {
            type: 'object',
            required: ['identifierType', 'value'],
            properties: {
              identifierType: {
                type: 'object',
                required: ['name'],
                properties: {
                  name: { type: 'string' },
                  dataType: { type: 'string', nullable: true },
                  isPartOfUniqueness: { type: 'boolean', nullable: true },
                },
              },
              value: { type: 'string' },
            },
          },
        },
      },
    },
  },
};

const validateVMResource = ajv.compile<VMResource>(vmResourceSchema);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Extract the VM resources from a GET /resources response body.
 *
 * Entries that do not match the expected shape are logged and dropped.
 */
export function parseResourceList(body: unknown, logger: Logger): VMResource[] {
  if (!isRecord(body) || body['resourceList'] === undefined) {
    return [];
  }

  const list = body['resourceList'];
  if (!Array.isArray(list)) {
    logger.warning('Ignoring response: resourceList is not an array');
    return [];
  }

  const resources: VMResource[] = [];
  list.forEach((entry: unknown, index) => {
    const result = runValidator(validateVMResource, entry);
    if (result.valid) {
      resources.push(result.value);
    } else {
      logger.warning(
        `Ignoring malformed resource at index ${index}:\n${formatValidationErrors(result.errors)}`
      );
    }
  });
  return resources;
}

/**
 * Find the first identifier entry of the given type.
 */
export function findIdentifier(
  resource: VMResource,
  typeName: string
): ResourceIdentifier | undefined {
  return resource.resourceKey.resourceIdentifiers.find(
    (identifier) => identifier.identifierType.name === typeName
  );
}

/**
 * Whether the resource carries an isPingEnabled entry whose value is not "true".
 *
 * A resource with no isPingEnabled entry at all does not need an update.
 */
export function needsPingUpdate(resource: VMResource): boolean {
  return resource.resourceKey.resourceIdentifiers.some(
    (identifier) =>
      identifier.identifierType.name === PING_IDENTIFIER && identifier.value !== 'true'
  );
}

/**
 * The identifier entries the update must carry, in their original order,
 * with isPingEnabled forced to "true". The resource is not modified.
 */
export function selectRequiredIdentifiers(resource: VMResource): ResourceIdentifier[] {
  const required: readonly string[] = REQUIRED_IDENTIFIER_TYPES;
  return resource.resourceKey.resourceIdentifiers
    .filter((identifier) => required.includes(identifier.identifierType.name))
    .map((identifier) => ({
      identifierType: { ...identifier.identifierType },
      value: identifier.identifierType.name === PING_IDENTIFIER ? 'true' : identifier.value,
    }));
}

/**
 * Build the minimal PUT /resources body.
 */
export function buildUpdatePayload(
  vmId: string,
  name: string,
  identifiers: ResourceIdentifier[]
): ResourceUpdatePayload {
  return {
    resourceKey: {
      name,
      adapterKindKey: ADAPTER_KIND,
      resourceKindKey: RESOURCE_KIND,
      resourceIdentifiers: identifiers,
    },
    identifier: vmId,
  };
}
