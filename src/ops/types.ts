/**
 * Operations API Types
 *
 * Shapes of the VCF Operations /resources payloads this tool reads and writes.
 */

/**
 * Identifier types that must be sent back for the API to accept an update.
 */
export const REQUIRED_IDENTIFIER_TYPES = [
  'isPingEnabled',
  'VMEntityName',
  'VMEntityObjectID',
  'VMEntityVCID',
] as const;

export type RequiredIdentifierType = (typeof REQUIRED_IDENTIFIER_TYPES)[number];

export const PING_IDENTIFIER: RequiredIdentifierType = 'isPingEnabled';

export const ADAPTER_KIND = 'VMWARE';
export const RESOURCE_KIND = 'VirtualMachine';

/**
 * Type descriptor of one resource identifier
 */
export interface IdentifierType {
  name: string;
  dataType?: string;
  isPartOfUniqueness?: boolean;
}

/**
 * One typed identifier entry of a resource key
 */
export interface ResourceIdentifier {
  identifierType: IdentifierType;
  value: string;
}

/**
 * The resourceKey of a VM resource
 */
export interface ResourceKey {
  name: string;
  adapterKindKey?: string;
  resourceKindKey?: string;
  resourceIdentifiers: ResourceIdentifier[];
}

/**
 * A VM resource as returned by GET /resources
 */
export interface VMResource {
  /** Operations resource id, stable across runs */
  identifier: string;
  resourceKey: ResourceKey;
}

/**
 * Body of PUT /resources
 */
export interface ResourceUpdatePayload {
  resourceKey: {
    name: string;
    adapterKindKey: typeof ADAPTER_KIND;
    resourceKindKey: typeof RESOURCE_KIND;
    resourceIdentifiers: ResourceIdentifier[];
  };
  identifier: string;
}
