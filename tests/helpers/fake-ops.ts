/**
 * In-process stand-ins for the Operations API, shared by the tests.
 */

import { RemoteRejectedError } from '../../src/core/errors.js';
import type { FetchLike } from '../../src/ops/client.js';
import type { ResourceGateway } from '../../src/ops/gateway.js';
import type { ResourceIdentifier, VMResource } from '../../src/ops/types.js';

export interface RecordedRequest {
  method: string;
  url: URL;
  authorization: string | null;
  body: unknown;
}

export type Responder = (request: RecordedRequest) => Response | Promise<Response>;

export function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function emptyResponse(status: number): Response {
  return new Response(null, { status });
}

/**
 * Records every request and answers it with `responder`.
 */
export class FakeFetch {
  readonly requests: RecordedRequest[] = [];

  constructor(private readonly responder: Responder) {}

  readonly fetch: FetchLike = async (input, init) => {
    const headers = new Headers(init?.headers);
    const request: RecordedRequest = {
      method: init?.method ?? 'GET',
      url: new URL(input),
      authorization: headers.get('Authorization'),
      body: typeof init?.body === 'string' ? JSON.parse(init.body) : undefined,
    };
    this.requests.push(request);
    return this.responder(request);
  };
}

function identifier(name: string, value: string): ResourceIdentifier {
  return { identifierType: { name, dataType: 'STRING', isPartOfUniqueness: true }, value };
}

/**
 * A VirtualMachine resource. `ping` null leaves out the isPingEnabled entry.
 */
export function makeVM(vmId: string, name: string, ping: string | null = 'false'): VMResource {
  const identifiers = [
    identifier('VMEntityInstanceUUID', `uuid-${vmId}`),
    identifier('VMEntityName', name),
    identifier('VMEntityObjectID', `vm-${vmId}`),
    identifier('VMEntityVCID', 'vc-0001'),
  ];
  if (ping !== null) {
    identifiers.push(identifier('isPingEnabled', ping));
  }
  return {
    identifier: vmId,
    resourceKey: {
      name,
      adapterKindKey: 'VMWARE',
      resourceKindKey: 'VirtualMachine',
      resourceIdentifiers: identifiers,
    },
  };
}

export function resourceList(...vms: VMResource[]): { resourceList: VMResource[] } {
  return { resourceList: vms };
}

/**
 * A ResourceGateway over a fixed list of VMs that records updates.
 */
export class FakeGateway implements ResourceGateway {
  readonly updates: Array<{ vmId: string; name: string; identifiers: ResourceIdentifier[] }> = [];
  fetchError: Error | undefined;
  rejectUpdatesFor = new Set<string>();

  constructor(public vms: VMResource[]) {}

  async fetchAll(): Promise<VMResource[]> {
    if (this.fetchError) {
      throw this.fetchError;
    }
    return this.vms;
  }

  async fetchNamed(names: string[]): Promise<VMResource[]> {
    const all = await this.fetchAll();
    return names.flatMap((name) => all.filter((vm) => vm.resourceKey.name === name));
  }

  async applyUpdate(vmId: string, name: string, identifiers: ResourceIdentifier[]): Promise<void> {
    if (this.rejectUpdatesFor.has(vmId)) {
      throw new RemoteRejectedError('PUT /resources returned HTTP 500', 500, '/resources', 'locked');
    }
    this.updates.push({ vmId, name, identifiers });
  }
}
