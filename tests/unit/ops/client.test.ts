/**
 * Unit tests for the Operations REST client
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import {
  AuthExpiredError,
  RemoteRejectedError,
  TransportError,
} from '../../../src/core/errors.js';
import { Logger, MemorySink } from '../../../src/lib/logger.js';
import { OpsClient } from '../../../src/ops/client.js';
import { FakeFetch, emptyResponse, jsonResponse } from '../../helpers/fake-ops.js';

const BASE_URL = 'https://ops.example.test/suite-api/api';

function createClient(fake: FakeFetch): OpsClient {
  return new OpsClient({
    baseUrl: `${BASE_URL}/`,
    token: 'test-token',
    logger: new Logger('json', { sink: new MemorySink() }),
    fetch: fake.fetch,
  });
}

describe('OpsClient', () => {
  it('should send the OpsToken header and query, and parse the JSON body', async () => {
    const fake = new FakeFetch(() => jsonResponse(200, { resourceList: [] }));
    const client = createClient(fake);

    const body = await client.request('GET', '/resources', {
      query: { resourceKind: 'VirtualMachine', adapterKind: 'VMWARE' },
    });

    assert.deepStrictEqual(body, { resourceList: [] });
    assert.strictEqual(fake.requests.length, 1);
    assert.strictEqual(
      fake.requests[0]?.url.toString(),
      `${BASE_URL}/resources?resourceKind=VirtualMachine&adapterKind=VMWARE`
    );
    assert.strictEqual(fake.requests[0]?.authorization, 'OpsToken test-token');
  });

  it('should use the replaced token on later requests', async () => {
    const fake = new FakeFetch(() => jsonResponse(200, {}));
    const client = createClient(fake);

    client.setToken('test-token-2');
    await client.request('GET', '/resources');

    assert.strictEqual(fake.requests[0]?.authorization, 'OpsToken test-token-2');
  });

  it('should serialize the request body', async () => {
    const fake = new FakeFetch(() => emptyResponse(200));
    const client = createClient(fake);

    const body = await client.request('PUT', '/resources', {
      query: { _no_links: 'true' },
      body: { identifier: 'vm-1' },
    });

    assert.strictEqual(body, undefined);
    assert.strictEqual(fake.requests[0]?.method, 'PUT');
    assert.deepStrictEqual(fake.requests[0]?.body, { identifier: 'vm-1' });
  });

  it('should map HTTP 401 to AuthExpiredError', async () => {
    const client = createClient(new FakeFetch(() => emptyResponse(401)));

    await assert.rejects(client.request('GET', '/resources'), AuthExpiredError);
  });

  it('should map other error statuses to RemoteRejectedError with the body', async () => {
    const client = createClient(new FakeFetch(() => new Response('resource is locked', { status: 500 })));

    await assert.rejects(client.request('PUT', '/resources'), (error: unknown) => {
      assert.ok(error instanceof RemoteRejectedError);
      assert.strictEqual(error.status, 500);
      assert.strictEqual(error.body, 'resource is locked');
      assert.strictEqual(error.message, `PUT ${BASE_URL}/resources returned HTTP 500`);
      return true;
    });
  });

  it('should reject a success body that is not JSON', async () => {
    const client = createClient(new FakeFetch(() => new Response('<html>', { status: 200 })));

    await assert.rejects(client.request('GET', '/resources'), (error: unknown) => {
      assert.ok(error instanceof RemoteRejectedError);
      assert.strictEqual(error.message, `GET ${BASE_URL}/resources returned a body that is not JSON`);
      return true;
    });
  });

  it('should map network failures to TransportError', async () => {
    const client = createClient(
      new FakeFetch(() => {
        throw new TypeError('fetch failed');
      })
    );

    await assert.rejects(client.request('GET', '/resources'), (error: unknown) => {
      assert.ok(error instanceof TransportError);
      assert.strictEqual(error.code, 'TRANSPORT_FAILED');
      assert.strictEqual(error.message, `GET ${BASE_URL}/resources failed: fetch failed`);
      assert.ok(error.cause instanceof TypeError);
      return true;
    });
  });
});
