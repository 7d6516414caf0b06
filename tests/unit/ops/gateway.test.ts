/**
 * Unit tests for the Operations resource gateway
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';

import { TokenStore, type TokenAcquirer } from '../../../src/auth/token-store.js';
import { AuthExpiredError, CredentialUnavailableError, RemoteRejectedError } from '../../../src/core/errors.js';
import { Logger, MemorySink } from '../../../src/lib/logger.js';
import { OpsClient } from '../../../src/ops/client.js';
import { OpsGateway } from '../../../src/ops/gateway.js';
import { selectRequiredIdentifiers } from '../../../src/ops/resources.js';
import {
  FakeFetch,
  emptyResponse,
  jsonResponse,
  makeVM,
  resourceList,
  type Responder,
} from '../../helpers/fake-ops.js';

const BASE_URL = 'https://ops.example.test/suite-api/api';

describe('OpsGateway', () => {
  let tempDir: string;
  let tokenPath: string;
  let sink: MemorySink;
  let logger: Logger;
  let refreshes: number;

  beforeEach(async () => {
    tempDir = join(tmpdir(), `vm-ping-gateway-${randomUUID()}`);
    await mkdir(tempDir, { recursive: true });
    tokenPath = join(tempDir, 'token.txt');
    await writeFile(tokenPath, 'test-token-1');
    sink = new MemorySink();
    logger = new Logger('human', { sink });
    refreshes = 0;
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  const rotateToken: TokenAcquirer = async () => {
    refreshes++;
    await writeFile(tokenPath, `test-token-${refreshes + 1}`);
  };

  const refuseToken: TokenAcquirer = async () => {
    refreshes++;
    throw new CredentialUnavailableError('Token request rejected by ops.example.test');
  };

  function createGateway(
    responder: Responder,
    acquire: TokenAcquirer = rotateToken
  ): { gateway: OpsGateway; fake: FakeFetch } {
    const fake = new FakeFetch(responder);
    const tokens = new TokenStore(tokenPath, acquire, logger);
    const client = new OpsClient({ baseUrl: BASE_URL, token: 'test-token-1', logger, fetch: fake.fetch });
    return { gateway: new OpsGateway({ client, tokens, logger }), fake };
  }

  /**
   * Answer with 401 while the request carries a token in `expired`.
   */
  function expiring(expired: string[], respond: Responder): Responder {
    return (request) =>
      expired.some((token) => request.authorization === `OpsToken ${token}`)
        ? emptyResponse(401)
        : respond(request);
  }

  describe('fetchAll', () => {
    it('should request every VMware VirtualMachine', async () => {
      const { gateway, fake } = createGateway(() =>
        jsonResponse(200, resourceList(makeVM('vm-1', 'web-01'), makeVM('vm-2', 'web-02')))
      );

      const vms = await gateway.fetchAll();

      assert.deepStrictEqual(vms.map((vm) => vm.identifier), ['vm-1', 'vm-2']);
      assert.strictEqual(fake.requests.length, 1);
      assert.strictEqual(fake.requests[0]?.url.searchParams.get('resourceKind'), 'VirtualMachine');
      assert.strictEqual(fake.requests[0]?.url.searchParams.get('adapterKind'), 'VMWARE');
      assert.ok(sink.messages().includes('Successfully fetched 2 VMs'));
    });

    it('should refresh the token once on 401 and retry', async () => {
      const { gateway, fake } = createGateway(
        expiring(['test-token-1'], () => jsonResponse(200, resourceList(makeVM('vm-1', 'web-01'))))
      );

      const vms = await gateway.fetchAll();

      assert.strictEqual(vms.length, 1);
      assert.strictEqual(refreshes, 1);
      assert.deepStrictEqual(
        fake.requests.map((request) => request.authorization),
        ['OpsToken test-token-1', 'OpsToken test-token-2']
      );
      assert.deepStrictEqual(sink.messages('warn'), ['⚠ Token expired, refreshing...']);
    });

    it('should propagate a second 401', async () => {
      const { gateway, fake } = createGateway(() => emptyResponse(401));

      await assert.rejects(gateway.fetchAll(), AuthExpiredError);
      assert.strictEqual(refreshes, 1);
      assert.strictEqual(fake.requests.length, 2);
    });

    it('should propagate other failures without refreshing', async () => {
      const { gateway } = createGateway(() => new Response('maintenance', { status: 503 }));

      await assert.rejects(gateway.fetchAll(), RemoteRejectedError);
      assert.strictEqual(refreshes, 0);
    });

    it('should propagate a failed token refresh without retrying', async () => {
      const { gateway, fake } = createGateway(() => emptyResponse(401), refuseToken);

      await assert.rejects(gateway.fetchAll(), CredentialUnavailableError);
      assert.strictEqual(refreshes, 1);
      assert.strictEqual(fake.requests.length, 1);
    });
  });

  describe('fetchNamed', () => {
    it('should refresh once for the whole call and keep the input order', async () => {
      const { gateway, fake } = createGateway(
        expiring(['test-token-1'], (request) => {
          const name = request.url.searchParams.get('name') ?? '';
          return jsonResponse(200, resourceList(makeVM(`id-${name}`, name)));
        })
      );

      const vms = await gateway.fetchNamed(['web-a', 'web-b']);

      assert.deepStrictEqual(vms.map((vm) => vm.resourceKey.name), ['web-a', 'web-b']);
      assert.strictEqual(refreshes, 1);
      assert.deepStrictEqual(
        fake.requests.map((request) => [request.url.searchParams.get('name'), request.authorization]),
        [
          ['web-a', 'OpsToken test-token-1'],
          ['web-a', 'OpsToken test-token-2'],
          ['web-b', 'OpsToken test-token-2'],
        ]
      );
    });

    it('should skip a name that fails after the retry was used', async () => {
      const { gateway, fake } = createGateway(
        expiring(['test-token-1', 'test-token-2'], (request) => {
          const name = request.url.searchParams.get('name') ?? '';
          return jsonResponse(200, resourceList(makeVM(`id-${name}`, name)));
        })
      );

      const vms = await gateway.fetchNamed(['web-a', 'web-b']);

      assert.deepStrictEqual(vms, []);
      assert.strictEqual(refreshes, 1);
      assert.strictEqual(fake.requests.length, 3);
      assert.deepStrictEqual(sink.messages('error'), [
        `✗ Error fetching VM web-a after token refresh: Authorization rejected by ${BASE_URL}/resources?resourceKind=VirtualMachine&adapterKind=VMWARE&name=web-a (HTTP 401)`,
        `✗ Error fetching VM web-b: Authorization rejected by ${BASE_URL}/resources?resourceKind=VirtualMachine&adapterKind=VMWARE&name=web-b (HTTP 401)`,
      ]);
    });

    it('should warn about names with no match and continue', async () => {
      const { gateway } = createGateway((request) => {
        const name = request.url.searchParams.get('name');
        return jsonResponse(200, name === 'ghost' ? { resourceList: [] } : resourceList(makeVM('vm-1', 'web-01')));
      });

      const vms = await gateway.fetchNamed(['ghost', 'web-01']);

      assert.deepStrictEqual(vms.map((vm) => vm.identifier), ['vm-1']);
      assert.deepStrictEqual(sink.messages('warn'), ['⚠ VM not found: ghost']);
      assert.ok(sink.messages().includes('Found VM: web-01'));
    });

    it('should skip a name whose request fails', async () => {
      const { gateway } = createGateway((request) =>
        request.url.searchParams.get('name') === 'broken'
          ? new Response('oops', { status: 500 })
          : jsonResponse(200, resourceList(makeVM('vm-1', 'web-01')))
      );

      const vms = await gateway.fetchNamed(['broken', 'web-01']);

      assert.deepStrictEqual(vms.map((vm) => vm.identifier), ['vm-1']);
      assert.strictEqual(refreshes, 0);
      assert.strictEqual(sink.messages('error').length, 1);
    });

    it('should abort the whole call when the token refresh fails', async () => {
      const { gateway, fake } = createGateway(
        expiring(['test-token-1'], () => jsonResponse(200, resourceList(makeVM('vm-1', 'web-01')))),
        refuseToken
      );

      await assert.rejects(gateway.fetchNamed(['web-a', 'web-b']), CredentialUnavailableError);
      assert.strictEqual(refreshes, 1);
      assert.deepStrictEqual(
        fake.requests.map((request) => request.url.searchParams.get('name')),
        ['web-a']
      );
      assert.deepStrictEqual(sink.messages('error'), []);
    });
  });

  describe('applyUpdate', () => {
    it('should PUT the minimal payload', async () => {
      const { gateway, fake } = createGateway(() => emptyResponse(200));
      const identifiers = selectRequiredIdentifiers(makeVM('vm-1', 'web-01'));

      await gateway.applyUpdate('vm-1', 'web-01', identifiers);

      assert.strictEqual(fake.requests.length, 1);
      assert.strictEqual(fake.requests[0]?.method, 'PUT');
      assert.strictEqual(fake.requests[0]?.url.toString(), `${BASE_URL}/resources?_no_links=true`);
      assert.deepStrictEqual(fake.requests[0]?.body, {
        resourceKey: {
          name: 'web-01',
          adapterKindKey: 'VMWARE',
          resourceKindKey: 'VirtualMachine',
          resourceIdentifiers: identifiers,
        },
        identifier: 'vm-1',
      });
    });
  });
});
