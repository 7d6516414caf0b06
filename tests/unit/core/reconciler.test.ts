/**
 * Unit tests for the VM Reconciler
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';

import { Reconciler } from '../../../src/core/reconciler.js';
import { Logger, MemorySink } from '../../../src/lib/logger.js';
import { StateManager } from '../../../src/state/manager.js';
import { FakeGateway, makeVM } from '../../helpers/fake-ops.js';

describe('Reconciler', () => {
  let sink: MemorySink;
  let logger: Logger;
  let state: StateManager;
  let gateway: FakeGateway;
  let reconciler: Reconciler;

  beforeEach(() => {
    sink = new MemorySink();
    logger = new Logger('human', { sink });
    // Never saved by these tests
    state = new StateManager(join(tmpdir(), `vm-ping-reconciler-${randomUUID()}.json`), {
      source: 'ops.example.test',
      logger,
      now: () => new Date('2025-04-01T10:00:00.000Z'),
    });
    gateway = new FakeGateway([]);
    reconciler = new Reconciler({ gateway, state, logger });
  });

  it('should enable ping when isPingEnabled is "false"', async () => {
    const outcome = await reconciler.reconcile(makeVM('vm-1', 'web-01', 'false'), false);

    assert.deepStrictEqual(outcome, { vmId: 'vm-1', name: 'web-01', status: 'updated', updated: true });
    assert.strictEqual(gateway.updates.length, 1);
    assert.deepStrictEqual(
      gateway.updates[0]?.identifiers.find((entry) => entry.identifierType.name === 'isPingEnabled')?.value,
      'true'
    );
    assert.deepStrictEqual(state.get('vm-1'), {
      name: 'web-01',
      first_processed: '2025-04-01T10:00:00.000Z',
      last_processed: '2025-04-01T10:00:00.000Z',
      ops_source: 'ops.example.test',
      action: 'ping_enabled',
    });
    assert.deepStrictEqual(sink.messages(), ['Updating ping monitoring for web-01', '✓ Successfully updated web-01']);
  });

  it('should never write when the value is already "true"', async () => {
    const outcome = await reconciler.reconcile(makeVM('vm-1', 'web-01', 'true'), false);

    assert.strictEqual(outcome.status, 'skipped_already_enabled');
    assert.strictEqual(gateway.updates.length, 0);
    assert.strictEqual(state.get('vm-1')?.action, 'already_enabled');
  });

  it('should treat a VM without an isPingEnabled entry as enabled', async () => {
    const outcome = await reconciler.reconcile(makeVM('vm-1', 'web-01', null), false);

    assert.strictEqual(outcome.status, 'skipped_already_enabled');
    assert.strictEqual(gateway.updates.length, 0);
  });

  it('should skip a cached VM without looking at it', async () => {
    state.record('vm-1', 'web-01', 'ping_enabled');

    const outcome = await reconciler.reconcile(makeVM('vm-1', 'web-01', 'false'), false);

    assert.strictEqual(outcome.status, 'skipped_cached');
    assert.strictEqual(gateway.updates.length, 0);
    assert.deepStrictEqual(sink.messages(), ['Skipping web-01 - already processed (cached)']);
  });

  it('should re-evaluate a cached VM when forced', async () => {
    state.record('vm-1', 'web-01', 'already_enabled');

    const outcome = await reconciler.reconcile(makeVM('vm-1', 'web-01', 'false'), true);

    assert.strictEqual(outcome.status, 'updated');
    assert.strictEqual(gateway.updates.length, 1);
  });

  it('should report a rejected update and leave the record untouched', async () => {
    gateway.rejectUpdatesFor.add('vm-1');

    const outcome = await reconciler.reconcile(makeVM('vm-1', 'web-01', 'false'), false);

    assert.deepStrictEqual(outcome, {
      vmId: 'vm-1',
      name: 'web-01',
      status: 'update_failed',
      updated: false,
      error: 'PUT /resources returned HTTP 500',
    });
    assert.strictEqual(state.get('vm-1'), undefined);
    assert.deepStrictEqual(sink.messages('error'), [
      '✗ Error updating web-01: PUT /resources returned HTTP 500',
      '✗ Response: locked',
    ]);
  });
});
