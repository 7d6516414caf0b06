/**
 * Unit tests for the Schedule Store
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';

import { Logger, MemorySink } from '../../../src/lib/logger.js';
import { ScheduleStore, defaultScheduleConfig } from '../../../src/schedule/store.js';

describe('ScheduleStore', () => {
  let tempDir: string;
  let schedulePath: string;
  let sink: MemorySink;
  let store: ScheduleStore;

  beforeEach(async () => {
    tempDir = join(tmpdir(), `vm-ping-schedule-${randomUUID()}`);
    await mkdir(tempDir, { recursive: true });
    schedulePath = join(tempDir, 'vcf-monitoring-schedule.json');
    sink = new MemorySink();
    store = new ScheduleStore(schedulePath, new Logger('human', { sink }));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('should return the defaults when the file does not exist', async () => {
    assert.deepStrictEqual(await store.load(), {
      schedule_type: 'interval',
      interval_unit: 'days',
      interval_value: 1,
      cron_expression: '0 0 * * *',
      vm_names: null,
      force_update: false,
      enabled: false,
      last_run: null,
      next_run: null,
    });
    assert.deepStrictEqual(sink.lines, []);
  });

  it('should fill keys missing from the file with defaults', async () => {
    await writeFile(schedulePath, JSON.stringify({ schedule_type: 'cron', cron_expression: '0 9 * * 1' }));

    assert.deepStrictEqual(await store.load(), {
      ...defaultScheduleConfig(),
      schedule_type: 'cron',
      cron_expression: '0 9 * * 1',
    });
  });

  it('should fall back to defaults and warn on an invalid file', async () => {
    await writeFile(schedulePath, JSON.stringify({ interval_value: 0 }));

    assert.deepStrictEqual(await store.load(), defaultScheduleConfig());
    assert.strictEqual(sink.messages('warn').length, 1);
    assert.ok(sink.messages('warn')[0]?.startsWith('⚠ Invalid schedule configuration, using defaults:'));
  });

  it('should fall back to defaults and warn on corrupt JSON', async () => {
    await writeFile(schedulePath, '{"schedule_type": ');

    assert.deepStrictEqual(await store.load(), defaultScheduleConfig());
    assert.strictEqual(sink.messages('warn').length, 1);
  });

  it('should merge updates and persist them', async () => {
    const updated = await store.update({ vm_names: ['web-01', 'web-02'], force_update: true });

    assert.deepStrictEqual(updated.vm_names, ['web-01', 'web-02']);
    const written: Record<string, unknown> = JSON.parse(await readFile(schedulePath, 'utf-8'));
    assert.strictEqual(written['force_update'], true);
    assert.deepStrictEqual(await store.load(), updated);
  });

  it('should not share the default object between loads', async () => {
    const first = await store.load();
    first.enabled = true;

    assert.strictEqual((await store.load()).enabled, false);
  });

  it('should accept explicit nulls and timestamps for the nullable keys', async () => {
    const saved = {
      ...defaultScheduleConfig(),
      vm_names: null,
      last_run: '2025-01-01T00:00:00.000Z',
      next_run: null,
    };
    await writeFile(schedulePath, JSON.stringify(saved));

    assert.deepStrictEqual(await store.load(), saved);
    assert.deepStrictEqual(sink.messages('warn'), []);
  });

  it('should reject a vm_names value that is neither a list nor null', async () => {
    await writeFile(schedulePath, JSON.stringify({ vm_names: 'web-01' }));

    assert.deepStrictEqual(await store.load(), defaultScheduleConfig());
    assert.strictEqual(sink.messages('warn').length, 1);
  });

  it('should reject an empty VM name in the list', async () => {
    await writeFile(schedulePath, JSON.stringify({ vm_names: ['web-01', ''] }));

    assert.deepStrictEqual(await store.load(), defaultScheduleConfig());
    assert.strictEqual(sink.messages('warn').length, 1);
  });
});
