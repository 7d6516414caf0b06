/**
 * Unit tests for Logger
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { ConfigError } from '../../../src/core/errors.js';
import { Logger, MemorySink } from '../../../src/lib/logger.js';

describe('Logger', () => {
  describe('human mode', () => {
    it('should prefix lines with their symbols', () => {
      const sink = new MemorySink();
      const logger = new Logger('human', { sink });

      logger.info('Fetching all VMs...');
      logger.success('Successfully updated web-01');
      logger.warning('VM not found: web-02');
      logger.error('Error updating web-03: boom');

      assert.deepStrictEqual(sink.lines, [
        { stream: 'log', message: 'Fetching all VMs...' },
        { stream: 'log', message: '✓ Successfully updated web-01' },
        { stream: 'warn', message: '⚠ VM not found: web-02' },
        { stream: 'error', message: '✗ Error updating web-03: boom' },
      ]);
    });

    it('should drop debug lines unless debug is enabled', () => {
      const quietSink = new MemorySink();
      const verboseSink = new MemorySink();

      new Logger('human', { sink: quietSink }).debug('hidden');
      new Logger('human', { sink: verboseSink, debug: true }).debug('shown');

      assert.deepStrictEqual(quietSink.messages(), []);
      assert.deepStrictEqual(verboseSink.messages(), ['· shown']);
    });

    it('should print the fix suggestion of an error', () => {
      const sink = new MemorySink();
      const logger = new Logger('human', { sink });

      logger.error('Config missing', new ConfigError('Config missing', 'CONFIG_NOT_FOUND', 'Create it.'));

      assert.deepStrictEqual(sink.messages('error'), ['✗ Config missing', '  Fix: Create it.']);
    });

    it('should indent nested output', () => {
      const sink = new MemorySink();
      const logger = new Logger('human', { sink });

      logger.indent();
      logger.info('nested');
      logger.dedent();
      logger.dedent();
      logger.info('top');

      assert.deepStrictEqual(sink.messages(), ['  nested', 'top']);
    });

    it('should align table columns', () => {
      const sink = new MemorySink();
      const logger = new Logger('human', { sink });

      logger.table(['NAME', 'ACTION'], [['web-01', 'ping_enabled'], ['db', 'unknown']]);

      assert.deepStrictEqual(sink.messages(), [
        'NAME    ACTION',
        'web-01  ping_enabled',
        'db      unknown',
      ]);
    });
  });

  describe('json mode', () => {
    it('should buffer warnings, data and errors and print them on flush', () => {
      const sink = new MemorySink();
      const logger = new Logger('json', { sink });

      logger.setCommand('run');
      logger.info('not printed');
      logger.warning('VM not found: web-02');
      logger.addData('summary', { totalFound: 1 });
      logger.error('Token request failed', new ConfigError('x', 'CONFIG_NOT_FOUND'));

      assert.deepStrictEqual(sink.lines, []);
      logger.flush();

      assert.strictEqual(sink.lines.length, 1);
      assert.deepStrictEqual(JSON.parse(sink.messages()[0] ?? ''), {
        success: false,
        command: 'run',
        data: { summary: { totalFound: 1 } },
        warnings: ['VM not found: web-02'],
        error: { code: 'CONFIG_NOT_FOUND', message: 'Token request failed' },
      });
    });
  });

  describe('fromOptions', () => {
    it('should pick the mode from --json', () => {
      assert.strictEqual(Logger.fromOptions({ json: true }).getMode(), 'json');
      assert.strictEqual(Logger.fromOptions({}).getMode(), 'human');
    });
  });
});
