#!/usr/bin/env node
import { Command, program } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join, resolve } from 'path';

import { DEFAULT_FILE_NAMES } from '../lib/paths.js';
import { runCommand } from './commands/run.js';
import { tokenCommand } from './commands/token.js';
import { validateCommand } from './commands/validate.js';
import { statusCommand } from './commands/status.js';
import {
  scheduleConfigureCommand,
  scheduleRunNowCommand,
  scheduleStartCommand,
  scheduleStatusCommand,
  scheduleStopCommand,
} from './commands/schedule.js';

// Get version from package.json
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packagePath = join(__dirname, '..', '..', 'package.json');
const packageJson = JSON.parse(readFileSync(packagePath, 'utf-8')) as { version: string };

interface GlobalOptions {
  dir?: string;
  config?: string;
}

program
  .name('vm-ping')
  .description('Enable ping monitoring on VMware VMs in VCF Operations')
  .version(packageJson.version)
  .option('--dir <path>', 'Working directory for configuration, token and state files')
  .option('--config <file>', `Login configuration (default: <dir>/${DEFAULT_FILE_NAMES.loginConfig})`);

/**
 * Resolve the login configuration path from the global options.
 */
function configPath(): string {
  const globalOpts = program.opts<GlobalOptions>();
  const workDir = resolve(globalOpts.dir ?? process.cwd());
  return globalOpts.config !== undefined
    ? resolve(workDir, globalOpts.config)
    : join(workDir, DEFAULT_FILE_NAMES.loginConfig);
}

const JSON_DESC = 'Output as JSON';
const DEBUG_DESC = 'Print debug messages';

program
  .command('run')
  .description('Enable ping monitoring on the selected VMs')
  .option('--vm-name <names...>', 'Names of the VMs to process')
  .option('--all-vms', 'Process every VM in the environment')
  .option('--force', 'Ignore the processed-VM cache')
  .option('--json', JSON_DESC)
  .option('--debug', DEBUG_DESC)
  .action((opts) => runCommand(configPath(), opts));

program
  .command('token')
  .description('Acquire a new bearer token')
  .option('--json', JSON_DESC)
  .option('--debug', DEBUG_DESC)
  .action((opts) => tokenCommand(configPath(), opts));

program
  .command('validate')
  .description('Validate the login configuration')
  .option('--json', JSON_DESC)
  .action((opts) => validateCommand(configPath(), opts));

program
  .command('status')
  .description('List the VMs recorded in the state file')
  .option('--json', JSON_DESC)
  .option('--debug', DEBUG_DESC)
  .action((opts) => statusCommand(configPath(), opts));

const schedule = new Command('schedule').description('Run the enabler on a schedule');

schedule
  .command('start')
  .description('Start the scheduler in the foreground')
  .option('--json', JSON_DESC)
  .option('--debug', DEBUG_DESC)
  .action((opts) => scheduleStartCommand(configPath(), opts));

schedule
  .command('stop')
  .description('Stop the running scheduler')
  .option('--json', JSON_DESC)
  .option('--debug', DEBUG_DESC)
  .action((opts) => scheduleStopCommand(configPath(), opts));

schedule
  .command('status')
  .description('Show scheduler status and configuration')
  .option('--json', JSON_DESC)
  .option('--debug', DEBUG_DESC)
  .action((opts) => scheduleStatusCommand(configPath(), opts));

schedule
  .command('run-now')
  .description('Run the scheduled job once, now')
  .option('--json', JSON_DESC)
  .option('--debug', DEBUG_DESC)
  .action((opts) => scheduleRunNowCommand(configPath(), opts));

schedule
  .command('configure')
  .description('Change the schedule, targets or cache behavior')
  .option('--daily <time>', 'Run daily at HH:MM')
  .option('--weekly <args...>', 'Run weekly: DAY [HH:MM]')
  .option('--monthly <args...>', 'Run monthly: DAY_OF_MONTH [HH:MM]')
  .option('--every <args...>', 'Run every VALUE UNIT (minutes, hours, days)')
  .option('--cron <expression>', 'Run on a five-field cron expression')
  .option('--vm-names <names...>', 'Process only these VMs')
  .option('--all-vms', 'Process every VM')
  .option('--force', 'Ignore the processed-VM cache')
  .option('--no-force', 'Use the processed-VM cache')
  .option('--json', JSON_DESC)
  .option('--debug', DEBUG_DESC)
  .action((opts) => scheduleConfigureCommand(configPath(), opts));

program.addCommand(schedule);

program.parse();
