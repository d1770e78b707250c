#!/usr/bin/env tsx
/**
 * laketemp CLI Entry Point
 *
 * Runs the lake temperature acquisition core from a configuration file.
 *
 * @module laketemp-cli
 */

import 'dotenv/config';
import { Command, InvalidArgumentError } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { EXIT_CODES, onceCommand, runCommand, validateCommand } from '../src/cli/commands.js';
import type { CommandContext } from '../src/cli/commands.js';
import { logger } from '../src/core/utils/logger.js';

function getVersion(): string {
  const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '..', 'package.json');
  try {
    const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
      return parsed.version;
    }
  } catch (error) {
    logger.debug('Could not read package version', { error: error instanceof Error ? error.message : String(error) });
  }
  return '0.0.0';
}

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

const context: CommandContext = {
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
};

function createProgram(): Command {
  const program = new Command();

  program
    .name('laketemp')
    .description('Lake water temperature acquisition from public hydrology portals')
    .version(getVersion(), '-V, --version', 'Output the version number');

  program
    .command('run')
    .description('Start all coordinators and print lake states periodically')
    .option('-c, --config <path>', 'Config file (default: $LAKETEMP_CONFIG or ./laketemp.yaml)')
    .option('--report-interval <seconds>', 'Seconds between status tables', parsePositiveInt, 300)
    .action((options: { config?: string; reportInterval: number }) => {
      const service = runCommand({ config: options.config, reportIntervalSeconds: options.reportInterval }, context);
      if (typeof service === 'number') {
        process.exit(service);
      }

      const shutdown = (signal: string): void => {
        logger.info('Shutting down', { signal });
        service.stop();
        process.exit(EXIT_CODES.SUCCESS);
      };
      process.once('SIGINT', () => shutdown('SIGINT'));
      process.once('SIGTERM', () => shutdown('SIGTERM'));
    });

  program
    .command('once')
    .description('Refresh every lake once, print the result and exit')
    .option('-c, --config <path>', 'Config file (default: $LAKETEMP_CONFIG or ./laketemp.yaml)')
    .option('--json', 'Output as JSON')
    .action(async (options: { config?: string; json?: boolean }) => {
      process.exitCode = await onceCommand(options, context);
    });

  program
    .command('validate')
    .description('Validate the configuration file')
    .option('-c, --config <path>', 'Config file (default: $LAKETEMP_CONFIG or ./laketemp.yaml)')
    .action((options: { config?: string }) => {
      process.exitCode = validateCommand(options, context);
    });

  return program;
}

async function main(): Promise<void> {
  try {
    await createProgram().parseAsync(process.argv);
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(EXIT_CODES.ERRORS);
  }
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.ERRORS);
});
