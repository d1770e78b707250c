/**
 * Command implementations behind the `laketemp` binary
 *
 * Commands take their collaborators as arguments so tests can run them
 * against a stub fetch and capture output.
 *
 * @module cli/commands
 */

import type { AppConfig } from '../config/lake-config.js';
import { loadConfigFile, resolveConfigPath } from '../config/lake-config.js';
import { CoordinatorRegistry } from '../coordinators/registry.js';
import type { Clock } from '../core/clock.js';
import { ConfigValidationError, LakeTempError } from '../core/errors.js';
import type { Logger } from '../core/utils/logger.js';
import { formatStatus, formatStatusTable } from './output.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  ERRORS: 1,
  NO_FRESH_DATA: 2,
  CONFIG_ERROR: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export interface CommandContext {
  readonly env?: NodeJS.ProcessEnv;
  readonly fetchImpl?: typeof fetch;
  readonly clock?: Clock;
  readonly logger?: Logger;
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
}

export interface ConfigOption {
  readonly config?: string;
}

function loadConfig(options: ConfigOption, ctx: CommandContext): AppConfig {
  const env = ctx.env ?? process.env;
  return loadConfigFile(resolveConfigPath(options.config, env), env);
}

function buildRegistry(config: AppConfig, ctx: CommandContext): CoordinatorRegistry {
  return CoordinatorRegistry.fromConfigs(config.lakes, {
    rateLimit: config.rateLimit,
    requestTimeoutMs: config.requestTimeoutMs,
    fetchImpl: ctx.fetchImpl,
    clock: ctx.clock,
    logger: ctx.logger,
  });
}

function reportConfigError(error: unknown, ctx: CommandContext): ExitCode {
  if (error instanceof ConfigValidationError || error instanceof LakeTempError) {
    ctx.stderr(error.message);
    return EXIT_CODES.CONFIG_ERROR;
  }
  throw error;
}

/**
 * `laketemp validate`: load and validate the configuration only
 */
export function validateCommand(options: ConfigOption, ctx: CommandContext): ExitCode {
  let config: AppConfig;
  try {
    config = loadConfig(options, ctx);
  } catch (error) {
    return reportConfigError(error, ctx);
  }

  const bySource = new Map<string, number>();
  for (const lake of config.lakes) {
    bySource.set(lake.source.type, (bySource.get(lake.source.type) ?? 0) + 1);
  }
  const breakdown = [...bySource.entries()].map(([type, count]) => `${type}: ${count}`).join(', ');
  ctx.stdout(`Configuration OK: ${config.lakes.length} lake(s) (${breakdown})`);
  return EXIT_CODES.SUCCESS;
}

/**
 * `laketemp once`: refresh every coordinator once and print the result.
 * Exits with NO_FRESH_DATA when no lake has a fresh reading.
 */
export async function onceCommand(options: ConfigOption & { readonly json?: boolean }, ctx: CommandContext): Promise<ExitCode> {
  let registry: CoordinatorRegistry;
  try {
    registry = buildRegistry(loadConfig(options, ctx), ctx);
  } catch (error) {
    return reportConfigError(error, ctx);
  }

  try {
    await registry.refreshAll();
    const reports = registry.getStatusReports();
    ctx.stdout(formatStatus(reports, options.json ? 'json' : 'table'));
    return reports.some((report) => report.state.status === 'fresh') ? EXIT_CODES.SUCCESS : EXIT_CODES.NO_FRESH_DATA;
  } finally {
    registry.stop();
  }
}

export interface RunningService {
  readonly registry: CoordinatorRegistry;
  /** Stop reporting and shut the registry down */
  stop(): void;
}

/**
 * `laketemp run`: start the registry and print a status table every
 * `reportIntervalSeconds` until stopped
 */
export function runCommand(
  options: ConfigOption & { readonly reportIntervalSeconds: number },
  ctx: CommandContext
): RunningService | ExitCode {
  let registry: CoordinatorRegistry;
  try {
    registry = buildRegistry(loadConfig(options, ctx), ctx);
  } catch (error) {
    return reportConfigError(error, ctx);
  }

  registry.start();
  const reporter = setInterval(() => {
    ctx.stdout(formatStatusTable(registry.getStatusReports()));
  }, Math.max(1, options.reportIntervalSeconds) * 1000);

  return {
    registry,
    stop: (): void => {
      clearInterval(reporter);
      registry.stop();
    },
  };
}
