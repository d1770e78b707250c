/**
 * laketemp Configuration
 *
 * Loads the lake list and shared settings from a YAML (or JSON) file and
 * validates them with zod. File keys are snake_case; the validated model is
 * camelCase.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options (`--config`)
 * 2. Environment variables (LAKETEMP_CONFIG, LAKETEMP_USER_AGENT)
 * 3. Config file values
 * 4. Default values
 *
 * @module config/lake-config
 */

import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import {
  DEFAULT_MAX_CONCURRENT_PER_DOMAIN,
  DEFAULT_MIN_SPACING_MS,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_SCAN_INTERVAL_SECONDS,
  DEFAULT_TIMEOUT_HOURS,
  DEFAULT_USER_AGENT,
  MAX_SCAN_INTERVAL_SECONDS,
  MAX_TIMEOUT_HOURS,
  MIN_SCAN_INTERVAL_SECONDS,
  MIN_TIMEOUT_HOURS,
} from '../core/constants.js';
import { ConfigValidationError, LakeTempError } from '../core/errors.js';
import type { LakeConfig, SourceConfig } from '../core/types.js';
import { SOURCE_TYPES } from '../core/types.js';
import type { RateLimiterConfig } from '../resilience/rate-limiter.js';

export const DEFAULT_CONFIG_FILE = 'laketemp.yaml';

// ============================================================================
// Schemas
// ============================================================================

export const EntityIdSchema = z
  .string()
  .regex(/^[a-z0-9_]{1,64}$/, 'entity_id must use lowercase letters, numbers and underscores only (max 64 chars)');

export const LakeUrlSchema = z
  .string()
  .refine((url) => /^https?:\/\//i.test(url), 'url must start with http:// or https://')
  .refine((url) => !url.includes(' '), 'url must not contain spaces');

const OptionalText = z.string().trim().min(1).optional();

const GkdBayernOptionsSchema = z.object({
  station_id: OptionalText,
  table_selector: OptionalText,
});

const HydroOoeOptionsSchema = z.object({
  station_id: z
    .union([z.string().trim().min(1), z.number().int().nonnegative()], {
      errorMap: () => ({ message: 'station_id must be a string or an integer' }),
    })
    .transform(String)
    .optional(),
});

const SalzburgOgdOptionsSchema = z.object({
  lake_name: OptionalText,
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export const SourceSchema = z.preprocess(
  (value) => (isRecord(value) && value.type === undefined ? { ...value, type: 'gkd_bayern' } : value),
  z.discriminatedUnion(
    'type',
    [
      z.object({ type: z.literal('gkd_bayern'), options: GkdBayernOptionsSchema.default({}) }),
      z.object({ type: z.literal('hydro_ooe'), options: HydroOoeOptionsSchema.default({}) }),
      z.object({ type: z.literal('salzburg_ogd'), options: SalzburgOgdOptionsSchema.default({}) }),
    ],
    {
      errorMap: (issue, ctx) =>
        issue.code === 'invalid_union_discriminator'
          ? { message: `source.type must be one of: ${SOURCE_TYPES.join(', ')}` }
          : { message: ctx.defaultError },
    }
  )
);

export const LakeEntrySchema = z
  .object({
    name: z.string().trim().min(1, 'name must not be empty').max(100, 'name must be at most 100 characters'),
    entity_id: EntityIdSchema,
    url: LakeUrlSchema.optional(),
    scan_interval: z
      .number()
      .int('scan_interval must be whole seconds')
      .min(MIN_SCAN_INTERVAL_SECONDS, `scan_interval must be between ${MIN_SCAN_INTERVAL_SECONDS} and ${MAX_SCAN_INTERVAL_SECONDS} seconds`)
      .max(MAX_SCAN_INTERVAL_SECONDS, `scan_interval must be between ${MIN_SCAN_INTERVAL_SECONDS} and ${MAX_SCAN_INTERVAL_SECONDS} seconds`)
      .default(DEFAULT_SCAN_INTERVAL_SECONDS),
    timeout_hours: z
      .number()
      .int('timeout_hours must be whole hours')
      .min(MIN_TIMEOUT_HOURS, `timeout_hours must be between ${MIN_TIMEOUT_HOURS} and ${MAX_TIMEOUT_HOURS} hours`)
      .max(MAX_TIMEOUT_HOURS, `timeout_hours must be between ${MIN_TIMEOUT_HOURS} and ${MAX_TIMEOUT_HOURS} hours`)
      .default(DEFAULT_TIMEOUT_HOURS),
    user_agent: z.string().min(10, 'user_agent must be at least 10 characters').optional(),
    source: SourceSchema.default({ type: 'gkd_bayern' }),
  })
  .superRefine((lake, ctx) => {
    if (lake.source.type === 'gkd_bayern' && lake.url === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['url'],
        message: 'url is required for gkd_bayern sources',
      });
    }
  });

export type LakeEntry = z.infer<typeof LakeEntrySchema>;

export const RateLimitSchema = z.object({
  max_concurrent: z.number().int().min(1).max(16).default(DEFAULT_MAX_CONCURRENT_PER_DOMAIN),
  min_spacing_ms: z.number().int().min(0).max(60_000).default(DEFAULT_MIN_SPACING_MS),
  jitter_ms: z.number().int().min(0).max(60_000).default(0),
});

export const ConfigFileSchema = z
  .object({
    lakes: z.array(LakeEntrySchema).min(1, 'at least one lake is required'),
    rate_limit: RateLimitSchema.default({}),
    request_timeout_ms: z.number().int().min(1000).max(120_000).default(DEFAULT_REQUEST_TIMEOUT_MS),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.lakes.forEach((lake, index) => {
      if (seen.has(lake.entity_id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['lakes', index, 'entity_id'],
          message: `duplicate entity_id '${lake.entity_id}'`,
        });
      }
      seen.add(lake.entity_id);
    });
  });

// ============================================================================
// Validated model
// ============================================================================

export interface AppConfig {
  readonly lakes: readonly LakeConfig[];
  readonly rateLimit: RateLimiterConfig;
  readonly requestTimeoutMs: number;
  /** File the configuration was read from, if any */
  readonly sourcePath?: string;
}

export interface ParseConfigOptions {
  readonly env?: NodeJS.ProcessEnv;
  /** Label used in error messages */
  readonly source?: string;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message));
}

function toSourceConfig(source: LakeEntry['source']): SourceConfig {
  switch (source.type) {
    case 'gkd_bayern':
      return {
        type: 'gkd_bayern',
        ...(source.options.station_id ? { stationId: source.options.station_id } : {}),
        ...(source.options.table_selector ? { tableSelector: source.options.table_selector } : {}),
      };
    case 'hydro_ooe':
      return {
        type: 'hydro_ooe',
        ...(source.options.station_id ? { stationId: source.options.station_id } : {}),
      };
    case 'salzburg_ogd':
      return {
        type: 'salzburg_ogd',
        ...(source.options.lake_name ? { lakeName: source.options.lake_name } : {}),
      };
  }
}

function defaultUserAgent(env: NodeJS.ProcessEnv): string {
  const override = env.LAKETEMP_USER_AGENT?.trim();
  return override && override.length >= 10 ? override : DEFAULT_USER_AGENT;
}

export function toLakeConfig(entry: LakeEntry, env: NodeJS.ProcessEnv = process.env): LakeConfig {
  return {
    name: entry.name,
    entityId: entry.entity_id,
    ...(entry.url !== undefined ? { url: entry.url } : {}),
    scanInterval: entry.scan_interval,
    timeoutHours: entry.timeout_hours,
    userAgent: entry.user_agent ?? defaultUserAgent(env),
    source: toSourceConfig(entry.source),
  };
}

/**
 * Validate a single lake entry (snake_case keys)
 *
 * @throws ConfigValidationError
 */
export function parseLakeConfig(raw: unknown, options: ParseConfigOptions = {}): LakeConfig {
  const result = LakeEntrySchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigValidationError(formatIssues(result.error), options.source);
  }
  return toLakeConfig(result.data, options.env);
}

/**
 * Validate a parsed configuration document
 *
 * @throws ConfigValidationError listing every issue with its path
 */
export function parseAppConfig(raw: unknown, options: ParseConfigOptions = {}): AppConfig {
  const result = ConfigFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigValidationError(formatIssues(result.error), options.source);
  }
  const env = options.env ?? process.env;
  const { lakes, rate_limit, request_timeout_ms } = result.data;
  return {
    lakes: lakes.map((entry) => toLakeConfig(entry, env)),
    rateLimit: {
      maxConcurrent: rate_limit.max_concurrent,
      minSpacingMs: rate_limit.min_spacing_ms,
      jitterMs: rate_limit.jitter_ms,
    },
    requestTimeoutMs: request_timeout_ms,
    ...(options.source !== undefined ? { sourcePath: options.source } : {}),
  };
}

/**
 * Config file path: explicit option, then LAKETEMP_CONFIG, then ./laketemp.yaml
 */
export function resolveConfigPath(explicit?: string, env: NodeJS.ProcessEnv = process.env): string {
  return resolve(explicit ?? env.LAKETEMP_CONFIG ?? DEFAULT_CONFIG_FILE);
}

/**
 * Read and validate a YAML or JSON configuration file
 *
 * @throws LakeTempError when the file is missing
 * @throws ConfigValidationError when it cannot be parsed or fails validation
 */
export function loadConfigFile(path: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fullPath = resolve(path);
  if (!existsSync(fullPath)) {
    throw new LakeTempError('CONFIG_NOT_FOUND', `Config file not found: ${fullPath}`);
  }

  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(fullPath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigValidationError([`could not parse file: ${message}`], fullPath);
  }

  return parseAppConfig(raw, { env, source: fullPath });
}
