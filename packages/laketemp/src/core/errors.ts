/**
 * laketemp Error Types
 *
 * Fetch and parse failures are caught at the coordinator boundary and logged;
 * they never reach the scheduler. Configuration and lookup errors surface to
 * the caller.
 */

import type { SourceType } from './types.js';

/**
 * Base class carrying a stable machine-readable code
 */
export class LakeTempError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'LakeTempError';
    this.code = code;
  }
}

export type FetchErrorKind = 'http_status' | 'network' | 'timeout' | 'aborted';

/**
 * Network failure, timeout, non-2xx status or cancellation of one GET
 */
export class FetchError extends LakeTempError {
  readonly kind: FetchErrorKind;
  readonly url: string;
  readonly detail: string;
  readonly status?: number;
  /** Parsed Retry-After header of a 429/503 response */
  readonly retryAfterSeconds?: number;

  constructor(
    kind: FetchErrorKind,
    url: string,
    detail: string,
    options: { readonly status?: number; readonly retryAfterSeconds?: number; readonly cause?: unknown } = {}
  ) {
    super('FETCH_ERROR', `Fetch ${kind} for ${url}: ${detail}`);
    this.name = 'FetchError';
    this.kind = kind;
    this.url = url;
    this.detail = detail;
    this.status = options.status;
    this.retryAfterSeconds = options.retryAfterSeconds;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * Structurally invalid upstream payload
 */
export class ParseError extends LakeTempError {
  readonly format: SourceType;
  readonly detail: string;

  constructor(format: SourceType, detail: string) {
    super('PARSE_ERROR', `${format} payload could not be parsed: ${detail}`);
    this.name = 'ParseError';
    this.format = format;
    this.detail = detail;
  }
}

/**
 * Configuration rejected by schema validation
 */
export class ConfigValidationError extends LakeTempError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[], source?: string) {
    const where = source ? ` in ${source}` : '';
    super('CONFIG_INVALID', `Invalid configuration${where}:\n  - ${issues.join('\n  - ')}`);
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}

export class UnknownLakeError extends LakeTempError {
  readonly entityId: string;

  constructor(entityId: string) {
    super('UNKNOWN_LAKE', `No lake registered with entity_id '${entityId}'`);
    this.name = 'UnknownLakeError';
    this.entityId = entityId;
  }
}

/**
 * Normalize an unknown thrown value
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
