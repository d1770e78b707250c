/**
 * Rate-limited HTTP GET client
 *
 * One instance per coordinator. The User-Agent and Accept headers are fixed
 * at construction. Every request holds a rate limiter permit for its domain
 * from before the request until the body has been read.
 *
 * No retries happen here: a failed GET surfaces as a FetchError and the
 * owning coordinator decides when to try again.
 *
 * Connection reuse comes from the keep-alive agent behind Node's global
 * fetch.
 */

import type { Clock } from '../core/clock.js';
import { systemClock } from '../core/clock.js';
import { DEFAULT_REQUEST_TIMEOUT_MS } from '../core/constants.js';
import { FetchError, toError } from '../core/errors.js';
import type { Logger } from '../core/utils/logger.js';
import { createLogger } from '../core/utils/logger.js';
import type { DomainRateLimiter, Permit } from '../resilience/rate-limiter.js';
import { PermitAbortedError } from '../resilience/rate-limiter.js';

export interface FetchClientConfig {
  readonly userAgent: string;
  /** Accept header (default: any) */
  readonly accept?: string;
  /** Per-request timeout covering headers and body (default: 20000) */
  readonly timeoutMs?: number;
}

export interface FetchClientDeps {
  readonly rateLimiter: DomainRateLimiter;
  readonly fetchImpl?: typeof fetch;
  readonly clock?: Clock;
  readonly logger?: Logger;
}

export interface FetchResult {
  readonly bytes: Uint8Array;
  readonly status: number;
  readonly byteLength: number;
  readonly contentType?: string;
  /** Final URL after redirects */
  readonly url: string;
}

/**
 * Parse a Retry-After header: delta seconds or an HTTP date
 */
export function parseRetryAfter(value: string | null | undefined, nowMs: number): number | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number.parseInt(trimmed, 10);
  }
  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) {
    return undefined;
  }
  return Math.max(0, Math.ceil((date - nowMs) / 1000));
}

export class FetchClient {
  private readonly userAgent: string;
  private readonly accept: string;
  private readonly timeoutMs: number;
  private readonly rateLimiter: DomainRateLimiter;
  private readonly fetchImpl: typeof fetch;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly inFlight = new Set<AbortController>();
  private closed = false;

  constructor(config: FetchClientConfig, deps: FetchClientDeps) {
    this.userAgent = config.userAgent;
    this.accept = config.accept ?? '*/*';
    this.timeoutMs = config.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.rateLimiter = deps.rateLimiter;
    this.fetchImpl = deps.fetchImpl ?? globalThis.fetch;
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? createLogger({ module: 'fetch-client' });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * GET `url` and read the whole body
   *
   * @throws FetchError on non-2xx status, network failure, timeout or abort
   */
  async fetch(url: string, signal?: AbortSignal): Promise<FetchResult> {
    if (this.closed) {
      throw new FetchError('aborted', url, 'client closed');
    }

    const controller = new AbortController();
    const onExternalAbort = (): void => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener('abort', onExternalAbort, { once: true });
    }
    this.inFlight.add(controller);

    let permit: Permit | undefined;
    let timedOut = false;
    let timeoutHandle: ReturnType<Clock['setTimeout']> | undefined;

    try {
      permit = await this.rateLimiter.acquire(url, controller.signal);

      timeoutHandle = this.clock.setTimeout(() => {
        timedOut = true;
        controller.abort();
      }, this.timeoutMs);

      const response = await this.fetchImpl(url, {
        method: 'GET',
        headers: {
          'User-Agent': this.userAgent,
          Accept: this.accept,
        },
        redirect: 'follow',
        signal: controller.signal,
      });

      if (!response.ok) {
        const retryAfterSeconds = parseRetryAfter(response.headers.get('retry-after'), this.clock.now());
        response.body?.cancel().catch((error: unknown) => {
          this.logger.debug('Discarding error body failed', { url, error: toError(error).message });
        });
        throw new FetchError('http_status', url, `HTTP ${response.status} ${response.statusText}`.trim(), {
          status: response.status,
          retryAfterSeconds,
        });
      }

      const bytes = new Uint8Array(await response.arrayBuffer());
      const contentType = response.headers.get('content-type') ?? undefined;

      this.logger.debug('Fetched', { url, status: response.status, bytes: bytes.byteLength });

      return {
        bytes,
        status: response.status,
        byteLength: bytes.byteLength,
        contentType,
        url: response.url || url,
      };
    } catch (error) {
      if (error instanceof FetchError) {
        throw error;
      }
      if (error instanceof PermitAbortedError) {
        throw new FetchError('aborted', url, 'aborted while waiting for rate limiter', { cause: error });
      }
      if (timedOut) {
        throw new FetchError('timeout', url, `no response within ${this.timeoutMs}ms`, { cause: error });
      }
      if (controller.signal.aborted) {
        throw new FetchError('aborted', url, 'request aborted', { cause: error });
      }
      throw new FetchError('network', url, toError(error).message, { cause: error });
    } finally {
      if (timeoutHandle !== undefined) {
        this.clock.clearTimeout(timeoutHandle);
      }
      permit?.release();
      signal?.removeEventListener('abort', onExternalAbort);
      this.inFlight.delete(controller);
    }
  }

  /**
   * Abort in-flight requests; later calls fail with kind `aborted`
   */
  close(): void {
    this.closed = true;
    for (const controller of this.inFlight) {
      controller.abort();
    }
    this.inFlight.clear();
  }
}
