/**
 * Per-Domain Rate Limiter
 *
 * Client-side politeness for upstream portals. Each domain gets its own
 * semaphore plus a minimum spacing between grants.
 *
 * ALGORITHM:
 * - A permit is granted when fewer than maxConcurrent are outstanding for
 *   the domain AND minSpacingMs (+ optional jitter) has elapsed since the
 *   previous grant for that domain
 * - Waiters are served FIFO per domain
 * - Aborted waiters leave the queue without consuming a slot
 * - Releasing a permit twice is a no-op
 *
 * One instance is shared by every coordinator the registry builds.
 */

import type { Clock, TimerHandle } from '../core/clock.js';
import { systemClock } from '../core/clock.js';
import { DEFAULT_MAX_CONCURRENT_PER_DOMAIN, DEFAULT_MIN_SPACING_MS } from '../core/constants.js';
import { LakeTempError } from '../core/errors.js';
import type { Logger } from '../core/utils/logger.js';
import { createLogger } from '../core/utils/logger.js';

export interface RateLimiterConfig {
  /** Outstanding permits allowed per domain */
  readonly maxConcurrent: number;
  /** Minimum time between two grants for the same domain */
  readonly minSpacingMs: number;
  /** Upper bound of random extra spacing added per grant */
  readonly jitterMs: number;
}

export interface RateLimiterDeps {
  readonly clock?: Clock;
  readonly logger?: Logger;
  /** Uniform [0, 1) source for jitter */
  readonly random?: () => number;
}

export interface DomainStats {
  readonly domain: string;
  readonly active: number;
  readonly queued: number;
}

/**
 * Held while a request is in flight
 */
export interface Permit {
  readonly domain: string;
  release(): void;
}

/**
 * Thrown to a waiter whose signal aborted before a permit was granted
 */
export class PermitAbortedError extends LakeTempError {
  readonly domain: string;

  constructor(domain: string) {
    super('PERMIT_ABORTED', `Waiting for a permit for '${domain}' was aborted`);
    this.name = 'PermitAbortedError';
    this.domain = domain;
  }
}

export const DEFAULT_RATE_LIMITER_CONFIG: RateLimiterConfig = {
  maxConcurrent: DEFAULT_MAX_CONCURRENT_PER_DOMAIN,
  minSpacingMs: DEFAULT_MIN_SPACING_MS,
  jitterMs: 0,
};

/**
 * Lower-cased host name of a URL (port excluded), or the trimmed lower-cased input when it is not one
 */
export function domainOf(target: string): string {
  try {
    return new URL(target).hostname.toLowerCase();
  } catch {
    return target.trim().toLowerCase();
  }
}

interface Waiter {
  readonly resolve: (permit: Permit) => void;
  readonly reject: (error: Error) => void;
  readonly signal?: AbortSignal;
  onAbort?: () => void;
}

interface DomainState {
  active: number;
  /** Epoch ms before which no further grant may happen */
  nextGrantAt: number;
  readonly queue: Waiter[];
  timer?: TimerHandle;
}

export class DomainRateLimiter {
  private readonly config: RateLimiterConfig;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly random: () => number;
  private readonly domains = new Map<string, DomainState>();

  constructor(config: Partial<RateLimiterConfig> = {}, deps: RateLimiterDeps = {}) {
    this.config = { ...DEFAULT_RATE_LIMITER_CONFIG, ...config };
    if (!Number.isInteger(this.config.maxConcurrent) || this.config.maxConcurrent < 1) {
      throw new RangeError(`maxConcurrent must be a positive integer, got ${this.config.maxConcurrent}`);
    }
    if (this.config.minSpacingMs < 0 || this.config.jitterMs < 0) {
      throw new RangeError('minSpacingMs and jitterMs must not be negative');
    }
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? createLogger({ module: 'rate-limiter' });
    this.random = deps.random ?? Math.random;
  }

  /**
   * Wait for a permit for the domain of `target` (a URL or a bare domain)
   *
   * @throws PermitAbortedError when `signal` aborts before the grant
   */
  acquire(target: string, signal?: AbortSignal): Promise<Permit> {
    const domain = domainOf(target);
    if (signal?.aborted) {
      return Promise.reject(new PermitAbortedError(domain));
    }

    const state = this.stateFor(domain);

    return new Promise<Permit>((resolve, reject) => {
      const waiter: Waiter = { resolve, reject, signal };

      if (signal) {
        waiter.onAbort = (): void => {
          const index = state.queue.indexOf(waiter);
          if (index !== -1) {
            state.queue.splice(index, 1);
            reject(new PermitAbortedError(domain));
            this.pump(domain, state);
          }
        };
        signal.addEventListener('abort', waiter.onAbort, { once: true });
      }

      state.queue.push(waiter);
      if (state.queue.length > 1 || state.active >= this.config.maxConcurrent) {
        this.logger.debug('Waiting for permit', {
          domain,
          active: state.active,
          queued: state.queue.length,
        });
      }
      this.pump(domain, state);
    });
  }

  /**
   * Run `fn` while holding a permit; the permit is released on every exit path
   */
  async withPermit<T>(target: string, fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const permit = await this.acquire(target, signal);
    try {
      return await fn();
    } finally {
      permit.release();
    }
  }

  getStats(target: string): DomainStats {
    const domain = domainOf(target);
    const state = this.domains.get(domain);
    return {
      domain,
      active: state?.active ?? 0,
      queued: state?.queue.length ?? 0,
    };
  }

  private stateFor(domain: string): DomainState {
    let state = this.domains.get(domain);
    if (!state) {
      state = { active: 0, nextGrantAt: Number.NEGATIVE_INFINITY, queue: [] };
      this.domains.set(domain, state);
    }
    return state;
  }

  private pump(domain: string, state: DomainState): void {
    while (state.queue.length > 0 && state.active < this.config.maxConcurrent) {
      const now = this.clock.now();
      const waitMs = state.nextGrantAt - now;

      if (waitMs > 0) {
        if (state.timer === undefined) {
          state.timer = this.clock.setTimeout(() => {
            state.timer = undefined;
            this.pump(domain, state);
          }, waitMs);
        }
        return;
      }

      const waiter = state.queue.shift();
      if (!waiter) {
        return;
      }
      if (waiter.signal && waiter.onAbort) {
        waiter.signal.removeEventListener('abort', waiter.onAbort);
      }

      state.active++;
      state.nextGrantAt = now + this.config.minSpacingMs + this.random() * this.config.jitterMs;
      waiter.resolve(this.createPermit(domain, state));
    }
  }

  private createPermit(domain: string, state: DomainState): Permit {
    let released = false;
    return {
      domain,
      release: (): void => {
        if (released) {
          return;
        }
        released = true;
        state.active--;
        this.pump(domain, state);
      },
    };
  }
}

/**
 * Factory for the limiter shared by one registry
 */
export function createDomainRateLimiter(
  config: Partial<RateLimiterConfig> = {},
  deps: RateLimiterDeps = {}
): DomainRateLimiter {
  return new DomainRateLimiter(config, deps);
}
