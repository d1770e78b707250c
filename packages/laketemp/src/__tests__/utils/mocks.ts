/**
 * Test Mocks
 *
 * Type-safe stand-ins for the logger and fetch. No network access.
 */

import { vi } from 'vitest';
import type { Clock, TimerHandle } from '../../core/clock.js';
import type { Logger, LogLevel, LogMetadata } from '../../core/utils/logger.js';

// ============================================================================
// Time
// ============================================================================

/**
 * Resolve after pending promise callbacks have run
 */
export async function flushAsync(rounds = 3): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}

/**
 * Clock whose time only moves when the test advances it
 */
export class ManualClock implements Clock {
  private current: number;
  private nextId = 1;
  private readonly timers = new Map<number, { readonly at: number; readonly callback: () => void }>();

  constructor(start: Date | number = 0) {
    this.current = typeof start === 'number' ? start : start.getTime();
  }

  now(): number {
    return this.current;
  }

  setTimeout(callback: () => void, ms: number): TimerHandle {
    const id = this.nextId++;
    this.timers.set(id, { at: this.current + Math.max(0, ms), callback });
    return id;
  }

  clearTimeout(handle: TimerHandle): void {
    if (typeof handle === 'number') {
      this.timers.delete(handle);
    }
  }

  get pendingTimers(): number {
    return this.timers.size;
  }

  /**
   * Move time forward, firing due timers in order and letting the work they
   * start settle before the next one
   */
  async advance(ms: number): Promise<void> {
    const target = this.current + ms;
    for (;;) {
      const due = this.nextDue(target);
      if (!due) {
        break;
      }
      this.timers.delete(due.id);
      this.current = due.at;
      due.callback();
      await flushAsync();
    }
    this.current = target;
    await flushAsync();
  }

  private nextDue(target: number): { id: number; at: number; callback: () => void } | undefined {
    let next: { id: number; at: number; callback: () => void } | undefined;
    for (const [id, timer] of this.timers) {
      if (timer.at <= target && (next === undefined || timer.at < next.at)) {
        next = { id, ...timer };
      }
    }
    return next;
  }
}

// ============================================================================
// Logger
// ============================================================================

export interface LogEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly metadata?: LogMetadata;
}

/**
 * Logger that keeps every entry for assertions
 */
export class RecordingLogger implements Logger {
  readonly entries: LogEntry[] = [];

  debug(message: string, metadata?: LogMetadata): void {
    this.entries.push({ level: 'debug', message, metadata });
  }

  info(message: string, metadata?: LogMetadata): void {
    this.entries.push({ level: 'info', message, metadata });
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.entries.push({ level: 'warn', message, metadata });
  }

  error(message: string, metadata?: LogMetadata): void {
    this.entries.push({ level: 'error', message, metadata });
  }

  at(level: LogLevel): LogEntry[] {
    return this.entries.filter((entry) => entry.level === level);
  }

  messages(level: LogLevel): string[] {
    return this.at(level).map((entry) => entry.message);
  }
}

// ============================================================================
// Fetch
// ============================================================================

export type FetchInput = string | URL | Request;

export function urlOf(input: FetchInput): string {
  if (typeof input === 'string') {
    return input;
  }
  return input instanceof URL ? input.href : input.url;
}

export interface StubResponseInit {
  readonly status?: number;
  readonly statusText?: string;
  readonly headers?: Readonly<Record<string, string>>;
}

export function textResponse(body: string, init: StubResponseInit = {}): Response {
  return new Response(body, {
    status: init.status ?? 200,
    statusText: init.statusText,
    headers: { 'content-type': 'text/plain; charset=utf-8', ...init.headers },
  });
}

/**
 * Fetch stub answering from a handler; every call is recorded
 */
export function createFetchStub(handler: (url: string, init?: RequestInit) => Response | Promise<Response>) {
  return vi.fn(async (input: FetchInput, init?: RequestInit): Promise<Response> => handler(urlOf(input), init));
}

/**
 * Fetch that never answers until its signal aborts
 */
export function createHangingFetch() {
  return vi.fn(
    (_input: FetchInput, init?: RequestInit): Promise<Response> =>
      new Promise<Response>((_resolve, reject) => {
        const abort = (): void => {
          const error = new Error('This operation was aborted');
          error.name = 'AbortError';
          reject(error);
        };
        if (init?.signal?.aborted) {
          abort();
          return;
        }
        init?.signal?.addEventListener('abort', abort);
      })
  );
}

/**
 * Fetch whose responses are released by the test
 */
export function createDeferredFetch() {
  const pending: Array<{ url: string; resolve: (response: Response) => void; reject: (error: Error) => void }> = [];
  const fetchImpl = vi.fn(
    (input: FetchInput): Promise<Response> =>
      new Promise<Response>((resolve, reject) => {
        pending.push({ url: urlOf(input), resolve, reject });
      })
  );
  return { fetchImpl, pending };
}
