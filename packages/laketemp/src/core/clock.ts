/**
 * Clock capability: reads "now" and schedules one-shot timers.
 *
 * Injected into the rate limiter, fetch client and coordinators so tests can
 * drive time explicitly. The system clock goes through the global timer
 * functions, which Vitest's fake timers replace.
 */

/** Node timer object, or a numeric id from a manual clock */
export type TimerHandle = ReturnType<typeof setTimeout> | number;

export interface Clock {
  /** Epoch milliseconds */
  now(): number;
  setTimeout(callback: () => void, ms: number): TimerHandle;
  clearTimeout(handle: TimerHandle): void;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  setTimeout: (callback, ms) => setTimeout(callback, ms),
  clearTimeout: (handle) => clearTimeout(handle),
};
