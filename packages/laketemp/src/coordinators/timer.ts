/**
 * Fixed-delay scheduler
 *
 * The next tick is armed only after the previous one settles, so ticks of
 * one coordinator never overlap and missed ticks are not caught up.
 */

import type { Clock, TimerHandle } from '../core/clock.js';
import { toError } from '../core/errors.js';
import type { Logger } from '../core/utils/logger.js';

export class FixedDelayTimer {
  private readonly task: () => Promise<void>;
  private readonly delayMs: () => number;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private handle?: TimerHandle;
  private inFlight?: Promise<void>;
  private active = false;
  /** Delay requested by a start() that arrived while a tick was running */
  private restartDelayMs?: number;

  /**
   * @param delayMs - evaluated each time the timer is armed
   */
  constructor(task: () => Promise<void>, delayMs: () => number, clock: Clock, logger: Logger) {
    this.task = task;
    this.delayMs = delayMs;
    this.clock = clock;
    this.logger = logger;
  }

  get isActive(): boolean {
    return this.active;
  }

  get isRunning(): boolean {
    return this.inFlight !== undefined;
  }

  /**
   * Arm the timer; the first tick fires after `initialDelayMs`
   */
  start(initialDelayMs = 0): void {
    if (this.active) {
      return;
    }
    this.active = true;
    if (this.inFlight) {
      this.restartDelayMs = initialDelayMs;
    } else {
      this.arm(initialDelayMs);
    }
  }

  /**
   * Run a tick now, or join the one already running.
   * The next scheduled tick is re-armed from the end of this one.
   */
  runNow(): Promise<void> {
    if (this.inFlight) {
      return this.inFlight;
    }
    this.clearPending();

    const run = async (): Promise<void> => {
      try {
        // Deferred so inFlight is assigned before the task can settle
        await Promise.resolve().then(() => this.task());
      } catch (error) {
        this.logger.error('Scheduled task failed', { error: toError(error).message });
      } finally {
        this.inFlight = undefined;
        const restartDelayMs = this.restartDelayMs;
        this.restartDelayMs = undefined;
        if (this.active) {
          this.arm(restartDelayMs ?? this.delayMs());
        }
      }
    };

    this.inFlight = run();
    return this.inFlight;
  }

  /**
   * Re-arm a waiting timer with the current delay, counted from now
   */
  rearm(): void {
    if (this.active && !this.inFlight) {
      this.arm(this.delayMs());
    }
  }

  /**
   * Disarm; a tick already running completes but schedules nothing
   */
  stop(): void {
    this.active = false;
    this.restartDelayMs = undefined;
    this.clearPending();
  }

  private arm(ms: number): void {
    this.clearPending();
    this.handle = this.clock.setTimeout(() => {
      this.handle = undefined;
      void this.runNow();
    }, Math.max(0, ms));
  }

  private clearPending(): void {
    if (this.handle !== undefined) {
      this.clock.clearTimeout(this.handle);
      this.handle = undefined;
    }
  }
}
