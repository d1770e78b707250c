/**
 * Fixed-Delay Timer Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { FixedDelayTimer } from '../../../coordinators/timer.js';
import { ManualClock, RecordingLogger } from '../../utils/mocks.js';

describe('FixedDelayTimer', () => {
  let clock: ManualClock;
  let logger: RecordingLogger;
  let delayMs: number;

  beforeEach(() => {
    clock = new ManualClock(0);
    logger = new RecordingLogger();
    delayMs = 1000;
  });

  function createTimer(task: () => Promise<void>): FixedDelayTimer {
    return new FixedDelayTimer(task, () => delayMs, clock, logger);
  }

  it('should run the first tick after the initial delay and then every delayMs', async () => {
    const task = vi.fn(async () => undefined);
    const timer = createTimer(task);
    timer.start(0);

    await clock.advance(0);
    expect(task).toHaveBeenCalledTimes(1);

    await clock.advance(999);
    expect(task).toHaveBeenCalledTimes(1);

    await clock.advance(1);
    expect(task).toHaveBeenCalledTimes(2);
    timer.stop();
  });

  it('should join a tick already running', async () => {
    let finish: () => void = () => undefined;
    const task = vi.fn(
      () =>
        new Promise<void>((resolve) => {
          finish = resolve;
        })
    );
    const timer = createTimer(task);

    const first = timer.runNow();
    const second = timer.runNow();
    expect(second).toBe(first);
    expect(timer.isRunning).toBe(true);

    await clock.advance(0);
    finish();
    await first;

    expect(task).toHaveBeenCalledTimes(1);
    expect(timer.isRunning).toBe(false);
  });

  it('should log a failed tick and keep the schedule', async () => {
    const task = vi.fn(async () => {
      throw new Error('boom');
    });
    const timer = createTimer(task);
    timer.start(0);

    await clock.advance(1000);

    expect(task).toHaveBeenCalledTimes(2);
    expect(logger.at('error')).toEqual([
      { level: 'error', message: 'Scheduled task failed', metadata: { error: 'boom' } },
      { level: 'error', message: 'Scheduled task failed', metadata: { error: 'boom' } },
    ]);
    timer.stop();
  });

  it('should not re-arm after stop', async () => {
    const task = vi.fn(async () => undefined);
    const timer = createTimer(task);
    timer.start(500);
    timer.stop();

    await clock.advance(10_000);

    expect(task).not.toHaveBeenCalled();
    expect(timer.isActive).toBe(false);
    expect(clock.pendingTimers).toBe(0);
  });

  it('should re-arm with the current delay counted from now', async () => {
    const task = vi.fn(async () => undefined);
    const timer = createTimer(task);
    timer.start(1000);

    await clock.advance(400);
    delayMs = 200;
    timer.rearm();

    await clock.advance(199);
    expect(task).not.toHaveBeenCalled();
    await clock.advance(1);
    expect(task).toHaveBeenCalledTimes(1);
    timer.stop();
  });

  it('should tick right after the running one when restarted mid-tick', async () => {
    let finish: () => void = () => undefined;
    const task = vi.fn(
      () =>
        new Promise<void>((resolve) => {
          finish = resolve;
        })
    );
    const timer = createTimer(task);
    timer.start(0);
    await clock.advance(0);
    expect(task).toHaveBeenCalledTimes(1);

    timer.stop();
    timer.start(0);
    finish();
    await clock.advance(0);
    await clock.advance(0);

    expect(task).toHaveBeenCalledTimes(2);
    timer.stop();
  });

  it('should not schedule when runNow is used on an inactive timer', async () => {
    const task = vi.fn(async () => undefined);
    const timer = createTimer(task);

    await timer.runNow();

    expect(task).toHaveBeenCalledTimes(1);
    expect(clock.pendingTimers).toBe(0);
  });
});
