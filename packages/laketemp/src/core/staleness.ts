/**
 * Staleness evaluation
 *
 * Pure functions; coordinators call them on every tick and the registry on
 * every read, so a reading ages out even while refreshes keep failing.
 */

import type { LakeState, TemperatureReading } from './types.js';

export const MS_PER_HOUR = 60 * 60 * 1000;

/**
 * Outcome of the most recent refresh, independent of reading age
 */
export interface RefreshHealth {
  readonly lastUpdateSuccess: boolean;
  readonly lastError?: string;
}

/**
 * True iff the reading is strictly older than `timeoutHours`.
 * A reading exactly `timeoutHours` old is still fresh.
 */
export function isStale(observedAt: Date, now: Date, timeoutHours: number): boolean {
  return now.getTime() - observedAt.getTime() > timeoutHours * MS_PER_HOUR;
}

export function deriveLakeState(
  reading: TemperatureReading | undefined,
  now: Date,
  timeoutHours: number,
  health: RefreshHealth
): LakeState {
  const base = {
    lastUpdateSuccess: health.lastUpdateSuccess,
    checkedAt: now,
    ...(health.lastError !== undefined ? { lastError: health.lastError } : {}),
  };

  if (reading === undefined) {
    return { ...base, status: 'error' };
  }

  if (isStale(reading.observedAt, now, timeoutHours)) {
    return { ...base, reading, status: 'stale' };
  }

  return { ...base, reading, status: 'fresh', value: reading.value };
}
