/**
 * Wall-clock time to instant conversion
 *
 * Upstream publishers print local times without offsets. These helpers
 * resolve them in an IANA zone through Intl, which covers DST transitions
 * without a timezone database dependency.
 *
 * @module zoned-time
 */

export interface WallTime {
  readonly year: number;
  /** 1-12 */
  readonly month: number;
  readonly day: number;
  readonly hour: number;
  readonly minute: number;
  readonly second?: number;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

/**
 * Offset of `timeZone` from UTC at the given instant, in milliseconds
 */
export function zoneOffsetMs(epochMs: number, timeZone: string): number {
  const fields: Record<string, number> = {};
  for (const part of formatterFor(timeZone).formatToParts(new Date(epochMs))) {
    if (part.type !== 'literal') {
      fields[part.type] = Number(part.value);
    }
  }
  const asUtc = Date.UTC(
    fields.year ?? 1970,
    (fields.month ?? 1) - 1,
    fields.day ?? 1,
    fields.hour ?? 0,
    fields.minute ?? 0,
    fields.second ?? 0
  );
  const truncated = Math.floor(epochMs / 1000) * 1000;
  return asUtc - truncated;
}

/**
 * Check that the fields describe a real calendar date and clock time
 */
export function isValidWallTime(wall: WallTime): boolean {
  const second = wall.second ?? 0;
  if (wall.month < 1 || wall.month > 12 || wall.day < 1 || wall.hour > 23 || wall.minute > 59 || second > 59) {
    return false;
  }
  if (wall.hour < 0 || wall.minute < 0 || second < 0) {
    return false;
  }
  const calendar = new Date(Date.UTC(wall.year, wall.month - 1, wall.day));
  return calendar.getUTCFullYear() === wall.year && calendar.getUTCMonth() === wall.month - 1 && calendar.getUTCDate() === wall.day;
}

/**
 * Resolve a wall time in an IANA zone. A wall time inside a spring-forward
 * gap resolves one hour early; an ambiguous fall-back time resolves to its
 * later (standard time) occurrence.
 *
 * @returns undefined when the wall time is not a valid calendar time
 */
export function wallTimeToInstant(wall: WallTime, timeZone: string): Date | undefined {
  if (!isValidWallTime(wall)) {
    return undefined;
  }
  const guess = Date.UTC(wall.year, wall.month - 1, wall.day, wall.hour, wall.minute, wall.second ?? 0);
  const firstOffset = zoneOffsetMs(guess, timeZone);
  const candidate = guess - firstOffset;
  const secondOffset = zoneOffsetMs(candidate, timeZone);
  if (secondOffset === firstOffset) {
    return new Date(candidate);
  }
  const adjusted = guess - secondOffset;
  return zoneOffsetMs(adjusted, timeZone) === secondOffset ? new Date(adjusted) : new Date(candidate);
}

/**
 * Resolve a wall time at a fixed UTC offset (e.g. ZRXP `#TZUTC+1`)
 */
export function wallTimeAtOffset(wall: WallTime, offsetMinutes: number): Date | undefined {
  if (!isValidWallTime(wall)) {
    return undefined;
  }
  const asUtc = Date.UTC(wall.year, wall.month - 1, wall.day, wall.hour, wall.minute, wall.second ?? 0);
  return new Date(asUtc - offsetMinutes * 60_000);
}
