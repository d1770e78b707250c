/**
 * Salzburg OGD "Hydrografie Seen" parser
 *
 * Semicolon-separated text with a header row. Column names and order vary
 * between exports, so columns are located by tolerant header matching.
 * Two layouts are understood:
 *
 * - a temperature column per row
 * - PARAMETER + MESSWERT columns, where only water temperature parameters count
 *
 * Wall times are local to Europe/Vienna unless the text carries an offset.
 */

import { SALZBURG_OGD_TIME_ZONE } from '../core/constants.js';
import { ParseError } from '../core/errors.js';
import type { TemperatureReading } from '../core/types.js';
import type { WallTime } from '../core/utils/zoned-time.js';
import { wallTimeAtOffset, wallTimeToInstant } from '../core/utils/zoned-time.js';
import { decodePayload, parseTemperatureCell } from './text.js';
import type { ParsePayload } from './types.js';

// ============================================================================
// Lake name normalization
// ============================================================================

const LAKE_ALIASES: Readonly<Record<string, string>> = {
  abersee: 'wolfgang',
  zellamsee: 'zeller',
  zellam: 'zeller',
  zell: 'zeller',
  zellsee: 'zeller',
};

const LAKE_STEMS: ReadonlyArray<readonly [string, string]> = [
  ['obertrumersee', 'obertrumer'],
  ['untertrumersee', 'untertrumer'],
  ['mattsee', 'matt'],
  ['grabensee', 'graben'],
  ['wolfgangsee', 'wolfgang'],
  ['zellersee', 'zeller'],
  ['wallersee', 'waller'],
  ['fuschlsee', 'fuschl'],
  ['mondsee', 'mond'],
  ['attersee', 'atter'],
];

function stripDiacritics(text: string): string {
  return text.normalize('NFKD').replace(/\p{M}/gu, '');
}

/**
 * Stable matching key for a lake name, e.g. "Zeller See", "Zell am See" and
 * "Zellersee" all map to `zeller`
 */
export function normalizeLakeKey(name: string): string {
  let base = stripDiacritics(name).toLowerCase().trim();
  base = base.replace('zeller see', 'zellersee').replace('obertrumer see', 'obertrumersee');
  base = base.replace(/\bsee\b/g, '');
  base = base.replace(/[^a-z0-9]+/g, '');

  base = LAKE_ALIASES[base] ?? base;

  for (const [pattern, stem] of LAKE_STEMS) {
    if (base.includes(pattern)) {
      return stem;
    }
  }
  return base;
}

// ============================================================================
// Column detection
// ============================================================================

type ColumnRole = 'name' | 'temp' | 'timestamp' | 'date' | 'time' | 'value' | 'parameter' | 'unit' | 'station';

const COLUMN_PATTERNS: Readonly<Record<ColumnRole, readonly RegExp[]>> = {
  name: [
    /gewassername/,
    /gewasser bezeichnung/,
    /gewasser/,
    /gewsser/,
    /stationsname/,
    /see/,
    /bezeichnung/,
    /\bname\b/,
  ],
  temp: [/wassertemperatur/, /wasser.*temperatur/, /\btemperatur\b/, /\bwassertemp\b/, /\btemp\b/, /cunit/, /celsius/],
  timestamp: [/zeitstempel/, /messzeitpunkt/, /zeit punkt/, /zeitpunkt/, /timestamp/],
  date: [/datum/, /messdatum/, /date/],
  time: [/zeit/, /uhrzeit/, /time/],
  value: [/messwert/, /wert/, /value/],
  parameter: [/parameter/, /param/, /messgrosse/, /messgroesse/],
  unit: [/einheit/, /unit/, /cunit/],
  station: [/station/, /standort/, /stelle/, /messstelle/, /messort/, /\bort\b/, /stationsname/],
};

const COLUMN_ROLES: readonly ColumnRole[] = [
  'name',
  'temp',
  'timestamp',
  'date',
  'time',
  'value',
  'parameter',
  'unit',
  'station',
];

export type ColumnMap = Readonly<Partial<Record<ColumnRole, number>>> & { readonly name: number };

function normalizeHeaderToken(token: string): string {
  return stripDiacritics(token)
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, ' ')
    .trim();
}

function findColumn(tokens: readonly string[], role: ColumnRole): number | undefined {
  const patterns = COLUMN_PATTERNS[role];
  const index = tokens.findIndex((token) => patterns.some((pattern) => pattern.test(token)));
  return index === -1 ? undefined : index;
}

/**
 * Locate the columns of a header row
 *
 * @throws ParseError when the name, temperature (or parameter + value) or time columns are missing
 */
export function detectColumns(headers: readonly string[]): ColumnMap {
  const tokens = headers.map(normalizeHeaderToken);
  const roles: Partial<Record<ColumnRole, number>> = {};
  for (const role of COLUMN_ROLES) {
    const index = findColumn(tokens, role);
    if (index !== undefined) {
      roles[role] = index;
    }
  }

  const name = roles.name;
  if (name === undefined) {
    throw new ParseError('salzburg_ogd', "missing required 'name' column");
  }
  if (roles.temp === undefined && (roles.value === undefined || roles.parameter === undefined)) {
    throw new ParseError('salzburg_ogd', "missing 'temperature' column or 'parameter' + 'value' columns");
  }
  if (roles.timestamp === undefined && roles.date === undefined) {
    throw new ParseError('salzburg_ogd', "missing measurement time columns ('timestamp' or 'date')");
  }
  return { ...roles, name };
}

// ============================================================================
// Timestamps
// ============================================================================

const ISO_WITH_OFFSET =
  /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?([+-])(\d{2}):(\d{2})$/;
const LOCAL_DMY = /^(\d{1,2})\.(\d{1,2})\.(\d{4})[ T](\d{1,2}):(\d{2})(?::(\d{2}))?$/;
const LOCAL_YMD = /^(\d{4})-(\d{1,2})-(\d{1,2})[ T](\d{1,2}):(\d{2})(?::(\d{2}))?$/;

const DATE_DMY = /^(\d{1,2})\.(\d{1,2})\.(\d{4})$/;
const DATE_YMD = /^(\d{4})-(\d{1,2})-(\d{1,2})$/;
const DATE_DMY_SHORT = /^(\d{1,2})\.(\d{1,2})\.(\d{2})$/;
const TIME_OF_DAY = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/;

function inVienna(wall: WallTime): Date | undefined {
  return wallTimeToInstant(wall, SALZBURG_OGD_TIME_ZONE);
}

function wallFrom(
  year: string | undefined,
  month: string | undefined,
  day: string | undefined,
  hour: string | undefined,
  minute: string | undefined,
  second: string | undefined
): WallTime {
  return {
    year: Number(year),
    month: Number(month),
    day: Number(day),
    hour: Number(hour),
    minute: Number(minute),
    second: second === undefined ? 0 : Number(second),
  };
}

/**
 * Date column plus optional time column. A missing or unreadable time
 * resolves to 12:00.
 */
export function parseDateTimeFromParts(dateText: string, timeText: string): Date | undefined {
  const date = dateText.trim();
  if (!date) {
    return undefined;
  }

  let ymd: { year: number; month: number; day: number } | undefined;
  let match = date.match(DATE_DMY);
  if (match) {
    ymd = { year: Number(match[3]), month: Number(match[2]), day: Number(match[1]) };
  } else if ((match = date.match(DATE_YMD))) {
    ymd = { year: Number(match[1]), month: Number(match[2]), day: Number(match[3]) };
  } else if ((match = date.match(DATE_DMY_SHORT))) {
    const shortYear = Number(match[3]);
    ymd = { year: shortYear < 69 ? 2000 + shortYear : 1900 + shortYear, month: Number(match[2]), day: Number(match[1]) };
  }
  if (!ymd) {
    return undefined;
  }

  const time = timeText.trim().match(TIME_OF_DAY);
  if (time) {
    const resolved = inVienna({
      ...ymd,
      hour: Number(time[1]),
      minute: Number(time[2]),
      second: time[3] === undefined ? 0 : Number(time[3]),
    });
    if (resolved) {
      return resolved;
    }
  }
  return inVienna({ ...ymd, hour: 12, minute: 0, second: 0 });
}

/**
 * Parse a single timestamp cell
 *
 * Accepts ISO 8601 with `Z` or an offset, `YYYY.MM.DD`, `YYYY-MM-DD` and
 * `DD.MM.YYYY` dates with times, trailing zone abbreviations (MEZ, MESZ),
 * and bare dates.
 */
export function parseDateTimeAny(text: string): Date | undefined {
  const raw = text.trim();
  if (!raw) {
    return undefined;
  }

  let normalized = raw.replace(/\s+[A-ZÄÖÜ]{2,6}$/, '');
  normalized = normalized.replace(/^(\d{4})\.(\d{2})\.(\d{2})/, '$1-$2-$3');
  normalized = normalized.replace(/(T\d{2}:\d{2}(?::\d{2})?)([+-])(\d{2})(\d{2})$/, '$1$2$3:$4');
  if (normalized.endsWith('Z')) {
    normalized = `${normalized.slice(0, -1)}+00:00`;
  }

  const iso = normalized.match(ISO_WITH_OFFSET);
  if (iso) {
    const [, year, month, day, hour, minute, second, sign, offH, offM] = iso;
    const offsetMinutes = (sign === '-' ? -1 : 1) * (Number(offH) * 60 + Number(offM));
    return wallTimeAtOffset(wallFrom(year, month, day, hour, minute, second), offsetMinutes);
  }

  const dmy = normalized.match(LOCAL_DMY);
  if (dmy) {
    const [, day, month, year, hour, minute, second] = dmy;
    return inVienna(wallFrom(year, month, day, hour, minute, second));
  }

  const ymd = normalized.match(LOCAL_YMD);
  if (ymd) {
    const [, year, month, day, hour, minute, second] = ymd;
    return inVienna(wallFrom(year, month, day, hour, minute, second));
  }

  const parts = normalized.split(/\s+/);
  return parseDateTimeFromParts(parts[0] ?? '', parts[1] ?? '');
}

// ============================================================================
// Rows
// ============================================================================

export function isWaterTemperatureParameter(parameter: string): boolean {
  const text = parameter.toLowerCase().trim();
  return text.includes('temperatur') || text === 'wt' || text.includes(' wt');
}

interface SalzburgRow {
  readonly lakeName: string;
  readonly stationName?: string;
  readonly observedAt: Date;
  readonly value: number;
}

function cell(row: readonly string[], index: number | undefined): string {
  return index === undefined ? '' : (row[index] ?? '');
}

function parseRow(row: readonly string[], columns: ColumnMap): SalzburgRow | undefined {
  const maxIndex = Math.max(...Object.values(columns).filter((index): index is number => index !== undefined));
  if (row.length <= maxIndex) {
    return undefined;
  }

  const lakeName = cell(row, columns.name).trim();
  if (!lakeName) {
    return undefined;
  }

  let value = columns.temp === undefined ? undefined : parseTemperatureCell(cell(row, columns.temp));
  if (value === undefined && columns.value !== undefined && columns.parameter !== undefined) {
    if (isWaterTemperatureParameter(cell(row, columns.parameter))) {
      value = parseTemperatureCell(cell(row, columns.value));
    }
  }
  if (value === undefined) {
    return undefined;
  }

  const observedAt =
    columns.timestamp !== undefined
      ? parseDateTimeAny(cell(row, columns.timestamp))
      : parseDateTimeFromParts(cell(row, columns.date), cell(row, columns.time));
  if (!observedAt) {
    return undefined;
  }

  const stationName = cell(row, columns.station).trim();
  return { lakeName, observedAt, value, ...(stationName ? { stationName } : {}) };
}

/**
 * Parse the full file into the latest reading per normalized lake key
 *
 * @throws ParseError when the header has fewer than two columns or lacks required columns
 */
export function parseSalzburgOgd(payload: ParsePayload): TemperatureReading[] {
  const text = decodePayload(payload.bytes, payload.contentType).trim();
  const lines = text.split(/\r?\n/);
  const headerLine = (lines[0] ?? '').replace(/^\uFEFF/, '').trim();
  const headers = headerLine.split(';').map((header) => header.trim());
  if (headers.length < 2) {
    throw new ParseError('salzburg_ogd', 'header has fewer than 2 columns');
  }
  const columns = detectColumns(headers);

  const latestByKey = new Map<string, TemperatureReading>();
  for (const line of lines.slice(1)) {
    if (!line.trim()) {
      continue;
    }
    const row = parseRow(
      line.split(';').map((value) => value.trim()),
      columns
    );
    if (!row) {
      continue;
    }

    const key = normalizeLakeKey(row.lakeName);
    const previous = latestByKey.get(key);
    if (previous && row.observedAt.getTime() <= previous.observedAt.getTime()) {
      continue;
    }
    latestByKey.set(key, {
      value: row.value,
      observedAt: row.observedAt,
      sourceStationKey: key,
      source: 'salzburg_ogd',
      labels: row.stationName ? [row.lakeName, row.stationName] : [row.lakeName],
    });
  }

  return [...latestByKey.values()];
}
