/**
 * GKD Bayern (Gewässerkundlicher Dienst Bayern) table page parser
 *
 * Each station page has a `/tabelle` view listing recent measurements as
 * `<tr><td>07.08.2025 16:00</td><td>22,0</td></tr>`. Times are local to
 * Europe/Berlin.
 */

import { load } from 'cheerio';
import { GKD_BAYERN_TIME_ZONE } from '../core/constants.js';
import { ParseError } from '../core/errors.js';
import type { TemperatureReading } from '../core/types.js';
import { wallTimeToInstant } from '../core/utils/zoned-time.js';
import { cleanText, decodePayload, latestOf, parseTemperatureCell } from './text.js';
import type { ParseHints, ParsePayload } from './types.js';

const GERMAN_DATETIME = /^(\d{1,2})\.(\d{1,2})\.(\d{4}) (\d{1,2}):(\d{2})(?::(\d{2}))?$/;

/**
 * Ensure the URL targets the `/tabelle` view of a station page
 */
export function toTableUrl(url: string): string {
  const stripped = url.replace(/\/+$/, '');
  return stripped.endsWith('tabelle') ? stripped : `${stripped}/tabelle`;
}

/**
 * Station id from a page URL: the trailing digit run of the station slug,
 * e.g. `.../inn/stock-18673955/messwerte` → `18673955`
 */
export function inferStationId(url: string): string | undefined {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    pathname = url;
  }
  const segments = pathname.split('/').filter((segment) => segment.length > 0);
  for (let i = segments.length - 1; i >= 0; i--) {
    const match = segments[i]?.match(/(?:^|[-_])(\d+)$/);
    if (match?.[1]) {
      return match[1];
    }
  }
  return undefined;
}

function stationKey(hints: ParseHints): string {
  if (hints.stationId) {
    return hints.stationId;
  }
  if (hints.url) {
    const inferred = inferStationId(hints.url);
    if (inferred) {
      return inferred;
    }
    try {
      return new URL(hints.url).pathname;
    } catch {
      return hints.url;
    }
  }
  return 'gkd_bayern';
}

/**
 * Parse `DD.MM.YYYY HH:MM[:SS]` in Europe/Berlin
 */
export function parseGermanDateTime(text: string): Date | undefined {
  const match = cleanText(text).match(GERMAN_DATETIME);
  if (!match) {
    return undefined;
  }
  const [, day, month, year, hour, minute, second] = match;
  return wallTimeToInstant(
    {
      year: Number(year),
      month: Number(month),
      day: Number(day),
      hour: Number(hour),
      minute: Number(minute),
      second: second === undefined ? 0 : Number(second),
    },
    GKD_BAYERN_TIME_ZONE
  );
}

function headerLooksLikeMeasurement(headers: readonly string[]): boolean {
  const combined = headers.map((h) => h.toLowerCase()).join(' ');
  return (
    (combined.includes('datum') || combined.includes('date')) &&
    (combined.includes('wassertemperatur') || combined.includes('°c'))
  );
}

/**
 * Parse a station table page into its latest reading
 *
 * @throws ParseError when the page has no candidate table, the selector is
 *   invalid, or no row can be parsed
 */
export function parseGkdBayern(payload: ParsePayload, hints: ParseHints = {}): TemperatureReading[] {
  const $ = load(decodePayload(payload.bytes, payload.contentType));

  let candidates;
  if (hints.tableSelector) {
    try {
      const matched = $(hints.tableSelector);
      const direct = matched.filter('table');
      candidates = direct.length > 0 ? direct : matched.find('table');
    } catch (error) {
      throw new ParseError(
        'gkd_bayern',
        `invalid table selector '${hints.tableSelector}': ${error instanceof Error ? error.message : String(error)}`
      );
    }
  } else {
    candidates = $('table');
  }

  const tables = candidates.toArray();
  if (tables.length === 0) {
    throw new ParseError(
      'gkd_bayern',
      hints.tableSelector ? `no <table> matches selector '${hints.tableSelector}'` : 'no <table> elements found'
    );
  }

  const headerTexts = (table: (typeof tables)[number]): string[] => {
    const $table = $(table);
    const fromHead = $table
      .find('thead th')
      .toArray()
      .map((cell) => cleanText($(cell).text()));
    if (fromHead.length > 0) {
      return fromHead;
    }
    return $table
      .find('tr')
      .first()
      .children('th, td')
      .toArray()
      .map((cell) => cleanText($(cell).text()));
  };

  const chosen = tables.find((table) => headerLooksLikeMeasurement(headerTexts(table))) ?? tables[0];
  if (!chosen) {
    throw new ParseError('gkd_bayern', 'no <table> elements found');
  }
  const $chosen = $(chosen);
  const body = $chosen.children('tbody');
  const rows = (body.length > 0 ? body : $chosen).find('tr').toArray();

  const key = stationKey(hints);
  const readings: TemperatureReading[] = [];

  for (const row of rows) {
    const [dateCell, tempCell] = $(row).children('td, th').toArray();
    if (!dateCell || !tempCell) {
      continue;
    }
    const dateText = cleanText($(dateCell).text());
    const tempText = cleanText($(tempCell).text());
    if (!dateText || !tempText || tempText === '-') {
      continue;
    }

    const observedAt = parseGermanDateTime(dateText);
    const value = parseTemperatureCell(tempText);
    if (observedAt === undefined || value === undefined) {
      continue;
    }

    readings.push({ value, observedAt, sourceStationKey: key, source: 'gkd_bayern' });
  }

  const latest = latestOf(readings);
  if (!latest) {
    throw new ParseError('gkd_bayern', 'no measurement rows parsed from table');
  }
  return [latest];
}
