/**
 * Hydro OÖ (Upper Austria) ZRXP bulk export parser
 *
 * The export concatenates one block per station:
 *
 *   #SANR5005|*|SNAMEMondsee|*|SWATERMondsee|*|
 *   #TZUTC+1|*|RINVAL-777|*|
 *   #LAYOUT(timestamp,value)|*|
 *   20240501110000 14.3
 *   20240501120000 14.6
 *
 * The file may be a single long line, so blocks are located by their
 * `#SANR` marker rather than by line structure.
 */

import { ParseError } from '../core/errors.js';
import type { TemperatureReading } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import { wallTimeAtOffset } from '../core/utils/zoned-time.js';
import { decodePayload, isPlausibleCelsius, latestOf } from './text.js';
import type { ParseHints, ParsePayload } from './types.js';

const parserLogger = createLogger({ module: 'parser:hydro_ooe' });

const BLOCK_MARKER = '#SANR';
const LAYOUT_MARKER = '#LAYOUT(timestamp,value)';
const FIELD_DELIMITER = '|*|';

const SANR_PATTERN = /#SANR(\d+)/;
const SNAME_PATTERN = /\|\*\|SNAME([^|]*)\|\*\|/;
const SWATER_PATTERN = /\|\*\|SWATER([^|]*)\|\*\|/;
const TZUTC_PATTERN = /#TZUTC([+-])(\d+)/;
const RINVAL_PATTERN = /RINVAL\s*([+-]?\d+(?:[.,]\d+)?)/;
const SAMPLE_PATTERN = /(\d{14})\s+([+-]?\d+(?:[.,]\d+)?)/g;

export interface ZrxpBlockHeader {
  readonly sanr?: string;
  readonly sname?: string;
  readonly swater?: string;
  /** Minutes east of UTC */
  readonly utcOffsetMinutes: number;
  readonly invalidValue?: number;
}

/**
 * Split an export into `#SANR` blocks; text before the first block is ignored
 */
export function splitZrxpBlocks(text: string): string[] {
  return text
    .split(BLOCK_MARKER)
    .slice(1)
    .map((part) => BLOCK_MARKER + part);
}

function parseDecimal(text: string): number {
  return Number(text.replace(',', '.'));
}

export function parseZrxpHeader(block: string): ZrxpBlockHeader {
  const sname = block.match(SNAME_PATTERN)?.[1]?.trim();
  const swater = block.match(SWATER_PATTERN)?.[1]?.trim();
  const tz = block.match(TZUTC_PATTERN);
  const rinval = block.match(RINVAL_PATTERN)?.[1];

  let utcOffsetMinutes = 0;
  if (tz?.[1] && tz[2]) {
    utcOffsetMinutes = (tz[1] === '-' ? -1 : 1) * Number(tz[2]) * 60;
  }

  const invalidValue = rinval === undefined ? undefined : parseDecimal(rinval);

  return {
    sanr: block.match(SANR_PATTERN)?.[1],
    sname: sname || undefined,
    swater: swater || undefined,
    utcOffsetMinutes,
    invalidValue: invalidValue !== undefined && Number.isFinite(invalidValue) ? invalidValue : undefined,
  };
}

/**
 * All valid samples of one block, in file order
 *
 * @throws ParseError when the layout marker or the data delimiter is missing
 */
export function parseZrxpSamples(block: string, header: ZrxpBlockHeader): Array<{ observedAt: Date; value: number }> {
  const layoutPos = block.indexOf(LAYOUT_MARKER);
  if (layoutPos === -1) {
    throw new ParseError('hydro_ooe', `block ${header.sanr ?? '?'} is missing ${LAYOUT_MARKER}`);
  }
  const dataStart = block.indexOf(FIELD_DELIMITER, layoutPos);
  if (dataStart === -1) {
    throw new ParseError('hydro_ooe', `block ${header.sanr ?? '?'} has no data delimiter after ${LAYOUT_MARKER}`);
  }

  const samples: Array<{ observedAt: Date; value: number }> = [];
  for (const match of block.slice(dataStart + FIELD_DELIMITER.length).matchAll(SAMPLE_PATTERN)) {
    const [, stamp, rawValue] = match;
    if (!stamp || !rawValue) {
      continue;
    }
    const value = parseDecimal(rawValue);
    if (!Number.isFinite(value)) {
      continue;
    }
    if (header.invalidValue !== undefined && Math.abs(value - header.invalidValue) < 1e-9) {
      continue;
    }
    if (!isPlausibleCelsius(value)) {
      continue;
    }
    const observedAt = wallTimeAtOffset(
      {
        year: Number(stamp.slice(0, 4)),
        month: Number(stamp.slice(4, 6)),
        day: Number(stamp.slice(6, 8)),
        hour: Number(stamp.slice(8, 10)),
        minute: Number(stamp.slice(10, 12)),
        second: Number(stamp.slice(12, 14)),
      },
      header.utcOffsetMinutes
    );
    if (observedAt) {
      samples.push({ observedAt, value });
    }
  }
  return samples;
}

/**
 * Parse the whole export into one latest reading per station, keyed by SANR.
 * A malformed block is logged and skipped.
 *
 * @throws ParseError when there is no `#SANR` block or no block is well formed
 */
export function parseHydroOoe(payload: ParsePayload, hints: ParseHints = {}): TemperatureReading[] {
  const log = hints.logger ?? parserLogger;
  const blocks = splitZrxpBlocks(decodePayload(payload.bytes, payload.contentType));
  if (blocks.length === 0) {
    throw new ParseError('hydro_ooe', 'no #SANR block found');
  }

  const bySanr = new Map<string, TemperatureReading>();
  let firstFailure: ParseError | undefined;
  let wellFormed = 0;
  for (const block of blocks) {
    const header = parseZrxpHeader(block);
    let samples: Array<{ observedAt: Date; value: number }>;
    try {
      samples = parseZrxpSamples(block, header);
    } catch (error) {
      if (!(error instanceof ParseError)) {
        throw error;
      }
      firstFailure ??= error;
      log.warn('Skipping malformed ZRXP block', { sanr: header.sanr ?? '?', error: error.detail });
      continue;
    }
    wellFormed++;

    if (!header.sanr) {
      continue;
    }
    const latest = latestOf(samples);
    if (!latest) {
      continue;
    }

    const labels = [header.sname, header.swater].filter((label): label is string => label !== undefined);
    const previous = bySanr.get(header.sanr);
    if (previous && previous.observedAt.getTime() >= latest.observedAt.getTime()) {
      continue;
    }
    bySanr.set(header.sanr, {
      value: latest.value,
      observedAt: latest.observedAt,
      sourceStationKey: header.sanr,
      source: 'hydro_ooe',
      labels,
    });
  }

  if (wellFormed === 0 && firstFailure) {
    throw new ParseError('hydro_ooe', `no well-formed block (${blocks.length} skipped); ${firstFailure.detail}`);
  }
  return [...bySanr.values()];
}
