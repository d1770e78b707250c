/**
 * Parser registry keyed by source type
 */

import { parseGkdBayern } from './gkd-bayern.js';
import { parseHydroOoe } from './hydro-ooe.js';
import { parseSalzburgOgd } from './salzburg-ogd.js';
import type { ParserRegistry } from './types.js';

export const PARSERS: ParserRegistry = {
  gkd_bayern: parseGkdBayern,
  hydro_ooe: parseHydroOoe,
  salzburg_ogd: (payload) => parseSalzburgOgd(payload),
};

export { parseGkdBayern, toTableUrl, inferStationId, parseGermanDateTime } from './gkd-bayern.js';
export { parseHydroOoe, splitZrxpBlocks, parseZrxpHeader } from './hydro-ooe.js';
export {
  parseSalzburgOgd,
  normalizeLakeKey,
  parseDateTimeAny,
  parseDateTimeFromParts,
  detectColumns,
} from './salzburg-ogd.js';
export { decodePayload, parseTemperatureCell, cleanText } from './text.js';
export type { ParsePayload, ParseHints, ReadingParser, ParserRegistry } from './types.js';
