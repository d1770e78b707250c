import type { SourceType, TemperatureReading } from '../core/types.js';
import type { Logger } from '../core/utils/logger.js';

/**
 * Raw upstream response handed to a parser
 */
export interface ParsePayload {
  readonly bytes: Uint8Array;
  /** Content-Type header, used for the declared charset */
  readonly contentType?: string;
}

/**
 * Per-lake parsing options
 */
export interface ParseHints {
  /** Page URL; GKD Bayern infers the station key from its path */
  readonly url?: string;
  readonly stationId?: string;
  /** CSS selector restricting the candidate tables */
  readonly tableSelector?: string;
  /** Receives warnings about skipped entries */
  readonly logger?: Logger;
}

/**
 * Pure bytes → readings transformation.
 *
 * Structural problems throw ParseError. Rows that cannot be read are skipped.
 */
export type ReadingParser = (payload: ParsePayload, hints?: ParseHints) => TemperatureReading[];

export type ParserRegistry = Readonly<Record<SourceType, ReadingParser>>;
