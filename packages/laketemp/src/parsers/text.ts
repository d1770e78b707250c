/**
 * Text helpers shared by the parsers
 */

import { TextDecoder } from 'node:util';
import { PLAUSIBLE_MAX_CELSIUS, PLAUSIBLE_MIN_CELSIUS } from '../core/constants.js';

const FALLBACK_ENCODINGS = ['utf-8', 'windows-1252'] as const;

function declaredCharset(contentType: string | undefined): string | undefined {
  const match = contentType?.match(/charset\s*=\s*"?([^";\s]+)"?/i);
  return match?.[1]?.toLowerCase();
}

function tryDecode(bytes: Uint8Array, encoding: string): string | undefined {
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(encoding, { fatal: true });
  } catch {
    // Unknown encoding label
    return undefined;
  }
  try {
    return decoder.decode(bytes);
  } catch {
    return undefined;
  }
}

/**
 * Decode a response body: declared charset, then strict UTF-8, then
 * windows-1252 (which accepts any byte sequence). A leading BOM is dropped.
 */
export function decodePayload(bytes: Uint8Array, contentType?: string): string {
  const charset = declaredCharset(contentType);
  const encodings = charset ? [charset, ...FALLBACK_ENCODINGS] : [...FALLBACK_ENCODINGS];

  for (const encoding of encodings) {
    const text = tryDecode(bytes, encoding);
    if (text !== undefined) {
      return text.replace(/^\uFEFF/, '');
    }
  }
  return new TextDecoder('utf-8').decode(bytes).replace(/^\uFEFF/, '');
}

/**
 * Collapse whitespace runs (including NBSP) to single spaces and trim
 */
export function cleanText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function isPlausibleCelsius(value: number): boolean {
  return value >= PLAUSIBLE_MIN_CELSIUS && value <= PLAUSIBLE_MAX_CELSIUS;
}

/**
 * Parse a temperature cell such as `14,3`, `14.3 °C` or `+0,5`.
 *
 * @returns undefined for empty, non-numeric or implausible values
 */
export function parseTemperatureCell(text: string): number | undefined {
  const cleaned = cleanText(text)
    .toLowerCase()
    .replace(/°c/g, '')
    .replace(/°/g, '')
    .replace(/c/g, '')
    .replace(/ /g, '')
    .replace(/,/g, '.');

  const numeric = Array.from(cleaned)
    .filter((ch) => '0123456789.+-'.includes(ch))
    .join('');
  if (numeric === '' || numeric === '+' || numeric === '-' || numeric === '.') {
    return undefined;
  }
  if (!/^[+-]?(\d+\.?\d*|\.\d+)$/.test(numeric)) {
    return undefined;
  }

  const value = Number(numeric);
  if (!Number.isFinite(value) || !isPlausibleCelsius(value)) {
    return undefined;
  }
  return value;
}

/**
 * Latest reading by observation time; the first one wins on ties
 */
export function latestOf<T extends { readonly observedAt: Date }>(items: readonly T[]): T | undefined {
  let latest: T | undefined;
  for (const item of items) {
    if (latest === undefined || item.observedAt.getTime() > latest.observedAt.getTime()) {
      latest = item;
    }
  }
  return latest;
}
