/**
 * Parser Text Helper Tests
 */

import { describe, it, expect } from 'vitest';
import { cleanText, decodePayload, latestOf, parseTemperatureCell } from '../../../parsers/text.js';
import { utf8 } from '../../utils/fixtures.js';

describe('parseTemperatureCell', () => {
  it('should read decimal commas and points', () => {
    expect(parseTemperatureCell('14,3')).toBe(14.3);
    expect(parseTemperatureCell('14.3')).toBe(14.3);
  });

  it('should strip units, signs and surrounding whitespace', () => {
    expect(parseTemperatureCell('14.3 °C')).toBe(14.3);
    expect(parseTemperatureCell('+0,5')).toBe(0.5);
    expect(parseTemperatureCell(' 14,3 ')).toBe(14.3);
  });

  it('should accept the plausible range bounds', () => {
    expect(parseTemperatureCell('-5')).toBe(-5);
    expect(parseTemperatureCell('45,0')).toBe(45);
  });

  it('should reject placeholders and implausible values', () => {
    expect(parseTemperatureCell('')).toBeUndefined();
    expect(parseTemperatureCell('-')).toBeUndefined();
    expect(parseTemperatureCell('n/a')).toBeUndefined();
    expect(parseTemperatureCell('99,0')).toBeUndefined();
    expect(parseTemperatureCell('-777')).toBeUndefined();
    expect(parseTemperatureCell('1.2.3')).toBeUndefined();
  });
});

describe('decodePayload', () => {
  it('should drop a leading byte order mark', () => {
    expect(decodePayload(utf8('\uFEFFGewässer;Datum'))).toBe('Gewässer;Datum');
  });

  it('should fall back to windows-1252 for invalid UTF-8', () => {
    const latin1 = new Uint8Array([0x47, 0x65, 0x77, 0xe4, 0x73, 0x73, 0x65, 0x72]);
    expect(decodePayload(latin1)).toBe('Gewässer');
  });

  it('should prefer a declared charset', () => {
    const latin1 = new Uint8Array([0x53, 0x74, 0x61, 0x75, 0xdf]);
    expect(decodePayload(latin1, 'text/plain; charset=ISO-8859-1')).toBe('Stauß');
  });
});

describe('cleanText', () => {
  it('should collapse whitespace runs', () => {
    expect(cleanText('  01.05.2024\n\t 12:00 ')).toBe('01.05.2024 12:00');
  });
});

describe('latestOf', () => {
  it('should pick the latest item and keep the first on ties', () => {
    const items = [
      { id: 'a', observedAt: new Date('2024-05-01T10:00:00Z') },
      { id: 'b', observedAt: new Date('2024-05-01T11:00:00Z') },
      { id: 'c', observedAt: new Date('2024-05-01T11:00:00Z') },
    ];
    expect(latestOf(items)?.id).toBe('b');
    expect(latestOf([])).toBeUndefined();
  });
});
