/**
 * Salzburg OGD Parser Tests
 */

import { describe, it, expect } from 'vitest';
import type { TemperatureReading } from '../../../core/types.js';
import {
  detectColumns,
  isWaterTemperatureParameter,
  normalizeLakeKey,
  parseDateTimeAny,
  parseDateTimeFromParts,
  parseSalzburgOgd,
} from '../../../parsers/salzburg-ogd.js';
import { loadFixtureBytes, utf8 } from '../../utils/fixtures.js';

function summarize(readings: readonly TemperatureReading[]) {
  return readings.map((reading) => ({
    key: reading.sourceStationKey,
    value: reading.value,
    observedAt: reading.observedAt.toISOString(),
  }));
}

describe('parseSalzburgOgd', () => {
  describe('Temperature column layout', () => {
    const readings = parseSalzburgOgd({ bytes: loadFixtureBytes('salzburg-seen.txt') });

    it('should return the latest reading per lake', () => {
      expect(summarize(readings)).toEqual([
        { key: 'fuschl', value: 14.3, observedAt: '2024-05-01T10:00:00.000Z' },
        { key: 'zeller', value: 12.5, observedAt: '2024-05-01T10:00:00.000Z' },
        { key: 'waller', value: 11, observedAt: '2024-05-01T10:00:00.000Z' },
      ]);
    });

    it('should label readings with lake and station names', () => {
      expect(readings[1]?.labels).toEqual(['Zeller See', 'Zell am See']);
      expect(readings[0]?.source).toBe('salzburg_ogd');
    });
  });

  describe('Parameter layout', () => {
    const readings = parseSalzburgOgd({ bytes: loadFixtureBytes('salzburg-seen-parameter.txt') });

    it('should keep only water temperature parameters', () => {
      expect(summarize(readings)).toEqual([
        { key: 'mond', value: 14.6, observedAt: '2024-05-01T10:00:00.000Z' },
        { key: 'wolfgang', value: 13.5, observedAt: '2024-05-01T11:00:00.000Z' },
      ]);
    });

    it('should merge lake aliases under one key', () => {
      expect(readings[1]?.labels).toEqual(['Abersee', 'Strobl']);
    });
  });

  it('should decode windows-1252 exports', () => {
    const text = 'Gewässer;Datum;Uhrzeit;Temperatur\nFuschlsee;01.05.2024;12:00;14,3\n';
    const bytes = new Uint8Array(Array.from(text, (ch) => ch.charCodeAt(0)));
    const readings = parseSalzburgOgd({ bytes });

    expect(summarize(readings)).toEqual([{ key: 'fuschl', value: 14.3, observedAt: '2024-05-01T10:00:00.000Z' }]);
    expect(readings[0]?.labels).toEqual(['Fuschlsee']);
  });

  it('should fail on a header with a single column', () => {
    expect(() => parseSalzburgOgd({ bytes: utf8('Wartungsarbeiten\n') })).toThrow(
      'salzburg_ogd payload could not be parsed: header has fewer than 2 columns'
    );
  });

  it('should return nothing for a header without rows', () => {
    expect(parseSalzburgOgd({ bytes: utf8('Gewässer;Datum;Wassertemperatur\n') })).toEqual([]);
  });
});

describe('detectColumns', () => {
  it('should require a lake name column', () => {
    expect(() => detectColumns(['Datum', 'Temperatur'])).toThrow("missing required 'name' column");
  });

  it('should require a temperature or parameter and value columns', () => {
    expect(() => detectColumns(['Gewässer', 'Datum', 'Messwert'])).toThrow(
      "missing 'temperature' column or 'parameter' + 'value' columns"
    );
  });

  it('should require a time column', () => {
    expect(() => detectColumns(['Gewässer', 'Wassertemperatur'])).toThrow('missing measurement time columns');
  });

  it('should locate columns regardless of order', () => {
    expect(detectColumns(['Wassertemperatur [°C]', 'Datum', 'Gewässer'])).toMatchObject({ name: 2, date: 1, temp: 0 });
  });
});

describe('normalizeLakeKey', () => {
  it('should map spellings of one lake to one key', () => {
    expect(normalizeLakeKey('Zeller See')).toBe('zeller');
    expect(normalizeLakeKey('Zellersee')).toBe('zeller');
    expect(normalizeLakeKey('Zell am See')).toBe('zeller');
    expect(normalizeLakeKey('Wolfgangsee')).toBe('wolfgang');
    expect(normalizeLakeKey('Abersee')).toBe('wolfgang');
  });

  it('should stem lake names', () => {
    expect(normalizeLakeKey('Obertrumer See')).toBe('obertrumer');
    expect(normalizeLakeKey('Mattsee')).toBe('matt');
    expect(normalizeLakeKey('  Fuschlsee ')).toBe('fuschl');
  });
});

describe('parseDateTimeAny', () => {
  it('should honour UTC and explicit offsets', () => {
    expect(parseDateTimeAny('2024-05-01T10:00:00Z')?.toISOString()).toBe('2024-05-01T10:00:00.000Z');
    expect(parseDateTimeAny('2024-05-01T12:00:00+0200')?.toISOString()).toBe('2024-05-01T10:00:00.000Z');
  });

  it('should read local Vienna times with zone abbreviations', () => {
    expect(parseDateTimeAny('2024.05.01 11:00 MESZ')?.toISOString()).toBe('2024-05-01T09:00:00.000Z');
    expect(parseDateTimeAny('01.05.2024 13:00')?.toISOString()).toBe('2024-05-01T11:00:00.000Z');
  });

  it('should place bare dates at noon', () => {
    expect(parseDateTimeAny('01.05.2024')?.toISOString()).toBe('2024-05-01T10:00:00.000Z');
  });

  it('should return undefined for empty or unreadable text', () => {
    expect(parseDateTimeAny('')).toBeUndefined();
    expect(parseDateTimeAny('gestern')).toBeUndefined();
  });
});

describe('parseDateTimeFromParts', () => {
  it('should expand two-digit years', () => {
    expect(parseDateTimeFromParts('01.05.24', '08:30')?.toISOString()).toBe('2024-05-01T06:30:00.000Z');
  });

  it('should fall back to noon for an unreadable time', () => {
    expect(parseDateTimeFromParts('2024-05-01', 'abends')?.toISOString()).toBe('2024-05-01T10:00:00.000Z');
  });
});

describe('isWaterTemperatureParameter', () => {
  it('should recognise temperature parameters only', () => {
    expect(isWaterTemperatureParameter('WT')).toBe(true);
    expect(isWaterTemperatureParameter('Wassertemperatur')).toBe(true);
    expect(isWaterTemperatureParameter('Wasserstand')).toBe(false);
  });
});
