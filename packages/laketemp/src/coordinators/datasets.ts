/**
 * Bulk datasets served by a DatasetCoordinator
 */

import { HYDRO_OOE_EXPORT_URL, SALZBURG_OGD_SEEN_URL } from '../core/constants.js';
import type { DatasetSnapshot, DatasetType, LakeConfig, TemperatureReading } from '../core/types.js';
import { normalizeLakeKey } from '../parsers/salzburg-ogd.js';

export interface DatasetDefinition {
  readonly type: DatasetType;
  readonly url: string;
  readonly accept: string;
  /** Key a lake is expected under, for logging */
  readonly expectedKey: (lake: LakeConfig) => string;
  /** Find the lake's reading in a snapshot */
  readonly match: (lake: LakeConfig, snapshot: DatasetSnapshot) => TemperatureReading | undefined;
}

function hydroStationId(lake: LakeConfig): string | undefined {
  if (lake.source.type !== 'hydro_ooe') {
    return undefined;
  }
  const id = lake.source.stationId?.trim();
  return id && /^\d+$/.test(id) ? id : undefined;
}

function salzburgLakeName(lake: LakeConfig): string {
  return lake.source.type === 'salzburg_ogd' && lake.source.lakeName ? lake.source.lakeName : lake.name;
}

export const HYDRO_OOE_DATASET: DatasetDefinition = {
  type: 'hydro_ooe',
  url: HYDRO_OOE_EXPORT_URL,
  accept: 'text/plain, */*',
  expectedKey: (lake) => hydroStationId(lake) ?? `name:${lake.name.trim().toLowerCase()}`,
  match: (lake, snapshot) => {
    const sanr = hydroStationId(lake);
    if (sanr) {
      const bySanr = snapshot.entries.get(sanr);
      if (bySanr) {
        return bySanr;
      }
    }
    const hint = lake.name.trim().toLowerCase();
    if (!hint) {
      return undefined;
    }
    for (const reading of snapshot.entries.values()) {
      if (reading.labels?.some((label) => label.toLowerCase().includes(hint))) {
        return reading;
      }
    }
    return undefined;
  },
};

export const SALZBURG_OGD_DATASET: DatasetDefinition = {
  type: 'salzburg_ogd',
  url: SALZBURG_OGD_SEEN_URL,
  accept: 'text/plain, */*',
  expectedKey: (lake) => normalizeLakeKey(salzburgLakeName(lake)),
  match: (lake, snapshot) => snapshot.entries.get(normalizeLakeKey(salzburgLakeName(lake))),
};

export const DATASETS: Readonly<Record<DatasetType, DatasetDefinition>> = {
  hydro_ooe: HYDRO_OOE_DATASET,
  salzburg_ogd: SALZBURG_OGD_DATASET,
};
