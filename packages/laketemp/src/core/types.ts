/**
 * Core domain types for lake temperature acquisition
 *
 * TYPE SAFETY: every value crossing a module boundary is readonly. Readings
 * and configs are created once and replaced wholesale, never mutated.
 */

// ============================================================================
// Source Configuration
// ============================================================================

/**
 * Upstream publishers
 *
 * - gkd_bayern: one HTML table page per station (per-lake source)
 * - hydro_ooe: ZRXP bulk export covering all stations (dataset)
 * - salzburg_ogd: semicolon text file covering all lakes (dataset)
 */
export type SourceType = 'gkd_bayern' | 'hydro_ooe' | 'salzburg_ogd';

/**
 * Source types served by one shared bulk download
 */
export type DatasetType = Exclude<SourceType, 'gkd_bayern'>;

export const SOURCE_TYPES: readonly SourceType[] = ['gkd_bayern', 'hydro_ooe', 'salzburg_ogd'];

export interface GkdBayernSource {
  readonly type: 'gkd_bayern';
  /** CSS selector narrowing which table is read when a page has several */
  readonly tableSelector?: string;
  /** Station key; inferred from the URL path when absent */
  readonly stationId?: string;
}

export interface HydroOoeSource {
  readonly type: 'hydro_ooe';
  /** SANR of the station in the ZRXP export; name matching is used when absent */
  readonly stationId?: string;
}

export interface SalzburgOgdSource {
  readonly type: 'salzburg_ogd';
  /** Lake name as written in the dataset; overrides the configured lake name for matching */
  readonly lakeName?: string;
}

export type SourceConfig = GkdBayernSource | HydroOoeSource | SalzburgOgdSource;

/**
 * Validated configuration for one lake
 */
export interface LakeConfig {
  readonly name: string;
  /** Slug, unique across the configuration */
  readonly entityId: string;
  /** Required for gkd_bayern, informational for dataset sources */
  readonly url?: string;
  /** Seconds between refreshes */
  readonly scanInterval: number;
  /** Readings older than this are not shown */
  readonly timeoutHours: number;
  readonly userAgent: string;
  readonly source: SourceConfig;
}

/**
 * A lake whose readings come from its own page
 */
export interface PerLakeConfig extends LakeConfig {
  readonly url: string;
  readonly source: GkdBayernSource;
}

export function isPerLakeConfig(lake: LakeConfig): lake is PerLakeConfig {
  return lake.source.type === 'gkd_bayern' && lake.url !== undefined;
}

export function isDatasetType(type: SourceType): type is DatasetType {
  return type === 'hydro_ooe' || type === 'salzburg_ogd';
}

// ============================================================================
// Readings
// ============================================================================

/**
 * One normalized measurement
 */
export interface TemperatureReading {
  /** Water temperature in °C, as published */
  readonly value: number;
  readonly observedAt: Date;
  /** Key used to match dataset rows to lakes (station id, SANR or normalized lake name) */
  readonly sourceStationKey: string;
  readonly source: SourceType;
  /** Station / water body names published alongside the row */
  readonly labels?: readonly string[];
}

/**
 * Result of one dataset download+parse cycle; discarded after fan-out
 */
export interface DatasetSnapshot {
  readonly fetchedAt: Date;
  readonly byteSize: number;
  readonly entries: ReadonlyMap<string, TemperatureReading>;
}

// ============================================================================
// Lake State
// ============================================================================

/**
 * - fresh: reading exists and is within timeoutHours
 * - stale: reading exists but is older than timeoutHours
 * - error: no reading has been obtained yet
 */
export type LakeStatus = 'fresh' | 'stale' | 'error';

export interface LakeState {
  /** Last good reading, retained across failed refreshes */
  readonly reading?: TemperatureReading;
  readonly status: LakeStatus;
  /** Externally visible value; undefined unless status is fresh */
  readonly value?: number;
  readonly lastUpdateSuccess: boolean;
  readonly lastError?: string;
  readonly checkedAt: Date;
}

/**
 * Per-lake view for the sensor layer and the CLI
 */
export interface LakeStatusReport {
  readonly entityId: string;
  readonly name: string;
  readonly sourceType: SourceType;
  readonly url?: string;
  readonly state: LakeState;
  readonly dataTimestamp?: string;
  readonly attribution: string;
}
