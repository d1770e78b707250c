/**
 * Shared defaults and upstream endpoints
 */

export const DEFAULT_SCAN_INTERVAL_SECONDS = 1800;
export const MIN_SCAN_INTERVAL_SECONDS = 60;
export const MAX_SCAN_INTERVAL_SECONDS = 24 * 60 * 60;

export const DEFAULT_TIMEOUT_HOURS = 24;
export const MIN_TIMEOUT_HOURS = 1;
export const MAX_TIMEOUT_HOURS = 24 * 14;

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 ' +
  '(KHTML, like Gecko) Chrome/124.0 Safari/537.36';

export const DEFAULT_REQUEST_TIMEOUT_MS = 20_000;

/** Rate limiter defaults applied per upstream host */
export const DEFAULT_MAX_CONCURRENT_PER_DOMAIN = 2;
export const DEFAULT_MIN_SPACING_MS = 250;

/** Plausible water temperature range in °C; values outside are dropped */
export const PLAUSIBLE_MIN_CELSIUS = -5;
export const PLAUSIBLE_MAX_CELSIUS = 45;

export const GKD_BAYERN_TIME_ZONE = 'Europe/Berlin';
export const SALZBURG_OGD_TIME_ZONE = 'Europe/Vienna';

export const HYDRO_OOE_EXPORT_URL = 'https://data.ooe.gv.at/files/hydro/HDOOE_Export_WT.zrxp';
export const SALZBURG_OGD_SEEN_URL =
  'https://www.salzburg.gv.at/ogd/56c28e2d-8b9e-41ba-b7d6-fa4896b5b48b/Hydrografie%20Seen.txt';

/** Upstream back-pressure for dataset downloads */
export const BACKOFF_MAX_ATTEMPTS = 8;
export const BACKOFF_CAP_SECONDS = 3600;
export const NOT_FOUND_BACKOFF_FACTOR = 1.2;
export const NOT_FOUND_BACKOFF_CAP_SECONDS = 1800;
export const DEFAULT_RETRY_AFTER_SECONDS = 300;

export const ATTRIBUTION = 'Data courtesy of public hydrology portals';
