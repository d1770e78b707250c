/**
 * laketemp: lake water temperature acquisition
 *
 * @packageDocumentation
 */

// Core
export type {
  SourceType,
  DatasetType,
  SourceConfig,
  GkdBayernSource,
  HydroOoeSource,
  SalzburgOgdSource,
  LakeConfig,
  PerLakeConfig,
  TemperatureReading,
  DatasetSnapshot,
  LakeStatus,
  LakeState,
  LakeStatusReport,
} from './core/types.js';
export { SOURCE_TYPES, isDatasetType, isPerLakeConfig } from './core/types.js';
export {
  LakeTempError,
  FetchError,
  ParseError,
  ConfigValidationError,
  UnknownLakeError,
  type FetchErrorKind,
} from './core/errors.js';
export { isStale, deriveLakeState, MS_PER_HOUR, type RefreshHealth } from './core/staleness.js';
export { systemClock, type Clock, type TimerHandle } from './core/clock.js';
export { logger, createLogger, parseLogLevel, type Logger, type LogLevel, type LogMetadata } from './core/utils/logger.js';
export { wallTimeToInstant, wallTimeAtOffset, type WallTime } from './core/utils/zoned-time.js';
export * as constants from './core/constants.js';

// Resilience + HTTP
export {
  DomainRateLimiter,
  createDomainRateLimiter,
  PermitAbortedError,
  domainOf,
  type Permit,
  type RateLimiterConfig,
  type DomainStats,
} from './resilience/rate-limiter.js';
export { FetchClient, parseRetryAfter, type FetchResult, type FetchClientConfig } from './http/fetch-client.js';

// Parsers
export * from './parsers/index.js';

// Coordinators
export { FixedDelayTimer } from './coordinators/timer.js';
export { LakeCoordinator, type LakePhase, type TickOutcome } from './coordinators/lake-coordinator.js';
export { DatasetCoordinator, type BackoffState, type SnapshotSummary } from './coordinators/dataset-coordinator.js';
export { DATASETS, HYDRO_OOE_DATASET, SALZBURG_OGD_DATASET, type DatasetDefinition } from './coordinators/datasets.js';
export { CoordinatorRegistry, type RegistryDeps } from './coordinators/registry.js';
export type { Coordinator, CoordinatorDeps } from './coordinators/types.js';

// Configuration
export {
  parseAppConfig,
  parseLakeConfig,
  loadConfigFile,
  resolveConfigPath,
  LakeEntrySchema,
  ConfigFileSchema,
  type AppConfig,
} from './config/lake-config.js';
