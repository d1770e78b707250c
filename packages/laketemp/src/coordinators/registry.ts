/**
 * Coordinator Registry
 *
 * Builds and owns every coordinator for a set of lakes: one
 * DatasetCoordinator per dataset type in use, one LakeCoordinator per
 * per-lake source. All of them share one rate limiter, clock and logger.
 */

import type { Clock } from '../core/clock.js';
import { systemClock } from '../core/clock.js';
import { ATTRIBUTION } from '../core/constants.js';
import { ConfigValidationError, LakeTempError, UnknownLakeError } from '../core/errors.js';
import type { DatasetType, LakeConfig, LakeState, LakeStatusReport } from '../core/types.js';
import { isDatasetType, isPerLakeConfig } from '../core/types.js';
import type { Logger } from '../core/utils/logger.js';
import { createLogger } from '../core/utils/logger.js';
import type { ParserRegistry } from '../parsers/types.js';
import type { DomainRateLimiter, RateLimiterConfig } from '../resilience/rate-limiter.js';
import { createDomainRateLimiter } from '../resilience/rate-limiter.js';
import { DatasetCoordinator } from './dataset-coordinator.js';
import { LakeCoordinator } from './lake-coordinator.js';
import type { Coordinator, CoordinatorDeps } from './types.js';

export interface RegistryDeps {
  /** Shared limiter; built from `rateLimit` when absent */
  readonly rateLimiter?: DomainRateLimiter;
  readonly rateLimit?: Partial<RateLimiterConfig>;
  readonly clock?: Clock;
  readonly logger?: Logger;
  readonly fetchImpl?: typeof fetch;
  readonly requestTimeoutMs?: number;
  readonly parsers?: ParserRegistry;
}

export class CoordinatorRegistry {
  private readonly rateLimiter: DomainRateLimiter;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly injectedLogger?: Logger;
  private readonly fetchImpl?: typeof fetch;
  private readonly requestTimeoutMs?: number;
  private readonly parsers?: ParserRegistry;
  private readonly lakes = new Map<string, LakeConfig>();
  private readonly owners = new Map<string, Coordinator>();
  private readonly perLake = new Map<string, LakeCoordinator>();
  private readonly datasets = new Map<DatasetType, DatasetCoordinator>();
  private started = false;

  private constructor(deps: RegistryDeps) {
    this.clock = deps.clock ?? systemClock;
    this.injectedLogger = deps.logger;
    this.logger = deps.logger ?? createLogger({ module: 'registry' });
    this.rateLimiter =
      deps.rateLimiter ?? createDomainRateLimiter(deps.rateLimit, { clock: this.clock, logger: deps.logger });
    this.fetchImpl = deps.fetchImpl;
    this.requestTimeoutMs = deps.requestTimeoutMs;
    this.parsers = deps.parsers;
  }

  /**
   * @throws ConfigValidationError when entity ids repeat
   */
  static fromConfigs(lakes: readonly LakeConfig[], deps: RegistryDeps = {}): CoordinatorRegistry {
    const seen = new Set<string>();
    const duplicates = new Set<string>();
    for (const lake of lakes) {
      if (seen.has(lake.entityId)) {
        duplicates.add(lake.entityId);
      }
      seen.add(lake.entityId);
    }
    if (duplicates.size > 0) {
      throw new ConfigValidationError([...duplicates].map((id) => `lakes: duplicate entity_id '${id}'`));
    }

    const registry = new CoordinatorRegistry(deps);
    for (const lake of lakes) {
      registry.addLake(lake);
    }
    return registry;
  }

  get isStarted(): boolean {
    return this.started;
  }

  /**
   * Arm every coordinator; first ticks fire immediately
   */
  start(): void {
    if (this.started) {
      return;
    }
    this.started = true;
    for (const coordinator of this.coordinators()) {
      coordinator.start();
    }
    this.logger.info('Registry started', {
      lakes: this.lakes.size,
      coordinators: this.coordinators().length,
    });
  }

  /**
   * Disarm timers, abort in-flight fetches and close clients
   */
  stop(): void {
    for (const coordinator of this.coordinators()) {
      coordinator.stop();
    }
    if (this.started) {
      this.logger.info('Registry stopped');
    }
    this.started = false;
  }

  /**
   * Run one tick on every coordinator and wait for all of them
   */
  async refreshAll(): Promise<void> {
    await Promise.all(this.coordinators().map((coordinator) => coordinator.refresh()));
  }

  /**
   * Cached state of one lake; never fetches
   *
   * @throws UnknownLakeError
   */
  getState(entityId: string): LakeState {
    const state = this.owners.get(entityId)?.getState(entityId);
    if (!state) {
      throw new UnknownLakeError(entityId);
    }
    return state;
  }

  getStatusReports(): LakeStatusReport[] {
    return [...this.lakes.values()].map((lake) => {
      const state = this.getState(lake.entityId);
      return {
        entityId: lake.entityId,
        name: lake.name,
        sourceType: lake.source.type,
        url: lake.url ?? this.datasetFor(lake)?.definition.url,
        state,
        dataTimestamp: state.reading?.observedAt.toISOString(),
        attribution: ATTRIBUTION,
      };
    });
  }

  lakeConfigs(): LakeConfig[] {
    return [...this.lakes.values()];
  }

  /**
   * Register a lake at runtime; its coordinator starts if the registry has
   *
   * @throws LakeTempError when the entity id is taken or a per-lake source has no URL
   */
  addLake(lake: LakeConfig): void {
    if (this.lakes.has(lake.entityId)) {
      throw new LakeTempError('DUPLICATE_LAKE', `Lake '${lake.entityId}' is already registered`);
    }

    const sourceType = lake.source.type;
    if (isDatasetType(sourceType)) {
      let coordinator = this.datasets.get(sourceType);
      if (!coordinator) {
        coordinator = new DatasetCoordinator(sourceType, this.coordinatorDeps(`dataset:${sourceType}`));
        this.datasets.set(sourceType, coordinator);
        this.logger.info('Created dataset coordinator', { dataset: sourceType });
        if (this.started) {
          coordinator.start();
        }
      }
      coordinator.registerLake(lake);
      this.owners.set(lake.entityId, coordinator);
    } else {
      if (!isPerLakeConfig(lake)) {
        throw new LakeTempError('MISSING_URL', `Lake '${lake.entityId}' (gkd_bayern) requires a url`);
      }
      const coordinator = new LakeCoordinator(lake, this.coordinatorDeps(`lake:${lake.entityId}`));
      this.perLake.set(lake.entityId, coordinator);
      this.owners.set(lake.entityId, coordinator);
      this.logger.info('Created lake coordinator', { entityId: lake.entityId, url: coordinator.tableUrl });
      if (this.started) {
        coordinator.start();
      }
    }

    this.lakes.set(lake.entityId, lake);
  }

  /**
   * Unregister a lake; unknown ids are ignored
   */
  removeLake(entityId: string): void {
    const lake = this.lakes.get(entityId);
    if (!lake) {
      return;
    }
    this.lakes.delete(entityId);
    this.owners.delete(entityId);

    const perLake = this.perLake.get(entityId);
    if (perLake) {
      perLake.stop();
      this.perLake.delete(entityId);
    } else {
      this.datasetFor(lake)?.unregisterLake(entityId);
    }
    this.logger.info('Removed lake', { entityId });
  }

  private datasetFor(lake: LakeConfig): DatasetCoordinator | undefined {
    const type = lake.source.type;
    return isDatasetType(type) ? this.datasets.get(type) : undefined;
  }

  private coordinators(): Coordinator[] {
    return [...this.datasets.values(), ...this.perLake.values()];
  }

  private coordinatorDeps(module: string): CoordinatorDeps {
    return {
      rateLimiter: this.rateLimiter,
      clock: this.clock,
      logger: this.injectedLogger ?? createLogger({ module }),
      fetchImpl: this.fetchImpl,
      requestTimeoutMs: this.requestTimeoutMs,
      parsers: this.parsers,
    };
  }
}
