/**
 * Dataset Coordinator
 *
 * One instance per bulk dataset, shared by every lake of that source type.
 * Each tick downloads the dataset once, parses it once into a keyed
 * snapshot and fans the matching reading out to every registered lake.
 *
 * SCHEDULING:
 * - Interval = min(scanInterval) over registered lakes (1800 s when empty)
 * - A trigger while a download is running joins it (single-flight)
 * - Failures stretch the next delay only; nothing is retried within a tick:
 *   - 429: Retry-After seconds (300 when absent)
 *   - 404: base × 1.2^attempts, capped at 1800 s
 *   - other: base × 2^attempts, capped at 3600 s
 *   - attempts are capped at 8 and the delay never drops below base
 *
 * The User-Agent of the first lake ever registered is used for every
 * download; later registrations do not change it.
 */

import type { Clock } from '../core/clock.js';
import { systemClock } from '../core/clock.js';
import {
  BACKOFF_CAP_SECONDS,
  BACKOFF_MAX_ATTEMPTS,
  DEFAULT_RETRY_AFTER_SECONDS,
  DEFAULT_SCAN_INTERVAL_SECONDS,
  NOT_FOUND_BACKOFF_CAP_SECONDS,
  NOT_FOUND_BACKOFF_FACTOR,
} from '../core/constants.js';
import { FetchError, LakeTempError, toError } from '../core/errors.js';
import type { RefreshHealth } from '../core/staleness.js';
import { deriveLakeState } from '../core/staleness.js';
import type { DatasetSnapshot, DatasetType, LakeConfig, LakeState, TemperatureReading } from '../core/types.js';
import type { Logger } from '../core/utils/logger.js';
import { createLogger } from '../core/utils/logger.js';
import { FetchClient } from '../http/fetch-client.js';
import { PARSERS } from '../parsers/index.js';
import type { ReadingParser } from '../parsers/types.js';
import type { DatasetDefinition } from './datasets.js';
import { DATASETS } from './datasets.js';
import { FixedDelayTimer } from './timer.js';
import type { Coordinator, CoordinatorDeps } from './types.js';

interface Member {
  readonly lake: LakeConfig;
  reading?: TemperatureReading;
  health: RefreshHealth;
  /** Set while the lake is absent from the latest snapshot */
  missing: boolean;
}

export interface BackoffState {
  readonly attempts: number;
  /** Active override of the scheduling interval, in seconds */
  readonly overrideSeconds?: number;
}

export interface SnapshotSummary {
  readonly fetchedAt: Date;
  readonly byteSize: number;
  readonly entryCount: number;
  readonly lakesUpdated: number;
}

/**
 * Lakes hold their own copy of a reading, never a reference into a snapshot
 */
function copyReading(reading: TemperatureReading): TemperatureReading {
  return {
    value: reading.value,
    observedAt: new Date(reading.observedAt.getTime()),
    sourceStationKey: reading.sourceStationKey,
    source: reading.source,
    ...(reading.labels ? { labels: [...reading.labels] } : {}),
  };
}

export class DatasetCoordinator implements Coordinator {
  readonly sourceType: DatasetType;
  readonly definition: DatasetDefinition;
  private readonly deps: CoordinatorDeps;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly timer: FixedDelayTimer;
  private readonly parse: ReadingParser;
  private readonly members = new Map<string, Member>();
  private userAgent?: string;
  private client?: FetchClient;
  private attempts = 0;
  private overrideSeconds?: number;
  private summary?: SnapshotSummary;
  private started = false;
  /** Bumped when downloads are cancelled; a tick from an older run is not a failure */
  private runId = 0;

  constructor(definition: DatasetDefinition | DatasetType, deps: CoordinatorDeps) {
    this.definition = typeof definition === 'string' ? DATASETS[definition] : definition;
    this.sourceType = this.definition.type;
    this.deps = deps;
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? createLogger({ module: `dataset:${this.sourceType}` });
    this.parse = (deps.parsers ?? PARSERS)[this.sourceType];
    this.timer = new FixedDelayTimer(
      () => this.tick(),
      () => this.nextDelaySeconds() * 1000,
      this.clock,
      this.logger
    );
  }

  // ============================================================================
  // Membership
  // ============================================================================

  /**
   * Add a lake, or replace its configuration if already registered.
   * The lake's reading and health survive re-registration.
   */
  registerLake(lake: LakeConfig): void {
    if (lake.source.type !== this.sourceType) {
      throw new LakeTempError(
        'SOURCE_MISMATCH',
        `Lake '${lake.entityId}' has source '${lake.source.type}', not '${this.sourceType}'`
      );
    }

    if (this.userAgent === undefined) {
      this.userAgent = lake.userAgent;
    }

    const existing = this.members.get(lake.entityId);
    this.members.set(lake.entityId, {
      lake,
      reading: existing?.reading,
      health: existing?.health ?? { lastUpdateSuccess: false },
      missing: existing?.missing ?? false,
    });

    this.logger.debug('Lake registered', {
      dataset: this.sourceType,
      entityId: lake.entityId,
      members: this.members.size,
      intervalSeconds: this.effectiveIntervalSeconds(),
    });

    if (this.started) {
      if (this.timer.isActive) {
        this.timer.rearm();
      } else {
        this.timer.start(0);
      }
    }
  }

  /**
   * Remove a lake; unknown ids are ignored. With no members left the timer
   * stops and the client is closed.
   */
  unregisterLake(entityId: string): void {
    if (!this.members.delete(entityId)) {
      return;
    }

    if (this.members.size === 0) {
      this.runId++;
      this.timer.stop();
      this.client?.close();
      this.client = undefined;
      this.logger.debug('Last lake unregistered; dataset idle', { dataset: this.sourceType });
      return;
    }

    this.logger.debug('Lake unregistered', {
      dataset: this.sourceType,
      entityId,
      members: this.members.size,
      intervalSeconds: this.effectiveIntervalSeconds(),
    });
    if (this.started) {
      this.timer.rearm();
    }
  }

  entityIds(): string[] {
    return [...this.members.keys()];
  }

  get memberCount(): number {
    return this.members.size;
  }

  /** User-Agent frozen at the first registration */
  get frozenUserAgent(): string | undefined {
    return this.userAgent;
  }

  // ============================================================================
  // Scheduling
  // ============================================================================

  /**
   * Minimum scanInterval over members, ignoring any backoff
   */
  effectiveIntervalSeconds(): number {
    let min: number | undefined;
    for (const { lake } of this.members.values()) {
      min = min === undefined ? lake.scanInterval : Math.min(min, lake.scanInterval);
    }
    return min ?? DEFAULT_SCAN_INTERVAL_SECONDS;
  }

  /**
   * Delay before the next tick, including any backoff override
   */
  nextDelaySeconds(): number {
    return this.overrideSeconds ?? this.effectiveIntervalSeconds();
  }

  get backoff(): BackoffState {
    return { attempts: this.attempts, overrideSeconds: this.overrideSeconds };
  }

  get lastSnapshot(): SnapshotSummary | undefined {
    return this.summary;
  }

  start(): void {
    this.started = true;
    if (this.members.size > 0) {
      this.timer.start(0);
    }
  }

  stop(): void {
    this.started = false;
    this.runId++;
    this.timer.stop();
    this.client?.close();
    this.client = undefined;
  }

  /**
   * Download now, or join the download already in flight
   */
  refresh(): Promise<void> {
    return this.timer.runNow();
  }

  getState(entityId: string): LakeState | undefined {
    const member = this.members.get(entityId);
    if (!member) {
      return undefined;
    }
    return deriveLakeState(member.reading, new Date(this.clock.now()), member.lake.timeoutHours, member.health);
  }

  // ============================================================================
  // Refresh
  // ============================================================================

  private ensureClient(): FetchClient {
    if (!this.client || this.client.isClosed) {
      this.client = new FetchClient(
        {
          userAgent: this.userAgent ?? '',
          accept: this.definition.accept,
          timeoutMs: this.deps.requestTimeoutMs,
        },
        {
          rateLimiter: this.deps.rateLimiter,
          fetchImpl: this.deps.fetchImpl,
          clock: this.clock,
          logger: this.logger,
        }
      );
    }
    return this.client;
  }

  private async download(): Promise<DatasetSnapshot> {
    const result = await this.ensureClient().fetch(this.definition.url);
    const readings = this.parse({ bytes: result.bytes, contentType: result.contentType }, { logger: this.logger });

    const entries = new Map<string, TemperatureReading>();
    for (const reading of readings) {
      entries.set(reading.sourceStationKey, reading);
    }
    return { fetchedAt: new Date(this.clock.now()), byteSize: result.byteLength, entries };
  }

  private async tick(): Promise<void> {
    if (this.members.size === 0) {
      return;
    }

    const runId = this.runId;
    let snapshot: DatasetSnapshot;
    try {
      snapshot = await this.download();
    } catch (error) {
      this.handleFailure(toError(error), runId !== this.runId);
      return;
    }

    this.attempts = 0;
    this.overrideSeconds = undefined;
    const lakesUpdated = this.fanOut(snapshot);

    this.summary = {
      fetchedAt: snapshot.fetchedAt,
      byteSize: snapshot.byteSize,
      entryCount: snapshot.entries.size,
      lakesUpdated,
    };
    this.logger.debug('Dataset refreshed', {
      dataset: this.sourceType,
      bytesDownloaded: snapshot.byteSize,
      entries: snapshot.entries.size,
      lakesUpdated,
      intervalSeconds: this.effectiveIntervalSeconds(),
    });
  }

  private fanOut(snapshot: DatasetSnapshot): number {
    let updated = 0;
    for (const [entityId, member] of this.members) {
      const match = this.definition.match(member.lake, snapshot);

      if (!match) {
        const key = this.definition.expectedKey(member.lake);
        member.missing = true;
        member.health = {
          lastUpdateSuccess: false,
          lastError: `No entry for '${key}' in latest ${this.sourceType} data`,
        };
        this.logger.warn('Dataset missing lake in latest data', {
          dataset: this.sourceType,
          entityId,
          name: member.lake.name,
          key,
        });
        continue;
      }

      if (member.missing) {
        this.logger.info('Lake available again in dataset', {
          dataset: this.sourceType,
          entityId,
          key: match.sourceStationKey,
        });
      }
      member.missing = false;
      member.reading = copyReading(match);
      member.health = { lastUpdateSuccess: true };
      updated++;
    }
    return updated;
  }

  private handleFailure(error: Error, cancelled: boolean): void {
    if (cancelled && error instanceof FetchError && error.kind === 'aborted') {
      this.logger.debug('Dataset refresh cancelled by shutdown', { dataset: this.sourceType });
      return;
    }

    const base = this.effectiveIntervalSeconds();
    if (error instanceof FetchError && error.kind === 'http_status' && error.status === 429) {
      this.applyRetryAfter(error.retryAfterSeconds ?? DEFAULT_RETRY_AFTER_SECONDS);
    } else if (error instanceof FetchError && error.kind === 'http_status' && error.status === 404) {
      this.applyBackoff(base, NOT_FOUND_BACKOFF_FACTOR, NOT_FOUND_BACKOFF_CAP_SECONDS);
    } else {
      this.applyBackoff(base, 2, BACKOFF_CAP_SECONDS);
    }

    for (const member of this.members.values()) {
      member.health = { lastUpdateSuccess: false, lastError: error.message };
    }

    this.logger.error('Dataset refresh failed', {
      dataset: this.sourceType,
      url: this.definition.url,
      error: error.message,
      attempts: this.attempts,
      nextDelaySeconds: this.nextDelaySeconds(),
    });
  }

  private applyBackoff(baseSeconds: number, factor: number, capSeconds: number): void {
    this.attempts = Math.min(this.attempts + 1, BACKOFF_MAX_ATTEMPTS);
    const next = Math.floor(Math.min(capSeconds, baseSeconds * factor ** this.attempts));
    this.overrideSeconds = Math.max(baseSeconds, next);
  }

  private applyRetryAfter(seconds: number): void {
    this.overrideSeconds = Math.max(1, Math.floor(seconds));
  }
}
