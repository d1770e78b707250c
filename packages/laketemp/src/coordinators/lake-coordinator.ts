/**
 * Per-Lake Coordinator
 *
 * Owns the schedule, fetch client and cached reading of one GKD Bayern lake.
 *
 * PHASES: idle → fetching → ready | error → idle, once per tick. The outcome
 * of the last tick stays readable through `lastOutcome`. A failed tick keeps
 * the previous reading; staleness still applies.
 */

import type { Clock } from '../core/clock.js';
import { systemClock } from '../core/clock.js';
import { FetchError, toError } from '../core/errors.js';
import type { RefreshHealth } from '../core/staleness.js';
import { deriveLakeState } from '../core/staleness.js';
import type { LakeState, PerLakeConfig, TemperatureReading } from '../core/types.js';
import type { Logger } from '../core/utils/logger.js';
import { createLogger } from '../core/utils/logger.js';
import { FetchClient } from '../http/fetch-client.js';
import { toTableUrl } from '../parsers/gkd-bayern.js';
import { PARSERS } from '../parsers/index.js';
import type { ReadingParser } from '../parsers/types.js';
import { FixedDelayTimer } from './timer.js';
import type { Coordinator, CoordinatorDeps } from './types.js';

export type LakePhase = 'idle' | 'fetching' | 'ready' | 'error';
export type TickOutcome = 'ready' | 'error';

const HTML_ACCEPT = 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.8';

export class LakeCoordinator implements Coordinator {
  readonly sourceType = 'gkd_bayern' as const;
  readonly lake: PerLakeConfig;
  private readonly deps: CoordinatorDeps;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly timer: FixedDelayTimer;
  private readonly parse: ReadingParser;
  private client?: FetchClient;
  private reading?: TemperatureReading;
  private health: RefreshHealth = { lastUpdateSuccess: false };
  private currentPhase: LakePhase = 'idle';
  private outcome?: TickOutcome;
  /** Bumped by stop(); a tick from an older run is cancelled, not failed */
  private runId = 0;

  constructor(lake: PerLakeConfig, deps: CoordinatorDeps) {
    this.lake = lake;
    this.deps = deps;
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? createLogger({ module: `lake:${lake.entityId}` });
    this.parse = (deps.parsers ?? PARSERS)[this.sourceType];
    this.timer = new FixedDelayTimer(
      () => this.tick(),
      () => this.lake.scanInterval * 1000,
      this.clock,
      this.logger
    );
  }

  get phase(): LakePhase {
    return this.currentPhase;
  }

  get lastOutcome(): TickOutcome | undefined {
    return this.outcome;
  }

  get tableUrl(): string {
    return toTableUrl(this.lake.url);
  }

  entityIds(): string[] {
    return [this.lake.entityId];
  }

  start(): void {
    this.timer.start(0);
  }

  stop(): void {
    this.runId++;
    this.timer.stop();
    this.client?.close();
    this.client = undefined;
  }

  refresh(): Promise<void> {
    return this.timer.runNow();
  }

  getState(entityId: string = this.lake.entityId): LakeState | undefined {
    if (entityId !== this.lake.entityId) {
      return undefined;
    }
    return deriveLakeState(this.reading, new Date(this.clock.now()), this.lake.timeoutHours, this.health);
  }

  private ensureClient(): FetchClient {
    if (!this.client || this.client.isClosed) {
      this.client = new FetchClient(
        {
          userAgent: this.lake.userAgent,
          accept: HTML_ACCEPT,
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

  private async tick(): Promise<void> {
    const url = this.tableUrl;
    const runId = this.runId;
    this.currentPhase = 'fetching';

    try {
      const result = await this.ensureClient().fetch(url);
      const [reading] = this.parse(
        { bytes: result.bytes, contentType: result.contentType },
        {
          url: this.lake.url,
          stationId: this.lake.source.stationId,
          tableSelector: this.lake.source.tableSelector,
          logger: this.logger,
        }
      );
      if (!reading) {
        throw new Error('parser returned no reading');
      }

      this.reading = reading;
      this.health = { lastUpdateSuccess: true };
      this.currentPhase = 'ready';
      this.outcome = 'ready';
      this.logger.debug('Lake refreshed', {
        entityId: this.lake.entityId,
        value: reading.value,
        observedAt: reading.observedAt.toISOString(),
        status: this.getState()?.status,
      });
    } catch (error) {
      const err = toError(error);
      if (runId !== this.runId && err instanceof FetchError && err.kind === 'aborted') {
        this.logger.debug('Refresh cancelled by shutdown', { entityId: this.lake.entityId });
        return;
      }
      this.health = { lastUpdateSuccess: false, lastError: err.message };
      this.currentPhase = 'error';
      this.outcome = 'error';
      this.logger.error('Lake refresh failed', {
        entityId: this.lake.entityId,
        url,
        error: err.message,
        retainedReading: this.reading !== undefined,
      });
    } finally {
      this.currentPhase = 'idle';
    }
  }
}
