import type { Clock } from '../core/clock.js';
import type { LakeState, SourceType } from '../core/types.js';
import type { Logger } from '../core/utils/logger.js';
import type { ParserRegistry } from '../parsers/types.js';
import type { DomainRateLimiter } from '../resilience/rate-limiter.js';

/**
 * Collaborators injected into every coordinator by the registry
 */
export interface CoordinatorDeps {
  readonly rateLimiter: DomainRateLimiter;
  readonly clock?: Clock;
  readonly logger?: Logger;
  readonly fetchImpl?: typeof fetch;
  readonly requestTimeoutMs?: number;
  /** Parser per source type; PARSERS when absent */
  readonly parsers?: ParserRegistry;
}

/**
 * Common surface of per-lake and dataset coordinators
 */
export interface Coordinator {
  readonly sourceType: SourceType;
  /** Entity ids whose state this coordinator owns */
  entityIds(): string[];
  start(): void;
  stop(): void;
  /** Run one tick now (joining one in flight) */
  refresh(): Promise<void>;
  getState(entityId: string): LakeState | undefined;
}
