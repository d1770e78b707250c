/**
 * Per-Lake Coordinator Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { LakeCoordinator } from '../../../coordinators/lake-coordinator.js';
import { MS_PER_HOUR } from '../../../core/staleness.js';
import type { PerLakeConfig, TemperatureReading } from '../../../core/types.js';
import { PARSERS } from '../../../parsers/index.js';
import type { ParseHints, ParsePayload } from '../../../parsers/types.js';
import { DomainRateLimiter } from '../../../resilience/rate-limiter.js';
import { ManualClock, RecordingLogger, createFetchStub, createHangingFetch, textResponse } from '../../utils/mocks.js';
import { FIXTURE_NOW, GKD_PAGE_URL, GKD_TABLE_URL, createPortalFetch } from '../../utils/portals.js';

const CHIEMSEE: PerLakeConfig = {
  name: 'Chiemsee / Stock',
  entityId: 'chiemsee',
  url: GKD_PAGE_URL,
  scanInterval: 1800,
  timeoutHours: 24,
  userAgent: 'test-agent/1.0',
  source: { type: 'gkd_bayern' },
};

describe('LakeCoordinator', () => {
  let clock: ManualClock;
  let logger: RecordingLogger;
  let rateLimiter: DomainRateLimiter;

  beforeEach(() => {
    clock = new ManualClock(FIXTURE_NOW);
    logger = new RecordingLogger();
    rateLimiter = new DomainRateLimiter({ minSpacingMs: 0 }, { clock, logger });
  });

  function createCoordinator(fetchImpl: typeof fetch, lake: PerLakeConfig = CHIEMSEE): LakeCoordinator {
    return new LakeCoordinator(lake, { rateLimiter, clock, logger, fetchImpl });
  }

  describe('Refresh', () => {
    it('should fetch the table view and cache the latest reading', async () => {
      const fetchImpl = createPortalFetch();
      const coordinator = createCoordinator(fetchImpl);

      await coordinator.refresh();

      expect(fetchImpl).toHaveBeenCalledTimes(1);
      expect(fetchImpl.mock.calls[0]?.[0]).toBe(GKD_TABLE_URL);
      const state = coordinator.getState();
      expect(state?.status).toBe('fresh');
      expect(state?.value).toBe(14.3);
      expect(state?.lastUpdateSuccess).toBe(true);
      expect(state?.reading?.sourceStationKey).toBe('18673955');
      expect(coordinator.phase).toBe('idle');
      expect(coordinator.lastOutcome).toBe('ready');
    });

    it('should pass source options to the parser', async () => {
      const coordinator = createCoordinator(createPortalFetch(), {
        ...CHIEMSEE,
        source: { type: 'gkd_bayern', stationId: 'stock', tableSelector: '#messwerte' },
      });

      await coordinator.refresh();

      expect(coordinator.getState()?.reading?.sourceStationKey).toBe('stock');
    });

    it('should parse with the parser registered for its source type', async () => {
      const parse = vi.fn(
        (_payload: ParsePayload, _hints?: ParseHints): TemperatureReading[] => [
          { value: 9.5, observedAt: new Date(FIXTURE_NOW), sourceStationKey: 'stub', source: 'gkd_bayern' },
        ]
      );
      const coordinator = new LakeCoordinator(CHIEMSEE, {
        rateLimiter,
        clock,
        logger,
        fetchImpl: createPortalFetch(),
        parsers: { ...PARSERS, gkd_bayern: parse },
      });

      await coordinator.refresh();

      expect(parse).toHaveBeenCalledTimes(1);
      expect(parse.mock.calls[0]?.[1]).toMatchObject({ url: GKD_PAGE_URL, logger });
      expect(coordinator.getState()?.value).toBe(9.5);
    });

    it('should keep the last reading when a refresh fails', async () => {
      let failing = false;
      const portal = createPortalFetch();
      const fetchImpl = createFetchStub((url) =>
        failing ? textResponse('oops', { status: 500, statusText: 'Internal Server Error' }) : portal(url)
      );
      const coordinator = createCoordinator(fetchImpl);
      await coordinator.refresh();

      failing = true;
      await coordinator.refresh();

      const state = coordinator.getState();
      expect(state?.status).toBe('fresh');
      expect(state?.value).toBe(14.3);
      expect(state?.lastUpdateSuccess).toBe(false);
      expect(state?.lastError).toBe(`Fetch http_status for ${GKD_TABLE_URL}: HTTP 500 Internal Server Error`);
      expect(coordinator.phase).toBe('idle');
      expect(coordinator.lastOutcome).toBe('error');
      expect(logger.at('error')).toEqual([
        {
          level: 'error',
          message: 'Lake refresh failed',
          metadata: {
            entityId: 'chiemsee',
            url: GKD_TABLE_URL,
            error: `Fetch http_status for ${GKD_TABLE_URL}: HTTP 500 Internal Server Error`,
            retainedReading: true,
          },
        },
      ]);
    });

    it('should report parse failures without a reading', async () => {
      const fetchImpl = createFetchStub(() => textResponse('<html><body>Wartung</body></html>'));
      const coordinator = createCoordinator(fetchImpl);

      await coordinator.refresh();

      const state = coordinator.getState();
      expect(state?.status).toBe('error');
      expect(state?.reading).toBeUndefined();
      expect(state?.lastError).toBe('gkd_bayern payload could not be parsed: no <table> elements found');
    });
  });

  describe('Staleness', () => {
    it('should hide the value once the reading is older than timeoutHours', async () => {
      const coordinator = createCoordinator(createPortalFetch());
      await coordinator.refresh();

      // Reading observed at 10:00Z, clock at 12:00Z
      await clock.advance(22 * MS_PER_HOUR);
      expect(coordinator.getState()?.status).toBe('fresh');

      await clock.advance(1);
      const state = coordinator.getState();
      expect(state?.status).toBe('stale');
      expect(state?.value).toBeUndefined();
      expect(state?.reading?.value).toBe(14.3);
    });

    it('should report error before the first reading', () => {
      const state = createCoordinator(createPortalFetch()).getState();

      expect(state?.status).toBe('error');
      expect(state?.lastUpdateSuccess).toBe(false);
    });

    it('should not answer for other entity ids', () => {
      expect(createCoordinator(createPortalFetch()).getState('mondsee')).toBeUndefined();
    });
  });

  describe('Scheduling', () => {
    it('should refresh on start and then every scanInterval', async () => {
      const fetchImpl = createPortalFetch();
      const coordinator = createCoordinator(fetchImpl);
      coordinator.start();

      await clock.advance(0);
      expect(fetchImpl).toHaveBeenCalledTimes(1);

      await clock.advance(1800 * 1000 - 1);
      expect(fetchImpl).toHaveBeenCalledTimes(1);

      await clock.advance(1);
      expect(fetchImpl).toHaveBeenCalledTimes(2);
      coordinator.stop();
    });

    it('should cancel an in-flight fetch on stop without logging an error', async () => {
      const coordinator = createCoordinator(createHangingFetch());
      coordinator.start();
      await clock.advance(0);
      expect(coordinator.phase).toBe('fetching');

      coordinator.stop();
      await clock.advance(0);

      expect(coordinator.phase).toBe('idle');
      expect(logger.messages('error')).toEqual([]);
      expect(logger.messages('debug')).toContain('Refresh cancelled by shutdown');
      expect(clock.pendingTimers).toBe(0);
    });

    it('should restart right after a stop without reporting the aborted tick as failed', async () => {
      const fetchImpl = createHangingFetch();
      const coordinator = createCoordinator(fetchImpl);
      coordinator.start();
      await clock.advance(0);

      coordinator.stop();
      coordinator.start();
      await clock.advance(0);
      await clock.advance(0);

      expect(fetchImpl).toHaveBeenCalledTimes(2);
      expect(coordinator.phase).toBe('fetching');
      expect(coordinator.getState()?.lastError).toBeUndefined();
      expect(logger.messages('error')).toEqual([]);
      expect(logger.messages('debug')).toContain('Refresh cancelled by shutdown');
      coordinator.stop();
      await clock.advance(0);
    });
  });
});
