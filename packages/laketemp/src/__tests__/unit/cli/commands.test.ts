/**
 * CLI Command Tests
 *
 * Commands run against fixture configs and the in-process portal stub.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { CommandContext } from '../../../cli/commands.js';
import { EXIT_CODES, onceCommand, runCommand, validateCommand } from '../../../cli/commands.js';
import { fixturePath } from '../../utils/fixtures.js';
import { ManualClock, RecordingLogger, createFetchStub, textResponse } from '../../utils/mocks.js';
import { FIXTURE_NOW, createPortalFetch } from '../../utils/portals.js';

const VALID = fixturePath('config/valid.yaml');

describe('CLI commands', () => {
  let stdout: string[];
  let stderr: string[];
  let ctx: CommandContext;

  beforeEach(() => {
    stdout = [];
    stderr = [];
    ctx = {
      env: {},
      fetchImpl: createPortalFetch(),
      clock: new ManualClock(FIXTURE_NOW),
      logger: new RecordingLogger(),
      stdout: (text) => stdout.push(text),
      stderr: (text) => stderr.push(text),
    };
  });

  describe('validate', () => {
    it('should summarize a valid configuration', () => {
      expect(validateCommand({ config: VALID }, ctx)).toBe(EXIT_CODES.SUCCESS);
      expect(stdout).toEqual(['Configuration OK: 3 lake(s) (gkd_bayern: 1, hydro_ooe: 1, salzburg_ogd: 1)']);
    });

    it('should read the path from LAKETEMP_CONFIG', () => {
      expect(validateCommand({}, { ...ctx, env: { LAKETEMP_CONFIG: VALID } })).toBe(EXIT_CODES.SUCCESS);
    });

    it('should print validation errors and exit with CONFIG_ERROR', () => {
      const path = fixturePath('config/invalid.yaml');

      expect(validateCommand({ config: path }, ctx)).toBe(EXIT_CODES.CONFIG_ERROR);
      expect(stdout).toEqual([]);
      expect(stderr[0]).toContain(`Invalid configuration in ${path}:`);
    });

    it('should report a missing file', () => {
      const path = fixturePath('config/absent.yaml');

      expect(validateCommand({ config: path }, ctx)).toBe(EXIT_CODES.CONFIG_ERROR);
      expect(stderr).toEqual([`Config file not found: ${path}`]);
    });
  });

  describe('once', () => {
    it('should refresh every lake and print a table', async () => {
      expect(await onceCommand({ config: VALID }, ctx)).toBe(EXIT_CODES.SUCCESS);

      const lines = stdout[0]?.split('\n') ?? [];
      expect(lines).toHaveLength(5);
      expect(lines[2]).toContain('14.3 °C');
    });

    it('should print JSON when asked', async () => {
      await onceCommand({ config: VALID, json: true }, ctx);

      const parsed: unknown = JSON.parse(stdout[0] ?? '[]');
      expect(parsed).toEqual([
        expect.objectContaining({ entity_id: 'chiemsee', status: 'fresh', value: 14.3 }),
        expect.objectContaining({ entity_id: 'mondsee', status: 'fresh', value: 14.3 }),
        expect.objectContaining({ entity_id: 'fuschlsee', status: 'fresh', value: 14.3 }),
      ]);
    });

    it('should exit with NO_FRESH_DATA when every source fails', async () => {
      const failing = createFetchStub(() => textResponse('down', { status: 503, statusText: 'Service Unavailable' }));

      expect(await onceCommand({ config: VALID }, { ...ctx, fetchImpl: failing })).toBe(EXIT_CODES.NO_FRESH_DATA);
      expect(stdout[0]).toContain('failed');
    });
  });

  describe('run', () => {
    it('should start the registry until stopped', () => {
      const service = runCommand({ config: VALID, reportIntervalSeconds: 3600 }, ctx);
      if (typeof service === 'number') {
        throw new Error(`expected a running service, got exit code ${service}`);
      }

      expect(service.registry.isStarted).toBe(true);
      service.stop();
      expect(service.registry.isStarted).toBe(false);
    });

    it('should return CONFIG_ERROR for an invalid configuration', () => {
      expect(runCommand({ config: fixturePath('config/invalid.yaml'), reportIntervalSeconds: 60 }, ctx)).toBe(
        EXIT_CODES.CONFIG_ERROR
      );
    });
  });
});
