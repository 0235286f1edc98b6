/**
 * CLI Command Tests
 *
 * Runs the commander program against a temporary data directory.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { createProgram } from '../src/control-plane/cli.js';
import { resetConfig } from '../src/config/index.js';
import { FIXTURES_DIR, at, createTempDir, removeTempDir } from './helpers.js';

function run(...args: string[]): Promise<unknown> {
  return createProgram().parseAsync(['node', 'ztgate', ...args]);
}

describe('CLI', () => {
  let dataDir: string;

  const printed = (): string[] => vi.mocked(console.log).mock.calls.map((call) => String(call[0]));
  const lastJson = (): unknown => JSON.parse(printed().at(-1) ?? 'null');

  beforeEach(async () => {
    dataDir = await createTempDir('ztgate-cli-');
    vi.stubEnv('ZTGATE_DATA_DIR', dataDir);
    vi.stubEnv('ZTGATE_POLICY_PATH', join(FIXTURES_DIR, 'policies.yaml'));
    vi.stubEnv('ZTGATE_AUDIT_RETRY_BACKOFF_MS', '0');
    vi.stubEnv('NO_COLOR', '1');
    resetConfig();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    resetConfig();
    process.exitCode = undefined;
    await removeTempDir(dataDir);
  });

  const enforceAlice = () =>
    run(
      'enforce',
      'alice',
      's3:GetObject',
      'arn:aws:s3:::finance-data',
      '192.168.1.12',
      'device-laptop-001',
      '--time',
      at(10).toISOString(),
      '--json'
    );

  const enforceEve = () =>
    run(
      'enforce',
      'eve',
      's3:ListBucket',
      'arn:aws:s3:::finance-data',
      '8.8.8.8',
      'device-laptop-001',
      '--time',
      at(10).toISOString(),
      '--json'
    );

  describe('enforce', () => {
    it('should allow a trusted request', async () => {
      await enforceAlice();

      expect(lastJson()).toEqual({
        decision: 'ALLOW',
        reason: 'context validated',
        cloud: 'AWS',
        enforcement: 'PERMITTED',
        remediationActions: [],
      });
      expect(process.exitCode).toBeUndefined();
    });

    it('should deny an untrusted network and report the revocation', async () => {
      await enforceEve();

      expect(lastJson()).toEqual({
        decision: 'DENY',
        reason: 'untrusted network source',
        cloud: 'AWS',
        enforcement: 'BLOCKED',
        remediationActions: ['Removed eve from SensitiveAccess group in AWS (mock)'],
      });

      const lines = (await readFile(join(dataDir, 'events.jsonl'), 'utf-8')).trim().split('\n');
      expect(lines.map((line) => JSON.parse(line).eventType)).toEqual(['POLICY_LOADED', 'REMEDIATION', 'ACCESS_REQUEST']);
    });

    it('should reject a blank argument without recording a decision', async () => {
      await run('enforce', ' ', 's3:GetObject', 'arn:aws:s3:::finance-data', '192.168.1.12', 'device-laptop-001');

      expect(process.exitCode).toBe(1);
      expect(console.error).toHaveBeenCalledWith('✗ Validation failed:\n  • user: user is required');
      expect(console.log).not.toHaveBeenCalled();
    });

    it('should reject an unparsable --time', async () => {
      await run(
        'enforce',
        'alice',
        's3:GetObject',
        'arn:aws:s3:::finance-data',
        '192.168.1.12',
        'device-laptop-001',
        '--time',
        'not-a-date'
      );

      expect(process.exitCode).toBe(1);
      expect(console.error).toHaveBeenCalledTimes(1);
      expect(console.log).not.toHaveBeenCalled();
    });
  });

  describe('metrics', () => {
    it('should rebuild counters from the log', async () => {
      await enforceAlice();
      await enforceEve();

      await run('metrics', '--json');

      expect(lastJson()).toMatchObject({
        totalAccessRequests: 2,
        totalRemediations: 1,
        decisions: { ALLOW: 1, DENY: 1, REVIEW: 0 },
        requestsByCloud: { AWS: 2 },
      });
    });
  });

  describe('events', () => {
    it('should filter by type and user', async () => {
      await enforceAlice();
      await enforceEve();

      await run('events', '--type', 'ACCESS_REQUEST', '--user', 'eve', '--json');

      const events = lastJson();
      expect(Array.isArray(events)).toBe(true);
      expect(events).toHaveLength(1);
      expect(events).toMatchObject([{ user: 'eve', decision: 'DENY', module: 'PEP' }]);
    });

    it('should reject an invalid limit', async () => {
      await run('events', '--limit', '0');

      expect(process.exitCode).toBe(1);
      expect(console.log).not.toHaveBeenCalled();
    });
  });

  describe('verify', () => {
    it('should pass when the metrics file matches the log', async () => {
      await enforceEve();

      await run('verify', '--json');

      expect(lastJson()).toMatchObject({ consistent: true, live: null, malformedLines: [] });
      expect(process.exitCode).toBeUndefined();
    });

    it('should fail when the metrics file has drifted from the log', async () => {
      await enforceEve();
      const metricsPath = join(dataDir, 'metrics.json');
      const metrics = JSON.parse(await readFile(metricsPath, 'utf-8'));
      metrics.totalEvents += 5;
      await writeFile(metricsPath, JSON.stringify(metrics), 'utf-8');

      await run('verify', '--json');

      expect(lastJson()).toMatchObject({ consistent: false });
      expect(process.exitCode).toBe(1);
    });
  });
});
