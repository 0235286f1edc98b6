/**
 * Central Monitor Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { appendFile, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { EventType } from '@ztgate/shared';
import { CentralMonitor, type AuditFailureAlarm } from '../src/monitoring/monitor.js';
import { replayMetrics, totalDecisions, metricsEqual } from '../src/monitoring/metrics.js';
import { AuditWriteError, ZtGateError } from '../src/security/errors.js';
import { Decision } from '../src/security/types.js';
import type { EventLogEntryInput } from '../src/monitoring/types.js';
import { MemoryEventSink, MemoryMetricsStore, createTempDir, removeTempDir } from './helpers.js';

function accessEvent(decision: Decision, cloud = 'AWS', user = 'alice'): EventLogEntryInput {
  return {
    module: 'PEP',
    eventType: EventType.ACCESS_REQUEST,
    user,
    resource: 'arn:aws:s3:::data',
    cloud,
    decision,
    reason: 'test',
  };
}

function remediationEvent(user = 'alice'): EventLogEntryInput {
  return {
    module: 'ARM',
    eventType: EventType.REMEDIATION,
    user,
    resource: 'arn:aws:s3:::data',
    cloud: 'AWS',
    decision: Decision.DENY,
    reason: 'test',
    actionsTaken: ['revoked'],
  };
}

describe('CentralMonitor', () => {
  describe('with in-memory storage', () => {
    let sink: MemoryEventSink;
    let metricsStore: MemoryMetricsStore;
    let monitor: CentralMonitor;

    beforeEach(async () => {
      sink = new MemoryEventSink();
      metricsStore = new MemoryMetricsStore();
      monitor = new CentralMonitor({ sink, metricsStore, maxAttempts: 3, retryBackoffMs: 0 });
      await monitor.init();
    });

    it('should assign an id and timestamp to each entry', async () => {
      const entry = await monitor.recordEvent(accessEvent(Decision.ALLOW));

      expect(entry.id).toMatch(/^[A-Za-z0-9_-]{21}$/);
      expect(Number.isNaN(Date.parse(entry.timestamp))).toBe(false);
      expect(entry.actionsTaken).toEqual([]);
      expect(entry.details).toEqual({});
      expect(sink.entries).toEqual([entry]);
    });

    it('should count decisions and clouds on access requests only', async () => {
      await monitor.recordEvent(accessEvent(Decision.ALLOW, 'AWS'));
      await monitor.recordEvent(accessEvent(Decision.DENY, 'GCP'));
      await monitor.recordEvent(remediationEvent());
      await monitor.recordEvent(accessEvent(Decision.REVIEW, 'AWS'));

      const metrics = monitor.snapshot();
      expect(metrics.totalEvents).toBe(4);
      expect(metrics.totalAccessRequests).toBe(3);
      expect(metrics.totalRemediations).toBe(1);
      expect(metrics.decisions).toEqual({ ALLOW: 1, DENY: 1, REVIEW: 1 });
      expect(metrics.requestsByCloud).toEqual({ AWS: 2, GCP: 1 });
      expect(metrics.eventsByType).toEqual({ ACCESS_REQUEST: 3, REMEDIATION: 1 });
      expect(totalDecisions(metrics)).toBe(metrics.totalAccessRequests);
    });

    it('should reject an access request without a decision', async () => {
      const { decision: _decision, ...input } = accessEvent(Decision.ALLOW);
      await expect(monitor.recordEvent(input)).rejects.toBeInstanceOf(ZtGateError);
      expect(sink.entries).toHaveLength(0);
    });

    it('should return snapshots that do not alias live state', async () => {
      await monitor.recordEvent(accessEvent(Decision.ALLOW));
      const first = monitor.snapshot();
      first.decisions.ALLOW = 99;
      first.requestsByCloud['AWS'] = 99;

      const second = monitor.snapshot();
      expect(second.decisions.ALLOW).toBe(1);
      expect(second.requestsByCloud['AWS']).toBe(1);
    });

    it('should match a replay of the log after concurrent writes', async () => {
      await Promise.all(
        Array.from({ length: 25 }, (_, i) =>
          monitor.recordEvent(accessEvent(i % 3 === 0 ? Decision.DENY : Decision.ALLOW, i % 2 ? 'AWS' : 'Azure', `u${i}`))
        )
      );

      expect(sink.entries).toHaveLength(25);
      expect(metricsEqual(monitor.snapshot(), replayMetrics(sink.entries))).toBe(true);
      expect(totalDecisions(monitor.snapshot())).toBe(25);
    });

    it('should persist metrics after every event', async () => {
      await monitor.recordEvent(accessEvent(Decision.DENY));
      expect(metricsStore.saved?.decisions.DENY).toBe(1);
    });

    it('should keep recording when the metrics file cannot be written', async () => {
      metricsStore.failSaves = true;
      const entry = await monitor.recordEvent(accessEvent(Decision.ALLOW));

      expect(sink.entries).toEqual([entry]);
      expect(monitor.snapshot().totalEvents).toBe(1);
    });

    it('should retry a failed append', async () => {
      sink.failNext = 2;
      await monitor.recordEvent(accessEvent(Decision.ALLOW));

      expect(sink.appendCalls).toBe(3);
      expect(sink.entries).toHaveLength(1);
      expect(monitor.snapshot().totalEvents).toBe(1);
    });

    it('should raise an alarm and leave metrics untouched when retries run out', async () => {
      const onAlarm = vi.fn<(alarm: AuditFailureAlarm) => void>();
      monitor.on('auditFailure', onAlarm);
      sink.failNext = 3;

      await expect(monitor.recordEvent(accessEvent(Decision.DENY))).rejects.toBeInstanceOf(AuditWriteError);

      expect(sink.appendCalls).toBe(3);
      expect(onAlarm).toHaveBeenCalledTimes(1);
      expect(onAlarm.mock.calls[0]?.[0].error.attempts).toBe(3);
      expect(monitor.snapshot().totalEvents).toBe(0);
    });

    it('should keep serving writes after an audit failure', async () => {
      sink.failNext = 3;
      await expect(monitor.recordEvent(accessEvent(Decision.DENY))).rejects.toBeInstanceOf(AuditWriteError);

      await monitor.recordEvent(accessEvent(Decision.ALLOW));
      expect(monitor.snapshot().decisions).toEqual({ ALLOW: 1, DENY: 0, REVIEW: 0 });
    });

    it('should filter queried events', async () => {
      await monitor.recordEvent(accessEvent(Decision.ALLOW, 'AWS', 'alice'));
      await monitor.recordEvent(accessEvent(Decision.DENY, 'GCP', 'bob'));
      await monitor.recordEvent(remediationEvent('bob'));
      await monitor.recordEvent(accessEvent(Decision.DENY, 'AWS', 'carol'));

      expect((await monitor.queryEvents({ user: 'bob' })).map((e) => e.eventType)).toEqual([
        EventType.ACCESS_REQUEST,
        EventType.REMEDIATION,
      ]);
      expect((await monitor.queryEvents({ type: EventType.ACCESS_REQUEST, decision: Decision.DENY })).map((e) => e.user)).toEqual([
        'bob',
        'carol',
      ]);
      expect((await monitor.queryEvents({ cloud: 'aws' })).map((e) => e.user)).toEqual(['alice', 'bob', 'carol']);
      expect((await monitor.queryEvents({ limit: 1 })).map((e) => e.user)).toEqual(['carol']);
      expect(await monitor.queryEvents({ since: new Date(Date.now() + 60_000) })).toEqual([]);
    });

    it('should verify live and persisted metrics against the log', async () => {
      await monitor.recordEvent(accessEvent(Decision.ALLOW));
      await monitor.recordEvent(remediationEvent());

      const verification = await monitor.verify();
      expect(verification.consistent).toBe(true);
      expect(verification.replayed.totalEvents).toBe(2);
      expect(verification.persisted?.totalEvents).toBe(2);
    });

    it('should report drift between the metrics file and the log', async () => {
      await monitor.recordEvent(accessEvent(Decision.ALLOW));
      metricsStore.saved = replayMetrics([]);

      const verification = await monitor.verify();
      expect(verification.consistent).toBe(false);
    });
  });

  describe('with file storage', () => {
    let dataDir: string;

    beforeEach(async () => {
      dataDir = await createTempDir('ztgate-monitor-');
    });

    afterEach(async () => {
      await removeTempDir(dataDir);
    });

    it('should write one JSON line per event', async () => {
      const monitor = new CentralMonitor({ dataDir, retryBackoffMs: 0 });
      await monitor.init();
      await monitor.recordEvent(accessEvent(Decision.ALLOW));
      await monitor.recordEvent(remediationEvent());

      const lines = (await readFile(join(dataDir, 'events.jsonl'), 'utf-8')).trim().split('\n');
      expect(lines).toHaveLength(2);
      expect(JSON.parse(lines[0] ?? '')).toMatchObject({ eventType: 'ACCESS_REQUEST', decision: 'ALLOW', user: 'alice' });
      expect(JSON.parse(lines[1] ?? '')).toMatchObject({ eventType: 'REMEDIATION', actionsTaken: ['revoked'] });
    });

    it('should rebuild metrics from the log after a restart', async () => {
      const first = new CentralMonitor({ dataDir, retryBackoffMs: 0 });
      await first.init();
      await first.recordEvent(accessEvent(Decision.ALLOW));
      await first.recordEvent(accessEvent(Decision.DENY, 'GCP'));
      await first.recordEvent(remediationEvent());

      const second = new CentralMonitor({ dataDir, retryBackoffMs: 0 });
      const rebuilt = await second.init();

      expect(metricsEqual(rebuilt, first.snapshot())).toBe(true);
      expect(rebuilt.decisions).toEqual({ ALLOW: 1, DENY: 1, REVIEW: 0 });

      const persisted = JSON.parse(await readFile(join(dataDir, 'metrics.json'), 'utf-8'));
      expect(persisted.totalEvents).toBe(3);
    });

    it('should skip a torn line when replaying', async () => {
      const first = new CentralMonitor({ dataDir, retryBackoffMs: 0 });
      await first.init();
      await first.recordEvent(accessEvent(Decision.ALLOW));
      await appendFile(join(dataDir, 'events.jsonl'), '{"id":"torn","timest');

      const second = new CentralMonitor({ dataDir, retryBackoffMs: 0 });
      const rebuilt = await second.init();
      const verification = await second.verify();

      expect(rebuilt.totalEvents).toBe(1);
      expect(verification.malformedLines).toEqual([2]);
    });

    it('should keep the log replayable when recording after a torn line', async () => {
      const first = new CentralMonitor({ dataDir, retryBackoffMs: 0 });
      await first.init();
      await first.recordEvent(accessEvent(Decision.ALLOW));
      await appendFile(join(dataDir, 'events.jsonl'), '{"id":"torn","timest');

      const second = new CentralMonitor({ dataDir, retryBackoffMs: 0 });
      await second.init();
      await second.recordEvent(accessEvent(Decision.DENY));
      const verification = await second.verify();

      expect(verification.consistent).toBe(true);
      expect(verification.replayed.totalEvents).toBe(2);
      expect(verification.replayed.decisions).toEqual({ ALLOW: 1, DENY: 1, REVIEW: 0 });
      expect(verification.malformedLines).toEqual([2]);
    });
  });
});
