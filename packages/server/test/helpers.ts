/**
 * Shared test helpers: temp directories, in-memory storage and fixed clocks.
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { EventLogEntry, MetricsState } from '@ztgate/shared';
import type { ZtGateConfig } from '../src/config/index.js';
import type { EventLogReadResult, EventSink, MetricsStore } from '../src/monitoring/types.js';
import { buildPolicySnapshot } from '../src/security/policy/loader.js';
import type { PolicySnapshot } from '../src/security/types.js';

export const FIXTURES_DIR = fileURLToPath(new URL('./fixtures', import.meta.url));

export async function createTempDir(prefix = 'ztgate-test-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * A local-time Date on a weekday at the given hour.
 */
export function at(hour: number, minute = 0): Date {
  return new Date(2026, 0, 5, hour, minute, 0, 0);
}

export function testConfig(dataDir: string, overrides: Partial<ZtGateConfig> = {}): ZtGateConfig {
  return {
    dataDir,
    policyPath: join(FIXTURES_DIR, 'policies.yaml'),
    port: 3001,
    host: '127.0.0.1',
    adapterTimeoutMs: 1000,
    remediationAttempts: 2,
    audit: { maxAttempts: 3, retryBackoffMs: 0 },
    ...overrides,
  };
}

/**
 * The fixture policy as an inline snapshot.
 */
export function testPolicy(): PolicySnapshot {
  return buildPolicySnapshot({
    name: 'test-policies',
    version: '2',
    defaultDecision: 'DENY',
    context: {
      trustedNetworkPrefixes: ['192.168.', '10.0.'],
      trustedDevices: ['device-laptop-001', 'device-admin-001'],
      businessHours: { startHour: 8, endHour: 20 },
    },
    policies: [
      { id: 'read-objects', matchActions: ['s3:GetObject'], decision: 'ALLOW', description: 'read access to objects' },
      { id: 'write-objects', matchActions: ['s3:PutObject'], decision: 'REVIEW', description: 'object writes require review' },
      { id: 'destructive', matchActions: ['s3:DeleteBucket'], decision: 'DENY', description: 'bucket deletion is denied' },
    ],
  });
}

/**
 * In-memory EventSink. `failNext` makes the next N appends throw.
 */
export class MemoryEventSink implements EventSink {
  readonly location = 'memory://events';
  readonly entries: EventLogEntry[] = [];
  appendCalls = 0;
  failNext = 0;

  async append(entry: EventLogEntry): Promise<void> {
    this.appendCalls++;
    if (this.failNext > 0) {
      this.failNext--;
      throw new Error('disk full');
    }
    this.entries.push(structuredClone(entry));
  }

  async read(): Promise<EventLogReadResult> {
    return { entries: this.entries.map((e) => structuredClone(e)), malformedLines: [] };
  }
}

/**
 * In-memory MetricsStore.
 */
export class MemoryMetricsStore implements MetricsStore {
  readonly location = 'memory://metrics';
  saved: MetricsState | null = null;
  saveCalls = 0;
  failSaves = false;

  async save(state: MetricsState): Promise<void> {
    this.saveCalls++;
    if (this.failSaves) {
      throw new Error('read-only file system');
    }
    this.saved = structuredClone(state);
  }

  async load(): Promise<MetricsState | null> {
    return this.saved ? structuredClone(this.saved) : null;
  }
}
