/**
 * Auto-Remediation Dispatcher Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { EventType, type EventLogEntry } from '@ztgate/shared';
import {
  AwsStubAdapter,
  resolveCloudProvider,
  type CloudAdapter,
} from '../src/security/remediation/adapters.js';
import { CloudAdapterRegistry, createDefaultAdapterRegistry } from '../src/security/remediation/registry.js';
import { RemediationDispatcher } from '../src/security/remediation/dispatcher.js';
import { AuditWriteError, ZtGateError } from '../src/security/errors.js';
import type { EventLogEntryInput, EventRecorder } from '../src/monitoring/types.js';
import { CloudProvider, Decision } from '../src/security/types.js';

class RecordingRecorder implements EventRecorder {
  readonly inputs: EventLogEntryInput[] = [];
  fail = false;

  async recordEvent(input: EventLogEntryInput): Promise<EventLogEntry> {
    if (this.fail) {
      throw new AuditWriteError(3, new Error('disk full'));
    }
    this.inputs.push(input);
    return {
      id: `evt-${this.inputs.length}`,
      timestamp: new Date(0).toISOString(),
      module: input.module,
      eventType: input.eventType,
      user: input.user,
      resource: input.resource,
      cloud: input.cloud,
      actionsTaken: input.actionsTaken ?? [],
      details: input.details ?? {},
    };
  }
}

describe('resolveCloudProvider', () => {
  it('should match labels by case-insensitive substring', () => {
    expect(resolveCloudProvider('AWS')).toBe(CloudProvider.AWS);
    expect(resolveCloudProvider('aws-govcloud')).toBe(CloudProvider.AWS);
    expect(resolveCloudProvider('Azure')).toBe(CloudProvider.AZURE);
    expect(resolveCloudProvider('GCP')).toBe(CloudProvider.GCP);
    expect(resolveCloudProvider('oracle')).toBeNull();
  });
});

describe('CloudAdapterRegistry', () => {
  it('should carry a stub for every cloud by default', () => {
    const registry = createDefaultAdapterRegistry();
    expect(registry.all().map((a) => a.cloud)).toEqual([CloudProvider.AWS, CloudProvider.AZURE, CloudProvider.GCP]);
  });

  it('should replace an adapter registered for the same cloud', () => {
    const registry = new CloudAdapterRegistry();
    const replacement: CloudAdapter = {
      cloud: CloudProvider.AWS,
      name: 'aws-custom',
      revokeAccess: async (user) => `custom ${user}`,
    };
    registry.register(new AwsStubAdapter());
    registry.register(replacement);

    expect(registry.get(CloudProvider.AWS)).toBe(replacement);
    expect(registry.all()).toHaveLength(1);
  });
});

describe('RemediationDispatcher', () => {
  let recorder: RecordingRecorder;
  let dispatcher: RemediationDispatcher;

  beforeEach(() => {
    recorder = new RecordingRecorder();
    dispatcher = new RemediationDispatcher({
      registry: createDefaultAdapterRegistry(),
      recorder,
      adapterTimeoutMs: 100,
    });
  });

  const deny = (cloud: string) => ({
    user: 'alice',
    resource: 'finance-data',
    decision: Decision.DENY,
    reason: 'untrusted network source',
    cloud,
  });

  it('should revoke access in AWS on DENY', async () => {
    const result = await dispatcher.remediate(deny('AWS'));
    expect(result).toEqual({
      actions: ['Removed alice from SensitiveAccess group in AWS (mock)'],
      recorded: true,
    });
  });

  it('should revoke access in Azure on DENY', async () => {
    expect((await dispatcher.remediate(deny('Azure'))).actions).toEqual(['Azure remediation triggered for alice']);
  });

  it('should revoke access in GCP on DENY', async () => {
    expect((await dispatcher.remediate(deny('gcp'))).actions).toEqual(['GCP remediation triggered for alice']);
  });

  it('should take no adapter action for an unknown cloud', async () => {
    expect(await dispatcher.remediate(deny('on-prem'))).toEqual({ actions: [], recorded: true });
    expect(recorder.inputs).toHaveLength(1);
    expect(recorder.inputs[0]?.actionsTaken).toEqual([]);
  });

  it('should request admin review on REVIEW', async () => {
    const { actions } = await dispatcher.remediate({
      user: 'carol',
      resource: 'arn:aws:s3:::reports',
      decision: Decision.REVIEW,
      reason: 'unrecognized device',
      cloud: 'AWS',
    });

    expect(actions).toEqual(['Admin review needed for carol on arn:aws:s3:::reports: unrecognized device']);
  });

  it('should record exactly one REMEDIATION event per call', async () => {
    await dispatcher.remediate(deny('AWS'));

    expect(recorder.inputs).toEqual([
      {
        module: 'ARM',
        eventType: EventType.REMEDIATION,
        user: 'alice',
        resource: 'finance-data',
        cloud: 'AWS',
        decision: Decision.DENY,
        reason: 'untrusted network source',
        actionsTaken: ['Removed alice from SensitiveAccess group in AWS (mock)'],
      },
    ]);
  });

  it('should turn an adapter error into a failure string', async () => {
    const registry = new CloudAdapterRegistry();
    registry.register({
      cloud: CloudProvider.AWS,
      name: 'aws-broken',
      revokeAccess: async () => {
        throw new Error('AccessDenied');
      },
    });
    const broken = new RemediationDispatcher({ registry, recorder });

    expect((await broken.remediate(deny('AWS'))).actions).toEqual(['AWS remediation failed: AccessDenied']);
  });

  it('should turn an adapter timeout into a failure string and abort the call', async () => {
    const signals: AbortSignal[] = [];
    const registry = new CloudAdapterRegistry();
    registry.register({
      cloud: CloudProvider.GCP,
      name: 'gcp-hanging',
      revokeAccess: (_user, signal) => {
        signals.push(signal);
        return new Promise<string>(() => undefined);
      },
    });
    const slow = new RemediationDispatcher({ registry, recorder, adapterTimeoutMs: 20 });

    const { actions } = await slow.remediate(deny('GCP'));

    expect(actions).toEqual(['GCP remediation failed: timed out after 20ms']);
    expect(signals[0]?.aborted).toBe(true);
  });

  it('should refuse an ALLOW decision', async () => {
    await expect(
      dispatcher.remediate({ ...deny('AWS'), decision: Decision.ALLOW })
    ).rejects.toBeInstanceOf(ZtGateError);
    expect(recorder.inputs).toHaveLength(0);
  });

  it('should report the actions taken when the audit write fails', async () => {
    recorder.fail = true;
    const revoke = vi.spyOn(AwsStubAdapter.prototype, 'revokeAccess');

    const result = await dispatcher.remediate(deny('AWS'));

    expect(result).toEqual({
      actions: ['Removed alice from SensitiveAccess group in AWS (mock)'],
      recorded: false,
    });
    expect(revoke).toHaveBeenCalledTimes(1);

    revoke.mockRestore();
  });
});
