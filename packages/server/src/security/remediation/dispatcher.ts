/**
 * Auto-Remediation Dispatcher
 *
 * Turns a DENY or REVIEW decision into remediation actions and records one
 * REMEDIATION event per call. Adapter failures become action strings and
 * never propagate. A failed audit write is reported in the result together
 * with the actions that were already taken.
 */

import type { Logger } from 'pino';
import { EventType } from '@ztgate/shared';
import type { EventRecorder } from '../../monitoring/types.js';
import { AdapterFailure, AuditWriteError, ZtGateError } from '../errors.js';
import { Decision } from '../types.js';
import { createLogger } from '../../utils/logger.js';
import { resolveCloudProvider, type CloudAdapter } from './adapters.js';
import type { CloudAdapterRegistry } from './registry.js';

export const ARM_MODULE = 'ARM';

export interface RemediationRequest {
  user: string;
  resource: string;
  decision: Decision;
  reason: string;
  /** Cloud label; matched against aws, azure, gcp by substring */
  cloud: string;
}

export interface RemediationResult {
  actions: string[];
  /** False when the REMEDIATION event could not be written to the audit log */
  recorded: boolean;
}

/**
 * Anything the enforcement point can hand a non-ALLOW decision to.
 */
export interface Remediator {
  remediate(request: RemediationRequest): Promise<RemediationResult>;
}

export interface RemediationDispatcherOptions {
  registry: CloudAdapterRegistry;
  recorder: EventRecorder;
  /** Upper bound on one adapter call */
  adapterTimeoutMs?: number;
}

const DEFAULT_ADAPTER_TIMEOUT_MS = 5000;

export class RemediationDispatcher implements Remediator {
  private readonly logger: Logger;
  private readonly registry: CloudAdapterRegistry;
  private readonly recorder: EventRecorder;
  private readonly adapterTimeoutMs: number;

  constructor(options: RemediationDispatcherOptions) {
    this.logger = createLogger('arm');
    this.registry = options.registry;
    this.recorder = options.recorder;
    this.adapterTimeoutMs = options.adapterTimeoutMs ?? DEFAULT_ADAPTER_TIMEOUT_MS;
  }

  /**
   * @throws ZtGateError for an ALLOW decision
   */
  async remediate(request: RemediationRequest): Promise<RemediationResult> {
    if (request.decision === Decision.ALLOW) {
      throw new ZtGateError('REMEDIATION_NOT_APPLICABLE', 'Remediation requested for an ALLOW decision');
    }

    const actions: string[] = [];

    if (request.decision === Decision.DENY) {
      const provider = resolveCloudProvider(request.cloud);
      const adapter = provider ? this.registry.get(provider) : undefined;
      if (adapter) {
        actions.push(await this.revoke(adapter, request.user));
      } else {
        this.logger.warn({ cloud: request.cloud, user: request.user }, 'No cloud adapter for remediation');
      }
    } else {
      actions.push(
        `Admin review needed for ${request.user} on ${request.resource}: ${request.reason}`
      );
    }

    try {
      await this.recorder.recordEvent({
        module: ARM_MODULE,
        eventType: EventType.REMEDIATION,
        user: request.user,
        resource: request.resource,
        cloud: request.cloud,
        decision: request.decision,
        reason: request.reason,
        actionsTaken: actions,
      });
    } catch (error) {
      if (!(error instanceof AuditWriteError)) {
        throw error;
      }
      this.logger.error(
        { error, user: request.user, cloud: request.cloud, actions },
        'Remediation taken but not recorded'
      );
      return { actions, recorded: false };
    }

    this.logger.info(
      { user: request.user, cloud: request.cloud, decision: request.decision, actions },
      'Remediation dispatched'
    );

    return { actions, recorded: true };
  }

  private async revoke(adapter: CloudAdapter, user: string): Promise<string> {
    try {
      return await this.callWithTimeout(adapter, user);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error({ error, cloud: adapter.cloud, adapter: adapter.name, user }, 'Cloud adapter failed');
      return `${adapter.cloud} remediation failed: ${message}`;
    }
  }

  private async callWithTimeout(adapter: CloudAdapter, user: string): Promise<string> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const failure = new AdapterFailure(adapter.cloud, `timed out after ${this.adapterTimeoutMs}ms`);
        controller.abort(failure);
        reject(failure);
      }, this.adapterTimeoutMs);
    });

    try {
      return await Promise.race([adapter.revokeAccess(user, controller.signal), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
