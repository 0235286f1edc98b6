/**
 * Policy Enforcement Point
 *
 * Validates the request, asks the PDP for a decision, hands non-ALLOW
 * decisions to remediation and records exactly one ACCESS_REQUEST event.
 * Remediation and monitoring failures are logged and never change the
 * outcome returned to the caller.
 */

import type { Logger } from 'pino';
import { EventType } from '@ztgate/shared';
import type { EventRecorder } from '../../monitoring/types.js';
import type { PolicyDecisionPoint } from '../decision/pdp.js';
import type { RemediationResult, Remediator } from '../remediation/dispatcher.js';
import {
  type CloudProvider,
  Decision,
  EnforcementStatus,
  type AccessRequest,
  type EnforcementOutcome,
} from '../types.js';
import { createLogger } from '../../utils/logger.js';
import { classifyResource } from './cloud.js';
import { createAccessRequest, type AccessRequestInput } from './request.js';

export const PEP_MODULE = 'PEP';

export interface PolicyEnforcementPointOptions {
  pdp: PolicyDecisionPoint;
  remediator: Remediator;
  recorder: EventRecorder;
  /** Remediation calls per request when the remediation audit write fails */
  remediationAttempts?: number;
  /** Clock used to stamp requests that carry no time */
  now?: () => Date;
}

export function enforcementStatusFor(decision: Decision): EnforcementStatus {
  switch (decision) {
    case Decision.ALLOW:
      return EnforcementStatus.PERMITTED;
    case Decision.REVIEW:
      return EnforcementStatus.PENDING_REVIEW;
    case Decision.DENY:
      return EnforcementStatus.BLOCKED;
  }
}

export class PolicyEnforcementPoint {
  private readonly logger: Logger;
  private readonly pdp: PolicyDecisionPoint;
  private readonly remediator: Remediator;
  private readonly recorder: EventRecorder;
  private readonly remediationAttempts: number;
  private readonly now: () => Date;

  constructor(options: PolicyEnforcementPointOptions) {
    this.logger = createLogger('pep');
    this.pdp = options.pdp;
    this.remediator = options.remediator;
    this.recorder = options.recorder;
    this.remediationAttempts = Math.max(1, options.remediationAttempts ?? 2);
    this.now = options.now ?? (() => new Date());
  }

  /**
   * @throws MalformedRequestError before any decision is made
   * @throws ConfigError when no policy is loaded
   */
  async enforce(input: AccessRequestInput): Promise<EnforcementOutcome> {
    const request = createAccessRequest(input, this.now);
    const result = this.pdp.decide(request);
    const cloud = classifyResource(request.resource);
    const enforcement = enforcementStatusFor(result.decision);

    this.logger.info(
      { user: request.user, action: request.action, resource: request.resource, decision: result.decision, enforcement },
      'Access decision'
    );

    const remediation =
      result.decision === Decision.ALLOW
        ? null
        : await this.remediate(request, result.decision, result.reason, cloud);
    const remediationActions = remediation ? remediation.actions : [];

    try {
      await this.recorder.recordEvent({
        module: PEP_MODULE,
        eventType: EventType.ACCESS_REQUEST,
        user: request.user,
        resource: request.resource,
        cloud,
        decision: result.decision,
        reason: result.reason,
        actionsTaken: remediationActions,
        details: {
          action: request.action,
          sourceIP: request.sourceIP,
          deviceId: request.deviceId,
          requestTime: request.requestTime.toISOString(),
          enforcement,
          contextDecision: result.context.decision,
          contextReason: result.context.reason,
          actionDecision: result.action.decision,
          actionReason: result.action.reason,
          policyId: result.action.policyId,
          policyHash: result.policy.hash,
          policyVersion: result.policy.version,
          ...(remediation && { remediationRecorded: remediation.recorded }),
        },
      });
    } catch (error) {
      this.logger.error({ error, user: request.user, resource: request.resource }, 'Failed to record access request');
    }

    return Object.freeze({
      request,
      decision: result.decision,
      reason: result.reason,
      cloud,
      enforcement,
      remediationActions: Object.freeze(remediationActions),
    });
  }

  /**
   * Dispatch remediation, calling again while its audit write keeps failing.
   * Adapters are idempotent, so a repeated revocation is harmless. The
   * actions of the last call are reported even when none was recorded.
   */
  private async remediate(
    request: AccessRequest,
    decision: Decision,
    reason: string,
    cloud: CloudProvider
  ): Promise<RemediationResult> {
    let result: RemediationResult = { actions: [], recorded: false };

    for (let attempt = 1; attempt <= this.remediationAttempts; attempt++) {
      try {
        result = await this.remediator.remediate({
          user: request.user,
          resource: request.resource,
          decision,
          reason,
          cloud,
        });
      } catch (error) {
        this.logger.error({ error, attempt, user: request.user, cloud }, 'Remediation failed');
        return { actions: [], recorded: false };
      }

      if (result.recorded) {
        return result;
      }
      if (attempt < this.remediationAttempts) {
        this.logger.warn({ attempt, user: request.user }, 'Remediation audit write failed, retrying');
      }
    }

    this.logger.error(
      { user: request.user, cloud, actions: result.actions, attempts: this.remediationAttempts },
      'Remediation could not be recorded in the audit log'
    );
    return result;
  }
}
