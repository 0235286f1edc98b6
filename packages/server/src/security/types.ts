/**
 * Access Control Pipeline - Core Types
 *
 * Type definitions for access requests, policies, trust configuration,
 * verdicts and enforcement outcomes.
 */

import type { CloudProvider, Decision, EnforcementStatus } from '@ztgate/shared';

export { Decision, EnforcementStatus, CloudProvider } from '@ztgate/shared';

// ============================================================================
// Access Request
// ============================================================================

/**
 * A single inbound access request. Frozen once constructed.
 */
export interface AccessRequest {
  readonly user: string;
  readonly action: string;
  /** URI-like resource identifier (ARN, Azure resource id, GCP resource name) */
  readonly resource: string;
  readonly sourceIP: string;
  readonly deviceId: string;
  readonly requestTime: Date;
}

// ============================================================================
// Policy
// ============================================================================

/**
 * Action-based policy. The first policy whose `matchActions` covers the
 * request action decides.
 */
export interface Policy {
  id: string;
  /** Exact action names, `*`, or prefix wildcards such as `s3:*` */
  matchActions: string[];
  decision: Decision;
  description: string;
}

/**
 * Ordered policies plus the decision used when none matches.
 */
export interface PolicySet {
  policies: Policy[];
  defaultDecision: Decision;
}

// ============================================================================
// Trust Configuration
// ============================================================================

/**
 * Hour-of-day window, half-open: `startHour` is inside, `endHour` is not.
 */
export interface BusinessHours {
  startHour: number;
  endHour: number;
}

/**
 * Static signals the context evaluator checks requests against.
 */
export interface TrustConfig {
  trustedNetworkPrefixes: string[];
  trustedDevices: string[];
  businessHours: BusinessHours;
}

// ============================================================================
// Policy Snapshot
// ============================================================================

/**
 * A fully parsed policy document. The policy store swaps whole snapshots,
 * so readers never observe a partial update.
 */
export interface PolicySnapshot {
  name: string;
  version: string;
  policySet: PolicySet;
  trust: TrustConfig;
  /** File path or 'inline' */
  source: string;
  /** SHA-256 of the canonical parsed document, for audit comparison */
  hash: string;
  loadedAt: Date;
}

// ============================================================================
// Verdicts
// ============================================================================

export interface ContextVerdict {
  decision: Decision;
  reason: string;
}

export interface ActionVerdict {
  decision: Decision;
  reason: string;
  /** Matching policy, or null when the default decision applied */
  policyId: string | null;
}

/**
 * Combined result of context and action evaluation.
 */
export interface DecisionResult {
  decision: Decision;
  reason: string;
  context: ContextVerdict;
  action: ActionVerdict;
}

// ============================================================================
// Enforcement Outcome
// ============================================================================

/**
 * Final result of one pass through the pipeline. Forwarded to monitoring
 * and returned to the caller; not retained.
 */
export interface EnforcementOutcome {
  readonly request: AccessRequest;
  readonly decision: Decision;
  readonly reason: string;
  readonly cloud: CloudProvider;
  readonly enforcement: EnforcementStatus;
  readonly remediationActions: readonly string[];
}
