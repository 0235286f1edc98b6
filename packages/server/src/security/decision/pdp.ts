/**
 * Policy Decision Point
 *
 * Combines the context verdict with the action policy lookup into one
 * decision using deny-overrides. Everything here is pure: the only shared
 * state is the read-only policy snapshot.
 */

import { evaluateContext } from '../context/evaluator.js';
import { anyActionMatches } from '../policy/match.js';
import type { PolicyStore } from '../policy/store.js';
import {
  Decision,
  type AccessRequest,
  type ActionVerdict,
  type ContextVerdict,
  type DecisionResult,
  type PolicySet,
  type PolicySnapshot,
  type TrustConfig,
} from '../types.js';

export const DEFAULT_POLICY_REASON = 'no matching policy (default)';

/**
 * Look up the first policy (in document order) whose actions cover the
 * request action.
 */
export function evaluateAction(request: AccessRequest, policySet: PolicySet): ActionVerdict {
  for (const policy of policySet.policies) {
    if (anyActionMatches(policy.matchActions, request.action)) {
      return { decision: policy.decision, reason: policy.description, policyId: policy.id };
    }
  }
  return { decision: policySet.defaultDecision, reason: DEFAULT_POLICY_REASON, policyId: null };
}

/**
 * Deny-overrides combination.
 *
 * Not symmetric: context REVIEW with action ALLOW is REVIEW, while context
 * ALLOW with action REVIEW fails closed to DENY.
 */
export function combine(context: Decision, action: Decision): Decision {
  if (context === Decision.DENY || action === Decision.DENY) {
    return Decision.DENY;
  }
  if (context === Decision.REVIEW && action === Decision.ALLOW) {
    return Decision.REVIEW;
  }
  if (context === Decision.ALLOW && action === Decision.ALLOW) {
    return Decision.ALLOW;
  }
  return Decision.DENY;
}

/**
 * Combine two verdicts, keeping the reason of the side that determined the
 * result. The context reason wins when both sides agree with it.
 */
export function combineVerdicts(
  context: ContextVerdict,
  action: ActionVerdict
): { decision: Decision; reason: string } {
  const decision = combine(context.decision, action.decision);
  const reason = decision === context.decision ? context.reason : action.reason;
  return { decision, reason };
}

/**
 * Evaluate a request against a policy set and trust configuration.
 */
export function decide(request: AccessRequest, policySet: PolicySet, trust: TrustConfig): DecisionResult {
  const context = evaluateContext(request, trust);
  const action = evaluateAction(request, policySet);
  const { decision, reason } = combineVerdicts(context, action);
  return { decision, reason, context, action };
}

/**
 * Binds `decide` to the policy store's active snapshot.
 */
export class PolicyDecisionPoint {
  constructor(private readonly store: PolicyStore) {}

  /**
   * @throws ConfigError if no policy has been loaded
   */
  decide(request: AccessRequest): DecisionResult & { policy: PolicySnapshot } {
    const policy = this.store.current();
    return { ...decide(request, policy.policySet, policy.trust), policy };
  }
}
