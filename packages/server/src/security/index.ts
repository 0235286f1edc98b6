/**
 * Access Control Pipeline
 *
 * Public API for the decision, enforcement and remediation modules.
 */

// Types
export {
  Decision,
  EnforcementStatus,
  CloudProvider,
  type AccessRequest,
  type Policy,
  type PolicySet,
  type BusinessHours,
  type TrustConfig,
  type PolicySnapshot,
  type ContextVerdict,
  type ActionVerdict,
  type DecisionResult,
  type EnforcementOutcome,
} from './types.js';

// Errors
export { ZtGateError, ConfigError, MalformedRequestError, AdapterFailure, AuditWriteError } from './errors.js';

// Schemas
export {
  DEFAULT_TRUSTED_NETWORK_PREFIXES,
  DEFAULT_TRUSTED_DEVICES,
  DEFAULT_BUSINESS_HOURS,
  businessHoursSchema,
  trustConfigSchema,
  policySchema,
  policyDocumentSchema,
  normalizePolicyDocument,
  type PolicyDocumentInput,
  type PolicyDocument,
} from './schemas.js';

// Policy
export * from './policy/index.js';

// Context
export {
  ContextReason,
  isTrustedNetwork,
  isWithinBusinessHours,
  isTrustedDevice,
  evaluateContext,
} from './context/evaluator.js';

// Decision
export {
  DEFAULT_POLICY_REASON,
  evaluateAction,
  combine,
  combineVerdicts,
  decide,
  PolicyDecisionPoint,
} from './decision/pdp.js';

// Remediation
export * from './remediation/index.js';

// Enforcement
export * from './enforcement/index.js';
