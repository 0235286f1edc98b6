/**
 * Access request and decision types for ZTGate.
 */

import { z } from 'zod';

/**
 * Tri-state access decision. Strictness order is DENY > REVIEW > ALLOW.
 */
export const Decision = {
  ALLOW: 'ALLOW',
  DENY: 'DENY',
  REVIEW: 'REVIEW',
} as const;

export type Decision = (typeof Decision)[keyof typeof Decision];

/**
 * Accepts decisions in any letter case (`allow`, `Deny`) and normalises them.
 */
export const decisionSchema = z.preprocess(
  (value) => (typeof value === 'string' ? value.trim().toUpperCase() : value),
  z.enum([Decision.ALLOW, Decision.DENY, Decision.REVIEW])
);

/**
 * How the enforcement point treated the request.
 * - PERMITTED: the request proceeds
 * - BLOCKED: the request is refused
 * - PENDING_REVIEW: held for manual inspection, not completed
 */
export const EnforcementStatus = {
  PERMITTED: 'PERMITTED',
  BLOCKED: 'BLOCKED',
  PENDING_REVIEW: 'PENDING_REVIEW',
} as const;

export type EnforcementStatus = (typeof EnforcementStatus)[keyof typeof EnforcementStatus];

/**
 * Clouds a resource identifier can be attributed to.
 */
export const CloudProvider = {
  AWS: 'AWS',
  AZURE: 'Azure',
  GCP: 'GCP',
} as const;

export type CloudProvider = (typeof CloudProvider)[keyof typeof CloudProvider];

const requiredField = (name: string) =>
  z
    .string({ required_error: `${name} is required`, invalid_type_error: `${name} must be a string` })
    .trim()
    .min(1, `${name} is required`);

// Access Request Body
// The request time is stamped by the server; a client-supplied one is dropped.
export const accessRequestBodySchema = z.object({
  user: requiredField('user'),
  action: requiredField('action'),
  resource: requiredField('resource'),
  sourceIP: requiredField('sourceIP'),
  deviceId: requiredField('deviceId'),
});

export type AccessRequestBody = z.infer<typeof accessRequestBodySchema>;

// Access Decision Response
export interface AccessDecisionResponse {
  decision: Decision;
  reason: string;
  cloud: CloudProvider;
  enforcement: EnforcementStatus;
  remediationActions: string[];
}
