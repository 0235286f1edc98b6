/**
 * Access Control Pipeline - Zod Schemas
 *
 * Runtime validation for policy documents. Policy documents are read from
 * YAML or JSON and validated here before a snapshot is built.
 */

import { z } from 'zod';
import { Decision, decisionSchema } from '@ztgate/shared';

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_TRUSTED_NETWORK_PREFIXES = ['192.168.', '10.0.'];
export const DEFAULT_TRUSTED_DEVICES = ['device-laptop-001', 'device-admin-001'];
export const DEFAULT_BUSINESS_HOURS = { startHour: 8, endHour: 20 };

// ============================================================================
// Trust Config Schema
// ============================================================================

export const businessHoursSchema = z.object({
  startHour: z.number().int().min(0).max(23),
  endHour: z.number().int().min(0).max(24),
});

export const trustConfigSchema = z.object({
  trustedNetworkPrefixes: z.array(z.string().min(1)).default(DEFAULT_TRUSTED_NETWORK_PREFIXES),
  trustedDevices: z.array(z.string().min(1)).default(DEFAULT_TRUSTED_DEVICES),
  businessHours: businessHoursSchema.default(DEFAULT_BUSINESS_HOURS),
});

// ============================================================================
// Policy Schema
// ============================================================================

export const policySchema = z.object({
  id: z.string().min(1).optional(),
  matchActions: z.array(z.string().trim().min(1)).min(1, 'at least one action is required'),
  decision: decisionSchema,
  description: z.string().default(''),
});

// ============================================================================
// Policy Document Schema
// ============================================================================

export const policyDocumentSchema = z.object({
  name: z.string().min(1).default('unnamed'),
  version: z.coerce.string().default('1.0'),
  defaultDecision: decisionSchema.default(Decision.DENY),
  context: trustConfigSchema.default({}),
  policies: z.array(policySchema).default([]),
});

export type PolicyDocumentInput = z.input<typeof policyDocumentSchema>;
export type PolicyDocument = z.output<typeof policyDocumentSchema>;

// ============================================================================
// Legacy Shape
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function normalizeLegacyPolicy(raw: unknown): unknown {
  if (!isRecord(raw) || raw['matchActions'] !== undefined) {
    return raw;
  }
  const conditions = raw['conditions'];
  if (!isRecord(conditions) || conditions['action'] === undefined) {
    return raw;
  }
  const { conditions: _conditions, ...rest } = raw;
  return { ...rest, matchActions: conditions['action'] };
}

/**
 * Rewrite the legacy document shape (`default_action`,
 * `policies[].conditions.action`) into the current one. Documents already in
 * the current shape pass through unchanged.
 */
export function normalizePolicyDocument(raw: unknown): unknown {
  if (!isRecord(raw)) {
    return raw;
  }

  const normalized: Record<string, unknown> = { ...raw };

  if (normalized['defaultDecision'] === undefined && normalized['default_action'] !== undefined) {
    normalized['defaultDecision'] = normalized['default_action'];
  }
  delete normalized['default_action'];

  const policies = normalized['policies'];
  if (Array.isArray(policies)) {
    normalized['policies'] = policies.map(normalizeLegacyPolicy);
  }

  return normalized;
}
