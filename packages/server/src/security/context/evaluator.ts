/**
 * Context Evaluator
 *
 * Checks network, time and device trust signals for a request. Checks run in
 * a fixed priority order (network, then business hours, then device) and the
 * first failing check decides.
 */

import { Decision, type AccessRequest, type BusinessHours, type ContextVerdict, type TrustConfig } from '../types.js';

export const ContextReason = {
  UNTRUSTED_NETWORK: 'untrusted network source',
  OUTSIDE_BUSINESS_HOURS: 'outside business hours',
  UNRECOGNIZED_DEVICE: 'unrecognized device',
  VALIDATED: 'context validated',
} as const;

export function isTrustedNetwork(sourceIP: string, prefixes: readonly string[]): boolean {
  return prefixes.some((prefix) => sourceIP.startsWith(prefix));
}

/**
 * Hour-of-day check against a half-open window. A window with
 * `startHour > endHour` wraps past midnight.
 */
export function isWithinBusinessHours(hour: number, window: BusinessHours): boolean {
  const { startHour, endHour } = window;
  if (startHour <= endHour) {
    return hour >= startHour && hour < endHour;
  }
  return hour >= startHour || hour < endHour;
}

export function isTrustedDevice(deviceId: string, trustedDevices: readonly string[]): boolean {
  return trustedDevices.includes(deviceId);
}

/**
 * Evaluate the request context. Total: every input yields exactly one verdict.
 * Hours are read in the deployment's local time.
 */
export function evaluateContext(request: AccessRequest, trust: TrustConfig): ContextVerdict {
  if (!isTrustedNetwork(request.sourceIP, trust.trustedNetworkPrefixes)) {
    return { decision: Decision.DENY, reason: ContextReason.UNTRUSTED_NETWORK };
  }

  if (!isWithinBusinessHours(request.requestTime.getHours(), trust.businessHours)) {
    return { decision: Decision.DENY, reason: ContextReason.OUTSIDE_BUSINESS_HOURS };
  }

  if (!isTrustedDevice(request.deviceId, trust.trustedDevices)) {
    return { decision: Decision.REVIEW, reason: ContextReason.UNRECOGNIZED_DEVICE };
  }

  return { decision: Decision.ALLOW, reason: ContextReason.VALIDATED };
}
