/**
 * Cloud Adapters
 *
 * One adapter per provider. The bundled adapters are stand-ins that report
 * what a real IAM call would have done; a deployment swaps in SDK-backed
 * implementations through the registry.
 */

import { CloudProvider } from '../types.js';

/**
 * Revokes a user's sensitive access in one cloud.
 *
 * Implementations must be idempotent: the dispatcher may call them again
 * for the same user after a failed audit write. The signal is aborted when
 * the dispatcher stops waiting.
 */
export interface CloudAdapter {
  readonly cloud: CloudProvider;
  readonly name: string;
  revokeAccess(user: string, signal: AbortSignal): Promise<string>;
}

export class AwsStubAdapter implements CloudAdapter {
  readonly cloud = CloudProvider.AWS;
  readonly name = 'aws-stub';

  async revokeAccess(user: string, _signal: AbortSignal): Promise<string> {
    return `Removed ${user} from SensitiveAccess group in AWS (mock)`;
  }
}

export class AzureStubAdapter implements CloudAdapter {
  readonly cloud = CloudProvider.AZURE;
  readonly name = 'azure-stub';

  async revokeAccess(user: string, _signal: AbortSignal): Promise<string> {
    return `Azure remediation triggered for ${user}`;
  }
}

export class GcpStubAdapter implements CloudAdapter {
  readonly cloud = CloudProvider.GCP;
  readonly name = 'gcp-stub';

  async revokeAccess(user: string, _signal: AbortSignal): Promise<string> {
    return `GCP remediation triggered for ${user}`;
  }
}

/**
 * Map a free-form cloud label to a provider by case-insensitive substring,
 * checking aws, azure, gcp in that order.
 */
export function resolveCloudProvider(label: string): CloudProvider | null {
  const normalized = label.toLowerCase();
  if (normalized.includes('aws')) return CloudProvider.AWS;
  if (normalized.includes('azure')) return CloudProvider.AZURE;
  if (normalized.includes('gcp')) return CloudProvider.GCP;
  return null;
}
