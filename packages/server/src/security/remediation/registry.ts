/**
 * Cloud Adapter Registry
 */

import type { CloudProvider } from '../types.js';
import { createLogger } from '../../utils/logger.js';
import { AwsStubAdapter, AzureStubAdapter, GcpStubAdapter, type CloudAdapter } from './adapters.js';

const log = createLogger('adapter-registry');

export class CloudAdapterRegistry {
  private readonly adapters = new Map<CloudProvider, CloudAdapter>();

  /**
   * Register an adapter, replacing any adapter for the same cloud.
   */
  register(adapter: CloudAdapter): void {
    if (this.adapters.has(adapter.cloud)) {
      log.warn({ cloud: adapter.cloud, name: adapter.name }, 'Overwriting existing cloud adapter');
    }
    this.adapters.set(adapter.cloud, adapter);
    log.debug({ cloud: adapter.cloud, name: adapter.name }, 'Cloud adapter registered');
  }

  get(cloud: CloudProvider): CloudAdapter | undefined {
    return this.adapters.get(cloud);
  }

  has(cloud: CloudProvider): boolean {
    return this.adapters.has(cloud);
  }

  all(): CloudAdapter[] {
    return Array.from(this.adapters.values());
  }
}

/**
 * Registry carrying the stub adapter for every supported cloud.
 */
export function createDefaultAdapterRegistry(): CloudAdapterRegistry {
  const registry = new CloudAdapterRegistry();
  registry.register(new AwsStubAdapter());
  registry.register(new AzureStubAdapter());
  registry.register(new GcpStubAdapter());
  return registry;
}
