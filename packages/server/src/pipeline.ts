/**
 * Pipeline assembly
 *
 * Wires the policy store, decision point, remediation dispatcher,
 * enforcement point and central monitor into one running pipeline.
 */

import { EventType } from '@ztgate/shared';
import { getConfig, type ZtGateConfig } from './config/index.js';
import { CentralMonitor } from './monitoring/monitor.js';
import { PolicyDecisionPoint } from './security/decision/pdp.js';
import { PolicyEnforcementPoint } from './security/enforcement/pep.js';
import type { ConfigError } from './security/errors.js';
import { PolicyStore, type PolicyReloadResult } from './security/policy/store.js';
import { RemediationDispatcher } from './security/remediation/dispatcher.js';
import { createDefaultAdapterRegistry, type CloudAdapterRegistry } from './security/remediation/registry.js';
import type { PolicySnapshot } from './security/types.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('pipeline');

export const POLICY_STORE_MODULE = 'POLICY_STORE';
const SYSTEM_USER = 'system';
const NO_CLOUD = 'none';

export interface PipelineOptions {
  config?: ZtGateConfig;
  registry?: CloudAdapterRegistry;
  /** Pre-loaded store; when omitted one is built from `config.policyPath` */
  policyStore?: PolicyStore;
  monitor?: CentralMonitor;
  /** Clock for stamping requests; defaults to the system clock */
  now?: () => Date;
}

export interface Pipeline {
  config: ZtGateConfig;
  policyStore: PolicyStore;
  monitor: CentralMonitor;
  pdp: PolicyDecisionPoint;
  arm: RemediationDispatcher;
  pep: PolicyEnforcementPoint;
  reloadPolicy(): Promise<PolicyReloadResult>;
}

/**
 * File-backed monitor for the configured data directory.
 */
export function createMonitor(config: ZtGateConfig): CentralMonitor {
  return new CentralMonitor({
    dataDir: config.dataDir,
    maxAttempts: config.audit.maxAttempts,
    retryBackoffMs: config.audit.retryBackoffMs,
  });
}

/**
 * Record policy store transitions in the audit log. Recording is best
 * effort: a failed write is logged and does not affect the store.
 */
function auditPolicyEvents(store: PolicyStore, monitor: CentralMonitor): void {
  store.on('loaded', (snapshot: PolicySnapshot) => {
    monitor
      .recordEvent({
        module: POLICY_STORE_MODULE,
        eventType: EventType.POLICY_LOADED,
        user: SYSTEM_USER,
        resource: snapshot.source,
        cloud: NO_CLOUD,
        reason: `loaded ${snapshot.name} v${snapshot.version}`,
        details: {
          name: snapshot.name,
          version: snapshot.version,
          hash: snapshot.hash,
          policies: snapshot.policySet.policies.length,
        },
      })
      .catch((error: unknown) => {
        log.error({ error, source: snapshot.source }, 'Failed to record policy load');
      });
  });

  store.on('reloadFailed', (error: ConfigError, retained: PolicySnapshot) => {
    monitor
      .recordEvent({
        module: POLICY_STORE_MODULE,
        eventType: EventType.POLICY_RELOAD_FAILED,
        user: SYSTEM_USER,
        resource: error.source,
        cloud: NO_CLOUD,
        reason: error.message,
        details: {
          validationErrors: error.validationErrors,
          retainedHash: retained.hash,
          retainedVersion: retained.version,
        },
      })
      .catch((recordError: unknown) => {
        log.error({ error: recordError, source: error.source }, 'Failed to record policy reload failure');
      });
  });
}

/**
 * Build and start the pipeline: rebuild metrics from the audit log, then
 * load the policy.
 *
 * @throws ConfigError when no policy can be loaded
 */
export async function createPipeline(options: PipelineOptions = {}): Promise<Pipeline> {
  const config = options.config ?? getConfig();

  const monitor = options.monitor ?? createMonitor(config);
  await monitor.init();

  const policyStore = options.policyStore ?? new PolicyStore(config.policyPath);
  auditPolicyEvents(policyStore, monitor);
  if (!policyStore.isLoaded()) {
    await policyStore.load();
  }

  const pdp = new PolicyDecisionPoint(policyStore);
  const arm = new RemediationDispatcher({
    registry: options.registry ?? createDefaultAdapterRegistry(),
    recorder: monitor,
    adapterTimeoutMs: config.adapterTimeoutMs,
  });
  const pep = new PolicyEnforcementPoint({
    pdp,
    remediator: arm,
    recorder: monitor,
    remediationAttempts: config.remediationAttempts,
    now: options.now,
  });

  log.info(
    { dataDir: config.dataDir, policy: policyStore.current().source, hash: policyStore.current().hash },
    'Pipeline ready'
  );

  return {
    config,
    policyStore,
    monitor,
    pdp,
    arm,
    pep,
    reloadPolicy: () => policyStore.reload(),
  };
}
