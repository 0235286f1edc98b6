/**
 * ZTGate Configuration Module
 *
 * Centralizes all configuration reading from environment variables
 * with validation and defaults.
 */

import { z } from 'zod';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config');

/**
 * Audit write retry schema
 */
const auditConfigSchema = z.object({
  /** Attempts per log append before the failure is escalated (1-10) */
  maxAttempts: z.coerce.number().int().min(1).max(10).default(3),
  /** Delay before the first retry, doubled on each further retry */
  retryBackoffMs: z.coerce.number().int().min(0).max(10000).default(50),
});

export type AuditConfig = z.infer<typeof auditConfigSchema>;

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  // Paths
  dataDir: z.string().min(1).default('.ztgate/data'),
  policyPath: z.string().min(1).default('config/policies.yaml'),

  // Server
  port: z.coerce.number().int().min(1).max(65535).default(3001),
  host: z.string().default('0.0.0.0'),

  // Remediation
  adapterTimeoutMs: z.coerce.number().int().min(100).max(120000).default(5000),
  remediationAttempts: z.coerce.number().int().min(1).max(5).default(2),

  // Audit
  audit: auditConfigSchema,
});

export type ZtGateConfig = z.infer<typeof configSchema>;

/**
 * Load configuration from environment variables
 */
export function loadConfig(): ZtGateConfig {
  const raw = {
    dataDir: process.env.ZTGATE_DATA_DIR,
    policyPath: process.env.ZTGATE_POLICY_PATH,
    port: process.env.ZTGATE_PORT,
    host: process.env.ZTGATE_HOST,
    adapterTimeoutMs: process.env.ZTGATE_ADAPTER_TIMEOUT_MS,
    remediationAttempts: process.env.ZTGATE_REMEDIATION_ATTEMPTS,
    audit: {
      maxAttempts: process.env.ZTGATE_AUDIT_MAX_ATTEMPTS,
      retryBackoffMs: process.env.ZTGATE_AUDIT_RETRY_BACKOFF_MS,
    },
  };

  const result = configSchema.safeParse(raw);

  if (!result.success) {
    log.error({ errors: result.error.errors }, 'Invalid configuration');
    throw new Error(`Configuration validation failed: ${result.error.message}`);
  }

  log.info(
    {
      dataDir: result.data.dataDir,
      policyPath: result.data.policyPath,
      adapterTimeoutMs: result.data.adapterTimeoutMs,
      auditMaxAttempts: result.data.audit.maxAttempts,
    },
    'Configuration loaded'
  );

  return result.data;
}

/**
 * Singleton configuration instance
 */
let configInstance: ZtGateConfig | null = null;

/**
 * Get the configuration singleton
 */
export function getConfig(): ZtGateConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset configuration (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}
