/**
 * ZTGate Library API
 *
 * Exports all public modules for programmatic usage.
 */

// Pipeline (main entry point)
export { createPipeline, createMonitor, POLICY_STORE_MODULE, type Pipeline, type PipelineOptions } from './pipeline.js';

// Decision, enforcement and remediation
export * from './security/index.js';

// Central monitoring
export {
  CentralMonitor,
  JsonlEventLog,
  JsonMetricsFile,
  EVENT_LOG_FILENAME,
  METRICS_FILENAME,
  getEventLogPath,
  getMetricsPath,
  createEmptyMetrics,
  applyEvent,
  replayMetrics,
  cloneMetrics,
  metricsEqual,
  totalDecisions,
  type CentralMonitorOptions,
  type AuditFailureAlarm,
  type EventLogEntryInput,
  type EventRecorder,
  type EventLogReadResult,
  type EventSink,
  type MetricsStore,
  type MetricsVerification,
} from './monitoring/index.js';

// Configuration
export { loadConfig, getConfig, resetConfig, type ZtGateConfig, type AuditConfig } from './config/index.js';

// HTTP server
export { createApp, startServer, stopServer, type AppConfig } from './server/index.js';

// CLI
export { createProgram, runCli } from './control-plane/cli.js';

// Utilities
export { createLogger } from './utils/logger.js';
export { SerialExecutor } from './utils/serial-executor.js';
