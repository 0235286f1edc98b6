/**
 * Central Monitor
 *
 * Single writer for the audit log and the metrics derived from it. Every
 * append and its metrics update run under one serial executor, so a
 * metrics snapshot never reflects an event that is not on disk.
 */

import { EventEmitter } from 'node:events';
import { nanoid } from 'nanoid';
import type { Logger } from 'pino';
import { EventType, type EventLogEntry, type EventQuery, type MetricsState } from '@ztgate/shared';
import { AuditWriteError, ZtGateError } from '../security/errors.js';
import { SerialExecutor } from '../utils/serial-executor.js';
import { createLogger } from '../utils/logger.js';
import { applyEvent, cloneMetrics, createEmptyMetrics, metricsEqual, replayMetrics } from './metrics.js';
import { JsonlEventLog, JsonMetricsFile, getEventLogPath, getMetricsPath } from './storage.js';
import type {
  EventLogEntryInput,
  EventRecorder,
  EventSink,
  MetricsStore,
  MetricsVerification,
} from './types.js';

export interface CentralMonitorOptions {
  /** Directory holding events.jsonl and metrics.json */
  dataDir?: string;
  /** Overrides the file-backed log */
  sink?: EventSink;
  /** Overrides the file-backed metrics cache */
  metricsStore?: MetricsStore;
  /** Append attempts before the failure is escalated */
  maxAttempts?: number;
  /** Delay before the first retry, doubled on each further retry */
  retryBackoffMs?: number;
}

/**
 * Payload of the `auditFailure` event.
 */
export interface AuditFailureAlarm {
  entry: EventLogEntry;
  error: AuditWriteError;
}

const DEFAULT_DATA_DIR = '.ztgate/data';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class CentralMonitor extends EventEmitter implements EventRecorder {
  private readonly logger: Logger;
  private readonly sink: EventSink;
  private readonly metricsStore: MetricsStore;
  private readonly maxAttempts: number;
  private readonly retryBackoffMs: number;
  private readonly writer = new SerialExecutor();
  private metrics: MetricsState = createEmptyMetrics();
  private initialized = false;

  constructor(options: CentralMonitorOptions = {}) {
    super();
    const dataDir = options.dataDir ?? DEFAULT_DATA_DIR;
    this.logger = createLogger('central-monitor');
    this.sink = options.sink ?? new JsonlEventLog(getEventLogPath(dataDir));
    this.metricsStore = options.metricsStore ?? new JsonMetricsFile(getMetricsPath(dataDir));
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.retryBackoffMs = Math.max(0, options.retryBackoffMs ?? 50);
  }

  get logPath(): string {
    return this.sink.location;
  }

  get metricsPath(): string {
    return this.metricsStore.location;
  }

  /**
   * Rebuild in-memory metrics from the log and rewrite the metrics file.
   */
  async init(): Promise<MetricsState> {
    return this.writer.run(async () => {
      const { entries, malformedLines } = await this.sink.read();
      this.metrics = replayMetrics(entries);
      this.initialized = true;
      await this.persistMetrics();
      this.logger.info(
        { events: entries.length, malformedLines: malformedLines.length, path: this.sink.location },
        'Metrics rebuilt from audit log'
      );
      return cloneMetrics(this.metrics);
    });
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  /**
   * Append one entry and fold it into the metrics.
   *
   * Throws AuditWriteError when the append fails on every attempt; the
   * metrics are then left untouched and `auditFailure` is emitted.
   */
  async recordEvent(input: EventLogEntryInput): Promise<EventLogEntry> {
    if (input.eventType === EventType.ACCESS_REQUEST && input.decision === undefined) {
      throw new ZtGateError('INVALID_EVENT', 'ACCESS_REQUEST events must carry a decision');
    }

    return this.writer.run(async () => {
      const entry: EventLogEntry = {
        id: nanoid(),
        timestamp: new Date().toISOString(),
        module: input.module,
        eventType: input.eventType,
        user: input.user,
        resource: input.resource,
        cloud: input.cloud,
        ...(input.decision !== undefined && { decision: input.decision }),
        ...(input.reason !== undefined && { reason: input.reason }),
        actionsTaken: [...(input.actionsTaken ?? [])],
        details: { ...(input.details ?? {}) },
      };

      await this.appendWithRetry(entry);

      applyEvent(this.metrics, entry);
      await this.persistMetrics();

      this.logger.debug(
        { id: entry.id, eventType: entry.eventType, user: entry.user, decision: entry.decision },
        `Audit: ${entry.eventType}`
      );

      return entry;
    });
  }

  /**
   * Deep copy of the current metrics.
   */
  snapshot(): MetricsState {
    return cloneMetrics(this.metrics);
  }

  /**
   * Read log entries matching the query, oldest first. `limit` keeps the
   * most recent matches.
   */
  async queryEvents(query: EventQuery = {}): Promise<EventLogEntry[]> {
    return this.writer.run(async () => {
      const { entries } = await this.sink.read();
      let results = entries;

      if (query.type) {
        const type = query.type;
        results = results.filter((e) => e.eventType === type);
      }
      if (query.user) {
        const user = query.user;
        results = results.filter((e) => e.user === user);
      }
      if (query.decision) {
        const decision = query.decision;
        results = results.filter((e) => e.decision === decision);
      }
      if (query.cloud) {
        const cloud = query.cloud.toLowerCase();
        results = results.filter((e) => e.cloud.toLowerCase() === cloud);
      }
      if (query.since) {
        const since = query.since.getTime();
        results = results.filter((e) => Date.parse(e.timestamp) >= since);
      }
      if (query.until) {
        const until = query.until.getTime();
        results = results.filter((e) => Date.parse(e.timestamp) <= until);
      }
      if (query.limit && query.limit > 0) {
        results = results.slice(-query.limit);
      }

      return results;
    });
  }

  /**
   * Replay the log and compare the result with the persisted metrics file
   * and, once `init` has run, with the in-memory metrics.
   */
  async verify(): Promise<MetricsVerification> {
    return this.writer.run(async () => {
      const { entries, malformedLines } = await this.sink.read();
      const replayed = replayMetrics(entries);
      const persisted = await this.metricsStore.load();
      const live = this.initialized ? cloneMetrics(this.metrics) : null;
      const consistent =
        (live === null || metricsEqual(replayed, live)) &&
        (persisted === null || metricsEqual(replayed, persisted));

      if (!consistent) {
        this.logger.warn({ path: this.sink.location }, 'Metrics diverge from audit log replay');
      }

      return { consistent, replayed, live, persisted, malformedLines };
    });
  }

  /**
   * Resolves once every write submitted so far has settled.
   */
  flush(): Promise<void> {
    return this.writer.idle();
  }

  private async appendWithRetry(entry: EventLogEntry): Promise<void> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        await this.sink.append(entry);
        return;
      } catch (error) {
        lastError = error;
        if (attempt < this.maxAttempts) {
          const backoff = this.retryBackoffMs * 2 ** (attempt - 1);
          this.logger.warn(
            { error, attempt, maxAttempts: this.maxAttempts, backoffMs: backoff },
            'Audit log append failed, retrying'
          );
          await delay(backoff);
        }
      }
    }

    const failure = new AuditWriteError(this.maxAttempts, lastError);
    this.logger.fatal(
      { error: failure, entryId: entry.id, eventType: entry.eventType, path: this.sink.location },
      'Audit log unavailable'
    );
    const alarm: AuditFailureAlarm = { entry, error: failure };
    this.emit('auditFailure', alarm);
    throw failure;
  }

  private async persistMetrics(): Promise<void> {
    try {
      await this.metricsStore.save(this.metrics);
    } catch (error) {
      this.logger.warn({ error, path: this.metricsStore.location }, 'Failed to persist metrics file');
    }
  }
}
