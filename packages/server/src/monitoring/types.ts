/**
 * Central Monitoring - Types
 */

import type { Decision, EventLogEntry, EventType, MetricsState } from '@ztgate/shared';

export { EventType } from '@ztgate/shared';
export type { EventLogEntry, EventQuery, MetricsState } from '@ztgate/shared';

/**
 * Fields a component supplies when recording an event. The monitor assigns
 * `id` and `timestamp`.
 */
export interface EventLogEntryInput {
  /** Emitting component (PEP, ARM, POLICY_STORE) */
  module: string;
  eventType: EventType;
  user: string;
  resource: string;
  cloud: string;
  decision?: Decision;
  reason?: string;
  actionsTaken?: string[];
  details?: Record<string, unknown>;
}

/**
 * Anything that can durably record an event.
 */
export interface EventRecorder {
  recordEvent(input: EventLogEntryInput): Promise<EventLogEntry>;
}

/**
 * Result of reading the append-only log.
 */
export interface EventLogReadResult {
  entries: EventLogEntry[];
  /** 1-based line numbers that could not be parsed or validated */
  malformedLines: number[];
}

/**
 * Durable append-only storage for audit entries.
 *
 * The file implementation is single-process. A multi-process deployment
 * needs a sink backed by a shared append-only store with its own
 * concurrency control.
 */
export interface EventSink {
  readonly location: string;
  append(entry: EventLogEntry): Promise<void>;
  read(): Promise<EventLogReadResult>;
}

/**
 * Side-file persistence for the metrics cache.
 */
export interface MetricsStore {
  readonly location: string;
  save(state: MetricsState): Promise<void>;
  load(): Promise<MetricsState | null>;
}

/**
 * Outcome of comparing live and persisted metrics against a log replay.
 */
export interface MetricsVerification {
  consistent: boolean;
  replayed: MetricsState;
  /** In-memory metrics, or null when the monitor has not replayed the log */
  live: MetricsState | null;
  persisted: MetricsState | null;
  malformedLines: number[];
}
