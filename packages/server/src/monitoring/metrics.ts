/**
 * Metrics fold over the audit log.
 *
 * MetricsState is a cache: folding the log from an empty state must always
 * reproduce it. Decision and per-cloud counters move on ACCESS_REQUEST
 * entries only, so the decision counters sum to the number of access
 * requests.
 */

import { Decision, EventType, type EventLogEntry, type MetricsState } from '@ztgate/shared';

export function createEmptyMetrics(): MetricsState {
  return {
    totalEvents: 0,
    totalAccessRequests: 0,
    totalRemediations: 0,
    decisions: {
      [Decision.ALLOW]: 0,
      [Decision.DENY]: 0,
      [Decision.REVIEW]: 0,
    },
    requestsByCloud: {},
    eventsByType: {},
    lastEventAt: null,
  };
}

/**
 * Apply one entry to the state in place.
 */
export function applyEvent(state: MetricsState, entry: EventLogEntry): void {
  state.totalEvents++;
  state.eventsByType[entry.eventType] = (state.eventsByType[entry.eventType] ?? 0) + 1;
  state.lastEventAt = entry.timestamp;

  switch (entry.eventType) {
    case EventType.ACCESS_REQUEST:
      state.totalAccessRequests++;
      if (entry.decision) {
        state.decisions[entry.decision]++;
      }
      state.requestsByCloud[entry.cloud] = (state.requestsByCloud[entry.cloud] ?? 0) + 1;
      break;
    case EventType.REMEDIATION:
      state.totalRemediations++;
      break;
    default:
      break;
  }
}

/**
 * Rebuild metrics from a sequence of log entries.
 */
export function replayMetrics(entries: Iterable<EventLogEntry>): MetricsState {
  const state = createEmptyMetrics();
  for (const entry of entries) {
    applyEvent(state, entry);
  }
  return state;
}

/**
 * Deep copy; never shares nested objects with the source.
 */
export function cloneMetrics(state: MetricsState): MetricsState {
  return structuredClone(state);
}

function sortedEntries(record: Record<string, number>): Array<[string, number]> {
  return Object.entries(record)
    .filter(([, count]) => count !== 0)
    .sort(([a], [b]) => a.localeCompare(b));
}

/**
 * Structural equality that ignores key order and zero-valued map entries.
 */
export function metricsEqual(a: MetricsState, b: MetricsState): boolean {
  return (
    a.totalEvents === b.totalEvents &&
    a.totalAccessRequests === b.totalAccessRequests &&
    a.totalRemediations === b.totalRemediations &&
    a.lastEventAt === b.lastEventAt &&
    JSON.stringify(sortedEntries(a.decisions)) === JSON.stringify(sortedEntries(b.decisions)) &&
    JSON.stringify(sortedEntries(a.requestsByCloud)) === JSON.stringify(sortedEntries(b.requestsByCloud)) &&
    JSON.stringify(sortedEntries(a.eventsByType)) === JSON.stringify(sortedEntries(b.eventsByType))
  );
}

/**
 * Sum of the per-decision counters.
 */
export function totalDecisions(state: MetricsState): number {
  return state.decisions.ALLOW + state.decisions.DENY + state.decisions.REVIEW;
}
