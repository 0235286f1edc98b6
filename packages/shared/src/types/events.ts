import { z } from 'zod';
import { Decision, decisionSchema } from './access.js';

/**
 * Event types written to the audit log.
 */
export const EventType = {
  ACCESS_REQUEST: 'ACCESS_REQUEST',
  REMEDIATION: 'REMEDIATION',
  POLICY_LOADED: 'POLICY_LOADED',
  POLICY_RELOAD_FAILED: 'POLICY_RELOAD_FAILED',
} as const;

export type EventType = (typeof EventType)[keyof typeof EventType];

export const eventTypeSchema = z.enum([
  EventType.ACCESS_REQUEST,
  EventType.REMEDIATION,
  EventType.POLICY_LOADED,
  EventType.POLICY_RELOAD_FAILED,
]);

/**
 * A single audit log record. Records are appended and never rewritten.
 */
export const eventLogEntrySchema = z.object({
  id: z.string().min(1),
  timestamp: z.string().datetime(),
  module: z.string().min(1),
  eventType: eventTypeSchema,
  user: z.string(),
  resource: z.string(),
  cloud: z.string(),
  decision: decisionSchema.optional(),
  reason: z.string().optional(),
  actionsTaken: z.array(z.string()),
  details: z.record(z.unknown()),
});

export type EventLogEntry = z.infer<typeof eventLogEntrySchema>;

// Event Query
export const eventQuerySchema = z.object({
  type: eventTypeSchema.optional(),
  user: z.string().min(1).optional(),
  decision: decisionSchema.optional(),
  cloud: z.string().min(1).optional(),
  since: z.coerce.date().optional(),
  until: z.coerce.date().optional(),
  limit: z.coerce.number().int().min(1).max(1000).optional(),
});

export type EventQuery = z.infer<typeof eventQuerySchema>;

/**
 * Aggregate counters derived from the audit log.
 */
export const metricsStateSchema = z.object({
  totalEvents: z.number().int().min(0),
  totalAccessRequests: z.number().int().min(0),
  totalRemediations: z.number().int().min(0),
  decisions: z.object({
    [Decision.ALLOW]: z.number().int().min(0),
    [Decision.DENY]: z.number().int().min(0),
    [Decision.REVIEW]: z.number().int().min(0),
  }),
  requestsByCloud: z.record(z.number().int().min(0)),
  eventsByType: z.record(z.number().int().min(0)),
  lastEventAt: z.string().nullable(),
});

export type MetricsState = z.infer<typeof metricsStateSchema>;
