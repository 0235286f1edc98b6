import type { EventLogEntry, MetricsState } from '@ztgate/shared';
import type { MetricsVerification } from '../monitoring/types.js';
import { Decision, EnforcementStatus, type EnforcementOutcome } from '../security/types.js';

/**
 * ANSI color codes for terminal output.
 */
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
} as const;

/**
 * Check if colors should be enabled.
 */
function useColors(): boolean {
  if (process.env['NO_COLOR'] !== undefined) {
    return false;
  }
  if (process.env['FORCE_COLOR'] !== undefined) {
    return true;
  }
  return process.stdout.isTTY ?? false;
}

function colorize(text: string, color: keyof typeof colors): string {
  if (!useColors()) {
    return text;
  }
  return `${colors[color]}${text}${colors.reset}`;
}

export function bold(text: string): string {
  return colorize(text, 'bold');
}

export function dim(text: string): string {
  return colorize(text, 'dim');
}

export function red(text: string): string {
  return colorize(text, 'red');
}

export function green(text: string): string {
  return colorize(text, 'green');
}

export function yellow(text: string): string {
  return colorize(text, 'yellow');
}

export function cyan(text: string): string {
  return colorize(text, 'cyan');
}

/**
 * Format a decision with its color: ALLOW green, REVIEW yellow, DENY red.
 */
export function formatDecision(decision: Decision): string {
  const decisionColors: Record<Decision, keyof typeof colors> = {
    [Decision.ALLOW]: 'green',
    [Decision.REVIEW]: 'yellow',
    [Decision.DENY]: 'red',
  };
  return colorize(decision, decisionColors[decision]);
}

export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return text.slice(0, maxLength - 3) + '...';
}

export function padRight(text: string, width: number): string {
  return text.padEnd(width);
}

export interface TableColumn<T> {
  header: string;
  width: number;
  value: (item: T) => string;
}

/**
 * Format data as a table.
 */
export function formatTable<T>(items: T[], columns: TableColumn<T>[]): string {
  const lines: string[] = [];

  lines.push(columns.map((col) => bold(padRight(col.header, col.width))).join('  '));
  lines.push(dim(columns.map((col) => '-'.repeat(col.width)).join('  ')));

  for (const item of items) {
    lines.push(columns.map((col) => padRight(truncate(col.value(item), col.width), col.width)).join('  '));
  }

  return lines.join('\n');
}

/**
 * Format the result of one enforcement.
 */
export function formatOutcome(outcome: EnforcementOutcome): string {
  const enforcementLabel: Record<EnforcementStatus, string> = {
    [EnforcementStatus.PERMITTED]: 'permitted',
    [EnforcementStatus.BLOCKED]: 'blocked',
    [EnforcementStatus.PENDING_REVIEW]: 'blocked pending review',
  };

  const lines = [
    `${bold('Decision:')}    ${formatDecision(outcome.decision)}`,
    `${bold('Reason:')}      ${outcome.reason}`,
    `${bold('Cloud:')}       ${cyan(outcome.cloud)}`,
    `${bold('Enforcement:')} ${enforcementLabel[outcome.enforcement]}`,
  ];

  if (outcome.remediationActions.length > 0) {
    lines.push(bold('Remediation:'));
    for (const action of outcome.remediationActions) {
      lines.push(`  - ${action}`);
    }
  }

  return lines.join('\n');
}

function formatCounters(title: string, counters: Record<string, number>): string[] {
  const entries = Object.entries(counters).sort(([a], [b]) => a.localeCompare(b));
  if (entries.length === 0) {
    return [`${bold(title)} ${dim('(none)')}`];
  }
  return [bold(title), ...entries.map(([key, count]) => `  ${padRight(key, 22)}${count}`)];
}

/**
 * Format a metrics snapshot.
 */
export function formatMetrics(metrics: MetricsState): string {
  return [
    `${bold('Total events:')}          ${metrics.totalEvents}`,
    `${bold('Access requests:')}       ${metrics.totalAccessRequests}`,
    `${bold('Remediations:')}          ${metrics.totalRemediations}`,
    `${bold('Last event:')}            ${metrics.lastEventAt ?? dim('never')}`,
    '',
    ...formatCounters('Decisions:', metrics.decisions),
    ...formatCounters('Requests by cloud:', metrics.requestsByCloud),
    ...formatCounters('Events by type:', metrics.eventsByType),
  ].join('\n');
}

/**
 * Format audit log entries as a table.
 */
export function formatEventList(events: EventLogEntry[]): string {
  if (events.length === 0) {
    return dim('No events found.');
  }

  const columns: TableColumn<EventLogEntry>[] = [
    { header: 'TIMESTAMP', width: 24, value: (e) => e.timestamp },
    { header: 'TYPE', width: 20, value: (e) => e.eventType },
    { header: 'USER', width: 14, value: (e) => e.user },
    { header: 'CLOUD', width: 6, value: (e) => e.cloud },
    { header: 'DECISION', width: 8, value: (e) => e.decision ?? '-' },
    { header: 'REASON', width: 36, value: (e) => e.reason ?? '' },
  ];

  return formatTable(events, columns);
}

/**
 * Format the comparison of metrics against a log replay.
 */
export function formatVerification(verification: MetricsVerification): string {
  const lines = [
    verification.consistent
      ? formatSuccess('Metrics match the audit log')
      : formatError('Metrics diverge from the audit log'),
    `  ${bold('Replayed events:')}  ${verification.replayed.totalEvents}`,
    `  ${bold('Live events:')}      ${verification.live ? String(verification.live.totalEvents) : dim('not loaded')}`,
    `  ${bold('Persisted events:')} ${verification.persisted ? String(verification.persisted.totalEvents) : dim('no metrics file')}`,
  ];
  if (verification.malformedLines.length > 0) {
    lines.push(formatWarning(`Skipped malformed log lines: ${verification.malformedLines.join(', ')}`));
  }
  return lines.join('\n');
}

export function formatSuccess(message: string): string {
  return `${green('✓')} ${message}`;
}

export function formatError(message: string): string {
  return `${red('✗')} ${red(message)}`;
}

export function formatWarning(message: string): string {
  return `${yellow('!')} ${yellow(message)}`;
}

export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/**
 * Print to stdout.
 */
export function print(text: string): void {
  // eslint-disable-next-line no-console -- CLI output function
  console.log(text);
}

/**
 * Print error to stderr.
 */
export function printError(text: string): void {
  // eslint-disable-next-line no-console -- CLI error output function
  console.error(text);
}

/**
 * Format validation errors.
 */
export function formatValidationErrors(errors: Array<{ path: string; message: string }>): string {
  const lines = errors.map((e) => {
    const path = e.path ? `${bold(e.path)}: ` : '';
    return `  ${red('•')} ${path}${e.message}`;
  });

  return [formatError('Validation failed:'), ...lines].join('\n');
}
