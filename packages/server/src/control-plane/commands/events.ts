import { Command } from 'commander';
import { eventQuerySchema, EventType } from '@ztgate/shared';
import { getConfig } from '../../config/index.js';
import { createMonitor } from '../../pipeline.js';
import {
  print,
  printError,
  formatError,
  formatEventList,
  formatJson,
  formatValidationErrors,
} from '../formatter.js';

/**
 * Create the events command.
 */
export function createEventsCommand(): Command {
  const command = new Command('events')
    .description('Query the audit log')
    .option('--type <type>', `Filter by event type (${Object.values(EventType).join(', ')})`)
    .option('-u, --user <user>', 'Filter by user')
    .option('-d, --decision <decision>', 'Filter by decision (ALLOW, DENY, REVIEW)')
    .option('-c, --cloud <cloud>', 'Filter by cloud')
    .option('--since <iso>', 'Only events at or after this time')
    .option('--until <iso>', 'Only events at or before this time')
    .option('-l, --limit <n>', 'Most recent N matching events', '50')
    .option('--json', 'Output result as JSON', false)
    .action(async (options: Record<string, unknown>) => {
      try {
        await executeEvents(options);
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

async function executeEvents(rawOptions: Record<string, unknown>): Promise<void> {
  const { json, ...queryOptions } = rawOptions;
  const queryResult = eventQuerySchema.safeParse(queryOptions);
  if (!queryResult.success) {
    printError(
      formatValidationErrors(
        queryResult.error.errors.map((e) => ({ path: e.path.join('.'), message: e.message }))
      )
    );
    process.exitCode = 1;
    return;
  }

  const monitor = createMonitor(getConfig());
  const events = await monitor.queryEvents(queryResult.data);

  print(json === true ? formatJson(events) : formatEventList(events));
}
