import { Command } from 'commander';
import { getConfig } from '../../config/index.js';
import { createMonitor } from '../../pipeline.js';
import { print, printError, formatError, formatJson, formatMetrics } from '../formatter.js';

/**
 * Create the metrics command.
 */
export function createMetricsCommand(): Command {
  const command = new Command('metrics')
    .description('Show metrics rebuilt from the audit log')
    .option('--json', 'Output result as JSON', false)
    .action(async (options: { json?: boolean }) => {
      try {
        const monitor = createMonitor(getConfig());
        const metrics = await monitor.init();
        print(options.json ? formatJson(metrics) : formatMetrics(metrics));
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}
