import { Command } from 'commander';
import { getConfig } from '../../config/index.js';
import { createMonitor } from '../../pipeline.js';
import { print, printError, formatError, formatJson, formatVerification } from '../formatter.js';

/**
 * Create the verify command.
 * Exits non-zero when the metrics file does not match a replay of the log.
 */
export function createVerifyCommand(): Command {
  const command = new Command('verify')
    .description('Check the metrics file against a replay of the audit log')
    .option('--json', 'Output result as JSON', false)
    .action(async (options: { json?: boolean }) => {
      try {
        const monitor = createMonitor(getConfig());
        const verification = await monitor.verify();
        print(options.json ? formatJson(verification) : formatVerification(verification));
        if (!verification.consistent) {
          process.exitCode = 1;
        }
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}
