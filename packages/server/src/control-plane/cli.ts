import { Command } from 'commander';
import { createEnforceCommand } from './commands/enforce.js';
import { createMetricsCommand } from './commands/metrics.js';
import { createEventsCommand } from './commands/events.js';
import { createVerifyCommand } from './commands/verify.js';
import { createServeCommand } from './commands/serve.js';

/**
 * Package version - will be updated during build
 */
const VERSION = '0.1.0';

/**
 * Create and configure the CLI program.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('ztgate')
    .description('ZTGate - zero-trust access control and auto-remediation for multi-cloud resources')
    .version(VERSION, '-v, --version', 'Output the current version');

  program.addCommand(createEnforceCommand());
  program.addCommand(createMetricsCommand());
  program.addCommand(createEventsCommand());
  program.addCommand(createVerifyCommand());
  program.addCommand(createServeCommand());

  // Error handling
  program.exitOverride();

  return program;
}

/**
 * Run the CLI program.
 */
export async function runCli(args: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(args);
  } catch (error) {
    // Commander throws on --help and --version
    if (
      error instanceof Error &&
      'code' in error &&
      (error.code === 'commander.helpDisplayed' || error.code === 'commander.version')
    ) {
      return;
    }

    throw error;
  }
}

export { createEnforceCommand } from './commands/enforce.js';
export { createMetricsCommand } from './commands/metrics.js';
export { createEventsCommand } from './commands/events.js';
export { createVerifyCommand } from './commands/verify.js';
export { createServeCommand } from './commands/serve.js';
