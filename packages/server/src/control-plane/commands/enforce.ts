import { Command } from 'commander';
import { z } from 'zod';
import { createPipeline } from '../../pipeline.js';
import { MalformedRequestError } from '../../security/errors.js';
import {
  print,
  printError,
  formatError,
  formatJson,
  formatOutcome,
  formatValidationErrors,
} from '../formatter.js';

const enforceOptionsSchema = z.object({
  time: z.coerce.date().optional(),
  json: z.boolean().default(false),
});

/**
 * Create the enforce command.
 */
export function createEnforceCommand(): Command {
  const command = new Command('enforce')
    .description('Evaluate and enforce a single access request')
    .argument('<user>', 'Requesting user')
    .argument('<action>', 'Requested action, e.g. s3:GetObject')
    .argument('<resource>', 'Target resource identifier')
    .argument('<ip>', 'Source IP address')
    .argument('<device>', 'Device identifier')
    .option('-t, --time <iso>', 'Request time (defaults to now)')
    .option('--json', 'Output result as JSON', false)
    .action(
      async (
        user: string,
        action: string,
        resource: string,
        sourceIP: string,
        deviceId: string,
        options: Record<string, unknown>
      ) => {
        try {
          await executeEnforce({ user, action, resource, sourceIP, deviceId }, options);
        } catch (error) {
          if (error instanceof MalformedRequestError) {
            printError(formatValidationErrors(error.issues));
          } else {
            printError(formatError(error instanceof Error ? error.message : String(error)));
          }
          process.exitCode = 1;
        }
      }
    );

  return command;
}

async function executeEnforce(
  fields: { user: string; action: string; resource: string; sourceIP: string; deviceId: string },
  rawOptions: Record<string, unknown>
): Promise<void> {
  const optionsResult = enforceOptionsSchema.safeParse(rawOptions);
  if (!optionsResult.success) {
    printError(
      formatValidationErrors(
        optionsResult.error.errors.map((e) => ({ path: e.path.join('.'), message: e.message }))
      )
    );
    process.exitCode = 1;
    return;
  }

  const options = optionsResult.data;
  const pipeline = await createPipeline();

  const outcome = await pipeline.pep.enforce(
    options.time ? { ...fields, requestTime: options.time } : fields
  );
  await pipeline.monitor.flush();

  if (options.json) {
    print(
      formatJson({
        decision: outcome.decision,
        reason: outcome.reason,
        cloud: outcome.cloud,
        enforcement: outcome.enforcement,
        remediationActions: outcome.remediationActions,
      })
    );
  } else {
    print(formatOutcome(outcome));
  }
}
