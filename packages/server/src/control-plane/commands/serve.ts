import { Command } from 'commander';
import { z } from 'zod';
import { startServer } from '../../server/index.js';
import { createPipeline } from '../../pipeline.js';
import type { AuditFailureAlarm } from '../../monitoring/monitor.js';
import {
  print,
  printError,
  formatError,
  formatWarning,
  formatValidationErrors,
  bold,
  cyan,
} from '../formatter.js';
import { getConfig } from '../../config/index.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('serve-command');

/**
 * Schema for serve command options
 */
const serveOptionsSchema = z.object({
  port: z.coerce.number().int().min(1).max(65535).optional(),
  host: z.string().optional(),
  corsOrigin: z.string().optional(),
  verbose: z.boolean().default(false),
});

type ServeOptions = z.infer<typeof serveOptionsSchema>;

/**
 * Create the serve command.
 */
export function createServeCommand(): Command {
  const command = new Command('serve')
    .description('Start the access control HTTP server')
    .option('-p, --port <port>', 'Port to listen on (default: ZTGATE_PORT or 3001)')
    .option('-H, --host <host>', 'Host to bind to (default: ZTGATE_HOST or 0.0.0.0)')
    .option('--cors-origin <origin>', 'CORS origin to allow (can specify multiple with comma)')
    .option('--verbose', 'Log every HTTP request', false)
    .action(async (options: Record<string, unknown>) => {
      try {
        await executeServe(options);
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

/**
 * Execute the serve command.
 */
async function executeServe(rawOptions: Record<string, unknown>): Promise<void> {
  const optionsResult = serveOptionsSchema.safeParse(rawOptions);
  if (!optionsResult.success) {
    printError(
      formatValidationErrors(
        optionsResult.error.errors.map((e) => ({
          path: e.path.join('.'),
          message: e.message,
        }))
      )
    );
    process.exitCode = 1;
    return;
  }

  const options: ServeOptions = optionsResult.data;
  const config = getConfig();
  const port = options.port ?? config.port;
  const host = options.host ?? config.host;
  const corsOrigins = options.corsOrigin ? options.corsOrigin.split(',').map((o) => o.trim()) : ['*'];

  // A missing or invalid policy aborts startup here
  const pipeline = await createPipeline({ config });
  const policy = pipeline.policyStore.current();

  pipeline.monitor.on('auditFailure', (alarm: AuditFailureAlarm) => {
    printError(formatError(`AUDIT LOG UNAVAILABLE: ${alarm.error.message}`));
  });

  print(`Starting ZTGate server...`);
  print('');
  print(`${bold('Server Configuration:')}`);
  print(`  ${bold('Port:')} ${cyan(String(port))}`);
  print(`  ${bold('Host:')} ${cyan(host)}`);
  print(`  ${bold('CORS Origins:')} ${cyan(corsOrigins.join(', '))}`);
  print('');
  print(`${bold('Pipeline Configuration:')}`);
  print(`  ${bold('Policy:')} ${cyan(`${policy.name} v${policy.version}`)} (${policy.source})`);
  print(`  ${bold('Policy Hash:')} ${cyan(policy.hash.slice(0, 12))}`);
  print(`  ${bold('Audit Log:')} ${cyan(pipeline.monitor.logPath)}`);
  print(`  ${bold('Adapter Timeout:')} ${cyan(String(config.adapterTimeoutMs) + 'ms')}`);
  print('');

  const server = await startServer({
    pipeline,
    port,
    host,
    corsOrigins,
    enableLogging: options.verbose,
  });

  const reload = (): void => {
    pipeline
      .reloadPolicy()
      .then((result) => {
        if (result.reloaded) {
          print(`Policy reloaded: ${result.snapshot.name} v${result.snapshot.version}`);
        } else {
          printError(formatWarning(`Policy reload rejected, keeping ${result.snapshot.hash.slice(0, 12)}`));
        }
      })
      .catch((err: unknown) => {
        log.error({ err }, 'Policy reload failed');
      });
  };

  const shutdown = (): void => {
    print('');
    print('Shutting down server...');

    const shutdownAsync = async (): Promise<void> => {
      await server.close();
      await pipeline.monitor.flush();
      print('Server stopped');
      process.exit(0);
    };

    shutdownAsync().catch((err: unknown) => {
      printError(formatError(err instanceof Error ? err.message : String(err)));
      process.exit(1);
    });
  };

  process.on('SIGHUP', reload);
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  print(`Server is running at ${cyan(`http://${host}:${port}`)}`);
  print('');
  print('Available endpoints:');
  print(`  ${cyan('GET')}  /health                  - Health check`);
  print(`  ${cyan('GET')}  /health/ready            - Readiness check`);
  print(`  ${cyan('GET')}  /health/live             - Liveness check`);
  print(`  ${cyan('POST')} /api/v1/access           - Evaluate an access request`);
  print(`  ${cyan('GET')}  /api/v1/metrics          - Metrics snapshot`);
  print(`  ${cyan('GET')}  /api/v1/metrics/verify   - Check metrics against the audit log`);
  print(`  ${cyan('GET')}  /api/v1/events           - Query the audit log`);
  print(`  ${cyan('GET')}  /api/v1/policies         - Active policy`);
  print(`  ${cyan('POST')} /api/v1/policies/reload  - Reload the policy document`);
  print('');
  print('Send SIGHUP to reload the policy. Press Ctrl+C to stop the server');
}
