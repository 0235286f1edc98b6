import { pino, type Logger, type LoggerOptions } from 'pino';

const env = process.env['NODE_ENV'];
const isTest = env === 'test' || process.env['VITEST'] !== undefined;
const isDev = env !== 'production' && !isTest;

const options: LoggerOptions = {
  level: process.env['ZTGATE_LOG_LEVEL'] ?? (isTest ? 'silent' : isDev ? 'debug' : 'info'),
  base: {
    pid: undefined,
    hostname: undefined,
  },
};

// Only add transport in dev mode
if (isDev) {
  options.transport = {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
    },
  };
}

export const logger = pino(options);

export function createLogger(module: string): Logger {
  return logger.child({ module });
}
