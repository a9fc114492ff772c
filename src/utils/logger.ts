import pino, { type LoggerOptions } from 'pino';

const env = process.env['NODE_ENV'];
const isTest = env === 'test' || process.env['VITEST'] !== undefined;
const isDev = env !== 'production' && !isTest;

// Logs go to stderr so command output on stdout stays parseable
const options: LoggerOptions = {
  level: process.env['RESEARCH_RELAY_LOG_LEVEL'] ?? (isTest ? 'silent' : 'info'),
  base: {
    pid: undefined,
    hostname: undefined,
  },
};

if (isDev) {
  options.transport = {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
      destination: 2,
    },
  };
}

export const logger = isDev ? pino(options) : pino(options, pino.destination(2));

export function createLogger(module: string): pino.Logger {
  return logger.child({ module });
}
