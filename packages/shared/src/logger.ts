import { hostname } from 'node:os';
import pino from 'pino';

export const SERVICE_NAME = 'agora';
export const SERVICE_VERSION = '0.1.0';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'];

/** Credentials that can end up in request or client log context. */
const REDACTED_PATHS = ['authorization', 'headers.authorization', 'apiKey', '*.apiKey'];

export function parseLogLevel(value: string | undefined): LogLevel {
  return LOG_LEVELS.find((level) => level === value) ?? 'info';
}

export interface LoggerOptions {
  readonly env?: NodeJS.ProcessEnv;
  /** Writes JSON lines here instead of stdout; disables the dev transport. */
  readonly destination?: pino.DestinationStream;
}

export function createLogger(options: LoggerOptions = {}): pino.Logger {
  const env = options.env ?? process.env;
  const base: pino.LoggerOptions = {
    name: SERVICE_NAME,
    level: parseLogLevel(env['LOG_LEVEL']),
    base: {
      pid: process.pid,
      hostname: hostname(),
      version: SERVICE_VERSION,
      ...(env['AGORA_MEMORY'] !== undefined && { memory: env['AGORA_MEMORY'] }),
    },
    redact: { paths: REDACTED_PATHS, censor: '[redacted]' },
  };
  if (options.destination) {
    return pino(base, options.destination);
  }
  return pino({
    ...base,
    transport:
      env['NODE_ENV'] === 'development'
        ? { target: 'pino/file', options: { destination: 1 } }
        : undefined,
  });
}

export const logger = createLogger();

export function createChildLogger(component: string): pino.Logger {
  return logger.child({ component });
}
