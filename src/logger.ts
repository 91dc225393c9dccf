/**
 * Structured logging with pino, always on stderr so stdout can carry JSONL records
 */
import { createRequire } from 'node:module';
import pino, { type LoggerOptions, type TransportSingleOptions } from 'pino';

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

type LogLevel = (typeof LOG_LEVELS)[number];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function levelFromEnv(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  return envLevel && isLogLevel(envLevel) ? envLevel : 'info';
}

/** pino-pretty in development when it resolves; it is a dev dependency only. */
function prettyTransport(): TransportSingleOptions | undefined {
  if (process.env.NODE_ENV !== 'development') return undefined;
  try {
    createRequire(import.meta.url).resolve('pino-pretty');
  } catch {
    return undefined;
  }
  return {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
      destination: 2,
    },
  };
}

const options: LoggerOptions = {
  level: levelFromEnv(),
  formatters: {
    level: (label) => ({ level: label }),
  },
  base: { service: 'webtrawl' },
};

const transport = prettyTransport();

export const logger = transport
  ? pino({ ...options, transport })
  : pino(options, pino.destination(2));
