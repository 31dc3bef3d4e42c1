import pino from 'pino';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

const envLevel = process.env.LOG_LEVEL;

// stdout carries the completion text, so logs go to stderr.
export const logger = pino(
  {
    name: 'prompt-relay',
    level: isLogLevel(envLevel) ? envLevel : 'info',
  },
  pino.destination({ dest: 2, sync: true })
);
