import { hostname } from 'node:os';
import pino from 'pino';

const isTest = process.env.VITEST === 'true' || process.env.NODE_ENV === 'test';
const isDev = process.env.NODE_ENV !== 'production' && !isTest;
const logLevel = isTest ? 'silent' : process.env.LOG_LEVEL ?? (isDev ? 'debug' : 'info');

const transport = isDev
  ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'yyyy-mm-dd HH:MM:ss.l',
        ignore: 'pid,hostname',
        messageFormat: '{component} | {msg}',
      },
    }
  : undefined;

export const logger = pino({
  level: logLevel,
  base: {
    pid: process.pid,
    hostname: hostname(),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  ...(transport ? { transport } : {}),
});

export type Logger = pino.Logger;

export interface LogContext {
  component?: string;
  platform?: string;
}

export function createLogger(context: LogContext): Logger {
  return logger.child(context);
}
