import pino from 'pino';
import { config } from '../config/index.js';

const base = pino({
  level: config.logLevel,
  base: { pid: process.pid },
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

type LogMeta = Record<string, unknown> | Error;

function write(level: 'debug' | 'info' | 'warn' | 'error', message: string, meta?: LogMeta): void {
  if (meta === undefined) {
    base[level](message);
  } else if (meta instanceof Error) {
    base[level]({ err: meta }, message);
  } else {
    base[level](meta, message);
  }
}

export const logger = {
  debug: (message: string, meta?: LogMeta) => write('debug', message, meta),
  info: (message: string, meta?: LogMeta) => write('info', message, meta),
  warn: (message: string, meta?: LogMeta) => write('warn', message, meta),
  error: (message: string, meta?: LogMeta) => write('error', message, meta),
};

export type Logger = typeof logger;

export default logger;
