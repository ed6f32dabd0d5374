import { config } from './config.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const order: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface Logger {
  debug(msg: string, data?: unknown): void;
  info(msg: string, data?: unknown): void;
  warn(msg: string, data?: unknown): void;
  error(msg: string, data?: unknown): void;
}

function toLevel(value: string): LogLevel {
  return value === 'debug' || value === 'warn' || value === 'error' ? value : 'info';
}

export function createLogger(category: string, minLevel: LogLevel = toLevel(config.logLevel)): Logger {
  const write = (level: LogLevel, msg: string, data?: unknown): void => {
    if (order[level] < order[minLevel]) return;
    const prefix = `[${category}][${level.toUpperCase()}]`;
    const args = data !== undefined ? [prefix, msg, data] : [prefix, msg];
    /* eslint-disable no-console */
    if (level === 'error') console.error(...args);
    else if (level === 'warn') console.warn(...args);
    else console.log(...args);
    /* eslint-enable no-console */
  };
  return {
    debug: (msg, data) => write('debug', msg, data),
    info: (msg, data) => write('info', msg, data),
    warn: (msg, data) => write('warn', msg, data),
    error: (msg, data) => write('error', msg, data)
  };
}
