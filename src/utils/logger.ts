import { env } from '../config.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

let levelOverride: LogLevel | undefined;

/** Raise or lower verbosity at run time (e.g. the CLI's --verbose flag). */
export function setLogLevel(level: LogLevel): void {
  levelOverride = level;
}

function log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
  if (LEVELS[level] < LEVELS[levelOverride ?? env.LOG_LEVEL]) return;
  const ts = new Date().toISOString();
  const out = env.LOG_FORMAT === 'json'
    ? JSON.stringify({ timestamp: ts, level, message, ...meta }, errorReplacer)
    : meta ? `[${ts}] [${level.toUpperCase()}] ${message} ${JSON.stringify(meta, errorReplacer)}`
           : `[${ts}] [${level.toUpperCase()}] ${message}`;
  level === 'error' ? process.stderr.write(out + '\n') : process.stdout.write(out + '\n');
}

function errorReplacer(_key: string, value: unknown): unknown {
  return value instanceof Error ? { name: value.name, message: value.message } : value;
}

export const logger = {
  debug: (msg: string, meta?: Record<string, unknown>) => log('debug', msg, meta),
  info:  (msg: string, meta?: Record<string, unknown>) => log('info',  msg, meta),
  warn:  (msg: string, meta?: Record<string, unknown>) => log('warn',  msg, meta),
  error: (msg: string, meta?: Record<string, unknown>) => log('error', msg, meta),
};
