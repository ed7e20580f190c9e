import { redact } from './redact.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LogEntry {
  level: LogLevel;
  ts: string;
  msg: string;
  [key: string]: unknown;
}

export interface Logger {
  debug(msg: string, extra?: Record<string, unknown>): void;
  info(msg: string, extra?: Record<string, unknown>): void;
  warn(msg: string, extra?: Record<string, unknown>): void;
  error(msg: string, extra?: Record<string, unknown>): void;
  child(bindings: Record<string, unknown>): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_ORDER;
}

function initialLevel(): LogLevel {
  const fromEnv = process.env['SHIPLINE_LOG_LEVEL'] ?? process.env['LOG_LEVEL'];
  return isLogLevel(fromEnv) ? fromEnv : 'info';
}

let currentLevel: LogLevel = initialLevel();

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

function log(
  level: LogLevel,
  msg: string,
  bindings: Record<string, unknown>,
  extra?: Record<string, unknown>,
): void {
  if (!shouldLog(level)) return;
  const entry: LogEntry = {
    level,
    ts: new Date().toISOString(),
    msg: redact(msg),
    ...bindings,
  };
  for (const [key, value] of Object.entries(extra ?? {})) {
    entry[key] = typeof value === 'string' ? redact(value) : value;
  }
  const line = JSON.stringify(entry);
  if (level === 'error') {
    process.stderr.write(line + '\n');
  } else {
    process.stdout.write(line + '\n');
  }
}

function createLogger(bindings: Record<string, unknown>): Logger {
  return {
    debug: (msg, extra) => log('debug', msg, bindings, extra),
    info: (msg, extra) => log('info', msg, bindings, extra),
    warn: (msg, extra) => log('warn', msg, bindings, extra),
    error: (msg, extra) => log('error', msg, bindings, extra),
    child: (more) => createLogger({ ...bindings, ...more }),
  };
}

export const logger: Logger = createLogger({});
