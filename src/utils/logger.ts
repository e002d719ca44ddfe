/**
 * Simple logger utility that writes level-prefixed lines to stderr
 * so stdout stays free for CLI output
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

let threshold: LogLevel = isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

function serialize(value: unknown): string {
  if (value instanceof Error) {
    return value.stack ?? `${value.name}: ${value.message}`;
  }
  try {
    return JSON.stringify(value, null, 2);
  } catch {
    return String(value);
  }
}

function write(level: LogLevel, message: string, args: unknown[]): void {
  if (!enabled(level)) return;
  process.stderr.write(`[${level.toUpperCase()}] ${message}\n`);
  if (args.length === 1) {
    process.stderr.write(`${serialize(args[0])}\n`);
  } else if (args.length > 1) {
    process.stderr.write(`${serialize(args)}\n`);
  }
}

export const logger = {
  info: (message: string, ...args: unknown[]) => write('info', message, args),

  error: (message: string, error?: unknown) =>
    write('error', message, error === undefined ? [] : [error]),

  debug: (message: string, ...args: unknown[]) => write('debug', message, args),

  warn: (message: string, ...args: unknown[]) => write('warn', message, args),
};

export type Logger = typeof logger;
