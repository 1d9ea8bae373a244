import { env } from './env.js';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';
type LogContext = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function serializeValue(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

function formatConsoleValue(value: unknown): string {
  const serialized = serializeValue(value);
  if (typeof serialized === 'string') {
    return /\s/.test(serialized) ? JSON.stringify(serialized) : serialized;
  }
  return JSON.stringify(serialized) ?? 'undefined';
}

export function formatLogLine(
  format: 'console' | 'json',
  level: LogLevel,
  event: string,
  context: LogContext,
  timestamp: string,
): string {
  if (format === 'json') {
    const entries = Object.entries(context).map(([key, value]) => [key, serializeValue(value)] as const);
    return JSON.stringify({ timestamp, level, event, ...Object.fromEntries(entries) });
  }

  const pairs = Object.entries(context)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${formatConsoleValue(value)}`);
  return [timestamp, level.toUpperCase().padEnd(5), event, ...pairs].join(' ');
}

function write(level: LogLevel, event: string, context: LogContext = {}) {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[env.LOG_LEVEL]) {
    return;
  }

  const line = formatLogLine(env.LOG_FORMAT, level, event, context, new Date().toISOString());
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export const logger = {
  debug: (event: string, context?: LogContext) => write('debug', event, context),
  info: (event: string, context?: LogContext) => write('info', event, context),
  warn: (event: string, context?: LogContext) => write('warn', event, context),
  error: (event: string, context?: LogContext) => write('error', event, context),
};
