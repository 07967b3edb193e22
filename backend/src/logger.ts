/**
 * Tagged console logger. Keeps the last N lines in memory so the HTTP surface can show them.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

function isLogLevel(v: string): v is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, v);
}

export function parseLogLevel(raw: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const v = raw?.trim().toLowerCase();
  return v && isLogLevel(v) ? v : fallback;
}

let minLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL);

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function getLogLevel(): LogLevel {
  return minLevel;
}

export type LogLine = { ts: string; level: string; tag: string; message: string; meta?: string };

const MAX_LOG_LINES = 1000;
const logBuffer: LogLine[] = [];

function pushToBuffer(line: LogLine): void {
  logBuffer.push(line);
  if (logBuffer.length > MAX_LOG_LINES) logBuffer.shift();
}

function log(level: Exclude<LogLevel, 'silent'>, tag: string, message: string, meta?: Record<string, unknown>): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;
  const ts = new Date().toISOString();
  const metaStr = meta ? JSON.stringify(meta) : undefined;
  const line = `[${ts}] [${level.toUpperCase()}] [${tag}] ${message}${metaStr ? ` ${metaStr}` : ''}`;
  pushToBuffer({ ts, level: level.toUpperCase(), tag, message, meta: metaStr });
  switch (level) {
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.log(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
      console.error(line);
      break;
  }
}

export function getRecentLogs(limit = 500): LogLine[] {
  const start = Math.max(0, logBuffer.length - limit);
  return logBuffer.slice(start);
}

export const logger = {
  debug(tag: string, msg: string, meta?: Record<string, unknown>) {
    log('debug', tag, msg, meta);
  },
  info(tag: string, msg: string, meta?: Record<string, unknown>) {
    log('info', tag, msg, meta);
  },
  warn(tag: string, msg: string, meta?: Record<string, unknown>) {
    log('warn', tag, msg, meta);
  },
  error(tag: string, msg: string, meta?: Record<string, unknown>) {
    log('error', tag, msg, meta);
  },
};
