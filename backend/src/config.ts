import path from 'path';
import { parseLogLevel, type LogLevel } from './logger.js';

export type Env = Record<string, string | undefined>;

export interface AppConfig {
  apiKey: string;
  apiUrl: string;
  /** as configured; use effectiveWorkerCount() when sizing the pool */
  workerCount: number;
  requestDelayMs: number;
  stocksFile: string;
  /** lookback in trading days */
  outputSize: number;
  logLevel: LogLevel;
  port: number;
  progressIntervalMs: number;
}

export const DEFAULT_API_URL = 'https://www.alphavantage.co/query';
export const MIN_WORKERS = 1;
export const MAX_WORKERS = 10;

function envStr(env: Env, key: string, fallback = ''): string {
  return (env[key] ?? fallback).trim();
}

function envInt(env: Env, key: string, fallback: number): number {
  const raw = env[key]?.trim();
  if (raw === undefined || raw === '') return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n)) {
    throw new Error(`invalid ${key} value: "${raw}" is not an integer`);
  }
  return n;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const apiKey = envStr(env, 'ALPHA_VANTAGE_API_KEY');
  if (!apiKey) {
    throw new Error('ALPHA_VANTAGE_API_KEY environment variable is required');
  }

  const requestDelaySeconds = envInt(env, 'REQUEST_DELAY_SECONDS', 2);
  if (requestDelaySeconds < 0) {
    throw new Error(`invalid REQUEST_DELAY_SECONDS value: ${requestDelaySeconds} is negative`);
  }
  const outputSize = envInt(env, 'OUTPUT_SIZE', 200);
  if (outputSize < 1) {
    throw new Error(`invalid OUTPUT_SIZE value: ${outputSize} must be at least 1`);
  }

  return {
    apiKey,
    apiUrl: envStr(env, 'ALPHA_VANTAGE_API_URL', DEFAULT_API_URL) || DEFAULT_API_URL,
    workerCount: envInt(env, 'WORKER_COUNT', 5),
    requestDelayMs: requestDelaySeconds * 1000,
    stocksFile: path.resolve(envStr(env, 'STOCKS_FILE', 'data/stocks.json') || 'data/stocks.json'),
    outputSize,
    logLevel: parseLogLevel(env.LOG_LEVEL),
    port: envInt(env, 'PORT', 8080),
    progressIntervalMs: envInt(env, 'PROGRESS_INTERVAL_MS', 1000),
  };
}

/** Worker pool size, kept within [1, 10] whatever was configured. */
export function clampWorkerCount(n: number): number {
  if (!Number.isFinite(n) || n < MIN_WORKERS) return MIN_WORKERS;
  if (n > MAX_WORKERS) return MAX_WORKERS;
  return Math.floor(n);
}

export function effectiveWorkerCount(config: Pick<AppConfig, 'workerCount'>): number {
  return clampWorkerCount(config.workerCount);
}

const SECRET_KEY_RE = /(TOKEN|KEY|SECRET|PASSWORD)/i;

// Loggable view of the config with secrets masked.
export function configSnapshot(config: AppConfig): Record<string, string | number> {
  const out: Record<string, string | number> = {};
  for (const [key, value] of Object.entries(config)) {
    if (typeof value !== 'string' && typeof value !== 'number') continue;
    out[key] = SECRET_KEY_RE.test(key) && typeof value === 'string' ? redact(value) : value;
  }
  out.effectiveWorkerCount = effectiveWorkerCount(config);
  return out;
}

function redact(v: string): string {
  if (v.length <= 4) return '****';
  return `${'*'.repeat(v.length - 4)}${v.slice(-4)}`;
}
