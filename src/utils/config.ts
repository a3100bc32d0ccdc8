import { LogLevel, parseLogLevel } from '../services/Logger';
import { KlineInterval, SUPPORTED_INTERVALS, isSupportedInterval } from './intervals';

export const MAX_KLINES_LIMIT = 1000;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface DownloaderConfig {
  readonly apiBaseUrl: string;
  readonly interval: KlineInterval;
  readonly limit: number;
  readonly requestTimeoutMs: number;
  readonly retryCooldownMs: number;
  readonly dataDir: string;
  readonly referenceAssets: readonly string[];
  readonly logDir: string | null;
  readonly logLevel: LogLevel;
  readonly logRetentionDays: number;
}

type Env = Record<string, string | undefined>;

function readInteger(env: Env, name: string, fallback: number, min: number, max: number = Number.MAX_SAFE_INTEGER): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = /^\d+$/.test(raw.trim()) ? Number(raw.trim()) : NaN;
  if (!Number.isSafeInteger(value) || value < min || value > max) {
    throw new ConfigError(`${name} must be an integer between ${min} and ${max}, got "${raw}"`);
  }
  return value;
}

/**
 * Build the downloader configuration from environment variables
 */
export function loadDownloaderConfig(env: Env = process.env): DownloaderConfig {
  const interval = env.KLINES_INTERVAL?.trim() || '1m';
  if (!isSupportedInterval(interval)) {
    throw new ConfigError(`Invalid KLINES_INTERVAL: ${interval}. Valid intervals: ${SUPPORTED_INTERVALS.join(', ')}`);
  }

  const levelName = env.LOG_LEVEL?.trim() || 'INFO';
  const logLevel = parseLogLevel(levelName);
  if (logLevel === undefined) {
    throw new ConfigError(`Invalid LOG_LEVEL: ${levelName}. Valid levels: DEBUG, INFO, WARN, ERROR`);
  }

  const referenceAssets = (env.REFERENCE_ASSETS ?? 'BTC,USDT')
    .split(',')
    .map(asset => asset.trim().toUpperCase())
    .filter(asset => asset.length > 0);
  if (referenceAssets.length === 0) {
    throw new ConfigError('REFERENCE_ASSETS must name at least one asset');
  }

  const logDir = env.LOG_DIR === undefined ? 'logs' : env.LOG_DIR.trim();

  return Object.freeze({
    apiBaseUrl: (env.BINANCE_API_URL?.trim() || 'https://api.binance.com/api/v3').replace(/\/+$/, ''),
    interval,
    limit: readInteger(env, 'KLINES_LIMIT', MAX_KLINES_LIMIT, 1, MAX_KLINES_LIMIT),
    requestTimeoutMs: readInteger(env, 'REQUEST_TIMEOUT_MS', 30_000, 1),
    retryCooldownMs: readInteger(env, 'RETRY_COOLDOWN_MS', 5 * 60 * 1000, 0),
    dataDir: env.DATA_DIR?.trim() || 'data',
    referenceAssets: Object.freeze(referenceAssets),
    logDir: logDir === '' ? null : logDir,
    logLevel,
    logRetentionDays: readInteger(env, 'LOG_RETENTION_DAYS', 30, 1)
  });
}
