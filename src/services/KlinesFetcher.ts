import axios, { AxiosResponse } from 'axios';
import { BatchResult, Candle, Sleep, sleep as defaultSleep } from '../types';
import { HttpClient } from '../utils/apiClient';
import { MAX_KLINES_LIMIT } from '../utils/config';
import { Logger } from './Logger';

export interface KlinesFetcherOptions {
  retryCooldownMs: number;
  sleep?: Sleep;
}

function toDecimal(value: unknown): string | null {
  if (typeof value === 'string') {
    return value.trim() !== '' && Number.isFinite(Number(value)) ? value : null;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return null;
}

function toInteger(value: unknown): number | null {
  return typeof value === 'number' && Number.isSafeInteger(value) ? value : null;
}

/**
 * Map one positional kline row onto a candle, or null when the row does not
 * have the expected shape
 */
export function parseKline(raw: unknown): Candle | null {
  if (!Array.isArray(raw) || raw.length < 12) return null;

  const openTime = toInteger(raw[0]);
  const closeTime = toInteger(raw[6]);
  const numberOfTrades = toInteger(raw[8]);
  const decimals = [1, 2, 3, 4, 5, 7, 9, 10].map(index => toDecimal(raw[index]));
  const [open, high, low, close, volume, quoteAssetVolume, takerBuyBaseAssetVolume, takerBuyQuoteAssetVolume] = decimals;

  if (
    openTime === null || closeTime === null || numberOfTrades === null ||
    open === null || high === null || low === null || close === null || volume === null ||
    quoteAssetVolume === null || takerBuyBaseAssetVolume === null || takerBuyQuoteAssetVolume === null
  ) {
    return null;
  }

  const ignore = raw[11];

  return {
    openTime,
    open,
    high,
    low,
    close,
    volume,
    closeTime,
    quoteAssetVolume,
    numberOfTrades,
    takerBuyBaseAssetVolume,
    takerBuyQuoteAssetVolume,
    ignore: typeof ignore === 'string' || typeof ignore === 'number' ? String(ignore) : ''
  };
}

/**
 * Connection failures, resets and timeouts surface as axios errors without a response
 */
export function isTransientNetworkError(error: unknown): boolean {
  return axios.isAxiosError(error) && error.response === undefined;
}

export class KlinesFetcher {
  private readonly http: HttpClient;
  private readonly logger: Logger;
  private readonly retryCooldownMs: number;
  private readonly sleep: Sleep;

  constructor(http: HttpClient, logger: Logger, options: KlinesFetcherOptions) {
    this.http = http;
    this.logger = logger;
    this.retryCooldownMs = options.retryCooldownMs;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Fetch one batch of klines starting at `startTime` (inclusive).
   * Transient network errors are retried after a fixed cooldown for as long
   * as they keep happening; any other outcome is returned to the caller.
   */
  async fetch(symbol: string, interval: string, startTime: number, limit: number = MAX_KLINES_LIMIT): Promise<BatchResult> {
    const boundedLimit = Math.max(1, Math.min(limit, MAX_KLINES_LIMIT));
    const params = { symbol, interval, startTime, limit: boundedLimit };

    for (let attempt = 1; ; attempt++) {
      let response: AxiosResponse<unknown>;
      try {
        response = await this.http.get<unknown>('/klines', { params });
      } catch (error) {
        if (!isTransientNetworkError(error)) {
          throw error;
        }
        const reason = axios.isAxiosError(error) ? (error.code ?? error.message) : 'network error';
        await this.logger.warn('DOWNLOAD', `${reason} for ${symbol}, cooling down for ${Math.round(this.retryCooldownMs / 1000)}s`, {
          symbol,
          startTime,
          attempt
        });
        await this.sleep(this.retryCooldownMs);
        continue;
      }

      if (response.status !== 200) {
        return { kind: 'failed', status: response.status, reason: `HTTP ${response.status}` };
      }

      return this.classifyPayload(response.data, boundedLimit);
    }
  }

  private classifyPayload(payload: unknown, limit: number): BatchResult {
    if (!Array.isArray(payload)) {
      return { kind: 'failed', status: 200, reason: 'malformed: payload is not an array' };
    }

    const candles: Candle[] = [];
    for (const [index, raw] of payload.slice(0, limit).entries()) {
      const candle = parseKline(raw);
      if (candle === null) {
        return { kind: 'failed', status: 200, reason: `malformed: row ${index} has an unexpected shape` };
      }
      candles.push(candle);
    }

    return candles.length === 0 ? { kind: 'empty' } : { kind: 'success', candles };
  }
}
