import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { BatchResult, Candle, RawKline } from '../src/types';
import { BatchFetcher } from '../src/services/SeriesMerger';

export function candle(openTime: number, close: string = '1.0'): Candle {
  return {
    openTime,
    open: '1.0',
    high: '1.0',
    low: '1.0',
    close,
    volume: '10.0',
    closeTime: openTime + 59999,
    quoteAssetVolume: '10.0',
    numberOfTrades: 5,
    takerBuyBaseAssetVolume: '5.0',
    takerBuyQuoteAssetVolume: '5.0',
    ignore: '0'
  };
}

/**
 * The exchange's positional form of `candle(openTime, close)`
 */
export function rawKline(openTime: number, close: string = '1.0'): RawKline {
  return [openTime, '1.0', '1.0', '1.0', close, '10.0', openTime + 59999, '10.0', 5, '5.0', '5.0', '0'];
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'klines-history-'));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export interface FetchCall {
  symbol: string;
  interval: string;
  startTime: number;
  limit?: number;
}

/**
 * In-memory exchange: answers each request with up to `pageSize` candles
 * whose open time is at or after the requested start time.
 */
export class FakeExchange implements BatchFetcher {
  readonly calls: FetchCall[] = [];
  private readonly candles: Candle[];
  private readonly pageSize: number;

  constructor(candles: Candle[], pageSize: number = 1000) {
    this.candles = [...candles].sort((a, b) => a.openTime - b.openTime);
    this.pageSize = pageSize;
  }

  async fetch(symbol: string, interval: string, startTime: number, limit?: number): Promise<BatchResult> {
    this.calls.push({ symbol, interval, startTime, limit });
    const page = this.candles.filter(c => c.openTime >= startTime).slice(0, this.pageSize);
    return page.length === 0 ? { kind: 'empty' } : { kind: 'success', candles: page };
  }
}

/**
 * Answers requests from a fixed script, one result per call
 */
export class ScriptedFetcher implements BatchFetcher {
  readonly calls: FetchCall[] = [];
  private readonly script: Array<(startTime: number) => BatchResult>;

  constructor(script: Array<(startTime: number) => BatchResult>) {
    this.script = script;
  }

  async fetch(symbol: string, interval: string, startTime: number, limit?: number): Promise<BatchResult> {
    this.calls.push({ symbol, interval, startTime, limit });
    const step = this.script[Math.min(this.calls.length, this.script.length) - 1];
    return step(startTime);
  }
}
