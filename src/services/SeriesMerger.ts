import { BatchResult, Candle, Clock, MergeProgress, systemClock } from '../types';
import { cleanCandles, maxOpenTime } from '../utils/cleanCandles';
import { MAX_KLINES_LIMIT } from '../utils/config';
import { Logger } from './Logger';
import { SeriesStore } from './SeriesStore';

export interface BatchFetcher {
  fetch(symbol: string, interval: string, startTime: number, limit?: number): Promise<BatchResult>;
}

export interface SeriesMergerOptions {
  limit?: number;
  clock?: Clock;
  onProgress?: (progress: MergeProgress) => void;
}

/**
 * Brings one pair's series file up to date with the exchange.
 */
export class SeriesMerger {
  private readonly fetcher: BatchFetcher;
  private readonly store: SeriesStore;
  private readonly logger: Logger;
  private readonly limit: number;
  private readonly clock: Clock;
  private readonly onProgress?: (progress: MergeProgress) => void;

  constructor(fetcher: BatchFetcher, store: SeriesStore, logger: Logger, options: SeriesMergerOptions = {}) {
    this.fetcher = fetcher;
    this.store = store;
    this.logger = logger;
    this.limit = options.limit ?? MAX_KLINES_LIMIT;
    this.clock = options.clock ?? systemClock;
    this.onProgress = options.onProgress;
  }

  /**
   * Fetch every candle newer than the last one on disk, merge and persist.
   * Returns the number of rows the series grew by (0 when nothing was written).
   */
  async mergeSeries(baseAsset: string, quoteAsset: string, interval: string): Promise<number> {
    const symbol = baseAsset + quoteAsset;

    const existing = (await this.store.read(baseAsset, quoteAsset)) ?? [];
    const oldLines = existing.length;
    const batches: Candle[][] = [existing];

    let lastTimestamp = maxOpenTime(existing);
    const now = this.clock.now();

    while (lastTimestamp < now) {
      const previousTimestamp = lastTimestamp;
      const result = await this.fetcher.fetch(symbol, interval, previousTimestamp + 1, this.limit);

      if (result.kind === 'failed') {
        await this.logger.warn('DOWNLOAD', `Stopping ${symbol}: ${result.reason}`, {
          status: result.status,
          startTime: previousTimestamp + 1
        });
        break;
      }
      if (result.kind === 'empty') break;

      lastTimestamp = maxOpenTime(result.candles);

      // The still-open candle keeps its open time between polls
      if (lastTimestamp <= previousTimestamp) break;

      batches.push(result.candles);
      await this.reportProgress({ symbol, interval, lastOpenTime: lastTimestamp });
    }

    if (batches.length === 1) {
      return 0;
    }

    const merged = cleanCandles(batches.flat());
    await this.store.write(baseAsset, quoteAsset, merged);
    return merged.length - oldLines;
  }

  private async reportProgress(progress: MergeProgress): Promise<void> {
    this.onProgress?.(progress);
    await this.logger.info('DOWNLOAD', `${progress.symbol} ${progress.interval} ${new Date(progress.lastOpenTime).toISOString()}`);
  }
}
