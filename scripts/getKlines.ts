#!/usr/bin/env ts-node

/**
 * Get Klines Script
 *
 * Brings the local kline history of every pair quoted in, or based on, one of
 * the reference assets up to date. Each pair is kept in DATA_DIR/<BASE>-<QUOTE>.csv
 * and a run resumes from the last candle on disk.
 *
 * Usage: npm run download
 * Settings come from the environment (see .env.example).
 */

import { config } from 'dotenv';
import { KlinesFetcher } from '../src/services/KlinesFetcher';
import { Logger } from '../src/services/Logger';
import { PairDriver } from '../src/services/PairDriver';
import { SeriesMerger } from '../src/services/SeriesMerger';
import { SeriesStore } from '../src/services/SeriesStore';
import { createExchangeClient } from '../src/utils/apiClient';
import { loadDownloaderConfig } from '../src/utils/config';
import { TradingPairsGenerator } from '../src/utils/TradingPairsGenerator';

config();

async function main(): Promise<void> {
  const settings = loadDownloaderConfig();
  const logger = new Logger(settings.logDir, settings.logLevel);
  await logger.initialize();
  await logger.cleanupOldLogs(settings.logRetentionDays);

  await logger.info('SYSTEM', '🎯 Starting klines download', {
    apiBaseUrl: settings.apiBaseUrl,
    interval: settings.interval,
    dataDir: settings.dataDir
  });

  const http = createExchangeClient({ baseURL: settings.apiBaseUrl, timeoutMs: settings.requestTimeoutMs }, logger);
  const store = new SeriesStore(settings.dataDir);
  const fetcher = new KlinesFetcher(http, logger, { retryCooldownMs: settings.retryCooldownMs });
  const merger = new SeriesMerger(fetcher, store, logger, { limit: settings.limit });
  const driver = new PairDriver(new TradingPairsGenerator(http, logger), merger, store, logger, {
    interval: settings.interval,
    referenceAssets: settings.referenceAssets
  });

  const summary = await driver.run();

  await logger.info('SYSTEM', '🎉 Klines download completed', summary);
}

// Run if called directly
if (require.main === module) {
  main().catch((error: unknown) => {
    console.error('\n💥 Klines download failed:', error);
    process.exit(1);
  });
}
