import { Logger } from '../services/Logger';
import { TradingPair } from '../types';
import { HttpClient } from './apiClient';

function isTradingPair(value: unknown): value is TradingPair {
  return (
    typeof value === 'object' && value !== null &&
    'symbol' in value && typeof value.symbol === 'string' &&
    'baseAsset' in value && typeof value.baseAsset === 'string' &&
    'quoteAsset' in value && typeof value.quoteAsset === 'string'
  );
}

/**
 * Keep pairs where the base or the quote asset is one of the reference assets
 */
export function filterPairs(pairs: readonly TradingPair[], referenceAssets: readonly string[]): TradingPair[] {
  const allowed = new Set(referenceAssets.map(asset => asset.toUpperCase()));
  return pairs.filter(pair => allowed.has(pair.baseAsset) || allowed.has(pair.quoteAsset));
}

export class TradingPairsGenerator {
  private readonly http: HttpClient;
  private readonly logger: Logger;

  constructor(http: HttpClient, logger: Logger) {
    this.http = http;
    this.logger = logger;
  }

  /**
   * Fetch all symbols listed on the exchange
   */
  async listPairs(): Promise<TradingPair[]> {
    await this.logger.info('PAIRS', 'Fetching exchange information...');
    const response = await this.http.get<unknown>('/exchangeInfo');

    if (response.status !== 200) {
      throw new Error(`Exchange info request failed with HTTP ${response.status}`);
    }

    const data = response.data;
    const symbols = typeof data === 'object' && data !== null && 'symbols' in data ? data.symbols : undefined;
    if (!Array.isArray(symbols)) {
      throw new Error('Exchange info response has no symbols list');
    }

    const pairs = symbols.filter(isTradingPair).map(entry => ({
      symbol: entry.symbol,
      baseAsset: entry.baseAsset,
      quoteAsset: entry.quoteAsset
    }));

    await this.logger.info('PAIRS', `Found ${pairs.length} listed pairs`);
    return pairs;
  }
}
