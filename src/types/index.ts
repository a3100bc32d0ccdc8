/**
 * Raw kline row as returned by the klines endpoint.
 */
export type RawKline = [
  number, // Open time
  string, // Open
  string, // High
  string, // Low
  string, // Close
  string, // Volume
  number, // Close time
  string, // Quote asset volume
  number, // Number of trades
  string, // Taker buy base asset volume
  string, // Taker buy quote asset volume
  string  // Ignore
];

/**
 * One candle of a series. Decimal fields keep the exact text the exchange
 * returned so a rewritten series file stays byte-identical.
 */
export interface Candle {
  openTime: number;
  open: string;
  high: string;
  low: string;
  close: string;
  volume: string;
  closeTime: number;
  quoteAssetVolume: string;
  numberOfTrades: number;
  takerBuyBaseAssetVolume: string;
  takerBuyQuoteAssetVolume: string;
  ignore: string;
}

/**
 * Column names of a series file, in file order.
 */
export const CANDLE_FIELDS = [
  'open_time',
  'open',
  'high',
  'low',
  'close',
  'volume',
  'close_time',
  'quote_asset_volume',
  'number_of_trades',
  'taker_buy_base_asset_volume',
  'taker_buy_quote_asset_volume',
  'ignore'
] as const;

export interface TradingPair {
  symbol: string;
  baseAsset: string;
  quoteAsset: string;
}

export type BatchResult =
  | { kind: 'success'; candles: Candle[] }
  | { kind: 'empty' }
  | { kind: 'failed'; status: number; reason: string };

export interface Clock {
  now(): number;
}

export type Sleep = (ms: number) => Promise<void>;

export interface MergeProgress {
  symbol: string;
  interval: string;
  lastOpenTime: number;
}

export interface RunSummary {
  pairsListed: number;
  pairsIncluded: number;
  pairsProcessed: number;
  pairsFailed: number;
  rowsAdded: number;
}

export const systemClock: Clock = {
  now: () => Date.now()
};

export const sleep: Sleep = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));
