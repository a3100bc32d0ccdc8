/**
 * Kline intervals accepted by the exchange
 */
export const SUPPORTED_INTERVALS = [
  '1s', '1m', '3m', '5m', '15m', '30m',
  '1h', '2h', '4h', '6h', '8h', '12h',
  '1d', '3d', '1w', '1M'
] as const;

export type KlineInterval = typeof SUPPORTED_INTERVALS[number];

const INTERVAL_SET: ReadonlySet<string> = new Set(SUPPORTED_INTERVALS);

export function isSupportedInterval(interval: string): interval is KlineInterval {
  return INTERVAL_SET.has(interval);
}
