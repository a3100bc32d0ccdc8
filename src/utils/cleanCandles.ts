import { Candle } from '../types';

/**
 * Sort candles by open time and drop duplicate open times.
 * When two rows share an open time the one seen last wins, so a freshly
 * fetched candle replaces a stale copy loaded from disk.
 */
export function cleanCandles(rows: readonly Candle[]): Candle[] {
  const byOpenTime = new Map<number, Candle>();
  for (const row of rows) {
    byOpenTime.set(row.openTime, row);
  }

  return Array.from(byOpenTime.values()).sort((a, b) => a.openTime - b.openTime);
}

export function maxOpenTime(rows: readonly Candle[]): number {
  let max = 0;
  for (const row of rows) {
    if (row.openTime > max) max = row.openTime;
  }
  return max;
}
