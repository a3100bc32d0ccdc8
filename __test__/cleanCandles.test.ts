/**
 * Unit tests for series cleaning
 */
import { cleanCandles, maxOpenTime } from '../src/utils/cleanCandles';
import { candle } from './fixtures';

describe('cleanCandles', () => {
  it('should sort rows by open time', () => {
    const rows = [candle(3000), candle(1000), candle(2000)];

    expect(cleanCandles(rows).map(c => c.openTime)).toEqual([1000, 2000, 3000]);
  });

  it('should keep the last-seen row for a duplicated open time', () => {
    const rows = [candle(1000, '1.0'), candle(2000, '2.0'), candle(1000, '9.5')];

    const cleaned = cleanCandles(rows);

    expect(cleaned.map(c => c.openTime)).toEqual([1000, 2000]);
    expect(cleaned[0].close).toBe('9.5');
  });

  it('should return strictly increasing open times', () => {
    const rows = [5000, 1000, 3000, 1000, 5000, 2000, 4000, 3000].map(t => candle(t));

    const times = cleanCandles(rows).map(c => c.openTime);

    for (let i = 1; i < times.length; i++) {
      expect(times[i]).toBeGreaterThan(times[i - 1]);
    }
    expect(times).toHaveLength(5);
  });

  it('should not modify its input', () => {
    const rows = [candle(2000), candle(1000)];

    cleanCandles(rows);

    expect(rows.map(c => c.openTime)).toEqual([2000, 1000]);
  });

  it('should handle an empty series', () => {
    expect(cleanCandles([])).toEqual([]);
  });
});

describe('maxOpenTime', () => {
  it('should return the largest open time', () => {
    expect(maxOpenTime([candle(2000), candle(7000), candle(3000)])).toBe(7000);
  });

  it('should return 0 for an empty series', () => {
    expect(maxOpenTime([])).toBe(0);
  });
});
