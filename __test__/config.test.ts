/**
 * Unit tests for environment configuration
 */
import { LogLevel } from '../src/services/Logger';
import { ConfigError, loadDownloaderConfig } from '../src/utils/config';

describe('loadDownloaderConfig', () => {
  it('should fall back to defaults', () => {
    expect(loadDownloaderConfig({})).toEqual({
      apiBaseUrl: 'https://api.binance.com/api/v3',
      interval: '1m',
      limit: 1000,
      requestTimeoutMs: 30000,
      retryCooldownMs: 300000,
      dataDir: 'data',
      referenceAssets: ['BTC', 'USDT'],
      logDir: 'logs',
      logLevel: LogLevel.INFO,
      logRetentionDays: 30
    });
  });

  it('should read overrides from the environment', () => {
    const settings = loadDownloaderConfig({
      BINANCE_API_URL: 'http://localhost:8080/api/v3/',
      KLINES_INTERVAL: '1h',
      KLINES_LIMIT: '500',
      RETRY_COOLDOWN_MS: '0',
      DATA_DIR: 'history',
      REFERENCE_ASSETS: ' eth, bnb ,',
      LOG_DIR: '',
      LOG_LEVEL: 'debug'
    });

    expect(settings.apiBaseUrl).toBe('http://localhost:8080/api/v3');
    expect(settings.interval).toBe('1h');
    expect(settings.limit).toBe(500);
    expect(settings.retryCooldownMs).toBe(0);
    expect(settings.dataDir).toBe('history');
    expect(settings.referenceAssets).toEqual(['ETH', 'BNB']);
    expect(settings.logDir).toBeNull();
    expect(settings.logLevel).toBe(LogLevel.DEBUG);
  });

  it('should return a frozen object', () => {
    expect(Object.isFrozen(loadDownloaderConfig({}))).toBe(true);
  });

  it('should reject an unknown interval', () => {
    expect(() => loadDownloaderConfig({ KLINES_INTERVAL: '7m' })).toThrow(ConfigError);
  });

  it('should reject a limit above the exchange maximum', () => {
    expect(() => loadDownloaderConfig({ KLINES_LIMIT: '1500' }))
      .toThrow('KLINES_LIMIT must be an integer between 1 and 1000, got "1500"');
  });

  it('should reject a fractional timeout', () => {
    expect(() => loadDownloaderConfig({ REQUEST_TIMEOUT_MS: '12.5' })).toThrow(ConfigError);
  });

  it.each(['0x10', '1e3', '-5', '+7', '16px'])('should reject "%s" as a limit', (raw) => {
    expect(() => loadDownloaderConfig({ KLINES_LIMIT: raw }))
      .toThrow(`KLINES_LIMIT must be an integer between 1 and 1000, got "${raw}"`);
  });

  it('should accept a limit padded with spaces', () => {
    expect(loadDownloaderConfig({ KLINES_LIMIT: ' 250 ' }).limit).toBe(250);
  });

  it('should read process.env by default', () => {
    // Loaded from .env.test by the test setup
    const settings = loadDownloaderConfig();

    expect(settings.logDir).toBeNull();
    expect(settings.logLevel).toBe(LogLevel.ERROR);
    expect(settings.retryCooldownMs).toBe(0);
  });

  it('should reject an unknown log level', () => {
    expect(() => loadDownloaderConfig({ LOG_LEVEL: 'loud' })).toThrow('Invalid LOG_LEVEL: loud');
  });

  it('should reject an empty reference asset list', () => {
    expect(() => loadDownloaderConfig({ REFERENCE_ASSETS: ' , ' })).toThrow('REFERENCE_ASSETS must name at least one asset');
  });
});
