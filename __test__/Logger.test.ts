/**
 * Unit tests for the file logger
 */
import * as fs from 'fs/promises';
import * as path from 'path';
import { LogLevel, Logger, parseLogLevel } from '../src/services/Logger';
import { makeTempDir, removeDir } from './fixtures';

const today = (): string => new Date().toISOString().split('T')[0];

describe('Logger Service', () => {
  let logDir: string;

  beforeEach(async () => {
    logDir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(logDir);
  });

  describe('File output', () => {
    it('should append JSON lines to the daily and category files', async () => {
      const logger = new Logger(logDir, LogLevel.INFO);
      await logger.initialize();

      await logger.info('download', 'ETHBTC 1m reached', { rows: 2 });

      const all = await fs.readFile(path.join(logDir, `${today()}_all.log`), 'utf8');
      const entry = JSON.parse(all.trim());
      expect(entry).toMatchObject({ level: 'INFO', category: 'DOWNLOAD', message: 'ETHBTC 1m reached', data: { rows: 2 } });

      const category = await fs.readFile(path.join(logDir, `${today()}_download.log`), 'utf8');
      expect(category).toBe(all);
    });

    it('should also write errors to the error file', async () => {
      const logger = new Logger(logDir, LogLevel.INFO);

      await logger.error('download', 'Failed to update ETH-BTC');

      const files = (await fs.readdir(logDir)).sort();
      expect(files).toEqual([`${today()}_all.log`, `${today()}_download.log`, `${today()}_errors.log`].sort());
    });

    it('should drop entries below the configured level', async () => {
      const logger = new Logger(logDir, LogLevel.WARN);

      await logger.info('download', 'progress');
      await logger.debug('http', 'GET /klines');

      await expect(fs.readdir(logDir)).resolves.toEqual([]);
    });

    it('should only log to the console without a log directory', async () => {
      const logger = new Logger(null, LogLevel.DEBUG);
      await logger.initialize();

      expect(console.log).not.toHaveBeenCalled();

      await logger.info('download', 'progress');

      expect(console.log).toHaveBeenCalledTimes(1);
      expect(jest.mocked(console.log).mock.calls[0][0]).toContain('DOWNLOAD     progress');
      await expect(fs.readdir(logDir)).resolves.toEqual([]);
    });
  });

  describe('Log retention', () => {
    it('should delete dated log files older than the retention period', async () => {
      await fs.writeFile(path.join(logDir, '2026-01-01_all.log'), '');
      await fs.writeFile(path.join(logDir, '2026-03-30_all.log'), '');
      await fs.writeFile(path.join(logDir, 'notes.txt'), '');
      const logger = new Logger(logDir, LogLevel.WARN);

      const removed = await logger.cleanupOldLogs(30, new Date('2026-03-31T12:00:00Z'));

      expect(removed).toEqual(['2026-01-01_all.log']);
      expect((await fs.readdir(logDir)).sort()).toEqual(['2026-03-30_all.log', 'notes.txt']);
    });

    it('should do nothing without a log directory', async () => {
      await expect(new Logger(null).cleanupOldLogs(1)).resolves.toEqual([]);
    });
  });

  describe('parseLogLevel', () => {
    it('should parse level names regardless of case', () => {
      expect(parseLogLevel('warn')).toBe(LogLevel.WARN);
      expect(parseLogLevel(' ERROR ')).toBe(LogLevel.ERROR);
    });

    it('should return undefined for unknown names', () => {
      expect(parseLogLevel('verbose')).toBeUndefined();
    });
  });
});
