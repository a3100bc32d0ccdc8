import * as fs from 'fs/promises';
import * as path from 'path';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3
}

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  category: string;
  message: string;
  data?: unknown;
}

export class Logger {
  private logDir: string | null;
  private logLevel: LogLevel;

  /**
   * @param logDir directory for the JSON log files; `null` logs to the console only
   */
  constructor(logDir: string | null = './logs', logLevel: LogLevel = LogLevel.INFO) {
    this.logDir = logDir;
    this.logLevel = logLevel;
  }

  /**
   * Initialize the logger by creating log directory
   */
  async initialize(): Promise<void> {
    if (this.logDir === null) return;
    try {
      await fs.mkdir(this.logDir, { recursive: true });
      await this.log(LogLevel.DEBUG, 'SYSTEM', 'Logger initialized', { logDir: this.logDir });
    } catch (error) {
      console.error('Failed to initialize logger:', error);
      throw error;
    }
  }

  /**
   * Log a message with specified level and category
   */
  async log(level: LogLevel, category: string, message: string, data?: unknown): Promise<void> {
    if (level < this.logLevel) return;

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      category: category.toUpperCase(),
      message,
      data
    };

    this.logToConsole(entry);

    if (this.logDir !== null) {
      await this.logToFiles(entry, this.logDir);
    }
  }

  async debug(category: string, message: string, data?: unknown): Promise<void> {
    await this.log(LogLevel.DEBUG, category, message, data);
  }

  async info(category: string, message: string, data?: unknown): Promise<void> {
    await this.log(LogLevel.INFO, category, message, data);
  }

  async warn(category: string, message: string, data?: unknown): Promise<void> {
    await this.log(LogLevel.WARN, category, message, data);
  }

  async error(category: string, message: string, data?: unknown): Promise<void> {
    await this.log(LogLevel.ERROR, category, message, data);
  }

  private logToConsole(entry: LogEntry): void {
    const timestamp = entry.timestamp.toLocaleString();
    const category = entry.category.padEnd(12);

    let color = '\x1b[0m';
    let icon = 'ℹ️';

    switch (entry.level) {
      case LogLevel.DEBUG:
        color = '\x1b[36m'; // Cyan
        icon = '🔍';
        break;
      case LogLevel.INFO:
        color = '\x1b[32m'; // Green
        icon = 'ℹ️';
        break;
      case LogLevel.WARN:
        color = '\x1b[33m'; // Yellow
        icon = '⚠️';
        break;
      case LogLevel.ERROR:
        color = '\x1b[31m'; // Red
        icon = '❌';
        break;
    }

    console.log(`${color}${icon} [${timestamp}] ${category} ${entry.message}\x1b[0m`);

    if (entry.data !== undefined) {
      console.log('   ', JSON.stringify(entry.data, null, 2).replace(/\n/g, '\n    '));
    }
  }

  /**
   * Append the entry as one JSON line to the daily, category and error files
   */
  private async logToFiles(entry: LogEntry, logDir: string): Promise<void> {
    const dateStr = entry.timestamp.toISOString().split('T')[0];

    const logText = JSON.stringify({
      timestamp: entry.timestamp.toISOString(),
      level: LogLevel[entry.level],
      category: entry.category,
      message: entry.message,
      data: entry.data
    }) + '\n';

    const filesToWrite = [
      `${dateStr}_all.log`,
      `${dateStr}_${entry.category.toLowerCase()}.log`,
      ...(entry.level >= LogLevel.ERROR ? [`${dateStr}_errors.log`] : [])
    ];

    const writePromises = filesToWrite.map(async (filename) => {
      try {
        await fs.appendFile(path.join(logDir, filename), logText, 'utf8');
      } catch (error) {
        console.error(`Failed to write to log file ${filename}:`, error);
      }
    });

    await Promise.all(writePromises);
  }

  /**
   * Remove log files older than the given number of days
   */
  async cleanupOldLogs(daysToKeep: number = 30, now: Date = new Date()): Promise<string[]> {
    if (this.logDir === null) return [];

    const removed: string[] = [];
    const cutoffDate = new Date(now.getTime());
    cutoffDate.setUTCDate(cutoffDate.getUTCDate() - daysToKeep);

    const files = await fs.readdir(this.logDir);
    for (const file of files) {
      if (!file.endsWith('.log')) continue;

      const fileDate = new Date(file.split('_')[0]);
      if (!isNaN(fileDate.getTime()) && fileDate < cutoffDate) {
        await fs.unlink(path.join(this.logDir, file));
        removed.push(file);
      }
    }

    if (removed.length > 0) {
      await this.info('SYSTEM', `Cleaned up ${removed.length} old log files`, { daysToKeep });
    }
    return removed;
  }
}

/**
 * Parse a level name such as "warn" or "DEBUG"
 */
export function parseLogLevel(value: string): LogLevel | undefined {
  switch (value.trim().toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'INFO':
      return LogLevel.INFO;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    default:
      return undefined;
  }
}
