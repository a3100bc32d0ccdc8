import { createReadStream, createWriteStream } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as readline from 'readline';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { CANDLE_FIELDS, Candle } from '../types';

const HEADER = CANDLE_FIELDS.join(',');
const LINES_PER_CHUNK = 1000;

export class SeriesFileError extends Error {
  readonly filePath: string;
  readonly line: number;

  constructor(filePath: string, line: number, detail: string) {
    super(`${filePath}:${line}: ${detail}`);
    this.name = 'SeriesFileError';
    this.filePath = filePath;
    this.line = line;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function parseInteger(value: string): number | null {
  return /^-?\d+$/.test(value) ? Number(value) : null;
}

function toCsvLine(candle: Candle): string {
  return [
    candle.openTime,
    candle.open,
    candle.high,
    candle.low,
    candle.close,
    candle.volume,
    candle.closeTime,
    candle.quoteAssetVolume,
    candle.numberOfTrades,
    candle.takerBuyBaseAssetVolume,
    candle.takerBuyQuoteAssetVolume,
    candle.ignore
  ].join(',');
}

/**
 * Header line followed by the candle lines, batched into chunks
 */
function* csvChunks(candles: readonly Candle[]): Generator<string> {
  yield HEADER + '\n';
  for (let start = 0; start < candles.length; start += LINES_PER_CHUNK) {
    let chunk = '';
    const end = Math.min(start + LINES_PER_CHUNK, candles.length);
    for (let i = start; i < end; i++) {
      chunk += toCsvLine(candles[i]) + '\n';
    }
    yield chunk;
  }
}

/**
 * One CSV file per trading pair under the data directory
 */
export class SeriesStore {
  private readonly dataDir: string;

  constructor(dataDir: string) {
    this.dataDir = dataDir;
  }

  filePath(baseAsset: string, quoteAsset: string): string {
    return path.join(this.dataDir, `${baseAsset}-${quoteAsset}.csv`);
  }

  async ensureDataDir(): Promise<void> {
    await fs.mkdir(this.dataDir, { recursive: true });
  }

  /**
   * Load a pair's series, or null when nothing has been downloaded yet
   */
  async read(baseAsset: string, quoteAsset: string): Promise<Candle[] | null> {
    const filePath = this.filePath(baseAsset, quoteAsset);

    try {
      await fs.access(filePath);
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw error;
    }

    const input = createReadStream(filePath, { encoding: 'utf8' });
    const lines = readline.createInterface({ input, crlfDelay: Infinity });

    const candles: Candle[] = [];
    let lineNumber = 0;
    try {
      for await (const line of lines) {
        lineNumber++;
        if (lineNumber === 1) {
          if (line !== HEADER) {
            throw new SeriesFileError(filePath, 1, `unexpected header "${line}"`);
          }
          continue;
        }
        if (line === '') continue;
        candles.push(this.parseLine(line, filePath, lineNumber));
      }
    } finally {
      lines.close();
      input.destroy();
    }

    if (lineNumber === 0) {
      throw new SeriesFileError(filePath, 1, 'unexpected header ""');
    }
    return candles;
  }

  /**
   * Replace a pair's series file (streamed to a sibling .tmp file, then renamed)
   */
  async write(baseAsset: string, quoteAsset: string, candles: readonly Candle[]): Promise<void> {
    const filePath = this.filePath(baseAsset, quoteAsset);
    const tmpPath = `${filePath}.tmp`;

    try {
      await pipeline(Readable.from(csvChunks(candles)), createWriteStream(tmpPath, { encoding: 'utf8' }));
    } catch (error) {
      await fs.rm(tmpPath, { force: true });
      throw error;
    }
    await fs.rename(tmpPath, filePath);
  }

  private parseLine(line: string, filePath: string, lineNumber: number): Candle {
    const fields = line.split(',');
    if (fields.length !== CANDLE_FIELDS.length) {
      throw new SeriesFileError(filePath, lineNumber, `expected ${CANDLE_FIELDS.length} fields, got ${fields.length}`);
    }

    const [openTimeText, open, high, low, close, volume, closeTimeText, quoteAssetVolume,
      tradesText, takerBuyBaseAssetVolume, takerBuyQuoteAssetVolume, ignore] = fields;

    const openTime = parseInteger(openTimeText);
    const closeTime = parseInteger(closeTimeText);
    const numberOfTrades = parseInteger(tradesText);
    if (openTime === null || closeTime === null || numberOfTrades === null) {
      throw new SeriesFileError(filePath, lineNumber, 'open_time, close_time and number_of_trades must be integers');
    }

    return {
      openTime,
      open,
      high,
      low,
      close,
      volume,
      closeTime,
      quoteAssetVolume,
      numberOfTrades,
      takerBuyBaseAssetVolume,
      takerBuyQuoteAssetVolume,
      ignore
    };
  }
}
