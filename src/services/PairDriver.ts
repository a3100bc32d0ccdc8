import { RunSummary, TradingPair } from '../types';
import { filterPairs } from '../utils/TradingPairsGenerator';
import { Logger } from './Logger';
import { SeriesMerger } from './SeriesMerger';
import { SeriesStore } from './SeriesStore';

export interface PairSource {
  listPairs(): Promise<TradingPair[]>;
}

export interface PairDriverOptions {
  interval: string;
  referenceAssets: readonly string[];
  random?: () => number;
}

/**
 * Fisher-Yates shuffle into a new array
 */
export function shuffle<T>(items: readonly T[], random: () => number = Math.random): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

export class PairDriver {
  private readonly pairs: PairSource;
  private readonly merger: Pick<SeriesMerger, 'mergeSeries'>;
  private readonly store: Pick<SeriesStore, 'ensureDataDir'>;
  private readonly logger: Logger;
  private readonly options: PairDriverOptions;

  constructor(
    pairs: PairSource,
    merger: Pick<SeriesMerger, 'mergeSeries'>,
    store: Pick<SeriesStore, 'ensureDataDir'>,
    logger: Logger,
    options: PairDriverOptions
  ) {
    this.pairs = pairs;
    this.merger = merger;
    this.store = store;
    this.logger = logger;
    this.options = options;
  }

  /**
   * Update every included pair once, one pair at a time.
   * A failing listing call aborts the run; a failing pair is logged and skipped.
   */
  async run(): Promise<RunSummary> {
    const allPairs = await this.pairs.listPairs();
    const included = shuffle(filterPairs(allPairs, this.options.referenceAssets), this.options.random);

    await this.store.ensureDataDir();
    await this.logger.info('PAIRS', `Updating ${included.length} of ${allPairs.length} pairs`, {
      interval: this.options.interval,
      referenceAssets: this.options.referenceAssets
    });

    const summary: RunSummary = {
      pairsListed: allPairs.length,
      pairsIncluded: included.length,
      pairsProcessed: 0,
      pairsFailed: 0,
      rowsAdded: 0
    };

    for (const [index, pair] of included.entries()) {
      const position = `${index + 1}/${included.length}`;
      try {
        const newLines = await this.merger.mergeSeries(pair.baseAsset, pair.quoteAsset, this.options.interval);
        summary.pairsProcessed++;

        if (newLines > 0) {
          summary.rowsAdded += newLines;
          await this.logger.info('DOWNLOAD', `${position} Wrote ${newLines} new lines to file for ${pair.baseAsset}-${pair.quoteAsset}`);
        }
      } catch (error) {
        summary.pairsFailed++;
        await this.logger.error('DOWNLOAD', `${position} Failed to update ${pair.baseAsset}-${pair.quoteAsset}`, {
          error: error instanceof Error ? error.message : String(error)
        });
      }
    }

    return summary;
  }
}
