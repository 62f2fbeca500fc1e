import pLimit from 'p-limit';
import type { AirlineCheckRecord, ArticleLookup, ArticleLookupResult, CheckSummary } from '../types/index.js';
import type { Logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { classifyStatus } from './statusClassifier.js';

export interface AirlineCheckerOptions {
  concurrency?: number;
  logger?: Logger | undefined;
}

export interface CheckAllOptions {
  onRecord?: (record: AirlineCheckRecord, index: number) => Promise<void> | void;
  /** Called with every record so far after each `checkpointEvery` records. */
  onCheckpoint?: (records: AirlineCheckRecord[]) => Promise<void> | void;
  checkpointEvery?: number;
}

export class AirlineChecker {
  private readonly concurrency: number;
  private readonly logger: Logger | undefined;

  constructor(private readonly articles: ArticleLookup, options: AirlineCheckerOptions = {}) {
    this.concurrency = options.concurrency ?? 1;
    this.logger = options.logger;
  }

  /** Looks one airline up and classifies what comes back. Lookup failures become not-found records. */
  async checkAirline(airline: string): Promise<AirlineCheckRecord> {
    let article: ArticleLookupResult;
    try {
      article = await this.articles.lookup(airline);
    } catch (error) {
      const message = errorMessage(error);
      this.logger?.(`Lookup failed for "${airline}": ${message}`);
      return { airline, found: false, error: message };
    }

    if (!article.found) {
      return { airline, found: false };
    }

    return {
      airline,
      found: true,
      title: article.title,
      url: article.url,
      classification: classifyStatus(airline, article.extract),
    };
  }

  /**
   * Checks every airline; records are emitted and returned in input order.
   * Rejects with the first error thrown by `onRecord` or `onCheckpoint`, and no further lookups start.
   */
  async checkAll(airlines: string[], options: CheckAllOptions = {}): Promise<AirlineCheckRecord[]> {
    if (airlines.length === 0) {
      return [];
    }

    const limit = pLimit(this.concurrency);
    const checkpointEvery = options.checkpointEvery ?? 0;
    const records: AirlineCheckRecord[] = [];
    const pending = new Map<number, AirlineCheckRecord>();

    // Drains run one after another so records and checkpoints keep input order.
    let draining: Promise<void> = Promise.resolve();
    const drain = async () => {
      let ready = pending.get(records.length);
      while (ready) {
        pending.delete(records.length);
        records.push(ready);
        if (options.onRecord) {
          await options.onRecord(ready, records.length - 1);
        }
        if (options.onCheckpoint && checkpointEvery > 0 && records.length % checkpointEvery === 0) {
          await options.onCheckpoint([...records]);
        }
        ready = pending.get(records.length);
      }
    };
    const emitIfReady = () => {
      draining = draining.then(drain);
      return draining;
    };

    // Set once a callback throws; airlines still queued are then skipped.
    let stopped = false;
    const tasks = airlines.map((airline, index) =>
      limit(async () => {
        if (stopped) {
          return;
        }
        this.logger?.(`[${index + 1}/${airlines.length}] ${airline}`);
        pending.set(index, await this.checkAirline(airline));
        try {
          await emitIfReady();
        } catch (error) {
          stopped = true;
          throw error;
        }
      }),
    );
    await Promise.all(tasks);
    await emitIfReady();

    return records;
  }
}

export function summarize(records: AirlineCheckRecord[]): CheckSummary {
  const summary: CheckSummary = {
    total: records.length,
    found: 0,
    notFound: 0,
    confidence: { high: 0, medium: 0, low: 0 },
  };

  for (const record of records) {
    if (record.found) {
      summary.found += 1;
      summary.confidence[record.classification.confidenceTier] += 1;
    } else {
      summary.notFound += 1;
      summary.confidence.low += 1;
    }
  }

  return summary;
}
