import { describe, expect, it, vi } from 'vitest';
import type { AirlineCheckRecord, ArticleLookup, ArticleLookupResult } from '../types/index.js';
import { AirlineChecker, summarize } from './airlineChecker.js';

const articles: Record<string, ArticleLookupResult> = {
  'Air Example': {
    found: true,
    title: 'Air Example',
    url: 'https://en.wikipedia.org/wiki/Air_Example',
    extract: 'Air Example was an airline that ceased operations in 1998.',
  },
  'Skyline Air': {
    found: true,
    title: 'Skyline Air',
    url: 'https://en.wikipedia.org/wiki/Skyline_Air',
    extract: 'Skyline Air currently operates scheduled flights.',
  },
  'Coastal Link': {
    found: true,
    title: 'Coastal Link',
    url: 'https://en.wikipedia.org/wiki/Coastal_Link',
    extract: 'Coastal Link was an airline based in Bergen.',
  },
};

function fakeLookup(delays: Record<string, number> = {}): ArticleLookup {
  return {
    lookup: vi.fn(async (name: string): Promise<ArticleLookupResult> => {
      const delay = delays[name] ?? 0;
      if (delay > 0) {
        await new Promise((resolve) => setTimeout(resolve, delay));
      }
      if (name === 'Broken Air') {
        throw new Error('socket hang up');
      }
      return articles[name] ?? { found: false };
    }),
  };
}

describe('AirlineChecker.checkAirline', () => {
  it('classifies the article text', async () => {
    const checker = new AirlineChecker(fakeLookup());
    await expect(checker.checkAirline('Air Example')).resolves.toEqual({
      airline: 'Air Example',
      found: true,
      title: 'Air Example',
      url: 'https://en.wikipedia.org/wiki/Air_Example',
      classification: { status: 'defunct', confidenceTier: 'high', ceasedYear: '1998' },
    });
  });

  it('returns a not-found record when the lookup finds nothing', async () => {
    const checker = new AirlineChecker(fakeLookup());
    await expect(checker.checkAirline('Zz')).resolves.toEqual({ airline: 'Zz', found: false });
  });

  it('records and logs lookup failures instead of throwing', async () => {
    const logger = vi.fn();
    const checker = new AirlineChecker(fakeLookup(), { logger });

    await expect(checker.checkAirline('Broken Air')).resolves.toEqual({
      airline: 'Broken Air',
      found: false,
      error: 'socket hang up',
    });
    expect(logger).toHaveBeenCalledWith('Lookup failed for "Broken Air": socket hang up');
  });
});

describe('AirlineChecker.checkAll', () => {
  it('returns an empty list for no airlines', async () => {
    const checker = new AirlineChecker(fakeLookup());
    await expect(checker.checkAll([])).resolves.toEqual([]);
  });

  it('emits records in input order even when lookups finish out of order', async () => {
    const checker = new AirlineChecker(fakeLookup({ 'Air Example': 30, 'Skyline Air': 5 }), { concurrency: 3 });
    const emitted: string[] = [];

    const records = await checker.checkAll(['Air Example', 'Skyline Air', 'Coastal Link'], {
      onRecord: (record, index) => {
        emitted.push(`${index}:${record.airline}`);
      },
    });

    expect(emitted).toEqual(['0:Air Example', '1:Skyline Air', '2:Coastal Link']);
    expect(records.map((record) => record.airline)).toEqual(['Air Example', 'Skyline Air', 'Coastal Link']);
  });

  it('logs progress for each airline', async () => {
    const logger = vi.fn();
    const checker = new AirlineChecker(fakeLookup(), { logger });

    await checker.checkAll(['Air Example', 'Zz']);

    expect(logger.mock.calls).toEqual([['[1/2] Air Example'], ['[2/2] Zz']]);
  });

  it('calls the checkpoint with all records so far', async () => {
    const checker = new AirlineChecker(fakeLookup());
    const checkpoints: string[][] = [];

    await checker.checkAll(['Air Example', 'Skyline Air', 'Coastal Link', 'Zz', 'Broken Air'], {
      checkpointEvery: 2,
      onCheckpoint: (records) => {
        checkpoints.push(records.map((record) => record.airline));
      },
    });

    expect(checkpoints).toEqual([
      ['Air Example', 'Skyline Air'],
      ['Air Example', 'Skyline Air', 'Coastal Link', 'Zz'],
    ]);
  });

  it('never checkpoints when checkpointEvery is zero', async () => {
    const checker = new AirlineChecker(fakeLookup());
    const onCheckpoint = vi.fn();

    await checker.checkAll(['Air Example', 'Skyline Air'], { checkpointEvery: 0, onCheckpoint });

    expect(onCheckpoint).not.toHaveBeenCalled();
  });

  it('stops looking airlines up once a checkpoint fails', async () => {
    const lookup = vi.fn(async (): Promise<ArticleLookupResult> => ({ found: false }));
    const checker = new AirlineChecker({ lookup });
    const airlines = Array.from({ length: 20 }, (_, index) => `Airline ${index + 1}`);

    await expect(
      checker.checkAll(airlines, {
        checkpointEvery: 2,
        onCheckpoint: () => {
          throw new Error('disk full');
        },
      }),
    ).rejects.toThrow('disk full');

    await new Promise((resolve) => setTimeout(resolve, 20));
    expect(lookup).toHaveBeenCalledTimes(2);
  });

  it('stops looking airlines up once onRecord fails', async () => {
    const lookup = vi.fn(async (): Promise<ArticleLookupResult> => ({ found: false }));
    const checker = new AirlineChecker({ lookup });

    await expect(
      checker.checkAll(['Air Example', 'Skyline Air', 'Coastal Link'], {
        onRecord: () => {
          throw new Error('write failed');
        },
      }),
    ).rejects.toThrow('write failed');

    await new Promise((resolve) => setTimeout(resolve, 20));
    expect(lookup).toHaveBeenCalledTimes(1);
  });
});

describe('summarize', () => {
  it('counts found records and confidence tiers', async () => {
    const checker = new AirlineChecker(fakeLookup());
    const records = await checker.checkAll(['Air Example', 'Skyline Air', 'Coastal Link', 'Zz', 'Broken Air']);

    expect(summarize(records)).toEqual({
      total: 5,
      found: 3,
      notFound: 2,
      confidence: { high: 2, medium: 0, low: 3 },
    });
  });

  it('handles an empty run', () => {
    const records: AirlineCheckRecord[] = [];
    expect(summarize(records)).toEqual({
      total: 0,
      found: 0,
      notFound: 0,
      confidence: { high: 0, medium: 0, low: 0 },
    });
  });
});
