import { describe, expect, it } from 'vitest';
import type { AirlineCheckRecord } from '../types/index.js';
import { recordToRow, recordsToRows, statusLabel } from './rows.js';

describe('statusLabel', () => {
  it('includes the ceased year for defunct airlines', () => {
    expect(statusLabel('defunct', '1998')).toBe('DEFUNCT (ceased 1998)');
  });

  it('notes an unknown ceased date', () => {
    expect(statusLabel('defunct')).toBe('DEFUNCT (ceased date unknown)');
  });

  it('labels the other statuses', () => {
    expect(statusLabel('operating')).toBe('OPERATING');
    expect(statusLabel('renamed')).toBe('RENAMED');
    expect(statusLabel('unknown')).toBe('STATUS UNKNOWN');
  });
});

describe('recordToRow', () => {
  it('maps a classified record', () => {
    const record: AirlineCheckRecord = {
      airline: 'Northeast',
      found: true,
      title: 'Northeast Airlines',
      url: 'https://en.wikipedia.org/wiki/Northeast_Airlines',
      classification: { status: 'renamed', confidenceTier: 'low', successorName: 'Delta Airlines' },
    };

    expect(recordToRow(record, 4)).toEqual({
      index: 4,
      airline: 'Northeast',
      status: 'RENAMED',
      successor: 'Delta Airlines',
      confidence: 'LOW',
      source: 'Wikipedia: https://en.wikipedia.org/wiki/Northeast_Airlines',
    });
  });

  it('fills not-found records with placeholders', () => {
    expect(recordToRow({ airline: 'Zz', found: false, error: 'timeout' }, 1)).toEqual({
      index: 1,
      airline: 'Zz',
      status: 'NOT FOUND',
      successor: 'N/A',
      confidence: 'LOW',
      source: 'N/A',
    });
  });
});

describe('recordsToRows', () => {
  it('numbers rows from one', () => {
    const rows = recordsToRows([
      { airline: 'A', found: false },
      { airline: 'B', found: false },
    ]);
    expect(rows.map((row) => row.index)).toEqual([1, 2]);
  });
});
