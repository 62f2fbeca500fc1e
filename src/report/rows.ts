import type { AirlineCheckRecord, AirlineStatus, ConfidenceTier } from '../types/index.js';

export interface ReportRow {
  index: number;
  airline: string;
  status: string;
  successor: string;
  confidence: string;
  source: string;
}

export const REPORT_COLUMNS: ReadonlyArray<{ key: keyof ReportRow; header: string; width: number }> = [
  { key: 'index', header: '#', width: 5 },
  { key: 'airline', header: 'Airline', width: 35 },
  { key: 'status', header: 'Status', width: 30 },
  { key: 'successor', header: 'Successor name', width: 35 },
  { key: 'confidence', header: 'Confidence', width: 18 },
  { key: 'source', header: 'Source', width: 50 },
];

export const NOT_AVAILABLE = 'N/A';
export const NOT_FOUND_LABEL = 'NOT FOUND';

export const CONFIDENCE_LABELS: Record<ConfidenceTier, string> = {
  high: 'HIGH',
  medium: 'MEDIUM',
  low: 'LOW',
};

export const CONFIDENCE_LEGEND: ReadonlyArray<[string, string]> = [
  [CONFIDENCE_LABELS.high, 'Confirmed by the article, with a concrete date or an explicit "currently"'],
  [CONFIDENCE_LABELS.medium, 'Found in the article but needs a manual check'],
  [CONFIDENCE_LABELS.low, 'Not found, or the article is ambiguous'],
];

export const STATUS_LEGEND: ReadonlyArray<[string, string]> = [
  ['OPERATING', 'The airline flies scheduled services'],
  ['DEFUNCT', 'The airline has ceased operations'],
  ['RENAMED', 'The airline changed its name or brand'],
  ['STATUS UNKNOWN', 'The article does not say'],
  [NOT_FOUND_LABEL, 'No article found for the name'],
];

export function statusLabel(status: AirlineStatus, ceasedYear?: string): string {
  switch (status) {
    case 'operating':
      return 'OPERATING';
    case 'defunct':
      return `DEFUNCT (ceased ${ceasedYear ?? 'date unknown'})`;
    case 'renamed':
      return 'RENAMED';
    case 'unknown':
      return 'STATUS UNKNOWN';
  }
}

export function recordToRow(record: AirlineCheckRecord, index: number): ReportRow {
  if (!record.found) {
    return {
      index,
      airline: record.airline,
      status: NOT_FOUND_LABEL,
      successor: NOT_AVAILABLE,
      confidence: CONFIDENCE_LABELS.low,
      source: NOT_AVAILABLE,
    };
  }

  const { classification } = record;
  return {
    index,
    airline: record.airline,
    status: statusLabel(classification.status, classification.ceasedYear),
    successor: classification.successorName ?? NOT_AVAILABLE,
    confidence: CONFIDENCE_LABELS[classification.confidenceTier],
    source: `Wikipedia: ${record.url}`,
  } satisfies ReportRow;
}

export function recordsToRows(records: AirlineCheckRecord[]): ReportRow[] {
  return records.map((record, position) => recordToRow(record, position + 1));
}
