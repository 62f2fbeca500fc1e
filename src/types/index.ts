export type AirlineStatus = 'operating' | 'defunct' | 'renamed' | 'unknown';

export type ConfidenceTier = 'high' | 'medium' | 'low';

export interface ClassificationInput {
  subjectName: string;
  sourceText: string;
}

export interface ClassificationResult {
  status: AirlineStatus;
  confidenceTier: ConfidenceTier;
  successorName?: string;
  ceasedYear?: string;
}

export type ArticleLookupResult =
  | { found: true; title: string; url: string; extract: string }
  | { found: false };

export interface ArticleLookup {
  lookup(name: string): Promise<ArticleLookupResult>;
}

export type AirlineCheckRecord =
  | {
      airline: string;
      found: true;
      title: string;
      url: string;
      classification: ClassificationResult;
    }
  | {
      airline: string;
      found: false;
      error?: string;
    };

export interface CheckSummary {
  total: number;
  found: number;
  notFound: number;
  confidence: Record<ConfidenceTier, number>;
}

export type ReportFormat = 'xlsx' | 'csv';
