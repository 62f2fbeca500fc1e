import type { AirlineStatus, ClassificationInput, ClassificationResult, ConfidenceTier } from '../types/index.js';
import { DEFUNCT_PHRASES, OPERATING_PHRASES, RENAMED_PHRASES } from './keywords.js';

const CEASED_YEAR_PATTERN = /ceased operations?.*?(\d{4})/;
const CURRENTLY_PATTERN = /\bcurrently\b/;
// Applied right after a renamed phrase; the name must start with an uppercase letter.
const SUCCESSOR_PATTERN = /\s+(\p{Lu}[\p{L}\p{M}\p{N}_\s&\-]+?)(?:\.|,|\sin\s|\sfrom\s|$)/uy;

interface StatusSignals {
  defunct: boolean;
  operating: boolean;
  renamed: boolean;
  mentionsCurrently: boolean;
  ceasedYear: string | undefined;
  successorName: string | undefined;
}

interface Rule<T> {
  result: T;
  applies: (signals: StatusSignals) => boolean;
}

const STATUS_RULES: ReadonlyArray<Rule<AirlineStatus>> = [
  { result: 'defunct', applies: (s) => s.defunct },
  { result: 'operating', applies: (s) => s.operating },
  { result: 'renamed', applies: (s) => s.renamed && s.successorName !== undefined },
];

const CONFIDENCE_RULES: ReadonlyArray<Rule<ConfidenceTier>> = [
  { result: 'high', applies: (s) => s.defunct && s.ceasedYear !== undefined },
  { result: 'high', applies: (s) => s.operating && s.mentionsCurrently },
  { result: 'medium', applies: (s) => s.defunct !== s.operating },
];

/**
 * Classifies an airline's operating status from free text describing it.
 *
 * Status and confidence are each picked by the first matching rule, so a text that reads
 * both as defunct and as operating is reported as defunct. Never throws; text without any
 * recognised phrase yields `unknown` with `low` confidence.
 *
 * The subject name is carried for the caller's records; matching looks at the text only.
 */
export function classifyStatus(subjectName: string, sourceText: string): ClassificationResult {
  const lowered = sourceText.toLowerCase();
  if (lowered.trim().length === 0) {
    return { status: 'unknown', confidenceTier: 'low' };
  }

  const defunct = containsAny(lowered, DEFUNCT_PHRASES);
  const renamed = containsAny(lowered, RENAMED_PHRASES);
  const signals: StatusSignals = {
    defunct,
    operating: containsAny(lowered, OPERATING_PHRASES),
    renamed,
    mentionsCurrently: CURRENTLY_PATTERN.test(lowered),
    ceasedYear: defunct ? CEASED_YEAR_PATTERN.exec(lowered)?.[1] : undefined,
    successorName: renamed ? extractSuccessorName(sourceText) : undefined,
  };

  const result: ClassificationResult = {
    status: firstApplying(STATUS_RULES, signals) ?? 'unknown',
    confidenceTier: firstApplying(CONFIDENCE_RULES, signals) ?? 'low',
  };
  if (signals.successorName !== undefined) {
    result.successorName = signals.successorName;
  }
  if (signals.ceasedYear !== undefined) {
    result.ceasedYear = signals.ceasedYear;
  }
  return result;
}

export function classifyInput(input: ClassificationInput): ClassificationResult {
  return classifyStatus(input.subjectName, input.sourceText);
}

/**
 * Finds the capitalised name following a renamed phrase, e.g. "renamed to Delta Air Lines."
 * Phrases are tried in list order and each occurrence in text order.
 */
export function extractSuccessorName(text: string): string | undefined {
  for (const phrase of RENAMED_PHRASES) {
    const occurrences = new RegExp(phrase, 'giu');
    for (const occurrence of text.matchAll(occurrences)) {
      const follower = new RegExp(SUCCESSOR_PATTERN);
      follower.lastIndex = (occurrence.index ?? 0) + phrase.length;
      const name = follower.exec(text)?.[1]?.trim();
      if (name) {
        return name;
      }
    }
  }
  return undefined;
}

function containsAny(text: string, phrases: readonly string[]): boolean {
  return phrases.some((phrase) => text.includes(phrase));
}

function firstApplying<T>(rules: ReadonlyArray<Rule<T>>, signals: StatusSignals): T | undefined {
  return rules.find((rule) => rule.applies(signals))?.result;
}
