import path from 'node:path';
import { DEFAULT_API_URL, DEFAULT_USER_AGENT } from './clients/wikipedia.js';
import { defaultReportPath, isReportFormat, REPORT_FORMATS } from './report/index.js';
import type { ReportFormat } from './types/index.js';

export const DEFAULT_INPUT_PATH = path.join('data', 'airlines.txt');
export const DEFAULT_CACHE_DIR = '.cache';

export interface RawCheckOptions {
  input?: string;
  output?: string;
  format?: string;
  limit?: string;
  concurrency?: string;
  requestSpacing?: string;
  checkpointEvery?: string;
  cacheDir?: string;
  cacheMaxAge?: string;
  cache?: boolean;
}

export interface CheckContext {
  inputPath: string;
  outputPath: string;
  format: ReportFormat;
  limit: number | undefined;
  concurrency: number;
  requestSpacingMs: number;
  checkpointEvery: number;
  cacheDir: string | undefined;
  cacheMaxAgeMs: number | undefined;
  apiUrl: string;
  userAgent: string;
}

export function buildCheckContext(raw: RawCheckOptions, env: NodeJS.ProcessEnv = process.env): CheckContext {
  const format = parseFormat(raw.format);
  const cacheMaxAgeHours = raw.cacheMaxAge === undefined ? undefined : parsePositiveInteger(raw.cacheMaxAge, 0, 'cache-max-age');

  return {
    inputPath: path.resolve(raw.input?.trim() || DEFAULT_INPUT_PATH),
    outputPath: path.resolve(raw.output?.trim() || defaultReportPath(format)),
    format,
    limit: raw.limit === undefined ? undefined : parsePositiveInteger(raw.limit, 0, 'limit'),
    concurrency: parsePositiveInteger(raw.concurrency, 1, 'concurrency'),
    requestSpacingMs: parseNonNegativeInteger(raw.requestSpacing, 100, 'request-spacing'),
    checkpointEvery: parseNonNegativeInteger(raw.checkpointEvery, 100, 'checkpoint-every'),
    cacheDir: raw.cache === false ? undefined : path.resolve(raw.cacheDir?.trim() || DEFAULT_CACHE_DIR),
    cacheMaxAgeMs: cacheMaxAgeHours === undefined ? undefined : cacheMaxAgeHours * 60 * 60 * 1000,
    apiUrl: env.WIKIPEDIA_API_URL?.trim() || DEFAULT_API_URL,
    userAgent: env.HTTP_USER_AGENT?.trim() || DEFAULT_USER_AGENT,
  };
}

export function parseFormat(value: string | undefined): ReportFormat {
  const normalized = value?.trim().toLowerCase() || 'xlsx';
  if (!isReportFormat(normalized)) {
    throw new Error(`Option --format must be one of ${REPORT_FORMATS.join(', ')}.`);
  }
  return normalized;
}

export function parsePositiveInteger(value: string | undefined, fallback: number, flagName: string): number {
  if (value === undefined) {
    return fallback;
  }

  const parsed = Math.floor(Number(value));
  if (!Number.isFinite(parsed) || parsed < 1) {
    throw new Error(`Option --${flagName} must be a positive number.`);
  }
  return parsed;
}

export function parseNonNegativeInteger(value: string | undefined, fallback: number, flagName: string): number {
  if (value === undefined) {
    return fallback;
  }

  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`Option --${flagName} must be zero or a positive number.`);
  }
  return Math.floor(parsed);
}
