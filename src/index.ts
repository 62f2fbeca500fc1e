#!/usr/bin/env node
import { promises as fs } from 'node:fs';
import { Command } from 'commander';
import dotenv from 'dotenv';
import { FileCache } from './cache/fileCache.js';
import { WikipediaClient } from './clients/wikipedia.js';
import { AirlineChecker, summarize } from './analysis/airlineChecker.js';
import { classifyStatus } from './analysis/statusClassifier.js';
import { readAirlineList } from './input/airlineList.js';
import { checkpointReportPath, writeReport } from './report/index.js';
import { buildCheckContext, DEFAULT_CACHE_DIR, DEFAULT_INPUT_PATH, type CheckContext, type RawCheckOptions } from './config.js';
import { createLogger } from './utils/logger.js';
import { errorMessage } from './utils/errors.js';
import type { CheckSummary } from './types/index.js';

dotenv.config();

interface ClassifyCommandOptions {
  name: string;
  text?: string;
  file?: string;
}

const program = new Command();
program
  .name('airline-status')
  .description('Check airline names against Wikipedia, classify their operating status and export a report.');

program
  .command('check')
  .description('Look up every airline in a list and write a status report.')
  .option('-i, --input <path>', 'Airline list, one name per line.', DEFAULT_INPUT_PATH)
  .option('-o, --output <path>', 'Report path (default output/airline_status_report_final.<format>).')
  .option('-f, --format <format>', 'Report format: xlsx or csv.', 'xlsx')
  .option('--limit <number>', 'Check only the first n airlines.')
  .option('--concurrency <number>', 'Concurrent lookups (default 1).')
  .option('--request-spacing <ms>', 'Minimum delay between Wikipedia requests in ms (default 100).')
  .option('--checkpoint-every <number>', 'Write an intermediate report every n airlines, 0 to disable (default 100).')
  .option('--cache-dir <path>', 'Directory for cached API responses.', DEFAULT_CACHE_DIR)
  .option('--cache-max-age <hours>', 'Ignore cached responses older than this.')
  .option('--no-cache', 'Always query the API.')
  .action(async (rawOptions: RawCheckOptions) => {
    await handleCheck(rawOptions);
  });

program
  .command('classify')
  .description('Classify a single piece of text and print the result as JSON.')
  .requiredOption('-n, --name <name>', 'Airline the text describes.')
  .option('-t, --text <text>', 'Text to classify.')
  .option('--file <path>', 'Read the text from a file.')
  .action(async (rawOptions: ClassifyCommandOptions) => {
    await handleClassify(rawOptions);
  });

program.parseAsync().catch((error: unknown) => {
  console.error(errorMessage(error));
  process.exitCode = 1;
});

async function handleCheck(rawOptions: RawCheckOptions) {
  const context = buildCheckContext(rawOptions);
  const airlines = await readAirlineList(context.inputPath);
  const selected = context.limit === undefined ? airlines : airlines.slice(0, context.limit);
  if (selected.length === 0) {
    console.log(`No airlines found in ${context.inputPath}.`);
    return;
  }

  console.log(`Airlines to check: ${selected.length}`);
  const checker = createChecker(context);
  const records = await checker.checkAll(selected, {
    checkpointEvery: context.checkpointEvery,
    onCheckpoint: async (soFar) => {
      const checkpointPath = checkpointReportPath(context.outputPath, context.format, soFar.length);
      await writeReport(soFar, { format: context.format, path: checkpointPath });
      console.log(`Checkpoint: ${soFar.length} airlines checked, saved ${checkpointPath}`);
    },
  });

  const reportPath = await writeReport(records, { format: context.format, path: context.outputPath });
  printSummary(summarize(records), reportPath);
}

async function handleClassify(rawOptions: ClassifyCommandOptions) {
  const text = await resolveClassifyText(rawOptions);
  const result = classifyStatus(rawOptions.name, text);
  console.log(JSON.stringify({ subjectName: rawOptions.name, ...result }, null, 2));
}

async function resolveClassifyText(options: ClassifyCommandOptions): Promise<string> {
  if (options.text !== undefined && options.file !== undefined) {
    throw new Error('Pass either --text or --file, not both.');
  }
  if (options.file !== undefined) {
    return fs.readFile(options.file, 'utf8');
  }
  if (options.text !== undefined) {
    return options.text;
  }
  throw new Error('Pass the text to classify with --text or --file.');
}

function createChecker(context: CheckContext): AirlineChecker {
  const cache = context.cacheDir
    ? new FileCache({ baseDir: context.cacheDir, maxAgeMs: context.cacheMaxAgeMs })
    : undefined;
  const client = new WikipediaClient({
    apiUrl: context.apiUrl,
    userAgent: context.userAgent,
    cache,
    requestSpacingMs: context.requestSpacingMs,
    logger: createLogger('wikipedia'),
  });
  return new AirlineChecker(client, {
    concurrency: context.concurrency,
    logger: createLogger('check'),
  });
}

function printSummary(summary: CheckSummary, reportPath: string) {
  const rule = '='.repeat(70);
  console.log(rule);
  console.log('Summary:');
  console.log(`Checked: ${summary.total}`);
  console.log(`Article found: ${summary.found}`);
  console.log(`Article not found: ${summary.notFound}`);
  console.log(`High confidence: ${summary.confidence.high}`);
  console.log(`Medium confidence: ${summary.confidence.medium}`);
  console.log(`Low confidence: ${summary.confidence.low}`);
  console.log(`Final report: ${reportPath}`);
  console.log(rule);
}
