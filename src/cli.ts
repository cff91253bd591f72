import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { resolve } from 'path';
import { loadConfig, mergeConfig } from './config';
import { CompanyPipeline } from './services/company-pipeline';
import { writeCompanyCsv, writeEntryReport } from './services/report-writer';
import { createSourceLoader, readInputEntries } from './sources';
import type { HttpFetch, Sleep } from './sources/http';
import type { InputEntry } from './types/company';
import { InputReadError, WriteError } from './utils/errors';
import { logger } from './utils/logger';

type CliOptions = {
  urlsFile?: string;
  urls?: string[];
  out?: string;
  report?: string;
  delay?: number;
  retries?: number;
  timeout?: number;
  keepDuplicates?: boolean;
  sourceColumns?: boolean;
};

export interface CliDependencies {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  fetch?: HttpFetch;
  wait?: Sleep;
}

function parseNonNegativeInt(value: string): number {
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

export function buildProgram(): Command {
  return new Command()
    .name('job-company-extractor')
    .description('Extract company names from LinkedIn and Indeed job pages into a CSV')
    .version('1.0.0')
    .option('--urls-file <path>', 'text file with one URL or saved HTML path per line (default: input.txt)')
    .option('--urls <entries...>', 'URLs or saved HTML paths given directly')
    .option('--out <path>', 'output CSV (default: company_names.csv)')
    .option('--report <path>', 'optional per-entry report CSV')
    .option('--delay <ms>', 'polite delay between live fetches in ms (default: 1000)', parseNonNegativeInt)
    .option('--retries <n>', 'retries for transient HTTP failures (default: 3)', parseNonNegativeInt)
    .option('--timeout <ms>', 'per-request timeout in ms (default: 25000)', parseNonNegativeInt)
    .option('--keep-duplicates', 'keep repeated company names')
    .option('--source-columns', "add 'Site' and 'Source' columns to the output")
    .exitOverride();
}

/**
 * Runs the extractor and returns the process exit code
 * Non-zero only when the input cannot be read or an output cannot be written
 */
export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const program = buildProgram();
  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) return error.exitCode;
    throw error;
  }

  const options = program.opts<CliOptions>();
  const cwd = deps.cwd ?? process.cwd();
  const config = mergeConfig(loadConfig(deps.env ?? process.env), {
    urlsFile: options.urlsFile,
    outputPath: options.out,
    reportPath: options.report,
    politeDelayMs: options.delay,
    maxRetries: options.retries,
    requestTimeoutMs: options.timeout,
    dedupe: options.keepDuplicates ? false : undefined,
    includeSourceColumns: options.sourceColumns ? true : undefined,
  });

  logger.debug('Configuration loaded', { ...config });

  let entries: InputEntry[];
  try {
    entries = await readInputEntries(config.urlsFile, options.urls ?? [], cwd);
  } catch (error) {
    if (error instanceof InputReadError) {
      logger.error('Cannot read input list', error, { urlsFile: error.path });
      return 1;
    }
    throw error;
  }

  if (entries.length === 0) {
    logger.error(`No entries found. Put URLs in ${config.urlsFile} or pass them with --urls`);
    return 1;
  }

  const pipeline = new CompanyPipeline(createSourceLoader(config, { fetch: deps.fetch, wait: deps.wait }), config);
  const { records, reports, summary } = await pipeline.run(entries);

  try {
    await writeCompanyCsv(resolve(cwd, config.outputPath), records, {
      includeSource: config.includeSourceColumns,
    });
    if (config.reportPath) {
      await writeEntryReport(resolve(cwd, config.reportPath), reports);
    }
  } catch (error) {
    if (error instanceof WriteError) {
      logger.error('Cannot write output', error, { path: error.path });
      return 1;
    }
    throw error;
  }

  const { ok, partial, skipped, failed } = summary.byStatus;
  logger.info(
    `Summary: ${summary.names} name(s) from ${summary.entries} entr${summary.entries === 1 ? 'y' : 'ies'} ` +
      `(ok ${ok}, partial ${partial}, skipped ${skipped}, failed ${failed})`
  );
  return 0;
}
