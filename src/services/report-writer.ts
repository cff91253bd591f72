import Papa from 'papaparse';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname } from 'path';
import type { CompanyRecord, EntryReport } from '../types/company';
import { WriteError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export const COMPANY_HEADER = 'Company Name';
export const SOURCE_HEADERS = ['Site', 'Source'];
export const REPORT_HEADERS = ['source', 'status', 'extracted_count', 'site', 'page_type', 'note'];

export interface CompanyCsvOptions {
  includeSource?: boolean;
}

function toCsv(fields: string[], rows: string[][]): string {
  return `${Papa.unparse([fields, ...rows], { newline: '\n' })}\n`;
}

export function formatCompanyCsv(records: CompanyRecord[], options: CompanyCsvOptions = {}): string {
  if (options.includeSource) {
    return toCsv(
      [COMPANY_HEADER, ...SOURCE_HEADERS],
      records.map((record) => [record.name, record.site, record.entry.raw])
    );
  }
  return toCsv([COMPANY_HEADER], records.map((record) => [record.name]));
}

export function formatEntryReport(reports: EntryReport[]): string {
  return toCsv(
    REPORT_HEADERS,
    reports.map((report) => [
      report.source,
      report.status,
      String(report.extractedCount),
      report.site ?? '',
      report.pageType ?? '',
      report.note ?? '',
    ])
  );
}

async function writeOutput(path: string, content: string): Promise<void> {
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content, 'utf-8');
  } catch (error) {
    throw new WriteError(`Cannot write ${path}: ${errorMessage(error)}`, path, error);
  }
}

export async function writeCompanyCsv(
  path: string,
  records: CompanyRecord[],
  options: CompanyCsvOptions = {}
): Promise<void> {
  await writeOutput(path, formatCompanyCsv(records, options));
  logger.info(`Wrote ${records.length} company name(s) to ${path}`);
}

export async function writeEntryReport(path: string, reports: EntryReport[]): Promise<void> {
  await writeOutput(path, formatEntryReport(reports));
  logger.info(`Wrote per-entry report to ${path}`, { entries: reports.length });
}

/**
 * Reads the names back from a company CSV (first column, header skipped)
 */
export async function readCompanyCsv(path: string): Promise<string[]> {
  const raw = await readFile(path, 'utf-8');
  const parsed = Papa.parse<string[]>(raw, { delimiter: ',', skipEmptyLines: true });

  if (parsed.errors.length > 0) {
    const firstErr = parsed.errors[0];
    logger.warn(`CSV parse warning (row ${firstErr.row}): ${firstErr.message}`);
  }

  return parsed.data.slice(1).map((row) => row[0] ?? '');
}
