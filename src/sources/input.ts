import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { fileURLToPath } from 'url';
import type { InputEntry } from '../types/company';
import { InputReadError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

const HTTP_URL = /^https?:\/\//i;
const FILE_URL = /^file:\/\//i;

function stripQuotes(value: string): string {
  return value.replace(/^["'“”]+|["'“”]+$/g, '').trim();
}

function filePathFromUrl(value: string): string {
  try {
    return fileURLToPath(value);
  } catch (error) {
    logger.debug(`Not a well-formed file URL, using it as a path`, { value, error: errorMessage(error) });
    return value.replace(FILE_URL, '');
  }
}

/**
 * Turns one input line into an entry
 * Blank lines and # comments yield null
 */
export function parseInputEntry(line: string, cwd: string = process.cwd()): InputEntry | null {
  const raw = stripQuotes(line.trim());
  if (!raw || raw.startsWith('#')) return null;

  if (HTTP_URL.test(raw)) {
    return { raw, location: raw, kind: 'url' };
  }

  const path = FILE_URL.test(raw) ? filePathFromUrl(raw) : raw;
  return { raw, location: resolve(cwd, path), kind: 'file' };
}

function entryKey(entry: InputEntry): string {
  return entry.kind === 'file'
    ? `file:${entry.location.toLowerCase()}`
    : entry.location.toLowerCase();
}

/**
 * Parses lines into entries, keeping the first of any repeated entry
 */
export function parseInputEntries(lines: string[], cwd: string = process.cwd()): InputEntry[] {
  const seen = new Set<string>();
  const entries: InputEntry[] = [];

  for (const line of lines) {
    const entry = parseInputEntry(line, cwd);
    if (!entry) continue;

    const key = entryKey(entry);
    if (seen.has(key)) {
      logger.debug(`Skipping repeated input entry`, { entry: entry.raw });
      continue;
    }
    seen.add(key);
    entries.push(entry);
  }

  return entries;
}

/**
 * Reads entries given directly, then the input list file
 * The file may be unreadable only when direct entries were given
 */
export async function readInputEntries(
  urlsFile: string | undefined,
  extra: string[] = [],
  cwd: string = process.cwd()
): Promise<InputEntry[]> {
  const lines: string[] = [...extra];

  if (urlsFile) {
    try {
      const content = await readFile(resolve(cwd, urlsFile), 'utf-8');
      lines.push(...content.split(/\r?\n/));
    } catch (error) {
      if (extra.length === 0) {
        throw new InputReadError(`Cannot read input file ${urlsFile}: ${errorMessage(error)}`, urlsFile, error);
      }
      logger.warn(`Input file not readable, using command-line entries only`, {
        urlsFile,
        error: errorMessage(error),
      });
    }
  }

  return parseInputEntries(lines, cwd);
}
