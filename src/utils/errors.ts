import type { PageType, Site } from '../types/company';

/**
 * Live fetch failed: network error, timeout or non-2xx status
 */
export class FetchError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number,
    public readonly attempts: number = 1
  ) {
    super(message);
    this.name = 'FetchError';
  }
}

/**
 * Saved page is missing or unreadable
 */
export class FileReadError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'FileReadError';
  }
}

/**
 * Neither LinkedIn nor Indeed markup was recognized
 */
export class UnrecognizedSiteError extends Error {
  constructor(public readonly source: string) {
    super(`Unrecognized site: ${source}`);
    this.name = 'UnrecognizedSiteError';
  }
}

/**
 * Fewer names were extracted than the page declares
 */
export class PartialExtractionError extends Error {
  constructor(
    public readonly source: string,
    public readonly site: Site,
    public readonly pageType: PageType,
    public readonly expected: number,
    public readonly extracted: number
  ) {
    super(`Extracted ${extracted} of ${expected} declared results`);
    this.name = 'PartialExtractionError';
  }
}

/**
 * Output file could not be written
 */
export class WriteError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'WriteError';
  }
}

/**
 * Input list could not be read
 */
export class InputReadError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'InputReadError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
