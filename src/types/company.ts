/**
 * Shared data model for the extraction pipeline
 */

export type InputKind = 'url' | 'file';

/**
 * One line of the input list
 */
export interface InputEntry {
  /** Line as written by the user (quotes stripped) */
  raw: string;
  /** URL, or absolute path for saved pages */
  location: string;
  kind: InputKind;
}

export type Site = 'linkedin' | 'indeed';

export type PageType = 'job' | 'search';

/**
 * Loaded and classified page markup
 * Discarded once its company names have been extracted
 */
export interface PageDocument {
  readonly entry: InputEntry;
  readonly html: string;
  readonly site: Site;
  readonly pageType: PageType;
  /** Result count the page itself declares (search pages only) */
  readonly declaredCount?: number;
}

export interface CompanyRecord {
  name: string;
  site: Site;
  entry: InputEntry;
}

export type EntryStatus = 'ok' | 'skipped' | 'partial' | 'failed';

/**
 * Per-entry outcome for the QA report
 */
export interface EntryReport {
  source: string;
  status: EntryStatus;
  extractedCount: number;
  site?: Site;
  pageType?: PageType;
  note?: string;
}
