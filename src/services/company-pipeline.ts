import type { Config } from '../config';
import { CompanyExtractor } from '../extractors';
import type { SourceLoader } from '../sources';
import type { CompanyRecord, EntryReport, EntryStatus, InputEntry, PageDocument } from '../types/company';
import { FetchError, FileReadError, UnrecognizedSiteError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { CompanyAggregator } from './company-aggregator';
import { classifyPage } from './page-classifier';

/**
 * Lifecycle of one input entry
 */
export type EntryState =
  | 'pending'
  | 'loaded'
  | 'classified'
  | 'extracted'
  | 'aggregated'
  | 'failed';

export interface RunSummary {
  entries: number;
  names: number;
  duplicates: number;
  byStatus: Record<EntryStatus, number>;
}

export interface RunResult {
  records: CompanyRecord[];
  reports: EntryReport[];
  summary: RunSummary;
}

type PipelineConfig = Pick<Config, 'dedupe'>;

/**
 * Orchestrates extraction over the input entries, one at a time
 * Per-entry failures are recorded and never stop the batch
 */
export class CompanyPipeline {
  constructor(
    private loader: SourceLoader,
    private config: PipelineConfig,
    private extractor: CompanyExtractor = new CompanyExtractor()
  ) {}

  async run(entries: InputEntry[]): Promise<RunResult> {
    const aggregator = new CompanyAggregator(this.config.dedupe);
    const reports: EntryReport[] = [];

    for (const [index, entry] of entries.entries()) {
      logger.info(`Processing entry ${index + 1}/${entries.length}`, { source: entry.raw, kind: entry.kind });
      reports.push(await this.processEntry(entry, aggregator));
    }

    const summary = summarize(reports, aggregator);
    logger.info('Extraction run completed', { ...summary });

    return { records: aggregator.records(), reports, summary };
  }

  private async processEntry(entry: InputEntry, aggregator: CompanyAggregator): Promise<EntryReport> {
    let state: EntryState = 'pending';
    let document: PageDocument | undefined;

    try {
      const html = await this.loader.load(entry);
      state = 'loaded';

      const page = classifyPage(entry, html);
      document = page;
      state = 'classified';

      const { names, partial } = this.extractor.extract(page);
      state = 'extracted';

      const added = aggregator.addAll(names.map((name) => ({ name, site: page.site, entry })));
      state = 'aggregated';

      const base = {
        source: entry.raw,
        extractedCount: names.length,
        site: page.site,
        pageType: page.pageType,
      };

      if (partial) {
        logger.warn(`Partial extraction`, {
          source: partial.source,
          site: partial.site,
          pageType: partial.pageType,
          expected: partial.expected,
          extracted: partial.extracted,
        });
        return { ...base, status: 'partial', note: partial.message };
      }

      if (names.length === 0) {
        const note = page.site === 'linkedin'
          ? 'No company names found (login wall?)'
          : 'No company names found';
        logger.warn(note, { source: entry.raw });
        return { ...base, status: 'skipped', note };
      }

      logger.info(`Extracted ${names.length} name(s)`, { source: entry.raw, newNames: added });
      return { ...base, status: 'ok' };
    } catch (error) {
      return this.recordFailure(entry, state, error, document);
    }
  }

  private recordFailure(
    entry: InputEntry,
    state: EntryState,
    error: unknown,
    document?: PageDocument
  ): EntryReport {
    const note = errorMessage(error);

    if (error instanceof UnrecognizedSiteError) {
      logger.warn(`Skipping entry: site not recognized`, { source: entry.raw });
      return { source: entry.raw, status: 'skipped', extractedCount: 0, note };
    }

    if (error instanceof FetchError || error instanceof FileReadError) {
      logger.warn(`Entry failed to load`, { source: entry.raw, error: note });
    } else {
      logger.error(`Entry failed after reaching ${state}`, error, { source: entry.raw });
    }

    return {
      source: entry.raw,
      status: 'failed',
      extractedCount: 0,
      site: document?.site,
      pageType: document?.pageType,
      note,
    };
  }
}

function summarize(reports: EntryReport[], aggregator: CompanyAggregator): RunSummary {
  const byStatus: Record<EntryStatus, number> = { ok: 0, skipped: 0, partial: 0, failed: 0 };
  for (const report of reports) {
    byStatus[report.status]++;
  }
  return {
    entries: reports.length,
    names: aggregator.size,
    duplicates: aggregator.duplicateCount,
    byStatus,
  };
}
