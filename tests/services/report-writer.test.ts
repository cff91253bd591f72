import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  formatCompanyCsv,
  formatEntryReport,
  readCompanyCsv,
  writeCompanyCsv,
  writeEntryReport,
} from '../../src/services/report-writer';
import type { CompanyRecord, InputEntry } from '../../src/types/company';
import { WriteError } from '../../src/utils/errors';

const entry: InputEntry = {
  raw: 'https://www.linkedin.com/jobs/view/1',
  location: 'https://www.linkedin.com/jobs/view/1',
  kind: 'url',
};

function records(...names: string[]): CompanyRecord[] {
  return names.map((name) => ({ name, site: 'linkedin', entry }));
}

describe('report-writer', () => {
  describe('formatCompanyCsv', () => {
    it('writes a single Company Name column', () => {
      expect(formatCompanyCsv(records('Acme Corp', 'Beta LLC'))).toBe('Company Name\nAcme Corp\nBeta LLC\n');
    });

    it('quotes names with commas and quotes', () => {
      expect(formatCompanyCsv(records('Acme, Inc.', 'The "Best" Co'))).toBe(
        'Company Name\n"Acme, Inc."\n"The ""Best"" Co"\n'
      );
    });

    it('writes only the header for an empty result set', () => {
      expect(formatCompanyCsv([])).toBe('Company Name\n');
    });

    it('adds site and source columns on request', () => {
      expect(formatCompanyCsv(records('Acme Corp'), { includeSource: true })).toBe(
        'Company Name,Site,Source\nAcme Corp,linkedin,https://www.linkedin.com/jobs/view/1\n'
      );
    });
  });

  describe('formatEntryReport', () => {
    it('lists status and count per entry', () => {
      const csv = formatEntryReport([
        { source: 'https://www.indeed.com/jobs?q=x', status: 'ok', extractedCount: 2, site: 'indeed', pageType: 'search' },
        { source: 'missing.html', status: 'failed', extractedCount: 0, note: 'Could not read local file' },
      ]);
      expect(csv).toBe(
        'source,status,extracted_count,site,page_type,note\n' +
          'https://www.indeed.com/jobs?q=x,ok,2,indeed,search,\n' +
          'missing.html,failed,0,,,Could not read local file\n'
      );
    });
  });

  describe('file output', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'report-writer-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('round-trips names through the CSV file', async () => {
      const path = join(dir, 'out', 'company_names.csv');
      const names = ['Acme, Inc.', 'Société Générale', 'The "Best" Co', '株式会社テスト'];

      await writeCompanyCsv(path, records(...names));
      await expect(readCompanyCsv(path)).resolves.toEqual(names);
    });

    it('writes the entry report as UTF-8', async () => {
      const path = join(dir, 'report.csv');
      await writeEntryReport(path, [{ source: 'zürich.html', status: 'skipped', extractedCount: 0 }]);
      await expect(readFile(path, 'utf-8')).resolves.toBe(
        'source,status,extracted_count,site,page_type,note\nzürich.html,skipped,0,,,\n'
      );
    });

    it('raises WriteError when the target cannot be written', async () => {
      const blocker = join(dir, 'not-a-dir');
      await writeFile(blocker, 'x', 'utf-8');

      const error = await writeCompanyCsv(join(blocker, 'names.csv'), records('Acme Corp')).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(WriteError);
      expect(error).toMatchObject({ path: join(blocker, 'names.csv') });
    });
  });
});
