import type { CompanyRecord } from '../types/company';
import { companyKey } from '../utils/company-name';

/**
 * Collects company records across all entries of a run
 * With dedupe on, the first-seen spelling of each name is kept
 */
export class CompanyAggregator {
  private items: CompanyRecord[] = [];
  private seen = new Set<string>();
  private duplicates = 0;

  constructor(private readonly dedupe: boolean = true) {}

  /**
   * Adds a record; returns false when it was dropped as a duplicate
   */
  add(record: CompanyRecord): boolean {
    const key = companyKey(record.name);
    if (!key) return false;

    if (this.dedupe) {
      if (this.seen.has(key)) {
        this.duplicates++;
        return false;
      }
      this.seen.add(key);
    }

    this.items.push(record);
    return true;
  }

  /**
   * Adds records in order and returns how many were kept
   */
  addAll(records: Iterable<CompanyRecord>): number {
    let added = 0;
    for (const record of records) {
      if (this.add(record)) added++;
    }
    return added;
  }

  records(): CompanyRecord[] {
    return [...this.items];
  }

  names(): string[] {
    return this.items.map((record) => record.name);
  }

  get size(): number {
    return this.items.length;
  }

  get duplicateCount(): number {
    return this.duplicates;
  }
}
