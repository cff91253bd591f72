import type { InputEntry, InputKind } from '../types/company';

/**
 * Base interface for page sources
 * Each source resolves one kind of input entry to raw markup
 */
export interface PageSource {
  /**
   * Entry kind this source handles
   */
  readonly kind: InputKind;

  /**
   * Loads the page behind an entry
   * @returns Raw HTML
   */
  load(entry: InputEntry): Promise<string>;
}
