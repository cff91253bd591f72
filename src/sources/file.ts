import { readFile } from 'fs/promises';
import type { PageSource } from './base';
import type { InputEntry } from '../types/company';
import { FileReadError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

/**
 * Saved-page adapter
 * Reads HTML the user saved from a browser (e.g. behind the LinkedIn login wall)
 */
export class FilePageSource implements PageSource {
  readonly kind = 'file' as const;

  async load(entry: InputEntry): Promise<string> {
    try {
      const html = await readFile(entry.location, 'utf-8');
      logger.debug(`Read saved page`, { path: entry.location, bytes: html.length });
      return html;
    } catch (error) {
      throw new FileReadError(
        `Could not read local file ${entry.location}: ${errorMessage(error)}`,
        entry.location,
        error
      );
    }
  }
}
