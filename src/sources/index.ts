import type { PageSource } from './base';
import { FilePageSource } from './file';
import { HttpPageSource, type HttpSourceDependencies } from './http';
import type { Config } from '../config';
import type { InputEntry, InputKind } from '../types/company';

/**
 * Dispatches each entry to the source for its kind
 */
export class SourceLoader {
  private sources = new Map<InputKind, PageSource>();

  constructor(sources: PageSource[]) {
    for (const source of sources) {
      this.sources.set(source.kind, source);
    }
  }

  async load(entry: InputEntry): Promise<string> {
    const source = this.sources.get(entry.kind);
    if (!source) {
      throw new Error(`No page source registered for ${entry.kind} entries`);
    }
    return source.load(entry);
  }
}

/**
 * Factory function to create the loader for a run
 */
export function createSourceLoader(config: Config, deps: HttpSourceDependencies = {}): SourceLoader {
  return new SourceLoader([
    new HttpPageSource(config, deps),
    new FilePageSource(),
  ]);
}

export type { PageSource } from './base';
export { FilePageSource } from './file';
export { HttpPageSource } from './http';
export { parseInputEntry, parseInputEntries, readInputEntries } from './input';
