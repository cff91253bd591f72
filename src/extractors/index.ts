import * as cheerio from 'cheerio';
import type { ExtractionRuleset } from './base';
import { IndeedJobRuleset, IndeedSearchRuleset } from './indeed';
import { LinkedInJobRuleset, LinkedInSearchRuleset } from './linkedin';
import type { PageDocument, PageType, Site } from '../types/company';
import { PartialExtractionError } from '../utils/errors';
import { logger } from '../utils/logger';

export interface ExtractionResult {
  names: string[];
  /** Names the page should have yielded, when known */
  expected?: number;
  /** Set when fewer names than expected were found */
  partial?: PartialExtractionError;
}

function rulesetKey(site: Site, pageType: PageType): string {
  return `${site}:${pageType}`;
}

/**
 * Rulesets keyed by (site, pageType)
 */
export class ExtractorRegistry {
  private rulesets = new Map<string, ExtractionRuleset>();

  register(ruleset: ExtractionRuleset): this {
    this.rulesets.set(rulesetKey(ruleset.site, ruleset.pageType), ruleset);
    return this;
  }

  get(site: Site, pageType: PageType): ExtractionRuleset | undefined {
    return this.rulesets.get(rulesetKey(site, pageType));
  }
}

export function createDefaultRegistry(): ExtractorRegistry {
  return new ExtractorRegistry()
    .register(new LinkedInSearchRuleset())
    .register(new LinkedInJobRuleset())
    .register(new IndeedSearchRuleset())
    .register(new IndeedJobRuleset());
}

/**
 * Applies the matching ruleset and checks the result against the
 * count the page declares
 */
export class CompanyExtractor {
  constructor(private registry: ExtractorRegistry = createDefaultRegistry()) {}

  extract(document: PageDocument): ExtractionResult {
    const ruleset = this.registry.get(document.site, document.pageType);
    if (!ruleset) {
      throw new Error(`No extraction ruleset for ${document.site} ${document.pageType} pages`);
    }

    const names = ruleset.extract(cheerio.load(document.html));
    const expected = document.pageType === 'job' ? 1 : document.declaredCount;

    logger.debug(`Extracted company names`, {
      source: document.entry.raw,
      site: document.site,
      pageType: document.pageType,
      extracted: names.length,
      expected,
    });

    if (expected !== undefined && names.length < expected) {
      return {
        names,
        expected,
        partial: new PartialExtractionError(
          document.entry.raw,
          document.site,
          document.pageType,
          expected,
          names.length
        ),
      };
    }

    return { names, expected };
  }
}

export type { ExtractionRuleset } from './base';
export { IndeedJobRuleset, IndeedSearchRuleset } from './indeed';
export { LinkedInJobRuleset, LinkedInSearchRuleset } from './linkedin';
