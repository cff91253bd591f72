import type { CheerioAPI } from 'cheerio';
import type { PageType, Site } from '../types/company';
import { acceptCompanyName } from '../utils/company-name';

/**
 * Site-specific extraction rules for one page layout
 * Rulesets are looked up by (site, pageType)
 */
export interface ExtractionRuleset {
  readonly site: Site;
  readonly pageType: PageType;

  /**
   * Returns company names in page order, one per result card
   * (a single name for job pages)
   */
  extract($: CheerioAPI): string[];
}

/**
 * First accepted company name among the selectors, tried in order
 */
export function firstCompanyName($: CheerioAPI, selectors: string[]): string | null {
  for (const selector of selectors) {
    const elements = $(selector).toArray();
    for (const element of elements) {
      const node = $(element);
      const name = acceptCompanyName(node.text()) ?? acceptCompanyName(node.attr('data-company-name'));
      if (name) return name;
    }
  }
  return null;
}

// LinkedIn's "Acme hiring Engineer in Berlin"; job titles capitalize "Hiring"
const HIRING_TITLE = /^(.+?)\s+hiring\s+.+?\s+in\s+\S/;

function fromHiringTitle(text: string): string | null {
  const match = text.match(HIRING_TITLE);
  return match ? acceptCompanyName(match[1]) : null;
}

function fromDashedTitle(text: string): string | null {
  const parts = text.split(' - ').map((part) => part.trim()).filter(Boolean);
  return parts.length >= 2 ? acceptCompanyName(parts[1]) : null;
}

/**
 * Company from a "<title>"-style string:
 * "Acme hiring Engineer in Berlin | LinkedIn" or "Engineer - Acme - Berlin | Indeed.com"
 * Each site's own title shape is tried first
 */
export function companyFromTitle(title: string | undefined, site: Site): string | null {
  if (!title) return null;
  const text = title.replace(/\s+/g, ' ').replace(/\s*\|.*$/, '').trim();

  return site === 'linkedin'
    ? fromHiringTitle(text) ?? fromDashedTitle(text)
    : fromDashedTitle(text) ?? fromHiringTitle(text);
}
