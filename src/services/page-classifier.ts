import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import type { InputEntry, PageDocument, PageType, Site } from '../types/company';
import { UnrecognizedSiteError } from '../utils/errors';
import { logger } from '../utils/logger';

/**
 * What identifies a site and tells its search pages from job pages
 */
interface SiteProfile {
  site: Site;
  hostPattern: RegExp;
  markupSignatures: RegExp[];
  countSelectors: string[];
  resultsListSelectors: string[];
  isSearchPath(url: URL): boolean;
}

const SITE_PROFILES: SiteProfile[] = [
  {
    site: 'linkedin',
    hostPattern: /(^|\.)linkedin\.com$/,
    markupSignatures: [
      /jobs-search__results-list/i,
      /topcard__org-name-link/i,
      /base-search-card/i,
      /top-card-layout/i,
      /job-card-container/i,
    ],
    countSelectors: [
      '.results-context-header__job-count',
      '.jobs-search-results-list__subtitle',
    ],
    resultsListSelectors: [
      'ul.jobs-search__results-list',
      'li.jobs-search-results__list-item',
    ],
    isSearchPath: (url) => url.pathname.startsWith('/jobs/search'),
  },
  {
    site: 'indeed',
    hostPattern: /(^|\.)indeed\.[a-z.]+$/,
    markupSignatures: [
      /jobsearch-/i,
      /data-jk=/i,
      /class="[^"]*\bcompanyName\b/i,
      /job_seen_beacon/i,
    ],
    countSelectors: [
      '.jobsearch-JobCountAndSortPane-jobCount',
      '#searchCountPages',
    ],
    resultsListSelectors: [
      '#mosaic-provider-jobcards',
      'ul.jobsearch-ResultsList',
      'td#resultsCol',
    ],
    isSearchPath: (url) => url.pathname === '/jobs' || url.pathname.startsWith('/q-'),
  },
];

const GENERIC_COUNT_SELECTORS = 'h1, h2, h3, [class*="count"], [class*="Count"], [class*="subtitle"]';
const NUMBER = '(\\d{1,3}(?:[,.]\\d{3})+|\\d+)';
const COUNT_PHRASE = new RegExp(`^${NUMBER}\\+?\\s+(?:results?|jobs?)\\b`, 'i');

function parseUrl(value: string | undefined): URL | null {
  if (!value) return null;
  try {
    return new URL(value);
  } catch {
    return null;
  }
}

function profileForHost(url: URL | null): SiteProfile | undefined {
  if (!url) return undefined;
  const host = url.hostname.toLowerCase().replace(/^www\./, '');
  return SITE_PROFILES.find((profile) => profile.hostPattern.test(host));
}

/**
 * Reads "1,234", "24+" or "Page 1 of 56 jobs" as a count
 */
export function parseCount(text: string): number | undefined {
  const match = text.match(new RegExp(`of\\s+${NUMBER}`, 'i')) ?? text.match(new RegExp(NUMBER));
  if (!match) return undefined;
  const value = parseInt(match[1].replace(/[,.]/g, ''), 10);
  return isNaN(value) ? undefined : value;
}

function detectProfile($: CheerioAPI, html: string, entry: InputEntry): SiteProfile | undefined {
  if (entry.kind === 'url') {
    const fromUrl = profileForHost(parseUrl(entry.location));
    if (fromUrl) return fromUrl;
  }

  const canonical = parseUrl($('link[rel="canonical"]').attr('href'))
    ?? parseUrl($('meta[property="og:url"]').attr('content'));
  const fromCanonical = profileForHost(canonical);
  if (fromCanonical) return fromCanonical;

  return SITE_PROFILES.find((profile) =>
    profile.markupSignatures.some((signature) => signature.test(html))
  );
}

function findDeclaredCount($: CheerioAPI, profile: SiteProfile): number | undefined {
  for (const selector of profile.countSelectors) {
    const text = $(selector).first().text().trim();
    if (!text) continue;
    const count = parseCount(text);
    if (count !== undefined) return count;
  }

  let declared: number | undefined;
  $(GENERIC_COUNT_SELECTORS).each((_, el) => {
    const text = $(el).text().replace(/\s+/g, ' ').trim();
    const match = text.match(COUNT_PHRASE);
    if (match) {
      declared = parseCount(match[1]);
      return false;
    }
    return undefined;
  });
  return declared;
}

/**
 * Decides which site and page layout a loaded page belongs to
 */
export function classifyPage(entry: InputEntry, html: string): PageDocument {
  const $ = cheerio.load(html);
  const profile = detectProfile($, html, entry);
  if (!profile) {
    throw new UnrecognizedSiteError(entry.raw);
  }

  const declaredCount = findDeclaredCount($, profile);
  const url = entry.kind === 'url' ? parseUrl(entry.location) : null;
  const hasResultsList = profile.resultsListSelectors.some((selector) => $(selector).length > 0);
  const isSearch = declaredCount !== undefined || hasResultsList || (url !== null && profile.isSearchPath(url));
  const pageType: PageType = isSearch ? 'search' : 'job';

  logger.debug(`Classified page`, {
    source: entry.raw,
    site: profile.site,
    pageType,
    declaredCount,
  });

  return {
    entry,
    html,
    site: profile.site,
    pageType,
    declaredCount: isSearch ? declaredCount : undefined,
  };
}
