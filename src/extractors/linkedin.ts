import type { CheerioAPI } from 'cheerio';
import type { ExtractionRuleset } from './base';
import { companyFromTitle, firstCompanyName } from './base';
import { acceptCompanyName } from '../utils/company-name';

/**
 * Result cards: public search list first, then the signed-in layout
 */
const CARD_SELECTORS = [
  'ul.jobs-search__results-list > li',
  'li.jobs-search-results__list-item',
];

const CARD_COMPANY_SELECTORS = [
  '.base-search-card__subtitle a',
  '.base-search-card__subtitle',
  '.job-card-container__primary-description',
  '.job-card-container__company-name',
  '.artdeco-entity-lockup__subtitle',
];

const TOPCARD_SELECTORS = [
  'a.topcard__org-name-link',
  '.topcard__org-name-link',
  'a.topcard__flavor',
  'span.topcard__flavor',
  '.job-details-jobs-unified-top-card__company-name a',
  '.job-details-jobs-unified-top-card__company-name',
  '.jobs-unified-top-card__company-name',
  "a[href*='/company/']",
];

export class LinkedInSearchRuleset implements ExtractionRuleset {
  readonly site = 'linkedin' as const;
  readonly pageType = 'search' as const;

  extract($: CheerioAPI): string[] {
    const cardSelector = CARD_SELECTORS.find((selector) => $(selector).length > 0);
    if (!cardSelector) return [];

    const names: string[] = [];
    $(cardSelector).each((_, li) => {
      const card = $(li);
      for (const selector of CARD_COMPANY_SELECTORS) {
        const name = acceptCompanyName(card.find(selector).first().text());
        if (name) {
          names.push(name);
          return;
        }
      }
    });
    return names;
  }
}

export class LinkedInJobRuleset implements ExtractionRuleset {
  readonly site = 'linkedin' as const;
  readonly pageType = 'job' as const;

  extract($: CheerioAPI): string[] {
    const name = firstCompanyName($, TOPCARD_SELECTORS)
      ?? companyFromTitle($('meta[property="og:title"]').attr('content'), this.site)
      ?? companyFromTitle($('meta[name="twitter:title"]').attr('content'), this.site)
      ?? companyFromTitle($('title').first().text(), this.site);
    return name ? [name] : [];
  }
}
