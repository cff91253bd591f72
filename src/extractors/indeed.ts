import type { CheerioAPI } from 'cheerio';
import type { ExtractionRuleset } from './base';
import { companyFromTitle, firstCompanyName } from './base';
import { acceptCompanyName } from '../utils/company-name';

// Current and legacy result card containers; they nest inside each other
const CARD_SELECTOR = '[data-jk], .job_seen_beacon, .tapItem, .resultContent';

const CARD_COMPANY_SELECTORS = [
  '.companyName',
  "[data-testid='company-name']",
  '.companyInfo span',
  '.companyInfo a',
];

const JOB_COMPANY_SELECTORS = [
  "[data-testid='inlineHeader-companyName'] a",
  "[data-testid='inlineHeader-companyName']",
  ".jobsearch-CompanyInfoContainer a[data-tn-element='companyName']",
  '[data-company-name]',
  '#companyInfo a',
  '.jobsearch-InlineCompanyRating div',
];

export class IndeedSearchRuleset implements ExtractionRuleset {
  readonly site = 'indeed' as const;
  readonly pageType = 'search' as const;

  extract($: CheerioAPI): string[] {
    const names: string[] = [];
    $(CARD_SELECTOR).each((_, el) => {
      const card = $(el);
      if (card.parents(CARD_SELECTOR).length > 0) return;

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

export class IndeedJobRuleset implements ExtractionRuleset {
  readonly site = 'indeed' as const;
  readonly pageType = 'job' as const;

  extract($: CheerioAPI): string[] {
    const name = firstCompanyName($, JOB_COMPANY_SELECTORS)
      ?? companyFromTitle($('meta[property="og:title"]').attr('content'), this.site)
      ?? companyFromTitle($('title').first().text(), this.site);
    return name ? [name] : [];
  }
}
