import { describe, it, expect } from 'vitest';
import * as cheerio from 'cheerio';
import { LinkedInJobRuleset, LinkedInSearchRuleset } from '../../src/extractors/linkedin';
import { linkedInJobPage, linkedInSearchPage } from '../fixtures/pages';

describe('LinkedIn rulesets', () => {
  describe('LinkedInSearchRuleset', () => {
    const ruleset = new LinkedInSearchRuleset();

    it('returns one name per result card in page order', () => {
      const $ = cheerio.load(linkedInSearchPage(['Acme Corp', 'Société Générale', 'Acme Corp'], 3));
      expect(ruleset.extract($)).toEqual(['Acme Corp', 'Société Générale', 'Acme Corp']);
    });

    it('falls back to subtitle text and legacy card layouts', () => {
      const $ = cheerio.load(`
        <ul class="jobs-search__results-list">
          <li><h4 class="base-search-card__subtitle">  Gamma   Labs </h4></li>
          <li><div class="job-card-container__primary-description">Delta Systems</div></li>
          <li><h3 class="base-search-card__title">No company shown</h3></li>
        </ul>
      `);
      expect(ruleset.extract($)).toEqual(['Gamma Labs', 'Delta Systems']);
    });

    it('reads the signed-in list layout', () => {
      const $ = cheerio.load(`
        <ul>
          <li class="jobs-search-results__list-item">
            <div class="artdeco-entity-lockup__subtitle"><span>Epsilon GmbH</span></div>
          </li>
        </ul>
      `);
      expect(ruleset.extract($)).toEqual(['Epsilon GmbH']);
    });

    it('returns nothing when no results list exists', () => {
      const $ = cheerio.load('<html><body><h1>Sign in</h1></body></html>');
      expect(ruleset.extract($)).toEqual([]);
    });
  });

  describe('LinkedInJobRuleset', () => {
    const ruleset = new LinkedInJobRuleset();

    it('reads the top card company link', () => {
      expect(ruleset.extract(cheerio.load(linkedInJobPage('Acme Corp')))).toEqual(['Acme Corp']);
    });

    it('falls back to og:title', () => {
      const $ = cheerio.load(`<html><head>
        <meta property="og:title" content="Zeta Robotics hiring Firmware Engineer in Oslo | LinkedIn">
      </head><body></body></html>`);
      expect(ruleset.extract($)).toEqual(['Zeta Robotics']);
    });

    it('falls back to a "Title - Company" page title', () => {
      const $ = cheerio.load('<html><head><title>Backend Engineer - Eta Health | LinkedIn</title></head></html>');
      expect(ruleset.extract($)).toEqual(['Eta Health']);
    });

    it('does not read "Hiring" in a job title as the hiring form', () => {
      const $ = cheerio.load('<html><head><title>Technical Hiring Lead - Eta Health | LinkedIn</title></head></html>');
      expect(ruleset.extract($)).toEqual(['Eta Health']);
    });

    it('reads the company before "hiring" when the job title also says Hiring', () => {
      const $ = cheerio.load('<html><head><title>Nu Labs hiring Hiring Manager in Paris, France | LinkedIn</title></head></html>');
      expect(ruleset.extract($)).toEqual(['Nu Labs']);
    });

    it('ignores sign-in prompts linked as company pages', () => {
      const $ = cheerio.load(`<html><body>
        <a href="https://www.linkedin.com/company/login">Sign in</a>
        <a href="https://www.linkedin.com/company/theta">Theta Partners</a>
      </body></html>`);
      expect(ruleset.extract($)).toEqual(['Theta Partners']);
    });

    it('returns nothing when no company is shown', () => {
      const $ = cheerio.load('<html><head><title>LinkedIn</title></head><body></body></html>');
      expect(ruleset.extract($)).toEqual([]);
    });
  });
});
