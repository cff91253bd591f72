import { describe, it, expect } from 'vitest';
import { acceptCompanyName, cleanCompanyName, companyKey, looksLikeNoise } from '../../src/utils/company-name';

describe('company-name', () => {
  describe('cleanCompanyName', () => {
    it('collapses whitespace and trims edge separators', () => {
      expect(cleanCompanyName('\n   Acme   Corp \t')).toBe('Acme Corp');
      expect(cleanCompanyName(' - Acme Corp |')).toBe('Acme Corp');
    });

    it('drops a trailing site suffix', () => {
      expect(cleanCompanyName('Acme Corp | LinkedIn')).toBe('Acme Corp');
      expect(cleanCompanyName('Acme Corp | Indeed.com')).toBe('Acme Corp');
    });

    it('keeps unicode names as they are', () => {
      expect(cleanCompanyName('  Société Générale ')).toBe('Société Générale');
      expect(cleanCompanyName('株式会社テスト')).toBe('株式会社テスト');
    });
  });

  describe('looksLikeNoise', () => {
    it('rejects headings and platform names', () => {
      expect(looksLikeNoise('208 EDM Operator jobs in United States')).toBe(true);
      expect(looksLikeNoise('1,024 new jobs')).toBe(true);
      expect(looksLikeNoise('LinkedIn')).toBe(true);
      expect(looksLikeNoise('Sign in')).toBe(true);
      expect(looksLikeNoise('Hiring')).toBe(true);
      expect(looksLikeNoise('A')).toBe(true);
    });

    it('accepts ordinary company names', () => {
      expect(looksLikeNoise('Acme Corp')).toBe(false);
      expect(looksLikeNoise('Acme Careers Group')).toBe(false);
      expect(looksLikeNoise('3M')).toBe(false);
    });

    it('only rejects "jobs in" as whole words', () => {
      expect(looksLikeNoise('Jobs Inc.')).toBe(false);
      expect(looksLikeNoise('Smart Jobs International')).toBe(false);
      expect(looksLikeNoise('Software jobs in Berlin')).toBe(true);
    });

    it('accepts Indeed as a hiring company', () => {
      expect(looksLikeNoise('Indeed')).toBe(false);
    });
  });

  describe('companyKey', () => {
    it('case-folds and trims', () => {
      expect(companyKey('  ACME Corp ')).toBe('acme corp');
    });
  });

  describe('acceptCompanyName', () => {
    it('returns the cleaned name or null', () => {
      expect(acceptCompanyName('  Beta   LLC ')).toBe('Beta LLC');
      expect(acceptCompanyName('Join now')).toBeNull();
      expect(acceptCompanyName('')).toBeNull();
      expect(acceptCompanyName(undefined)).toBeNull();
    });
  });
});
