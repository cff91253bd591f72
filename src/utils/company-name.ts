const SITE_SUFFIX = /\s*\|\s*(LinkedIn|Indeed|Glassdoor|Monster).*$/i;
const EDGE_PUNCTUATION = /^[\s|-]+|[\s|-]+$/g;
const PLATFORM_NAMES = new Set(['linkedin']);

/**
 * Collapses whitespace and strips trailing "| LinkedIn"-style suffixes
 */
export function cleanCompanyName(raw: string): string {
  return raw
    .replace(/\s+/g, ' ')
    .replace(EDGE_PUNCTUATION, '')
    .replace(SITE_SUFFIX, '')
    .trim();
}

/**
 * Rejects text that is a heading, call to action or platform name
 * rather than a company
 */
export function looksLikeNoise(name: string): boolean {
  const n = name.trim();
  if (n.length < 2) return true;

  const lower = n.toLowerCase();
  if (PLATFORM_NAMES.has(lower)) return true;
  if (/\bjobs in\b/.test(lower)) return true;
  if (/\b\d+\b.*\bjobs?\b/.test(lower)) return true;
  if (/\b(sign in|join now)\b/.test(lower)) return true;
  if (/\b(apply|hiring|careers?)\b/.test(lower) && !/[a-z]{3,}\s/.test(lower)) return true;

  return false;
}

/**
 * Comparison key for deduplication: trimmed and case-folded
 */
export function companyKey(name: string): string {
  return name.trim().toLowerCase();
}

/**
 * Cleans a candidate and returns it, or null when nothing usable remains
 */
export function acceptCompanyName(raw: string | undefined): string | null {
  if (!raw) return null;
  const cleaned = cleanCompanyName(raw);
  return cleaned && !looksLikeNoise(cleaned) ? cleaned : null;
}
