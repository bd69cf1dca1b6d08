export const MAX_SEARCH_TERMS = 16;
const MAX_TERM_LENGTH = 64;

/**
 * Splits a free-text query into lower-cased words (letters and digits in any script),
 * deduplicated in first-seen order.
 */
export function extractSearchTerms(query: string | null | undefined): string[] {
  const out: string[] = [];
  const seen = new Set<string>();
  for (const raw of String(query ?? '').toLowerCase().split(/[^\p{L}\p{N}]+/u)) {
    const term = raw.slice(0, MAX_TERM_LENGTH);
    if (!term || seen.has(term)) continue;
    seen.add(term);
    out.push(term);
    if (out.length >= MAX_SEARCH_TERMS) break;
  }
  return out;
}
