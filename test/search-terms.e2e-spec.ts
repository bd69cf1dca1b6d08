import { extractSearchTerms, MAX_SEARCH_TERMS } from '../src/modules/posts/search-terms';

describe('search-terms (extractSearchTerms)', () => {
  it('lower-cases and splits on anything that is not a letter or digit', () => {
    expect(extractSearchTerms('Hello, World! foo-bar_baz 42')).toEqual(['hello', 'world', 'foo', 'bar', 'baz', '42']);
  });

  it('keeps letters from any script', () => {
    expect(extractSearchTerms('Café naïve Привет')).toEqual(['café', 'naïve', 'привет']);
  });

  it('dedupes in first-seen order', () => {
    expect(extractSearchTerms('cat Dog CAT dog bird')).toEqual(['cat', 'dog', 'bird']);
  });

  it('returns nothing for blank or punctuation-only input', () => {
    expect(extractSearchTerms('')).toEqual([]);
    expect(extractSearchTerms('  !!! ... ')).toEqual([]);
    expect(extractSearchTerms(null)).toEqual([]);
  });

  it('caps the number of terms', () => {
    const query = Array.from({ length: 40 }, (_, i) => `w${i}`).join(' ');
    const terms = extractSearchTerms(query);
    expect(terms).toHaveLength(MAX_SEARCH_TERMS);
    expect(terms[0]).toBe('w0');
    expect(terms[MAX_SEARCH_TERMS - 1]).toBe('w15');
  });
});
