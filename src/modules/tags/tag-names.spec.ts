import { normalizeTagName, normalizeTagNames } from './tag-names';

describe('tag names', () => {
  it('trims, collapses whitespace and lower-cases', () => {
    expect(normalizeTagName('  Type   Script ')).toBe('type script');
  });

  it('maps empty names to null', () => {
    expect(normalizeTagName('   ')).toBeNull();
    expect(normalizeTagName(undefined)).toBeNull();
  });

  it('truncates to 64 characters', () => {
    expect(normalizeTagName('x'.repeat(80))).toBe('x'.repeat(64));
  });

  it('dedupes case-insensitively in first-seen order', () => {
    expect(normalizeTagNames(['News', 'tech', ' NEWS ', '', 'Tech', 'art'])).toEqual(['news', 'tech', 'art']);
  });
});
