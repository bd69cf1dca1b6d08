export const MAX_TAG_NAME_LENGTH = 64;

/** Canonical tag name: trimmed, inner whitespace collapsed, lower-cased. Empty → null. */
export function normalizeTagName(raw: string | null | undefined): string | null {
  const name = String(raw ?? '')
    .trim()
    .replace(/\s+/g, ' ')
    .toLowerCase()
    .slice(0, MAX_TAG_NAME_LENGTH)
    .trim();
  return name ? name : null;
}

/** Normalized, deduplicated, first-seen order. */
export function normalizeTagNames(raw: ReadonlyArray<string | null | undefined>): string[] {
  const out: string[] = [];
  const seen = new Set<string>();
  for (const r of raw ?? []) {
    const name = normalizeTagName(r);
    if (!name || seen.has(name)) continue;
    seen.add(name);
    out.push(name);
  }
  return out;
}
