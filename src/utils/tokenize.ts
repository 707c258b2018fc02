/** Lowercases and drops every character outside [a-z0-9]. */
export function normalizeWord(word: string): string {
  return word.toLowerCase().replace(/[^a-z0-9]/g, '');
}

/**
 * Splits on whitespace and normalizes each word; empty words are dropped.
 * `minLength` filters out short words (used for descriptions).
 */
export function words(text: string | undefined, minLength = 1): string[] {
  if (!text) return [];
  const out: string[] = [];
  for (const raw of text.trim().split(/\s+/)) {
    const w = normalizeWord(raw);
    if (w.length >= minLength) out.push(w);
  }
  return out;
}

/** Query tokens: same normalization as indexed words, deduplicated, order kept. */
export function queryTokens(query: string | undefined): string[] {
  return Array.from(new Set(words(query)));
}

export function normalizeTag(tag: string): string {
  return tag.trim().toLowerCase();
}

export function normalizeTags(tags: Iterable<string> | undefined): string[] {
  if (!tags) return [];
  const out = new Set<string>();
  for (const t of tags) {
    const n = normalizeTag(t);
    if (n) out.add(n);
  }
  return Array.from(out);
}
