/**
 * Similarity primitives for fuzzy title resolution.
 */

/** Words too common to say anything about which movie is meant. */
const STOP_WORDS = new Set([
  "a", "an", "the", "of", "and", "or", "in", "on", "at", "to", "for", "with",
  "from", "by", "is", "it", "its",
  "и", "в", "во", "на", "с", "со", "о", "об", "по", "к", "у", "из", "за", "а",
]);

/**
 * Lowercase word tokens, punctuation dropped, stop words removed.
 */
export function tokenize(text: string): Set<string> {
  const tokens = new Set<string>();
  for (const raw of text.toLowerCase().split(/[^\p{L}\p{N}]+/u)) {
    if (raw && !STOP_WORDS.has(raw)) tokens.add(raw);
  }
  return tokens;
}

/** Classic edit distance (insert / delete / substitute, unit cost). */
export function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  if (!a) return b.length;
  if (!b) return a.length;

  let prev = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const cur = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      cur.push(Math.min(cur[j - 1] + 1, prev[j] + 1, prev[j - 1] + cost));
    }
    prev = cur;
  }
  return prev[b.length];
}

/** 1 - distance / longer length, in [0, 1]. */
export function editSimilarity(a: string, b: string): number {
  const longest = Math.max(a.length, b.length);
  if (longest === 0) return 1;
  const sim = 1 - levenshtein(a, b) / longest;
  return Math.min(1, Math.max(0, sim));
}

/** |A ∩ B| / |A ∪ B|; 0 when both are empty. */
export function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 && b.size === 0) return 0;
  let shared = 0;
  for (const t of a) if (b.has(t)) shared++;
  return shared / (a.size + b.size - shared);
}

/** Share of query tokens found in the haystack, capped at 1. */
export function coverage(query: ReadonlySet<string>, haystack: ReadonlySet<string>): number {
  let hits = 0;
  for (const t of query) if (haystack.has(t)) hits++;
  return Math.min(1, hits / Math.max(1, query.size));
}
