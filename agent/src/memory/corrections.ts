/**
 * Typo corrections applied to user text before preference extraction.
 *
 * A fixed literal table, not a spell checker.
 */

const CORRECTIONS: ReadonlyArray<[wrong: string, right: string]> = [
  ["люлблю", "люблю"],
  ["люблбю", "люблю"],
  ["научные фантастики", "научную фантастику"],
  ["фантастиу", "фантастику"],
  ["lvoe", "love"],
  ["moive", "movie"],
  ["moives", "movies"],
  ["favorit", "favorite"],
];

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// \b only knows ASCII word characters, so boundaries are spelled out for Cyrillic.
const RULES = CORRECTIONS.map(([wrong, right]) => ({
  pattern: new RegExp(`(?<![\\p{L}\\p{N}])${escapeRegExp(wrong)}(?![\\p{L}\\p{N}])`, "giu"),
  right,
}));

export function applyCorrection(text: string): string {
  let out = text;
  for (const { pattern, right } of RULES) {
    out = out.replace(pattern, right);
  }
  return out;
}
