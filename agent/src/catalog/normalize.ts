/**
 * Text normalization shared by catalog lookups and the resolver.
 */

/** Lowercase, trim and collapse internal whitespace. */
export function normalizeText(text: string): string {
  return text.toLowerCase().replace(/\s+/g, " ").trim();
}
