/**
 * Catalog: read-only, in-memory view of the movie dataset.
 *
 * Constructed once from the rows of the catalog database and never mutated.
 * Dataset order is preserved and used as the final tie-breaker everywhere.
 */

import { normalizeText } from "./normalize.js";
import type { CatalogEntry, CatalogRecord } from "./types.js";

export class Catalog {
  private readonly entries: readonly CatalogEntry[];
  private readonly normalizedTitles: readonly string[];

  constructor(records: readonly CatalogRecord[]) {
    this.entries = Object.freeze(records.map((record, index) => Object.freeze({
      record: Object.freeze({
        ...record,
        genres: Object.freeze([...record.genres]),
        cast: Object.freeze([...record.cast]),
      }),
      index,
    })));
    this.normalizedTitles = Object.freeze(records.map(r => normalizeText(r.title)));
  }

  get size(): number {
    return this.entries.length;
  }

  /** Every entry in dataset order. */
  all(): readonly CatalogEntry[] {
    return this.entries;
  }

  /** First entry whose normalized title equals the normalized query. */
  findExact(query: string): CatalogEntry | undefined {
    const q = normalizeText(query);
    if (!q) return undefined;
    const idx = this.normalizedTitles.indexOf(q);
    return idx >= 0 ? this.entries[idx] : undefined;
  }

  /** Entries whose normalized title contains the normalized query, in dataset order. */
  findBySubstring(query: string): CatalogEntry[] {
    const q = normalizeText(query);
    if (!q) return [];
    return this.entries.filter((_, i) => this.normalizedTitles[i].includes(q));
  }

  /** Movies with a cast member matching the actor fragment, best rated first. */
  withActor(actor: string, limit: number): CatalogRecord[] {
    const q = normalizeText(actor);
    if (!q) return [];
    return this.topRated(e => e.record.cast.some(name => normalizeText(name).includes(q)), limit);
  }

  /** Movies tagged with a genre matching the fragment, best rated first. */
  topByGenre(genre: string, limit: number): CatalogRecord[] {
    const q = normalizeText(genre);
    if (!q) return [];
    return this.topRated(e => e.record.genres.some(g => normalizeText(g).includes(q)), limit);
  }

  /** Movies whose overview mentions the keyword, in dataset order. */
  searchOverview(keyword: string, limit: number): CatalogRecord[] {
    const q = normalizeText(keyword);
    if (!q) return [];
    return this.entries
      .filter(e => normalizeText(e.record.overview).includes(q))
      .slice(0, limit)
      .map(e => e.record);
  }

  private topRated(predicate: (entry: CatalogEntry) => boolean, limit: number): CatalogRecord[] {
    return this.entries
      .filter(predicate)
      .sort((a, b) => b.record.rating - a.record.rating || a.index - b.index)
      .slice(0, limit)
      .map(e => e.record);
  }
}
