/**
 * Catalog Types
 */

/** One movie of the local catalog. Frozen after load. */
export interface CatalogRecord {
  readonly title: string;
  /** Release year, null when the source value is not a year */
  readonly year: number | null;
  readonly genres: readonly string[];
  readonly director: string;
  /** Principal cast in billing order */
  readonly cast: readonly string[];
  /** IMDb rating, 0-10 */
  readonly rating: number;
  readonly overview: string;
}

/** A record together with its position in dataset order. */
export interface CatalogEntry {
  readonly record: CatalogRecord;
  readonly index: number;
}
