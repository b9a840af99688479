/**
 * MovieResolver: pure, no I/O.
 *
 * Resolves a free-text movie reference against the catalog with three tiers
 * tried in order: exact normalized title, title substring, then a hybrid
 * fuzzy score over the whole catalog. A fuzzy candidate below the score
 * threshold is still taken when its title is a couple of typos away.
 * Exposes only the winning record.
 */

import type { Catalog } from "#catalog/catalog.js";
import { normalizeText } from "#catalog/normalize.js";
import type { CatalogEntry, CatalogRecord } from "#catalog/types.js";
import { coverage, editSimilarity, jaccard, levenshtein, tokenize } from "./similarity.js";

// ============================================
// TYPES
// ============================================

export type MatchTier = "exact" | "substring" | "fuzzy";

export interface MatchCandidate {
  entry: CatalogEntry;
  /** Higher is better. 1 for exact hits. */
  score: number;
  tier: MatchTier;
}

export type ResolutionResult =
  | { matched: true; record: CatalogRecord; tier: MatchTier; score: number }
  | { matched: false; query: string };

export interface ResolverWeights {
  edit: number;
  token: number;
  metadata: number;
}

export interface ResolverOptions {
  weights: ResolverWeights;
  /** Minimum hybrid score for a fuzzy candidate to be accepted */
  threshold: number;
  /**
   * Below the threshold, still accept the title closest to the query when it
   * is at most this many edits away (and within half the title's length).
   * 0 turns this off.
   */
  maxTypoDistance: number;
}

export interface ScoreBreakdown {
  edit: number;
  token: number;
  metadata: number;
  score: number;
}

export const DEFAULT_RESOLVER_OPTIONS: ResolverOptions = {
  weights: { edit: 0.6, token: 0.25, metadata: 0.15 },
  threshold: 0.5,
  maxTypoDistance: 2,
};

interface IndexedEntry {
  entry: CatalogEntry;
  title: string;
  titleTokens: Set<string>;
  metaTokens: Set<string>;
}

type Tier = (query: string, resolver: MovieResolver) => MatchCandidate | undefined;

// ============================================
// TIERS
// ============================================

function byRatingThenOrder(a: MatchCandidate, b: MatchCandidate): number {
  return b.entry.record.rating - a.entry.record.rating || a.entry.index - b.entry.index;
}

const exactTier: Tier = (query, resolver) => {
  const entry = resolver.catalog.findExact(query);
  return entry ? { entry, score: 1, tier: "exact" } : undefined;
};

const substringTier: Tier = (query, resolver) => {
  const hits = resolver.catalog.findBySubstring(query);
  if (hits.length === 0) return undefined;
  const best = hits
    .map((entry): MatchCandidate => ({
      entry,
      score: query.length / normalizeText(entry.record.title).length,
      tier: "substring",
    }))
    .sort((a, b) =>
      b.entry.record.rating - a.entry.record.rating
      || a.entry.record.title.length - b.entry.record.title.length
      || a.entry.index - b.entry.index);
  return best[0];
};

const fuzzyTier: Tier = (query, resolver) => {
  const [best] = resolver.rank(query, 1);
  if (best && best.score >= resolver.options.threshold) return best;
  return resolver.nearestTitle(query);
};

const TIERS: Tier[] = [exactTier, substringTier, fuzzyTier];

// ============================================
// RESOLVER
// ============================================

export class MovieResolver {
  readonly catalog: Catalog;
  readonly options: ResolverOptions;
  private readonly index: IndexedEntry[];

  constructor(catalog: Catalog, options: ResolverOptions = DEFAULT_RESOLVER_OPTIONS) {
    const { edit, token, metadata } = options.weights;
    if ([edit, token, metadata].some(w => !Number.isFinite(w) || w < 0)) {
      throw new Error("Resolver weights must be non-negative numbers");
    }
    if (edit + token + metadata === 0) {
      throw new Error("At least one resolver weight must be positive");
    }
    if (!Number.isInteger(options.maxTypoDistance) || options.maxTypoDistance < 0) {
      throw new Error("Resolver typo distance must be a non-negative integer");
    }

    this.catalog = catalog;
    this.options = options;
    this.index = catalog.all().map(entry => {
      const r = entry.record;
      return {
        entry,
        title: normalizeText(r.title),
        titleTokens: tokenize(r.title),
        metaTokens: tokenize([r.overview, ...r.genres, r.director, ...r.cast].join(" ")),
      };
    });
  }

  resolve(query: string): ResolutionResult {
    const q = normalizeText(query);
    if (!q || this.catalog.size === 0) return { matched: false, query };

    for (const tier of TIERS) {
      const candidate = tier(q, this);
      if (candidate) {
        return { matched: true, record: candidate.entry.record, tier: candidate.tier, score: candidate.score };
      }
    }
    return { matched: false, query };
  }

  /**
   * Fuzzy-score the whole catalog and return the best candidates,
   * highest score first (ties: rating, then dataset order).
   * No threshold is applied.
   */
  rank(query: string, limit: number = 5): MatchCandidate[] {
    const q = normalizeText(query);
    if (!q) return [];
    const queryTokens = tokenize(q);

    return this.index
      .map((item): MatchCandidate => ({
        entry: item.entry,
        score: this.score(q, queryTokens, item).score,
        tier: "fuzzy",
      }))
      .sort((a, b) => b.score - a.score || byRatingThenOrder(a, b))
      .slice(0, Math.max(0, limit));
  }

  /**
   * The title fewest edits away from the query, if that is within the typo
   * allowance. Ties: fewer edits, then rating, then dataset order.
   */
  nearestTitle(query: string): MatchCandidate | undefined {
    const q = normalizeText(query);
    const { maxTypoDistance } = this.options;
    if (!q || maxTypoDistance === 0) return undefined;
    const queryTokens = tokenize(q);

    let best: { candidate: MatchCandidate; distance: number } | undefined;
    for (const item of this.index) {
      const distance = levenshtein(q, item.title);
      if (distance > Math.min(maxTypoDistance, Math.floor(item.title.length / 2))) continue;
      const candidate: MatchCandidate = {
        entry: item.entry,
        score: this.score(q, queryTokens, item).score,
        tier: "fuzzy",
      };
      if (!best || distance < best.distance
        || (distance === best.distance && byRatingThenOrder(candidate, best.candidate) < 0)) {
        best = { candidate, distance };
      }
    }
    return best?.candidate;
  }

  /** Component scores of one catalog entry against a query. */
  explain(query: string, entryIndex: number): ScoreBreakdown | undefined {
    const item = this.index[entryIndex];
    const q = normalizeText(query);
    if (!item || !q) return undefined;
    return this.score(q, tokenize(q), item);
  }

  private score(query: string, queryTokens: Set<string>, item: IndexedEntry): ScoreBreakdown {
    const { weights } = this.options;
    const edit = editSimilarity(query, item.title);
    const token = jaccard(queryTokens, item.titleTokens);
    const metadata = coverage(queryTokens, item.metaTokens);
    return {
      edit,
      token,
      metadata,
      score: weights.edit * edit + weights.token * token + weights.metadata * metadata,
    };
  }
}
