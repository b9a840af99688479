/**
 * Movie Resolver Tests
 *
 * Tier order, tie-breaking, fuzzy scoring and configuration checks.
 */

import { describe, it, expect } from "vitest";
import { Catalog } from "#catalog/catalog.js";
import { fixtureCatalog, movie } from "#catalog/fixtures.js";
import { MovieResolver, DEFAULT_RESOLVER_OPTIONS } from "./resolver.js";
import { coverage, editSimilarity, jaccard, levenshtein, tokenize } from "./similarity.js";

// ============================================
// SIMILARITY PRIMITIVES
// ============================================

describe("similarity", () => {
  it("computes edit distance", () => {
    expect(levenshtein("kitten", "sitting")).toBe(3);
    expect(levenshtein("", "abc")).toBe(3);
    expect(levenshtein("same", "same")).toBe(0);
  });

  it("normalizes edit similarity by the longer string", () => {
    expect(editSimilarity("intersellar", "interstellar")).toBeCloseTo(11 / 12, 10);
    expect(editSimilarity("", "")).toBe(1);
  });

  it("tokenizes without punctuation or stop words", () => {
    expect([...tokenize("The Lord of the Rings: Return")]).toEqual(["lord", "rings", "return"]);
    expect([...tokenize("Война и мир")]).toEqual(["война", "мир"]);
  });

  it("computes Jaccard overlap and query coverage", () => {
    expect(jaccard(new Set(["a", "b"]), new Set(["b", "c"]))).toBeCloseTo(1 / 3, 10);
    expect(jaccard(new Set(), new Set())).toBe(0);
    expect(coverage(new Set(["x", "y"]), new Set(["y", "z"]))).toBe(0.5);
    expect(coverage(new Set(), new Set(["y"]))).toBe(0);
  });
});

// ============================================
// TIERS
// ============================================

describe("MovieResolver.resolve", () => {
  const resolver = new MovieResolver(fixtureCatalog());

  it("resolves an exact title ignoring case and spacing", () => {
    const result = resolver.resolve("  INTERSTELLAR ");
    expect(result).toEqual({
      matched: true,
      record: expect.objectContaining({ title: "Interstellar", year: 2014 }),
      tier: "exact",
      score: 1,
    });
  });

  it("prefers the exact title over a longer title containing it", () => {
    const result = resolver.resolve("the dark knight");
    expect(result.matched && result.record.title).toBe("The Dark Knight");
    expect(result.matched && result.tier).toBe("exact");
  });

  it("picks the best rated substring hit", () => {
    const result = resolver.resolve("lien");
    expect(result).toEqual({
      matched: true,
      record: expect.objectContaining({ title: "Alien" }),
      tier: "substring",
      score: 0.8,
    });
  });

  it("resolves a unique partial title by substring", () => {
    const result = resolver.resolve("spirited");
    expect(result.matched && result.record.title).toBe("Spirited Away");
    expect(result.matched && result.tier).toBe("substring");
  });

  it("resolves a one-letter typo through the fuzzy tier", () => {
    const result = resolver.resolve("Intersellar");
    expect(result.matched).toBe(true);
    if (!result.matched) return;
    expect(result.record.title).toBe("Interstellar");
    expect(result.tier).toBe("fuzzy");
    expect(result.score).toBeCloseTo(0.55, 6);

    const typo = resolver.resolve("Incepton");
    expect(typo.matched && typo.record.title).toBe("Inception");
  });

  it("accepts a title two edits away even below the score threshold", () => {
    const result = resolver.resolve("Inceptoin");
    expect(result).toEqual({
      matched: true,
      record: expect.objectContaining({ title: "Inception" }),
      tier: "fuzzy",
      score: expect.closeTo(0.6 * (7 / 9), 6),
    });

    const swapped = resolver.resolve("Alein");
    expect(swapped.matched && swapped.record.title).toBe("Alien");
    expect(swapped.matched && swapped.tier).toBe("fuzzy");
    expect(swapped.matched && swapped.score).toBeCloseTo(0.36, 6);
  });

  it("accepts one extra letter on a short title", () => {
    const result = resolver.resolve("Upp");
    expect(result.matched && result.record.title).toBe("Up");
    expect(result.matched && result.tier).toBe("fuzzy");
  });

  it("does not let a short title absorb unrelated two-letter queries", () => {
    expect(resolver.nearestTitle("zq")).toBeUndefined();
    expect(resolver.resolve("zq").matched).toBe(false);
  });

  it("returns NoMatch for unrelated text", () => {
    expect(resolver.resolve("zzqx vprt")).toEqual({ matched: false, query: "zzqx vprt" });
  });

  it("returns NoMatch for an empty query", () => {
    expect(resolver.resolve("   ")).toEqual({ matched: false, query: "   " });
  });

  it("returns NoMatch against an empty catalog", () => {
    expect(new MovieResolver(new Catalog([])).resolve("Interstellar").matched).toBe(false);
  });

  it("respects a stricter threshold when typo acceptance is off", () => {
    const strict = new MovieResolver(fixtureCatalog(), {
      ...DEFAULT_RESOLVER_OPTIONS,
      threshold: 0.6,
      maxTypoDistance: 0,
    });
    expect(strict.resolve("Intersellar").matched).toBe(false);
    expect(strict.resolve("Alein").matched).toBe(false);
  });

  it("narrows typo acceptance with a smaller distance", () => {
    const tight = new MovieResolver(fixtureCatalog(), { ...DEFAULT_RESOLVER_OPTIONS, maxTypoDistance: 1 });
    expect(tight.resolve("Alein").matched).toBe(false);
    const short = tight.resolve("Upp");
    expect(short.matched && short.tier).toBe("fuzzy");
  });
});

// ============================================
// TIE-BREAKING
// ============================================

describe("tie-breaking", () => {
  it("prefers the shorter title among equally rated substring hits", () => {
    const resolver = new MovieResolver(new Catalog([
      movie({ title: "Heat Wave", rating: 8.3 }),
      movie({ title: "Heat", rating: 8.3 }),
    ]));
    const result = resolver.resolve("hea");
    expect(result.matched && result.record.title).toBe("Heat");
  });

  it("falls back to dataset order for identical substring candidates", () => {
    const resolver = new MovieResolver(new Catalog([
      movie({ title: "Rocky V", rating: 5 }),
      movie({ title: "Rocky I", rating: 5 }),
    ]));
    const result = resolver.resolve("rocky");
    expect(result.matched && result.record.title).toBe("Rocky V");
  });

  it("breaks fuzzy score ties by rating", () => {
    const resolver = new MovieResolver(new Catalog([
      movie({ title: "Solaris", year: 2002, rating: 6.2 }),
      movie({ title: "Solaris", year: 1972, rating: 8.1 }),
    ]));
    const result = resolver.resolve("Solaros");
    expect(result.matched && result.tier).toBe("fuzzy");
    expect(result.matched && result.record.year).toBe(1972);
  });
});

// ============================================
// DIAGNOSTICS
// ============================================

describe("rank / explain", () => {
  const resolver = new MovieResolver(fixtureCatalog());

  it("ranks fuzzy candidates by score", () => {
    const ranked = resolver.rank("alien", 2);
    expect(ranked.map(c => c.entry.record.title)).toEqual(["Alien", "Aliens"]);
    expect(ranked[0].score).toBeCloseTo(0.85, 6);
    expect(ranked[1].score).toBeCloseTo(0.5, 6);
    expect(ranked.every(c => c.tier === "fuzzy")).toBe(true);
  });

  it("returns no candidates for an empty query", () => {
    expect(resolver.rank("  ")).toEqual([]);
  });

  it("breaks a score into its components", () => {
    const breakdown = resolver.explain("dark knight", 2);
    expect(breakdown?.edit).toBeCloseTo(11 / 15, 6);
    expect(breakdown?.token).toBe(1);
    expect(breakdown?.metadata).toBe(0);
    expect(breakdown?.score).toBeCloseTo(0.6 * (11 / 15) + 0.25, 6);
  });

  it("counts director and overview words as metadata", () => {
    expect(resolver.explain("nolan wormhole", 0)?.metadata).toBe(1);
  });
});

// ============================================
// CONFIGURATION
// ============================================

describe("resolver options", () => {
  it("rejects all-zero weights", () => {
    expect(() => new MovieResolver(fixtureCatalog(), {
      weights: { edit: 0, token: 0, metadata: 0 },
      threshold: 0.5,
      maxTypoDistance: 2,
    })).toThrow("At least one resolver weight must be positive");
  });

  it("rejects negative weights", () => {
    expect(() => new MovieResolver(fixtureCatalog(), {
      weights: { edit: 1, token: -0.1, metadata: 0 },
      threshold: 0.5,
      maxTypoDistance: 2,
    })).toThrow("non-negative");
  });

  it("rejects a fractional typo distance", () => {
    expect(() => new MovieResolver(fixtureCatalog(), { ...DEFAULT_RESOLVER_OPTIONS, maxTypoDistance: 1.5 }))
      .toThrow("Resolver typo distance must be a non-negative integer");
  });
});
