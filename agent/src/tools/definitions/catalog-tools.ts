/**
 * Catalog Tools
 *
 * Lookups against the local IMDb top-1000 catalog. Title lookups go through
 * the MovieResolver; a NoMatch is reported as text, never guessed.
 */

import type { Catalog } from "#catalog/catalog.js";
import type { CatalogRecord } from "#catalog/types.js";
import type { MovieResolver } from "#resolver/resolver.js";
import type { RegisteredTool, ToolArgs } from "#tools/types.js";

export const DEFAULT_LIMIT = 5;
export const MAX_LIMIT = 20;

export const CATALOG_UNAVAILABLE =
  "The local movie catalog is unavailable (no catalog database was loaded).";

// ============================================
// HELPERS
// ============================================

/** Optional `limit` argument: default 5, clamped to [1, 20]. */
export function clampLimit(value: unknown): number {
  if (typeof value !== "number" || !Number.isFinite(value)) return DEFAULT_LIMIT;
  return Math.min(MAX_LIMIT, Math.max(1, Math.trunc(value)));
}

function str(args: ToolArgs, key: string): string {
  const value = args[key];
  return typeof value === "string" ? value.trim() : "";
}

function yearOf(record: CatalogRecord): string {
  return record.year === null ? "n/a" : String(record.year);
}

function listLine(record: CatalogRecord): string {
  return `${record.title} (${yearOf(record)}), rating ${record.rating.toFixed(1)}`;
}

function describeRecord(record: CatalogRecord): string {
  return [
    `${record.title} (${yearOf(record)})`,
    `Genre: ${record.genres.join(", ") || "n/a"}`,
    `IMDb rating: ${record.rating.toFixed(1)}`,
    `Director: ${record.director || "n/a"}`,
    `Cast: ${record.cast.join(", ") || "n/a"}`,
    `Overview: ${record.overview || "n/a"}`,
  ].join("\n");
}

function titleParams(description: string) {
  return {
    type: "object" as const,
    properties: { title: { type: "string" as const, description } },
    required: ["title"],
  };
}

function listParams(key: string, description: string) {
  return {
    type: "object" as const,
    properties: {
      [key]: { type: "string" as const, description },
      limit: { type: "integer" as const, description: `How many movies to return (1-${MAX_LIMIT}, default ${DEFAULT_LIMIT})` },
    },
    required: [key],
  };
}

// ============================================
// DEFINITIONS
// ============================================

export function createCatalogTools(catalog: Catalog, resolver: MovieResolver): RegisteredTool[] {
  const available = () => catalog.size > 0;

  return [
    {
      id: "catalog.movie_info",
      description: "Describe a movie from the local IMDb top-1000 catalog: year, genres, rating, director, cast and overview. Tolerates typos in the title.",
      inputSchema: titleParams("Movie title as the user wrote it"),
      handler: async (args) => {
        if (!available()) return CATALOG_UNAVAILABLE;
        const title = str(args, "title");
        const result = resolver.resolve(title);
        if (!result.matched) return `No movie matching "${title}" was found in the local catalog.`;
        return `${describeRecord(result.record)}\nMatch: ${result.tier}`;
      },
    },
    {
      id: "catalog.movie_rating",
      description: "Get the IMDb rating of a movie from the local catalog. Tolerates typos in the title.",
      inputSchema: titleParams("Movie title as the user wrote it"),
      handler: async (args) => {
        if (!available()) return CATALOG_UNAVAILABLE;
        const title = str(args, "title");
        const result = resolver.resolve(title);
        if (!result.matched) return `No movie matching "${title}" was found in the local catalog.`;
        const r = result.record;
        return `IMDb rating of "${r.title}" (${yearOf(r)}): ${r.rating.toFixed(1)}`;
      },
    },
    {
      id: "catalog.movies_with_actor",
      description: "List the best rated catalog movies featuring an actor (matches part of the name).",
      inputSchema: listParams("actor", "Actor name or part of it"),
      handler: async (args) => {
        if (!available()) return CATALOG_UNAVAILABLE;
        const actor = str(args, "actor");
        const movies = catalog.withActor(actor, clampLimit(args.limit));
        if (movies.length === 0) return `No movies with an actor matching "${actor}" in the local catalog.`;
        return `Movies with "${actor}":\n${movies.map(listLine).join("\n")}`;
      },
    },
    {
      id: "catalog.top_by_genre",
      description: "List the best rated catalog movies of a genre (English genre names such as Drama, Sci-Fi, Comedy).",
      inputSchema: listParams("genre", "Genre name or part of it"),
      handler: async (args) => {
        if (!available()) return CATALOG_UNAVAILABLE;
        const genre = str(args, "genre");
        const movies = catalog.topByGenre(genre, clampLimit(args.limit));
        if (movies.length === 0) return `No movies in genre "${genre}" in the local catalog.`;
        return `Top "${genre}" movies:\n${movies.map(listLine).join("\n")}`;
      },
    },
    {
      id: "catalog.search_keyword",
      description: "Find catalog movies whose plot overview mentions a keyword.",
      inputSchema: listParams("keyword", "Word or phrase to look for in plot overviews"),
      handler: async (args) => {
        if (!available()) return CATALOG_UNAVAILABLE;
        const keyword = str(args, "keyword");
        const movies = catalog.searchOverview(keyword, clampLimit(args.limit));
        if (movies.length === 0) return `No movies whose overview mentions "${keyword}" in the local catalog.`;
        return `Movies whose overview mentions "${keyword}":\n${movies.map(listLine).join("\n")}`;
      },
    },
  ];
}
