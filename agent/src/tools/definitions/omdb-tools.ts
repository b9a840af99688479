/**
 * OMDb Tools
 *
 * Online lookups for movies outside the local catalog. Lookup failures are
 * thrown as ExternalLookupError and reported in-band by the tool loop.
 */

import type { OmdbClient } from "#omdb/client.js";
import type { RegisteredTool, ToolArgs } from "#tools/types.js";
import { clampLimit, DEFAULT_LIMIT, MAX_LIMIT } from "./catalog-tools.js";

export type OmdbLookup = Pick<OmdbClient, "lookup" | "search">;

function str(args: ToolArgs, key: string): string {
  const value = args[key];
  return typeof value === "string" ? value.trim() : "";
}

const titleSchema = {
  type: "object" as const,
  properties: { title: { type: "string" as const, description: "Movie title (English titles work best)" } },
  required: ["title"],
};

export function createOmdbTools(omdb: OmdbLookup): RegisteredTool[] {
  return [
    {
      id: "omdb.movie_info",
      description: "Look a movie up online in OMDb, with the full plot. Use for movies missing from the local catalog.",
      inputSchema: titleSchema,
      handler: async (args) => {
        const m = await omdb.lookup(str(args, "title"), { fullPlot: true });
        return [
          `${m.title} (${m.year})`,
          `Genre: ${m.genre}`,
          `IMDb rating: ${m.imdbRating}`,
          `Director: ${m.director}`,
          `Cast: ${m.actors}`,
          `Plot: ${m.plot}`,
          "Source: OMDb",
        ].join("\n");
      },
    },
    {
      id: "omdb.movie_rating",
      description: "Get a movie's IMDb rating online from OMDb.",
      inputSchema: titleSchema,
      handler: async (args) => {
        const m = await omdb.lookup(str(args, "title"));
        return `IMDb rating of "${m.title}" (${m.year}) according to OMDb: ${m.imdbRating}`;
      },
    },
    {
      id: "omdb.search",
      description: "Search OMDb for movies whose title contains a keyword.",
      inputSchema: {
        type: "object",
        properties: {
          keyword: { type: "string", description: "Word to search titles for" },
          limit: { type: "integer", description: `How many results to return (1-${MAX_LIMIT}, default ${DEFAULT_LIMIT})` },
        },
        required: ["keyword"],
      },
      handler: async (args) => {
        const keyword = str(args, "keyword");
        const hits = (await omdb.search(keyword)).slice(0, clampLimit(args.limit));
        if (hits.length === 0) return `No OMDb results for "${keyword}".`;
        return `OMDb results for "${keyword}":\n${hits.map(h => `${h.title} (${h.year})`).join("\n")}`;
      },
    },
  ];
}
