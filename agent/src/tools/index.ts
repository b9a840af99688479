/**
 * Tool registry assembly.
 */

import type { Catalog } from "#catalog/catalog.js";
import type { MovieResolver } from "#resolver/resolver.js";
import { createCatalogTools } from "#tools/definitions/catalog-tools.js";
import { createOmdbTools, type OmdbLookup } from "#tools/definitions/omdb-tools.js";
import { ToolRegistry } from "./registry.js";

export interface ToolDependencies {
  catalog: Catalog;
  resolver: MovieResolver;
  omdb: OmdbLookup;
}

export function buildToolRegistry(deps: ToolDependencies): ToolRegistry {
  return new ToolRegistry().register(
    ...createCatalogTools(deps.catalog, deps.resolver),
    ...createOmdbTools(deps.omdb),
  );
}

export { ToolRegistry, validateArguments } from "./registry.js";
export { sanitizeToolName, unsanitizeToolName, manifestToNativeTools } from "./manifest.js";
export { clampLimit, CATALOG_UNAVAILABLE } from "#tools/definitions/catalog-tools.js";
export type { OmdbLookup } from "#tools/definitions/omdb-tools.js";
export type { RegisteredTool, ToolArgs, ToolHandler, ToolManifestEntry } from "./types.js";
