/**
 * Catalog Database Loader
 *
 * Reads the `movies` table (IMDb top-1000 layout, produced by the import job)
 * with better-sqlite3 and builds the in-memory Catalog. The database is opened
 * read-only and closed as soon as the rows are in memory.
 */

import Database from "better-sqlite3";
import * as fs from "fs";
import { createComponentLogger } from "#logging.js";
import { Catalog } from "./catalog.js";
import type { CatalogRecord } from "./types.js";

const log = createComponentLogger("catalog");

const CATALOG_TABLE = "movies";

const SELECT_MOVIES = `
  SELECT
    Series_Title AS title,
    Released_Year AS year,
    COALESCE(Genre, '') AS genre,
    IMDB_Rating AS rating,
    COALESCE(Director, '') AS director,
    COALESCE(Star1, '') AS star1,
    COALESCE(Star2, '') AS star2,
    COALESCE(Star3, '') AS star3,
    COALESCE(Star4, '') AS star4,
    COALESCE(Overview, '') AS overview
  FROM ${CATALOG_TABLE}
  ORDER BY rowid
`;

interface MovieRow {
  title: unknown;
  year: unknown;
  genre: unknown;
  rating: unknown;
  director: unknown;
  star1: unknown;
  star2: unknown;
  star3: unknown;
  star4: unknown;
  overview: unknown;
}

function isMovieRow(row: unknown): row is MovieRow {
  return typeof row === "object" && row !== null && "title" in row;
}

function text(value: unknown): string {
  if (typeof value === "string") return value.trim();
  if (typeof value === "number") return String(value);
  return "";
}

function parseYear(value: unknown): number | null {
  const n = typeof value === "number" ? value : Number.parseInt(text(value), 10);
  return Number.isInteger(n) && n > 0 ? n : null;
}

function parseRating(value: unknown): number {
  const n = typeof value === "number" ? value : Number.parseFloat(text(value));
  if (!Number.isFinite(n)) return 0;
  return Math.min(10, Math.max(0, n));
}

function rowToRecord(row: MovieRow): CatalogRecord | null {
  const title = text(row.title);
  if (!title) return null;
  return {
    title,
    year: parseYear(row.year),
    genres: text(row.genre).split(",").map(g => g.trim()).filter(Boolean),
    director: text(row.director),
    cast: [row.star1, row.star2, row.star3, row.star4].map(text).filter(Boolean),
    rating: parseRating(row.rating),
    overview: text(row.overview),
  };
}

/**
 * Read every movie row from an open database, in table order.
 * Rows without a title are skipped.
 */
export function loadCatalogRecords(db: Database.Database): CatalogRecord[] {
  const rows: unknown[] = db.prepare(SELECT_MOVIES).all();
  const records: CatalogRecord[] = [];
  let skipped = 0;
  for (const row of rows) {
    const record = isMovieRow(row) ? rowToRecord(row) : null;
    if (record) {
      records.push(record);
    } else {
      skipped++;
    }
  }
  if (skipped > 0) {
    log.warn(`Skipped ${skipped} catalog row(s) without a title`);
  }
  return records;
}

/**
 * Open the catalog database and load it. A missing file yields an empty
 * catalog; the catalog tools then report the data as unavailable.
 */
export function openCatalog(dbPath: string): Catalog {
  if (!fs.existsSync(dbPath)) {
    log.warn("Catalog database not found, catalog tools will be unavailable", { dbPath });
    return new Catalog([]);
  }

  const db = new Database(dbPath, { readonly: true, fileMustExist: true });
  try {
    const records = loadCatalogRecords(db);
    log.info(`Loaded ${records.length} catalog record(s)`, { dbPath });
    return new Catalog(records);
  } finally {
    db.close();
  }
}
