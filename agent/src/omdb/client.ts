/**
 * OMDb Client
 *
 * Thin wrapper over the OMDb HTTP API (https://www.omdbapi.com/). Every
 * failure, including OMDb's own `Response: "False"`, surfaces as an
 * ExternalLookupError so the tool loop can report it in-band.
 */

import { describeError, ExternalLookupError } from "#errors.js";
import { createComponentLogger } from "#logging.js";

const log = createComponentLogger("omdb");

const OMDB_BASE = "https://www.omdbapi.com/";
const SERVICE = "OMDb";

// ============================================
// TYPES
// ============================================

export interface OmdbMovie {
  title: string;
  year: string;
  genre: string;
  director: string;
  actors: string;
  imdbRating: string;
  plot: string;
}

export interface OmdbSearchHit {
  title: string;
  year: string;
  imdbId: string;
}

export interface OmdbClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
}

type OmdbBody = Record<string, unknown>;

function isRecord(value: unknown): value is OmdbBody {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function field(body: OmdbBody, key: string): string {
  const value = body[key];
  return typeof value === "string" && value.trim() ? value.trim() : "N/A";
}

// ============================================
// CLIENT
// ============================================

export class OmdbClient {
  private apiKey: string;
  private baseUrl: string;
  private timeoutMs: number;

  constructor(apiKey: string, options: OmdbClientOptions = {}) {
    this.apiKey = apiKey.trim();
    this.baseUrl = options.baseUrl ?? OMDB_BASE;
    this.timeoutMs = options.timeoutMs ?? 15_000;
  }

  get configured(): boolean {
    return this.apiKey !== "";
  }

  /** Look a movie up by title. `fullPlot` asks for the long plot text. */
  async lookup(title: string, options: { fullPlot?: boolean } = {}): Promise<OmdbMovie> {
    const params: Record<string, string> = { t: title };
    if (options.fullPlot) params.plot = "full";

    const body = await this.request(params);
    return {
      title: field(body, "Title"),
      year: field(body, "Year"),
      genre: field(body, "Genre"),
      director: field(body, "Director"),
      actors: field(body, "Actors"),
      imdbRating: field(body, "imdbRating"),
      plot: field(body, "Plot"),
    };
  }

  /** Keyword search. Returns OMDb's first page of hits. */
  async search(keyword: string): Promise<OmdbSearchHit[]> {
    const body = await this.request({ s: keyword });
    const hits: unknown[] = Array.isArray(body.Search) ? body.Search : [];
    return hits.filter(isRecord).map(hit => ({
      title: field(hit, "Title"),
      year: field(hit, "Year"),
      imdbId: field(hit, "imdbID"),
    }));
  }

  private async request(params: Record<string, string>): Promise<OmdbBody> {
    if (!this.configured) {
      throw new ExternalLookupError(SERVICE, "no API key configured (set OMDB_API_KEY)");
    }

    const url = new URL(this.baseUrl);
    for (const [key, value] of Object.entries(params)) url.searchParams.set(key, value);
    url.searchParams.set("apikey", this.apiKey);

    let resp: Response;
    try {
      resp = await fetch(url, {
        headers: { "Accept": "application/json" },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new ExternalLookupError(SERVICE, describeError(err), { cause: err });
    }

    if (!resp.ok) {
      throw new ExternalLookupError(SERVICE, `HTTP ${resp.status}`);
    }

    let body: unknown;
    try {
      body = await resp.json();
    } catch (err) {
      throw new ExternalLookupError(SERVICE, "malformed response body", { cause: err });
    }

    if (!isRecord(body)) {
      throw new ExternalLookupError(SERVICE, "malformed response body");
    }
    if (body.Response === "False") {
      throw new ExternalLookupError(SERVICE, typeof body.Error === "string" ? body.Error : "no result");
    }

    log.debug("OMDb request succeeded", { params: Object.keys(params) });
    return body;
  }
}
