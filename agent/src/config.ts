/**
 * Agent Configuration
 *
 * Typed view over the environment. `.env` is loaded by the entry point
 * (dotenv) before this module reads anything; tests pass an explicit env.
 */

import * as path from "path";
import type { ResolverOptions } from "#resolver/resolver.js";
import { DEFAULT_RESOLVER_OPTIONS } from "#resolver/resolver.js";

// ============================================
// TYPES
// ============================================

export interface LLMSettings {
  apiKey: string;
  baseUrl: string;
  model: string;
  temperature: number;
  maxTokens: number;
}

export interface AgentConfig {
  llm: LLMSettings;
  /** Empty when OMDb tools should report themselves unavailable */
  omdbApiKey: string;
  catalogDbPath: string;
  profilePath: string;
  /** Model decisions allowed per turn before the fallback answer */
  maxSteps: number;
  /** Prior user/assistant messages carried into each turn's context */
  historyLimit: number;
  resolver: ResolverOptions;
}

type Env = Record<string, string | undefined>;

// ============================================
// PARSING HELPERS
// ============================================

function readNumber(env: Env, key: string, fallback: number, range: { min: number; max: number }): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < range.min || value > range.max) {
    throw new Error(`${key} must be a number between ${range.min} and ${range.max}, got "${raw}"`);
  }
  return value;
}

function readInteger(env: Env, key: string, fallback: number, range: { min: number; max: number }): number {
  const value = readNumber(env, key, fallback, range);
  if (!Number.isInteger(value)) {
    throw new Error(`${key} must be an integer, got "${env[key]}"`);
  }
  return value;
}

function readString(env: Env, key: string, fallback: string): string {
  const raw = env[key]?.trim();
  return raw ? raw : fallback;
}

// ============================================
// LOADER
// ============================================

export function loadConfig(env: Env = process.env, cwd: string = process.cwd()): AgentConfig {
  return {
    llm: {
      apiKey: readString(env, "LLM_API_KEY", env.OPENAI_API_KEY?.trim() ?? ""),
      baseUrl: readString(env, "LLM_BASE_URL", "https://api.openai.com/v1").replace(/\/+$/, ""),
      model: readString(env, "LLM_MODEL", env.OPENAI_MODEL?.trim() || "gpt-4o-mini"),
      temperature: readNumber(env, "LLM_TEMPERATURE", 0.2, { min: 0, max: 2 }),
      maxTokens: readInteger(env, "LLM_MAX_TOKENS", 1024, { min: 1, max: 32_768 }),
    },
    omdbApiKey: readString(env, "OMDB_API_KEY", ""),
    catalogDbPath: path.resolve(cwd, readString(env, "CATALOG_DB_PATH", path.join("data", "imdb_top_1000.db"))),
    profilePath: path.resolve(cwd, readString(env, "PROFILE_PATH", path.join("data", "profile.json"))),
    maxSteps: readInteger(env, "MAX_STEPS", 8, { min: 1, max: 50 }),
    historyLimit: readInteger(env, "HISTORY_LIMIT", 12, { min: 0, max: 200 }),
    resolver: {
      weights: {
        edit: readNumber(env, "RESOLVER_EDIT_WEIGHT", DEFAULT_RESOLVER_OPTIONS.weights.edit, { min: 0, max: 10 }),
        token: readNumber(env, "RESOLVER_TOKEN_WEIGHT", DEFAULT_RESOLVER_OPTIONS.weights.token, { min: 0, max: 10 }),
        metadata: readNumber(env, "RESOLVER_METADATA_WEIGHT", DEFAULT_RESOLVER_OPTIONS.weights.metadata, { min: 0, max: 10 }),
      },
      threshold: readNumber(env, "RESOLVER_THRESHOLD", DEFAULT_RESOLVER_OPTIONS.threshold, { min: 0, max: 10 }),
      maxTypoDistance: readInteger(env, "RESOLVER_MAX_TYPOS", DEFAULT_RESOLVER_OPTIONS.maxTypoDistance, { min: 0, max: 5 }),
    },
  };
}
