/**
 * Preference Extraction & Merge
 *
 * Pattern rules (Russian and English) that pull the user's name and favorite
 * genres, actors, directors and movies out of a message. Clause rules run
 * first and remove what they matched, so "я люблю фильмы Нолана" becomes a
 * director and not a genre.
 */

import { applyCorrection } from "./corrections.js";
import {
  emptyProfile,
  PREFERENCE_CATEGORIES,
  type PreferenceCategory,
  type PreferenceFacts,
  type UserProfile,
} from "./types.js";

// ============================================
// PATTERNS
// ============================================

const START = "(?<![\\p{L}\\p{N}])";
const END = "(?![\\p{L}\\p{N}])";
const PHRASE = "([\\p{L}\\p{N} '\\-]+)";
const LIST = "([\\p{L}\\p{N} ,'\\-]+)";

function rule(source: string): RegExp {
  return new RegExp(START + source, "giu");
}

interface ExtractionRule {
  category: PreferenceCategory;
  pattern: RegExp;
  /** Capture may hold several values separated by commas or "и" / "and" */
  list: boolean;
}

const NAME_RULES: RegExp[] = [
  rule("меня зовут\\s+([\\p{L}\\-]+)"),
  rule("my name is\\s+([\\p{L}\\-]+)"),
  rule("call me\\s+([\\p{L}\\-]+)"),
];

const CLAUSE_RULES: ExtractionRule[] = [
  { category: "director", list: true, pattern: rule(`я (?:очень )?люблю фильмы (?:режисс[её]ра\\s+)?${LIST}`) },
  { category: "director", list: true, pattern: rule(`мой любимый режисс[её]р\\s+(?:[—-]\\s*)?${LIST}`) },
  { category: "director", list: true, pattern: rule(`i (?:really )?(?:love|like|enjoy) (?:movies|films) (?:by|from|directed by)\\s+${LIST}`) },
  { category: "director", list: true, pattern: rule(`my favou?rite director is\\s+${LIST}`) },

  { category: "actor", list: true, pattern: rule(`я (?:очень )?люблю акт[её]ра\\s+${LIST}`) },
  { category: "actor", list: true, pattern: rule(`мой любимый акт[её]р\\s+(?:[—-]\\s*)?${LIST}`) },
  { category: "actor", list: true, pattern: rule(`i (?:really )?(?:love|like|enjoy) (?:movies|films) (?:with|starring)\\s+${LIST}`) },
  { category: "actor", list: true, pattern: rule(`my favou?rite actor is\\s+${LIST}`) },

  { category: "movie", list: false, pattern: rule(`(?:мой любимый фильм|мне нравится фильм|я (?:очень )?люблю фильм)\\s+(?:[—-]\\s*)?${PHRASE}`) },
  { category: "movie", list: false, pattern: rule(`(?:my favou?rite (?:movie|film) is|i (?:really )?(?:love|like) the (?:movie|film))\\s+${PHRASE}`) },
];

const GENRE_RULES: ExtractionRule[] = [
  { category: "genre", list: true, pattern: rule(`мой любимый жанр\\s+(?:[—-]\\s*)?${LIST}`) },
  { category: "genre", list: true, pattern: rule(`я (?:очень )?люблю\\s+${LIST}`) },
  { category: "genre", list: true, pattern: rule(`my favou?rite genres? (?:is|are)\\s+${LIST}`) },
  { category: "genre", list: true, pattern: rule(`i (?:really )?(?:love|like|enjoy)\\s+([\\p{L}\\p{N} ,'\\-]+?)\\s+(?:movies|films)${END}`) },
];

const FILLERS = new RegExp(`${START}(?:тоже|также|очень|too|also|really)${END}`, "giu");
const LIST_SEPARATOR = /\s*,\s*|\s+и\s+|\s+and\s+/iu;

// ============================================
// HELPERS
// ============================================

function clean(value: string): string {
  return value.replace(FILLERS, " ").replace(/\s+/g, " ").trim();
}

function capitalizeWords(value: string): string {
  return value
    .split(" ")
    .map(w => w.charAt(0).toLocaleUpperCase() + w.slice(1))
    .join(" ");
}

function normalizeValue(category: PreferenceCategory, value: string): string {
  const v = clean(value);
  switch (category) {
    case "genre":
      return v.toLocaleLowerCase();
    case "actor":
    case "director":
      return capitalizeWords(v);
    case "movie":
      return v;
  }
}

/** Append unless already present, ignoring case. */
function appendUnique(list: string[], value: string): boolean {
  const key = value.toLocaleLowerCase();
  if (!value || list.some(existing => existing.toLocaleLowerCase() === key)) return false;
  list.push(value);
  return true;
}

function collect(facts: PreferenceFacts, rule: ExtractionRule, captured: string): void {
  const pieces = rule.list ? captured.split(LIST_SEPARATOR) : [captured];
  for (const piece of pieces) {
    appendUnique(facts.preferences[rule.category], normalizeValue(rule.category, piece));
  }
}

function applyRules(text: string, rules: ExtractionRule[], facts: PreferenceFacts): string {
  let rest = text;
  for (const r of rules) {
    rest = rest.replace(r.pattern, (_match: string, captured: string) => {
      collect(facts, r, captured);
      return " ";
    });
  }
  return rest;
}

// ============================================
// PUBLIC API
// ============================================

/**
 * Pull preference facts out of one user message. Typos from the correction
 * table are fixed first.
 */
export function extractPreferences(text: string): PreferenceFacts {
  const facts = emptyProfile();
  const corrected = applyCorrection(text);

  for (const pattern of NAME_RULES) {
    for (const match of corrected.matchAll(pattern)) {
      facts.name = match[1];
    }
  }

  const rest = applyRules(corrected, CLAUSE_RULES, facts);
  applyRules(rest, GENRE_RULES, facts);
  return facts;
}

/**
 * Merge facts into the profile in place. Append-only: values are never
 * removed, duplicates are detected case-insensitively. A new name replaces
 * the old one. Returns whether the profile changed.
 */
export function mergePreferences(profile: UserProfile, facts: PreferenceFacts): boolean {
  let changed = false;
  if (facts.name && facts.name !== profile.name) {
    profile.name = facts.name;
    changed = true;
  }
  for (const category of PREFERENCE_CATEGORIES) {
    for (const value of facts.preferences[category]) {
      if (appendUnique(profile.preferences[category], value)) changed = true;
    }
  }
  return changed;
}

export function isProfileEmpty(profile: UserProfile): boolean {
  return !profile.name && PREFERENCE_CATEGORIES.every(c => profile.preferences[c].length === 0);
}

const CATEGORY_LABELS: Record<PreferenceCategory, string> = {
  genre: "Favorite genres",
  actor: "Favorite actors",
  director: "Favorite directors",
  movie: "Favorite movies",
};

/** Profile snapshot placed in the model context. */
export function describeProfile(profile: UserProfile): string {
  if (isProfileEmpty(profile)) return "Nothing is known about the user yet.";

  const lines: string[] = [];
  if (profile.name) lines.push(`User's name: ${profile.name}.`);
  for (const category of PREFERENCE_CATEGORIES) {
    const values = profile.preferences[category];
    if (values.length > 0) lines.push(`${CATEGORY_LABELS[category]}: ${values.join(", ")}.`);
  }
  return lines.join("\n");
}
