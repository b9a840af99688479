/**
 * Preference memory types.
 */

export const PREFERENCE_CATEGORIES = ["genre", "actor", "director", "movie"] as const;

export type PreferenceCategory = typeof PREFERENCE_CATEGORIES[number];

export type Preferences = Record<PreferenceCategory, string[]>;

/** Persisted as `{ "name": ..., "preferences": { ... } }`. */
export interface UserProfile {
  name: string | null;
  preferences: Preferences;
}

/** Facts pulled from one user message, in the same shape as a profile. */
export type PreferenceFacts = UserProfile;

export function emptyProfile(): UserProfile {
  return {
    name: null,
    preferences: { genre: [], actor: [], director: [], movie: [] },
  };
}
