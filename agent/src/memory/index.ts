export { applyCorrection } from "./corrections.js";
export { answerFromProfile } from "./direct-answers.js";
export { describeProfile, extractPreferences, isProfileEmpty, mergePreferences } from "./preferences.js";
export { ProfileStore, parseProfile } from "./profile-store.js";
export { emptyProfile, PREFERENCE_CATEGORIES } from "./types.js";
export type { PreferenceCategory, PreferenceFacts, Preferences, UserProfile } from "./types.js";
