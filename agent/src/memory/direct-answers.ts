/**
 * Direct Memory Answers
 *
 * Questions about the user's own profile ("как меня зовут?", "what genres do
 * I like?") are answered from memory without a model call.
 */

import { PREFERENCE_CATEGORIES, type PreferenceCategory, type UserProfile } from "./types.js";

interface DirectQuestion {
  phrases: string[];
  answer: (profile: UserProfile) => string;
}

const RU_LABELS: Record<PreferenceCategory, string> = {
  genre: "любимые жанры",
  actor: "любимые актёры",
  director: "любимые режиссёры",
  movie: "любимые фильмы",
};

const EN_LABELS: Record<PreferenceCategory, string> = {
  genre: "favorite genres",
  actor: "favorite actors",
  director: "favorite directors",
  movie: "favorite movies",
};

function listPreferences(profile: UserProfile, labels: Record<PreferenceCategory, string>): string[] {
  return PREFERENCE_CATEGORIES
    .filter(c => profile.preferences[c].length > 0)
    .map(c => `${labels[c]}: ${profile.preferences[c].join(", ")}`);
}

const QUESTIONS: DirectQuestion[] = [
  {
    phrases: ["как меня зовут"],
    answer: p => p.name ? `Тебя зовут ${p.name}.` : "Я ещё не знаю, как тебя зовут.",
  },
  {
    phrases: ["what is my name", "what's my name"],
    answer: p => p.name ? `Your name is ${p.name}.` : "I don't know your name yet.",
  },
  {
    phrases: ["какие жанры я люблю"],
    answer: p => p.preferences.genre.length > 0
      ? `Ты любишь ${p.preferences.genre.join(", ")}.`
      : "Я пока не знаю, какие жанры ты любишь.",
  },
  {
    phrases: ["what genres do i like", "which genres do i like"],
    answer: p => p.preferences.genre.length > 0
      ? `You like ${p.preferences.genre.join(", ")}.`
      : "I don't know which genres you like yet.",
  },
  {
    phrases: ["что я люблю"],
    answer: p => {
      const parts = listPreferences(p, RU_LABELS);
      return parts.length > 0 ? `У тебя ${parts.join("; ")}.` : "Я пока не знаю, что ты любишь.";
    },
  },
  {
    phrases: ["what do i like"],
    answer: p => {
      const parts = listPreferences(p, EN_LABELS);
      return parts.length > 0 ? `Here is what I know: ${parts.join("; ")}.` : "I don't know what you like yet.";
    },
  },
];

/**
 * Answer a question about the profile, or null when the text is not one.
 */
export function answerFromProfile(text: string, profile: UserProfile): string | null {
  const low = text.toLocaleLowerCase().replace(/\s+/g, " ");
  for (const q of QUESTIONS) {
    if (q.phrases.some(phrase => low.includes(phrase))) return q.answer(profile);
  }
  return null;
}
