/**
 * Small hand-written catalog used by the agent tests.
 */

import { Catalog } from "./catalog.js";
import type { CatalogRecord } from "./types.js";

export function movie(overrides: Partial<CatalogRecord> & { title: string }): CatalogRecord {
  return {
    year: null,
    genres: [],
    director: "",
    cast: [],
    rating: 0,
    overview: "",
    ...overrides,
  };
}

export const FIXTURE_MOVIES: CatalogRecord[] = [
  movie({
    title: "Interstellar", year: 2014, genres: ["Adventure", "Drama", "Sci-Fi"],
    director: "Christopher Nolan",
    cast: ["Matthew McConaughey", "Anne Hathaway", "Jessica Chastain", "Mackenzie Foy"],
    rating: 8.6,
    overview: "A crew of explorers travels through a wormhole near Saturn to find a new home for humanity.",
  }),
  movie({
    title: "Inception", year: 2010, genres: ["Action", "Adventure", "Sci-Fi"],
    director: "Christopher Nolan",
    cast: ["Leonardo DiCaprio", "Joseph Gordon-Levitt", "Elliot Page", "Ken Watanabe"],
    rating: 8.8,
    overview: "A thief who steals secrets through dream-sharing is given a chance to plant an idea instead.",
  }),
  movie({
    title: "The Dark Knight", year: 2008, genres: ["Action", "Crime", "Drama"],
    director: "Christopher Nolan",
    cast: ["Christian Bale", "Heath Ledger", "Aaron Eckhart", "Michael Caine"],
    rating: 9.0,
    overview: "Batman faces the Joker, a criminal mastermind who plunges Gotham into chaos.",
  }),
  movie({
    title: "The Dark Knight Rises", year: 2012, genres: ["Action", "Drama"],
    director: "Christopher Nolan",
    cast: ["Christian Bale", "Tom Hardy", "Anne Hathaway", "Gary Oldman"],
    rating: 8.4,
    overview: "Eight years later Batman returns to protect Gotham from the masked terrorist Bane.",
  }),
  movie({
    title: "Police Story", year: 1985, genres: ["Action", "Comedy", "Crime"],
    director: "Jackie Chan",
    cast: ["Jackie Chan", "Brigitte Lin", "Maggie Cheung", "Chu Yuan"],
    rating: 7.6,
    overview: "A Hong Kong detective must clear his name after a drug lord frames him.",
  }),
  movie({
    title: "Drunken Master II", year: 1994, genres: ["Action", "Comedy"],
    director: "Chia-Liang Liu",
    cast: ["Jackie Chan", "Lung Ti", "Anita Mui", "Felix Wong"],
    rating: 7.6,
    overview: "A martial artist uncovers a smuggling ring stealing ancient artifacts.",
  }),
  movie({
    title: "Spirited Away", year: 2001, genres: ["Animation", "Adventure", "Family"],
    director: "Hayao Miyazaki",
    cast: ["Daveigh Chase", "Suzanne Pleshette", "Miyu Irino", "Rumi Hiiragi"],
    rating: 8.6,
    overview: "A girl wanders into a world of spirits and must work in a bathhouse to free her parents.",
  }),
  movie({
    title: "Alien", year: 1979, genres: ["Horror", "Sci-Fi"],
    director: "Ridley Scott",
    cast: ["Sigourney Weaver", "Tom Skerritt", "John Hurt", "Veronica Cartwright"],
    rating: 8.4,
    overview: "The crew of a commercial spacecraft encounters a deadly creature.",
  }),
  movie({
    title: "Aliens", year: 1986, genres: ["Action", "Adventure", "Sci-Fi"],
    director: "James Cameron",
    cast: ["Sigourney Weaver", "Michael Biehn", "Carrie Henn", "Paul Reiser"],
    rating: 8.3,
    overview: "Ripley returns to the planet with a unit of marines.",
  }),
  movie({
    title: "Up", year: 2009, genres: ["Animation", "Adventure", "Comedy"],
    director: "Pete Docter",
    cast: ["Edward Asner", "Jordan Nagai", "John Ratzenberger", "Christopher Plummer"],
    rating: 8.2,
    overview: "An old man ties balloons to his house and flies to South America.",
  }),
];

export function fixtureCatalog(): Catalog {
  return new Catalog(FIXTURE_MOVIES);
}
