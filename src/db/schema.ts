import {
  pgTable,
  text,
  doublePrecision,
  boolean,
  date,
  index,
  primaryKey,
} from 'drizzle-orm/pg-core';

// ─── Daily movie list ─────────────────────────────────────────────────────────

export const movieListPopSorted = pgTable('movie_list_pop_sorted', {
  movieId: text('movie_id').notNull(),
  ingestDate: date('ingest_date', { mode: 'string' }).notNull(),
  popularity: doublePrecision('popularity').notNull(),
  movieTitle: text('movie_title'),
  adult: boolean('adult'),
  video: boolean('video'),
}, (table) => [
  primaryKey({ columns: [table.ingestDate, table.popularity, table.movieId] }),
  index('idx_movie_list_pop_desc').on(table.ingestDate, table.popularity.desc()),
]);

// ─── Movie details ────────────────────────────────────────────────────────────

export const movieInfo = pgTable('movie_info', {
  movieId: text('movie_id').primaryKey(),
  imdbId: text('imdb_id'),
  movieTitle: text('movie_title'),
  releaseDate: date('release_date', { mode: 'string' }),
  language: text('language'),
  length: doublePrecision('length'),
  posterPath: text('poster_path'),
  adult: boolean('adult'),
  genresId: text('genres_id').array(),
  description: text('description'),
});
