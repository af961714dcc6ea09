import { sql } from 'drizzle-orm';

// Mirrors schema.ts; run before the first save into each table.

export const movieListDdl = [
  sql`
  CREATE TABLE IF NOT EXISTS movie_list_pop_sorted (
    movie_id text NOT NULL,
    ingest_date date NOT NULL,
    popularity double precision NOT NULL,
    movie_title text,
    adult boolean,
    video boolean,
    PRIMARY KEY (ingest_date, popularity, movie_id)
  )`,
  sql`
  CREATE INDEX IF NOT EXISTS idx_movie_list_pop_desc
    ON movie_list_pop_sorted (ingest_date, popularity DESC)`,
];

export const movieInfoDdl = [
  sql`
  CREATE TABLE IF NOT EXISTS movie_info (
    movie_id text PRIMARY KEY,
    imdb_id text,
    movie_title text,
    release_date date,
    language text,
    length double precision,
    poster_path text,
    adult boolean,
    genres_id text[],
    description text
  )`,
];
