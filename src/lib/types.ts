/** One row per movie per export day. */
export type MovieListRecord = {
  movieId: string;
  ingestDate: string; // "YYYY-MM-DD", from the export filename
  popularity: number;
  movieTitle: string;
  adult: boolean | null;
  video: boolean | null;
};

/** Enrichment data for a single movie, written once. */
export type MovieDetailRecord = {
  movieId: string;
  imdbId: string | null;
  movieTitle: string | null;
  releaseDate: string | null; // "YYYY-MM-DD" once normalized
  language: string | null;
  length: number | null; // runtime in minutes
  posterPath: string | null;
  adult: boolean | null;
  genresId: string[] | null;
  description: string | null;
};
