import { z } from "zod";
import { ingestDateFromFilename } from "./dates";
import { errorMessage } from "./errors";
import type { MovieDetailRecord, MovieListRecord } from "./types";

const TMDB_BASE = "https://api.themoviedb.org/3";
const EXPORTS_BASE = "http://files.tmdb.org/p/exports";
const DETAIL_LANGUAGE = "en-US";

// ─── Wire shapes ──────────────────────────────────────────────────────────────

const exportLineSchema = z.object({
  id: z.union([z.number(), z.string()]),
  original_title: z.string(),
  popularity: z.number(),
  adult: z.boolean().nullish(),
  video: z.boolean().nullish(),
});

const detailsSchema = z.object({
  imdb_id: z.string().nullish(),
  original_title: z.string().nullish(),
  release_date: z.string().nullish(),
  original_language: z.string().nullish(),
  runtime: z.number().nullish(),
  poster_path: z.string().nullish(),
  adult: z.boolean().nullish(),
  overview: z.string().nullish(),
  genres: z
    .array(z.object({ id: z.union([z.number(), z.string()]) }).passthrough())
    .nullish(),
});

// ─── URLs ─────────────────────────────────────────────────────────────────────

export function exportFileUrl(filename: string): string {
  return `${EXPORTS_BASE}/${filename}`;
}

export function movieDetailsUrl(movieId: string, apiKey: string): string {
  return `${TMDB_BASE}/movie/${encodeURIComponent(movieId)}?api_key=${encodeURIComponent(apiKey)}&language=${DETAIL_LANGUAGE}`;
}

// ─── Parsing ──────────────────────────────────────────────────────────────────

export type ParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: string };

/** One line of a daily export file. `ingest_date` comes from the filename. */
export function parseExportLine(
  line: string,
  filename: string,
): ParseResult<MovieListRecord> {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch (err) {
    return { ok: false, error: errorMessage(err) };
  }

  const parsed = exportLineSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, error: parsed.error.issues[0]?.message ?? "invalid" };
  }

  const data = parsed.data;
  return {
    ok: true,
    value: {
      movieId: String(data.id),
      ingestDate: ingestDateFromFilename(filename),
      popularity: data.popularity,
      movieTitle: data.original_title.trim(),
      adult: data.adult ?? null,
      video: data.video ?? null,
    },
  };
}

/**
 * Maps a movie details body onto a detail record. Values pass through as-is;
 * empty strings and bad dates are handled by `normalizeDetailRecord`.
 */
export function parseMovieDetails(
  movieId: string,
  body: unknown,
): ParseResult<MovieDetailRecord> {
  const parsed = detailsSchema.safeParse(body);
  if (!parsed.success) {
    return { ok: false, error: parsed.error.issues[0]?.message ?? "invalid" };
  }

  const data = parsed.data;
  const genreIds = [...new Set((data.genres ?? []).map((g) => String(g.id)))];

  return {
    ok: true,
    value: {
      movieId,
      imdbId: data.imdb_id ?? null,
      movieTitle: data.original_title ?? null,
      releaseDate: data.release_date ?? null,
      language: data.original_language ?? null,
      length: data.runtime ?? null,
      posterPath: data.poster_path ?? null,
      adult: data.adult ?? null,
      genresId: genreIds.length > 0 ? genreIds : null,
      description: data.overview ?? null,
    },
  };
}
