import { isIsoDate } from "./dates";
import type { MovieDetailRecord } from "./types";

const emptyToNull = <T>(value: T | ""): T | null => (value === "" ? null : value);

/**
 * Post-parse cleanup for a detail record: empty strings become null, and a
 * release date that is not a real `YYYY-MM-DD` date becomes null. The rest of
 * the record is kept either way.
 */
export function normalizeDetailRecord(record: MovieDetailRecord): MovieDetailRecord {
  return {
    movieId: record.movieId,
    imdbId: emptyToNull(record.imdbId),
    movieTitle: emptyToNull(record.movieTitle),
    releaseDate: isIsoDate(record.releaseDate) ? record.releaseDate : null,
    language: emptyToNull(record.language),
    length: record.length,
    posterPath: emptyToNull(record.posterPath),
    adult: record.adult,
    genresId: record.genresId,
    description: emptyToNull(record.description),
  };
}

/** Keeps records with popularity >= `threshold`, in order. */
export function filterByPopularity<T extends { popularity: number }>(
  records: readonly T[],
  threshold: number | null | undefined,
): T[] {
  if (threshold == null) return [...records];
  return records.filter((r) => r.popularity >= threshold);
}
