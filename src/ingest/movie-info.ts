import { writeBatches } from "@/db/persist";
import { INFO_SCHEMA, MOVIE_SCHEMA } from "@/db/store";
import type { DataStore, TableSchema } from "@/db/store";
import type { DetailDelays } from "@/lib/config";
import { StoreError } from "@/lib/errors";
import { fetchJson, sleep as defaultSleep, withRetries } from "@/lib/http";
import type { Logger } from "@/lib/logger";
import { normalizeDetailRecord } from "@/lib/normalize";
import { movieDetailsUrl, parseMovieDetails } from "@/lib/tmdb";
import type { MovieDetailRecord } from "@/lib/types";

const LIST_VIEW = "list";
const INFO_VIEW = "info";

export type MovieInfoOptions = {
  apiKey: string;
  retry: number;
  batchSize: number;
  delays: DetailDelays;
  requestTimeoutMs?: number;
};

export type MovieInfoDeps = {
  store: DataStore;
  log: Logger;
  sleep?: (ms: number) => Promise<void>;
};

export type EnrichmentSummary = {
  candidates: number;
  fetched: number;
  skipped: number;
  written: number;
};

// ─── Candidate selection ──────────────────────────────────────────────────────

function movieIds(rows: Array<Record<string, unknown>>): string[] {
  const ids: string[] = [];
  for (const row of rows) {
    const id = row.movie_id;
    if (typeof id === "string" || typeof id === "number") ids.push(String(id));
  }
  return ids;
}

/** Ids in `listed` that are not in `enriched`, de-duplicated. */
export function missingMovieIds(
  listed: readonly string[],
  enriched: readonly string[],
): string[] {
  const done = new Set(enriched);
  return [...new Set(listed)].filter((id) => !done.has(id));
}

async function distinctMovieIds(store: DataStore, view: string): Promise<string[]> {
  const res = await store.query(`SELECT DISTINCT(movie_id) FROM ${view}`);
  if (!res.ok) throw new StoreError(`query ${view}`, res.error);
  return movieIds(res.value.data);
}

async function ensureTable<Row>(store: DataStore, schema: TableSchema<Row>): Promise<void> {
  const created = await store.save(schema, []);
  if (!created.ok) throw new StoreError(`create ${schema.tableName}`, created.error);
}

/**
 * Listed movies that have no detail record yet. Ensures both tables exist,
 * since a run whose exports were all empty never created the list table,
 * then registers both views.
 */
export async function findMoviesToEnrich(
  store: DataStore,
  log: Logger,
): Promise<string[]> {
  log.info("movie_views_preparing");

  await ensureTable(store, MOVIE_SCHEMA);
  await ensureTable(store, INFO_SCHEMA);

  for (const [view, table] of [
    [LIST_VIEW, MOVIE_SCHEMA.tableName],
    [INFO_VIEW, INFO_SCHEMA.tableName],
  ] as const) {
    const res = await store.createView(view, { table }, "postgres");
    if (!res.ok) throw new StoreError(`create view ${view}`, res.error);
  }

  const enriched = await distinctMovieIds(store, INFO_VIEW);
  const listed = await distinctMovieIds(store, LIST_VIEW);
  const missing = missingMovieIds(listed, enriched);

  log.info("movie_info_candidates", { movies: missing.length });
  return missing;
}

// ─── Detail fetch ─────────────────────────────────────────────────────────────

/**
 * One movie's normalized detail record, or null when the API answered with an
 * error status, retries ran out, or the body was not a details object.
 */
export async function fetchMovieDetail(
  movieId: string,
  options: MovieInfoOptions,
  log: Logger,
): Promise<MovieDetailRecord | null> {
  const url = movieDetailsUrl(movieId, options.apiKey);
  const outcome = await withRetries(
    () => {
      log.info("movie_info_requesting", { movieId });
      return fetchJson(url, options.requestTimeoutMs);
    },
    options.retry,
    { log, context: { movieId } },
  );

  if (!outcome.ok) {
    if (outcome.reason === "exhausted") {
      log.info("movie_info_retries_exhausted", {
        movieId,
        attempts: outcome.attempts,
        error: outcome.error.message,
      });
    }
    return null;
  }

  const parsed = parseMovieDetails(movieId, outcome.value);
  if (!parsed.ok) {
    log.warn("movie_info_invalid", { movieId, error: parsed.error });
    return null;
  }
  return normalizeDetailRecord(parsed.value);
}

// ─── Pipeline ─────────────────────────────────────────────────────────────────

/**
 * Fetches details for every listed movie without a detail record, one request
 * at a time with a pause after each, then saves them in batches.
 */
export async function enrichMovieDetails(
  deps: MovieInfoDeps,
  options: MovieInfoOptions,
): Promise<EnrichmentSummary> {
  const { store, log } = deps;
  const pause = deps.sleep ?? defaultSleep;

  const candidates = await findMoviesToEnrich(store, log);
  if (candidates.length === 0) {
    log.info("movie_info_nothing_new");
    return { candidates: 0, fetched: 0, skipped: 0, written: 0 };
  }

  log.info("movie_info_fetching", { movies: candidates.length });
  const records: MovieDetailRecord[] = [];

  for (const movieId of candidates) {
    const record = await fetchMovieDetail(movieId, options, log);
    if (!record) {
      await pause(options.delays.afterFailureMs);
      continue;
    }
    records.push(record);
    await pause(options.delays.afterSuccessMs);
  }

  const skipped = candidates.length - records.length;
  if (records.length === 0) {
    log.info("movie_info_nothing_to_write", { skipped });
    return { candidates: candidates.length, fetched: 0, skipped, written: 0 };
  }

  log.info("movie_info_saving", { movies: records.length });
  const written = await writeBatches(
    store,
    INFO_SCHEMA,
    records,
    options.batchSize,
    log,
  );

  return { candidates: candidates.length, fetched: records.length, skipped, written };
}
