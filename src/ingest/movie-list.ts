import { createReadStream, existsSync } from "node:fs";
import { unlink } from "node:fs/promises";
import path from "node:path";
import { createInterface } from "node:readline";
import { createGunzip } from "node:zlib";
import { writeBatches } from "@/db/persist";
import { MOVIE_SCHEMA } from "@/db/store";
import type { DataStore } from "@/db/store";
import type { ListTarget } from "@/lib/config";
import { backfillDates, exportFilenameFor, parseIsoDate } from "@/lib/dates";
import { ConfigError, RetriesExhaustedError, errorMessage } from "@/lib/errors";
import { downloadToFile, withRetries } from "@/lib/http";
import type { Logger } from "@/lib/logger";
import { filterByPopularity } from "@/lib/normalize";
import { exportFileUrl, parseExportLine } from "@/lib/tmdb";
import type { MovieListRecord } from "@/lib/types";

export type MovieListOptions = {
  retry: number;
  batchSize: number;
  target: ListTarget;
  /** Calendar day the backfill counts back from. */
  today: Date;
  downloadDir: string;
  filterPopularity?: number | null;
  requestTimeoutMs?: number;
};

export type MovieListDeps = {
  store: DataStore;
  log: Logger;
};

export type ExportDaySummary = {
  filename: string;
  parsed: number;
  kept: number;
  written: number;
};

// ─── Target dates ─────────────────────────────────────────────────────────────

/** Lazily yields the export days for `target`, newest first. */
export function* targetDates(
  target: ListTarget,
  today: Date,
): Generator<Date, void, undefined> {
  if (target.kind === "backfill") {
    yield* backfillDates(today, target.days);
    return;
  }

  const date = parseIsoDate(target.date);
  if (!date) {
    throw new ConfigError(`FILE_DATE must be a YYYY-MM-DD date, got "${target.date}"`);
  }
  yield date;
}

// ─── Steps ────────────────────────────────────────────────────────────────────

/**
 * Downloads one export file. Returns false when the server answered with an
 * error status; throws RetriesExhaustedError when transport errors persist.
 */
export async function downloadExportFile(
  filename: string,
  destination: string,
  retry: number,
  log: Logger,
  timeoutMs?: number,
): Promise<boolean> {
  const url = exportFileUrl(filename);
  const outcome = await withRetries(
    () => downloadToFile(url, destination, timeoutMs),
    retry,
    { log, context: { filename } },
  );

  if (outcome.ok) return true;
  if (outcome.reason === "http") return false;
  throw new RetriesExhaustedError(outcome.attempts, outcome.error);
}

/**
 * Reads a downloaded export line by line through gunzip. A missing file means
 * no movies for that day; a file that is not gzip rejects.
 */
export async function readMovieFile(
  filePath: string,
  log: Logger,
): Promise<MovieListRecord[]> {
  if (!existsSync(filePath)) return [];

  const filename = path.basename(filePath);
  const source = createReadStream(filePath);
  const lines = createInterface({
    input: source.pipe(createGunzip()),
    crlfDelay: Infinity,
  });
  const movies: MovieListRecord[] = [];
  let skipped = 0;

  try {
    for await (const line of lines) {
      if (line.trim() === "") continue;
      const parsed = parseExportLine(line, filename);
      if (parsed.ok) {
        movies.push(parsed.value);
      } else {
        skipped += 1;
        log.warn("movie_line_invalid", { filename, error: parsed.error });
      }
    }
  } finally {
    lines.close();
    source.destroy();
  }

  log.info("movie_file_parsed", { filename, movies: movies.length, skipped });
  return movies;
}

export async function removeFile(filePath: string, log: Logger): Promise<void> {
  try {
    await unlink(filePath);
  } catch (err) {
    log.debug("movie_file_remove_failed", {
      file: filePath,
      error: errorMessage(err),
    });
  }
}

// ─── Pipeline ─────────────────────────────────────────────────────────────────

/**
 * Fetches each target day's export, keeps the movies at or above the
 * popularity threshold and saves them. Days run strictly one after another.
 */
export async function ingestMovieLists(
  deps: MovieListDeps,
  options: MovieListOptions,
): Promise<ExportDaySummary[]> {
  const { store, log } = deps;
  const summaries: ExportDaySummary[] = [];

  log.info("movie_list_started", { target: options.target });

  for (const date of targetDates(options.target, options.today)) {
    const filename = exportFilenameFor(date);
    const filePath = path.join(options.downloadDir, filename);
    log.info("movie_file_retrieving", { filename });

    const downloaded = await downloadExportFile(
      filename,
      filePath,
      options.retry,
      log,
      options.requestTimeoutMs,
    );
    try {
      const movies = downloaded ? await readMovieFile(filePath, log) : [];
      const kept = filterByPopularity(movies, options.filterPopularity);

      log.info("movie_list_saving", { filename, movies: kept.length });
      const written =
        kept.length === 0
          ? 0
          : await writeBatches(store, MOVIE_SCHEMA, kept, options.batchSize, log);

      summaries.push({ filename, parsed: movies.length, kept: kept.length, written });
    } finally {
      await removeFile(filePath, log);
    }
  }

  return summaries;
}
