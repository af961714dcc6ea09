/**
 * Daily ingest: saves the popular movies from TMDB's daily id exports, then
 * fetches details for every listed movie that has none yet.
 *
 * Usage:
 *   npx tsx scripts/ingest.ts
 *
 * Required env vars: MOVIE_DB, POSTGRES_URL, and BACKFILLED_DAYS or FILE_DATE
 * Optional env vars: POPULARITY, BATCH_SIZE, RETRY, DOWNLOAD_DIR,
 *   REQUEST_TIMEOUT_MS, DETAIL_FAILURE_DELAY_MS, DETAIL_SUCCESS_DELAY_MS,
 *   RUN_UTC_OFFSET_HOURS, LOG_LEVEL
 */

import "dotenv/config";
import { closeDb, getDb } from "@/db/client";
import { DrizzleStore } from "@/db/store";
import { enrichMovieDetails } from "@/ingest/movie-info";
import { ingestMovieLists } from "@/ingest/movie-list";
import { loadConfig } from "@/lib/config";
import type { Config } from "@/lib/config";
import { runDate } from "@/lib/dates";
import { ConfigError, errorMessage } from "@/lib/errors";
import { createLogger, log } from "@/lib/logger";

function readConfig(): Config {
  try {
    return loadConfig(process.env);
  } catch (err) {
    if (err instanceof ConfigError) {
      log.error("config_invalid", { error: err.message });
      process.exit(1);
    }
    throw err;
  }
}

async function run(config: Config): Promise<void> {
  const db = getDb();
  if (!db) {
    throw new ConfigError("POSTGRES_URL is required to store movie data");
  }
  const store = new DrizzleStore(db);

  if (process.env.BACKFILLED_DAYS && process.env.FILE_DATE) {
    log.warn("file_date_ignored", { reason: "BACKFILLED_DAYS is set" });
  }

  const days = await ingestMovieLists(
    { store, log: createLogger("movie-fetch") },
    {
      retry: config.retry,
      batchSize: config.batchSize,
      target: config.target,
      today: runDate(new Date(), config.runUtcOffsetHours),
      downloadDir: config.downloadDir,
      filterPopularity: config.popularity,
      requestTimeoutMs: config.requestTimeoutMs,
    },
  );
  log.info("movie_list_done", { days });

  const details = await enrichMovieDetails(
    { store, log: createLogger("movie-info") },
    {
      apiKey: config.apiKey,
      retry: config.retry,
      batchSize: config.batchSize,
      delays: config.delays,
      requestTimeoutMs: config.requestTimeoutMs,
    },
  );
  log.info("movie_info_done", { ...details });
}

async function main(): Promise<void> {
  const config = readConfig();
  try {
    await run(config);
  } catch (err) {
    log.error("run_failed", {
      error: errorMessage(err),
      name: err instanceof Error ? err.name : undefined,
    });
    process.exitCode = 1;
  } finally {
    await closeDb();
  }
}

void main();
