import os from "node:os";
import { DEFAULT_RUN_UTC_OFFSET_HOURS, parseIsoDate } from "./dates";
import { ConfigError } from "./errors";
import { DEFAULT_TIMEOUT_MS } from "./http";

type Env = Record<string, string | undefined>;

/** Which export days the list ingester fetches. */
export type ListTarget =
  | { kind: "backfill"; days: number }
  | { kind: "date"; date: string };

export type DetailDelays = {
  /** Pause after a detail request that produced no data. */
  afterFailureMs: number;
  /** Pause after a successful detail request. */
  afterSuccessMs: number;
};

export type Config = {
  apiKey: string;
  postgresUrl: string | undefined;
  popularity: number;
  batchSize: number;
  retry: number;
  target: ListTarget;
  downloadDir: string;
  requestTimeoutMs: number;
  delays: DetailDelays;
  runUtcOffsetHours: number;
};

export const defaults = {
  popularity: 15,
  batchSize: 10,
  retry: 3,
  delays: { afterFailureMs: 2000, afterSuccessMs: 350 },
} as const;

function readNumber(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (raw == null || raw === "") return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n)) {
    throw new ConfigError(`${name} must be a number, got "${raw}"`);
  }
  return n;
}

function readCount(env: Env, name: string, fallback: number, min = 0): number {
  const n = readNumber(env, name, fallback);
  if (!Number.isInteger(n) || n < min) {
    throw new ConfigError(`${name} must be an integer >= ${min}, got "${env[name]}"`);
  }
  return n;
}

/**
 * Backfill depth wins when both are set; the single date is only a fallback.
 */
export function resolveTarget(
  backfilledDays: string | undefined,
  fileDate: string | undefined,
): ListTarget {
  const days = backfilledDays?.trim();
  const date = fileDate?.trim();

  if (days) {
    if (!/^-?\d+$/.test(days)) {
      throw new ConfigError("Backfilled days must be an integer >= 0");
    }
    const n = Number.parseInt(days, 10);
    if (n < 0) {
      throw new ConfigError("Backfilled days must be >= 0");
    }
    return { kind: "backfill", days: n };
  }

  if (!date) {
    throw new ConfigError("You must supply either BACKFILLED_DAYS or FILE_DATE");
  }
  if (!parseIsoDate(date)) {
    throw new ConfigError(`FILE_DATE must be a YYYY-MM-DD date, got "${date}"`);
  }
  return { kind: "date", date };
}

export function loadConfig(env: Env): Config {
  const apiKey = env.MOVIE_DB?.trim();
  if (!apiKey) {
    throw new ConfigError("Please save a movie database api key in MOVIE_DB.");
  }

  return {
    apiKey,
    postgresUrl: env.POSTGRES_URL?.trim() || undefined,
    popularity: readNumber(env, "POPULARITY", defaults.popularity),
    batchSize: readCount(env, "BATCH_SIZE", defaults.batchSize, 1),
    retry: readCount(env, "RETRY", defaults.retry),
    target: resolveTarget(env.BACKFILLED_DAYS, env.FILE_DATE),
    downloadDir: env.DOWNLOAD_DIR?.trim() || os.tmpdir(),
    requestTimeoutMs: readCount(env, "REQUEST_TIMEOUT_MS", DEFAULT_TIMEOUT_MS, 1),
    delays: {
      afterFailureMs: readCount(
        env,
        "DETAIL_FAILURE_DELAY_MS",
        defaults.delays.afterFailureMs,
      ),
      afterSuccessMs: readCount(
        env,
        "DETAIL_SUCCESS_DELAY_MS",
        defaults.delays.afterSuccessMs,
      ),
    },
    runUtcOffsetHours: readNumber(
      env,
      "RUN_UTC_OFFSET_HOURS",
      DEFAULT_RUN_UTC_OFFSET_HOURS,
    ),
  };
}
