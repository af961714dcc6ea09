import { createWriteStream } from "node:fs";
import { rm } from "node:fs/promises";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { HttpStatusError, errorMessage } from "./errors";
import type { Logger } from "./logger";

export const DEFAULT_TIMEOUT_MS = 30000;
const USER_AGENT = "movie-export-ingest/1.0";

export function isAbortError(err: unknown): err is Error {
  return err instanceof Error && err.name === "AbortError";
}

export async function sleep(ms: number): Promise<void> {
  if (ms <= 0) return;
  await new Promise<void>((resolve) => setTimeout(resolve, ms));
}

export async function fetchWithTimeout(
  url: string,
  init: RequestInit = {},
  timeoutMs: number = DEFAULT_TIMEOUT_MS,
): Promise<Response> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  try {
    return await fetch(url, {
      ...init,
      signal: controller.signal,
      headers: {
        "user-agent": USER_AGENT,
        ...(init.headers || {}),
      },
    });
  } catch (err) {
    if (isAbortError(err)) {
      throw new Error("Temporarily unavailable");
    }
    throw err;
  } finally {
    clearTimeout(timeout);
  }
}

// ─── Retry policy ─────────────────────────────────────────────────────────────

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; reason: "http"; error: HttpStatusError; attempts: number }
  | { ok: false; reason: "exhausted"; error: Error; attempts: number };

export type RetryOptions = {
  log: Logger;
  /** Extra fields attached to every retry log line. */
  context?: Record<string, unknown>;
};

/**
 * Runs `action` until it succeeds, up to `maxRetries + 1` attempts.
 * An HttpStatusError stops immediately; 4xx/5xx responses are not transient.
 * Never throws: the caller decides whether a failed outcome is fatal.
 */
export async function withRetries<T>(
  action: (attempt: number) => Promise<T>,
  maxRetries: number,
  options: RetryOptions,
): Promise<RetryOutcome<T>> {
  const { log, context } = options;
  let attempt = 0;

  while (true) {
    try {
      const value = await action(attempt);
      return { ok: true, value, attempts: attempt + 1 };
    } catch (err) {
      if (err instanceof HttpStatusError) {
        log.debug("http_error", {
          ...context,
          status: err.status,
          url: err.url,
        });
        return { ok: false, reason: "http", error: err, attempts: attempt + 1 };
      }

      const error = err instanceof Error ? err : new Error(errorMessage(err));
      log.debug("request_attempt_failed", {
        ...context,
        attempt,
        error: error.message,
      });
      attempt += 1;
      if (attempt > maxRetries) {
        return { ok: false, reason: "exhausted", error, attempts: attempt };
      }

      log.info("request_retrying", { ...context, attempt });
    }
  }
}

// ─── Request actions ──────────────────────────────────────────────────────────

/** Releases the unread body so the connection goes back to the pool. */
async function statusError(res: Response, url: string): Promise<HttpStatusError> {
  await res.body?.cancel();
  return new HttpStatusError(res.status, res.statusText, url);
}

export async function fetchJson(
  url: string,
  timeoutMs?: number,
): Promise<unknown> {
  const res = await fetchWithTimeout(url, {}, timeoutMs);
  if (!res.ok) {
    throw await statusError(res, url);
  }
  const body: unknown = await res.json();
  return body;
}

/** Streams the response body to `destination` without buffering it. */
export async function downloadToFile(
  url: string,
  destination: string,
  timeoutMs?: number,
): Promise<void> {
  const res = await fetchWithTimeout(url, {}, timeoutMs);
  if (!res.ok) {
    throw await statusError(res, url);
  }
  if (!res.body) {
    throw new Error(`Empty response body: ${url}`);
  }

  try {
    await pipeline(Readable.fromWeb(res.body), createWriteStream(destination));
  } catch (err) {
    // A half-written file must not be parsed as a complete export.
    await rm(destination, { force: true });
    throw err;
  }
}
