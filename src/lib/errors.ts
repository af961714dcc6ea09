/** Invalid or missing process configuration. Always fatal. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** A 4xx/5xx response. These are never retried. */
export class HttpStatusError extends Error {
  constructor(
    readonly status: number,
    readonly statusText: string,
    readonly url: string,
  ) {
    super(`Request failed: ${status} ${statusText}`);
    this.name = "HttpStatusError";
  }
}

export class RetriesExhaustedError extends Error {
  constructor(
    readonly attempts: number,
    readonly lastError: Error,
  ) {
    super(`Max retries reached after ${attempts} attempts: ${lastError.message}`);
    this.name = "RetriesExhaustedError";
  }
}

export class StoreError extends Error {
  constructor(
    readonly operation: string,
    readonly reason: string,
  ) {
    super(`Store ${operation} failed: ${reason}`);
    this.name = "StoreError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
