type LogContext = Record<string, unknown>;

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

function thresholdFromEnv(): LogLevel {
  const raw = process.env.LOG_LEVEL?.trim().toLowerCase();
  return raw && isLogLevel(raw) ? raw : "info";
}

export type Logger = {
  readonly scope: string;
  debug: (msg: string, context?: LogContext) => void;
  info: (msg: string, context?: LogContext) => void;
  warn: (msg: string, context?: LogContext) => void;
  error: (msg: string, context?: LogContext) => void;
};

function emit(
  scope: string,
  threshold: LogLevel,
  level: LogLevel,
  msg: string,
  context?: LogContext,
) {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;
  const entry = { level, scope, msg, ts: new Date().toISOString(), ...context };
  const line = JSON.stringify(entry);
  if (level === "error") {
    console.error(line);
  } else {
    console.log(line);
  }
}

/** Structured JSON-lines logger tagged with `scope`. */
export function createLogger(
  scope: string,
  level: LogLevel = thresholdFromEnv(),
): Logger {
  return {
    scope,
    debug: (msg, context) => emit(scope, level, "debug", msg, context),
    info: (msg, context) => emit(scope, level, "info", msg, context),
    warn: (msg, context) => emit(scope, level, "warn", msg, context),
    error: (msg, context) => emit(scope, level, "error", msg, context),
  };
}

export const log = createLogger("movie-ingest");
