import { addHours, format, isValid, parse, subDays } from "date-fns";

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const ISO_DATE_FORMAT = "yyyy-MM-dd";
const FILENAME_PATTERN = /^movie_ids_(\d{2})_(\d{2})_(\d{4})\.json\.gz$/;

/** US Eastern Standard Time, without daylight saving. */
export const DEFAULT_RUN_UTC_OFFSET_HOURS = -5;

/**
 * Parses a strict `YYYY-MM-DD` string into a local-midnight Date.
 * Returns null for other shapes and for impossible dates like 2020-13-40.
 */
export function parseIsoDate(text: string | null | undefined): Date | null {
  if (text == null || !ISO_DATE_PATTERN.test(text)) return null;
  const parsed = parse(text, ISO_DATE_FORMAT, new Date(0));
  return isValid(parsed) ? parsed : null;
}

export function isIsoDate(text: string | null | undefined): text is string {
  return parseIsoDate(text) !== null;
}

export function formatIsoDate(date: Date): string {
  return format(date, ISO_DATE_FORMAT);
}

/** Calendar day at a fixed UTC offset, as a local-midnight Date. */
export function runDate(
  now: Date = new Date(),
  utcOffsetHours: number = DEFAULT_RUN_UTC_OFFSET_HOURS,
): Date {
  const shifted = addHours(now, utcOffsetHours);
  return new Date(
    shifted.getUTCFullYear(),
    shifted.getUTCMonth(),
    shifted.getUTCDate(),
  );
}

/** `today`, then each of the `days` days before it. */
export function* backfillDates(
  today: Date,
  days: number,
): Generator<Date, void, undefined> {
  for (let offset = 0; offset <= days; offset += 1) {
    yield subDays(today, offset);
  }
}

// ─── Export filenames ─────────────────────────────────────────────────────────

const pad2 = (n: number) => String(n).padStart(2, "0");

export function exportFilename(day: number, month: number, year: number): string {
  return `movie_ids_${pad2(month)}_${pad2(day)}_${year}.json.gz`;
}

export function exportFilenameFor(date: Date): string {
  return exportFilename(date.getDate(), date.getMonth() + 1, date.getFullYear());
}

/** `movie_ids_03_05_2020.json.gz` → `2020-03-05`. */
export function ingestDateFromFilename(filename: string): string {
  const match = FILENAME_PATTERN.exec(filename);
  if (!match) {
    throw new Error(`Not an export filename: ${filename}`);
  }
  const [, month, day, year] = match;
  return `${year}-${month}-${day}`;
}
